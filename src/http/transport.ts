import type { Logger } from 'winston';
import type { AuthProvider } from '../auth';
import type { FetchLike } from '../types';
import { TransportError } from '../errors';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface HttpRequest {
  /** Pre-encoded `key=value` pairs. */
  query?: string[];
  body?: unknown;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  body: string;
}

export interface HttpTransportOptions {
  baseUrl: string;
  auth: AuthProvider;
  timeoutMs: number;
  fetch: FetchLike;
  logger: Logger;
}

/**
 * One request, one fully-read response. Anything that prevents a response from arriving
 * (network error, timeout, auth provider failure) becomes a TransportError; a caller abort
 * rethrows the signal's reason.
 */
export class HttpTransport {
  private readonly baseUrl: string;

  constructor(private readonly opts: HttpTransportOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
  }

  buildUrl(path: string, query: string[] = []): string {
    return query.length > 0 ? `${this.baseUrl}${path}?${query.join('&')}` : `${this.baseUrl}${path}`;
  }

  async request(method: HttpMethod, path: string, req: HttpRequest = {}): Promise<HttpResponse> {
    const { signal: externalSignal } = req;
    externalSignal?.throwIfAborted();

    const url = this.buildUrl(path, req.query);
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.opts.timeoutMs);
    const onAbort = () => controller.abort(externalSignal?.reason);
    externalSignal?.addEventListener('abort', onAbort, { once: true });

    try {
      const authorization = await this.opts.auth.authorize(new URL(url));
      const resp = await this.opts.fetch(url, {
        method,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          Authorization: authorization
        },
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
        signal: controller.signal
      });
      // Read the whole body so the underlying connection is released.
      const body = await resp.text();
      this.opts.logger.debug('scheduler request', { method, path, status: resp.status });
      return { status: resp.status, ok: resp.ok, body };
    } catch (err) {
      if (externalSignal?.aborted) throw externalSignal.reason;
      if (timedOut) {
        throw new TransportError(`${method} ${path} timed out after ${this.opts.timeoutMs}ms`, { cause: err });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${method} ${path} failed: ${message}`, { cause: err });
    } finally {
      clearTimeout(timeoutId);
      externalSignal?.removeEventListener('abort', onAbort);
    }
  }
}
