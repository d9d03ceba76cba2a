import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'winston';
import type { Job, JobResult, RequestOptions } from '../types';
import { WaitTimeoutError } from '../errors';

export type QueryFn = (uuids: string[], options: RequestOptions) => Promise<JobResult[]>;

export interface PollOptions {
  intervalMs: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  logger: Logger;
}

export function isTerminal(job: Job): boolean {
  return job.status === 'completed';
}

/**
 * Poll until every job is completed, yielding each one the first time it is seen completed.
 * Failed status lookups are retried on the next interval. The timeout and the caller's signal
 * both cut the sleep short and are forwarded to in-flight requests.
 */
export async function* pollUntilComplete(uuids: string[], query: QueryFn, opts: PollOptions): AsyncGenerator<Job, void, undefined> {
  // keyed by lowercase identifier, valued by the caller's first spelling
  const pending = new Map<string, string>();
  for (const uuid of uuids) if (!pending.has(uuid.toLowerCase())) pending.set(uuid.toLowerCase(), uuid);
  const controller = new AbortController();
  const { signal: externalSignal, timeoutMs, intervalMs, logger } = opts;

  externalSignal?.throwIfAborted();
  const onAbort = () => controller.abort(externalSignal?.reason);
  externalSignal?.addEventListener('abort', onAbort, { once: true });
  const timer =
    timeoutMs === undefined
      ? undefined
      : setTimeout(() => controller.abort(new WaitTimeoutError(timeoutMs, [...pending.values()])), timeoutMs);

  try {
    let round = 0;
    while (pending.size > 0) {
      round += 1;
      const results = await query([...pending.values()], { signal: controller.signal });
      for (const result of results) {
        if (result.status === 'ERROR') {
          logger.warn('job status lookup failed, retrying on next poll', { uuid: result.uuid, reason: result.reason });
          continue;
        }
        if (isTerminal(result.data) && pending.delete(result.uuid.toLowerCase())) {
          yield result.data;
        }
      }

      if (pending.size === 0) break;
      logger.debug('waiting for jobs', { round, pending: pending.size, intervalMs });
      try {
        await sleep(intervalMs, undefined, { signal: controller.signal });
      } catch (err) {
        if (controller.signal.aborted) throw controller.signal.reason;
        throw err;
      }
    }
  } finally {
    if (timer) clearTimeout(timer);
    externalSignal?.removeEventListener('abort', onAbort);
  }
}
