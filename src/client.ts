import { userInfo } from 'os';
import type { z } from 'zod';
import type { Logger } from 'winston';
import type {
  AuthMode,
  ErrorResult,
  Job,
  JobClientConfig,
  JobClientOptions,
  JobDescriptor,
  JobResult,
  JobState,
  JobStatus,
  ListOptions,
  OkResult,
  RequestOptions,
  ResolvedJob,
  Result,
  ResultError,
  WaitOptions
} from './types';
import { mergeConfig, validateConfig } from './config';
import { createAuthProvider } from './auth';
import { HttpTransport, type HttpMethod, type HttpRequest, type HttpResponse } from './http/transport';
import { chunk, jobParams } from './jobs/batch';
import { resolveJobs } from './jobs/descriptors';
import { pollUntilComplete } from './jobs/wait';
import { jobListSchema, uuidSchema } from './schemas';
import { SchedulerError, TransportError, ValidationError } from './errors';
import { logger as defaultLogger } from './logger';

export const SCHEDULER_ENDPOINT = '/rawscheduler';
export const LIST_ENDPOINT = '/list';
export const RETRY_ENDPOINT = '/retry';

export const JOB_STATES: Array<JobStatus | JobState> = ['success', 'running', 'failed', 'completed', 'waiting'];

type BatchSender<T> = (batch: string[], options: RequestOptions) => Promise<Result<Map<string, T>>>;

function ok<T>(data: T, httpCode: number): OkResult<T> {
  return { status: 'OK', data, httpCode };
}

function failure(error: ResultError, httpCode?: number): ErrorResult {
  return { status: 'ERROR', reason: error.message, error, httpCode };
}

function parseBody<T>(resp: HttpResponse, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let json: unknown;
  try {
    json = JSON.parse(resp.body);
  } catch {
    throw new SchedulerError(resp.status, resp.body, 'malformed scheduler response: body is not JSON');
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new SchedulerError(resp.status, resp.body, `malformed scheduler response: ${parsed.error.issues[0].message}`);
  }
  return parsed.data;
}

function defaultUser(): string {
  const { LOGNAME, USER, LNAME, USERNAME } = process.env;
  const fromEnv = LOGNAME || USER || LNAME || USERNAME;
  if (fromEnv) return fromEnv;
  try {
    return userInfo().username;
  } catch (err) {
    // no passwd entry for the uid, common in containers
    throw new ValidationError('user is required', [], { cause: err });
  }
}

/**
 * Client for the scheduler's REST API.
 *
 * submit/query/delete/retry/list never throw for HTTP or network failures: they resolve to
 * `{ status: 'ERROR', reason }` results. Invalid arguments throw ValidationError before any request.
 */
export class JobClient {
  public readonly config: JobClientConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(opts: JobClientOptions) {
    this.config = validateConfig(mergeConfig(opts));
    this.logger = this.config.logger ?? defaultLogger;
    this.transport = new HttpTransport({
      baseUrl: this.config.url,
      auth: createAuthProvider(this.config),
      timeoutMs: this.config.requestTimeoutMs,
      fetch: this.config.fetch ?? ((input, init) => fetch(input, init)),
      logger: this.logger
    });
  }

  getUrl(): string {
    return this.config.url;
  }

  getAuth(): AuthMode {
    return this.config.auth;
  }

  getDefaultJobSettings(): Partial<JobDescriptor> {
    return { ...this.config.defaultJobSettings };
  }

  /**
   * Descriptors with default settings applied and identifiers attached, as `submit` would send them.
   */
  resolveJobs(jobs: JobDescriptor[]): ResolvedJob[] {
    return resolveJobs(jobs, this.config.defaultJobSettings);
  }

  /**
   * Submit jobs in one request. On success `data[i]` is the identifier of `jobs[i]`.
   */
  async submit(jobs: JobDescriptor[], options: RequestOptions = {}): Promise<Result<string[]>> {
    const resolved = this.resolveJobs(jobs);
    const uuids = resolved.map((j) => j.uuid);
    const result = await this.call('POST', SCHEDULER_ENDPOINT, { body: { jobs: resolved }, signal: options.signal }, () => uuids);
    if (result.status === 'OK') this.logger.info('submitted jobs', { count: uuids.length });
    return result;
  }

  /**
   * One result per requested identifier, in request order.
   */
  async query(uuids: string[], options: RequestOptions = {}): Promise<JobResult[]> {
    return this.batched<Job>(uuids, options, this.config.batchRequestSize, (batch, opts) =>
      this.call('GET', SCHEDULER_ENDPOINT, { query: jobParams(batch), signal: opts.signal }, (resp) => {
        const jobs = parseBody(resp, jobListSchema);
        return new Map(jobs.map((job): [string, Job] => [job.uuid, job]));
      })
    );
  }

  /**
   * Mark jobs for deletion. `OK` does not mean the job has stopped running.
   */
  async delete(uuids: string[], options: RequestOptions = {}): Promise<JobResult<null>[]> {
    return this.batched<null>(uuids, options, this.config.batchRequestSize, (batch, opts) =>
      this.call('DELETE', SCHEDULER_ENDPOINT, { query: jobParams(batch), signal: opts.signal }, () =>
        new Map(batch.map((uuid): [string, null] => [uuid, null]))
      )
    );
  }

  /**
   * Reset the retry budget of each job to `retries`. One request per job.
   */
  async retry(uuids: string[], retries: number, options: RequestOptions = {}): Promise<JobResult<null>[]> {
    if (!Number.isInteger(retries) || retries < 0) {
      throw new ValidationError('retries must be an integer greater than or equal to 0');
    }
    return this.batched<null>(uuids, options, 1, (batch, opts) =>
      this.call(
        'POST',
        RETRY_ENDPOINT,
        { query: [...jobParams(batch), `retries=${retries}`], body: {}, signal: opts.signal },
        () => new Map(batch.map((uuid): [string, null] => [uuid, null]))
      )
    );
  }

  /**
   * List a user's jobs, optionally filtered by state and submission time.
   */
  async list(options: ListOptions = {}): Promise<Result<Job[]>> {
    const { user, states = JOB_STATES, startTime, stopTime, limit, signal } = options;
    for (const [name, value] of [['startTime', startTime], ['stopTime', stopTime]] as const) {
      if (value !== undefined && Number.isNaN(value.getTime())) throw new ValidationError(`${name} must be a valid date`);
    }
    if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
      throw new ValidationError('limit must be a positive integer');
    }

    const query = [`user=${encodeURIComponent(user ?? defaultUser())}`];
    // `+` separates states and must reach the scheduler encoded
    if (states.length > 0) query.push(`state=${states.map(encodeURIComponent).join('%2B')}`);
    if (startTime) query.push(`start_ms=${startTime.getTime()}`);
    if (stopTime) query.push(`stop_ms=${stopTime.getTime()}`);
    if (limit !== undefined) query.push(`limit=${limit}`);

    return this.call('GET', LIST_ENDPOINT, { query, signal }, (resp) => parseBody(resp, jobListSchema));
  }

  /**
   * Yield each job once it has completed, in completion order. Unbounded unless `timeoutMs`
   * or `signal` is given; stop iterating to stop polling.
   */
  wait(uuids: string[], options: WaitOptions = {}): AsyncGenerator<Job, void, undefined> {
    this.requireJobs(uuids);
    const invalid = uuids.filter((uuid) => !uuidSchema.safeParse(uuid).success);
    if (invalid.length > 0) throw new ValidationError('invalid job uuid', invalid.map((uuid) => ({ path: uuid, message: 'not a UUID' })));
    for (const [name, value] of [['intervalMs', options.intervalMs], ['timeoutMs', options.timeoutMs]] as const) {
      if (value !== undefined && (!Number.isFinite(value) || value <= 0)) throw new ValidationError(`${name} must be a positive number`);
    }

    return pollUntilComplete(uuids, (pending, opts) => this.query(pending, opts), {
      intervalMs: options.intervalMs ?? this.config.statusUpdateIntervalMs,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      logger: this.logger
    });
  }

  private requireJobs(uuids: string[]): void {
    if (!Array.isArray(uuids)) throw new ValidationError('jobs must be a list of UUIDs');
    if (uuids.length === 0) throw new ValidationError('one or more jobs required');
  }

  private async call<T>(method: HttpMethod, path: string, req: HttpRequest, parse: (resp: HttpResponse) => T): Promise<Result<T>> {
    try {
      const resp = await this.transport.request(method, path, req);
      if (!resp.ok) {
        this.logger.warn('scheduler rejected request', { method, path, status: resp.status });
        return failure(new SchedulerError(resp.status, resp.body), resp.status);
      }
      return ok(parse(resp), resp.status);
    } catch (err) {
      if (err instanceof SchedulerError) {
        this.logger.warn(err.message, { method, path, status: err.status });
        return failure(err, err.status);
      }
      if (err instanceof TransportError) {
        this.logger.warn(err.message, { method, path });
        return failure(err);
      }
      throw err;
    }
  }

  /**
   * Send identifiers in batches and fan the answers back out per identifier. A batch the
   * scheduler rejects is re-sent one identifier at a time so one bad job cannot fail the rest.
   */
  private async batched<T>(uuids: string[], options: RequestOptions, size: number, send: BatchSender<T>): Promise<JobResult<T>[]> {
    this.requireJobs(uuids);

    // identifiers compare case-insensitively; the scheduler may answer in canonical lowercase
    const outcomes = new Map<string, Result<T>>();
    const valid = new Map<string, string>();
    for (const uuid of uuids) {
      const key = uuid.toLowerCase();
      if (valid.has(key) || outcomes.has(key)) continue;
      if (uuidSchema.safeParse(uuid).success) valid.set(key, uuid);
      else outcomes.set(key, failure(new ValidationError(`invalid job uuid "${uuid}"`)));
    }

    const settle = async (batch: string[]): Promise<void> => {
      const res = await send(batch, options);
      if (res.status === 'OK') {
        const answered = new Map<string, Result<T>>();
        for (const [uuid, data] of res.data) answered.set(uuid.toLowerCase(), ok(data, res.httpCode));
        for (const uuid of batch) {
          const key = uuid.toLowerCase();
          outcomes.set(key, answered.get(key) ?? failure(new SchedulerError(404, '', `job ${uuid} not found`), 404));
        }
      } else if (batch.length > 1 && res.error instanceof SchedulerError) {
        this.logger.debug('batch rejected, retrying jobs individually', { size: batch.length, status: res.httpCode });
        for (const uuid of batch) await settle([uuid]);
      } else {
        for (const uuid of batch) outcomes.set(uuid.toLowerCase(), res);
      }
    };

    for (const batch of chunk([...valid.values()], size)) await settle(batch);

    return uuids.map((uuid): JobResult<T> => {
      const result = outcomes.get(uuid.toLowerCase()) ?? failure(new SchedulerError(404, '', `job ${uuid} not found`), 404);
      return { ...result, uuid };
    });
  }
}
