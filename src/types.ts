import type { z } from 'zod';
import type { Logger } from 'winston';
import type { jobDescriptorSchema, resolvedJobSchema, jobSchema, instanceSchema } from './schemas';
import type { SchedulerError, TransportError, ValidationError } from './errors';

export type AuthMode = 'http_basic' | 'kerberos';

/**
 * Produces a base64 SPNEGO token for the given service principal (e.g. `HTTP@scheduler.example.com`).
 * Typically backed by a GSSAPI binding the caller already uses.
 */
export type KerberosTokenProvider = (service: string) => Promise<string>;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Job client configuration.
 */
export interface JobClientConfig {
  url: string;
  auth: AuthMode;
  httpUser?: string;
  httpPassword?: string;
  kerberosTokenProvider?: KerberosTokenProvider;
  batchRequestSize: number;
  statusUpdateIntervalMs: number;
  requestTimeoutMs: number;
  defaultJobSettings: Partial<JobDescriptor>;
  fetch?: FetchLike;
  logger?: Logger;
}

export type JobClientOptions = Partial<JobClientConfig> & { url: string };

/** Caller-supplied description of a job to submit. `max_retries` may come from the default settings. */
export type JobDescriptor = Omit<z.input<typeof jobDescriptorSchema>, 'max_retries'> & { max_retries?: number };

/** A descriptor with defaults applied and an identifier attached. */
export type ResolvedJob = z.output<typeof resolvedJobSchema>;

export type Job = z.output<typeof jobSchema>;
export type Instance = z.output<typeof instanceSchema>;
export type JobStatus = Job['status'];
export type JobState = NonNullable<Job['state']>;

export type ResultError = TransportError | SchedulerError | ValidationError;

export interface OkResult<T> {
  status: 'OK';
  data: T;
  httpCode: number;
}

export interface ErrorResult {
  status: 'ERROR';
  reason: string;
  error: ResultError;
  httpCode?: number;
}

export type Result<T> = OkResult<T> | ErrorResult;

/** Result for a single job identifier. */
export type JobResult<T = Job> = Result<T> & { uuid: string };

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ListOptions extends RequestOptions {
  user?: string;
  states?: Array<JobStatus | JobState>;
  startTime?: Date;
  stopTime?: Date;
  limit?: number;
}

export interface WaitOptions {
  intervalMs?: number;
  /** No upper bound when omitted. */
  timeoutMs?: number;
  signal?: AbortSignal;
}
