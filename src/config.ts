import { z } from 'zod';
import type { AuthMode, JobClientConfig, JobClientOptions } from './types';
import { clientConfigSchema } from './schemas';
import { ConfigurationError } from './errors';

export const DEFAULTS: Omit<JobClientConfig, 'url'> = {
  auth: 'http_basic',
  batchRequestSize: 32,
  statusUpdateIntervalMs: 10_000,
  requestTimeoutMs: 60_000,
  defaultJobSettings: { max_retries: 1 }
};

export function mergeConfig(cfg: JobClientOptions): JobClientConfig {
  return {
    ...cfg,
    auth: cfg.auth ?? DEFAULTS.auth,
    batchRequestSize: cfg.batchRequestSize ?? DEFAULTS.batchRequestSize,
    statusUpdateIntervalMs: cfg.statusUpdateIntervalMs ?? DEFAULTS.statusUpdateIntervalMs,
    requestTimeoutMs: cfg.requestTimeoutMs ?? DEFAULTS.requestTimeoutMs,
    defaultJobSettings: { ...(cfg.defaultJobSettings ?? DEFAULTS.defaultJobSettings) }
  };
}

/**
 * Throws ConfigurationError naming the first invalid option.
 */
export function validateConfig(cfg: JobClientConfig): JobClientConfig {
  const parsed = clientConfigSchema.safeParse(cfg);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigurationError(field === 'auth' ? issue.message : `${field}: ${issue.message}`);
  }

  if (cfg.auth === 'http_basic') {
    if (cfg.httpUser === undefined) throw new ConfigurationError('HTTP user is required when authentication is HTTP basic');
    if (cfg.httpPassword === undefined) throw new ConfigurationError('HTTP password is required when authentication is HTTP basic');
  } else if (!cfg.kerberosTokenProvider) {
    throw new ConfigurationError('kerberosTokenProvider is required when authentication is kerberos');
  }
  return cfg;
}

const authModeSchema = z.enum(['http_basic', 'kerberos']);

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  return n;
}

/**
 * Build client options from `SCHEDULER_*` environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): JobClientOptions {
  const url = env.SCHEDULER_URL;
  if (!url) throw new ConfigurationError('SCHEDULER_URL is required');

  let auth: AuthMode | undefined;
  if (env.SCHEDULER_AUTH) {
    const parsed = authModeSchema.safeParse(env.SCHEDULER_AUTH);
    if (!parsed.success) throw new ConfigurationError(`authentication type ${env.SCHEDULER_AUTH} not supported`);
    auth = parsed.data;
  }

  return {
    url,
    auth,
    httpUser: env.SCHEDULER_HTTP_USER,
    httpPassword: env.SCHEDULER_HTTP_PASSWORD,
    batchRequestSize: envNumber(env, 'SCHEDULER_BATCH_REQUEST_SIZE'),
    statusUpdateIntervalMs: envNumber(env, 'SCHEDULER_STATUS_UPDATE_INTERVAL_MS'),
    requestTimeoutMs: envNumber(env, 'SCHEDULER_REQUEST_TIMEOUT_MS')
  };
}
