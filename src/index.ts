export { JobClient, SCHEDULER_ENDPOINT, LIST_ENDPOINT, RETRY_ENDPOINT, JOB_STATES } from './client';
export * from './types';
export * from './errors';
export { DEFAULTS, mergeConfig, validateConfig, configFromEnv } from './config';
export { createAuthProvider, BasicAuth, KerberosAuth } from './auth';
export type { AuthProvider } from './auth';
export { generateBatchRequest } from './jobs/batch';
export { resolveJobs } from './jobs/descriptors';
export { isTerminal } from './jobs/wait';
export { jobDescriptorSchema, jobSchema, instanceSchema } from './schemas';
export { createLogger } from './logger';
