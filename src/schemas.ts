import { z } from 'zod';

export const uuidSchema = z.string().uuid();

export const jobUriSchema = z
  .object({
    value: z.string().min(1),
    executable: z.boolean().optional(),
    extract: z.boolean().optional(),
    cache: z.boolean().optional()
  })
  .passthrough();

export const jobConstraintSchema = z.tuple([z.string().min(1), z.string().min(1), z.string()]);

/**
 * Job submission schema. Field names are the scheduler's wire names.
 */
export const jobDescriptorSchema = z
  .object({
    uuid: uuidSchema.optional(),
    name: z.string().min(1).optional(),
    command: z.string().optional(),
    executor: z.enum(['mesos', 'cook']).optional(),
    priority: z.number().int().min(0).max(100).optional(),
    max_retries: z.number().int().positive(),
    max_runtime: z.number().int().positive().optional(),
    expected_runtime: z.number().int().positive().optional(),
    cpus: z.number().positive().optional(),
    mem: z.number().positive().optional(),
    gpus: z.number().int().min(0).optional(),
    ports: z.number().int().min(0).optional(),
    uris: z.array(jobUriSchema).optional(),
    env: z.record(z.string()).optional(),
    labels: z.record(z.string()).optional(),
    constraints: z.array(jobConstraintSchema).optional(),
    disable_mea_culpa_retries: z.boolean().optional(),
    container: z.record(z.unknown()).optional(),
    application: z.object({ name: z.string().min(1), version: z.string().min(1) }).optional()
  })
  .strict();

export const resolvedJobSchema = jobDescriptorSchema.extend({ uuid: uuidSchema });

export const instanceStatusSchema = z.enum(['unknown', 'running', 'success', 'failed']);

export const instanceSchema = z
  .object({
    task_id: z.string(),
    status: instanceStatusSchema,
    hostname: z.string().optional(),
    start_time: z.number().optional(),
    end_time: z.number().optional(),
    exit_code: z.number().optional(),
    reason_code: z.number().optional(),
    reason_string: z.string().optional(),
    output_url: z.string().optional(),
    preempted: z.boolean().optional()
  })
  .passthrough();

export const jobStatusSchema = z.enum(['waiting', 'running', 'completed']);
export const jobStateSchema = z.enum(['waiting', 'running', 'success', 'failed']);

/**
 * Job state record as returned by the scheduler. Unknown fields are kept.
 */
export const jobSchema = z
  .object({
    uuid: z.string(),
    status: jobStatusSchema,
    state: jobStateSchema.optional(),
    name: z.string().optional(),
    command: z.string().optional(),
    cpus: z.number().optional(),
    mem: z.number().optional(),
    gpus: z.number().optional(),
    max_retries: z.number().optional(),
    retries_remaining: z.number().optional(),
    max_runtime: z.number().optional(),
    priority: z.number().optional(),
    submit_time: z.number().optional(),
    framework_id: z.string().nullable().optional(),
    instances: z.array(instanceSchema).default([])
  })
  .passthrough();

export const jobListSchema = z.array(jobSchema);

const positiveInt = z.number().int().positive();

export const clientConfigSchema = z.object({
  url: z
    .string({ required_error: 'url is required' })
    .url('url must be an absolute URL')
    .refine((u) => /^https?:\/\//i.test(u), 'url must use http or https'),
  auth: z.enum(['http_basic', 'kerberos'], {
    errorMap: (issue, ctx) =>
      issue.code === 'invalid_enum_value'
        ? { message: `authentication type ${String(issue.received)} not supported` }
        : { message: ctx.defaultError }
  }),
  httpUser: z.string().optional(),
  httpPassword: z.string().optional(),
  batchRequestSize: positiveInt,
  statusUpdateIntervalMs: positiveInt,
  requestTimeoutMs: positiveInt,
  // a default uuid would give every submitted job the same identifier
  defaultJobSettings: jobDescriptorSchema.omit({ uuid: true }).partial()
});

export function issuesFromZod(error: z.ZodError, root = ''): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => {
    const path = issue.path
      .map((p) => (typeof p === 'number' ? `[${p}]` : `.${p}`))
      .join('')
      .replace(/^\./, '');
    return { path: root && path ? `${root}${path.startsWith('[') ? '' : '.'}${path}` : root || path, message: issue.message };
  });
}
