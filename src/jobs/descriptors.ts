import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { JobDescriptor, ResolvedJob } from '../types';
import { resolvedJobSchema, issuesFromZod } from '../schemas';
import { ValidationError } from '../errors';

const resolvedJobsSchema = z.array(resolvedJobSchema);

function merge(defaults: Partial<JobDescriptor>, job: JobDescriptor): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const source of [defaults, job]) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  merged.uuid = job.uuid ?? randomUUID();
  return merged;
}

/**
 * Apply default settings and attach an identifier to every descriptor that lacks one.
 * Returns new objects in input order; the caller's descriptors are left untouched.
 */
export function resolveJobs(jobs: JobDescriptor[], defaults: Partial<JobDescriptor> = {}): ResolvedJob[] {
  if (!Array.isArray(jobs) || jobs.length === 0) throw new ValidationError('one or more jobs required');

  const parsed = resolvedJobsSchema.safeParse(jobs.map((job) => merge(defaults, job)));
  if (!parsed.success) throw new ValidationError('invalid job definition', issuesFromZod(parsed.error, 'jobs'));
  return parsed.data;
}
