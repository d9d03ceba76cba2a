export function chunk<T>(items: T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) throw new RangeError('batch size must be a positive integer');
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

export function jobParams(uuids: string[]): string[] {
  return uuids.map((uuid) => `job=${encodeURIComponent(uuid)}`);
}

/**
 * Slice identifiers into batches of `job=<uuid>` query parameters.
 */
export function generateBatchRequest(jobs: string[], batchSize: number): string[][] {
  return chunk(jobs, batchSize).map(jobParams);
}
