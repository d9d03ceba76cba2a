/**
 * Example: submit a job, then wait for it to finish.
 *
 *   SCHEDULER_URL=http://localhost:12321 SCHEDULER_HTTP_USER=alice SCHEDULER_HTTP_PASSWORD=secret npx tsx examples/submit-and-wait.ts
 */

import { JobClient } from '../src/client';
import { configFromEnv } from '../src/config';

async function main() {
  const client = new JobClient(configFromEnv());

  const submitted = await client.submit([{ command: 'echo hello', cpus: 0.5, mem: 128, max_retries: 1 }]);
  if (submitted.status === 'ERROR') {
    console.error('Submit failed:', submitted.reason);
    process.exitCode = 1;
    return;
  }
  console.log('Submitted job:', submitted.data[0]);

  for await (const job of client.wait(submitted.data, { intervalMs: 2000, timeoutMs: 10 * 60 * 1000 })) {
    const last = job.instances[job.instances.length - 1];
    console.log(`Job ${job.uuid} finished: ${job.state ?? job.status}`, last ? `(instance ${last.task_id} ${last.status})` : '');
  }
}

main().catch(console.error);
