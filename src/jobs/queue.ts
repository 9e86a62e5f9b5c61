import Bull from 'bull';
import { config } from '../config';

export interface EnrichTaskJobData {
  taskId: string;
}

export interface ReconcileJobData {
  pageSize?: number;
}

// Gateway and embedding adapter own retry policy, so Bull does not retry on top of them
export const enrichmentQueue = new Bull('task-enrichment', config.redisUrl, {
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: true,
    removeOnFail: false,
  },
});

// Queue event handlers
enrichmentQueue.on('completed', (job) => {
  console.log(`✓ Job ${job.id} (${job.name}) completed`);
});

enrichmentQueue.on('failed', (job, err) => {
  console.error(`✗ Job ${job?.id} failed:`, err.message);
});

enrichmentQueue.on('error', (error) => {
  console.error('Queue error:', error);
});

/**
 * Queue enrichment for a task. The job id carries the version so a burst of
 * requests for the same version collapses into one job.
 */
export async function enqueueEnrichment(taskId: string, version: number): Promise<void> {
  const data: EnrichTaskJobData = { taskId };
  await enrichmentQueue.add('enrich-task', data, {
    jobId: `enrich-${taskId}-v${version}`,
  });
}

export default enrichmentQueue;
