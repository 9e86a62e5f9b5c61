import { Job } from 'bull';
import { enrichmentService } from '../../services';
import { EnrichTaskJobData, ReconcileJobData, enrichmentQueue } from '../queue';

/**
 * Worker to enrich tasks in the background (after create / description edit)
 */
async function enrichTaskWorker(job: Job<EnrichTaskJobData>) {
  const { taskId } = job.data;

  console.log(`🔄 Processing enrichment job ${job.id} for task ${taskId}`);

  const outcome = await enrichmentService.enrich(taskId);
  switch (outcome.status) {
    case 'complete':
      console.log(`✓ Task ${taskId} enriched`);
      break;
    case 'failed':
      console.warn(`⚠️ Task ${taskId} partially enriched, failed stages: ${outcome.failures.map((f) => f.stage).join(', ')}`);
      break;
    case 'already_running':
    case 'stale':
      console.log(`⏭ Task ${taskId} skipped (${outcome.status})`);
      break;
  }

  return { status: outcome.status };
}

/**
 * Worker to re-upsert embeddings that drifted from their task's description
 */
async function reconcileWorker(job: Job<ReconcileJobData>) {
  const summary = await enrichmentService.reconcileAll(job.data.pageSize);
  console.log(
    `✓ Reconciled embeddings: checked=${summary.checked} repaired=${summary.repaired} failed=${summary.failures.length}`
  );
  return summary;
}

// Register workers
enrichmentQueue.process('enrich-task', 4, enrichTaskWorker);
enrichmentQueue.process('reconcile-embeddings', reconcileWorker);

console.log('✓ Enrichment workers registered');

export { enrichTaskWorker, reconcileWorker };
