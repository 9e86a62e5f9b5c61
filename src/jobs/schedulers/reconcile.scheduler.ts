import { config } from '../../config';
import { enrichmentQueue } from '../queue';

/**
 * Schedule the recurring embedding reconciliation sweep
 */
export async function scheduleReconciliation() {
  await enrichmentQueue.add(
    'reconcile-embeddings',
    {},
    {
      repeat: { cron: config.enrichment.reconcileCron },
      jobId: 'reconcile-embeddings', // Prevent duplicates
    }
  );

  console.log(`✓ Embedding reconciliation scheduled (${config.enrichment.reconcileCron})`);
}
