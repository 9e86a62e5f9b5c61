import { TaskStore } from '../../repositories/task.repository';
import { EnrichmentClaim, EnrichmentPatch, EnrichmentStage, StageFailure, Task } from '../../types/task.types';
import {
  AlreadyRunningError,
  AppError,
  NotFoundError,
  StageTimeoutError,
  VersionConflictError,
} from '../../utils/errors';
import { Logger, createLogger, errorMessage } from '../../utils/logger';
import { withTimeout } from '../../utils/retry';
import { EmbeddingStoreAdapter } from './embedding-store.service';
import { hashText } from './embeddings.service';
import { ClassificationResult, LLMGateway, PriorityResult, TimeEstimateResult } from './llm-gateway.service';

export interface EnrichmentStages {
  classify: boolean;
  estimate: boolean;
  priority: boolean;
}

export interface EnrichmentOptions {
  stages: EnrichmentStages;
  joinTimeoutMs: number;
  /** How long a claim holds before another run may take over an in_progress task. */
  claimLeaseMs: number;
  /** Labels offered to the classifier; it may still answer with its own. */
  categories: string[];
}

export const DEFAULT_CATEGORIES = ['work', 'personal', 'health', 'finance', 'learning', 'household', 'errands', 'social'];

/**
 * What each stage produced, with the model's confidence and raw reply for diagnostics.
 * Not persisted on its own.
 */
export interface EnrichmentResult {
  classification?: ClassificationResult;
  timeEstimate?: TimeEstimateResult;
  priority?: PriorityResult;
  sourceTextHash?: string;
}

export type EnrichmentOutcome =
  | { status: 'complete'; task: Task; result: EnrichmentResult }
  | { status: 'failed'; task: Task; result: EnrichmentResult; failures: StageFailure[] }
  | { status: 'already_running'; taskId: string; reason: AlreadyRunningError }
  | { status: 'stale'; taskId: string; startedVersion: number };

export interface ReconcileResult {
  taskId: string;
  action: 'in_sync' | 'repaired' | 'skipped';
}

export interface ReconcileSummary {
  checked: number;
  repaired: number;
  failures: Array<{ taskId: string; message: string }>;
}

export interface SimilarTask {
  task: Task;
  distance: number;
}

function toFailure(stage: EnrichmentStage, error: unknown): StageFailure {
  return {
    stage,
    code: error instanceof AppError ? error.code : 'UNEXPECTED_ERROR',
    message: errorMessage(error),
  };
}

/**
 * Enrichment pipeline.
 *
 * Per task: pending → in_progress → complete | failed. The claim to in_progress and the
 * final merge are both compare-and-set on enrichment_version, so at most one run per task
 * gets past the guard and a run for an old description never overwrites a newer edit.
 * The three LLM calls and the embedding upsert are independent; whatever succeeded is kept.
 *
 * Holds no state of its own; safe to call again for the same task.
 */
export class EnrichmentService {
  constructor(
    private readonly tasks: TaskStore,
    private readonly gateway: LLMGateway,
    private readonly embeddings: EmbeddingStoreAdapter,
    private readonly options: EnrichmentOptions,
    private readonly logger: Logger = createLogger('enrichment'),
  ) {}

  async enrich(taskId: string): Promise<EnrichmentOutcome> {
    const task = await this.tasks.findById(taskId);
    if (!task) throw new NotFoundError('Task', taskId);

    if (task.enrichment_status === 'in_progress' && this.leaseHeld(task)) {
      return { status: 'already_running', taskId, reason: new AlreadyRunningError(taskId) };
    }
    if (task.enrichment_status === 'in_progress') {
      this.logger.warn(`Claim on task ${taskId} expired, taking over`, { startedAt: task.enrichment_started_at });
    }

    let claim: EnrichmentClaim;
    try {
      claim = await this.tasks.claimEnrichment(taskId, task.enrichment_version, this.options.claimLeaseMs);
    } catch (error) {
      if (error instanceof AlreadyRunningError) {
        return { status: 'already_running', taskId, reason: error };
      }
      if (error instanceof VersionConflictError) {
        // edited between our read and the claim; the edit owns the next run
        return { status: 'stale', taskId, startedVersion: task.enrichment_version };
      }
      throw error;
    }

    const version = claim.task.enrichment_version;
    this.logger.info(`🤖 Enriching task ${taskId} (v${version})`);

    try {
      return await this.runClaimed(claim);
    } catch (error) {
      await this.releaseClaim(taskId, version, claim.token, error);
      throw error;
    }
  }

  private async runClaimed({ task, token }: EnrichmentClaim): Promise<EnrichmentOutcome> {
    const { id, description, enrichment_version: version } = task;
    const { stages } = this.options;
    const variables = { description, categories: this.options.categories.join(', ') };

    const [classification, estimate, priority, embedding] = await Promise.allSettled([
      stages.classify ? this.join('classify', this.gateway.invoke('classify_task', variables)) : Promise.resolve(null),
      stages.estimate ? this.join('estimate', this.gateway.invoke('estimate_time', variables)) : Promise.resolve(null),
      stages.priority
        ? this.join('priority', this.gateway.invoke('recommend_priority', variables))
        : Promise.resolve(null),
      this.join('embedding', this.embeddings.upsert(id, description)),
    ]);

    const result: EnrichmentResult = {};
    const failures: StageFailure[] = [];

    if (classification.status === 'fulfilled') {
      if (classification.value) result.classification = classification.value;
    } else {
      failures.push(toFailure('classify', classification.reason));
    }

    if (estimate.status === 'fulfilled') {
      if (estimate.value) result.timeEstimate = estimate.value;
    } else {
      failures.push(toFailure('estimate', estimate.reason));
    }

    if (priority.status === 'fulfilled') {
      if (priority.value) result.priority = priority.value;
    } else {
      failures.push(toFailure('priority', priority.reason));
    }

    if (embedding.status === 'fulfilled') {
      result.sourceTextHash = embedding.value;
    } else {
      failures.push(toFailure('embedding', embedding.reason));
    }

    const patch: EnrichmentPatch = {
      category: result.classification?.label,
      estimated_minutes: result.timeEstimate?.minutes,
      priority: result.priority?.priority,
      source_text_hash: result.sourceTextHash,
      enrichment_status: failures.length === 0 ? 'complete' : 'failed',
      last_enrichment_error: failures.length === 0 ? null : failures,
    };

    const saved = await this.tasks.completeEnrichment(id, version, token, patch);
    if (!saved) {
      return this.discardStale(id, version);
    }

    if (failures.length > 0) {
      this.logger.warn(`✗ Enrichment failed for task ${id}`, { failures });
      return { status: 'failed', task: saved, result, failures };
    }

    this.logger.info(`✓ Task ${id} enriched`, {
      category: saved.category,
      estimated_minutes: saved.estimated_minutes,
      priority: saved.priority,
    });
    return { status: 'complete', task: saved, result };
  }

  /**
   * User edit of the description. The running enrichment (if any) becomes stale;
   * last-known derived fields stay visible until the next run replaces them.
   */
  async updateDescription(taskId: string, description: string): Promise<Task> {
    const task = await this.tasks.findById(taskId);
    if (!task) throw new NotFoundError('Task', taskId);
    if (task.description === description) return task;

    const updated = await this.tasks.updateDescription(taskId, description);
    this.logger.info(`Task ${taskId} description changed (v${updated.enrichment_version})`);
    return updated;
  }

  /** Explicit retry: failed → pending, then enrich. */
  async retry(taskId: string): Promise<EnrichmentOutcome> {
    await this.tasks.markPending(taskId);
    return this.enrich(taskId);
  }

  /**
   * Delete a task and its vector. The vector goes first: a left-over record without a
   * vector is repaired by reconciliation, an orphaned vector is not.
   */
  async deleteTask(taskId: string): Promise<void> {
    const task = await this.tasks.findById(taskId);
    if (!task) throw new NotFoundError('Task', taskId);

    await this.embeddings.remove(taskId);
    await this.tasks.delete(taskId);
    this.logger.info(`🗑 Task ${taskId} deleted with its embedding`);
  }

  /**
   * Re-run the upsert when a complete task's vector is missing or was computed from other text.
   */
  async reconcile(taskId: string): Promise<ReconcileResult> {
    const task = await this.tasks.findById(taskId);
    if (!task) throw new NotFoundError('Task', taskId);
    if (task.enrichment_status !== 'complete') return { taskId, action: 'skipped' };

    const expected = hashText(task.description);
    const record = await this.embeddings.get(taskId);
    if (record && record.source_text_hash === expected) {
      return { taskId, action: 'in_sync' };
    }

    await this.embeddings.upsert(taskId, task.description);
    this.logger.info(`Reconciled embedding for task ${taskId}`, { hadRecord: record !== null });
    return { taskId, action: 'repaired' };
  }

  /** Sweep every complete task, one keyset page at a time. */
  async reconcileAll(pageSize: number = 500): Promise<ReconcileSummary> {
    const summary: ReconcileSummary = { checked: 0, repaired: 0, failures: [] };
    let afterId: string | null = null;

    for (;;) {
      const page: Task[] = await this.tasks.pageByStatus('complete', afterId, pageSize);

      for (const task of page) {
        summary.checked++;
        try {
          const { action } = await this.reconcile(task.id);
          if (action === 'repaired') summary.repaired++;
        } catch (error) {
          this.logger.error(`Reconcile failed for task ${task.id}`, { error: errorMessage(error) });
          summary.failures.push({ taskId: task.id, message: errorMessage(error) });
        }
      }

      if (page.length < pageSize) break;
      afterId = page[page.length - 1].id;
    }

    return summary;
  }

  /** Nearest tasks to this task's description, excluding itself. */
  async findSimilar(taskId: string, k: number = 5): Promise<SimilarTask[]> {
    const task = await this.tasks.findById(taskId);
    if (!task) throw new NotFoundError('Task', taskId);

    const neighbors = await this.embeddings.queryText(task.description, k + 1);
    const similar: SimilarTask[] = [];
    for (const neighbor of neighbors) {
      if (neighbor.task_id === taskId) continue;
      const match = await this.tasks.findById(neighbor.task_id);
      if (match) similar.push({ task: match, distance: neighbor.distance });
      if (similar.length === k) break;
    }
    return similar;
  }

  private join<T>(stage: EnrichmentStage, call: Promise<T>): Promise<T> {
    return withTimeout(call, this.options.joinTimeoutMs, () => new StageTimeoutError(stage, this.options.joinTimeoutMs));
  }

  private leaseHeld(task: Task): boolean {
    if (!task.enrichment_started_at) return false;
    return Date.now() - new Date(task.enrichment_started_at).getTime() < this.options.claimLeaseMs;
  }

  private async discardStale(taskId: string, startedVersion: number): Promise<EnrichmentOutcome> {
    const current = await this.tasks.findById(taskId);
    if (!current) {
      // deleted while we ran; our upsert may have re-created the vector
      await this.embeddings.remove(taskId);
    } else {
      await this.realignEmbedding(current);
    }
    this.logger.info(`Discarded stale enrichment for task ${taskId}`, {
      startedVersion,
      currentVersion: current?.enrichment_version ?? null,
    });
    return { status: 'stale', taskId, startedVersion };
  }

  /**
   * A discarded run's upsert may have landed after the newer run's, leaving the vector on
   * the old text. Put it back on the current description.
   */
  private async realignEmbedding(current: Task): Promise<void> {
    try {
      const record = await this.embeddings.get(current.id);
      if (!record || record.source_text_hash === hashText(current.description)) return;

      await this.embeddings.upsert(current.id, current.description);
      this.logger.info(`Re-aligned embedding for task ${current.id} after a stale run`);
    } catch (error) {
      // the reconcile sweep repairs it later
      this.logger.error(`Could not re-align embedding for task ${current.id}`, { error: errorMessage(error) });
    }
  }

  // Never leave a task stuck in in_progress after an unexpected error
  private async releaseClaim(taskId: string, version: number, token: string, cause: unknown): Promise<void> {
    try {
      await this.tasks.completeEnrichment(taskId, version, token, {
        enrichment_status: 'failed',
        last_enrichment_error: [toFailure('merge', cause)],
      });
    } catch (releaseError) {
      this.logger.error(`Could not release enrichment claim on task ${taskId}`, {
        error: errorMessage(releaseError),
        cause: errorMessage(cause),
      });
    }
  }
}
