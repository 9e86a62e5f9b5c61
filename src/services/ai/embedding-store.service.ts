import { EmbeddingRecord, Neighbor, VectorStore } from '../../repositories/embedding.repository';
import { AppError, VectorStoreUnavailableError } from '../../utils/errors';
import { Logger, createLogger, errorMessage } from '../../utils/logger';
import { BackoffPolicy, RetryExhaustedError, Sleep, retryWithBackoff } from '../../utils/retry';
import { EmbeddingProvider, hashText } from './embeddings.service';

export class EmbeddingDimensionError extends AppError {
  constructor(readonly expected: number, readonly actual: number) {
    super(`Embedding has ${actual} dimensions, index expects ${expected}`, 'EMBEDDING_DIMENSION_MISMATCH', 500, {
      isOperational: false,
    });
  }
}

/**
 * Owns the vector side of a task: computes the embedding for its text and keeps
 * exactly one record per task id in the vector index (last write wins).
 *
 * Backend failures are retried locally; once the budget is spent they surface as
 * VectorStoreUnavailableError, separate from LLM failures so callers can treat them apart.
 */
export class EmbeddingStoreAdapter {
  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly store: VectorStore,
    private readonly retry: BackoffPolicy,
    private readonly logger: Logger = createLogger('embeddings'),
    private readonly sleep?: Sleep,
  ) {}

  get dimension(): number {
    return this.provider.dimension;
  }

  async upsert(taskId: string, text: string): Promise<string> {
    const embedding = await this.withRetry('embed', () => this.provider.embed(text));
    this.assertDimension(embedding);

    const sourceTextHash = hashText(text);
    await this.withRetry('upsert', () =>
      this.store.upsert({ task_id: taskId, embedding, source_text_hash: sourceTextHash })
    );

    this.logger.debug('Embedding stored', { taskId, sourceTextHash });
    return sourceTextHash;
  }

  async query(embedding: number[], k: number): Promise<Neighbor[]> {
    this.assertDimension(embedding);
    if (k <= 0) return [];
    return this.withRetry('query', () => this.store.query(embedding, k));
  }

  async queryText(text: string, k: number): Promise<Neighbor[]> {
    const embedding = await this.withRetry('embed', () => this.provider.embed(text));
    return this.query(embedding, k);
  }

  async get(taskId: string): Promise<EmbeddingRecord | null> {
    return this.withRetry('get', () => this.store.get(taskId));
  }

  /** Removing an id that has no vector is not an error. */
  async remove(taskId: string): Promise<void> {
    await this.withRetry('remove', () => this.store.remove(taskId));
    this.logger.debug('Embedding removed', { taskId });
  }

  private assertDimension(embedding: number[]): void {
    if (embedding.length !== this.provider.dimension) {
      throw new EmbeddingDimensionError(this.provider.dimension, embedding.length);
    }
  }

  private async withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await retryWithBackoff(fn, {
        ...this.retry,
        isRetryable: () => true,
        sleep: this.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn(`Vector ${operation} attempt ${attempt} failed, retrying in ${delayMs}ms`, {
            error: errorMessage(error),
          });
        },
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new VectorStoreUnavailableError(operation, error.attempts, error.lastError);
      }
      throw error;
    }
  }
}
