import crypto from 'crypto';
import { Queryable } from '../config/database';
import {
  CreateTaskInput,
  EnrichmentClaim,
  EnrichmentPatch,
  EnrichmentStatus,
  ListTasksOptions,
  Task,
} from '../types/task.types';
import { AlreadyRunningError, NotFoundError, VersionConflictError } from '../utils/errors';

/**
 * Durable task records. The enrichment pipeline reads and writes through this interface;
 * every write it makes is guarded by the task's enrichment_version.
 */
export interface TaskStore {
  create(input: CreateTaskInput): Promise<Task>;
  findById(id: string): Promise<Task | null>;
  list(options?: ListTasksOptions): Promise<Task[]>;
  /** Keyset page in id order, for sweeps that must visit every matching task. */
  pageByStatus(status: EnrichmentStatus, afterId: string | null, limit: number): Promise<Task[]>;
  /** User edit: bumps enrichment_version and resets status to pending. Other fields are kept. */
  updateDescription(id: string, description: string): Promise<Task>;
  /**
   * Compare-and-set → in_progress at `expectedVersion`. An in_progress row is taken over
   * once its claim is older than `leaseMs` (the run that held it is presumed dead).
   * Throws NotFoundError, AlreadyRunningError or VersionConflictError when the claim is lost.
   */
  claimEnrichment(id: string, expectedVersion: number, leaseMs: number): Promise<EnrichmentClaim>;
  /**
   * Merge derived fields and the final status in one write. Returns null when the task
   * moved on (new version, claim taken over, or no longer in_progress) and the result
   * must be discarded.
   */
  completeEnrichment(id: string, expectedVersion: number, token: string, patch: EnrichmentPatch): Promise<Task | null>;
  /** failed → pending (explicit retry). Returns the current record either way. */
  markPending(id: string): Promise<Task>;
  delete(id: string): Promise<boolean>;
}

export class TaskRepository implements TaskStore {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateTaskInput): Promise<Task> {
    const { title, description } = input;

    const result = await this.db.query<Task>(
      `INSERT INTO tasks (title, description, enrichment_status, enrichment_version)
       VALUES ($1, $2, 'pending', 1)
       RETURNING *`,
      [title ?? null, description]
    );
    return result.rows[0];
  }

  async findById(id: string): Promise<Task | null> {
    const result = await this.db.query<Task>('SELECT * FROM tasks WHERE id = $1', [id]);
    return result.rows[0] || null;
  }

  async list({ status, limit = 50 }: ListTasksOptions = {}): Promise<Task[]> {
    const query = status
      ? 'SELECT * FROM tasks WHERE enrichment_status = $1 ORDER BY created_at DESC LIMIT $2'
      : 'SELECT * FROM tasks ORDER BY created_at DESC LIMIT $1';
    const params = status ? [status, limit] : [limit];
    const result = await this.db.query<Task>(query, params);
    return result.rows;
  }

  async pageByStatus(status: EnrichmentStatus, afterId: string | null, limit: number): Promise<Task[]> {
    const result = afterId
      ? await this.db.query<Task>(
          'SELECT * FROM tasks WHERE enrichment_status = $1 AND id > $2 ORDER BY id LIMIT $3',
          [status, afterId, limit]
        )
      : await this.db.query<Task>('SELECT * FROM tasks WHERE enrichment_status = $1 ORDER BY id LIMIT $2', [
          status,
          limit,
        ]);
    return result.rows;
  }

  async updateDescription(id: string, description: string): Promise<Task> {
    const result = await this.db.query<Task>(
      `UPDATE tasks
       SET description = $2,
           enrichment_status = 'pending',
           enrichment_version = enrichment_version + 1,
           updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [id, description]
    );
    const task = result.rows[0];
    if (!task) throw new NotFoundError('Task', id);
    return task;
  }

  async claimEnrichment(id: string, expectedVersion: number, leaseMs: number): Promise<EnrichmentClaim> {
    const token = crypto.randomUUID();
    const result = await this.db.query<Task>(
      `UPDATE tasks
       SET enrichment_status = 'in_progress',
           enrichment_started_at = NOW(),
           enrichment_claim = $3,
           updated_at = NOW()
       WHERE id = $1 AND enrichment_version = $2
         AND (enrichment_status <> 'in_progress'
              OR enrichment_started_at IS NULL
              OR enrichment_started_at < NOW() - $4::int * INTERVAL '1 millisecond')
       RETURNING *`,
      [id, expectedVersion, token, leaseMs]
    );
    if (result.rows[0]) return { task: result.rows[0], token };

    // Lost the claim: work out why
    const current = await this.findById(id);
    if (!current) throw new NotFoundError('Task', id);
    if (current.enrichment_status === 'in_progress') throw new AlreadyRunningError(id);
    throw new VersionConflictError(id, expectedVersion);
  }

  async completeEnrichment(
    id: string,
    expectedVersion: number,
    token: string,
    patch: EnrichmentPatch
  ): Promise<Task | null> {
    const result = await this.db.query<Task>(
      `UPDATE tasks
       SET category = COALESCE($3, category),
           estimated_minutes = COALESCE($4, estimated_minutes),
           priority = COALESCE($5, priority),
           source_text_hash = COALESCE($6, source_text_hash),
           enrichment_status = $7,
           last_enrichment_error = $8,
           enriched_at = NOW(),
           updated_at = NOW()
       WHERE id = $1 AND enrichment_version = $2 AND enrichment_status = 'in_progress'
         AND enrichment_claim = $9
       RETURNING *`,
      [
        id,
        expectedVersion,
        patch.category ?? null,
        patch.estimated_minutes ?? null,
        patch.priority ?? null,
        patch.source_text_hash ?? null,
        patch.enrichment_status,
        patch.last_enrichment_error ? JSON.stringify(patch.last_enrichment_error) : null,
        token,
      ]
    );
    return result.rows[0] || null;
  }

  async markPending(id: string): Promise<Task> {
    const result = await this.db.query<Task>(
      `UPDATE tasks SET enrichment_status = 'pending', updated_at = NOW()
       WHERE id = $1 AND enrichment_status = 'failed'
       RETURNING *`,
      [id]
    );
    if (result.rows[0]) return result.rows[0];

    const current = await this.findById(id);
    if (!current) throw new NotFoundError('Task', id);
    return current;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM tasks WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
