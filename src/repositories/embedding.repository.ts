import { Queryable } from '../config/database';
import { cosineDistance } from '../services/ai/embeddings.service';

export interface EmbeddingRecord {
  task_id: string;
  embedding: number[];
  source_text_hash: string;
  updated_at: Date;
}

export interface Neighbor {
  task_id: string;
  distance: number;
}

/**
 * Storage of one vector per task, nearest-neighbour by cosine distance.
 */
export interface VectorStore {
  upsert(record: Omit<EmbeddingRecord, 'updated_at'>): Promise<void>;
  query(embedding: number[], k: number): Promise<Neighbor[]>;
  get(taskId: string): Promise<EmbeddingRecord | null>;
  remove(taskId: string): Promise<void>;
}

interface EmbeddingRow {
  task_id: string;
  embedding: string;
  source_text_hash: string;
  updated_at: Date;
}

function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}

// pgvector returns vectors as text: "[0.1,0.2,...]"
export function parseVectorLiteral(value: string): number[] {
  const inner = value.trim().replace(/^\[/, '').replace(/\]$/, '');
  if (inner === '') return [];
  return inner.split(',').map((part) => Number(part));
}

export class PgVectorStore implements VectorStore {
  constructor(private readonly db: Queryable) {}

  async upsert({ task_id, embedding, source_text_hash }: Omit<EmbeddingRecord, 'updated_at'>): Promise<void> {
    await this.db.query(
      `INSERT INTO task_embeddings (task_id, embedding, source_text_hash, updated_at)
       VALUES ($1, $2::vector, $3, NOW())
       ON CONFLICT (task_id) DO UPDATE
         SET embedding = EXCLUDED.embedding,
             source_text_hash = EXCLUDED.source_text_hash,
             updated_at = NOW()`,
      [task_id, toVectorLiteral(embedding), source_text_hash]
    );
  }

  async query(embedding: number[], k: number): Promise<Neighbor[]> {
    const result = await this.db.query<{ task_id: string; distance: string | number }>(
      `SELECT task_id, embedding <=> $1::vector AS distance
       FROM task_embeddings
       ORDER BY embedding <=> $1::vector, task_id
       LIMIT $2`,
      [toVectorLiteral(embedding), k]
    );
    return result.rows.map((row) => ({ task_id: row.task_id, distance: Number(row.distance) }));
  }

  async get(taskId: string): Promise<EmbeddingRecord | null> {
    const result = await this.db.query<EmbeddingRow>(
      'SELECT task_id, embedding::text AS embedding, source_text_hash, updated_at FROM task_embeddings WHERE task_id = $1',
      [taskId]
    );
    const row = result.rows[0];
    if (!row) return null;
    return { ...row, embedding: parseVectorLiteral(row.embedding) };
  }

  async remove(taskId: string): Promise<void> {
    await this.db.query('DELETE FROM task_embeddings WHERE task_id = $1', [taskId]);
  }
}

/**
 * In-process vector index (VECTOR_BACKEND=memory). Brute-force scan.
 */
export class InMemoryVectorStore implements VectorStore {
  private records = new Map<string, EmbeddingRecord>();

  async upsert(record: Omit<EmbeddingRecord, 'updated_at'>): Promise<void> {
    this.records.set(record.task_id, { ...record, embedding: [...record.embedding], updated_at: new Date() });
  }

  async query(embedding: number[], k: number): Promise<Neighbor[]> {
    if (k <= 0) return [];
    return [...this.records.values()]
      .map((record) => ({ task_id: record.task_id, distance: cosineDistance(embedding, record.embedding) }))
      .sort((a, b) => a.distance - b.distance || a.task_id.localeCompare(b.task_id))
      .slice(0, k);
  }

  async get(taskId: string): Promise<EmbeddingRecord | null> {
    return this.records.get(taskId) ?? null;
  }

  async remove(taskId: string): Promise<void> {
    this.records.delete(taskId);
  }

  get size(): number {
    return this.records.size;
  }
}
