import crypto from 'crypto';
import OpenAI from 'openai';

/**
 * Turns text into a fixed-dimension vector.
 */
export interface EmbeddingProvider {
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
}

/**
 * SHA-256 of the text an embedding was computed from; used to detect stale vectors.
 */
export function hashText(text: string): string {
  return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}

// 32-bit FNV-1a
function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Local feature-hashing embedding. No network, deterministic, good enough for
 * "same words, same neighbourhood" similarity in development and tests.
 */
export class HashedEmbeddingProvider implements EmbeddingProvider {
  constructor(readonly dimension: number = 1536) {}

  async embed(text: string): Promise<number[]> {
    const embedding = new Array<number>(this.dimension).fill(0);

    for (const token of tokenize(text)) {
      const hash = fnv1a(token);
      const index = hash % this.dimension;
      // top bit decides the sign so collisions tend to cancel out
      embedding[index] += hash & 0x80000000 ? -1 : 1;
    }

    // Normalize to unit length
    const magnitude = Math.sqrt(embedding.reduce((sum, val) => sum + val * val, 0));
    if (magnitude > 0) {
      for (let i = 0; i < embedding.length; i++) {
        embedding[i] = embedding[i] / magnitude;
      }
    }

    return embedding;
  }
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model: string;
  dimension: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly dimension: number;
  private client: OpenAI;

  constructor(private readonly options: OpenAIEmbeddingOptions, client?: OpenAI) {
    this.dimension = options.dimension;
    this.client = client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.options.model,
      input: text,
      dimensions: this.dimension,
    });

    const first = response.data[0];
    if (!first) {
      throw new Error('OpenAI returned no embedding');
    }
    return first.embedding;
  }
}

/**
 * Cosine distance (1 - cosine similarity). Zero vectors are maximally distant.
 */
export function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Embeddings must have same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 1;
  return 1 - dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}
