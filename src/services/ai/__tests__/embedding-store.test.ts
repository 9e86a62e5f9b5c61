import { describe, it, expect, vi } from 'vitest';
import { EmbeddingDimensionError, EmbeddingStoreAdapter } from '../embedding-store.service';
import { EmbeddingProvider, HashedEmbeddingProvider, cosineDistance, hashText, tokenize } from '../embeddings.service';
import { InMemoryVectorStore } from '../../../repositories/embedding.repository';
import { VectorStoreUnavailableError } from '../../../utils/errors';
import { createMockLogger } from '../../../__tests__/helpers/fakes';

function setup(provider: EmbeddingProvider = new HashedEmbeddingProvider(64)) {
  const store = new InMemoryVectorStore();
  const sleep = vi.fn(async (_ms: number) => undefined);
  const adapter = new EmbeddingStoreAdapter(
    provider,
    store,
    { maxAttempts: 3, backoffBaseMs: 50, backoffCapMs: 400 },
    createMockLogger(),
    sleep,
  );
  return { adapter, store, sleep };
}

function unit(dimension: number, index: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  vector[index] = 1;
  return vector;
}

describe('EmbeddingStoreAdapter', () => {
  it('stores one record per task and returns the text hash', async () => {
    const { adapter, store } = setup();

    const hash = await adapter.upsert('task-1', 'Book flights');

    expect(hash).toBe(hashText('Book flights'));
    const record = await store.get('task-1');
    expect(record?.source_text_hash).toBe(hash);
    expect(record?.embedding).toHaveLength(64);
  });

  it('replaces the previous vector on re-upsert', async () => {
    const { adapter, store } = setup();

    await adapter.upsert('task-1', 'Book flights');
    await adapter.upsert('task-1', 'Book hotel');

    expect(store.size).toBe(1);
    expect((await store.get('task-1'))?.source_text_hash).toBe(hashText('Book hotel'));
  });

  it('returns neighbours ordered by distance with ties broken by id', async () => {
    const { adapter, store } = setup();
    await store.upsert({ task_id: 'b', embedding: unit(64, 0), source_text_hash: 'x' });
    await store.upsert({ task_id: 'a', embedding: unit(64, 0), source_text_hash: 'x' });
    await store.upsert({ task_id: 'c', embedding: unit(64, 1), source_text_hash: 'x' });

    const neighbours = await adapter.query(unit(64, 0), 2);

    expect(neighbours).toEqual([
      { task_id: 'a', distance: 0 },
      { task_id: 'b', distance: 0 },
    ]);
  });

  it('returns nothing for k of zero', async () => {
    const { adapter } = setup();
    await adapter.upsert('task-1', 'Book flights');

    expect(await adapter.query(unit(64, 0), 0)).toEqual([]);
  });

  it('rejects a query vector of the wrong dimension', async () => {
    const { adapter } = setup();

    await expect(adapter.query([1, 0, 0], 3)).rejects.toBeInstanceOf(EmbeddingDimensionError);
  });

  it('rejects a provider that returns the wrong dimension', async () => {
    const provider: EmbeddingProvider = { dimension: 8, embed: async () => [1, 0] };
    const { adapter, store } = setup(provider);

    await expect(adapter.upsert('task-1', 'x')).rejects.toThrow('Embedding has 2 dimensions, index expects 8');
    expect(store.size).toBe(0);
  });

  it('treats removing an unknown id as a no-op', async () => {
    const { adapter } = setup();

    await expect(adapter.remove('nobody')).resolves.toBeUndefined();
  });

  it('retries backend failures before giving up', async () => {
    const { adapter, store, sleep } = setup();
    const upsert = vi.spyOn(store, 'upsert').mockRejectedValue(new Error('timeout'));

    const error = await adapter.upsert('task-1', 'Book flights').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(VectorStoreUnavailableError);
    expect(error).toMatchObject({ operation: 'upsert', attempts: 3, code: 'VECTOR_STORE_UNAVAILABLE' });
    expect(upsert).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([50, 100]);
  });

  it('recovers from a single backend failure', async () => {
    const { adapter, store } = setup();
    vi.spyOn(store, 'get').mockRejectedValueOnce(new Error('reset'));
    await store.upsert({ task_id: 'task-1', embedding: unit(64, 3), source_text_hash: 'h' });

    const record = await adapter.get('task-1');

    expect(record?.source_text_hash).toBe('h');
  });
});

describe('HashedEmbeddingProvider', () => {
  it('is deterministic and unit length', async () => {
    const provider = new HashedEmbeddingProvider(128);

    const first = await provider.embed('Water the plants');
    const second = await provider.embed('Water the plants');

    expect(first).toEqual(second);
    const norm = Math.sqrt(first.reduce((sum, value) => sum + value * value, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it('ignores case and punctuation', async () => {
    const provider = new HashedEmbeddingProvider(128);

    expect(await provider.embed('Water the plants!')).toEqual(await provider.embed('water THE plants'));
  });

  it('maps empty text to the zero vector', async () => {
    const provider = new HashedEmbeddingProvider(16);

    expect(await provider.embed('  ...  ')).toEqual(new Array<number>(16).fill(0));
  });
});

describe('tokenize', () => {
  it('splits on anything that is not a letter or digit', () => {
    expect(tokenize("Café run #2, don't forget")).toEqual(['café', 'run', '2', 'don', 't', 'forget']);
  });
});

describe('cosineDistance', () => {
  it('is 0 for identical directions and 1 for orthogonal ones', () => {
    expect(cosineDistance([2, 0], [5, 0])).toBe(0);
    expect(cosineDistance([1, 0], [0, 1])).toBe(1);
  });

  it('treats a zero vector as maximally distant', () => {
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
  });

  it('rejects vectors of different length', () => {
    expect(() => cosineDistance([1], [1, 0])).toThrow('Embeddings must have same length');
  });
});
