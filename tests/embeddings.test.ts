import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { createSilentLogger } from '../src/logger';
import { createEmbeddingService, type Embedder } from '../src/vector/embeddings';
import { openEmbeddingCache } from '../src/vector/schema';
import { HashingEmbedder, makeTempDir } from './helpers';

const logger = createSilentLogger();

describe('createEmbeddingService', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });

  afterEach(() => cleanup());

  test('embeds each distinct hash once per batch', async () => {
    const embedder = new HashingEmbedder();
    const service = createEmbeddingService(embedder, 2, logger);

    const result = await service.embedBatch([
      { hash: 'h1', text: 'same text' },
      { hash: 'h2', text: 'other text' },
      { hash: 'h1', text: 'same text' },
    ]);

    expect([...result.keys()].sort()).toEqual(['h1', 'h2']);
    expect(embedder.calls.sort()).toEqual(['other text', 'same text']);
  });

  test('resolves an empty batch', async () => {
    const service = createEmbeddingService(new HashingEmbedder(), 2, logger);
    expect((await service.embedBatch([])).size).toBe(0);
  });

  test('never runs more than the concurrency limit at once', async () => {
    let running = 0;
    let peak = 0;
    const embedder: Embedder = {
      modelId: 'slow',
      embed: async () => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((r) => setTimeout(r, 5));
        running--;
        return [1, 0];
      },
    };

    const service = createEmbeddingService(embedder, 3, logger);
    await service.embedBatch(Array.from({ length: 10 }, (_, i) => ({ hash: `h${i}`, text: `t${i}` })));

    expect(peak).toBe(3);
  });

  test('rejects when any embedding fails', async () => {
    const embedder: Embedder = {
      modelId: 'flaky',
      embed: async (text) => (text === 'bad' ? Promise.reject(new Error('embed failed')) : [1, 0]),
    };
    const service = createEmbeddingService(embedder, 2, logger);

    await expect(
      service.embedBatch([
        { hash: 'a', text: 'ok' },
        { hash: 'b', text: 'bad' },
      ]),
    ).rejects.toThrow('embed failed');
  });

  test('serves repeated hashes from the persistent cache', async () => {
    const cacheDb = openEmbeddingCache(join(dir, 'cache.db'));
    try {
      const embedder = new HashingEmbedder();
      const service = createEmbeddingService(embedder, 2, logger, cacheDb);

      const first = await service.getEmbedding('h1', 'cached text');
      const second = await service.getEmbedding('h1', 'cached text');

      expect(embedder.calls).toEqual(['cached text']);
      expect(second).toEqual(first);
    } finally {
      cacheDb.close();
    }
  });

  test('keys the cache by model', async () => {
    const cacheDb = openEmbeddingCache(join(dir, 'cache.db'));
    try {
      const a = new HashingEmbedder('model-a');
      const b = new HashingEmbedder('model-b');
      await createEmbeddingService(a, 1, logger, cacheDb).getEmbedding('h1', 'text');
      await createEmbeddingService(b, 1, logger, cacheDb).getEmbedding('h1', 'text');

      expect(a.calls).toHaveLength(1);
      expect(b.calls).toHaveLength(1);
    } finally {
      cacheDb.close();
    }
  });
});
