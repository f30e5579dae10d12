import type { EmbeddingConfig } from '../config';
import type { Logger } from '../logger';
import { OllamaClient } from '../ollama';
import { deserializeEmbedding, serializeEmbedding, type SqliteDatabase } from './schema';

/**
 * Text → fixed-length vector. modelId is the compatibility key recorded in
 * an index and checked against the query-time embedder.
 */
export interface Embedder {
  readonly modelId: string;
  embed(text: string): Promise<number[]>;
}

export class OllamaEmbedder implements Embedder {
  constructor(
    private ollama: OllamaClient,
    readonly modelId: string
  ) {}

  async embed(text: string): Promise<number[]> {
    const result = await this.ollama.embed(text, this.modelId);
    return result.embedding;
  }
}

export interface EmbeddingService {
  readonly modelId: string;
  getEmbedding(hash: string, text: string): Promise<number[]>;
  embedBatch(items: { hash: string; text: string }[]): Promise<Map<string, number[]>>;
}

/**
 * Embedding with bounded concurrency and an optional persistent cache keyed
 * by (content hash, model).
 */
export function createEmbeddingService(
  embedder: Embedder,
  concurrency: number,
  logger: Logger,
  cacheDb?: SqliteDatabase
): EmbeddingService {
  const getCached = cacheDb?.prepare<[string, string], { embedding: Buffer }>(
    'SELECT embedding FROM embedding_cache WHERE content_hash = ? AND model = ?',
  );

  const insertCache = cacheDb?.prepare(
    "INSERT OR REPLACE INTO embedding_cache (content_hash, model, embedding, created_at) VALUES (?, ?, ?, datetime('now'))",
  );

  async function getEmbedding(hash: string, text: string): Promise<number[]> {
    // Check cache first
    const cached = getCached?.get(hash, embedder.modelId);
    if (cached) {
      return Array.from(deserializeEmbedding(cached.embedding));
    }

    const embedding = await embedder.embed(text);

    if (insertCache) {
      insertCache.run(hash, embedder.modelId, serializeEmbedding(embedding));
      logger.debug({ hash: hash.slice(0, 8) }, 'Embedding cached');
    }

    return embedding;
  }

  async function embedBatch(items: { hash: string; text: string }[]): Promise<Map<string, number[]>> {
    const unique = new Map<string, string>();
    for (const item of items) {
      if (!unique.has(item.hash)) unique.set(item.hash, item.text);
    }
    const work = [...unique.entries()];
    const results = new Map<string, number[]>();
    let running = 0;
    let idx = 0;
    let failed = false;

    return new Promise((resolve, reject) => {
      if (work.length === 0) {
        resolve(results);
        return;
      }

      function next() {
        while (!failed && running < concurrency && idx < work.length) {
          const [hash, text] = work[idx++];
          running++;
          getEmbedding(hash, text)
            .then((emb) => {
              results.set(hash, emb);
              running--;
              if (results.size === work.length) {
                resolve(results);
              } else {
                next();
              }
            })
            .catch((err: unknown) => {
              failed = true;
              reject(err);
            });
        }
      }

      next();
    });
  }

  return { modelId: embedder.modelId, getEmbedding, embedBatch };
}

export function createOllamaEmbedder(config: EmbeddingConfig, logger: Logger): OllamaEmbedder {
  const ollama = new OllamaClient({ baseUrl: config.baseUrl, model: config.model }, logger);
  return new OllamaEmbedder(ollama, config.model);
}
