import { existsSync } from 'node:fs';
import { z } from 'zod';
import { errorMessage, IndexConfigError } from '../errors';
import type { ChunkMetadata } from '../ingest/types';
import type { Logger } from '../logger';
import { deserializeEmbedding, INDEX_SCHEMA_VERSION, openIndexDb } from './schema';

export interface Neighbor {
  chunkId: string;
  score: number;
}

export interface IndexedChunk {
  chunkId: string;
  text: string;
  metadata: ChunkMetadata;
}

const ChunkMetadataSchema = z.object({
  source: z.string(),
  type: z.enum(['webpage', 'pdf']),
  url: z.string().optional(),
  page: z.number().int().optional(),
  ordinal: z.number().int(),
});

interface ChunkRow {
  chunk_id: string;
  content: string;
  metadata: string;
  embedding: Buffer;
}

function parseMetadata(row: ChunkRow): ChunkMetadata {
  try {
    return ChunkMetadataSchema.parse(JSON.parse(row.metadata));
  } catch (err) {
    throw new IndexConfigError(`Corrupt index entry ${row.chunk_id}: ${errorMessage(err)}`);
  }
}

function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dotProduct / denom;
}

/**
 * Read-only, in-memory view of a persisted index bundle. Nothing mutates it
 * after open(), so it is safe to share across concurrent requests.
 */
export class VectorIndex {
  private constructor(
    readonly modelId: string,
    readonly dimensions: number,
    private ids: string[],
    private vectors: Float32Array[],
    private chunks: Map<string, IndexedChunk>
  ) {}

  /**
   * Load the bundle at indexPath. Fails with IndexConfigError when the bundle
   * is missing or unreadable, or was built with a different embedding model.
   */
  static open(indexPath: string, expectedModel: string, logger: Logger): VectorIndex {
    if (!existsSync(indexPath)) {
      throw new IndexConfigError(`Index not found at ${indexPath}`);
    }

    let meta: Map<string, string>;
    let rows: ChunkRow[];
    try {
      const db = openIndexDb(indexPath);
      try {
        const metaRows = db.prepare<[], { key: string; value: string }>('SELECT key, value FROM index_meta').all();
        meta = new Map(metaRows.map((r) => [r.key, r.value]));
        rows = db
          .prepare<[], ChunkRow>('SELECT chunk_id, content, metadata, embedding FROM chunks ORDER BY rowid')
          .all();
      } finally {
        db.close();
      }
    } catch (err) {
      throw new IndexConfigError(`Could not read index at ${indexPath}: ${errorMessage(err)}`);
    }

    const version = meta.get('schema_version');
    if (version !== INDEX_SCHEMA_VERSION) {
      throw new IndexConfigError(`Unsupported index schema version: ${version ?? 'none'}`);
    }

    const modelId = meta.get('embedding_model');
    if (modelId !== expectedModel) {
      throw new IndexConfigError(
        `Embedding model mismatch: index was built with "${modelId ?? 'unknown'}" but queries use "${expectedModel}"`,
      );
    }

    const dimensions = Number(meta.get('dimensions'));
    if (rows.length === 0) {
      throw new IndexConfigError(`Index at ${indexPath} has no entries`);
    }

    const ids: string[] = [];
    const vectors: Float32Array[] = [];
    const chunks = new Map<string, IndexedChunk>();
    for (const row of rows) {
      const vector = deserializeEmbedding(row.embedding);
      const metadata = parseMetadata(row);
      if (vector.length !== dimensions) {
        throw new IndexConfigError(`Corrupt index entry ${row.chunk_id}: dimension ${vector.length} != ${dimensions}`);
      }
      ids.push(row.chunk_id);
      vectors.push(vector);
      chunks.set(row.chunk_id, {
        chunkId: row.chunk_id,
        text: row.content,
        metadata,
      });
    }

    logger.info({ indexPath, entries: ids.length, model: modelId, dimensions }, 'Index loaded');
    return new VectorIndex(modelId, dimensions, ids, vectors, chunks);
  }

  get size(): number {
    return this.ids.length;
  }

  /**
   * Top-k chunk ids by cosine similarity, best first. Ties keep index order.
   */
  nearestNeighbors(queryVector: number[], k: number): Neighbor[] {
    if (queryVector.length !== this.dimensions) {
      throw new IndexConfigError(
        `Query embedding has ${queryVector.length} dimensions, index expects ${this.dimensions}`,
      );
    }

    const scored = this.vectors.map((vector, i) => ({
      chunkId: this.ids[i],
      score: cosineSimilarity(queryVector, vector),
    }));
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, Math.max(0, k));
  }

  lookup(chunkId: string): IndexedChunk | undefined {
    return this.chunks.get(chunkId);
  }
}
