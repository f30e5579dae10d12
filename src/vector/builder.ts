import { existsSync, renameSync, rmSync } from 'node:fs';
import { IndexConfigError } from '../errors';
import { contentHash } from '../ingest/chunker';
import type { Chunk } from '../ingest/types';
import type { Logger } from '../logger';
import type { EmbeddingService } from './embeddings';
import { createIndexDb, INDEX_SCHEMA_VERSION, serializeEmbedding } from './schema';

export interface BuildSummary {
  indexPath: string;
  modelId: string;
  dimensions: number;
  entries: number;
}

function tempPathFor(indexPath: string): string {
  return `${indexPath}.${process.pid}.${Math.random().toString(16).slice(2)}.tmp`;
}

/**
 * Embed every chunk with one model and persist the index bundle at
 * indexPath, replacing any previous bundle.
 *
 * The bundle is written to a temporary file and renamed into place, so a
 * failed build never leaves a partial index and a rebuild never
 * accumulates entries from an earlier one.
 */
export async function buildIndex(
  chunks: Chunk[],
  embeddings: EmbeddingService,
  indexPath: string,
  logger: Logger
): Promise<BuildSummary> {
  if (chunks.length === 0) {
    throw new IndexConfigError('No chunks to index; refusing to write an empty index');
  }
  if (!embeddings.modelId) {
    throw new IndexConfigError('No embedding model configured');
  }

  const seen = new Set<string>();
  for (const chunk of chunks) {
    if (seen.has(chunk.chunkId)) {
      throw new IndexConfigError(`Duplicate chunk id: ${chunk.chunkId}`);
    }
    seen.add(chunk.chunkId);
  }

  logger.info({ chunks: chunks.length, model: embeddings.modelId }, 'Embedding chunks');
  const hashes = chunks.map((c) => contentHash(c.text));
  const vectors = await embeddings.embedBatch(chunks.map((c, i) => ({ hash: hashes[i], text: c.text })));

  let dimensions = 0;
  const rows = chunks.map((chunk, i) => {
    const vector = vectors.get(hashes[i]);
    if (!vector || vector.length === 0) {
      throw new IndexConfigError(`Missing embedding for chunk ${chunk.chunkId}`);
    }
    if (dimensions === 0) dimensions = vector.length;
    if (vector.length !== dimensions) {
      throw new IndexConfigError(
        `Embedding dimension mismatch for chunk ${chunk.chunkId}: ${vector.length} != ${dimensions}`,
      );
    }
    return { chunk, vector };
  });

  const tmpPath = tempPathFor(indexPath);
  const db = createIndexDb(tmpPath);
  try {
    const insertMeta = db.prepare('INSERT INTO index_meta (key, value) VALUES (?, ?)');
    const insertChunk = db.prepare(
      'INSERT INTO chunks (chunk_id, parent_document_id, ordinal, content, metadata, embedding) VALUES (?, ?, ?, ?, ?, ?)',
    );

    const writeAll = db.transaction(() => {
      insertMeta.run('schema_version', INDEX_SCHEMA_VERSION);
      insertMeta.run('embedding_model', embeddings.modelId);
      insertMeta.run('dimensions', String(dimensions));
      insertMeta.run('entries', String(rows.length));
      insertMeta.run('built_at', new Date().toISOString());
      for (const { chunk, vector } of rows) {
        insertChunk.run(
          chunk.chunkId,
          chunk.parentDocumentId,
          chunk.ordinal,
          chunk.text,
          JSON.stringify(chunk.metadata),
          serializeEmbedding(vector),
        );
      }
    });
    writeAll();
    db.close();

    renameSync(tmpPath, indexPath);
  } catch (err) {
    if (db.open) db.close();
    if (existsSync(tmpPath)) rmSync(tmpPath, { force: true });
    throw err;
  }

  logger.info({ indexPath, entries: rows.length, dimensions, model: embeddings.modelId }, 'Index written');
  return { indexPath, modelId: embeddings.modelId, dimensions, entries: rows.length };
}
