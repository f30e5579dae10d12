import type { ChunkingConfig } from '../config';
import { IndexConfigError } from '../errors';
import { chunkDocuments, contentHash } from '../ingest/chunker';
import { type LoaderRegistry, loadCorpus } from '../ingest/loader';
import type { Logger } from '../logger';
import { type BuildSummary, buildIndex } from './builder';
import type { EmbeddingService } from './embeddings';
import { VectorIndex } from './vector-index';

export interface IndexBuildOptions {
  corpusDirs: string[];
  indexPath: string;
  chunking: ChunkingConfig;
  loaders: LoaderRegistry;
  embeddings: EmbeddingService;
  /** Query run against the fresh index and logged, as a quick sanity check. */
  smokeQuery?: string;
}

export interface IndexBuildResult extends BuildSummary {
  documents: number;
}

/**
 * Corpus directories → documents → chunks → persisted index.
 */
export async function runIndexBuild(opts: IndexBuildOptions, logger: Logger): Promise<IndexBuildResult> {
  const documents = await loadCorpus(opts.corpusDirs, opts.loaders, logger);
  if (documents.length === 0) {
    throw new IndexConfigError(`No documents found in ${opts.corpusDirs.join(', ')}`);
  }

  const chunks = chunkDocuments(documents, opts.chunking);
  logger.info({ chunks: chunks.length, ...opts.chunking }, 'Documents chunked');

  const summary = await buildIndex(chunks, opts.embeddings, opts.indexPath, logger);

  if (opts.smokeQuery) {
    const index = VectorIndex.open(opts.indexPath, opts.embeddings.modelId, logger);
    const vector = await opts.embeddings.getEmbedding(contentHash(opts.smokeQuery), opts.smokeQuery);
    for (const hit of index.nearestNeighbors(vector, 3)) {
      const chunk = index.lookup(hit.chunkId);
      logger.info(
        { chunkId: hit.chunkId, score: Number(hit.score.toFixed(4)), preview: chunk?.text.slice(0, 120) },
        'Smoke query hit',
      );
    }
  }

  return { ...summary, documents: documents.length };
}
