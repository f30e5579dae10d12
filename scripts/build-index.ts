/**
 * Load the acquired corpus, chunk it, embed every chunk and write the index.
 *
 * Usage: npm run build-index [-- --config path/to/config.json] [--query "smoke test question"]
 */
import { loadConfig } from '../src/config';
import { createLoaders } from '../src/ingest/loader';
import { createLogger } from '../src/logger';
import { runIndexBuild } from '../src/vector/build-pipeline';
import { createEmbeddingService, createOllamaEmbedder } from '../src/vector/embeddings';
import { openEmbeddingCache } from '../src/vector/schema';
import { configPathFromArgs } from './args';

async function main() {
  const args = process.argv.slice(2);
  const config = loadConfig(configPathFromArgs(args));
  const logger = createLogger(config.logging);

  const queryFlag = args.indexOf('--query');
  const smokeQuery = queryFlag >= 0 ? args[queryFlag + 1] : 'What transaction accounts are available?';

  const cacheDb = config.embedding.cachePath ? openEmbeddingCache(config.embedding.cachePath) : undefined;
  const embeddings = createEmbeddingService(
    createOllamaEmbedder(config.embedding, logger),
    config.embedding.concurrency,
    logger,
    cacheDb,
  );

  try {
    const result = await runIndexBuild(
      {
        corpusDirs: [config.acquisition.siteTextDir, config.acquisition.documentsDir],
        indexPath: config.index.path,
        chunking: config.chunking,
        loaders: createLoaders(),
        embeddings,
        smokeQuery,
      },
      logger,
    );
    logger.info(result, 'Index build complete');
  } finally {
    cacheDb?.close();
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
