/**
 * Crawl the public site from the configured seeds and store page text.
 *
 * Usage: npm run crawl [-- --config path/to/config.json]
 */
import { acquire } from '../src/acquisition/pipeline';
import { ContentStore } from '../src/acquisition/content-store';
import { discover } from '../src/acquisition/crawler';
import { loadConfig } from '../src/config';
import { createLogger } from '../src/logger';
import { configPathFromArgs } from './args';

async function main() {
  const config = loadConfig(configPathFromArgs(process.argv.slice(2)));
  const logger = createLogger(config.logging);
  const { acquisition } = config;

  if (acquisition.seeds.length === 0) {
    logger.error('No crawl seeds configured (acquisition.seeds)');
    process.exit(1);
  }

  const store = new ContentStore(acquisition.siteTextDir, logger);
  await store.open();

  const pages = discover(
    acquisition.seeds,
    { policy: acquisition.policy, userAgent: acquisition.userAgent, accept: ['html'] },
    logger,
  );
  const summary = await acquire(pages, store, logger);

  logger.info(
    { stored: summary.stored, failed: summary.failed, files: summary.files.length, dir: store.dir },
    'Site text crawl complete',
  );
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
