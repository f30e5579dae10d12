/**
 * Download curated PDF documents, then discover more by crawling the
 * configured seed pages for linked PDFs.
 *
 * Usage: npm run download-pdfs [-- --config path/to/config.json]
 */
import { acquire } from '../src/acquisition/pipeline';
import { ContentStore } from '../src/acquisition/content-store';
import { discoverDocumentLinks } from '../src/acquisition/crawler';
import { downloadDocuments, downloadLinkedDocuments } from '../src/acquisition/downloader';
import { loadConfig } from '../src/config';
import { createLogger } from '../src/logger';
import { configPathFromArgs } from './args';

async function main() {
  const config = loadConfig(configPathFromArgs(process.argv.slice(2)));
  const logger = createLogger(config.logging);
  const { acquisition } = config;
  const { documents } = acquisition;

  const store = new ContentStore(acquisition.documentsDir, logger);
  await store.open();

  logger.info({ count: documents.urls.length }, 'Downloading curated documents');
  const curated = await acquire(
    downloadDocuments(documents.urls, { config: documents, userAgent: acquisition.userAgent }, logger),
    store,
    logger
  );
  logger.info({ stored: curated.stored, failed: curated.failed }, 'Curated documents done');

  if (documents.seedPages.length > 0) {
    logger.info({ seeds: documents.seedPages.length }, 'Discovering linked documents');
    const links = discoverDocumentLinks(
      documents.seedPages,
      {
        policy: acquisition.policy,
        userAgent: acquisition.userAgent,
        maxVisits: documents.maxCrawlPages,
        maxDocuments: documents.maxDocuments,
      },
      logger
    );
    const discovered = await acquire(
      downloadLinkedDocuments(links, { config: documents, userAgent: acquisition.userAgent }, logger),
      store,
      logger
    );
    logger.info({ stored: discovered.stored, failed: discovered.failed }, 'Discovered documents done');
  }

  const manifest = await store.readManifest();
  logger.info({ files: store.size, manifestEntries: manifest.length, dir: store.dir }, 'Document download complete');
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
