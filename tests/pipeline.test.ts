import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import pino from 'pino';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { ContentStore, sha256Hex } from '../src/acquisition/content-store';
import { discover, tagPageText } from '../src/acquisition/crawler';
import { acquire } from '../src/acquisition/pipeline';
import type { CrawlPolicy } from '../src/config';
import { IndexConfigError } from '../src/errors';
import { createLoaders } from '../src/ingest/loader';
import { createSilentLogger } from '../src/logger';
import { runIndexBuild } from '../src/vector/build-pipeline';
import { createEmbeddingService } from '../src/vector/embeddings';
import { VectorIndex } from '../src/vector/vector-index';
import { fakeFetch, HashingEmbedder, htmlPage, makeTempDir } from './helpers';

const logger = createSilentLogger();

const policy: CrawlPolicy = {
  allowedHostSuffix: 'bank.test',
  pathAllowList: ['/personal'],
  pathDenyList: [],
  maxPages: 10,
  perPageLinkLimit: 20,
  requestTimeout: 1000,
  interRequestDelay: 0,
  minTextLength: 5,
  maxBytes: 100_000,
};

describe('acquisition into the content store', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });

  afterEach(() => cleanup());

  test('stores crawled pages and records each one in the manifest', async () => {
    const { fetchFn } = fakeFetch({
      'https://www.bank.test/personal.html': htmlPage('<p>Personal overview</p><a href="/personal/accounts.html">Accounts</a>'),
      'https://www.bank.test/personal/accounts.html': htmlPage('<p>Everyday Account</p>'),
    });
    const store = new ContentStore(dir, logger);
    await store.open();

    const summary = await acquire(
      discover(['https://www.bank.test/personal.html'], { policy, userAgent: 'test-agent', fetch: fetchFn, accept: ['html'] }, logger),
      store,
      logger,
    );

    expect(summary.stored).toBe(2);
    expect(summary.failed).toBe(0);
    expect(summary.files.every((f) => f.endsWith('.txt'))).toBe(true);

    const manifest = await store.readManifest();
    expect(manifest.map((e) => [e.sourceURL, e.referrer])).toEqual([
      ['https://www.bank.test/personal.html', undefined],
      ['https://www.bank.test/personal/accounts.html', 'https://www.bank.test/personal.html'],
    ]);
  });

  test('keeps one file for the same page served at two URLs', async () => {
    const body = htmlPage('<p>Everyday Account has no monthly fee.</p>');
    const { fetchFn } = fakeFetch({
      'https://www.bank.test/personal/a.html': body,
      'https://www.bank.test/personal/b.html': body,
    });
    const store = new ContentStore(dir, logger);
    await store.open();

    const summary = await acquire(
      discover(
        ['https://www.bank.test/personal/a.html', 'https://www.bank.test/personal/b.html'],
        { policy, userAgent: 'test-agent', fetch: fetchFn, accept: ['html'] },
        logger
      ),
      store,
      logger
    );

    const key = sha256Hex('Everyday Account has no monthly fee.');
    const filename = `${key.slice(0, 16)}_a.txt`;
    expect(summary.stored).toBe(2);
    expect(summary.files).toEqual([filename]);
    expect(await store.listStoredFiles()).toEqual([filename]);
    expect(readFileSync(join(dir, filename), 'utf-8')).toBe(
      tagPageText('https://www.bank.test/personal/a.html', 'Everyday Account has no monthly fee.')
    );

    const manifest = await store.readManifest();
    expect(manifest.map((e) => [e.sourceURL, e.contentHash, e.storedFilename])).toEqual([
      ['https://www.bank.test/personal/a.html', key, filename],
      ['https://www.bank.test/personal/b.html', key, filename],
    ]);

    const reopened = new ContentStore(dir, logger);
    await reopened.open();
    expect(reopened.hasHash(key)).toBe(filename);
  });
});

describe('runIndexBuild', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });

  afterEach(() => cleanup());

  test('indexes every document found in the corpus directories', async () => {
    const siteDir = join(dir, 'site');
    const pdfDir = join(dir, 'pdfs');
    mkdirSync(siteDir);
    mkdirSync(pdfDir);
    writeFileSync(join(siteDir, 'a_accounts.txt'), 'https://bank.test/personal/accounts.html\n\nEveryday Account – no monthly fee.');
    writeFileSync(join(pdfDir, 'b_fees.pdf'), '%PDF-1.4');
    const indexPath = join(dir, 'index', 'vectors.db');

    const result = await runIndexBuild(
      {
        corpusDirs: [siteDir, pdfDir],
        indexPath,
        chunking: { chunkSize: 1000, chunkOverlap: 200 },
        loaders: createLoaders(async () => ['Fees page one', 'Fees page two']),
        embeddings: createEmbeddingService(new HashingEmbedder(), 2, logger),
        smokeQuery: 'monthly fee',
      },
      logger,
    );

    expect(result.documents).toBe(3);
    expect(result.entries).toBe(3);

    const index = VectorIndex.open(indexPath, 'test-embed', logger);
    expect(index.lookup('a_accounts.txt:0')?.metadata.url).toBe('https://bank.test/personal/accounts.html');
    expect(index.lookup('b_fees.pdf#p1:0')?.metadata).toEqual({ source: 'b_fees.pdf', type: 'pdf', page: 1, ordinal: 0 });
  });

  test('reports the loaded corpus once', async () => {
    const siteDir = join(dir, 'site');
    mkdirSync(siteDir);
    writeFileSync(join(siteDir, 'a_rates.txt'), 'https://bank.test/personal/rates.html\n\nHome loan rates.');
    const messages: string[] = [];
    const recording = pino({ level: 'info' }, {
      write: (line: string) => {
        messages.push(JSON.parse(line).msg);
      },
    });

    await runIndexBuild(
      {
        corpusDirs: [siteDir],
        indexPath: join(dir, 'vectors.db'),
        chunking: { chunkSize: 1000, chunkOverlap: 200 },
        loaders: createLoaders(),
        embeddings: createEmbeddingService(new HashingEmbedder(), 2, recording),
      },
      recording
    );

    expect(messages.filter((m) => m === 'Corpus loaded')).toHaveLength(1);
  });

  test('refuses to build from an empty corpus', async () => {
    await expect(
      runIndexBuild(
        {
          corpusDirs: [join(dir, 'nothing')],
          indexPath: join(dir, 'vectors.db'),
          chunking: { chunkSize: 1000, chunkOverlap: 200 },
          loaders: createLoaders(),
          embeddings: createEmbeddingService(new HashingEmbedder(), 2, logger),
        },
        logger,
      ),
    ).rejects.toBeInstanceOf(IndexConfigError);
  });
});
