import type { DocumentDownloadConfig } from '../config';
import { AcquisitionError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { DocumentLink } from './crawler';
import { discardBody, readBodyWithLimit, sleep } from './http';
import type { FetchFn, RawArtifact } from './types';

export const CURATED_REFERRER = 'curated';

export interface DownloadOptions {
  config: Pick<DocumentDownloadConfig, 'maxBytes' | 'timeout' | 'retries' | 'delay'>;
  userAgent: string;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

const PDF_MAGIC = Buffer.from('%PDF-');

function looksLikePdf(bytes: Buffer, contentType: string): boolean {
  return contentType.toLowerCase().includes('application/pdf') || bytes.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC);
}

/**
 * HEAD probe: rejects documents that announce a size above the ceiling.
 * A failed probe is not fatal; the GET still enforces the ceiling.
 */
async function probe(url: string, opts: DownloadOptions, logger: Logger): Promise<void> {
  const fetchFn = opts.fetch ?? fetch;
  let head: Response;
  try {
    head = await fetchFn(url, {
      method: 'HEAD',
      headers: { 'User-Agent': opts.userAgent },
      redirect: 'follow',
      signal: AbortSignal.timeout(opts.config.timeout),
    });
  } catch (err) {
    logger.debug({ url, err: errorMessage(err) }, 'HEAD failed');
    return;
  }

  if (head.status >= 400) {
    throw new AcquisitionError('status', url, `HEAD returned ${head.status}`);
  }
  const length = Number(head.headers.get('content-length') ?? '');
  if (Number.isFinite(length) && length > opts.config.maxBytes) {
    throw new AcquisitionError('oversized', url, `Announced size ${length} exceeds ${opts.config.maxBytes} bytes`);
  }
}

/**
 * Download one document with a size ceiling. Network errors are retried up
 * to config.retries attempts; a non-200 status or an oversized body is not.
 */
export async function downloadDocument(
  url: string,
  referrer: string,
  opts: DownloadOptions,
  logger: Logger
): Promise<RawArtifact> {
  const fetchFn = opts.fetch ?? fetch;
  const wait = opts.sleep ?? sleep;
  const { retries, timeout, maxBytes, delay } = opts.config;

  await probe(url, opts, logger);

  let lastError: unknown;
  for (let attempt = 1; attempt <= retries; attempt++) {
    if (delay > 0) await wait(delay);

    let response: Response;
    try {
      response = await fetchFn(url, {
        headers: { 'User-Agent': opts.userAgent, Accept: 'application/pdf,*/*;q=0.8' },
        redirect: 'follow',
        signal: AbortSignal.timeout(timeout),
      });
    } catch (err) {
      lastError = err;
      logger.warn({ url, attempt, err: errorMessage(err) }, 'Download attempt failed');
      continue;
    }

    if (response.status !== 200) {
      await discardBody(response);
      throw new AcquisitionError('status', url, `GET returned ${response.status}`);
    }

    const body = await readBodyWithLimit(response, url, maxBytes);
    const contentType = response.headers.get('content-type') ?? '';
    if (!looksLikePdf(body.bytes, contentType)) {
      throw new AcquisitionError('content-type', url, `Not a PDF: ${contentType || 'unknown type'}`);
    }

    return {
      contentHash: body.contentHash,
      sourceURL: url,
      mediaType: 'pdf',
      bytes: body.bytes,
      fetchedAt: new Date(),
      httpStatus: response.status,
      referrer,
    };
  }

  throw new AcquisitionError('network', url, `All ${retries} attempts failed: ${errorMessage(lastError)}`);
}

function logSkipped(url: string, err: unknown, logger: Logger): void {
  if (err instanceof AcquisitionError) {
    logger.warn({ url, reason: err.reason, err: err.message }, 'Skipping document');
  } else {
    logger.warn({ url, err }, 'Skipping document');
  }
}

/**
 * Download a fixed list of document URLs in order, skipping (and logging)
 * each one that fails.
 */
export async function* downloadDocuments(
  urls: string[],
  opts: DownloadOptions,
  logger: Logger
): AsyncGenerator<RawArtifact, void, undefined> {
  let ok = 0;
  for (const url of urls) {
    try {
      const artifact = await downloadDocument(url, CURATED_REFERRER, opts, logger);
      ok++;
      yield artifact;
    } catch (err) {
      logSkipped(url, err, logger);
    }
  }
  logger.info({ downloaded: ok, requested: urls.length }, 'Curated downloads finished');
}

/**
 * Download documents as they are discovered, each recorded with the page
 * that linked it.
 */
export async function* downloadLinkedDocuments(
  links: AsyncIterable<DocumentLink>,
  opts: DownloadOptions,
  logger: Logger
): AsyncGenerator<RawArtifact, void, undefined> {
  let ok = 0;
  let found = 0;
  for await (const link of links) {
    found++;
    try {
      const artifact = await downloadDocument(link.url, link.referrer, opts, logger);
      ok++;
      yield artifact;
    } catch (err) {
      logSkipped(link.url, err, logger);
    }
  }
  logger.info({ downloaded: ok, found }, 'Linked downloads finished');
}
