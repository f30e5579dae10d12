import type { CrawlPolicy } from '../config';
import { AcquisitionError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { contentKey } from './content-store';
import { extractLinks, htmlToText, type PageLink } from './html';
import { discardBody, readBodyWithLimit, sleep } from './http';
import { normalizeUrl, shouldFollow } from './policy';
import type { FetchFn, MediaType, RawArtifact } from './types';

export interface CrawlOptions {
  policy: CrawlPolicy;
  userAgent: string;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  /** Media types yielded as artifacts. HTML pages are still mined for links when not accepted. */
  accept?: MediaType[];
  /** Upper bound on URLs fetched, accepted or not. */
  maxVisits?: number;
}

interface PageOutcome {
  artifact?: RawArtifact;
  links: PageLink[];
}

const ACCEPT_HEADER = 'text/html,application/xhtml+xml,application/pdf;q=0.9,*/*;q=0.8';

function classify(contentType: string): MediaType | null {
  const ct = contentType.toLowerCase();
  if (ct.includes('text/html') || ct.includes('xhtml')) return 'html';
  if (ct.includes('application/pdf')) return 'pdf';
  return null;
}

/** Tagged page text as stored: source URL on the first line, then the visible text. */
export function tagPageText(url: string, text: string): string {
  return `${url}\n\n${text}`;
}

/** A link counts as a document when its path ends in .pdf or its anchor declares the PDF type. */
export function isDocumentLink(link: PageLink): boolean {
  if (link.type?.toLowerCase().includes('application/pdf')) return true;
  try {
    return new URL(link.url).pathname.toLowerCase().endsWith('.pdf');
  } catch {
    return false;
  }
}

function onAllowedHost(url: string, hostSuffix: string): boolean {
  try {
    const parsed = new URL(url);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname.endsWith(hostSuffix);
  } catch {
    return false;
  }
}

async function fetchPage(
  url: string,
  referrer: string | undefined,
  accept: Set<MediaType>,
  opts: CrawlOptions,
  logger: Logger
): Promise<PageOutcome> {
  const fetchFn = opts.fetch ?? fetch;
  const { policy } = opts;

  let response: Response;
  try {
    response = await fetchFn(url, {
      headers: { 'User-Agent': opts.userAgent, Accept: ACCEPT_HEADER },
      redirect: 'follow',
      signal: AbortSignal.timeout(policy.requestTimeout),
    });
  } catch (err) {
    throw new AcquisitionError('network', url, `Request failed: ${errorMessage(err)}`);
  }

  if (response.status !== 200) {
    await discardBody(response);
    throw new AcquisitionError('status', url, `HTTP ${response.status}`);
  }

  const mediaType = classify(response.headers.get('content-type') ?? '');
  if (!mediaType || (mediaType === 'pdf' && !accept.has('pdf'))) {
    await discardBody(response);
    throw new AcquisitionError('content-type', url, `Unsupported content type: ${response.headers.get('content-type') ?? 'none'}`);
  }

  const body = await readBodyWithLimit(response, url, policy.maxBytes);
  const fetchedAt = new Date();

  if (mediaType === 'pdf') {
    if (body.bytes.length === 0) {
      throw new AcquisitionError('too-small', url, 'Empty document');
    }
    return {
      artifact: {
        contentHash: body.contentHash,
        sourceURL: url,
        mediaType,
        bytes: body.bytes,
        fetchedAt,
        httpStatus: response.status,
        referrer,
      },
      links: [],
    };
  }

  const html = body.bytes.toString('utf-8');
  const links = extractLinks(html, url);
  if (!accept.has('html')) {
    return { links };
  }

  const text = htmlToText(html);
  if (text.length < policy.minTextLength) {
    throw new AcquisitionError('too-small', url, `Page text too short (${text.length} chars)`);
  }

  const bytes = Buffer.from(tagPageText(url, text), 'utf-8');
  logger.debug({ url, chars: text.length, links: links.length }, 'Page fetched');
  return {
    artifact: {
      contentHash: contentKey(bytes, 'html'),
      sourceURL: url,
      mediaType,
      bytes,
      fetchedAt,
      httpStatus: response.status,
      referrer,
    },
    links,
  };
}

/**
 * Breadth-first crawl from seedURLs under the given policy.
 *
 * Yields artifacts lazily as they are fetched. The returned generator is
 * one-shot: once exhausted (queue empty or policy.maxPages artifacts
 * accepted) it yields nothing more and cannot be restarted; call discover
 * again for a fresh crawl. Fetch failures are logged and the URL dropped.
 */
export async function* discover(
  seedURLs: string[],
  opts: CrawlOptions,
  logger: Logger
): AsyncGenerator<RawArtifact, void, undefined> {
  const { policy } = opts;
  const accept = new Set<MediaType>(opts.accept ?? ['html', 'pdf']);
  const maxVisits = opts.maxVisits ?? Number.POSITIVE_INFINITY;
  const wait = opts.sleep ?? sleep;

  const queue: string[] = [];
  const queued = new Set<string>();
  const referrers = new Map<string, string>();
  const visited = new Set<string>();

  for (const seed of seedURLs) {
    const url = normalizeUrl(seed);
    if (url && !queued.has(url)) {
      queue.push(url);
      queued.add(url);
    }
  }

  let accepted = 0;
  let failed = 0;

  while (accepted < policy.maxPages && visited.size < maxVisits) {
    const url = queue.shift();
    if (url === undefined) break;
    queued.delete(url);
    if (visited.has(url)) continue;

    if (visited.size > 0 && policy.interRequestDelay > 0) {
      await wait(policy.interRequestDelay);
    }
    visited.add(url);

    let outcome: PageOutcome;
    try {
      outcome = await fetchPage(url, referrers.get(url), accept, opts, logger);
    } catch (err) {
      failed++;
      if (err instanceof AcquisitionError) {
        logger.warn({ url, reason: err.reason, err: err.message }, 'Skipping URL');
      } else {
        logger.warn({ url, err }, 'Skipping URL');
      }
      continue;
    }

    if (outcome.artifact) {
      accepted++;
    }

    if (accepted < policy.maxPages) {
      let added = 0;
      for (const { url: link } of outcome.links) {
        if (added >= policy.perPageLinkLimit) break;
        if (!shouldFollow(link, policy)) continue;
        if (visited.has(link) || queued.has(link)) continue;
        queue.push(link);
        queued.add(link);
        referrers.set(link, url);
        added++;
      }
    }

    if (outcome.artifact) {
      logger.info({ n: accepted, url }, 'Accepted');
      yield outcome.artifact;
    }
  }

  logger.info({ accepted, failed, visited: visited.size, pending: queue.length }, 'Crawl finished');
}

export interface DocumentLink {
  url: string;
  /** Page the link was found on */
  referrer: string;
  text: string;
}

export interface DocumentDiscoveryOptions extends CrawlOptions {
  maxDocuments: number;
}

/**
 * Breadth-first crawl of HTML pages from seedPages, collecting links to
 * documents on the allowed host. Documents are not fetched here. Page links
 * are followed under the crawl policy; document links do not count against
 * perPageLinkLimit. Stops after maxVisits pages or maxDocuments links.
 */
export async function* discoverDocumentLinks(
  seedPages: string[],
  opts: DocumentDiscoveryOptions,
  logger: Logger
): AsyncGenerator<DocumentLink, void, undefined> {
  const { policy, maxDocuments } = opts;
  const maxVisits = opts.maxVisits ?? Number.POSITIVE_INFINITY;
  const wait = opts.sleep ?? sleep;
  const pagesOnly = new Set<MediaType>();

  const queue: string[] = [];
  const queued = new Set<string>();
  const visited = new Set<string>();
  const found = new Set<string>();

  for (const seed of seedPages) {
    const url = normalizeUrl(seed);
    if (url && !queued.has(url)) {
      queue.push(url);
      queued.add(url);
    }
  }

  while (found.size < maxDocuments && visited.size < maxVisits) {
    const url = queue.shift();
    if (url === undefined) break;
    queued.delete(url);
    if (visited.has(url)) continue;

    if (visited.size > 0 && policy.interRequestDelay > 0) {
      await wait(policy.interRequestDelay);
    }
    visited.add(url);

    let outcome: PageOutcome;
    try {
      outcome = await fetchPage(url, undefined, pagesOnly, opts, logger);
    } catch (err) {
      if (err instanceof AcquisitionError) {
        logger.warn({ url, reason: err.reason, err: err.message }, 'Skipping page');
      } else {
        logger.warn({ url, err }, 'Skipping page');
      }
      continue;
    }

    const documents: DocumentLink[] = [];
    let added = 0;
    for (const link of outcome.links) {
      if (isDocumentLink(link)) {
        if (found.size >= maxDocuments) continue;
        if (found.has(link.url) || !onAllowedHost(link.url, policy.allowedHostSuffix)) continue;
        found.add(link.url);
        documents.push({ url: link.url, referrer: url, text: link.text });
        continue;
      }
      if (added >= policy.perPageLinkLimit) continue;
      if (!shouldFollow(link.url, policy)) continue;
      if (visited.has(link.url) || queued.has(link.url)) continue;
      queue.push(link.url);
      queued.add(link.url);
      added++;
    }

    if (documents.length > 0) {
      logger.info({ page: url, documents: documents.length }, 'Found document links');
    }
    yield* documents;
  }

  logger.info({ documents: found.size, pages: visited.size }, 'Document discovery finished');
}
