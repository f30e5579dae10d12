import { readdir, readFile } from 'node:fs/promises';
import { extname, join, relative } from 'node:path';
import type { MediaType } from '../acquisition/types';
import { errorMessage, LoadError } from '../errors';
import type { Logger } from '../logger';
import { extractPdfPages, type PdfPageExtractor } from './pdf';
import type { Document } from './types';

/** A stored artifact as the loader sees it. */
export interface StoredArtifact {
  storedFilename: string;
  mediaType: MediaType;
  bytes: Buffer;
}

export interface DocumentLoader {
  readonly mediaType: MediaType;
  load(artifact: StoredArtifact): Promise<Document[]>;
}

export type LoaderRegistry = Record<MediaType, DocumentLoader>;

const URL_LINE = /^https?:\/\/\S+$/;

/**
 * Tagged page text: an optional source URL on the first line, then the body.
 */
export class TextDocumentLoader implements DocumentLoader {
  readonly mediaType = 'html' as const;
  private decoder = new TextDecoder('utf-8', { fatal: true });

  async load(artifact: StoredArtifact): Promise<Document[]> {
    let content: string;
    try {
      content = this.decoder.decode(artifact.bytes);
    } catch {
      throw new LoadError(artifact.storedFilename, 'File is not valid UTF-8');
    }

    const newline = content.indexOf('\n');
    const firstLine = (newline === -1 ? content : content.slice(0, newline)).trim();

    let originURL: string | undefined;
    let rawText = content;
    if (URL_LINE.test(firstLine)) {
      originURL = firstLine;
      rawText = newline === -1 ? '' : content.slice(newline + 1).replace(/^(?:[ \t]*\r?\n)+/, '');
    }

    if (!rawText.trim()) return [];

    return [
      {
        documentId: artifact.storedFilename,
        sourceFilename: artifact.storedFilename,
        originType: 'webpage',
        ...(originURL ? { originURL } : {}),
        rawText,
      },
    ];
  }
}

/**
 * One Document per page, in page order. Blank pages produce no Document.
 */
export class PdfDocumentLoader implements DocumentLoader {
  readonly mediaType = 'pdf' as const;

  constructor(private extractPages: PdfPageExtractor = extractPdfPages) {}

  async load(artifact: StoredArtifact): Promise<Document[]> {
    let pages: string[];
    try {
      pages = await this.extractPages(artifact.bytes);
    } catch (err) {
      throw new LoadError(artifact.storedFilename, `PDF parsing failed: ${errorMessage(err)}`);
    }

    const documents: Document[] = [];
    pages.forEach((text, pageNumber) => {
      if (!text.trim()) return;
      documents.push({
        documentId: `${artifact.storedFilename}#p${pageNumber}`,
        sourceFilename: artifact.storedFilename,
        originType: 'pdf',
        pageNumber,
        rawText: text,
      });
    });
    return documents;
  }
}

export function createLoaders(extractPages?: PdfPageExtractor): LoaderRegistry {
  return {
    html: new TextDocumentLoader(),
    pdf: new PdfDocumentLoader(extractPages),
  };
}

export function mediaTypeForFile(filename: string): MediaType | null {
  const ext = extname(filename).toLowerCase();
  if (ext === '.pdf') return 'pdf';
  if (ext === '.txt') return 'html';
  return null;
}

/**
 * Load one artifact. Failures are logged and yield no documents.
 */
export async function loadArtifact(
  artifact: StoredArtifact,
  loaders: LoaderRegistry,
  logger: Logger
): Promise<Document[]> {
  try {
    const documents = await loaders[artifact.mediaType].load(artifact);
    logger.debug({ file: artifact.storedFilename, documents: documents.length }, 'Loaded artifact');
    return documents;
  } catch (err) {
    logger.warn({ file: artifact.storedFilename, err: errorMessage(err) }, 'Failed to load artifact, skipping');
    return [];
  }
}

/**
 * Recursively discover loadable files (.txt, .pdf) under dir, relative paths sorted.
 */
export async function discoverFiles(dir: string): Promise<string[]> {
  const results: string[] = [];

  async function walk(current: string) {
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && mediaTypeForFile(entry.name)) {
        results.push(relative(dir, fullPath));
      }
    }
  }

  await walk(dir);
  return results.sort();
}

/**
 * Load every PDF and tagged text file under the given directories.
 * Missing directories are skipped with a warning.
 */
export async function loadCorpus(dirs: string[], loaders: LoaderRegistry, logger: Logger): Promise<Document[]> {
  const documents: Document[] = [];
  let files = 0;

  for (const dir of dirs) {
    let relPaths: string[];
    try {
      relPaths = await discoverFiles(dir);
    } catch (err) {
      logger.warn({ dir, err: errorMessage(err) }, 'Corpus directory not readable, skipping');
      continue;
    }

    for (const relPath of relPaths) {
      const mediaType = mediaTypeForFile(relPath);
      if (!mediaType) continue;
      let bytes: Buffer;
      try {
        bytes = await readFile(join(dir, relPath));
      } catch (err) {
        logger.warn({ file: relPath, err: errorMessage(err) }, 'Could not read file, skipping');
        continue;
      }
      files++;
      documents.push(...(await loadArtifact({ storedFilename: relPath, mediaType, bytes }, loaders, logger)));
    }
  }

  logger.info({ files, documents: documents.length }, 'Corpus loaded');
  return documents;
}
