import { createHash } from 'node:crypto';
import type { ChunkingConfig } from '../config';
import type { Chunk, ChunkMetadata, Document } from './types';

/** Coarsest first; the empty separator splits between characters. */
export const SEPARATORS = ['\n\n', '\n', '. ', ' ', ''] as const;

export function contentHash(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

export type ChunkOptions = ChunkingConfig;

interface Span {
  start: number;
  end: number;
}

/**
 * Cut [start, end) of text into contiguous spans no longer than chunkSize,
 * trying separators coarsest first. A separator stays attached to the end
 * of the piece before it, so the spans tile the region exactly.
 */
function splitSpans(text: string, start: number, end: number, separators: readonly string[], chunkSize: number): Span[] {
  if (end - start <= chunkSize) {
    return [{ start, end }];
  }

  const region = text.slice(start, end);
  const index = separators.findIndex((sep) => sep === '' || region.includes(sep));
  if (index === -1) {
    return [{ start, end }];
  }
  const separator = separators[index];
  const finer = separators.slice(index + 1);

  const pieces: Span[] = [];
  if (separator === '') {
    // Character boundary: step by code point so surrogate pairs stay whole
    let offset = start;
    for (const ch of region) {
      pieces.push({ start: offset, end: offset + ch.length });
      offset += ch.length;
    }
  } else {
    let pieceStart = start;
    let at = region.indexOf(separator);
    while (at !== -1) {
      const pieceEnd = start + at + separator.length;
      pieces.push({ start: pieceStart, end: pieceEnd });
      pieceStart = pieceEnd;
      at = region.indexOf(separator, at + separator.length);
    }
    if (pieceStart < end) {
      pieces.push({ start: pieceStart, end });
    }
  }

  const spans: Span[] = [];
  for (const piece of pieces) {
    if (piece.end - piece.start <= chunkSize || finer.length === 0) {
      spans.push(piece);
    } else {
      spans.push(...splitSpans(text, piece.start, piece.end, finer, chunkSize));
    }
  }
  return spans;
}

/**
 * Greedily pack contiguous spans into windows of at most chunkSize. When a
 * window is emitted, the next one starts from the shortest tail of it that
 * fits within chunkOverlap (and still leaves room for the next span).
 */
function mergeSpans(spans: Span[], chunkSize: number, chunkOverlap: number): Span[] {
  const windows: Span[] = [];
  let current: Span[] = [];

  for (const span of spans) {
    const first = current[0];
    if (first && span.end - first.start > chunkSize) {
      const last = current[current.length - 1];
      windows.push({ start: first.start, end: last.end });

      let head = current[0];
      while (head && (last.end - head.start > chunkOverlap || span.end - head.start > chunkSize)) {
        current.shift();
        head = current[0];
      }
    }
    current.push(span);
  }

  const first = current[0];
  if (first) {
    windows.push({ start: first.start, end: current[current.length - 1].end });
  }
  return windows;
}

/**
 * Split raw text into [start, end) windows. Adjacent windows overlap by at
 * most chunkOverlap characters; every window is at most chunkSize unless a
 * single unsplittable unit is larger.
 */
export function splitText(text: string, opts: ChunkOptions): Span[] {
  if (text.length === 0) return [];
  const spans = splitSpans(text, 0, text.length, SEPARATORS, opts.chunkSize);
  return mergeSpans(spans, opts.chunkSize, opts.chunkOverlap);
}

export function chunkDocument(document: Document, opts: ChunkOptions): Chunk[] {
  return splitText(document.rawText, opts).map((window, ordinal) => {
    const metadata: ChunkMetadata = {
      source: document.sourceFilename,
      type: document.originType,
      ...(document.originURL ? { url: document.originURL } : {}),
      ...(document.pageNumber !== undefined ? { page: document.pageNumber } : {}),
      ordinal,
    };
    return {
      chunkId: `${document.documentId}:${ordinal}`,
      parentDocumentId: document.documentId,
      ordinal,
      text: document.rawText.slice(window.start, window.end),
      start: window.start,
      end: window.end,
      metadata,
    };
  });
}

export function chunkDocuments(documents: Document[], opts: ChunkOptions): Chunk[] {
  return documents.flatMap((doc) => chunkDocument(doc, opts));
}

/**
 * Inverse of chunkDocument for one document: concatenate chunk texts with
 * each chunk's overlap with its predecessor removed.
 */
export function reconstructText(chunks: Chunk[]): string {
  let text = '';
  let end = 0;
  for (const chunk of chunks) {
    text += chunk.text.slice(Math.max(0, end - chunk.start));
    end = chunk.end;
  }
  return text;
}
