import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { Logger } from '../logger';
import { KeyedLock } from '../keyed-lock';
import type { ManifestEntry, ManifestRow, MediaType } from './types';

export const MANIFEST_FILE = 'manifest.jsonl';
const HASH_PREFIX_LENGTH = 16;
const MAX_BASENAME_LENGTH = 80;

export function sha256Hex(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Dedup key for stored bytes. Tagged page text is keyed by the visible text
 * after its URL line, so one page served under two URLs shares a key.
 */
export function contentKey(bytes: Buffer, mediaType: MediaType): string {
  if (mediaType === 'pdf') return sha256Hex(bytes);
  const text = bytes.toString('utf-8');
  const start = text.indexOf('\n\n');
  return sha256Hex(start >= 0 ? text.slice(start + 2) : text);
}

function mediaTypeOfStored(filename: string): MediaType {
  return filename.toLowerCase().endsWith('.pdf') ? 'pdf' : 'html';
}

/**
 * Filesystem-safe basename for a URL: last path segment, characters outside
 * [A-Za-z0-9._-] replaced, extension forced to match the stored media type
 * (.pdf for documents, .txt for tagged page text).
 */
export function sanitizeBasename(sourceURL: string, mediaType: MediaType): string {
  let name = '';
  try {
    const segments = new URL(sourceURL).pathname.split('/').filter(Boolean);
    name = segments[segments.length - 1] ?? '';
    name = decodeURIComponent(name);
  } catch {
    name = '';
  }

  name = name
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^[._]+/, '');

  if (mediaType === 'pdf') {
    name = name.replace(/\.pdf$/i, '');
  } else {
    name = name.replace(/\.(html?|txt)$/i, '');
  }
  name = name.slice(0, MAX_BASENAME_LENGTH) || 'index';

  return `${name}.${mediaType === 'pdf' ? 'pdf' : 'txt'}`;
}

export function deriveFilename(contentHash: string, sourceURL: string, mediaType: MediaType): string {
  return `${contentHash.slice(0, HASH_PREFIX_LENGTH)}_${sanitizeBasename(sourceURL, mediaType)}`;
}

function toRow(entry: ManifestEntry): ManifestRow {
  return {
    source_url: entry.sourceURL,
    ...(entry.referrer ? { referrer: entry.referrer } : {}),
    saved_filename: entry.storedFilename,
    sha256: entry.contentHash,
    filesize_bytes: entry.sizeBytes,
    http_status: entry.httpStatus,
    timestamp: entry.timestamp,
  };
}

const ManifestRowSchema = z.object({
  source_url: z.string(),
  referrer: z.string().optional(),
  saved_filename: z.string(),
  sha256: z.string(),
  filesize_bytes: z.number().default(0),
  http_status: z.number().default(0),
  timestamp: z.number().default(0),
});

function fromRow(raw: unknown): ManifestEntry | null {
  const parsed = ManifestRowSchema.safeParse(raw);
  if (!parsed.success) return null;
  const row = parsed.data;
  return {
    sourceURL: row.source_url,
    referrer: row.referrer,
    contentHash: row.sha256,
    storedFilename: row.saved_filename,
    sizeBytes: row.filesize_bytes,
    httpStatus: row.http_status,
    timestamp: row.timestamp,
  };
}

export interface PutOptions {
  mediaType?: MediaType;
  httpStatus?: number;
  referrer?: string;
  /** Dedup key already computed by the producer; defaults to contentKey(bytes) */
  contentHash?: string;
  fetchedAt?: Date;
}

/**
 * Content-addressed artifact store with an append-only JSONL manifest.
 *
 * A hash is written to disk at most once; re-acquiring identical bytes (from
 * any URL) only appends a manifest entry pointing at the existing file.
 * Hash-check-then-write runs inside a per-hash exclusive section so
 * concurrent producers cannot both write the same content.
 */
export class ContentStore {
  private byHash = new Map<string, string>();
  private locks = new KeyedLock();
  private manifestWrites: Promise<void> = Promise.resolve();
  private openPromise: Promise<void> | null = null;
  private opened = false;
  readonly manifestPath: string;

  constructor(
    readonly dir: string,
    private logger: Logger
  ) {
    this.manifestPath = path.join(dir, MANIFEST_FILE);
  }

  /**
   * Create the directory and rebuild the hash index from the manifest and
   * from any stored files the manifest does not mention. Concurrent callers
   * share one scan.
   */
  open(): Promise<void> {
    if (!this.openPromise) {
      this.openPromise = this.load().catch((err: unknown) => {
        this.openPromise = null;
        throw err;
      });
    }
    return this.openPromise;
  }

  private async load(): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });

    const onDisk = new Set(await this.listStoredFiles());
    for (const entry of await this.readManifest()) {
      if (onDisk.has(entry.storedFilename) && !this.byHash.has(entry.contentHash)) {
        this.byHash.set(entry.contentHash, entry.storedFilename);
      }
    }

    const known = new Set(this.byHash.values());
    for (const filename of onDisk) {
      if (known.has(filename)) continue;
      const hash = contentKey(await fs.readFile(path.join(this.dir, filename)), mediaTypeOfStored(filename));
      if (!this.byHash.has(hash)) {
        this.byHash.set(hash, filename);
      }
    }

    this.opened = true;
    this.logger.info({ dir: this.dir, artifacts: this.byHash.size }, 'Content store opened');
  }

  hasHash(hash: string): string | undefined {
    return this.byHash.get(hash);
  }

  get size(): number {
    return this.byHash.size;
  }

  /**
   * Store bytes fetched from sourceURL. Returns the stored filename, which is
   * the existing one when the content is already present.
   */
  async put(sourceURL: string, bytes: Buffer, opts: PutOptions = {}): Promise<string> {
    if (!this.opened) {
      throw new Error('ContentStore not opened');
    }
    const mediaType = opts.mediaType ?? 'pdf';
    const contentHash = opts.contentHash ?? contentKey(bytes, mediaType);

    return this.locks.run(contentHash, async () => {
      let storedFilename = this.byHash.get(contentHash);

      if (storedFilename) {
        this.logger.info({ url: sourceURL, existing: storedFilename }, 'Already have content (sha match)');
      } else {
        storedFilename = deriveFilename(contentHash, sourceURL, mediaType);
        const target = path.join(this.dir, storedFilename);
        const tmp = `${target}.${process.pid}.${Math.random().toString(16).slice(2)}.tmp`;
        await fs.writeFile(tmp, bytes);
        await fs.rename(tmp, target);
        this.byHash.set(contentHash, storedFilename);
        this.logger.info({ file: storedFilename, bytes: bytes.length }, 'Saved artifact');
      }

      await this.appendManifest({
        sourceURL,
        referrer: opts.referrer,
        contentHash,
        storedFilename,
        sizeBytes: bytes.length,
        httpStatus: opts.httpStatus ?? 200,
        timestamp: Math.floor((opts.fetchedAt ?? new Date()).getTime() / 1000),
      });

      return storedFilename;
    });
  }

  /**
   * Append one entry. Writes are serialized so lines never interleave.
   */
  async appendManifest(entry: ManifestEntry): Promise<void> {
    const line = `${JSON.stringify(toRow(entry))}\n`;
    const next = this.manifestWrites
      .catch(() => undefined)
      .then(() => fs.appendFile(this.manifestPath, line, 'utf-8'));
    this.manifestWrites = next;
    await next;
  }

  async readManifest(): Promise<ManifestEntry[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.manifestPath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const entries: ManifestEntry[] = [];
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      try {
        const entry = fromRow(JSON.parse(line));
        if (entry) entries.push(entry);
      } catch {
        this.logger.warn({ manifest: this.manifestPath }, 'Skipping malformed manifest line');
      }
    }
    return entries;
  }

  /** Stored artifact filenames (manifest and temp files excluded). */
  async listStoredFiles(): Promise<string[]> {
    const entries = await fs.readdir(this.dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name !== MANIFEST_FILE && !e.name.endsWith('.tmp'))
      .map((e) => e.name)
      .sort();
  }
}
