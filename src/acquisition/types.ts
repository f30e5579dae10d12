export type MediaType = 'html' | 'pdf';

/**
 * One fetched unit of raw content. `bytes` is what gets stored: the raw PDF,
 * or for a web page its tagged text (`<url>\n\n<visible text>`).
 */
export interface RawArtifact {
  contentHash: string;
  sourceURL: string;
  mediaType: MediaType;
  bytes: Buffer;
  fetchedAt: Date;
  httpStatus: number;
  /** Page the URL was discovered on, when it came from a crawl. */
  referrer?: string;
}

export interface ManifestEntry {
  sourceURL: string;
  referrer?: string;
  contentHash: string;
  storedFilename: string;
  sizeBytes: number;
  httpStatus: number;
  /** Unix seconds */
  timestamp: number;
}

/** On-disk manifest row (one JSON object per line). */
export interface ManifestRow {
  source_url: string;
  referrer?: string;
  saved_filename: string;
  sha256: string;
  filesize_bytes: number;
  http_status: number;
  timestamp: number;
}

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;
