/**
 * Raised when an index cannot be built or served: no chunks to index,
 * missing index bundle, or an embedding model that does not match the one
 * the index was built with. Fatal for the build or for every request.
 */
export class IndexConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IndexConfigError';
  }
}

export type AcquisitionFailure = 'network' | 'status' | 'content-type' | 'too-small' | 'oversized';

/**
 * A single URL could not be acquired. Logged and skipped by the crawler.
 */
export class AcquisitionError extends Error {
  constructor(
    readonly reason: AcquisitionFailure,
    readonly url: string,
    message: string
  ) {
    super(message);
    this.name = 'AcquisitionError';
  }
}

/**
 * A stored artifact could not be turned into documents (corrupt PDF, bad
 * encoding). Logged and skipped by the loader.
 */
export class LoadError extends Error {
  constructor(
    readonly file: string,
    message: string
  ) {
    super(message);
    this.name = 'LoadError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
