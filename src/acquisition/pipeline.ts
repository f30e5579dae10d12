import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { ContentStore } from './content-store';
import type { RawArtifact } from './types';

export interface AcquireSummary {
  stored: number;
  failed: number;
  files: string[];
}

/**
 * Drain an artifact sequence into the store. A failed write is logged and
 * does not stop the batch.
 */
export async function acquire(
  artifacts: AsyncIterable<RawArtifact>,
  store: ContentStore,
  logger: Logger
): Promise<AcquireSummary> {
  const files = new Set<string>();
  let stored = 0;
  let failed = 0;

  for await (const artifact of artifacts) {
    try {
      const filename = await store.put(artifact.sourceURL, artifact.bytes, {
        mediaType: artifact.mediaType,
        httpStatus: artifact.httpStatus,
        referrer: artifact.referrer,
        contentHash: artifact.contentHash,
        fetchedAt: artifact.fetchedAt,
      });
      files.add(filename);
      stored++;
    } catch (err) {
      failed++;
      logger.warn({ url: artifact.sourceURL, err: errorMessage(err) }, 'Failed to store artifact');
    }
  }

  logger.info({ stored, failed, distinctFiles: files.size, dir: store.dir }, 'Acquisition complete');
  return { stored, failed, files: [...files] };
}
