import { createHash } from 'node:crypto';
import { AcquisitionError } from '../errors';

export interface LimitedBody {
  bytes: Buffer;
  contentHash: string;
}

/**
 * Read a response body, hashing as it streams. Aborts the transfer as soon
 * as more than maxBytes have arrived, so an oversized download never holds
 * more than the ceiling in memory.
 */
export async function readBodyWithLimit(response: Response, url: string, maxBytes: number): Promise<LimitedBody> {
  const hash = createHash('sha256');
  const parts: Buffer[] = [];
  let total = 0;

  if (!response.body) {
    return { bytes: Buffer.alloc(0), contentHash: hash.digest('hex') };
  }

  const reader = response.body.getReader();
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    if (!value || value.byteLength === 0) continue;

    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new AcquisitionError('oversized', url, `Aborted ${url} (size > ${maxBytes} bytes)`);
    }
    const part = Buffer.from(value);
    hash.update(part);
    parts.push(part);
  }

  return { bytes: Buffer.concat(parts, total), contentHash: hash.digest('hex') };
}

/**
 * Release a response body we are not going to read.
 */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
