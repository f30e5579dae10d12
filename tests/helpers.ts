import { createHash } from 'node:crypto';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FetchFn } from '../src/acquisition/types';
import type { Embedder } from '../src/vector/embeddings';

export function makeTempDir(prefix = 'rag-test-'): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/**
 * Bag-of-words embedder: each lowercase word bumps one hashed dimension.
 * Texts sharing words score closer under cosine similarity.
 */
export class HashingEmbedder implements Embedder {
  calls: string[] = [];

  constructor(
    readonly modelId = 'test-embed',
    private dimensions = 64
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const bucket = createHash('sha256').update(word).digest().readUInt32BE(0) % this.dimensions;
      vector[bucket] += 1;
    }
    return vector;
  }
}

export interface RouteResponse {
  status?: number;
  headers?: Record<string, string>;
  body?: string | Buffer;
}

/**
 * Fetch stand-in serving canned responses by URL. Unknown URLs get a 404;
 * a route given as an Error makes the call reject.
 */
export function fakeFetch(routes: Record<string, RouteResponse | Error | ((method: string) => RouteResponse | Error)>) {
  const calls: { url: string; method: string }[] = [];

  const fetchFn: FetchFn = async (url, init) => {
    const method = init?.method ?? 'GET';
    calls.push({ url, method });
    const entry = routes[url];
    const route = typeof entry === 'function' ? entry(method) : entry;
    if (route instanceof Error) throw route;
    if (!route) return new Response('not found', { status: 404, headers: { 'content-type': 'text/html' } });
    const body = route.body === undefined ? null : typeof route.body === 'string' ? route.body : new Uint8Array(route.body);
    return new Response(method === 'HEAD' ? null : body, {
      status: route.status ?? 200,
      headers: route.headers ?? {},
    });
  };

  return { fetchFn, calls };
}

export function htmlPage(body: string): RouteResponse {
  return { headers: { 'content-type': 'text/html; charset=utf-8' }, body: `<html><body>${body}</body></html>` };
}

export const noSleep = async (_ms: number): Promise<void> => {};
