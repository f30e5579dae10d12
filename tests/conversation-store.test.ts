import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  conversationFilename,
  InMemoryConversationStore,
  JsonlConversationStore,
} from '../src/conversation/store';
import { createSilentLogger } from '../src/logger';
import { makeTempDir } from './helpers';

const logger = createSilentLogger();

describe('InMemoryConversationStore', () => {
  test('creates a conversation on first append', async () => {
    const store = new InMemoryConversationStore();
    expect(await store.has('c1')).toBe(false);
    await store.appendTurn('c1', { user: 'q', ai: 'a' });
    expect(await store.has('c1')).toBe(true);
    expect(await store.getTurns('c1')).toEqual([{ user: 'q', ai: 'a' }]);
  });

  test('returns a copy of the turns', async () => {
    const store = new InMemoryConversationStore();
    await store.appendTurn('c1', { user: 'q', ai: 'a' });
    const turns = await store.getTurns('c1');
    turns.push({ user: 'x', ai: 'y' });
    expect(await store.getTurns('c1')).toHaveLength(1);
  });
});

describe('conversationFilename', () => {
  test('encodes ids into a single path segment', () => {
    expect(conversationFilename('abc-123')).toBe('abc-123.jsonl');
    expect(conversationFilename('../etc/passwd')).toBe('..%2Fetc%2Fpasswd.jsonl');
  });

  test('hashes very long ids', () => {
    expect(conversationFilename('x'.repeat(500))).toMatch(/^h-[0-9a-f]{64}\.jsonl$/);
  });
});

describe('JsonlConversationStore', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });

  afterEach(() => cleanup());

  test('appends turns as JSON lines', async () => {
    const store = new JsonlConversationStore(dir, logger);
    await store.appendTurn('c1', { user: 'first', ai: 'one' });
    await store.appendTurn('c1', { user: 'second', ai: 'two' });

    expect(readFileSync(join(dir, 'c1.jsonl'), 'utf-8')).toBe(
      '{"user":"first","ai":"one"}\n{"user":"second","ai":"two"}\n',
    );
  });

  test('reloads history from disk', async () => {
    await new JsonlConversationStore(dir, logger).appendTurn('c1', { user: 'q', ai: 'a' });

    const fresh = new JsonlConversationStore(dir, logger);
    expect(await fresh.has('c1')).toBe(true);
    expect(await fresh.getTurns('c1')).toEqual([{ user: 'q', ai: 'a' }]);
    expect(await fresh.has('other')).toBe(false);
    expect(await fresh.getTurns('other')).toEqual([]);
  });
});
