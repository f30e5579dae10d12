import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { InMemoryConversationStore } from '../src/conversation/store';
import type { LLMClient } from '../src/core/llm-client';
import { IndexConfigError } from '../src/errors';
import { chunkDocuments } from '../src/ingest/chunker';
import type { Document } from '../src/ingest/types';
import { createSilentLogger } from '../src/logger';
import { GENERATION_FAILED_MESSAGE, NO_MODEL_MESSAGE } from '../src/rag/prompts';
import { RagService } from '../src/rag/service';
import { buildIndex } from '../src/vector/builder';
import { createEmbeddingService } from '../src/vector/embeddings';
import { VectorIndex } from '../src/vector/vector-index';
import { HashingEmbedder, makeTempDir } from './helpers';

const logger = createSilentLogger();

class ScriptedLLM implements LLMClient {
  readonly backend = 'openai' as const;
  prompts: string[] = [];

  constructor(private reply: (prompt: string, call: number) => Promise<string>) {}

  generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply(prompt, this.prompts.length);
  }
}

const EVERYDAY: Document = {
  documentId: 'abc_accounts.txt',
  sourceFilename: 'abc_accounts.txt',
  originType: 'webpage',
  originURL: 'https://bank.test/personal/accounts.html',
  rawText: 'Everyday Account – a transaction account with no monthly fee.',
};

const CARDS: Document = {
  documentId: 'def_cards.txt',
  sourceFilename: 'def_cards.txt',
  originType: 'webpage',
  rawText: 'Low Rate credit card with a low purchase rate.',
};

const tick = () => new Promise((r) => setTimeout(r, 0));

describe('RagService', () => {
  let dir: string;
  let cleanup: () => void;
  let indexPath: string;
  const embedder = new HashingEmbedder();

  beforeEach(async () => {
    ({ dir, cleanup } = makeTempDir());
    indexPath = join(dir, 'vectors.db');
    const chunks = chunkDocuments([EVERYDAY, CARDS], { chunkSize: 1000, chunkOverlap: 200 });
    await buildIndex(chunks, createEmbeddingService(embedder, 2, logger), indexPath, logger);
  });

  afterEach(() => cleanup());

  function service(llm: LLMClient | null, conversations = new InMemoryConversationStore()) {
    return new RagService({ embedder, indexPath, conversations, llm, logger, organization: 'Example Bank' });
  }

  test('answers with the apology and cites the matching chunk when no model is configured', async () => {
    const conversations = new InMemoryConversationStore();
    const rag = service(null, conversations);

    const result = await rag.answer('c1', 'Tell me about transaction accounts');

    expect(result.answerText).toBe(NO_MODEL_MESSAGE);
    expect(result.sources).toContainEqual({
      source: 'abc_accounts.txt',
      type: 'webpage',
      url: 'https://bank.test/personal/accounts.html',
      ordinal: 0,
    });
    expect(result.sources[0].source).toBe('abc_accounts.txt');
    expect(await conversations.getTurns('c1')).toEqual([
      { user: 'Tell me about transaction accounts', ai: NO_MODEL_MESSAGE },
    ]);
  });

  test('feeds retrieved context and prior turns into the prompt', async () => {
    const llm = new ScriptedLLM(async (_prompt, call) => `answer-${call}`);
    const rag = service(llm);

    await rag.answer('c1', 'first question');
    const second = await rag.answer('c1', 'second question');

    expect(second.answerText).toBe('answer-2');
    expect(llm.prompts[0].startsWith('\nUser: first question\n')).toBe(true);
    expect(llm.prompts[1].startsWith('User: first question\nAI: answer-1\nUser: second question\n')).toBe(true);
    expect(llm.prompts[1]).toContain('Everyday Account – a transaction account with no monthly fee.');
    expect(llm.prompts[1]).toContain('Context (from Example Bank documents):');
  });

  test('cleans the model output before returning and storing it', async () => {
    const conversations = new InMemoryConversationStore();
    const llm = new ScriptedLLM(async () => 'AI: here you go\n**Everyday Account** – no monthly fee\n\n');
    const rag = service(llm, conversations);

    const result = await rag.answer('c1', 'accounts?');

    expect(result.answerText).toBe('Everyday Account – no monthly fee');
    expect(await conversations.getTurns('c1')).toEqual([{ user: 'accounts?', ai: 'Everyday Account – no monthly fee' }]);
  });

  test('turns a generation failure into the apology and still records the turn', async () => {
    const conversations = new InMemoryConversationStore();
    const llm = new ScriptedLLM(async () => Promise.reject(new Error('rate limited')));
    const rag = service(llm, conversations);

    const result = await rag.answer('c1', 'accounts?');

    expect(result.answerText).toBe(GENERATION_FAILED_MESSAGE);
    expect(await conversations.getTurns('c1')).toEqual([{ user: 'accounts?', ai: GENERATION_FAILED_MESSAGE }]);
  });

  test('serializes requests for one conversation but not across conversations', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((r) => {
      release = r;
    });
    const llm = new ScriptedLLM(async (prompt, call) => {
      if (call === 1) await gate;
      return `answer-${call}`;
    });
    const conversations = new InMemoryConversationStore();
    const rag = service(llm, conversations);

    const first = rag.answer('c1', 'q1');
    const second = rag.answer('c1', 'q2');
    for (let i = 0; i < 5; i++) await tick();
    expect(llm.prompts).toHaveLength(1);

    const other = await rag.answer('c2', 'other question');
    expect(other.answerText).toBe('answer-2');

    release();
    await Promise.all([first, second]);

    const turns = await conversations.getTurns('c1');
    expect(turns.map((t) => t.user)).toEqual(['q1', 'q2']);
    expect(llm.prompts[2].startsWith('User: q1\nAI: answer-1\nUser: q2\n')).toBe(true);
  });

  test('stores turns in arrival order when an earlier query takes longer to embed', async () => {
    class SlowFirstEmbedder extends HashingEmbedder {
      async embed(text: string): Promise<number[]> {
        if (text === 'first') await new Promise((r) => setTimeout(r, 50));
        return super.embed(text);
      }
    }
    const conversations = new InMemoryConversationStore();
    const rag = new RagService({
      embedder: new SlowFirstEmbedder(),
      indexPath,
      conversations,
      llm: new ScriptedLLM(async (prompt, call) => `answer-${call}`),
      logger,
    });

    await Promise.all([rag.answer('c', 'first'), rag.answer('c', 'second')]);

    const turns = await conversations.getTurns('c');
    expect(turns).toEqual([
      { user: 'first', ai: 'answer-1' },
      { user: 'second', ai: 'answer-2' },
    ]);
  });

  test('warms up by loading the index once', async () => {
    let opens = 0;
    const rag = new RagService({
      embedder,
      indexPath,
      conversations: new InMemoryConversationStore(),
      llm: null,
      logger,
      openIndex: (path, model, log) => {
        opens++;
        return VectorIndex.open(path, model, log);
      },
    });
    expect(rag.indexState()).toEqual({ status: 'unloaded' });

    expect(await rag.warmUp()).toEqual({ status: 'ready', entries: 2, model: 'test-embed', dimensions: 64 });
    await rag.answer('c1', 'accounts?');
    await rag.answer('c2', 'cards?');

    expect(opens).toBe(1);
  });

  test('fails every request fast when the index cannot be loaded', async () => {
    let opens = 0;
    const rag = new RagService({
      embedder,
      indexPath: join(dir, 'missing.db'),
      conversations: new InMemoryConversationStore(),
      llm: null,
      logger,
      openIndex: (path, model, log) => {
        opens++;
        return VectorIndex.open(path, model, log);
      },
    });

    await expect(rag.answer('c1', 'accounts?')).rejects.toBeInstanceOf(IndexConfigError);
    await expect(rag.answer('c2', 'cards?')).rejects.toBeInstanceOf(IndexConfigError);
    expect(opens).toBe(1);
    expect(rag.indexState().status).toBe('failed');
  });

  test('refuses to serve an index built with another embedding model', async () => {
    const rag = new RagService({
      embedder: new HashingEmbedder('another-model'),
      indexPath,
      conversations: new InMemoryConversationStore(),
      llm: null,
      logger,
    });

    const state = await rag.warmUp();
    expect(state.status).toBe('failed');
    await expect(rag.answer('c1', 'accounts?')).rejects.toThrow(/Embedding model mismatch/);
  });
});
