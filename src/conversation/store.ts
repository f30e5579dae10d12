import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { Logger } from '../logger';

export interface Turn {
  user: string;
  ai: string;
}

const TurnSchema = z.object({ user: z.string(), ai: z.string() });

/**
 * Ordered per-conversation turns. Callers serialize read-then-append for a
 * given id; the store only guarantees each append lands exactly once.
 */
export interface ConversationStore {
  getTurns(conversationId: string): Promise<Turn[]>;
  appendTurn(conversationId: string, turn: Turn): Promise<void>;
  has(conversationId: string): Promise<boolean>;
}

export class InMemoryConversationStore implements ConversationStore {
  private conversations = new Map<string, Turn[]>();

  async getTurns(conversationId: string): Promise<Turn[]> {
    return [...(this.conversations.get(conversationId) ?? [])];
  }

  async appendTurn(conversationId: string, turn: Turn): Promise<void> {
    const turns = this.conversations.get(conversationId);
    if (turns) {
      turns.push(turn);
    } else {
      this.conversations.set(conversationId, [turn]);
    }
  }

  async has(conversationId: string): Promise<boolean> {
    return this.conversations.has(conversationId);
  }
}

const MAX_ENCODED_ID_LENGTH = 120;

/** One JSONL file per conversation; ids that do not make a safe filename are hashed. */
export function conversationFilename(conversationId: string): string {
  const encoded = encodeURIComponent(conversationId);
  if (encoded.length <= MAX_ENCODED_ID_LENGTH && encoded !== '.' && encoded !== '..' && !encoded.startsWith('h-')) {
    return `${encoded}.jsonl`;
  }
  return `h-${createHash('sha256').update(conversationId).digest('hex')}.jsonl`;
}

/**
 * Conversation history persisted as append-only JSONL under dataDir, so turns
 * survive restarts. Turns are cached in memory after the first read.
 */
export class JsonlConversationStore implements ConversationStore {
  private cache = new Map<string, Turn[]>();

  constructor(
    private dataDir: string,
    private logger: Logger
  ) {}

  private filePath(conversationId: string): string {
    return path.join(this.dataDir, conversationFilename(conversationId));
  }

  private async load(conversationId: string): Promise<Turn[] | undefined> {
    const cached = this.cache.get(conversationId);
    if (cached) return cached;

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath(conversationId), 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
      throw err;
    }

    const turns: Turn[] = [];
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      try {
        turns.push(TurnSchema.parse(JSON.parse(line)));
      } catch (err) {
        this.logger.warn({ err, conversationId }, 'Skipping malformed conversation line');
      }
    }
    this.cache.set(conversationId, turns);
    return turns;
  }

  async getTurns(conversationId: string): Promise<Turn[]> {
    return [...((await this.load(conversationId)) ?? [])];
  }

  async appendTurn(conversationId: string, turn: Turn): Promise<void> {
    const turns = (await this.load(conversationId)) ?? [];
    await fs.mkdir(this.dataDir, { recursive: true });
    await fs.appendFile(this.filePath(conversationId), `${JSON.stringify(turn)}\n`, 'utf-8');
    turns.push(turn);
    this.cache.set(conversationId, turns);
  }

  async has(conversationId: string): Promise<boolean> {
    return (await this.load(conversationId)) !== undefined;
  }
}
