import type { ConversationStore } from '../conversation/store';
import type { LLMClient } from '../core/llm-client';
import type { ChunkMetadata } from '../ingest/types';
import { KeyedLock } from '../keyed-lock';
import type { Logger } from '../logger';
import type { Embedder } from '../vector/embeddings';
import { VectorIndex } from '../vector/vector-index';
import { buildPrompt, cleanResponse, GENERATION_FAILED_MESSAGE, NO_MODEL_MESSAGE } from './prompts';

export const DEFAULT_TOP_K = 8;

export interface RagAnswer {
  answerText: string;
  sources: ChunkMetadata[];
}

export type IndexState =
  | { status: 'unloaded' }
  | { status: 'loading' }
  | { status: 'ready'; entries: number; model: string; dimensions: number }
  | { status: 'failed'; error: string };

export interface RagServiceDeps {
  embedder: Embedder;
  indexPath: string;
  conversations: ConversationStore;
  llm: LLMClient | null;
  logger: Logger;
  topK?: number;
  organization?: string;
  /** Override how the index bundle is opened (tests). */
  openIndex?: (indexPath: string, modelId: string, logger: Logger) => VectorIndex;
}

/**
 * Query-time retrieval and answer generation.
 *
 * The index is loaded once on first use and shared read-only by every
 * request. A failed load is remembered, so later requests fail the same way
 * instead of retrying. Each request runs under an exclusive section for its
 * conversation id; different ids never wait on each other.
 */
export class RagService {
  private indexPromise: Promise<VectorIndex> | null = null;
  private state: IndexState = { status: 'unloaded' };
  private locks = new KeyedLock();
  private topK: number;
  private organization: string;
  private openIndex: (indexPath: string, modelId: string, logger: Logger) => VectorIndex;

  constructor(private deps: RagServiceDeps) {
    this.topK = deps.topK ?? DEFAULT_TOP_K;
    this.organization = deps.organization ?? 'the bank';
    this.openIndex = deps.openIndex ?? ((p, model, logger) => VectorIndex.open(p, model, logger));
  }

  indexState(): IndexState {
    return this.state;
  }

  getIndex(): Promise<VectorIndex> {
    if (!this.indexPromise) {
      this.state = { status: 'loading' };
      this.indexPromise = new Promise<VectorIndex>((resolve) => {
        resolve(this.openIndex(this.deps.indexPath, this.deps.embedder.modelId, this.deps.logger));
      }).then(
        (index) => {
          this.state = { status: 'ready', entries: index.size, model: index.modelId, dimensions: index.dimensions };
          return index;
        },
        (err: unknown) => {
          this.state = { status: 'failed', error: err instanceof Error ? err.message : String(err) };
          this.deps.logger.error({ err, indexPath: this.deps.indexPath }, 'Failed to load index');
          throw err;
        },
      );
    }
    return this.indexPromise;
  }

  /**
   * Load the index ahead of the first request. Never rejects; the outcome is
   * visible through indexState().
   */
  async warmUp(): Promise<IndexState> {
    try {
      await this.getIndex();
    } catch {
      // Recorded in state and logged by getIndex
    }
    return this.state;
  }

  /**
   * The conversation's place in line is taken when the call is made, so turns
   * are stored in arrival order however long each retrieval takes.
   */
  answer(conversationId: string, queryText: string): Promise<RagAnswer> {
    return this.locks.run(conversationId, async () => {
      const index = await this.getIndex();

      const queryVector = await this.deps.embedder.embed(queryText);
      const neighbors = index.nearestNeighbors(queryVector, this.topK);
      const hits = neighbors.flatMap((n) => {
        const chunk = index.lookup(n.chunkId);
        return chunk ? [chunk] : [];
      });
      const context = hits.map((h) => h.text).join('\n');
      const sources = hits.map((h) => h.metadata);

      this.deps.logger.info({ conversationId, hits: hits.length }, 'Retrieved context');

      const history = await this.deps.conversations.getTurns(conversationId);
      const prompt = buildPrompt(history, queryText, context, this.organization);
      const answerText = await this.generate(prompt, conversationId);
      await this.deps.conversations.appendTurn(conversationId, { user: queryText, ai: answerText });

      return { answerText, sources };
    });
  }

  private async generate(prompt: string, conversationId: string): Promise<string> {
    if (!this.deps.llm) return NO_MODEL_MESSAGE;

    try {
      const raw = await this.deps.llm.generate(prompt);
      return cleanResponse(raw);
    } catch (err) {
      this.deps.logger.error({ err, conversationId, backend: this.deps.llm.backend }, 'Generation failed');
      return GENERATION_FAILED_MESSAGE;
    }
  }
}
