import { z } from 'zod';
import type { Logger } from './logger';

export interface OllamaConfig {
  baseUrl: string;
  model: string;
  fallbacks?: string[];
  timeout?: number;
}

export interface GenerateOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

const OllamaGenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  done: z.boolean().optional(),
});

const OllamaEmbedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
});

export class OllamaClient {
  constructor(
    private config: OllamaConfig,
    private logger: Logger
  ) {}

  /**
   * Generate text using Ollama, trying fallback models in order when the
   * primary model fails.
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const model = options.model || this.config.model;

    try {
      this.logger.debug({ model, prompt: prompt.slice(0, 100) }, 'Generating with Ollama');

      const response = await fetch(`${this.config.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model,
          prompt,
          stream: false,
          options: {
            temperature: options.temperature,
            num_predict: options.maxTokens,
          },
        }),
        signal: this.config.timeout ? AbortSignal.timeout(this.config.timeout) : undefined,
      });

      if (!response.ok) {
        throw new Error(`Ollama API error: ${response.status} ${response.statusText}`);
      }

      const data = OllamaGenerateResponseSchema.parse(await response.json());
      this.logger.debug({ model, response: data.response.slice(0, 100) }, 'Generated response');

      return data.response;
    } catch (error) {
      // Fallbacks are only tried from the primary call
      if (options.model) throw error;

      this.logger.warn({ err: error, model }, 'Primary model failed, trying fallbacks');
      for (const fallback of this.config.fallbacks ?? []) {
        try {
          this.logger.debug({ fallback }, 'Trying fallback model');
          return await this.generate(prompt, { ...options, model: fallback });
        } catch (fallbackError) {
          this.logger.debug({ err: fallbackError, fallback }, 'Fallback model failed');
        }
      }

      this.logger.error({ err: error }, 'All Ollama models failed');
      throw new Error(`Failed to generate response: ${error}`);
    }
  }

  /**
   * Generate an embedding for text using Ollama
   */
  async embed(text: string, model?: string): Promise<{ embedding: number[]; model: string }> {
    const embeddingModel = model || this.config.model;

    try {
      this.logger.debug({ model: embeddingModel, textLength: text.length }, 'Generating embedding');

      const response = await fetch(`${this.config.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: embeddingModel,
          input: text,
        }),
        signal: this.config.timeout ? AbortSignal.timeout(this.config.timeout) : undefined,
      });

      if (!response.ok) {
        throw new Error(`Ollama embed API error: ${response.status} ${response.statusText}`);
      }

      const data = OllamaEmbedResponseSchema.parse(await response.json());
      const embedding = data.embeddings[0];

      if (!embedding || embedding.length === 0) {
        throw new Error('Empty embedding returned from Ollama');
      }

      return { embedding, model: data.model ?? embeddingModel };
    } catch (error) {
      this.logger.error({ err: error, model: embeddingModel }, 'Failed to generate embedding');
      throw error;
    }
  }
}
