import { z } from 'zod';
import type { FetchFn } from '../acquisition/types';
import type { GenerationConfig } from '../config';
import type { Logger } from '../logger';
import { OllamaClient } from '../ollama';

export interface LLMGenerateOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMClient {
  readonly backend: 'openai' | 'ollama';
  generate(prompt: string, opts?: LLMGenerateOptions): Promise<string>;
}

/**
 * Thin wrapper delegating to existing OllamaClient.
 */
export class OllamaLLMClient implements LLMClient {
  readonly backend = 'ollama' as const;

  constructor(
    private ollama: OllamaClient,
    private defaults: LLMGenerateOptions = {}
  ) {}

  generate(prompt: string, opts?: LLMGenerateOptions): Promise<string> {
    return this.ollama.generate(prompt, { ...this.defaults, ...opts });
  }
}

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

export interface ChatCompletionsConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  fallbacks?: string[];
  temperature?: number;
  maxTokens?: number;
  timeout?: number;
}

/**
 * Client for hosted OpenAI-compatible `/chat/completions` endpoints (Groq
 * and friends). The prompt is sent as a single user message.
 */
export class ChatCompletionsLLMClient implements LLMClient {
  readonly backend = 'openai' as const;
  private fetchFn: FetchFn;

  constructor(
    private config: ChatCompletionsConfig,
    private logger: Logger,
    fetchFn?: FetchFn
  ) {
    this.fetchFn = fetchFn ?? fetch;
  }

  async generate(prompt: string, opts: LLMGenerateOptions = {}): Promise<string> {
    const models = opts.model ? [opts.model] : [this.config.model, ...(this.config.fallbacks ?? [])];

    let lastError: unknown;
    for (const model of models) {
      try {
        return await this.complete(model, prompt, opts);
      } catch (err) {
        lastError = err;
        this.logger.warn({ err, model }, 'Chat completion failed');
      }
    }
    throw new Error(`Failed to generate response: ${lastError instanceof Error ? lastError.message : String(lastError)}`);
  }

  private async complete(model: string, prompt: string, opts: LLMGenerateOptions): Promise<string> {
    this.logger.debug({ model, prompt: prompt.slice(0, 100) }, 'Requesting chat completion');

    const response = await this.fetchFn(`${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model,
        messages: [{ role: 'user', content: prompt }],
        temperature: opts.temperature ?? this.config.temperature,
        max_tokens: opts.maxTokens ?? this.config.maxTokens,
      }),
      signal: this.config.timeout ? AbortSignal.timeout(this.config.timeout) : undefined,
    });

    if (!response.ok) {
      throw new Error(`Chat completions API error: ${response.status} ${response.statusText}`);
    }

    const data = ChatCompletionSchema.parse(await response.json());
    const content = data.choices[0].message.content ?? '';
    this.logger.debug({ model, response: content.slice(0, 100) }, 'Generated response');
    return content;
  }
}

/**
 * Build the generation client for the configured backend. Returns null when
 * the hosted backend has no credential, so callers can answer with a fixed
 * apology instead of failing at startup.
 */
export function createLLMClient(config: GenerationConfig, logger: Logger, fetchFn?: FetchFn): LLMClient | null {
  if (config.backend === 'ollama') {
    const ollama = new OllamaClient(
      { baseUrl: config.baseUrl, model: config.model, fallbacks: config.fallbacks, timeout: config.timeout },
      logger,
    );
    return new OllamaLLMClient(ollama, { temperature: config.temperature, maxTokens: config.maxTokens });
  }

  if (!config.apiKey) {
    logger.warn('No generation API key configured; answers will be a fixed apology');
    return null;
  }

  return new ChatCompletionsLLMClient(
    {
      baseUrl: config.baseUrl,
      apiKey: config.apiKey,
      model: config.model,
      fallbacks: config.fallbacks,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      timeout: config.timeout,
    },
    logger,
    fetchFn,
  );
}
