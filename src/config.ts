import { readFileSync } from 'node:fs';
import { z } from 'zod';

// Zod schemas for type-safe configuration
const CrawlPolicySchema = z.object({
  allowedHostSuffix: z.string().default('commbank.com.au'),
  pathAllowList: z.array(z.string()).default(['/personal', '/business', '/content/dam', '/important-info']),
  pathDenyList: z
    .array(z.string())
    .default(['/privacy', '/careers', '/security', '/about-us', '/newsroom', '/site-map', '/legal', '/contact']),
  maxPages: z.number().int().positive().default(500),
  perPageLinkLimit: z.number().int().min(0).default(20),
  requestTimeout: z.number().int().positive().default(10_000),
  interRequestDelay: z.number().int().min(0).default(100),
  minTextLength: z.number().int().min(0).default(100),
  maxBytes: z.number().int().positive().default(10 * 1024 * 1024),
});

const DocumentDownloadSchema = z.object({
  urls: z.array(z.string().url()).default([]),
  seedPages: z.array(z.string().url()).default([]),
  maxBytes: z.number().int().positive().default(100 * 1024 * 1024), // 100MB
  timeout: z.number().int().positive().default(30_000),
  retries: z.number().int().min(1).default(2),
  delay: z.number().int().min(0).default(1000),
  maxDocuments: z.number().int().positive().default(500),
  maxCrawlPages: z.number().int().positive().default(200),
});

const AcquisitionConfigSchema = z.object({
  siteTextDir: z.string().default('./data/site_text'),
  documentsDir: z.string().default('./data/pdfs'),
  userAgent: z.string().default('ProductDocsRag/1.0 (+crawler)'),
  seeds: z.array(z.string().url()).default([]),
  policy: CrawlPolicySchema.default({}),
  documents: DocumentDownloadSchema.default({}),
});

export const ChunkingConfigSchema = z
  .object({
    chunkSize: z.number().int().positive().default(1000),
    chunkOverlap: z.number().int().min(0).default(200),
  })
  .refine((c) => c.chunkOverlap < c.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

const EmbeddingConfigSchema = z.object({
  baseUrl: z.string().url().default('http://127.0.0.1:11434'),
  model: z.string().default('nomic-embed-text'),
  concurrency: z.number().int().positive().default(4),
  cachePath: z.string().optional(),
});

const IndexConfigSchema = z.object({
  path: z.string().default('./data/index/vectors.db'),
});

const GenerationConfigSchema = z.object({
  backend: z.enum(['openai', 'ollama']).default('openai'),
  baseUrl: z.string().url().default('https://api.groq.com/openai/v1'),
  apiKey: z.string().optional(),
  model: z.string().default('llama3-8b-8192'),
  fallbacks: z.array(z.string()).default([]),
  temperature: z.number().min(0).max(2).default(0.3),
  maxTokens: z.number().int().positive().optional(),
  timeout: z.number().int().positive().default(60_000),
});

const AssistantConfigSchema = z.object({
  organization: z.string().default('the bank'),
  topK: z.number().int().positive().default(8),
});

const ConversationsConfigSchema = z.object({
  dataDir: z.string().optional(),
});

const WebConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().positive().default(8000),
  corsOrigins: z.array(z.string()).default(['*']),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  file: z.string().optional(),
});

export const ConfigSchema = z.object({
  acquisition: AcquisitionConfigSchema.default({}),
  chunking: ChunkingConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.default({}),
  index: IndexConfigSchema.default({}),
  generation: GenerationConfigSchema.default({}),
  assistant: AssistantConfigSchema.default({}),
  conversations: ConversationsConfigSchema.default({}),
  web: WebConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type AcquisitionConfig = z.infer<typeof AcquisitionConfigSchema>;
export type CrawlPolicy = z.infer<typeof CrawlPolicySchema>;
export type DocumentDownloadConfig = z.infer<typeof DocumentDownloadSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type IndexConfig = z.infer<typeof IndexConfigSchema>;
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type AssistantConfig = z.infer<typeof AssistantConfigSchema>;
export type WebConfig = z.infer<typeof WebConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const DEFAULT_CONFIG_PATH = './config/config.json';

/**
 * Substitute environment variables in strings.
 * Supports ${VAR_NAME} (must be set) and ${VAR_NAME:-default}.
 */
export function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}:]+)(?::-([^}]*))?\}/g, (_, varName: string, fallback: string | undefined) => {
      const value = env[varName];
      if (value !== undefined) return value;
      if (fallback !== undefined) return fallback;
      throw new Error(`Environment variable ${varName} is not defined`);
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

/**
 * Validate a raw (already env-substituted) config object.
 * An empty apiKey is treated as "not configured".
 */
export function parseConfig(raw: unknown): Config {
  const config = ConfigSchema.parse(raw);
  if (!config.generation.apiKey?.trim()) {
    config.generation.apiKey = undefined;
  }
  return config;
}

/**
 * Load and validate configuration from file
 */
export function loadConfig(configPath: string = process.env.RAG_CONFIG ?? DEFAULT_CONFIG_PATH): Config {
  try {
    const content = readFileSync(configPath, 'utf-8');
    const rawConfig: unknown = JSON.parse(content);

    // Substitute environment variables
    const configWithEnv = substituteEnvVars(rawConfig);

    return parseConfig(configWithEnv);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      for (const issue of error.issues) {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      }
      throw new Error('Invalid configuration');
    }
    throw error;
  }
}
