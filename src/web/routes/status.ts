import { Hono } from 'hono';
import type { Config } from '../../config';
import type { RagService } from '../../rag/service';

const startedAt = Date.now();

export function statusRoutes(deps: { config: Config; ragService: RagService }) {
  const app = new Hono();

  app.get('/', (c) => {
    const index = deps.ragService.indexState();
    return c.json({
      uptime: Math.floor((Date.now() - startedAt) / 1000),
      startedAt: new Date(startedAt).toISOString(),
      ready: index.status === 'ready',
      index,
      embedding: { model: deps.config.embedding.model },
      generation: {
        backend: deps.config.generation.backend,
        model: deps.config.generation.model,
        configured: deps.config.generation.backend === 'ollama' || Boolean(deps.config.generation.apiKey),
      },
    });
  });

  return app;
}
