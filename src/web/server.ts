import { serve, type ServerType } from '@hono/node-server';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { Config } from '../config';
import type { ConversationStore } from '../conversation/store';
import type { Logger } from '../logger';
import type { RagService } from '../rag/service';
import { chatRoutes } from './routes/chat';
import { conversationsRoutes } from './routes/conversations';
import { statusRoutes } from './routes/status';

export const ROOT_MESSAGE = 'Product assistant is running';

export type WebServerDeps = {
  config: Config;
  logger: Logger;
  ragService: RagService;
  conversations: ConversationStore;
};

export function createApp(deps: WebServerDeps): Hono {
  const { config, logger } = deps;
  const app = new Hono();

  const origins = config.web.corsOrigins;
  app.use('*', cors({ origin: origins.includes('*') ? '*' : origins }));

  // Liveness probe
  app.get('/', (c) => c.json({ message: ROOT_MESSAGE }));

  app.route('/chat', chatRoutes({ ragService: deps.ragService, logger }));
  app.route('/api/status', statusRoutes({ config, ragService: deps.ragService }));
  app.route('/api/conversations', conversationsRoutes({ conversations: deps.conversations }));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));
  app.onError((err, c) => {
    logger.error({ err, path: c.req.path }, 'Unhandled request error');
    return c.json({ error: 'Something went wrong. Please try again.' }, 500);
  });

  return app;
}

export function startWebServer(deps: WebServerDeps): ServerType {
  const { port, host } = deps.config.web;
  const app = createApp(deps);

  const server = serve({ fetch: app.fetch, port, hostname: host });

  deps.logger.info({ port, host }, `Assistant API available at http://${host}:${port}`);
  return server;
}
