import { Hono } from 'hono';
import { z } from 'zod';
import { IndexConfigError } from '../../errors';
import type { Logger } from '../../logger';
import type { RagService } from '../../rag/service';

const ChatRequestSchema = z.object({
  conversation_id: z.string().min(1),
  query: z.string().trim().min(1),
});

export function chatRoutes(deps: { ragService: RagService; logger: Logger }) {
  const app = new Hono();

  app.post('/', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be JSON' }, 400);
    }

    const parsed = ChatRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Both conversation_id and query are required' }, 400);
    }

    const { conversation_id: conversationId, query } = parsed.data;
    try {
      const { answerText, sources } = await deps.ragService.answer(conversationId, query);
      return c.json({ answer: answerText, sources });
    } catch (err) {
      if (err instanceof IndexConfigError) {
        deps.logger.error({ err, conversationId }, 'Chat unavailable: index not ready');
        return c.json({ error: 'The assistant is not available right now. Please try again later.' }, 503);
      }
      deps.logger.error({ err, conversationId }, 'Chat request failed');
      return c.json({ error: 'Something went wrong while answering. Please try again.' }, 500);
    }
  });

  return app;
}
