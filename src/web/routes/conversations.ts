import { Hono } from 'hono';
import type { ConversationStore } from '../../conversation/store';

export function conversationsRoutes(deps: { conversations: ConversationStore }) {
  const app = new Hono();

  // Get conversation turns, oldest first
  app.get('/:id', async (c) => {
    const id = c.req.param('id');
    if (!(await deps.conversations.has(id))) {
      return c.json({ error: 'Conversation not found' }, 404);
    }

    const turns = await deps.conversations.getTurns(id);
    return c.json({ conversation_id: id, turns });
  });

  return app;
}
