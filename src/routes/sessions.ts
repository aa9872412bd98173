// Session routes
import type { FastifyPluginAsync } from 'fastify';
import { AppError } from '../utils/errors.js';
import type { SessionStore } from '../services/sessions/session-store.js';
import { requireAuthIfEnabled } from '../security/route-guards.js';

export interface SessionRoutesOptions {
  sessions: SessionStore;
}

type IdParams = { Params: { id: string } };

export const sessionRoutes: FastifyPluginAsync<SessionRoutesOptions> = async (server, opts) => {
  const { sessions } = opts;

  server.addHook('onRequest', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return reply;
    }
  });

  // GET /v1/sessions - Newest first
  server.get('/sessions', async () => {
    const list = await sessions.list();
    return {
      sessions: list.map(s => ({
        id: s.id,
        title: s.title,
        updated_at: s.updatedAt,
        message_count: s.messageCount,
      })),
    };
  });

  // GET /v1/sessions/:id
  server.get<IdParams>('/sessions/:id', async (request) => {
    const session = await sessions.get(request.params.id);
    if (!session) {
      throw AppError.notFound('Session not found');
    }
    return {
      session: {
        id: session.id,
        title: session.title,
        messages: session.messages,
        created_at: session.createdAt,
        updated_at: session.updatedAt,
      },
    };
  });

  // DELETE /v1/sessions/:id
  server.delete<IdParams>('/sessions/:id', async (request) => {
    const removed = await sessions.delete(request.params.id);
    if (!removed) {
      throw AppError.notFound('Session not found');
    }
    return { ok: true };
  });
};
