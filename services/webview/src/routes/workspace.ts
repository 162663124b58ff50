// src/routes/workspace.ts
import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { BacklogQueries } from '../contracts/backlogService';
import { badRequest, respond } from './envelope';

export async function registerWorkspaceRoutes(app: FastifyInstance, service: BacklogQueries) {
  app.get('/api/workspace/info', async (_req, reply) => respond(service, reply, () => service.getWorkspaceInfo()));

  app.get('/api/workspace/switch', async (req, reply) => {
    const parsed = z.object({ path: z.string().default('') }).safeParse(req.query);
    if (!parsed.success) return badRequest(service, reply, parsed.error);

    return respond(service, reply, () => service.switchWorkspace(parsed.data.path));
  });
}
