import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { BacklogQueries } from '../contracts/backlogService';
import { badRequest, flagSchema, respond } from './envelope';

// ---------- Schemas ----------
// product names are validated by the service so that bad names get its error message
const productQuerySchema = z.object({
  product: z.string().default(''),
  refresh: flagSchema.optional(),
});

const itemsQuerySchema = productQuerySchema.extend({
  q: z.string().optional(),
});

const itemParamsSchema = z.object({
  id: z.string().min(1, 'id required'),
});

const refreshQuerySchema = z.object({
  product: z.string().optional(),
});

// ---------- Routes ----------
export async function registerBacklogRoutes(app: FastifyInstance, service: BacklogQueries) {
  app.get('/api/products', async (_req, reply) => respond(service, reply, () => service.listProducts()));

  // Drop one product's cache, or all of them when no product is given
  app.get('/api/refresh', async (req, reply) => {
    const parsed = refreshQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(service, reply, parsed.error);

    return respond(service, reply, () => service.refresh(parsed.data.product ?? ''));
  });

  app.get('/api/items', async (req, reply) => {
    const parsed = itemsQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(service, reply, parsed.error);

    const { product, refresh = false, q = '' } = parsed.data;
    return respond(service, reply, () => service.listItems(product, refresh, q));
  });

  app.get('/api/items/:id', async (req, reply) => {
    const params = itemParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(service, reply, params.error);
    const query = productQuerySchema.safeParse(req.query);
    if (!query.success) return badRequest(service, reply, query.error);

    const { product, refresh = false } = query.data;
    return respond(service, reply, () => service.getItem(product, params.data.id, refresh));
  });

  app.get('/api/tree', async (req, reply) => {
    const parsed = productQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(service, reply, parsed.error);

    const { product, refresh = false } = parsed.data;
    return respond(service, reply, () => service.buildTree(product, refresh));
  });

  app.get('/api/kanban', async (req, reply) => {
    const parsed = productQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(service, reply, parsed.error);

    const { product, refresh = false } = parsed.data;
    return respond(service, reply, () => service.buildKanban(product, refresh));
  });
}
