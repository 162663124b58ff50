import Fastify from 'fastify';
import { config } from './config';
import { registerBacklogRoutes } from './routes/backlog';
import { registerWorkspaceRoutes } from './routes/workspace';
import type { BacklogQueries } from './contracts/backlogService';
import { BacklogService } from './service/backlogService';

export interface BuildAppOptions {
  /** Defaults to a service over the configured products root, logging through Fastify. */
  service?: BacklogQueries;
  /** Enables Fastify's request logger at this level. */
  logLevel?: string;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({ logger: options.logLevel ? { level: options.logLevel } : false });
  const service = options.service ?? new BacklogService({ productsRoot: config.productsRoot, logger: app.log });

  app.get('/healthz', async () => ({ ok: true, status: 'healthy' }));

  await registerWorkspaceRoutes(app, service);
  await registerBacklogRoutes(app, service);
  return app;
}

export { BacklogService } from './service/backlogService';
export type {
  BacklogQueries,
  GetItemResult,
  ItemDetail,
  ItemSummary,
  KanbanResult,
  Lane,
  ListItemsResult,
  RefreshResult,
  SwitchWorkspaceResult,
  TreeNode,
  TreeResult,
  WorkspaceInfo,
} from './contracts/backlogService';
