import type { FastifyReply } from 'fastify';
import { z } from 'zod';
import type { BacklogQueries } from '../contracts/backlogService';
import { BacklogError, httpStatusFor } from '../errors';

export interface Envelope<T> {
  ok: boolean;
  data: T;
  meta: { products_root: string };
}

export interface ErrorData {
  error: string;
  code: string;
}

// query-string flags arrive as strings: accept 1/true/yes
export const flagSchema = z.preprocess(
  (v) => (typeof v === 'string' ? ['1', 'true', 'yes'].includes(v.toLowerCase()) : v),
  z.boolean(),
);

function envelope<T>(service: BacklogQueries, ok: boolean, data: T): Envelope<T> {
  return { ok, data, meta: { products_root: service.getWorkspaceInfo().products_root } };
}

export function badRequest(service: BacklogQueries, reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send(envelope(service, false, { error: 'invalid_request', issues: error.flatten() }));
}

/**
 * Runs a service call and wraps the outcome. Known backlog errors become a failed
 * envelope with their HTTP status; anything else is left to Fastify's error handler.
 */
export async function respond<T>(
  service: BacklogQueries,
  reply: FastifyReply,
  run: () => Promise<T> | T,
) {
  try {
    const data = await run();
    return reply.send(envelope(service, true, data));
  } catch (err) {
    if (!(err instanceof BacklogError)) throw err;
    const data: ErrorData = { error: err.message, code: err.code };
    return reply.code(httpStatusFor(err)).send(envelope(service, false, data));
  }
}
