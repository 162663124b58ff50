import 'dotenv/config';
import { parseArgs } from 'util';

const DEFAULT_PRODUCTS_ROOT = '_kano/backlog/products';
const DEFAULT_PORT = 8787;

// flags win over env; unknown flags are ignored so test runners can pass their own
const { values: flags } = parseArgs({
  args: process.argv.slice(2),
  options: {
    'backlog-root': { type: 'string' },
    port: { type: 'string' },
  },
  strict: false,
  allowPositionals: true,
});

function flag(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function parsePort(raw: string | undefined): number {
  const port = raw ? parseInt(raw, 10) : DEFAULT_PORT;
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid port: ${raw}`);
  }
  return port;
}

export const config = {
  productsRoot: flag(flags['backlog-root']) || process.env.BACKLOG_PRODUCTS_ROOT || DEFAULT_PRODUCTS_ROOT,
  port: parsePort(flag(flags.port) || process.env.PORT || undefined),
  host: process.env.HOST || '127.0.0.1',
  logLevel: process.env.LOG_LEVEL || 'info',
};
