#!/usr/bin/env node
import { config } from './config';
import { logger } from './logger';
import { buildApp } from './server';

/**
 * Entrypoint for the backlog webview service.
 * Flags: `--backlog-root <path>` and `--port <n>` (see config.ts for env fallbacks).
 */
async function main() {
  const app = await buildApp({ logLevel: config.logLevel });

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Backlog webview listening on http://${config.host}:${config.port} (products root: ${config.productsRoot})`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error starting backlog webview');
  process.exit(1);
});
