#!/usr/bin/env node

import { fileURLToPath } from 'node:url';
import { createConsoleLogger } from '@authority-rag/core';
import { ApiServer } from './server.js';

export { ApiServer, API_SERVER_VERSION } from './server.js';
export type { ApiServerOptions } from './server.js';

export { parseApiKeys, createAuthMiddleware, requireAdmin, authenticatedKey } from './middleware/auth.js';
export type { ApiKeyEntry } from './middleware/auth.js';

export { createSearchRouter, searchRequestSchema, formatSearchResponse } from './routes/search.js';
export type { SearchRequest, SearchResponseItem, SearchRouteDeps } from './routes/search.js';

export { createStatusRouter } from './routes/status.js';
export type { StatusResponse, StatusRouteDeps } from './routes/status.js';

export { createAdminRouter } from './routes/admin.js';
export type { AdminRouteDeps } from './routes/admin.js';

export { createOpenAPISpec } from './openapi.js';
export type { OpenAPISpec } from './openapi.js';

const DEFAULT_PORT = 3100;

async function main(): Promise<void> {
  const rootDir = process.argv[2] ?? process.cwd();
  const port = parseInt(process.env['AUTHRAG_PORT'] ?? '', 10) || DEFAULT_PORT;
  const logger = createConsoleLogger({ prefix: 'api-server' });

  const server = new ApiServer({ rootDir, port, logger });
  const initialized = await server.initialize();
  if (initialized.isErr()) {
    logger.error('refusing to start', { error: initialized.error.message });
    process.exit(1);
  }
  await server.start();

  logger.info(`listening on http://localhost:${port}`);
  logger.info(`OpenAPI spec: http://localhost:${port}/api/openapi.json`);

  const shutdown = (): void => {
    logger.info('shutting down');
    server
      .close()
      .catch((error: unknown) => {
        logger.error('shutdown failed', { error: error instanceof Error ? error.message : String(error) });
      })
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Only run main when this module is executed directly (not imported)
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  main().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
