/**
 * Fluency Coach API Server
 *
 * Entry point that starts the Hono app on Node through @hono/node-server.
 *
 * Features:
 * - Automatic port discovery (finds available port if preferred is in use)
 * - Configuration validated at startup
 * - Conversations persisted to SQLite (DATABASE_PATH)
 * - Graceful shutdown on SIGINT/SIGTERM
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables: see .env.example
 *
 * @example
 * ```bash
 * PORT=8080 MODEL_NAME=llama3 npm run server
 * ```
 */

import 'dotenv/config';
import { createServer } from 'node:net';
import { serve } from '@hono/node-server';
import { config, ConfigValidationError, isProduction, validateConfig } from '../config';
import { createCoachingRuntime } from '../runtime';
import { createApp } from './app';

/** Highest port tried before giving up */
const MAX_PORT = 3100;

/**
 * Finds an available port starting from the preferred port.
 *
 * Binds a temporary server to test each port, moving up one port at a time
 * until one is free or `maxPort` is passed.
 *
 * @throws Error if no available port is found within the range
 */
export async function findAvailablePort(preferredPort: number, maxPort: number = MAX_PORT): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    const free = await new Promise<boolean>((resolve) => {
      const listener = createServer();
      listener.once('error', () => resolve(false));
      listener.listen(port, () => {
        listener.close(() => resolve(true));
      });
    });

    if (free) return port;
    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }

  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

async function startServer(): Promise<void> {
  validateConfig();

  const port = await findAvailablePort(config.server.port);
  const runtime = createCoachingRuntime(config);
  const app = createApp({ service: runtime.service }, { isProduction: isProduction() });

  const backendStatus = await runtime.service.status();

  const server = serve({ fetch: app.fetch, port, hostname: config.server.host }, (info) => {
    console.log('');
    console.log('Fluency Coach API Server');
    console.log(`  Server:      http://localhost:${info.port}`);
    console.log(`  Environment: ${config.server.nodeEnv}`);
    console.log(`  Database:    ${config.database.path}`);
    console.log(`  Backend:     ${backendStatus.provider} (${backendStatus.model})`);
    console.log(`  Status:      ${backendStatus.message}`);
    console.log('');
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close(() => {
      runtime.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    console.error(`[Config] ${error.message}`);
  } else {
    console.error('[Server] Failed to start:', error);
  }
  process.exit(1);
});
