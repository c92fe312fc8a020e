#!/usr/bin/env node

/**
 * Browser Session MCP Server
 *
 * Main entry point: reads configuration, builds the session registry and
 * idle reaper, registers tools and serves them over stdio.
 */

import { initServerConfig, getSessionRegistry } from './server/server-config.js';
import { SessionToolServer } from './server/mcp-server.js';
import { IdleReaper } from './session/idle-reaper.js';
import { createAllTools } from './tools/index.js';
import { cleanupTempFiles } from './lib/temp-file.js';
import { getLogger } from './shared/services/logging.service.js';

const SERVER_NAME = 'tabkeeper-mcp';
const SERVER_VERSION = '0.1.0';

async function main(): Promise<void> {
  const logger = getLogger();
  const config = initServerConfig(process.argv.slice(2));
  const registry = getSessionRegistry();
  const reaper = new IdleReaper(registry, { intervalMs: config.reapIntervalMs });
  const server = new SessionToolServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    createAllTools(registry)
  );

  await server.start();
  reaper.start();
  logger.info('Session registry ready', {
    capacity: config.capacity,
    idle_timeout_ms: config.idleTimeoutMs,
    reap_interval_ms: config.reapIntervalMs,
    headless: config.headless,
    auto_create: config.autoCreate,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    reaper.stop();
    try {
      await registry.shutdown();
      await cleanupTempFiles();
      await server.stop();
    } catch (error) {
      logger.error('Shutdown failed', error instanceof Error ? error : undefined);
      process.exit(1);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
