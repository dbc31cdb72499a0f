#!/usr/bin/env node
/**
 * Server Registry - CLI Entry Point
 *
 * Starts the MCP server and tears the registry down on shutdown.
 */

import { startServer } from './server.js';
import { ServerRegistry } from './registry/ServerRegistry.js';

function shutdown(signal: NodeJS.Signals): void {
  console.error(`Received ${signal}, shutting down`);
  ServerRegistry.teardown();
  process.exit(0);
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);

startServer().catch((error) => {
  console.error('Failed to start Server Registry:', error);
  ServerRegistry.teardown();
  process.exit(1);
});
