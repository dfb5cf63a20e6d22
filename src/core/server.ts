#!/usr/bin/env node
/**
 * core/server.ts
 *
 * The single entry point. Orchestrates startup in order:
 *   1. Load environment variables from .env
 *   2. Parse CLI args
 *   3. Load session config (defaults ← config/session.json ← env ← CLI)
 *   4. Initialise the logger (stdout + the control API's log stream)
 *   5. Create and init the bridge context
 *   6. Start the HTTP control API
 */

import * as path from 'path';
import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { Server } from 'http';

// .env next to the project root (relative to dist/core/), else CWD
const envPath = path.resolve(__dirname, '..', '..', '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
} else {
  dotenv.config();
}

import { initLogger, scopedLogger } from './logger';
import { loadSessionConfig, parseCli } from './config';
import { BridgeContext } from './context';
import { LogBroadcaster, createHttpTransport } from '../transports/http';

const log = scopedLogger('core/server');

let serverInstance: Server | null = null;
let context: BridgeContext | null = null;

const SHUTDOWN_TIMEOUT_MS = 5000;

function gracefulShutdown(signal: string): void {
  log.info({ signal }, 'Received shutdown signal, starting graceful shutdown');

  // logout goes out before the socket is closed
  context?.teardown();

  const timer = setTimeout(() => {
    log.warn('Shutdown timeout reached, forcing exit');
    process.exit(0);
  }, SHUTDOWN_TIMEOUT_MS);
  timer.unref();

  if (!serverInstance) {
    process.exit(0);
  }
  serverInstance.closeAllConnections();
  serverInstance.close(() => {
    log.info('Graceful shutdown complete');
    process.exit(0);
  });
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

function main(): void {
  const sessionConfig = loadSessionConfig(parseCli(process.argv.slice(2)));

  const logs = new LogBroadcaster();
  initLogger(sessionConfig, logs);
  log.info({ serverUrl: sessionConfig.serverUrl, port: sessionConfig.controlPort }, 'Mux input bridge starting');

  context = BridgeContext.create(sessionConfig);
  context.init();

  const app = createHttpTransport(context, logs);
  serverInstance = app.listen(sessionConfig.controlPort, () => {
    log.info({ port: sessionConfig.controlPort }, 'Control API listening');
  });
  serverInstance.keepAliveTimeout = 65000;
}

try {
  main();
} catch (e) {
  console.error('Fatal error during startup:', (e as Error).message);
  console.error((e as Error).stack);
  process.exit(1);
}
