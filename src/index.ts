#!/usr/bin/env tsx

// Load .env FIRST — before any other module initializes
import { configPath } from './env.js';

import { loadConfigFile } from './config/load.js';
import { createLogger, LogLevel, parseLogLevel, setLogLevel } from './logger.js';
import { errMsg } from './utils/error.js';
import { connectMqtt } from './mqtt/connection.js';
import { BodyMetricsApp } from './app.js';

const log = createLogger('Main');

let app: BodyMetricsApp | null = null;
let stopping = false;

// ─── Signal handling ─────────────────────────────────────────────────────────

async function shutdown(): Promise<void> {
  if (stopping) {
    log.info('Force exit.');
    process.exit(1);
  }
  stopping = true;
  log.info('\nShutting down gracefully... (press again to force exit)');
  try {
    await app?.stop();
    process.exit(0);
  } catch (err) {
    log.error(`Shutdown failed: ${errMsg(err)}`);
    process.exit(1);
  }
}

function onSignal(): void {
  shutdown().catch((err: unknown) => {
    log.error(errMsg(err));
    process.exit(1);
  });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

// ─── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const path = configPath();
  const config = loadConfigFile(path);

  const envLevel = parseLogLevel(process.env.LOG_LEVEL);
  if (envLevel !== undefined) {
    setLogLevel(envLevel);
  } else if (config.runtime.debug) {
    setLogLevel(LogLevel.DEBUG);
  }

  log.info(`\nBody Metrics Sync — ${config.scales.length} scale(s) from ${path}`);

  const conn = await connectMqtt(config.mqtt);
  app = new BodyMetricsApp(config, conn);
  await app.start();
}

main().catch((err: unknown) => {
  log.error(errMsg(err));
  process.exit(1);
});
