#!/usr/bin/env node
import { config } from './config/index.js';
import { logger, closeLogger, rootLogger } from './utils/logger.js';
import { runWithLogger } from './app.js';

const log = logger.child({ component: 'main' });

function exit(code: number): never {
  closeLogger();
  process.exit(code);
}

async function main(): Promise<void> {
  log.debug({ pid: process.pid, argv: process.argv.slice(2) }, 'Starting pinentry-menu');

  const code = await runWithLogger(rootLogger, {
    args: process.argv.slice(2),
    config,
    input: process.stdin,
    output: process.stdout,
    errorOutput: process.stderr,
  });

  process.exit(code);
}

// Handle termination signals
process.on('SIGINT', () => {
  log.info({ signal: 'SIGINT' }, 'Interrupted');
  exit(130);
});
process.on('SIGTERM', () => {
  log.info({ signal: 'SIGTERM' }, 'Terminated');
  exit(143);
});

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  log.fatal({ err }, 'Uncaught exception');
  exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.fatal({ reason }, 'Unhandled rejection');
  exit(1);
});

// Already logged and released by runWithLogger.
main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  exit(1);
});
