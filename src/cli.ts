#!/usr/bin/env node
import { createInterface } from 'readline';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { getClientVersion } from './utils/system.js';
import { MariaDBClient } from './mariadb/client.js';
import { isStatementComplete } from './mariadb/parser.js';
import { envClientConfig } from './mariadb/types.js';

const log = logger.child({ component: 'main' });

let client: MariaDBClient | null = null;
let isShuttingDown = false;

async function main(): Promise<void> {
  log.info({ bin: config.client.bin, version: getClientVersion(config.client.bin) }, 'Starting mariadb-repl');

  client = new MariaDBClient(envClientConfig(config));

  try {
    await client.start();
  } catch (err) {
    log.fatal({ err }, 'Failed to start the MariaDB client');
    process.exit(1);
  }

  if (client.getState() !== 'running') {
    process.exit(1);
  }

  const input = createInterface({ input: process.stdin, terminal: false });
  let pending: string[] = [];

  for await (const line of input) {
    pending.push(line);
    if (!isStatementComplete(line)) continue;

    const statement = pending.join('\n');
    pending = [];

    const outcome = await client.execute(statement);
    switch (outcome.kind) {
      case 'ok':
        process.stdout.write(outcome.text + '\n');
        break;
      case 'error':
        process.stderr.write(outcome.text + '\n');
        break;
      case 'transport':
        process.stderr.write(`${outcome.message}\n`);
        await shutdown('transport', 1);
        return;
    }
  }

  if (pending.join('').trim()) {
    log.warn('Input ended inside an unterminated statement');
  }

  await shutdown('end of input');
}

async function shutdown(signal: string, exitCode = 0): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info({ signal }, 'Shutting down...');

  try {
    if (client) {
      await client.stop();
    }
    log.info('Shutdown complete');
    process.exit(exitCode);
  } catch (err) {
    log.error({ err }, 'Error during shutdown');
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch(() => process.exit(1));
});
process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch(() => process.exit(1));
});

process.on('unhandledRejection', (reason) => {
  log.fatal({ reason }, 'Unhandled rejection');
  shutdown('unhandledRejection', 1).catch(() => process.exit(1));
});

main().catch((err) => {
  log.fatal({ err }, 'Failed to start');
  process.exit(1);
});
