#!/usr/bin/env node
import 'dotenv/config';
import { createBatchDriver } from './batch/driver.js';
import { parseCliArgs, USAGE } from './cliArgs.js';
import { loadConfig } from './config.js';
import { logger } from './infra/logger.js';

async function main(): Promise<number> {
  const { help, overrides } = parseCliArgs(process.argv.slice(2));
  if (help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const config = loadConfig(process.env, overrides);
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('interrupt received, finishing the current document');
    controller.abort();
  });

  const result = await createBatchDriver({ config, logger }).run({ signal: controller.signal });
  process.stdout.write(`${result.records.length}/${result.processed} documents written to ${result.outputPath}\n`);
  return 0;
}

main().then(
  (code) => process.exit(code),
  (error) => {
    logger.fatal({ err: error }, 'paper-tabulate failed');
    process.exit(1);
  }
);
