#!/usr/bin/env -S npx tsx
/**
 * scoped-s3 command-line client
 *
 * Usage: scoped-s3 --project 42 --api-key <key> list-buckets
 */

import { createLogger, initEnv } from '@scoped-s3/config';
import { run } from './main.js';

// Load env before anything reads process.env
const loadResult = initEnv();
const logger = createLogger('cli');

async function main(): Promise<void> {
  try {
    process.exitCode = await run(process.argv.slice(2), {
      env: process.env,
      loadResult,
      stdout: (line) => process.stdout.write(`${line}\n`),
      stderr: (line) => process.stderr.write(`${line}\n`),
    });
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.fatal({ event: 'cli.crash', error: err.message, stack: err.stack }, 'Unexpected failure');
    process.exitCode = 1;
  }
}

void main();
