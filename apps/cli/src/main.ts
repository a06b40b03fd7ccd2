/**
 * CLI entry logic, separated from process wiring so it can run in tests.
 *
 * Exit codes: 0 success, 1 storage or configuration failure, 2 usage error.
 */

import { createLogger, loadStorageSettings, type EnvLoadResult } from '@scoped-s3/config';
import { StorageError, type ProjectStorageClient } from '@scoped-s3/storage';
import { parseArgs, USAGE, UsageError, type ParsedArgs } from './args.js';
import { createCliClient, type TransportOverrides } from './client.js';
import { runCommand, type Print } from './commands.js';
import { printEnvDiagnostics } from './env-diagnostics.js';

const logger = createLogger('cli');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliContext {
  env: NodeJS.ProcessEnv;
  loadResult: EnvLoadResult;
  stdout: Print;
  stderr: Print;
  transport?: TransportOverrides;
}

function usageFailure(error: UsageError, context: CliContext): number {
  context.stderr(`Error: ${error.message}`);
  context.stderr(USAGE);
  return EXIT_USAGE;
}

export async function run(argv: readonly string[], context: CliContext): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) return usageFailure(error, context);
    throw error;
  }

  const { globals, command } = parsed;

  if (command.command === 'help') {
    context.stdout(USAGE);
    return EXIT_OK;
  }
  if (command.command === 'env') {
    printEnvDiagnostics(context.loadResult, context.env, context.stdout);
    return EXIT_OK;
  }

  let client: ProjectStorageClient;
  try {
    client = createCliClient(globals, loadStorageSettings(context.env), context.transport);
  } catch (error) {
    if (error instanceof UsageError) return usageFailure(error, context);
    const message = error instanceof Error ? error.message : String(error);
    context.stderr(`Error: ${message}`);
    return EXIT_FAILURE;
  }

  const startTime = Date.now();
  logger.debug({ event: 'cli.command.start', command: command.command, endpoint: client.endpoint });

  try {
    await runCommand(client, command, context.stdout);
    logger.debug({ event: 'cli.command.success', command: command.command, durationMs: Date.now() - startTime });
    return EXIT_OK;
  } catch (error) {
    if (!(error instanceof StorageError)) throw error;

    logger.debug({ event: 'cli.command.fail', command: command.command, kind: error.kind });
    context.stderr(`Error: ${error.message}`);
    return EXIT_FAILURE;
  } finally {
    client.destroy();
  }
}
