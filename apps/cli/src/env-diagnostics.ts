/**
 * `env` subcommand: environment loading diagnostics, without secrets
 */

import { getEnvDiagnostics, STORAGE_ENV_KEYS, type EnvLoadResult } from '@scoped-s3/config';
import type { Print } from './commands.js';

export function printEnvDiagnostics(loadResult: EnvLoadResult, env: NodeJS.ProcessEnv, print: Print): void {
  const { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded } = loadResult;

  print('Environment Diagnostics');
  print(`  Repo root: ${repoRoot}`);
  print(`  .env file: ${envFilePath} (${loaded ? 'loaded' : 'missing'})`);
  print(`  .env.local file: ${envLocalFilePath} (${localLoaded ? 'loaded' : 'missing'})`);
  print(`  Keys loaded from files: ${keysLoaded.length}`);

  const diagnostics = getEnvDiagnostics(STORAGE_ENV_KEYS, { env, loadResult });

  print('');
  print('Variables:');
  for (const key of diagnostics.keys) {
    const status = key.present ? 'set' : 'unset';
    const length = key.length ? ` (length: ${key.length})` : '';
    const masked = key.maskedValue ? ` (${key.maskedValue})` : '';
    const source = key.source ? ` [from ${key.source}]` : '';
    print(`  ${key.key}: ${status}${length}${masked}${source}`);
  }

  if (diagnostics.warnings.length > 0) {
    print('');
    print('Warnings:');
    for (const warning of diagnostics.warnings) {
      print(`  - ${warning}`);
    }
  }

  // Structured output for machine parsing
  print('');
  print(
    JSON.stringify({
      event: 'env.diagnostics',
      envFilePath,
      envFileExists: diagnostics.envFileExists,
      envLocalFilePath,
      envLocalFileExists: localLoaded,
      keysLoadedCount: keysLoaded.length,
      variables: diagnostics.keys,
      warnings: diagnostics.warnings,
    })
  );
}
