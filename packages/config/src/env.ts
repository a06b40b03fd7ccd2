/**
 * Centralized environment variable loader
 *
 * Locates repo root and loads .env / .env.local deterministically.
 * Provides diagnostics and validation without logging secrets.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';
import { createLogger } from './logger.js';

const logger = createLogger('env');

export interface EnvKeyStatus {
  key: string;
  present: boolean;
  maskedValue?: string;
  length?: number;
  source?: string;
}

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  keys: EnvKeyStatus[];
  warnings: string[];
}

export interface EnvLoadResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, string>; // key -> '.env' | '.env.local'
}

export interface EnvLoadOptions {
  cwd?: string;
  envFile?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Find repository root by walking up from the start directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  for (;;) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath) && hasWorkspaces(packageJsonPath)) {
      return current;
    }

    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  // Nothing found: treat the start path as the root
  return resolve(startPath);
}

function hasWorkspaces(packageJsonPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg;
  } catch (error) {
    logger.debug({ event: 'env.package_json.unreadable', path: packageJsonPath, error: String(error) });
    return false;
  }
}

/**
 * Mask sensitive values for logging
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

/**
 * Check if value contains unprintable characters (common Windows CRLF issues)
 */
export function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

function hasQuotesOrWhitespace(value: string): boolean {
  return /^["'\s]|["'\s]$/.test(value);
}

function isSecretKey(key: string): boolean {
  return key.includes('TOKEN') || key.includes('SECRET') || key.includes('PASSWORD') || key.includes('KEY');
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

/**
 * Load .env then .env.local into `env`.
 *
 * Non-empty values already present in `env` are never replaced by an
 * empty value from a file; .env.local overrides .env.
 */
export function loadEnvFiles(options: EnvLoadOptions = {}): EnvLoadResult {
  const env = options.env ?? process.env;
  const repoRoot = findRepoRoot(options.cwd ?? process.cwd());
  const envFilePath = resolve(options.envFile || env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const existing: Record<string, string> = {};
  for (const key of Object.keys(env)) {
    const value = env[key];
    if (isPresent(value)) {
      existing[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  const loadFile = (path: string, label: string): boolean => {
    if (!existsSync(path)) {
      logger.debug({ event: 'env.file.missing', path }, `${label} file not found`);
      return false;
    }

    const result = config({ path, override: true, processEnv: env });
    if (result.error) {
      logger.warn({ event: 'env.file.error', path, error: result.error.message }, `Error loading ${label} file`);
      return false;
    }

    for (const [key, value] of Object.entries(result.parsed ?? {})) {
      if (isPresent(value)) {
        keySources[key] = label;
        if (!keysLoaded.includes(key)) {
          keysLoaded.push(key);
        }
      }
    }
    return true;
  };

  const loaded = loadFile(envFilePath, '.env');
  const localLoaded = loadFile(envLocalFilePath, '.env.local');

  // Restore values that a file blanked out
  for (const [key, value] of Object.entries(existing)) {
    if (!isPresent(env[key])) {
      env[key] = value;
    }
  }

  return { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded, keySources };
}

// Guard to ensure process.env is only loaded once
let cachedResult: EnvLoadResult | null = null;

/**
 * Initialize process.env from the repo's .env files.
 * Must be called before any code reads process.env; repeat calls return the first result.
 */
export function initEnv(envFileOverride?: string): EnvLoadResult {
  if (cachedResult) {
    return cachedResult;
  }

  cachedResult = loadEnvFiles({ envFile: envFileOverride });
  logger.debug(
    { event: 'env.init', envFilePath: cachedResult.envFilePath, keysLoaded: cachedResult.keysLoaded.length },
    'Environment initialized'
  );
  return cachedResult;
}

/**
 * Get environment diagnostics (safe for logging, no secrets)
 */
export function getEnvDiagnostics(
  keys: readonly string[],
  options: { env?: NodeJS.ProcessEnv; loadResult?: EnvLoadResult } = {}
): EnvDiagnostics {
  const env = options.env ?? process.env;
  const cwd = process.cwd();
  const loadResult = options.loadResult ?? cachedResult;
  const repoRoot = loadResult?.repoRoot ?? findRepoRoot(cwd);
  const envFilePath = loadResult?.envFilePath ?? resolve(env.ENV_FILE || join(repoRoot, '.env'));
  const envFileExists = existsSync(envFilePath);
  const keySources = loadResult?.keySources ?? {};

  const statuses = keys.map((key): EnvKeyStatus => {
    const value = env[key];
    if (!isPresent(value)) {
      return { key, present: false };
    }
    return {
      key,
      present: true,
      length: value.trim().length,
      maskedValue: isSecretKey(key) ? maskValue(value) : undefined,
      source: keySources[key],
    };
  });

  const warnings: string[] = [];
  if (!envFileExists) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }

  for (const key of keys) {
    const value = env[key];
    if (!value) continue;
    if (isSecretKey(key) && hasQuotesOrWhitespace(value)) {
      warnings.push(`${key} contains quotes or leading/trailing whitespace (may cause issues)`);
    }
    if (hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
  }

  return { cwd, repoRoot, envFilePath, envFileExists, keys: statuses, warnings };
}
