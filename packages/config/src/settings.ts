/**
 * Typed storage settings read from the environment
 */

import { z } from 'zod';

export const STORAGE_ENV_KEYS = [
  'SCOPED_S3_URL',
  'SCOPED_S3_API_KEY',
  'SCOPED_S3_PROJECT_ID',
  'SCOPED_S3_ORG_ID',
  'SCOPED_S3_REGION',
  'SCOPED_S3_ACCESS_KEY_ID',
  'SCOPED_S3_SECRET_ACCESS_KEY',
  'LOG_LEVEL',
] as const;

export const DEFAULT_ENDPOINT_URL = 'http://localhost:9000';

// Empty strings in .env files mean "unset"
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const optionalInt = (label: string, min: number) =>
  optionalString.pipe(
    z.coerce
      .number({ invalid_type_error: `${label} must be a number` })
      .int(`${label} must be an integer`)
      .min(min, `${label} must be >= ${min}`)
      .optional()
  );

const StorageEnvSchema = z.object({
  SCOPED_S3_URL: optionalString,
  SCOPED_S3_API_KEY: optionalString,
  SCOPED_S3_PROJECT_ID: optionalInt('SCOPED_S3_PROJECT_ID', 1),
  SCOPED_S3_ORG_ID: optionalInt('SCOPED_S3_ORG_ID', 0),
  SCOPED_S3_REGION: optionalString,
  SCOPED_S3_ACCESS_KEY_ID: optionalString,
  SCOPED_S3_SECRET_ACCESS_KEY: optionalString,
});

export interface StorageSettings {
  url: string;
  apiKey?: string;
  projectId?: number;
  organisationId: number;
  region?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

/**
 * Read storage settings from env vars
 * @throws Error listing every invalid variable
 */
export function loadStorageSettings(env: NodeJS.ProcessEnv = process.env): StorageSettings {
  const result = StorageEnvSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid storage environment: ${details.join('; ')}`);
  }

  const parsed = result.data;
  return {
    url: parsed.SCOPED_S3_URL ?? DEFAULT_ENDPOINT_URL,
    apiKey: parsed.SCOPED_S3_API_KEY,
    projectId: parsed.SCOPED_S3_PROJECT_ID,
    organisationId: parsed.SCOPED_S3_ORG_ID ?? 0,
    region: parsed.SCOPED_S3_REGION,
    accessKeyId: parsed.SCOPED_S3_ACCESS_KEY_ID,
    secretAccessKey: parsed.SCOPED_S3_SECRET_ACCESS_KEY,
  };
}
