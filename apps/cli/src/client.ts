/**
 * Build the storage client the CLI runs against.
 * Flags win over environment settings.
 */

import type { StorageSettings } from '@scoped-s3/config';
import {
  createProjectStorageClient,
  createS3CredentialStorageClient,
  type ProjectClientOptions,
  type ProjectStorageClient,
} from '@scoped-s3/storage';
import { UsageError, type GlobalOptions } from './args.js';

/** Transport settings the CLI leaves to the SDK; tests swap the handler */
export type TransportOverrides = Pick<ProjectClientOptions, 'requestHandler' | 'maxAttempts'>;

export function createCliClient(
  globals: GlobalOptions,
  settings: StorageSettings,
  transport: TransportOverrides = {}
): ProjectStorageClient {
  const url = globals.url ?? settings.url;
  const region = globals.region ?? settings.region;

  // Native credentials apply when given as flags, or from env when no API key flag was passed
  const nativeFlags = globals.accessKey !== undefined || globals.secretKey !== undefined;
  const nativeEnv =
    globals.apiKey === undefined && (settings.accessKeyId !== undefined || settings.secretAccessKey !== undefined);

  if (nativeFlags || nativeEnv) {
    const accessKeyId = nativeFlags ? globals.accessKey : settings.accessKeyId;
    const secretAccessKey = nativeFlags ? globals.secretKey : settings.secretAccessKey;
    if (!accessKeyId || !secretAccessKey) {
      throw new UsageError('--access-key and --secret-key must be given together');
    }
    return createS3CredentialStorageClient({ url, region, credentials: { accessKeyId, secretAccessKey }, ...transport });
  }

  const apiKey = globals.apiKey ?? settings.apiKey;
  if (!apiKey) {
    throw new UsageError('An API key is required: pass --api-key or set SCOPED_S3_API_KEY');
  }
  const projectId = globals.project ?? settings.projectId;
  if (projectId === undefined) {
    throw new UsageError('A project id is required: pass --project or set SCOPED_S3_PROJECT_ID');
  }

  return createProjectStorageClient({
    url,
    apiKey,
    projectId,
    organisationId: globals.org ?? settings.organisationId,
    region,
    ...transport,
  });
}
