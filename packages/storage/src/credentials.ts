/**
 * Credential adapters
 *
 * The project gateway authenticates with an API key header instead of
 * SigV4, so the SDK gets a fixed identity and a signer that leaves the
 * request untouched. Nothing here falls back to the default provider chain.
 */

import type { AwsCredentialIdentity, AwsCredentialIdentityProvider, RequestSigner } from '@smithy/types';
import { ConfigurationError } from './errors.js';
import type { S3Credentials } from './types.js';

// Control characters cannot travel in an HTTP header value
const CONTROL_CHARS = /[\x00-\x1F\x7F]/;

export interface ApiKeyCredentials {
  apiKey: string;
  provider: AwsCredentialIdentityProvider;
}

/** The key is sent exactly as given; it is checked, never rewritten. */
export function validateApiKey(apiKey: string): string {
  if (apiKey.trim().length === 0) {
    throw new ConfigurationError('API key is required but is empty or missing');
  }
  if (apiKey !== apiKey.trim()) {
    throw new ConfigurationError('API key must not have leading or trailing whitespace');
  }
  if (CONTROL_CHARS.test(apiKey)) {
    throw new ConfigurationError('API key contains control characters');
  }
  return apiKey;
}

/**
 * Wrap an API key as a static credential identity.
 */
export function createApiKeyCredentials(apiKey: string): ApiKeyCredentials {
  const key = validateApiKey(apiKey);
  const identity: AwsCredentialIdentity = Object.freeze({ accessKeyId: key, secretAccessKey: '' });

  return {
    apiKey: key,
    provider: async () => identity,
  };
}

/**
 * Static native S3 credentials, for backends reached without the project gateway
 */
export function createStaticCredentials(credentials: S3Credentials): AwsCredentialIdentityProvider {
  if (!credentials.accessKeyId.trim() || !credentials.secretAccessKey.trim()) {
    throw new ConfigurationError('S3 credentials require both an access key id and a secret access key');
  }

  const identity: AwsCredentialIdentity = Object.freeze({
    accessKeyId: credentials.accessKeyId,
    secretAccessKey: credentials.secretAccessKey,
    sessionToken: credentials.sessionToken,
    expiration: credentials.expiration,
  });

  return async () => identity;
}

/**
 * Signer that returns the request as-is; the API key header set by the
 * project routing middleware is the only authentication.
 */
export const passThroughSigner: RequestSigner = {
  sign: async (request) => request,
};
