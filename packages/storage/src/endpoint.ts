/**
 * Endpoint resolution
 *
 * The client always talks to the exact configured URL with path-style
 * addressing (bucket in the path, never in the hostname).
 */

import type { S3ClientConfig } from '@aws-sdk/client-s3';
import { ConfigurationError } from './errors.js';

export const DEFAULT_REGION = 'us-east-1';

export interface ResolvedEndpoint {
  /** Normalized URL handed to the SDK (no trailing slash) */
  url: string;
  protocol: 'http:' | 'https:';
  host: string;
  /** Path the endpoint is mounted under, '' for the root */
  basePath: string;
}

/**
 * Parse and validate an endpoint URL
 * @throws ConfigurationError if the URL is empty, unparsable or not http(s)
 */
export function resolveEndpoint(url: string): ResolvedEndpoint {
  const raw = url.trim();
  if (raw.length === 0) {
    throw new ConfigurationError('Endpoint URL is required but is empty or missing');
  }

  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch (error) {
    throw new ConfigurationError(`Endpoint URL is not a valid URL: ${raw.substring(0, 50)}`, { cause: error });
  }

  const protocol = parsed.protocol;
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ConfigurationError(`Endpoint URL must start with http:// or https://. Got: ${protocol}`);
  }
  if (!parsed.hostname) {
    throw new ConfigurationError(`Endpoint URL has no hostname: ${raw.substring(0, 50)}`);
  }
  if (parsed.search || parsed.hash) {
    throw new ConfigurationError('Endpoint URL must not contain a query string or fragment');
  }

  const basePath = parsed.pathname.replace(/\/+$/, '');

  return {
    url: `${protocol}//${parsed.host}${basePath}`,
    protocol,
    host: parsed.host,
    basePath,
  };
}

/**
 * S3Client settings that pin every request to the endpoint
 */
export function endpointClientConfig(
  endpoint: ResolvedEndpoint,
  region: string = DEFAULT_REGION
): Pick<S3ClientConfig, 'endpoint' | 'forcePathStyle' | 'region'> {
  return {
    endpoint: endpoint.url,
    forcePathStyle: true,
    region,
  };
}
