/**
 * Project-scoped client for S3-compatible object storage
 */

export * from './client.js';
export * from './credentials.js';
export * from './endpoint.js';
export * from './errors.js';
export * from './project-routing.js';
export * from './transfer.js';
export type * from './types.js';
