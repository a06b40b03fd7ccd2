/**
 * Project routing middleware
 *
 * The gateway exposes each project's S3 API under
 *   <base>/api/v1/organisations/<org>/projects/<project>/s3/<bucket>/<key>
 * and authenticates it with an `x-api-key` header. The SDK builds plain
 * path-style requests; this build-step middleware moves them under the
 * project prefix and attaches the key.
 */

import { HttpRequest } from '@smithy/protocol-http';
import type { BuildMiddleware, Pluggable } from '@smithy/types';
import { createLogger } from '@scoped-s3/config';
import type { ProjectScope } from './types.js';

const logger = createLogger('storage.routing');

export const API_KEY_HEADER = 'x-api-key';
export const PROJECT_ROUTING_MIDDLEWARE = 'projectRoutingMiddleware';

export interface ProjectRoute extends ProjectScope {
  apiKey: string;
  /** Endpoint mount path, '' for the root */
  basePath: string;
}

export function projectPathPrefix(scope: ProjectScope): string {
  return `/api/v1/organisations/${scope.organisationId}/projects/${scope.projectId}/s3`;
}

/**
 * Insert the project prefix between the endpoint base path and the S3 path
 */
export function projectPath(route: ProjectRoute, path: string): string {
  const { basePath } = route;
  const underBase = basePath === '' || path === basePath || path.startsWith(`${basePath}/`);
  let rest = underBase ? path.slice(basePath.length) : path;

  const prefix = `${basePath}${projectPathPrefix(route)}`;

  // List-buckets style requests address the project root itself
  if (rest === '' || rest === '/') {
    return prefix;
  }
  if (!rest.startsWith('/')) {
    rest = `/${rest}`;
  }
  return `${prefix}${rest}`;
}

export function projectRoutingMiddleware<Input extends object, Output extends object>(
  route: ProjectRoute
): BuildMiddleware<Input, Output> {
  return (next) => async (args) => {
    if (HttpRequest.isInstance(args.request)) {
      const original = args.request.path;
      args.request.headers[API_KEY_HEADER] = route.apiKey;
      args.request.path = projectPath(route, original);
      logger.debug({ event: 'storage.routing.rewrite', from: original, to: args.request.path });
    }
    return next(args);
  };
}

export function getProjectRoutingPlugin<Input extends object, Output extends object>(
  route: ProjectRoute
): Pluggable<Input, Output> {
  return {
    applyToStack: (stack) => {
      stack.add(projectRoutingMiddleware<Input, Output>(route), {
        step: 'build',
        name: PROJECT_ROUTING_MIDDLEWARE,
        override: true,
      });
    },
  };
}
