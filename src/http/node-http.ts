/**
 * node:http adapter for the Auth Pipeline
 *
 * Wraps plain `(req, res)` handlers:
 * ```typescript
 * const auth = createNodeAuth(layer.pipeline);
 * const server = createServer(
 *   auth.withRequiredAuth(auth.withRole('admin', (req, res) => {
 *     res.end(JSON.stringify(auth.getIdentity(req)));
 *   }))
 * );
 * ```
 */

import type { IncomingMessage, ServerResponse } from 'http';
import type { AuthExchange, AuthPipeline } from '../core/auth-pipeline.js';
import { IdentityContext, defaultIdentityContext } from '../core/identity-context.js';
import type { AuthMode, RequestIdentity } from '../core/types.js';
import { createErrorResponse, sanitizeError, type ErrorBody } from '../utils/errors.js';

export type NodeHandler = (req: IncomingMessage, res: ServerResponse) => void | Promise<void>;

export interface NodeAuthOptions {
  /** Where identities are attached (default: the shared context) */
  identityContext?: IdentityContext;
}

export interface NodeAuth {
  withRequiredAuth(handler: NodeHandler): NodeHandler;
  withOptionalAuth(handler: NodeHandler): NodeHandler;
  withRole(role: string, handler: NodeHandler): NodeHandler;
  getIdentity(req: IncomingMessage): RequestIdentity | undefined;
}

function writeJson(
  res: ServerResponse,
  statusCode: number,
  body: ErrorBody,
  headers: Record<string, string> = {}
): void {
  res.writeHead(statusCode, { ...headers, 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function requestPath(req: IncomingMessage): string {
  return new URL(req.url ?? '/', 'http://localhost').pathname;
}

function toExchange(req: IncomingMessage, res: ServerResponse, context: IdentityContext): AuthExchange {
  return {
    method: req.method,
    path: requestPath(req),
    getHeader: (name) => req.headers[name.toLowerCase()],
    reject: (statusCode, body, headers) => writeJson(res, statusCode, body, headers),
    attachIdentity: (identity) => context.attach(req, identity),
    getIdentity: () => context.get(req),
  };
}

/**
 * Run a handler, turning anything it throws into a structured response.
 */
function guard(handler: NodeHandler, realm: string): NodeHandler {
  return (req, res) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch((error: unknown) => {
        const { statusCode, body } = createErrorResponse(error);
        if (statusCode === 500) {
          console.error('[HTTP] Error:', sanitizeError(error));
        }
        if (!res.headersSent) {
          const headers: Record<string, string> =
            statusCode === 401 ? { 'WWW-Authenticate': `Bearer realm="${realm}"` } : {};
          writeJson(res, statusCode, body, headers);
        } else {
          res.end();
        }
      });
  };
}

export function createNodeAuth(pipeline: AuthPipeline, options: NodeAuthOptions = {}): NodeAuth {
  const context = options.identityContext ?? defaultIdentityContext;
  const realm = pipeline.getRealm();

  const withMode = (mode: AuthMode, handler: NodeHandler): NodeHandler =>
    guard(async (req, res) => {
      if (await pipeline.validate(toExchange(req, res, context), mode)) {
        await handler(req, res);
      }
    }, realm);

  return {
    withRequiredAuth: (handler) => withMode('required', handler),
    withOptionalAuth: (handler) => withMode('optional', handler),
    withRole: (role, handler) =>
      guard(async (req, res) => {
        if (pipeline.authorizeExchange(toExchange(req, res, context), role)) {
          await handler(req, res);
        }
      }, realm),
    getIdentity: (req) => context.get(req),
  };
}
