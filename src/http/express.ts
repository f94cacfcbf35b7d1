/**
 * Express adapter for the Auth Pipeline
 *
 * @example
 * ```typescript
 * const auth = createExpressAuth(layer.pipeline);
 *
 * app.get('/api/me', auth.requireAuth, (req, res) => {
 *   res.json(auth.getIdentity(req));
 * });
 * app.delete('/api/users/:id', auth.requireAuth, auth.requireRole('admin'), handler);
 * app.get('/api/feed', auth.optionalAuth, feedHandler);
 * app.use(identityErrorHandler());
 * ```
 */

import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import type { AuthExchange, AuthPipeline } from '../core/auth-pipeline.js';
import { IdentityContext, defaultIdentityContext } from '../core/identity-context.js';
import type { AuthMode, RequestIdentity } from '../core/types.js';
import { TOKEN_ISSUER } from '../core/types.js';
import { createErrorResponse, sanitizeError } from '../utils/errors.js';

export interface ExpressAuthOptions {
  /** Where identities are attached (default: the shared context) */
  identityContext?: IdentityContext;
}

export interface ExpressAuth {
  /** Reject with 401 unless a valid bearer token is present. */
  requireAuth: RequestHandler;

  /** Attach an identity when a valid token is present; never rejects. */
  optionalAuth: RequestHandler;

  /** Reject with 403 unless the attached identity has the role. */
  requireRole(role: string): RequestHandler;

  getIdentity(req: Request): RequestIdentity | undefined;
}

function toExchange(req: Request, res: Response, context: IdentityContext): AuthExchange {
  return {
    method: req.method,
    path: req.path,
    getHeader: (name) => req.headers[name.toLowerCase()],
    reject: (statusCode, body, headers) => {
      if (headers) {
        res.set(headers);
      }
      res.status(statusCode).json(body);
    },
    attachIdentity: (identity) => context.attach(req, identity),
    getIdentity: () => context.get(req),
  };
}

export function createExpressAuth(
  pipeline: AuthPipeline,
  options: ExpressAuthOptions = {}
): ExpressAuth {
  const context = options.identityContext ?? defaultIdentityContext;

  const validate =
    (mode: AuthMode): RequestHandler =>
    (req, res, next) => {
      pipeline
        .validate(toExchange(req, res, context), mode)
        .then((proceed) => {
          if (proceed) {
            next();
          }
        })
        .catch(next);
    };

  return {
    requireAuth: validate('required'),
    optionalAuth: validate('optional'),
    requireRole: (role) => (req, res, next) => {
      if (pipeline.authorizeExchange(toExchange(req, res, context), role)) {
        next();
      }
    },
    getIdentity: (req) => context.get(req),
  };
}

/**
 * Error middleware that keeps library and stack details off the wire.
 *
 * Identity errors thrown by handlers (e.g. IdentityContext.require()) become
 * the structured 401/403 body; everything else becomes a generic 500.
 */
export function identityErrorHandler(realm: string = TOKEN_ISSUER): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const { statusCode, body } = createErrorResponse(err);

    if (statusCode === 500) {
      console.error('[HTTP] Error:', sanitizeError(err));
    }
    if (statusCode === 401) {
      res.setHeader('WWW-Authenticate', `Bearer realm="${realm}"`);
    }

    res.status(statusCode).json(body);
  };
}
