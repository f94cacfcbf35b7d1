/**
 * Auth Pipeline - bearer extraction, validation, enrichment and role gate
 *
 * Written once against AuthExchange, the small request/response capability
 * every adapter provides (read a header, write a status and JSON body,
 * attach and read the request identity). The Express and node:http
 * adapters only translate their request objects into an exchange.
 *
 * Per request: Start -> TokenExtracted{present|absent|malformed} ->
 * Validated{ok|rejected} -> (required: Allowed|ShortCircuited,
 * optional: Allowed with or without identity) -> RoleChecked -> done.
 * Nothing is carried between requests.
 */

import type { HeaderValue, RequestHeaders } from '../types/index.js';
import {
  AuthenticationError,
  AuthorizationError,
  IdentityErrors,
  createErrorResponse,
  type ErrorBody,
} from '../utils/errors.js';
import { AuditService } from './audit-service.js';
import { createRequestIdentity } from './identity-context.js';
import type { TokenManager } from './token-manager.js';
import { TOKEN_ISSUER, type AuthMode, type RequestIdentity } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What the pipeline needs from a framework to process one request.
 */
export interface AuthExchange {
  readonly method?: string;
  readonly path?: string;

  getHeader(name: string): HeaderValue;

  /** Write the rejection and end the request. */
  reject(statusCode: number, body: ErrorBody, headers?: Record<string, string>): void;

  attachIdentity(identity: RequestIdentity): void;

  getIdentity(): RequestIdentity | undefined;
}

export type TokenValidator = Pick<TokenManager, 'validateToken'>;

export type TokenExtraction =
  | { status: 'present'; token: string }
  | { status: 'absent' }
  | { status: 'malformed' };

export type AuthenticationOutcome =
  | { outcome: 'authenticated'; identity: RequestIdentity }
  | { outcome: 'anonymous'; reason: AuthenticationError }
  | { outcome: 'rejected'; error: AuthenticationError };

export type AuthorizationOutcome =
  | { allowed: true }
  | { allowed: false; error: AuthorizationError };

export interface RequestInfo {
  method?: string;
  path?: string;
}

export interface AuthPipelineOptions {
  /** Audit sink (default: disabled AuditService) */
  auditService?: AuditService;

  /** Realm advertised in WWW-Authenticate on 401 (default: 'bearer-identity') */
  realm?: string;
}

const AUDIT_SOURCE = 'auth:pipeline';
const BEARER_PREFIX = 'Bearer ';

// ============================================================================
// Extraction
// ============================================================================

/**
 * Read the Authorization header. Node lower-cases header names, plain
 * objects built by hand may not.
 */
export function readAuthorizationHeader(headers: RequestHeaders): string | undefined {
  const value = headers['authorization'] ?? headers['Authorization'];
  const first = Array.isArray(value) ? value[0] : value;
  return first === undefined || first === '' ? undefined : first;
}

/**
 * Classify an Authorization header value.
 *
 * Requires the literal, case-sensitive "Bearer " prefix; the remainder is
 * trimmed and must not be empty.
 *
 * @example
 * classifyAuthorizationHeader('Bearer abc.def.ghi') // { status: 'present', token: 'abc.def.ghi' }
 * classifyAuthorizationHeader('bearer abc')         // { status: 'malformed' }
 */
export function classifyAuthorizationHeader(header: string | undefined): TokenExtraction {
  if (header === undefined || header === '') {
    return { status: 'absent' };
  }
  if (!header.startsWith(BEARER_PREFIX)) {
    return { status: 'malformed' };
  }

  const token = header.slice(BEARER_PREFIX.length).trim();
  if (token.length === 0) {
    return { status: 'malformed' };
  }
  return { status: 'present', token };
}

/**
 * Bearer token from a header value, or undefined when there is none.
 */
export function extractBearerToken(header: HeaderValue): string | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  const extraction = classifyAuthorizationHeader(value);
  return extraction.status === 'present' ? extraction.token : undefined;
}

/**
 * Exact, case-sensitive membership. Duplicates are harmless.
 */
export function hasRole(roles: readonly string[], requiredRole: string): boolean {
  return roles.includes(requiredRole);
}

// ============================================================================
// Pipeline
// ============================================================================

export class AuthPipeline {
  private readonly auditService: AuditService;
  private readonly realm: string;

  constructor(
    private readonly tokenManager: TokenValidator,
    options: AuthPipelineOptions = {}
  ) {
    this.auditService = options.auditService ?? new AuditService();
    this.realm = options.realm ?? TOKEN_ISSUER;
  }

  getRealm(): string {
    return this.realm;
  }

  /**
   * Extract and validate a bearer token.
   *
   * Authentication failures never escape as exceptions: required mode turns
   * them into `rejected`, optional mode into `anonymous`. Anything else the
   * token manager throws propagates.
   */
  async authenticate(
    headers: RequestHeaders,
    mode: AuthMode,
    request: RequestInfo = {}
  ): Promise<AuthenticationOutcome> {
    const extraction = classifyAuthorizationHeader(readAuthorizationHeader(headers));

    let failure: AuthenticationError;
    if (extraction.status === 'present') {
      try {
        const claims = await this.tokenManager.validateToken(extraction.token);
        const identity = createRequestIdentity(claims);
        this.recordSuccess(identity, mode, request);
        return { outcome: 'authenticated', identity };
      } catch (error) {
        if (!(error instanceof AuthenticationError)) {
          throw error;
        }
        failure = error;
      }
    } else if (extraction.status === 'absent') {
      failure = IdentityErrors.MISSING_CREDENTIALS();
    } else {
      failure = IdentityErrors.MALFORMED_HEADER();
    }

    this.recordFailure(failure, mode, request);

    if (mode === 'optional') {
      return { outcome: 'anonymous', reason: failure };
    }
    return { outcome: 'rejected', error: failure };
  }

  /**
   * Role gate. Needs an identity from an earlier validation stage.
   */
  authorize(
    identity: RequestIdentity | undefined,
    requiredRole: string,
    request: RequestInfo = {}
  ): AuthorizationOutcome {
    let error: AuthorizationError | undefined;

    if (!identity) {
      error = IdentityErrors.NO_ROLES_IN_CONTEXT();
    } else if (!hasRole(identity.roles, requiredRole)) {
      error = IdentityErrors.INSUFFICIENT_PERMISSIONS(requiredRole);
    }

    this.auditService.record({
      source: AUDIT_SOURCE,
      userId: identity?.subjectId,
      action: 'auth:role',
      success: error === undefined,
      reason: error?.code,
      metadata: { requiredRole, ...request },
    });

    if (error) {
      console.warn('[AuthPipeline] Role check failed:', {
        reason: error.code,
        userId: identity?.subjectId,
        requiredRole,
        path: request.path,
      });
      return { allowed: false, error };
    }
    return { allowed: true };
  }

  // ==========================================================================
  // Exchange-level stages (used by adapters)
  // ==========================================================================

  /**
   * Run the validate + enrich stages on an exchange.
   *
   * An exchange that already carries an identity from an earlier stage
   * keeps it and continues; the identity is write-once.
   *
   * @returns True when the chain should continue; false when the exchange
   *   has been rejected
   */
  async validate(exchange: AuthExchange, mode: AuthMode): Promise<boolean> {
    if (exchange.getIdentity()) {
      return true;
    }

    const request = { method: exchange.method, path: exchange.path };
    const result = await this.authenticate(
      { authorization: exchange.getHeader('authorization') },
      mode,
      request
    );

    switch (result.outcome) {
      case 'authenticated':
        if (!exchange.getIdentity()) {
          exchange.attachIdentity(result.identity);
        }
        return true;
      case 'anonymous':
        return true;
      case 'rejected':
        this.reject(exchange, result.error);
        return false;
    }
  }

  /**
   * Run the role gate on an exchange.
   *
   * @returns True when the chain should continue
   */
  authorizeExchange(exchange: AuthExchange, requiredRole: string): boolean {
    const result = this.authorize(exchange.getIdentity(), requiredRole, {
      method: exchange.method,
      path: exchange.path,
    });

    if (!result.allowed) {
      this.reject(exchange, result.error);
      return false;
    }
    return true;
  }

  /**
   * Write an authentication or authorization rejection.
   */
  reject(exchange: AuthExchange, error: AuthenticationError | AuthorizationError): void {
    const { statusCode, body } = createErrorResponse(error);
    const headers =
      statusCode === 401 ? { 'WWW-Authenticate': `Bearer realm="${this.realm}"` } : undefined;
    exchange.reject(statusCode, body, headers);
  }

  // ==========================================================================
  // Observability
  // ==========================================================================

  private recordSuccess(identity: RequestIdentity, mode: AuthMode, request: RequestInfo): void {
    if (mode === 'required') {
      console.log('[AuthPipeline] User authenticated', {
        userId: identity.subjectId,
        username: identity.displayName,
        path: request.path,
        method: request.method,
      });
    }

    this.auditService.record({
      source: AUDIT_SOURCE,
      userId: identity.subjectId,
      action: `auth:${mode}`,
      success: true,
      metadata: { ...request, tokenId: identity.claims.tokenId },
    });
  }

  private recordFailure(failure: AuthenticationError, mode: AuthMode, request: RequestInfo): void {
    // A request without any credentials is routine in optional mode
    if (mode === 'required' || failure.code !== 'MISSING_CREDENTIALS') {
      console.warn(`[AuthPipeline] ${mode === 'required' ? 'Rejected' : 'Ignored'} token:`, {
        reason: failure.code,
        path: request.path,
        method: request.method,
      });
    }

    this.auditService.record({
      source: AUDIT_SOURCE,
      action: `auth:${mode}`,
      success: false,
      reason: failure.code,
      metadata: { ...request },
    });
  }
}
