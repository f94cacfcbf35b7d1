/**
 * Core Identity Types
 *
 * Files in src/core/ MUST NOT import from src/http/ or src/config/.
 */

// ============================================================================
// Constants
// ============================================================================

/** Issuer stamped on every token this layer mints. */
export const TOKEN_ISSUER = 'bearer-identity';

export type TokenAlgorithm = 'HS256';

/** The only signing algorithm the layer accepts. */
export const TOKEN_ALGORITHM: TokenAlgorithm = 'HS256';

export const DEFAULT_KEY_ID = 'default';

export const ROLE_ADMIN = 'admin';
export const ROLE_USER = 'user';

// ============================================================================
// Claims
// ============================================================================

/**
 * The authenticated identity carried inside a token.
 *
 * Only built by the TokenManager, at issuance or from a verified signature,
 * and frozen once built. Timestamps are whole seconds since the epoch.
 */
export interface Claims {
  readonly subjectId: string;
  readonly displayName: string;
  readonly roles: readonly string[];
  readonly issuer: string;
  readonly issuedAt: number;
  readonly notBefore: number;
  readonly expiresAt: number;
  readonly tokenId: string;
  readonly keyId: string;
}

// ============================================================================
// Request Identity
// ============================================================================

/**
 * What downstream handlers see for one request after a successful
 * validation stage.
 */
export interface RequestIdentity {
  readonly subjectId: string;
  readonly displayName: string;
  readonly roles: readonly string[];
  readonly claims: Claims;
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * required: no valid token short-circuits with 401
 * optional: proceed anonymously when there is no valid token
 */
export type AuthMode = 'required' | 'optional';

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * Every entry carries a `source` naming the component that produced it
 * (e.g. 'token:manager', 'auth:pipeline').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry */
  source: string;

  /** Subject ID associated with the event (if known) */
  userId?: string;

  /** Event name, e.g. 'token:issue', 'auth:required', 'auth:role' */
  action: string;

  success: boolean;

  /** Machine-readable reason for the result */
  reason?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}

// ============================================================================
// Clock
// ============================================================================

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Whole seconds since the epoch, the resolution tokens carry. */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
