/**
 * Token Manager - mints, verifies, refreshes and rotates signed bearer tokens
 *
 * Responsibilities:
 * - HS256 signing with the active key, `kid` in the protected header
 * - Signature, algorithm and registered-claim (iss, nbf, exp) validation
 * - Refresh (re-mint from a valid token) and hot key rotation
 *
 * NOT responsible for:
 * - Reading tokens from requests (handled by AuthPipeline)
 * - Revocation: every check is stateless given (token, keyring, clock)
 */

import { randomBytes } from 'crypto';
import { SignJWT, base64url, compactVerify, decodeProtectedHeader, errors } from 'jose';
import { z } from 'zod';
import type { TokenPayload } from '../types/index.js';
import { IdentityError, IdentityErrors } from '../utils/errors.js';
import { AuditService } from './audit-service.js';
import {
  SigningContext,
  selectVerificationKey,
  type SigningContextOptions,
  type SigningKeyring,
} from './signing-context.js';
import {
  TOKEN_ISSUER,
  systemClock,
  toEpochSeconds,
  type Claims,
  type Clock,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface TokenManagerOptions extends SigningContextOptions {
  /** Seconds of skew allowed on both nbf and exp (default: 0) */
  clockTolerance?: number;

  /** Audit sink (default: disabled AuditService) */
  auditService?: AuditService;
}

export interface IssuedToken {
  token: string;
  claims: Claims;
}

const AUDIT_SOURCE = 'token:manager';

const TokenPayloadSchema = z.object({
  user_id: z.string().min(1),
  username: z.string(),
  roles: z.array(z.string()),
  iss: z.string(),
  sub: z.string(),
  iat: z.number().int(),
  nbf: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

const decoder = new TextDecoder();

// ============================================================================
// Token Manager
// ============================================================================

export class TokenManager {
  private readonly signingContext: SigningContext;
  private readonly clock: Clock;
  private readonly clockTolerance: number;
  private readonly auditService: AuditService;

  /**
   * @param secret - Initial signing secret
   * @throws {ConfigurationError} If the secret is empty
   */
  constructor(secret: string, options: TokenManagerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.signingContext = new SigningContext(secret, { ...options, clock: this.clock });
    this.clockTolerance = options.clockTolerance ?? 0;
    this.auditService = options.auditService ?? new AuditService();
  }

  getActiveKeyId(): string {
    return this.signingContext.getActiveKeyId();
  }

  getAlgorithm(): string {
    return this.signingContext.snapshot().algorithm;
  }

  getRetainedKeyIds(): string[] {
    return this.signingContext.getRetainedKeyIds();
  }

  /**
   * Issue a signed token for an already-resolved principal.
   *
   * A non-positive ttl is accepted and yields a token that is already
   * expired.
   *
   * @param ttlSeconds - Lifetime in seconds
   * @throws {SigningError} If the signature cannot be computed
   */
  async issueToken(
    subjectId: string,
    displayName: string,
    roles: readonly string[],
    ttlSeconds: number
  ): Promise<string> {
    const { token } = await this.issueTokenWithClaims(subjectId, displayName, roles, ttlSeconds);
    return token;
  }

  /**
   * Same as issueToken(), also returning the claims that were signed.
   */
  async issueTokenWithClaims(
    subjectId: string,
    displayName: string,
    roles: readonly string[],
    ttlSeconds: number
  ): Promise<IssuedToken> {
    this.assertIssueArguments(subjectId, displayName, roles, ttlSeconds);

    const keyring = this.signingContext.snapshot();
    const now = toEpochSeconds(this.clock.now());

    const claims: Claims = Object.freeze({
      subjectId,
      displayName,
      roles: Object.freeze([...roles]),
      issuer: TOKEN_ISSUER,
      issuedAt: now,
      notBefore: now,
      expiresAt: now + Math.trunc(ttlSeconds),
      tokenId: createTokenId(now),
      keyId: keyring.active.keyId,
    });

    const token = await this.sign(claims, keyring);

    this.auditService.record({
      source: AUDIT_SOURCE,
      userId: subjectId,
      action: 'token:issue',
      success: true,
      metadata: { tokenId: claims.tokenId, keyId: claims.keyId, expiresAt: claims.expiresAt },
    });

    return { token, claims };
  }

  /**
   * Verify a token against the current keyring and return its claims.
   *
   * @throws {AuthenticationError} MALFORMED_TOKEN, ALGORITHM_MISMATCH,
   *   INVALID_SIGNATURE, TOKEN_EXPIRED, TOKEN_NOT_YET_VALID or INVALID_CLAIMS
   */
  async validateToken(token: string): Promise<Claims> {
    try {
      const claims = await this.verify(token, this.signingContext.snapshot());

      this.auditService.record({
        source: AUDIT_SOURCE,
        userId: claims.subjectId,
        action: 'token:validate',
        success: true,
        metadata: { tokenId: claims.tokenId, keyId: claims.keyId },
      });

      return claims;
    } catch (error) {
      if (error instanceof IdentityError) {
        this.auditService.record({
          source: AUDIT_SOURCE,
          action: 'token:validate',
          success: false,
          reason: error.code,
        });
      }
      throw error;
    }
  }

  /**
   * Re-mint a valid token with a new lifetime. The new token has a new
   * token ID, the active key ID and a fresh issuedAt.
   *
   * @throws {AuthenticationError} Whatever validateToken() throws; an invalid
   *   token is never refreshed
   */
  async refreshToken(token: string, ttlSeconds: number): Promise<string> {
    const claims = await this.validateToken(token);
    const refreshed = await this.issueTokenWithClaims(
      claims.subjectId,
      claims.displayName,
      claims.roles,
      ttlSeconds
    );

    this.auditService.record({
      source: AUDIT_SOURCE,
      userId: claims.subjectId,
      action: 'token:refresh',
      success: true,
      metadata: { previousTokenId: claims.tokenId, tokenId: refreshed.claims.tokenId },
    });

    return refreshed.token;
  }

  /**
   * Swap in a new signing secret for every later issue/validate call.
   *
   * @param keyId - Defaults to a fingerprint of the secret
   * @returns The new active key ID
   * @throws {ConfigurationError} If the secret is empty; the previous key
   *   stays active
   */
  rotateSigningKey(newSecret: string, keyId?: string): string {
    try {
      const keyring = this.signingContext.rotate(newSecret, keyId);

      console.log(
        `[TokenManager] Signing key rotated (kid: ${keyring.active.keyId}, retained: ${keyring.retired.length})`
      );
      this.auditService.record({
        source: AUDIT_SOURCE,
        userId: 'system',
        action: 'key:rotate',
        success: true,
        metadata: { keyId: keyring.active.keyId, algorithm: keyring.algorithm },
      });

      return keyring.active.keyId;
    } catch (error) {
      this.auditService.record({
        source: AUDIT_SOURCE,
        userId: 'system',
        action: 'key:rotate',
        success: false,
        reason: error instanceof IdentityError ? error.code : 'UNKNOWN',
      });
      throw error;
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async sign(claims: Claims, keyring: SigningKeyring): Promise<string> {
    const payload: TokenPayload = {
      user_id: claims.subjectId,
      username: claims.displayName,
      roles: [...claims.roles],
      iss: claims.issuer,
      sub: claims.subjectId,
      iat: claims.issuedAt,
      nbf: claims.notBefore,
      exp: claims.expiresAt,
      jti: claims.tokenId,
    };

    try {
      return await new SignJWT(payload)
        .setProtectedHeader({ alg: keyring.algorithm, typ: 'JWT', kid: keyring.active.keyId })
        .sign(keyring.active.secret);
    } catch (error) {
      console.error('[TokenManager] Failed to sign token:', error);
      throw IdentityErrors.SIGNING_FAILED({
        originalError: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  private async verify(token: string, keyring: SigningKeyring): Promise<Claims> {
    let headerKeyId: string | undefined;
    try {
      const { kid } = decodeProtectedHeader(token);
      headerKeyId = typeof kid === 'string' ? kid : undefined;
    } catch (error) {
      throw IdentityErrors.MALFORMED_TOKEN({ originalError: describeError(error) });
    }

    const selection = selectVerificationKey(keyring, headerKeyId);
    if (selection.keyIdMismatch) {
      // Not a failure: the token may predate a rotation
      console.warn(
        `[TokenManager] Key ID mismatch (token kid: ${headerKeyId ?? 'none'}, active: ${keyring.active.keyId})`
      );
      this.auditService.record({
        source: AUDIT_SOURCE,
        action: 'token:kid_mismatch',
        success: true,
        metadata: { tokenKeyId: headerKeyId, activeKeyId: keyring.active.keyId },
      });
    }

    let rawPayload: Uint8Array;
    try {
      const result = await compactVerify(token, selection.key.secret, {
        algorithms: [keyring.algorithm],
      });
      rawPayload = result.payload;
    } catch (error) {
      throw mapJoseError(error);
    }

    // The decoder ignores the unused low bits of the last character
    if (!isCanonicalSegment(token.slice(token.lastIndexOf('.') + 1))) {
      throw IdentityErrors.INVALID_SIGNATURE({ originalError: 'non-canonical signature encoding' });
    }

    const payload = parsePayload(rawPayload);

    if (payload.iss !== TOKEN_ISSUER) {
      throw IdentityErrors.INVALID_CLAIMS({ claim: 'iss' });
    }
    if (payload.sub !== payload.user_id) {
      throw IdentityErrors.INVALID_CLAIMS({ claim: 'sub' });
    }

    const now = toEpochSeconds(this.clock.now());
    if (now > payload.exp + this.clockTolerance) {
      throw IdentityErrors.TOKEN_EXPIRED({ exp: payload.exp, now });
    }
    if (now < payload.nbf - this.clockTolerance) {
      throw IdentityErrors.TOKEN_NOT_YET_VALID({ nbf: payload.nbf, now });
    }

    return Object.freeze({
      subjectId: payload.user_id,
      displayName: payload.username,
      roles: Object.freeze([...payload.roles]),
      issuer: payload.iss,
      issuedAt: payload.iat,
      notBefore: payload.nbf,
      expiresAt: payload.exp,
      tokenId: payload.jti,
      keyId: headerKeyId ?? selection.key.keyId,
    });
  }

  private assertIssueArguments(
    subjectId: string,
    displayName: string,
    roles: readonly string[],
    ttlSeconds: number
  ): void {
    if (typeof subjectId !== 'string' || subjectId.length === 0) {
      throw IdentityErrors.INVALID_ARGUMENT('subjectId must be a non-empty string');
    }
    if (typeof displayName !== 'string') {
      throw IdentityErrors.INVALID_ARGUMENT('displayName must be a string');
    }
    if (!Array.isArray(roles) || roles.some((role) => typeof role !== 'string')) {
      throw IdentityErrors.INVALID_ARGUMENT('roles must be an array of strings');
    }
    if (!Number.isFinite(ttlSeconds)) {
      throw IdentityErrors.INVALID_ARGUMENT('ttl must be a finite number of seconds');
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Token ID: issuance second plus 64 random bits, so two tokens minted in
 * the same second never share an ID.
 */
export function createTokenId(issuedAt: number): string {
  return `jwt-${issuedAt}-${randomBytes(8).toString('hex')}`;
}

/** Only called on a segment the verifier has already decoded. */
function isCanonicalSegment(segment: string): boolean {
  return base64url.encode(base64url.decode(segment)) === segment;
}

function parsePayload(raw: Uint8Array): TokenPayload {
  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(raw));
  } catch (error) {
    throw IdentityErrors.MALFORMED_TOKEN({ originalError: describeError(error) });
  }

  const parsed = TokenPayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw IdentityErrors.INVALID_CLAIMS({
      issues: parsed.error.issues.map((issue) => issue.path.join('.')),
    });
  }
  return parsed.data;
}

function mapJoseError(error: unknown): IdentityError {
  const details = { originalError: describeError(error) };

  if (error instanceof errors.JOSEAlgNotAllowed) {
    return IdentityErrors.ALGORITHM_MISMATCH(details);
  }
  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return IdentityErrors.INVALID_SIGNATURE(details);
  }
  return IdentityErrors.MALFORMED_TOKEN(details);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
