/**
 * Signing Context - process-wide signing key state
 *
 * The active key, and any retired keys still accepted for verification,
 * live in one frozen SigningKeyring. Rotation builds a new keyring and
 * swaps the reference in a single assignment, so an operation that took a
 * snapshot keeps seeing one whole keyring until it finishes.
 */

import { createHash } from 'crypto';
import { IdentityErrors } from '../utils/errors.js';
import { DEFAULT_KEY_ID, TOKEN_ALGORITHM, type Clock, type TokenAlgorithm, systemClock } from './types.js';

export interface SigningKey {
  readonly keyId: string;
  readonly secret: Uint8Array;
  readonly activatedAt: Date;
}

export interface SigningKeyring {
  readonly algorithm: TokenAlgorithm;
  readonly active: SigningKey;
  /** Previously active keys, newest first. Verify-only. */
  readonly retired: readonly SigningKey[];
}

export interface SigningContextOptions {
  /** Key ID for the initial secret (default: 'default') */
  keyId?: string;

  /**
   * How many previous keys stay valid for verification after a rotation.
   * 0 means tokens signed before a rotation stop verifying immediately.
   */
  retainedKeys?: number;

  clock?: Clock;
}

/** Result of picking a verification key for a token's `kid` header. */
export interface KeySelection {
  key: SigningKey;
  /** True when the token named a key other than the active one (or none). */
  keyIdMismatch: boolean;
}

export const MAX_RETAINED_KEYS = 5;

const encoder = new TextEncoder();

/**
 * Derive a stable key ID from a secret: `hs-` plus the first 16 hex chars
 * of its SHA-256.
 */
export function fingerprintSecret(secret: string): string {
  return `hs-${createHash('sha256').update(secret, 'utf8').digest('hex').slice(0, 16)}`;
}

function assertSecret(secret: unknown, operation: string): asserts secret is string {
  if (typeof secret !== 'string' || secret.trim().length === 0) {
    throw IdentityErrors.CONFIGURATION_ERROR(`signing secret is empty (${operation})`);
  }
}

export class SigningContext {
  private keyring: SigningKeyring;
  private readonly retainedKeys: number;
  private readonly clock: Clock;

  /**
   * @throws {ConfigurationError} If the secret is empty
   */
  constructor(secret: string, options: SigningContextOptions = {}) {
    assertSecret(secret, 'startup');

    const retainedKeys = options.retainedKeys ?? 0;
    if (!Number.isInteger(retainedKeys) || retainedKeys < 0 || retainedKeys > MAX_RETAINED_KEYS) {
      throw IdentityErrors.CONFIGURATION_ERROR(
        `retainedKeys must be an integer between 0 and ${MAX_RETAINED_KEYS}`
      );
    }

    const keyId = options.keyId ?? DEFAULT_KEY_ID;
    if (keyId.length === 0) {
      throw IdentityErrors.CONFIGURATION_ERROR('keyId must not be empty');
    }

    this.retainedKeys = retainedKeys;
    this.clock = options.clock ?? systemClock;
    this.keyring = Object.freeze({
      algorithm: TOKEN_ALGORITHM,
      active: this.createKey(keyId, secret),
      retired: Object.freeze([]),
    });
  }

  /**
   * Current keyring. Callers hold on to the returned value for the whole
   * of one operation instead of re-reading it.
   */
  snapshot(): SigningKeyring {
    return this.keyring;
  }

  getActiveKeyId(): string {
    return this.keyring.active.keyId;
  }

  getRetainedKeyIds(): string[] {
    return this.keyring.retired.map((key) => key.keyId);
  }

  /**
   * Replace the active key.
   *
   * Validation happens before anything is built, so a rejected secret leaves
   * the previous keyring in place.
   *
   * @param keyId - Defaults to the secret's fingerprint
   * @throws {ConfigurationError} If the secret or key ID is empty
   */
  rotate(secret: string, keyId?: string): SigningKeyring {
    assertSecret(secret, 'rotation');
    if (keyId !== undefined && keyId.length === 0) {
      throw IdentityErrors.CONFIGURATION_ERROR('keyId must not be empty');
    }

    const previous = this.keyring;
    const active = this.createKey(keyId ?? fingerprintSecret(secret), secret);

    const retired =
      previous.active.keyId === active.keyId
        ? previous.retired.filter((key) => key.keyId !== active.keyId)
        : [previous.active, ...previous.retired.filter((key) => key.keyId !== active.keyId)];

    const next: SigningKeyring = Object.freeze({
      algorithm: previous.algorithm,
      active,
      retired: Object.freeze(retired.slice(0, this.retainedKeys)),
    });

    this.keyring = next;
    return next;
  }

  private createKey(keyId: string, secret: string): SigningKey {
    return Object.freeze({
      keyId,
      secret: encoder.encode(secret),
      activatedAt: this.clock.now(),
    });
  }
}

/**
 * Pick the key a token should be verified with.
 *
 * A `kid` naming the active key or a retained key selects that key. Any
 * other value (or none) falls back to the active key and is reported as a
 * mismatch rather than rejected.
 */
export function selectVerificationKey(keyring: SigningKeyring, keyId: string | undefined): KeySelection {
  if (keyId === keyring.active.keyId) {
    return { key: keyring.active, keyIdMismatch: false };
  }

  const retained = keyring.retired.find((key) => key.keyId === keyId);
  return { key: retained ?? keyring.active, keyIdMismatch: true };
}
