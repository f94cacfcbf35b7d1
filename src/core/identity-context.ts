/**
 * Request Identity Context
 *
 * Carries the validated identity of one request to downstream handlers.
 * Entries are keyed weakly by the request object, so nothing outlives the
 * request and nothing is shared between requests.
 */

import { IdentityErrors } from '../utils/errors.js';
import type { Claims, RequestIdentity } from './types.js';

export function createRequestIdentity(claims: Claims): RequestIdentity {
  return Object.freeze({
    subjectId: claims.subjectId,
    displayName: claims.displayName,
    roles: claims.roles,
    claims,
  });
}

export class IdentityContext {
  private readonly identities = new WeakMap<object, RequestIdentity>();

  /**
   * Attach the identity for a request. Write-once.
   *
   * @throws {Error} If the request already carries an identity
   */
  attach(request: object, identity: RequestIdentity): void {
    if (this.identities.has(request)) {
      throw new Error('Request identity is already attached and cannot be replaced');
    }
    this.identities.set(request, Object.isFrozen(identity) ? identity : Object.freeze({ ...identity }));
  }

  /**
   * Identity for the request, or undefined when no validation stage ran or
   * optional mode found no valid token.
   */
  get(request: object): RequestIdentity | undefined {
    return this.identities.get(request);
  }

  has(request: object): boolean {
    return this.identities.has(request);
  }

  /**
   * Like get(), for handlers that cannot run anonymously.
   *
   * @throws {AuthenticationError} MISSING_IDENTITY
   */
  require(request: object): RequestIdentity {
    const identity = this.identities.get(request);
    if (!identity) {
      throw IdentityErrors.MISSING_IDENTITY();
    }
    return identity;
  }

  getSubjectId(request: object): string | undefined {
    return this.identities.get(request)?.subjectId;
  }

  getDisplayName(request: object): string | undefined {
    return this.identities.get(request)?.displayName;
  }

  getRoles(request: object): readonly string[] | undefined {
    return this.identities.get(request)?.roles;
  }

  getClaims(request: object): Claims | undefined {
    return this.identities.get(request)?.claims;
  }
}

/** Shared context used by the adapters unless one is passed in. */
export const defaultIdentityContext = new IdentityContext();
