// Shared wire-level types for the bearer identity layer

export const IDENTITY_ERROR_CODES = [
  'CONFIGURATION_ERROR',
  'INVALID_ARGUMENT',
  'SIGNING_FAILED',
  'MISSING_CREDENTIALS',
  'MALFORMED_HEADER',
  'MALFORMED_TOKEN',
  'ALGORITHM_MISMATCH',
  'INVALID_SIGNATURE',
  'TOKEN_EXPIRED',
  'TOKEN_NOT_YET_VALID',
  'INVALID_CLAIMS',
  'MISSING_IDENTITY',
  'NO_ROLES_IN_CONTEXT',
  'INSUFFICIENT_PERMISSIONS',
] as const;

export type IdentityErrorCode = (typeof IDENTITY_ERROR_CODES)[number];

/**
 * Payload as it travels inside the signed token.
 *
 * `sub` always equals `user_id`; the key ID is carried in the protected
 * header, not here.
 */
export type TokenPayload = {
  user_id: string;
  username: string;
  roles: string[];
  iss: string;
  sub: string;
  iat: number;
  nbf: number;
  exp: number;
  jti: string;
};

/** Header values a request may carry, as Node delivers them. */
export type HeaderValue = string | string[] | undefined;

export type RequestHeaders = Record<string, HeaderValue>;
