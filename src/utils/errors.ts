import type { IdentityErrorCode } from '../types/index.js';

export class IdentityError extends Error {
  constructor(
    public code: IdentityErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IdentityError';

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/**
 * Secret missing or empty at startup or rotation. Fatal to the operation
 * that asked for it.
 */
export class ConfigurationError extends IdentityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, 500, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Caller could not be authenticated. Always 401; the message stays generic,
 * library error text only goes to `details`.
 */
export class AuthenticationError extends IdentityError {
  constructor(code: IdentityErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, 401, details);
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends IdentityError {
  constructor(code: IdentityErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, 403, details);
    this.name = 'AuthorizationError';
  }
}

/** Signature computation failed during issuance. */
export class SigningError extends IdentityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SIGNING_FAILED', message, 500, details);
    this.name = 'SigningError';
  }
}

export const INVALID_TOKEN_MESSAGE = 'Invalid or expired token';
export const MISSING_HEADER_MESSAGE = 'Missing or invalid authorization header';

// Predefined identity error types
export const IdentityErrors = {
  INVALID_ARGUMENT: (message: string) =>
    new IdentityError('INVALID_ARGUMENT', `Invalid argument: ${message}`, 500),

  CONFIGURATION_ERROR: (message: string) =>
    new ConfigurationError(`Configuration error: ${message}`),

  SIGNING_FAILED: (details?: Record<string, unknown>) =>
    new SigningError('Failed to sign token', details),

  MISSING_CREDENTIALS: () =>
    new AuthenticationError('MISSING_CREDENTIALS', MISSING_HEADER_MESSAGE),

  MALFORMED_HEADER: () => new AuthenticationError('MALFORMED_HEADER', MISSING_HEADER_MESSAGE),

  MALFORMED_TOKEN: (details?: Record<string, unknown>) =>
    new AuthenticationError('MALFORMED_TOKEN', INVALID_TOKEN_MESSAGE, details),

  ALGORITHM_MISMATCH: (details?: Record<string, unknown>) =>
    new AuthenticationError('ALGORITHM_MISMATCH', INVALID_TOKEN_MESSAGE, details),

  INVALID_SIGNATURE: (details?: Record<string, unknown>) =>
    new AuthenticationError('INVALID_SIGNATURE', INVALID_TOKEN_MESSAGE, details),

  TOKEN_EXPIRED: (details?: Record<string, unknown>) =>
    new AuthenticationError('TOKEN_EXPIRED', INVALID_TOKEN_MESSAGE, details),

  TOKEN_NOT_YET_VALID: (details?: Record<string, unknown>) =>
    new AuthenticationError('TOKEN_NOT_YET_VALID', INVALID_TOKEN_MESSAGE, details),

  INVALID_CLAIMS: (details?: Record<string, unknown>) =>
    new AuthenticationError('INVALID_CLAIMS', INVALID_TOKEN_MESSAGE, details),

  MISSING_IDENTITY: () =>
    new AuthenticationError('MISSING_IDENTITY', 'Authentication required'),

  NO_ROLES_IN_CONTEXT: () =>
    new AuthorizationError('NO_ROLES_IN_CONTEXT', 'User roles not found in context'),

  INSUFFICIENT_PERMISSIONS: (requiredRole: string) =>
    new AuthorizationError('INSUFFICIENT_PERMISSIONS', 'Insufficient permissions', {
      requiredRole,
    }),
} as const;

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function isAuthorizationError(error: unknown): error is AuthorizationError {
  return error instanceof AuthorizationError;
}

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof IdentityError) {
    return {
      type: error.name,
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

/**
 * Map an error onto the body that crosses the HTTP boundary.
 *
 * Only 401 and 403 carry their own message and reason. Everything else is
 * an internal error and is reported without any detail.
 */
export function createErrorResponse(error: unknown): {
  statusCode: number;
  body: ErrorBody;
} {
  if (error instanceof AuthenticationError || error instanceof AuthorizationError) {
    return {
      statusCode: error.statusCode,
      body: {
        error: error.message,
        code: error.statusCode,
        reason: error.code,
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: 'Internal server error',
      code: 500,
      reason: 'INTERNAL_ERROR',
    },
  };
}

export interface ErrorBody {
  error: string;
  code: number;
  reason: IdentityErrorCode | 'INTERNAL_ERROR';
}
