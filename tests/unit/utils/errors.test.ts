import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  AuthorizationError,
  ConfigurationError,
  IdentityError,
  IdentityErrors,
  SigningError,
  createErrorResponse,
  isAuthenticationError,
  isAuthorizationError,
  sanitizeError,
} from '../../../src/utils/errors.js';

describe('IdentityErrors', () => {
  it('should map each category onto its status code', () => {
    expect(IdentityErrors.CONFIGURATION_ERROR('x')).toBeInstanceOf(ConfigurationError);
    expect(IdentityErrors.CONFIGURATION_ERROR('x').statusCode).toBe(500);
    expect(IdentityErrors.SIGNING_FAILED()).toBeInstanceOf(SigningError);
    expect(IdentityErrors.TOKEN_EXPIRED().statusCode).toBe(401);
    expect(IdentityErrors.INSUFFICIENT_PERMISSIONS('admin').statusCode).toBe(403);
  });

  it('should keep token failure messages generic', () => {
    const codes = [
      IdentityErrors.MALFORMED_TOKEN(),
      IdentityErrors.ALGORITHM_MISMATCH(),
      IdentityErrors.INVALID_SIGNATURE(),
      IdentityErrors.TOKEN_EXPIRED(),
      IdentityErrors.TOKEN_NOT_YET_VALID(),
      IdentityErrors.INVALID_CLAIMS(),
    ];

    expect(new Set(codes.map((error) => error.message))).toEqual(new Set(['Invalid or expired token']));
  });

  it('should narrow with the type guards', () => {
    expect(isAuthenticationError(IdentityErrors.MISSING_CREDENTIALS())).toBe(true);
    expect(isAuthenticationError(IdentityErrors.NO_ROLES_IN_CONTEXT())).toBe(false);
    expect(isAuthorizationError(IdentityErrors.NO_ROLES_IN_CONTEXT())).toBe(true);
    expect(isAuthorizationError(new Error('x'))).toBe(false);
  });

  it('should serialise to JSON with code and details', () => {
    const error = IdentityErrors.INSUFFICIENT_PERMISSIONS('admin');

    expect(error.toJSON()).toEqual({
      name: 'AuthorizationError',
      code: 'INSUFFICIENT_PERMISSIONS',
      message: 'Insufficient permissions',
      statusCode: 403,
      details: { requiredRole: 'admin' },
    });
  });
});

describe('createErrorResponse', () => {
  it('should expose 401 errors with their reason', () => {
    expect(createErrorResponse(IdentityErrors.MALFORMED_HEADER())).toEqual({
      statusCode: 401,
      body: { error: 'Missing or invalid authorization header', code: 401, reason: 'MALFORMED_HEADER' },
    });
  });

  it('should expose 403 errors with their reason', () => {
    expect(createErrorResponse(IdentityErrors.INSUFFICIENT_PERMISSIONS('admin'))).toEqual({
      statusCode: 403,
      body: { error: 'Insufficient permissions', code: 403, reason: 'INSUFFICIENT_PERMISSIONS' },
    });
  });

  it('should hide everything else behind a generic 500', () => {
    const internal = { error: 'Internal server error', code: 500, reason: 'INTERNAL_ERROR' };

    expect(createErrorResponse(new Error('connection refused')).body).toEqual(internal);
    expect(createErrorResponse(IdentityErrors.SIGNING_FAILED()).body).toEqual(internal);
    expect(createErrorResponse(new IdentityError('INVALID_ARGUMENT', 'x', 400)).statusCode).toBe(500);
    expect(createErrorResponse('boom').statusCode).toBe(500);
  });
});

describe('sanitizeError', () => {
  it('should describe identity errors by code', () => {
    expect(sanitizeError(new AuthenticationError('TOKEN_EXPIRED', 'Invalid or expired token'))).toMatchObject({
      type: 'AuthenticationError',
      code: 'TOKEN_EXPIRED',
      statusCode: 401,
    });
  });

  it('should describe unknown values without their content', () => {
    expect(sanitizeError(42)).toEqual({ type: 'Unknown', message: 'An unknown error occurred' });
  });

  it('should keep the name of plain errors', () => {
    expect(sanitizeError(new TypeError('bad'))).toMatchObject({ type: 'Error', name: 'TypeError', message: 'bad' });
  });

  it('should build an AuthorizationError with its own name', () => {
    expect(new AuthorizationError('NO_ROLES_IN_CONTEXT', 'x').name).toBe('AuthorizationError');
  });
});
