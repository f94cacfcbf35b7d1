/**
 * Core Module Public API
 *
 * Token issuance and validation, the auth pipeline and the request
 * identity context. Nothing here depends on config/ or http/.
 */

// ============================================================================
// Services
// ============================================================================

export { TokenManager, createTokenId } from './token-manager.js';
export type { TokenManagerOptions, IssuedToken } from './token-manager.js';

export {
  SigningContext,
  MAX_RETAINED_KEYS,
  fingerprintSecret,
  selectVerificationKey,
} from './signing-context.js';
export type {
  SigningKey,
  SigningKeyring,
  SigningContextOptions,
  KeySelection,
} from './signing-context.js';

export {
  AuthPipeline,
  classifyAuthorizationHeader,
  extractBearerToken,
  hasRole,
  readAuthorizationHeader,
} from './auth-pipeline.js';
export type {
  AuthExchange,
  AuthPipelineOptions,
  AuthenticationOutcome,
  AuthorizationOutcome,
  RequestInfo,
  TokenExtraction,
  TokenValidator,
} from './auth-pipeline.js';

export {
  IdentityContext,
  createRequestIdentity,
  defaultIdentityContext,
} from './identity-context.js';

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

// ============================================================================
// Types
// ============================================================================

export type {
  AuditEntry,
  AuthMode,
  Claims,
  Clock,
  RequestIdentity,
  TokenAlgorithm,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

export {
  DEFAULT_KEY_ID,
  ROLE_ADMIN,
  ROLE_USER,
  TOKEN_ALGORITHM,
  TOKEN_ISSUER,
  systemClock,
  toEpochSeconds,
} from './types.js';
