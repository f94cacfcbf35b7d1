// Main export file - re-exports all public APIs

// Core layer exports
export * from './core/index.js';

// HTTP adapters
export * from './http/index.js';

// Configuration exports
export * from './config/index.js';

// Composition
export {
  createIdentityLayer,
  type IdentityLayer,
  type IdentityLayerOptions,
} from './identity-layer.js';

// Shared types
export type { HeaderValue, RequestHeaders, TokenPayload, IdentityErrorCode } from './types/index.js';
export { IDENTITY_ERROR_CODES } from './types/index.js';

// Utility exports
export * from './utils/errors.js';
