/**
 * Configuration Module - Public API
 */

export { ConfigManager, type ConfigManagerOptions } from './manager.js';

export {
  IdentityConfigSchema,
  AuditConfigSchema,
  EnvironmentSchema,
  type IdentityConfig,
  type IdentityConfigInput,
  type AuditConfig,
  type Environment,
} from './schema.js';

export {
  SecretResolver,
  FileSecretProvider,
  EnvProvider,
  isSecretProvider,
  type ISecretProvider,
  type SecretResolverConfig,
} from './secrets/index.js';
