/**
 * Identity Layer - composition root
 *
 * Builds the token manager, auth pipeline and identity context from one
 * validated configuration, with the signing secret resolved through the
 * secret provider chain.
 *
 * @example
 * ```typescript
 * const layer = await createIdentityLayer({ configPath: './config/identity.json' });
 * const auth = createExpressAuth(layer.pipeline, { identityContext: layer.identityContext });
 *
 * app.get('/admin', auth.requireAuth, auth.requireRole(ROLE_ADMIN), handler);
 *
 * // After the secret was replaced in its store:
 * await layer.rotateFromSource();
 * ```
 */

import { ConfigManager } from './config/manager.js';
import type { IdentityConfig, IdentityConfigInput } from './config/schema.js';
import type { SecretResolver } from './config/secrets/index.js';
import { AuditService } from './core/audit-service.js';
import { AuthPipeline } from './core/auth-pipeline.js';
import { IdentityContext } from './core/identity-context.js';
import { TokenManager } from './core/token-manager.js';
import type { Clock } from './core/types.js';

export interface IdentityLayerOptions {
  /** Raw configuration; validated before anything is built */
  config?: IdentityConfigInput;

  /**
   * JSON configuration file, read when `config` is not given
   * (default: CONFIG_PATH or './config/identity.json'). `{"$secret": "NAME"}`
   * descriptors in it are resolved through the secret provider chain.
   */
  configPath?: string;

  /** Provider chain for the signing secret (default: /run/secrets, then env) */
  secretResolver?: SecretResolver;

  /** Audit sink (default: built from `config.audit`) */
  auditService?: AuditService;

  clock?: Clock;
}

export interface IdentityLayer {
  readonly config: IdentityConfig;
  readonly tokenManager: TokenManager;
  readonly pipeline: AuthPipeline;
  readonly identityContext: IdentityContext;
  readonly auditService: AuditService;

  /** Issue a token with the configured default lifetime. */
  issueToken(subjectId: string, displayName: string, roles: readonly string[]): Promise<string>;

  /** Refresh a token with the configured refresh lifetime. */
  refreshToken(token: string): Promise<string>;

  /**
   * Re-read the signing secret from its source and rotate to it.
   *
   * @returns The new active key ID
   * @throws {ConfigurationError} If the secret is no longer configured; the
   *   current key stays active
   */
  rotateFromSource(keyId?: string): Promise<string>;
}

/**
 * @throws {ConfigurationError} If the configuration cannot be read, is
 *   invalid, or the signing secret is not configured
 */
export async function createIdentityLayer(
  options: IdentityLayerOptions = {}
): Promise<IdentityLayer> {
  const configManager = new ConfigManager({
    secretResolver: options.secretResolver,
    auditService: options.auditService,
  });
  const config = options.config
    ? configManager.fromObject(options.config)
    : await configManager.loadConfig(options.configPath);

  const auditService =
    options.auditService ??
    new AuditService({
      enabled: config.audit.enabled,
      logAllAttempts: config.audit.logAllAttempts,
      maxEntries: config.audit.maxEntries,
    });

  const secret = await configManager.resolveSigningSecret();

  const tokenManager = new TokenManager(secret, {
    keyId: config.keyId,
    retainedKeys: config.retainedKeys,
    clockTolerance: config.clockTolerance,
    clock: options.clock,
    auditService,
  });

  const pipeline = new AuthPipeline(tokenManager, { auditService, realm: config.realm });
  const identityContext = new IdentityContext();

  console.log(
    `[IdentityLayer] Ready (alg: ${tokenManager.getAlgorithm()}, kid: ${tokenManager.getActiveKeyId()}, audit: ${auditService.isEnabled()})`
  );

  return {
    config,
    tokenManager,
    pipeline,
    identityContext,
    auditService,

    issueToken: (subjectId, displayName, roles) =>
      tokenManager.issueToken(subjectId, displayName, roles, config.tokenTtlSeconds),

    refreshToken: (token) => tokenManager.refreshToken(token, config.refreshTtlSeconds),

    async rotateFromSource(keyId?: string): Promise<string> {
      const next = await configManager.resolveSigningSecret();
      return tokenManager.rotateSigningKey(next, keyId);
    },
  };
}
