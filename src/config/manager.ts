import { readFile } from 'fs/promises';
import { ZodError } from 'zod';
import { AuditService } from '../core/audit-service.js';
import { IdentityError, IdentityErrors } from '../utils/errors.js';
import {
  EnvironmentSchema,
  IdentityConfigSchema,
  type Environment,
  type IdentityConfig,
} from './schema.js';
import { EnvProvider, FileSecretProvider, SecretResolver } from './secrets/index.js';

export interface ConfigManagerOptions {
  /** AuditService instance for logging secret access (optional) */
  auditService?: AuditService;

  /** Directory for file-based secrets (default: SECRETS_DIR or '/run/secrets') */
  secretsDir?: string;

  /** Replace the default provider chain entirely */
  secretResolver?: SecretResolver;

  env?: NodeJS.ProcessEnv;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export class ConfigManager {
  private config: IdentityConfig | null = null;
  private env: Environment;
  private secretResolver: SecretResolver;

  constructor(options: ConfigManagerOptions = {}) {
    const env = EnvironmentSchema.safeParse(options.env ?? process.env);
    if (!env.success) {
      throw IdentityErrors.CONFIGURATION_ERROR(`invalid environment (${formatIssues(env.error)})`);
    }
    this.env = env.data;

    if (options.secretResolver) {
      this.secretResolver = options.secretResolver;
    } else {
      this.secretResolver = new SecretResolver({
        auditService: options.auditService,
        failFast: true,
      });

      // 1. FileSecretProvider (highest priority - production)
      this.secretResolver.addProvider(
        new FileSecretProvider(options.secretsDir ?? this.env.SECRETS_DIR ?? '/run/secrets')
      );

      // 2. EnvProvider (fallback - development/test)
      this.secretResolver.addProvider(new EnvProvider());
    }
  }

  /**
   * Load configuration from a JSON file.
   *
   * `{"$secret": "NAME"}` descriptors are resolved before validation.
   *
   * @param configPath - Default: CONFIG_PATH or './config/identity.json'
   */
  async loadConfig(configPath?: string): Promise<IdentityConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath ?? this.env.CONFIG_PATH ?? './config/identity.json';

    try {
      const configFile = await readFile(path, 'utf-8');
      const rawConfig: unknown = JSON.parse(configFile);

      console.log('[ConfigManager] Resolving secrets...');
      await this.secretResolver.resolveSecrets(rawConfig);

      this.config = this.validate(rawConfig);
      console.log('[ConfigManager] Configuration loaded and validated successfully');
      return this.config;
    } catch (error) {
      if (error instanceof IdentityError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw IdentityErrors.CONFIGURATION_ERROR(`failed to load ${path}: ${message}`);
    }
  }

  /**
   * Validate an in-memory configuration object and make it current.
   */
  fromObject(raw: unknown): IdentityConfig {
    this.config = this.validate(raw);
    return this.config;
  }

  getConfig(): IdentityConfig {
    if (!this.config) {
      throw IdentityErrors.CONFIGURATION_ERROR('configuration not loaded, call loadConfig() first');
    }
    return this.config;
  }

  getEnvironment(): Environment {
    return this.env;
  }

  /**
   * Resolve the signing secret named by the configuration.
   *
   * Consulted at startup and again on every rotation from source.
   *
   * @throws {ConfigurationError} If no provider has a non-empty value
   */
  async resolveSigningSecret(): Promise<string> {
    const { secretName } = this.getConfig();
    const secret = await this.secretResolver.resolve(secretName);

    if (secret === undefined || secret.trim().length === 0) {
      throw IdentityErrors.CONFIGURATION_ERROR(`signing secret "${secretName}" is not configured`);
    }
    return secret;
  }

  getSecretResolver(): SecretResolver {
    return this.secretResolver;
  }

  isSecureEnvironment(): boolean {
    return this.env.NODE_ENV === 'production';
  }

  private validate(raw: unknown): IdentityConfig {
    try {
      const config = IdentityConfigSchema.parse(raw);

      if (this.isSecureEnvironment() && !config.audit.enabled) {
        console.warn('[ConfigManager] Audit logging should be enabled in production environments');
      }
      return config;
    } catch (error) {
      if (error instanceof ZodError) {
        throw IdentityErrors.CONFIGURATION_ERROR(`invalid configuration (${formatIssues(error)})`);
      }
      throw error;
    }
  }
}
