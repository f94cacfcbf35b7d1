/**
 * Secret Resolver
 *
 * Resolves logical secret names through a provider chain, and replaces
 * `{"$secret": "NAME"}` descriptors in a parsed configuration in place.
 *
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 *
 * const raw = JSON.parse(await fs.readFile('config/identity.json', 'utf-8'));
 * await resolver.resolveSecrets(raw);
 * ```
 */

import { isSecretProvider, type ISecretProvider } from './ISecretProvider.js';
import { AuditService } from '../../core/audit-service.js';

export interface SecretResolverConfig {
  /** Records every resolution, successful or not (names only, never values). Best effort. */
  auditService?: AuditService;

  /** Throw when a descriptor cannot be resolved (default: true) */
  failFast?: boolean;
}

interface SecretDescriptor {
  $secret: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    isRecord(value) &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0 &&
    Object.keys(value).length === 1
  );
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private auditService?: AuditService;
  private failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
    this.failFast = config?.failFast ?? true;
  }

  /**
   * Append a provider. Providers are tried in the order they are added.
   *
   * @throws Error if the object has no resolve() method
   */
  public addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * Replace every secret descriptor in `config` with its resolved value.
   * Modifies `config` in place.
   *
   * @throws Error if failFast is set and a descriptor cannot be resolved
   */
  public async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config, 'config');
  }

  /**
   * Resolve one logical name through the chain.
   *
   * @returns The first value a provider returns, or undefined
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    return this.resolveSecret(logicalName, logicalName);
  }

  private async resolveNode(node: unknown, path: string): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        const child: unknown = node[i];
        const replacement = await this.resolveChild(child, `${path}[${i}]`);
        if (replacement !== undefined) {
          node[i] = replacement;
        }
      }
      return;
    }

    if (!isRecord(node)) {
      return;
    }

    for (const key of Object.keys(node)) {
      const replacement = await this.resolveChild(node[key], `${path}.${key}`);
      if (replacement !== undefined) {
        node[key] = replacement;
      }
    }
  }

  /**
   * @returns The resolved value when `child` is a descriptor
   */
  private async resolveChild(child: unknown, path: string): Promise<string | undefined> {
    if (!isSecretDescriptor(child)) {
      await this.resolveNode(child, path);
      return undefined;
    }

    const logicalName = child.$secret;
    const resolvedValue = await this.resolveSecret(logicalName, path);

    if (resolvedValue === undefined) {
      const errorMessage = `Secret "${logicalName}" at path "${path}" could not be resolved by any provider.`;

      if (this.failFast) {
        throw new Error(`[SecretResolver] ${errorMessage}`);
      }
      console.warn(`[SecretResolver] ${errorMessage}`);
    }

    return resolvedValue;
  }

  private async resolveSecret(logicalName: string, path: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);

        if (value !== undefined) {
          this.auditService?.record({
            source: 'secret:resolution',
            userId: 'system',
            action: `resolve:${logicalName}`,
            success: true,
            metadata: {
              secretName: logicalName,
              provider: provider.constructor.name,
              configPath: path,
            },
          });

          return value;
        }
      } catch (error) {
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${error instanceof Error ? error.message : 'Unknown error'}`
        );
      }
    }

    this.auditService?.record({
      source: 'secret:resolution',
      userId: 'system',
      action: `resolve:${logicalName}`,
      success: false,
      reason: 'NOT_FOUND',
      metadata: {
        secretName: logicalName,
        provider: 'none',
        configPath: path,
      },
    });

    return undefined;
  }

  public getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  /** Remove every provider (tests) */
  public clearProviders(): void {
    this.providers = [];
  }
}
