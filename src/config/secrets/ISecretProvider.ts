/**
 * Secret Provider Interface
 *
 * A provider resolves a logical secret name (e.g. "JWT_SECRET") from one
 * source. SecretResolver tries providers in order until one returns a value.
 */

export interface ISecretProvider {
  /**
   * Resolve a logical secret name from this provider's source.
   *
   * @returns The secret, or undefined so the next provider is tried
   * @throws Only for unexpected failures; a missing secret is undefined
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(obj: unknown): obj is ISecretProvider {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'resolve' in obj &&
    typeof obj.resolve === 'function'
  );
}
