/**
 * Environment Variable Secret Provider
 *
 * Fallback after FileSecretProvider. Reads `env[logicalName]`, which is how
 * the signing secret was configured before file mounts existed, and how
 * rotation from source re-reads JWT_SECRET.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  /**
   * @param env - Variables to read (default: process.env, read on every call)
   */
  constructor(private readonly env?: NodeJS.ProcessEnv) {}

  public async resolve(logicalName: string): Promise<string | undefined> {
    const value = (this.env ?? process.env)[logicalName];

    if (value === undefined || value.trim() === '') {
      return undefined;
    }

    return value.trim();
  }
}
