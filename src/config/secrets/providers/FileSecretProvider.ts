/**
 * File-Based Secret Provider
 *
 * Reads `{secretDir}/{logicalName}` (Docker and Kubernetes secret mounts).
 * Highest priority in the default chain.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

export class FileSecretProvider implements ISecretProvider {
  private readonly secretDir: string;

  constructor(secretDir: string = '/run/secrets') {
    this.secretDir = secretDir;
  }

  /**
   * @returns File contents with surrounding whitespace trimmed, or undefined
   *   when the file is missing, unreadable or outside secretDir
   */
  public async resolve(logicalName: string): Promise<string | undefined> {
    if (logicalName.includes('..') || path.isAbsolute(logicalName)) {
      return undefined;
    }

    const filePath = path.join(this.secretDir, logicalName);
    const normalizedSecretDir = path.resolve(this.secretDir);

    if (!path.resolve(filePath).startsWith(normalizedSecretDir + path.sep)) {
      return undefined;
    }

    try {
      const secretValue = (await fs.readFile(filePath, 'utf-8')).trim();
      return secretValue === '' ? undefined : secretValue;
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'EACCES' || code === 'EISDIR') {
        return undefined;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[FileSecretProvider] Unexpected error reading ${filePath}: ${message}`);
      return undefined;
    }
  }

  public getSecretDir(): string {
    return this.secretDir;
  }
}
