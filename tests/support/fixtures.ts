import type { ISecretProvider } from '../../src/config/secrets/index.js';
import type { Clock } from '../../src/core/types.js';

export const TEST_SECRET = 'test-secret';

/** 2026-01-01T00:00:00Z */
export const T0 = 1767225600;

export class FakeClock implements Clock {
  constructor(public seconds: number = T0) {}

  now(): Date {
    return new Date(this.seconds * 1000);
  }

  advance(seconds: number): void {
    this.seconds += seconds;
  }
}

export class MemorySecretProvider implements ISecretProvider {
  private secrets: Map<string, string>;

  constructor(secrets: Record<string, string> = {}) {
    this.secrets = new Map(Object.entries(secrets));
  }

  async resolve(logicalName: string): Promise<string | undefined> {
    return this.secrets.get(logicalName);
  }

  set(name: string, value: string): void {
    this.secrets.set(name, value);
  }

  delete(name: string): void {
    this.secrets.delete(name);
  }
}

/** Flip the first character of the signature segment. */
export function tamperSignature(token: string): string {
  const [header, payload, signature] = token.split('.');
  const first = signature.startsWith('A') ? 'B' : 'A';
  return `${header}.${payload}.${first}${signature.slice(1)}`;
}
