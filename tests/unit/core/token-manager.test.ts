/**
 * TokenManager Tests
 *
 * Issue/validate round trip, tamper and algorithm checks, time-based
 * validity, refresh and key rotation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SignJWT } from 'jose';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import { fingerprintSecret } from '../../../src/core/signing-context.js';
import { TokenManager, createTokenId } from '../../../src/core/token-manager.js';
import type { TokenPayload } from '../../../src/types/index.js';
import { ConfigurationError, IdentityError } from '../../../src/utils/errors.js';
import { FakeClock, T0, TEST_SECRET, tamperSignature } from '../../support/fixtures.js';

const encoder = new TextEncoder();
const BASE64URL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

function payloadAt(now: number, overrides: Partial<TokenPayload> = {}): TokenPayload {
  return {
    user_id: 'u-1',
    username: 'alice',
    roles: ['user'],
    iss: 'bearer-identity',
    sub: 'u-1',
    iat: now,
    nbf: now,
    exp: now + 60,
    jti: 'jwt-test',
    ...overrides,
  };
}

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

describe('TokenManager', () => {
  let clock: FakeClock;
  let storage: InMemoryAuditStorage;
  let manager: TokenManager;

  beforeEach(() => {
    clock = new FakeClock();
    storage = new InMemoryAuditStorage();
    manager = new TokenManager(TEST_SECRET, {
      clock,
      auditService: new AuditService({ enabled: true, storage }),
    });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('construction', () => {
    it('should refuse to start without a secret', () => {
      expect(() => new TokenManager('')).toThrow(ConfigurationError);
    });

    it('should report the active key ID and algorithm', () => {
      expect(manager.getActiveKeyId()).toBe('default');
      expect(manager.getAlgorithm()).toBe('HS256');
    });
  });

  describe('issueToken', () => {
    it('should produce a three-part token with kid in the header', async () => {
      const token = await manager.issueToken('u-1', 'alice', ['user'], 3600);
      const [header] = token.split('.');

      expect(token.split('.')).toHaveLength(3);
      expect(JSON.parse(Buffer.from(header, 'base64url').toString('utf8'))).toEqual({
        alg: 'HS256',
        typ: 'JWT',
        kid: 'default',
      });
    });

    it('should stamp issuer, timestamps and a token ID', async () => {
      const { claims } = await manager.issueTokenWithClaims('u-1', 'alice', ['user', 'admin'], 3600);

      expect(claims).toMatchObject({
        subjectId: 'u-1',
        displayName: 'alice',
        roles: ['user', 'admin'],
        issuer: 'bearer-identity',
        issuedAt: T0,
        notBefore: T0,
        expiresAt: T0 + 3600,
        keyId: 'default',
      });
      expect(claims.tokenId).toMatch(/^jwt-1767225600-[0-9a-f]{16}$/);
    });

    it('should give two tokens issued in the same second different IDs', async () => {
      const first = await manager.issueTokenWithClaims('u-1', 'alice', [], 60);
      const second = await manager.issueTokenWithClaims('u-1', 'alice', [], 60);

      expect(first.claims.tokenId).not.toBe(second.claims.tokenId);
    });

    it('should reject an empty subject ID', async () => {
      await expect(manager.issueToken('', 'alice', [], 60)).rejects.toMatchObject({
        code: 'INVALID_ARGUMENT',
      });
    });

    it('should reject a non-finite ttl', async () => {
      await expect(manager.issueToken('u-1', 'alice', [], Number.NaN)).rejects.toMatchObject({
        code: 'INVALID_ARGUMENT',
      });
    });
  });

  describe('validateToken', () => {
    it('should return exactly the claims that were issued', async () => {
      const issued = await manager.issueTokenWithClaims('u-1', 'alice', ['user', 'admin'], 3600);

      const claims = await manager.validateToken(issued.token);

      expect(claims).toEqual(issued.claims);
      expect(Object.isFrozen(claims)).toBe(true);
    });

    it('should preserve empty roles', async () => {
      const token = await manager.issueToken('u-2', 'bob', [], 60);

      expect((await manager.validateToken(token)).roles).toEqual([]);
    });

    it('should reject a token whose signature was altered', async () => {
      const token = await manager.issueToken('u-1', 'alice', ['user'], 3600);

      await expect(manager.validateToken(tamperSignature(token))).rejects.toMatchObject({
        code: 'INVALID_SIGNATURE',
        statusCode: 401,
        message: 'Invalid or expired token',
      });
    });

    it('should reject every single-bit change to the signature characters', async () => {
      const token = await manager.issueToken('u-1', 'alice', ['user'], 3600);
      const signatureStart = token.lastIndexOf('.') + 1;
      const accepted: string[] = [];

      for (let position = signatureStart; position < token.length; position++) {
        const index = BASE64URL_ALPHABET.indexOf(token[position]);
        for (const bit of [1, 2, 4, 8, 16, 32]) {
          const variant =
            token.slice(0, position) + BASE64URL_ALPHABET[index ^ bit] + token.slice(position + 1);
          const code = await manager.validateToken(variant).then(
            () => 'ACCEPTED',
            (error: unknown) => (error instanceof IdentityError ? error.code : 'UNEXPECTED')
          );
          if (code !== 'INVALID_SIGNATURE') {
            accepted.push(`${position - signatureStart}:${bit}:${code}`);
          }
        }
      }

      expect(token.length - signatureStart).toBe(43);
      expect(accepted).toEqual([]);
    });

    it('should reject a token whose payload was altered', async () => {
      const token = await manager.issueToken('u-1', 'alice', ['user'], 3600);
      const [header, , signature] = token.split('.');
      const forged = `${header}.${encodeSegment(payloadAt(T0, { roles: ['admin'] }))}.${signature}`;

      await expect(manager.validateToken(forged)).rejects.toMatchObject({
        code: 'INVALID_SIGNATURE',
      });
    });

    it('should reject a token signed by a different secret', async () => {
      const other = new TokenManager('test-secret-other', { clock });
      const token = await other.issueToken('u-1', 'alice', ['user'], 3600);

      await expect(manager.validateToken(token)).rejects.toMatchObject({
        code: 'INVALID_SIGNATURE',
      });
    });

    it('should reject a token signed with another HMAC algorithm', async () => {
      const token = await new SignJWT(payloadAt(T0))
        .setProtectedHeader({ alg: 'HS512', kid: 'default' })
        .sign(encoder.encode(TEST_SECRET));

      await expect(manager.validateToken(token)).rejects.toMatchObject({
        code: 'ALGORITHM_MISMATCH',
      });
    });

    it('should reject an unsigned token', async () => {
      const token = `${encodeSegment({ alg: 'none', typ: 'JWT' })}.${encodeSegment(payloadAt(T0))}.`;

      await expect(manager.validateToken(token)).rejects.toMatchObject({
        code: 'ALGORITHM_MISMATCH',
      });
    });

    it('should reject a value that is not a token', async () => {
      await expect(manager.validateToken('not-a-token')).rejects.toMatchObject({
        code: 'MALFORMED_TOKEN',
      });
    });

    it('should reject a foreign issuer', async () => {
      const token = await new SignJWT(payloadAt(T0, { iss: 'someone-else' }))
        .setProtectedHeader({ alg: 'HS256', kid: 'default' })
        .sign(encoder.encode(TEST_SECRET));

      await expect(manager.validateToken(token)).rejects.toMatchObject({
        code: 'INVALID_CLAIMS',
      });
    });

    it('should reject a subject that disagrees with the user ID claim', async () => {
      const token = await new SignJWT(payloadAt(T0, { sub: 'u-2' }))
        .setProtectedHeader({ alg: 'HS256', kid: 'default' })
        .sign(encoder.encode(TEST_SECRET));

      await expect(manager.validateToken(token)).rejects.toMatchObject({
        code: 'INVALID_CLAIMS',
        details: { claim: 'sub' },
      });
    });

    it('should reject a payload missing required claims', async () => {
      const { user_id: _omitted, ...incomplete } = payloadAt(T0);
      const token = await new SignJWT(incomplete)
        .setProtectedHeader({ alg: 'HS256', kid: 'default' })
        .sign(encoder.encode(TEST_SECRET));

      await expect(manager.validateToken(token)).rejects.toMatchObject({
        code: 'INVALID_CLAIMS',
      });
    });
  });

  describe('time validity', () => {
    it('should treat a token issued with a negative ttl as expired', async () => {
      const token = await manager.issueToken('u-1', 'alice', ['user'], -1);

      await expect(manager.validateToken(token)).rejects.toMatchObject({
        code: 'TOKEN_EXPIRED',
        statusCode: 401,
      });
    });

    it('should accept a token at its expiry second and reject it one second later', async () => {
      const token = await manager.issueToken('u-1', 'alice', ['user'], 60);

      clock.advance(60);
      await expect(manager.validateToken(token)).resolves.toMatchObject({ subjectId: 'u-1' });

      clock.advance(1);
      await expect(manager.validateToken(token)).rejects.toMatchObject({ code: 'TOKEN_EXPIRED' });
    });

    it('should reject a token before its not-before time', async () => {
      const token = await manager.issueToken('u-1', 'alice', ['user'], 60);

      clock.advance(-10);

      await expect(manager.validateToken(token)).rejects.toMatchObject({
        code: 'TOKEN_NOT_YET_VALID',
      });
    });

    it('should apply the clock tolerance to both bounds', async () => {
      const tolerant = new TokenManager(TEST_SECRET, { clock, clockTolerance: 30 });
      const token = await tolerant.issueToken('u-1', 'alice', ['user'], 60);

      clock.advance(-10);
      await expect(tolerant.validateToken(token)).resolves.toMatchObject({ subjectId: 'u-1' });

      clock.advance(10 + 60 + 30);
      await expect(tolerant.validateToken(token)).resolves.toMatchObject({ subjectId: 'u-1' });

      clock.advance(1);
      await expect(tolerant.validateToken(token)).rejects.toMatchObject({ code: 'TOKEN_EXPIRED' });
    });
  });

  describe('refreshToken', () => {
    it('should re-mint a valid token with a new ID and lifetime', async () => {
      const original = await manager.issueTokenWithClaims('u-1', 'alice', ['user'], 60);
      clock.advance(10);

      const refreshed = await manager.validateToken(await manager.refreshToken(original.token, 120));

      expect(refreshed).toMatchObject({
        subjectId: 'u-1',
        displayName: 'alice',
        roles: ['user'],
        issuedAt: T0 + 10,
        expiresAt: T0 + 130,
      });
      expect(refreshed.tokenId).not.toBe(original.claims.tokenId);
    });

    it('should refuse to refresh an expired token', async () => {
      const token = await manager.issueToken('u-1', 'alice', ['user'], 60);
      clock.advance(61);

      await expect(manager.refreshToken(token, 60)).rejects.toMatchObject({
        code: 'TOKEN_EXPIRED',
      });
    });
  });

  describe('rotateSigningKey', () => {
    it('should invalidate tokens signed with the previous key', async () => {
      const before = await manager.issueToken('u-1', 'alice', ['user'], 3600);

      const keyId = manager.rotateSigningKey('test-secret-2');
      const after = await manager.issueToken('u-1', 'alice', ['user'], 3600);

      expect(keyId).toBe(fingerprintSecret('test-secret-2'));
      await expect(manager.validateToken(before)).rejects.toMatchObject({
        code: 'INVALID_SIGNATURE',
      });
      await expect(manager.validateToken(after)).resolves.toMatchObject({ keyId });
    });

    it('should keep verifying retained keys', async () => {
      const retaining = new TokenManager(TEST_SECRET, { clock, retainedKeys: 1 });
      const before = await retaining.issueToken('u-1', 'alice', ['user'], 3600);

      retaining.rotateSigningKey('test-secret-2', 'k2');

      await expect(retaining.validateToken(before)).resolves.toMatchObject({ keyId: 'default' });
      expect(retaining.getRetainedKeyIds()).toEqual(['default']);
    });

    it('should keep the previous key when the new secret is empty', async () => {
      const token = await manager.issueToken('u-1', 'alice', ['user'], 3600);

      expect(() => manager.rotateSigningKey('  ')).toThrow(ConfigurationError);
      expect(manager.getActiveKeyId()).toBe('default');
      await expect(manager.validateToken(token)).resolves.toMatchObject({ subjectId: 'u-1' });
    });

    it('should let a validation already in flight finish against its snapshot', async () => {
      const token = await manager.issueToken('u-1', 'alice', ['user'], 3600);

      const pending = manager.validateToken(token);
      manager.rotateSigningKey('test-secret-2');

      await expect(pending).resolves.toMatchObject({ subjectId: 'u-1' });
    });
  });

  describe('key ID mismatch', () => {
    it('should log and audit a token naming an unknown key, then verify with the active key', async () => {
      const token = await new SignJWT(payloadAt(T0))
        .setProtectedHeader({ alg: 'HS256', kid: 'other' })
        .sign(encoder.encode(TEST_SECRET));

      const claims = await manager.validateToken(token);

      expect(claims.keyId).toBe('other');
      expect(console.warn).toHaveBeenCalledWith(
        '[TokenManager] Key ID mismatch (token kid: other, active: default)'
      );
      expect(storage.getEntries().map((e) => e.action)).toEqual([
        'token:kid_mismatch',
        'token:validate',
      ]);
    });
  });

  describe('audit', () => {
    it('should record issuance, validation failures and rotation', async () => {
      const token = await manager.issueToken('u-1', 'alice', ['user'], 3600);
      await expect(manager.validateToken(tamperSignature(token))).rejects.toThrow();
      manager.rotateSigningKey('test-secret-2', 'k2');
      expect(() => manager.rotateSigningKey('')).toThrow();

      expect(
        storage.getEntries().map(({ action, success, reason }) => ({ action, success, reason }))
      ).toEqual([
        { action: 'token:issue', success: true, reason: undefined },
        { action: 'token:validate', success: false, reason: 'INVALID_SIGNATURE' },
        { action: 'key:rotate', success: true, reason: undefined },
        { action: 'key:rotate', success: false, reason: 'CONFIGURATION_ERROR' },
      ]);
    });
  });

  describe('createTokenId', () => {
    it('should embed the issuance second', () => {
      expect(createTokenId(42)).toMatch(/^jwt-42-[0-9a-f]{16}$/);
    });
  });
});
