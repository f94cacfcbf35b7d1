/**
 * Identity Layer Configuration Schema
 */

import { z } from 'zod';
import { MAX_RETAINED_KEYS } from '../core/signing-context.js';
import { DEFAULT_KEY_ID, TOKEN_ALGORITHM, TOKEN_ISSUER } from '../core/types.js';

/**
 * Audit logging configuration
 */
export const AuditConfigSchema = z.object({
  enabled: z.boolean().optional().default(false).describe('Enable audit logging'),
  logAllAttempts: z
    .boolean()
    .optional()
    .default(true)
    .describe('Log successful events as well as failures'),
  maxEntries: z.number().int().min(1).max(1000000).optional().default(10000),
});

export const IdentityConfigSchema = z.object({
  secretName: z
    .string()
    .min(1)
    .optional()
    .default('JWT_SECRET')
    .describe('Logical name of the signing secret, resolved through the provider chain'),
  keyId: z.string().min(1).optional().default(DEFAULT_KEY_ID).describe('Key ID of the startup key'),
  algorithm: z.literal(TOKEN_ALGORITHM).optional().default(TOKEN_ALGORITHM),
  tokenTtlSeconds: z.number().int().positive().optional().default(900),
  refreshTtlSeconds: z.number().int().positive().optional().default(3600),
  clockTolerance: z
    .number()
    .int()
    .min(0)
    .max(300)
    .optional()
    .default(0)
    .describe('Clock skew tolerance in seconds (max 5 minutes)'),
  retainedKeys: z
    .number()
    .int()
    .min(0)
    .max(MAX_RETAINED_KEYS)
    .optional()
    .default(0)
    .describe('Previous keys still accepted for verification after a rotation'),
  realm: z.string().min(1).optional().default(TOKEN_ISSUER),
  audit: AuditConfigSchema.optional().default({}),
});

export type IdentityConfig = z.infer<typeof IdentityConfigSchema>;
export type IdentityConfigInput = z.input<typeof IdentityConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;

export const EnvironmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CONFIG_PATH: z.string().optional(),
  SECRETS_DIR: z.string().optional(),
});

export type Environment = z.infer<typeof EnvironmentSchema>;
