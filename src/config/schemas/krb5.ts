/**
 * Kerberos TGT Session Configuration Schema
 *
 * One JSON document declares the command-line backend, the audit trail and
 * any number of named sessions. Passwords should be given as
 * `{"$secret": "NAME"}` descriptors; they are resolved before validation.
 *
 * @module config/schemas/krb5
 */

import { z } from 'zod';

// ============================================================================
// Session
// ============================================================================

export const CredentialUsageSchema = z.enum(['initiate', 'accept', 'both']);

export const Krb5SessionConfigSchema = z.object({
  principal: z
    .string()
    .min(1)
    .describe('Kerberos principal (e.g., svc-backup@EXAMPLE.COM or HTTP/web01.example.com@EXAMPLE.COM)'),
  ccache: z
    .string()
    .min(1)
    .optional()
    .describe('Credential cache (e.g., FILE:/var/run/backup/krb5cc); default cache when omitted'),
  keytab: z.string().min(1).optional().describe('Path to the key table holding the principal key'),
  password: z
    .string()
    .min(1)
    .optional()
    .describe('Password for the principal; prefer a key table in production'),
  usage: CredentialUsageSchema.optional().default('initiate').describe('Credential usage'),
  setDefault: z
    .boolean()
    .optional()
    .default(true)
    .describe('Make stored credentials the default of the cache collection'),
  overwrite: z
    .boolean()
    .optional()
    .default(true)
    .describe('Replace credentials already in the cache for the principal'),
});

// ============================================================================
// Backend
// ============================================================================

export const Krb5BackendConfigSchema = z.object({
  type: z.literal('mit').optional().default('mit').describe('MIT Kerberos kinit/klist tools'),
  kinitPath: z.string().min(1).optional().default('kinit').describe('kinit executable'),
  klistPath: z.string().min(1).optional().default('klist').describe('klist executable'),
  timeoutMs: z
    .number()
    .int()
    .min(1000)
    .max(300000)
    .optional()
    .default(30000)
    .describe('Per-command timeout in milliseconds (default: 30 seconds)'),
  scratchDir: z
    .string()
    .min(1)
    .optional()
    .describe('Parent directory of scratch credential caches (default: OS temp directory)'),
});

// ============================================================================
// Audit
// ============================================================================

export const Krb5AuditConfigSchema = z.object({
  enabled: z.boolean().optional().default(false).describe('Record acquisition attempts'),
  logAllAttempts: z
    .boolean()
    .optional()
    .default(true)
    .describe('Record successful attempts as well as failures'),
  maxEntries: z
    .number()
    .int()
    .min(1)
    .max(1000000)
    .optional()
    .default(10000)
    .describe('In-memory entries kept before the oldest is dropped'),
});

// ============================================================================
// Document
// ============================================================================

export const Krb5ConfigSchema = z.object({
  backend: Krb5BackendConfigSchema.optional().default({}),
  audit: Krb5AuditConfigSchema.optional().default({}),
  sessions: z
    .record(z.string().min(1), Krb5SessionConfigSchema)
    .refine((sessions) => Object.keys(sessions).length > 0, {
      message: 'At least one session must be configured',
    }),
});

// ============================================================================
// TypeScript Types
// ============================================================================

export type Krb5SessionConfig = z.infer<typeof Krb5SessionConfigSchema>;
export type Krb5BackendConfig = z.infer<typeof Krb5BackendConfigSchema>;
export type Krb5AuditConfig = z.infer<typeof Krb5AuditConfigSchema>;
export type Krb5Config = z.infer<typeof Krb5ConfigSchema>;

/**
 * @throws {z.ZodError}
 */
export function validateKrb5Config(config: unknown): Krb5Config {
  return Krb5ConfigSchema.parse(config);
}
