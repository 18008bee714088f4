/**
 * Core Types
 *
 * Shared types for the acquisition core: session configuration, the
 * normalised acquisition outcome and the result records handed to callers.
 */

import type { CredentialUsage, GssCredentials, Principal } from '../gssapi/types.js';

// ============================================================================
// Audit
// ============================================================================

/**
 * Audit trail entry for one credential operation
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** MANDATORY: Origin of the audit entry (e.g., 'krb5:keytab', 'secret:resolution') */
  source: string;

  /** Principal or system identity associated with the event */
  userId?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Human-readable reason for the result */
  reason?: string;

  /** Error message if the action failed */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}

// ============================================================================
// Session configuration
// ============================================================================

/**
 * Immutable session configuration
 *
 * Replaced as a whole whenever a field changes; see SessionConfigBuilder.
 */
export interface SessionConfig {
  readonly principal: Principal;

  /** Credential cache reference, null for the system default cache */
  readonly ccache: string | null;

  /** Absolute key table path, validated to exist when assigned */
  readonly keytab: string | null;
}

// ============================================================================
// Outcomes
// ============================================================================

/**
 * Failure kinds callers can observe on a result
 */
export type AcquisitionErrorKind =
  | 'expired'
  | 'missing'
  | 'invalid'
  | 'protocol'
  | 'store-conflict'
  | 'store-unavailable'
  | 'duplicate-element';

export type UnusableKind = Extract<AcquisitionErrorKind, 'missing' | 'invalid' | 'protocol'>;

/**
 * Normalised result of one acquisition attempt
 */
export type AcquireOutcome =
  | { status: 'valid'; credentials: GssCredentials; lifetimeSeconds: number | null }
  | { status: 'expired' }
  | { status: 'unusable'; kind: UnusableKind; error: string };

export interface CommitResult {
  success: boolean;
  errorKind?: AcquisitionErrorKind;
  error?: string;
}

// ============================================================================
// Acquisition requests and results
// ============================================================================

export type CredentialSourceType = 'default' | 'keytab' | 'password';

export interface AcquireOptions {
  /** Credential usage (default: 'initiate') */
  usage?: CredentialUsage;

  /** Make the stored credentials the default for the store (default: true) */
  setDefault?: boolean;

  /** Replace credentials already stored under the same name (default: true) */
  overwrite?: boolean;
}

/**
 * Where credentials should come from
 */
export type CredentialSource =
  | { type: 'default'; usage?: CredentialUsage }
  | { type: 'keytab'; path: string; options?: AcquireOptions }
  | { type: 'password'; password: string; options?: AcquireOptions };

/**
 * Detailed result of an acquisition entry point
 *
 * The public session methods reduce this to `success`.
 */
export interface AcquisitionResult {
  success: boolean;
  source: CredentialSourceType;

  /** Status of the last acquisition attempt made */
  outcome: AcquireOutcome['status'];

  errorKind?: AcquisitionErrorKind;
  error?: string;

  /** Key-table flow went through a scratch cache */
  fallbackUsed: boolean;

  /** Credentials were written into the caller's store */
  committed: boolean;

  auditTrail: AuditEntry;
}
