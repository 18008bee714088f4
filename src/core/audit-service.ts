/**
 * Audit Service - Credential Operation Trail with Null Object Pattern
 *
 * Write-only record of acquisition attempts and secret resolutions.
 * Works without configuration (disabled by default).
 */

import type { AuditEntry } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Record successful attempts too, not just failures (default: true) */
  logAllAttempts?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Maximum in-memory entries before overflow (default: 10000) */
  maxEntries?: number;

  /** Invoked with every retained entry when in-memory storage overflows */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage interface for audit entries
 *
 * Write-only: querying belongs to whatever indexed store backs it.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

/**
 * Default in-memory audit storage, bounded, oldest entry dropped on overflow
 */
class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];
  private readonly maxEntries: number;
  private readonly onOverflow?: (entries: AuditEntry[]) => void;

  constructor(maxEntries: number = 10000, onOverflow?: (entries: AuditEntry[]) => void) {
    this.maxEntries = maxEntries;
    this.onOverflow = onOverflow;
  }

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      // Hand over everything before the oldest entry is dropped
      this.onOverflow?.([...this.entries]);
      this.entries.shift();
    }
  }

  /**
   * @internal
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /**
   * @internal
   */
  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service (Null Object Pattern)
// ============================================================================

/**
 * @example
 * ```typescript
 * const audit = new AuditService({ enabled: true, logAllAttempts: false });
 * const session = new Krb5Session(gss, { principal: 'svc@EXAMPLE.COM' }, { auditService: audit });
 * ```
 */
export class AuditService {
  private readonly enabled: boolean;
  private readonly logAllAttempts: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.logAllAttempts = config?.logAllAttempts ?? true;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries, config?.onOverflow);
  }

  /**
   * Record an audit entry
   *
   * @throws {Error} when the entry has no source
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error(
        'AuditEntry missing required field: source. ' +
          'All audit entries must include a source field for audit trail integrity.'
      );
    }

    if (entry.success && !this.logAllAttempts) {
      return;
    }

    await this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * @internal
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}

export { InMemoryAuditStorage };
