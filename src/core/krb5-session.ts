/**
 * Krb5Session - TGT manager for one principal
 *
 * Holds the session configuration and expiry, and exposes the acquisition
 * entry points as boolean results. The detailed outcome of the last call is
 * kept in {@link Krb5Session.lastResult}.
 *
 * SECURITY ADVISORY: password acquisition hands the plaintext password to
 * this process and is unsuitable for production or untrusted transport.
 * Services should acquire from a key table.
 *
 * @example
 * ```typescript
 * const session = new Krb5Session(new MitKerberosGssApi(), {
 *   principal: 'svc-backup@EXAMPLE.COM',
 *   ccache: 'FILE:/var/run/backup/krb5cc',
 * });
 *
 * if (await session.acquireWithKeyTab('/etc/krb5/backup.keytab')) {
 *   console.log(`TGT valid until ${session.lifetime}`);
 * }
 * ```
 */

import type { CredentialUsage, GssApi, Principal, StoreDescriptor } from '../gssapi/types.js';
import { SystemClock, type Clock } from '../utils/clock.js';
import { AcquisitionEngine } from './acquisition-engine.js';
import type { AuditService } from './audit-service.js';
import { LifetimeTracker } from './lifetime-tracker.js';
import { resolveScratchDir } from './scratch-cache.js';
import { SessionConfigBuilder, withCacheRef, withKeytab, withPrincipal } from './session-config.js';
import { buildStore } from './store-descriptor.js';
import type {
  AcquireOptions,
  AcquisitionResult,
  CredentialSource,
  SessionConfig,
} from './types.js';

export interface Krb5SessionInit {
  principal: string;
  ccache?: string | null;
  keytab?: string | null;
}

export interface Krb5SessionOptions {
  auditService?: AuditService;

  /** Parent directory of scratch caches (default: os.tmpdir()) */
  scratchDir?: string;

  clock?: Clock;
}

export class Krb5Session {
  private current: SessionConfig;
  private readonly tracker: LifetimeTracker;
  private readonly engine: AcquisitionEngine;
  private last: AcquisitionResult | null = null;

  /**
   * @throws {InvalidPrincipalError} when the principal does not parse
   * @throws {KeytabNotFoundError} when an initial key table does not exist
   * @throws {ConfigurationError} when the scratch directory does not exist
   */
  constructor(
    private readonly gss: GssApi,
    init: Krb5SessionInit,
    options: Krb5SessionOptions = {}
  ) {
    this.current = new SessionConfigBuilder(gss)
      .principal(init.principal)
      .ccache(init.ccache ?? null)
      .keytab(init.keytab ?? null)
      .build();
    this.tracker = new LifetimeTracker(options.clock ?? new SystemClock());
    this.engine = new AcquisitionEngine(gss, {
      lifetime: this.tracker,
      auditService: options.auditService,
      scratchDir: options.scratchDir === undefined ? undefined : resolveScratchDir(options.scratchDir),
    });
  }

  get principal(): Principal {
    return this.current.principal;
  }

  get ccache(): string | null {
    return this.current.ccache;
  }

  get keytab(): string | null {
    return this.current.keytab;
  }

  /** Store mapping derived from the current configuration */
  get store(): StoreDescriptor {
    return buildStore(this.current);
  }

  get config(): SessionConfig {
    return this.current;
  }

  get expiresAt(): Date | null {
    return this.tracker.expiresAt;
  }

  /** Expiry as "YYYY-MM-DD HH:mm:ss" local time, null when unknown */
  get lifetime(): string | null {
    return this.tracker.lifetime;
  }

  get lastResult(): AcquisitionResult | null {
    return this.last;
  }

  /**
   * @throws {InvalidPrincipalError} configuration unchanged
   */
  setPrincipal(raw: string): Principal {
    this.current = withPrincipal(this.current, this.gss, raw);
    return this.current.principal;
  }

  setCacheRef(ref: string | null): void {
    this.current = withCacheRef(this.current, ref);
  }

  /**
   * @returns the absolute path recorded
   * @throws {KeytabNotFoundError} configuration unchanged
   */
  setKeyTab(path: string): string {
    this.current = withKeytab(this.current, path);
    return this.current.keytab ?? path;
  }

  async acquireFromDefault(usage: CredentialUsage = 'initiate'): Promise<boolean> {
    return this.record(await this.engine.acquireFromDefault(this.current, usage));
  }

  /**
   * @throws {KeytabNotFoundError} before any acquisition is attempted
   */
  async acquireWithKeyTab(path: string, options: AcquireOptions = {}): Promise<boolean> {
    this.setKeyTab(path);
    return this.record(await this.engine.acquireWithKeyTab(this.current, options));
  }

  /**
   * Obtain a TGT from a password and store it in the session cache
   *
   * SECURITY ADVISORY: for interactive or test use only. The password is
   * plaintext in memory; use {@link Krb5Session.acquireWithKeyTab} for services.
   */
  async acquireWithPassword(password: string, options: AcquireOptions = {}): Promise<boolean> {
    return this.record(await this.engine.acquireWithPassword(this.current, password, options));
  }

  async acquire(source: CredentialSource): Promise<boolean> {
    switch (source.type) {
      case 'default':
        return this.acquireFromDefault(source.usage);
      case 'keytab':
        return this.acquireWithKeyTab(source.path, source.options);
      case 'password':
        return this.acquireWithPassword(source.password, source.options);
    }
  }

  /**
   * Live check against the credential store
   *
   * True when the store holds expired, missing or invalid credentials for the
   * principal; false when they are valid or the library failed otherwise.
   * Refreshes the expiry as a side effect. Not an acquisition: lastResult
   * and the audit trail are left alone.
   */
  async isExpired(): Promise<boolean> {
    const outcome = await this.engine.attemptAcquire({
      name: this.current.principal,
      usage: 'initiate',
      store: buildStore(this.current),
    });
    return outcome.status === 'expired' || (outcome.status === 'unusable' && outcome.kind !== 'protocol');
  }

  private record(result: AcquisitionResult): boolean {
    this.last = result;
    return result.success;
  }
}
