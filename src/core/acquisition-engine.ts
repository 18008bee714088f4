/**
 * Acquisition Engine
 *
 * Three ways to obtain a TGT for a session's principal:
 * - default: whatever the configured (or default) store already holds
 * - key table: the store first, then a scratch FILE cache whose contents are
 *   committed into the caller's store
 * - password: a one-off acquisition, inspected and committed
 *
 * Every outcome of the library is normalised into an {@link AcquireOutcome};
 * entry points resolve with an {@link AcquisitionResult} and never reject
 * because of something the Kerberos authority reported.
 */

import { isGssError, type AcquireCredentialsRequest, type GssApi, type GssCredentials } from '../gssapi/types.js';
import { sanitizeError } from '../utils/errors.js';
import { AuditService } from './audit-service.js';
import { LifetimeTracker } from './lifetime-tracker.js';
import { withScratchCache } from './scratch-cache.js';
import { StorageCommitter } from './storage-committer.js';
import { buildCacheStore, buildStore } from './store-descriptor.js';
import type {
  AcquireOptions,
  AcquireOutcome,
  AcquisitionErrorKind,
  AcquisitionResult,
  AuditEntry,
  CommitResult,
  CredentialSourceType,
  SessionConfig,
} from './types.js';

export interface AcquisitionEngineOptions {
  lifetime?: LifetimeTracker;
  committer?: StorageCommitter;
  auditService?: AuditService;

  /** Parent directory of scratch caches (default: os.tmpdir()) */
  scratchDir?: string;
}

type FailedOutcome = Exclude<AcquireOutcome, { status: 'valid' }>;

/**
 * Normalise a library failure
 */
export function classifyAcquireFailure(error: unknown): FailedOutcome {
  const message = error instanceof Error ? error.message : 'Unknown error';
  if (!isGssError(error)) {
    return { status: 'unusable', kind: 'protocol', error: message };
  }
  switch (error.category) {
    case 'expired':
      return { status: 'expired' };
    case 'missing':
    case 'invalid':
      return { status: 'unusable', kind: error.category, error: message };
    default:
      return { status: 'unusable', kind: 'protocol', error: message };
  }
}

function errorKindOf(outcome: AcquireOutcome): AcquisitionErrorKind | undefined {
  switch (outcome.status) {
    case 'valid':
      return undefined;
    case 'expired':
      return 'expired';
    case 'unusable':
      return outcome.kind;
  }
}

function errorOf(outcome: AcquireOutcome): string | undefined {
  switch (outcome.status) {
    case 'valid':
      return undefined;
    case 'expired':
      return 'Credentials have expired';
    case 'unusable':
      return outcome.error;
  }
}

interface Completion {
  success: boolean;
  outcome: AcquireOutcome;
  errorKind?: AcquisitionErrorKind;
  error?: string;
  fallbackUsed: boolean;
  committed: boolean;
}

export class AcquisitionEngine {
  private readonly lifetime: LifetimeTracker;
  private readonly committer: StorageCommitter;
  private readonly auditService: AuditService;
  private readonly scratchDir?: string;

  constructor(
    private readonly gss: GssApi,
    options: AcquisitionEngineOptions = {}
  ) {
    this.lifetime = options.lifetime ?? new LifetimeTracker();
    this.committer = options.committer ?? new StorageCommitter(gss);
    this.auditService = options.auditService ?? new AuditService();
    this.scratchDir = options.scratchDir;
  }

  get tracker(): LifetimeTracker {
    return this.lifetime;
  }

  /**
   * One acquisition call against a store, normalised
   */
  async attemptAcquire(request: AcquireCredentialsRequest): Promise<AcquireOutcome> {
    return this.normalise(() => this.gss.acquireCredentials(request));
  }

  /**
   * Re-validate credentials already held
   */
  async inspect(credentials: GssCredentials): Promise<AcquireOutcome> {
    return this.normalise(async () => credentials);
  }

  async acquireFromDefault(
    config: SessionConfig,
    usage: AcquireOptions['usage'] = 'initiate'
  ): Promise<AcquisitionResult> {
    const outcome = await this.attemptAcquire({
      name: config.principal,
      usage,
      store: buildStore(config),
    });

    return this.finish('default', config, {
      success: outcome.status === 'valid',
      outcome,
      errorKind: errorKindOf(outcome),
      error: errorOf(outcome),
      fallbackUsed: false,
      committed: false,
    });
  }

  /**
   * Key-table acquisition
   *
   * `config.keytab` must already be validated (see Krb5Session.setKeyTab).
   */
  async acquireWithKeyTab(config: SessionConfig, options: AcquireOptions = {}): Promise<AcquisitionResult> {
    const usage = options.usage ?? 'initiate';
    const setDefault = options.setDefault ?? true;
    const overwrite = options.overwrite ?? true;

    const direct = await this.attemptAcquire({ name: config.principal, usage, store: buildStore(config) });
    if (direct.status === 'valid') {
      return this.finish('keytab', config, {
        success: true,
        outcome: direct,
        fallbackUsed: false,
        committed: false,
      });
    }

    console.debug(
      `[ACQUISITION-ENGINE] Direct key table acquisition for ${config.principal.text} gave ${
        errorKindOf(direct) ?? direct.status
      }, retrying through a scratch cache`
    );

    const completion = await withScratchCache(async (scratch) => {
      const fallback = await this.attemptAcquire({
        name: config.principal,
        usage,
        store: buildStore(config, { ccache: scratch.ccache }),
      });

      const commit = await this.committer.commit(
        fallback.status === 'valid' ? fallback.credentials : null,
        buildCacheStore(config),
        usage,
        setDefault,
        overwrite
      );
      return this.completeCommit(fallback, commit, true);
    }, this.scratchDir);

    return this.finish('keytab', config, completion);
  }

  /**
   * Password acquisition
   *
   * SECURITY ADVISORY: not suitable for production services or untrusted
   * transport. The plaintext password passes through this process; prefer a
   * key table.
   *
   * The password is encoded once; the encoded bytes are zero-filled before
   * this method returns.
   */
  async acquireWithPassword(
    config: SessionConfig,
    password: string,
    options: AcquireOptions = {}
  ): Promise<AcquisitionResult> {
    const usage = options.usage ?? 'initiate';
    const setDefault = options.setDefault ?? true;
    const overwrite = options.overwrite ?? true;

    const secret = new TextEncoder().encode(password);
    let credentials: GssCredentials;
    try {
      credentials = await this.gss.acquireCredentialsWithPassword({
        name: config.principal,
        password: secret,
        usage,
        mechs: ['krb5'],
      });
    } catch (error) {
      console.error(
        '[ACQUISITION-ENGINE] ✗ Unable to acquire Kerberos credentials to obtain a ticket-granting ticket (TGT)',
        sanitizeError(error)
      );
      this.lifetime.recordLifetime(null);
      const outcome = classifyAcquireFailure(error);
      return this.finish('password', config, {
        success: false,
        outcome,
        errorKind: errorKindOf(outcome),
        error: errorOf(outcome),
        fallbackUsed: false,
        committed: false,
      });
    } finally {
      secret.fill(0);
    }

    try {
      const outcome = await this.inspect(credentials);
      const commit = await this.committer.commit(
        outcome.status === 'valid' ? outcome.credentials : null,
        buildCacheStore(config),
        usage,
        setDefault,
        overwrite
      );
      return this.finish('password', config, this.completeCommit(outcome, commit, false));
    } finally {
      await this.release(credentials);
    }
  }

  private completeCommit(outcome: AcquireOutcome, commit: CommitResult, fallbackUsed: boolean): Completion {
    if (outcome.status !== 'valid') {
      return {
        success: false,
        outcome,
        errorKind: errorKindOf(outcome),
        error: errorOf(outcome),
        fallbackUsed,
        committed: false,
      };
    }
    if (!commit.success) {
      this.lifetime.recordLifetime(null);
    }
    return {
      success: commit.success,
      outcome,
      errorKind: commit.errorKind,
      error: commit.error,
      fallbackUsed,
      committed: commit.success,
    };
  }

  private async normalise(obtain: () => Promise<GssCredentials>): Promise<AcquireOutcome> {
    try {
      const credentials = await obtain();
      const inquired = await this.gss.inquireCredentials(credentials);
      this.lifetime.recordLifetime(inquired.lifetime);
      return { status: 'valid', credentials, lifetimeSeconds: inquired.lifetime };
    } catch (error) {
      this.lifetime.recordLifetime(null);
      const outcome = classifyAcquireFailure(error);
      if (outcome.status === 'expired') {
        console.debug('[ACQUISITION-ENGINE] Credentials have expired');
      } else if (outcome.kind === 'protocol') {
        console.error('[ACQUISITION-ENGINE] ✗ Kerberos library failure', sanitizeError(error));
      } else {
        console.debug(`[ACQUISITION-ENGINE] Credentials unusable (${outcome.kind}): ${outcome.error}`);
      }
      return outcome;
    }
  }

  private async release(credentials: GssCredentials): Promise<void> {
    try {
      await this.gss.releaseCredentials(credentials);
    } catch (error) {
      console.error('[ACQUISITION-ENGINE] ✗ Failed to release credentials', sanitizeError(error));
    }
  }

  private async finish(
    source: CredentialSourceType,
    config: SessionConfig,
    completion: Completion
  ): Promise<AcquisitionResult> {
    const auditTrail: AuditEntry = {
      timestamp: new Date(),
      source: `krb5:${source}`,
      userId: config.principal.text,
      action: `acquire_${source}`,
      success: completion.success,
      reason: completion.success
        ? `TGT available for ${config.principal.text}`
        : `Acquisition failed (${completion.errorKind ?? 'unknown'})`,
      error: completion.error,
      metadata: {
        ccache: config.ccache,
        keytab: config.keytab,
        outcome: completion.outcome.status,
        errorKind: completion.errorKind,
        fallbackUsed: completion.fallbackUsed,
        committed: completion.committed,
        expiresAt: this.lifetime.lifetime,
      },
    };
    try {
      await this.auditService.log(auditTrail);
    } catch (error) {
      console.error('[ACQUISITION-ENGINE] ✗ Failed to record audit entry', sanitizeError(error));
    }

    if (completion.success) {
      console.log(`[ACQUISITION-ENGINE] ✓ ${source} acquisition succeeded for ${config.principal.text}`);
    } else {
      console.log(
        `[ACQUISITION-ENGINE] ✗ ${source} acquisition failed for ${config.principal.text}: ${
          completion.errorKind ?? 'unknown'
        }`
      );
    }

    return {
      success: completion.success,
      source,
      outcome: completion.outcome.status,
      errorKind: completion.errorKind,
      error: completion.error,
      fallbackUsed: completion.fallbackUsed,
      committed: completion.committed,
      auditTrail,
    };
  }
}
