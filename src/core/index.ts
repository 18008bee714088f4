/**
 * Core Module - Public API
 */

export { Krb5Session, type Krb5SessionInit, type Krb5SessionOptions } from './krb5-session.js';
export {
  AcquisitionEngine,
  classifyAcquireFailure,
  type AcquisitionEngineOptions,
} from './acquisition-engine.js';
export { StorageCommitter, classifyStoreFailure } from './storage-committer.js';
export { LifetimeTracker, formatTimestamp } from './lifetime-tracker.js';
export { resolveScratchDir, withScratchCache, type ScratchCache } from './scratch-cache.js';
export { buildStore, buildCacheStore, describeStore, isDefaultStore } from './store-descriptor.js';
export {
  SessionConfigBuilder,
  resolveKeytab,
  withCacheRef,
  withKeytab,
  withPrincipal,
} from './session-config.js';
export { parsePrincipal, samePrincipal, type NameParser } from './principal.js';
export {
  AuditService,
  InMemoryAuditStorage,
  type AuditServiceConfig,
  type AuditStorage,
} from './audit-service.js';

export type {
  AcquireOptions,
  AcquireOutcome,
  AcquisitionErrorKind,
  AcquisitionResult,
  AuditEntry,
  CommitResult,
  CredentialSource,
  CredentialSourceType,
  SessionConfig,
  UnusableKind,
} from './types.js';
