/**
 * Credential Store Descriptor
 *
 * Pure function of a session configuration. Never memoized: the acquisition
 * engine builds a one-off descriptor with a scratch cache while the session's
 * own configuration stays as it is.
 */

import type { StoreDescriptor } from '../gssapi/types.js';
import type { SessionConfig } from './types.js';

/**
 * Build the store mapping for the library
 *
 * @param config - Key table and cache of the session
 * @param overrides - Entries that replace the session's for this call only
 * @returns `{}` when nothing is set, meaning the process defaults
 */
export function buildStore(
  config: Pick<SessionConfig, 'keytab' | 'ccache'>,
  overrides: StoreDescriptor = {}
): StoreDescriptor {
  const store: StoreDescriptor = {};
  if (config.keytab) {
    store.client_keytab = config.keytab;
  }
  if (config.ccache) {
    store.ccache = config.ccache;
  }
  return { ...store, ...overrides };
}

/**
 * Destination for committed credentials: the session's cache only, or null
 * for the default store
 */
export function buildCacheStore(config: Pick<SessionConfig, 'ccache'>): StoreDescriptor | null {
  return config.ccache ? { ccache: config.ccache } : null;
}

export function isDefaultStore(store: StoreDescriptor | null): boolean {
  return store === null || (store.client_keytab === undefined && store.ccache === undefined);
}

export function describeStore(store: StoreDescriptor | null): string {
  if (isDefaultStore(store)) {
    return 'default store';
  }
  return Object.entries(store ?? {})
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');
}
