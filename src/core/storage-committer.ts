/**
 * Storage Committer
 *
 * Persists credentials into a store and reports the outcome as a value.
 * Nothing thrown by the library gets past commit().
 */

import {
  isGssError,
  type CredentialUsage,
  type GssApi,
  type GssCredentials,
  type StoreDescriptor,
} from '../gssapi/types.js';
import { sanitizeError } from '../utils/errors.js';
import { describeStore, isDefaultStore } from './store-descriptor.js';
import type { AcquisitionErrorKind, CommitResult } from './types.js';

/**
 * Map a storage failure onto the caller-visible error kind
 */
export function classifyStoreFailure(error: unknown): AcquisitionErrorKind {
  if (!isGssError(error)) {
    return 'protocol';
  }
  switch (error.category) {
    case 'store-error':
      return 'store-conflict';
    case 'unavailable':
      return 'store-unavailable';
    case 'duplicate-element':
      return 'duplicate-element';
    case 'expired':
      return 'expired';
    default:
      return 'protocol';
  }
}

export class StorageCommitter {
  constructor(private readonly gss: Pick<GssApi, 'storeCredentials'>) {}

  /**
   * Store credentials
   *
   * @param credentials - Handle to persist; null when nothing usable was acquired
   * @param store - Destination; null or empty means the default store
   */
  async commit(
    credentials: GssCredentials | null,
    store: StoreDescriptor | null,
    usage: CredentialUsage,
    setDefault: boolean,
    overwrite: boolean
  ): Promise<CommitResult> {
    const target = isDefaultStore(store) ? null : store;

    if (credentials === null) {
      console.error(`[STORAGE-COMMITTER] ✗ No usable credentials to store into ${describeStore(target)}`);
      return { success: false, errorKind: 'invalid', error: 'No usable credentials to store' };
    }

    try {
      await this.gss.storeCredentials(credentials, { store: target, usage, setDefault, overwrite });
      console.log(
        `[STORAGE-COMMITTER] ✓ Stored credentials for ${credentials.name.text} into ${describeStore(target)}`
      );
      return { success: true };
    } catch (error) {
      const errorKind = classifyStoreFailure(error);
      console.error(
        `[STORAGE-COMMITTER] ✗ Krb store failed, store: ${describeStore(target)} (${errorKind})`,
        sanitizeError(error)
      );
      return {
        success: false,
        errorKind,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}
