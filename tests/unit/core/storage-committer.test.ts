/**
 * Storage Committer Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { StorageCommitter, classifyStoreFailure } from '../../../src/core/storage-committer.js';
import { parsePrincipalName } from '../../../src/gssapi/principal-name.js';
import { GssError, type GssCredentials, type GssErrorCategory } from '../../../src/gssapi/types.js';
import { FakeGssApi } from '../../../src/testing/fake-gssapi.js';
import { FixedClock } from '../../../src/utils/clock.js';

const ALICE = parsePrincipalName('alice@EXAMPLE.COM');

describe('classifyStoreFailure', () => {
  it.each<[GssErrorCategory, string]>([
    ['store-error', 'store-conflict'],
    ['unavailable', 'store-unavailable'],
    ['duplicate-element', 'duplicate-element'],
    ['expired', 'expired'],
    ['missing', 'protocol'],
    ['failure', 'protocol'],
  ])('should map %s to %s', (category, kind) => {
    expect(classifyStoreFailure(new GssError(category, 'x'))).toBe(kind);
  });

  it('should treat foreign errors as protocol failures', () => {
    expect(classifyStoreFailure(new TypeError('boom'))).toBe('protocol');
    expect(classifyStoreFailure('boom')).toBe('protocol');
  });
});

describe('StorageCommitter', () => {
  let gss: FakeGssApi;
  let committer: StorageCommitter;
  let credentials: GssCredentials;

  beforeEach(() => {
    gss = new FakeGssApi({ clock: new FixedClock(new Date(2026, 9, 19, 12, 0, 0)) });
    committer = new StorageCommitter(gss);
    credentials = { name: ALICE, usage: 'initiate', ccache: 'MEMORY:source' };
    gss.seedCache('MEMORY:source', 'alice@EXAMPLE.COM', 3600);
  });

  it('should store credentials into the given cache', async () => {
    const result = await committer.commit(credentials, { ccache: 'FILE:/tmp/dst' }, 'initiate', true, true);

    expect(result).toEqual({ success: true });
    expect(gss.entries('FILE:/tmp/dst').map((e) => e.principal)).toEqual(['alice@EXAMPLE.COM']);
    expect(gss.calls).toEqual([
      {
        operation: 'store',
        from: 'MEMORY:source',
        to: 'FILE:/tmp/dst',
        usage: 'initiate',
        setDefault: true,
        overwrite: true,
      },
    ]);
  });

  it('should pass an empty store as the default store', async () => {
    const storeCredentials = vi.spyOn(gss, 'storeCredentials');

    await committer.commit(credentials, {}, 'initiate', false, true);

    expect(storeCredentials).toHaveBeenCalledWith(credentials, {
      store: null,
      usage: 'initiate',
      setDefault: false,
      overwrite: true,
    });
    expect(gss.entries('FILE:/tmp/krb5cc_fake')).toHaveLength(1);
  });

  it('should not call the library without credentials', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const result = await committer.commit(null, { ccache: 'FILE:/tmp/dst' }, 'initiate', true, true);

    expect(result).toEqual({
      success: false,
      errorKind: 'invalid',
      error: 'No usable credentials to store',
    });
    expect(gss.calls).toEqual([]);
    errorSpy.mockRestore();
  });

  it('should report store failures without throwing', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    gss.failNextStore('store-error');

    const result = await committer.commit(credentials, { ccache: 'FILE:/tmp/dst' }, 'initiate', true, true);

    expect(result).toEqual({
      success: false,
      errorKind: 'store-conflict',
      error: 'Simulated store-error while storing into FILE:/tmp/dst',
    });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });

  it('should report expired source credentials', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    gss.seedCache('MEMORY:source', 'alice@EXAMPLE.COM', -60);

    const result = await committer.commit(credentials, { ccache: 'FILE:/tmp/dst' }, 'initiate', true, true);

    expect(result.errorKind).toBe('expired');
    vi.restoreAllMocks();
  });

  it('should refuse to replace credentials when overwrite is off', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    gss.seedCache('FILE:/tmp/dst', 'alice@EXAMPLE.COM', 60);

    const result = await committer.commit(credentials, { ccache: 'FILE:/tmp/dst' }, 'initiate', true, false);

    expect(result).toEqual({
      success: false,
      errorKind: 'duplicate-element',
      error: 'FILE:/tmp/dst already holds credentials for alice@EXAMPLE.COM',
    });
    vi.restoreAllMocks();
  });
});
