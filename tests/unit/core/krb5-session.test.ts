/**
 * Krb5Session Tests
 *
 * End-to-end acquisition scenarios through the public facade.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import { Krb5Session } from '../../../src/core/krb5-session.js';
import { FakeGssApi } from '../../../src/testing/fake-gssapi.js';
import { FixedClock } from '../../../src/utils/clock.js';
import { ConfigurationError, InvalidPrincipalError, KeytabNotFoundError } from '../../../src/utils/errors.js';

describe('Krb5Session', () => {
  let clock: FixedClock;
  let dir: string;
  let scratchDir: string;
  let keytab: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    clock = new FixedClock(new Date(2026, 9, 19, 12, 0, 0));
    dir = await mkdtemp(join(tmpdir(), 'krb5-session-test-'));
    scratchDir = join(dir, 'scratch');
    await mkdir(scratchDir);
    keytab = join(dir, 'svc.keytab');
    await writeFile(keytab, 'not really a keytab');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('construction', () => {
    it('should expose the validated configuration', () => {
      const gss = new FakeGssApi({ clock });
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM', ccache: 'FILE:/tmp/alice' });

      expect(session.principal.text).toBe('alice@EXAMPLE.COM');
      expect(session.ccache).toBe('FILE:/tmp/alice');
      expect(session.keytab).toBeNull();
      expect(session.store).toEqual({ ccache: 'FILE:/tmp/alice' });
      expect(session.config.principal).toBe(session.principal);
      expect(session.expiresAt).toBeNull();
      expect(session.lifetime).toBeNull();
      expect(session.lastResult).toBeNull();
    });

    it('should reject an invalid principal', () => {
      expect(() => new Krb5Session(new FakeGssApi(), { principal: 'a@b@c' })).toThrow(
        InvalidPrincipalError
      );
    });

    it('should reject a missing initial key table', () => {
      expect(
        () => new Krb5Session(new FakeGssApi(), { principal: 'svc@EXAMPLE.COM', keytab: join(dir, 'absent') })
      ).toThrow(KeytabNotFoundError);
    });

    it('should reject a scratch directory that does not exist', () => {
      const missing = join(dir, 'missing');

      expect(
        () => new Krb5Session(new FakeGssApi(), { principal: 'svc@EXAMPLE.COM' }, { scratchDir: missing })
      ).toThrow(new ConfigurationError(`scratch directory '${missing}' does not exist`));
    });
  });

  describe('setters', () => {
    it('should keep the previous principal when a new one is rejected', () => {
      const session = new Krb5Session(new FakeGssApi(), { principal: 'alice@EXAMPLE.COM' });

      expect(() => session.setPrincipal('a@b@c')).toThrow(
        'Invalid Kerberos principal "a@b@c": more than one realm separator'
      );
      expect(session.principal.text).toBe('alice@EXAMPLE.COM');

      expect(session.setPrincipal('bob@EXAMPLE.COM').text).toBe('bob@EXAMPLE.COM');
      expect(session.principal.text).toBe('bob@EXAMPLE.COM');
    });

    it('should keep the previous key table when a new one is missing', () => {
      const session = new Krb5Session(new FakeGssApi(), { principal: 'svc@EXAMPLE.COM' });
      expect(session.setKeyTab(keytab)).toBe(keytab);

      expect(() => session.setKeyTab(join(dir, 'absent.keytab'))).toThrow(KeytabNotFoundError);
      expect(session.keytab).toBe(keytab);
    });

    it('should derive the store from the current configuration', () => {
      const session = new Krb5Session(new FakeGssApi(), { principal: 'svc@EXAMPLE.COM' });
      expect(session.store).toEqual({});

      session.setCacheRef('KEYRING:persistent:1000');
      session.setKeyTab(keytab);

      expect(session.store).toEqual({ client_keytab: keytab, ccache: 'KEYRING:persistent:1000' });

      session.setCacheRef(null);
      expect(session.store).toEqual({ client_keytab: keytab });
    });
  });

  describe('default acquisition', () => {
    it('should succeed with valid credentials in the default cache', async () => {
      const gss = new FakeGssApi({ clock });
      gss.seedCache('FILE:/tmp/krb5cc_fake', 'alice@EXAMPLE.COM', 3600);
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM' }, { clock });

      await expect(session.acquireFromDefault()).resolves.toBe(true);

      expect(session.lifetime).toBe('2026-10-19 13:00:00');
      expect(session.expiresAt).toEqual(new Date(2026, 9, 19, 13, 0, 0));
      expect(session.lastResult).toMatchObject({ source: 'default', outcome: 'valid', success: true });
    });

    it('should fail on expired credentials and clear the lifetime', async () => {
      const gss = new FakeGssApi({ clock });
      gss.seedCache('FILE:/tmp/krb5cc_fake', 'alice@EXAMPLE.COM', -60);
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM' }, { clock });

      await expect(session.acquireFromDefault()).resolves.toBe(false);

      expect(session.lifetime).toBeNull();
      expect(session.lastResult?.errorKind).toBe('expired');
    });

    it('should give the same result when repeated', async () => {
      const gss = new FakeGssApi({ clock });
      gss.seedCache('FILE:/tmp/krb5cc_fake', 'alice@EXAMPLE.COM', 3600);
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM' }, { clock });

      await expect(session.acquireFromDefault()).resolves.toBe(true);
      const first = session.lifetime;
      await expect(session.acquireFromDefault()).resolves.toBe(true);

      expect(session.lifetime).toBe(first);
      expect(gss.entries('FILE:/tmp/krb5cc_fake')).toHaveLength(1);
      expect(gss.calls.filter((c) => c.operation === 'store')).toEqual([]);
    });
  });

  describe('isExpired', () => {
    it('should be false for valid credentials', async () => {
      const gss = new FakeGssApi({ clock });
      gss.seedCache('FILE:/tmp/krb5cc_fake', 'alice@EXAMPLE.COM', 3600);
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM' }, { clock });

      await expect(session.isExpired()).resolves.toBe(false);
    });

    it('should be true for expired credentials', async () => {
      const gss = new FakeGssApi({ clock });
      gss.seedCache('FILE:/tmp/krb5cc_fake', 'alice@EXAMPLE.COM', -60);
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM' }, { clock });

      await expect(session.isExpired()).resolves.toBe(true);
    });

    it('should be true when there are no credentials', async () => {
      const session = new Krb5Session(new FakeGssApi({ clock }), { principal: 'alice@EXAMPLE.COM' });

      await expect(session.isExpired()).resolves.toBe(true);
    });

    it('should be false for protocol failures', async () => {
      const gss = new FakeGssApi({ clock });
      gss.registerKeytab(keytab, 'svc@EXAMPLE.COM');
      gss.setKdcReachable(false);
      const session = new Krb5Session(gss, { principal: 'svc@EXAMPLE.COM', keytab }, { clock });

      await expect(session.isExpired()).resolves.toBe(false);
    });

    it('should check the store live instead of the recorded expiry', async () => {
      const gss = new FakeGssApi({ clock });
      gss.seedCache('FILE:/tmp/krb5cc_fake', 'alice@EXAMPLE.COM', 3600);
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM' }, { clock });
      await session.acquireFromDefault();

      clock.advance(7200);

      await expect(session.isExpired()).resolves.toBe(true);
      expect(session.lastResult?.success).toBe(true);
    });

    it('should not be recorded as an acquisition', async () => {
      const auditService = new AuditService({ enabled: true });
      const session = new Krb5Session(new FakeGssApi({ clock }), { principal: 'alice@EXAMPLE.COM' }, { clock, auditService });

      await expect(session.isExpired()).resolves.toBe(true);

      expect((auditService._getStorage() as InMemoryAuditStorage).getEntries()).toEqual([]);
      expect(session.lastResult).toBeNull();
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('key table acquisition', () => {
    it('should raise before any acquisition when the key table is missing', async () => {
      const gss = new FakeGssApi({ clock });
      const session = new Krb5Session(gss, { principal: 'svc@EXAMPLE.COM' }, { clock, scratchDir });

      await expect(session.acquireWithKeyTab('/nonexistent/svc.keytab')).rejects.toThrow(
        KeytabNotFoundError
      );

      expect(gss.calls).toEqual([]);
      expect(session.keytab).toBeNull();
      expect(session.lastResult).toBeNull();
    });

    it('should fall back to a scratch cache and leave nothing behind', async () => {
      const gss = new FakeGssApi({ clock, fileOnlyKeytabAcquisition: true, writeFileCaches: true });
      gss.registerKeytab(keytab, 'svc@EXAMPLE.COM');
      const session = new Krb5Session(
        gss,
        { principal: 'svc@EXAMPLE.COM', ccache: 'KEYRING:persistent:1000' },
        { clock, scratchDir }
      );

      await expect(session.acquireWithKeyTab(keytab)).resolves.toBe(true);

      expect(session.keytab).toBe(keytab);
      expect(session.ccache).toBe('KEYRING:persistent:1000');
      expect(session.lastResult).toMatchObject({ fallbackUsed: true, committed: true });
      expect(session.lifetime).toBe('2026-10-19 22:00:00');
      expect(gss.entries('KEYRING:persistent:1000').map((e) => e.principal)).toEqual(['svc@EXAMPLE.COM']);
      expect(await readdir(scratchDir)).toEqual([]);
    });

    it('should make the key table TGT visible to a default acquisition', async () => {
      const gss = new FakeGssApi({ clock });
      gss.registerKeytab(keytab, 'svc@EXAMPLE.COM');
      const session = new Krb5Session(gss, { principal: 'svc@EXAMPLE.COM', ccache: 'FILE:/tmp/svc' }, { clock, scratchDir });

      await expect(session.acquireWithKeyTab(keytab)).resolves.toBe(true);
      await expect(session.acquireFromDefault()).resolves.toBe(true);

      expect(session.lastResult).toMatchObject({ source: 'default', outcome: 'valid' });
      expect(session.lifetime).toBe('2026-10-19 22:00:00');
    });

    it('should hold one entry after acquiring twice', async () => {
      const gss = new FakeGssApi({ clock, fileOnlyKeytabAcquisition: true });
      gss.registerKeytab(keytab, 'svc@EXAMPLE.COM');
      const session = new Krb5Session(
        gss,
        { principal: 'svc@EXAMPLE.COM', ccache: 'KEYRING:persistent:1000' },
        { clock, scratchDir }
      );

      await expect(session.acquireWithKeyTab(keytab, { overwrite: true })).resolves.toBe(true);
      await expect(session.acquireWithKeyTab(keytab, { overwrite: true })).resolves.toBe(true);

      expect(gss.entries('KEYRING:persistent:1000').map((e) => e.principal)).toEqual(['svc@EXAMPLE.COM']);
      expect(await readdir(scratchDir)).toEqual([]);
    });

    it('should report duplicate credentials when overwrite is off', async () => {
      const gss = new FakeGssApi({ clock, fileOnlyKeytabAcquisition: true });
      gss.registerKeytab(keytab, 'svc@EXAMPLE.COM');
      gss.seedCache('KEYRING:persistent:1000', 'svc@EXAMPLE.COM', -60);
      const session = new Krb5Session(
        gss,
        { principal: 'svc@EXAMPLE.COM', ccache: 'KEYRING:persistent:1000' },
        { clock, scratchDir }
      );

      await expect(session.acquireWithKeyTab(keytab, { overwrite: false })).resolves.toBe(false);

      expect(session.lastResult?.errorKind).toBe('duplicate-element');
      expect(await readdir(scratchDir)).toEqual([]);
    });
  });

  describe('password acquisition', () => {
    it('should store credentials in the session cache', async () => {
      const gss = new FakeGssApi({ clock });
      gss.registerPassword('alice@EXAMPLE.COM', 'test-secret');
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM', ccache: 'FILE:/tmp/alice' }, { clock });

      await expect(session.acquireWithPassword('test-secret')).resolves.toBe(true);

      expect(gss.cacheNames()).toEqual(['FILE:/tmp/alice']);
      expect(session.lifetime).toBe('2026-10-19 22:00:00');
    });

    it('should fail on a wrong password without writing anything', async () => {
      const gss = new FakeGssApi({ clock });
      gss.registerPassword('alice@EXAMPLE.COM', 'test-secret');
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM', ccache: 'FILE:/tmp/alice' }, { clock });

      await expect(session.acquireWithPassword('wrong-secret')).resolves.toBe(false);

      expect(session.lastResult?.errorKind).toBe('invalid');
      expect(gss.cacheNames()).toEqual([]);
    });

    it('should report an unknown principal as missing', async () => {
      const session = new Krb5Session(new FakeGssApi({ clock }), { principal: 'nobody@EXAMPLE.COM' }, { clock });

      await expect(session.acquireWithPassword('test-secret')).resolves.toBe(false);

      expect(session.lastResult?.errorKind).toBe('missing');
    });

    it('should report a store conflict and still release the handle', async () => {
      const gss = new FakeGssApi({ clock });
      gss.registerPassword('alice@EXAMPLE.COM', 'test-secret');
      gss.failNextStore('store-error');
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM', ccache: 'FILE:/tmp/alice' }, { clock });

      await expect(session.acquireWithPassword('test-secret')).resolves.toBe(false);

      expect(session.lastResult?.errorKind).toBe('store-conflict');
      expect(session.lifetime).toBeNull();
      expect(gss.calls.map((c) => c.operation)).toEqual([
        'acquire-with-password',
        'inquire',
        'store',
        'release',
      ]);
    });
  });

  describe('acquire', () => {
    it('should dispatch on the credential source', async () => {
      const gss = new FakeGssApi({ clock });
      gss.registerPassword('alice@EXAMPLE.COM', 'test-secret');
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM' }, { clock });

      await expect(session.acquire({ type: 'password', password: 'test-secret' })).resolves.toBe(true);
      expect(session.lastResult?.source).toBe('password');

      await expect(session.acquire({ type: 'default' })).resolves.toBe(true);
      expect(session.lastResult?.source).toBe('default');
    });

    it('should validate key table sources', async () => {
      const session = new Krb5Session(new FakeGssApi({ clock }), { principal: 'svc@EXAMPLE.COM' });

      await expect(session.acquire({ type: 'keytab', path: join(dir, 'absent.keytab') })).rejects.toThrow(
        KeytabNotFoundError
      );
    });
  });

  describe('audit trail', () => {
    it('should record one entry per acquisition', async () => {
      const auditService = new AuditService({ enabled: true });
      const gss = new FakeGssApi({ clock });
      gss.seedCache('FILE:/tmp/krb5cc_fake', 'alice@EXAMPLE.COM', 3600);
      const session = new Krb5Session(gss, { principal: 'alice@EXAMPLE.COM' }, { clock, auditService });

      await session.acquireFromDefault();

      const storage = auditService._getStorage() as InMemoryAuditStorage;
      const entries = storage.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        source: 'krb5:default',
        userId: 'alice@EXAMPLE.COM',
        action: 'acquire_default',
        success: true,
        reason: 'TGT available for alice@EXAMPLE.COM',
      });
      expect(entries[0].metadata).toMatchObject({ expiresAt: '2026-10-19 13:00:00', fallbackUsed: false });
    });

    it('should still answer when the audit storage fails', async () => {
      const auditService = new AuditService({
        enabled: true,
        storage: {
          log: async () => {
            throw new Error('disk full');
          },
        },
      });
      const session = new Krb5Session(new FakeGssApi({ clock }), { principal: 'alice@EXAMPLE.COM' }, { clock, auditService });

      await expect(session.acquireFromDefault()).resolves.toBe(false);

      expect(session.lastResult?.errorKind).toBe('missing');
      expect(console.error).toHaveBeenCalledWith(
        '[ACQUISITION-ENGINE] ✗ Failed to record audit entry',
        expect.objectContaining({ message: 'disk full' })
      );
    });
  });
});
