/**
 * MIT Kerberos command-line backend
 *
 * Implements the {@link GssApi} port on top of the MIT Kerberos user tools:
 * - `klist -c <cache>` decides whether a cache holds valid, expired or no
 *   credentials for a principal, and how long the TGT has left
 * - `kinit -k -t <keytab> -c <cache> <principal>` obtains a TGT from a key table
 * - `kinit -c <cache> <principal>` with the password on stdin obtains a TGT
 *   from a password, into a private scratch cache owned by the returned handle
 *
 * A store without a cache leaves `-c` out, so the tools use the library
 * default (KRB5CCNAME, else default_ccache_name from krb5.conf).
 *
 * Storing copies a FILE cache into a FILE destination. Other cache types
 * (KEYRING, KCM, DIR) are reported as unavailable.
 *
 * Tools run under the C locale so klist timestamps have a fixed layout.
 *
 * @module gssapi/mit-kerberos
 */

import { spawn } from 'node:child_process';
import { mkdtemp, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SystemClock, type Clock } from '../utils/clock.js';
import { classifyKinitFailure, firstLine } from './kinit-errors.js';
import { findTicketGrantingTicket, parseKlistOutput } from './klist-parser.js';
import { parsePrincipalName, principalMatches } from './principal-name.js';
import {
  GssError,
  type AcquireCredentialsRequest,
  type AcquireWithPasswordRequest,
  type CredentialUsage,
  type GssApi,
  type GssCredentials,
  type InquiredCredentials,
  type Principal,
  type StoreCredentialsOptions,
  type StoredCredentials,
} from './types.js';

// ============================================================================
// Command runner
// ============================================================================

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  env: NodeJS.ProcessEnv;
  timeoutMs: number;

  /** Bytes written to stdin; the runner zero-fills its copy once written */
  input?: Uint8Array;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions
) => Promise<CommandResult>;

/**
 * Run a command and collect its output
 *
 * Resolves with the exit status (non-zero on failure or timeout); rejects only
 * when the process cannot be started at all.
 */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, [...args], {
      env: options.env,
      timeout: options.timeoutMs,
    });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', reject);
    child.on('close', (code, signal) => {
      resolve({
        exitCode: code ?? 1,
        stdout,
        stderr: signal ? `${stderr}\nterminated by ${signal}` : stderr,
      });
    });

    if (options.input) {
      const buffer = Buffer.from(options.input);
      child.stdin.end(buffer, () => buffer.fill(0));
    } else {
      child.stdin.end();
    }
  });

// ============================================================================
// Backend
// ============================================================================

export interface MitKerberosOptions {
  /** kinit executable (default: "kinit" on PATH) */
  kinitPath?: string;

  /** klist executable (default: "klist" on PATH) */
  klistPath?: string;

  /** Per-command timeout in milliseconds (default: 30000) */
  timeoutMs?: number;

  /** Base environment for the tools (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Parent directory for password scratch caches (default: os.tmpdir()) */
  scratchDir?: string;

  runner?: CommandRunner;
  clock?: Clock;
}

type CacheState =
  | { status: 'valid'; lifetime: number }
  | { status: 'expired' }
  | { status: 'missing'; reason: string };

/**
 * Path of a FILE credential cache, or null for other cache types
 */
export function fileCachePath(ref: string): string | null {
  if (ref.startsWith('FILE:')) {
    return ref.slice('FILE:'.length);
  }
  // Residual "TYPE:" prefixes name non-file caches; a bare path is a file cache
  if (/^[A-Z][A-Z0-9]*:/.test(ref)) {
    return null;
  }
  return ref;
}

/**
 * Name of the default cache as reported by a bare `klist` run
 *
 * A populated cache is named on the "Ticket cache:" line. An empty one is
 * only named in the diagnostic, e.g. `No credentials cache found (filename:
 * /tmp/krb5cc_1000)` or `Credentials cache 'KCM:1000' not found`.
 */
export function defaultCacheFromKlist(result: CommandResult): string | null {
  if (result.exitCode === 0) {
    return parseKlistOutput(result.stdout).cacheName;
  }
  const file = /\(filename: ([^)]+)\)/.exec(result.stderr);
  if (file) {
    return `FILE:${file[1]}`;
  }
  const keyring = /cache keyring '([^']+)'/.exec(result.stderr);
  if (keyring) {
    return `KEYRING:${keyring[1]}`;
  }
  const named = /cache '([^']+)'/.exec(result.stderr);
  return named ? named[1] : null;
}

function cacheOption(ccache: string | null): string[] {
  return ccache === null ? [] : ['-c', ccache];
}

function describeCache(ccache: string | null): string {
  return ccache ?? 'the default cache';
}

export class MitKerberosGssApi implements GssApi {
  private readonly kinitPath: string;
  private readonly klistPath: string;
  private readonly timeoutMs: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly scratchDir: string;
  private readonly run: CommandRunner;
  private readonly clock: Clock;
  private readonly ownedCaches = new Map<GssCredentials, string>();

  constructor(options: MitKerberosOptions = {}) {
    this.kinitPath = options.kinitPath ?? 'kinit';
    this.klistPath = options.klistPath ?? 'klist';
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.env = { ...(options.env ?? process.env), LC_ALL: 'C', LANG: 'C' };
    this.scratchDir = options.scratchDir ?? tmpdir();
    this.run = options.runner ?? runCommand;
    this.clock = options.clock ?? new SystemClock();
  }

  parseName(raw: string): Principal {
    return parsePrincipalName(raw);
  }

  /**
   * Resolve the library default cache to a name
   *
   * Only needed to copy into it; reading and kinit leave the choice to the tools.
   */
  async locateDefaultCcache(): Promise<string | null> {
    const fromEnv = this.env.KRB5CCNAME;
    if (fromEnv) {
      return fromEnv;
    }
    return defaultCacheFromKlist(await this.exec(this.klistPath, []));
  }

  async acquireCredentials(request: AcquireCredentialsRequest): Promise<GssCredentials> {
    const { name, usage, store } = request;
    this.requireInitiate(usage);

    const ccache = store.ccache ?? null;
    const state = await this.inspectCache(ccache, name);

    if (state.status === 'valid') {
      return { name, usage, ccache };
    }

    if (store.client_keytab) {
      console.debug(
        `[MIT-KERBEROS] Obtaining TGT for ${name.text} from key table into ${describeCache(ccache)}`
      );
      await this.kinit(['-k', '-t', store.client_keytab, ...cacheOption(ccache), name.text]);
      return { name, usage, ccache };
    }

    if (state.status === 'expired') {
      throw new GssError('expired', `Credentials for ${name.text} in ${describeCache(ccache)} have expired`);
    }
    throw new GssError(
      'missing',
      `No credentials for ${name.text} in ${describeCache(ccache)}: ${state.reason}`
    );
  }

  async acquireCredentialsWithPassword(
    request: AcquireWithPasswordRequest
  ): Promise<GssCredentials> {
    const { name, password, usage, mechs } = request;
    this.requireInitiate(usage);

    if (!mechs.includes('krb5')) {
      throw new GssError('unavailable', 'Only the Kerberos mechanism is supported');
    }

    const dir = await mkdtemp(join(this.scratchDir, 'krb5-pw-'));
    const ccache = `FILE:${join(dir, 'ccache')}`;

    const input = new Uint8Array(password.length + 1);
    input.set(password);
    input[password.length] = 0x0a;

    try {
      console.debug(`[MIT-KERBEROS] Obtaining TGT for ${name.text} with password`);
      await this.kinit(['-c', ccache, name.text], input);
    } catch (error) {
      await rm(dir, { recursive: true, force: true });
      throw error;
    } finally {
      input.fill(0);
    }

    const credentials: GssCredentials = { name, usage, ccache };
    this.ownedCaches.set(credentials, dir);
    return credentials;
  }

  async inquireCredentials(credentials: GssCredentials): Promise<InquiredCredentials> {
    const state = await this.inspectCache(credentials.ccache, credentials.name);

    if (state.status === 'expired') {
      throw new GssError('expired', `Credentials for ${credentials.name.text} have expired`);
    }
    if (state.status === 'missing') {
      throw new GssError('missing', `No credentials for ${credentials.name.text}: ${state.reason}`);
    }

    return {
      name: credentials.name,
      lifetime: state.lifetime,
      usage: credentials.usage,
    };
  }

  async storeCredentials(
    credentials: GssCredentials,
    options: StoreCredentialsOptions
  ): Promise<StoredCredentials> {
    const stored: StoredCredentials = { elementsStored: ['krb5'], usageStored: options.usage };
    if ((options.store?.ccache ?? null) === credentials.ccache) {
      return stored;
    }

    const origin = credentials.ccache ?? (await this.locateDefaultCcache());
    const destination = options.store?.ccache ?? (await this.locateDefaultCcache());
    if (origin === null || destination === null) {
      throw new GssError('unavailable', 'Cannot determine the default credential cache');
    }
    if (origin === destination) {
      return stored;
    }

    const source = fileCachePath(origin);
    const target = fileCachePath(destination);
    if (source === null || target === null) {
      throw new GssError(
        'unavailable',
        `Cannot store credentials into ${destination}: only FILE caches are supported`
      );
    }

    if (!options.overwrite) {
      const existing = await this.inspectCache(destination, credentials.name);
      if (existing.status !== 'missing') {
        throw new GssError(
          'duplicate-element',
          `${destination} already holds credentials for ${credentials.name.text}`
        );
      }
    }

    // setDefault has no meaning for a single FILE cache; collections are unsupported above
    const staging = `${target}.${process.pid}.tmp`;
    try {
      const data = await readFile(source);
      await writeFile(staging, data, { mode: 0o600 });
      await rename(staging, target);
    } catch (error) {
      await rm(staging, { force: true });
      throw new GssError(
        'store-error',
        `Failed to write ${destination}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    return stored;
  }

  async releaseCredentials(credentials: GssCredentials): Promise<void> {
    const dir = this.ownedCaches.get(credentials);
    if (dir === undefined) {
      return;
    }
    this.ownedCaches.delete(credentials);
    await rm(dir, { recursive: true, force: true });
  }

  private requireInitiate(usage: CredentialUsage): void {
    if (usage !== 'initiate') {
      throw new GssError(
        'unavailable',
        `Credential usage "${usage}" is not supported by the kinit backend`
      );
    }
  }

  private async inspectCache(ccache: string | null, name: Principal): Promise<CacheState> {
    const result = await this.exec(this.klistPath, cacheOption(ccache));
    if (result.exitCode !== 0) {
      return { status: 'missing', reason: firstLine(result.stderr) };
    }

    const listing = parseKlistOutput(result.stdout);
    if (listing.defaultPrincipal === null || !principalMatches(name, listing.defaultPrincipal)) {
      return {
        status: 'missing',
        reason: `cache belongs to ${listing.defaultPrincipal ?? 'nobody'}`,
      };
    }

    const realm = name.realm ?? listing.defaultPrincipal.split('@').pop() ?? null;
    const tgt = findTicketGrantingTicket(listing, realm);
    if (!tgt) {
      return { status: 'missing', reason: 'no ticket-granting ticket in cache' };
    }

    const lifetime = Math.floor((tgt.expires.getTime() - this.clock.now().getTime()) / 1000);
    if (lifetime <= 0) {
      return { status: 'expired' };
    }
    return { status: 'valid', lifetime };
  }

  private async kinit(args: string[], input?: Uint8Array): Promise<void> {
    const result = await this.exec(this.kinitPath, args, input);
    if (result.exitCode !== 0) {
      const category = classifyKinitFailure(result.stderr);
      throw new GssError(category, `kinit failed: ${firstLine(result.stderr)}`, result.stderr.trim());
    }
  }

  private async exec(command: string, args: string[], input?: Uint8Array): Promise<CommandResult> {
    try {
      return await this.run(command, args, { env: this.env, timeoutMs: this.timeoutMs, input });
    } catch (error) {
      throw new GssError(
        'unavailable',
        `Cannot run ${command}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }
}
