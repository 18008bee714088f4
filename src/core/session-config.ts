/**
 * Identity Model - session configuration
 *
 * A SessionConfig is an immutable value. Every setter returns a new value and
 * leaves the old one untouched, so a failed validation never disturbs the
 * current configuration.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Principal } from '../gssapi/types.js';
import { Krb5Errors, KeytabNotFoundError } from '../utils/errors.js';
import { parsePrincipal, type NameParser } from './principal.js';
import type { SessionConfig } from './types.js';

/**
 * Resolve a key table path to an absolute path and check that it exists
 *
 * Pre-flight only: the file is not opened.
 *
 * @throws {KeytabNotFoundError}
 */
export function resolveKeytab(path: string): string {
  const absolute = resolve(path);
  if (!existsSync(absolute)) {
    throw new KeytabNotFoundError(path);
  }
  return absolute;
}

function freeze(config: SessionConfig): SessionConfig {
  return Object.freeze({ ...config });
}

export function withPrincipal(config: SessionConfig, parser: NameParser, raw: string): SessionConfig {
  return freeze({ ...config, principal: parsePrincipal(parser, raw) });
}

/**
 * Cache references are stored verbatim; the library validates them on use
 */
export function withCacheRef(config: SessionConfig, ref: string | null): SessionConfig {
  return freeze({ ...config, ccache: ref });
}

export function withKeytab(config: SessionConfig, path: string | null): SessionConfig {
  return freeze({ ...config, keytab: path === null ? null : resolveKeytab(path) });
}

/**
 * Validates every field as it is set
 *
 * @example
 * ```typescript
 * const config = new SessionConfigBuilder(gss)
 *   .principal('svc-backup@EXAMPLE.COM')
 *   .ccache('FILE:/var/run/backup/krb5cc')
 *   .keytab('/etc/krb5/backup.keytab')
 *   .build();
 * ```
 */
export class SessionConfigBuilder {
  private principalValue?: Principal;
  private ccacheValue: string | null = null;
  private keytabValue: string | null = null;

  constructor(private readonly parser: NameParser) {}

  static from(parser: NameParser, config: SessionConfig): SessionConfigBuilder {
    const builder = new SessionConfigBuilder(parser);
    builder.principalValue = config.principal;
    builder.ccacheValue = config.ccache;
    builder.keytabValue = config.keytab;
    return builder;
  }

  /**
   * @throws {InvalidPrincipalError}
   */
  principal(raw: string): this {
    this.principalValue = parsePrincipal(this.parser, raw);
    return this;
  }

  ccache(ref: string | null): this {
    this.ccacheValue = ref;
    return this;
  }

  /**
   * @throws {KeytabNotFoundError}
   */
  keytab(path: string | null): this {
    this.keytabValue = path === null ? null : resolveKeytab(path);
    return this;
  }

  /**
   * @throws {ConfigurationError} when no principal was set
   */
  build(): SessionConfig {
    if (!this.principalValue) {
      throw Krb5Errors.MISSING_PRINCIPAL();
    }
    return freeze({
      principal: this.principalValue,
      ccache: this.ccacheValue,
      keytab: this.keytabValue,
    });
  }
}
