/**
 * Kerberos principal name parsing
 *
 * Follows the krb5 string form: components separated by an unescaped '/',
 * an optional realm after the single unescaped '@', and backslash escapes
 * for the separators and a handful of control characters.
 *
 * @module gssapi/principal-name
 */

import { GssError, type Principal } from './types.js';

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  b: '\b',
  '0': '\0',
};

const REVERSE_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '/': '\\/',
  '@': '\\@',
  '\n': '\\n',
  '\t': '\\t',
  '\b': '\\b',
  '\0': '\\0',
};

function badName(raw: string, reason: string): GssError {
  return new GssError('bad-name', `Invalid Kerberos principal name "${raw}": ${reason}`, reason);
}

function escapePart(part: string): string {
  let out = '';
  for (const ch of part) {
    out += REVERSE_ESCAPES[ch] ?? ch;
  }
  return out;
}

/**
 * Render components and realm in canonical escaped form
 */
export function formatPrincipalName(components: readonly string[], realm: string | null): string {
  const name = components.map(escapePart).join('/');
  return realm === null ? name : `${name}@${escapePart(realm)}`;
}

/**
 * Parse a Kerberos principal name
 *
 * @example
 * ```typescript
 * parsePrincipalName('HTTP/web01.example.com@EXAMPLE.COM');
 * // { components: ['HTTP', 'web01.example.com'], realm: 'EXAMPLE.COM', ... }
 * ```
 *
 * @throws {GssError} category 'bad-name' when the syntax is rejected
 */
export function parsePrincipalName(raw: string): Principal {
  if (raw.length === 0) {
    throw badName(raw, 'name is empty');
  }

  const components: string[] = [];
  let current = '';
  let inRealm = false;

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];

    if (ch === '\0' || ch === '\n') {
      throw badName(raw, 'control characters must be escaped');
    }

    if (ch === '\\') {
      i++;
      if (i >= raw.length) {
        throw badName(raw, 'unterminated escape sequence');
      }
      const escaped = raw[i];
      current += ESCAPES[escaped] ?? escaped;
      continue;
    }

    if (ch === '@') {
      if (inRealm) {
        throw badName(raw, 'more than one realm separator');
      }
      components.push(current);
      current = '';
      inRealm = true;
      continue;
    }

    if (ch === '/') {
      if (inRealm) {
        throw badName(raw, "unescaped '/' in realm");
      }
      components.push(current);
      current = '';
      continue;
    }

    current += ch;
  }

  let realm: string | null = null;
  if (inRealm) {
    if (current.length === 0) {
      throw badName(raw, 'realm is empty');
    }
    realm = current;
  } else {
    components.push(current);
  }

  if (components[0].length === 0) {
    throw badName(raw, 'primary component is empty');
  }

  return Object.freeze({
    components: Object.freeze([...components]),
    realm,
    text: formatPrincipalName(components, realm),
  });
}

/**
 * Whether a principal string reported by the library names the same identity
 *
 * A name without a realm matches any realm.
 */
export function principalMatches(principal: Principal, reported: string): boolean {
  if (principal.realm !== null) {
    return reported === principal.text;
  }
  return reported === principal.text || reported.startsWith(`${principal.text}@`);
}
