/**
 * Classification of `kinit` failures
 *
 * kinit reports everything as exit status 1 with a message on stderr; the
 * message text is the only signal for which GSS error category applies.
 *
 * @module gssapi/kinit-errors
 */

import type { GssErrorCategory } from './types.js';

const RULES: ReadonlyArray<[RegExp, GssErrorCategory]> = [
  [/expired/i, 'expired'],
  [/Key table file .* not found/i, 'invalid'],
  [
    /Preauthentication failed|Password incorrect|Decrypt integrity check failed|No suitable keys|Keytab contains no suitable keys|Key table entry not found|Unsupported key table format|Key version number .* is incorrect|revoked/i,
    'invalid',
  ],
  [/not found in Kerberos database|No credentials cache found|No such file or directory/i, 'missing'],
];

export function classifyKinitFailure(stderr: string): GssErrorCategory {
  for (const [pattern, category] of RULES) {
    if (pattern.test(stderr)) {
      return category;
    }
  }
  return 'failure';
}

/**
 * First non-empty stderr line, for log and error messages
 */
export function firstLine(text: string): string {
  const line = text.split(/\r?\n/).find((l) => l.trim().length > 0);
  return line?.trim() ?? 'no diagnostic output';
}
