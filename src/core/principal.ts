/**
 * Identity Model - principal names
 *
 * Name syntax belongs to the Kerberos library; this module only turns the
 * library's rejection into the caller-facing InvalidPrincipalError.
 */

import { isGssError, type GssApi, type Principal } from '../gssapi/types.js';
import { InvalidPrincipalError } from '../utils/errors.js';

export type NameParser = Pick<GssApi, 'parseName'>;

/**
 * Parse and validate a principal name
 *
 * @throws {InvalidPrincipalError} when the library rejects the syntax
 */
export function parsePrincipal(parser: NameParser, raw: string): Principal {
  try {
    return parser.parseName(raw);
  } catch (error) {
    if (isGssError(error) && error.category === 'bad-name') {
      throw new InvalidPrincipalError(raw, error.minorMessage ?? error.message);
    }
    throw error;
  }
}

/**
 * Whether two parsed principals name the same identity
 */
export function samePrincipal(a: Principal, b: Principal): boolean {
  return a.text === b.text;
}
