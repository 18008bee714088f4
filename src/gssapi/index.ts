/**
 * GSS-API port and the MIT Kerberos command-line backend
 */

export {
  GssError,
  isGssError,
  type AcquireCredentialsRequest,
  type AcquireWithPasswordRequest,
  type CredentialUsage,
  type GssApi,
  type GssCredentials,
  type GssErrorCategory,
  type GssMechanism,
  type InquiredCredentials,
  type Principal,
  type StoreCredentialsOptions,
  type StoreDescriptor,
  type StoredCredentials,
} from './types.js';
export { formatPrincipalName, parsePrincipalName, principalMatches } from './principal-name.js';
export {
  MitKerberosGssApi,
  defaultCacheFromKlist,
  fileCachePath,
  runCommand,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  type MitKerberosOptions,
} from './mit-kerberos.js';
export {
  findTicketGrantingTicket,
  parseKlistOutput,
  parseKlistTimestamp,
  type KlistListing,
  type KlistTicket,
} from './klist-parser.js';
export { classifyKinitFailure, firstLine } from './kinit-errors.js';
