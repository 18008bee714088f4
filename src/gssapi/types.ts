/**
 * GSS-API Collaborator Port
 *
 * The acquisition core never talks to a KDC itself. Everything it needs from
 * the Kerberos library is expressed by the {@link GssApi} interface below:
 * parse-name, acquire-by-store, acquire-with-password, inquire and store.
 *
 * Implementations:
 * - {@link MitKerberosGssApi} - MIT Kerberos command-line tools (kinit/klist)
 * - {@link FakeGssApi} - in-process stand-in for tests
 *
 * @module gssapi/types
 */

// ============================================================================
// Names and credential usage
// ============================================================================

/**
 * Parsed Kerberos principal name
 *
 * @example
 * ```typescript
 * // "HTTP/web01.example.com@EXAMPLE.COM"
 * {
 *   components: ['HTTP', 'web01.example.com'],
 *   realm: 'EXAMPLE.COM',
 *   text: 'HTTP/web01.example.com@EXAMPLE.COM'
 * }
 * ```
 */
export interface Principal {
  /** Unescaped name components (primary first, then instances) */
  readonly components: readonly string[];

  /** Realm, or null when the name carries none (library default realm applies) */
  readonly realm: string | null;

  /** Canonical escaped form */
  readonly text: string;
}

/**
 * How the credentials will be used
 */
export type CredentialUsage = 'initiate' | 'accept' | 'both';

/**
 * Mechanisms a password acquisition may be restricted to
 */
export type GssMechanism = 'krb5';

/**
 * Credential store mapping passed to the library
 *
 * Keys follow the gss_acquire_cred_from() store key names.
 * An empty mapping means "use the process defaults".
 */
export interface StoreDescriptor {
  /** Client key table used to obtain initial credentials */
  client_keytab?: string;

  /** Credential cache to read from / write to */
  ccache?: string;
}

// ============================================================================
// Credentials
// ============================================================================

/**
 * Opaque credential handle returned by the library
 */
export interface GssCredentials {
  /** Principal the credentials belong to */
  readonly name: Principal;

  /** Usage the credentials were acquired for */
  readonly usage: CredentialUsage;

  /** Credential cache currently holding the credentials; null for the library default */
  readonly ccache: string | null;
}

/**
 * Result of inquiring a credential handle
 */
export interface InquiredCredentials {
  name: Principal;

  /** Remaining lifetime in seconds, null when the library reports none */
  lifetime: number | null;

  usage: CredentialUsage;
}

export interface AcquireCredentialsRequest {
  name: Principal;
  usage: CredentialUsage;
  store: StoreDescriptor;
}

export interface AcquireWithPasswordRequest {
  name: Principal;

  /** UTF-8 password bytes. Implementations must not retain or log them. */
  password: Uint8Array;

  usage: CredentialUsage;
  mechs: readonly GssMechanism[];
}

export interface StoreCredentialsOptions {
  /** Destination store, null for the default store */
  store: StoreDescriptor | null;
  usage: CredentialUsage;

  /** Make these credentials the default for the destination store */
  setDefault: boolean;

  /** Replace credentials already stored under the same name */
  overwrite: boolean;
}

export interface StoredCredentials {
  /** Mechanisms whose elements were written */
  elementsStored: GssMechanism[];
  usageStored: CredentialUsage;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Error categories reported by the library
 *
 * - expired: credentials exist but their validity window has passed
 * - missing: no credentials for the name in the store
 * - invalid: credentials or key material rejected (bad password, bad keytab)
 * - bad-name: name syntax rejected
 * - failure: generic protocol failure (KDC unreachable, mechanism error)
 * - store-error: destination store could not be written
 * - unavailable: operation not supported by the backend
 * - duplicate-element: destination already holds credentials and overwrite is off
 */
export type GssErrorCategory =
  | 'expired'
  | 'missing'
  | 'invalid'
  | 'bad-name'
  | 'failure'
  | 'store-error'
  | 'unavailable'
  | 'duplicate-element';

export class GssError extends Error {
  constructor(
    public readonly category: GssErrorCategory,
    message: string,
    public readonly minorMessage?: string
  ) {
    super(message);
    this.name = 'GssError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GssError);
    }
  }
}

export function isGssError(error: unknown): error is GssError {
  return error instanceof GssError;
}

// ============================================================================
// Port
// ============================================================================

/**
 * Operations the acquisition core consumes from the Kerberos library
 */
export interface GssApi {
  /**
   * Parse a Kerberos principal name
   *
   * @throws {GssError} category 'bad-name' when the syntax is rejected
   */
  parseName(raw: string): Principal;

  /**
   * Acquire credentials for a name from a credential store
   *
   * Valid credentials already in `store.ccache` are returned as-is. Otherwise,
   * when `store.client_keytab` is set, initial credentials are obtained from the
   * key table into `store.ccache`.
   */
  acquireCredentials(request: AcquireCredentialsRequest): Promise<GssCredentials>;

  /**
   * Acquire initial credentials with a password
   */
  acquireCredentialsWithPassword(request: AcquireWithPasswordRequest): Promise<GssCredentials>;

  /**
   * Inquire name, remaining lifetime and usage of a credential handle
   */
  inquireCredentials(credentials: GssCredentials): Promise<InquiredCredentials>;

  /**
   * Store credentials into a credential store
   */
  storeCredentials(
    credentials: GssCredentials,
    options: StoreCredentialsOptions
  ): Promise<StoredCredentials>;

  /**
   * Release any resources the handle owns (temporary caches)
   */
  releaseCredentials(credentials: GssCredentials): Promise<void>;
}
