/**
 * Caller-visible errors
 *
 * Only input validation surfaces as a thrown error. Everything the Kerberos
 * authority reports is absorbed into boolean results and an
 * AcquisitionErrorKind (see core/types.ts).
 */

export class Krb5Error extends Error {
  constructor(
    public code: string,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'Krb5Error';

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Principal string rejected by the name parser
 */
export class InvalidPrincipalError extends Krb5Error {
  constructor(principal: string, reason: string) {
    super('INVALID_PRINCIPAL', `Invalid Kerberos principal "${principal}": ${reason}`, {
      principal,
    });
    this.name = 'InvalidPrincipalError';
  }
}

/**
 * Key table path does not exist at assignment time
 */
export class KeytabNotFoundError extends Krb5Error {
  constructor(path: string) {
    super('KEYTAB_NOT_FOUND', `Kerberos keytab file '${path}' doesn't exist.`, { path });
    this.name = 'KeytabNotFoundError';
  }
}

export class ConfigurationError extends Krb5Error {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', `Configuration error: ${message}`, details);
    this.name = 'ConfigurationError';
  }
}

export const Krb5Errors = {
  INVALID_PRINCIPAL: (principal: string, reason: string) =>
    new InvalidPrincipalError(principal, reason),

  KEYTAB_NOT_FOUND: (path: string) => new KeytabNotFoundError(path),

  MISSING_PRINCIPAL: () => new ConfigurationError('a principal is required'),

  SCRATCH_DIR_NOT_FOUND: (dir: string) =>
    new ConfigurationError(`scratch directory '${dir}' does not exist`, { scratchDir: dir }),

  UNKNOWN_SESSION: (name: string) =>
    new ConfigurationError(`no session named "${name}"`, { session: name }),

  CONFIG_NOT_LOADED: () =>
    new ConfigurationError('configuration not loaded, call loadConfig() first'),
} as const;

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof Krb5Error) {
    return {
      type: 'Krb5Error',
      code: error.code,
      message: error.message,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}
