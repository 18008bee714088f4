/**
 * Configuration Module - Public API
 */

export {
  ConfigManager,
  selectSource,
  type ConfigManagerOptions,
  type ConfiguredAcquisition,
} from './manager.js';

export {
  CredentialUsageSchema,
  Krb5AuditConfigSchema,
  Krb5BackendConfigSchema,
  Krb5ConfigSchema,
  Krb5SessionConfigSchema,
  validateKrb5Config,
  type Krb5AuditConfig,
  type Krb5BackendConfig,
  type Krb5Config,
  type Krb5SessionConfig,
} from './schemas/krb5.js';

export * from './secrets/index.js';
