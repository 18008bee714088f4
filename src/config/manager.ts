import { readFile } from 'node:fs/promises';
import { AuditService } from '../core/audit-service.js';
import { Krb5Session, type Krb5SessionOptions } from '../core/krb5-session.js';
import type { CredentialSource } from '../core/types.js';
import { MitKerberosGssApi, type MitKerberosOptions } from '../gssapi/mit-kerberos.js';
import type { GssApi } from '../gssapi/types.js';
import { ConfigurationError, Krb5Errors } from '../utils/errors.js';
import {
  Krb5ConfigSchema,
  type Krb5AuditConfig,
  type Krb5BackendConfig,
  type Krb5Config,
  type Krb5SessionConfig,
} from './schemas/krb5.js';
import { EnvProvider, FileSecretProvider, SecretResolver } from './secrets/index.js';

export interface ConfigManagerOptions {
  /** Receives secret resolutions and, via createSession(), acquisitions */
  auditService?: AuditService;

  /** Directory for file-based secrets (default: '/run/secrets') */
  secretsDir?: string;

  env?: NodeJS.ProcessEnv;
}

export interface ConfiguredAcquisition {
  session: Krb5Session;
  source: CredentialSource['type'];
  acquired: boolean;
}

/**
 * Pick the credential source of a configured session
 *
 * Key table first, then password, then whatever the cache already holds.
 */
export function selectSource(config: Krb5SessionConfig): CredentialSource {
  const options = {
    usage: config.usage,
    setDefault: config.setDefault,
    overwrite: config.overwrite,
  };
  if (config.keytab) {
    return { type: 'keytab', path: config.keytab, options };
  }
  if (config.password) {
    return { type: 'password', password: config.password, options };
  }
  return { type: 'default', usage: config.usage };
}

export class ConfigManager {
  private config: Krb5Config | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;
  private readonly auditService?: AuditService;

  constructor(options?: ConfigManagerOptions) {
    this.env = options?.env ?? process.env;
    this.auditService = options?.auditService;

    this.secretResolver = new SecretResolver({
      auditService: this.auditService,
      failFast: true,
    });
    this.secretResolver.addProvider(new FileSecretProvider(options?.secretsDir ?? '/run/secrets'));
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  /**
   * Read, resolve secrets in, and validate the configuration file
   *
   * Path: argument, then CONFIG_PATH, then ./config/krb5.json. Cached after
   * the first successful load; see reloadConfig().
   *
   * @throws {ConfigurationError}
   */
  async loadConfig(configPath?: string): Promise<Krb5Config> {
    if (this.config) {
      return this.config;
    }

    const path = configPath || this.env.CONFIG_PATH || './config/krb5.json';

    try {
      const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));

      console.log('[ConfigManager] Resolving secrets...');
      await this.secretResolver.resolveSecrets(raw);

      const config = Krb5ConfigSchema.parse(raw);
      this.warnAboutSessions(config);

      this.config = config;
      console.log(`[ConfigManager] Configuration loaded from ${path}`);
      return config;
    } catch (error) {
      throw new ConfigurationError(
        `failed to load ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { path }
      );
    }
  }

  async reloadConfig(configPath?: string): Promise<Krb5Config> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  getConfig(): Krb5Config {
    if (!this.config) {
      throw Krb5Errors.CONFIG_NOT_LOADED();
    }
    return this.config;
  }

  getBackendConfig(): Krb5BackendConfig {
    return this.getConfig().backend;
  }

  getAuditConfig(): Krb5AuditConfig {
    return this.getConfig().audit;
  }

  getSessionNames(): string[] {
    return Object.keys(this.getConfig().sessions);
  }

  /**
   * @throws {ConfigurationError} when no session has that name
   */
  getSessionConfig(name: string): Krb5SessionConfig {
    const sessions = this.getConfig().sessions;
    if (!Object.prototype.hasOwnProperty.call(sessions, name)) {
      throw Krb5Errors.UNKNOWN_SESSION(name);
    }
    return sessions[name];
  }

  /**
   * MIT Kerberos backend configured from the backend section
   */
  createBackend(overrides: Partial<MitKerberosOptions> = {}): MitKerberosGssApi {
    const backend = this.getBackendConfig();
    return new MitKerberosGssApi({
      kinitPath: backend.kinitPath,
      klistPath: backend.klistPath,
      timeoutMs: backend.timeoutMs,
      scratchDir: backend.scratchDir,
      env: this.env,
      ...overrides,
    });
  }

  /**
   * Audit service from the audit section, unless one was injected
   */
  getAuditService(): AuditService {
    if (this.auditService) {
      return this.auditService;
    }
    const audit = this.getAuditConfig();
    return new AuditService({
      enabled: audit.enabled,
      logAllAttempts: audit.logAllAttempts,
      maxEntries: audit.maxEntries,
    });
  }

  /**
   * Build a session for a configured name
   *
   * @throws {ConfigurationError} for an unknown name
   * @throws {InvalidPrincipalError}
   * @throws {KeytabNotFoundError}
   */
  createSession(name: string, gss: GssApi, options: Krb5SessionOptions = {}): Krb5Session {
    const config = this.getSessionConfig(name);
    return new Krb5Session(
      gss,
      { principal: config.principal, ccache: config.ccache ?? null, keytab: config.keytab ?? null },
      {
        auditService: this.getAuditService(),
        scratchDir: this.getBackendConfig().scratchDir,
        ...options,
      }
    );
  }

  /**
   * Create the named session and acquire through its configured source
   */
  async acquireConfigured(
    name: string,
    gss: GssApi,
    options: Krb5SessionOptions = {}
  ): Promise<ConfiguredAcquisition> {
    const session = this.createSession(name, gss, options);
    const source = selectSource(this.getSessionConfig(name));
    const acquired = await session.acquire(source);
    return { session, source: source.type, acquired };
  }

  getSecretResolver(): SecretResolver {
    return this.secretResolver;
  }

  private warnAboutSessions(config: Krb5Config): void {
    for (const [name, session] of Object.entries(config.sessions)) {
      if (session.keytab && session.password) {
        console.warn(`[ConfigManager] Session "${name}" declares both keytab and password; the keytab is used`);
      }
      if (!session.keytab && session.password && this.env.NODE_ENV === 'production') {
        console.warn(`[ConfigManager] Session "${name}" uses a password; prefer a key table in production`);
      }
    }
  }
}
