/**
 * Secret Resolver
 *
 * Walks a parsed configuration and replaces every `{"$secret": "NAME"}`
 * descriptor with the value found by the provider chain, in place. Runs
 * before schema validation, so passwords never have to sit in the JSON file.
 *
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 * await resolver.resolveSecrets(rawConfig);
 * ```
 */

import { isSecretProvider, type ISecretProvider } from './ISecretProvider.js';
import type { AuditService } from '../../core/audit-service.js';

export interface SecretResolverConfig {
  /** Records which provider answered for which secret (never the value) */
  auditService?: AuditService;

  /** Throw when a secret cannot be resolved (default: true) */
  failFast?: boolean;
}

interface SecretDescriptor {
  $secret: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    isRecord(value) &&
    Object.keys(value).length === 1 &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0
  );
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly auditService?: AuditService;
  private readonly failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
    this.failFast = config?.failFast ?? true;
  }

  /**
   * Append a provider; earlier providers win
   *
   * @throws {Error} when the argument has no resolve() method
   */
  addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * Resolve every descriptor in `config`, modifying it in place
   *
   * @throws {Error} with failFast, naming the secret and its path
   */
  async resolveSecrets(config: unknown): Promise<void> {
    await this.resolveNode(config, 'config');
  }

  getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  clearProviders(): void {
    this.providers = [];
  }

  private async resolveNode(node: unknown, path: string): Promise<void> {
    if (Array.isArray(node)) {
      for (let i = 0; i < node.length; i++) {
        await this.resolveNode(node[i], `${path}[${i}]`);
      }
      return;
    }
    if (!isRecord(node)) {
      return;
    }

    for (const key of Object.keys(node)) {
      const child = node[key];
      const childPath = `${path}.${key}`;

      if (!isSecretDescriptor(child)) {
        await this.resolveNode(child, childPath);
        continue;
      }

      const value = await this.resolveSecret(child.$secret, childPath);
      if (value !== undefined) {
        node[key] = value;
        continue;
      }

      const message = `Secret "${child.$secret}" at path "${childPath}" could not be resolved by any provider.`;
      if (this.failFast) {
        throw new Error(`[SecretResolver] ${message}`);
      }
      console.warn(`[SecretResolver] ${message}`);
    }
  }

  private async resolveSecret(logicalName: string, path: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);
        if (value !== undefined) {
          await this.audit(logicalName, path, provider.constructor.name, true);
          return value;
        }
      } catch (error) {
        console.warn(
          `[SecretResolver] Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${
            error instanceof Error ? error.message : 'Unknown error'
          }`
        );
      }
    }

    await this.audit(logicalName, path, 'none', false);
    return undefined;
  }

  private async audit(
    logicalName: string,
    path: string,
    provider: string,
    success: boolean
  ): Promise<void> {
    if (!this.auditService) {
      return;
    }
    await this.auditService.log({
      source: 'secret:resolution',
      timestamp: new Date(),
      userId: 'system',
      action: `resolve:${logicalName}`,
      success,
      error: success ? undefined : 'No provider could resolve this secret',
      metadata: { secretName: logicalName, provider, configPath: path },
    });
  }
}
