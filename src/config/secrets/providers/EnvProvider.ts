/**
 * Environment Variable Secret Provider
 *
 * Fallback after FileSecretProvider. Environment variables are inherited by
 * kinit and klist child processes, so prefer mounted secret files for
 * service passwords.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * @returns the trimmed variable, or undefined when unset or empty
   */
  async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName];
    if (value === undefined || value === '') {
      return undefined;
    }
    return value.trim();
  }
}
