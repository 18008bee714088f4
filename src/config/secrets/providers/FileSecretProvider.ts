/**
 * File-Based Secret Provider
 *
 * Reads `<secretDir>/<logicalName>`, the layout of Docker and Kubernetes
 * secret mounts. Names that would leave `secretDir` are not looked up.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { ISecretProvider } from '../ISecretProvider.js';

function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
}

export class FileSecretProvider implements ISecretProvider {
  constructor(private readonly secretDir: string = '/run/secrets') {}

  /**
   * @returns the trimmed file contents, or undefined when absent or unreadable
   */
  async resolve(logicalName: string): Promise<string | undefined> {
    if (logicalName.includes('..') || path.isAbsolute(logicalName)) {
      return undefined;
    }

    const root = path.resolve(this.secretDir);
    const filePath = path.resolve(root, logicalName);
    if (!filePath.startsWith(root + path.sep)) {
      return undefined;
    }

    try {
      const secret = await readFile(filePath, 'utf-8');
      return secret.trim();
    } catch (error) {
      const code = errorCode(error);
      if (code !== 'ENOENT' && code !== 'EACCES') {
        console.warn(
          `[FileSecretProvider] Unexpected error reading ${filePath}: ${
            error instanceof Error ? error.message : 'Unknown error'
          }`
        );
      }
      return undefined;
    }
  }

  getSecretDir(): string {
    return this.secretDir;
  }
}
