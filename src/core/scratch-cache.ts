/**
 * Scoped scratch credential cache
 *
 * Key-table acquisition on some platforms can only materialise into a
 * file-backed cache. The engine borrows a private directory for that file
 * and the directory is removed on every exit path: ticket material must not
 * outlive the call.
 */

import { statSync } from 'node:fs';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { Krb5Errors, sanitizeError } from '../utils/errors.js';

export interface ScratchCache {
  /** Private directory (mode 0700) */
  dir: string;

  /** FILE cache reference inside `dir` */
  ccache: string;
}

/**
 * Resolve a scratch parent directory to an absolute path that exists
 *
 * @throws {ConfigurationError}
 */
export function resolveScratchDir(dir: string): string {
  const absolute = resolve(dir);
  if (!statSync(absolute, { throwIfNoEntry: false })?.isDirectory()) {
    throw Krb5Errors.SCRATCH_DIR_NOT_FOUND(dir);
  }
  return absolute;
}

/**
 * Run `fn` with a fresh scratch cache and remove it afterwards
 *
 * @param fn - Work to do while the scratch cache exists
 * @param parentDir - Where the private directory is created (default: os.tmpdir())
 */
export async function withScratchCache<T>(
  fn: (scratch: ScratchCache) => Promise<T>,
  parentDir: string = tmpdir()
): Promise<T> {
  const dir = await mkdtemp(join(parentDir, 'krb5-'));
  try {
    return await fn({ dir, ccache: `FILE:${join(dir, 'ccache')}` });
  } finally {
    await removeScratch(dir);
  }
}

async function removeScratch(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (error) {
    console.error(`[SCRATCH-CACHE] ✗ Failed to remove scratch cache ${dir}:`, sanitizeError(error));
  }
}
