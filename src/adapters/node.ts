/**
 * Node.js adapter implementation.
 * Stores the configuration document in a single file using node:fs/promises.
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { ConfigStore } from './types.js';
import type { Logger } from '../utils/logger.js';

export interface FileConfigStoreOptions {
  logger?: Logger;
  /** Also restrict an existing parent directory to its owner (0700) */
  restrictDirectory?: boolean;
}

function formatDisplayPath(target: string): string {
  const home = os.homedir();
  if (target.startsWith(home)) {
    return `~${target.slice(home.length)}`;
  }
  return target;
}

async function ensurePermission(target: string, mode: number, logger?: Logger): Promise<void> {
  if (process.platform === 'win32') return;
  const stat = await fs.stat(target);
  const current = stat.mode & 0o777;
  if (current === mode) return;
  await fs.chmod(target, mode);
  logger?.debug(`Fixed permissions on ${formatDisplayPath(target)}`);
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileConfigStore implements ConfigStore {
  readonly location: string;

  constructor(
    private readonly filePath: string,
    private readonly opts: FileConfigStoreOptions = {},
  ) {
    this.location = formatDisplayPath(filePath);
  }

  async read(): Promise<string | undefined> {
    try {
      return await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw error;
    }
  }

  /**
   * Atomic write: temp file in the same directory, then rename over the target.
   */
  async write(content: string): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, {
      recursive: true,
      mode: process.platform === 'win32' ? undefined : 0o700,
    });
    if (this.opts.restrictDirectory) {
      await ensurePermission(dir, 0o700, this.opts.logger);
    }

    const tempName = `.tmp-${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2)}`;
    const tempPath = path.join(dir, tempName);
    const writeOptions =
      process.platform === 'win32'
        ? { encoding: 'utf8' as const }
        : { encoding: 'utf8' as const, mode: 0o600 };

    try {
      await fs.writeFile(tempPath, content, writeOptions);
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    await ensurePermission(this.filePath, 0o600, this.opts.logger);
  }
}

export function createFileConfigStore(
  filePath: string,
  opts: FileConfigStoreOptions = {},
): FileConfigStore {
  return new FileConfigStore(filePath, opts);
}
