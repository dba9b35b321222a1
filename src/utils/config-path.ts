import os from 'node:os';
import path from 'node:path';

const CONFIG_DIRNAME = '.cmdctx';
const CONFIG_FILENAME = 'config.toml';

export const CONFIG_PATH_ENV = 'CMDCTX_CONFIG';

export function getConfigDir(): string {
  return path.join(os.homedir(), CONFIG_DIRNAME);
}

/**
 * Explicit path, then `CMDCTX_CONFIG`, then `~/.cmdctx/config.toml`.
 */
export function getConfigPath(explicit?: string): string {
  if (explicit && explicit.length > 0) return path.resolve(explicit);
  const fromEnv = process.env[CONFIG_PATH_ENV];
  if (fromEnv && fromEnv.length > 0) return path.resolve(fromEnv);
  return path.join(getConfigDir(), CONFIG_FILENAME);
}
