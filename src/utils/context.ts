import path from 'node:path';

import { createFileConfigStore } from '../adapters/node.js';
import { getConfigDir, getConfigPath } from './config-path.js';
import { createLogger } from './logger.js';

import type { Logger } from './logger.js';
import type { ConfigStore } from '../adapters/types.js';

export interface CLIContext {
  logger: Logger;
  store: ConfigStore;
}

export interface CLIContextOptions {
  verbose?: boolean;
  config?: string;
}

export function createCLIContext(opts: CLIContextOptions): CLIContext {
  const logger = createLogger({ verbose: opts.verbose });
  const configPath = getConfigPath(opts.config);
  const store = createFileConfigStore(configPath, {
    logger,
    restrictDirectory: path.dirname(configPath) === getConfigDir(),
  });
  return { logger, store };
}
