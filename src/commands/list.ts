import { contextFor, loadConfig, reportError } from './command-helpers.js';

import type { CreateContext } from './command-helpers.js';
import type { CommandConfigView } from '../core/command-config.js';
import type { Logger } from '../utils/logger.js';
import type { Command } from 'commander';

function printContext(logger: Logger, context: string, config: CommandConfigView): void {
  logger.info(`${context}:`);
  if (config.size === 0) {
    logger.info('  (no entries)');
    return;
  }
  for (const [key, details] of config.entries()) {
    const marker = key === config.defaultKey ? '*' : ' ';
    logger.info(` ${marker} ${key}  [${details.commandType}] ${details.command}`);
  }
}

export function registerListCommand(program: Command, createCtx: CreateContext): void {
  program
    .command('list')
    .argument('[context]', 'Only list this context')
    .description('List contexts and their entries (* marks the default)')
    .action(async (context: string | undefined) => {
      const ctx = contextFor(program, createCtx);
      try {
        const config = await loadConfig(ctx);
        if (context !== undefined) {
          printContext(ctx.logger, context, config.commands.requireConfigs(context));
          return;
        }
        const entries = config.commands.entries();
        if (entries.length === 0) {
          ctx.logger.info('No contexts configured');
          return;
        }
        for (const [name, commandConfig] of entries) {
          printContext(ctx.logger, name, commandConfig);
        }
      } catch (error) {
        reportError(ctx, error);
      }
    });
}
