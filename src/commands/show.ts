import { formatDetails } from '../utils/format.js';
import { contextFor, loadConfig, reportError } from './command-helpers.js';

import type { CreateContext } from './command-helpers.js';
import type { Command } from 'commander';

export function registerShowCommand(program: Command, createCtx: CreateContext): void {
  program
    .command('show')
    .argument('<context>', 'Context to resolve')
    .argument('[key]', 'Config key (defaults to the context default)')
    .description('Show the command an entry resolves to')
    .action(async (context: string, key: string | undefined) => {
      const ctx = contextFor(program, createCtx);
      try {
        const config = await loadConfig(ctx);
        const details =
          key === undefined
            ? config.commands.getOrDefaultConfig(context)
            : config.commands.requireConfigs(context).get(key);
        for (const line of formatDetails(details)) {
          ctx.logger.info(line);
        }
      } catch (error) {
        reportError(ctx, error);
      }
    });
}
