import { contextFor, loadConfig, reportError } from './command-helpers.js';

import type { CreateContext } from './command-helpers.js';
import type { Command } from 'commander';

export function registerRemoveCommand(program: Command, createCtx: CreateContext): void {
  program
    .command('remove')
    .argument('<context>', 'Context holding the entry')
    .argument('<key>', 'Config key to remove')
    .description('Remove a command configuration')
    .action(async (context: string, key: string) => {
      const ctx = contextFor(program, createCtx);
      try {
        const config = await loadConfig(ctx);
        const commandConfig = config.commands.requireConfigs(context);
        const wasDefault = commandConfig.defaultKey === key;
        if (!commandConfig.removeConfig(key)) {
          ctx.logger.info(`${context}/${key} does not exist; nothing to do.`);
          return;
        }
        await config.save(ctx.store);
        ctx.logger.info(`Removed ${context}/${key}`);
        if (wasDefault) {
          ctx.logger.warn(`${context} no longer has a default; run \`cmdctx default\` to pick one`);
        }
      } catch (error) {
        reportError(ctx, error);
      }
    });
}
