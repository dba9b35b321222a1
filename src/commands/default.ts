import { contextFor, loadConfig, reportError } from './command-helpers.js';

import type { CreateContext } from './command-helpers.js';
import type { Command } from 'commander';

export function registerDefaultCommand(program: Command, createCtx: CreateContext): void {
  program
    .command('default')
    .argument('<context>', 'Context to update')
    .argument('<key>', 'Existing config key to use as the default')
    .description('Set the default configuration of a context')
    .option('--strict', 'Fail with context-not-found for unregistered contexts', false)
    .action(async (context: string, key: string, raw: { strict?: boolean }) => {
      const ctx = contextFor(program, createCtx);
      try {
        const config = await loadConfig(ctx, raw.strict ? 'strict' : 'lenient');
        config.commands.setDefaultConfig(context, key);
        await config.save(ctx.store);
        ctx.logger.info(`Default for ${context} is now ${key}`);
      } catch (error) {
        reportError(ctx, error);
      }
    });
}
