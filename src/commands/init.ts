import { Config } from '../core/config.js';
import { contextFor, reportError } from './command-helpers.js';

import type { CreateContext } from './command-helpers.js';
import type { Command } from 'commander';

export function registerInitCommand(program: Command, createCtx: CreateContext): void {
  program
    .command('init')
    .description('Write the default configuration (run, test, build, bench)')
    .option('--force', 'Overwrite an existing configuration', false)
    .action(async (raw: { force?: boolean }) => {
      const ctx = contextFor(program, createCtx);
      try {
        const existing = await ctx.store.read();
        if (existing !== undefined && !raw.force) {
          ctx.logger.info(`${ctx.store.location} already exists; use --force to overwrite`);
          return;
        }
        await Config.createDefault().save(ctx.store);
        ctx.logger.info(`Wrote default configuration to ${ctx.store.location}`);
      } catch (error) {
        reportError(ctx, error);
      }
    });
}
