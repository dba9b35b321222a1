import { Config } from '../core/config.js';
import { CmdctxError } from '../core/errors.js';

import type { ContextPolicy } from '../core/commands.js';
import type { CLIContext, CLIContextOptions } from '../utils/context.js';
import type { Command } from 'commander';

export type CreateContext = (opts: CLIContextOptions) => CLIContext;

export function contextFor(program: Command, createCtx: CreateContext): CLIContext {
  const opts = program.opts<{ verbose?: boolean; config?: string }>();
  return createCtx({ verbose: opts.verbose, config: opts.config });
}

export async function loadConfig(ctx: CLIContext, contextPolicy?: ContextPolicy): Promise<Config> {
  ctx.logger.debug(`config:load:start ${ctx.store.location}`);
  const { config, warnings, source } = await Config.load(ctx.store, { contextPolicy });
  for (const warning of warnings) {
    ctx.logger.warn(warning);
  }
  ctx.logger.debug(
    `config:load:done source=${source} contexts=${config.commands.contexts().length}`,
  );
  return config;
}

export function reportError(ctx: CLIContext, error: unknown): void {
  if (error instanceof CmdctxError) {
    ctx.logger.error(error.toUserMessage());
    process.exitCode = error.getExitCode();
    return;
  }
  ctx.logger.error(error instanceof Error ? error : String(error));
  process.exitCode = 1;
}
