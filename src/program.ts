import { Command } from 'commander';

import { registerAddCommand } from './commands/add.js';
import { registerDefaultCommand } from './commands/default.js';
import { registerInitCommand } from './commands/init.js';
import { registerListCommand } from './commands/list.js';
import { registerRemoveCommand } from './commands/remove.js';
import { registerShowCommand } from './commands/show.js';
import { CONFIG_PATH_ENV } from './utils/config-path.js';
import { createCLIContext } from './utils/context.js';
import { getCliVersion } from './utils/version.js';

import type { CreateContext } from './commands/command-helpers.js';

export function buildProgram(createCtx: CreateContext = createCLIContext): Command {
  const program = new Command();

  program
    .name('cmdctx')
    .description('Per-context command configurations for command runners')
    .version(getCliVersion())
    .option('-v, --verbose', 'Enable verbose logging', false)
    .option(
      '-c, --config <path>',
      `Config file (default: $${CONFIG_PATH_ENV} or ~/.cmdctx/config.toml)`,
    );

  // Register commands (thin orchestration only)
  registerInitCommand(program, createCtx);
  registerListCommand(program, createCtx);
  registerShowCommand(program, createCtx);
  registerAddCommand(program, createCtx);
  registerDefaultCommand(program, createCtx);
  registerRemoveCommand(program, createCtx);

  program.showHelpAfterError();
  program.showSuggestionAfterError();

  return program;
}
