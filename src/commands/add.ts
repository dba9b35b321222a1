import { existsSync } from 'node:fs';

import { CommandDetailsBuilder, commandDetailsEqual } from '../core/command-details.js';
import { preCommandValidator, workingDirectoryValidator } from '../core/validators.js';
import {
  collect,
  normalizeCommandTypeOption,
  parseEnvAssignments,
} from '../utils/command-options.js';
import { contextFor, loadConfig, reportError } from './command-helpers.js';

import type { CreateContext } from './command-helpers.js';
import type { Command } from 'commander';

interface AddOptions {
  type?: string;
  env: string[];
  preCommand?: string;
  cwd?: string;
  allowMultiple?: boolean;
  default?: boolean;
}

export function registerAddCommand(program: Command, createCtx: CreateContext): void {
  program
    .command('add')
    .argument('<context>', 'Context to add the entry to')
    .argument('<key>', 'Config key, unique within the context')
    .argument('<command>', 'Command (a cargo subcommand for --type cargo)')
    .argument('[params...]', 'Arguments passed after the command')
    .description('Add or replace a command configuration')
    .option('-t, --type <type>', "Command type: 'cargo' or 'shell'", 'shell')
    .option('-e, --env <KEY=VALUE>', 'Environment variable (repeatable)', collect, [])
    .option('--pre-command <key>', 'Entry of the same context to run first')
    .option('--cwd <dir>', 'Working directory')
    .option('--allow-multiple', 'Allow concurrent instances', false)
    .option('--default', 'Make this entry the context default', false)
    .action(
      async (context: string, key: string, command: string, params: string[], raw: AddOptions) => {
        const ctx = contextFor(program, createCtx);
        try {
          const commandType = normalizeCommandTypeOption(raw.type) ?? 'shell';
          const config = await loadConfig(ctx);
          const builder = new CommandDetailsBuilder(command, commandType)
            .params(params)
            .env(parseEnvAssignments(raw.env))
            .preCommand(raw.preCommand)
            .workingDirectory(raw.cwd)
            .allowMultipleInstances(Boolean(raw.allowMultiple))
            .addValidator(preCommandValidator(config.commands.getConfigs(context), key))
            .addValidator(workingDirectoryValidator(existsSync));
          const details = builder.build();

          const current = config.commands.getConfigs(context);
          const unchanged = current.has(key) && commandDetailsEqual(current.get(key), details);
          config.commands.updateConfig(context, key, details);
          if (raw.default) {
            config.commands.setDefaultConfig(context, key);
          }
          if (unchanged && !raw.default) {
            ctx.logger.info(`${context}/${key} is unchanged`);
            return;
          }
          await config.save(ctx.store);
          ctx.logger.info(`Saved ${context}/${key}${raw.default ? ' (default)' : ''}`);
        } catch (error) {
          reportError(ctx, error);
        }
      },
    );
}
