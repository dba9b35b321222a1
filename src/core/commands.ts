import { CommandConfig } from './command-config.js';
import { CmdctxError, ErrorCode } from './errors.js';

import type { CommandConfigView } from './command-config.js';
import type { CommandContext, CommandDetails } from '../types/command.js';

/**
 * How a context that was never registered is treated when setting a default.
 * `lenient` reads it as an empty config (so the key lookup fails), `strict`
 * rejects it outright.
 */
export type ContextPolicy = 'lenient' | 'strict';

export interface CommandsOptions {
  contextPolicy?: ContextPolicy;
}

const EMPTY_VIEW: CommandConfigView = new CommandConfig();

function contextNotFound(context: CommandContext): CmdctxError {
  return new CmdctxError(ErrorCode.CONTEXT_NOT_FOUND, `Context '${context}' is not registered`, {
    details: { context },
  });
}

/**
 * Registry of every context's {@link CommandConfig}. Contexts keep insertion
 * order so that saved files are stable between runs.
 */
export class Commands {
  readonly contextPolicy: ContextPolicy;
  private readonly configs = new Map<CommandContext, CommandConfig>();

  constructor(opts: CommandsOptions = {}) {
    this.contextPolicy = opts.contextPolicy ?? 'lenient';
  }

  has(context: CommandContext): boolean {
    return this.configs.has(context);
  }

  contexts(): CommandContext[] {
    return [...this.configs.keys()];
  }

  entries(): Array<[CommandContext, CommandConfig]> {
    return [...this.configs.entries()];
  }

  /**
   * Config for `context`, or an empty view when it is not registered.
   */
  getConfigs(context: CommandContext): CommandConfigView {
    return this.configs.get(context) ?? EMPTY_VIEW;
  }

  requireConfigs(context: CommandContext): CommandConfig {
    const config = this.configs.get(context);
    if (!config) throw contextNotFound(context);
    return config;
  }

  getOrInsertConfig(context: CommandContext): CommandConfig {
    let config = this.configs.get(context);
    if (!config) {
      config = new CommandConfig();
      this.configs.set(context, config);
    }
    return config;
  }

  /** Replace the whole config registered for `context`. */
  insertConfig(context: CommandContext, config: CommandConfig): void {
    this.configs.set(context, config);
  }

  updateConfig(context: CommandContext, configKey: string, details: CommandDetails): void {
    this.getOrInsertConfig(context).updateConfig(configKey, details);
  }

  getOrDefaultConfig(context: CommandContext): CommandDetails {
    const config = this.getConfigs(context);
    if (config.size === 0) {
      throw new CmdctxError(
        ErrorCode.NO_CONFIG_FOR_CONTEXT,
        `No command configured for context '${context}'`,
        { details: { context } },
      );
    }
    return config.getDefault();
  }

  setDefaultConfig(
    context: CommandContext,
    configKey: string,
    policy: ContextPolicy = this.contextPolicy,
  ): void {
    const config = this.configs.get(context);
    if (config) {
      config.setDefault(configKey);
      return;
    }
    if (policy === 'strict') throw contextNotFound(context);
    throw new CmdctxError(
      ErrorCode.CONFIG_KEY_NOT_FOUND,
      `Config key '${configKey}' not found in context '${context}'`,
      { details: { context, configKey } },
    );
  }
}
