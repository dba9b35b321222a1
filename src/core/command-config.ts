import { CommandDetailsBuilder } from './command-details.js';
import { CmdctxError, ErrorCode } from './errors.js';

import type { CommandContext, CommandDetails, CommandType } from '../types/command.js';

/**
 * Read side of a {@link CommandConfig}. Returned for contexts that are not
 * registered, so callers cannot add entries through a lookup.
 */
export interface CommandConfigView {
  readonly size: number;
  readonly defaultKey: string | undefined;
  has(configKey: string): boolean;
  get(configKey: string): CommandDetails;
  getDefault(): CommandDetails;
  keys(): string[];
  entries(): Array<[string, CommandDetails]>;
}

const SEEDED_COMMANDS = new Map<CommandContext, { command: string; commandType: CommandType }>([
  ['run', { command: 'run --package ${packageName} --bin ${binaryName}', commandType: 'cargo' }],
  ['test', { command: 'test', commandType: 'cargo' }],
  ['build', { command: 'build', commandType: 'cargo' }],
  ['bench', { command: 'bench', commandType: 'cargo' }],
]);

export const SEEDED_CONFIG_KEY = 'default';

export class CommandConfig implements CommandConfigView {
  private readonly configs = new Map<string, CommandDetails>();
  private defaultConfigKey: string | undefined;

  /**
   * Config holding one `default` entry for a built-in context, marked as the
   * default. Returns an empty config for contexts without a seeded command.
   */
  static withContext(context: CommandContext): CommandConfig {
    const config = new CommandConfig();
    const seed = SEEDED_COMMANDS.get(context);
    if (!seed) return config;
    config.updateConfig(
      SEEDED_CONFIG_KEY,
      new CommandDetailsBuilder(seed.command, seed.commandType)
        .workingDirectory('${workspaceFolder}')
        .build(),
    );
    config.setDefault(SEEDED_CONFIG_KEY);
    return config;
  }

  get size(): number {
    return this.configs.size;
  }

  get defaultKey(): string | undefined {
    return this.defaultConfigKey;
  }

  has(configKey: string): boolean {
    return this.configs.has(configKey);
  }

  keys(): string[] {
    return [...this.configs.keys()];
  }

  entries(): Array<[string, CommandDetails]> {
    return [...this.configs.entries()];
  }

  /**
   * Insert or replace the entry at `configKey`. The default is left alone,
   * even when this is the first entry.
   */
  updateConfig(configKey: string, details: CommandDetails): void {
    this.configs.set(configKey, details);
  }

  /**
   * Rebuild the entry at `configKey` from its current value.
   */
  editConfig(
    configKey: string,
    edit: (builder: CommandDetailsBuilder) => CommandDetailsBuilder,
  ): CommandDetails {
    const next = edit(CommandDetailsBuilder.from(this.get(configKey))).build();
    this.configs.set(configKey, next);
    return next;
  }

  /**
   * Remove the entry at `configKey`. Clears the default when it pointed there.
   */
  removeConfig(configKey: string): boolean {
    const removed = this.configs.delete(configKey);
    if (removed && this.defaultConfigKey === configKey) {
      this.defaultConfigKey = undefined;
    }
    return removed;
  }

  setDefault(configKey: string): void {
    if (!this.configs.has(configKey)) {
      throw new CmdctxError(
        ErrorCode.CONFIG_KEY_NOT_FOUND,
        `Config key '${configKey}' not found`,
        { details: { configKey } },
      );
    }
    this.defaultConfigKey = configKey;
  }

  get(configKey: string): CommandDetails {
    const details = this.configs.get(configKey);
    if (!details) {
      throw new CmdctxError(
        ErrorCode.CONFIG_KEY_NOT_FOUND,
        `Config key '${configKey}' not found`,
        { details: { configKey } },
      );
    }
    return details;
  }

  getDefault(): CommandDetails {
    if (this.defaultConfigKey !== undefined) {
      return this.get(this.defaultConfigKey);
    }
    if (this.configs.size === 1) {
      const [only] = this.configs.values();
      return only;
    }
    const available = this.configs.size > 0 ? `; available: ${this.keys().join(', ')}` : '';
    throw new CmdctxError(
      ErrorCode.NO_DEFAULT_CONFIGURED,
      `No default config key set${available}`,
    );
  }
}
