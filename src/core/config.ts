import * as TOML from '@iarna/toml';

import { CommandConfig } from './command-config.js';
import { CommandDetailsBuilder } from './command-details.js';
import { Commands } from './commands.js';
import { CmdctxError, ErrorCode } from './errors.js';
import {
  BUILTIN_CONTEXTS,
  CommandTypeSchema,
  DEFAULT_COMMAND_TYPE,
} from '../types/command.js';
import {
  RawCommandConfigSchema,
  RawCommandDetailsSchema,
  RawConfigDocumentSchema,
} from '../types/config.js';

import type { CommandsOptions } from './commands.js';
import type { ConfigStore } from '../adapters/types.js';
import type { CommandDetails, CommandType } from '../types/command.js';
import type {
  CommandConfigDocument,
  CommandDetailsDocument,
  ConfigDocument,
  RawCommandDetails,
} from '../types/config.js';

export interface MaterializeResult {
  config: Config;
  warnings: string[];
}

export interface LoadResult extends MaterializeResult {
  /** `defaults` when the store held no document yet */
  source: 'store' | 'defaults';
}

export function parseConfigDocument(text: string, location = 'config'): unknown {
  try {
    return TOML.parse(text);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new CmdctxError(ErrorCode.CONFIG_PARSE_FAILURE, `Failed to parse ${location}: ${msg}`, {
      cause: error,
    });
  }
}

function resolveCommandType(
  raw: RawCommandDetails,
  where: string,
  warnings: string[],
): CommandType {
  const tag = raw.command_type ?? raw.type;
  if (tag === undefined) return DEFAULT_COMMAND_TYPE;
  const parsed = CommandTypeSchema.safeParse(tag.toLowerCase());
  if (parsed.success) return parsed.data;
  warnings.push(`${where}: unknown command type '${tag}', using '${DEFAULT_COMMAND_TYPE}'`);
  return DEFAULT_COMMAND_TYPE;
}

function toScalarString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function resolveEnv(
  env: RawCommandDetails['env'],
  where: string,
  warnings: string[],
): Array<[string, string]> {
  const resolved: Array<[string, string]> = [];
  for (const [name, value] of Object.entries(env ?? {})) {
    const text = toScalarString(value);
    if (text === undefined) {
      warnings.push(`${where}: env ${name} is not a string, skipping`);
    } else {
      resolved.push([name, text]);
    }
  }
  return resolved;
}

function resolveParams(
  params: RawCommandDetails['params'],
  where: string,
  warnings: string[],
): string[] {
  if (params === undefined) return [];
  if (typeof params === 'string') return params.split(/\s+/).filter((p) => p.length > 0);
  const resolved: string[] = [];
  params.forEach((param, index) => {
    const text = toScalarString(param);
    if (text === undefined) {
      warnings.push(`${where}: params[${index}] is not a string, skipping`);
    } else {
      resolved.push(text);
    }
  });
  return resolved;
}

function materializeDetails(
  rawValue: unknown,
  where: string,
  warnings: string[],
): CommandDetails | undefined {
  const parsed = RawCommandDetailsSchema.safeParse(rawValue);
  if (!parsed.success) {
    warnings.push(`${where}: expected a table, skipping`);
    return undefined;
  }
  const raw = parsed.data;
  if (raw.command === undefined || raw.command.trim().length === 0) {
    warnings.push(`${where}: missing command, skipping`);
    return undefined;
  }

  const builder = new CommandDetailsBuilder(raw.command, resolveCommandType(raw, where, warnings))
    .env(Object.fromEntries(resolveEnv(raw.env, where, warnings)))
    .params(resolveParams(raw.params, where, warnings))
    .allowMultipleInstances(raw.allow_multiple_instances ?? false);
  if (raw.pre_command !== undefined && raw.pre_command.length > 0) {
    builder.preCommand(raw.pre_command);
  }
  if (raw.working_directory !== undefined && raw.working_directory.length > 0) {
    builder.workingDirectory(raw.working_directory);
  }
  return builder.build();
}

function materializeCommandConfig(
  rawValue: unknown,
  context: string,
  warnings: string[],
): CommandConfig | undefined {
  const parsed = RawCommandConfigSchema.safeParse(rawValue);
  if (!parsed.success) {
    warnings.push(`commands.${context}: expected a table, skipping`);
    return undefined;
  }
  const raw = parsed.data;
  const config = new CommandConfig();
  for (const [key, value] of Object.entries(raw.entries ?? raw.configs ?? {})) {
    const details = materializeDetails(value, `commands.${context}.entries.${key}`, warnings);
    if (details) config.updateConfig(key, details);
  }

  const defaultKey = raw.default_key ?? raw.default;
  if (defaultKey !== undefined && defaultKey.length > 0) {
    if (config.has(defaultKey)) {
      config.setDefault(defaultKey);
    } else {
      warnings.push(`commands.${context}: default key '${defaultKey}' has no entry, ignoring`);
    }
  }
  return config;
}

/**
 * Second pass of a load: turns a parsed document into a {@link Config},
 * filling every absent field with its default. Entries that cannot form a
 * valid command are dropped and reported in `warnings`.
 */
export function materializeConfig(raw: unknown, opts: CommandsOptions = {}): MaterializeResult {
  const parsed = RawConfigDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CmdctxError(ErrorCode.CONFIG_PARSE_FAILURE, 'Config document must be a table');
  }
  const warnings: string[] = [];
  const commands = new Commands(opts);
  for (const [context, value] of Object.entries(parsed.data.commands ?? {})) {
    const config = materializeCommandConfig(value, context, warnings);
    if (config) commands.insertConfig(context, config);
  }
  return { config: new Config(commands), warnings };
}

function toDetailsDocument(details: CommandDetails): CommandDetailsDocument {
  const doc: CommandDetailsDocument = {
    command: details.command,
    command_type: details.commandType,
    allow_multiple_instances: details.allowMultipleInstances,
  };
  if (details.params.length > 0) doc.params = [...details.params];
  const envKeys = Object.keys(details.env).sort();
  if (envKeys.length > 0) {
    doc.env = Object.fromEntries(envKeys.map((key) => [key, details.env[key]]));
  }
  if (details.preCommand !== undefined) doc.pre_command = details.preCommand;
  if (details.workingDirectory !== undefined) doc.working_directory = details.workingDirectory;
  return doc;
}

function toCommandConfigDocument(commandConfig: CommandConfig): CommandConfigDocument {
  // fromEntries keeps every key an own property, `__proto__` included
  const entries = Object.fromEntries(
    commandConfig.entries().map(([key, details]) => [key, toDetailsDocument(details)] as const),
  );
  return {
    ...(commandConfig.defaultKey !== undefined && { default_key: commandConfig.defaultKey }),
    entries,
  };
}

export function toConfigDocument(config: Config): ConfigDocument {
  const commands = Object.fromEntries(
    config.commands
      .entries()
      .map(
        ([context, commandConfig]) => [context, toCommandConfigDocument(commandConfig)] as const,
      ),
  );
  return { commands };
}

export function serializeConfig(config: Config): string {
  return TOML.stringify(toConfigDocument(config) as unknown as TOML.JsonMap);
}

/**
 * Root of the persisted configuration. Built once by the entry point and
 * passed to whatever needs it.
 */
export class Config {
  constructor(readonly commands: Commands = new Commands()) {}

  /**
   * Registry seeded with one `default` cargo entry for `run`, `test`, `build`
   * and `bench`.
   */
  static createDefault(opts: CommandsOptions = {}): Config {
    const commands = new Commands(opts);
    for (const context of BUILTIN_CONTEXTS) {
      const config = CommandConfig.withContext(context);
      if (config.size > 0) commands.insertConfig(context, config);
    }
    return new Config(commands);
  }

  static async load(store: ConfigStore, opts: CommandsOptions = {}): Promise<LoadResult> {
    let text: string | undefined;
    try {
      text = await store.read();
    } catch (error) {
      throw new CmdctxError(
        ErrorCode.CONFIG_READ_FAILURE,
        `Failed to read ${store.location}`,
        { cause: error },
      );
    }
    if (text === undefined) {
      return { config: Config.createDefault(opts), warnings: [], source: 'defaults' };
    }
    const raw = parseConfigDocument(text, store.location);
    return { ...materializeConfig(raw, opts), source: 'store' };
  }

  /**
   * Write the registry through `store`. Leaves the in-memory state as it was
   * whether or not the write succeeds.
   */
  async save(store: ConfigStore): Promise<void> {
    const content = serializeConfig(this);
    try {
      await store.write(content);
    } catch (error) {
      throw new CmdctxError(
        ErrorCode.CONFIG_WRITE_FAILURE,
        `Failed to write ${store.location}`,
        { cause: error },
      );
    }
  }
}
