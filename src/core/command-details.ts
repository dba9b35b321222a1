import { CommandTypeSchema } from '../types/command.js';
import { CmdctxError, ErrorCode } from './errors.js';

import type {
  CommandDetails,
  CommandType,
  ValidationResult,
  Validator,
  ValidatorFn,
} from '../types/command.js';

function toValidator(input: Validator | ValidatorFn, position: number): Validator {
  if (typeof input !== 'function') return input;
  return {
    validate(candidate: CommandDetails): ValidationResult {
      const result = input(candidate);
      if (result === true) return { ok: true };
      if (result === false) {
        return { ok: false, message: `Validator #${position} rejected '${candidate.command}'` };
      }
      return result;
    },
  };
}

function freezeDetails(details: CommandDetails): CommandDetails {
  return Object.freeze({
    ...details,
    env: Object.freeze({ ...details.env }),
    params: Object.freeze([...details.params]),
  });
}

/**
 * Builds a {@link CommandDetails}. This is the only way to obtain one, so every
 * instance in a registry has passed the validators declared for it.
 *
 * @example
 * ```typescript
 * const details = new CommandDetailsBuilder('test', 'cargo')
 *   .params(['--', '--nocapture'])
 *   .env({ RUST_BACKTRACE: '1' })
 *   .build();
 * ```
 */
export class CommandDetailsBuilder {
  private readonly fields: {
    command: string;
    commandType: CommandType;
    env: Record<string, string>;
    preCommand?: string;
    params: string[];
    workingDirectory?: string;
    allowMultipleInstances: boolean;
  };
  private readonly validators: Validator[] = [];
  private consumed = false;

  constructor(command: string, commandType: CommandType) {
    this.fields = {
      command,
      commandType,
      env: {},
      params: [],
      allowMultipleInstances: false,
    };
  }

  /**
   * Start from an existing value. Validators are not carried over.
   */
  static from(details: CommandDetails): CommandDetailsBuilder {
    const builder = new CommandDetailsBuilder(details.command, details.commandType)
      .env(details.env)
      .params(details.params)
      .allowMultipleInstances(details.allowMultipleInstances);
    if (details.preCommand !== undefined) builder.preCommand(details.preCommand);
    if (details.workingDirectory !== undefined) builder.workingDirectory(details.workingDirectory);
    return builder;
  }

  command(command: string): this {
    this.assertOpen();
    this.fields.command = command;
    return this;
  }

  commandType(commandType: CommandType): this {
    this.assertOpen();
    this.fields.commandType = commandType;
    return this;
  }

  env(env: Readonly<Record<string, string>>): this {
    this.assertOpen();
    this.fields.env = { ...env };
    return this;
  }

  /** `undefined` clears a previously set pre-command */
  preCommand(preCommand: string | undefined): this {
    this.assertOpen();
    this.fields.preCommand = preCommand;
    return this;
  }

  params(params: readonly string[]): this {
    this.assertOpen();
    this.fields.params = [...params];
    return this;
  }

  workingDirectory(workingDirectory: string | undefined): this {
    this.assertOpen();
    this.fields.workingDirectory = workingDirectory;
    return this;
  }

  allowMultipleInstances(allow: boolean): this {
    this.assertOpen();
    this.fields.allowMultipleInstances = allow;
    return this;
  }

  addValidator(validator: Validator | ValidatorFn): this {
    this.assertOpen();
    this.validators.push(toValidator(validator, this.validators.length + 1));
    return this;
  }

  build(): CommandDetails {
    this.assertOpen();
    this.consumed = true;

    const { command, commandType } = this.fields;
    if (command.trim().length === 0) {
      throw new CmdctxError(ErrorCode.INVALID_COMMAND, 'Command must not be empty');
    }
    if (!CommandTypeSchema.safeParse(commandType).success) {
      throw new CmdctxError(
        ErrorCode.INVALID_COMMAND,
        `Unknown command type '${String(commandType)}'. Expected one of: ${CommandTypeSchema.options.join(', ')}`,
      );
    }

    const candidate: CommandDetails = {
      command,
      commandType,
      env: this.fields.env,
      params: this.fields.params,
      allowMultipleInstances: this.fields.allowMultipleInstances,
      ...(this.fields.preCommand !== undefined && { preCommand: this.fields.preCommand }),
      ...(this.fields.workingDirectory !== undefined && {
        workingDirectory: this.fields.workingDirectory,
      }),
    };
    const details = freezeDetails(candidate);

    for (const validator of this.validators) {
      const result = validator.validate(details);
      if (!result.ok) {
        throw new CmdctxError(ErrorCode.VALIDATION_FAILED, result.message, {
          details: { command },
        });
      }
    }
    return details;
  }

  private assertOpen(): void {
    if (this.consumed) {
      throw new CmdctxError(
        ErrorCode.INVALID_ARGUMENT,
        'CommandDetailsBuilder has already been built; start a new builder',
      );
    }
  }
}

export function commandDetailsEqual(a: CommandDetails, b: CommandDetails): boolean {
  if (a.command !== b.command || a.commandType !== b.commandType) return false;
  if (a.preCommand !== b.preCommand || a.workingDirectory !== b.workingDirectory) return false;
  if (a.allowMultipleInstances !== b.allowMultipleInstances) return false;
  if (a.params.length !== b.params.length) return false;
  if (a.params.some((param, index) => param !== b.params[index])) return false;
  const envKeys = Object.keys(a.env);
  if (envKeys.length !== Object.keys(b.env).length) return false;
  return envKeys.every((key) => b.env[key] === a.env[key]);
}
