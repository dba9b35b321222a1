import { z } from 'zod';

/**
 * Scenario a set of command configurations is keyed by: a task category such
 * as `test`, a project name or a file path. Compared by value.
 */
export type CommandContext = string;

export const BUILTIN_CONTEXTS = ['run', 'test', 'build', 'bench', 'script'] as const;

export const CommandTypeSchema = z.enum(['cargo', 'shell']);

// cargo: `command` is a cargo subcommand line; shell: `command` runs as-is
export type CommandType = z.infer<typeof CommandTypeSchema>;

export const DEFAULT_COMMAND_TYPE: CommandType = 'shell';

export interface CommandDetails {
  readonly command: string;
  readonly commandType: CommandType;
  readonly env: Readonly<Record<string, string>>;
  readonly preCommand?: string;
  readonly params: readonly string[];
  /** Unset means the caller's current directory */
  readonly workingDirectory?: string;
  readonly allowMultipleInstances: boolean;
}

export type ValidationResult = { ok: true } | { ok: false; message: string };

/**
 * Check run against a fully assembled candidate before the builder accepts it.
 */
export interface Validator {
  validate(candidate: CommandDetails): ValidationResult;
}

export type ValidatorFn = (candidate: CommandDetails) => ValidationResult | boolean;
