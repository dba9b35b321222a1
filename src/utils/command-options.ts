import { CmdctxError, ErrorCode } from '../core/errors.js';
import { CommandTypeSchema } from '../types/command.js';

import type { CommandType } from '../types/command.js';

export function normalizeCommandTypeOption(value: string | undefined): CommandType | undefined {
  if (!value) return undefined;
  const parsed = CommandTypeSchema.safeParse(value.trim().toLowerCase());
  if (parsed.success) return parsed.data;
  throw new CmdctxError(
    ErrorCode.INVALID_ARGUMENT,
    `Unsupported command type '${value}'. Expected ${CommandTypeSchema.options
      .map((option) => `'${option}'`)
      .join(' or ')}.`,
  );
}

/**
 * Parses repeated `KEY=VALUE` flags. The value may itself contain `=`.
 */
export function parseEnvAssignments(assignments: readonly string[]): Record<string, string> {
  const pairs: Array<[string, string]> = [];
  for (const assignment of assignments) {
    const eq = assignment.indexOf('=');
    const key = eq === -1 ? '' : assignment.slice(0, eq).trim();
    if (key.length === 0) {
      throw new CmdctxError(
        ErrorCode.INVALID_ARGUMENT,
        `Invalid env assignment '${assignment}'. Expected KEY=VALUE.`,
      );
    }
    pairs.push([key, assignment.slice(eq + 1)]);
  }
  return Object.fromEntries(pairs);
}

// commander accumulator for repeatable options
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
