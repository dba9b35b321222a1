import type { CommandConfigView } from './command-config.js';
import type { CommandDetails, ValidationResult, Validator } from '../types/command.js';

const PLACEHOLDER = /\$\{[^}]+\}/;

/**
 * A pre-command names another entry of the same context. It may not name the
 * entry being built, and the entry it names must already exist.
 */
export function preCommandValidator(config: CommandConfigView, configKey: string): Validator {
  return {
    validate(candidate: CommandDetails): ValidationResult {
      const pre = candidate.preCommand;
      if (pre === undefined || pre.length === 0) return { ok: true };
      if (pre === configKey) {
        return { ok: false, message: `Cannot set pre_command to its own key: ${configKey}` };
      }
      if (!config.has(pre)) {
        return { ok: false, message: `pre_command '${pre}' does not exist as a command key` };
      }
      return { ok: true };
    },
  };
}

/**
 * Rejects a working directory that `exists` reports missing. Paths holding a
 * `${...}` placeholder are resolved by the executor and pass unchecked.
 */
export function workingDirectoryValidator(exists: (dir: string) => boolean): Validator {
  return {
    validate(candidate: CommandDetails): ValidationResult {
      const dir = candidate.workingDirectory;
      if (dir === undefined || PLACEHOLDER.test(dir)) return { ok: true };
      if (!exists(dir)) {
        return { ok: false, message: `Working directory does not exist: ${dir}` };
      }
      return { ok: true };
    },
  };
}
