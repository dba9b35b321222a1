import type { CommandDetails } from '../types/command.js';

function quote(value: string): string {
  return /^[\w./:${}=+-]+$/.test(value) ? value : JSON.stringify(value);
}

/**
 * Command line the entry describes, as the executor would assemble it.
 */
export function formatCommandLine(details: CommandDetails): string {
  const head = details.commandType === 'cargo' ? `cargo ${details.command}` : details.command;
  return [head, ...details.params.map(quote)].join(' ');
}

export function formatDetails(details: CommandDetails): string[] {
  const lines = [
    `command: ${details.command}`,
    `type: ${details.commandType}`,
    `command line: ${formatCommandLine(details)}`,
  ];
  if (details.params.length > 0) lines.push(`params: ${details.params.map(quote).join(' ')}`);
  if (details.preCommand !== undefined) lines.push(`pre-command: ${details.preCommand}`);
  lines.push(`working directory: ${details.workingDirectory ?? '(current directory)'}`);
  lines.push(`allow multiple instances: ${details.allowMultipleInstances ? 'yes' : 'no'}`);
  for (const key of Object.keys(details.env).sort()) {
    lines.push(`env ${key}=${details.env[key]}`);
  }
  return lines;
}
