#!/usr/bin/env node
import { buildProgram } from './program.js';

async function main(argv: string[]): Promise<void> {
  await buildProgram().parseAsync(argv);
}

// Always execute when invoked as CLI entry
main(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
