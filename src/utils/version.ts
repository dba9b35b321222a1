import { readFileSync } from 'node:fs';

import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

let cached: string | undefined;

export function getCliVersion(): string {
  if (cached !== undefined) return cached;
  try {
    // src/utils and dist/utils both sit two levels below package.json
    const url = new URL('../../package.json', import.meta.url);
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(url, 'utf8')));
    cached = parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    cached = '0.0.0';
  }
  return cached;
}
