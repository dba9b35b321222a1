import { z } from 'zod';

// Sparse schemas for the persisted document. Every field is optional and a
// field of the wrong type reads as absent; materialization fills defaults.

const optionalString = z.string().optional().catch(undefined);

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Passed through as parsed: user-chosen keys such as `__proto__` stay own
// properties, and values are checked one by one during materialization.
const optionalTable = z.custom<Record<string, unknown>>(isTable).optional().catch(undefined);

export const RawCommandDetailsSchema = z.object({
  command: optionalString,
  command_type: optionalString,
  // older files spell the tag `type`
  type: optionalString,
  env: optionalTable,
  pre_command: optionalString,
  params: z.union([z.array(z.unknown()), z.string()]).optional().catch(undefined),
  working_directory: optionalString,
  allow_multiple_instances: z.boolean().optional().catch(undefined),
});

export const RawCommandConfigSchema = z.object({
  entries: optionalTable,
  configs: optionalTable,
  default_key: optionalString,
  default: optionalString,
});

export const RawConfigDocumentSchema = z.object({
  commands: optionalTable,
});

export type RawCommandDetails = z.infer<typeof RawCommandDetailsSchema>;

export interface CommandDetailsDocument {
  command: string;
  command_type: string;
  env?: Record<string, string>;
  pre_command?: string;
  params?: string[];
  working_directory?: string;
  allow_multiple_instances: boolean;
}

export interface CommandConfigDocument {
  default_key?: string;
  entries: Record<string, CommandDetailsDocument>;
}

export interface ConfigDocument {
  commands: Record<string, CommandConfigDocument>;
}
