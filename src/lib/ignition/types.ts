// Path: src/lib/ignition/types.ts
// Loose structural types for Ignition JSON documents

/**
 * An Ignition document. Only the sections the assembler touches are
 * inspected; everything else passes through untouched.
 */
export type IgnitionConfig = Record<string, unknown>;

export interface InspectedFile {
  path: string;
  /** Octal permission string, or "?" when the entry has no mode */
  mode: string;
  content: string;
}

export interface InspectedDropin {
  unit: string;
  name: string;
  contents: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Entries of `config[section][key]` when that is an array, else empty
 */
export function getEntries(config: IgnitionConfig, section: string, key: string): unknown[] {
  const parent = config[section];
  if (!isRecord(parent)) {
    return [];
  }
  const entries = parent[key];
  return Array.isArray(entries) ? entries : [];
}
