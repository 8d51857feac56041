import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';

/** Registry location used when neither a flag nor the config file names one. */
export const DEFAULT_REGISTRY = 'cl.xml';
/** Output directory used when neither a flag nor the config file names one. */
export const DEFAULT_OUTPUT_DIR = '.';

/** Settings read from an optional YAML config file. */
export interface NotesConfig {
  registry?: string;
  output?: string;
}

/** Fully resolved generator settings. */
export interface ResolvedNotesConfig {
  registry: string;
  output: string;
}

/** Validation error for malformed config files. */
export class NotesConfigError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Config error in ${filePath}: ${message}`);
    this.name = 'NotesConfigError';
    this.filePath = filePath;
  }
}

/** Keys accepted in the config file. */
const CONFIG_KEYS = new Set(['registry', 'output']);

/** Load and validate a YAML config file. */
export async function loadNotesConfig(filePath: string): Promise<NotesConfig> {
  const raw = await readFile(filePath, 'utf8');
  return parseNotesConfig(filePath, parseYaml(raw));
}

/** Validate parsed YAML into a `NotesConfig`. An empty document is an empty config. */
export function parseNotesConfig(filePath: string, input: unknown): NotesConfig {
  if (input === undefined || input === null) {
    return {};
  }

  if (typeof input !== 'object' || Array.isArray(input)) {
    throw new NotesConfigError(filePath, 'config must be a YAML mapping');
  }

  const obj = input as Record<string, unknown>;
  for (const key of Object.keys(obj)) {
    if (!CONFIG_KEYS.has(key)) {
      throw new NotesConfigError(filePath, `unknown key '${key}'`);
    }
  }

  const config: NotesConfig = {};
  const registry = readOptionalString(filePath, obj, 'registry');
  const output = readOptionalString(filePath, obj, 'output');

  if (registry !== undefined) {
    config.registry = registry;
  }
  if (output !== undefined) {
    config.output = output;
  }

  return config;
}

/** Merge settings: explicit flags, then config file, then defaults. */
export function resolveNotesConfig(flags: NotesConfig, fileConfig: NotesConfig = {}): ResolvedNotesConfig {
  return {
    registry: flags.registry ?? fileConfig.registry ?? DEFAULT_REGISTRY,
    output: flags.output ?? fileConfig.output ?? DEFAULT_OUTPUT_DIR
  };
}

/** Read an optional non-empty string field. */
function readOptionalString(filePath: string, obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string' || value.trim() === '') {
    throw new NotesConfigError(filePath, `'${key}' must be a non-empty string`);
  }

  return value;
}
