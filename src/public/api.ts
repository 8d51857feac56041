import { DEFAULT_OUTPUT_DIR } from '../config/notes-config.js';
import type { Diagnostic, DiagnosticListener } from '../core/diagnostics.js';
import { SYMBOL_KINDS, type ClassificationStats, type VersionSymbol } from '../core/registry.js';
import { classifySymbols } from '../notes/classify.js';
import { createNotesContext } from '../notes/notes-context.js';
import { writeNotes } from '../notes/write-notes.js';
import { parseRegistry } from '../parser/parse-registry.js';
import {
  describeRegistrySource,
  readRegistrySource,
  resolveRegistrySource,
  type RegistryFetch,
  type RegistrySource
} from '../parser/registry-source.js';

/** Generator configuration. */
export interface GenerateOptions {
  /** Local path or `http(s)://` URL of the registry XML. */
  registry: string;
  outputDir?: string;
  /** Replaces the global `fetch` for remote registries. */
  fetch?: RegistryFetch;
  /** Receives each diagnostic as soon as it is produced. */
  onDiagnostic?: DiagnosticListener;
}

/** Outcome of a complete run. */
export interface GenerateResult {
  source: RegistrySource;
  /** Paths of every note written, commands first. */
  files: string[];
  summaries: ClassificationStats[];
  diagnostics: Diagnostic[];
}

/**
 * Load the registry and write one note per command and enumerant.
 * Source and registry errors are thrown; the command notes of a run that fails
 * during the enumerant pass stay on disk.
 */
export async function generateVersionNotes(options: GenerateOptions): Promise<GenerateResult> {
  const source = resolveRegistrySource(options.registry);
  const sourceName = describeRegistrySource(source);
  const outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;

  const xmlText = await readRegistrySource(source, { fetch: options.fetch });
  const registry = parseRegistry(xmlText, sourceName);
  const ctx = createNotesContext(sourceName, options.onDiagnostic);

  const files: string[] = [];
  const summaries: ClassificationStats[] = [];
  const noted = new Map<string, VersionSymbol>();

  for (const kind of SYMBOL_KINDS) {
    const { symbols, stats } = classifySymbols(registry, kind, ctx, noted);
    files.push(...(await writeNotes(outputDir, symbols)));
    summaries.push(stats);
    for (const symbol of symbols) {
      noted.set(symbol.name, symbol);
    }
  }

  return {
    source,
    files,
    summaries,
    diagnostics: ctx.diagnostics
  };
}
