import type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticListener,
  DiagnosticSeverity
} from '../core/diagnostics.js';
import type { XmlNode } from '../parser/xml-ast.js';

/** Diagnostic state shared by the passes of one generator run. */
export interface NotesContext {
  sourceName?: string;
  diagnostics: Diagnostic[];
  listener?: DiagnosticListener;
}

/** Create a context for one run. */
export function createNotesContext(sourceName?: string, listener?: DiagnosticListener): NotesContext {
  return {
    sourceName,
    diagnostics: [],
    listener
  };
}

/**
 * Record a diagnostic and forward it to the listener right away, so callers
 * see warnings even when a later symbol aborts the run.
 */
export function addDiagnostic(
  ctx: NotesContext,
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  node?: XmlNode
): void {
  const diagnostic: Diagnostic = {
    code,
    severity,
    message
  };

  if (node) {
    diagnostic.source = { name: ctx.sourceName, ...node.location };
    diagnostic.xmlPath = node.path;
  }

  ctx.diagnostics.push(diagnostic);
  ctx.listener?.(diagnostic);
}
