/** Severity classes used by loader and classifier diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Stable codes for every diagnostic the generator can emit. */
export type DiagnosticCode =
  | 'SYMBOL_NAME_MISSING'
  | 'CORE_EXTENSION_COLLISION'
  | 'DUPLICATE_SYMBOL'
  | 'CROSS_KIND_COLLISION'
  | 'UNSAFE_SYMBOL_NAME'
  | 'SYMBOL_SUMMARY';

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  name?: string;
  line: number;
  column: number;
}

/** Canonical diagnostic object emitted by all public API operations. */
export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
  xmlPath?: string;
}

/** Sink invoked for each diagnostic as soon as it is produced. */
export type DiagnosticListener = (diagnostic: Diagnostic) => void;
