export {
  generateVersionNotes,
  type GenerateOptions,
  type GenerateResult
} from './api.js';
export type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticListener,
  DiagnosticSeverity,
  DiagnosticSource
} from '../core/diagnostics.js';
export {
  DeprecationCommentError,
  DeprecationConflictError,
  RegistrySourceError,
  RegistryStructureError
} from '../core/errors.js';
export type {
  ClassificationStats,
  NoteClassification,
  SymbolKind,
  VersionSymbol
} from '../core/registry.js';
export { classifyNote, classifySymbols, findDeprecation, formatSummary } from '../notes/classify.js';
export { createNotesContext } from '../notes/notes-context.js';
export { formatFullNote, formatShortNote, renderNoteFile } from '../notes/render-note.js';
export { writeNotes } from '../notes/write-notes.js';
export { parseRegistry, Registry } from '../parser/parse-registry.js';
export {
  readRegistrySource,
  resolveRegistrySource,
  type RegistryFetch,
  type RegistrySource
} from '../parser/registry-source.js';
export { XmlParseError } from '../parser/xml-ast.js';
export {
  loadNotesConfig,
  NotesConfigError,
  parseNotesConfig,
  resolveNotesConfig,
  type NotesConfig
} from '../config/notes-config.js';
