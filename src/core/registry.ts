import type { XmlNode } from '../parser/xml-ast.js';

/** Symbol kinds documented by the generator, in processing order. */
export const SYMBOL_KINDS = ['command', 'enum'] as const;

/** One of the registry element names that carry a documented symbol. */
export type SymbolKind = (typeof SYMBOL_KINDS)[number];

/** Container categories in precedence order: core versions before extensions. */
export const CONTAINER_TYPES = ['feature', 'extension'] as const;

/** Registry element that introduces symbols. */
export type ContainerType = (typeof CONTAINER_TYPES)[number];

/** Version every symbol of the first core release was introduced in. */
export const BASELINE_VERSION = '1.0';

/** Prefix shared by all extension names (`cl_khr_fp64`, `cl_ext_float_atomics`, ...). */
export const EXTENSION_PREFIX = 'cl_';

/** Feature or extension element resolved from the registry tree. */
export interface RegistryContainer {
  type: ContainerType;
  /** Feature `number` or extension `name`. */
  id: string;
  node: XmlNode;
}

/** A `<require>` group, optionally carrying a free-text comment. */
export interface RequireGroup {
  comment?: string;
  node: XmlNode;
}

/** Resolved availability of one symbol, ready for rendering. */
export interface VersionSymbol {
  name: string;
  kind: SymbolKind;
  /** Version token ("1.2") or extension name ("cl_khr_gl_sharing"). */
  addedIn: string;
  deprecatedBy?: string;
  container: RegistryContainer;
}

/**
 * Note category derived from `addedIn` and `deprecatedBy`.
 * Extensions have no deprecated variant.
 */
export type NoteClassification =
  | { kind: 'always-present' }
  | { kind: 'deprecated'; deprecatedBy: string }
  | { kind: 'added'; addedIn: string }
  | { kind: 'added-deprecated'; addedIn: string; deprecatedBy: string }
  | { kind: 'extension'; extension: string };

/** Counters reported after one classification pass. */
export interface ClassificationStats {
  kind: SymbolKind;
  visited: number;
  newerThanBaseline: number;
  deprecated: number;
}

/** Whether a version-or-extension token names an extension. */
export function isExtensionToken(token: string): boolean {
  return token.startsWith(EXTENSION_PREFIX);
}
