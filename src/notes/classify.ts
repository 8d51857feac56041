import { DeprecationCommentError, DeprecationConflictError } from '../core/errors.js';
import {
  BASELINE_VERSION,
  CONTAINER_TYPES,
  isExtensionToken,
  type ClassificationStats,
  type ContainerType,
  type NoteClassification,
  type RegistryContainer,
  type RequireGroup,
  type SymbolKind,
  type VersionSymbol
} from '../core/registry.js';
import type { Registry } from '../parser/parse-registry.js';
import type { XmlNode } from '../parser/xml-ast.js';
import { attribute } from '../parser/xml-utils.js';
import { addDiagnostic, type NotesContext } from './notes-context.js';

/** Phrase that marks a require group as a deprecation list. */
export const DEPRECATION_MARKER = 'deprecated in OpenCL';

/** Characters that would let a registry name leave the output directory. */
const PATH_SEPARATORS = /[\\/\0]/;

/** Symbols selected for output plus the pass counters. */
export interface ClassificationResult {
  symbols: VersionSymbol[];
  stats: ClassificationStats;
}

/**
 * Resolve every symbol of one kind to its introducing feature or extension.
 *
 * Features are visited before extensions, so a symbol that a core version and
 * an extension both require is documented against the core version. Each name
 * is selected at most once; later occurrences are reported as warnings.
 * Names in `claimed` already have a note from another kind's pass and are
 * skipped with a warning.
 */
export function classifySymbols(
  registry: Registry,
  kind: SymbolKind,
  ctx: NotesContext,
  claimed: ReadonlyMap<string, VersionSymbol> = new Map()
): ClassificationResult {
  const processed = new Map<string, RegistryContainer>();
  const symbols: VersionSymbol[] = [];
  const stats: ClassificationStats = { kind, visited: 0, newerThanBaseline: 0, deprecated: 0 };

  for (const type of CONTAINER_TYPES) {
    for (const container of registry.containers(type, kind)) {
      for (const entry of registry.symbolEntries(container, kind)) {
        const name = attribute(entry, 'name');
        if (name === undefined || name === '') {
          addDiagnostic(
            ctx,
            'SYMBOL_NAME_MISSING',
            'warning',
            `<${kind}> without a name in ${describe(container)}`,
            entry
          );
          continue;
        }

        if (!isSafeFileName(name)) {
          addDiagnostic(
            ctx,
            'UNSAFE_SYMBOL_NAME',
            'warning',
            `<${kind}> name '${name}' in ${describe(container)} cannot be used as a file name; skipped`,
            entry
          );
          continue;
        }

        stats.visited += 1;

        const deprecatedBy = container.type === 'feature' ? findDeprecation(registry, kind, name) : undefined;

        const owner = processed.get(name);
        if (owner) {
          reportDuplicate(ctx, name, owner, container, entry);
          continue;
        }

        const otherKind = claimed.get(name);
        if (otherKind) {
          addDiagnostic(
            ctx,
            'CROSS_KIND_COLLISION',
            'warning',
            `${name} is declared as both ${otherKind.kind} and ${kind} in the XML; ` +
              `only the ${otherKind.kind} from ${describe(otherKind.container)} is noted`,
            entry
          );
          continue;
        }

        processed.set(name, container);
        symbols.push({ name, kind, addedIn: container.id, deprecatedBy, container });

        if (container.id !== BASELINE_VERSION) {
          stats.newerThanBaseline += 1;
        }
        if (deprecatedBy !== undefined) {
          stats.deprecated += 1;
        }
      }
    }
  }

  addDiagnostic(ctx, 'SYMBOL_SUMMARY', 'info', formatSummary(stats));
  return { symbols, stats };
}

/**
 * Find the version that deprecates `name`, from require-group comments ending in
 * `"... deprecated in OpenCL 1.2"`.
 * Throws when the marker is misplaced or more than one group deprecates the symbol.
 */
export function findDeprecation(registry: Registry, kind: SymbolKind, name: string): string | undefined {
  let deprecatedBy: string | undefined;
  let deprecatingGroup: RequireGroup | undefined;

  for (const group of registry.commentedRequireGroups(kind, name)) {
    const comment = group.comment ?? '';
    if (!comment.includes(DEPRECATION_MARKER)) {
      continue;
    }

    const words = comment.split(' ');
    if (words.slice(-4, -1).join(' ') !== DEPRECATION_MARKER) {
      throw new DeprecationCommentError(name, group);
    }

    if (deprecatingGroup) {
      throw new DeprecationConflictError(name, kind, deprecatingGroup, group);
    }

    deprecatingGroup = group;
    deprecatedBy = words.at(-1);
  }

  return deprecatedBy;
}

/**
 * Map the introducing token and optional deprecation to a note category.
 * Without an explicit container type, tokens are told apart by the `cl_` prefix.
 */
export function classifyNote(
  addedIn: string,
  deprecatedBy?: string,
  containerType: ContainerType = isExtensionToken(addedIn) ? 'extension' : 'feature'
): NoteClassification {
  if (containerType === 'extension') {
    return { kind: 'extension', extension: addedIn };
  }

  if (addedIn === BASELINE_VERSION) {
    return deprecatedBy === undefined ? { kind: 'always-present' } : { kind: 'deprecated', deprecatedBy };
  }

  return deprecatedBy === undefined
    ? { kind: 'added', addedIn }
    : { kind: 'added-deprecated', addedIn, deprecatedBy };
}

/** Summary line printed after each pass. */
export function formatSummary(stats: ClassificationStats): string {
  return (
    `Found ${stats.visited} API ${stats.kind}s, ` +
    `${stats.newerThanBaseline} newer than ${BASELINE_VERSION}, ` +
    `${stats.deprecated} deprecated`
  );
}

/** Warn about a name that an earlier container already claimed. */
function reportDuplicate(
  ctx: NotesContext,
  name: string,
  owner: RegistryContainer,
  container: RegistryContainer,
  entry: XmlNode
): void {
  if (owner.type === 'feature' && container.type === 'extension') {
    addDiagnostic(
      ctx,
      'CORE_EXTENSION_COLLISION',
      'warning',
      `${name} exists as both a core version and extension API in the XML; ` +
        `only the core version dependency (${owner.id}) is noted`,
      entry
    );
    return;
  }

  addDiagnostic(
    ctx,
    'DUPLICATE_SYMBOL',
    'warning',
    `${name} is required by both ${describe(owner)} and ${describe(container)}; ` +
      `only ${describe(owner)} is noted`,
    entry
  );
}

/** A name is usable as `<name>.asciidoc` when it stays a single path segment. */
export function isSafeFileName(name: string): boolean {
  return !PATH_SEPARATORS.test(name) && name !== '.' && name !== '..';
}

function describe(container: RegistryContainer): string {
  return container.type === 'feature' ? `version ${container.id}` : `extension ${container.id}`;
}
