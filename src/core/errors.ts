import type { RegistrySource } from '../parser/registry-source.js';
import type { RequireGroup, SymbolKind } from './registry.js';

/** Registry location could not be read or fetched. */
export class RegistrySourceError extends Error {
  readonly registrySource: RegistrySource;

  constructor(registrySource: RegistrySource, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RegistrySourceError';
    this.registrySource = registrySource;
  }
}

/** Registry element is missing an attribute the classifier cannot do without. */
export class RegistryStructureError extends Error {
  readonly xmlPath: string;

  constructor(xmlPath: string, message: string) {
    super(`${message} (at ${xmlPath})`);
    this.name = 'RegistryStructureError';
    this.xmlPath = xmlPath;
  }
}

/** A require-group comment mentions deprecation but not in the `... deprecated in OpenCL X.Y` form. */
export class DeprecationCommentError extends Error {
  readonly symbolName: string;
  readonly group: RequireGroup;

  constructor(symbolName: string, group: RequireGroup) {
    super(
      `Malformed deprecation comment for ${symbolName} at ${group.node.path}: '${group.comment ?? ''}'`
    );
    this.name = 'DeprecationCommentError';
    this.symbolName = symbolName;
    this.group = group;
  }
}

/** More than one require group claims to deprecate the same symbol. */
export class DeprecationConflictError extends Error {
  readonly symbolName: string;
  readonly kind: SymbolKind;
  readonly groups: readonly [RequireGroup, RequireGroup];

  constructor(symbolName: string, kind: SymbolKind, first: RequireGroup, second: RequireGroup) {
    super(
      `${kind} ${symbolName} is deprecated twice: ` +
        `'${first.comment ?? ''}' (${first.node.path}) and '${second.comment ?? ''}' (${second.node.path})`
    );
    this.name = 'DeprecationConflictError';
    this.symbolName = symbolName;
    this.kind = kind;
    this.groups = [first, second];
  }
}
