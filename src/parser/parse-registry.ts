import { RegistryStructureError } from '../core/errors.js';
import type { ContainerType, RegistryContainer, RequireGroup, SymbolKind } from '../core/registry.js';
import { parseXmlToAst, type XmlNode } from './xml-ast.js';
import { attribute, childrenOf, descendantsOf, hasChild } from './xml-utils.js';

/** Attribute that identifies each container type. */
const CONTAINER_ID_ATTRIBUTE: Record<ContainerType, string> = {
  feature: 'number',
  extension: 'name'
};

/** Read-only view over a parsed registry document. */
export class Registry {
  readonly root: XmlNode;
  readonly sourceName?: string;
  private readonly commentedGroups: RequireGroup[];

  constructor(root: XmlNode, sourceName?: string) {
    this.root = root;
    this.sourceName = sourceName;
    this.commentedGroups = collectCommentedGroups(root);
  }

  /**
   * Every `type` element that has a `<require>` child holding a `<kind>` child,
   * in document order.
   */
  containers(type: ContainerType, kind: SymbolKind): RegistryContainer[] {
    return descendantsOf(this.root, type)
      .filter((node) => childrenOf(node, 'require').some((group) => hasChild(group, kind)))
      .map((node) => toContainer(type, node));
  }

  /** Every `<kind>` element anywhere below the container, in document order. */
  symbolEntries(container: RegistryContainer, kind: SymbolKind): XmlNode[] {
    return descendantsOf(container.node, kind);
  }

  /** Commented `<require>` groups anywhere in the registry that directly list `<kind name="name">`. */
  commentedRequireGroups(kind: SymbolKind, name: string): RequireGroup[] {
    return this.commentedGroups.filter((group) =>
      childrenOf(group.node, kind).some((entry) => attribute(entry, 'name') === name)
    );
  }
}

/** Parse registry XML text. Malformed documents throw `XmlParseError`. */
export function parseRegistry(xmlText: string, sourceName?: string): Registry {
  return new Registry(parseXmlToAst(xmlText, sourceName), sourceName);
}

/** All `<require comment="...">` groups in document order. */
function collectCommentedGroups(root: XmlNode): RequireGroup[] {
  const groups: RequireGroup[] = [];

  for (const node of descendantsOf(root, 'require')) {
    const comment = attribute(node, 'comment');
    if (comment !== undefined) {
      groups.push({ comment, node });
    }
  }

  return groups;
}

/** Resolve the identifying attribute of a feature or extension element. */
function toContainer(type: ContainerType, node: XmlNode): RegistryContainer {
  const idAttribute = CONTAINER_ID_ATTRIBUTE[type];
  const id = attribute(node, idAttribute);
  if (id === undefined || id.trim() === '') {
    throw new RegistryStructureError(node.path, `<${type}> is missing its '${idAttribute}' attribute`);
  }

  return { type, id, node };
}
