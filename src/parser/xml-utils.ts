import type { XmlNode } from './xml-ast.js';

/** Return all children matching `name`. */
export function childrenOf(node: XmlNode | undefined, name: string): XmlNode[] {
  if (!node) {
    return [];
  }

  return node.children.filter((child) => child.name === name);
}

/** Return true when at least one direct child is named `name`. */
export function hasChild(node: XmlNode, name: string): boolean {
  return node.children.some((child) => child.name === name);
}

/** Return every descendant named `name`, in document order. */
export function descendantsOf(node: XmlNode, name: string): XmlNode[] {
  const out: XmlNode[] = [];

  const walk = (current: XmlNode): void => {
    for (const child of current.children) {
      if (child.name === name) {
        out.push(child);
      }
      walk(child);
    }
  };

  walk(node);
  return out;
}

/** Read attribute `name` from a node, if available. */
export function attribute(node: XmlNode | undefined, name: string): string | undefined {
  return node?.attributes[name];
}
