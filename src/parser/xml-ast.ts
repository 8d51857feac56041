import { SaxesParser, type SaxesTag } from 'saxes';

/** Line and column origin for diagnostics and traceability. */
export interface XmlLocation {
  line: number;
  column: number;
}

/** Immutable element shape the registry queries walk. */
export interface XmlNode {
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlNode[];
  readonly location: XmlLocation;
  readonly path: string;
}

/** Parse failure wrapper that keeps source coordinates when available. */
export class XmlParseError extends Error {
  readonly source?: XmlLocation;
  readonly sourceName?: string;

  constructor(message: string, source?: XmlLocation, sourceName?: string) {
    super(message);
    this.name = 'XmlParseError';
    this.source = source;
    this.sourceName = sourceName;
  }
}

/** Node used while SAX callbacks are still building the tree. */
interface MutableXmlNode {
  name: string;
  attributes: Record<string, string>;
  children: MutableXmlNode[];
  location: XmlLocation;
  path: string;
  childNameCount: Map<string, number>;
}

/**
 * Parse registry XML into an element-only AST with stable XPath-like paths.
 * Text content is dropped: the registry carries everything the generator
 * reads in attributes.
 */
export function parseXmlToAst(xmlText: string, sourceName?: string): XmlNode {
  const parser = new SaxesParser({
    position: true,
    fileName: sourceName
  });

  let root: MutableXmlNode | undefined;
  const stack: MutableXmlNode[] = [];
  const openTagLocations: XmlLocation[] = [];
  let parseError: XmlParseError | undefined;

  parser.on('error', (error) => {
    if (!parseError) {
      parseError = new XmlParseError(
        error.message,
        {
          line: parser.line,
          column: parser.column + 1
        },
        sourceName
      );
    }
  });

  parser.on('opentagstart', () => {
    openTagLocations.push({
      line: parser.line,
      column: parser.column + 1
    });
  });

  parser.on('opentag', (tag: SaxesTag) => {
    const start = openTagLocations.pop() ?? { line: parser.line, column: parser.column + 1 };
    const parent = stack.at(-1);

    const node: MutableXmlNode = {
      name: tag.name,
      attributes: toAttributeMap(tag),
      children: [],
      location: start,
      path: buildPath(parent, tag.name),
      childNameCount: new Map<string, number>()
    };

    if (parent) {
      parent.children.push(node);
    } else {
      root = node;
    }

    stack.push(node);
  });

  parser.on('closetag', () => {
    stack.pop();
  });

  parser.write(xmlText).close();

  if (parseError) {
    throw parseError;
  }

  if (!root) {
    throw new XmlParseError('No XML root element found', undefined, sourceName);
  }

  return freezeNode(root);
}

/** Normalize SAX attribute payload into plain string values. */
function toAttributeMap(tag: SaxesTag): Record<string, string> {
  const out: Record<string, string> = {};

  for (const [key, value] of Object.entries(tag.attributes)) {
    out[key] = typeof value === 'string' ? value : value.value;
  }

  return out;
}

/** Build deterministic node paths with sibling indexes (for diagnostics). */
function buildPath(parent: MutableXmlNode | undefined, name: string): string {
  if (!parent) {
    return `/${name}[1]`;
  }

  const next = (parent.childNameCount.get(name) ?? 0) + 1;
  parent.childNameCount.set(name, next);
  return `${parent.path}/${name}[${next}]`;
}

/** Freeze builder nodes into immutable AST nodes. */
function freezeNode(node: MutableXmlNode): XmlNode {
  return Object.freeze({
    name: node.name,
    attributes: Object.freeze(node.attributes),
    children: Object.freeze(node.children.map(freezeNode)),
    location: node.location,
    path: node.path
  });
}
