import { SaxesParser, type SaxesAttribute, type SaxesTag } from 'saxes';

import { XmlParseError } from '../core/errors.js';

/** Line and column origin for diagnostics and traceability. */
export interface XmlLocation {
  line: number;
  column: number;
}

/** Minimal immutable XML element consumed by the translation passes. */
export interface XmlNode {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  text: string;
  location: XmlLocation;
  path: string;
}

/** Parsed document: the root element plus what the XML declaration said. */
export interface XmlDocument {
  root: XmlNode;
  declaredEncoding?: string;
  doctype?: string;
}

/** Mutable node used while SAX callbacks are still building the tree. */
interface MutableXmlNode {
  name: string;
  attributes: Record<string, string>;
  children: MutableXmlNode[];
  text: string;
  location: XmlLocation;
  path: string;
  childNameCount: Map<string, number>;
}

/** Parse XML into an immutable element tree; throws `XmlParseError` on malformed input. */
export function parseXmlToAst(xmlText: string, sourceName?: string): XmlNode {
  return parseXmlDocument(xmlText, sourceName).root;
}

/**
 * Parse a whole document, keeping the declaration's encoding and the doctype.
 * Element paths carry sibling indexes (`/score-partwise[1]/part[2]/measure[4]`).
 */
export function parseXmlDocument(xmlText: string, sourceName?: string): XmlDocument {
  const parser = new SaxesParser({
    xmlns: true,
    position: true,
    fileName: sourceName
  });

  let root: MutableXmlNode | undefined;
  const stack: MutableXmlNode[] = [];
  const openTagLocations: XmlLocation[] = [];
  let parseError: XmlParseError | undefined;
  let declaredEncoding: string | undefined;
  let doctype: string | undefined;

  parser.on('error', (error) => {
    if (!parseError) {
      parseError = new XmlParseError(error.message, {
        name: sourceName,
        line: parser.line,
        column: parser.column + 1
      });
    }
  });

  parser.on('xmldecl', (declaration) => {
    declaredEncoding = declaration.encoding;
  });

  parser.on('doctype', (text) => {
    doctype = text.trim();
  });

  parser.on('opentagstart', () => {
    openTagLocations.push({ line: parser.line, column: parser.column + 1 });
  });

  parser.on('opentag', (tag) => {
    const location = openTagLocations.pop() ?? { line: parser.line, column: parser.column + 1 };
    const parent = stack.at(-1);
    const name = localName(tag);
    const node: MutableXmlNode = {
      name,
      attributes: toAttributeMap(tag),
      children: [],
      text: '',
      location,
      path: buildPath(parent, name),
      childNameCount: new Map<string, number>()
    };

    if (parent) {
      parent.children.push(node);
    } else {
      root = node;
    }

    stack.push(node);
  });

  parser.on('text', appendText);
  parser.on('cdata', appendText);

  parser.on('closetag', () => {
    stack.pop();
  });

  // saxes keeps reporting after the first error; only the first one is surfaced.
  parser.write(xmlText).close();

  if (parseError) {
    throw parseError;
  }

  if (!root) {
    throw new XmlParseError('No XML root element found');
  }

  return { root: freezeNode(root), declaredEncoding, doctype };

  function appendText(text: string): void {
    const current = stack.at(-1);
    if (current) {
      current.text += text;
    }
  }
}

/** Namespace-local element name, so lookups stay prefix-agnostic. */
function localName(tag: SaxesTag): string {
  if (tag.local && tag.local.length > 0) {
    return tag.local;
  }

  const index = tag.name.indexOf(':');
  return index === -1 ? tag.name : tag.name.slice(index + 1);
}

/** Flatten SAX attributes into qualified and local keys. */
function toAttributeMap(tag: SaxesTag): Record<string, string> {
  const out: Record<string, string> = {};

  for (const [key, value] of Object.entries(tag.attributes)) {
    if (typeof value === 'string') {
      out[key] = value;
    } else {
      addAttributeKeys(out, key, value);
    }
  }

  return out;
}

function addAttributeKeys(out: Record<string, string>, key: string, attr: SaxesAttribute): void {
  out[key] = attr.value;
  out[attr.name] = attr.value;

  if ('local' in attr) {
    out[attr.local] = attr.value;
  }
}

function buildPath(parent: MutableXmlNode | undefined, name: string): string {
  if (!parent) {
    return `/${name}[1]`;
  }

  const next = (parent.childNameCount.get(name) ?? 0) + 1;
  parent.childNameCount.set(name, next);
  return `${parent.path}/${name}[${next}]`;
}

function freezeNode(node: MutableXmlNode): XmlNode {
  return {
    name: node.name,
    attributes: node.attributes,
    children: node.children.map(freezeNode),
    text: node.text,
    location: node.location,
    path: node.path
  };
}

/**
 * Synthesize an element outside any parsed document.
 * Used when regrouping timewise documents into partwise order.
 */
export function createXmlNode(
  name: string,
  children: XmlNode[],
  template: Pick<XmlNode, 'location' | 'path'>,
  attributes: Record<string, string> = {}
): XmlNode {
  return { name, attributes, children, text: '', location: template.location, path: template.path };
}
