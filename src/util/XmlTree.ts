/**
 * Minimal ordered XML element tree over fast-xml-parser.
 *
 * EDI XML depends on sibling order and on repeated tag names, so both
 * directions use fast-xml-parser's `preserveOrder` form. Only elements,
 * attributes and text survive: declarations, processing instructions and
 * comments are dropped, and namespace prefixes are removed from names.
 *
 * Whitespace-only text between child elements is formatting and is ignored;
 * the text of a leaf element is kept exactly, spaces included.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { FormatError } from '../errors/FormatError.js';

export interface XmlNode {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  /** Text content; ignored when building a node with children, empty when parsed with children */
  text: string;
}

export interface XmlBuildOptions {
  /** Indent nested elements (default false) */
  pretty?: boolean;
  /** Indentation unit when pretty printing (default two spaces) */
  indentBy?: string;
}

const ATTR_PREFIX = '@_';
const ATTRS_KEY = ':@';
const TEXT_NODE_NAME = '#text';

type OrderedEntry = Record<string, unknown>;

export function createXmlNode(
  name: string,
  init: { attributes?: Record<string, string>; children?: XmlNode[]; text?: string } = {}
): XmlNode {
  return {
    name,
    attributes: init.attributes ?? {},
    children: init.children ?? [],
    text: init.text ?? '',
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toScalarText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Parse XML text and return its root element.
 */
export function parseXmlTree(xml: string): XmlNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new FormatError(`Invalid XML at line ${line}, column ${col}: ${msg}`, 'INVALID_XML');
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    textNodeName: TEXT_NODE_NAME,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    removeNSPrefix: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
  });

  const parsed: unknown = parser.parse(xml);
  const roots = Array.isArray(parsed) ? parsed.map(toXmlNode).filter((n): n is XmlNode => n !== null) : [];
  const root = roots[0];
  if (!root) {
    throw new FormatError('Invalid XML: no root element', 'INVALID_XML');
  }
  return root;
}

/**
 * Convert one preserveOrder entry; text entries and non-element entries give null.
 */
function toXmlNode(entry: unknown): XmlNode | null {
  if (!isRecord(entry)) return null;

  const name = Object.keys(entry).find((key) => key !== ATTRS_KEY);
  if (!name || name === TEXT_NODE_NAME || name.startsWith('?')) {
    return null;
  }

  const node = createXmlNode(name);

  const rawAttributes = entry[ATTRS_KEY];
  if (isRecord(rawAttributes)) {
    for (const [key, value] of Object.entries(rawAttributes)) {
      const attrName = key.startsWith(ATTR_PREFIX) ? key.substring(ATTR_PREFIX.length) : key;
      node.attributes[attrName] = toScalarText(value);
    }
  }

  const content = entry[name];
  let text = '';
  if (Array.isArray(content)) {
    for (const child of content) {
      if (isRecord(child) && TEXT_NODE_NAME in child) {
        text += toScalarText(child[TEXT_NODE_NAME]);
        continue;
      }
      const childNode = toXmlNode(child);
      if (childNode) {
        node.children.push(childNode);
      }
    }
  }
  node.text = node.children.length > 0 ? '' : text;
  return node;
}

/**
 * Render a tree as XML text (no declaration).
 */
export function buildXmlTree(root: XmlNode, options: XmlBuildOptions = {}): string {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    textNodeName: TEXT_NODE_NAME,
    format: options.pretty ?? false,
    indentBy: options.indentBy ?? '  ',
    suppressEmptyNode: false,
  });
  const output: string = builder.build([toOrderedEntry(root)]);
  return output.replace(/^\r?\n/, '');
}

function toOrderedEntry(node: XmlNode): OrderedEntry {
  let content: OrderedEntry[];
  if (node.children.length > 0) {
    content = node.children.map(toOrderedEntry);
  } else if (node.text !== '') {
    content = [{ [TEXT_NODE_NAME]: node.text }];
  } else {
    content = [];
  }

  const entry: OrderedEntry = { [node.name]: content };
  const attributeNames = Object.keys(node.attributes);
  if (attributeNames.length > 0) {
    const attributes: Record<string, string> = {};
    for (const attrName of attributeNames) {
      attributes[ATTR_PREFIX + attrName] = node.attributes[attrName] ?? '';
    }
    entry[ATTRS_KEY] = attributes;
  }
  return entry;
}
