import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { FormatError } from '../errors.js';

export interface XmlText {
  type: 'text';
  text: string;
}

export interface XmlElement {
  type: 'element';
  /** Local name, namespace prefix removed. */
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlElement | XmlText;

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

// Ordered mode keeps mixed content (text around <ref> elements) in sequence.
const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  processEntities: true,
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function localName(name: string): string {
  const idx = name.lastIndexOf(':');
  return idx >= 0 ? name.slice(idx + 1) : name;
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [key, value] of Object.entries(raw)) {
    attributes[localName(key)] = String(value);
  }
  return attributes;
}

function toNodes(raw: unknown): XmlNode[] {
  if (!Array.isArray(raw)) return [];
  const entries: unknown[] = raw;
  const nodes: XmlNode[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY || key.startsWith('?')) continue;
      if (key === TEXT_KEY) {
        nodes.push({ type: 'text', text: String(value) });
        continue;
      }
      nodes.push({
        type: 'element',
        name: localName(key),
        attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        children: toNodes(value),
      });
    }
  }

  return nodes;
}

/**
 * Parses markup into an ordered element tree and returns its root element.
 * Throws FormatError for empty input or XML that is not well-formed.
 */
export function parseXmlTree(xml: string, source?: string): XmlElement {
  if (!xml || !xml.trim()) {
    throw new FormatError('Markup is empty', { source });
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new FormatError(`Malformed markup at line ${line}, column ${col}: ${msg}`, {
      source,
      line,
      column: col,
    });
  }

  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (error) {
    throw new FormatError('Markup could not be parsed', { source, cause: error });
  }

  const roots = toNodes(parsed).filter((node): node is XmlElement => node.type === 'element');
  if (roots.length === 0) {
    throw new FormatError('Markup has no root element', { source });
  }
  if (roots.length > 1) {
    throw new FormatError('Markup has more than one root element', { source });
  }
  return roots[0];
}

export function attr(element: XmlElement, name: string): string | undefined {
  return element.attributes[name];
}

export function childElements(element: XmlElement | undefined, name?: string): XmlElement[] {
  const children: XmlElement[] = [];
  if (!element) return children;
  for (const child of element.children) {
    if (child.type === 'element' && (name === undefined || child.name === name)) {
      children.push(child);
    }
  }
  return children;
}

export function firstChild(
  element: XmlElement | undefined,
  name: string,
  predicate: (el: XmlElement) => boolean = () => true
): XmlElement | undefined {
  if (!element) return undefined;
  return childElements(element, name).find(predicate);
}

/** Depth-first, document order, the element itself excluded. */
export function findFirst(
  element: XmlElement | undefined,
  name: string,
  predicate: (el: XmlElement) => boolean = () => true
): XmlElement | undefined {
  if (!element) return undefined;
  for (const child of element.children) {
    if (child.type !== 'element') continue;
    if (child.name === name && predicate(child)) return child;
    const nested = findFirst(child, name, predicate);
    if (nested) return nested;
  }
  return undefined;
}

export function findAll(element: XmlElement | undefined, name: string): XmlElement[] {
  const found: XmlElement[] = [];
  if (!element) return found;
  for (const child of element.children) {
    if (child.type !== 'element') continue;
    if (child.name === name) found.push(child);
    found.push(...findAll(child, name));
  }
  return found;
}

export function textContent(node: XmlNode | undefined): string {
  if (!node) return '';
  if (node.type === 'text') return node.text;
  return node.children.map((child) => textContent(child)).join('');
}
