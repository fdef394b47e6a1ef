/**
 * Namespace-agnostic navigation over parsed Jira XML exports
 *
 * Jira RSS exports mix plain tags with prefixed ones depending on the
 * version that produced them, so every lookup compares local names only.
 */

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import type { PreservedOrderNode, XmlElement } from "../types";
import { XmlParseError } from "../types/errors";

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

/**
 * Parser that preserves document order and leaves every value as a string.
 * Character references (`&#233;`, `&#x41;`) are decoded like named entities.
 */
const parser = new XMLParser({
  preserveOrder: true,
  htmlEntities: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  textNodeName: TEXT_KEY,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  textNodeName: TEXT_KEY,
  suppressEmptyNode: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAttributes(node: PreservedOrderNode): Record<string, string> {
  const attributes: Record<string, string> = {};
  const raw = node[ATTRIBUTES_KEY];
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [name, value] of Object.entries(raw)) {
    attributes[name] = String(value);
  }
  return attributes;
}

/**
 * Converts one order-preserving parser node into an XmlElement.
 * Text nodes, processing instructions and empty nodes yield undefined.
 */
function toElement(node: PreservedOrderNode): XmlElement | undefined {
  const name = Object.keys(node).find(
    (key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY
  );
  if (!name || name.startsWith("?")) {
    return undefined;
  }

  const content = node[name];
  const childNodes: unknown[] = Array.isArray(content) ? content : [];
  const children: XmlElement[] = [];
  let text: string | null = null;

  for (const child of childNodes) {
    if (!isRecord(child)) {
      continue;
    }
    if (TEXT_KEY in child) {
      // Only text ahead of the first child element is the node's own text
      if (children.length === 0) {
        text = (text ?? "") + String(child[TEXT_KEY]);
      }
      continue;
    }
    const element = toElement(child);
    if (element) {
      children.push(element);
    }
  }

  return {
    name,
    attributes: readAttributes(node),
    text,
    children,
    raw: node,
  };
}

/**
 * Parses an XML document and returns its root element
 * @throws {XmlParseError} When the document is malformed or has no root element
 */
export function parseXmlDocument(xml: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new XmlParseError(validation.err.msg, validation.err.line);
  }

  const parsed: unknown = parser.parse(xml);
  const nodes: unknown[] = Array.isArray(parsed) ? parsed : [];

  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    const element = toElement(node);
    if (element) {
      return element;
    }
  }

  throw new XmlParseError("Document has no root element");
}

/**
 * Strips a "{namespace-uri}" or "prefix:" qualifier from a tag
 * @example localName("{http://example.com/ns}key") // "key"
 * @example localName("jira:key") // "key"
 */
export function localName(tag: string): string {
  let name = tag;
  const braceEnd = name.indexOf("}");
  if (braceEnd !== -1) {
    name = name.slice(braceEnd + 1);
  }
  const colon = name.indexOf(":");
  if (colon !== -1) {
    name = name.slice(colon + 1);
  }
  return name;
}

/**
 * Finds the first immediate child with the given local name
 */
export function findChild(
  parent: XmlElement,
  name: string
): XmlElement | undefined {
  return parent.children.find((child) => localName(child.name) === name);
}

/**
 * Trimmed own text of an element; "" when the element is absent or has none
 */
export function textOf(element: XmlElement | undefined): string {
  if (!element || element.text === null) {
    return "";
  }
  return element.text.trim();
}

/**
 * Trimmed text of the first child with the given local name
 */
export function findText(parent: XmlElement, name: string): string {
  return textOf(findChild(parent, name));
}

/**
 * Walks the element and all of its descendants in document order,
 * returning those with the given local name (the element itself included)
 */
export function findDescendants(root: XmlElement, name: string): XmlElement[] {
  const matches: XmlElement[] = [];
  const visit = (element: XmlElement): void => {
    if (localName(element.name) === name) {
      matches.push(element);
    }
    element.children.forEach(visit);
  };
  visit(root);
  return matches;
}

/**
 * Every element in the subtree, the root first, in document order
 */
export function walkElements(root: XmlElement): XmlElement[] {
  const elements: XmlElement[] = [root];
  root.children.forEach((child) => elements.push(...walkElements(child)));
  return elements;
}

/**
 * Serializes an element back to XML from its original parser node
 */
export function serializeElement(element: XmlElement): string {
  return String(builder.build([element.raw]));
}
