/**
 * XML helpers for XKB/rules/*.xml (xkbConfigRegistry documents)
 *
 * Blank text between elements is dropped on parse and re-created by the
 * pretty-printer on write, so a file round-trips to the same bytes.
 */

import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { XkbFormatError } from "#/errors";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const PROCESSING_INSTRUCTION_NODE = 7;

const INDENT = "  ";
const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isBlankText(node: Node): boolean {
  return node.nodeType === TEXT_NODE && (node.nodeValue ?? "").trim() === "";
}

export function childNodes(node: Node): Node[] {
  const children: Node[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    children.push(child);
  }
  return children;
}

export function childElements(node: Node, tagName?: string): Element[] {
  return childNodes(node).filter(
    (child): child is Element =>
      isElement(child) && (tagName === undefined || child.nodeName === tagName)
  );
}

/** All elements named `tagName` below `root`, in document order */
export function descendants(root: Node, tagName: string): Element[] {
  const found: Element[] = [];
  for (const child of childElements(root)) {
    if (child.nodeName === tagName) found.push(child);
    found.push(...descendants(child, tagName));
  }
  return found;
}

/** Text of the element at `path` (tag names) below `node`, if any */
export function childText(node: Node, ...path: string[]): string | undefined {
  let current: Element | undefined;
  let parent: Node = node;
  for (const tagName of path) {
    current = childElements(parent, tagName)[0];
    if (!current) return undefined;
    parent = current;
  }
  return current?.textContent ?? undefined;
}

/** Build an element tree: strings become text nodes */
export function createElement(
  doc: Document,
  tagName: string,
  ...children: Array<Node | string>
): Element {
  const element = doc.createElement(tagName);
  for (const child of children) {
    element.appendChild(typeof child === "string" ? doc.createTextNode(child) : child);
  }
  return element;
}

// Whitespace inside an element without child elements is content, not layout
function dropBlankText(element: Element): void {
  const children = childNodes(element);
  const hasElements = children.some(isElement);

  for (const child of children) {
    if (hasElements && isBlankText(child)) {
      element.removeChild(child);
    } else if (isElement(child)) {
      dropBlankText(child);
    }
  }
}

function indent(element: Element, level: number): void {
  const children = childNodes(element);
  const isMixed = children.some((child) => child.nodeType === TEXT_NODE && !isBlankText(child));
  if (isMixed || !children.some(isElement)) return;

  const doc = element.ownerDocument;
  for (const child of children) {
    if (isBlankText(child)) {
      element.removeChild(child);
      continue;
    }
    element.insertBefore(doc.createTextNode(`\n${INDENT.repeat(level + 1)}`), child);
    if (isElement(child)) indent(child, level + 1);
  }
  element.appendChild(doc.createTextNode(`\n${INDENT.repeat(level)}`));
}

export function parseRegistry(content: string, path: string): Document {
  const fail = (message: string): never => {
    throw new XkbFormatError(message.trim(), path);
  };

  const doc = new DOMParser({ errorHandler: { error: fail, fatalError: fail } }).parseFromString(
    content,
    "text/xml"
  );

  const root = childElements(doc)[0];
  if (!root) fail("no root element");
  else dropBlankText(root);

  return doc;
}

/**
 * Serialize with an XML declaration and two-space indentation.
 * DOCTYPE and comments outside the root element are kept in place.
 */
export function serializeRegistry(doc: Document): string {
  const serializer = new XMLSerializer();
  const parts = [XML_DECLARATION];

  for (const node of childNodes(doc)) {
    if (node.nodeType === PROCESSING_INSTRUCTION_NODE && node.nodeName === "xml") continue;
    if (node.nodeType === TEXT_NODE) continue;
    if (isElement(node)) indent(node, 0);
    parts.push(serializer.serializeToString(node));
  }

  return `${parts.join("\n")}\n`;
}
