/**
 * xml.ts — Element tree on top of fast-xml-parser
 *
 * The binding model reads and writes a small element tree rather than the
 * parser's own output shape. Parsing runs in preserveOrder mode so that
 * sibling <axis> and <button> elements keep their document order, which is
 * the binding priority order.
 *
 * Element and attribute names are lower-cased on read, so `<Action Name="x">`
 * and `<action name="x">` load identically. Text content is ignored.
 */

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import type { ParseResult } from "../devices/types.js";

export interface XmlElement {
  name:       string;
  attributes: Record<string, string>;
  children:   XmlElement[];
}

/** Key fast-xml-parser uses for an element's attributes in preserveOrder mode. */
const ATTRIBUTES_KEY = ":@";

const parser = new XMLParser({
  preserveOrder:       true,
  ignoreAttributes:    false,
  attributeNamePrefix: "",
  parseAttributeValue: false,
  trimValues:          true,
});

const builder = new XMLBuilder({
  preserveOrder:       true,
  ignoreAttributes:    false,
  attributeNamePrefix: "",
  format:              true,
  indentBy:            "  ",
  suppressEmptyNode:   true,
});

const OrderedNode = z.record(z.string(), z.unknown());
const OrderedAttributes = z.record(z.string(), z.unknown());

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

function isElementKey(key: string): boolean {
  // "#text", "#comment", "?xml" and the attribute bag are not elements
  return key !== ATTRIBUTES_KEY && !key.startsWith("#") && !key.startsWith("?");
}

function toAttributes(raw: unknown): Record<string, string> {
  const parsed = OrderedAttributes.safeParse(raw);
  if (!parsed.success) return {};
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    out[key.toLowerCase()] = String(value);
  }
  return out;
}

function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes)) return [];

  const elements: XmlElement[] = [];
  for (const node of nodes) {
    const parsed = OrderedNode.safeParse(node);
    if (!parsed.success) continue;

    const name = Object.keys(parsed.data).find(isElementKey);
    if (name === undefined) continue;

    elements.push({
      name:       name.toLowerCase(),
      attributes: toAttributes(parsed.data[ATTRIBUTES_KEY]),
      children:   toElements(parsed.data[name]),
    });
  }
  return elements;
}

/**
 * Parses a document and returns its root element.
 * Malformed markup and documents without a root element are errors.
 */
export function parseXml(text: string): ParseResult<XmlElement> {
  const valid = XMLValidator.validate(text);
  if (valid !== true) {
    return { ok: false, error: `Malformed XML at line ${valid.err.line}: ${valid.err.msg}` };
  }

  const parsed: unknown = parser.parse(text);
  const root = toElements(parsed)[0];
  if (!root) return { ok: false, error: "XML document has no root element" };
  return { ok: true, value: root };
}

/** Children of `element` with the given (lower-case) name. */
export function childElements(element: XmlElement, name: string): XmlElement[] {
  return element.children.filter((c) => c.name === name);
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

function toOrdered(element: XmlElement): Record<string, unknown> {
  const node: Record<string, unknown> = {
    [element.name]: element.children.map(toOrdered),
  };
  if (Object.keys(element.attributes).length > 0) {
    node[ATTRIBUTES_KEY] = { ...element.attributes };
  }
  return node;
}

/**
 * Serializes an element tree with two-space indentation. Elements without
 * children are written as self-closing tags.
 */
export function buildXml(root: XmlElement): string {
  const text: string = builder.build([toOrdered(root)]);
  return `${text.trim()}\n`;
}
