/**
 * Minimal ordered element model over fast-xml-parser output.
 *
 * Bill documents mix sibling element names (e.g. the children of <actions>)
 * and their order is meaningful, so documents are parsed with
 * preserveOrder=true and folded into plain XmlElement trees.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MalformedDocumentError } from "./errors";

export type XmlElement = {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  /** Direct text content, trimmed and joined with single spaces */
  text: string;
};

const ATTRIBUTE_PREFIX = "@_";
const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const orderedParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  preserveOrder: true,
  trimValues: true,
  parseAttributeValue: false,
  parseTagValue: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith(ATTRIBUTE_PREFIX)) {
      continue;
    }
    attributes[key.slice(ATTRIBUTE_PREFIX.length)] =
      typeof value === "string" ? value : String(value);
  }
  return attributes;
}

function foldNodes(nodes: unknown): { elements: XmlElement[]; text: string } {
  const elements: XmlElement[] = [];
  const textParts: string[] = [];

  if (!Array.isArray(nodes)) {
    return { elements, text: "" };
  }

  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) {
        continue;
      }
      if (key === TEXT_KEY) {
        const part = String(value).trim();
        if (part) {
          textParts.push(part);
        }
        continue;
      }
      // Processing instructions (<?xml ...?>) are not elements
      if (key.startsWith("?")) {
        continue;
      }
      const folded = foldNodes(value);
      elements.push({
        name: key,
        attributes: readAttributes(node[ATTRIBUTES_KEY]),
        children: folded.elements,
        text: folded.text,
      });
    }
  }

  return { elements, text: textParts.join(" ") };
}

/**
 * Parse an XML document and return its root element.
 *
 * @param source - Path or label used in error messages
 * @throws MalformedDocumentError when the markup is not well-formed
 */
export function parseXmlDocument(xml: string, source: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line } = validation.err;
    throw new MalformedDocumentError(source, `${code} at line ${line}: ${msg}`);
  }

  const { elements } = foldNodes(orderedParser.parse(xml));
  const root = elements[0];
  if (!root) {
    throw new MalformedDocumentError(source, "no root element");
  }
  return root;
}

/**
 * Attribute value, or undefined when the attribute is absent.
 */
export function attr(element: XmlElement, name: string): string | undefined {
  return Object.hasOwn(element.attributes, name)
    ? element.attributes[name]
    : undefined;
}

/**
 * Direct children with the given name ("*" matches any name).
 */
export function childElements(
  element: XmlElement,
  name: string
): XmlElement[] {
  return name === "*"
    ? element.children
    : element.children.filter((child) => child.name === name);
}

/**
 * Elements reached by a relative slash-separated path, in document order.
 * e.g. select(bill, "cosponsors/cosponsor")
 */
export function select(element: XmlElement, path: string): XmlElement[] {
  let current = [element];
  for (const step of path.split("/")) {
    current = current.flatMap((el) => childElements(el, step));
  }
  return current;
}

export function selectFirst(
  element: XmlElement,
  path: string
): XmlElement | undefined {
  return select(element, path)[0];
}

/**
 * All descendant text in document order, like XPath string().
 */
export function stringValue(element: XmlElement): string {
  const parts = [element.text, ...element.children.map(stringValue)];
  return parts.filter((part) => part.length > 0).join(" ");
}

/**
 * Compact one-line rendering of an element's opening tag for log messages.
 */
export function describeElement(element: XmlElement): string {
  const attributes = Object.entries(element.attributes)
    .map(([key, value]) => ` ${key}="${value}"`)
    .join("");
  return `<${element.name}${attributes}>`;
}
