import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MarkupParseError } from "../errors";
import { element, type MarkupChild, type MarkupElement } from "./node";

const TEXT_KEY = "#text";
const ATTRS_KEY = ":@";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  htmlEntities: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toAttributes(value: unknown): [string, string][] {
  if (!isRecord(value)) return [];
  return Object.entries(value).map(([name, attr]) => [name, String(attr)]);
}

function toChildren(nodes: unknown): MarkupChild[] {
  if (!Array.isArray(nodes)) return [];

  const children: MarkupChild[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    if (TEXT_KEY in node) {
      children.push(String(node[TEXT_KEY]));
      continue;
    }
    const tag = Object.keys(node).find((key) => key !== ATTRS_KEY);
    if (!tag) continue;
    children.push(element(tag, toAttributes(node[ATTRS_KEY]), toChildren(node[tag])));
  }
  return children;
}

/**
 * Parse a well-formed XML document into markup nodes.
 * Throws MarkupParseError when the input is not well-formed.
 */
export function parseMarkup(xml: string): MarkupChild[] {
  const result = XMLValidator.validate(xml);
  if (result !== true) {
    throw new MarkupParseError(result.err.msg, result.err.line);
  }
  return toChildren(parser.parse(xml));
}

/**
 * Parse a markup fragment that may hold several sibling elements.
 */
export function parseFragment(markup: string): MarkupChild[] {
  const [wrapper] = parseMarkup(`<div>${markup}</div>`);
  if (!wrapper || typeof wrapper === "string") return [];
  return wrapper.children;
}

export function firstElement(children: MarkupChild[]): MarkupElement | null {
  for (const child of children) {
    if (typeof child !== "string") return child;
  }
  return null;
}
