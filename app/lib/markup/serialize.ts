import type { MarkupChild, MarkupElement } from "./node";

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function escapeAttribute(text: string): string {
  return escapeXml(text).replace(/"/g, "&quot;");
}

/**
 * Serialize to XHTML. Empty elements are written self-closed (`<img/>`).
 */
export function serialize(node: MarkupChild): string {
  if (typeof node === "string") {
    return escapeXml(node);
  }
  const attrs = node.attributes
    .map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`)
    .join("");

  if (node.children.length === 0) {
    return `<${node.tag}${attrs}/>`;
  }
  const inner = node.children.map(serialize).join("");
  return `<${node.tag}${attrs}>${inner}</${node.tag}>`;
}

export function serializeAll(nodes: MarkupElement[]): string[] {
  return nodes.map((node) => serialize(node));
}
