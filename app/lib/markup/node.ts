/**
 * Minimal XHTML element model.
 *
 * Each element keeps an ordered list of children where a child is either a
 * text run or another element. Appending text next to an existing text run
 * merges the two, so there is no separate "text"/"tail" bookkeeping.
 */

export interface MarkupElement {
  tag: string;
  attributes: [string, string][];
  children: MarkupChild[];
}

export type MarkupChild = MarkupElement | string;

export function element(
  tag: string,
  attributes: Record<string, string> | [string, string][] = [],
  children: MarkupChild[] = [],
): MarkupElement {
  const attrs = Array.isArray(attributes) ? [...attributes] : Object.entries(attributes);
  const node: MarkupElement = { tag, attributes: attrs, children: [] };
  for (const child of children) {
    append(node, child);
  }
  return node;
}

export function isElement(child: MarkupChild): child is MarkupElement {
  return typeof child !== "string";
}

/**
 * Append a child, merging adjacent text runs.
 */
export function append(parent: MarkupElement, child: MarkupChild): void {
  if (typeof child === "string") {
    if (child === "") return;
    const last = parent.children[parent.children.length - 1];
    if (typeof last === "string") {
      parent.children[parent.children.length - 1] = last + child;
      return;
    }
  }
  parent.children.push(child);
}

export function prepend(parent: MarkupElement, child: MarkupChild): void {
  parent.children.unshift(child);
}

export function childElements(node: MarkupElement): MarkupElement[] {
  return node.children.filter(isElement);
}

/**
 * Depth-first search for an element with the given tag (the root included).
 */
export function findElement(node: MarkupElement, tag: string): MarkupElement | null {
  if (node.tag === tag) return node;
  for (const child of childElements(node)) {
    const found = findElement(child, tag);
    if (found) return found;
  }
  return null;
}

export function containsTag(nodes: MarkupElement[], tag: string): boolean {
  return nodes.some((node) => findElement(node, tag) !== null);
}
