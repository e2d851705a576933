import { StructuralError } from "../errors";
import { append, childElements, element, prepend, type MarkupElement } from "../markup";
import { backReferenceId, markId, type ContentRenderer } from "./content";
import type { Chapter, ContentBlock, Footnote, InlineContent } from "./types";

/**
 * Render the footnote section of a chapter.
 *
 * Footnotes nobody refers to, or whose contents render to nothing, are left
 * out. Each rendered footnote opens with a `[N]` link back to its mark.
 */
export function renderFootnotes(renderer: ContentRenderer, footnotes: Footnote[]): MarkupElement[] {
  const sections: MarkupElement[] = [];

  for (const footnote of footnotes) {
    if (!footnote.hasMark || footnote.contents.length === 0) {
      continue;
    }

    const citation = element("div", { class: "citation" });
    for (const block of footnote.contents) {
      const node = renderer.renderBlock(block);
      if (node) append(citation, node);
    }

    const [first] = childElements(citation);
    if (!first) continue;

    const backReference = element(
      "a",
      { id: backReferenceId(footnote.id), href: `#${markId(footnote.id)}`, class: "citation" },
      [`[${footnote.id}]`],
    );
    if (first.tag === "p") {
      prepend(first, backReference);
    } else {
      prepend(citation, element("p", {}, [backReference]));
    }
    sections.push(citation);
  }

  return sections;
}

function collectFromInline(content: InlineContent[] | undefined, ids: Set<number>): void {
  for (const item of content ?? []) {
    if (typeof item === "string") continue;
    if (item.kind === "mark") {
      ids.add(item.id);
    } else if (item.kind === "tag") {
      collectFromInline(item.content, ids);
    } else {
      collectFromInline(item.title, ids);
      collectFromInline(item.caption, ids);
    }
  }
}

function collectFromBlocks(blocks: ContentBlock[], ids: Set<number>): void {
  for (const block of blocks) {
    if (block.kind === "text") {
      collectFromInline(block.content, ids);
      continue;
    }
    if (block.kind === "table" && typeof block.html !== "string") {
      collectFromInline([block.html], ids);
    }
    collectFromInline(block.title, ids);
    collectFromInline(block.caption, ids);
  }
}

/** IDs of every mark in the chapter body and footnote bodies, sorted. */
export function collectMarkIds(chapter: Chapter): number[] {
  const ids = new Set<number>();
  collectFromBlocks(chapter.elements, ids);
  for (const footnote of chapter.footnotes ?? []) {
    collectFromBlocks(footnote.contents, ids);
  }
  return [...ids].sort((a, b) => a - b);
}

/**
 * Every mark must point at a footnote of the same chapter.
 */
export function checkFootnoteReferences(chapter: Chapter): void {
  const footnoteIds = new Set((chapter.footnotes ?? []).map((footnote) => footnote.id));
  const missing = collectMarkIds(chapter).filter((id) => !footnoteIds.has(id));
  if (missing.length > 0) {
    throw new StructuralError(`Marks without a matching footnote: ${missing.join(", ")}`);
  }
}
