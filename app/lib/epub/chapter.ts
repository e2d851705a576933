import { containsTag, type MarkupElement } from "../markup";
import type { ContentRenderer } from "./content";
import { checkFootnoteReferences, renderFootnotes } from "./footnotes";
import type { Chapter } from "./types";

export interface RenderedChapter {
  content: MarkupElement[];
  citations: MarkupElement[];
  /** The manifest item needs `properties="mathml"`. */
  hasMathML: boolean;
}

export function renderChapter(renderer: ContentRenderer, chapter: Chapter): RenderedChapter {
  checkFootnoteReferences(chapter);

  const content: MarkupElement[] = [];
  for (const block of chapter.elements) {
    const node = renderer.renderBlock(block);
    if (node) content.push(node);
  }
  const citations = renderFootnotes(renderer, chapter.footnotes ?? []);

  return {
    content,
    citations,
    hasMathML: containsTag(content, "math") || containsTag(citations, "math"),
  };
}
