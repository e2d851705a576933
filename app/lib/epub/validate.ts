import { InvalidUnicodeError } from "../errors";
import type { BookData, Chapter, ContentBlock, InlineContent, TocNode } from "./types";

/**
 * Returns the first unpaired surrogate code unit in `text`, or null.
 */
export function findUnpairedSurrogate(text: string): number | null {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 0xd800 && code <= 0xdbff) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
        continue;
      }
      return code;
    }
    if (code >= 0xdc00 && code <= 0xdfff) {
      return code;
    }
  }
  return null;
}

function checkString(value: string | undefined, field: string): void {
  if (value === undefined) return;
  const codePoint = findUnpairedSurrogate(value);
  if (codePoint !== null) {
    throw new InvalidUnicodeError(field, codePoint);
  }
}

function checkList(values: string[] | undefined, field: string): void {
  values?.forEach((value, index) => checkString(value, `${field}[${index}]`));
}

function checkTocNodes(nodes: TocNode[] | undefined, field: string): void {
  nodes?.forEach((node, index) => {
    const path = `${field}[${index}]`;
    checkString(node.title, `${path}.title`);
    checkTocNodes(node.children, `${path}.children`);
  });
}

function checkInline(content: InlineContent[] | undefined, field: string): void {
  content?.forEach((item, index) => {
    const path = `${field}[${index}]`;
    if (typeof item === "string") {
      checkString(item, path);
      return;
    }
    switch (item.kind) {
      case "mark":
        return;
      case "formula":
        checkString(item.latex, `${path}.latex`);
        return;
      case "tag":
        checkString(item.name, `${path}.name`);
        item.attributes.forEach(([name, value], attrIndex) => {
          checkString(name, `${path}.attributes[${attrIndex}][0]`);
          checkString(value, `${path}.attributes[${attrIndex}][1]`);
        });
        checkInline(item.content, `${path}.content`);
        return;
    }
  });
}

function checkCaptioned(
  block: { title?: InlineContent[]; caption?: InlineContent[] },
  path: string,
): void {
  checkInline(block.title, `${path}.title`);
  checkInline(block.caption, `${path}.caption`);
}

function checkBlocks(blocks: ContentBlock[], field: string): void {
  blocks.forEach((block, index) => {
    const path = `${field}[${index}]`;
    switch (block.kind) {
      case "text":
        checkInline(block.content, `${path}.content`);
        return;
      case "table":
        if (typeof block.html === "string") {
          checkString(block.html, `${path}.html`);
        } else {
          checkInline([block.html], `${path}.html`);
        }
        checkCaptioned(block, path);
        return;
      case "formula":
        checkString(block.latex, `${path}.latex`);
        checkCaptioned(block, path);
        return;
      case "image":
        checkString(block.path, `${path}.path`);
        checkString(block.alt, `${path}.alt`);
        checkCaptioned(block, path);
        return;
    }
  });
}

/**
 * Reject book metadata and TOC titles that hold unpaired surrogates.
 * Chapters are checked separately when they are loaded.
 */
export function validateBookData(data: BookData): void {
  const meta = data.meta;
  if (meta) {
    checkString(meta.title, "BookData.meta.title");
    checkString(meta.description, "BookData.meta.description");
    checkString(meta.publisher, "BookData.meta.publisher");
    checkString(meta.isbn, "BookData.meta.isbn");
    checkList(meta.authors, "BookData.meta.authors");
    checkList(meta.editors, "BookData.meta.editors");
    checkList(meta.translators, "BookData.meta.translators");
  }
  checkString(data.coverImagePath, "BookData.coverImagePath");
  checkTocNodes(data.prefaces, "BookData.prefaces");
  checkTocNodes(data.chapters, "BookData.chapters");
}

export function validateChapter(chapter: Chapter, label = "Chapter"): void {
  checkBlocks(chapter.elements, `${label}.elements`);
  chapter.footnotes?.forEach((footnote, index) => {
    checkBlocks(footnote.contents, `${label}.footnotes[${index}].contents`);
  });
}
