/**
 * Book model consumed by the EPUB generator.
 *
 * The model mirrors what a reader sees: metadata, a table of contents whose
 * entries point at lazily loaded chapters, and chapters made of typed blocks.
 */

export type Language = "zh" | "en";

/** How tables are written: as XHTML tables, or left out. */
export type TableRender = "html" | "clipping";

/** How LaTeX formulas are written: MathML, SVG images, or left out. */
export type LaTeXRender = "mathml" | "svg" | "clipping";

export interface BookMeta {
  title?: string;
  description?: string;
  publisher?: string;
  /** Used as the package identifier; a random UUID is generated when absent. */
  isbn?: string;
  authors?: string[];
  editors?: string[];
  translators?: string[];
  /** `dcterms:modified`; defaults to the build time. */
  modified?: Date;
}

/**
 * One-shot chapter producer. The generator calls `load()` exactly once per
 * source, in navigation order, while writing the archive.
 */
export interface ChapterSource {
  load(): Chapter | Promise<Chapter>;
}

export interface TocNode {
  title: string;
  /** Absent for section headings that only group their children. */
  source?: ChapterSource;
  children?: TocNode[];
}

export interface BookData {
  meta?: BookMeta;
  /** Front matter written before every TOC chapter, without a TOC entry of its own. */
  head?: ChapterSource;
  prefaces?: TocNode[];
  chapters?: TocNode[];
  /** Absolute path of the cover image. */
  coverImagePath?: string;
}

export interface Chapter {
  elements: ContentBlock[];
  footnotes?: Footnote[];
}

export interface Mark {
  kind: "mark";
  id: number;
}

export interface HtmlTag {
  kind: "tag";
  name: string;
  attributes: [string, string][];
  content: InlineContent[];
}

export type InlineContent = string | Mark | Formula | HtmlTag;

export type TextRole = "heading" | "body" | "quote";

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface TextBlock {
  kind: "text";
  role: TextRole;
  /** Heading depth, only read for the heading role. Defaults to 1. */
  level?: HeadingLevel;
  content: InlineContent[];
}

interface Captioned {
  title?: InlineContent[];
  caption?: InlineContent[];
}

export interface Table extends Captioned {
  kind: "table";
  /** Either a tag tree or an XHTML string holding a `<table>`. */
  html: HtmlTag | string;
}

export interface Formula extends Captioned {
  kind: "formula";
  latex: string;
}

export interface Image extends Captioned {
  kind: "image";
  path: string;
  alt?: string;
}

export type ContentBlock = TextBlock | Table | Formula | Image;

export interface Footnote {
  id: number;
  /** Whether some Mark in the chapter refers to this footnote. */
  hasMark: boolean;
  contents: ContentBlock[];
}

// Constructors

export function chapterSource(load: () => Chapter | Promise<Chapter>): ChapterSource {
  let loaded = false;
  return {
    load() {
      if (loaded) {
        throw new Error("Chapter source has already been loaded");
      }
      loaded = true;
      return load();
    },
  };
}

export function heading(content: InlineContent[] | string, level: HeadingLevel = 1): TextBlock {
  return { kind: "text", role: "heading", level, content: toInline(content) };
}

export function paragraph(content: InlineContent[] | string): TextBlock {
  return { kind: "text", role: "body", content: toInline(content) };
}

export function quote(content: InlineContent[] | string): TextBlock {
  return { kind: "text", role: "quote", content: toInline(content) };
}

export function mark(id: number): Mark {
  return { kind: "mark", id };
}

export function tag(
  name: string,
  content: InlineContent[] | string = [],
  attributes: [string, string][] = [],
): HtmlTag {
  return { kind: "tag", name, attributes, content: toInline(content) };
}

export function formula(latex: string, extra: Captioned = {}): Formula {
  return { kind: "formula", latex, ...extra };
}

export function table(html: HtmlTag | string, extra: Captioned = {}): Table {
  return { kind: "table", html, ...extra };
}

export function image(path: string, extra: Captioned & { alt?: string } = {}): Image {
  return { kind: "image", path, ...extra };
}

export function footnote(id: number, contents: ContentBlock[], hasMark = true): Footnote {
  return { id, hasMark, contents };
}

function toInline(content: InlineContent[] | string): InlineContent[] {
  return typeof content === "string" ? [content] : content;
}
