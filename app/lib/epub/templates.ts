/**
 * Document templates for the archive. Every function is pure: the same
 * parameters always give the same text.
 */
import { escapeAttribute, escapeXml } from "../markup";
import type { Language } from "./types";

const XHTML_NS = "http://www.w3.org/1999/xhtml";
const OPS_NS = "http://www.idpf.org/2007/ops";

export const EPUB_MIMETYPE = "application/epub+zip";

export function mimetype(): string {
  return EPUB_MIMETYPE;
}

export function containerXml(packagePath: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="${escapeAttribute(packagePath)}" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;
}

function htmlOpen(language: Language): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE html>
<html xmlns="${XHTML_NS}" xmlns:epub="${OPS_NS}" xml:lang="${language}" lang="${language}">`;
}

function head(title: string, stylesheet: string): string {
  return `<head>
  <title>${escapeXml(title)}</title>
  <link rel="stylesheet" type="text/css" href="${escapeAttribute(stylesheet)}"/>
</head>`;
}

function indent(lines: string[], depth: number): string {
  const pad = "  ".repeat(depth);
  return lines.map((line) => `${pad}${line}`).join("\n");
}

export interface ChapterParams {
  language: Language;
  title: string;
  /** Serialized block elements. */
  content: string[];
  /** Serialized footnote sections. */
  citations: string[];
  referencesLabel: string;
}

export function chapterXhtml(params: ChapterParams): string {
  const references =
    params.citations.length > 0
      ? `
  <section class="references" epub:type="footnotes">
    <hr/>
    <h2>${escapeXml(params.referencesLabel)}</h2>
${indent(params.citations, 2)}
  </section>`
      : "";

  return `${htmlOpen(params.language)}
${head(params.title, "../styles/style.css")}
<body>
  <section class="chapter">
${indent(params.content, 2)}
  </section>${references}
</body>
</html>
`;
}

export interface NavParams {
  language: Language;
  title: string;
  tocLabel: string;
  landmarksLabel: string;
  /** Serialized `<li>` items of the table of contents. */
  tocItems: string[];
  /** Serialized `<li>` items of the landmarks list. */
  landmarks: string[];
}

export function navXhtml(params: NavParams): string {
  const landmarks =
    params.landmarks.length > 0
      ? `
  <nav epub:type="landmarks" id="landmarks" hidden="hidden">
    <h2>${escapeXml(params.landmarksLabel)}</h2>
    <ol>
${indent(params.landmarks, 3)}
    </ol>
  </nav>`
      : "";

  return `${htmlOpen(params.language)}
${head(params.title, "styles/style.css")}
<body>
  <nav epub:type="toc" id="toc">
    <h1>${escapeXml(params.tocLabel)}</h1>
    <ol>
${indent(params.tocItems, 3)}
    </ol>
  </nav>${landmarks}
</body>
</html>
`;
}

export interface NcxParams {
  language: Language;
  identifier: string;
  depth: number;
  title: string;
  authors: string[];
  /** Serialized `<navPoint>` elements. */
  navPoints: string[];
}

export function tocNcx(params: NcxParams): string {
  const authors = params.authors.map(
    (author) => `  <docAuthor><text>${escapeXml(author)}</text></docAuthor>`,
  );
  return `<?xml version="1.0" encoding="UTF-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1" xml:lang="${params.language}">
  <head>
    <meta name="dtb:uid" content="${escapeAttribute(params.identifier)}"/>
    <meta name="dtb:depth" content="${Math.max(1, params.depth)}"/>
    <meta name="dtb:totalPageCount" content="0"/>
    <meta name="dtb:maxPageNumber" content="0"/>
  </head>
  <docTitle><text>${escapeXml(params.title)}</text></docTitle>
${[...authors, "  <navMap>"].join("\n")}
${indent(params.navPoints, 2)}
  </navMap>
</ncx>
`;
}

export interface ManifestItem {
  id: string;
  href: string;
  mediaType: string;
  properties?: string;
}

export interface PackageParams {
  language: Language;
  identifier: string;
  title: string;
  modified: string;
  description?: string;
  publisher?: string;
  authors: string[];
  editors: string[];
  translators: string[];
  coverImageId?: string;
  manifest: ManifestItem[];
  /** Manifest IDs in reading order. */
  spine: string[];
}

function contributors(names: string[], element: string, role: string, prefix: string): string[] {
  return names.flatMap((name, index) => {
    const id = `${prefix}${index + 1}`;
    return [
      `<${element} id="${id}">${escapeXml(name)}</${element}>`,
      `<meta refines="#${id}" property="role" scheme="marc:relators">${role}</meta>`,
    ];
  });
}

export function contentOpf(params: PackageParams): string {
  const metadata = [
    `<dc:identifier id="BookId">${escapeXml(params.identifier)}</dc:identifier>`,
    `<dc:title>${escapeXml(params.title)}</dc:title>`,
    `<dc:language>${params.language}</dc:language>`,
    ...contributors(params.authors, "dc:creator", "aut", "author"),
    ...contributors(params.editors, "dc:contributor", "edt", "editor"),
    ...contributors(params.translators, "dc:contributor", "trl", "translator"),
    ...(params.publisher ? [`<dc:publisher>${escapeXml(params.publisher)}</dc:publisher>`] : []),
    ...(params.description ? [`<dc:description>${escapeXml(params.description)}</dc:description>`] : []),
    `<meta property="dcterms:modified">${params.modified}</meta>`,
    ...(params.coverImageId ? [`<meta name="cover" content="${params.coverImageId}"/>`] : []),
  ];

  const manifest = params.manifest.map((item) => {
    const properties = item.properties ? ` properties="${item.properties}"` : "";
    return `<item id="${item.id}" href="${escapeAttribute(item.href)}" media-type="${item.mediaType}"${properties}/>`;
  });

  const spine = params.spine.map((idref) => `<itemref idref="${idref}"/>`);

  return `<?xml version="1.0" encoding="UTF-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="BookId" xml:lang="${params.language}">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
${indent(metadata, 2)}
  </metadata>
  <manifest>
${indent(manifest, 2)}
  </manifest>
  <spine toc="ncx">
${indent(spine, 2)}
  </spine>
</package>
`;
}

export interface CoverParams {
  language: Language;
  title: string;
  imageHref: string;
}

export function coverXhtml(params: CoverParams): string {
  return `${htmlOpen(params.language)}
${head(params.title, "../styles/style.css")}
<body class="cover">
  <section epub:type="cover">
    <img src="${escapeAttribute(params.imageHref)}" alt="${escapeAttribute(params.title)}"/>
  </section>
</body>
</html>
`;
}

export function styleCss(): string {
  return `body {
  font-family: serif;
  line-height: 1.6;
  margin: 1em;
}
h1, h2, h3, h4, h5, h6 {
  line-height: 1.3;
  margin-top: 1.5em;
  margin-bottom: 0.5em;
}
p {
  margin: 0.5em 0;
  text-align: justify;
}
blockquote {
  margin: 1em 2em;
  font-style: italic;
}
a.super {
  vertical-align: super;
  font-size: 0.75em;
  text-decoration: none;
}
.alt-wrapper {
  margin: 1em 0;
  text-align: center;
  overflow-x: auto;
}
.alt-wrapper img {
  max-width: 100%;
  height: auto;
}
.formula-inline img {
  vertical-align: middle;
}
.asset-title {
  text-align: center;
  font-weight: bold;
}
.asset-caption {
  text-align: center;
  font-size: 0.9em;
}
table {
  border-collapse: collapse;
  margin: 0 auto;
}
td, th {
  border: 1px solid #999;
  padding: 0.25em 0.5em;
}
.references {
  font-size: 0.9em;
}
.references hr {
  border: none;
  border-top: 1px solid #ccc;
  margin: 2em 0 1em;
}
.citation {
  margin: 0.5em 0;
}
body.cover {
  margin: 0;
  text-align: center;
}
body.cover img {
  max-width: 100%;
  max-height: 100vh;
}
`;
}
