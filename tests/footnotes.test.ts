import { describe, it, expect } from "vitest";
import { renderChapter } from "../app/lib/epub/chapter";
import { ContentRenderer } from "../app/lib/epub/content";
import { AssetRegistry } from "../app/lib/epub/asset-registry";
import { checkFootnoteReferences, collectMarkIds } from "../app/lib/epub/footnotes";
import { StructuralError } from "../app/lib/errors";
import { element, serialize } from "../app/lib/markup";
import {
  footnote,
  formula,
  image,
  mark,
  paragraph,
  quote,
  table,
  tag,
  type Chapter,
  type TableRender,
} from "../app/lib/epub/types";

function createRenderer(tableRender: TableRender = "html") {
  return new ContentRenderer({
    tableRender,
    latexRender: "mathml",
    formulaBackend: {
      toMathML: (latex) => element("math", {}, [element("mi", {}, [latex])]),
      toSvg: () => null,
    },
    assets: new AssetRegistry({ writeAsset: () => {} }),
  });
}

describe("footnotes", () => {
  it("should link a mark and its footnote both ways", () => {
    const chapter: Chapter = {
      elements: [paragraph(["See here", mark(1), "."])],
      footnotes: [footnote(1, [paragraph("Note one")])],
    };
    const rendered = renderChapter(createRenderer(), chapter);

    expect(rendered.content.map((node) => serialize(node))).toEqual([
      '<p>See here<a id="ref-1" href="#mark-1" class="super" epub:type="noteref">[1]</a>.</p>',
    ]);
    expect(rendered.citations.map((node) => serialize(node))).toEqual([
      '<div class="citation"><p><a id="mark-1" href="#ref-1" class="citation">[1]</a>Note one</p></div>',
    ]);
  });

  it("should add a paragraph for the back link when the note does not start with one", () => {
    const chapter: Chapter = {
      elements: [paragraph([mark(2)])],
      footnotes: [footnote(2, [quote("Quoted note"), paragraph("More")])],
    };
    const [citation] = renderChapter(createRenderer(), chapter).citations;

    expect(serialize(citation)).toBe(
      '<div class="citation">' +
        '<p><a id="mark-2" href="#ref-2" class="citation">[2]</a></p>' +
        "<blockquote><p>Quoted note</p></blockquote>" +
        "<p>More</p></div>",
    );
  });

  it("should skip unreferenced, empty and fully clipped footnotes", () => {
    const chapter: Chapter = {
      elements: [paragraph([mark(2), mark(3), mark(4)])],
      footnotes: [
        footnote(1, [paragraph("Nobody points here")], false),
        footnote(2, []),
        footnote(3, [table("<table><tr><td>1</td></tr></table>")]),
        footnote(4, [paragraph("Kept")]),
      ],
    };
    const rendered = renderChapter(createRenderer("clipping"), chapter);

    expect(rendered.citations.map((node) => serialize(node))).toEqual([
      '<div class="citation"><p><a id="mark-4" href="#ref-4" class="citation">[4]</a>Kept</p></div>',
    ]);
  });

  it("should keep footnotes in their given order", () => {
    const chapter: Chapter = {
      elements: [paragraph([mark(2), mark(1)])],
      footnotes: [footnote(2, [paragraph("b")]), footnote(1, [paragraph("a")])],
    };
    const rendered = renderChapter(createRenderer(), chapter);
    expect(rendered.citations.map((node) => serialize(node))).toEqual([
      '<div class="citation"><p><a id="mark-2" href="#ref-2" class="citation">[2]</a>b</p></div>',
      '<div class="citation"><p><a id="mark-1" href="#ref-1" class="citation">[1]</a>a</p></div>',
    ]);
  });

  it("should report MathML in the body or in footnotes", () => {
    const renderer = createRenderer();
    expect(renderChapter(renderer, { elements: [paragraph("plain")] }).hasMathML).toBe(false);
    expect(renderChapter(renderer, { elements: [formula("x")] }).hasMathML).toBe(true);
    expect(
      renderChapter(renderer, {
        elements: [paragraph([mark(1)])],
        footnotes: [footnote(1, [paragraph(["n = ", formula("n")])])],
      }).hasMathML,
    ).toBe(true);
  });

  describe("mark checks", () => {
    it("should collect marks from tags, captions and footnote bodies", () => {
      const chapter: Chapter = {
        elements: [
          paragraph([tag("em", [mark(5)])]),
          image("unused.png", { caption: [mark(3)] }),
          table(tag("table", [tag("tr", [tag("td", [mark(7)])])])),
        ],
        footnotes: [footnote(1, [paragraph([mark(2)])])],
      };
      expect(collectMarkIds(chapter)).toEqual([2, 3, 5, 7]);
    });

    it("should reject marks without a footnote", () => {
      const chapter: Chapter = {
        elements: [paragraph([mark(3), mark(1), mark(2)])],
        footnotes: [footnote(2, [paragraph("two")])],
      };
      expect(() => checkFootnoteReferences(chapter)).toThrow(StructuralError);
      expect(() => checkFootnoteReferences(chapter)).toThrow("Marks without a matching footnote: 1, 3");
      expect(() => renderChapter(createRenderer(), chapter)).toThrow(StructuralError);
    });
  });
});
