import { extname } from "path";
import { append, element, type MarkupElement } from "../markup";
import type { FormulaBackend } from "../math";
import { assertNever, errorMessage } from "../utils";
import type { AssetRegistry } from "./asset-registry";
import { imageMediaType, normalizeLatex, parseTableMarkup } from "./assets";
import { assetHref } from "./paths";
import type {
  ContentBlock,
  Formula,
  HtmlTag,
  Image,
  InlineContent,
  LaTeXRender,
  Table,
  TableRender,
  TextBlock,
} from "./types";

export interface RenderContext {
  tableRender: TableRender;
  latexRender: LaTeXRender;
  formulaBackend: FormulaBackend;
  assets: AssetRegistry;
}

export function markId(id: number): string {
  return `ref-${id}`;
}

export function backReferenceId(id: number): string {
  return `mark-${id}`;
}

/**
 * Turns content blocks into XHTML elements.
 *
 * Table and formula conversion failures are logged and the element is left
 * out; a missing image file is not recoverable and propagates.
 */
export class ContentRenderer {
  constructor(private readonly context: RenderContext) {}

  renderBlock(block: ContentBlock): MarkupElement | null {
    switch (block.kind) {
      case "text":
        return this.renderText(block);
      case "table":
        return this.renderTable(block);
      case "formula":
        return this.renderFormula(block, false);
      case "image":
        return this.renderImage(block);
      default:
        return assertNever(block);
    }
  }

  /**
   * Render inline items into `parent`, left to right. Text following an
   * inline element lands after it.
   */
  renderInline(parent: MarkupElement, content: InlineContent[]): void {
    for (const item of content) {
      if (typeof item === "string") {
        append(parent, item);
        continue;
      }
      switch (item.kind) {
        case "mark":
          append(
            parent,
            element(
              "a",
              {
                id: markId(item.id),
                href: `#${backReferenceId(item.id)}`,
                class: "super",
                "epub:type": "noteref",
              },
              [`[${item.id}]`],
            ),
          );
          break;
        case "formula": {
          const node = this.renderFormula(item, true);
          if (node) append(parent, node);
          break;
        }
        case "tag":
          append(parent, this.renderTag(item));
          break;
        default:
          assertNever(item);
      }
    }
  }

  private renderTag(tag: HtmlTag): MarkupElement {
    const node = element(tag.name, tag.attributes);
    this.renderInline(node, tag.content);
    return node;
  }

  private renderText(block: TextBlock): MarkupElement {
    switch (block.role) {
      case "heading": {
        const node = element(`h${block.level ?? 1}`);
        this.renderInline(node, block.content);
        return node;
      }
      case "body": {
        const node = element("p");
        this.renderInline(node, block.content);
        return node;
      }
      case "quote": {
        const node = element("p");
        this.renderInline(node, block.content);
        return element("blockquote", {}, [node]);
      }
      default:
        return assertNever(block.role);
    }
  }

  private renderTable(table: Table): MarkupElement | null {
    if (this.context.tableRender === "clipping") {
      return null;
    }

    let content: MarkupElement | null;
    try {
      content = typeof table.html === "string" ? parseTableMarkup(table.html) : this.renderTag(table.html);
    } catch (error) {
      console.warn("[EPUB] Table skipped:", errorMessage(error));
      return null;
    }
    if (!content) return null;

    return this.wrapWithTitleCaption(table, element("div", { class: "alt-wrapper" }, [content]));
  }

  private renderFormula(formula: Formula, inlineMode: boolean): MarkupElement | null {
    const { latexRender, formulaBackend } = this.context;
    if (latexRender === "clipping") {
      return null;
    }
    const latex = normalizeLatex(formula.latex);
    if (!latex) {
      return null;
    }

    let content: MarkupElement | null;
    try {
      content =
        latexRender === "mathml"
          ? formulaBackend.toMathML(latex, inlineMode)
          : this.renderSvgFormula(latex, inlineMode);
    } catch (error) {
      console.warn(`[EPUB] Formula "${latex}" skipped:`, errorMessage(error));
      return null;
    }

    // title and caption only apply to block formulas
    if (!content || inlineMode) return content;
    return this.wrapWithTitleCaption(formula, content);
  }

  private renderSvgFormula(latex: string, inlineMode: boolean): MarkupElement | null {
    const svg = this.context.formulaBackend.toSvg(latex);
    if (!svg) return null;

    const fileName = this.context.assets.addAsset(svg, "image/svg+xml", ".svg");
    const img = element("img", { src: assetHref(fileName), alt: "formula" });
    return inlineMode
      ? element("span", { class: "formula-inline" }, [img])
      : element("div", { class: "alt-wrapper" }, [img]);
  }

  private renderImage(image: Image): MarkupElement {
    const extension = extname(image.path) || ".png";
    const fileName = this.context.assets.useAsset(image.path, imageMediaType(extension), extension);

    // a title or caption describes the image, so alt stays empty
    const described = Boolean(image.title?.length || image.caption?.length);
    const img = element("img", {
      src: assetHref(fileName),
      alt: described ? "" : (image.alt ?? ""),
    });
    return this.wrapWithTitleCaption(image, element("div", { class: "alt-wrapper" }, [img]));
  }

  private wrapWithTitleCaption(
    asset: Table | Formula | Image,
    content: MarkupElement,
  ): MarkupElement {
    if (!asset.title?.length && !asset.caption?.length) {
      return content;
    }

    const container = element("div", { class: "asset-container" });
    if (asset.title?.length) {
      const title = element("div", { class: "asset-title" });
      this.renderInline(title, asset.title);
      append(container, title);
    }
    append(container, content);
    if (asset.caption?.length) {
      const caption = element("div", { class: "asset-caption" });
      this.renderInline(caption, asset.caption);
      append(container, caption);
    }
    return container;
  }
}
