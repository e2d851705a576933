import { lookup } from "mime-types";
import { firstElement, parseFragment, type MarkupElement } from "../markup";

const DEFAULT_IMAGE_TYPE = "image/png";

/**
 * Media type for an image file extension (`.jpg`, `.svg`, ...). Unknown or
 * non-image extensions are treated as PNG.
 */
export function imageMediaType(extension: string): string {
  const mediaType = lookup(extension.toLowerCase());
  if (!mediaType || !mediaType.startsWith("image/")) {
    return DEFAULT_IMAGE_TYPE;
  }
  return mediaType;
}

/** Drop line breaks and surrounding whitespace from a LaTeX expression. */
export function normalizeLatex(latex: string): string {
  return latex.replace(/\r?\n/g, "").trim();
}

/**
 * Parse table markup given as a string. The first element of the fragment
 * is the table; a fragment without elements yields null.
 */
export function parseTableMarkup(markup: string): MarkupElement | null {
  return firstElement(parseFragment(markup));
}
