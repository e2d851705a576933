import katex from "katex";
import { findElement, parseMarkup, type MarkupElement } from "../markup";
import { errorMessage } from "../utils";

/**
 * Convert LaTeX to a MathML `<math>` element with KaTeX.
 * Returns null when KaTeX rejects the expression.
 */
export function latexToMathML(latex: string, inlineMode: boolean): MarkupElement | null {
  let html: string;
  try {
    html = katex.renderToString(latex, {
      output: "mathml",
      throwOnError: true,
      displayMode: !inlineMode,
      strict: "ignore",
      trust: false,
    });
  } catch (error) {
    console.warn(`[Math] KaTeX rejected "${latex}":`, errorMessage(error));
    return null;
  }

  try {
    for (const node of parseMarkup(html)) {
      if (typeof node === "string") continue;
      const math = findElement(node, "math");
      if (math) return math;
    }
  } catch (error) {
    console.warn(`[Math] Unreadable MathML for "${latex}":`, errorMessage(error));
  }
  return null;
}

