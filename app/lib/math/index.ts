import type { MarkupElement } from "../markup";
import { latexToMathML } from "./katex";
import { latexToSvg } from "./mathjax";

/**
 * LaTeX conversion used by the content renderer. Implementations signal
 * failure by returning null and never throw.
 */
export interface FormulaBackend {
  toMathML(latex: string, inlineMode: boolean): MarkupElement | null;
  toSvg(latex: string): Buffer | null;
}

export const defaultFormulaBackend: FormulaBackend = {
  toMathML: latexToMathML,
  toSvg: latexToSvg,
};

export { latexToMathML, latexToSvg };
