import { mathjax } from "mathjax-full/js/mathjax.js";
import { TeX } from "mathjax-full/js/input/tex.js";
import { SVG } from "mathjax-full/js/output/svg.js";
import { liteAdaptor } from "mathjax-full/js/adaptors/liteAdaptor.js";
import { RegisterHTMLHandler } from "mathjax-full/js/handlers/html.js";
import { AllPackages } from "mathjax-full/js/input/tex/AllPackages.js";
import { errorMessage } from "../utils";

// noerrors/noundefined turn TeX errors into red output instead of failures
const PACKAGES = AllPackages.filter((name) => name !== "noerrors" && name !== "noundefined");

let convert: ((latex: string) => string) | null = null;

function getConverter(): (latex: string) => string {
  if (convert) return convert;

  const adaptor = liteAdaptor();
  RegisterHTMLHandler(adaptor);
  const document = mathjax.document("", {
    InputJax: new TeX({
      packages: PACKAGES,
      formatError: (_jax: unknown, error: unknown) => {
        throw error;
      },
    }),
    // identical LaTeX must give identical bytes, so no shared glyph defs
    OutputJax: new SVG({ fontCache: "none" }),
  });

  convert = (latex) => adaptor.innerHTML(document.convert(latex, { display: true }));
  return convert;
}

/**
 * Render LaTeX to a standalone SVG document with MathJax.
 * Returns null when the expression cannot be typeset.
 */
export function latexToSvg(latex: string): Buffer | null {
  try {
    const svg = getConverter()(latex);
    if (!svg.startsWith("<svg")) return null;
    return Buffer.from(`<?xml version="1.0" encoding="UTF-8"?>\n${svg}`, "utf-8");
  } catch (error) {
    console.warn(`[Math] MathJax could not render "${latex}":`, errorMessage(error));
    return null;
  }
}
