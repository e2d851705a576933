import { z } from "zod";
import { defaultFormulaBackend, type FormulaBackend } from "../math";
import type { LaTeXRender, Language, TableRender } from "./types";

export type ProgressCallback = (percent: number, message: string) => void;

export interface GenerateOptions {
  language?: Language;
  tableRender?: TableRender;
  latexRender?: LaTeXRender;
  /** Replaces the KaTeX/MathJax conversion. */
  formulaBackend?: FormulaBackend;
  onProgress?: ProgressCallback;
}

export interface ResolvedOptions {
  language: Language;
  tableRender: TableRender;
  latexRender: LaTeXRender;
  formulaBackend: FormulaBackend;
  onProgress: ProgressCallback;
}

const EnvSchema = z.object({
  EPUB_LANGUAGE: z.enum(["zh", "en"]).default("zh"),
  EPUB_TABLE_RENDER: z.enum(["html", "clipping"]).default("html"),
  EPUB_LATEX_RENDER: z.enum(["mathml", "svg", "clipping"]).default("mathml"),
});

type EnvDefaults = z.infer<typeof EnvSchema>;

/**
 * Read rendering defaults from the environment. Unset variables fall back to
 * `zh`, `html` and `mathml`; a value outside the allowed set is an error.
 */
export function loadEnvDefaults(env: NodeJS.ProcessEnv = process.env): EnvDefaults {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid EPUB environment configuration: ${issues}`);
  }
  return result.data;
}

export function resolveOptions(
  options: GenerateOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedOptions {
  const defaults = loadEnvDefaults(env);
  return {
    language: options.language ?? defaults.EPUB_LANGUAGE,
    tableRender: options.tableRender ?? defaults.EPUB_TABLE_RENDER,
    latexRender: options.latexRender ?? defaults.EPUB_LATEX_RENDER,
    formulaBackend: options.formulaBackend ?? defaultFormulaBackend,
    onProgress: options.onProgress ?? (() => {}),
  };
}
