import { existsSync } from "fs";
import { mkdir, rename, unlink, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { v4 as uuid } from "uuid";
import { AssetNotFoundError, StructuralError } from "./errors";
import { ArchiveAssembler } from "./epub/archive";
import { resolveOptions, type GenerateOptions } from "./epub/config";
import { buildNavTree } from "./epub/nav-tree";
import type { BookData, LaTeXRender, Language, TableRender } from "./epub/types";
import { validateBookData } from "./epub/validate";
import { errorMessage, formatModified } from "./utils";

/**
 * Build an EPUB in memory.
 *
 * The book data and TOC structure are checked before any chapter source is
 * loaded, so a structural problem never costs a chapter load.
 */
export async function buildEpub(data: BookData, options?: GenerateOptions): Promise<Buffer> {
  const resolved = resolveOptions(options);

  validateBookData(data);
  if (data.coverImagePath && !existsSync(data.coverImagePath)) {
    throw new AssetNotFoundError(resolve(data.coverImagePath));
  }

  const tree = buildNavTree(data.prefaces ?? [], data.chapters ?? [], Boolean(data.coverImagePath));
  if (tree.entries.length === 0 && !data.head) {
    throw new StructuralError("Book has no chapters to write");
  }

  const modified = data.meta?.modified ?? new Date();
  const assembler = new ArchiveAssembler({
    data,
    tree,
    options: resolved,
    identifier: data.meta?.isbn || `urn:uuid:${uuid()}`,
    modified: formatModified(modified),
    entryDate: modified,
  });
  return assembler.assemble();
}

/**
 * Build an EPUB and write it to `outputPath`.
 *
 * The archive is written to a temporary file beside the target and renamed
 * into place, so a failed build leaves no file at `outputPath`.
 */
export async function generateEpub(
  data: BookData,
  outputPath: string,
  options?: GenerateOptions,
): Promise<void> {
  const target = resolve(outputPath);
  await mkdir(dirname(target), { recursive: true });

  const buffer = await buildEpub(data, options);

  const tempPath = `${target}.${uuid()}.tmp`;
  try {
    await writeFile(tempPath, buffer);
    await rename(tempPath, target);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      console.warn(`[EPUB] Could not remove ${tempPath}: ${errorMessage(cleanupError)}`);
    });
    throw error;
  }

  console.log(`[EPUB] Wrote ${target} (${buffer.length} bytes)`);
}

/**
 * Positional form of {@link generateEpub}. Omitted modes fall back to the
 * environment defaults.
 */
export function generate(
  data: BookData,
  outputPath: string,
  language?: Language,
  tableRender?: TableRender,
  latexRender?: LaTeXRender,
): Promise<void> {
  return generateEpub(data, outputPath, { language, tableRender, latexRender });
}

export * from "./epub/types";
export type { GenerateOptions, ProgressCallback } from "./epub/config";
export { loadEnvDefaults, resolveOptions } from "./epub/config";
export type { FormulaBackend } from "./math";
export { ArchiveAssembler, type ArchiveState } from "./epub/archive";
export { AssetRegistry } from "./epub/asset-registry";
export { buildNavTree, type NavEntry, type NavPoint, type NavTree } from "./epub/nav-tree";
export { validateBookData, validateChapter } from "./epub/validate";
export {
  ArchiveStateError,
  AssetNotFoundError,
  InvalidUnicodeError,
  MarkupParseError,
  StructuralError,
} from "./errors";
