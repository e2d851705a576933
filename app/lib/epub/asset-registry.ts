import { createHash } from "crypto";
import { existsSync, readFileSync } from "fs";
import { readFile } from "fs/promises";
import { extname, resolve } from "path";
import { AssetNotFoundError } from "../errors";

/**
 * Destination for asset bytes. The archive assembler implements this so the
 * registry never touches the archive directly.
 */
export interface AssetSink {
  writeAsset(fileName: string, data: Buffer): void;
}

export interface UsedAsset {
  fileName: string;
  mediaType: string;
}

function contentFileName(data: Buffer, extension: string): string {
  const hash = createHash("sha256").update(data).digest("hex").slice(0, 16);
  return `${hash}${extension.toLowerCase()}`;
}

/**
 * Tracks the asset files of one build.
 *
 * Names are derived from file content, so registering the same path twice,
 * or two paths with identical bytes, yields a single archive entry.
 * Files registered by path are copied in `finalize()`; generated bytes are
 * written as soon as they are registered.
 */
export class AssetRegistry {
  private readonly mediaTypes = new Map<string, string>();
  private readonly namesByPath = new Map<string, string>();
  private readonly pending = new Map<string, string>();
  private finalized = false;

  constructor(private readonly sink: AssetSink) {}

  useAsset(sourcePath: string, mediaType: string, extension = extname(sourcePath) || ".png"): string {
    this.assertOpen();
    const absolutePath = resolve(sourcePath);
    const known = this.namesByPath.get(absolutePath);
    if (known) return known;

    if (!existsSync(absolutePath)) {
      throw new AssetNotFoundError(sourcePath);
    }
    const fileName = contentFileName(readFileSync(absolutePath), extension);
    this.namesByPath.set(absolutePath, fileName);

    if (!this.mediaTypes.has(fileName)) {
      this.mediaTypes.set(fileName, mediaType);
      this.pending.set(fileName, absolutePath);
    }
    return fileName;
  }

  addAsset(data: Buffer, mediaType: string, extension: string): string {
    this.assertOpen();
    const fileName = contentFileName(data, extension);
    if (this.mediaTypes.has(fileName)) return fileName;

    this.mediaTypes.set(fileName, mediaType);
    this.sink.writeAsset(fileName, data);
    return fileName;
  }

  /**
   * Copy every file registered by path into the archive. Returns the number
   * of files written.
   */
  async finalize(): Promise<number> {
    this.assertOpen();
    this.finalized = true;

    let written = 0;
    for (const [fileName, sourcePath] of this.pending) {
      this.sink.writeAsset(fileName, await readFile(sourcePath));
      written++;
    }
    this.pending.clear();
    return written;
  }

  /** Registered files sorted by name, for the package manifest. */
  get usedFiles(): UsedAsset[] {
    return [...this.mediaTypes]
      .map(([fileName, mediaType]) => ({ fileName, mediaType }))
      .sort((a, b) => (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0));
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new Error("Asset registry has already been finalized");
    }
  }
}
