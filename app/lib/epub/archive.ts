import JSZip from "jszip";
import { readFile } from "fs/promises";
import { extname } from "path";
import { ArchiveStateError } from "../errors";
import { serialize, serializeAll } from "../markup";
import { AssetRegistry, type AssetSink } from "./asset-registry";
import { imageMediaType } from "./assets";
import { renderChapter } from "./chapter";
import type { ResolvedOptions } from "./config";
import { ContentRenderer } from "./content";
import { getLabels, type Labels } from "./i18n";
import { navLandmarks, navTocItems, ncxNavPoints, type NavLink } from "./navigation";
import { findFirstFile, type NavTree } from "./nav-tree";
import {
  ASSETS_DIR,
  CONTAINER_PATH,
  COVER_PAGE_FILE,
  HEAD_FILE,
  MIMETYPE_PATH,
  NAV_PATH,
  NCX_PATH,
  PACKAGE_PATH,
  STYLE_PATH,
  TEXT_DIR,
  assetHref,
} from "./paths";
import {
  EPUB_MIMETYPE,
  chapterXhtml,
  containerXml,
  contentOpf,
  coverXhtml,
  mimetype,
  navXhtml,
  styleCss,
  tocNcx,
  type ManifestItem,
} from "./templates";
import type { BookData, ChapterSource } from "./types";
import { validateChapter } from "./validate";

export type ArchiveState =
  | "opened"
  | "mimetype-written"
  | "navigation-written"
  | "chapters-written"
  | "manifest-written"
  | "assets-written"
  | "closed"
  | "failed";

export interface AssemblyPlan {
  data: BookData;
  tree: NavTree;
  options: ResolvedOptions;
  /** `dc:identifier` and NCX `dtb:uid`. */
  identifier: string;
  /** `dcterms:modified`, already formatted. */
  modified: string;
  /** Timestamp stored on every archive entry. */
  entryDate: Date;
}

const XHTML_TYPE = "application/xhtml+xml";

function manifestId(prefix: string, fileName: string): string {
  return `${prefix}${fileName.replace(/[^A-Za-z0-9_-]/g, "_")}`;
}

/**
 * Writes one EPUB into an in-memory ZIP.
 *
 * The steps must run in order: mimetype, navigation, chapters, manifest,
 * assets, close. A failing step leaves the assembler in the `failed` state
 * and the partial archive must be thrown away.
 */
export class ArchiveAssembler implements AssetSink {
  private readonly zip = new JSZip();
  private readonly assets: AssetRegistry;
  private readonly renderer: ContentRenderer;
  private readonly labels: Labels;
  private readonly mathmlFiles = new Set<string>();
  private readonly coverExtension: string;
  private currentState: ArchiveState = "opened";

  constructor(private readonly plan: AssemblyPlan) {
    this.assets = new AssetRegistry(this);
    this.renderer = new ContentRenderer({
      tableRender: plan.options.tableRender,
      latexRender: plan.options.latexRender,
      formulaBackend: plan.options.formulaBackend,
      assets: this.assets,
    });
    this.labels = getLabels(plan.options.language);
    const coverPath = plan.data.coverImagePath;
    this.coverExtension = coverPath ? (extname(coverPath) || ".png").toLowerCase() : ".png";
  }

  get state(): ArchiveState {
    return this.currentState;
  }

  /** Run every step and return the finished archive. */
  async assemble(): Promise<Buffer> {
    const progress = this.plan.options.onProgress;
    progress(0, "Writing package headers...");
    await this.writeMimetype();
    await this.writeNavigation();
    await this.writeChapters();
    progress(90, "Writing package document...");
    await this.writeManifest();
    await this.writeAssets();
    progress(95, "Compressing EPUB...");
    const buffer = await this.close();
    progress(100, "EPUB complete");
    return buffer;
  }

  writeAsset(fileName: string, data: Buffer): void {
    this.writeBinary(`${ASSETS_DIR}/${fileName}`, data);
  }

  async writeMimetype(): Promise<void> {
    await this.step("opened", "mimetype-written", () => {
      this.writeText(MIMETYPE_PATH, mimetype(), { compression: "STORE" });
    });
  }

  async writeNavigation(): Promise<void> {
    await this.step("mimetype-written", "navigation-written", () => {
      const { data, tree, options, identifier } = this.plan;
      const title = this.bookTitle;

      this.writeText(CONTAINER_PATH, containerXml(PACKAGE_PATH));

      const cover = data.coverImagePath
        ? { title: this.labels.cover, href: `Text/${COVER_PAGE_FILE}` }
        : undefined;
      this.writeText(
        NCX_PATH,
        tocNcx({
          language: options.language,
          identifier,
          depth: tree.depth,
          title,
          authors: data.meta?.authors ?? [],
          navPoints: serializeAll(ncxNavPoints(tree.points, cover)),
        }),
      );

      const headLink: NavLink[] = data.head
        ? [{ title: this.labels.preface, href: `Text/${HEAD_FILE}` }]
        : [];
      this.writeText(
        NAV_PATH,
        navXhtml({
          language: options.language,
          title,
          tocLabel: this.labels.tableOfContents,
          landmarksLabel: this.labels.landmarks,
          tocItems: serializeAll(navTocItems(tree.points, headLink)),
          landmarks: serializeAll(navLandmarks(this.landmarkLinks())),
        }),
      );
    });
  }

  /**
   * Load, render and write each chapter in reading order. Sources are
   * loaded one at a time so only the current chapter is held in memory.
   */
  async writeChapters(): Promise<void> {
    await this.step("navigation-written", "chapters-written", async () => {
      const { data, tree, options } = this.plan;
      const total = tree.entries.length + (data.head ? 1 : 0);
      let done = 0;

      if (data.head) {
        await this.writeChapter(data.head, HEAD_FILE, this.labels.preface);
        done++;
      }
      for (const entry of tree.entries) {
        options.onProgress(
          5 + Math.round((done / total) * 80),
          `Writing chapter ${done + 1}/${total}...`,
        );
        await this.writeChapter(entry.source, entry.fileName, entry.title);
        done++;
      }
    });
  }

  async writeManifest(): Promise<void> {
    await this.step("chapters-written", "manifest-written", () => {
      const { data, tree, options, identifier, modified } = this.plan;
      const meta = data.meta;
      const hasCover = Boolean(data.coverImagePath);

      const chapterItem = (id: string, fileName: string): ManifestItem => ({
        id,
        href: `Text/${fileName}`,
        mediaType: XHTML_TYPE,
        properties: this.mathmlFiles.has(fileName) ? "mathml" : undefined,
      });

      const manifest: ManifestItem[] = [
        { id: "nav", href: "nav.xhtml", mediaType: XHTML_TYPE, properties: "nav" },
        { id: "ncx", href: "toc.ncx", mediaType: "application/x-dtbncx+xml" },
        { id: "css", href: "styles/style.css", mediaType: "text/css" },
      ];
      const spine: string[] = [];

      if (hasCover) {
        manifest.push(
          { id: "cover", href: `Text/${COVER_PAGE_FILE}`, mediaType: XHTML_TYPE },
          {
            id: "cover-image",
            href: `assets/${this.coverFileName}`,
            mediaType: imageMediaType(this.coverExtension),
            properties: "cover-image",
          },
        );
        spine.push("cover");
      }
      if (data.head) {
        manifest.push(chapterItem("head", HEAD_FILE));
        spine.push("head");
      }
      for (const entry of tree.entries) {
        const id = manifestId("", entry.fileName.replace(/\.xhtml$/, ""));
        manifest.push(chapterItem(id, entry.fileName));
        spine.push(id);
      }

      const usedIds = new Set(manifest.map((item) => item.id));
      for (const asset of this.assets.usedFiles) {
        let id = manifestId("asset-", asset.fileName);
        for (let n = 2; usedIds.has(id); n++) {
          id = `${manifestId("asset-", asset.fileName)}-${n}`;
        }
        usedIds.add(id);
        manifest.push({ id, href: `assets/${asset.fileName}`, mediaType: asset.mediaType });
      }

      this.writeText(
        PACKAGE_PATH,
        contentOpf({
          language: options.language,
          identifier,
          title: this.bookTitle,
          modified,
          description: meta?.description,
          publisher: meta?.publisher,
          authors: meta?.authors ?? [],
          editors: meta?.editors ?? [],
          translators: meta?.translators ?? [],
          coverImageId: hasCover ? "cover-image" : undefined,
          manifest,
          spine,
        }),
      );
    });
  }

  async writeAssets(): Promise<void> {
    await this.step("manifest-written", "assets-written", async () => {
      const { data, options } = this.plan;
      this.writeText(STYLE_PATH, styleCss());

      if (data.coverImagePath) {
        this.writeText(
          `${TEXT_DIR}/${COVER_PAGE_FILE}`,
          coverXhtml({
            language: options.language,
            title: this.labels.cover,
            imageHref: assetHref(this.coverFileName),
          }),
        );
        this.writeAsset(this.coverFileName, await readFile(data.coverImagePath));
      }

      const copied = await this.assets.finalize();
      if (copied > 0) {
        console.log(`[EPUB] Copied ${copied} asset file(s)`);
      }
    });
  }

  close(): Promise<Buffer> {
    return this.step("assets-written", "closed", () =>
      this.zip.generateAsync({
        type: "nodebuffer",
        mimeType: EPUB_MIMETYPE,
        compression: "DEFLATE",
        compressionOptions: { level: 6 },
      }),
    );
  }

  /** Archive paths in write order. */
  get entryNames(): string[] {
    return Object.keys(this.zip.files);
  }

  private get bookTitle(): string {
    return this.plan.data.meta?.title || this.labels.unnamed;
  }

  private get coverFileName(): string {
    return `cover${this.coverExtension}`;
  }

  private landmarkLinks(): (NavLink & { type: string })[] {
    const { data, tree } = this.plan;
    const links: (NavLink & { type: string })[] = [];
    if (data.coverImagePath) {
      links.push({ type: "cover", title: this.labels.cover, href: `Text/${COVER_PAGE_FILE}` });
    }
    if (data.head) {
      links.push({ type: "frontmatter", title: this.labels.preface, href: `Text/${HEAD_FILE}` });
    }
    const first = findFirstFile(tree.points);
    if (first) {
      links.push({ type: "bodymatter", title: this.labels.start, href: `Text/${first}` });
    }
    return links;
  }

  private async writeChapter(source: ChapterSource, fileName: string, title: string): Promise<void> {
    const chapter = await source.load();
    validateChapter(chapter, `Chapter(${fileName})`);

    const rendered = renderChapter(this.renderer, chapter);
    if (rendered.hasMathML) {
      this.mathmlFiles.add(fileName);
    }

    this.writeText(
      `${TEXT_DIR}/${fileName}`,
      chapterXhtml({
        language: this.plan.options.language,
        title,
        content: rendered.content.map((node) => serialize(node)),
        citations: rendered.citations.map((node) => serialize(node)),
        referencesLabel: this.labels.references,
      }),
    );
  }

  private async step<T>(
    from: ArchiveState,
    to: ArchiveState,
    run: () => T | Promise<T>,
  ): Promise<T> {
    if (this.currentState !== from) {
      throw new ArchiveStateError(from, this.currentState);
    }
    try {
      const result = await run();
      this.currentState = to;
      return result;
    } catch (error) {
      this.currentState = "failed";
      throw error;
    }
  }

  private writeText(path: string, content: string, options: JSZip.JSZipFileOptions = {}): void {
    this.zip.file(path, content, { createFolders: false, date: this.plan.entryDate, ...options });
  }

  private writeBinary(path: string, data: Buffer): void {
    this.zip.file(path, data, { createFolders: false, date: this.plan.entryDate, binary: true });
  }
}
