import { StructuralError } from "../errors";
import { padNumber } from "../utils";
import type { ChapterSource, TocNode } from "./types";

/**
 * A TOC node that owns a chapter file.
 */
export interface NavEntry {
  id: number;
  fileName: string;
  playOrder: number;
  title: string;
  source: ChapterSource;
}

/**
 * Navigation tree node. `entry` is null for section headings; their `href`
 * is the file of the first chapter found below them.
 */
export interface NavPoint {
  title: string;
  entry: NavEntry | null;
  href: string;
  children: NavPoint[];
}

export interface NavTree {
  points: NavPoint[];
  /** Entries in pre-order, which is also the reading order. */
  entries: NavEntry[];
  depth: number;
}

export function countTocNodes(nodes: TocNode[]): number {
  let count = 0;
  for (const node of nodes) {
    count += 1 + countTocNodes(node.children ?? []);
  }
  return count;
}

export function maxTocDepth(nodes: TocNode[]): number {
  let depth = 0;
  for (const node of nodes) {
    depth = Math.max(depth, maxTocDepth(node.children ?? []) + 1);
  }
  return depth;
}

/**
 * First chapter-backed entry in depth-first order.
 */
export function findFirstEntry(points: NavPoint[]): NavEntry | null {
  for (const point of points) {
    if (point.entry) return point.entry;
    const found = findFirstEntry(point.children);
    if (found) return found;
  }
  return null;
}

export function findFirstFile(points: NavPoint[]): string | null {
  return findFirstEntry(points)?.fileName ?? null;
}

class NavTreeBuilder {
  readonly entries: NavEntry[] = [];
  private nextId = 1;
  private nextOrder: number;

  constructor(
    hasCover: boolean,
    private readonly digits: number,
  ) {
    this.nextOrder = hasCover ? 2 : 1;
  }

  createPoint(node: TocNode, path: string): NavPoint {
    let entry: NavEntry | null = null;
    if (node.source) {
      const id = this.nextId++;
      entry = {
        id,
        fileName: `part${padNumber(id, this.digits)}.xhtml`,
        playOrder: this.nextOrder++,
        title: node.title,
        source: node.source,
      };
      this.entries.push(entry);
    }

    const children = (node.children ?? []).map((child, index) =>
      this.createPoint(child, `${path}.children[${index}]`),
    );

    const href = entry ? entry.fileName : findFirstFile(children);
    if (href === null) {
      throw new StructuralError(
        `TOC entry "${node.title}" (${path}) has no chapter in itself or any descendant`,
      );
    }
    return { title: node.title, entry, href, children };
  }
}

/**
 * Assign file names, IDs and play order to a TOC forest.
 *
 * Prefaces come before chapters. IDs are given in pre-order to nodes with a
 * chapter source only; file names are zero padded to the digit count of the
 * total node count.
 */
export function buildNavTree(prefaces: TocNode[], chapters: TocNode[], hasCover: boolean): NavTree {
  const total = countTocNodes(prefaces) + countTocNodes(chapters);
  const builder = new NavTreeBuilder(hasCover, String(total).length);

  const points = [
    ...prefaces.map((node, index) => builder.createPoint(node, `prefaces[${index}]`)),
    ...chapters.map((node, index) => builder.createPoint(node, `chapters[${index}]`)),
  ];

  return {
    points,
    entries: builder.entries,
    depth: Math.max(maxTocDepth(prefaces), maxTocDepth(chapters)),
  };
}
