import { StructuralError } from "../errors";
import { append, element, type MarkupElement } from "../markup";
import { findFirstEntry, type NavPoint } from "./nav-tree";

export interface NavLink {
  title: string;
  /** Path relative to the package directory, e.g. `Text/head.xhtml`. */
  href: string;
}

function tocItem(point: NavPoint): MarkupElement {
  const item = element("li", {}, [element("a", { href: `Text/${point.href}` }, [point.title])]);
  if (point.children.length > 0) {
    append(item, element("ol", {}, point.children.map(tocItem)));
  }
  return item;
}

/**
 * `<li>` items of the EPUB 3 table of contents. Section headings link to
 * the first chapter below them. `leading` links (front matter) come first.
 */
export function navTocItems(points: NavPoint[], leading: NavLink[] = []): MarkupElement[] {
  return [
    ...leading.map((link) => element("li", {}, [element("a", { href: link.href }, [link.title])])),
    ...points.map(tocItem),
  ];
}

export function navLandmarks(links: (NavLink & { type: string })[]): MarkupElement[] {
  return links.map((link) =>
    element("li", {}, [element("a", { "epub:type": link.type, href: link.href }, [link.title])]),
  );
}

export interface NcxCover {
  title: string;
  href: string;
}

/**
 * `<navPoint>` elements of the NCX. A section heading shares the play
 * order of the chapter it points at and gets its own `np_section_N` ID.
 */
export function ncxNavPoints(points: NavPoint[], cover?: NcxCover): MarkupElement[] {
  let sections = 0;

  const navPoint = (point: NavPoint): MarkupElement => {
    const target = point.entry ?? findFirstEntry(point.children);
    if (!target) {
      throw new StructuralError(`TOC entry "${point.title}" has no chapter to point at`);
    }
    const id = point.entry ? `np_${point.entry.id}` : `np_section_${++sections}`;
    return element("navPoint", { id, playOrder: String(target.playOrder) }, [
      element("navLabel", {}, [element("text", {}, [point.title])]),
      element("content", { src: `Text/${target.fileName}` }),
      ...point.children.map(navPoint),
    ]);
  };

  const coverPoint = cover
    ? [
        element("navPoint", { id: "np_cover", playOrder: "1" }, [
          element("navLabel", {}, [element("text", {}, [cover.title])]),
          element("content", { src: cover.href }),
        ]),
      ]
    : [];

  return [...coverPoint, ...points.map(navPoint)];
}
