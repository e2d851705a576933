/**
 * Fixed layout of the generated archive.
 */

export const MIMETYPE_PATH = "mimetype";
export const CONTAINER_PATH = "META-INF/container.xml";

export const OEBPS_DIR = "OEBPS";
export const PACKAGE_PATH = `${OEBPS_DIR}/content.opf`;
export const NCX_PATH = `${OEBPS_DIR}/toc.ncx`;
export const NAV_PATH = `${OEBPS_DIR}/nav.xhtml`;
export const STYLE_PATH = `${OEBPS_DIR}/styles/style.css`;

export const TEXT_DIR = `${OEBPS_DIR}/Text`;
export const ASSETS_DIR = `${OEBPS_DIR}/assets`;

export const HEAD_FILE = "head.xhtml";
export const COVER_PAGE_FILE = "cover.xhtml";

/** Relative href from a Text/ document to an asset. */
export function assetHref(fileName: string): string {
  return `../assets/${fileName}`;
}
