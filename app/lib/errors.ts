/**
 * Error types raised while assembling an EPUB.
 */

/**
 * The book model cannot be turned into a valid EPUB: a TOC entry with no
 * chapter anywhere below it, a footnote mark without a footnote, or a book
 * with nothing to read.
 */
export class StructuralError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructuralError";
  }
}

/**
 * A referenced image or cover file does not exist.
 */
export class AssetNotFoundError extends Error {
  readonly code = "ENOENT";

  constructor(readonly path: string) {
    super(`Asset file not found: ${path}`);
    this.name = "AssetNotFoundError";
  }
}

export class ArchiveStateError extends Error {
  constructor(expected: string, actual: string) {
    super(`Archive is in state "${actual}", expected "${expected}"`);
    this.name = "ArchiveStateError";
  }
}

export class MarkupParseError extends Error {
  constructor(
    message: string,
    readonly line: number,
  ) {
    super(`Invalid markup at line ${line}: ${message}`);
    this.name = "MarkupParseError";
  }
}

/**
 * A string holds an unpaired surrogate and cannot be encoded as UTF-8.
 */
export class InvalidUnicodeError extends Error {
  constructor(
    readonly field: string,
    readonly codePoint: number,
  ) {
    const hex = codePoint.toString(16).toUpperCase().padStart(4, "0");
    super(`Invalid character U+${hex} in ${field}`);
    this.name = "InvalidUnicodeError";
  }
}
