/**
 * Small helpers shared by the generation modules.
 */

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format a date as `YYYY-MM-DDThh:mm:ssZ` (UTC, no milliseconds), the form
 * EPUB requires for `dcterms:modified`.
 */
export function formatModified(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function padNumber(value: number, digits: number): string {
  return String(value).padStart(digits, "0");
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
