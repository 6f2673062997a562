import path from "node:path";

/** Book name of a PDF: its file name without directory or extension. */
export function bookNameFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Reduce an uploaded file name to a safe ASCII name: accents folded, path
 * separators and whitespace turned into underscores, anything outside
 * [A-Za-z0-9_.-] dropped, leading/trailing dots and underscores trimmed.
 * May return an empty string.
 */
export function secureFilename(name: string): string {
  return name
    .normalize("NFKD")
    .replace(/[^\x00-\x7f]/g, "")
    .replace(/[/\\]/g, " ")
    .split(/\s+/)
    .filter(Boolean)
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "");
}
