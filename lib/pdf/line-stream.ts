import type { PdfDocument } from "./open";

export interface PageLines {
  /** 1-based page number */
  pageNumber: number;
  /** Trimmed, non-empty text lines in reading order */
  lines: string[];
}

export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function readPageLines(doc: PdfDocument, pageIndex: number): PageLines {
  const page = doc.loadPage(pageIndex);
  const text = page.toStructuredText().asText();
  return { pageNumber: pageIndex + 1, lines: splitLines(text) };
}

export function readAllLines(doc: PdfDocument): PageLines[] {
  const pages: PageLines[] = [];
  const total = doc.countPages();
  for (let i = 0; i < total; i++) {
    pages.push(readPageLines(doc, i));
  }
  return pages;
}
