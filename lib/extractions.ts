import { getDb } from "./db";
import {
  extractionDocumentSchema,
  type ExtractionDocument,
} from "./pipeline/structure/document-schema";

export interface ExtractionRow {
  id: number;
  pdfFileName: string;
  document: ExtractionDocument;
  createdAt: string;
}

type RawRow = {
  id: number;
  PDFFileName: string;
  JSONContent: string;
  CreatedAt: string;
};

function fromRaw(row: RawRow): ExtractionRow {
  return {
    id: row.id,
    pdfFileName: row.PDFFileName,
    document: extractionDocumentSchema.parse(JSON.parse(row.JSONContent)),
    createdAt: row.CreatedAt,
  };
}

/** Stored file name of a document: `<book>.pdf`. */
export function pdfFileNameFor(document: ExtractionDocument): string {
  return `${document.response.book ?? "unknown"}.pdf`;
}

/**
 * Store an extraction result. Best-effort: a failure is logged and reported
 * as `false`, never thrown.
 */
export function saveExtraction(
  document: ExtractionDocument,
  options: { dbPath?: string; now?: Date } = {}
): boolean {
  const pdfFileName = pdfFileNameFor(document);
  try {
    const db = getDb(options.dbPath);
    db.prepare(
      "INSERT INTO extractions (PDFFileName, JSONContent, CreatedAt) VALUES (?, ?, ?)"
    ).run(pdfFileName, JSON.stringify(document), (options.now ?? new Date()).toISOString());
    return true;
  } catch (err) {
    console.error(
      `[extractions] Failed to store ${pdfFileName}:`,
      err instanceof Error ? err.message : err
    );
    return false;
  }
}

export function listExtractions(dbPath?: string): ExtractionRow[] {
  const rows = getDb(dbPath)
    .prepare("SELECT id, PDFFileName, JSONContent, CreatedAt FROM extractions ORDER BY id")
    .all() as RawRow[];
  return rows.map(fromRaw);
}

/** Most recent stored extraction for a PDF file name, or null. */
export function getExtraction(pdfFileName: string, dbPath?: string): ExtractionRow | null {
  const row = getDb(dbPath)
    .prepare(
      "SELECT id, PDFFileName, JSONContent, CreatedAt FROM extractions WHERE PDFFileName = ? ORDER BY id DESC LIMIT 1"
    )
    .get(pdfFileName) as RawRow | undefined;
  return row ? fromRaw(row) : null;
}
