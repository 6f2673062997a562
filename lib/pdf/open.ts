import fs from "node:fs";
import mupdf, { type Document as MupdfDocument } from "mupdf";

export type PdfDocument = MupdfDocument;

export class PdfOpenError extends Error {
  constructor(
    public readonly pdfPath: string,
    cause: unknown
  ) {
    super(
      `Unable to open PDF ${pdfPath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "PdfOpenError";
  }
}

/**
 * Open a PDF from a buffer, suppressing mupdf's stderr warnings.
 * Throws if the data is not a readable PDF.
 */
export function openPdfFromBuffer(buffer: Buffer): PdfDocument {
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    const doc = mupdf.Document.openDocument(buffer, "application/pdf");
    // Lazy parsers only fail once the page tree is touched.
    doc.countPages();
    return doc;
  } finally {
    process.stderr.write = origWrite;
  }
}

export function openPdf(pdfPath: string): PdfDocument {
  try {
    return openPdfFromBuffer(fs.readFileSync(pdfPath));
  } catch (err) {
    throw new PdfOpenError(pdfPath, err);
  }
}
