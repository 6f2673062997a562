/**
 * Document extraction
 *
 * Runs the whole pipeline for one PDF:
 * 1. Diagram extraction (render, contour analysis, crops)
 * 2. Line extraction and structuring
 * 3. Assembly of the response envelope
 */

import fs from "node:fs";
import path from "node:path";
import { Observable } from "rxjs";
import {
  getDiagramSettings,
  getStructureSettings,
  loadConfig,
  type AppConfig,
  type DiagramSettings,
} from "@/lib/config";
import { readAllLines } from "@/lib/pdf/line-stream";
import { openPdf } from "@/lib/pdf/open";
import { extractDiagrams } from "./diagrams/extract-diagrams";
import {
  createCallbackProgress,
  nullProgress,
  type Progress,
  type ProgressEvent,
  type StepName,
} from "./progress";
import { bookNameFromPath } from "./slug";
import { assembleDocument } from "./structure/assemble";
import type { Diagram, ExtractionDocument } from "./structure/document-schema";
import { structureDocument } from "./structure/structurer";

export interface ExtractOptions {
  /** Parsed config; loaded from config.yaml when omitted */
  config?: AppConfig;
  /** Overrides for the configured diagram settings */
  diagrams?: Partial<DiagramSettings>;
  subject?: string | null;
  chapterTitle?: string | null;
  progress?: Progress;
}

export interface ExtractionResult {
  document: ExtractionDocument;
  diagrams: Diagram[];
  pageCount: number;
  /** Directory holding the diagram crops */
  imagesDir: string;
}

export type ExtractionUpdate =
  | { type: "progress"; event: ProgressEvent }
  | { type: "result"; result: ExtractionResult };

/** Directory the crops of a book are written to. */
export function resolveImagesDir(outputRoot: string, bookName: string): string {
  return path.resolve(outputRoot, "images", bookName);
}

/**
 * Extract the structured document and diagram crops of a PDF.
 *
 * Throws `PdfOpenError` when the file cannot be opened; nothing else about the
 * content (no diagrams, no headings) is treated as an error.
 */
export async function extractStructuredContent(
  pdfPath: string,
  outputRoot: string,
  options: ExtractOptions = {}
): Promise<ExtractionResult> {
  const cfg = options.config ?? loadConfig();
  const diagramSettings = { ...getDiagramSettings(cfg), ...options.diagrams };
  const structureSettings = getStructureSettings(cfg);
  const progress = options.progress ?? nullProgress;

  const book = bookNameFromPath(pdfPath);
  const imagesDir = resolveImagesDir(outputRoot, book);

  const doc = openPdf(pdfPath);
  try {
    fs.mkdirSync(imagesDir, { recursive: true });
    removeStaleCrops(imagesDir);

    const diagrams = await runStep(progress, "diagrams", book, () =>
      extractDiagrams(doc, { bookName: book, imagesDir, ...diagramSettings }, (p) => {
        progress.emit({
          type: "step-progress",
          step: "diagrams",
          book,
          message: `Analysed page ${p.page}`,
          page: p.page,
          totalPages: p.totalPages,
        });
      })
    );

    const chapter = await runStep(progress, "structure", book, async () =>
      structureDocument(readAllLines(doc), diagrams, {
        chapterTitle:
          options.chapterTitle !== undefined ? options.chapterTitle : structureSettings.chapterTitle,
        defaultChapterName: structureSettings.defaultChapterName,
      })
    );

    const document = assembleDocument(chapter, {
      book,
      subject: options.subject !== undefined ? options.subject : structureSettings.subject,
    });

    return { document, diagrams, pageCount: doc.countPages(), imagesDir };
  } finally {
    doc.destroy();
  }
}

const CROP_FILE_RE = /^page_\d+_diagram_\d+\.jpg$/;

/** Delete crops left by an earlier run so the directory matches the new records. */
function removeStaleCrops(imagesDir: string): void {
  for (const name of fs.readdirSync(imagesDir)) {
    if (CROP_FILE_RE.test(name)) {
      fs.rmSync(path.join(imagesDir, name), { force: true });
    }
  }
}

async function runStep<T>(
  progress: Progress,
  step: StepName,
  book: string,
  run: () => Promise<T>
): Promise<T> {
  progress.emit({ type: "step-start", step, book });
  try {
    const result = await run();
    progress.emit({ type: "step-complete", step, book });
    return result;
  } catch (err) {
    progress.emit({
      type: "step-error",
      step,
      book,
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
}

// Convenience wrapper for CLI usage
export function extractWithProgress(
  pdfPath: string,
  outputRoot: string,
  options: Omit<ExtractOptions, "progress"> = {}
): Observable<ExtractionUpdate> {
  return new Observable<ExtractionUpdate>((subscriber) => {
    const progress = createCallbackProgress((event) =>
      subscriber.next({ type: "progress", event })
    );
    extractStructuredContent(pdfPath, outputRoot, { ...options, progress }).then(
      (result) => {
        subscriber.next({ type: "result", result });
        subscriber.complete();
      },
      (err: unknown) => subscriber.error(err)
    );
  });
}
