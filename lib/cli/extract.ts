import { extractWithProgress, type ExtractionUpdate } from "../pipeline/extract-document";
import { getOutputRoot } from "../config";
import { runWithProgress } from "./progress";

const pdfPath = process.argv[2];
const outputRoot = process.argv[3] ?? getOutputRoot();

if (!pdfPath) {
  console.error("Usage: extract <pdf_path> [output_root]");
  process.exit(1);
}

const last = await runWithProgress<ExtractionUpdate>(
  extractWithProgress(pdfPath, outputRoot),
  (update) =>
    update.type === "progress" &&
    update.event.type === "step-progress" &&
    update.event.page !== undefined &&
    update.event.totalPages !== undefined
      ? { current: update.event.page, total: update.event.totalPages }
      : null,
  { label: "extract" }
).catch(() => process.exit(1));

if (last?.type === "result") {
  const { document, diagrams, imagesDir } = last.result;
  console.error(`${diagrams.length} diagrams written to ${imagesDir}`);
  process.stdout.write(JSON.stringify(document, null, 2) + "\n");
}
