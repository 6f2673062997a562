import fs from "node:fs";
import path from "node:path";
import { NextResponse } from "next/server";
import { getOutputRoot, getUploadDir } from "@/lib/config";
import { saveExtraction } from "@/lib/extractions";
import { extractStructuredContent } from "@/lib/pipeline/extract-document";
import { createConsoleProgress } from "@/lib/pipeline/progress";
import { secureFilename } from "@/lib/pipeline/slug";
import type { ExtractionDocument } from "@/lib/pipeline/structure/document-schema";

export const runtime = "nodejs";

export type UploadResult =
  | {
      response: ExtractionDocument["response"];
      uploaded_files: ExtractionDocument;
    }
  | { file: string; error: string };

interface AcceptedFile {
  file: File;
  fileName: string;
}

export async function POST(request: Request) {
  const formData = await request.formData();

  if (!formData.has("files")) {
    return NextResponse.json({ error: "'files' field is missing" }, { status: 400 });
  }

  const accepted: AcceptedFile[] = [];
  for (const entry of formData.getAll("files")) {
    if (typeof entry === "string" || entry.name === "") continue;
    const fileName = secureFilename(entry.name);
    if (!fileName) continue;
    accepted.push({ file: entry, fileName });
  }

  if (accepted.length === 0) {
    return NextResponse.json({ error: "No files selected" }, { status: 400 });
  }

  const uploadDir = getUploadDir();
  const outputRoot = getOutputRoot();
  fs.mkdirSync(uploadDir, { recursive: true });

  // Documents run in parallel; uploads sharing a file name would share an
  // output directory, so those are chained one after another.
  const chains = new Map<string, Promise<unknown>>();
  const results = accepted.map((item) => {
    const previous = chains.get(item.fileName) ?? Promise.resolve();
    const next = previous.then(() => processUpload(item, uploadDir, outputRoot));
    chains.set(item.fileName, next);
    return next;
  });

  return NextResponse.json(await Promise.all(results));
}

async function processUpload(
  { file, fileName }: AcceptedFile,
  uploadDir: string,
  outputRoot: string
): Promise<UploadResult> {
  const pdfPath = path.join(uploadDir, fileName);

  try {
    fs.writeFileSync(pdfPath, Buffer.from(await file.arrayBuffer()));
    const { document } = await extractStructuredContent(pdfPath, outputRoot, {
      progress: createConsoleProgress(),
    });
    saveExtraction(document);
    return { response: document.response, uploaded_files: document };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[upload] Extraction failed for ${fileName}: ${message}`);
    return { file: fileName, error: message };
  }
}
