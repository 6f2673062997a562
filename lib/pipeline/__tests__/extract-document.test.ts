import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { lastValueFrom, toArray } from "rxjs";
import { PdfOpenError } from "@/lib/pdf/open";
import { createTestPdf } from "@/lib/pdf/__tests__/create-test-pdf";
import {
  extractStructuredContent,
  extractWithProgress,
  resolveImagesDir,
} from "../extract-document";
import { createCallbackProgress, type ProgressEvent } from "../progress";

let workDir: string;
let pdfPath: string;

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), "extract-document-"));
  pdfPath = path.join(workDir, "circles.pdf");
  fs.writeFileSync(
    pdfPath,
    createTestPdf([
      {
        lines: ["CIRCLES", "9.1 Introduction", "A circle is round."],
        boxes: [[72, 200, 200, 150]],
      },
      { lines: ["EXERCISE 9.1", "1. Draw a circle."] },
    ])
  );
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

const outputRoot = () => path.join(workDir, "output");
const DIAGRAMS = { concurrency: 1 };

describe("extractStructuredContent", () => {
  it("builds the document and writes the diagram crops", async () => {
    const { document, diagrams, pageCount, imagesDir } = await extractStructuredContent(
      pdfPath,
      outputRoot(),
      { config: {}, diagrams: DIAGRAMS }
    );

    expect(pageCount).toBe(2);
    expect(imagesDir).toBe(path.resolve(outputRoot(), "images", "circles"));
    expect(document.response.book).toBe("circles");
    expect(document.response.subject).toBe("Mathematics");
    expect(document.response.chapters).toHaveLength(1);

    const [chapter] = document.response.chapters;
    expect(chapter.chapterName).toBe("CIRCLES");
    expect(chapter.exercises).toEqual([]);
    expect(chapter.topics.map((t) => t.topicName)).toEqual(["Introduction"]);

    const imagesOf = (page: number) =>
      diagrams.filter((d) => d.page === page).map((d) => ({ img: d.imagePath }));

    const [topic] = chapter.topics;
    expect(topic.sections).toEqual([
      { sectionName: "Section 1", content: "A circle is round.", imageUrls: imagesOf(1) },
    ]);
    expect(topic.exercises).toEqual([
      { exercise: "EXERCISE 9.1", content: "1. Draw a circle.", imageUrls: imagesOf(2) },
    ]);

    const box = diagrams.find((d) => d.page === 1 && Math.abs(d.x - 72) < 2);
    expect(box).toBeDefined();
    expect(Math.abs((box?.width ?? 0) - 200)).toBeLessThan(2);

    for (const d of diagrams) {
      expect(fs.existsSync(path.join(imagesDir, path.basename(d.imagePath)))).toBe(true);
    }
    expect(fs.readdirSync(imagesDir)).toHaveLength(diagrams.length);
  });

  it("removes crops left by an earlier run of the same book", async () => {
    const imagesDir = resolveImagesDir(outputRoot(), "circles");
    fs.mkdirSync(imagesDir, { recursive: true });
    fs.writeFileSync(path.join(imagesDir, "page_9_diagram_3.jpg"), "stale");
    fs.writeFileSync(path.join(imagesDir, "notes.txt"), "kept");

    const { diagrams } = await extractStructuredContent(pdfPath, outputRoot(), {
      config: {},
      diagrams: DIAGRAMS,
    });

    expect(fs.existsSync(path.join(imagesDir, "page_9_diagram_3.jpg"))).toBe(false);
    expect(fs.readFileSync(path.join(imagesDir, "notes.txt"), "utf-8")).toBe("kept");
    expect(fs.readdirSync(imagesDir).filter((f) => f.endsWith(".jpg"))).toHaveLength(
      diagrams.length
    );
  });

  it("produces the same tree and crops on a second run", async () => {
    const first = await extractStructuredContent(pdfPath, outputRoot(), {
      config: {},
      diagrams: DIAGRAMS,
    });
    const firstCrops = first.diagrams.map((d) =>
      fs.readFileSync(path.join(first.imagesDir, path.basename(d.imagePath)))
    );

    const second = await extractStructuredContent(pdfPath, outputRoot(), {
      config: {},
      diagrams: DIAGRAMS,
    });

    expect(second.document).toEqual(first.document);
    expect(second.diagrams).toEqual(first.diagrams);
    second.diagrams.forEach((d, i) => {
      const crop = fs.readFileSync(path.join(second.imagesDir, path.basename(d.imagePath)));
      expect(crop.equals(firstCrops[i])).toBe(true);
    });
  });

  it("applies subject and chapter title overrides", async () => {
    const { document } = await extractStructuredContent(pdfPath, outputRoot(), {
      config: { subject: "Geometry", structure: { default_chapter_name: "Chapter" } },
      diagrams: DIAGRAMS,
      chapterTitle: "NOT PRESENT",
    });
    expect(document.response.subject).toBe("Geometry");
    expect(document.response.chapters[0].chapterName).toBe("Chapter");
  });

  it("emits step events in order", async () => {
    const events: ProgressEvent[] = [];
    await extractStructuredContent(pdfPath, outputRoot(), {
      config: {},
      diagrams: DIAGRAMS,
      progress: createCallbackProgress((e) => events.push(e)),
    });

    expect(events.filter((e) => e.type !== "step-progress")).toEqual([
      { type: "step-start", step: "diagrams", book: "circles" },
      { type: "step-complete", step: "diagrams", book: "circles" },
      { type: "step-start", step: "structure", book: "circles" },
      { type: "step-complete", step: "structure", book: "circles" },
    ]);
    expect(
      events.flatMap((e) => (e.type === "step-progress" ? [[e.page, e.totalPages]] : []))
    ).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  it("fails with PdfOpenError before creating any output", async () => {
    const badPath = path.join(workDir, "broken.pdf");
    fs.writeFileSync(badPath, "not a pdf");

    await expect(extractStructuredContent(badPath, outputRoot(), { config: {} })).rejects.toThrow(
      PdfOpenError
    );
    expect(fs.existsSync(resolveImagesDir(outputRoot(), "broken"))).toBe(false);
  });
});

describe("extractWithProgress", () => {
  it("streams progress and ends with the result", async () => {
    const updates = await lastValueFrom(
      extractWithProgress(pdfPath, outputRoot(), { config: {}, diagrams: DIAGRAMS }).pipe(toArray())
    );
    const last = updates[updates.length - 1];
    expect(last.type).toBe("result");
    expect(last.type === "result" && last.result.document.response.book).toBe("circles");
    expect(updates.slice(0, -1).every((u) => u.type === "progress")).toBe(true);
  });

  it("errors the stream when the PDF cannot be opened", async () => {
    await expect(
      lastValueFrom(extractWithProgress(path.join(workDir, "missing.pdf"), outputRoot()))
    ).rejects.toThrow(PdfOpenError);
  });
});
