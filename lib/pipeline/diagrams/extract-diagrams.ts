/**
 * Diagram Extraction
 *
 * Finds vector diagrams on rendered pages by contour analysis and writes a JPEG
 * crop for each one. Boxes are reported in original page units.
 */

import os from "node:os";
import path from "node:path";
import sharp from "sharp";
import {
  binarize,
  boundingRect,
  contourArea,
  findExternalContours,
  gaussianKernel,
  type Rect,
} from "@/lib/images/contours";
import type { PdfDocument } from "@/lib/pdf/open";
import { renderPage, type RenderedPage } from "@/lib/pdf/rasterize";
import {
  createDiagram,
  diagramFileName,
  diagramImagePath,
  type Diagram,
} from "../structure/document-schema";

// ============================================================================
// Types
// ============================================================================

export interface DetectionSettings {
  /** Luminance at or below which a blurred pixel counts as ink */
  threshold: number;
  /** Gaussian window size; 1 disables blurring */
  blurKernel: number;
  /** Minimum contour area in pixels at the rendering resolution */
  minArea: number;
}

export interface DiagramOptions {
  bookName: string;
  /** Directory the JPEG crops are written to */
  imagesDir: string;
  zoom: number;
  /** Minimum contour area in px² at `referenceZoom` */
  minArea: number;
  referenceZoom: number;
  threshold: number;
  blurKernel: number;
  jpegQuality: number;
  /** Pages analysed at once; defaults to the available CPU parallelism */
  concurrency?: number;
}

export interface DetectedRegion {
  /** Bounding box in rendered pixels */
  rect: Rect;
  /** Contour area in rendered px² */
  area: number;
}

export interface DiagramProgress {
  page: number;
  totalPages: number;
}

// ============================================================================
// Detection
// ============================================================================

/**
 * Scale a pixel-area threshold given at `referenceZoom` to `zoom`. Contour
 * areas grow with the square of the magnification.
 */
export function scaledMinArea(minArea: number, zoom: number, referenceZoom: number): number {
  return minArea * (zoom / referenceZoom) ** 2;
}

/**
 * Find candidate diagram regions in a page raster: greyscale, blur,
 * inverse threshold, outermost contours, area filter.
 */
export async function detectRegions(
  png: Buffer,
  settings: DetectionSettings
): Promise<DetectedRegion[]> {
  let pipeline = sharp(png).greyscale();
  if (settings.blurKernel >= 3) {
    pipeline = pipeline.convolve(gaussianKernel(settings.blurKernel));
  }
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });

  const mask = binarize(data, info.width, info.height, info.channels, settings.threshold);
  const regions: DetectedRegion[] = [];
  for (const contour of findExternalContours(mask, info.width, info.height)) {
    const area = contourArea(contour);
    if (area > settings.minArea) {
      regions.push({ rect: boundingRect(contour), area });
    }
  }
  return regions;
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Detect the diagrams of one rendered page, write their crops and return their
 * records. Crops come from the rendered raster, so their resolution follows
 * the zoom.
 */
export async function extractPageDiagrams(
  page: RenderedPage,
  options: DiagramOptions
): Promise<Diagram[]> {
  const regions = await detectRegions(page.png, {
    threshold: options.threshold,
    blurKernel: options.blurKernel,
    minArea: scaledMinArea(options.minArea, page.zoom, options.referenceZoom),
  });

  const diagrams: Diagram[] = [];
  for (const { rect } of regions) {
    const box = toPageUnits(rect, page);
    if (!box) continue;

    const index = diagrams.length + 1;
    const fileName = diagramFileName(page.pageNumber, index);
    await sharp(page.png)
      .extract({ left: rect.x, top: rect.y, width: rect.width, height: rect.height })
      .jpeg({ quality: options.jpegQuality })
      .toFile(path.join(options.imagesDir, fileName));

    diagrams.push(
      createDiagram(
        {
          page: page.pageNumber,
          ...box,
          imagePath: diagramImagePath(options.bookName, page.pageNumber, index),
        },
        page
      )
    );
  }
  return diagrams;
}

/** Divide a pixel box by the zoom and clamp it to the page rectangle. */
function toPageUnits(
  rect: Rect,
  page: Pick<RenderedPage, "zoom" | "width" | "height">
): Rect | null {
  const x = Math.min(rect.x / page.zoom, page.width);
  const y = Math.min(rect.y / page.zoom, page.height);
  const width = Math.min(rect.width / page.zoom, page.width - x);
  const height = Math.min(rect.height / page.zoom, page.height - y);
  if (width <= 0 || height <= 0) return null;
  return { x, y, width, height };
}

/**
 * Extract diagrams from every page of a document. Pages are processed with
 * bounded concurrency; results are ordered by page, then by detection order.
 */
export async function extractDiagrams(
  doc: PdfDocument,
  options: DiagramOptions,
  onProgress?: (progress: DiagramProgress) => void
): Promise<Diagram[]> {
  const totalPages = doc.countPages();
  const concurrency = options.concurrency ?? os.availableParallelism();
  const results: Diagram[][] = new Array(totalPages);
  let completed = 0;

  const queue = Array.from({ length: totalPages }, (_, i) => i);
  const workers = Array.from(
    { length: Math.min(concurrency, totalPages) },
    async () => {
      for (let i = queue.shift(); i !== undefined; i = queue.shift()) {
        const page = renderPage(doc, i, options.zoom);
        results[i] = await extractPageDiagrams(page, options);
        completed++;
        onProgress?.({ page: completed, totalPages });
      }
    }
  );
  await Promise.all(workers);

  return results.flat();
}
