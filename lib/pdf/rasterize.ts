import mupdf from "mupdf";
import type { PdfDocument } from "./open";

export const DEFAULT_ZOOM = 3;

export interface RenderedPage {
  /** 1-based page number */
  pageNumber: number;
  /** Page size in original (unscaled) units */
  width: number;
  height: number;
  zoom: number;
  pixelWidth: number;
  pixelHeight: number;
  /** RGB raster of the page at `zoom` */
  png: Buffer;
}

/**
 * Render one page (0-based index) to an RGB PNG at the given magnification.
 */
export function renderPage(
  doc: PdfDocument,
  pageIndex: number,
  zoom = DEFAULT_ZOOM
): RenderedPage {
  if (!(zoom > 0)) {
    throw new Error(`zoom must be positive, got ${zoom}`);
  }
  const page = doc.loadPage(pageIndex);
  const [x0, y0, x1, y1] = page.getBounds();

  const matrix = mupdf.Matrix.scale(zoom, zoom);
  const pixmap = page.toPixmap(matrix, mupdf.ColorSpace.DeviceRGB, false);
  const png = Buffer.from(pixmap.asPNG());

  return {
    pageNumber: pageIndex + 1,
    width: x1 - x0,
    height: y1 - y0,
    zoom,
    pixelWidth: png.readUInt32BE(16),
    pixelHeight: png.readUInt32BE(20),
    png,
  };
}
