/**
 * Contour analysis on binary rasters.
 *
 * Finds the outermost borders of 8-connected foreground regions, the way a
 * diagram detector needs them: shapes nested inside the hole of another shape
 * are not reported on their own.
 */

// ============================================================================
// Types
// ============================================================================

export interface Point {
  x: number;
  y: number;
}

export type Contour = Point[];

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ConvolutionKernel {
  width: number;
  height: number;
  kernel: number[];
}

// ============================================================================
// Raster preparation
// ============================================================================

/**
 * Square Gaussian kernel for an odd window size. Sigma follows the usual
 * derivation from the window size (1.1 for a 5x5 window).
 */
export function gaussianKernel(size: number): ConvolutionKernel {
  if (!Number.isInteger(size) || size < 1 || size % 2 === 0) {
    throw new Error(`Kernel size must be a positive odd integer, got ${size}`);
  }
  const sigma = 0.3 * ((size - 1) * 0.5 - 1) + 0.8;
  const half = (size - 1) / 2;
  const row: number[] = [];
  for (let i = -half; i <= half; i++) {
    row.push(Math.exp(-(i * i) / (2 * sigma * sigma)));
  }
  const sum = row.reduce((a, b) => a + b, 0);
  const norm = row.map((v) => v / sum);

  const kernel: number[] = [];
  for (const a of norm) {
    for (const b of norm) {
      kernel.push(a * b);
    }
  }
  return { width: size, height: size, kernel };
}

/**
 * Inverse binary threshold: dark pixels (value <= cutoff) become foreground (1),
 * everything else background (0). Only the first channel of each pixel is read.
 */
export function binarize(
  data: Uint8Array,
  width: number,
  height: number,
  channels: number,
  cutoff: number
): Uint8Array {
  const mask = new Uint8Array(width * height);
  for (let i = 0; i < width * height; i++) {
    mask[i] = data[i * channels] <= cutoff ? 1 : 0;
  }
  return mask;
}

// ============================================================================
// Contour extraction
// ============================================================================

// Clockwise neighbour order in image coordinates (y grows downward).
const DX = [1, 1, 0, -1, -1, -1, 0, 1];
const DY = [0, 1, 1, 1, 0, -1, -1, -1];
const WEST = 4;

/**
 * Find the outer borders of all foreground regions that touch the background
 * surrounding the image. Regions inside the hole of another region are skipped.
 *
 * Contours come back in raster-scan order of their top-left pixel. Each contour
 * lists border pixels in traversal order; a single isolated pixel yields a
 * one-point contour.
 */
export function findExternalContours(
  mask: Uint8Array,
  width: number,
  height: number
): Contour[] {
  if (mask.length !== width * height) {
    throw new Error(`Mask size ${mask.length} does not match ${width}x${height}`);
  }

  // Pad with a one-pixel background frame so border following never leaves
  // the buffer and the outside region is connected.
  const pw = width + 2;
  const ph = height + 2;
  const img = new Uint8Array(pw * ph);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (mask[y * width + x]) img[(y + 1) * pw + x + 1] = 1;
    }
  }

  const outside = markOutside(img, pw, ph);
  const labelled = new Uint8Array(pw * ph);
  const contours: Contour[] = [];

  for (let y = 1; y < ph - 1; y++) {
    for (let x = 1; x < pw - 1; x++) {
      const idx = y * pw + x;
      if (!img[idx] || labelled[idx]) continue;

      labelComponent(img, labelled, pw, idx);

      // The first pixel met in raster order is the component's top-left; its
      // west neighbour lies in the outside region only for outermost shapes.
      if (!outside[idx - 1]) continue;

      const border = traceOuterBorder(img, pw, x, y);
      contours.push(border.map((p) => ({ x: p.x - 1, y: p.y - 1 })));
    }
  }

  return contours;
}

/** Flood-fill (4-connected) the background reachable from the padded frame. */
function markOutside(img: Uint8Array, pw: number, ph: number): Uint8Array {
  const outside = new Uint8Array(pw * ph);
  const stack = new Int32Array(pw * ph);
  let top = 0;
  stack[top++] = 0;
  outside[0] = 1;

  while (top > 0) {
    const idx = stack[--top];
    const x = idx % pw;
    const y = (idx - x) / pw;
    const neighbours = [
      x > 0 ? idx - 1 : -1,
      x < pw - 1 ? idx + 1 : -1,
      y > 0 ? idx - pw : -1,
      y < ph - 1 ? idx + pw : -1,
    ];
    for (const n of neighbours) {
      if (n >= 0 && !img[n] && !outside[n]) {
        outside[n] = 1;
        stack[top++] = n;
      }
    }
  }
  return outside;
}

/** Mark every pixel 8-connected to `start` as labelled. */
function labelComponent(
  img: Uint8Array,
  labelled: Uint8Array,
  pw: number,
  start: number
): void {
  const stack: number[] = [start];
  labelled[start] = 1;
  for (let idx = stack.pop(); idx !== undefined; idx = stack.pop()) {
    for (let d = 0; d < 8; d++) {
      const n = idx + DY[d] * pw + DX[d];
      if (img[n] && !labelled[n]) {
        labelled[n] = 1;
        stack.push(n);
      }
    }
  }
}

/**
 * Suzuki-Abe outer border following, starting at the top-left pixel of a
 * component whose west neighbour is background.
 */
function traceOuterBorder(img: Uint8Array, pw: number, x0: number, y0: number): Point[] {
  const at = (x: number, y: number) => img[y * pw + x] === 1;

  // Clockwise from the west neighbour for the last pixel of the traversal.
  let first = -1;
  for (let k = 0; k < 8; k++) {
    const d = (WEST + k) % 8;
    if (at(x0 + DX[d], y0 + DY[d])) {
      first = d;
      break;
    }
  }
  if (first < 0) return [{ x: x0, y: y0 }];

  const x1 = x0 + DX[first];
  const y1 = y0 + DY[first];
  const points: Point[] = [{ x: x0, y: y0 }];

  let x2 = x1;
  let y2 = y1;
  let x3 = x0;
  let y3 = y0;

  for (;;) {
    // Counter-clockwise around (x3, y3), starting just after (x2, y2).
    const from = directionOf(x2 - x3, y2 - y3);
    let x4 = x3;
    let y4 = y3;
    for (let k = 1; k <= 8; k++) {
      const d = (from - k + 8) % 8;
      if (at(x3 + DX[d], y3 + DY[d])) {
        x4 = x3 + DX[d];
        y4 = y3 + DY[d];
        break;
      }
    }

    if (x4 === x0 && y4 === y0 && x3 === x1 && y3 === y1) break;

    points.push({ x: x4, y: y4 });
    x2 = x3;
    y2 = y3;
    x3 = x4;
    y3 = y4;
  }

  return points;
}

function directionOf(dx: number, dy: number): number {
  for (let d = 0; d < 8; d++) {
    if (DX[d] === dx && DY[d] === dy) return d;
  }
  throw new Error(`(${dx}, ${dy}) is not a neighbour offset`);
}

// ============================================================================
// Measurements
// ============================================================================

/** Polygon area enclosed by the contour's pixel centres (shoelace formula). */
export function contourArea(contour: Contour): number {
  let sum = 0;
  for (let i = 0; i < contour.length; i++) {
    const a = contour[i];
    const b = contour[(i + 1) % contour.length];
    sum += a.x * b.y - b.x * a.y;
  }
  return Math.abs(sum) / 2;
}

/** Smallest upright rectangle covering every contour pixel. */
export function boundingRect(contour: Contour): Rect {
  if (contour.length === 0) {
    return { x: 0, y: 0, width: 0, height: 0 };
  }
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const { x, y } of contour) {
    if (x < minX) minX = x;
    if (y < minY) minY = y;
    if (x > maxX) maxX = x;
    if (y > maxY) maxY = y;
  }
  return { x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 };
}
