import { describe, it, expect } from "vitest";
import {
  binarize,
  boundingRect,
  contourArea,
  findExternalContours,
  gaussianKernel,
} from "../contours";

/** Build a mask from rows of "#" (foreground) and "." (background). */
function mask(rows: string[]): { data: Uint8Array; width: number; height: number } {
  const height = rows.length;
  const width = rows[0].length;
  const data = new Uint8Array(width * height);
  rows.forEach((row, y) => {
    for (let x = 0; x < width; x++) {
      if (row[x] === "#") data[y * width + x] = 1;
    }
  });
  return { data, width, height };
}

function contoursOf(rows: string[]) {
  const m = mask(rows);
  return findExternalContours(m.data, m.width, m.height);
}

describe("findExternalContours", () => {
  it("traces a filled rectangle", () => {
    const contours = contoursOf([
      ".......",
      "..###..",
      "..###..",
      ".......",
    ]);
    expect(contours).toHaveLength(1);
    expect(contours[0]).toEqual([
      { x: 2, y: 1 },
      { x: 2, y: 2 },
      { x: 3, y: 2 },
      { x: 4, y: 2 },
      { x: 4, y: 1 },
      { x: 3, y: 1 },
    ]);
    expect(contourArea(contours[0])).toBe(2);
    expect(boundingRect(contours[0])).toEqual({ x: 2, y: 1, width: 3, height: 2 });
  });

  it("skips shapes nested inside another shape's hole", () => {
    const contours = contoursOf([
      ".......",
      ".#####.",
      ".#...#.",
      ".#.#.#.",
      ".#...#.",
      ".#####.",
      ".......",
    ]);
    expect(contours).toHaveLength(1);
    expect(contourArea(contours[0])).toBe(16);
    expect(boundingRect(contours[0])).toEqual({ x: 1, y: 1, width: 5, height: 5 });
  });

  it("reports contours in raster order of their top-left pixel", () => {
    const contours = contoursOf([
      "..........",
      "......###.",
      "......###.",
      "..........",
      "..........",
      ".###......",
      ".###......",
      ".###......",
    ]);
    expect(contours.map(boundingRect)).toEqual([
      { x: 6, y: 1, width: 3, height: 2 },
      { x: 1, y: 5, width: 3, height: 3 },
    ]);
  });

  it("returns a one-point contour for an isolated pixel", () => {
    const contours = contoursOf(["...", ".#.", "..."]);
    expect(contours).toEqual([[{ x: 1, y: 1 }]]);
    expect(contourArea(contours[0])).toBe(0);
    expect(boundingRect(contours[0])).toEqual({ x: 1, y: 1, width: 1, height: 1 });
  });

  it("joins diagonal neighbours into one region", () => {
    const contours = contoursOf(["....", ".#..", "..#.", "...."]);
    expect(contours).toEqual([
      [
        { x: 1, y: 1 },
        { x: 2, y: 2 },
      ],
    ]);
  });

  it("keeps pixels separated by a gap apart", () => {
    expect(contoursOf(["#.#"])).toHaveLength(2);
  });

  it("handles shapes touching the image border", () => {
    const contours = contoursOf(["###", "###", "###"]);
    expect(contours).toHaveLength(1);
    expect(contourArea(contours[0])).toBe(4);
    expect(boundingRect(contours[0])).toEqual({ x: 0, y: 0, width: 3, height: 3 });
  });

  it("returns nothing for an empty mask", () => {
    expect(contoursOf(["....", "...."])).toEqual([]);
  });

  it("rejects a mask of the wrong size", () => {
    expect(() => findExternalContours(new Uint8Array(5), 2, 2)).toThrow(
      "Mask size 5 does not match 2x2"
    );
  });
});

describe("binarize", () => {
  it("marks pixels at or below the cutoff as foreground", () => {
    const rgb = new Uint8Array([10, 0, 0, 200, 0, 0, 201, 0, 0, 255, 0, 0]);
    expect(Array.from(binarize(rgb, 4, 1, 3, 200))).toEqual([1, 1, 0, 0]);
  });

  it("reads single-channel data", () => {
    const grey = new Uint8Array([0, 255, 128, 129]);
    expect(Array.from(binarize(grey, 2, 2, 1, 128))).toEqual([1, 0, 1, 0]);
  });
});

describe("gaussianKernel", () => {
  it("builds a normalised symmetric 5x5 kernel", () => {
    const { width, height, kernel } = gaussianKernel(5);
    expect(width).toBe(5);
    expect(height).toBe(5);
    expect(kernel).toHaveLength(25);
    expect(kernel.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 10);
    expect(kernel[0]).toBeCloseTo(kernel[24], 12);
    expect(kernel[12]).toBe(Math.max(...kernel));
  });

  it("gives an identity kernel for size 1", () => {
    expect(gaussianKernel(1).kernel).toEqual([1]);
  });

  it("rejects even sizes", () => {
    expect(() => gaussianKernel(4)).toThrow("Kernel size must be a positive odd integer, got 4");
  });
});

describe("contour measurements", () => {
  it("returns zeros for an empty contour", () => {
    expect(contourArea([])).toBe(0);
    expect(boundingRect([])).toEqual({ x: 0, y: 0, width: 0, height: 0 });
  });
});
