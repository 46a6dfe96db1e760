import { describe, expect, it } from 'vitest';
import {
  binarize,
  extractRegions,
  labelComponents,
  segmentCells,
  smoothBoundary,
  toGrayscale,
  totalArea,
} from './segmentation';
import type { GrayImage, PixelImage, Point } from './types';

function grayImage(width: number, height: number, fill = 0): GrayImage {
  return { data: new Uint8Array(width * height).fill(fill), width, height, channels: 1 };
}

function paint(image: GrayImage, row: number, col: number, side: number, value: number) {
  for (let r = row; r < row + side; r++) {
    for (let c = col; c < col + side; c++) {
      image.data[r * image.width + c] = value;
    }
  }
}

/** 10×10 black image with a 3×3 square of intensity 200 at rows/cols 3-5. */
function squareImage(): GrayImage {
  const image = grayImage(10, 10);
  paint(image, 3, 3, 3, 200);
  return image;
}

/** Deterministic pseudo-random texture. */
function noiseImage(width: number, height: number, seed: number): GrayImage {
  const image = grayImage(width, height);
  let state = seed;
  for (let i = 0; i < image.data.length; i++) {
    state = (state * 16807) % 2147483647;
    image.data[i] = state % 256;
  }
  return image;
}

function perimeter(points: Point[]): number {
  let length = 0;
  for (let i = 0; i < points.length; i++) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    length += Math.hypot(a.row - b.row, a.col - b.col);
  }
  return length;
}

describe('toGrayscale', () => {
  it('weights RGB by luminance', () => {
    const rgb: PixelImage = {
      data: new Uint8Array([255, 0, 0, 0, 255, 0, 0, 0, 255, 10, 20, 30]),
      width: 4,
      height: 1,
      channels: 3,
    };
    // 0.2989*255, 0.587*255, 0.114*255, 0.2989*10 + 0.587*20 + 0.114*30
    expect([...toGrayscale(rgb).data]).toEqual([76, 150, 29, 18]);
  });

  it('ignores alpha', () => {
    const rgba: PixelImage = { data: new Uint8Array([100, 100, 100, 0]), width: 1, height: 1, channels: 4 };
    expect([...toGrayscale(rgba).data]).toEqual([100]);
  });

  it('takes the first channel of gray + alpha', () => {
    const ga: PixelImage = { data: new Uint8Array([42, 255]), width: 1, height: 1, channels: 2 };
    expect([...toGrayscale(ga).data]).toEqual([42]);
  });
});

describe('binarize', () => {
  it('marks pixels strictly above the threshold', () => {
    const image: GrayImage = { data: new Uint8Array([89, 90, 91, 255]), width: 4, height: 1, channels: 1 };
    expect([...binarize(image, 90).data]).toEqual([0, 0, 255, 255]);
  });
});

describe('labelComponents', () => {
  it('joins diagonal neighbours and labels in scan order', () => {
    const mask = grayImage(5, 3);
    // Diagonal pair top-left, separate pixel far right
    mask.data[0] = 255;
    mask.data[6] = 255;
    mask.data[4] = 255;
    const map = labelComponents(mask);
    expect(map.count).toBe(2);
    expect(map.labels[0]).toBe(1);
    expect(map.labels[6]).toBe(1);
    expect(map.labels[4]).toBe(2);
  });
});

describe('segmentCells', () => {
  it('finds the single square', () => {
    const { regions } = segmentCells(squareImage(), { threshold: 90, minPixelCount: 1 });

    expect(regions).toHaveLength(1);
    const [region] = regions;
    expect(region.area).toBe(9);
    expect(region.centroid).toEqual({ x: 4, y: 4 });
    expect(region.boundingBox).toEqual({ top: 3, left: 3, width: 3, height: 3 });
    expect(region.boundary).toHaveLength(12);
    expect(perimeter(region.boundary)).toBe(12);
    expect(region.boundary.slice(0, 4)).toEqual([
      { row: 2.5, col: 2.5 },
      { row: 2.5, col: 3.5 },
      { row: 2.5, col: 4.5 },
      { row: 2.5, col: 5.5 },
    ]);
    expect(region.boundary[6]).toEqual({ row: 5.5, col: 5.5 });
  });

  it('drops the square when it is not larger than the minimum', () => {
    expect(segmentCells(squareImage(), { threshold: 90, minPixelCount: 10 }).regions).toEqual([]);
    expect(segmentCells(squareImage(), { threshold: 90, minPixelCount: 9 }).regions).toEqual([]);
    expect(segmentCells(squareImage(), { threshold: 90, minPixelCount: 8 }).regions).toHaveLength(1);
  });

  it('returns nothing when the threshold reaches the brightest pixel', () => {
    const result = segmentCells(squareImage(), { threshold: 200, minPixelCount: 0 });
    expect(result.regions).toEqual([]);
    expect(result.mask.data.every((v) => v === 0)).toBe(true);
  });

  it('converts color input before thresholding', () => {
    const rgb: PixelImage = { data: new Uint8Array(10 * 10 * 3), width: 10, height: 10, channels: 3 };
    for (let r = 3; r < 6; r++) {
      for (let c = 3; c < 6; c++) rgb.data.fill(200, (r * 10 + c) * 3, (r * 10 + c) * 3 + 3);
    }
    const { gray, regions } = segmentCells(rgb, { threshold: 90, minPixelCount: 1 });
    expect(gray.data[3 * 10 + 3]).toBe(200);
    expect(regions.map((r) => r.area)).toEqual([9]);
  });

  it('traces only the outer contour of a ring', () => {
    const image = grayImage(7, 7);
    paint(image, 1, 1, 5, 255);
    paint(image, 2, 2, 3, 0);
    const [ring] = segmentCells(image, { threshold: 90, minPixelCount: 0 }).regions;
    expect(ring.area).toBe(16);
    expect(ring.boundary).toHaveLength(20);
    expect(ring.centroid).toEqual({ x: 3, y: 3 });
  });

  it('orders regions by scan order', () => {
    const image = grayImage(12, 12);
    paint(image, 8, 1, 3, 255);
    paint(image, 1, 7, 2, 255);
    const regions = segmentCells(image, { threshold: 90, minPixelCount: 0 }).regions;
    expect(regions.map((r) => r.area)).toEqual([4, 9]);
    expect(regions.map((r) => r.label)).toEqual([1, 2]);
  });

  it('refuses a threshold that is not a number', () => {
    expect(() => segmentCells(squareImage(), { threshold: Number('abc'), minPixelCount: 1 })).toThrow(RangeError);
  });

  it('is idempotent', () => {
    const image = noiseImage(40, 30, 7);
    const options = { threshold: 150, minPixelCount: 3, smoothingWindow: 5 };
    expect(segmentCells(image, options).regions).toEqual(segmentCells(image, options).regions);
  });

  it('never grows the foreground as the threshold rises', () => {
    const image = noiseImage(40, 40, 11);
    let previous = Infinity;
    for (const threshold of [0, 60, 120, 180, 240, 255]) {
      const area = totalArea(segmentCells(image, { threshold, minPixelCount: 4 }).regions);
      expect(area).toBeLessThanOrEqual(previous);
      previous = area;
    }
  });

  it('keeps only regions above the debris filter', () => {
    const image = noiseImage(40, 40, 23);
    for (const minPixelCount of [0, 2, 5, 20]) {
      for (const region of segmentCells(image, { threshold: 128, minPixelCount }).regions) {
        expect(region.area).toBeGreaterThan(minPixelCount);
      }
    }
  });
});

describe('smoothing', () => {
  it('changes only the displayed outline', () => {
    const plain = segmentCells(squareImage(), { threshold: 90, minPixelCount: 1 }).regions[0];
    const smooth = segmentCells(squareImage(), { threshold: 90, minPixelCount: 1, smoothingWindow: 3 }).regions[0];

    expect(smooth.area).toBe(plain.area);
    expect(smooth.centroid).toEqual(plain.centroid);
    expect(smooth.boundary).toEqual(plain.boundary);
    expect(plain.displayBoundary).toEqual(plain.boundary);
    expect(smooth.displayBoundary).not.toEqual(smooth.boundary);
    // First vertex averages its two neighbours on the closed contour.
    expect(smooth.displayBoundary[0].row).toBeCloseTo((3.5 + 2.5 + 2.5) / 3);
    expect(smooth.displayBoundary[0].col).toBeCloseTo((2.5 + 2.5 + 3.5) / 3);
  });

  it('rounds even windows down and caps the window at the contour length', () => {
    const points: Point[] = [
      { row: 0, col: 0 },
      { row: 0, col: 3 },
      { row: 3, col: 3 },
      { row: 3, col: 0 },
    ];
    expect(smoothBoundary(points, 2)).toEqual(points);
    // Window 31 on 4 points becomes 3.
    expect(smoothBoundary(points, 31)).toEqual(smoothBoundary(points, 3));
    expect(smoothBoundary(points, 3)[0]).toEqual({ row: 1, col: 1 });
  });

  it('treats a NaN window as no smoothing', () => {
    const points: Point[] = [
      { row: 0, col: 0 },
      { row: 0, col: 3 },
      { row: 3, col: 3 },
    ];
    expect(smoothBoundary(points, Number('abc'))).toEqual(points);
  });

  it('leaves the region set of extractRegions unchanged', () => {
    const mask = binarize(squareImage(), 90);
    const a = extractRegions(mask, { minPixelCount: 0, smoothingWindow: 1 });
    const b = extractRegions(mask, { minPixelCount: 0, smoothingWindow: 31 });
    expect(b.map((r) => [r.area, r.centroid])).toEqual(a.map((r) => [r.area, r.centroid]));
  });
});
