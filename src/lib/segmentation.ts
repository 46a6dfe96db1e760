/**
 * Threshold segmentation for counting cells.
 *
 * Coordinates follow pixel centres: pixel (row r, col c) covers
 * [r - 0.5, r + 0.5] × [c - 0.5, c + 0.5], so centroids land on pixel
 * centres and boundary vertices on half-integer corners.
 */
import type {
  BoundingBox,
  CellRegion,
  GrayImage,
  PixelImage,
  Point,
  SegmentationOptions,
  SegmentationResult,
} from './types';
import { clamp } from './utils';

// ==========================================
// GRAYSCALE & THRESHOLD
// ==========================================

const LUMA_R = 0.2989;
const LUMA_G = 0.587;
const LUMA_B = 0.114;

export function toGrayscale(image: PixelImage): GrayImage {
  const { width, height, channels, data } = image;
  const out = new Uint8Array(width * height);

  for (let i = 0; i < width * height; i++) {
    const base = i * channels;
    if (channels < 3) {
      // Gray or gray + alpha
      out[i] = data[base];
    } else {
      const y = LUMA_R * data[base] + LUMA_G * data[base + 1] + LUMA_B * data[base + 2];
      out[i] = clamp(Math.round(y), 0, 255);
    }
  }
  return { data: out, width, height, channels: 1 };
}

/** Foreground (255) where intensity is strictly greater than `threshold`. */
export function binarize(gray: GrayImage, threshold: number): GrayImage {
  const out = new Uint8Array(gray.data.length);
  for (let i = 0; i < gray.data.length; i++) {
    out[i] = gray.data[i] > threshold ? 255 : 0;
  }
  return { data: out, width: gray.width, height: gray.height, channels: 1 };
}

// ==========================================
// CONNECTED COMPONENTS
// ==========================================

export type LabelMap = {
  labels: Int32Array;
  count: number;
  width: number;
  height: number;
};

/**
 * 8-connected labeling of the non-zero pixels of `mask`. Labels start at 1
 * and are assigned in row-major scan order.
 */
export function labelComponents(mask: GrayImage): LabelMap {
  const { width: w, height: h } = mask;
  const labels = new Int32Array(w * h);
  let nextLabel = 1;

  for (let i = 0; i < w * h; i++) {
    if (mask.data[i] === 0 || labels[i] !== 0) continue;

    const queue: number[] = [i];
    let front = 0;
    labels[i] = nextLabel;

    while (front < queue.length) {
      const pos = queue[front++];
      const cy = (pos / w) | 0;
      const cx = pos % w;

      for (let dy = -1; dy <= 1; dy++) {
        const ny = cy + dy;
        if (ny < 0 || ny >= h) continue;
        for (let dx = -1; dx <= 1; dx++) {
          const nx = cx + dx;
          if ((dx === 0 && dy === 0) || nx < 0 || nx >= w) continue;
          const npos = ny * w + nx;
          if (labels[npos] === 0 && mask.data[npos] !== 0) {
            labels[npos] = nextLabel;
            queue.push(npos);
          }
        }
      }
    }

    nextLabel++;
  }

  return { labels, count: nextLabel - 1, width: w, height: h };
}

type RegionStats = {
  area: number;
  sumRow: number;
  sumCol: number;
  minRow: number;
  maxRow: number;
  minCol: number;
  maxCol: number;
  /** First pixel in scan order; the boundary trace starts on its top edge. */
  start: number;
};

function collectStats(map: LabelMap): RegionStats[] {
  const stats: RegionStats[] = [];
  const { labels, width } = map;

  for (let i = 0; i < labels.length; i++) {
    const label = labels[i];
    if (label === 0) continue;
    const row = (i / width) | 0;
    const col = i % width;
    let s = stats[label - 1];
    if (!s) {
      s = { area: 0, sumRow: 0, sumCol: 0, minRow: row, maxRow: row, minCol: col, maxCol: col, start: i };
      stats[label - 1] = s;
    }
    s.area++;
    s.sumRow += row;
    s.sumCol += col;
    s.minRow = Math.min(s.minRow, row);
    s.maxRow = Math.max(s.maxRow, row);
    s.minCol = Math.min(s.minCol, col);
    s.maxCol = Math.max(s.maxCol, col);
  }
  return stats;
}

// ==========================================
// BOUNDARY TRACING
// ==========================================

// Clockwise on screen (rows grow downward): E, S, W, N
const DIR_ROW = [0, 1, 0, -1];
const DIR_COL = [1, 0, -1, 0];

/**
 * Trace the outer contour of one component along pixel edges, keeping the
 * component on the right-hand side. Diagonal neighbours stay on the same
 * contour, matching 8-connectivity. Holes are never entered.
 */
export function traceBoundary(map: LabelMap, label: number, start: number): Point[] {
  const { labels, width, height } = map;
  const inside = (r: number, c: number) =>
    r >= 0 && r < height && c >= 0 && c < width && labels[r * width + c] === label;

  // Vertices on the corner lattice: (R, C) is the top-left corner of pixel (R, C).
  const startR = (start / width) | 0;
  const startC = start % width;
  let r = startR;
  let c = startC;
  let dir = 0;
  const points: Point[] = [];

  do {
    points.push({ row: r - 0.5, col: c - 0.5 });
    r += DIR_ROW[dir];
    c += DIR_COL[dir];

    // Pixels ahead of vertex (r, c) on the left and right of the heading.
    const tl = inside(r - 1, c - 1);
    const tr = inside(r - 1, c);
    const bl = inside(r, c - 1);
    const br = inside(r, c);
    const [aheadLeft, aheadRight] =
      dir === 0 ? [tr, br] : dir === 1 ? [br, bl] : dir === 2 ? [bl, tl] : [tl, tr];

    if (aheadLeft) dir = (dir + 3) % 4;
    else if (!aheadRight) dir = (dir + 1) % 4;
  } while (!(r === startR && c === startC && dir === 0));

  return points;
}

// ==========================================
// SMOOTHING
// ==========================================

/**
 * Circular moving average over a closed contour. Even windows shrink to the
 * next odd size and the window never exceeds the contour length. A NaN
 * window means no smoothing.
 */
export function smoothBoundary(points: Point[], window: number): Point[] {
  let span = Math.floor(window);
  if (Number.isNaN(span)) span = 1;
  if (span % 2 === 0) span -= 1;
  const n = points.length;
  if (n > 0 && span > n) span = n % 2 === 1 ? n : n - 1;
  if (span <= 1 || n === 0) return points.map((p) => ({ ...p }));

  const half = (span - 1) / 2;
  return points.map((_, i) => {
    let sumRow = 0;
    let sumCol = 0;
    for (let k = -half; k <= half; k++) {
      const p = points[(((i + k) % n) + n) % n];
      sumRow += p.row;
      sumCol += p.col;
    }
    return { row: sumRow / span, col: sumCol / span };
  });
}

// ==========================================
// REGIONS
// ==========================================

/**
 * Regions of a binary mask with more than `minPixelCount` pixels, in label
 * scan order.
 */
export function extractRegions(mask: GrayImage, options: Omit<SegmentationOptions, 'threshold'>): CellRegion[] {
  const map = labelComponents(mask);
  const stats = collectStats(map);
  const regions: CellRegion[] = [];

  stats.forEach((s, index) => {
    if (s.area <= options.minPixelCount) return;
    const label = index + 1;
    const boundary = traceBoundary(map, label, s.start);
    const boundingBox: BoundingBox = {
      top: s.minRow,
      left: s.minCol,
      width: s.maxCol - s.minCol + 1,
      height: s.maxRow - s.minRow + 1,
    };

    regions.push({
      label,
      area: s.area,
      centroid: { x: s.sumCol / s.area, y: s.sumRow / s.area },
      boundingBox,
      boundary,
      displayBoundary: smoothBoundary(boundary, options.smoothingWindow ?? 1),
    });
  });

  return regions;
}

/** Grayscale → threshold → labeled regions, keeping the intermediate images. */
export function segmentCells(image: PixelImage, options: SegmentationOptions): SegmentationResult {
  if (!Number.isFinite(options.threshold)) {
    throw new RangeError(`Threshold must be a finite number, got ${options.threshold}`);
  }
  const gray = image.channels === 1 ? { ...image, channels: 1 as const } : toGrayscale(image);
  const mask = binarize(gray, options.threshold);
  const regions = extractRegions(mask, options);
  return { gray, mask, regions };
}

export function totalArea(regions: CellRegion[]): number {
  return regions.reduce((sum, r) => sum + r.area, 0);
}
