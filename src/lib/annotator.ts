import sharp from 'sharp';
import { OutputWriteError } from './errors';
import type { CellRegion, Point } from './types';
import { escapeXml } from './utils';

const BOUNDARY_COLOR = '#ffffff';
const CENTROID_COLOR = '#ff0000';

function toPolylinePoints(points: Point[]): string {
  // SVG x/y sit on pixel edges, so shift pixel-centre coordinates by half a pixel.
  return points.map((p) => `${(p.col + 0.5).toFixed(2)},${(p.row + 0.5).toFixed(2)}`).join(' ');
}

function buildMarker(x: number, y: number, size: number, thickness: number): string {
  const half = size / 2;
  const cx = x + 0.5;
  const cy = y + 0.5;
  return `
  <line x1="${(cx - half).toFixed(1)}" y1="${(cy - half).toFixed(1)}" x2="${(cx + half).toFixed(1)}" y2="${(cy + half).toFixed(1)}" stroke="${CENTROID_COLOR}" stroke-width="${thickness}" />
  <line x1="${(cx - half).toFixed(1)}" y1="${(cy + half).toFixed(1)}" x2="${(cx + half).toFixed(1)}" y2="${(cy - half).toFixed(1)}" stroke="${CENTROID_COLOR}" stroke-width="${thickness}" />`;
}

export function buildRegionsSvg(
  width: number,
  height: number,
  regions: CellRegion[],
  title?: string
): string {
  const lineWidth = Math.max(0.5, Math.min(width, height) / 1000);
  const markerSize = Math.max(6, Math.round(Math.min(width, height) / 60));
  const markerThickness = Math.max(1, Math.round(markerSize / 8));
  const fontSize = Math.max(12, Math.round(Math.min(width, height) / 50));

  const outlines = regions
    .filter((r) => r.displayBoundary.length > 1)
    .map(
      (r) =>
        `  <polygon points="${toPolylinePoints(r.displayBoundary)}" fill="none" stroke="${BOUNDARY_COLOR}" stroke-width="${lineWidth}" />`
    )
    .join('\n');

  const markers = regions
    .map((r) => buildMarker(r.centroid.x, r.centroid.y, markerSize, markerThickness))
    .join('\n');

  const header = title
    ? `
  <rect x="0" y="0" width="${width}" height="${fontSize + 12}" fill="rgba(0,0,0,0.6)" />
  <text x="${(width / 2).toFixed(1)}" y="6" font-size="${fontSize}" font-family="system-ui, -apple-system, Segoe UI, sans-serif" fill="#ffffff" text-anchor="middle" dominant-baseline="hanging">${escapeXml(title)}</text>`
    : '';

  return `
<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
${outlines}
${markers}
${header}
</svg>
`.trim();
}

/**
 * Draw region outlines and centroid markers over the original image. With no
 * regions the image is written with only its title.
 */
export async function annotateRegions(options: {
  imageBuffer: Buffer;
  regions: CellRegion[];
  outputPath: string;
  title?: string;
}) {
  const base = sharp(options.imageBuffer);
  const metadata = await base.metadata();

  if (!metadata.width || !metadata.height) {
    throw new Error('Unable to read image dimensions.');
  }

  const svg = buildRegionsSvg(metadata.width, metadata.height, options.regions, options.title);
  const pipeline = base.composite([{ input: Buffer.from(svg), top: 0, left: 0 }]).png();

  try {
    await pipeline.toFile(options.outputPath);
  } catch (error) {
    throw new OutputWriteError(options.outputPath, error);
  }
}
