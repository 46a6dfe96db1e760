/**
 * Image retrieval and decoding, plus the thumbnail montage.
 */
import sharp from 'sharp';
import type { GatewayClient } from './client';
import { endpoints } from './navigator';
import type { Image, PixelImage } from './types';
import { runWithConcurrency } from './utils';

export type Thumbnail = {
  image: Image;
  bytes: Buffer;
};

export type MontageOptions = {
  /** Each thumbnail is fitted into a square of this size (default: 128) */
  tileSize?: number;
  /** Gap around and between tiles in px (default: 10) */
  border?: number;
  background?: string;
};

export type MontageLayout = {
  rows: number;
  cols: number;
  width: number;
  height: number;
  positions: Array<{ left: number; top: number }>;
};

const WHITE = '#ffffff';

// ==========================================
// FETCHING
// ==========================================

export async function fetchImageBytes(client: GatewayClient, path: string): Promise<Buffer> {
  return client.getBytes(path);
}

export async function fetchThumbnail(client: GatewayClient, image: Image): Promise<Thumbnail> {
  return { image, bytes: await fetchImageBytes(client, image.thumbUrl) };
}

/**
 * Fetch the thumbnails of `images` with at most `concurrency` requests in
 * flight. The result is in the same order as `images`.
 */
export async function fetchThumbnails(
  client: GatewayClient,
  images: Image[],
  concurrency = 1,
  onFetched?: (thumbnail: Thumbnail, index: number) => void
): Promise<Thumbnail[]> {
  return runWithConcurrency(images, concurrency, async (image, index) => {
    const thumbnail = await fetchThumbnail(client, image);
    onFetched?.(thumbnail, index);
    return thumbnail;
  });
}

export async function fetchFullImage(client: GatewayClient, imageId: number): Promise<Buffer> {
  return fetchImageBytes(client, endpoints.renderImage(imageId));
}

// ==========================================
// DECODING
// ==========================================

/**
 * Decode to 8 bits per channel. 16-bit inputs are rescaled by converting to
 * the 8-bit colour space matching their channel count.
 */
export async function decodeImage(bytes: Buffer): Promise<PixelImage> {
  let pipeline = sharp(bytes);
  const metadata = await pipeline.metadata();
  if (metadata.depth && metadata.depth !== 'uchar') {
    pipeline = pipeline.toColourspace((metadata.channels ?? 3) < 3 ? 'b-w' : 'srgb');
  }

  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  if (data.length !== info.width * info.height * info.channels) {
    throw new Error(`Unsupported pixel depth "${metadata.depth}": expected 8 bits per channel.`);
  }
  return {
    data,
    width: info.width,
    height: info.height,
    channels: info.channels,
  };
}

/**
 * A sharp pipeline reading raw pixels, e.g. to encode a grayscale or mask
 * image. Single-channel input stays single-channel on output.
 */
export function pixelsToSharp(image: PixelImage): sharp.Sharp {
  const pipeline = sharp(Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength), {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
  return image.channels === 1 ? pipeline.toColourspace('b-w') : pipeline;
}

// ==========================================
// MONTAGE
// ==========================================

export function montageLayout(count: number, options: MontageOptions = {}): MontageLayout {
  const tileSize = options.tileSize ?? 128;
  const border = options.border ?? 10;
  const cols = Math.max(1, Math.ceil(Math.sqrt(count)));
  const rows = Math.max(1, Math.ceil(count / cols));

  const positions = Array.from({ length: count }, (_, i) => ({
    left: border + (i % cols) * (tileSize + border),
    top: border + Math.floor(i / cols) * (tileSize + border),
  }));

  return {
    rows,
    cols,
    width: cols * tileSize + (cols + 1) * border,
    height: rows * tileSize + (rows + 1) * border,
    positions,
  };
}

/**
 * Lay out thumbnails row by row on a white canvas. Order follows `thumbnails`.
 */
export async function buildMontage(
  thumbnails: Thumbnail[],
  options: MontageOptions = {}
): Promise<sharp.Sharp> {
  if (thumbnails.length === 0) {
    throw new Error('Cannot build a montage without thumbnails.');
  }
  const tileSize = options.tileSize ?? 128;
  const background = options.background ?? WHITE;
  const layout = montageLayout(thumbnails.length, options);

  const tiles = await Promise.all(
    thumbnails.map((thumb) =>
      sharp(thumb.bytes)
        .resize(tileSize, tileSize, { fit: 'contain', background })
        .flatten({ background })
        .png()
        .toBuffer()
    )
  );

  return sharp({
    create: { width: layout.width, height: layout.height, channels: 3, background },
  }).composite(tiles.map((input, i) => ({ input, ...layout.positions[i] })));
}
