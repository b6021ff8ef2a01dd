/**
 * Raster image provider backed by sharp.
 */

import sharp from 'sharp';
import type { ImageInfo, ImageProvider, RasterFormat } from './types.js';

const JPEG_QUALITY = 90;

/**
 * Read format and dimensions without decoding pixels.
 */
async function inspect(data: Uint8Array): Promise<ImageInfo> {
  const metadata = await sharp(data).metadata();
  if (!metadata.format || !metadata.width || !metadata.height) {
    throw new Error('Image has no readable format or dimensions');
  }
  return { format: metadata.format, width: metadata.width, height: metadata.height };
}

/**
 * Alpha is flattened onto white; JPEG has no transparency.
 */
async function toJpeg(data: Uint8Array): Promise<Buffer> {
  return sharp(data).flatten({ background: '#ffffff' }).jpeg({ quality: JPEG_QUALITY }).toBuffer();
}

async function toPng(data: Uint8Array): Promise<Buffer> {
  return sharp(data).png().toBuffer();
}

async function grayscale(data: Uint8Array, format: RasterFormat): Promise<Buffer> {
  return sharp(data).grayscale().toFormat(format).toBuffer();
}

async function resize(data: Uint8Array, width: number, height: number, format: RasterFormat): Promise<Buffer> {
  // 'fill' ignores aspect ratio so the output is exactly width × height.
  return sharp(data).resize(width, height, { fit: 'fill' }).toFormat(format).toBuffer();
}

export const sharpImageProvider: ImageProvider = {
  inspect,
  toJpeg,
  toPng,
  grayscale,
  resize,
};
