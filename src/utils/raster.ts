/**
 * Raster Utilities
 *
 * PNG decoding to grayscale plus the small set of raster operations the
 * probe and scorer need (crop, box downsampling).
 */

import { PNG } from 'pngjs';
import type { Raster, Region } from '../types/navigation';

/**
 * Luma weights matching the usual BGR/RGB to gray conversion
 */
const LUMA_R = 0.299;
const LUMA_G = 0.587;
const LUMA_B = 0.114;

export function createRaster(width: number, height: number, fill = 0): Raster {
  return { width, height, data: new Uint8Array(width * height).fill(fill) };
}

/**
 * Build a raster from row arrays. Handy for fixtures.
 */
export function rasterFromRows(rows: number[][]): Raster {
  const height = rows.length;
  const width = height > 0 ? rows[0].length : 0;
  const data = new Uint8Array(width * height);
  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new Error(`Row ${y} has ${row.length} pixels, expected ${width}`);
    }
    data.set(row, y * width);
  });
  return { width, height, data };
}

/**
 * Decode a PNG buffer into a grayscale raster. Alpha is ignored.
 */
export function decodePngToGray(buffer: Buffer): Raster {
  const png = PNG.sync.read(buffer);
  const gray = new Uint8Array(png.width * png.height);

  for (let i = 0, p = 0; i < gray.length; i++, p += 4) {
    const r = png.data[p];
    const g = png.data[p + 1];
    const b = png.data[p + 2];
    gray[i] = Math.round(LUMA_R * r + LUMA_G * g + LUMA_B * b);
  }

  return { width: png.width, height: png.height, data: gray };
}

/**
 * Encode a grayscale raster as an RGBA PNG.
 */
export function encodeGrayToPng(raster: Raster): Buffer {
  const png = new PNG({ width: raster.width, height: raster.height });
  for (let i = 0, p = 0; i < raster.data.length; i++, p += 4) {
    const v = raster.data[i];
    png.data[p] = v;
    png.data[p + 1] = v;
    png.data[p + 2] = v;
    png.data[p + 3] = 255;
  }
  return PNG.sync.write(png);
}

/**
 * Crop a raster to a region, clamped to the raster bounds. Returns the crop
 * and the offset actually applied.
 */
export function cropRaster(raster: Raster, region: Region): { raster: Raster; offsetX: number; offsetY: number } {
  const x0 = Math.max(0, Math.min(raster.width, Math.floor(region.x)));
  const y0 = Math.max(0, Math.min(raster.height, Math.floor(region.y)));
  const x1 = Math.max(x0, Math.min(raster.width, Math.floor(region.x + region.width)));
  const y1 = Math.max(y0, Math.min(raster.height, Math.floor(region.y + region.height)));
  const width = x1 - x0;
  const height = y1 - y0;
  const data = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    const start = (y0 + y) * raster.width + x0;
    data.set(raster.data.subarray(start, start + width), y * width);
  }

  return { raster: { width, height, data }, offsetX: x0, offsetY: y0 };
}

/**
 * Shrink a raster by an integer factor, averaging each factor x factor block.
 * Trailing rows/columns that do not fill a block are dropped.
 */
export function downsampleRaster(raster: Raster, factor: number): Raster {
  if (factor <= 1) {
    return raster;
  }

  const width = Math.floor(raster.width / factor);
  const height = Math.floor(raster.height / factor);
  const data = new Uint8Array(width * height);
  const area = factor * factor;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let sum = 0;
      for (let dy = 0; dy < factor; dy++) {
        const row = (y * factor + dy) * raster.width + x * factor;
        for (let dx = 0; dx < factor; dx++) {
          sum += raster.data[row + dx];
        }
      }
      data[y * width + x] = Math.round(sum / area);
    }
  }

  return { width, height, data };
}
