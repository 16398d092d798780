/**
 * Geometry and RGBA buffer helpers shared by the compositor and the
 * archive writer.
 */

import type { DecodedImage } from "./pixel-decoder.js";

/**
 * Window of a `width` x `height` image placed at (x, y) that falls on a
 * canvas, in canvas coordinates.
 *
 * @returns [left, top, right, bottom], or undefined when nothing overlaps.
 */
export function computeClipWindow(
  x: number,
  y: number,
  width: number,
  height: number,
  canvasWidth: number,
  canvasHeight: number,
): [number, number, number, number] | undefined {
  const left = Math.max(x, 0);
  const top = Math.max(y, 0);
  const right = Math.min(x + width, canvasWidth);
  const bottom = Math.min(y + height, canvasHeight);
  if (left >= right || top >= bottom) return undefined;
  return [left, top, right, bottom];
}

/**
 * Largest size with the aspect ratio of `width` x `height` that fits in a
 * `maxSize` square. Images that already fit keep their size.
 */
export function fitWithin(width: number, height: number, maxSize: number): [number, number] {
  if (width <= maxSize && height <= maxSize) return [width, height];
  const scale = maxSize / Math.max(width, height);
  return [Math.max(1, Math.round(width * scale)), Math.max(1, Math.round(height * scale))];
}

/** Resize an RGBA image with nearest-neighbour sampling. */
export function resizeNearest(image: DecodedImage, width: number, height: number): DecodedImage {
  if (width === image.width && height === image.height) return image;

  const data = new Uint8Array(width * height * 4);
  const xRatio = image.width / width;
  const yRatio = image.height / height;

  for (let y = 0; y < height; y++) {
    const srcY = Math.min(Math.floor(y * yRatio), image.height - 1);
    for (let x = 0; x < width; x++) {
      const srcX = Math.min(Math.floor(x * xRatio), image.width - 1);
      const src = (srcY * image.width + srcX) * 4;
      data.set(image.data.subarray(src, src + 4), (y * width + x) * 4);
    }
  }

  return { width, height, data, hasAlpha: image.hasAlpha };
}
