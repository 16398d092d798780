// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * PNG encoder for 8-bit RGBA images.
 *
 * Scanlines are filtered with the adaptive heuristic (minimum sum of
 * absolute differences per row) and the filtered stream is compressed
 * with fflate, either synchronously or on fflate's worker-backed async
 * deflate.
 */

import { zlib, zlibSync } from "fflate";
import { WriteError } from "./errors.js";
import type { DecodedImage } from "./pixel-decoder.js";

/** fflate compression level. */
export type DeflateLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export const PNG_SIGNATURE = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const COLOR_TYPE_RGBA = 6;
const BYTES_PER_PIXEL = 4;

enum FilterType {
  None = 0,
  Sub = 1,
  Up = 2,
  Average = 3,
  Paeth = 4,
}

// ── Deflate ─────────────────────────────────────────────────────────

/** Compress with zlib framing (RFC 1950), as PNG IDAT requires. */
export function compressDeflate(data: Uint8Array, level: DeflateLevel = 6): Uint8Array {
  return zlibSync(data, { level });
}

/**
 * Compress with zlib framing off the main thread, using fflate's
 * worker-backed async API.
 */
export function compressDeflateAsync(data: Uint8Array, level: DeflateLevel = 6): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    zlib(data, { level }, (err, result) => {
      if (err) reject(err);
      else resolve(result);
    });
  });
}

// ── Public API ──────────────────────────────────────────────────────

/**
 * Encode an RGBA image as PNG.
 *
 * @throws WriteError (`encode`) on a zero dimension or a buffer whose size
 *   does not match the dimensions.
 */
export function encodePng(image: DecodedImage, level: DeflateLevel = 6): Uint8Array {
  const filtered = filterImage(image);
  return assemblePng(image, compressDeflate(filtered, level));
}

/** Like {@link encodePng}, with the deflate stage run asynchronously. */
export async function encodePngAsync(image: DecodedImage, level: DeflateLevel = 6): Promise<Uint8Array> {
  const filtered = filterImage(image);
  let compressed: Uint8Array;
  try {
    compressed = await compressDeflateAsync(filtered, level);
  } catch (err) {
    throw new WriteError("encode", "PNG deflate failed", { cause: err });
  }
  return assemblePng(image, compressed);
}

/** Throw unless `image` has non-zero dimensions and a matching buffer. */
export function validateImage(image: DecodedImage): void {
  const { width, height, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new WriteError("encode", `Cannot encode a ${width}x${height} image`);
  }
  if (data.length !== width * height * BYTES_PER_PIXEL) {
    throw new WriteError(
      "encode",
      `RGBA buffer holds ${data.length} bytes, expected ${width * height * BYTES_PER_PIXEL} for ${width}x${height}`,
    );
  }
}

// ── Chunks ──────────────────────────────────────────────────────────

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c >>> 0;
}

export function crc32(data: Uint8Array, start = 0, length = data.length - start): number {
  let crc = 0xffffffff;
  for (let i = start; i < start + length; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function writeU32BE(data: Uint8Array, offset: number, value: number): void {
  data[offset] = (value >>> 24) & 0xff;
  data[offset + 1] = (value >>> 16) & 0xff;
  data[offset + 2] = (value >>> 8) & 0xff;
  data[offset + 3] = value & 0xff;
}

/** Length, type, data and CRC (over type and data). */
function createChunk(type: string, data: Uint8Array): Uint8Array {
  const chunk = new Uint8Array(12 + data.length);
  writeU32BE(chunk, 0, data.length);
  for (let i = 0; i < 4; i++) chunk[4 + i] = type.charCodeAt(i);
  chunk.set(data, 8);
  writeU32BE(chunk, 8 + data.length, crc32(chunk, 4, data.length + 4));
  return chunk;
}

function createIhdr(width: number, height: number): Uint8Array {
  const data = new Uint8Array(13);
  writeU32BE(data, 0, width);
  writeU32BE(data, 4, height);
  data[8] = 8; // bit depth
  data[9] = COLOR_TYPE_RGBA;
  // compression, filter and interlace methods stay 0
  return createChunk("IHDR", data);
}

function assemblePng(image: DecodedImage, compressed: Uint8Array): Uint8Array {
  const chunks = [
    PNG_SIGNATURE,
    createIhdr(image.width, image.height),
    createChunk("IDAT", compressed),
    createChunk("IEND", new Uint8Array(0)),
  ];

  const output = new Uint8Array(chunks.reduce((sum, c) => sum + c.length, 0));
  let offset = 0;
  for (const chunk of chunks) {
    output.set(chunk, offset);
    offset += chunk.length;
  }
  return output;
}

// ── Filtering ───────────────────────────────────────────────────────

function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

/** Filter one scanline into `out` (filter byte first). */
function filterScanline(
  current: Uint8Array,
  previous: Uint8Array | undefined,
  filterType: FilterType,
  out: Uint8Array,
): void {
  const bpp = BYTES_PER_PIXEL;
  out[0] = filterType;
  for (let i = 0; i < current.length; i++) {
    const a = i >= bpp ? current[i - bpp] : 0;
    const b = previous ? previous[i] : 0;
    const c = i >= bpp && previous ? previous[i - bpp] : 0;
    let predicted: number;
    switch (filterType) {
      case FilterType.Sub:
        predicted = a;
        break;
      case FilterType.Up:
        predicted = b;
        break;
      case FilterType.Average:
        predicted = (a + b) >>> 1;
        break;
      case FilterType.Paeth:
        predicted = paethPredictor(a, b, c);
        break;
      default:
        predicted = 0;
    }
    out[i + 1] = (current[i] - predicted) & 0xff;
  }
}

/** Sum of filtered bytes read as signed values. */
function sumAbsolute(data: Uint8Array): number {
  let sum = 0;
  for (let i = 1; i < data.length; i++) {
    const v = data[i];
    sum += v < 128 ? v : 256 - v;
  }
  return sum;
}

const FILTERS: readonly FilterType[] = [
  FilterType.None,
  FilterType.Sub,
  FilterType.Up,
  FilterType.Average,
  FilterType.Paeth,
];

/** Filter every scanline with the filter that minimises its byte sum. */
function filterImage(image: DecodedImage): Uint8Array {
  validateImage(image);
  const { width, height, data } = image;
  const stride = width * BYTES_PER_PIXEL;
  const output = new Uint8Array((stride + 1) * height);
  const candidate = new Uint8Array(stride + 1);
  const best = new Uint8Array(stride + 1);

  let previous: Uint8Array | undefined;
  for (let y = 0; y < height; y++) {
    const current = data.subarray(y * stride, (y + 1) * stride);
    let bestSum = Infinity;
    for (const filterType of FILTERS) {
      filterScanline(current, previous, filterType, candidate);
      const sum = sumAbsolute(candidate);
      if (sum < bestSum) {
        bestSum = sum;
        best.set(candidate);
      }
    }
    output.set(best, y * (stride + 1));
    previous = current;
  }

  return output;
}
