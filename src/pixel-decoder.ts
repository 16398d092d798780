// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Pixel decoder: turns one IFD's strips or tiles into an 8-bit RGBA
 * buffer with straight (unpremultiplied) alpha.
 *
 * Decoding runs in two passes. First every block is decompressed and
 * un-predicted by geotiff and copied into its own region of a packed
 * sample plane in file byte order. Then the plane is normalised pixel by
 * pixel according to the photometric interpretation.
 */

import { getBlockDecoder } from "./compression.js";
import {
  CorruptImageDataError,
  MalformedIfdError,
  UnsupportedPhotometricError,
  UnsupportedSampleFormatError,
} from "./errors.js";
import type { Ifd } from "./ifd-walker.js";
import {
  COMPRESSION_NONE,
  EXTRA_SAMPLE_ASSOCIATED_ALPHA,
  EXTRA_SAMPLE_UNASSOCIATED_ALPHA,
  EXTRA_SAMPLE_UNSPECIFIED,
  PHOTOMETRIC_BLACK_IS_ZERO,
  PHOTOMETRIC_PALETTE,
  PHOTOMETRIC_RGB,
  PHOTOMETRIC_WHITE_IS_ZERO,
  PLANAR_CHUNKY,
  PREDICTOR_HORIZONTAL,
  PREDICTOR_NONE,
  SAMPLE_FORMAT_UINT,
  TAG_BITS_PER_SAMPLE,
  TAG_COLOR_MAP,
  TAG_COMPRESSION,
  TAG_EXTRA_SAMPLES,
  TAG_IMAGE_LENGTH,
  TAG_IMAGE_WIDTH,
  TAG_PHOTOMETRIC,
  TAG_PLANAR_CONFIGURATION,
  TAG_PREDICTOR,
  TAG_ROWS_PER_STRIP,
  TAG_SAMPLES_PER_PIXEL,
  TAG_SAMPLE_FORMAT,
  TAG_STRIP_BYTE_COUNTS,
  TAG_STRIP_OFFSETS,
  TAG_TILE_BYTE_COUNTS,
  TAG_TILE_LENGTH,
  TAG_TILE_OFFSETS,
  TAG_TILE_WIDTH,
} from "./tiff-types.js";

/** A decoded image: RGBA, 8 bits per channel, straight alpha. */
export interface DecodedImage {
  width: number;
  height: number;
  /** `width * height * 4` bytes, row-major. */
  data: Uint8Array;
  /** False when the source had no alpha sample (the buffer is opaque). */
  hasAlpha: boolean;
}

const SUPPORTED_BIT_DEPTHS: ReadonlySet<number> = new Set([1, 2, 4, 8, 16]);

/** Sample layout of an IFD, resolved from its tags with TIFF defaults. */
interface SampleLayout {
  width: number;
  height: number;
  samplesPerPixel: number;
  bitsPerSample: number;
  photometric: number;
  colorChannels: number;
  /** Index of the alpha sample within a pixel, or -1. */
  alphaSample: number;
  premultiplied: boolean;
  littleEndian: boolean;
}

/** Strips or tiles of an image, in file order. */
interface BlockGrid {
  tiled: boolean;
  blockWidth: number;
  blockHeight: number;
  blocks: Block[];
}

/** One strip or tile and where it lands in the image. */
interface Block {
  offset: number;
  byteCount: number;
  /** Top-left pixel of the block in the image. */
  x: number;
  y: number;
  /** Nominal block size; tiles may extend past the image edge. */
  width: number;
  height: number;
}

/** Largest image, in pixels, this decoder allocates for. */
export const MAX_IMAGE_PIXELS = 2 ** 28;

// ── Public API ──────────────────────────────────────────────────────

/**
 * Decode the image held by `ifd` into RGBA.
 *
 * Blocks are decompressed by geotiff (see {@link getBlockDecoder}); the
 * tile grid and the photometric conversion are resolved here from our
 * own IFD view.
 *
 * @throws MalformedIfdError on missing or inconsistent geometry tags, or
 *   an image larger than {@link MAX_IMAGE_PIXELS}.
 * @throws UnsupportedCompressionError, UnsupportedPhotometricError or
 *   UnsupportedSampleFormatError for variants this decoder does not handle.
 * @throws CorruptImageDataError if a block cannot be decompressed or
 *   decodes to fewer bytes than its geometry needs.
 * @throws OutOfBoundsError if a block lies outside the file.
 */
export async function decodeImage(ifd: Ifd): Promise<DecodedImage> {
  const layout = resolveLayout(ifd);
  const compression = ifd.number(TAG_COMPRESSION, COMPRESSION_NONE);
  const predictor = ifd.number(TAG_PREDICTOR, PREDICTOR_NONE);

  if (predictor !== PREDICTOR_NONE && predictor !== PREDICTOR_HORIZONTAL) {
    throw new UnsupportedSampleFormatError(TAG_PREDICTOR, predictor, `Unsupported predictor ${predictor}`);
  }
  if (predictor === PREDICTOR_HORIZONTAL) {
    if (layout.bitsPerSample !== 8 && layout.bitsPerSample !== 16) {
      throw new UnsupportedSampleFormatError(
        TAG_BITS_PER_SAMPLE,
        layout.bitsPerSample,
        `Horizontal predictor needs 8- or 16-bit samples, got ${layout.bitsPerSample}`,
      );
    }
    // geotiff sums 16-bit differences in host (little-endian) order
    if (layout.bitsPerSample === 16 && !layout.littleEndian) {
      throw new UnsupportedSampleFormatError(
        TAG_PREDICTOR,
        predictor,
        "Horizontal predictor on big-endian 16-bit samples is not supported",
      );
    }
  }

  const grid = collectBlocks(ifd, layout);
  checkImageSize(layout.width, layout.height, ifd.offset);

  const decoder = await getBlockDecoder({
    Compression: compression,
    Predictor: predictor,
    BitsPerSample: new Array<number>(layout.samplesPerPixel).fill(layout.bitsPerSample),
    PlanarConfiguration: PLANAR_CHUNKY,
    ImageWidth: layout.width,
    ImageLength: layout.height,
    ...(grid.tiled
      ? { TileWidth: grid.blockWidth, TileLength: grid.blockHeight }
      : { StripOffsets: grid.blocks.map((b) => b.offset), RowsPerStrip: grid.blockHeight }),
  });

  const rowBytes = packedRowBytes(layout.width, layout);
  const plane = new Uint8Array(rowBytes * layout.height);

  for (const [index, block] of grid.blocks.entries()) {
    const blockRowBytes = packedRowBytes(block.width, layout);
    const rows = Math.min(block.height, layout.height - block.y);
    // Strips are stored clipped to the image; tiles are always full size.
    const storedRows = grid.tiled ? block.height : rows;
    const expectedSize = blockRowBytes * storedRows;

    const samples = await decoder(ifd.file.reader.span(block.offset, block.byteCount), storedRows);
    if (samples.length < expectedSize) {
      throw new CorruptImageDataError(
        `Block ${index} at offset ${block.offset} decoded to ${samples.length} bytes, expected ${expectedSize}`,
      );
    }

    const destX = packedRowBytes(block.x, layout);
    const copyBytes = Math.min(blockRowBytes, rowBytes - destX);
    for (let row = 0; row < rows; row++) {
      const src = row * blockRowBytes;
      plane.set(samples.subarray(src, src + copyBytes), (block.y + row) * rowBytes + destX);
    }
  }

  return {
    width: layout.width,
    height: layout.height,
    data: toRgba(plane, rowBytes, layout, readColorMap(ifd, layout)),
    hasAlpha: layout.alphaSample >= 0,
  };
}

/**
 * Reject a `width` x `height` image too large to hold in memory.
 *
 * @throws MalformedIfdError naming the IFD at `ifdOffset`.
 */
export function checkImageSize(width: number, height: number, ifdOffset: number): void {
  if (width * height > MAX_IMAGE_PIXELS) {
    throw new MalformedIfdError(
      `Image of ${width}x${height} pixels exceeds the limit of ${MAX_IMAGE_PIXELS} pixels`,
      ifdOffset,
    );
  }
}

// ── Layout ──────────────────────────────────────────────────────────

function resolveLayout(ifd: Ifd): SampleLayout {
  const width = ifd.numbers(TAG_IMAGE_WIDTH)?.[0];
  const height = ifd.numbers(TAG_IMAGE_LENGTH)?.[0];
  if (width === undefined || height === undefined) {
    throw new MalformedIfdError("Image is missing ImageWidth or ImageLength", ifd.offset);
  }

  const samplesPerPixel = ifd.number(TAG_SAMPLES_PER_PIXEL, 1);
  if (samplesPerPixel < 1) {
    throw new MalformedIfdError(`SamplesPerPixel is ${samplesPerPixel}`, ifd.offset);
  }

  const depths = ifd.numbers(TAG_BITS_PER_SAMPLE) ?? [1];
  const bitsPerSample = depths.length > 0 ? depths[0] : 1;
  if (depths.some((d) => d !== bitsPerSample)) {
    throw new UnsupportedSampleFormatError(
      TAG_BITS_PER_SAMPLE,
      bitsPerSample,
      `Mixed bit depths [${depths.join(", ")}] are not supported`,
    );
  }
  if (!SUPPORTED_BIT_DEPTHS.has(bitsPerSample)) {
    throw new UnsupportedSampleFormatError(TAG_BITS_PER_SAMPLE, bitsPerSample, `Unsupported bit depth ${bitsPerSample}`);
  }

  for (const format of ifd.numbers(TAG_SAMPLE_FORMAT) ?? []) {
    if (format !== SAMPLE_FORMAT_UINT) {
      throw new UnsupportedSampleFormatError(TAG_SAMPLE_FORMAT, format, `Unsupported sample format ${format}`);
    }
  }

  const planar = ifd.number(TAG_PLANAR_CONFIGURATION, PLANAR_CHUNKY);
  if (planar !== PLANAR_CHUNKY && samplesPerPixel > 1) {
    throw new UnsupportedSampleFormatError(
      TAG_PLANAR_CONFIGURATION,
      planar,
      `Unsupported planar configuration ${planar}`,
    );
  }

  const photometric = ifd.number(
    TAG_PHOTOMETRIC,
    samplesPerPixel >= 3 ? PHOTOMETRIC_RGB : PHOTOMETRIC_BLACK_IS_ZERO,
  );
  let colorChannels: number;
  switch (photometric) {
    case PHOTOMETRIC_WHITE_IS_ZERO:
    case PHOTOMETRIC_BLACK_IS_ZERO:
    case PHOTOMETRIC_PALETTE:
      colorChannels = 1;
      break;
    case PHOTOMETRIC_RGB:
      colorChannels = 3;
      break;
    default:
      throw new UnsupportedPhotometricError(TAG_PHOTOMETRIC, photometric);
  }
  if (samplesPerPixel < colorChannels) {
    throw new MalformedIfdError(
      `Photometric ${photometric} needs ${colorChannels} samples per pixel, got ${samplesPerPixel}`,
      ifd.offset,
    );
  }

  // The first extra sample is alpha unless declared unspecified.
  let alphaSample = -1;
  let premultiplied = false;
  if (samplesPerPixel > colorChannels) {
    const kind = ifd.numbers(TAG_EXTRA_SAMPLES)?.[0] ?? EXTRA_SAMPLE_UNASSOCIATED_ALPHA;
    if (kind !== EXTRA_SAMPLE_UNSPECIFIED) {
      alphaSample = colorChannels;
      premultiplied = kind === EXTRA_SAMPLE_ASSOCIATED_ALPHA;
    }
  }

  return {
    width,
    height,
    samplesPerPixel,
    bitsPerSample,
    photometric,
    colorChannels,
    alphaSample,
    premultiplied,
    littleEndian: ifd.file.littleEndian,
  };
}

/** Bytes of `pixels` packed samples, rounded up to a whole byte. */
function packedRowBytes(pixels: number, layout: SampleLayout): number {
  return Math.ceil((pixels * layout.samplesPerPixel * layout.bitsPerSample) / 8);
}

/** Enumerate strips or tiles with their placement in the image. */
function collectBlocks(ifd: Ifd, layout: SampleLayout): BlockGrid {
  const { width, height } = layout;
  const tiled = ifd.has(TAG_TILE_WIDTH);

  const blockWidth = tiled ? ifd.number(TAG_TILE_WIDTH, 0) : width;
  const blockHeight = tiled
    ? ifd.number(TAG_TILE_LENGTH, 0)
    : Math.min(ifd.number(TAG_ROWS_PER_STRIP, height), height);
  const offsets = ifd.numbers(tiled ? TAG_TILE_OFFSETS : TAG_STRIP_OFFSETS);
  const byteCounts = ifd.numbers(tiled ? TAG_TILE_BYTE_COUNTS : TAG_STRIP_BYTE_COUNTS);

  if (width === 0 || height === 0) return { tiled, blockWidth, blockHeight, blocks: [] };
  if (blockWidth <= 0 || blockHeight <= 0) {
    throw new MalformedIfdError(`Invalid block size ${blockWidth}x${blockHeight}`, ifd.offset);
  }
  if (offsets === undefined || byteCounts === undefined) {
    throw new MalformedIfdError(`Image has no ${tiled ? "tile" : "strip"} offsets or byte counts`, ifd.offset);
  }

  const across = Math.ceil(width / blockWidth);
  const down = Math.ceil(height / blockHeight);
  const expected = across * down;
  if (offsets.length !== expected || byteCounts.length !== expected) {
    throw new MalformedIfdError(
      `Expected ${expected} ${tiled ? "tiles" : "strips"}, found ${offsets.length} offsets and ${byteCounts.length} byte counts`,
      ifd.offset,
    );
  }

  const blocks: Block[] = [];
  for (let i = 0; i < expected; i++) {
    blocks.push({
      offset: offsets[i],
      byteCount: byteCounts[i],
      x: (i % across) * blockWidth,
      y: Math.floor(i / across) * blockHeight,
      width: blockWidth,
      height: blockHeight,
    });
  }
  return { tiled, blockWidth, blockHeight, blocks };
}

// ── Normalisation ───────────────────────────────────────────────────

/** ColorMap as three channel tables, or undefined for non-palette images. */
function readColorMap(ifd: Ifd, layout: SampleLayout): Uint16Array[] | undefined {
  if (layout.photometric !== PHOTOMETRIC_PALETTE) return undefined;

  const values = ifd.numbers(TAG_COLOR_MAP);
  const entries = 1 << layout.bitsPerSample;
  if (values === undefined || values.length < entries * 3) {
    throw new MalformedIfdError(
      `Palette image needs a ColorMap of ${entries * 3} values, found ${values?.length ?? 0}`,
      ifd.offset,
    );
  }
  // Stored as all reds, then all greens, then all blues.
  return [0, 1, 2].map((c) => Uint16Array.from(values.slice(c * entries, (c + 1) * entries)));
}

/** Read sample `index` of a packed row starting at byte `rowStart`. */
function readSample(plane: Uint8Array, rowStart: number, index: number, layout: SampleLayout): number {
  const bps = layout.bitsPerSample;
  if (bps === 8) return plane[rowStart + index];
  if (bps === 16) {
    const pos = rowStart + index * 2;
    return layout.littleEndian ? plane[pos] | (plane[pos + 1] << 8) : (plane[pos] << 8) | plane[pos + 1];
  }
  // Sub-byte samples are packed MSB first.
  const bit = index * bps;
  const byte = plane[rowStart + (bit >>> 3)];
  return (byte >>> (8 - bps - (bit & 7))) & ((1 << bps) - 1);
}

function toRgba(
  plane: Uint8Array,
  rowBytes: number,
  layout: SampleLayout,
  colorMap: Uint16Array[] | undefined,
): Uint8Array {
  const { width, height, samplesPerPixel: spp, photometric, alphaSample } = layout;
  const maxValue = (1 << layout.bitsPerSample) - 1;
  const scale = (v: number): number => (maxValue === 255 ? v : Math.round((v * 255) / maxValue));
  const output = new Uint8Array(width * height * 4);

  for (let y = 0; y < height; y++) {
    const rowStart = y * rowBytes;
    for (let x = 0; x < width; x++) {
      const first = x * spp;
      const out = (y * width + x) * 4;
      let r: number;
      let g: number;
      let b: number;

      const v = readSample(plane, rowStart, first, layout);
      if (photometric === PHOTOMETRIC_RGB) {
        r = scale(v);
        g = scale(readSample(plane, rowStart, first + 1, layout));
        b = scale(readSample(plane, rowStart, first + 2, layout));
      } else if (colorMap !== undefined) {
        r = Math.round((colorMap[0][v] / 65535) * 255);
        g = Math.round((colorMap[1][v] / 65535) * 255);
        b = Math.round((colorMap[2][v] / 65535) * 255);
      } else {
        const gray = photometric === PHOTOMETRIC_WHITE_IS_ZERO ? 255 - scale(v) : scale(v);
        r = g = b = gray;
      }

      let a = 255;
      if (alphaSample >= 0) {
        a = scale(readSample(plane, rowStart, first + alphaSample, layout));
        if (layout.premultiplied) {
          [r, g, b] = a === 0 ? [0, 0, 0] : [unpremultiply(r, a), unpremultiply(g, a), unpremultiply(b, a)];
        }
      }

      output[out] = r;
      output[out + 1] = g;
      output[out + 2] = b;
      output[out + 3] = a;
    }
  }

  return output;
}

function unpremultiply(c: number, a: number): number {
  return Math.min(255, Math.round((c * 255) / a));
}
