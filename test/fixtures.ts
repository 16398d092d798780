// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Test fixture helpers: build small layered TIFF files in memory and read
 * back the pieces of an ORA archive.
 *
 * The builder writes sequentially: pixel data and directories are appended
 * in the order they are added, so a directory can only point at
 * directories added before it. The header's first-IFD offset is patched
 * in `finish()`.
 */

import { unzlibSync, zlibSync } from "fflate";
import { fromArrayBuffer } from "geotiff";

import {
  COMPRESSION_DEFLATE,
  COMPRESSION_LZW,
  COMPRESSION_NONE,
  COMPRESSION_PACKBITS,
  EXTRA_SAMPLE_UNASSOCIATED_ALPHA,
  PHOTOMETRIC_RGB,
  RESOLUTION_UNIT_INCH,
  SUBFILE_REDUCED_IMAGE,
  TAG_BITS_PER_SAMPLE,
  TAG_COMPRESSION,
  TAG_EXTRA_SAMPLES,
  TAG_IMAGE_LENGTH,
  TAG_IMAGE_WIDTH,
  TAG_LAYER_TABLE,
  TAG_NEW_SUBFILE_TYPE,
  TAG_PHOTOMETRIC,
  TAG_RESOLUTION_UNIT,
  TAG_ROWS_PER_STRIP,
  TAG_SAMPLES_PER_PIXEL,
  TAG_SOFTWARE,
  TAG_STRIP_BYTE_COUNTS,
  TAG_STRIP_OFFSETS,
  TAG_X_RESOLUTION,
  TAG_Y_RESOLUTION,
  TIFF_TYPE_ASCII,
  TIFF_TYPE_LONG,
  TIFF_TYPE_LONG8,
  TIFF_TYPE_RATIONAL,
  TIFF_TYPE_SHORT,
  TIFF_TYPE_UNDEFINED,
  typeSize,
} from "../src/tiff-types.js";

// ── Low-level TIFF builder ──────────────────────────────────────────

/** A single TIFF tag entry to write. */
export interface TiffTag {
  tag: number;
  type: number;
  /**
   * Numbers (RATIONAL as numerator/denominator pairs), a string for ASCII,
   * or raw bytes for BYTE/UNDEFINED.
   */
  values: number[] | string | Uint8Array;
  /** Override the count written to the entry. */
  count?: number;
}

export interface TiffBuilderOptions {
  littleEndian?: boolean;
  bigTiff?: boolean;
}

export class TiffBuilder {
  readonly littleEndian: boolean;
  readonly bigTiff: boolean;
  private bytes = new Uint8Array(1024);
  private length = 0;

  constructor(options: TiffBuilderOptions = {}) {
    this.littleEndian = options.littleEndian ?? true;
    this.bigTiff = options.bigTiff ?? false;

    this.u8(this.littleEndian ? 0x49 : 0x4d);
    this.u8(this.littleEndian ? 0x49 : 0x4d);
    if (this.bigTiff) {
      this.u16(43);
      this.u16(8);
      this.u16(0);
      this.offset(0);
    } else {
      this.u16(42);
      this.offset(0);
    }
  }

  get size(): number {
    return this.length;
  }

  /** Append raw bytes (word aligned) and return their offset. */
  addData(data: Uint8Array): number {
    this.align();
    const at = this.length;
    this.append(data);
    return at;
  }

  /**
   * Append an IFD with `tags` in the given order and return its offset.
   * Values that do not fit inline are written right after the directory.
   */
  addIfd(tags: TiffTag[], nextIfdOffset = 0): number {
    this.align();
    const at = this.length;
    const countSize = this.bigTiff ? 8 : 2;
    const entrySize = this.bigTiff ? 20 : 12;
    const offsetSize = this.bigTiff ? 8 : 4;
    let overflow = at + countSize + tags.length * entrySize + offsetSize;

    const deferred: Uint8Array[] = [];
    if (this.bigTiff) this.offset(tags.length);
    else this.u16(tags.length);

    for (const tag of tags) {
      const value = this.encodeValue(tag);
      const count = tag.count ?? elementCount(tag, value);
      this.u16(tag.tag);
      this.u16(tag.type);
      this.offset(count);
      if (value.length <= offsetSize) {
        const padded = new Uint8Array(offsetSize);
        padded.set(value);
        this.append(padded);
      } else {
        this.offset(overflow);
        deferred.push(value);
        overflow += value.length + (value.length & 1);
      }
    }
    this.offset(nextIfdOffset);

    for (const value of deferred) {
      this.append(value);
      this.align();
    }
    return at;
  }

  /** Overwrite a u32 (or u64 for BigTIFF) at `at`. */
  patchOffset(at: number, value: number): void {
    const saved = this.length;
    this.length = at;
    this.offset(value);
    this.length = saved;
  }

  /** Set the header's first-IFD offset and return the file bytes. */
  finish(firstIfdOffset: number): Uint8Array {
    this.patchOffset(this.bigTiff ? 8 : 4, firstIfdOffset);
    return this.bytes.slice(0, this.length);
  }

  // ── encoding ──

  encodeValue(tag: TiffTag): Uint8Array {
    if (typeof tag.values === "string") {
      return new TextEncoder().encode(`${tag.values}\0`);
    }
    if (tag.values instanceof Uint8Array) {
      return tag.values;
    }
    const size = typeSize(tag.type);
    const isRational = tag.type === TIFF_TYPE_RATIONAL;
    const out = new Uint8Array(isRational ? (tag.values.length / 2) * 8 : tag.values.length * size);
    const view = new DataView(out.buffer);
    const le = this.littleEndian;
    tag.values.forEach((v, i) => {
      if (isRational) {
        view.setUint32(i * 4, v, le);
      } else if (size === 1) {
        view.setUint8(i, v);
      } else if (size === 2) {
        view.setUint16(i * 2, v, le);
      } else if (size === 4) {
        view.setUint32(i * 4, v, le);
      } else {
        writeU64(view, i * 8, v, le);
      }
    });
    return out;
  }

  private append(data: Uint8Array): void {
    this.ensure(this.length + data.length);
    this.bytes.set(data, this.length);
    this.length += data.length;
  }

  private align(): void {
    if (this.length & 1) this.u8(0);
  }

  private ensure(capacity: number): void {
    if (capacity <= this.bytes.length) return;
    const grown = new Uint8Array(Math.max(capacity, this.bytes.length * 2));
    grown.set(this.bytes.subarray(0, this.length));
    this.bytes = grown;
  }

  private u8(v: number): void {
    this.ensure(this.length + 1);
    this.bytes[this.length++] = v;
  }

  private u16(v: number): void {
    const b = new Uint8Array(2);
    new DataView(b.buffer).setUint16(0, v, this.littleEndian);
    this.append(b);
  }

  private offset(v: number): void {
    const b = new Uint8Array(this.bigTiff ? 8 : 4);
    const view = new DataView(b.buffer);
    if (this.bigTiff) writeU64(view, 0, v, this.littleEndian);
    else view.setUint32(0, v, this.littleEndian);
    this.append(b);
  }
}

function writeU64(view: DataView, at: number, v: number, le: boolean): void {
  const hi = Math.floor(v / 0x1_0000_0000);
  const lo = v >>> 0;
  view.setUint32(at + (le ? 0 : 4), lo, le);
  view.setUint32(at + (le ? 4 : 0), hi, le);
}

function elementCount(tag: TiffTag, encoded: Uint8Array): number {
  if (typeof tag.values === "string" || tag.values instanceof Uint8Array) return encoded.length;
  return tag.type === TIFF_TYPE_RATIONAL ? tag.values.length / 2 : tag.values.length;
}

// ── Test encoders ───────────────────────────────────────────────────

/** PackBits: runs of 2+ equal bytes become repeat packets, the rest literals. */
export function encodePackBits(data: Uint8Array): Uint8Array {
  const output: number[] = [];
  let pos = 0;

  while (pos < data.length) {
    let run = 1;
    while (pos + run < data.length && data[pos + run] === data[pos] && run < 128) run++;

    if (run >= 2) {
      output.push(257 - run, data[pos]);
      pos += run;
      continue;
    }

    const start = pos;
    while (pos < data.length && pos - start < 128 && (pos + 1 >= data.length || data[pos] !== data[pos + 1])) {
      pos++;
    }
    output.push(pos - start - 1, ...data.subarray(start, pos));
  }

  return new Uint8Array(output);
}

/**
 * TIFF LZW: MSB-first codes starting at 9 bits, with the early width
 * change readers expect. Emits a Clear code first and whenever the table
 * is about to fill.
 */
export function encodeLzw(data: Uint8Array): Uint8Array {
  const out: number[] = [];
  let acc = 0;
  let accBits = 0;
  let width = 9;

  const write = (code: number): void => {
    acc = (acc << width) | code;
    accBits += width;
    while (accBits >= 8) {
      out.push((acc >>> (accBits - 8)) & 0xff);
      accBits -= 8;
      acc &= (1 << accBits) - 1;
    }
  };

  let dict = new Map<number, number>();
  let dictLen = 258;
  write(256);

  if (data.length > 0) {
    let prefix = data[0];
    for (let i = 1; i < data.length; i++) {
      const byte = data[i];
      const key = prefix * 256 + byte;
      const existing = dict.get(key);
      if (existing !== undefined) {
        prefix = existing;
        continue;
      }
      write(prefix);
      dict.set(key, dictLen++);
      if (dictLen >= 4094) {
        write(256);
        dict = new Map();
        dictLen = 258;
        width = 9;
      } else if (dictLen >= 1 << width) {
        width++;
      }
      prefix = byte;
    }
    write(prefix);
    if (dictLen + 1 >= 1 << width && width < 12) width++;
  }

  write(257);
  if (accBits > 0) out.push((acc << (8 - accBits)) & 0xff);
  return new Uint8Array(out);
}

export type FixtureCompression = "none" | "packbits" | "lzw" | "deflate";

const COMPRESSION_CODES: Record<FixtureCompression, number> = {
  none: COMPRESSION_NONE,
  packbits: COMPRESSION_PACKBITS,
  lzw: COMPRESSION_LZW,
  deflate: COMPRESSION_DEFLATE,
};

export function compressBlock(data: Uint8Array, compression: FixtureCompression): Uint8Array {
  switch (compression) {
    case "none":
      return data;
    case "packbits":
      return encodePackBits(data);
    case "lzw":
      return encodeLzw(data);
    case "deflate":
      return zlibSync(data);
  }
}

// ── Images ──────────────────────────────────────────────────────────

/** Straight RGBA test image. */
export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Fill an image with one colour. */
export function solidImage(width: number, height: number, rgba: [number, number, number, number]): RgbaImage {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) data.set(rgba, i * 4);
  return { width, height, data };
}

/** Two-colour checkerboard with 1-pixel cells. */
export function checkerboard(
  width: number,
  height: number,
  even: [number, number, number, number],
  odd: [number, number, number, number],
): RgbaImage {
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data.set((x + y) % 2 === 0 ? even : odd, (y * width + x) * 4);
    }
  }
  return { width, height, data };
}

/**
 * Tags and strips for an 8-bit RGBA (unassociated alpha) image split into
 * strips of `rowsPerStrip` rows.
 */
export function addRgbaImage(
  builder: TiffBuilder,
  image: RgbaImage,
  options: { compression?: FixtureCompression; rowsPerStrip?: number; extraTags?: TiffTag[]; next?: number } = {},
): number {
  const compression = options.compression ?? "none";
  const rowsPerStrip = options.rowsPerStrip ?? image.height;
  const rowBytes = image.width * 4;

  const offsets: number[] = [];
  const counts: number[] = [];
  for (let y = 0; y < image.height; y += rowsPerStrip) {
    const rows = Math.min(rowsPerStrip, image.height - y);
    const strip = compressBlock(image.data.subarray(y * rowBytes, (y + rows) * rowBytes), compression);
    offsets.push(builder.addData(strip));
    counts.push(strip.length);
  }

  const offsetType = builder.bigTiff ? TIFF_TYPE_LONG8 : TIFF_TYPE_LONG;
  return builder.addIfd(
    [
      ...(options.extraTags ?? []),
      { tag: TAG_IMAGE_WIDTH, type: TIFF_TYPE_LONG, values: [image.width] },
      { tag: TAG_IMAGE_LENGTH, type: TIFF_TYPE_LONG, values: [image.height] },
      { tag: TAG_BITS_PER_SAMPLE, type: TIFF_TYPE_SHORT, values: [8, 8, 8, 8] },
      { tag: TAG_COMPRESSION, type: TIFF_TYPE_SHORT, values: [COMPRESSION_CODES[compression]] },
      { tag: TAG_PHOTOMETRIC, type: TIFF_TYPE_SHORT, values: [PHOTOMETRIC_RGB] },
      { tag: TAG_STRIP_OFFSETS, type: offsetType, values: offsets },
      { tag: TAG_SAMPLES_PER_PIXEL, type: TIFF_TYPE_SHORT, values: [4] },
      { tag: TAG_ROWS_PER_STRIP, type: TIFF_TYPE_LONG, values: [rowsPerStrip] },
      { tag: TAG_STRIP_BYTE_COUNTS, type: offsetType, values: counts },
      { tag: TAG_EXTRA_SAMPLES, type: TIFF_TYPE_SHORT, values: [EXTRA_SAMPLE_UNASSOCIATED_ALPHA] },
    ],
    options.next ?? 0,
  );
}

// ── Layered documents ───────────────────────────────────────────────

export interface FixtureLayer {
  name: string;
  image: RgbaImage;
  x?: number;
  y?: number;
  /** 16.16 fixed point is derived from this. Default: 1. */
  opacity?: number;
  visible?: boolean;
  blendCode?: number;
  compression?: FixtureCompression;
  /** Replace the 64-byte name field. */
  rawName?: Uint8Array;
  /** Write this IFD offset into the record instead of the real one. */
  ifdOffsetOverride?: number;
  /** Additional tags on the layer IFD. */
  extraTags?: TiffTag[];
}

export interface LayeredTiffOptions extends TiffBuilderOptions {
  width: number;
  height: number;
  /** Table order: first entry is the topmost layer. */
  layers: FixtureLayer[];
  thumbnail?: RgbaImage;
  /** Pixels per inch written as X/YResolution. */
  resolution?: number;
  layerTableTag?: number;
  /** Software tag on the root IFD. */
  software?: string;
}

/** Encode one 84-byte layer record. */
export function layerRecord(layer: FixtureLayer, ifdOffset: number, littleEndian: boolean): Uint8Array {
  const record = new Uint8Array(84);
  const view = new DataView(record.buffer);
  view.setUint32(0, ifdOffset, littleEndian);
  view.setInt32(4, layer.x ?? 0, littleEndian);
  view.setInt32(8, layer.y ?? 0, littleEndian);
  view.setUint32(12, Math.round((layer.opacity ?? 1) * 0x10000), littleEndian);
  record[16] = layer.visible === false ? 0 : 1;
  record[17] = layer.blendCode ?? 0;
  record.set(layer.rawName ?? new TextEncoder().encode(layer.name).subarray(0, 63), 20);
  return record;
}

/**
 * Build a layered TIFF: layer images, layer IFDs, an optional thumbnail
 * IFD chained after the root, and the root IFD carrying an opaque white
 * composite and the layer table.
 */
export function buildLayeredTiff(options: LayeredTiffOptions): Uint8Array {
  const builder = new TiffBuilder(options);
  const le = builder.littleEndian;

  const layerOffsets = options.layers.map((layer) =>
    addRgbaImage(builder, layer.image, { compression: layer.compression, extraTags: layer.extraTags }),
  );

  const thumbnailOffset =
    options.thumbnail === undefined
      ? 0
      : addRgbaImage(builder, options.thumbnail, {
          extraTags: [{ tag: TAG_NEW_SUBFILE_TYPE, type: TIFF_TYPE_LONG, values: [SUBFILE_REDUCED_IMAGE] }],
        });

  const table = new Uint8Array(options.layers.length * 84);
  options.layers.forEach((layer, i) => {
    table.set(layerRecord(layer, layer.ifdOffsetOverride ?? layerOffsets[i], le), i * 84);
  });

  const rootTags: TiffTag[] = [];
  if (options.resolution !== undefined) {
    rootTags.push(
      { tag: TAG_X_RESOLUTION, type: TIFF_TYPE_RATIONAL, values: [options.resolution, 1] },
      { tag: TAG_Y_RESOLUTION, type: TIFF_TYPE_RATIONAL, values: [options.resolution, 1] },
      { tag: TAG_RESOLUTION_UNIT, type: TIFF_TYPE_SHORT, values: [RESOLUTION_UNIT_INCH] },
    );
  }
  if (options.software !== undefined) rootTags.push(asciiTag(TAG_SOFTWARE, options.software));
  rootTags.push({ tag: options.layerTableTag ?? TAG_LAYER_TABLE, type: TIFF_TYPE_UNDEFINED, values: table });

  const root = addRgbaImage(builder, solidImage(options.width, options.height, [255, 255, 255, 255]), {
    extraTags: rootTags,
    next: thumbnailOffset,
  });
  return builder.finish(root);
}

/** Copy into a standalone ArrayBuffer, as geotiff expects. */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.length);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

/** First image of a TIFF as read by geotiff, samples interleaved. */
export async function readWithGeotiff(
  bytes: Uint8Array,
): Promise<{ width: number; height: number; samplesPerPixel: number; samples: number[] }> {
  const tiff = await fromArrayBuffer(toArrayBuffer(bytes));
  const image = await tiff.getImage(0);
  const raster = await image.readRasters({ interleave: true });
  const samples: number[] = [];
  for (let i = 0; i < raster.length; i++) {
    const value = raster[i];
    if (typeof value === "number") samples.push(value);
  }
  return {
    width: image.getWidth(),
    height: image.getHeight(),
    samplesPerPixel: image.getSamplesPerPixel(),
    samples,
  };
}

/** An ASCII tag, for tests that need a non-numeric value. */
export function asciiTag(tag: number, value: string): TiffTag {
  return { tag, type: TIFF_TYPE_ASCII, values: value };
}

// ── Archive readers ─────────────────────────────────────────────────

export interface ZipEntry {
  name: string;
  /** 0 stored, 8 deflated. */
  method: number;
  data: Uint8Array;
}

/** Walk the local file headers of a zip in file order. */
export function listZipEntries(archive: Uint8Array): ZipEntry[] {
  const view = new DataView(archive.buffer, archive.byteOffset, archive.byteLength);
  const entries: ZipEntry[] = [];
  let pos = 0;
  while (pos + 30 <= archive.length && view.getUint32(pos, true) === 0x04034b50) {
    const method = view.getUint16(pos + 8, true);
    const compressedSize = view.getUint32(pos + 18, true);
    const nameLength = view.getUint16(pos + 26, true);
    const extraLength = view.getUint16(pos + 28, true);
    const name = new TextDecoder().decode(archive.subarray(pos + 30, pos + 30 + nameLength));
    const start = pos + 30 + nameLength + extraLength;
    entries.push({ name, method, data: archive.subarray(start, start + compressedSize) });
    pos = start + compressedSize;
  }
  return entries;
}

/** Decode an 8-bit RGBA PNG (no interlacing) for assertions. */
export function decodeTestPng(png: Uint8Array): RgbaImage {
  const view = new DataView(png.buffer, png.byteOffset, png.byteLength);
  let width = 0;
  let height = 0;
  const idat: Uint8Array[] = [];

  let pos = 8;
  while (pos < png.length) {
    const length = view.getUint32(pos);
    const type = new TextDecoder().decode(png.subarray(pos + 4, pos + 8));
    const body = png.subarray(pos + 8, pos + 8 + length);
    if (type === "IHDR") {
      width = view.getUint32(pos + 8);
      height = view.getUint32(pos + 12);
    } else if (type === "IDAT") {
      idat.push(body);
    }
    pos += 12 + length;
  }

  const joined = new Uint8Array(idat.reduce((n, c) => n + c.length, 0));
  let at = 0;
  for (const chunk of idat) {
    joined.set(chunk, at);
    at += chunk.length;
  }
  const raw = unzlibSync(joined);

  const stride = width * 4;
  const data = new Uint8Array(stride * height);
  for (let y = 0; y < height; y++) {
    const filter = raw[y * (stride + 1)];
    const line = raw.subarray(y * (stride + 1) + 1, (y + 1) * (stride + 1));
    for (let i = 0; i < stride; i++) {
      const a = i >= 4 ? data[y * stride + i - 4] : 0;
      const b = y > 0 ? data[(y - 1) * stride + i] : 0;
      const c = i >= 4 && y > 0 ? data[(y - 1) * stride + i - 4] : 0;
      let predicted = 0;
      if (filter === 1) predicted = a;
      else if (filter === 2) predicted = b;
      else if (filter === 3) predicted = (a + b) >>> 1;
      else if (filter === 4) predicted = paeth(a, b, c);
      data[y * stride + i] = (line[i] + predicted) & 0xff;
    }
  }
  return { width, height, data };
}

function paeth(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  return pb <= pc ? b : c;
}

/** Attributes of every element named `element` in an XML string. */
export function parseXmlElements(xml: string, element: string): Record<string, string>[] {
  const results: Record<string, string>[] = [];
  const elementRe = new RegExp(`<${element}\\b([^>]*?)/?>`, "g");
  for (const match of xml.matchAll(elementRe)) {
    const attrs: Record<string, string> = {};
    for (const attr of match[1].matchAll(/([\w:-]+)="([^"]*)"/g)) {
      attrs[attr[1]] = attr[2];
    }
    results.push(attrs);
  }
  return results;
}
