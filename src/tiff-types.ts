// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * TIFF constants: field types, tag numbers, compression and photometric
 * codes, and the header layouts of classic TIFF and BigTIFF.
 */

// ── Field types ─────────────────────────────────────────────────────

export const TIFF_TYPE_BYTE = 1;
export const TIFF_TYPE_ASCII = 2;
export const TIFF_TYPE_SHORT = 3;
export const TIFF_TYPE_LONG = 4;
export const TIFF_TYPE_RATIONAL = 5; // two LONGs
export const TIFF_TYPE_SBYTE = 6;
export const TIFF_TYPE_UNDEFINED = 7;
export const TIFF_TYPE_SSHORT = 8;
export const TIFF_TYPE_SLONG = 9;
export const TIFF_TYPE_SRATIONAL = 10;
export const TIFF_TYPE_FLOAT = 11;
export const TIFF_TYPE_DOUBLE = 12;
export const TIFF_TYPE_IFD = 13;
export const TIFF_TYPE_LONG8 = 16; // BigTIFF only
export const TIFF_TYPE_SLONG8 = 17;
export const TIFF_TYPE_IFD8 = 18;

const TYPE_SIZES: Readonly<Record<number, number>> = {
  [TIFF_TYPE_BYTE]: 1,
  [TIFF_TYPE_ASCII]: 1,
  [TIFF_TYPE_SHORT]: 2,
  [TIFF_TYPE_LONG]: 4,
  [TIFF_TYPE_RATIONAL]: 8,
  [TIFF_TYPE_SBYTE]: 1,
  [TIFF_TYPE_UNDEFINED]: 1,
  [TIFF_TYPE_SSHORT]: 2,
  [TIFF_TYPE_SLONG]: 4,
  [TIFF_TYPE_SRATIONAL]: 8,
  [TIFF_TYPE_FLOAT]: 4,
  [TIFF_TYPE_DOUBLE]: 8,
  [TIFF_TYPE_IFD]: 4,
  [TIFF_TYPE_LONG8]: 8,
  [TIFF_TYPE_SLONG8]: 8,
  [TIFF_TYPE_IFD8]: 8,
};

/** Whether the field type is one the reader knows how to interpret. */
export function isKnownType(type: number): boolean {
  return TYPE_SIZES[type] !== undefined;
}

/**
 * Byte size of one element of a field type. Unrecognised types are kept as
 * opaque single bytes.
 */
export function typeSize(type: number): number {
  return TYPE_SIZES[type] ?? 1;
}

// ── Tags ────────────────────────────────────────────────────────────

export const TAG_NEW_SUBFILE_TYPE = 254;
export const TAG_SUBFILE_TYPE = 255;
export const TAG_IMAGE_WIDTH = 256;
export const TAG_IMAGE_LENGTH = 257;
export const TAG_BITS_PER_SAMPLE = 258;
export const TAG_COMPRESSION = 259;
export const TAG_PHOTOMETRIC = 262;
export const TAG_FILL_ORDER = 266;
export const TAG_DOCUMENT_NAME = 269;
export const TAG_IMAGE_DESCRIPTION = 270;
export const TAG_MAKE = 271;
export const TAG_MODEL = 272;
export const TAG_STRIP_OFFSETS = 273;
export const TAG_ORIENTATION = 274;
export const TAG_SAMPLES_PER_PIXEL = 277;
export const TAG_ROWS_PER_STRIP = 278;
export const TAG_STRIP_BYTE_COUNTS = 279;
export const TAG_X_RESOLUTION = 282;
export const TAG_Y_RESOLUTION = 283;
export const TAG_PLANAR_CONFIGURATION = 284;
export const TAG_PAGE_NAME = 285;
export const TAG_X_POSITION = 286;
export const TAG_Y_POSITION = 287;
export const TAG_RESOLUTION_UNIT = 296;
export const TAG_PAGE_NUMBER = 297;
export const TAG_SOFTWARE = 305;
export const TAG_DATE_TIME = 306;
export const TAG_ARTIST = 315;
export const TAG_HOST_COMPUTER = 316;
export const TAG_PREDICTOR = 317;
export const TAG_COLOR_MAP = 320;
export const TAG_TILE_WIDTH = 322;
export const TAG_TILE_LENGTH = 323;
export const TAG_TILE_OFFSETS = 324;
export const TAG_TILE_BYTE_COUNTS = 325;
export const TAG_SUB_IFDS = 330;
export const TAG_EXTRA_SAMPLES = 338;
export const TAG_SAMPLE_FORMAT = 339;
export const TAG_XMP = 700;
export const TAG_COPYRIGHT = 33432;
export const TAG_ICC_PROFILE = 34675;

/** Private tag holding the fixed-size layer records. */
export const TAG_LAYER_TABLE = 50784;

/** Tags the reader understands; anything else is reported once per IFD. */
export const KNOWN_TAGS: ReadonlySet<number> = new Set([
  TAG_NEW_SUBFILE_TYPE,
  TAG_SUBFILE_TYPE,
  TAG_IMAGE_WIDTH,
  TAG_IMAGE_LENGTH,
  TAG_BITS_PER_SAMPLE,
  TAG_COMPRESSION,
  TAG_PHOTOMETRIC,
  TAG_FILL_ORDER,
  TAG_DOCUMENT_NAME,
  TAG_IMAGE_DESCRIPTION,
  TAG_MAKE,
  TAG_MODEL,
  TAG_STRIP_OFFSETS,
  TAG_ORIENTATION,
  TAG_SAMPLES_PER_PIXEL,
  TAG_ROWS_PER_STRIP,
  TAG_STRIP_BYTE_COUNTS,
  TAG_X_RESOLUTION,
  TAG_Y_RESOLUTION,
  TAG_PLANAR_CONFIGURATION,
  TAG_PAGE_NAME,
  TAG_X_POSITION,
  TAG_Y_POSITION,
  TAG_RESOLUTION_UNIT,
  TAG_PAGE_NUMBER,
  TAG_SOFTWARE,
  TAG_DATE_TIME,
  TAG_ARTIST,
  TAG_HOST_COMPUTER,
  TAG_PREDICTOR,
  TAG_COLOR_MAP,
  TAG_TILE_WIDTH,
  TAG_TILE_LENGTH,
  TAG_TILE_OFFSETS,
  TAG_TILE_BYTE_COUNTS,
  TAG_SUB_IFDS,
  TAG_EXTRA_SAMPLES,
  TAG_SAMPLE_FORMAT,
  TAG_XMP,
  TAG_COPYRIGHT,
  TAG_ICC_PROFILE,
  TAG_LAYER_TABLE,
]);

// ── Field values ────────────────────────────────────────────────────

export const COMPRESSION_NONE = 1;
export const COMPRESSION_LZW = 5;
export const COMPRESSION_DEFLATE = 8;
export const COMPRESSION_PACKBITS = 32773;
export const COMPRESSION_ADOBE_DEFLATE = 32946;

export const PHOTOMETRIC_WHITE_IS_ZERO = 0;
export const PHOTOMETRIC_BLACK_IS_ZERO = 1;
export const PHOTOMETRIC_RGB = 2;
export const PHOTOMETRIC_PALETTE = 3;

export const PREDICTOR_NONE = 1;
export const PREDICTOR_HORIZONTAL = 2;

export const PLANAR_CHUNKY = 1;

export const SAMPLE_FORMAT_UINT = 1;

export const EXTRA_SAMPLE_UNSPECIFIED = 0;
export const EXTRA_SAMPLE_ASSOCIATED_ALPHA = 1;
export const EXTRA_SAMPLE_UNASSOCIATED_ALPHA = 2;

/** NewSubfileType bit marking a reduced-resolution copy (thumbnail). */
export const SUBFILE_REDUCED_IMAGE = 1;

export const RESOLUTION_UNIT_INCH = 2;
export const RESOLUTION_UNIT_CENTIMETER = 3;

// ── Header layouts ──────────────────────────────────────────────────

export const BYTE_ORDER_LITTLE = 0x4949; // "II"
export const BYTE_ORDER_BIG = 0x4d4d; // "MM"
export const MAGIC_CLASSIC = 42;
export const MAGIC_BIGTIFF = 43;

/** Format-dependent sizes of classic TIFF vs BigTIFF directories. */
export interface TiffFormat {
  readonly bigTiff: boolean;
  readonly headerSize: number;
  /** Bytes used by the IFD entry count. */
  readonly countSize: number;
  /** 12 for classic, 20 for BigTIFF. */
  readonly entrySize: number;
  /** Size of offsets, entry counts and the next-IFD pointer. */
  readonly offsetSize: number;
  /** Max bytes that fit in an entry's value/offset field. */
  readonly inlineCapacity: number;
}

export const CLASSIC_FORMAT: TiffFormat = {
  bigTiff: false,
  headerSize: 8,
  countSize: 2,
  entrySize: 12,
  offsetSize: 4,
  inlineCapacity: 4,
};

export const BIGTIFF_FORMAT: TiffFormat = {
  bigTiff: true,
  headerSize: 16,
  countSize: 8,
  entrySize: 20,
  offsetSize: 8,
  inlineCapacity: 8,
};
