// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * IFD walker: parses the TIFF header and Image File Directories.
 *
 * A directory can be reached two ways: by following the standard
 * next-IFD pointers from the header, or by jumping straight to an offset
 * supplied by the caller (layer IFDs are only referenced from the private
 * layer table). Both go through {@link TiffFile.readIfd}; the walker knows
 * nothing about vendor tags.
 *
 * Offsets are kept as plain integers and only dereferenced on request, so
 * cyclic or backward references cannot cause unbounded recursion.
 */

import { ByteReader } from "./byte-reader.js";
import { MalformedIfdError, OutOfBoundsError } from "./errors.js";
import {
  BIGTIFF_FORMAT,
  BYTE_ORDER_BIG,
  BYTE_ORDER_LITTLE,
  CLASSIC_FORMAT,
  KNOWN_TAGS,
  MAGIC_BIGTIFF,
  MAGIC_CLASSIC,
  TIFF_TYPE_ASCII,
  TIFF_TYPE_BYTE,
  TIFF_TYPE_DOUBLE,
  TIFF_TYPE_FLOAT,
  TIFF_TYPE_IFD,
  TIFF_TYPE_IFD8,
  TIFF_TYPE_LONG,
  TIFF_TYPE_LONG8,
  TIFF_TYPE_RATIONAL,
  TIFF_TYPE_SBYTE,
  TIFF_TYPE_SHORT,
  TIFF_TYPE_SLONG,
  TIFF_TYPE_SLONG8,
  TIFF_TYPE_SRATIONAL,
  TIFF_TYPE_SSHORT,
  TIFF_TYPE_UNDEFINED,
  isKnownType,
  typeSize,
  type TiffFormat,
} from "./tiff-types.js";

/** Maximum number of directories followed along one next-IFD chain. */
export const MAX_CHAIN_LENGTH = 1024;

// ── Types ───────────────────────────────────────────────────────────

/**
 * Where a tag's value lives. Decided once when the entry is read, from
 * `count * typeSize <= inlineCapacity`.
 */
export type TagValue =
  | { kind: "inline"; bytes: Uint8Array }
  | { kind: "offset"; offset: number; byteLength: number };

/** One entry of an IFD's tag table. */
export interface TagEntry {
  id: number;
  type: number;
  count: number;
  value: TagValue;
}

/** Parsed TIFF header. */
export interface TiffHeader {
  littleEndian: boolean;
  format: TiffFormat;
  firstIfdOffset: number;
}

// ── TiffFile ────────────────────────────────────────────────────────

/**
 * A TIFF held entirely in memory. Owns the byte buffer and the byte order;
 * every directory read from it validates offsets against the buffer.
 */
export class TiffFile {
  readonly reader: ByteReader;
  readonly header: TiffHeader;

  private constructor(reader: ByteReader, header: TiffHeader) {
    this.reader = reader;
    this.header = header;
  }

  /** Parse the header of `bytes` and wrap it for directory reads. */
  static from(bytes: Uint8Array): TiffFile {
    const header = parseHeader(bytes);
    return new TiffFile(new ByteReader(bytes, header.littleEndian), header);
  }

  get littleEndian(): boolean {
    return this.header.littleEndian;
  }

  get bigTiff(): boolean {
    return this.header.format.bigTiff;
  }

  get byteLength(): number {
    return this.reader.length;
  }

  /**
   * Parse the directory at `offset`.
   *
   * @throws OutOfBoundsError if the entry count itself cannot be read.
   * @throws MalformedIfdError if the entry table runs past the buffer or an
   *   entry's value offset points outside it.
   */
  readIfd(offset: number): Ifd {
    const fmt = this.header.format;
    const reader = this.reader;

    const entryCount = fmt.bigTiff ? reader.u64(offset) : reader.u16(offset);
    const tableEnd = offset + fmt.countSize + entryCount * fmt.entrySize;
    if (!reader.fits(offset, tableEnd - offset + fmt.offsetSize)) {
      throw new MalformedIfdError(
        `Entry count ${entryCount} runs past the end of the ${reader.length}-byte buffer`,
        offset,
      );
    }

    const entries: TagEntry[] = [];
    let pos = offset + fmt.countSize;
    for (let i = 0; i < entryCount; i++) {
      entries.push(readEntry(reader, pos, fmt, offset));
      pos += fmt.entrySize;
    }

    const nextIfdOffset = fmt.bigTiff ? reader.u64(pos) : reader.u32(pos);
    return new Ifd(this, offset, entries, nextIfdOffset);
  }

  /**
   * Follow next-IFD pointers starting at `start` (the header's first IFD by
   * default) and return every directory in chain order.
   */
  walkChain(start: number = this.header.firstIfdOffset): Ifd[] {
    const ifds: Ifd[] = [];
    const seen = new Set<number>();

    let current = start;
    while (current !== 0) {
      if (seen.has(current)) {
        throw new MalformedIfdError("Circular next-IFD reference", current);
      }
      if (ifds.length >= MAX_CHAIN_LENGTH) {
        throw new MalformedIfdError(`IFD chain exceeds ${MAX_CHAIN_LENGTH} directories`, current);
      }
      seen.add(current);

      const ifd = this.readIfd(current);
      ifds.push(ifd);
      current = ifd.nextIfdOffset;
    }

    return ifds;
  }

  /** The first directory of the main chain (the composite image). */
  rootIfd(): Ifd {
    if (this.header.firstIfdOffset === 0) {
      throw new MalformedIfdError("TIFF header declares no image directory");
    }
    return this.readIfd(this.header.firstIfdOffset);
  }
}

/**
 * Parse a classic or BigTIFF header.
 *
 * @throws OutOfBoundsError if the buffer is shorter than the header.
 * @throws MalformedIfdError on a bad byte order mark or magic number.
 */
export function parseHeader(bytes: Uint8Array): TiffHeader {
  if (bytes.length < CLASSIC_FORMAT.headerSize) {
    throw new OutOfBoundsError(0, CLASSIC_FORMAT.headerSize, bytes.length);
  }

  const byteOrder = (bytes[0] << 8) | bytes[1];
  if (byteOrder !== BYTE_ORDER_LITTLE && byteOrder !== BYTE_ORDER_BIG) {
    throw new MalformedIfdError("Not a TIFF file: bad byte order mark");
  }
  const littleEndian = byteOrder === BYTE_ORDER_LITTLE;
  const reader = new ByteReader(bytes, littleEndian);

  const magic = reader.u16(2);
  if (magic === MAGIC_CLASSIC) {
    return { littleEndian, format: CLASSIC_FORMAT, firstIfdOffset: reader.u32(4) };
  }
  if (magic === MAGIC_BIGTIFF) {
    const offsetSize = reader.u16(4);
    if (offsetSize !== 8) {
      throw new MalformedIfdError(`Unexpected BigTIFF offset size ${offsetSize}`);
    }
    return { littleEndian, format: BIGTIFF_FORMAT, firstIfdOffset: reader.u64(8) };
  }
  throw new MalformedIfdError(`Not a TIFF file: bad magic number ${magic}`);
}

/** Read one tag entry and resolve where its value lives. */
function readEntry(reader: ByteReader, pos: number, fmt: TiffFormat, ifdOffset: number): TagEntry {
  const id = reader.u16(pos);
  const type = reader.u16(pos + 2);
  const count = fmt.bigTiff ? reader.u64(pos + 4) : reader.u32(pos + 4);
  const valueField = pos + 4 + fmt.offsetSize;

  const byteLength = count * typeSize(type);
  if (byteLength <= fmt.inlineCapacity) {
    return { id, type, count, value: { kind: "inline", bytes: reader.span(valueField, byteLength) } };
  }

  const offset = fmt.bigTiff ? reader.u64(valueField) : reader.u32(valueField);
  if (!reader.fits(offset, byteLength)) {
    throw new MalformedIfdError(
      `Tag ${id} value (${byteLength} bytes at offset ${offset}) lies outside the buffer`,
      ifdOffset,
    );
  }
  return { id, type, count, value: { kind: "offset", offset, byteLength } };
}

// ── Ifd ─────────────────────────────────────────────────────────────

/**
 * One Image File Directory. Entries are kept in file order; lookups do not
 * assume the table is sorted. When a tag id repeats, the first entry wins.
 */
export class Ifd {
  readonly file: TiffFile;
  /** Byte offset of this directory (its identity). */
  readonly offset: number;
  readonly entries: readonly TagEntry[];
  /** Offset of the next directory in the chain, 0 if none. */
  readonly nextIfdOffset: number;
  private readonly byId = new Map<number, TagEntry>();
  private readonly duplicates: number[] = [];

  constructor(file: TiffFile, offset: number, entries: TagEntry[], nextIfdOffset: number) {
    this.file = file;
    this.offset = offset;
    this.entries = entries;
    this.nextIfdOffset = nextIfdOffset;
    for (const entry of entries) {
      if (this.byId.has(entry.id)) {
        this.duplicates.push(entry.id);
      } else {
        this.byId.set(entry.id, entry);
      }
    }
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }

  entry(id: number): TagEntry | undefined {
    return this.byId.get(id);
  }

  /** Raw value bytes of a tag, read from the buffer on demand. */
  bytes(id: number): Uint8Array | undefined {
    const entry = this.byId.get(id);
    return entry === undefined ? undefined : this.valueBytes(entry);
  }

  valueBytes(entry: TagEntry): Uint8Array {
    if (entry.value.kind === "inline") return entry.value.bytes;
    return this.file.reader.span(entry.value.offset, entry.value.byteLength);
  }

  /**
   * Numeric values of a tag. Rationals become `numerator / denominator`.
   * Returns undefined when the tag is absent.
   *
   * @throws MalformedIfdError if the tag holds ASCII, UNDEFINED or an
   *   unknown field type.
   */
  numbers(id: number): number[] | undefined {
    const entry = this.byId.get(id);
    if (entry === undefined) return undefined;

    const bytes = this.valueBytes(entry);
    const source = new ByteReader(bytes, this.file.littleEndian);
    const size = typeSize(entry.type);

    const values: number[] = [];
    for (let i = 0; i < entry.count; i++) {
      values.push(readNumber(source, i * size, entry, this.offset));
    }
    return values;
  }

  /** First numeric value of a tag, or `fallback` when absent or empty. */
  number(id: number, fallback: number): number {
    const values = this.numbers(id);
    return values !== undefined && values.length > 0 ? values[0] : fallback;
  }

  /** First value of a RATIONAL tag as a float, or undefined when absent. */
  rational(id: number): number | undefined {
    const entry = this.byId.get(id);
    if (entry === undefined || entry.count === 0) return undefined;
    if (entry.type !== TIFF_TYPE_RATIONAL && entry.type !== TIFF_TYPE_SRATIONAL) {
      throw new MalformedIfdError(`Tag ${id} is not a rational (type ${entry.type})`, this.offset);
    }
    const values = this.numbers(id);
    return values === undefined ? undefined : values[0];
  }

  /** ASCII value without its terminating NUL, or undefined when absent. */
  ascii(id: number): string | undefined {
    const entry = this.byId.get(id);
    if (entry === undefined) return undefined;
    if (entry.type !== TIFF_TYPE_ASCII) {
      throw new MalformedIfdError(`Tag ${id} is not ASCII (type ${entry.type})`, this.offset);
    }
    const bytes = this.valueBytes(entry);
    const end = bytes.indexOf(0);
    return new TextDecoder("latin1").decode(end >= 0 ? bytes.subarray(0, end) : bytes);
  }

  /** Tag ids this reader does not recognise, in table order. */
  unknownTagIds(): number[] {
    return this.entries.filter((e) => !KNOWN_TAGS.has(e.id) || !isKnownType(e.type)).map((e) => e.id);
  }

  /** Tag ids that appeared more than once; later copies are ignored. */
  duplicateTagIds(): number[] {
    return [...this.duplicates];
  }
}

/** Decode one numeric element of `entry` at `pos`. */
function readNumber(reader: ByteReader, pos: number, entry: TagEntry, ifdOffset: number): number {
  switch (entry.type) {
    case TIFF_TYPE_BYTE:
      return reader.u8(pos);
    case TIFF_TYPE_SBYTE:
      return reader.i8(pos);
    case TIFF_TYPE_SHORT:
      return reader.u16(pos);
    case TIFF_TYPE_SSHORT:
      return reader.i16(pos);
    case TIFF_TYPE_LONG:
    case TIFF_TYPE_IFD:
      return reader.u32(pos);
    case TIFF_TYPE_SLONG:
      return reader.i32(pos);
    case TIFF_TYPE_LONG8:
    case TIFF_TYPE_IFD8:
      return reader.u64(pos);
    case TIFF_TYPE_SLONG8: {
      const lo = reader.littleEndian ? reader.u32(pos) : reader.u32(pos + 4);
      const hi = reader.littleEndian ? reader.i32(pos + 4) : reader.i32(pos);
      return hi * 0x1_0000_0000 + lo;
    }
    case TIFF_TYPE_RATIONAL: {
      const den = reader.u32(pos + 4);
      return den === 0 ? 0 : reader.u32(pos) / den;
    }
    case TIFF_TYPE_SRATIONAL: {
      const den = reader.i32(pos + 4);
      return den === 0 ? 0 : reader.i32(pos) / den;
    }
    case TIFF_TYPE_FLOAT:
      return reader.f32(pos);
    case TIFF_TYPE_DOUBLE:
      return reader.f64(pos);
    case TIFF_TYPE_UNDEFINED:
    default:
      throw new MalformedIfdError(`Tag ${entry.id} has non-numeric type ${entry.type}`, ifdOffset);
  }
}
