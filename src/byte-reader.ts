// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Endian-aware positioned reads over an immutable byte buffer.
 *
 * Every read is bounds-checked and throws {@link OutOfBoundsError} rather
 * than returning a short result.
 */

import { OutOfBoundsError } from "./errors.js";

export class ByteReader {
  readonly bytes: Uint8Array;
  readonly littleEndian: boolean;
  private readonly view: DataView;

  constructor(bytes: Uint8Array, littleEndian: boolean) {
    this.bytes = bytes;
    this.littleEndian = littleEndian;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get length(): number {
    return this.bytes.length;
  }

  /** Throw unless `length` bytes starting at `offset` lie inside the buffer. */
  check(offset: number, length: number): void {
    if (
      !Number.isSafeInteger(offset) ||
      !Number.isSafeInteger(length) ||
      offset < 0 ||
      length < 0 ||
      offset + length > this.bytes.length
    ) {
      throw new OutOfBoundsError(offset, length, this.bytes.length);
    }
  }

  /** Whether `length` bytes starting at `offset` lie inside the buffer. */
  fits(offset: number, length: number): boolean {
    return offset >= 0 && length >= 0 && offset + length <= this.bytes.length;
  }

  u8(offset: number): number {
    this.check(offset, 1);
    return this.view.getUint8(offset);
  }

  u16(offset: number): number {
    this.check(offset, 2);
    return this.view.getUint16(offset, this.littleEndian);
  }

  u32(offset: number): number {
    this.check(offset, 4);
    return this.view.getUint32(offset, this.littleEndian);
  }

  /**
   * Read an unsigned 64-bit integer as a number. Values beyond 2^53 cannot
   * address any buffer, so they are reported as out of bounds.
   */
  u64(offset: number): number {
    this.check(offset, 8);
    const first = this.view.getUint32(offset, this.littleEndian);
    const second = this.view.getUint32(offset + 4, this.littleEndian);
    const [lo, hi] = this.littleEndian ? [first, second] : [second, first];
    const value = hi * 0x1_0000_0000 + lo;
    if (!Number.isSafeInteger(value)) {
      throw new OutOfBoundsError(offset, 8, this.bytes.length);
    }
    return value;
  }

  i8(offset: number): number {
    this.check(offset, 1);
    return this.view.getInt8(offset);
  }

  i16(offset: number): number {
    this.check(offset, 2);
    return this.view.getInt16(offset, this.littleEndian);
  }

  i32(offset: number): number {
    this.check(offset, 4);
    return this.view.getInt32(offset, this.littleEndian);
  }

  f32(offset: number): number {
    this.check(offset, 4);
    return this.view.getFloat32(offset, this.littleEndian);
  }

  f64(offset: number): number {
    this.check(offset, 8);
    return this.view.getFloat64(offset, this.littleEndian);
  }

  /** Zero-copy view of `length` bytes at `offset`. */
  span(offset: number, length: number): Uint8Array {
    this.check(offset, length);
    return this.bytes.subarray(offset, offset + length);
  }
}
