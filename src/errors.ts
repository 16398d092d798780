// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Typed failures raised while reading a layered TIFF or producing the
 * Open Raster archive.
 *
 * Structural problems (offsets, counts, sizes) are always fatal for the
 * file being converted. Vendor-specific semantic oddities are reported as
 * {@link ConversionWarning}s instead and never reach this hierarchy.
 */

/** Discriminator shared by every {@link ConversionError}. */
export type ConversionErrorCode =
  | "OutOfBounds"
  | "MalformedIfd"
  | "MalformedLayerRecord"
  | "UnsupportedCompression"
  | "UnsupportedPhotometric"
  | "UnsupportedSampleFormat"
  | "CorruptImageData"
  | "WriteError";

/** Base class of every error thrown by this package. */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConversionError";
    this.code = code;
  }
}

/** A read of `length` bytes at `offset` would leave the buffer. */
export class OutOfBoundsError extends ConversionError {
  readonly offset: number;
  readonly length: number;
  readonly bufferLength: number;

  constructor(offset: number, length: number, bufferLength: number) {
    super(
      "OutOfBounds",
      `Cannot read ${length} byte(s) at offset ${offset}: buffer holds ${bufferLength} byte(s)`,
    );
    this.name = "OutOfBoundsError";
    this.offset = offset;
    this.length = length;
    this.bufferLength = bufferLength;
  }
}

/** Structural violation of a TIFF header or Image File Directory. */
export class MalformedIfdError extends ConversionError {
  /** Byte offset of the offending IFD, when one is known. */
  readonly ifdOffset?: number;

  constructor(message: string, ifdOffset?: number) {
    super("MalformedIfd", ifdOffset === undefined ? message : `${message} (IFD at offset ${ifdOffset})`);
    this.name = "MalformedIfdError";
    this.ifdOffset = ifdOffset;
  }
}

/** The private layer table, or one of its records, has an unexpected shape. */
export class MalformedLayerRecordError extends ConversionError {
  /** Index of the offending record in the layer table, if any. */
  readonly recordIndex?: number;

  constructor(message: string, recordIndex?: number) {
    super(
      "MalformedLayerRecord",
      recordIndex === undefined ? message : `Layer record ${recordIndex}: ${message}`,
    );
    this.name = "MalformedLayerRecordError";
    this.recordIndex = recordIndex;
  }
}

/**
 * A recognised-but-unimplemented variant. Carries the tag id and value so
 * support can be extended later.
 */
export abstract class UnsupportedVariantError extends ConversionError {
  readonly tagId: number;
  readonly value: number;

  constructor(
    code: ConversionErrorCode,
    tagId: number,
    value: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(code, `${message} (tag ${tagId} = ${value})`, options);
    this.tagId = tagId;
    this.value = value;
  }
}

export class UnsupportedCompressionError extends UnsupportedVariantError {
  constructor(tagId: number, value: number, options?: { cause?: unknown }) {
    super("UnsupportedCompression", tagId, value, `Unsupported compression ${value}`, options);
    this.name = "UnsupportedCompressionError";
  }
}

export class UnsupportedPhotometricError extends UnsupportedVariantError {
  constructor(tagId: number, value: number) {
    super("UnsupportedPhotometric", tagId, value, `Unsupported photometric interpretation ${value}`);
    this.name = "UnsupportedPhotometricError";
  }
}

/** Bit depth, sample format, planar configuration or predictor not handled. */
export class UnsupportedSampleFormatError extends UnsupportedVariantError {
  constructor(tagId: number, value: number, message: string) {
    super("UnsupportedSampleFormat", tagId, value, message);
    this.name = "UnsupportedSampleFormatError";
  }
}

/** A compressed strip or tile does not decode to the size its geometry needs. */
export class CorruptImageDataError extends ConversionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CorruptImageData", message, options);
    this.name = "CorruptImageDataError";
  }
}

/** Where an archive failure happened: the storage or a pixel encode. */
export type WriteErrorKind = "io" | "encode";

export class WriteError extends ConversionError {
  readonly kind: WriteErrorKind;

  constructor(kind: WriteErrorKind, message: string, options?: { cause?: unknown }) {
    super("WriteError", message, options);
    this.name = "WriteError";
    this.kind = kind;
  }
}

// ── Warnings ────────────────────────────────────────────────────────

/** Non-fatal findings recorded during a conversion. */
export type ConversionWarningCode = "UnknownBlendMode" | "UnknownTag" | "DuplicateTag";

export interface ConversionWarning {
  code: ConversionWarningCode;
  message: string;
}

/** Collects warnings and forwards each one to an optional listener. */
export class WarningLog {
  private readonly entries: ConversionWarning[] = [];
  private readonly listener?: (warning: ConversionWarning) => void;

  constructor(listener?: (warning: ConversionWarning) => void) {
    this.listener = listener;
  }

  add(code: ConversionWarningCode, message: string): void {
    const warning: ConversionWarning = { code, message };
    this.entries.push(warning);
    this.listener?.(warning);
  }

  /** Snapshot of the warnings recorded so far, in order. */
  list(): ConversionWarning[] {
    return [...this.entries];
  }
}
