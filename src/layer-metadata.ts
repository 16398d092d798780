// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Decoder for the private layer table stored on the root IFD.
 *
 * The table is a BYTE/UNDEFINED tag holding fixed-size records, one per
 * layer, in table order (first record = topmost layer):
 *
 *   0   u32  layer IFD offset
 *   4   i32  x offset on the canvas
 *   8   i32  y offset on the canvas
 *   12  u32  opacity, 16.16 fixed point
 *   16  u8   visible flag
 *   17  u8   blend code
 *   18  u16  reserved
 *   20  64B  UTF-8 name, NUL terminated
 *
 * Multi-byte fields follow the file's byte order.
 */

import { blendModeForCode, type BlendMode } from "./blend-modes.js";
import { ByteReader } from "./byte-reader.js";
import { MalformedLayerRecordError, type WarningLog } from "./errors.js";
import type { Ifd } from "./ifd-walker.js";
import { TAG_LAYER_TABLE, TIFF_TYPE_BYTE, TIFF_TYPE_UNDEFINED } from "./tiff-types.js";

export const LAYER_RECORD_SIZE = 84;
export const LAYER_NAME_OFFSET = 20;
export const LAYER_NAME_SIZE = 64;

/** 1.0 in the table's 16.16 fixed-point opacity. */
export const OPACITY_ONE = 0x10000;

/** Metadata of one layer, as recorded in the layer table. */
export interface LayerDescriptor {
  name: string;
  /** Offset of the IFD holding the layer's pixels; 0 for an added background layer. */
  ifdOffset: number;
  x: number;
  y: number;
  /** In [0, 1]. */
  opacity: number;
  visible: boolean;
  blendMode: BlendMode;
  /** Raw blend code from the record. */
  blendCode: number;
  /** Position in the layer table; 0 is the topmost layer. */
  zOrder: number;
}

export interface LayerTableOptions {
  /** Tag id of the layer table. Default: 50784. */
  layerTableTag?: number;
  /**
   * Vendor blend codes to recognise on top of the built-in ones. An entry
   * here overrides a built-in code.
   */
  blendCodes?: ReadonlyMap<number, BlendMode>;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode every record of the layer table on `ifd`, in table order.
 *
 * Unknown blend codes fall back to `normal` and are recorded on `warnings`.
 *
 * @throws MalformedLayerRecordError if the tag is missing, has the wrong
 *   type or size, or a record's name is not a valid terminated string.
 */
export function decodeLayerTable(
  ifd: Ifd,
  options: LayerTableOptions = {},
  warnings?: WarningLog,
): LayerDescriptor[] {
  const tag = options.layerTableTag ?? TAG_LAYER_TABLE;

  const entry = ifd.entry(tag);
  if (entry === undefined) {
    throw new MalformedLayerRecordError(`No layer table (tag ${tag}) on the root image`);
  }
  if (entry.type !== TIFF_TYPE_BYTE && entry.type !== TIFF_TYPE_UNDEFINED) {
    throw new MalformedLayerRecordError(`Layer table tag ${tag} has type ${entry.type}, expected BYTE or UNDEFINED`);
  }
  if (entry.count % LAYER_RECORD_SIZE !== 0) {
    throw new MalformedLayerRecordError(
      `Layer table holds ${entry.count} bytes, not a multiple of the ${LAYER_RECORD_SIZE}-byte record size`,
    );
  }

  const reader = new ByteReader(ifd.valueBytes(entry), ifd.file.littleEndian);
  const recordCount = entry.count / LAYER_RECORD_SIZE;

  const layers: LayerDescriptor[] = [];
  for (let i = 0; i < recordCount; i++) {
    layers.push(decodeLayerRecord(reader, i, warnings, options.blendCodes));
  }
  return layers;
}

/** Decode the record at position `index` of the table read by `reader`. */
export function decodeLayerRecord(
  reader: ByteReader,
  index: number,
  warnings?: WarningLog,
  blendCodes?: ReadonlyMap<number, BlendMode>,
): LayerDescriptor {
  const base = index * LAYER_RECORD_SIZE;

  const ifdOffset = reader.u32(base);
  const x = reader.i32(base + 4);
  const y = reader.i32(base + 8);
  const rawOpacity = reader.u32(base + 12);
  const visible = reader.u8(base + 16) !== 0;
  const blendCode = reader.u8(base + 17);
  const name = decodeName(reader.span(base + LAYER_NAME_OFFSET, LAYER_NAME_SIZE), index);

  let blendMode = blendModeForCode(blendCode, blendCodes);
  if (blendMode === undefined) {
    warnings?.add("UnknownBlendMode", `Layer ${index} ("${name}") has unknown blend code ${blendCode}; using normal`);
    blendMode = "normal";
  }

  return {
    name,
    ifdOffset,
    x,
    y,
    opacity: Math.min(rawOpacity / OPACITY_ONE, 1),
    visible,
    blendMode,
    blendCode,
    zOrder: index,
  };
}

/** Decode a NUL-terminated UTF-8 name field, trimming trailing padding. */
function decodeName(field: Uint8Array, index: number): string {
  const end = field.indexOf(0);
  if (end < 0) {
    throw new MalformedLayerRecordError(`name is not NUL-terminated within ${LAYER_NAME_SIZE} bytes`, index);
  }

  let name: string;
  try {
    name = utf8.decode(field.subarray(0, end));
  } catch (err) {
    throw new MalformedLayerRecordError(`name is not valid UTF-8 (${String(err)})`, index);
  }
  return name.replace(/[\0 ]+$/, "");
}
