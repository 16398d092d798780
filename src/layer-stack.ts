// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Assemble a {@link LayerStack} from a layered TIFF: canvas geometry and
 * resolution from the root IFD, layer records from the private table, one
 * decoded image per record, and the embedded thumbnail if there is one.
 * A solid background layer can be added below the file's layers.
 */

import type { BlendMode } from "./blend-modes.js";
import { type ConversionWarning, MalformedIfdError, WarningLog } from "./errors.js";
import { type Ifd, TiffFile } from "./ifd-walker.js";
import { decodeLayerTable, type LayerDescriptor } from "./layer-metadata.js";
import { checkImageSize, type DecodedImage, decodeImage } from "./pixel-decoder.js";
import {
  RESOLUTION_UNIT_CENTIMETER,
  RESOLUTION_UNIT_INCH,
  SUBFILE_REDUCED_IMAGE,
  TAG_IMAGE_LENGTH,
  TAG_IMAGE_WIDTH,
  TAG_LAYER_TABLE,
  TAG_NEW_SUBFILE_TYPE,
  TAG_RESOLUTION_UNIT,
  TAG_SOFTWARE,
  TAG_SUB_IFDS,
  TAG_X_RESOLUTION,
  TAG_Y_RESOLUTION,
} from "./tiff-types.js";

// ── Types ───────────────────────────────────────────────────────────

export interface StackLayer {
  descriptor: LayerDescriptor;
  image: DecodedImage;
}

/**
 * The decoded document. `layers` is in layer-table order: index 0 is the
 * topmost layer.
 */
export interface LayerStack {
  width: number;
  height: number;
  layers: StackLayer[];
  thumbnail?: DecodedImage;
  /** Pixels per inch. */
  xResolution?: number;
  yResolution?: number;
  /** Software tag of the root image, as written by the producing application. */
  software?: string;
}

export interface ReadOptions {
  /** Tag id of the private layer table. Default: 50784. */
  layerTableTag?: number;
  /** Vendor blend codes recognised on top of the built-in ones. */
  blendCodes?: ReadonlyMap<number, BlendMode>;
  /**
   * Add a solid layer of this colour, covering the canvas, below every
   * file layer. ARGB hex as stored in the producing
   * application's metadata, e.g. `"ffffffff"` (a leading `#` is allowed).
   */
  backgroundColor?: string;
  /** Called with each warning as it is recorded. */
  onWarning?: (warning: ConversionWarning) => void;
}

export interface ReadResult {
  stack: LayerStack;
  warnings: ConversionWarning[];
}

// ── Public API ──────────────────────────────────────────────────────

/** Name of the layer added for {@link ReadOptions.backgroundColor}. */
export const BACKGROUND_LAYER_NAME = "Background";

/**
 * Parse a layered TIFF into a layer stack.
 *
 * Every structural error propagates; nothing is returned for a file that
 * fails part way.
 *
 * @throws RangeError if `options.backgroundColor` is not 8 hex digits.
 */
export async function readLayerStack(bytes: Uint8Array, options: ReadOptions = {}): Promise<ReadResult> {
  const layerTableTag = options.layerTableTag ?? TAG_LAYER_TABLE;
  const background = options.backgroundColor === undefined ? undefined : parseArgb(options.backgroundColor);
  const warnings = new WarningLog(options.onWarning);

  const file = TiffFile.from(bytes);
  const root = file.rootIfd();
  reportDuplicates(root, warnings);

  const width = root.numbers(TAG_IMAGE_WIDTH)?.[0];
  const height = root.numbers(TAG_IMAGE_LENGTH)?.[0];
  if (width === undefined || height === undefined) {
    throw new MalformedIfdError("Root image is missing ImageWidth or ImageLength", root.offset);
  }
  // The merged image is composited at canvas size
  checkImageSize(width, height, root.offset);

  const descriptors = decodeLayerTable(root, { layerTableTag, blendCodes: options.blendCodes }, warnings);
  const layers: StackLayer[] = [];
  for (const descriptor of descriptors) {
    const ifd = file.readIfd(descriptor.ifdOffset);
    reportUnknownTags(ifd, warnings);
    reportDuplicates(ifd, warnings);
    layers.push({ descriptor, image: await decodeImage(ifd) });
  }
  if (background !== undefined) {
    layers.push(backgroundLayer(width, height, background, layers.length));
  }

  const thumbnailIfd = findThumbnailIfd(file, root);
  const stack: LayerStack = {
    width,
    height,
    layers,
    thumbnail: thumbnailIfd === undefined ? undefined : await decodeImage(thumbnailIfd),
    ...readResolution(root),
  };
  const software = root.ascii(TAG_SOFTWARE);
  if (software !== undefined) stack.software = software;

  return { stack, warnings: warnings.list() };
}

/** Whether NewSubfileType marks the IFD as a reduced-resolution copy. */
export function isReducedImage(ifd: Ifd): boolean {
  return (ifd.number(TAG_NEW_SUBFILE_TYPE, 0) & SUBFILE_REDUCED_IMAGE) !== 0;
}

/**
 * First reduced-resolution image in the root's next-IFD chain, then among
 * its SubIFDs.
 */
export function findThumbnailIfd(file: TiffFile, root: Ifd): Ifd | undefined {
  const chained = file.walkChain(root.offset).slice(1);
  const subIfds = (root.numbers(TAG_SUB_IFDS) ?? []).map((offset) => file.readIfd(offset));
  return [...chained, ...subIfds].find(isReducedImage);
}

/** X/Y resolution of `ifd` converted to pixels per inch, when declared. */
export function readResolution(ifd: Ifd): { xResolution?: number; yResolution?: number } {
  const unit = ifd.number(TAG_RESOLUTION_UNIT, RESOLUTION_UNIT_INCH);
  const toPpi = (value: number | undefined): number | undefined => {
    if (value === undefined || !(value > 0)) return undefined;
    if (unit === RESOLUTION_UNIT_INCH) return value;
    if (unit === RESOLUTION_UNIT_CENTIMETER) return value * 2.54;
    return undefined;
  };

  const xResolution = toPpi(ifd.rational(TAG_X_RESOLUTION));
  const yResolution = toPpi(ifd.rational(TAG_Y_RESOLUTION));
  return xResolution === undefined || yResolution === undefined ? {} : { xResolution, yResolution };
}

// ── Background ──────────────────────────────────────────────────────

/**
 * Parse an ARGB hex colour into RGBA bytes.
 *
 * @throws RangeError unless `hex` is 8 hex digits, optionally after `#`.
 */
export function parseArgb(hex: string): [number, number, number, number] {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (match === null) {
    throw new RangeError(`Background colour must be 8 ARGB hex digits, got "${hex}"`);
  }
  const [a, r, g, b] = match.slice(1).map((pair) => parseInt(pair, 16));
  return [r, g, b, a];
}

/** Solid canvas-sized layer at stack position `zOrder`. */
function backgroundLayer(
  width: number,
  height: number,
  rgba: [number, number, number, number],
  zOrder: number,
): StackLayer {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) data.set(rgba, i);

  return {
    descriptor: {
      name: BACKGROUND_LAYER_NAME,
      // Not read from the file
      ifdOffset: 0,
      x: 0,
      y: 0,
      opacity: 1,
      visible: true,
      blendMode: "normal",
      blendCode: 0,
      zOrder,
    },
    image: { width, height, data, hasAlpha: rgba[3] !== 255 },
  };
}

// ── Diagnostics ─────────────────────────────────────────────────────

function reportUnknownTags(ifd: Ifd, warnings: WarningLog): void {
  const unknown = ifd.unknownTagIds();
  if (unknown.length > 0) {
    warnings.add("UnknownTag", `Layer IFD at offset ${ifd.offset} has unknown tags ${unknown.join(", ")}`);
  }
}

function reportDuplicates(ifd: Ifd, warnings: WarningLog): void {
  for (const id of ifd.duplicateTagIds()) {
    warnings.add("DuplicateTag", `IFD at offset ${ifd.offset} repeats tag ${id}; the first entry is used`);
  }
}
