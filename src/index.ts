// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * tiff-layers-ora
 *
 * Extract the layers a drawing application stores inside a TIFF and
 * re-encode them losslessly as an Open Raster (ORA) archive.
 *
 * @example
 * ```ts
 * import { convertFile } from "tiff-layers-ora";
 *
 * const { outputPath, warnings } = await convertFile("sketch.tif");
 * for (const w of warnings) console.warn(`${w.code}: ${w.message}`);
 * ```
 */

// Conversion
export {
  convert,
  convertFile,
  defaultOutputPath,
  type ConvertOptions,
  type ConvertResult,
  type ConvertFileResult,
} from "./convert.js";

// Reading
export {
  readLayerStack,
  parseArgb,
  BACKGROUND_LAYER_NAME,
  findThumbnailIfd,
  isReducedImage,
  readResolution,
  type LayerStack,
  type StackLayer,
  type ReadOptions,
  type ReadResult,
} from "./layer-stack.js";
export { TiffFile, Ifd, parseHeader, MAX_CHAIN_LENGTH, type TagEntry, type TagValue, type TiffHeader } from "./ifd-walker.js";
export { ByteReader } from "./byte-reader.js";
export {
  decodeLayerTable,
  decodeLayerRecord,
  LAYER_RECORD_SIZE,
  OPACITY_ONE,
  type LayerDescriptor,
  type LayerTableOptions,
} from "./layer-metadata.js";
export { decodeImage, checkImageSize, MAX_IMAGE_PIXELS, type DecodedImage } from "./pixel-decoder.js";
export {
  getBlockDecoder,
  SUPPORTED_COMPRESSIONS,
  type BlockDecoder,
  type BlockDirectory,
} from "./compression.js";
export {
  DEFAULT_BLEND_CODES,
  blendModeForCode,
  compositeOp,
  ORA_COMPOSITE_OPS,
  type BlendMode,
} from "./blend-modes.js";

// Writing
export { encodeOra, writeStack, ORA_MIMETYPE, type OraWriteOptions } from "./ora-writer.js";
export { buildStackXml, formatOpacity, layerSrc, ORA_VERSION } from "./stack-xml.js";
export { encodePng, encodePngAsync, compressDeflate, compressDeflateAsync, type DeflateLevel } from "./png-encoder.js";
export { flattenLayers, getBlendFunction, Canvas, type BlendFunction } from "./composite.js";

// Errors and warnings
export {
  ConversionError,
  OutOfBoundsError,
  MalformedIfdError,
  MalformedLayerRecordError,
  UnsupportedVariantError,
  UnsupportedCompressionError,
  UnsupportedPhotometricError,
  UnsupportedSampleFormatError,
  CorruptImageDataError,
  WriteError,
  WarningLog,
  type ConversionErrorCode,
  type ConversionWarning,
  type ConversionWarningCode,
  type WriteErrorKind,
} from "./errors.js";
