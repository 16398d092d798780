// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Block decompression for TIFF strips and tiles, delegated to geotiff's
 * decoder registry.
 *
 * geotiff picks a decoder from the Compression value of a file directory
 * and reverses the horizontal predictor after decompressing. The
 * directories handed to it here are built from our own IFD walker, so
 * layer IFDs reached only through the layer table decode the same way as
 * the root image.
 */

import { type BaseDecoder, getDecoder } from "geotiff";
import { CorruptImageDataError, UnsupportedCompressionError } from "./errors.js";
import {
  COMPRESSION_ADOBE_DEFLATE,
  COMPRESSION_DEFLATE,
  COMPRESSION_LZW,
  COMPRESSION_NONE,
  COMPRESSION_PACKBITS,
  TAG_COMPRESSION,
} from "./tiff-types.js";

/**
 * The file directory fields geotiff's decoders read, named as geotiff
 * names them. Strips carry `StripOffsets` and `RowsPerStrip`; tiles carry
 * `TileWidth` and `TileLength`.
 */
export interface BlockDirectory {
  Compression: number;
  Predictor: number;
  /** One entry per sample. */
  BitsPerSample: number[];
  PlanarConfiguration: number;
  ImageWidth: number;
  ImageLength: number;
  StripOffsets?: number[];
  RowsPerStrip?: number;
  TileWidth?: number;
  TileLength?: number;
}

/**
 * Decompress (and un-predict) one block. `rows` is the number of rows a
 * strip actually stores, which is fewer than `RowsPerStrip` for the last
 * strip of most images; tiles ignore it.
 */
export type BlockDecoder = (data: Uint8Array, rows?: number) => Promise<Uint8Array>;

/** Compression values accepted in layer images. */
export const SUPPORTED_COMPRESSIONS: ReadonlySet<number> = new Set([
  COMPRESSION_NONE,
  COMPRESSION_LZW,
  COMPRESSION_DEFLATE,
  COMPRESSION_ADOBE_DEFLATE,
  COMPRESSION_PACKBITS,
]);

/**
 * Resolve the block decoder for `directory`.
 *
 * @throws UnsupportedCompressionError for compressions outside
 *   {@link SUPPORTED_COMPRESSIONS}, or if geotiff cannot provide the decoder.
 */
export async function getBlockDecoder(directory: BlockDirectory): Promise<BlockDecoder> {
  const compression = directory.Compression;
  if (!SUPPORTED_COMPRESSIONS.has(compression)) {
    throw new UnsupportedCompressionError(TAG_COMPRESSION, compression);
  }

  let decoder: BaseDecoder;
  try {
    decoder = await getDecoder(directory);
  } catch (err) {
    throw new UnsupportedCompressionError(TAG_COMPRESSION, compression, { cause: err });
  }

  const stripped = directory.StripOffsets !== undefined;

  return async (data, rows) => {
    // Raw and predicted blocks are modified in place; decode a private copy
    const buffer = data.slice().buffer;
    const blockDirectory = stripped && rows !== undefined ? { ...directory, RowsPerStrip: rows } : directory;

    let decoded: unknown;
    try {
      decoded = await decoder.decode(blockDirectory, buffer);
    } catch (err) {
      throw new CorruptImageDataError(`Compression ${compression} block cannot be decoded`, { cause: err });
    }
    if (!(decoded instanceof ArrayBuffer)) {
      throw new CorruptImageDataError(`Compression ${compression} decoder returned no data`);
    }
    return new Uint8Array(decoded);
  };
}
