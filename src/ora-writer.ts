// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Open Raster writer.
 *
 * Packs a LayerStack into an ORA archive: a stored `mimetype` entry first,
 * then `stack.xml`, one PNG per layer, the merged image and a thumbnail.
 * Layer PNGs are encoded with bounded concurrency on fflate's async
 * deflate; results are collected by stack position so the archive layout
 * never depends on completion order.
 *
 * @example
 * ```ts
 * import { readLayerStack, writeStack } from "tiff-layers-ora";
 *
 * const { stack } = await readLayerStack(bytes);
 * await writeStack(stack, "drawing.ora");
 * ```
 */

import { randomUUID } from "node:crypto"
import { rename, rm, writeFile } from "node:fs/promises"
import { strToU8, zipSync, type Zippable } from "fflate"

import { flattenLayers } from "./composite.js"
import { ConversionError, WriteError } from "./errors.js"
import type { LayerStack } from "./layer-stack.js"
import type { DecodedImage } from "./pixel-decoder.js"
import { type DeflateLevel, encodePng, encodePngAsync, validateImage } from "./png-encoder.js"
import { buildStackXml, layerSrc } from "./stack-xml.js"
import { fitWithin, resizeNearest } from "./utils.js"

export const ORA_MIMETYPE = "image/openraster"

/** Options for the ORA writer. */
export interface OraWriteOptions {
  /**
   * Maximum number of layer PNGs encoded at once. Must be a positive
   * integer.
   * Default: 4.
   */
  concurrency?: number

  /**
   * Deflate level for PNG data and stack.xml (0-9).
   * Default: 6.
   */
  compressionLevel?: DeflateLevel

  /**
   * Longest side of Thumbnails/thumbnail.png. Larger sources are shrunk
   * with nearest-neighbour sampling.
   * Default: 256.
   */
  thumbnailSize?: number
}

/**
 * Encode `stack` as an ORA archive.
 *
 * @throws RangeError if `concurrency` is not a positive integer.
 * @throws WriteError (`encode`) if any layer, the merged image or the
 *   thumbnail cannot be encoded.
 */
export async function encodeOra(
  stack: LayerStack,
  options: OraWriteOptions = {},
): Promise<Uint8Array> {
  const concurrency = options.concurrency ?? 4
  const level = options.compressionLevel ?? 6
  const thumbnailSize = options.thumbnailSize ?? 256

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`)
  }

  // Fail before any encoding work if a layer is unusable
  for (const [index, { image }] of stack.layers.entries()) {
    validateLayer(image, index)
  }

  let merged: DecodedImage
  try {
    merged = flattenLayers(stack)
  } catch (err) {
    throw new WriteError("encode", `Cannot composite a ${stack.width}x${stack.height} merged image`, { cause: err })
  }
  const thumbnailSource = stack.thumbnail ?? merged
  const [thumbWidth, thumbHeight] = fitWithin(
    thumbnailSource.width,
    thumbnailSource.height,
    thumbnailSize,
  )

  // Encode layers with bounded concurrency
  const total = stack.layers.length
  const layerPngs: Uint8Array[] = new Array(total)
  const effectiveConcurrency = Math.min(concurrency, Math.max(1, total))

  for (let start = 0; start < total; start += effectiveConcurrency) {
    const end = Math.min(start + effectiveConcurrency, total)
    const batch = []
    for (let i = start; i < end; i++) {
      batch.push(
        encodePngAsync(stack.layers[i].image, level).then((png) => {
          layerPngs[i] = png
        }),
      )
    }
    await Promise.all(batch)
  }

  const mergedPng = encodePng(merged, level)
  const thumbnailPng = encodePng(resizeNearest(thumbnailSource, thumbWidth, thumbHeight), level)

  // Insertion order is archive order; PNG data is already deflated
  const entries: Zippable = {
    mimetype: [strToU8(ORA_MIMETYPE), { level: 0 }],
    "stack.xml": [strToU8(buildStackXml(stack)), { level }],
  }
  for (const [index, png] of layerPngs.entries()) {
    entries[layerSrc(index)] = [png, { level: 0 }]
  }
  entries["mergedimage.png"] = [mergedPng, { level: 0 }]
  entries["Thumbnails/thumbnail.png"] = [thumbnailPng, { level: 0 }]

  try {
    return zipSync(entries)
  } catch (err) {
    throw new WriteError("encode", "Failed to assemble the ORA archive", { cause: err })
  }
}

/**
 * Encode `stack` and publish it at `destination`.
 *
 * The archive is fully encoded before anything touches the file system,
 * then written to a temporary file beside the destination and renamed
 * into place. On failure the temporary file is removed and no file
 * appears at `destination`.
 *
 * @throws WriteError (`encode`) on encoding failures, (`io`) on storage
 *   failures.
 */
export async function writeStack(
  stack: LayerStack,
  destination: string,
  options: OraWriteOptions = {},
): Promise<void> {
  const archive = await encodeOra(stack, options)
  const tempPath = `${destination}.${randomUUID()}.tmp`

  try {
    await writeFile(tempPath, archive)
    await rename(tempPath, destination)
  } catch (err) {
    try {
      await rm(tempPath, { force: true })
    } catch (cleanupErr) {
      throw new WriteError(
        "io",
        `Failed to write ${destination}; temporary file ${tempPath} could not be removed`,
        { cause: new AggregateError([err, cleanupErr]) },
      )
    }
    throw new WriteError("io", `Failed to write ${destination}`, { cause: err })
  }
}

function validateLayer(image: DecodedImage, index: number): void {
  try {
    validateImage(image)
  } catch (err) {
    if (err instanceof ConversionError) {
      throw new WriteError("encode", `Layer ${index}: ${err.message}`, { cause: err })
    }
    throw err
  }
}
