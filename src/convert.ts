// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * One-call conversion: parse a layered TIFF, decode every layer and write
 * the Open Raster archive.
 */

import { readFile } from "node:fs/promises"
import { extname } from "node:path"

import { type ConversionWarning, WriteError } from "./errors.js"
import { type LayerStack, type ReadOptions, readLayerStack } from "./layer-stack.js"
import { encodeOra, type OraWriteOptions, writeStack } from "./ora-writer.js"

/** Options for {@link convert} and {@link convertFile}. */
export interface ConvertOptions extends ReadOptions, OraWriteOptions {}

export interface ConvertResult {
  /** The complete ORA archive. */
  archive: Uint8Array
  stack: LayerStack
  warnings: ConversionWarning[]
}

export interface ConvertFileResult {
  outputPath: string
  stack: LayerStack
  warnings: ConversionWarning[]
}

/**
 * Convert an in-memory layered TIFF to an ORA archive.
 *
 * Fails as a whole: either the full archive is returned or an error is
 * thrown.
 */
export async function convert(
  bytes: Uint8Array,
  options: ConvertOptions = {},
): Promise<ConvertResult> {
  const { stack, warnings } = await readLayerStack(bytes, options)
  const archive = await encodeOra(stack, options)
  return { archive, stack, warnings }
}

/**
 * Convert the TIFF at `inputPath` and publish the archive at `outputPath`
 * (default: the input path with its extension replaced by `.ora`).
 */
export async function convertFile(
  inputPath: string,
  outputPath: string = defaultOutputPath(inputPath),
  options: ConvertOptions = {},
): Promise<ConvertFileResult> {
  let bytes: Uint8Array
  try {
    bytes = await readFile(inputPath)
  } catch (err) {
    throw new WriteError("io", `Failed to read ${inputPath}`, { cause: err })
  }

  const { stack, warnings } = await readLayerStack(bytes, options)
  await writeStack(stack, outputPath, options)
  return { outputPath, stack, warnings }
}

/** `input.tif` -> `input.ora`; a path without extension gains `.ora`. */
export function defaultOutputPath(inputPath: string): string {
  const ext = extname(inputPath)
  return (ext === "" ? inputPath : inputPath.slice(0, -ext.length)) + ".ora"
}
