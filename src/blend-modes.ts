// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Blend modes: the vendor code table and the matching Open Raster
 * `composite-op` identifiers.
 *
 * Codes observed in new files are passed per conversion as an extra
 * table (`ReadOptions.blendCodes`); the built-in table is never modified.
 */

/** Blend modes the compositor and the stack writer understand. */
export type BlendMode =
  | "normal"
  | "multiply"
  | "screen"
  | "overlay"
  | "darken"
  | "lighten"
  | "color-dodge"
  | "color-burn"
  | "hard-light"
  | "soft-light"
  | "difference"
  | "add";

/** ORA `composite-op` attribute for each blend mode. */
export const ORA_COMPOSITE_OPS: Readonly<Record<BlendMode, string>> = {
  normal: "svg:src-over",
  multiply: "svg:multiply",
  screen: "svg:screen",
  overlay: "svg:overlay",
  darken: "svg:darken",
  lighten: "svg:lighten",
  "color-dodge": "svg:color-dodge",
  "color-burn": "svg:color-burn",
  "hard-light": "svg:hard-light",
  "soft-light": "svg:soft-light",
  difference: "svg:difference",
  add: "svg:plus",
};

/** Built-in vendor codes. */
export const DEFAULT_BLEND_CODES: ReadonlyMap<number, BlendMode> = new Map<number, BlendMode>([
  [0, "normal"],
  [1, "multiply"],
  [2, "screen"],
  [3, "overlay"],
  [4, "darken"],
  [5, "lighten"],
  [6, "color-dodge"],
  [7, "color-burn"],
  [8, "hard-light"],
  [9, "soft-light"],
  [10, "difference"],
  [11, "add"],
]);

/**
 * Blend mode for a vendor code. `extra` is consulted first, then the
 * built-in codes; undefined if neither knows the code.
 */
export function blendModeForCode(code: number, extra?: ReadonlyMap<number, BlendMode>): BlendMode | undefined {
  return extra?.get(code) ?? DEFAULT_BLEND_CODES.get(code);
}

/** ORA `composite-op` identifier of a blend mode. */
export function compositeOp(mode: BlendMode): string {
  return ORA_COMPOSITE_OPS[mode];
}
