// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Flatten a layer stack into one RGBA image.
 *
 * Colours are blended with the separable blend functions of the W3C
 * Compositing and Blending Level 1 and then composited source-over. `add`
 * is the Porter-Duff `plus` operator. Work is done in floating point on
 * straight colour; the result is rounded once at the end.
 */

import type { BlendMode } from "./blend-modes.js";
import type { LayerStack } from "./layer-stack.js";
import type { DecodedImage } from "./pixel-decoder.js";
import { computeClipWindow } from "./utils.js";

/** Separable blend function B(cb, cs) on channels in [0, 1]. */
export type BlendFunction = (backdrop: number, source: number) => number;

const multiply: BlendFunction = (cb, cs) => cb * cs;
const screen: BlendFunction = (cb, cs) => cb + cs - cb * cs;
const hardLight: BlendFunction = (cb, cs) => (cs <= 0.5 ? multiply(cb, 2 * cs) : screen(cb, 2 * cs - 1));

const BLEND_FUNCTIONS: Readonly<Record<Exclude<BlendMode, "add">, BlendFunction>> = {
  normal: (_cb, cs) => cs,
  multiply,
  screen,
  overlay: (cb, cs) => hardLight(cs, cb),
  darken: (cb, cs) => Math.min(cb, cs),
  lighten: (cb, cs) => Math.max(cb, cs),
  "color-dodge": (cb, cs) => {
    if (cb === 0) return 0;
    if (cs === 1) return 1;
    return Math.min(1, cb / (1 - cs));
  },
  "color-burn": (cb, cs) => {
    if (cb === 1) return 1;
    if (cs === 0) return 0;
    return 1 - Math.min(1, (1 - cb) / cs);
  },
  "hard-light": hardLight,
  "soft-light": (cb, cs) => {
    if (cs <= 0.5) return cb - (1 - 2 * cs) * cb * (1 - cb);
    const d = cb <= 0.25 ? ((16 * cb - 12) * cb + 4) * cb : Math.sqrt(cb);
    return cb + (2 * cs - 1) * (d - cb);
  },
  difference: (cb, cs) => Math.abs(cb - cs),
};

/** Blend function of a separable mode. */
export function getBlendFunction(mode: Exclude<BlendMode, "add">): BlendFunction {
  return BLEND_FUNCTIONS[mode];
}

/**
 * Canvas with straight RGBA channels in [0, 1], composited in place.
 */
export class Canvas {
  readonly width: number;
  readonly height: number;
  readonly pixels: Float64Array;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.pixels = new Float64Array(width * height * 4);
  }

  /**
   * Composite `image` with its top-left corner at (x, y). Parts outside the
   * canvas are clipped.
   */
  draw(image: DecodedImage, x: number, y: number, opacity: number, mode: BlendMode): void {
    const window = computeClipWindow(x, y, image.width, image.height, this.width, this.height);
    if (window === undefined || opacity <= 0) return;
    const [left, top, right, bottom] = window;
    const blend = mode === "add" ? undefined : BLEND_FUNCTIONS[mode];
    const px = this.pixels;
    const src = image.data;

    for (let cy = top; cy < bottom; cy++) {
      for (let cx = left; cx < right; cx++) {
        const s = ((cy - y) * image.width + (cx - x)) * 4;
        const d = (cy * this.width + cx) * 4;

        const as = (src[s + 3] / 255) * opacity;
        if (as === 0) continue;
        const ab = px[d + 3];

        const ao = blend === undefined ? Math.min(1, as + ab) : as + ab * (1 - as);
        for (let c = 0; c < 3; c++) {
          const cs = src[s + c] / 255;
          const cb = px[d + c];
          let co: number;
          if (blend === undefined) {
            co = Math.min(1, as * cs + ab * cb);
          } else {
            const mixed = (1 - ab) * cs + ab * blend(cb, cs);
            co = as * mixed + (1 - as) * ab * cb;
          }
          px[d + c] = co / ao;
        }
        px[d + 3] = ao;
      }
    }
  }

  /** Round to 8-bit straight RGBA. */
  toImage(): DecodedImage {
    const data = new Uint8Array(this.pixels.length);
    for (let i = 0; i < data.length; i++) {
      data[i] = Math.round(Math.min(1, Math.max(0, this.pixels[i])) * 255);
    }
    return { width: this.width, height: this.height, data, hasAlpha: true };
  }
}

/**
 * Composite every visible layer bottom to top onto a transparent canvas
 * the size of the stack.
 */
export function flattenLayers(stack: LayerStack): DecodedImage {
  const canvas = new Canvas(stack.width, stack.height);
  for (let i = stack.layers.length - 1; i >= 0; i--) {
    const { descriptor, image } = stack.layers[i];
    if (!descriptor.visible) continue;
    canvas.draw(image, descriptor.x, descriptor.y, descriptor.opacity, descriptor.blendMode);
  }
  return canvas.toImage();
}
