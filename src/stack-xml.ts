// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * stack.xml writer: the Open Raster document description.
 *
 * Layers are listed in stack order, which is also ORA document order
 * (first child is drawn on top). Offsets are written as recorded,
 * negative values included.
 */

import { compositeOp } from "./blend-modes.js";
import type { LayerStack } from "./layer-stack.js";

export const ORA_VERSION = "0.0.5";

/** Archive path of the PNG for the layer at stack position `index`. */
export function layerSrc(index: number): string {
  return `data/layer${index}.png`;
}

/** Opacity with at most six decimals and no trailing zeros. */
export function formatOpacity(opacity: number): string {
  return Number(opacity.toFixed(6)).toString();
}

/**
 * Generate the stack.xml document for `stack`.
 *
 * Resolution attributes are written only when both axes are known,
 * rounded to whole pixels per inch.
 */
export function buildStackXml(stack: LayerStack): string {
  const resolution =
    stack.xResolution !== undefined && stack.yResolution !== undefined
      ? ` xres="${Math.round(stack.xResolution)}" yres="${Math.round(stack.yResolution)}"`
      : "";

  const layers = stack.layers
    .map(({ descriptor }, index) => {
      const attrs = [
        `name="${escapeXml(descriptor.name)}"`,
        `src="${layerSrc(index)}"`,
        `x="${descriptor.x}"`,
        `y="${descriptor.y}"`,
        `opacity="${formatOpacity(descriptor.opacity)}"`,
        `visibility="${descriptor.visible ? "visible" : "hidden"}"`,
        `composite-op="${compositeOp(descriptor.blendMode)}"`,
      ];
      return `    <layer ${attrs.join(" ")}/>\n`;
    })
    .join("");

  return `<?xml version="1.0" encoding="UTF-8"?>
<image version="${ORA_VERSION}" w="${stack.width}" h="${stack.height}"${resolution}>
  <stack>
${layers}  </stack>
</image>
`;
}

// Characters XML 1.0 does not allow, even as character references
const XML_FORBIDDEN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

/**
 * Escape text for use inside a double-quoted XML attribute. Characters
 * XML 1.0 cannot carry are dropped.
 */
export function escapeXml(str: string): string {
  return str
    .replace(XML_FORBIDDEN, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;")
    .replace(/\t/g, "&#9;")
    .replace(/\n/g, "&#10;")
    .replace(/\r/g, "&#13;");
}
