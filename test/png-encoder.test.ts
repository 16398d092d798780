// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, it, expect } from "vitest";
import { unzlibSync } from "fflate";
import { WriteError } from "../src/errors.js";
import type { DecodedImage } from "../src/pixel-decoder.js";
import {
  compressDeflate,
  compressDeflateAsync,
  crc32,
  encodePng,
  encodePngAsync,
  PNG_SIGNATURE,
} from "../src/png-encoder.js";
import { checkerboard, decodeTestPng } from "./fixtures.js";

function gradient(width: number, height: number): DecodedImage {
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      data.set([x * 20, y * 30, (x + y) * 10, 255 - x], (y * width + x) * 4);
    }
  }
  return { width, height, data, hasAlpha: true };
}

describe("crc32", () => {
  it("matches the IEND chunk CRC", () => {
    expect(crc32(new TextEncoder().encode("IEND"))).toBe(0xae426082);
  });

  it("honours start and length", () => {
    const bytes = new TextEncoder().encode("xxIENDyy");
    expect(crc32(bytes, 2, 4)).toBe(0xae426082);
  });
});

describe("compressDeflate", () => {
  it("produces zlib data in both modes", async () => {
    const data = new TextEncoder().encode("layer layer layer layer");
    expect(unzlibSync(compressDeflate(data))).toEqual(data);
    expect(unzlibSync(await compressDeflateAsync(data, 9))).toEqual(data);
  });
});

describe("encodePng", () => {
  it("writes the signature and an 8-bit RGBA header", () => {
    const png = encodePng(gradient(3, 2));

    expect(Array.from(png.subarray(0, 8))).toEqual(Array.from(PNG_SIGNATURE));
    expect(Array.from(png.subarray(8, 29))).toEqual([
      0, 0, 0, 13, 0x49, 0x48, 0x44, 0x52, 0, 0, 0, 3, 0, 0, 0, 2, 8, 6, 0, 0, 0,
    ]);
    expect(new TextDecoder().decode(png.subarray(png.length - 8, png.length - 4))).toBe("IEND");
  });

  it("round-trips pixels through the filters", () => {
    const image = gradient(7, 5);
    const decoded = decodeTestPng(encodePng(image));

    expect(decoded.width).toBe(7);
    expect(decoded.height).toBe(5);
    expect(Array.from(decoded.data)).toEqual(Array.from(image.data));
  });

  it("round-trips pixels with async deflate", async () => {
    const { width, height, data } = checkerboard(6, 4, [10, 20, 30, 40], [250, 240, 230, 0]);
    const image: DecodedImage = { width, height, data, hasAlpha: true };
    const decoded = decodeTestPng(await encodePngAsync(image, 1));

    expect(Array.from(decoded.data)).toEqual(Array.from(data));
  });

  it("rejects images it cannot encode", async () => {
    const empty: DecodedImage = { width: 0, height: 4, data: new Uint8Array(0), hasAlpha: true };
    expect(() => encodePng(empty)).toThrow(WriteError);

    const short: DecodedImage = { width: 2, height: 2, data: new Uint8Array(15), hasAlpha: true };
    expect(() => encodePng(short)).toThrow(/holds 15 bytes, expected 16/);
    await expect(encodePngAsync(short)).rejects.toBeInstanceOf(WriteError);
  });
});
