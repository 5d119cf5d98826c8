/*
  Image decode + grayscale (sharp)

  Design
  - Deterministic: fixed grayscale conversion, EXIF orientation applied.
  - Full resolution: sharpness measures need the original pixels.
  - Judge payload is re-encoded as JPEG (PNG sources stay PNG).
*/

import fs from "fs/promises";
import path from "path";
import sharp from "sharp";

import { DecodeError } from "../errors";
import type { DecodedGray, PixelSource } from "../types";

export interface DecodedImage extends DecodedGray {
  /** RGBA pixels, length = width * height * 4 */
  readonly rgba: Uint8Array;
}

/**
 * Convert RGBA -> grayscale deterministically.
 * Integer approximation of Rec. 601 luma:
 *   Y = (77R + 150G + 29B) >> 8
 */
export function rgbaToGrayscale(rgba: Uint8Array, width: number, height: number): Uint8Array {
  const expected = Math.trunc(width) * Math.trunc(height) * 4;
  if (rgba.length < expected) {
    throw new DecodeError(`RGBA length ${rgba.length} < expected ${expected}`);
  }

  const n = Math.trunc(width) * Math.trunc(height);
  const out = new Uint8Array(n);

  for (let i = 0, p = 0; i < n; i++, p += 4) {
    // alpha ignored
    out[i] = (77 * rgba[p] + 150 * rgba[p + 1] + 29 * rgba[p + 2]) >> 8;
  }

  return out;
}

/**
 * Decode bytes into RGBA pixels. Auto-rotates using EXIF orientation.
 */
export async function decodeToRgba(bytes: Uint8Array): Promise<{ width: number; height: number; rgba: Uint8Array }> {
  let data: Buffer;
  let info: sharp.OutputInfo;
  try {
    const out = await sharp(Buffer.from(bytes), { failOn: "none" })
      .rotate() // respect EXIF
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    data = out.data;
    info = out.info;
  } catch (e) {
    throw new DecodeError("Failed to decode image bytes via sharp", e);
  }

  if (!info.width || !info.height) throw new DecodeError("sharp decode returned missing info");
  if (info.channels !== 4) {
    // ensureAlpha() should make it 4
    throw new DecodeError(`Unexpected channel count from sharp: ${info.channels}`);
  }

  return {
    width: info.width,
    height: info.height,
    rgba: new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
  };
}

export async function decodeImage(bytes: Uint8Array): Promise<DecodedImage> {
  const { width, height, rgba } = await decodeToRgba(bytes);
  return { width, height, rgba, grayscale: rgbaToGrayscale(rgba, width, height) };
}

async function readFileOrThrow(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (e) {
    throw new DecodeError(`Cannot read image file: ${filePath}`, e);
  }
}

/**
 * Base64 payload for the judge.
 */
export async function encodeImageBase64(filePath: string): Promise<string> {
  const bytes = await readFileOrThrow(filePath);
  const isPng = path.extname(filePath).toLowerCase() === ".png";
  try {
    const pipeline = sharp(bytes, { failOn: "none" }).rotate();
    const out = isPng ? await pipeline.png().toBuffer() : await pipeline.jpeg({ quality: 90, mozjpeg: false }).toBuffer();
    return out.toString("base64");
  } catch (e) {
    throw new DecodeError(`Failed to encode ${filePath} for the judge`, e);
  }
}

export function createSharpPixelSource(): PixelSource {
  return {
    decodeGray: async (filePath: string): Promise<DecodedGray> => {
      const img = await decodeImage(await readFileOrThrow(filePath));
      return { width: img.width, height: img.height, grayscale: img.grayscale };
    },
    encodeForJudge: encodeImageBase64
  };
}
