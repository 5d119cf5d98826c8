import fs from "fs";
import os from "os";
import path from "path";
import sharp from "sharp";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DecodeError } from "../errors";
import { createSharpPixelSource, decodeImage, rgbaToGrayscale } from "./decode";

let dir = "";

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "decode-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("rgbaToGrayscale", () => {
  it("uses integer Rec. 601 weights", () => {
    const rgba = new Uint8Array([255, 0, 0, 255, 0, 255, 0, 255, 0, 0, 255, 255, 255, 255, 255, 0]);
    expect(Array.from(rgbaToGrayscale(rgba, 4, 1))).toEqual([76, 149, 28, 255]);
  });

  it("rejects short buffers", () => {
    expect(() => rgbaToGrayscale(new Uint8Array(3), 1, 1)).toThrow(DecodeError);
  });
});

describe("decodeImage", () => {
  it("decodes a lossless PNG to exact pixels", async () => {
    const png = await sharp({ create: { width: 3, height: 2, channels: 3, background: { r: 0, g: 255, b: 0 } } })
      .png()
      .toBuffer();
    const img = await decodeImage(png);
    expect(img.width).toBe(3);
    expect(img.height).toBe(2);
    expect(Array.from(img.grayscale)).toEqual([149, 149, 149, 149, 149, 149]);
  });

  it("wraps undecodable bytes in DecodeError", async () => {
    await expect(decodeImage(new Uint8Array([1, 2, 3]))).rejects.toBeInstanceOf(DecodeError);
  });
});

describe("createSharpPixelSource", () => {
  it("reads files and encodes PNG payloads as PNG", async () => {
    const file = path.join(dir, "flat.png");
    await sharp({ create: { width: 4, height: 4, channels: 3, background: { r: 10, g: 10, b: 10 } } })
      .png()
      .toFile(file);

    const src = createSharpPixelSource();
    const gray = await src.decodeGray(file);
    expect(gray.width).toBe(4);
    expect(gray.grayscale.length).toBe(16);

    const b64 = await src.encodeForJudge(file);
    // PNG signature
    expect(Buffer.from(b64, "base64").subarray(1, 4).toString("ascii")).toBe("PNG");
  });

  it("reports missing files as DecodeError", async () => {
    await expect(createSharpPixelSource().decodeGray(path.join(dir, "nope.jpg"))).rejects.toBeInstanceOf(DecodeError);
  });
});
