import { describe, it, expect } from "vitest";
import { CURATION_DEFAULTS } from "../config";
import { analyzeQuality, imageInfo } from "./quality";
import { edgeVariance } from "./sharpness";
import { cropGrayscale, CENTER_REGION, LOWER_BAND_REGION } from "../image/crop";

const T = CURATION_DEFAULTS.quality;

function checkerboard(width: number, height: number): Uint8Array {
  const out = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) out[y * width + x] = (x + y) % 2 === 0 ? 255 : 0;
  }
  return out;
}

describe("edgeVariance", () => {
  it("is zero on a flat image", () => {
    const flat = new Uint8Array(10 * 10).fill(90);
    expect(edgeVariance(flat, 10, 10)).toEqual({ variance: 0, mean: 0, n: 64 });
  });

  it("clips the response and ignores borders", () => {
    // 3x3 with a bright center: single interior sample 8*255 clipped to 255
    const px = new Uint8Array([0, 0, 0, 0, 255, 0, 0, 0, 0]);
    const s = edgeVariance(px, 3, 3);
    expect(s.n).toBe(1);
    expect(s.mean).toBe(255);
    expect(s.variance).toBe(0);
  });

  it("returns zero for images without an interior", () => {
    expect(edgeVariance(new Uint8Array(4), 2, 2).variance).toBe(0);
  });

  it("is high on a checkerboard", () => {
    // bright cells clip to 255, dark cells clip to 0 => variance 255^2/4
    const s = edgeVariance(checkerboard(6, 6), 6, 6);
    expect(s.n).toBe(16);
    expect(s.variance).toBeCloseTo(16256.25, 5);
  });
});

describe("cropGrayscale", () => {
  it("uses truncated fractional bounds", () => {
    const px = new Uint8Array(10 * 10).map((_, i) => i);
    const c = cropGrayscale(px, 10, 10, CENTER_REGION);
    // x 2..7, y 2..7
    expect(c.width).toBe(5);
    expect(c.height).toBe(5);
    expect(c.grayscale[0]).toBe(22);

    const lower = cropGrayscale(px, 10, 10, LOWER_BAND_REGION);
    // x 1..9, y 5..9
    expect(lower.width).toBe(8);
    expect(lower.height).toBe(4);
    expect(lower.grayscale[0]).toBe(51);
  });
});

describe("analyzeQuality", () => {
  it("flags a flat dark frame as dark and blurred everywhere", () => {
    const q = analyzeQuality(new Uint8Array(20 * 20).fill(10), 20, 20, T);
    expect(q).toEqual({
      brightness: 10,
      resolution: 400,
      edge_variance: 0,
      center_edge_variance: 0,
      lower_edge_variance: 0,
      dark: true,
      overexposed: false,
      blur: true,
      blur_center: true,
      blur_lower: true,
      blur_strong: true
    });
  });

  it("flags overexposure strictly above the threshold", () => {
    expect(analyzeQuality(new Uint8Array(16).fill(205), 4, 4, T).overexposed).toBe(false);
    expect(analyzeQuality(new Uint8Array(16).fill(206), 4, 4, T).overexposed).toBe(true);
  });

  it("does not flag blur on a sharp pattern", () => {
    const q = analyzeQuality(checkerboard(40, 40), 40, 40, T);
    expect(q.blur).toBe(false);
    expect(q.blur_center).toBe(false);
    expect(q.blur_lower).toBe(false);
    expect(q.blur_strong).toBe(false);
    expect(q.brightness).toBe(127.5);
  });
});

describe("imageInfo", () => {
  it("derives orientation", () => {
    expect(imageInfo(10, 10).orientation).toBe("square");
    expect(imageInfo(20, 10).orientation).toBe("landscape");
    expect(imageInfo(10, 20).orientation).toBe("portrait");
  });
});
