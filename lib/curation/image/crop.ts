/*
  Grayscale region crops

  Regions are fractions of the frame, converted to pixel bounds with
  truncation (x0 = trunc(w * left), x1 = trunc(w * right)).
*/

export interface Region {
  /** 0..1 fractions of width/height */
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
}

/** Central 50% x 50% */
export const CENTER_REGION: Region = { left: 0.25, top: 0.25, right: 0.75, bottom: 0.75 };

/** Lower band where a seated subject usually sits */
export const LOWER_BAND_REGION: Region = { left: 0.1, top: 0.5, right: 0.9, bottom: 0.95 };

export interface GrayCrop {
  readonly grayscale: Uint8Array;
  readonly width: number;
  readonly height: number;
}

/**
 * Crop a region out of a row-major grayscale buffer.
 * Degenerate regions return an empty crop.
 */
export function cropGrayscale(grayscale: Uint8Array, width: number, height: number, region: Region): GrayCrop {
  const w = Math.trunc(width);
  const h = Math.trunc(height);

  const x0 = Math.max(0, Math.min(w, Math.trunc(w * region.left)));
  const x1 = Math.max(x0, Math.min(w, Math.trunc(w * region.right)));
  const y0 = Math.max(0, Math.min(h, Math.trunc(h * region.top)));
  const y1 = Math.max(y0, Math.min(h, Math.trunc(h * region.bottom)));

  const outW = x1 - x0;
  const outH = y1 - y0;
  const out = new Uint8Array(outW * outH);

  // Copy row-by-row
  for (let yy = 0; yy < outH; yy++) {
    const src = (y0 + yy) * w + x0;
    out.set(grayscale.subarray(src, src + outW), yy * outW);
  }

  return { grayscale: out, width: outW, height: outH };
}
