/*
  Sharpness scoring

  Metric
  - Variance of an edge-magnitude response on grayscale pixels.

  Notes
  - Kernel is the 8-neighbour edge finder:
      [ -1 -1 -1
        -1  8 -1
        -1 -1 -1 ]
    with the response clipped to 0..255 (8-bit filter output).
  - Border pixels are ignored.
  - Caller is responsible for decoding and providing grayscale.
*/

export interface EdgeStats {
  /** Variance of the clipped edge response. Higher = sharper. */
  readonly variance: number;
  readonly mean: number;
  /** Number of samples used. */
  readonly n: number;
}

/**
 * Compute edge-response variance over the interior of a grayscale image.
 * Images without an interior (either side < 3) yield variance 0.
 */
export function edgeVariance(grayscale: Uint8Array, width: number, height: number): EdgeStats {
  const w = Math.trunc(width);
  const h = Math.trunc(height);
  if (!Number.isFinite(w) || !Number.isFinite(h) || w < 3 || h < 3) {
    return { variance: 0, mean: 0, n: 0 };
  }
  const expected = w * h;
  if (grayscale.length < expected) {
    throw new Error(`grayscale length ${grayscale.length} < expected ${expected}`);
  }

  let n = 0;
  let sum = 0;
  let sumSq = 0;

  for (let y = 1; y < h - 1; y++) {
    const row = y * w;
    const rowUp = (y - 1) * w;
    const rowDn = (y + 1) * w;

    for (let x = 1; x < w - 1; x++) {
      const neighbours =
        grayscale[rowUp + x - 1] +
        grayscale[rowUp + x] +
        grayscale[rowUp + x + 1] +
        grayscale[row + x - 1] +
        grayscale[row + x + 1] +
        grayscale[rowDn + x - 1] +
        grayscale[rowDn + x] +
        grayscale[rowDn + x + 1];

      const raw = 8 * grayscale[row + x] - neighbours;
      const v = raw < 0 ? 0 : raw > 255 ? 255 : raw;

      n += 1;
      sum += v;
      sumSq += v * v;
    }
  }

  if (n === 0) return { variance: 0, mean: 0, n: 0 };

  const mean = sum / n;
  const variance = Math.max(0, sumSq / n - mean * mean);

  return { variance, mean, n };
}
