/*
  Perceptual fingerprint (average hash)

  Requirements
  - Pure TypeScript (no native deps)
  - Deterministic for identical pixel content, independent of source resolution
  - Operates on grayscale pixel buffers

  Conventions
  - 64-bit fingerprints encoded as lowercase hex (length 16)
  - Bit i of the integer is set iff grid sample i (row-major) >= mean of all samples

  Notes
  - Caller provides grayscale pixels (Uint8Array) in row-major order.
*/

export type Fingerprint = string; // lowercase hex, length 16

const GRID = 8;
const HEX64 = /^[0-9a-fA-F]{16}$/;

function assertDims(width: number, height: number): void {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    throw new Error(`Invalid dimensions (w=${width}, h=${height})`);
  }
}

function assertGrayscaleLength(grayscale: Uint8Array, width: number, height: number): void {
  const expected = Math.trunc(width) * Math.trunc(height);
  if (grayscale.length < expected) {
    throw new Error(`grayscale length ${grayscale.length} < expected ${expected}`);
  }
}

/**
 * Downscale grayscale to a fixed square grid using deterministic box sampling.
 *
 * Each output cell averages its source rectangle with integer accumulators.
 * Source dimensions smaller than the grid repeat pixels.
 */
export function downscaleGrayscaleBox(
  grayscale: Uint8Array,
  width: number,
  height: number,
  outSize: number
): Uint8Array {
  assertDims(width, height);
  if (!Number.isFinite(outSize) || outSize <= 0) throw new Error(`Invalid outSize ${outSize}`);
  const w = Math.trunc(width);
  const h = Math.trunc(height);
  const s = Math.trunc(outSize);
  assertGrayscaleLength(grayscale, w, h);

  const out = new Uint8Array(s * s);

  // Output cell (ox,oy) covers input [x0,x1) x [y0,y1)
  for (let oy = 0; oy < s; oy++) {
    const y0 = Math.floor((oy * h) / s);
    const y1 = Math.max(y0 + 1, Math.floor(((oy + 1) * h) / s));

    for (let ox = 0; ox < s; ox++) {
      const x0 = Math.floor((ox * w) / s);
      const x1 = Math.max(x0 + 1, Math.floor(((ox + 1) * w) / s));

      let sum = 0;
      let count = 0;

      for (let y = y0; y < y1; y++) {
        const row = y * w;
        for (let x = x0; x < x1; x++) {
          sum += grayscale[row + x];
          count += 1;
        }
      }

      out[oy * s + ox] = count > 0 ? Math.round(sum / count) : 0;
    }
  }

  return out;
}

/**
 * Pack a 64-entry bit array into hex, bit i contributing `1 << i`.
 */
function bitsToHex64(bits: Uint8Array): Fingerprint {
  if (bits.length !== 64) throw new Error(`Expected 64 bits, got ${bits.length}`);

  let value = BigInt(0);
  for (let i = 0; i < 64; i++) {
    if (bits[i] & 1) value |= BigInt(1) << BigInt(i);
  }

  return value.toString(16).padStart(16, "0");
}

/**
 * Compute the 64-bit average-hash fingerprint.
 *
 * Steps
 * - Downscale to 8x8.
 * - Compute mean.
 * - Bit = 1 if sample >= mean else 0.
 */
export function fingerprint64Hex(grayscale: Uint8Array, width: number, height: number): Fingerprint {
  assertDims(width, height);
  const small = downscaleGrayscaleBox(grayscale, width, height, GRID);

  let sum = 0;
  for (let i = 0; i < small.length; i++) sum += small[i];
  const mean = sum / small.length;

  const bits = new Uint8Array(64);
  for (let i = 0; i < 64; i++) {
    bits[i] = small[i] >= mean ? 1 : 0;
  }

  return bitsToHex64(bits);
}

export function isFingerprint(v: unknown): v is Fingerprint {
  return typeof v === "string" && HEX64.test(v);
}

/**
 * Coerce an optional stored fingerprint. Anything that is not 16 hex digits
 * means "unfingerprinted".
 */
export function parseFingerprint(v: unknown): Fingerprint | null {
  return isFingerprint(v) ? v.toLowerCase() : null;
}

function popcountBigInt(x: bigint): number {
  const ZERO = BigInt(0);
  const ONE = BigInt(1);

  let n = 0;
  let v = x;
  while (v !== ZERO) {
    v &= v - ONE;
    n += 1;
  }
  return n;
}

/**
 * Count differing bits between two 64-bit hex fingerprints.
 */
export function hammingDistance(a: Fingerprint, b: Fingerprint): number {
  if (!isFingerprint(a)) throw new Error(`Invalid 64-bit hex fingerprint: ${a}`);
  if (!isFingerprint(b)) throw new Error(`Invalid 64-bit hex fingerprint: ${b}`);

  return popcountBigInt(BigInt(`0x${a}`) ^ BigInt(`0x${b}`));
}

/**
 * True when any of `pool` lies within `threshold` bits of `fp`.
 */
export function isNearDuplicate(fp: Fingerprint, pool: Iterable<Fingerprint>, threshold: number): boolean {
  for (const other of pool) {
    if (hammingDistance(fp, other) <= threshold) return true;
  }
  return false;
}
