/*
  Exposure

  Mean luminance (0..255) of grayscale pixels.
*/

export function meanLuma(grayscale: Uint8Array): number {
  const n = grayscale.length;
  if (n === 0) return 0;

  let sum = 0;
  for (let i = 0; i < n; i++) sum += grayscale[i];
  return sum / n;
}
