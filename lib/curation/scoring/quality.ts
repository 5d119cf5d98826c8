/*
  Quality analyzer

  Requirements
  - Pure function of decoded grayscale pixels.
  - Three edge-variance measures: whole frame, center crop, lower band.
  - Boolean flags from fixed thresholds (CurationConfig.quality).
*/

import type { QualityThresholds } from "../config";
import type { ImageInfo, Orientation, QualityMetrics } from "../types";
import { CENTER_REGION, LOWER_BAND_REGION, cropGrayscale } from "../image/crop";
import { edgeVariance } from "./sharpness";
import { meanLuma } from "./exposure";

export function orientationOf(width: number, height: number): Orientation {
  if (width === height) return "square";
  return width > height ? "landscape" : "portrait";
}

export function imageInfo(width: number, height: number): ImageInfo {
  return { width, height, orientation: orientationOf(width, height) };
}

export function analyzeQuality(
  grayscale: Uint8Array,
  width: number,
  height: number,
  thresholds: QualityThresholds
): QualityMetrics {
  const brightness = meanLuma(grayscale.subarray(0, Math.trunc(width) * Math.trunc(height)));

  const full = edgeVariance(grayscale, width, height).variance;

  const center = cropGrayscale(grayscale, width, height, CENTER_REGION);
  const centerVar = edgeVariance(center.grayscale, center.width, center.height).variance;

  const lower = cropGrayscale(grayscale, width, height, LOWER_BAND_REGION);
  const lowerVar = edgeVariance(lower.grayscale, lower.width, lower.height).variance;

  return {
    brightness,
    resolution: Math.trunc(width) * Math.trunc(height),
    edge_variance: full,
    center_edge_variance: centerVar,
    lower_edge_variance: lowerVar,

    dark: brightness < thresholds.dark_below,
    overexposed: brightness > thresholds.overexposed_above,
    blur: full < thresholds.blur_edge_variance,
    blur_center: centerVar < thresholds.blur_center_edge_variance,
    blur_lower: lowerVar < thresholds.blur_lower_edge_variance,
    blur_strong: centerVar < thresholds.blur_strong_center_edge_variance
  };
}

/**
 * Subset of metrics embedded in the judge prompt. Numbers are rounded so the
 * prompt text stays stable.
 */
export function qualityHints(q: QualityMetrics): Record<string, number | boolean> {
  const r = (v: number): number => Math.round(v * 100) / 100;
  return {
    brightness: r(q.brightness),
    edge_variance: r(q.edge_variance),
    center_edge_variance: r(q.center_edge_variance),
    lower_edge_variance: r(q.lower_edge_variance),
    dark: q.dark,
    overexposed: q.overexposed,
    blur: q.blur,
    blur_center: q.blur_center,
    blur_lower: q.blur_lower,
    blur_strong: q.blur_strong
  };
}
