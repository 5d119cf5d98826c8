/*
  Score penalties

  Two deterministic passes over the judge score, each clamped to [0,1]:
  1. quality correction from pixel flags + resolution
  2. risk penalty from the judge's own risk flags
  Each true flag subtracts (weight * scale).
*/

import type { PenaltyWeights } from "../config";
import type { JudgeRisks, QualityMetrics } from "../types";
import { clamp01 } from "../judge/normalize";

export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

export function applyQualityPenalty(
  score: number,
  quality: QualityMetrics,
  dims: Dimensions | null,
  w: PenaltyWeights
): number {
  let s = score;
  if (quality.dark) s -= w.dark * w.scale;
  if (quality.blur_strong) s -= w.blur_strong * w.scale;
  if (quality.blur_center) s -= w.blur_center * w.scale;
  if (quality.blur_lower) s -= w.blur_lower * w.scale;
  if (dims && Math.min(dims.width, dims.height) < w.min_short_side) s -= w.low_resolution * w.scale;
  return clamp01(s);
}

export function applyRiskPenalty(score: number, risks: JudgeRisks, w: PenaltyWeights): number {
  let s = score;
  if (risks.blur) s -= w.risk_blur * w.scale;
  if (risks.out_of_focus) s -= w.risk_out_of_focus * w.scale;
  if (risks.dark) s -= w.risk_dark * w.scale;
  if (risks.overexposed) s -= w.risk_overexposed * w.scale;
  return clamp01(s);
}

/**
 * Final score: quality correction (when metrics exist), then risk penalty.
 */
export function finalScore(params: {
  judge_score: number;
  risks: JudgeRisks;
  quality: QualityMetrics | null;
  dims: Dimensions | null;
  weights: PenaltyWeights;
}): number {
  const base = clamp01(params.judge_score);
  const corrected = params.quality ? applyQualityPenalty(base, params.quality, params.dims, params.weights) : base;
  return applyRiskPenalty(corrected, params.risks, params.weights);
}
