/*
  Per-image scoring shared by the photo and video runners.

  decode -> info + fingerprint + quality -> prompt -> judge -> normalize ->
  penalties. Any failure rejects; callers capture it on the item.
*/

import type { CurationConfig } from "../config";
import { buildJudgePrompt } from "../judge/prompt";
import { normalizeJudgeOutput } from "../judge/normalize";
import { fingerprint64Hex, type Fingerprint } from "../scoring/hashing/fingerprint";
import { finalScore } from "../scoring/penalties";
import { analyzeQuality, imageInfo } from "../scoring/quality";
import type { ImageInfo, Judge, JudgeAnalysis, PixelSource, QualityMetrics } from "../types";

export interface ImageFacts {
  readonly info: ImageInfo;
  readonly fingerprint: Fingerprint;
  readonly quality: QualityMetrics;
}

export interface JudgedImage {
  readonly analysis: JudgeAnalysis;
  readonly score: number;
}

export async function analyzeImage(pixels: PixelSource, filePath: string, config: CurationConfig): Promise<ImageFacts> {
  const img = await pixels.decodeGray(filePath);
  return {
    info: imageInfo(img.width, img.height),
    fingerprint: fingerprint64Hex(img.grayscale, img.width, img.height),
    quality: analyzeQuality(img.grayscale, img.width, img.height, config.quality)
  };
}

export async function judgeImage(
  deps: { pixels: PixelSource; judge: Judge },
  filePath: string,
  facts: ImageFacts,
  config: CurationConfig
): Promise<JudgedImage> {
  const image_b64 = await deps.pixels.encodeForJudge(filePath);
  const raw = await deps.judge.judge({ prompt: buildJudgePrompt(facts.quality), image_b64 });
  const analysis = normalizeJudgeOutput(raw);

  return {
    analysis,
    score: finalScore({
      judge_score: analysis.score,
      risks: analysis.risks,
      quality: facts.quality,
      dims: facts.info,
      weights: config.penalties
    })
  };
}
