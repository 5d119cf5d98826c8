/*
  Judge prompt

  The prompt embeds the expected schema and the pixel-level quality hints so
  the judge can weigh them. Both are serialized as JSON.
*/

import type { QualityMetrics } from "../types";
import { qualityHints } from "../scoring/quality";

export const JUDGE_SYSTEM_PROMPT = "You are a photo selection assistant. Return only JSON.";

export const SCHEMA_TEMPLATE = {
  caption: "",
  tags: [],
  risks: { blur: false, dark: false, overexposed: false, out_of_focus: false },
  score: 0.0
} as const;

export function buildJudgePrompt(quality: QualityMetrics | null): string {
  const hints = quality ? qualityHints(quality) : {};
  return [
    "Evaluate this image for a highlight reel.",
    "Prefer a clearly visible, in-focus subject, good exposure and pleasing composition.",
    "Use the quality hints below as objective measurements of the pixels.",
    `Quality hints: ${JSON.stringify(hints)}`,
    "Respond with a single JSON object matching this schema exactly (score in 0..1):",
    JSON.stringify(SCHEMA_TEMPLATE),
    "Return JSON only, no prose and no markdown."
  ].join("\n");
}
