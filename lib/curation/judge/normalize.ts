/*
  Judge output normalizer

  The judge payload is untrusted. This module is the only place that looks
  at its raw shape; everything downstream works on JudgeAnalysis.

  Rules
  - Not a plain object => malformed (InvalidJudgeResponseError when forced).
  - `overall_score` wins over `score`; numeric strings accepted; else 0.
  - Every numeric field is clamped to [0,1].
  - Non-list `tags` => []; non-object `risks` => {}; missing risk flags => false.
*/

import { InvalidJudgeResponseError } from "../errors";
import type { JudgeAnalysis, JudgeRisks } from "../types";

export type JudgeOutput =
  | { readonly kind: "valid"; readonly analysis: JudgeAnalysis }
  | { readonly kind: "malformed"; readonly reason: string; readonly raw: unknown };

type RawObject = Readonly<Record<string, unknown>>;

function isRecord(v: unknown): v is RawObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function clamp01(v: number): number {
  if (!Number.isFinite(v)) return 0;
  return Math.max(0, Math.min(1, v));
}

/**
 * Number or numeric-looking string; anything else is `fallback`.
 */
export function coerceNumber(v: unknown, fallback = 0): number {
  if (typeof v === "number") return Number.isFinite(v) ? v : fallback;
  if (typeof v === "string") {
    const s = v.trim();
    if (s.length === 0) return fallback;
    const n = Number(s);
    return Number.isFinite(n) ? n : fallback;
  }
  return fallback;
}

function coerceFlag(v: unknown): boolean {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  if (typeof v === "string") return ["true", "yes", "1"].includes(v.trim().toLowerCase());
  return false;
}

function coerceTags(v: unknown): string[] {
  if (!Array.isArray(v)) return [];
  const out: string[] = [];
  for (const t of v) {
    if (typeof t === "string") {
      const s = t.trim();
      if (s) out.push(s);
    } else if (typeof t === "number" || typeof t === "boolean") {
      out.push(String(t));
    }
  }
  return out;
}

function coerceRisks(v: unknown): JudgeRisks {
  const r: RawObject = isRecord(v) ? v : {};
  return {
    blur: coerceFlag(r.blur),
    dark: coerceFlag(r.dark),
    overexposed: coerceFlag(r.overexposed),
    out_of_focus: coerceFlag(r.out_of_focus)
  };
}

/**
 * Parse an untrusted judge payload into the tagged variant.
 */
export function parseJudgeOutput(raw: unknown): JudgeOutput {
  if (!isRecord(raw)) {
    const got = raw === null ? "null" : Array.isArray(raw) ? "array" : typeof raw;
    return { kind: "malformed", reason: `judge response is not an object (got ${got})`, raw };
  }

  const scoreSource = raw.overall_score !== undefined && raw.overall_score !== null ? raw.overall_score : raw.score;

  const analysis: JudgeAnalysis = {
    caption: typeof raw.caption === "string" ? raw.caption.trim() : "",
    tags: coerceTags(raw.tags),
    risks: coerceRisks(raw.risks),
    score: clamp01(coerceNumber(scoreSource)),
    sharpness: clamp01(coerceNumber(raw.sharpness)),
    subject_visibility: clamp01(coerceNumber(raw.subject_visibility)),
    composition: clamp01(coerceNumber(raw.composition)),
    duplication_penalty: clamp01(coerceNumber(raw.duplication_penalty)),
    reasoning: typeof raw.reasoning === "string" ? raw.reasoning.trim() : ""
  };

  return { kind: "valid", analysis };
}

/**
 * Normalize or throw InvalidJudgeResponseError.
 */
export function normalizeJudgeOutput(raw: unknown): JudgeAnalysis {
  const out = parseJudgeOutput(raw);
  if (out.kind === "malformed") throw new InvalidJudgeResponseError(out.reason);
  return out.analysis;
}
