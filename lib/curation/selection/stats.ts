import type { ScoreDistribution, Scored } from "../types";

/** No error and a finite score. */
export function isEligible(item: Scored): boolean {
  return item.error === null && typeof item.score === "number" && Number.isFinite(item.score);
}

export function scoreOf(item: Scored): number {
  return typeof item.score === "number" && Number.isFinite(item.score) ? item.score : 0;
}

/**
 * Stable descending sort by score; ties keep input order.
 */
export function sortByScoreDesc<T extends Scored>(items: ReadonlyArray<T>): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => scoreOf(b.item) - scoreOf(a.item) || a.index - b.index)
    .map((e) => e.item);
}

export function median(sorted: ReadonlyArray<number>): number {
  const n = sorted.length;
  if (n === 0) return 0;
  const mid = Math.floor(n / 2);
  return n % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * min / median / p90 / max. p90 is the element at floor(0.9 * (n - 1)).
 */
export function scoreDistribution(scores: ReadonlyArray<number>): ScoreDistribution | null {
  if (scores.length === 0) return null;
  const sorted = [...scores].sort((a, b) => a - b);
  return {
    min: sorted[0],
    median: median(sorted),
    p90: sorted[Math.floor(0.9 * (sorted.length - 1))],
    max: sorted[sorted.length - 1]
  };
}
