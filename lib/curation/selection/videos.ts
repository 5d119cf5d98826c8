/*
  Video clip selection (duration quota)

  Requirements
  - Same eligibility and ordering as photos, plus a brightness gate.
  - Budget = min(max_source_seconds, target_digest_seconds).
  - Per clip, in order: count cap (stop), dedupe (skip + count),
    duration overflow (skip), accept; stop once the budget is met.

  Notes
  - Dedupe state lives in an explicit FingerprintAccumulator passed in by the
    caller. Per-source scope uses a fresh one per source; global scope threads
    one instance through every source in processing order.
*/

import type { CurationConfig, DedupeScope } from "../config";
import type { Scored, VideoSelectionStats } from "../types";
import { isNearDuplicate, type Fingerprint } from "../scoring/hashing/fingerprint";
import { isEligible, scoreDistribution, scoreOf, sortByScoreDesc } from "./stats";

export interface ClipCandidate extends Scored {
  readonly duration: number;
  readonly quality: { readonly brightness: number } | null;
}

export type VideoSelectionOptions = Pick<
  CurationConfig["video"],
  "max_source_seconds" | "target_digest_seconds" | "max_selected_clips" | "min_brightness"
> & {
  readonly dedupe: Pick<CurationConfig["video"]["dedupe"], "enabled" | "hamming_threshold">;
};

export interface ClipSelectionResult<T> {
  readonly selected: ReadonlyArray<T>;
  readonly stats: VideoSelectionStats;
}

/**
 * Fingerprints accepted so far. Single writer: updates must happen in the
 * same order clips are evaluated.
 */
export class FingerprintAccumulator {
  private readonly accepted: Fingerprint[] = [];

  constructor(readonly scope: DedupeScope = "per_source_video") {}

  isNearDuplicate(fp: Fingerprint, threshold: number): boolean {
    return isNearDuplicate(fp, this.accepted, threshold);
  }

  add(fp: Fingerprint): void {
    this.accepted.push(fp);
  }

  get size(): number {
    return this.accepted.length;
  }

  snapshot(): ReadonlyArray<Fingerprint> {
    return [...this.accepted];
  }
}

export function passesQualityGate(item: ClipCandidate, minBrightness: number): boolean {
  if (!item.quality) return false;
  return item.quality.brightness >= minBrightness;
}

export function selectClips<T extends ClipCandidate>(
  items: ReadonlyArray<T>,
  opts: VideoSelectionOptions,
  accumulator: FingerprintAccumulator = new FingerprintAccumulator()
): ClipSelectionResult<T> {
  const scored = items.filter(isEligible);
  const ordered = sortByScoreDesc(scored.filter((c) => passesQualityGate(c, opts.min_brightness)));
  const budget = Math.min(opts.max_source_seconds, opts.target_digest_seconds);

  const selected: T[] = [];
  let total = 0;
  let removed = 0;

  for (const clip of ordered) {
    if (selected.length >= opts.max_selected_clips) break;

    const fp = clip.fingerprint;
    if (opts.dedupe.enabled && fp !== null && accumulator.isNearDuplicate(fp, opts.dedupe.hamming_threshold)) {
      removed += 1;
      continue;
    }

    const duration = Number.isFinite(clip.duration) ? clip.duration : 0;
    if (total + duration > budget) continue;

    selected.push(clip);
    total += duration;
    if (opts.dedupe.enabled && fp !== null) accumulator.add(fp);
    if (total >= budget) break;
  }

  return {
    selected,
    stats: {
      total_clips: items.length,
      scored_clips: scored.length,
      selected_clips_count: selected.length,
      removed_duplicates: removed,
      total_selected_seconds: total,
      score_distribution: scoreDistribution(scored.map(scoreOf))
    }
  };
}

/**
 * Sum per-source stats into one batch-level record.
 */
export function mergeSelectionStats(all: ReadonlyArray<VideoSelectionStats>, scores: ReadonlyArray<number>): VideoSelectionStats {
  return {
    total_clips: all.reduce((n, s) => n + s.total_clips, 0),
    scored_clips: all.reduce((n, s) => n + s.scored_clips, 0),
    selected_clips_count: all.reduce((n, s) => n + s.selected_clips_count, 0),
    removed_duplicates: all.reduce((n, s) => n + s.removed_duplicates, 0),
    total_selected_seconds: all.reduce((n, s) => n + s.total_selected_seconds, 0),
    score_distribution: scoreDistribution(scores)
  };
}
