/*
  Curation config

  Single source of truth for quality thresholds, penalty weights, selection
  quotas, judge transport and cleanup policy.

  Design goals
  - Deterministic behavior across runs (no randomness).
  - No magic numbers scattered throughout the codebase.
*/

import { ConfigError } from "./errors";

export const CONFIG_VERSION = "reel-curator/v1" as const;

export type VideoPreset = "youtube16x9" | "shorts9x16" | "clips_only";
export type DedupeScope = "per_source_video" | "global";

export const VIDEO_PRESETS: ReadonlyArray<VideoPreset> = ["youtube16x9", "shorts9x16", "clips_only"];
export const DEDUPE_SCOPES: ReadonlyArray<DedupeScope> = ["per_source_video", "global"];

export interface QualityThresholds {
  /** Mean luma below this is `dark` */
  readonly dark_below: number;
  /** Mean luma above this is `overexposed` */
  readonly overexposed_above: number;
  readonly blur_edge_variance: number;
  readonly blur_center_edge_variance: number;
  readonly blur_lower_edge_variance: number;
  readonly blur_strong_center_edge_variance: number;
}

export interface PenaltyWeights {
  /** Every weight below is multiplied by this before it is subtracted. */
  readonly scale: number;
  readonly dark: number;
  readonly blur_strong: number;
  readonly blur_center: number;
  readonly blur_lower: number;
  readonly low_resolution: number;
  /** Short side (px) below which `low_resolution` applies */
  readonly min_short_side: number;

  readonly risk_blur: number;
  readonly risk_out_of_focus: number;
  readonly risk_dark: number;
  readonly risk_overexposed: number;
}

export interface CurationConfig {
  readonly version: typeof CONFIG_VERSION;

  readonly quality: QualityThresholds;
  readonly penalties: PenaltyWeights;

  readonly photo: {
    readonly target_count: number;
    readonly dedupe: boolean;
    readonly hamming_threshold: number;
    /** Reuse cached scores when the fingerprint is unchanged */
    readonly resume: boolean;
    /** Ignore the cache even when `resume` is set */
    readonly force: boolean;
  };

  readonly video: {
    readonly max_source_seconds: number;
    readonly target_digest_seconds: number;
    readonly max_selected_clips: number;
    readonly min_clip_seconds: number;
    readonly max_clip_seconds: number;
    /** Clips whose representative frame is darker than this never qualify */
    readonly min_brightness: number;
    readonly dedupe: {
      readonly enabled: boolean;
      readonly hamming_threshold: number;
      readonly scope: DedupeScope;
    };
    readonly preset: VideoPreset;
    readonly concat_in_digest_folder: boolean;
    readonly use_hwaccel: boolean;
    readonly analyze_audio: boolean;
  };

  readonly judge: {
    readonly base_url: string;
    readonly model: string;
    readonly timeout_ms: number;
    /** Extra attempts after the first one */
    readonly max_retries: number;
    /** Linear backoff step: attempt N waits N * retry_backoff_ms */
    readonly retry_backoff_ms: number;
  };

  readonly cleanup: {
    readonly keep_temp: boolean;
    readonly max_attempts: number;
    readonly backoff_ms: number;
  };

  readonly debug: {
    /** If true, emits per-item debug logs (still structured). */
    readonly log_per_item: boolean;
  };
}

export const CURATION_DEFAULTS: CurationConfig = {
  version: CONFIG_VERSION,

  quality: {
    dark_below: 50,
    overexposed_above: 205,
    blur_edge_variance: 140,
    blur_center_edge_variance: 220,
    blur_lower_edge_variance: 180,
    blur_strong_center_edge_variance: 140
  },

  penalties: {
    scale: 0.5,
    dark: 0.2,
    blur_strong: 0.4,
    blur_center: 0.25,
    blur_lower: 0.15,
    low_resolution: 0.2,
    min_short_side: 720,

    risk_blur: 0.25,
    risk_out_of_focus: 0.25,
    risk_dark: 0.15,
    risk_overexposed: 0.15
  },

  photo: {
    target_count: 30,
    dedupe: true,
    hamming_threshold: 8,
    resume: false,
    force: false
  },

  video: {
    max_source_seconds: 60,
    target_digest_seconds: 90,
    max_selected_clips: 20,
    min_clip_seconds: 2,
    max_clip_seconds: 6,
    min_brightness: 15,
    dedupe: {
      enabled: true,
      hamming_threshold: 6,
      scope: "per_source_video"
    },
    preset: "youtube16x9",
    concat_in_digest_folder: false,
    use_hwaccel: false,
    analyze_audio: true
  },

  judge: {
    base_url: "http://localhost:11434",
    model: "",
    timeout_ms: 30_000,
    max_retries: 2,
    retry_backoff_ms: 800
  },

  cleanup: {
    keep_temp: false,
    max_attempts: 3,
    backoff_ms: 200
  },

  debug: {
    log_per_item: false
  }
};

export type CurationConfigOverrides = {
  quality?: Partial<QualityThresholds>;
  penalties?: Partial<PenaltyWeights>;
  photo?: Partial<CurationConfig["photo"]>;
  video?: Partial<Omit<CurationConfig["video"], "dedupe">> & {
    dedupe?: Partial<CurationConfig["video"]["dedupe"]>;
  };
  judge?: Partial<CurationConfig["judge"]>;
  cleanup?: Partial<CurationConfig["cleanup"]>;
  debug?: Partial<CurationConfig["debug"]>;
};

/**
 * Merge overrides into defaults (deep merge for nested config objects).
 * Deterministic and side-effect free.
 */
export function buildCurationConfig(overrides: CurationConfigOverrides = {}): CurationConfig {
  const d = CURATION_DEFAULTS;
  const merged: CurationConfig = {
    version: CONFIG_VERSION,
    quality: { ...d.quality, ...(overrides.quality ?? {}) },
    penalties: { ...d.penalties, ...(overrides.penalties ?? {}) },
    photo: { ...d.photo, ...(overrides.photo ?? {}) },
    video: {
      ...d.video,
      ...(overrides.video ?? {}),
      dedupe: {
        ...d.video.dedupe,
        ...(overrides.video?.dedupe ?? {})
      }
    },
    judge: { ...d.judge, ...(overrides.judge ?? {}) },
    cleanup: { ...d.cleanup, ...(overrides.cleanup ?? {}) },
    debug: { ...d.debug, ...(overrides.debug ?? {}) }
  };

  assertCurationConfig(merged);
  return merged;
}

/**
 * Validate configuration invariants early to avoid undefined runtime behavior.
 */
export function assertCurationConfig(cfg: CurationConfig): void {
  const fail = (msg: string): never => {
    throw new ConfigError(`CurationConfig invalid: ${msg}`);
  };

  if (cfg.version !== CONFIG_VERSION) fail(`version must be ${CONFIG_VERSION}`);

  const q = cfg.quality;
  if (q.dark_below < 0 || q.overexposed_above > 255 || q.dark_below >= q.overexposed_above)
    fail("quality.dark_below/overexposed_above must be within 0..255 and dark < overexposed");
  for (const [k, v] of Object.entries(q)) {
    if (!Number.isFinite(v) || v < 0) fail(`quality.${k} must be a finite number >= 0`);
  }

  for (const [k, v] of Object.entries(cfg.penalties)) {
    if (!Number.isFinite(v) || v < 0) fail(`penalties.${k} must be a finite number >= 0`);
  }

  const p = cfg.photo;
  if (!Number.isInteger(p.target_count) || p.target_count < 0) fail("photo.target_count must be an integer >= 0");
  if (p.hamming_threshold < 0 || p.hamming_threshold > 64) fail("photo.hamming_threshold must be within 0..64");

  const v = cfg.video;
  if (v.max_source_seconds <= 0) fail("video.max_source_seconds must be > 0");
  if (v.target_digest_seconds <= 0) fail("video.target_digest_seconds must be > 0");
  if (!Number.isInteger(v.max_selected_clips) || v.max_selected_clips <= 0)
    fail("video.max_selected_clips must be an integer > 0");
  if (v.min_clip_seconds <= 0) fail("video.min_clip_seconds must be > 0");
  if (v.max_clip_seconds < v.min_clip_seconds) fail("video.max_clip_seconds must be >= min_clip_seconds");
  if (v.min_brightness < 0 || v.min_brightness > 255) fail("video.min_brightness must be within 0..255");
  if (v.dedupe.hamming_threshold < 0 || v.dedupe.hamming_threshold > 64)
    fail("video.dedupe.hamming_threshold must be within 0..64");
  if (!DEDUPE_SCOPES.includes(v.dedupe.scope)) fail(`video.dedupe.scope must be one of ${DEDUPE_SCOPES.join(", ")}`);
  if (!VIDEO_PRESETS.includes(v.preset)) fail(`video.preset must be one of ${VIDEO_PRESETS.join(", ")}`);

  const j = cfg.judge;
  if (!/^https?:\/\//i.test(j.base_url)) fail("judge.base_url must be an http(s) URL");
  if (j.timeout_ms <= 0) fail("judge.timeout_ms must be > 0");
  if (!Number.isInteger(j.max_retries) || j.max_retries < 0) fail("judge.max_retries must be an integer >= 0");
  if (j.retry_backoff_ms < 0) fail("judge.retry_backoff_ms must be >= 0");

  const c = cfg.cleanup;
  if (!Number.isInteger(c.max_attempts) || c.max_attempts < 1) fail("cleanup.max_attempts must be an integer >= 1");
  if (c.backoff_ms < 0) fail("cleanup.backoff_ms must be >= 0");
}
