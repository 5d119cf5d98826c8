/*
  Curation types

  Strict types shared by scoring, selection, planning and the batch runners.
  Keep this file dependency-free so it can be imported anywhere without
  side effects.
*/

import type { Fingerprint } from "./scoring/hashing/fingerprint";

export type Orientation = "square" | "landscape" | "portrait";

export interface ImageInfo {
  readonly width: number;
  readonly height: number;
  readonly orientation: Orientation;
}

export interface QualityMetrics {
  /** Mean luma 0..255 */
  readonly brightness: number;
  /** Pixel count */
  readonly resolution: number;
  readonly edge_variance: number;
  readonly center_edge_variance: number;
  readonly lower_edge_variance: number;

  readonly dark: boolean;
  readonly overexposed: boolean;
  readonly blur: boolean;
  readonly blur_center: boolean;
  readonly blur_lower: boolean;
  readonly blur_strong: boolean;
}

export interface JudgeRisks {
  readonly blur: boolean;
  readonly dark: boolean;
  readonly overexposed: boolean;
  readonly out_of_focus: boolean;
}

/** Canonical judge analysis. Every field is present and well-typed. */
export interface JudgeAnalysis {
  readonly caption: string;
  readonly tags: ReadonlyArray<string>;
  readonly risks: JudgeRisks;
  /** 0..1, taken from `overall_score` when present, else `score` */
  readonly score: number;

  readonly sharpness: number;
  readonly subject_visibility: number;
  readonly composition: number;
  readonly duplication_penalty: number;
  readonly reasoning: string;
}

export interface AudioHints {
  readonly has_speech: boolean;
  /** Mean RMS 0..1 */
  readonly rms: number;
}

/** Fields every selectable item carries. */
export interface Scored {
  readonly fingerprint: Fingerprint | null;
  /** Final score after penalties */
  readonly score: number | null;
  readonly error: string | null;
}

export interface PhotoItem extends Scored {
  readonly path: string;
  readonly file_name: string;
  readonly info: ImageInfo | null;
  readonly quality: QualityMetrics | null;
  readonly analysis: JudgeAnalysis | null;
  /** True when the score came from the cache */
  readonly cached: boolean;
  readonly selected: boolean;
}

export interface ClipItem extends Scored {
  readonly source: string;
  readonly path: string;
  /** Position within the source's kept segments, from 0 */
  readonly index: number;
  readonly start: number;
  readonly end: number;
  readonly duration: number;
  readonly frame_path: string | null;
  readonly quality: QualityMetrics | null;
  readonly analysis: JudgeAnalysis | null;
  readonly audio: AudioHints | null;
  readonly selected: boolean;
}

export interface ScoreDistribution {
  readonly min: number;
  readonly median: number;
  readonly p90: number;
  readonly max: number;
}

export interface VideoSelectionStats {
  readonly total_clips: number;
  readonly scored_clips: number;
  readonly selected_clips_count: number;
  readonly removed_duplicates: number;
  readonly total_selected_seconds: number;
  readonly score_distribution: ScoreDistribution | null;
}

/* ---------------- Injected collaborators ---------------- */

export interface DecodedGray {
  readonly width: number;
  readonly height: number;
  /** Row-major grayscale, length = width * height */
  readonly grayscale: Uint8Array;
}

/**
 * Imaging collaborator. Implementations must be deterministic for identical
 * file content.
 */
export interface PixelSource {
  decodeGray(filePath: string): Promise<DecodedGray>;
  /** Base64 image payload for the judge */
  encodeForJudge(filePath: string): Promise<string>;
}

export interface ClipSegment {
  readonly path: string;
  readonly index: number;
  readonly start: number;
  readonly end: number;
  readonly duration: number;
}

export interface SplitOptions {
  readonly min_clip_seconds: number;
  readonly max_clip_seconds: number;
  readonly use_hwaccel: boolean;
}

export interface ProbeResult {
  readonly duration: number;
  readonly width: number;
  readonly height: number;
  readonly fps: number;
}

/** Media transcoding collaborator. Failures reject with TranscodeError. */
export interface Transcoder {
  probe(filePath: string): Promise<ProbeResult>;
  split(source: string, outDir: string, opts: SplitOptions): Promise<ReadonlyArray<ClipSegment>>;
  extractFrame(clipPath: string, outPath: string): Promise<string>;
  concat(clips: ReadonlyArray<string>, outPath: string, listPath: string, useHwaccel: boolean): Promise<string>;
  /** Mono 16 kHz signed 16-bit PCM */
  decodeAudioPcm(clipPath: string): Promise<Int16Array>;
}

export interface JudgeRequest {
  readonly prompt: string;
  readonly image_b64: string;
}

/** Judge collaborator. Resolves to the raw structured payload. */
export interface Judge {
  judge(req: JudgeRequest): Promise<unknown>;
}

export interface StructuredLogger {
  (obj: unknown): void;
}

/**
 * Dependencies injected into the batch runners (no hidden globals).
 */
export interface CurationDeps {
  readonly pixels: PixelSource;
  readonly judge: Judge;
  readonly transcoder?: Transcoder;

  /** Structured logger hook; if omitted, logging is a no-op. */
  log?: StructuredLogger;

  /** Clock in ms for testability */
  nowMs?: () => number;
  /** Delay used between cleanup retries */
  sleep?: (ms: number) => Promise<void>;
}
