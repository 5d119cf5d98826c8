/*
  Video digest runner

  Flow per batch
  - split every source into clips            (ledger step "split")
  - frame + fingerprint + quality + judge    (ledger step "score")
  - per-source selection with the accumulator (ledger step "select")
  - copy selected clips in start order, concat (ledger step "concat")
  - guarded cleanup of temp/, then the manifest with the cleanup report

  Notes
  - Sources are processed in discovery order; with global dedupe scope one
    accumulator is threaded through all of them in that order.
  - Audio hints are best-effort and never fail a clip.
*/

import crypto from "crypto";
import fs from "fs/promises";
import path from "path";

import { audioHintsFor } from "../../video/audio";
import { CONFIG_VERSION, type CurationConfig } from "../config";
import { ConfigError, describeError } from "../errors";
import { cleanupWorkDir, type CleanupReport } from "../jobs/cleanup";
import { JobLedger, type JobStep } from "../jobs/jobState";
import { createRunLogger, type RunLogger, type RunSummary } from "../logging/runLogger";
import { writeManifest, type SelectedClipEntry, type SourceResult, type VideoManifest } from "../manifest";
import { collectVideoPaths } from "../plan/discover";
import {
  concatListPath,
  digestClipsDir,
  finalDigestPath,
  folderDigestPath,
  stemOf,
  videoPaths,
  workDirs,
  type VideoOutputPaths
} from "../plan/outputPaths";
import { isEligible, scoreOf } from "../selection/stats";
import { FingerprintAccumulator, mergeSelectionStats, selectClips } from "../selection/videos";
import type { ClipItem, ClipSegment, CurationDeps, Transcoder, VideoSelectionStats } from "../types";
import { analyzeImage, judgeImage } from "./scoreImage";

export interface VideoRunParams {
  readonly input: string;
  readonly output_dir: string;
  readonly config: CurationConfig;
  readonly run_id?: string;
}

export interface VideoRunResult {
  readonly sources: ReadonlyArray<SourceResult>;
  readonly clips: ReadonlyArray<ClipItem>;
  readonly stats: VideoSelectionStats;
  readonly cleanup: CleanupReport;
  readonly manifest_path: string;
  readonly summary: RunSummary;
}

interface RunContext {
  readonly config: CurationConfig;
  readonly deps: CurationDeps;
  readonly transcoder: Transcoder;
  readonly paths: VideoOutputPaths;
  readonly ledger: JobLedger;
  readonly logger: RunLogger;
}

async function scoreClip(ctx: RunContext, source: string, segment: ClipSegment): Promise<ClipItem> {
  const base = {
    source,
    path: segment.path,
    index: segment.index,
    start: segment.start,
    end: segment.end,
    duration: segment.duration,
    selected: false
  };

  let frame_path: string | null = null;
  try {
    frame_path = path.join(workDirs(ctx.paths, stemOf(source)).frames, `${stemOf(segment.path)}.jpg`);
    await ctx.transcoder.extractFrame(segment.path, frame_path);

    const facts = await analyzeImage(ctx.deps.pixels, frame_path, ctx.config);
    const judged = await judgeImage(ctx.deps, frame_path, facts, ctx.config);
    const audio = ctx.config.video.analyze_audio ? await audioHintsFor(ctx.transcoder, segment.path) : null;

    ctx.ledger.ok("score", segment.path);
    ctx.logger.incProcessed();
    ctx.logger.debugItem({ clip: segment.path, score: judged.score, audio });

    return {
      ...base,
      frame_path,
      fingerprint: facts.fingerprint,
      quality: facts.quality,
      analysis: judged.analysis,
      audio,
      score: judged.score,
      error: null
    };
  } catch (e) {
    const error = describeError(e);
    ctx.ledger.fail("score", segment.path, error);
    ctx.logger.addFailure(error);
    ctx.logger.event("videos.clip_failed", "warn", error, { file: segment.path });
    return { ...base, frame_path, fingerprint: null, quality: null, analysis: null, audio: null, score: null, error };
  }
}

/**
 * Copy the chosen clips in start order and build the requested digests.
 */
async function assembleDigest(
  ctx: RunContext,
  source: string,
  chosen: ReadonlyArray<ClipItem>
): Promise<{ entries: SelectedClipEntry[]; digest_path: string | null; folder_digest_path: string | null }> {
  const stem = stemOf(source);
  const dir = digestClipsDir(ctx.paths, stem);
  await fs.mkdir(dir, { recursive: true });

  const ordered = [...chosen].sort((a, b) => a.start - b.start);
  const entries: SelectedClipEntry[] = [];
  const copies: string[] = [];

  for (const [i, clip] of ordered.entries()) {
    const destination = path.join(dir, `clip_${String(i + 1).padStart(4, "0")}${path.extname(clip.path)}`);
    await fs.copyFile(clip.path, destination);
    copies.push(destination);
    entries.push({
      path: destination,
      source_clip: clip.path,
      start: clip.start,
      end: clip.end,
      score: clip.score,
      has_speech: clip.audio?.has_speech ?? null
    });
  }

  const video = ctx.config.video;
  let digest_path: string | null = null;
  let folder_digest_path: string | null = null;

  if (copies.length > 0 && video.preset !== "clips_only") {
    digest_path = await ctx.transcoder.concat(
      copies,
      finalDigestPath(ctx.paths, stem),
      concatListPath(ctx.paths, `${stem}_root`),
      video.use_hwaccel
    );
  }
  if (copies.length > 0 && video.concat_in_digest_folder) {
    folder_digest_path = await ctx.transcoder.concat(
      copies,
      folderDigestPath(ctx.paths, stem),
      concatListPath(ctx.paths, `${stem}_folder`),
      video.use_hwaccel
    );
  }

  return { entries, digest_path, folder_digest_path };
}

export async function runVideoDigest(params: VideoRunParams, deps: CurationDeps): Promise<VideoRunResult> {
  const transcoder = deps.transcoder;
  if (!transcoder) throw new ConfigError("video runs need a transcoder");

  const { config } = params;
  const paths = videoPaths(params.output_dir);
  const run_id = params.run_id ?? crypto.randomUUID();
  const ledger = new JobLedger();
  const logger = createRunLogger({
    run_id,
    kind: "videos",
    config_version: config.version,
    log: deps.log,
    debug: config.debug.log_per_item,
    nowMs: deps.nowMs
  });
  const ctx: RunContext = { config, deps, transcoder, paths, ledger, logger };

  await fs.mkdir(paths.temp_dir, { recursive: true });
  const sources = await collectVideoPaths(params.input);

  // split + score
  const clipsBySource = new Map<string, ClipItem[]>();
  const splitErrors = new Map<string, string>();

  for (const source of sources) {
    let segments: ReadonlyArray<ClipSegment> = [];
    try {
      segments = await transcoder.split(source, workDirs(paths, stemOf(source)).clips, {
        min_clip_seconds: config.video.min_clip_seconds,
        max_clip_seconds: config.video.max_clip_seconds,
        use_hwaccel: config.video.use_hwaccel
      });
      ledger.ok("split", source);
    } catch (e) {
      const error = describeError(e);
      ledger.fail("split", source, error);
      logger.addFailure(error);
      logger.event("videos.split_failed", "error", error, { file: source });
      splitErrors.set(source, error);
    }

    const items: ClipItem[] = [];
    for (const segment of segments) items.push(await scoreClip(ctx, source, segment));
    clipsBySource.set(source, items);
  }

  // select + assemble
  const globalAccumulator = config.video.dedupe.scope === "global" ? new FingerprintAccumulator("global") : null;
  const chosenPaths = new Set<string>();
  const perSourceStats: VideoSelectionStats[] = [];
  const results: SourceResult[] = [];

  for (const source of sources) {
    const splitError = splitErrors.get(source);
    if (splitError !== undefined) {
      results.push({
        source_video: source,
        selected_clips: [],
        digest_path: null,
        folder_digest_path: null,
        total_duration: 0,
        stats: null,
        error: splitError
      });
      continue;
    }

    const clips = clipsBySource.get(source) ?? [];
    let step: JobStep = "select";
    let attempted: VideoSelectionStats | null = null;

    // A source's clips count as selected only once its digest is assembled.
    try {
      const accumulator = globalAccumulator ?? new FingerprintAccumulator("per_source_video");
      const selection = selectClips(clips, config.video, accumulator);
      attempted = selection.stats;
      ledger.ok("select", source);

      step = "concat";
      const digest = await assembleDigest(ctx, source, selection.selected);
      ledger.ok("concat", source);

      perSourceStats.push(selection.stats);
      for (const clip of selection.selected) chosenPaths.add(clip.path);
      results.push({
        source_video: source,
        selected_clips: digest.entries,
        digest_path: digest.digest_path,
        folder_digest_path: digest.folder_digest_path,
        total_duration: selection.stats.total_selected_seconds,
        stats: selection.stats,
        error: null
      });
    } catch (e) {
      const error = describeError(e);
      ledger.fail(step, source, error);
      logger.addFailure(error);
      logger.event(`videos.${step}_failed`, "error", error, { file: source });
      if (attempted !== null) {
        perSourceStats.push({ ...attempted, selected_clips_count: 0, removed_duplicates: 0, total_selected_seconds: 0 });
      }
      results.push({
        source_video: source,
        selected_clips: [],
        digest_path: null,
        folder_digest_path: null,
        total_duration: 0,
        stats: null,
        error
      });
    }
  }

  const clips = sources.flatMap((s) =>
    (clipsBySource.get(s) ?? []).map((c): ClipItem => (chosenPaths.has(c.path) ? { ...c, selected: true } : c))
  );
  const stats = mergeSelectionStats(perSourceStats, clips.filter(isEligible).map(scoreOf));
  logger.addRemovedDuplicates(stats.removed_duplicates);

  const cleanup = await cleanupWorkDir({
    work_dir: paths.temp_dir,
    output_dir: paths.output_dir,
    keep: config.cleanup.keep_temp,
    item_errors: clips.filter((c) => c.error !== null).length + splitErrors.size,
    ledger,
    max_attempts: config.cleanup.max_attempts,
    backoff_ms: config.cleanup.backoff_ms,
    sleep: deps.sleep,
    log: deps.log
  });

  const summary = logger.finalizeAndLog({ items_seen: clips.length, selected: chosenPaths.size });

  const manifest: VideoManifest = {
    version: CONFIG_VERSION,
    run_id,
    sources: results,
    clips,
    stats,
    ledger: ledger.toJSON(),
    cleanup,
    summary
  };
  await writeManifest(paths.manifest_path, manifest);

  return { sources: results, clips, stats, cleanup, manifest_path: paths.manifest_path, summary };
}
