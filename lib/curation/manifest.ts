/*
  Batch manifests

  One JSON document per batch listing every item, whether it was selected and
  its error. Video manifests add per-source clip lists and digest paths.
*/

import fs from "fs/promises";
import path from "path";

import type { CONFIG_VERSION } from "./config";
import type { CleanupReport } from "./jobs/cleanup";
import type { LedgerSnapshot } from "./jobs/jobState";
import type { RunSummary } from "./logging/runLogger";
import type { ClipItem, PhotoItem, VideoSelectionStats } from "./types";

export interface PhotoManifestEntry {
  readonly path: string;
  readonly file_name: string;
  readonly width: number | null;
  readonly height: number | null;
  readonly orientation: string | null;
  readonly fingerprint: string | null;
  readonly score: number | null;
  readonly cached: boolean;
  readonly selected: boolean;
  readonly error: string | null;
  readonly quality: PhotoItem["quality"];
  readonly analysis: PhotoItem["analysis"];
}

export interface PhotoManifest {
  readonly version: typeof CONFIG_VERSION;
  readonly run_id: string;
  readonly photos: ReadonlyArray<PhotoManifestEntry>;
  /** Near-duplicate groups; the representative is the first member */
  readonly duplicate_groups: ReadonlyArray<ReadonlyArray<string>>;
  readonly summary: RunSummary;
}

export interface SelectedClipEntry {
  /** Copy under digest_clips/<stem>/ */
  readonly path: string;
  readonly source_clip: string;
  readonly start: number;
  readonly end: number;
  readonly score: number | null;
  readonly has_speech: boolean | null;
}

export interface SourceResult {
  readonly source_video: string;
  readonly selected_clips: ReadonlyArray<SelectedClipEntry>;
  readonly digest_path: string | null;
  readonly folder_digest_path: string | null;
  readonly total_duration: number;
  readonly stats: VideoSelectionStats | null;
  readonly error: string | null;
}

export interface VideoManifest {
  readonly version: typeof CONFIG_VERSION;
  readonly run_id: string;
  readonly sources: ReadonlyArray<SourceResult>;
  readonly clips: ReadonlyArray<ClipItem>;
  readonly stats: VideoSelectionStats;
  readonly ledger: LedgerSnapshot;
  readonly cleanup: CleanupReport;
  readonly summary: RunSummary;
}

export function photoManifestEntry(item: PhotoItem): PhotoManifestEntry {
  return {
    path: item.path,
    file_name: item.file_name,
    width: item.info?.width ?? null,
    height: item.info?.height ?? null,
    orientation: item.info?.orientation ?? null,
    fingerprint: item.fingerprint,
    score: item.score,
    cached: item.cached,
    selected: item.selected,
    error: item.error,
    quality: item.quality,
    analysis: item.analysis
  };
}

export async function writeManifest(filePath: string, manifest: PhotoManifest | VideoManifest): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(manifest, null, 2)}\n`, "utf8");
}
