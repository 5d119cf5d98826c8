/*
  Output layout

  Photos
  - <out>/selected/
  - <out>/scores/manifest.photos.json
  - <out>/scores/photo_scores.sqlite

  Videos
  - <out>/scores/manifest.videos.json
  - <out>/temp/ (working tree; its basename is the cleanup sentinel)
  - <out>/digest_clips/<stem>/
  - <out>/<stem>_digest.mp4
  - <out>/temp/concat/<label>.txt
*/

import path from "path";

export const WORK_DIR_SENTINEL = "temp";

export interface PhotoOutputPaths {
  readonly output_dir: string;
  readonly selected_dir: string;
  readonly scores_dir: string;
  readonly manifest_path: string;
  readonly db_path: string;
}

export interface VideoOutputPaths {
  readonly output_dir: string;
  readonly scores_dir: string;
  readonly temp_dir: string;
  readonly digest_clips_dir: string;
  readonly manifest_path: string;
}

export function photoPaths(outputDir: string): PhotoOutputPaths {
  const scores = path.join(outputDir, "scores");
  return {
    output_dir: outputDir,
    selected_dir: path.join(outputDir, "selected"),
    scores_dir: scores,
    manifest_path: path.join(scores, "manifest.photos.json"),
    db_path: path.join(scores, "photo_scores.sqlite")
  };
}

export function videoPaths(outputDir: string): VideoOutputPaths {
  const scores = path.join(outputDir, "scores");
  return {
    output_dir: outputDir,
    scores_dir: scores,
    temp_dir: path.join(outputDir, WORK_DIR_SENTINEL),
    digest_clips_dir: path.join(outputDir, "digest_clips"),
    manifest_path: path.join(scores, "manifest.videos.json")
  };
}

export function digestClipsDir(paths: VideoOutputPaths, stem: string): string {
  return path.join(paths.digest_clips_dir, stem);
}

export function finalDigestPath(paths: VideoOutputPaths, stem: string): string {
  return path.join(paths.output_dir, `${stem}_digest.mp4`);
}

export function folderDigestPath(paths: VideoOutputPaths, stem: string): string {
  return path.join(digestClipsDir(paths, stem), "digest.mp4");
}

export function concatListPath(paths: VideoOutputPaths, label: string): string {
  return path.join(paths.temp_dir, "concat", `${label}.txt`);
}

/** Working subdirectories under temp/ */
export function workDirs(paths: VideoOutputPaths, stem: string): { clips: string; frames: string; audio: string } {
  return {
    clips: path.join(paths.temp_dir, "clips", stem),
    frames: path.join(paths.temp_dir, "frames", stem),
    audio: path.join(paths.temp_dir, "audio", stem)
  };
}

/** File name without its last extension */
export function stemOf(filePath: string): string {
  return path.parse(filePath).name;
}
