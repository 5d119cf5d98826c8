/*
  Execution planner (dry run)

  Classifies inputs into "to process" / "to skip" and lists the outputs a
  real run would produce. Never writes: the cache is opened read-only and
  nothing is created on disk.
*/

import path from "path";

import type { VideoPreset } from "../config";
import { ScoreCache } from "../cache/scoreCache";
import type { Fingerprint } from "../scoring/hashing/fingerprint";
import { collectPhotoPaths, collectVideoPaths } from "./discover";
import {
  concatListPath,
  digestClipsDir,
  finalDigestPath,
  folderDigestPath,
  photoPaths,
  stemOf,
  videoPaths
} from "./outputPaths";

export interface PhotoPlan {
  readonly type: "photo";
  readonly resume: boolean;
  readonly files_to_process: ReadonlyArray<string>;
  readonly files_to_skip: ReadonlyArray<string>;
  readonly estimated_output_paths: ReadonlyArray<string>;
}

export interface VideoPlan {
  readonly type: "video";
  readonly preset: VideoPreset;
  readonly concat_in_digest_folder: boolean;
  readonly files_to_process: ReadonlyArray<string>;
  readonly files_to_skip: ReadonlyArray<string>;
  readonly estimated_output_paths: ReadonlyArray<string>;
}

export type ExecutionPlan = PhotoPlan | VideoPlan;

function uniq(items: ReadonlyArray<string>): string[] {
  return Array.from(new Set(items));
}

export async function buildPhotoPlan(params: {
  input: string;
  output_dir: string;
  resume: boolean;
  force: boolean;
  /** Fingerprint of a file's decoded pixels */
  fingerprintOf: (filePath: string) => Promise<Fingerprint>;
}): Promise<PhotoPlan> {
  const resume = params.resume && !params.force;
  const paths = photoPaths(params.output_dir);
  const cache = resume ? ScoreCache.open(paths.db_path, { readOnly: true }) : null;

  const files = await collectPhotoPaths(params.input);
  const toProcess: string[] = [];
  const toSkip: string[] = [];

  try {
    for (const file of files) {
      if (cache) {
        // Unreadable files stay in "to process"; the real run records their error.
        const fp = await params.fingerprintOf(file).catch(() => null);
        if (fp !== null && cache.get(file, fp)) {
          toSkip.push(file);
          continue;
        }
      }
      toProcess.push(file);
    }
  } finally {
    cache?.close();
  }

  const estimated = [
    paths.scores_dir,
    paths.manifest_path,
    paths.db_path,
    paths.selected_dir,
    ...toProcess.map((f) => path.join(paths.selected_dir, path.basename(f)))
  ];

  return {
    type: "photo",
    resume,
    files_to_process: toProcess,
    files_to_skip: toSkip,
    estimated_output_paths: uniq(estimated)
  };
}

export async function buildVideoPlan(params: {
  input: string;
  output_dir: string;
  preset: VideoPreset;
  concat_in_digest_folder: boolean;
}): Promise<VideoPlan> {
  const paths = videoPaths(params.output_dir);
  const files = await collectVideoPaths(params.input);

  const estimated: string[] = [paths.scores_dir, paths.manifest_path, paths.digest_clips_dir, paths.temp_dir];

  for (const file of files) {
    const stem = stemOf(file);
    estimated.push(path.join(digestClipsDir(paths, stem), "clip_*.mp4"));
    if (params.preset !== "clips_only") {
      estimated.push(finalDigestPath(paths, stem));
      estimated.push(concatListPath(paths, `${stem}_root`));
    }
    if (params.concat_in_digest_folder) {
      estimated.push(folderDigestPath(paths, stem));
      estimated.push(concatListPath(paths, `${stem}_folder`));
    }
  }

  return {
    type: "video",
    preset: params.preset,
    concat_in_digest_folder: params.concat_in_digest_folder,
    files_to_process: files,
    files_to_skip: [],
    estimated_output_paths: uniq(estimated)
  };
}
