/*
  Photo batch runner

  Requirements
  - Every discovered file ends up in the manifest, selected or not.
  - A per-item failure is captured on the item; the batch always completes.
  - Resume reuses a cached score only when the stored fingerprint matches.
  - Selected files are copied into selected/; a failed copy un-selects the item.
*/

import crypto from "crypto";
import fs from "fs/promises";
import path from "path";

import { CONFIG_VERSION, type CurationConfig } from "../config";
import { ScoreCache } from "../cache/scoreCache";
import { describeError } from "../errors";
import { createRunLogger, type RunSummary } from "../logging/runLogger";
import { photoManifestEntry, writeManifest, type PhotoManifest } from "../manifest";
import { collectPhotoPaths } from "../plan/discover";
import { photoPaths } from "../plan/outputPaths";
import { selectPhotos } from "../selection/photos";
import type { CurationDeps, PhotoItem } from "../types";
import { analyzeImage, judgeImage, type ImageFacts } from "./scoreImage";

export interface PhotoRunParams {
  readonly input: string;
  readonly output_dir: string;
  readonly config: CurationConfig;
  readonly run_id?: string;
}

export interface PhotoRunResult {
  readonly items: ReadonlyArray<PhotoItem>;
  readonly selected: ReadonlyArray<PhotoItem>;
  readonly manifest_path: string;
  readonly summary: RunSummary;
}

function failedItem(filePath: string, facts: ImageFacts | null, error: string): PhotoItem {
  return {
    path: filePath,
    file_name: path.basename(filePath),
    info: facts?.info ?? null,
    fingerprint: facts?.fingerprint ?? null,
    quality: facts?.quality ?? null,
    analysis: null,
    score: null,
    cached: false,
    selected: false,
    error
  };
}

/** selected/<name>, suffixed `_2`, `_3`... when two sources share a basename */
function destinationName(fileName: string, used: Set<string>): string {
  const { name, ext } = path.parse(fileName);
  let candidate = fileName;
  for (let n = 2; used.has(candidate.toLowerCase()); n++) candidate = `${name}_${n}${ext}`;
  used.add(candidate.toLowerCase());
  return candidate;
}

export async function runPhotoCuration(params: PhotoRunParams, deps: CurationDeps): Promise<PhotoRunResult> {
  const { config } = params;
  const paths = photoPaths(params.output_dir);
  const run_id = params.run_id ?? crypto.randomUUID();
  const logger = createRunLogger({
    run_id,
    kind: "photos",
    config_version: config.version,
    log: deps.log,
    debug: config.debug.log_per_item,
    nowMs: deps.nowMs
  });

  await fs.mkdir(paths.selected_dir, { recursive: true });
  const files = await collectPhotoPaths(params.input);
  const resume = config.photo.resume && !config.photo.force;

  const cache = ScoreCache.open(paths.db_path, { log: deps.log });
  const scored: PhotoItem[] = [];

  try {
    for (const file of files) {
      let facts: ImageFacts | null = null;
      try {
        facts = await analyzeImage(deps.pixels, file, config);

        const hit = resume ? cache.get(file, facts.fingerprint) : null;
        if (hit) {
          logger.incCached();
          scored.push({
            path: file,
            file_name: path.basename(file),
            info: facts.info,
            fingerprint: facts.fingerprint,
            quality: hit.quality ?? facts.quality,
            analysis: hit.analysis,
            score: hit.score,
            cached: true,
            selected: false,
            error: null
          });
          logger.debugItem({ file, cached: true, score: hit.score });
          continue;
        }

        const judged = await judgeImage(deps, file, facts, config);
        cache.upsert(file, facts.fingerprint, judged.score, judged.analysis, facts.quality);
        logger.incProcessed();

        scored.push({
          path: file,
          file_name: path.basename(file),
          info: facts.info,
          fingerprint: facts.fingerprint,
          quality: facts.quality,
          analysis: judged.analysis,
          score: judged.score,
          cached: false,
          selected: false,
          error: null
        });
        logger.debugItem({ file, cached: false, score: judged.score });
      } catch (e) {
        const error = describeError(e);
        logger.addFailure(error);
        logger.event("photos.item_failed", "warn", error, { file });
        scored.push(failedItem(file, facts, error));
      }
    }
  } finally {
    cache.close();
  }

  const selection = selectPhotos(scored, config.photo);
  logger.addRemovedDuplicates(selection.removed_duplicates);

  // Copy in rank order; outcome keyed by source path.
  const copyErrors = new Map<string, string>();
  const usedNames = new Set<string>();
  for (const item of selection.selected) {
    const destination = path.join(paths.selected_dir, destinationName(item.file_name, usedNames));
    try {
      await fs.copyFile(item.path, destination);
    } catch (e) {
      const error = describeError(e);
      copyErrors.set(item.path, error);
      logger.addFailure(error);
      logger.event("photos.copy_failed", "warn", error, { file: item.path });
    }
  }

  const chosen = new Set(selection.selected.map((i) => i.path));
  const items = scored.map((item): PhotoItem => {
    const copyError = copyErrors.get(item.path);
    if (copyError !== undefined) return { ...item, selected: false, error: item.error ?? copyError };
    return chosen.has(item.path) ? { ...item, selected: true } : item;
  });

  const byPath = new Map(items.map((i) => [i.path, i]));
  const selected = selection.selected.flatMap((i) => {
    const final = byPath.get(i.path);
    return final && final.selected ? [final] : [];
  });

  const summary = logger.finalizeAndLog({ items_seen: files.length, selected: selected.length });

  const manifest: PhotoManifest = {
    version: CONFIG_VERSION,
    run_id,
    photos: items.map(photoManifestEntry),
    duplicate_groups: selection.clusters
      .filter((c) => c.members.length > 1)
      .map((c) => c.members.map((m) => m.path)),
    summary
  };
  await writeManifest(paths.manifest_path, manifest);

  return { items, selected, manifest_path: paths.manifest_path, summary };
}
