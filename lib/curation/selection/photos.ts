/*
  Photo selection (count quota)

  Requirements
  - Deterministic: score-descending walk, ties in input order.
  - Greedy clustering against representative fingerprints only.
  - Unfingerprinted items are never clustered.
  - Near-duplicates never share the selected set; dedupe can be switched off.

  Notes
  - A representative is the first (therefore highest-scoring) member of its
    cluster under the walk.
*/

import type { CurationConfig } from "../config";
import type { Scored } from "../types";
import { hammingDistance, type Fingerprint } from "../scoring/hashing/fingerprint";
import { isEligible, sortByScoreDesc } from "./stats";

export type PhotoSelectionOptions = Pick<CurationConfig["photo"], "target_count" | "dedupe" | "hamming_threshold">;

export interface Cluster<T> {
  readonly representative: T;
  readonly members: ReadonlyArray<T>;
}

export interface PhotoSelectionResult<T> {
  readonly selected: ReadonlyArray<T>;
  readonly clusters: ReadonlyArray<Cluster<T>>;
  readonly eligible_count: number;
  readonly removed_duplicates: number;
}

interface MutableCluster<T> {
  readonly fingerprint: Fingerprint;
  readonly representative: T;
  readonly members: T[];
}

export function selectPhotos<T extends Scored>(
  items: ReadonlyArray<T>,
  opts: PhotoSelectionOptions
): PhotoSelectionResult<T> {
  const ordered = sortByScoreDesc(items.filter(isEligible));

  const clusters: MutableCluster<T>[] = [];
  const candidates: T[] = [];
  let removed = 0;

  for (const item of ordered) {
    if (!opts.dedupe || item.fingerprint === null) {
      candidates.push(item);
      continue;
    }

    const fp = item.fingerprint;
    const home = clusters.find((c) => hammingDistance(fp, c.fingerprint) <= opts.hamming_threshold);
    if (home) {
      home.members.push(item);
      removed += 1;
      continue;
    }

    clusters.push({ fingerprint: fp, representative: item, members: [item] });
    candidates.push(item);
  }

  const ranked = sortByScoreDesc(candidates);
  const selected = opts.target_count >= ranked.length ? ranked : ranked.slice(0, opts.target_count);

  return {
    selected,
    clusters: clusters.map((c) => ({ representative: c.representative, members: c.members })),
    eligible_count: ordered.length,
    removed_duplicates: removed
  };
}
