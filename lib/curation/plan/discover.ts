/*
  Media discovery

  Recursive listings filtered by extension (case-insensitive), sorted so that
  processing order is deterministic.
*/

import fs from "fs/promises";
import path from "path";

export const PHOTO_EXTENSIONS: ReadonlyArray<string> = [".jpg", ".jpeg", ".png", ".heic"];
export const VIDEO_EXTENSIONS: ReadonlyArray<string> = [".mp4", ".mov", ".mkv", ".avi", ".webm"];

function hasExtension(file: string, exts: ReadonlyArray<string>): boolean {
  return exts.includes(path.extname(file).toLowerCase());
}

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) await walk(full, out);
    else if (e.isFile()) out.push(full);
  }
}

async function listMedia(input: string, exts: ReadonlyArray<string>, allowSingleFile: boolean): Promise<string[]> {
  const root = path.resolve(input);
  const st = await fs.stat(root);

  if (st.isFile()) {
    if (allowSingleFile && hasExtension(root, exts)) return [root];
    return [];
  }

  const all: string[] = [];
  await walk(root, all);
  return all.filter((f) => hasExtension(f, exts)).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function collectPhotoPaths(input: string): Promise<string[]> {
  return listMedia(input, PHOTO_EXTENSIONS, false);
}

/** A single video file or a directory of them */
export function collectVideoPaths(input: string): Promise<string[]> {
  return listMedia(input, VIDEO_EXTENSIONS, true);
}
