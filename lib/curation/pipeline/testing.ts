/*
  In-process stand-ins for the runner collaborators (tests only).
*/

import fs from "fs/promises";
import path from "path";

import { DecodeError, TranscodeError } from "../errors";
import type { ClipSegment, DecodedGray, Judge, PixelSource, ProbeResult, SplitOptions, Transcoder } from "../types";

export type Pattern = "left" | "top" | "flat";

/** 8x8 test image: bright half (200) against a dark half (50) */
export function patternImage(pattern: Pattern): DecodedGray {
  const grayscale = new Uint8Array(64);
  for (let y = 0; y < 8; y++) {
    for (let x = 0; x < 8; x++) {
      const bright = pattern === "flat" || (pattern === "left" ? x < 4 : y < 4);
      grayscale[y * 8 + x] = bright ? 200 : 50;
    }
  }
  return { width: 8, height: 8, grayscale };
}

/** `<parent dir>/<basename>` */
export function fileKey(filePath: string): string {
  return `${path.basename(path.dirname(filePath))}/${path.basename(filePath)}`;
}

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return table[key] ?? table[key.slice(key.indexOf("/") + 1)];
}

/**
 * Decodes by `parent/basename`, falling back to the basename. Unknown names
 * fail with DecodeError. The judge payload is the base64 of the key so a fake
 * judge can tell images apart.
 */
export function fakePixels(patterns: Readonly<Record<string, Pattern>>): PixelSource {
  return {
    decodeGray: async (filePath) => {
      const pattern = lookup(patterns, fileKey(filePath));
      if (pattern === undefined) throw new DecodeError(`cannot decode ${path.basename(filePath)}`);
      return patternImage(pattern);
    },
    encodeForJudge: async (filePath) => Buffer.from(fileKey(filePath)).toString("base64")
  };
}

/** Replies by key (same fallback as fakePixels); records the basename of every image judged. */
export function fakeJudge(replies: Readonly<Record<string, unknown>>): Judge & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    judge: async (req) => {
      const key = Buffer.from(req.image_b64, "base64").toString("utf8");
      calls.push(key.slice(key.indexOf("/") + 1));
      const reply = lookup(replies, key);
      return reply === undefined ? { score: 0 } : reply;
    }
  };
}

export interface FakeSource {
  /** Clip durations in seconds, in segment order */
  readonly clips: ReadonlyArray<number>;
  readonly fail?: boolean;
}

/**
 * Writes empty clip files on split; frames are named after the clip stem so
 * `fakePixels` can key on them.
 */
export function fakeTranscoder(sources: Readonly<Record<string, FakeSource>>): Transcoder & { concats: string[][] } {
  const concats: string[][] = [];

  return {
    concats,
    probe: async (): Promise<ProbeResult> => ({ duration: 0, width: 8, height: 8, fps: 30 }),
    split: async (source: string, outDir: string, opts: SplitOptions): Promise<ClipSegment[]> => {
      const fake = sources[path.basename(source)];
      if (!fake || fake.fail) throw new TranscodeError(`ffmpeg exited with code 1: ${path.basename(source)}`, "invalid data");

      await fs.mkdir(outDir, { recursive: true });
      const out: ClipSegment[] = [];
      let cursor = 0;
      for (const [i, duration] of fake.clips.entries()) {
        const clipPath = path.join(outDir, `clip_${String(i).padStart(4, "0")}.mp4`);
        await fs.writeFile(clipPath, `clip ${i}`);
        if (duration < opts.min_clip_seconds) continue;
        out.push({ path: clipPath, index: out.length, start: cursor, end: cursor + duration, duration });
        cursor += duration;
      }
      return out;
    },
    extractFrame: async (_clip: string, outPath: string) => {
      await fs.mkdir(path.dirname(outPath), { recursive: true });
      await fs.writeFile(outPath, "frame");
      return outPath;
    },
    concat: async (clips, outPath, listPath) => {
      concats.push([...clips]);
      await fs.mkdir(path.dirname(listPath), { recursive: true });
      await fs.writeFile(listPath, clips.join("\n"));
      await fs.writeFile(outPath, "digest");
      return outPath;
    },
    decodeAudioPcm: async () => new Int16Array(320).fill(3277)
  };
}
