// lib/video/ffmpeg.ts
import { spawn } from "child_process";
import fs from "fs/promises";
import path from "path";
import { path as bundledFfprobePath } from "ffprobe-static";

import { TranscodeError } from "../curation/errors";
import type { ClipSegment, ProbeResult, SplitOptions, Transcoder } from "../curation/types";

export type ProcessResult = {
  stdout: Buffer;
  stderr: string;
};

export type RunOptions = {
  cwd?: string;
  timeoutMs?: number;
};

/**
 * Spawns a binary and collects its output.
 * Non-zero exit, spawn failure and timeout reject with TranscodeError.
 */
export type ProcessRunner = (cmd: string, args: string[], opts?: RunOptions) => Promise<ProcessResult>;

export type FfmpegTranscoderOptions = {
  /** Default: FFMPEG_PATH, else `ffmpeg` on PATH */
  ffmpegPath?: string;

  /** Default: FFPROBE_PATH, else the ffprobe-static binary */
  ffprobePath?: string;

  /**
   * Safety timeout for encodes (split, concat).
   * Default: 10 minutes.
   */
  encodeTimeoutMs?: number;

  /**
   * Safety timeout for probe, frame grab and audio decode.
   * Default: 60s.
   */
  probeTimeoutMs?: number;

  run?: ProcessRunner;
};

type Env = Record<string, string | undefined>;

export function resolveFfmpegPath(env: Env = process.env): string {
  const explicit = env.FFMPEG_PATH?.trim();
  return explicit ? explicit : "ffmpeg";
}

export function resolveFfprobePath(env: Env = process.env): string {
  const explicit = env.FFPROBE_PATH?.trim();
  return explicit ? explicit : bundledFfprobePath;
}

export const runProcess: ProcessRunner = (cmd, args, opts) => {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      cwd: opts?.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const out: Buffer[] = [];
    let stderr = "";
    let settled = false;
    let timeout: NodeJS.Timeout | null = null;

    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      if (timeout) clearTimeout(timeout);
      fn();
    };

    child.stdout.on("data", (d: Buffer) => out.push(d));
    child.stderr.on("data", (d: Buffer) => (stderr += d.toString()));

    const timeoutMs = typeof opts?.timeoutMs === "number" ? opts.timeoutMs : null;
    if (timeoutMs && timeoutMs > 0) {
      timeout = setTimeout(() => {
        child.kill("SIGKILL");
        settle(() => reject(new TranscodeError(`${path.basename(cmd)} timed out after ${timeoutMs}ms`, stderr)));
      }, timeoutMs);
    }

    child.on("error", (err) => {
      settle(() => reject(new TranscodeError(`failed to start ${cmd}: ${err.message}`, stderr, err)));
    });

    child.on("close", (code) => {
      settle(() => {
        if (code === 0) return resolve({ stdout: Buffer.concat(out), stderr });
        reject(new TranscodeError(`${path.basename(cmd)} exited with code ${code}: ${stderr.trim()}`, stderr));
      });
    });
  });
};

/** "30000/1001" -> 29.97; "0/0" and garbage -> 0 */
export function parseFps(rate: unknown): number {
  if (typeof rate !== "string" || !rate.trim()) return 0;
  const [numRaw, denRaw] = rate.trim().split("/");
  const num = Number(numRaw);
  const den = denRaw === undefined ? 1 : Number(denRaw);
  if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0) return 0;
  return num / den;
}

function toNumber(v: unknown): number {
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim() ? Number(v) : NaN;
  return Number.isFinite(n) ? n : 0;
}

function field(obj: unknown, key: string): unknown {
  return typeof obj === "object" && obj !== null ? Reflect.get(obj, key) : undefined;
}

export function parseProbeJson(stdout: string): ProbeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (e) {
    throw new TranscodeError("ffprobe returned invalid JSON", stdout, e);
  }

  const streams = field(parsed, "streams");
  const stream: unknown = Array.isArray(streams) ? streams[0] : undefined;

  return {
    duration: toNumber(field(field(parsed, "format"), "duration")),
    width: Math.trunc(toNumber(field(stream, "width"))),
    height: Math.trunc(toNumber(field(stream, "height"))),
    fps: parseFps(field(stream, "avg_frame_rate")),
  };
}

export function buildProbeArgs(filePath: string): string[] {
  return [
    "-v",
    "error",
    "-select_streams",
    "v:0",
    "-show_entries",
    "stream=width,height,avg_frame_rate",
    "-show_entries",
    "format=duration",
    "-of",
    "json",
    filePath,
  ];
}

const NVENC_VIDEO = ["-c:v", "h264_nvenc", "-preset", "p4", "-rc", "vbr", "-cq", "19", "-b:v", "10M", "-maxrate", "20M", "-bufsize", "20M"];

/**
 * Fixed-length segments with a forced keyframe at every boundary.
 */
export function buildSegmentArgs(source: string, outPattern: string, segmentSeconds: number, useHwaccel: boolean): string[] {
  const seg = String(segmentSeconds);
  const video = useHwaccel
    ? NVENC_VIDEO
    : ["-c:v", "libx264", "-crf", "22", "-preset", "veryfast"];

  return [
    "-y",
    ...(useHwaccel ? ["-hwaccel", "cuda"] : []),
    "-i",
    source,
    ...video,
    "-pix_fmt",
    "yuv420p",
    "-force_key_frames",
    `expr:gte(t,n_forced*${seg})`,
    "-c:a",
    "aac",
    "-b:a",
    "128k",
    "-f",
    "segment",
    "-segment_time",
    seg,
    "-reset_timestamps",
    "1",
    outPattern,
  ];
}

export function buildFrameArgs(clipPath: string, atSeconds: number, outPath: string): string[] {
  return ["-y", "-ss", atSeconds.toFixed(3), "-i", clipPath, "-frames:v", "1", "-q:v", "2", outPath];
}

/** Concat demuxer list; single quotes in paths use the demuxer's `'\''` escape. */
export function buildConcatList(clips: ReadonlyArray<string>): string {
  return clips
    .map((clip) => {
      const posix = clip.split(path.sep).join("/");
      return `file '${posix.replace(/'/g, "'\\''")}'`;
    })
    .join("\n");
}

export function buildConcatArgs(listPath: string, outPath: string, useHwaccel: boolean): string[] {
  const video = useHwaccel
    ? [...NVENC_VIDEO, "-pix_fmt", "yuv420p", "-profile:v", "high"]
    : ["-c:v", "libx264", "-pix_fmt", "yuv420p", "-profile:v", "high"];

  return [
    "-y",
    "-f",
    "concat",
    "-safe",
    "0",
    "-i",
    listPath,
    ...video,
    "-c:a",
    "aac",
    "-b:a",
    "128k",
    "-movflags",
    "+faststart",
    outPath,
  ];
}

/** Mono 16 kHz s16le on stdout */
export function buildAudioArgs(clipPath: string): string[] {
  return ["-v", "error", "-i", clipPath, "-vn", "-ac", "1", "-ar", "16000", "-acodec", "pcm_s16le", "-f", "s16le", "-"];
}

export function pcmFromBuffer(buf: Buffer): Int16Array {
  const n = Math.floor(buf.length / 2);
  const out = new Int16Array(n);
  for (let i = 0; i < n; i++) out[i] = buf.readInt16LE(i * 2);
  return out;
}

const CLIP_FILE = /^clip_\d{4,}\.mp4$/;

export function createFfmpegTranscoder(options: FfmpegTranscoderOptions = {}): Transcoder {
  const ffmpeg = options.ffmpegPath ?? resolveFfmpegPath();
  const ffprobe = options.ffprobePath ?? resolveFfprobePath();
  const run = options.run ?? runProcess;
  const encodeTimeoutMs = options.encodeTimeoutMs ?? 10 * 60_000;
  const probeTimeoutMs = options.probeTimeoutMs ?? 60_000;

  const probe = async (filePath: string): Promise<ProbeResult> => {
    const { stdout } = await run(ffprobe, buildProbeArgs(filePath), { timeoutMs: probeTimeoutMs });
    return parseProbeJson(stdout.toString("utf8"));
  };

  const split = async (source: string, outDir: string, opts: SplitOptions): Promise<ClipSegment[]> => {
    await fs.mkdir(outDir, { recursive: true });
    await run(
      ffmpeg,
      buildSegmentArgs(source, path.join(outDir, "clip_%04d.mp4"), opts.max_clip_seconds, opts.use_hwaccel),
      { timeoutMs: encodeTimeoutMs }
    );

    const files = (await fs.readdir(outDir)).filter((f) => CLIP_FILE.test(f)).sort();

    const segments: ClipSegment[] = [];
    let cursor = 0;
    for (const file of files) {
      const clipPath = path.join(outDir, file);
      const { duration } = await probe(clipPath);
      if (duration < opts.min_clip_seconds) continue;

      segments.push({ path: clipPath, index: segments.length, start: cursor, end: cursor + duration, duration });
      cursor += duration;
    }
    return segments;
  };

  const extractFrame = async (clipPath: string, outPath: string): Promise<string> => {
    const { duration } = await probe(clipPath);
    await fs.mkdir(path.dirname(outPath), { recursive: true });
    await run(ffmpeg, buildFrameArgs(clipPath, Math.max(0, duration / 2), outPath), { timeoutMs: probeTimeoutMs });
    return outPath;
  };

  const concat = async (
    clips: ReadonlyArray<string>,
    outPath: string,
    listPath: string,
    useHwaccel: boolean
  ): Promise<string> => {
    if (clips.length === 0) throw new TranscodeError("concat needs at least one clip");
    await fs.mkdir(path.dirname(listPath), { recursive: true });
    await fs.writeFile(listPath, buildConcatList(clips), "utf8");
    await fs.mkdir(path.dirname(outPath), { recursive: true });
    await run(ffmpeg, buildConcatArgs(listPath, outPath, useHwaccel), { timeoutMs: encodeTimeoutMs });
    return outPath;
  };

  const decodeAudioPcm = async (clipPath: string): Promise<Int16Array> => {
    const { stdout } = await run(ffmpeg, buildAudioArgs(clipPath), { timeoutMs: probeTimeoutMs });
    return pcmFromBuffer(stdout);
  };

  return { probe, split, extractFrame, concat, decodeAudioPcm };
}
