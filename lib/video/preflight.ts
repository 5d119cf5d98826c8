// lib/video/preflight.ts
import { ConfigError } from "../curation/errors";
import type { FetchLike } from "../curation/judge/client";
import { runProcess, type ProcessRunner } from "./ffmpeg";

export type PreflightStatus = {
  ffmpeg_ok: boolean;
  nvenc_available: boolean;
  judge_ok: boolean;
};

export type PreflightOptions = {
  ffmpegPath: string;
  baseUrl: string;
  useHwaccel: boolean;

  /** Default: true */
  requireFfmpeg?: boolean;
  /** Default: true */
  requireJudge?: boolean;

  /**
   * Judge reachability timeout.
   * Default: 3s.
   */
  timeoutMs?: number;

  run?: ProcessRunner;
  fetchImpl?: FetchLike;
};

export async function checkFfmpeg(run: ProcessRunner, ffmpegPath: string): Promise<boolean> {
  try {
    await run(ffmpegPath, ["-hide_banner", "-version"], { timeoutMs: 10_000 });
    return true;
  } catch {
    return false;
  }
}

export async function checkNvenc(run: ProcessRunner, ffmpegPath: string): Promise<boolean> {
  try {
    const { stdout } = await run(ffmpegPath, ["-hide_banner", "-encoders"], { timeoutMs: 10_000 });
    return stdout.toString("utf8").includes("h264_nvenc");
  } catch {
    return false;
  }
}

export async function checkJudge(fetchImpl: FetchLike, baseUrl: string, timeoutMs: number): Promise<boolean> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetchImpl(`${baseUrl.replace(/\/+$/, "")}/api/tags`, {
      method: "GET",
      signal: controller.signal,
    });
    return res.status === 200;
  } catch {
    return false;
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * Verify external tools before a run.
 * Throws ConfigError naming the first unmet requirement.
 */
export async function runPreflight(options: PreflightOptions): Promise<PreflightStatus> {
  const run = options.run ?? runProcess;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const requireFfmpeg = options.requireFfmpeg !== false;
  const requireJudge = options.requireJudge !== false;

  const ffmpeg_ok = requireFfmpeg ? await checkFfmpeg(run, options.ffmpegPath) : true;
  if (!ffmpeg_ok) {
    throw new ConfigError(`ffmpeg not runnable at "${options.ffmpegPath}". Install it or set FFMPEG_PATH.`);
  }

  const nvenc_available = requireFfmpeg ? await checkNvenc(run, options.ffmpegPath) : false;
  if (options.useHwaccel && !nvenc_available) {
    throw new ConfigError("h264_nvenc encoder not available in ffmpeg; disable use_hwaccel.");
  }

  const judge_ok = requireJudge ? await checkJudge(fetchImpl, options.baseUrl, options.timeoutMs ?? 3_000) : true;
  if (!judge_ok) {
    throw new ConfigError(`Cannot reach judge at ${options.baseUrl}. Check JUDGE_BASE_URL or --judge-url.`);
  }

  return { ffmpeg_ok, nvenc_available, judge_ok };
}
