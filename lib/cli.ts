#!/usr/bin/env node
import dotenv from "dotenv";
import { Command, InvalidArgumentError, Option } from "commander";

import {
  loadConfigFile,
  resolvePhotoRun,
  resolvePlan,
  resolveVideoRun,
  type FileSettings,
  type PhotoFlags,
  type PlanFlags,
  type VideoFlags
} from "./cli/configFile";
import { buildCurationConfig } from "./curation/config";
import { ConfigError, describeError } from "./curation/errors";
import { createSharpPixelSource } from "./curation/image/decode";
import { createHttpJudge } from "./curation/judge/client";
import { createStreamLogger, type LogFormat } from "./curation/logging/sinks";
import { runPhotoCuration } from "./curation/pipeline/photoRun";
import { runVideoDigest } from "./curation/pipeline/videoRun";
import { buildPhotoPlan, buildVideoPlan } from "./curation/plan/executionPlan";
import { fingerprint64Hex } from "./curation/scoring/hashing/fingerprint";
import type { StructuredLogger } from "./curation/types";
import { createFfmpegTranscoder, resolveFfmpegPath } from "./video/ffmpeg";
import { runPreflight } from "./video/preflight";

dotenv.config();

type WithLogFormat = { logFormat: LogFormat };

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError("Not a number.");
  return n;
}

function parseInteger(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Not an integer.");
  return n;
}

function logFormatOption(): Option {
  return new Option("--log-format <format>", "log output on stderr").choices(["json", "text"]).default("text");
}

async function readSettings(configPath: string | undefined): Promise<FileSettings> {
  return configPath ? loadConfigFile(configPath) : {};
}

function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/** ConfigError exits 2, anything else 1. */
async function guard(log: StructuredLogger, task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (e) {
    log({ at: "cli.failed", level: "error", message: describeError(e), error: e instanceof Error ? e.name : null });
    process.exitCode = e instanceof ConfigError ? 2 : 1;
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("reel-curator")
    .description("Score, deduplicate and select photos and video clips with a vision judge")
    .version("0.1.0");

  program
    .command("photos")
    .description("curate a photo folder into selected/")
    .option("-c, --config <path>", "YAML config file")
    .option("-i, --input <path>", "photo file or folder")
    .option("-o, --output <path>", "output folder")
    .option("-n, --target-count <count>", "number of photos to select", parseInteger)
    .option("--model <name>", "judge model (default: JUDGE_MODEL)")
    .option("--judge-url <url>", "judge base URL (default: JUDGE_BASE_URL)")
    .option("--resume", "reuse cached scores")
    .option("--force", "ignore the score cache")
    .option("--dedupe", "exclude near-duplicates")
    .option("--no-dedupe", "keep near-duplicates")
    .option("--hamming-threshold <bits>", "near-duplicate distance", parseInteger)
    .option("--debug", "per-item log records")
    .addOption(logFormatOption())
    .action(async (opts: PhotoFlags & WithLogFormat) => {
      const log = createStreamLogger(opts.logFormat);
      await guard(log, async () => {
        const run = resolvePhotoRun(opts, await readSettings(opts.config));
        const res = await runPhotoCuration(
          { input: run.input, output_dir: run.output_dir, config: run.config },
          { pixels: createSharpPixelSource(), judge: createHttpJudge({ config: run.config.judge, log }), log }
        );
        printJson({ manifest_path: res.manifest_path, selected: res.selected.map((i) => i.path), summary: res.summary });
      });
    });

  program
    .command("videos")
    .description("split, score and assemble video digests")
    .option("-c, --config <path>", "YAML config file")
    .option("-i, --input <path>", "video file or folder")
    .option("-o, --output <path>", "output folder")
    .option("--max-source-seconds <seconds>", "longest source to accept", parseNumber)
    .option("--target-digest-seconds <seconds>", "digest duration budget", parseNumber)
    .option("--max-selected-clips <count>", "clip cap per source", parseInteger)
    .option("--min-clip <seconds>", "drop segments shorter than this", parseNumber)
    .option("--max-clip <seconds>", "segment length", parseNumber)
    .option("--model <name>", "judge model (default: JUDGE_MODEL)")
    .option("--judge-url <url>", "judge base URL (default: JUDGE_BASE_URL)")
    .option("--dedupe", "skip near-duplicate clips")
    .option("--no-dedupe", "keep near-duplicate clips")
    .option("--dedupe-hamming-threshold <bits>", "near-duplicate distance", parseInteger)
    .option("--dedupe-scope <scope>", "per_source_video | global")
    .option("--preset <preset>", "youtube16x9 | shorts9x16 | clips_only")
    .option("--concat-in-digest-folder", "also write digest_clips/<stem>/digest.mp4")
    .option("--use-hwaccel", "encode with h264_nvenc")
    .option("--analyze-audio", "compute speech hints")
    .option("--no-analyze-audio", "skip speech hints")
    .option("--keep-temp", "keep the temp/ working tree")
    .option("--debug", "per-item log records")
    .addOption(logFormatOption())
    .action(async (opts: VideoFlags & WithLogFormat) => {
      const log = createStreamLogger(opts.logFormat);
      await guard(log, async () => {
        const run = resolveVideoRun(opts, await readSettings(opts.config));
        await runPreflight({
          ffmpegPath: run.ffmpeg_path,
          baseUrl: run.config.judge.base_url,
          useHwaccel: run.config.video.use_hwaccel
        });

        const res = await runVideoDigest(
          { input: run.input, output_dir: run.output_dir, config: run.config },
          {
            pixels: createSharpPixelSource(),
            judge: createHttpJudge({ config: run.config.judge, log }),
            transcoder: createFfmpegTranscoder({ ffmpegPath: run.ffmpeg_path, ffprobePath: run.ffprobe_path }),
            log
          }
        );
        printJson({
          manifest_path: res.manifest_path,
          sources: res.sources.map((s) => ({ source: s.source_video, digest: s.digest_path, error: s.error })),
          cleanup: res.cleanup,
          summary: res.summary
        });
      });
    });

  program
    .command("plan")
    .description("print what a run would process and write, without running it")
    .argument("<kind>", "photos | videos")
    .option("-c, --config <path>", "YAML config file")
    .option("-i, --input <path>", "input file or folder")
    .option("-o, --output <path>", "output folder")
    .option("--resume", "photos: skip files with a cached score")
    .option("--force", "photos: ignore the score cache")
    .option("--preset <preset>", "videos: youtube16x9 | shorts9x16 | clips_only")
    .option("--concat-in-digest-folder", "videos: also plan the folder digest")
    .addOption(logFormatOption())
    .action(async (kind: string, opts: PlanFlags & WithLogFormat) => {
      const log = createStreamLogger(opts.logFormat);
      await guard(log, async () => {
        if (kind !== "photos" && kind !== "videos") throw new ConfigError(`unknown plan kind: ${kind}`);
        const plan = resolvePlan(kind, opts, await readSettings(opts.config));

        if (kind === "videos") {
          printJson(await buildVideoPlan(plan));
          return;
        }

        const pixels = createSharpPixelSource();
        printJson(
          await buildPhotoPlan({
            ...plan,
            fingerprintOf: async (filePath) => {
              const img = await pixels.decodeGray(filePath);
              return fingerprint64Hex(img.grayscale, img.width, img.height);
            }
          })
        );
      });
    });

  program
    .command("doctor")
    .description("check ffmpeg, the nvenc encoder and the judge endpoint")
    .option("--judge-url <url>", "judge base URL (default: JUDGE_BASE_URL)")
    .option("--use-hwaccel", "require h264_nvenc")
    .option("--skip-judge", "do not contact the judge")
    .addOption(logFormatOption())
    .action(async (opts: { judgeUrl?: string; useHwaccel?: boolean; skipJudge?: boolean } & WithLogFormat) => {
      const log = createStreamLogger(opts.logFormat);
      await guard(log, async () => {
        const baseUrl = opts.judgeUrl ?? process.env.JUDGE_BASE_URL ?? buildCurationConfig().judge.base_url;
        const status = await runPreflight({
          ffmpegPath: resolveFfmpegPath(),
          baseUrl,
          useHwaccel: opts.useHwaccel === true,
          requireJudge: opts.skipJudge !== true
        });
        printJson(status);
      });
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((e: unknown) => {
      process.stderr.write(`${describeError(e)}\n`);
      process.exitCode = 1;
    });
}
