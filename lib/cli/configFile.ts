/*
  CLI settings resolution

  Precedence (lowest first): defaults -> YAML file -> environment -> flags.

  YAML keys are accepted at the top level or under a `photo:` / `video:`
  section; a section value wins over the same top-level key. Booleans accept
  true/false/yes/no/on/off/1/0.
*/

import fs from "fs/promises";
import path from "path";
import * as yaml from "js-yaml";

import {
  DEDUPE_SCOPES,
  VIDEO_PRESETS,
  buildCurationConfig,
  type CurationConfig,
  type CurationConfigOverrides,
  type DedupeScope,
  type VideoPreset
} from "../curation/config";
import { ConfigError, describeError } from "../curation/errors";
import { resolveFfmpegPath, resolveFfprobePath } from "../video/ffmpeg";

export type FileSettings = Readonly<Record<string, unknown>>;
export type Env = Readonly<Record<string, string | undefined>>;
type Section = "photo" | "video";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export async function loadConfigFile(filePath: string): Promise<FileSettings> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (e) {
    throw new ConfigError(`Config file not readable: ${filePath} (${describeError(e)})`);
  }

  let data: unknown;
  try {
    data = yaml.load(text);
  } catch (e) {
    throw new ConfigError(`Config file is not valid YAML: ${filePath} (${describeError(e)})`);
  }

  if (data === null || data === undefined) return {};
  if (!isRecord(data)) throw new ConfigError(`Config file must be a YAML mapping: ${filePath}`);
  return data;
}

export function coerceBool(v: unknown): boolean | null {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  if (typeof v === "string") {
    const s = v.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(s)) return true;
    if (["0", "false", "no", "off"].includes(s)) return false;
  }
  return null;
}

function fileValue(file: FileSettings, section: Section, key: string): unknown {
  const nested = file[section];
  if (isRecord(nested) && nested[key] !== undefined && nested[key] !== null) return nested[key];
  return file[key];
}

function asString(key: string, v: unknown): string | undefined {
  if (v === undefined || v === null) return undefined;
  if (typeof v === "string" || typeof v === "number") return String(v);
  throw new ConfigError(`${key} must be a string`);
}

function asNumber(key: string, v: unknown): number | undefined {
  if (v === undefined || v === null || v === "") return undefined;
  const n = typeof v === "number" ? v : typeof v === "string" ? Number(v.trim()) : NaN;
  if (!Number.isFinite(n)) throw new ConfigError(`${key} must be a number (got ${JSON.stringify(v)})`);
  return n;
}

function asBool(key: string, v: unknown): boolean | undefined {
  if (v === undefined || v === null) return undefined;
  const b = coerceBool(v);
  if (b === null) throw new ConfigError(`${key} must be a boolean (got ${JSON.stringify(v)})`);
  return b;
}

function asChoice<T extends string>(key: string, v: unknown, choices: ReadonlyArray<T>): T | undefined {
  const s = asString(key, v);
  if (s === undefined) return undefined;
  const hit = choices.find((c) => c === s);
  if (hit === undefined) throw new ConfigError(`${key} must be one of ${choices.join(", ")} (got ${s})`);
  return hit;
}

function required<T>(flag: string, v: T | undefined): T {
  if (v === undefined || v === "") {
    throw new ConfigError(`missing required parameter ${flag}`);
  }
  return v;
}

/** Flags shared by the photos and videos commands */
export interface CommonFlags {
  readonly config?: string;
  readonly input?: string;
  readonly output?: string;
  readonly model?: string;
  readonly judgeUrl?: string;
  readonly debug?: boolean;
}

export interface PhotoFlags extends CommonFlags {
  readonly targetCount?: number;
  readonly resume?: boolean;
  readonly force?: boolean;
  readonly dedupe?: boolean;
  readonly hammingThreshold?: number;
}

export interface VideoFlags extends CommonFlags {
  readonly maxSourceSeconds?: number;
  readonly targetDigestSeconds?: number;
  readonly maxSelectedClips?: number;
  readonly minClip?: number;
  readonly maxClip?: number;
  readonly dedupe?: boolean;
  readonly dedupeHammingThreshold?: number;
  readonly dedupeScope?: string;
  readonly preset?: string;
  readonly concatInDigestFolder?: boolean;
  readonly useHwaccel?: boolean;
  readonly analyzeAudio?: boolean;
  readonly keepTemp?: boolean;
}

export interface ResolvedRun {
  readonly input: string;
  readonly output_dir: string;
  readonly config: CurationConfig;
  readonly ffmpeg_path: string;
  readonly ffprobe_path: string;
}

function envString(env: Env, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

function judgeOverrides(flags: CommonFlags, file: FileSettings, section: Section, env: Env): CurationConfig["judge"] {
  const pick = (key: string): unknown => fileValue(file, section, key);
  return {
    ...buildCurationConfig().judge,
    ...definedOnly({
      base_url: flags.judgeUrl ?? envString(env, "JUDGE_BASE_URL") ?? asString("base_url", pick("base_url")),
      model: flags.model ?? envString(env, "JUDGE_MODEL") ?? asString("model", pick("model")),
      timeout_ms: asNumber("judge_timeout_ms", pick("judge_timeout_ms")),
      max_retries: asNumber("judge_max_retries", pick("judge_max_retries"))
    })
  };
}

/** Drop keys whose value is undefined so spreads keep the defaults. */
function definedOnly<T extends Record<string, unknown>>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const k in obj) {
    if (obj[k] !== undefined) out[k] = obj[k];
  }
  return out;
}

function commonPaths(flags: CommonFlags, file: FileSettings, section: Section, env: Env) {
  const pick = (key: string): unknown => fileValue(file, section, key);
  const input = required("--input", flags.input ?? asString("input", pick("input")));
  const output = required("--output", flags.output ?? asString("output", pick("output")));
  return {
    input: path.resolve(input),
    output_dir: path.resolve(output),
    ffmpeg_path: resolveFfmpegPath(env),
    ffprobe_path: resolveFfprobePath(env)
  };
}

export function resolvePhotoRun(flags: PhotoFlags, file: FileSettings = {}, env: Env = process.env): ResolvedRun {
  const pick = (key: string): unknown => fileValue(file, "photo", key);
  const judge = judgeOverrides(flags, file, "photo", env);
  required("--model", judge.model || undefined);

  const overrides: CurationConfigOverrides = {
    photo: definedOnly({
      target_count: required("--target-count", flags.targetCount ?? asNumber("target_count", pick("target_count"))),
      resume: flags.resume ?? asBool("resume", pick("resume")),
      force: flags.force ?? asBool("force", pick("force")),
      dedupe: flags.dedupe ?? asBool("dedupe", pick("dedupe")),
      hamming_threshold: flags.hammingThreshold ?? asNumber("hamming_threshold", pick("hamming_threshold"))
    }),
    judge,
    debug: definedOnly({ log_per_item: flags.debug ?? asBool("debug", pick("debug")) })
  };

  return { ...commonPaths(flags, file, "photo", env), config: buildCurationConfig(overrides) };
}

export function resolveVideoRun(flags: VideoFlags, file: FileSettings = {}, env: Env = process.env): ResolvedRun {
  const pick = (key: string): unknown => fileValue(file, "video", key);
  const judge = judgeOverrides(flags, file, "video", env);
  required("--model", judge.model || undefined);

  const preset: VideoPreset | undefined = asChoice("preset", flags.preset ?? pick("preset"), VIDEO_PRESETS);
  const scope: DedupeScope | undefined = asChoice("dedupe_scope", flags.dedupeScope ?? pick("dedupe_scope"), DEDUPE_SCOPES);

  const overrides: CurationConfigOverrides = {
    video: {
      ...definedOnly({
        max_source_seconds: required(
          "--max-source-seconds",
          flags.maxSourceSeconds ?? asNumber("max_source_seconds", pick("max_source_seconds"))
        ),
        target_digest_seconds: flags.targetDigestSeconds ?? asNumber("target_digest_seconds", pick("target_digest_seconds")),
        max_selected_clips: flags.maxSelectedClips ?? asNumber("max_selected_clips", pick("max_selected_clips")),
        min_clip_seconds: flags.minClip ?? asNumber("min_clip", pick("min_clip")),
        max_clip_seconds: flags.maxClip ?? asNumber("max_clip", pick("max_clip")),
        min_brightness: asNumber("min_brightness", pick("min_brightness")),
        preset,
        concat_in_digest_folder: flags.concatInDigestFolder ?? asBool("concat_in_digest_folder", pick("concat_in_digest_folder")),
        use_hwaccel: flags.useHwaccel ?? asBool("use_hwaccel", pick("use_hwaccel")),
        analyze_audio: flags.analyzeAudio ?? asBool("analyze_audio", pick("analyze_audio"))
      }),
      dedupe: definedOnly({
        enabled: flags.dedupe ?? asBool("dedupe", pick("dedupe")),
        hamming_threshold: flags.dedupeHammingThreshold ?? asNumber("dedupe_hamming_threshold", pick("dedupe_hamming_threshold")),
        scope
      })
    },
    judge,
    cleanup: definedOnly({ keep_temp: flags.keepTemp ?? asBool("keep_temp", pick("keep_temp")) }),
    debug: definedOnly({ log_per_item: flags.debug ?? asBool("debug", pick("debug")) })
  };

  return { ...commonPaths(flags, file, "video", env), config: buildCurationConfig(overrides) };
}

export interface PlanFlags {
  readonly config?: string;
  readonly input?: string;
  readonly output?: string;
  readonly resume?: boolean;
  readonly force?: boolean;
  readonly preset?: string;
  readonly concatInDigestFolder?: boolean;
}

export interface ResolvedPlan {
  readonly input: string;
  readonly output_dir: string;
  readonly resume: boolean;
  readonly force: boolean;
  readonly preset: VideoPreset;
  readonly concat_in_digest_folder: boolean;
}

/** Dry-run settings: only paths and the options that change the plan; no judge needed. */
export function resolvePlan(
  kind: "photos" | "videos",
  flags: PlanFlags,
  file: FileSettings = {},
  env: Env = process.env
): ResolvedPlan {
  const section: Section = kind === "photos" ? "photo" : "video";
  const pick = (key: string): unknown => fileValue(file, section, key);
  const d = buildCurationConfig();
  const { input, output_dir } = commonPaths(flags, file, section, env);

  return {
    input,
    output_dir,
    resume: flags.resume ?? asBool("resume", pick("resume")) ?? d.photo.resume,
    force: flags.force ?? asBool("force", pick("force")) ?? d.photo.force,
    preset: asChoice("preset", flags.preset ?? pick("preset"), VIDEO_PRESETS) ?? d.video.preset,
    concat_in_digest_folder:
      flags.concatInDigestFolder ??
      asBool("concat_in_digest_folder", pick("concat_in_digest_folder")) ??
      d.video.concat_in_digest_folder
  };
}
