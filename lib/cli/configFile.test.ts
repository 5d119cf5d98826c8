import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "../curation/errors";
import { coerceBool, loadConfigFile, resolvePhotoRun, resolvePlan, resolveVideoRun } from "./configFile";

let dir = "";

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-config-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeYaml(text: string): string {
  const file = path.join(dir, "config.yaml");
  fs.writeFileSync(file, text);
  return file;
}

describe("coerceBool", () => {
  it("accepts the usual spellings", () => {
    expect(["true", "YES", " on ", "1"].map(coerceBool)).toEqual([true, true, true, true]);
    expect(["false", "No", "off", "0"].map(coerceBool)).toEqual([false, false, false, false]);
    expect([true, false, 2, 0].map(coerceBool)).toEqual([true, false, true, false]);
  });

  it("returns null for anything else", () => {
    expect(coerceBool("maybe")).toBeNull();
    expect(coerceBool(null)).toBeNull();
    expect(coerceBool({})).toBeNull();
  });
});

describe("loadConfigFile", () => {
  it("treats an empty file as no settings", async () => {
    expect(await loadConfigFile(writeYaml(""))).toEqual({});
  });

  it("reads a mapping", async () => {
    const file = writeYaml("model: judge-small\nvideo:\n  min_clip: 3\n");
    expect(await loadConfigFile(file)).toEqual({ model: "judge-small", video: { min_clip: 3 } });
  });

  it("rejects a non-mapping document", async () => {
    await expect(loadConfigFile(writeYaml("- a\n- b\n"))).rejects.toBeInstanceOf(ConfigError);
  });

  it("rejects a missing file", async () => {
    await expect(loadConfigFile(path.join(dir, "absent.yaml"))).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("resolveVideoRun", () => {
  const env = {};

  it("reads top-level and nested keys, nested winning", () => {
    const run = resolveVideoRun(
      {},
      {
        input: "in",
        output: "out",
        model: "judge-small",
        max_source_seconds: 45,
        min_clip: 1,
        video: { min_clip: 3, dedupe_scope: "global", use_hwaccel: "yes" }
      },
      env
    );

    expect(run.input).toBe(path.resolve("in"));
    expect(run.output_dir).toBe(path.resolve("out"));
    expect(run.config.video.max_source_seconds).toBe(45);
    expect(run.config.video.min_clip_seconds).toBe(3);
    expect(run.config.video.dedupe.scope).toBe("global");
    expect(run.config.video.use_hwaccel).toBe(true);
    expect(run.config.video.dedupe.enabled).toBe(true);
  });

  it("lets flags override the file", () => {
    const run = resolveVideoRun(
      { maxSourceSeconds: 30, minClip: 4, dedupe: false, preset: "clips_only" },
      { input: "in", output: "out", model: "judge-small", max_source_seconds: 45, video: { min_clip: 3 } },
      env
    );
    expect(run.config.video.max_source_seconds).toBe(30);
    expect(run.config.video.min_clip_seconds).toBe(4);
    expect(run.config.video.dedupe.enabled).toBe(false);
    expect(run.config.video.preset).toBe("clips_only");
  });

  it("requires max_source_seconds", () => {
    expect(() => resolveVideoRun({ input: "in", output: "out", model: "m" }, {}, env)).toThrow(
      "missing required parameter --max-source-seconds"
    );
  });

  it("rejects an unknown preset", () => {
    expect(() =>
      resolveVideoRun({ input: "in", output: "out", model: "m", maxSourceSeconds: 10, preset: "square" }, {}, env)
    ).toThrow("preset must be one of youtube16x9, shorts9x16, clips_only (got square)");
  });

  it("takes binary paths from the environment", () => {
    const run = resolveVideoRun(
      { input: "in", output: "out", model: "m", maxSourceSeconds: 10 },
      {},
      { FFMPEG_PATH: "/opt/ff/ffmpeg", FFPROBE_PATH: "/opt/ff/ffprobe" }
    );
    expect(run.ffmpeg_path).toBe("/opt/ff/ffmpeg");
    expect(run.ffprobe_path).toBe("/opt/ff/ffprobe");
  });
});

describe("resolvePhotoRun", () => {
  const file = { input: "in", output: "out", model: "file-model", target_count: 12, photo: { resume: "on" } };

  it("applies file values and coerces booleans", () => {
    const run = resolvePhotoRun({}, file, {});
    expect(run.config.photo.target_count).toBe(12);
    expect(run.config.photo.resume).toBe(true);
    expect(run.config.photo.force).toBe(false);
    expect(run.config.judge.model).toBe("file-model");
  });

  it("ranks environment above the file and flags above both", () => {
    const env = { JUDGE_MODEL: "env-model", JUDGE_BASE_URL: "http://judge.local:9000" };
    expect(resolvePhotoRun({}, file, env).config.judge).toMatchObject({
      model: "env-model",
      base_url: "http://judge.local:9000"
    });
    expect(resolvePhotoRun({ model: "flag-model", targetCount: 4 }, file, env).config).toMatchObject({
      judge: { model: "flag-model" },
      photo: { target_count: 4 }
    });
  });

  it("requires a model and a target count", () => {
    expect(() => resolvePhotoRun({ input: "in", output: "out", targetCount: 3 }, {}, {})).toThrow(
      "missing required parameter --model"
    );
    expect(() => resolvePhotoRun({ input: "in", output: "out", model: "m" }, {}, {})).toThrow(
      "missing required parameter --target-count"
    );
  });

  it("rejects a boolean it cannot read", () => {
    expect(() => resolvePhotoRun({}, { ...file, photo: { resume: "sometimes" } }, {})).toThrow(ConfigError);
  });
});

describe("resolvePlan", () => {
  it("needs only paths and falls back to defaults", () => {
    expect(resolvePlan("videos", { input: "in", output: "out" }, { video: { preset: "shorts9x16" } }, {})).toEqual({
      input: path.resolve("in"),
      output_dir: path.resolve("out"),
      resume: false,
      force: false,
      preset: "shorts9x16",
      concat_in_digest_folder: false
    });
  });

  it("reads photo resume from the photo section", () => {
    const plan = resolvePlan("photos", { output: "out" }, { input: "in", photo: { resume: 1 } }, {});
    expect(plan.resume).toBe(true);
  });
});
