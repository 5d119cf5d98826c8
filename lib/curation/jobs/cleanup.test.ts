import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { UnsafeCleanupTargetError } from "../errors";
import { cleanupWorkDir, verifyCleanupTarget, type CleanupFs } from "./cleanup";
import { JobLedger } from "./jobState";

let root = "";
let output = "";
let temp = "";

function okLedger(): JobLedger {
  const ledger = new JobLedger();
  ledger.ok("split", "a");
  return ledger;
}

function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: simulated`), { code });
}

beforeEach(() => {
  root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "cleanup-")));
  output = path.join(root, "output");
  temp = path.join(output, "temp");
  fs.mkdirSync(path.join(temp, "clips", "source"), { recursive: true });
  fs.mkdirSync(path.join(temp, "frames", "source"), { recursive: true });
  fs.writeFileSync(path.join(temp, "clips", "source", "clip_0001.mp4"), "clip");
  fs.writeFileSync(path.join(temp, "frames", "source", "frame.jpg"), "frame");
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

const base = {
  keep: false,
  item_errors: 0,
  max_attempts: 3,
  backoff_ms: 200,
  sleep: async () => {}
};

describe("cleanupWorkDir", () => {
  it("removes all files then all empty directories", async () => {
    const report = await cleanupWorkDir({ ...base, work_dir: temp, output_dir: output, ledger: okLedger() });

    expect(report.ran).toBe(true);
    expect(report.outcomes).toEqual([
      { path: path.join(temp, "clips", "source", "clip_0001.mp4"), kind: "file", status: "deleted", reason: null },
      { path: path.join(temp, "frames", "source", "frame.jpg"), kind: "file", status: "deleted", reason: null },
      { path: path.join(temp, "frames", "source"), kind: "dir", status: "deleted", reason: null },
      { path: path.join(temp, "clips", "source"), kind: "dir", status: "deleted", reason: null },
      { path: path.join(temp, "frames"), kind: "dir", status: "deleted", reason: null },
      { path: path.join(temp, "clips"), kind: "dir", status: "deleted", reason: null },
      { path: temp, kind: "dir", status: "deleted", reason: null }
    ]);
    expect(fs.existsSync(temp)).toBe(false);
    expect(fs.existsSync(output)).toBe(true);
  });

  it("leaves the tree alone when keep is requested", async () => {
    const report = await cleanupWorkDir({ ...base, keep: true, work_dir: temp, output_dir: output, ledger: okLedger() });
    expect(report.ran).toBe(false);
    expect(report.skipped_reason).toBe("keep requested");
    expect(fs.existsSync(path.join(temp, "clips", "source", "clip_0001.mp4"))).toBe(true);
  });

  it("leaves the tree alone when any ledger entry failed", async () => {
    const ledger = okLedger();
    ledger.fail("concat", "a", "boom");
    const report = await cleanupWorkDir({ ...base, work_dir: temp, output_dir: output, ledger });
    expect(report.skipped_reason).toBe("1 ledger entry failed");
    expect(fs.existsSync(path.join(temp, "frames", "source", "frame.jpg"))).toBe(true);
  });

  it("leaves the tree alone when an item has an error", async () => {
    const report = await cleanupWorkDir({ ...base, item_errors: 2, work_dir: temp, output_dir: output, ledger: okLedger() });
    expect(report.skipped_reason).toBe("2 item(s) reported errors");
    expect(fs.existsSync(temp)).toBe(true);
  });

  it("refuses a path outside the output directory", async () => {
    const unsafe = path.join(root, "unsafe");
    fs.mkdirSync(path.join(unsafe, "clips"), { recursive: true });
    fs.writeFileSync(path.join(unsafe, "clips", "clip_0001.mp4"), "clip");

    const report = await cleanupWorkDir({ ...base, work_dir: unsafe, output_dir: output, ledger: okLedger() });
    expect(report.ran).toBe(false);
    expect(report.outcomes).toEqual([
      { path: unsafe, kind: "dir", status: "skipped", reason: 'unsafe target: work dir name is not "temp"' }
    ]);
    expect(fs.existsSync(path.join(unsafe, "clips", "clip_0001.mp4"))).toBe(true);
  });

  it("retries transient failures and treats vanished files as deleted", async () => {
    const calls: string[] = [];
    const waits: number[] = [];
    let busy = 1;
    const fsOps: CleanupFs = {
      unlink: async (p) => {
        calls.push(path.basename(p));
        if (p.endsWith("clip_0001.mp4") && busy > 0) {
          busy -= 1;
          throw errnoError("EBUSY");
        }
        if (p.endsWith("frame.jpg")) {
          fs.unlinkSync(p);
          throw errnoError("ENOENT");
        }
        fs.unlinkSync(p);
      },
      rmdir: async (p) => fs.rmdirSync(p)
    };

    const report = await cleanupWorkDir({
      ...base,
      sleep: async (ms) => {
        waits.push(ms);
      },
      fsOps,
      work_dir: temp,
      output_dir: output,
      ledger: okLedger()
    });

    expect(calls).toEqual(["clip_0001.mp4", "clip_0001.mp4", "frame.jpg"]);
    expect(waits).toEqual([200]);
    expect(report.outcomes.slice(0, 2)).toEqual([
      { path: path.join(temp, "clips", "source", "clip_0001.mp4"), kind: "file", status: "deleted", reason: null },
      { path: path.join(temp, "frames", "source", "frame.jpg"), kind: "file", status: "deleted", reason: "already gone" }
    ]);
    expect(fs.existsSync(temp)).toBe(false);
  });

  it("reports files that never go away and keeps their directories", async () => {
    const fsOps: CleanupFs = {
      unlink: async (p) => {
        if (p.endsWith("clip_0001.mp4")) throw errnoError("EPERM");
        fs.unlinkSync(p);
      },
      rmdir: async (p) => fs.rmdirSync(p)
    };

    const report = await cleanupWorkDir({ ...base, fsOps, work_dir: temp, output_dir: output, ledger: okLedger() });

    expect(report.outcomes[0]).toEqual({
      path: path.join(temp, "clips", "source", "clip_0001.mp4"),
      kind: "file",
      status: "failed",
      reason: "EPERM: simulated"
    });
    const clipsSource = report.outcomes.find((o) => o.path === path.join(temp, "clips", "source"));
    expect(clipsSource?.status).toBe("skipped");
    expect(fs.existsSync(path.join(temp, "frames"))).toBe(false);
    expect(fs.existsSync(path.join(temp, "clips", "source", "clip_0001.mp4"))).toBe(true);
  });
});

describe("verifyCleanupTarget", () => {
  it("rejects a sentinel-named directory outside the output dir", async () => {
    const stray = path.join(root, "temp");
    fs.mkdirSync(stray);
    await expect(verifyCleanupTarget(stray, output)).rejects.toBeInstanceOf(UnsafeCleanupTargetError);
  });

  it("rejects the output dir itself", async () => {
    await expect(verifyCleanupTarget(output, output)).rejects.toBeInstanceOf(UnsafeCleanupTargetError);
  });

  it("accepts temp/ under the output dir", async () => {
    await expect(verifyCleanupTarget(temp, output)).resolves.toBe(temp);
  });

  it("reports a directory it cannot list and cleans the rest", async () => {
    const clips = path.join(temp, "clips");
    const fsOps: CleanupFs = {
      unlink: async (p) => fs.unlinkSync(p),
      rmdir: async (p) => fs.rmdirSync(p),
      readdir: async (p) => {
        if (p === clips) throw errnoError("EACCES");
        return fs.readdirSync(p, { withFileTypes: true });
      }
    };

    const report = await cleanupWorkDir({ ...base, fsOps, work_dir: temp, output_dir: output, ledger: okLedger() });

    expect(report.ran).toBe(true);
    expect(report.outcomes).toEqual([
      { path: clips, kind: "dir", status: "failed", reason: "cannot list: EACCES: simulated" },
      { path: path.join(temp, "frames", "source", "frame.jpg"), kind: "file", status: "deleted", reason: null },
      { path: path.join(temp, "frames", "source"), kind: "dir", status: "deleted", reason: null },
      { path: path.join(temp, "frames"), kind: "dir", status: "deleted", reason: null },
      { path: temp, kind: "dir", status: "skipped", reason: "not empty" }
    ]);
    expect(fs.existsSync(path.join(clips, "source", "clip_0001.mp4"))).toBe(true);
  });
});
