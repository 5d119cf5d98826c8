import fs from "fs";
import os from "os";
import path from "path";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { JudgeAnalysis, QualityMetrics } from "../types";
import { SCORE_TABLE, ScoreCache } from "./scoreCache";

const FP_A = "00ff00ff00ff00ff";
const FP_B = "ff00ff00ff00ff00";

const ANALYSIS: JudgeAnalysis = {
  caption: "kid on a swing",
  tags: ["park"],
  risks: { blur: false, dark: false, overexposed: false, out_of_focus: false },
  score: 0.8,
  sharpness: 0.7,
  subject_visibility: 0.9,
  composition: 0.6,
  duplication_penalty: 0,
  reasoning: "clear subject"
};

const QUALITY: QualityMetrics = {
  brightness: 120,
  resolution: 2_000_000,
  edge_variance: 400,
  center_edge_variance: 500,
  lower_edge_variance: 300,
  dark: false,
  overexposed: false,
  blur: false,
  blur_center: false,
  blur_lower: false,
  blur_strong: false
};

let dir = "";

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "score-cache-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("ScoreCache", () => {
  it("returns a record only for the matching fingerprint", () => {
    const dbPath = path.join(dir, "scores", "photo_scores.sqlite");
    const cache = ScoreCache.open(dbPath, { now: () => new Date("2026-01-02T03:04:05.000Z") });
    cache.upsert("/in/a.jpg", FP_A, 0.75, ANALYSIS, QUALITY);

    expect(cache.get("/in/a.jpg", FP_A)).toEqual({
      file_path: "/in/a.jpg",
      file_hash: FP_A,
      score: 0.75,
      analysis: ANALYSIS,
      quality: QUALITY,
      last_processed_at: "2026-01-02T03:04:05.000Z"
    });
    expect(cache.get("/in/a.jpg", FP_B)).toBeNull();
    expect(cache.get("/in/other.jpg", FP_A)).toBeNull();
    cache.close();
  });

  it("replaces every field on upsert", () => {
    const cache = ScoreCache.open(path.join(dir, "c.sqlite"));
    cache.upsert("/in/a.jpg", FP_A, 0.75, ANALYSIS, QUALITY);
    cache.upsert("/in/a.jpg", FP_B, 0.2, null, null);

    expect(cache.get("/in/a.jpg", FP_A)).toBeNull();
    const rec = cache.get("/in/a.jpg", FP_B);
    expect(rec?.score).toBe(0.2);
    expect(rec?.analysis).toBeNull();
    expect(rec?.quality).toBeNull();
    cache.close();
  });

  it("read-only mode never creates the store", () => {
    const dbPath = path.join(dir, "missing", "photo_scores.sqlite");
    const cache = ScoreCache.open(dbPath, { readOnly: true });

    expect(cache.get("/in/a.jpg", FP_A)).toBeNull();
    expect(fs.existsSync(dbPath)).toBe(false);
    expect(fs.existsSync(path.dirname(dbPath))).toBe(false);
    expect(() => cache.upsert("/in/a.jpg", FP_A, 0.5, null, null)).toThrow(/read-only/);
  });

  it("read-only mode reads existing records", () => {
    const dbPath = path.join(dir, "c.sqlite");
    const rw = ScoreCache.open(dbPath);
    rw.upsert("/in/a.jpg", FP_A, 0.5, null, QUALITY);
    rw.close();

    const ro = ScoreCache.open(dbPath, { readOnly: true });
    expect(ro.get("/in/a.jpg", FP_A)?.score).toBe(0.5);
    ro.close();
  });

  it("treats unreadable rows as misses and logs them", () => {
    const dbPath = path.join(dir, "c.sqlite");
    const logs: unknown[] = [];
    const cache = ScoreCache.open(dbPath, { log: (o) => logs.push(o) });
    cache.upsert("/in/a.jpg", FP_A, 0.5, ANALYSIS, QUALITY);

    const raw = new Database(dbPath);
    raw.prepare(`UPDATE ${SCORE_TABLE} SET analysis_json = ? WHERE file_path = ?`).run("{not json", "/in/a.jpg");
    raw.close();

    expect(cache.get("/in/a.jpg", FP_A)).toBeNull();
    expect(logs).toEqual([
      {
        at: "cache.corrupt",
        level: "warn",
        message: "unreadable analysis_json for /in/a.jpg",
        file: "/in/a.jpg"
      }
    ]);
    cache.close();
  });

  describe("with a file that is not a database", () => {
    function writeGarbage(): string {
      const dbPath = path.join(dir, "scores", "photo_scores.sqlite");
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      fs.writeFileSync(dbPath, "garbage bytes, not sqlite ".repeat(200));
      return dbPath;
    }

    it("answers every read-only lookup with a miss", () => {
      const dbPath = writeGarbage();
      const logs: unknown[] = [];
      const cache = ScoreCache.open(dbPath, { readOnly: true, log: (o) => logs.push(o) });

      expect(cache.get("/in/a.jpg", FP_A)).toBeNull();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({ at: "cache.corrupt", level: "warn", file: dbPath });
      expect(fs.readFileSync(dbPath, "utf8").startsWith("garbage bytes")).toBe(true);
      cache.close();
    });

    it("moves the file aside and starts empty in read-write mode", () => {
      const dbPath = writeGarbage();
      const logs: unknown[] = [];
      const cache = ScoreCache.open(dbPath, { log: (o) => logs.push(o) });

      expect(cache.get("/in/a.jpg", FP_A)).toBeNull();
      expect(cache.upsert("/in/a.jpg", FP_A, 0.5, null, QUALITY)).toBe(true);
      expect(cache.get("/in/a.jpg", FP_A)?.score).toBe(0.5);
      expect(fs.readFileSync(`${dbPath}.corrupt`, "utf8").startsWith("garbage bytes")).toBe(true);
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({ at: "cache.corrupt", file: dbPath });
      cache.close();
    });
  });
});
