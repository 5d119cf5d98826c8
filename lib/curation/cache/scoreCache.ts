/*
  Score cache (SQLite)

  One file per batch, co-located with outputs. Keyed by absolute path; a hit
  is only valid when the stored fingerprint equals the current one.

  Modes
  - read-write: creates the file and table on open.
  - read-only: never creates anything; a missing file or table answers every
    lookup with a miss.

  Corruption never fails a batch. An unreadable row is a miss. A file that is
  not a database is a miss for every key in read-only mode; in read-write mode
  it is moved aside to `<file>.corrupt` and recreated. All of these are
  reported as `cache.corrupt` through the `log` hook.
*/

import fs from "fs";
import path from "path";
import Database from "better-sqlite3";

import { CacheCorruptionError, describeError } from "../errors";
import type { JudgeAnalysis, QualityMetrics, StructuredLogger } from "../types";
import type { Fingerprint } from "../scoring/hashing/fingerprint";
import { parseJudgeOutput } from "../judge/normalize";

export const SCORE_TABLE = "photo_scores";

export interface ScoreRecord {
  readonly file_path: string;
  readonly file_hash: Fingerprint;
  readonly score: number;
  readonly analysis: JudgeAnalysis | null;
  readonly quality: QualityMetrics | null;
  /** ISO-8601 */
  readonly last_processed_at: string;
}

interface DbRow {
  file_path: string;
  file_hash: string;
  score: number | null;
  analysis_json: string | null;
  quality_json: string | null;
  last_processed_at: string;
}

export interface ScoreCacheOptions {
  readonly readOnly?: boolean;
  readonly log?: StructuredLogger;
  readonly now?: () => Date;
}

const serialize = (value: unknown): string => JSON.stringify(value ?? null);

const QUALITY_NUMBERS = ["brightness", "resolution", "edge_variance", "center_edge_variance", "lower_edge_variance"] as const;
const QUALITY_FLAGS = ["dark", "overexposed", "blur", "blur_center", "blur_lower", "blur_strong"] as const;

function toQualityMetrics(v: unknown): QualityMetrics | null {
  if (typeof v !== "object" || v === null) return null;
  const num = (k: string): number | null => {
    const x: unknown = Reflect.get(v, k);
    return typeof x === "number" && Number.isFinite(x) ? x : null;
  };
  const flag = (k: string): boolean | null => {
    const x: unknown = Reflect.get(v, k);
    return typeof x === "boolean" ? x : null;
  };

  const nums = QUALITY_NUMBERS.map(num);
  const flags = QUALITY_FLAGS.map(flag);
  const [brightness, resolution, edge, center, lower] = nums;
  const [dark, overexposed, blur, blurCenter, blurLower, blurStrong] = flags;
  if (
    brightness === null ||
    resolution === null ||
    edge === null ||
    center === null ||
    lower === null ||
    dark === null ||
    overexposed === null ||
    blur === null ||
    blurCenter === null ||
    blurLower === null ||
    blurStrong === null
  ) {
    return null;
  }

  return {
    brightness,
    resolution,
    edge_variance: edge,
    center_edge_variance: center,
    lower_edge_variance: lower,
    dark,
    overexposed,
    blur,
    blur_center: blurCenter,
    blur_lower: blurLower,
    blur_strong: blurStrong
  };
}

function parseColumn(row: DbRow, column: "analysis_json" | "quality_json"): unknown {
  const text = row[column];
  if (text === null) return null;
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (e) {
    throw new CacheCorruptionError(`unreadable ${column} for ${row.file_path}`, row.file_path, e);
  }
}

function rowToRecord(row: DbRow): ScoreRecord {
  if (row.score === null || !Number.isFinite(row.score)) {
    throw new CacheCorruptionError(`missing score for ${row.file_path}`, row.file_path);
  }

  const rawAnalysis = parseColumn(row, "analysis_json");
  let analysis: JudgeAnalysis | null = null;
  if (rawAnalysis !== null) {
    const parsed = parseJudgeOutput(rawAnalysis);
    if (parsed.kind === "malformed") {
      throw new CacheCorruptionError(`stored analysis for ${row.file_path}: ${parsed.reason}`, row.file_path);
    }
    analysis = parsed.analysis;
  }

  const rawQuality = parseColumn(row, "quality_json");
  const quality = rawQuality === null ? null : toQualityMetrics(rawQuality);
  if (rawQuality !== null && quality === null) {
    throw new CacheCorruptionError(`stored quality for ${row.file_path} has the wrong shape`, row.file_path);
  }

  return {
    file_path: row.file_path,
    file_hash: row.file_hash,
    score: row.score,
    analysis,
    quality,
    last_processed_at: row.last_processed_at
  };
}

function reportCorrupt(opts: ScoreCacheOptions, err: CacheCorruptionError): void {
  opts.log?.({ at: "cache.corrupt", level: "warn", message: err.message, file: err.key });
}

/** Throws when the file is not a readable database. A missing table yields null. */
function openReadOnly(dbPath: string): Database.Database | null {
  const db = new Database(dbPath, { readonly: true, fileMustExist: true });
  try {
    const table = db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?").get(SCORE_TABLE);
    if (table !== undefined) return db;
  } catch (e) {
    db.close();
    throw e;
  }
  db.close();
  return null;
}

function openReadWrite(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  try {
    db.exec(
      `CREATE TABLE IF NOT EXISTS ${SCORE_TABLE} (
        file_path TEXT PRIMARY KEY,
        file_hash TEXT NOT NULL,
        score REAL,
        analysis_json TEXT,
        quality_json TEXT,
        last_processed_at TEXT NOT NULL
      )`
    );
    return db;
  } catch (e) {
    db.close();
    throw e;
  }
}

export class ScoreCache {
  private constructor(
    private readonly db: Database.Database | null,
    readonly dbPath: string,
    readonly readOnly: boolean,
    private readonly opts: ScoreCacheOptions
  ) {}

  static open(dbPath: string, opts: ScoreCacheOptions = {}): ScoreCache {
    if (opts.readOnly) {
      if (!fs.existsSync(dbPath)) return new ScoreCache(null, dbPath, true, opts);
      try {
        return new ScoreCache(openReadOnly(dbPath), dbPath, true, opts);
      } catch (e) {
        reportCorrupt(opts, new CacheCorruptionError(`score cache unreadable: ${describeError(e)}`, dbPath, e));
        return new ScoreCache(null, dbPath, true, opts);
      }
    }

    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    try {
      return new ScoreCache(openReadWrite(dbPath), dbPath, false, opts);
    } catch (e) {
      reportCorrupt(opts, new CacheCorruptionError(`score cache unreadable: ${describeError(e)}`, dbPath, e));
    }

    // Move the bad file aside and start empty; if even that fails, run without a cache.
    try {
      fs.renameSync(dbPath, `${dbPath}.corrupt`);
      return new ScoreCache(openReadWrite(dbPath), dbPath, false, opts);
    } catch (e) {
      reportCorrupt(opts, new CacheCorruptionError(`score cache disabled: ${describeError(e)}`, dbPath, e));
      return new ScoreCache(null, dbPath, false, opts);
    }
  }

  /**
   * Record for `filePath` only if its stored fingerprint equals `fingerprint`.
   */
  get(filePath: string, fingerprint: Fingerprint): ScoreRecord | null {
    if (!this.db) return null;

    try {
      const row = this.db
        .prepare<[string], DbRow>(
          `SELECT file_path, file_hash, score, analysis_json, quality_json, last_processed_at
           FROM ${SCORE_TABLE} WHERE file_path = ?`
        )
        .get(filePath);

      if (!row || row.file_hash !== fingerprint) return null;
      return rowToRecord(row);
    } catch (e) {
      const err = e instanceof CacheCorruptionError ? e : new CacheCorruptionError(describeError(e), filePath, e);
      reportCorrupt(this.opts, err);
      return null;
    }
  }

  /**
   * Replace-by-path write of every field.
   * A failed write is logged and reported as `false`; it never fails the item.
   */
  upsert(
    filePath: string,
    fingerprint: Fingerprint,
    score: number,
    analysis: JudgeAnalysis | null,
    quality: QualityMetrics | null
  ): boolean {
    if (this.readOnly) {
      throw new Error(`ScoreCache opened read-only: ${this.dbPath}`);
    }
    if (!this.db) return false;

    const at = (this.opts.now ?? (() => new Date()))().toISOString();
    try {
      this.db
        .prepare(
          `INSERT INTO ${SCORE_TABLE} (file_path, file_hash, score, analysis_json, quality_json, last_processed_at)
           VALUES (@file_path, @file_hash, @score, @analysis_json, @quality_json, @last_processed_at)
           ON CONFLICT(file_path) DO UPDATE SET
             file_hash = excluded.file_hash,
             score = excluded.score,
             analysis_json = excluded.analysis_json,
             quality_json = excluded.quality_json,
             last_processed_at = excluded.last_processed_at`
        )
        .run({
          file_path: filePath,
          file_hash: fingerprint,
          score,
          analysis_json: serialize(analysis),
          quality_json: serialize(quality),
          last_processed_at: at
        });
      return true;
    } catch (e) {
      this.opts.log?.({ at: "cache.write_failed", level: "warn", message: describeError(e), file: filePath });
      return false;
    }
  }

  close(): void {
    this.db?.close();
  }
}
