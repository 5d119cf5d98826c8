/*
  Guarded cleanup of the working tree

  Gate (all must hold)
  - keep was not requested
  - no item carries an error and the ledger has no failed entry
  - the work dir's basename is the sentinel and its real path lies strictly
    inside the real output dir

  Then: unlink every file (bounded attempts, fixed backoff, ENOENT counts as
  deleted), then remove directories deepest-first, each only if empty.
  Every path gets an outcome record.
*/

import fs from "fs/promises";
import path from "path";

import { UnsafeCleanupTargetError, describeError, errorCode } from "../errors";
import type { StructuredLogger } from "../types";
import type { JobLedger } from "./jobState";
import { WORK_DIR_SENTINEL } from "../plan/outputPaths";

export type CleanupStatus = "deleted" | "failed" | "skipped";

export interface CleanupOutcome {
  readonly path: string;
  readonly kind: "file" | "dir";
  readonly status: CleanupStatus;
  readonly reason: string | null;
}

export interface CleanupReport {
  readonly ran: boolean;
  /** Why the whole cleanup did not run */
  readonly skipped_reason: string | null;
  readonly outcomes: ReadonlyArray<CleanupOutcome>;
}

export interface DirEntry {
  readonly name: string;
  isDirectory(): boolean;
}

export interface CleanupFs {
  unlink(p: string): Promise<void>;
  rmdir(p: string): Promise<void>;
  /** Default: fs.readdir with file types */
  readdir?(p: string): Promise<ReadonlyArray<DirEntry>>;
}

export interface CleanupParams {
  readonly work_dir: string;
  readonly output_dir: string;
  readonly keep: boolean;
  /** Number of batch items that ended with an error */
  readonly item_errors: number;
  readonly ledger: JobLedger;
  readonly max_attempts: number;
  readonly backoff_ms: number;

  readonly sleep?: (ms: number) => Promise<void>;
  readonly log?: StructuredLogger;
  readonly fsOps?: CleanupFs;
}

const NODE_FS: CleanupFs = {
  unlink: (p) => fs.unlink(p),
  rmdir: (p) => fs.rmdir(p)
};

const readDirEntries = (p: string): Promise<ReadonlyArray<DirEntry>> => fs.readdir(p, { withFileTypes: true });

/**
 * Pure gate over recorded state. Returns the reason cleanup must not run, or null.
 */
export function cleanupBlocker(params: Pick<CleanupParams, "keep" | "item_errors" | "ledger">): string | null {
  if (params.keep) return "keep requested";
  if (params.item_errors > 0) return `${params.item_errors} item(s) reported errors`;
  const outcome = params.ledger.outcome();
  if (!outcome.failure_free) return `${outcome.failed} ledger entr${outcome.failed === 1 ? "y" : "ies"} failed`;
  return null;
}

/**
 * Resolve the real path of `workDir` and check it is a sentinel-named
 * directory strictly inside `outputDir`.
 */
export async function verifyCleanupTarget(workDir: string, outputDir: string): Promise<string> {
  if (path.basename(path.resolve(workDir)) !== WORK_DIR_SENTINEL) {
    throw new UnsafeCleanupTargetError(`work dir name is not "${WORK_DIR_SENTINEL}"`, workDir);
  }

  let realWork: string;
  let realOut: string;
  try {
    realWork = await fs.realpath(workDir);
    realOut = await fs.realpath(outputDir);
  } catch (e) {
    throw new UnsafeCleanupTargetError(`cannot resolve cleanup paths: ${describeError(e)}`, workDir);
  }

  if (path.basename(realWork) !== WORK_DIR_SENTINEL) {
    throw new UnsafeCleanupTargetError(`work dir resolves to a non-sentinel name: ${realWork}`, workDir);
  }

  const rel = path.relative(realOut, realWork);
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new UnsafeCleanupTargetError(`work dir ${realWork} is not inside ${realOut}`, workDir);
  }

  let isDir: boolean;
  try {
    isDir = (await fs.lstat(realWork)).isDirectory();
  } catch (e) {
    throw new UnsafeCleanupTargetError(`cannot stat work dir: ${describeError(e)}`, workDir);
  }
  if (!isDir) throw new UnsafeCleanupTargetError(`work dir is not a directory: ${realWork}`, workDir);

  return realWork;
}

/**
 * Walk the tree. A directory that cannot be listed is reported and left out,
 * so its ancestors stay non-empty and are skipped later.
 */
async function listTree(
  root: string,
  readdir: (p: string) => Promise<ReadonlyArray<DirEntry>>
): Promise<{ files: string[]; dirs: string[]; unlisted: CleanupOutcome[] }> {
  const files: string[] = [];
  const dirs: string[] = [];
  const unlisted: CleanupOutcome[] = [];

  const visit = async (dir: string): Promise<void> => {
    let entries: ReadonlyArray<DirEntry>;
    try {
      entries = await readdir(dir);
    } catch (e) {
      unlisted.push({ path: dir, kind: "dir", status: "failed", reason: `cannot list: ${describeError(e)}` });
      return;
    }
    dirs.push(dir);
    for (const e of entries) {
      const full = path.join(dir, e.name);
      if (e.isDirectory()) {
        await visit(full);
      } else {
        files.push(full);
      }
    }
  };

  await visit(root);
  files.sort();
  return { files, dirs, unlisted };
}

function depth(p: string): number {
  return p.split(path.sep).length;
}

async function withRetries(
  op: () => Promise<void>,
  attempts: number,
  backoffMs: number,
  sleep: (ms: number) => Promise<void>
): Promise<{ ok: true; gone: boolean } | { ok: false; error: unknown }> {
  let lastErr: unknown = null;
  for (let i = 0; i < attempts; i++) {
    try {
      await op();
      return { ok: true, gone: false };
    } catch (e) {
      if (errorCode(e) === "ENOENT") return { ok: true, gone: true };
      lastErr = e;
      if (i < attempts - 1) await sleep(backoffMs);
    }
  }
  return { ok: false, error: lastErr };
}

export async function cleanupWorkDir(params: CleanupParams): Promise<CleanupReport> {
  const log = params.log;
  const sleep = params.sleep ?? ((ms: number) => new Promise<void>((r) => setTimeout(r, ms)));
  const ops = params.fsOps ?? NODE_FS;
  const readdir = ops.readdir?.bind(ops) ?? readDirEntries;

  const skip = (reason: string): CleanupReport => {
    log?.({ at: "cleanup.skipped", level: "info", message: reason, file: params.work_dir });
    return {
      ran: false,
      skipped_reason: reason,
      outcomes: [{ path: params.work_dir, kind: "dir", status: "skipped", reason }]
    };
  };

  const blocker = cleanupBlocker(params);
  if (blocker) return skip(blocker);

  let root: string;
  try {
    root = await verifyCleanupTarget(params.work_dir, params.output_dir);
  } catch (e) {
    const message = describeError(e);
    log?.({ at: "cleanup.unsafe", level: "warn", message, file: params.work_dir });
    return skip(`unsafe target: ${message}`);
  }

  const { files, dirs, unlisted } = await listTree(root, readdir);
  const outcomes: CleanupOutcome[] = [...unlisted];
  for (const o of unlisted) log?.({ at: "cleanup.failed", level: "warn", message: o.reason, file: o.path });

  for (const file of files) {
    const r = await withRetries(() => ops.unlink(file), params.max_attempts, params.backoff_ms, sleep);
    if (r.ok) {
      outcomes.push({ path: file, kind: "file", status: "deleted", reason: r.gone ? "already gone" : null });
    } else {
      const reason = describeError(r.error);
      outcomes.push({ path: file, kind: "file", status: "failed", reason });
      log?.({ at: "cleanup.failed", level: "warn", message: reason, file });
    }
  }

  const ordered = [...dirs].sort((a, b) => depth(b) - depth(a) || (a < b ? 1 : a > b ? -1 : 0));
  for (const dir of ordered) {
    let remaining: ReadonlyArray<DirEntry>;
    try {
      remaining = await readdir(dir);
    } catch (e) {
      const gone = errorCode(e) === "ENOENT";
      outcomes.push({ path: dir, kind: "dir", status: gone ? "deleted" : "failed", reason: gone ? "already gone" : describeError(e) });
      continue;
    }
    if (remaining.length > 0) {
      outcomes.push({ path: dir, kind: "dir", status: "skipped", reason: "not empty" });
      continue;
    }

    const r = await withRetries(() => ops.rmdir(dir), params.max_attempts, params.backoff_ms, sleep);
    if (r.ok) {
      outcomes.push({ path: dir, kind: "dir", status: "deleted", reason: r.gone ? "already gone" : null });
    } else {
      const reason = describeError(r.error);
      outcomes.push({ path: dir, kind: "dir", status: errorCode(r.error) === "ENOTEMPTY" ? "skipped" : "failed", reason });
      log?.({ at: "cleanup.failed", level: "warn", message: reason, file: dir });
    }
  }

  const failed = outcomes.filter((o) => o.status === "failed").length;
  log?.({
    at: "cleanup.done",
    level: failed > 0 ? "warn" : "info",
    message: `cleanup finished: ${outcomes.length - failed} ok, ${failed} failed`,
    file: root
  });

  return { ran: true, skipped_reason: null, outcomes };
}
