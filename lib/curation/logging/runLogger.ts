/*
  Curation run structured logger

  Goals
  - Emit exactly one structured summary object per run.
  - Keep per-item logs behind an explicit debug flag.
  - Count processed, cached, failed and deduplicated items.

  This module is dependency-free.
*/

import type { StructuredLogger } from "../types";

export type RunKind = "photos" | "videos";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface RunLoggerInit {
  readonly run_id: string;
  readonly kind: RunKind;
  readonly config_version: string;
  readonly log?: StructuredLogger;
  readonly debug?: boolean;
  readonly nowMs?: () => number;
}

export interface RunCounts {
  readonly items_seen: number;
  readonly processed: number;
  readonly cached: number;
  readonly failed: number;
  readonly removed_duplicates: number;
  readonly selected: number;
}

export interface RunSummary {
  readonly run_id: string;
  readonly kind: RunKind;
  readonly config_version: string;
  readonly counts: RunCounts;
  readonly duration_ms: number;
  /** error string -> occurrences */
  readonly error_counts: Readonly<Record<string, number>>;
}

export interface RunLogger {
  incProcessed(): void;
  incCached(): void;
  /** Count a failed item and remember its error text */
  addFailure(error: string): void;
  addRemovedDuplicates(n: number): void;

  /** Free-form event with a level, routed to the hook */
  event(at: string, level: LogLevel, message: string, fields?: Readonly<Record<string, unknown>>): void;

  /** Optional per-item debug logs */
  debugItem(obj: unknown): void;

  /** Build and emit one summary log */
  finalizeAndLog(params: { items_seen: number; selected: number }): RunSummary;
}

function asInt(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.max(0, Math.trunc(n));
}

export function createRunLogger(init: RunLoggerInit): RunLogger {
  const errorCounts: Record<string, number> = {};
  const nowMs = init.nowMs ?? (() => Date.now());
  const startedAt = nowMs();

  let processed = 0;
  let cached = 0;
  let failed = 0;
  let removed = 0;

  const log: StructuredLogger | undefined = init.log;
  const debugEnabled = Boolean(init.debug);

  const event = (at: string, level: LogLevel, message: string, fields?: Readonly<Record<string, unknown>>): void => {
    if (!log) return;
    if (level === "debug" && !debugEnabled) return;
    log({ at, level, message, run_id: init.run_id, ...(fields ?? {}) });
  };

  return {
    incProcessed: () => {
      processed += 1;
    },
    incCached: () => {
      cached += 1;
    },
    addFailure: (error: string) => {
      failed += 1;
      errorCounts[error] = (errorCounts[error] ?? 0) + 1;
    },
    addRemovedDuplicates: (n: number) => {
      removed += asInt(n);
    },
    event,
    debugItem: (obj: unknown) => {
      if (!debugEnabled || !log) return;
      log({ at: `${init.kind}.item`, level: "debug", message: "item", run_id: init.run_id, payload: obj });
    },
    finalizeAndLog: (params) => {
      const summary: RunSummary = {
        run_id: init.run_id,
        kind: init.kind,
        config_version: init.config_version,
        counts: {
          items_seen: asInt(params.items_seen),
          processed,
          cached,
          failed,
          removed_duplicates: removed,
          selected: asInt(params.selected)
        },
        duration_ms: Math.max(0, nowMs() - startedAt),
        error_counts: { ...errorCounts }
      };

      if (log) {
        log({ at: `${init.kind}.summary`, level: "info", message: "run finished", ...summary });
      }
      return summary;
    }
  };
}
