/*
  Job ledger

  Append-only record of per-step outcomes across a batch. Each (step, key)
  pair is written once; later writes for the same pair are rejected.
  Cleanup reads the aggregate outcome instead of relying on exceptions.
*/

export type JobStep = "split" | "score" | "select" | "concat";

export const JOB_STEPS: ReadonlyArray<JobStep> = ["split", "score", "select", "concat"];

export type JobStatus = "ok" | "failed";

export interface LedgerEntry {
  readonly status: JobStatus;
  readonly error?: string;
}

export interface LedgerFailure {
  readonly step: JobStep;
  readonly key: string;
  readonly error: string | null;
}

export interface JobOutcome {
  readonly ok: number;
  readonly failed: number;
  readonly failures: ReadonlyArray<LedgerFailure>;
  readonly failure_free: boolean;
}

export type LedgerSnapshot = Readonly<Record<JobStep, Readonly<Record<string, LedgerEntry>>>>;

export class JobLedger {
  private readonly steps = new Map<JobStep, Map<string, LedgerEntry>>(JOB_STEPS.map((s) => [s, new Map()]));

  private table(step: JobStep): Map<string, LedgerEntry> {
    let t = this.steps.get(step);
    if (!t) {
      t = new Map();
      this.steps.set(step, t);
    }
    return t;
  }

  /**
   * Returns false (and changes nothing) when the pair was already recorded.
   */
  record(step: JobStep, key: string, status: JobStatus, error?: string): boolean {
    const t = this.table(step);
    if (t.has(key)) return false;
    t.set(key, error === undefined ? { status } : { status, error });
    return true;
  }

  ok(step: JobStep, key: string): boolean {
    return this.record(step, key, "ok");
  }

  fail(step: JobStep, key: string, error: string): boolean {
    return this.record(step, key, "failed", error);
  }

  get(step: JobStep, key: string): LedgerEntry | null {
    return this.table(step).get(key) ?? null;
  }

  outcome(): JobOutcome {
    let ok = 0;
    const failures: LedgerFailure[] = [];
    for (const step of JOB_STEPS) {
      for (const [key, e] of this.table(step)) {
        if (e.status === "ok") ok += 1;
        else failures.push({ step, key, error: e.error ?? null });
      }
    }
    return { ok, failed: failures.length, failures, failure_free: failures.length === 0 };
  }

  toJSON(): LedgerSnapshot {
    const snap = (step: JobStep): Record<string, LedgerEntry> => Object.fromEntries(this.table(step));
    return {
      split: snap("split"),
      score: snap("score"),
      select: snap("select"),
      concat: snap("concat")
    };
  }
}
