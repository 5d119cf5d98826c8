/*
  Curation error taxonomy

  Per-item failures are captured as strings on the item and never escape a
  batch loop. Only ConfigError is batch-fatal.
*/

export class DecodeError extends Error {
  readonly name = "DecodeError";
  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

export class TranscodeError extends Error {
  readonly name = "TranscodeError";
  constructor(message: string, readonly stderr: string = "", readonly cause?: unknown) {
    super(message);
  }
}

/** Structurally bad judge payload. Not retried. */
export class InvalidJudgeResponseError extends Error {
  readonly name = "InvalidJudgeResponseError";
  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

/** Network or HTTP failure talking to the judge. Retried with backoff. */
export class JudgeUnavailableError extends Error {
  readonly name = "JudgeUnavailableError";
  constructor(message: string, readonly status: number | null = null, readonly cause?: unknown) {
    super(message);
  }
}

export class UnsafeCleanupTargetError extends Error {
  readonly name = "UnsafeCleanupTargetError";
  constructor(message: string, readonly target: string) {
    super(message);
  }
}

export class CacheCorruptionError extends Error {
  readonly name = "CacheCorruptionError";
  constructor(message: string, readonly key: string, readonly cause?: unknown) {
    super(message);
  }
}

export class ConfigError extends Error {
  readonly name = "ConfigError";
  constructor(message: string) {
    super(message);
  }
}

/**
 * Render any thrown value as the string stored on an item's `error` field.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const msg = err.message.trim();
    return msg.length > 0 ? msg : err.name;
  }
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

/** Node fs errors carry a string `code`. */
export function errorCode(err: unknown): string | null {
  if (typeof err !== "object" || err === null) return null;
  const code: unknown = Reflect.get(err, "code");
  return typeof code === "string" ? code : null;
}
