/*
  Log sinks for the CLI

  json: one JSON object per line.
  text: `LEVEL: message file=<path> key=value ...`
*/

import type { StructuredLogger } from "../types";

export type LogFormat = "json" | "text";

const RESERVED = new Set(["at", "level", "message", "file"]);

function fieldValue(v: unknown): string {
  if (typeof v === "string") return /\s/.test(v) ? JSON.stringify(v) : v;
  if (typeof v === "number" || typeof v === "boolean" || v === null) return String(v);
  return JSON.stringify(v) ?? String(v);
}

function readString(obj: object, key: string): string | null {
  const v: unknown = Reflect.get(obj, key);
  return typeof v === "string" ? v : null;
}

/**
 * Render one record in the text format.
 */
export function formatText(obj: unknown): string {
  if (typeof obj !== "object" || obj === null) return `INFO: ${String(obj)}`;

  const level = (readString(obj, "level") ?? "info").toUpperCase();
  const message = readString(obj, "message") ?? readString(obj, "at") ?? "";
  const parts = [`${level}: ${message}`];

  const file = readString(obj, "file");
  if (file !== null) parts.push(`file=${fieldValue(file)}`);

  for (const [k, v] of Object.entries(obj)) {
    if (RESERVED.has(k) || v === undefined) continue;
    parts.push(`${k}=${fieldValue(v)}`);
  }
  return parts.join(" ");
}

export function createStreamLogger(
  format: LogFormat,
  write: (line: string) => void = (line) => process.stderr.write(`${line}\n`)
): StructuredLogger {
  return (obj: unknown) => {
    write(format === "json" ? JSON.stringify(obj) : formatText(obj));
  };
}
