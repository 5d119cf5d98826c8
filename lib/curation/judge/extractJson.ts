/*
  JSON extraction from judge text

  Models wrap JSON in prose or markdown fences. We strip fences, then take
  the first balanced {...} span, ignoring braces inside JSON strings.
*/

const FENCE = /```(?:json)?/gi;

export function stripCodeFences(text: string): string {
  return text.replace(FENCE, "").trim();
}

/**
 * Return the first balanced object span, or null if none closes.
 */
export function firstBalancedObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === "{") depth += 1;
    else if (ch === "}") {
      depth -= 1;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}

export type ExtractResult =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly reason: string };

export function extractJsonObject(text: string): ExtractResult {
  const span = firstBalancedObject(stripCodeFences(text));
  if (span === null) return { ok: false, reason: "no JSON object found in judge output" };

  try {
    const value: unknown = JSON.parse(span);
    return { ok: true, value };
  } catch (e) {
    return { ok: false, reason: `judge JSON parse failed: ${e instanceof Error ? e.message : String(e)}` };
  }
}
