/*
  HTTP judge client

  Chat-style endpoint: POST {base_url}/api/chat, non-streaming, image passed
  as base64 on the user message. Response text is read from
  `message.content`.

  Retry policy
  - JudgeUnavailableError (network, timeout, non-200, empty content) is
    retried up to `max_retries` extra times with linear backoff.
  - InvalidJudgeResponseError is structural and surfaces immediately.
*/

import type { CurationConfig } from "../config";
import { InvalidJudgeResponseError, JudgeUnavailableError, describeError } from "../errors";
import type { Judge, JudgeRequest, StructuredLogger } from "../types";
import { extractJsonObject } from "./extractJson";
import { JUDGE_SYSTEM_PROMPT } from "./prompt";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpJudgeOptions {
  readonly config: CurationConfig["judge"];
  readonly fetchImpl?: FetchLike;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly log?: StructuredLogger;
}

export const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function readMessageContent(json: unknown): string | null {
  if (typeof json !== "object" || json === null) return null;
  const message: unknown = Reflect.get(json, "message");
  if (typeof message !== "object" || message === null) return null;
  const content: unknown = Reflect.get(message, "content");
  return typeof content === "string" ? content : null;
}

function trimBaseUrl(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * One request/response exchange. Returns the raw text the model produced.
 */
async function requestOnce(
  fetchImpl: FetchLike,
  cfg: CurationConfig["judge"],
  req: JudgeRequest
): Promise<string> {
  const body = {
    model: cfg.model,
    stream: false,
    messages: [
      { role: "system", content: JUDGE_SYSTEM_PROMPT },
      { role: "user", content: req.prompt, images: [req.image_b64] }
    ]
  };

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), cfg.timeout_ms);

  // The timer covers the body reads as well as the request.
  try {
    let res: Response;
    try {
      res = await fetchImpl(`${trimBaseUrl(cfg.base_url)}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal
      });
    } catch (e) {
      throw new JudgeUnavailableError(`judge request failed: ${describeError(e)}`, null, e);
    }

    if (!res.ok) {
      const txt = await res.text().catch(() => "");
      throw new JudgeUnavailableError(`judge HTTP ${res.status}: ${txt.slice(0, 200)}`, res.status);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (e) {
      if (controller.signal.aborted) {
        throw new JudgeUnavailableError(`judge response timed out after ${cfg.timeout_ms}ms`, res.status, e);
      }
      throw new InvalidJudgeResponseError("judge response body is not JSON", e);
    }

    const content = readMessageContent(json);
    if (content === null || content.trim().length === 0) {
      throw new JudgeUnavailableError("judge returned empty content", res.status);
    }
    return content;
  } finally {
    clearTimeout(timeout);
  }
}

export function createHttpJudge(opts: HttpJudgeOptions): Judge {
  const cfg = opts.config;
  const fetchImpl: FetchLike = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  const sleep = opts.sleep ?? defaultSleep;

  const judge = async (req: JudgeRequest): Promise<unknown> => {
    let lastErr: unknown = null;

    for (let attempt = 0; attempt <= cfg.max_retries; attempt++) {
      try {
        const text = await requestOnce(fetchImpl, cfg, req);
        const extracted = extractJsonObject(text);
        if (!extracted.ok) throw new InvalidJudgeResponseError(extracted.reason);
        return extracted.value;
      } catch (e) {
        if (!(e instanceof JudgeUnavailableError)) throw e;
        lastErr = e;
        opts.log?.({
          at: "judge.retry",
          level: "warn",
          message: e.message,
          attempt: attempt + 1,
          max_attempts: cfg.max_retries + 1
        });
        if (attempt < cfg.max_retries) await sleep(cfg.retry_backoff_ms * (attempt + 1));
      }
    }

    throw lastErr instanceof JudgeUnavailableError ? lastErr : new JudgeUnavailableError(describeError(lastErr));
  };

  return { judge };
}
