import { describe, it, expect } from "vitest";
import { CURATION_DEFAULTS } from "../config";
import { InvalidJudgeResponseError, JudgeUnavailableError } from "../errors";
import { createHttpJudge, type FetchLike } from "./client";

const CFG = { ...CURATION_DEFAULTS.judge, base_url: "http://judge.test/", model: "test-model" };

function chatResponse(content: string, status = 200): Response {
  return new Response(JSON.stringify({ message: { role: "assistant", content } }), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

function scriptedFetch(steps: ReadonlyArray<() => Response>): { fetchImpl: FetchLike; calls: Array<{ url: string; body: unknown }> } {
  const calls: Array<{ url: string; body: unknown }> = [];
  let i = 0;
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, body: typeof init.body === "string" ? JSON.parse(init.body) : null });
    const step = steps[Math.min(i, steps.length - 1)];
    i += 1;
    return step();
  };
  return { fetchImpl, calls };
}

describe("createHttpJudge", () => {
  it("posts a chat request and extracts the JSON object", async () => {
    const { fetchImpl, calls } = scriptedFetch([() => chatResponse('ok ```json\n{"score":0.7}\n```')]);
    const judge = createHttpJudge({ config: CFG, fetchImpl, sleep: async () => {} });

    const raw = await judge.judge({ prompt: "rate", image_b64: "aGVsbG8=" });

    expect(raw).toEqual({ score: 0.7 });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe("http://judge.test/api/chat");
    expect(calls[0].body).toEqual({
      model: "test-model",
      stream: false,
      messages: [
        { role: "system", content: "You are a photo selection assistant. Return only JSON." },
        { role: "user", content: "rate", images: ["aGVsbG8="] }
      ]
    });
  });

  it("retries unavailable responses with linear backoff", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      () => new Response("busy", { status: 503 }),
      () => new Response("busy", { status: 503 }),
      () => chatResponse('{"score":0.4}')
    ]);
    const waits: number[] = [];
    const judge = createHttpJudge({
      config: CFG,
      fetchImpl,
      sleep: async (ms) => {
        waits.push(ms);
      }
    });

    await expect(judge.judge({ prompt: "p", image_b64: "x" })).resolves.toEqual({ score: 0.4 });
    expect(calls).toHaveLength(3);
    expect(waits).toEqual([800, 1600]);
  });

  it("gives up after max_retries extra attempts", async () => {
    const { fetchImpl, calls } = scriptedFetch([() => new Response("down", { status: 500 })]);
    const waits: number[] = [];
    const judge = createHttpJudge({
      config: CFG,
      fetchImpl,
      sleep: async (ms) => {
        waits.push(ms);
      }
    });

    await expect(judge.judge({ prompt: "p", image_b64: "x" })).rejects.toBeInstanceOf(JudgeUnavailableError);
    expect(calls).toHaveLength(3);
    expect(waits).toEqual([800, 1600]);
  });

  it("does not retry structurally invalid output", async () => {
    const { fetchImpl, calls } = scriptedFetch([() => chatResponse("I cannot rate this image.")]);
    const judge = createHttpJudge({ config: CFG, fetchImpl, sleep: async () => {} });

    await expect(judge.judge({ prompt: "p", image_b64: "x" })).rejects.toBeInstanceOf(InvalidJudgeResponseError);
    expect(calls).toHaveLength(1);
  });

  it("treats network errors as unavailable", async () => {
    let n = 0;
    const fetchImpl: FetchLike = async () => {
      n += 1;
      throw new Error("ECONNREFUSED");
    };
    const judge = createHttpJudge({ config: { ...CFG, max_retries: 0 }, fetchImpl, sleep: async () => {} });

    await expect(judge.judge({ prompt: "p", image_b64: "x" })).rejects.toThrow(/ECONNREFUSED/);
    expect(n).toBe(1);
  });

  it("times out a response body that stalls", async () => {
    const fetchImpl: FetchLike = async (_url, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"message":'));
          init.signal?.addEventListener("abort", () => controller.error(new Error("aborted")));
        }
      });
      return new Response(body, { status: 200, headers: { "Content-Type": "application/json" } });
    };
    const judge = createHttpJudge({ config: { ...CFG, timeout_ms: 20, max_retries: 0 }, fetchImpl, sleep: async () => {} });

    const err: unknown = await judge.judge({ prompt: "p", image_b64: "x" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(JudgeUnavailableError);
    expect(err).toMatchObject({ message: "judge response timed out after 20ms", status: 200 });
  });
});
