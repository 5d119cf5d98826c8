import { describe, it, expect } from "vitest";
import { InvalidJudgeResponseError } from "../errors";
import { coerceNumber, normalizeJudgeOutput, parseJudgeOutput } from "./normalize";

describe("parseJudgeOutput", () => {
  it("tags non-objects as malformed", () => {
    for (const raw of [null, "text", 3, ["a"]]) {
      const out = parseJudgeOutput(raw);
      expect(out.kind).toBe("malformed");
    }
  });

  it("fills defaults for an empty object", () => {
    const out = parseJudgeOutput({});
    expect(out).toEqual({
      kind: "valid",
      analysis: {
        caption: "",
        tags: [],
        risks: { blur: false, dark: false, overexposed: false, out_of_focus: false },
        score: 0,
        sharpness: 0,
        subject_visibility: 0,
        composition: 0,
        duplication_penalty: 0,
        reasoning: ""
      }
    });
  });

  it("prefers overall_score over score", () => {
    const a = normalizeJudgeOutput({ score: 0.2, overall_score: "0.7" });
    expect(a.score).toBe(0.7);
  });

  it("clamps scores into [0,1]", () => {
    expect(normalizeJudgeOutput({ score: "1.2" }).score).toBe(1);
    expect(normalizeJudgeOutput({ score: -3 }).score).toBe(0);
    expect(normalizeJudgeOutput({ score: "n/a" }).score).toBe(0);
    expect(normalizeJudgeOutput({ sharpness: 4, composition: "0.25" })).toMatchObject({
      sharpness: 1,
      composition: 0.25
    });
  });

  it("repairs tags and risks", () => {
    const a = normalizeJudgeOutput({
      caption: "  beach  ",
      tags: "not-a-list",
      risks: ["blur"],
      reasoning: " ok "
    });
    expect(a.caption).toBe("beach");
    expect(a.tags).toEqual([]);
    expect(a.risks).toEqual({ blur: false, dark: false, overexposed: false, out_of_focus: false });
    expect(a.reasoning).toBe("ok");

    const b = normalizeJudgeOutput({ tags: ["sun", "", 7], risks: { dark: true, blur: "yes" } });
    expect(b.tags).toEqual(["sun", "7"]);
    expect(b.risks).toEqual({ blur: true, dark: true, overexposed: false, out_of_focus: false });
  });
});

describe("normalizeJudgeOutput", () => {
  it("throws InvalidJudgeResponseError for non-objects", () => {
    expect(() => normalizeJudgeOutput("nope")).toThrow(InvalidJudgeResponseError);
  });
});

describe("coerceNumber", () => {
  it("accepts numbers and numeric strings only", () => {
    expect(coerceNumber(0.5)).toBe(0.5);
    expect(coerceNumber(" 0.25 ")).toBe(0.25);
    expect(coerceNumber("")).toBe(0);
    expect(coerceNumber(true)).toBe(0);
    expect(coerceNumber(Number.NaN, 9)).toBe(9);
  });
});
