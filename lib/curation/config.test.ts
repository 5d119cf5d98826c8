import { describe, it, expect } from "vitest";
import { CURATION_DEFAULTS, buildCurationConfig } from "./config";
import { ConfigError } from "./errors";

describe("buildCurationConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(buildCurationConfig()).toEqual(CURATION_DEFAULTS);
  });

  it("deep-merges nested sections", () => {
    const cfg = buildCurationConfig({ video: { preset: "clips_only", dedupe: { scope: "global" } } });
    expect(cfg.video.preset).toBe("clips_only");
    expect(cfg.video.dedupe).toEqual({ enabled: true, hamming_threshold: 6, scope: "global" });
    expect(cfg.video.max_clip_seconds).toBe(6);
  });

  it("rejects invalid values with ConfigError", () => {
    expect(() => buildCurationConfig({ video: { min_clip_seconds: 8, max_clip_seconds: 6 } })).toThrow(ConfigError);
    expect(() => buildCurationConfig({ photo: { hamming_threshold: 65 } })).toThrow(
      "CurationConfig invalid: photo.hamming_threshold must be within 0..64"
    );
    expect(() => buildCurationConfig({ judge: { base_url: "localhost:11434" } })).toThrow(ConfigError);
  });
});
