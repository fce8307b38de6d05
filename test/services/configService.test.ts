import { describe, expect, test } from "@jest/globals";
import {
  DEFAULT_ALIGNMENT_CONFIG,
  loadConfig,
  resolveAlignmentConfig,
} from "../../src/services/configService";

describe("resolveAlignmentConfig", () => {
  test("fills every field from the defaults", () => {
    expect(resolveAlignmentConfig()).toEqual({
      minSilenceGapMs: 2000,
      maxSegmentDurationMs: 300000,
      splitOnSpeakerChange: true,
      minSimilarity: 0.5,
      hallucinationSimilarityFloor: 0.4,
      hallucinationPositionRatio: 0.5,
      suspiciousPositionRatio: 0.8,
      searchDistanceMultiplier: 3,
      minSearchDistance: 50,
      windowMinRatio: 0.5,
      windowMaxRatio: 2,
      fallbackCursorStep: 20,
      maxWindowEvaluations: 200000,
      extractionPaddingMs: 100,
    });
  });

  test("applies overrides over the defaults", () => {
    expect(
      resolveAlignmentConfig({
        minSimilarity: 0.7,
        splitOnSpeakerChange: false,
      }),
    ).toEqual({
      ...DEFAULT_ALIGNMENT_CONFIG,
      minSimilarity: 0.7,
      splitOnSpeakerChange: false,
    });
  });

  test("rejects ratios outside [0, 1]", () => {
    expect(() => resolveAlignmentConfig({ minSimilarity: 2 })).toThrow();
  });
});

describe("loadConfig", () => {
  test("reads alignment and transcription settings from the environment", () => {
    const config = loadConfig({
      ALIGN_MIN_SILENCE_GAP_MS: "1500",
      ALIGN_SPLIT_ON_SPEAKER_CHANGE: "false",
      OPENAI_API_KEY: "test-secret",
      TRANSCRIPTION_LANGUAGE: "zh",
      BATCH_MAX_CONCURRENT_FILES: "3",
    });

    expect(config.alignment).toEqual({
      ...DEFAULT_ALIGNMENT_CONFIG,
      minSilenceGapMs: 1500,
      splitOnSpeakerChange: false,
    });
    expect(config.transcription).toMatchObject({
      apiKey: "test-secret",
      model: "gpt-4o-transcribe",
      language: "zh",
      timeoutMs: 120000,
      breakAfterConsecutiveFailures: 5,
      breakDurationMs: 30000,
      rateMinTimeMs: 200,
    });
    expect(config.batch).toEqual({ maxConcurrentFiles: 3 });
  });

  test("ignores blank values", () => {
    const config = loadConfig({
      ALIGN_MIN_SIMILARITY: "  ",
      OPENAI_API_KEY: "",
    });
    expect(config.alignment.minSimilarity).toBe(0.5);
    expect(config.transcription.apiKey).toBeUndefined();
  });

  test("rejects invalid values", () => {
    expect(() => loadConfig({ ALIGN_MIN_SIMILARITY: "2" })).toThrow();
    expect(() =>
      loadConfig({ ALIGN_SPLIT_ON_SPEAKER_CHANGE: "maybe" }),
    ).toThrow();
  });
});
