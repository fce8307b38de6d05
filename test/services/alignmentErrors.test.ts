import { describe, expect, test } from "@jest/globals";
import {
  AudioExtractionError,
  DiarizationError,
  describeError,
  isDiarizationError,
} from "../../src/services/alignmentErrors";

describe("alignment errors", () => {
  test("recognizes diarization errors by class or name", () => {
    expect(
      isDiarizationError(new DiarizationError("no sentences", "/a.wav")),
    ).toBe(true);
    expect(isDiarizationError({ name: "DiarizationError" })).toBe(true);
    expect(isDiarizationError(new Error("other"))).toBe(false);
    expect(isDiarizationError(null)).toBe(false);
  });

  test("keeps the failed window on extraction errors", () => {
    const error = new AudioExtractionError("ffmpeg exited", 1000, 2000);
    expect(error.name).toBe("AudioExtractionError");
    expect([error.startMs, error.endMs]).toEqual([1000, 2000]);
  });

  test("describes errors and thrown values", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("plain")).toBe("plain");
  });
});
