import { describe, expect, test } from "@jest/globals";
import type { Sentence } from "../../src/types/alignment";
import {
  buildSegmentWindows,
  findAlignmentAnchors,
} from "../../src/utils/alignmentAnchors";

const buildSentence = (overrides: Partial<Sentence> = {}): Sentence => ({
  start: 0,
  end: 1000,
  text: "你好",
  speaker: "A",
  ...overrides,
});

const contiguousSentences = (count: number, speaker = "A"): Sentence[] =>
  Array.from({ length: count }, (_, index) =>
    buildSentence({ start: index * 1000, end: (index + 1) * 1000, speaker }),
  );

describe("findAlignmentAnchors", () => {
  test("an empty list yields a single empty segment", () => {
    expect(findAlignmentAnchors([])).toEqual([0, 0]);
  });

  test("a single sentence is one segment", () => {
    expect(findAlignmentAnchors([buildSentence()])).toEqual([0, 1]);
  });

  test("splits on long silences and speaker changes", () => {
    const sentences = [
      buildSentence({ start: 0, end: 1000, text: "你好", speaker: "A" }),
      buildSentence({ start: 1000, end: 2000, text: "今天天气", speaker: "A" }),
      buildSentence({ start: 5000, end: 6000, text: "很好", speaker: "B" }),
    ];
    expect(findAlignmentAnchors(sentences)).toEqual([0, 2, 3]);
  });

  test("a gap equal to the threshold does not split", () => {
    const sentences = [
      buildSentence({ start: 0, end: 1000 }),
      buildSentence({ start: 3000, end: 4000 }),
    ];
    expect(findAlignmentAnchors(sentences)).toEqual([0, 2]);
    expect(
      findAlignmentAnchors(sentences, { minSilenceGapMs: 1999 }),
    ).toEqual([0, 1, 2]);
  });

  test("speaker changes only split when enabled", () => {
    const sentences = [
      buildSentence({ start: 0, end: 1000, speaker: "A" }),
      buildSentence({ start: 1000, end: 2000, speaker: "B" }),
    ];
    expect(
      findAlignmentAnchors(sentences, { splitOnSpeakerChange: true }),
    ).toEqual([0, 1, 2]);
    expect(
      findAlignmentAnchors(sentences, { splitOnSpeakerChange: false }),
    ).toEqual([0, 2]);
  });

  test("forces a split once a segment runs past the duration limit", () => {
    expect(
      findAlignmentAnchors(contiguousSentences(7), {
        maxSegmentDurationMs: 2500,
      }),
    ).toEqual([0, 3, 6, 7]);
  });

  test("anchors are strictly increasing and bracket the list", () => {
    const sentences = [
      ...contiguousSentences(3, "A"),
      buildSentence({ start: 9000, end: 9500, speaker: "B" }),
      buildSentence({ start: 9500, end: 9800, speaker: "A" }),
      buildSentence({ start: 20000, end: 21000, speaker: "A" }),
    ];
    const anchors = findAlignmentAnchors(sentences);
    expect(anchors[0]).toBe(0);
    expect(anchors[anchors.length - 1]).toBe(sentences.length);
    for (let index = 1; index < anchors.length; index += 1) {
      expect(anchors[index]).toBeGreaterThan(anchors[index - 1]);
    }
  });
});

describe("buildSegmentWindows", () => {
  test("turns anchor pairs into time-bounded windows", () => {
    const sentences = [
      buildSentence({ start: 0, end: 1000 }),
      buildSentence({ start: 1000, end: 2000 }),
      buildSentence({ start: 5000, end: 6000, speaker: "B" }),
    ];
    expect(buildSegmentWindows(sentences, [0, 2, 3])).toEqual([
      { index: 0, startIndex: 0, endIndex: 2, startMs: 0, endMs: 2000 },
      { index: 1, startIndex: 2, endIndex: 3, startMs: 5000, endMs: 6000 },
    ]);
  });

  test("an empty list has no windows", () => {
    expect(buildSegmentWindows([], [0, 0])).toEqual([]);
  });
});
