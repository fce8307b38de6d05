import { describe, expect, test } from "@jest/globals";
import {
  assembleRecords,
  buildDiarizedFallbackRecords,
  summarizeSources,
} from "../../src/services/resultAssemblyService";
import type { AlignedGroup, AlignmentRecord } from "../../src/types/alignment";

const members = [
  { start: 0, end: 400, text: "大家好", speaker: "A" },
  { start: 400, end: 800, text: "我是", speaker: "A" },
  { start: 800, end: 1200, text: "小王", speaker: "A" },
];

const buildAligned = (overrides: Partial<AlignedGroup> = {}): AlignedGroup => ({
  group: {
    speaker: "A",
    start: 0,
    end: 1200,
    text: "大家好我是小王",
    members,
  },
  text: "大家好，我是小王。",
  source: "fuzzy_match",
  similarity: 1,
  cursorAfter: 9,
  ...overrides,
});

describe("assembleRecords", () => {
  test("keeps a multi-sentence group as one record with its member count", () => {
    expect(assembleRecords([buildAligned()])).toEqual([
      {
        speaker: "A",
        start: 0,
        end: 1200,
        text: "大家好，我是小王。",
        source: "fuzzy_match",
        mergedCount: 3,
        similarity: 1,
      },
    ]);
  });

  test("omits similarity when the group had none", () => {
    const { similarity: _omitted, ...aligned } = buildAligned({
      source: "empty",
      text: "",
    });
    const [record] = assembleRecords([aligned]);
    expect(record).not.toHaveProperty("similarity");
    expect(record.source).toBe("empty");
  });
});

describe("buildDiarizedFallbackRecords", () => {
  test("emits one record per sentence with emoji removed", () => {
    expect(
      buildDiarizedFallbackRecords(
        [{ start: 0, end: 1000, text: "好的👍", speaker: "B" }],
        "extraction_failed",
      ),
    ).toEqual([
      {
        speaker: "B",
        start: 0,
        end: 1000,
        text: "好的",
        source: "extraction_failed",
        mergedCount: 1,
      },
    ]);
  });
});

describe("summarizeSources", () => {
  test("counts records per source", () => {
    const buildRecord = (
      overrides: Partial<AlignmentRecord>,
    ): AlignmentRecord => ({
      speaker: "A",
      start: 0,
      end: 1,
      text: "a",
      source: "fuzzy_match",
      mergedCount: 1,
      ...overrides,
    });
    const records = [
      buildRecord({}),
      buildRecord({ speaker: "B", start: 1, end: 2, text: "b" }),
      buildRecord({ start: 2, end: 3, text: "c", source: "direct" }),
    ];
    expect(summarizeSources(records)).toEqual({ fuzzy_match: 2, direct: 1 });
    expect(summarizeSources([])).toEqual({});
  });
});
