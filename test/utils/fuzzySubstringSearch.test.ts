import { describe, expect, test } from "@jest/globals";
import {
  fuzzySubstringSearch,
  resolveSearchDistance,
} from "../../src/utils/fuzzySubstringSearch";

describe("fuzzySubstringSearch", () => {
  test("finds a needle across whitespace in the haystack", () => {
    expect(fuzzySubstringSearch("今天 天气 真不错", "今天天气")).toEqual({
      text: "今天 天气 ",
      startPos: 0,
      endPos: 6,
      similarity: 1,
    });
  });

  test("returns nothing for a needle that normalizes to empty", () => {
    expect(fuzzySubstringSearch("今天天气", "，。！")).toBeUndefined();
  });

  test("does not look past the search distance", () => {
    const haystack = `${"x".repeat(60)}abc`;
    expect(
      fuzzySubstringSearch(haystack, "abc", { maxSearchDistance: 50 }),
    ).toBeUndefined();
  });

  test("keeps the best window only when it clears the threshold", () => {
    expect(fuzzySubstringSearch("abcxyz", "abcdef")).toEqual({
      text: "abc",
      startPos: 0,
      endPos: 3,
      similarity: 2 / 3,
    });
    expect(
      fuzzySubstringSearch("abcxyz", "abcdef", { minSimilarity: 0.7 }),
    ).toBeUndefined();
  });

  test("stops scoring windows once the evaluation cap is hit", () => {
    expect(
      fuzzySubstringSearch("今天 天气 真不错", "今天天气", {
        tuning: { maxWindowEvaluations: 1 },
      }),
    ).toEqual({
      text: "今天 ",
      startPos: 0,
      endPos: 3,
      similarity: 2 / 3,
    });
  });

  test("match positions always lie inside the searched slice", () => {
    const cases: Array<[string, string]> = [
      ["大家好，我是小王。今天我们讨论预算。", "今天讨论预算"],
      ["Hello there, general Kenobi!", "general kenobi"],
      ["  ，。  好的，没问题  ", "没问题"],
      ["短", "短"],
    ];
    for (const [haystack, needle] of cases) {
      const match = fuzzySubstringSearch(haystack, needle);
      expect(match).toBeDefined();
      if (!match) continue;
      expect(match.startPos).toBeGreaterThanOrEqual(0);
      expect(match.startPos).toBeLessThanOrEqual(match.endPos);
      expect(match.endPos).toBeLessThanOrEqual(haystack.length);
      expect(match.text).toBe(haystack.slice(match.startPos, match.endPos));
    }
  });
});

describe("resolveSearchDistance", () => {
  test("scales with the needle but never drops below the floor", () => {
    const tuning = { searchDistanceMultiplier: 3, minSearchDistance: 50 };
    expect(resolveSearchDistance(5, tuning)).toBe(50);
    expect(resolveSearchDistance(40, tuning)).toBe(120);
  });
});
