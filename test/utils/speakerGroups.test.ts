import { describe, expect, test } from "@jest/globals";
import type { Sentence } from "../../src/types/alignment";
import { countSpeakers, groupBySpeaker } from "../../src/utils/speakerGroups";

const sentences: Sentence[] = [
  { start: 0, end: 1000, text: "大家好", speaker: "A" },
  { start: 1000, end: 1800, text: "我是小王", speaker: "A" },
  { start: 1800, end: 3000, text: "你好", speaker: "B" },
  { start: 3000, end: 4000, text: "开始吧", speaker: "A" },
];

describe("groupBySpeaker", () => {
  test("folds consecutive same-speaker sentences", () => {
    const groups = groupBySpeaker(sentences);
    expect(
      groups.map(({ speaker, start, end, text, members }) => ({
        speaker,
        start,
        end,
        text,
        memberCount: members.length,
      })),
    ).toEqual([
      {
        speaker: "A",
        start: 0,
        end: 1800,
        text: "大家好我是小王",
        memberCount: 2,
      },
      { speaker: "B", start: 1800, end: 3000, text: "你好", memberCount: 1 },
      { speaker: "A", start: 3000, end: 4000, text: "开始吧", memberCount: 1 },
    ]);
  });

  test("keeps the original sentences as members", () => {
    const [first] = groupBySpeaker(sentences);
    expect(first.members).toEqual([sentences[0], sentences[1]]);
  });

  test("does not mutate its input", () => {
    groupBySpeaker(sentences);
    expect(sentences[0]).toEqual({
      start: 0,
      end: 1000,
      text: "大家好",
      speaker: "A",
    });
  });

  test("an empty list has no groups", () => {
    expect(groupBySpeaker([])).toEqual([]);
  });
});

describe("countSpeakers", () => {
  test("counts distinct speakers", () => {
    expect(countSpeakers(sentences)).toBe(2);
    expect(countSpeakers([])).toBe(0);
  });
});
