import { describe, expect, test } from "@jest/globals";
import {
  cleanHighFidelityText,
  removeEmoji,
  removeEngineTags,
} from "../../src/utils/transcriptCleanup";

describe("removeEngineTags", () => {
  test("strips markup tags and collapses whitespace", () => {
    expect(removeEngineTags("<|zh|><|NEUTRAL|><|Speech|>  你好   世界 ")).toBe(
      "你好 世界",
    );
  });

  test("leaves empty input empty", () => {
    expect(removeEngineTags("")).toBe("");
  });
});

describe("removeEmoji", () => {
  test("drops emoji and trims", () => {
    expect(removeEmoji("好的👍 ")).toBe("好的");
    expect(removeEmoji("😀😀")).toBe("");
  });

  test("keeps plain text untouched", () => {
    expect(removeEmoji("今天天气不错。")).toBe("今天天气不错。");
  });
});

describe("cleanHighFidelityText", () => {
  test("removes tags then emoji", () => {
    expect(cleanHighFidelityText("<|en|>Sounds good 🎉")).toBe("Sounds good");
  });
});
