import {
  HALLUCINATION_MAX_DISTINCT_CHARS,
  HALLUCINATION_MIN_REPEAT_LENGTH,
  HALLUCINATION_POSITION_RATIO,
  HALLUCINATION_SIMILARITY_FLOOR,
} from "../constants";
import type { AlignmentConfig, MatchResult } from "../types/alignment";

export type HallucinationReason =
  | "empty_text"
  | "repeated_characters"
  | "no_match"
  | "low_similarity"
  | "late_match";

export type HallucinationGuardResult = {
  hallucination: boolean;
  reason?: HallucinationReason;
};

export type HallucinationThresholds = Pick<
  AlignmentConfig,
  "hallucinationSimilarityFloor" | "hallucinationPositionRatio"
>;

const DEFAULT_THRESHOLDS: HallucinationThresholds = {
  hallucinationSimilarityFloor: HALLUCINATION_SIMILARITY_FLOOR,
  hallucinationPositionRatio: HALLUCINATION_POSITION_RATIO,
};

const flagged = (reason: HallucinationReason): HallucinationGuardResult => ({
  hallucination: true,
  reason,
});

// Counted per code point so astral characters are not split in two.
const isDegenerateRepeat = (text: string): boolean => {
  const chars = Array.from(text);
  if (chars.length < HALLUCINATION_MIN_REPEAT_LENGTH) return false;
  return new Set(chars).size <= HALLUCINATION_MAX_DISTINCT_CHARS;
};

/**
 * Decide whether a diarized unit and its fuzzy match should be distrusted.
 * Rules run in order and the first hit wins; when nothing fires the match
 * is usable.
 */
export function evaluateHallucinationGuards(
  needleText: string,
  match: MatchResult | undefined,
  remainingLength: number,
  thresholds: Partial<HallucinationThresholds> = {},
): HallucinationGuardResult {
  const resolved = { ...DEFAULT_THRESHOLDS, ...thresholds };

  if (!needleText) return flagged("empty_text");
  if (isDegenerateRepeat(needleText)) return flagged("repeated_characters");
  if (!match) return flagged("no_match");
  if (match.similarity < resolved.hallucinationSimilarityFloor) {
    return flagged("low_similarity");
  }
  if (
    remainingLength > 0 &&
    match.startPos > remainingLength * resolved.hallucinationPositionRatio
  ) {
    return flagged("late_match");
  }

  return { hallucination: false };
}

export const isLikelyHallucination = (
  needleText: string,
  match: MatchResult | undefined,
  remainingLength: number,
  thresholds?: Partial<HallucinationThresholds>,
): boolean =>
  evaluateHallucinationGuards(needleText, match, remainingLength, thresholds)
    .hallucination;
