import type {
  AlignedGroup,
  AlignmentConfig,
  AlignmentSource,
  SpeakerGroup,
} from "../types/alignment";
import {
  fuzzySubstringSearch,
  resolveSearchDistance,
} from "../utils/fuzzySubstringSearch";
import { evaluateHallucinationGuards } from "../utils/hallucinationGuards";
import { normalizedLength } from "../utils/textNormalizer";
import { removeEmoji } from "../utils/transcriptCleanup";
import { DEFAULT_ALIGNMENT_CONFIG } from "./configService";

type GroupDecision = {
  text: string;
  source: AlignmentSource;
  similarity?: number;
  nextCursor: number;
};

const decideGroup = (
  highFidelityText: string,
  group: SpeakerGroup,
  cursor: number,
  config: AlignmentConfig,
): GroupDecision => {
  const needleLength = normalizedLength(group.text);
  if (needleLength === 0) {
    return { text: "", source: "empty", nextCursor: cursor };
  }

  const remaining = highFidelityText.slice(cursor);
  const maxSearchDistance = resolveSearchDistance(needleLength, config);
  const match = fuzzySubstringSearch(remaining, group.text, {
    minSimilarity: config.minSimilarity,
    maxSearchDistance,
    tuning: config,
  });

  // Rejected units still move forward so a run of failures cannot stall
  // the cursor on the same window.
  const steppedCursor = Math.min(
    highFidelityText.length,
    cursor + Math.min(needleLength, config.fallbackCursorStep),
  );
  const fallbackText = removeEmoji(group.text);

  const guard = evaluateHallucinationGuards(
    group.text,
    match,
    remaining.length,
    config,
  );
  if (guard.hallucination || !match) {
    return {
      text: fallbackText,
      source: "hallucination_fallback",
      nextCursor: steppedCursor,
    };
  }

  if (match.startPos > maxSearchDistance * config.suspiciousPositionRatio) {
    return {
      text: fallbackText,
      source: "suspicious_fallback",
      similarity: match.similarity,
      nextCursor: steppedCursor,
    };
  }

  const matchedText = match.text.trim();
  return {
    text: matchedText || fallbackText,
    source: "fuzzy_match",
    similarity: match.similarity,
    nextCursor: Math.min(highFidelityText.length, cursor + match.endPos),
  };
};

/**
 * Walk speaker groups left to right against one segment's high-fidelity
 * text. The cursor only moves forward and never leaves the text, so each
 * group can only claim text after what earlier groups claimed.
 */
export function alignSpeakerGroups(
  highFidelityText: string,
  groups: SpeakerGroup[],
  config: AlignmentConfig = DEFAULT_ALIGNMENT_CONFIG,
): AlignedGroup[] {
  const aligned: AlignedGroup[] = [];
  let cursor = 0;

  for (const group of groups) {
    const decision = decideGroup(highFidelityText, group, cursor, config);
    cursor = decision.nextCursor;
    aligned.push({
      group,
      text: decision.text,
      source: decision.source,
      ...(decision.similarity !== undefined
        ? { similarity: decision.similarity }
        : {}),
      cursorAfter: cursor,
    });
  }

  return aligned;
}
