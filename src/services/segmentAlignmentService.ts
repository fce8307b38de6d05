import type {
  AlignedGroup,
  AlignmentConfig,
  AlignmentRecord,
  Sentence,
} from "../types/alignment";
import { countSpeakers, groupBySpeaker } from "../utils/speakerGroups";
import { cleanHighFidelityText } from "../utils/transcriptCleanup";
import type { SegmentStrategy } from "./alignmentEvents";
import { DEFAULT_ALIGNMENT_CONFIG } from "./configService";
import {
  assembleRecords,
  buildDiarizedFallbackRecords,
} from "./resultAssemblyService";
import { alignSpeakerGroups } from "./sequentialAlignmentService";

export type SegmentAlignment = {
  strategy: SegmentStrategy | "source_empty";
  records: AlignmentRecord[];
  aligned: AlignedGroup[];
  speakerCount: number;
};

/**
 * Align one segment's sentences with the high-fidelity text produced for
 * the same audio span. Each call starts from a fresh cursor.
 */
export function alignSegment(
  sentences: Sentence[],
  rawHighFidelityText: string,
  config: AlignmentConfig = DEFAULT_ALIGNMENT_CONFIG,
): SegmentAlignment {
  const speakerCount = countSpeakers(sentences);
  const highFidelityText = cleanHighFidelityText(rawHighFidelityText);

  if (sentences.length === 0) {
    return { strategy: "direct", records: [], aligned: [], speakerCount };
  }

  if (!highFidelityText) {
    return {
      strategy: "source_empty",
      records: buildDiarizedFallbackRecords(sentences, "source_empty"),
      aligned: [],
      speakerCount,
    };
  }

  const first = sentences[0];
  const last = sentences[sentences.length - 1];

  if (sentences.length === 1) {
    return {
      strategy: "direct",
      records: [
        {
          speaker: first.speaker,
          start: first.start,
          end: first.end,
          text: highFidelityText,
          source: "direct",
          mergedCount: 1,
        },
      ],
      aligned: [],
      speakerCount,
    };
  }

  if (speakerCount === 1) {
    // Nothing reliable to split one speaker's text on.
    return {
      strategy: "merged",
      records: [
        {
          speaker: first.speaker,
          start: first.start,
          end: last.end,
          text: highFidelityText,
          source: "merged",
          mergedCount: sentences.length,
        },
      ],
      aligned: [],
      speakerCount,
    };
  }

  const aligned = alignSpeakerGroups(
    highFidelityText,
    groupBySpeaker(sentences),
    config,
  );
  return {
    strategy: "fuzzy",
    records: assembleRecords(aligned),
    aligned,
    speakerCount,
  };
}
