import type {
  AlignedGroup,
  AlignmentRecord,
  AlignmentSource,
  Sentence,
  SourceStats,
} from "../types/alignment";
import { removeEmoji } from "../utils/transcriptCleanup";

/**
 * One record per aligned group. Groups with several member sentences stay
 * merged; their text is never split back across sentence boundaries.
 */
export const toAlignmentRecord = (aligned: AlignedGroup): AlignmentRecord => ({
  speaker: aligned.group.speaker,
  start: aligned.group.start,
  end: aligned.group.end,
  text: aligned.text,
  source: aligned.source,
  mergedCount: Math.max(1, aligned.group.members.length),
  ...(aligned.similarity !== undefined
    ? { similarity: aligned.similarity }
    : {}),
});

export const assembleRecords = (aligned: AlignedGroup[]): AlignmentRecord[] =>
  aligned.map(toAlignmentRecord);

/** Each sentence keeps its own diarized text, tagged with why. */
export const buildDiarizedFallbackRecords = (
  sentences: Sentence[],
  source: AlignmentSource,
): AlignmentRecord[] =>
  sentences.map((sentence) => ({
    speaker: sentence.speaker,
    start: sentence.start,
    end: sentence.end,
    text: removeEmoji(sentence.text),
    source,
    mergedCount: 1,
  }));

export const summarizeSources = (records: AlignmentRecord[]): SourceStats => {
  const stats: SourceStats = {};
  for (const record of records) {
    stats[record.source] = (stats[record.source] ?? 0) + 1;
  }
  return stats;
};
