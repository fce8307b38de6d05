import { MAX_SEGMENT_DURATION_MS, MIN_SILENCE_GAP_MS } from "../constants";
import type {
  AlignmentConfig,
  AlignmentSegmentWindow,
  Sentence,
} from "../types/alignment";

export type AnchorOptions = Partial<
  Pick<
    AlignmentConfig,
    "minSilenceGapMs" | "maxSegmentDurationMs" | "splitOnSpeakerChange"
  >
>;

const shouldAnchor = (
  prev: Sentence,
  curr: Sentence,
  lastAnchorTime: number,
  options: Required<AnchorOptions>,
): boolean => {
  if (curr.start - prev.end > options.minSilenceGapMs) return true;
  if (options.splitOnSpeakerChange && prev.speaker !== curr.speaker) {
    return true;
  }
  return curr.start - lastAnchorTime > options.maxSegmentDurationMs;
};

/**
 * Split a start-ordered sentence list into alignment segments. Returns
 * sentence indices `[0, …, sentences.length]`; each adjacent pair bounds
 * one segment. An empty list yields `[0, 0]`.
 */
export function findAlignmentAnchors(
  sentences: Sentence[],
  options: AnchorOptions = {},
): number[] {
  if (sentences.length === 0) return [0, 0];

  const resolved: Required<AnchorOptions> = {
    minSilenceGapMs: options.minSilenceGapMs ?? MIN_SILENCE_GAP_MS,
    maxSegmentDurationMs:
      options.maxSegmentDurationMs ?? MAX_SEGMENT_DURATION_MS,
    splitOnSpeakerChange: options.splitOnSpeakerChange ?? true,
  };

  const anchors = new Set<number>([0]);
  let lastAnchorTime = sentences[0].start;

  for (let index = 1; index < sentences.length; index += 1) {
    const curr = sentences[index];
    if (shouldAnchor(sentences[index - 1], curr, lastAnchorTime, resolved)) {
      anchors.add(index);
      lastAnchorTime = curr.start;
    }
  }

  anchors.add(sentences.length);
  return Array.from(anchors).sort((a, b) => a - b);
}

export const buildSegmentWindows = (
  sentences: Sentence[],
  anchors: number[],
): AlignmentSegmentWindow[] => {
  const windows: AlignmentSegmentWindow[] = [];
  for (let index = 0; index < anchors.length - 1; index += 1) {
    const startIndex = anchors[index];
    const endIndex = anchors[index + 1];
    if (endIndex <= startIndex) continue;
    windows.push({
      index,
      startIndex,
      endIndex,
      startMs: sentences[startIndex].start,
      endMs: sentences[endIndex - 1].end,
    });
  }
  return windows;
};
