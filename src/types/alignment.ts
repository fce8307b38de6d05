export type SpeakerId = string;

/** One time-stamped, speaker-labelled sentence from the diarization engine. */
export type Sentence = {
  start: number;
  end: number;
  text: string;
  speaker: SpeakerId;
};

/** Consecutive same-speaker sentences folded into one matching unit. */
export type SpeakerGroup = {
  speaker: SpeakerId;
  start: number;
  end: number;
  text: string;
  members: Sentence[];
};

export type NormalizedText = {
  normalized: string;
  /** `indexMap[k]` is the original offset of the k-th retained character. */
  indexMap: number[];
};

export type MatchResult = {
  text: string;
  startPos: number;
  endPos: number;
  similarity: number;
};

export type AlignmentSource =
  | "fuzzy_match"
  | "hallucination_fallback"
  | "suspicious_fallback"
  | "empty"
  | "direct"
  | "merged"
  | "source_empty"
  | "extraction_failed";

export const ALIGNMENT_SOURCES: readonly AlignmentSource[] = [
  "fuzzy_match",
  "hallucination_fallback",
  "suspicious_fallback",
  "empty",
  "direct",
  "merged",
  "source_empty",
  "extraction_failed",
];

export type AlignmentRecord = {
  speaker: SpeakerId;
  start: number;
  end: number;
  text: string;
  source: AlignmentSource;
  mergedCount: number;
  similarity?: number;
};

export type AlignedGroup = {
  group: SpeakerGroup;
  text: string;
  source: AlignmentSource;
  similarity?: number;
  cursorAfter: number;
};

export type SourceStats = Partial<Record<AlignmentSource, number>>;

export type AlignmentConfig = {
  minSilenceGapMs: number;
  maxSegmentDurationMs: number;
  splitOnSpeakerChange: boolean;
  minSimilarity: number;
  hallucinationSimilarityFloor: number;
  hallucinationPositionRatio: number;
  suspiciousPositionRatio: number;
  searchDistanceMultiplier: number;
  minSearchDistance: number;
  windowMinRatio: number;
  windowMaxRatio: number;
  fallbackCursorStep: number;
  maxWindowEvaluations: number;
  extractionPaddingMs: number;
};

export type ExtractedAudio = {
  samples: Float32Array;
  sampleRate: number;
};

export type AlignmentSegmentWindow = {
  index: number;
  startIndex: number;
  endIndex: number;
  startMs: number;
  endMs: number;
};
