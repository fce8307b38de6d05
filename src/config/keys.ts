export const CONFIG_KEYS = {
  alignment: {
    minSilenceGapMs: "ALIGN_MIN_SILENCE_GAP_MS",
    maxSegmentDurationMs: "ALIGN_MAX_SEGMENT_DURATION_MS",
    splitOnSpeakerChange: "ALIGN_SPLIT_ON_SPEAKER_CHANGE",
    minSimilarity: "ALIGN_MIN_SIMILARITY",
    hallucinationSimilarityFloor: "ALIGN_HALLUCINATION_SIMILARITY_FLOOR",
    hallucinationPositionRatio: "ALIGN_HALLUCINATION_POSITION_RATIO",
    suspiciousPositionRatio: "ALIGN_SUSPICIOUS_POSITION_RATIO",
    searchDistanceMultiplier: "ALIGN_SEARCH_DISTANCE_MULTIPLIER",
    minSearchDistance: "ALIGN_MIN_SEARCH_DISTANCE",
    windowMinRatio: "ALIGN_WINDOW_MIN_RATIO",
    windowMaxRatio: "ALIGN_WINDOW_MAX_RATIO",
    fallbackCursorStep: "ALIGN_FALLBACK_CURSOR_STEP",
    maxWindowEvaluations: "ALIGN_MAX_WINDOW_EVALUATIONS",
    extractionPaddingMs: "ALIGN_EXTRACTION_PADDING_MS",
  },
  transcription: {
    apiKey: "OPENAI_API_KEY",
    baseUrl: "OPENAI_BASE_URL",
    model: "TRANSCRIPTION_MODEL",
    language: "TRANSCRIPTION_LANGUAGE",
    timeoutMs: "TRANSCRIPTION_TIMEOUT_MS",
    breakAfterConsecutiveFailures:
      "TRANSCRIPTION_BREAK_AFTER_CONSECUTIVE_FAILURES",
    breakDurationMs: "TRANSCRIPTION_BREAK_DURATION_MS",
    rateMinTimeMs: "TRANSCRIPTION_RATE_MIN_TIME_MS",
  },
  batch: {
    maxConcurrentFiles: "BATCH_MAX_CONCURRENT_FILES",
  },
} as const;

export type AlignmentConfigKey = keyof typeof CONFIG_KEYS.alignment;
