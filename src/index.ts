export * from "./types/alignment";
export {
  normalizeText,
  normalizeWithIndexMap,
  mapToOriginalPosition,
} from "./utils/textNormalizer";
export { similarityRatio } from "./utils/sequenceSimilarity";
export {
  fuzzySubstringSearch,
  resolveSearchDistance,
} from "./utils/fuzzySubstringSearch";
export {
  evaluateHallucinationGuards,
  isLikelyHallucination,
} from "./utils/hallucinationGuards";
export {
  findAlignmentAnchors,
  buildSegmentWindows,
} from "./utils/alignmentAnchors";
export { groupBySpeaker } from "./utils/speakerGroups";
export {
  removeEmoji,
  removeEngineTags,
  cleanHighFidelityText,
} from "./utils/transcriptCleanup";
export { alignSpeakerGroups } from "./services/sequentialAlignmentService";
export { alignSegment } from "./services/segmentAlignmentService";
export {
  assembleRecords,
  summarizeSources,
} from "./services/resultAssemblyService";
export {
  processAudioCascaded,
  type CascadedDependencies,
  type CascadedTranscriptionResult,
} from "./services/cascadedTranscriptionService";
export * from "./services/alignmentEvents";
export * from "./services/alignmentErrors";
export {
  DEFAULT_ALIGNMENT_CONFIG,
  loadConfig,
  resolveAlignmentConfig,
} from "./services/configService";
export { createAudioExtractor } from "./services/audioExtractionService";
export { createHighFidelityTranscriber } from "./services/highFidelityTranscriptionService";
export { createWavEncoder } from "./services/wavConversionService";
export { createSidecarDiarizer } from "./services/diarizationService";
export {
  formatCascadedResult,
  formatCascadedResultJson,
} from "./services/resultFormatService";
export { processDirectory } from "./services/batchProcessingService";
