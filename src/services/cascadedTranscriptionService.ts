import type {
  AlignmentConfig,
  AlignmentRecord,
  AlignmentSegmentWindow,
  ExtractedAudio,
  Sentence,
  SourceStats,
} from "../types/alignment";
import {
  buildSegmentWindows,
  findAlignmentAnchors,
} from "../utils/alignmentAnchors";
import { DiarizationError, describeError } from "./alignmentErrors";
import {
  type AlignmentObserver,
  type PipelineTimings,
  noopAlignmentObserver,
} from "./alignmentEvents";
import {
  type AudioExtractor,
  createAudioExtractor,
} from "./audioExtractionService";
import {
  type AlignmentConfigOverrides,
  getConfig,
  resolveAlignmentConfig,
} from "./configService";
import { createSidecarDiarizer, type Diarizer } from "./diarizationService";
import {
  createHighFidelityTranscriber,
  type HighFidelityTranscriber,
} from "./highFidelityTranscriptionService";
import {
  buildDiarizedFallbackRecords,
  summarizeSources,
} from "./resultAssemblyService";
import { alignSegment } from "./segmentAlignmentService";

export type CascadedDependencies = {
  diarize: Diarizer;
  extractAudio: AudioExtractor;
  transcribe: HighFidelityTranscriber;
  now: () => number;
};

export type CascadedTranscriptionOptions = {
  alignment?: AlignmentConfigOverrides;
  observer?: AlignmentObserver;
};

export type CascadedTranscriptionResult = {
  audioPath: string;
  records: AlignmentRecord[];
  anchors: number[];
  segmentCount: number;
  sourceStats: SourceStats;
  timings: PipelineTimings;
};

type SegmentContext = {
  audioPath: string;
  sentences: Sentence[];
  segment: AlignmentSegmentWindow;
  segmentCount: number;
  config: AlignmentConfig;
  dependencies: CascadedDependencies;
  observer: AlignmentObserver;
};

type SegmentOutcome = {
  records: AlignmentRecord[];
  highFidelityMs: number;
};

const resolveDependencies = (
  config: AlignmentConfig,
  overrides: Partial<CascadedDependencies>,
): CascadedDependencies => ({
  diarize: overrides.diarize ?? createSidecarDiarizer(),
  extractAudio:
    overrides.extractAudio ??
    createAudioExtractor({ paddingMs: config.extractionPaddingMs }),
  transcribe:
    overrides.transcribe ??
    createHighFidelityTranscriber(getConfig().transcription),
  now: overrides.now ?? Date.now,
});

const extractSegmentAudio = async (
  context: SegmentContext,
): Promise<ExtractedAudio | undefined> => {
  try {
    return await context.dependencies.extractAudio(
      context.audioPath,
      context.segment.startMs,
      context.segment.endMs,
    );
  } catch (error) {
    context.observer.onEvent({
      type: "segment_extraction_failed",
      segment: context.segment,
      error: describeError(error),
    });
    return undefined;
  }
};

const transcribeSegmentAudio = async (
  context: SegmentContext,
  audio: ExtractedAudio,
): Promise<string> => {
  try {
    return await context.dependencies.transcribe(
      audio.samples,
      audio.sampleRate,
    );
  } catch (error) {
    context.observer.onEvent({
      type: "segment_transcription_failed",
      segment: context.segment,
      error: describeError(error),
    });
    return "";
  }
};

/** Failures here degrade this segment only; nothing is rethrown. */
const processSegment = async (
  context: SegmentContext,
): Promise<SegmentOutcome> => {
  context.observer.onEvent({
    type: "segment_started",
    segment: context.segment,
    segmentCount: context.segmentCount,
    sentenceCount: context.sentences.length,
  });

  const audio = await extractSegmentAudio(context);
  if (!audio) {
    return {
      records: buildDiarizedFallbackRecords(
        context.sentences,
        "extraction_failed",
      ),
      highFidelityMs: 0,
    };
  }

  const transcribeStartedAt = context.dependencies.now();
  const highFidelityText = await transcribeSegmentAudio(context, audio);
  const highFidelityMs = context.dependencies.now() - transcribeStartedAt;

  const alignment = alignSegment(
    context.sentences,
    highFidelityText,
    context.config,
  );

  if (alignment.strategy === "source_empty") {
    context.observer.onEvent({
      type: "segment_source_empty",
      segment: context.segment,
    });
    return { records: alignment.records, highFidelityMs };
  }

  for (const aligned of alignment.aligned) {
    context.observer.onEvent({
      type: "group_aligned",
      segment: context.segment,
      speaker: aligned.group.speaker,
      source: aligned.source,
      similarity: aligned.similarity,
      cursorAfter: aligned.cursorAfter,
    });
  }
  context.observer.onEvent({
    type: "segment_aligned",
    segment: context.segment,
    strategy: alignment.strategy,
    speakerCount: alignment.speakerCount,
    recordCount: alignment.records.length,
  });

  return { records: alignment.records, highFidelityMs };
};

/**
 * Merge the diarized and high-fidelity transcripts of one audio file.
 * Segments run strictly in order, each from a fresh cursor. Only a
 * diarization failure aborts the file.
 */
export async function processAudioCascaded(
  audioPath: string,
  options: CascadedTranscriptionOptions = {},
  dependencyOverrides: Partial<CascadedDependencies> = {},
): Promise<CascadedTranscriptionResult> {
  const config = resolveAlignmentConfig(options.alignment);
  const observer = options.observer ?? noopAlignmentObserver;
  const dependencies = resolveDependencies(config, dependencyOverrides);

  const startedAt = dependencies.now();
  const sentences = await dependencies.diarize(audioPath);
  if (sentences.length === 0) {
    throw new DiarizationError("Diarization produced no sentences.", audioPath);
  }
  const diarizationMs = dependencies.now() - startedAt;
  observer.onEvent({
    type: "diarization_completed",
    audioPath,
    sentenceCount: sentences.length,
    elapsedMs: diarizationMs,
  });

  const anchors = findAlignmentAnchors(sentences, config);
  const segments = buildSegmentWindows(sentences, anchors);
  observer.onEvent({
    type: "anchors_detected",
    audioPath,
    anchors,
    segmentCount: segments.length,
  });

  const records: AlignmentRecord[] = [];
  let highFidelityMs = 0;
  for (const segment of segments) {
    const outcome = await processSegment({
      audioPath,
      sentences: sentences.slice(segment.startIndex, segment.endIndex),
      segment,
      segmentCount: segments.length,
      config,
      dependencies,
      observer,
    });
    records.push(...outcome.records);
    highFidelityMs += outcome.highFidelityMs;
  }

  const sourceStats = summarizeSources(records);
  const timings: PipelineTimings = {
    diarizationMs,
    highFidelityMs,
    totalMs: dependencies.now() - startedAt,
  };
  observer.onEvent({
    type: "file_completed",
    audioPath,
    recordCount: records.length,
    sourceStats,
    timings,
  });

  return {
    audioPath,
    records,
    anchors,
    segmentCount: segments.length,
    sourceStats,
    timings,
  };
}
