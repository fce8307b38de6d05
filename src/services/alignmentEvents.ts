import type {
  AlignmentSegmentWindow,
  AlignmentSource,
  SourceStats,
  SpeakerId,
} from "../types/alignment";

export type SegmentStrategy = "direct" | "merged" | "fuzzy";

export type PipelineTimings = {
  diarizationMs: number;
  highFidelityMs: number;
  totalMs: number;
};

export type AlignmentEvent =
  | {
      type: "diarization_completed";
      audioPath: string;
      sentenceCount: number;
      elapsedMs: number;
    }
  | {
      type: "anchors_detected";
      audioPath: string;
      anchors: number[];
      segmentCount: number;
    }
  | {
      type: "segment_started";
      segment: AlignmentSegmentWindow;
      segmentCount: number;
      sentenceCount: number;
    }
  | {
      type: "segment_extraction_failed";
      segment: AlignmentSegmentWindow;
      error: string;
    }
  | {
      type: "segment_transcription_failed";
      segment: AlignmentSegmentWindow;
      error: string;
    }
  | {
      type: "segment_source_empty";
      segment: AlignmentSegmentWindow;
    }
  | {
      type: "segment_aligned";
      segment: AlignmentSegmentWindow;
      strategy: SegmentStrategy;
      speakerCount: number;
      recordCount: number;
    }
  | {
      type: "group_aligned";
      segment: AlignmentSegmentWindow;
      speaker: SpeakerId;
      source: AlignmentSource;
      similarity?: number;
      cursorAfter: number;
    }
  | {
      type: "file_completed";
      audioPath: string;
      recordCount: number;
      sourceStats: SourceStats;
      timings: PipelineTimings;
    };

export type AlignmentEventType = AlignmentEvent["type"];

export type AlignmentObserver = {
  onEvent: (event: AlignmentEvent) => void;
};

export const noopAlignmentObserver: AlignmentObserver = {
  onEvent: () => undefined,
};

const describeSegment = (segment: AlignmentSegmentWindow) => ({
  segmentIndex: segment.index + 1,
  startMs: segment.startMs,
  endMs: segment.endMs,
  sentences: segment.endIndex - segment.startIndex,
});

/** Structured console output for each pipeline event. */
export const createConsoleAlignmentObserver = (
  options: { verbose?: boolean } = {},
): AlignmentObserver => ({
  onEvent: (event) => {
    switch (event.type) {
      case "diarization_completed":
        console.log("Diarized sentences loaded.", {
          audioPath: event.audioPath,
          sentenceCount: event.sentenceCount,
          elapsedMs: event.elapsedMs,
        });
        return;
      case "anchors_detected":
        console.log("Alignment anchors detected.", {
          audioPath: event.audioPath,
          segmentCount: event.segmentCount,
        });
        return;
      case "segment_started":
        if (options.verbose) {
          console.log("Processing alignment segment.", {
            ...describeSegment(event.segment),
            segmentCount: event.segmentCount,
          });
        }
        return;
      case "segment_extraction_failed":
        console.error("Audio extraction failed, using diarized text.", {
          ...describeSegment(event.segment),
          error: event.error,
        });
        return;
      case "segment_transcription_failed":
        console.error("High-fidelity transcription failed.", {
          ...describeSegment(event.segment),
          error: event.error,
        });
        return;
      case "segment_source_empty":
        console.warn("High-fidelity text empty, using diarized text.", {
          ...describeSegment(event.segment),
        });
        return;
      case "segment_aligned":
        if (options.verbose) {
          console.log("Alignment segment done.", {
            ...describeSegment(event.segment),
            strategy: event.strategy,
            speakerCount: event.speakerCount,
            recordCount: event.recordCount,
          });
        }
        return;
      case "group_aligned":
        if (options.verbose) {
          console.log("Speaker group aligned.", {
            segmentIndex: event.segment.index + 1,
            speaker: event.speaker,
            source: event.source,
            similarity: event.similarity,
            cursorAfter: event.cursorAfter,
          });
        }
        return;
      case "file_completed":
        console.log("Cascaded alignment complete.", {
          audioPath: event.audioPath,
          recordCount: event.recordCount,
          sourceStats: event.sourceStats,
          timings: event.timings,
        });
        return;
    }
  },
});

export type RecordingAlignmentObserver = AlignmentObserver & {
  events: AlignmentEvent[];
  ofType: <T extends AlignmentEventType>(
    type: T,
  ) => Extract<AlignmentEvent, { type: T }>[];
};

export const createRecordingAlignmentObserver =
  (): RecordingAlignmentObserver => {
    const events: AlignmentEvent[] = [];
    return {
      events,
      onEvent: (event) => {
        events.push(event);
      },
      ofType: <T extends AlignmentEventType>(type: T) =>
        events.filter(
          (event): event is Extract<AlignmentEvent, { type: T }> =>
            event.type === type,
        ),
    };
  };
