export const DIARIZATION_ERROR_NAME = "DiarizationError";
export const AUDIO_EXTRACTION_ERROR_NAME = "AudioExtractionError";
export const HIGH_FIDELITY_TRANSCRIPTION_ERROR_NAME =
  "HighFidelityTranscriptionError";

/** Nothing to align without diarized sentences; fatal for the file. */
export class DiarizationError extends Error {
  constructor(
    message: string,
    public readonly audioPath?: string,
  ) {
    super(message);
    this.name = DIARIZATION_ERROR_NAME;
  }
}

export class AudioExtractionError extends Error {
  constructor(
    message: string,
    public readonly startMs: number,
    public readonly endMs: number,
  ) {
    super(message);
    this.name = AUDIO_EXTRACTION_ERROR_NAME;
  }
}

export class HighFidelityTranscriptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = HIGH_FIDELITY_TRANSCRIPTION_ERROR_NAME;
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export const isDiarizationError = (
  error: unknown,
): error is DiarizationError => {
  if (error instanceof DiarizationError) return true;
  if (!isRecord(error)) return false;
  return error.name === DIARIZATION_ERROR_NAME;
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
