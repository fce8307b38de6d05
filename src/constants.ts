export const MIN_SILENCE_GAP_MS = 2000; // ms of silence between sentences that forces an anchor
export const MAX_SEGMENT_DURATION_MS = 5 * 60 * 1000; // longest alignment segment before a forced anchor

export const MIN_SIMILARITY_THRESHOLD = 0.5; // weakest fuzzy match the matcher will return
export const HALLUCINATION_SIMILARITY_FLOOR = 0.4;
export const HALLUCINATION_POSITION_RATIO = 0.5; // matches starting past this share of the remaining text are distrusted
export const HALLUCINATION_MIN_REPEAT_LENGTH = 4;
export const HALLUCINATION_MAX_DISTINCT_CHARS = 2;
export const SUSPICIOUS_POSITION_RATIO = 0.8; // matches starting this close to the search boundary are distrusted

export const SEARCH_DISTANCE_MULTIPLIER = 3;
export const MIN_SEARCH_DISTANCE = 50;
export const WINDOW_MIN_RATIO = 0.5;
export const WINDOW_MAX_RATIO = 2;
export const MAX_WINDOW_EVALUATIONS = 200_000;

export const FALLBACK_CURSOR_STEP = 20; // max characters a rejected unit advances the cursor

export const EXTRACTION_PADDING_MS = 100;
export const EXTRACTION_SAMPLE_RATE = 16000;

export const TRANSCRIPTION_MODEL = "gpt-4o-transcribe";
export const TRANSCRIPTION_TIMEOUT_MS = 120_000;
export const TRANSCRIPTION_BREAK_AFTER_CONSECUTIVE_FAILURES = 5;
export const TRANSCRIPTION_BREAK_DURATION = 30_000;
export const TRANSCRIPTION_RATE_MIN_TIME = 200; // Rate limit in minimum milliseconds between requests

export const BATCH_MAX_CONCURRENT_FILES = 1;
export const AUDIO_FILE_EXTENSIONS = [".webm", ".mp3", ".wav", ".m4a", ".flac"];
export const TRANSCRIPTION_OUTPUT_SUFFIX = "_transcription.txt";
export const SENTENCES_SIDECAR_SUFFIX = ".sentences.json";
