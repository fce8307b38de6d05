import { z } from "zod";
import { CONFIG_KEYS } from "../config/keys";
import {
  BATCH_MAX_CONCURRENT_FILES,
  EXTRACTION_PADDING_MS,
  FALLBACK_CURSOR_STEP,
  HALLUCINATION_POSITION_RATIO,
  HALLUCINATION_SIMILARITY_FLOOR,
  MAX_SEGMENT_DURATION_MS,
  MAX_WINDOW_EVALUATIONS,
  MIN_SEARCH_DISTANCE,
  MIN_SILENCE_GAP_MS,
  MIN_SIMILARITY_THRESHOLD,
  SEARCH_DISTANCE_MULTIPLIER,
  SUSPICIOUS_POSITION_RATIO,
  TRANSCRIPTION_BREAK_AFTER_CONSECUTIVE_FAILURES,
  TRANSCRIPTION_BREAK_DURATION,
  TRANSCRIPTION_MODEL,
  TRANSCRIPTION_RATE_MIN_TIME,
  TRANSCRIPTION_TIMEOUT_MS,
  WINDOW_MAX_RATIO,
  WINDOW_MIN_RATIO,
} from "../constants";
import type { AlignmentConfig } from "../types/alignment";

const ratio = z.number().min(0).max(1);

export const AlignmentConfigSchema = z.object({
  minSilenceGapMs: z.number().nonnegative().default(MIN_SILENCE_GAP_MS),
  maxSegmentDurationMs: z
    .number()
    .positive()
    .default(MAX_SEGMENT_DURATION_MS),
  splitOnSpeakerChange: z.boolean().default(true),
  minSimilarity: ratio.default(MIN_SIMILARITY_THRESHOLD),
  hallucinationSimilarityFloor: ratio.default(HALLUCINATION_SIMILARITY_FLOOR),
  hallucinationPositionRatio: ratio.default(HALLUCINATION_POSITION_RATIO),
  suspiciousPositionRatio: ratio.default(SUSPICIOUS_POSITION_RATIO),
  searchDistanceMultiplier: z
    .number()
    .positive()
    .default(SEARCH_DISTANCE_MULTIPLIER),
  minSearchDistance: z.number().int().positive().default(MIN_SEARCH_DISTANCE),
  windowMinRatio: z.number().positive().default(WINDOW_MIN_RATIO),
  windowMaxRatio: z.number().positive().default(WINDOW_MAX_RATIO),
  fallbackCursorStep: z.number().int().positive().default(FALLBACK_CURSOR_STEP),
  maxWindowEvaluations: z
    .number()
    .int()
    .positive()
    .default(MAX_WINDOW_EVALUATIONS),
  extractionPaddingMs: z
    .number()
    .nonnegative()
    .default(EXTRACTION_PADDING_MS),
});

export type AlignmentConfigOverrides = Partial<AlignmentConfig>;

/** Merge overrides over the defaults and validate the result. */
export const resolveAlignmentConfig = (
  overrides: AlignmentConfigOverrides = {},
): AlignmentConfig => AlignmentConfigSchema.parse(overrides);

export const DEFAULT_ALIGNMENT_CONFIG: AlignmentConfig =
  resolveAlignmentConfig();

export type TranscriptionConfig = {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  language?: string;
  timeoutMs: number;
  breakAfterConsecutiveFailures: number;
  breakDurationMs: number;
  rateMinTimeMs: number;
};

export type AppConfig = {
  alignment: AlignmentConfig;
  transcription: TranscriptionConfig;
  batch: {
    maxConcurrentFiles: number;
  };
};

const envBoolean = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const AlignmentEnvSchema = z.object({
  minSilenceGapMs: z.coerce.number().optional(),
  maxSegmentDurationMs: z.coerce.number().optional(),
  splitOnSpeakerChange: envBoolean.optional(),
  minSimilarity: z.coerce.number().optional(),
  hallucinationSimilarityFloor: z.coerce.number().optional(),
  hallucinationPositionRatio: z.coerce.number().optional(),
  suspiciousPositionRatio: z.coerce.number().optional(),
  searchDistanceMultiplier: z.coerce.number().optional(),
  minSearchDistance: z.coerce.number().optional(),
  windowMinRatio: z.coerce.number().optional(),
  windowMaxRatio: z.coerce.number().optional(),
  fallbackCursorStep: z.coerce.number().optional(),
  maxWindowEvaluations: z.coerce.number().optional(),
  extractionPaddingMs: z.coerce.number().optional(),
});

const TranscriptionEnvSchema = z.object({
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().default(TRANSCRIPTION_MODEL),
  language: z.string().optional(),
  timeoutMs: z.coerce
    .number()
    .int()
    .positive()
    .default(TRANSCRIPTION_TIMEOUT_MS),
  breakAfterConsecutiveFailures: z.coerce
    .number()
    .int()
    .positive()
    .default(TRANSCRIPTION_BREAK_AFTER_CONSECUTIVE_FAILURES),
  breakDurationMs: z.coerce
    .number()
    .int()
    .positive()
    .default(TRANSCRIPTION_BREAK_DURATION),
  rateMinTimeMs: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(TRANSCRIPTION_RATE_MIN_TIME),
});

const BatchEnvSchema = z.object({
  maxConcurrentFiles: z.coerce
    .number()
    .int()
    .positive()
    .default(BATCH_MAX_CONCURRENT_FILES),
});

const readEnv = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

const readSection = (
  env: NodeJS.ProcessEnv,
  keys: Record<string, string>,
): Record<string, string | undefined> =>
  Object.fromEntries(
    Object.entries(keys).map(([field, name]) => [field, readEnv(env, name)]),
  );

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const alignmentEnv = AlignmentEnvSchema.parse(
    readSection(env, CONFIG_KEYS.alignment),
  );
  return {
    alignment: resolveAlignmentConfig(alignmentEnv),
    transcription: TranscriptionEnvSchema.parse(
      readSection(env, CONFIG_KEYS.transcription),
    ),
    batch: BatchEnvSchema.parse(readSection(env, CONFIG_KEYS.batch)),
  };
}

let cachedConfig: AppConfig | null = null;

export const getConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
};
