import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { SENTENCES_SIDECAR_SUFFIX } from "../constants";
import type { Sentence } from "../types/alignment";
import { DiarizationError, describeError } from "./alignmentErrors";

export type Diarizer = (audioPath: string) => Promise<Sentence[]>;

const SpeakerLabelSchema = z.union([z.string(), z.number()]);

const DiarizedSentenceSchema = z.object({
  start: z.number().nonnegative(),
  end: z.number().nonnegative(),
  text: z.string().default(""),
  spk: SpeakerLabelSchema.optional(),
  speaker: SpeakerLabelSchema.optional(),
});

const DiarizationFileSchema = z.union([
  z.array(DiarizedSentenceSchema),
  z.object({ sentence_info: z.array(DiarizedSentenceSchema) }),
]);

type DiarizedSentence = z.infer<typeof DiarizedSentenceSchema>;

const UNKNOWN_SPEAKER = "unknown";

const toSentence = (entry: DiarizedSentence): Sentence => ({
  start: entry.start,
  end: entry.end,
  text: entry.text,
  speaker: String(entry.speaker ?? entry.spk ?? UNKNOWN_SPEAKER),
});

/** Validate diarization output and order it by start time. */
export function parseDiarizedSentences(raw: unknown): Sentence[] {
  const parsed = DiarizationFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DiarizationError(
      `Invalid diarization output: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
        .join("; ")}`,
    );
  }
  const entries = Array.isArray(parsed.data)
    ? parsed.data
    : parsed.data.sentence_info;
  return entries
    .map(toSentence)
    .map((sentence, index) => ({ sentence, index }))
    .sort((a, b) => a.sentence.start - b.sentence.start || a.index - b.index)
    .map(({ sentence }) => sentence);
}

export const resolveSentencesPath = (audioPath: string): string => {
  const parsed = path.parse(audioPath);
  return path.join(parsed.dir, `${parsed.name}${SENTENCES_SIDECAR_SUFFIX}`);
};

type SidecarDependencies = {
  readFile: (filePath: string) => Promise<string>;
};

/**
 * Diarizer backed by the diarization engine's JSON output saved beside
 * the audio file (or at an explicit path).
 */
export function createSidecarDiarizer(
  options: { sentencesPath?: string } = {},
  dependencyOverrides: Partial<SidecarDependencies> = {},
): Diarizer {
  const dependencies: SidecarDependencies = {
    readFile: async (filePath) => await fs.readFile(filePath, "utf8"),
    ...dependencyOverrides,
  };

  return async (audioPath) => {
    const sentencesPath =
      options.sentencesPath ?? resolveSentencesPath(audioPath);
    let raw: unknown;
    try {
      raw = JSON.parse(await dependencies.readFile(sentencesPath));
    } catch (error) {
      throw new DiarizationError(
        `Failed to read diarization output ${sentencesPath}: ${describeError(error)}`,
        audioPath,
      );
    }
    return parseDiarizedSentences(raw);
  };
}
