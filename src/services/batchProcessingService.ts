import { promises as fs } from "node:fs";
import path from "node:path";
import Bottleneck from "bottleneck";
import {
  AUDIO_FILE_EXTENSIONS,
  BATCH_MAX_CONCURRENT_FILES,
  TRANSCRIPTION_OUTPUT_SUFFIX,
} from "../constants";
import { describeError } from "./alignmentErrors";
import type { CascadedTranscriptionResult } from "./cascadedTranscriptionService";
import {
  formatCascadedResult,
  formatCascadedResultJson,
} from "./resultFormatService";

export type OutputFormat = "text" | "json";

export type BatchFileResult =
  | {
      audioPath: string;
      status: "completed";
      outputPath: string;
      recordCount: number;
    }
  | {
      audioPath: string;
      status: "failed";
      error: string;
    };

type BatchDependencies = {
  listDirectory: (directory: string) => Promise<string[]>;
  writeFile: (filePath: string, contents: string) => Promise<void>;
  processFile: (audioPath: string) => Promise<CascadedTranscriptionResult>;
};

export type BatchOptions = {
  maxConcurrentFiles?: number;
  format?: OutputFormat;
};

export const isAudioFile = (fileName: string): boolean =>
  AUDIO_FILE_EXTENSIONS.includes(path.extname(fileName).toLowerCase());

export const resolveOutputPath = (
  audioPath: string,
  format: OutputFormat,
): string => {
  const parsed = path.parse(audioPath);
  const suffix =
    format === "json"
      ? TRANSCRIPTION_OUTPUT_SUFFIX.replace(/\.txt$/, ".json")
      : TRANSCRIPTION_OUTPUT_SUFFIX;
  return path.join(parsed.dir, `${parsed.name}${suffix}`);
};

export const renderResult = (
  result: CascadedTranscriptionResult,
  format: OutputFormat,
): string =>
  format === "json"
    ? formatCascadedResultJson(result)
    : formatCascadedResult(result.records, result.audioPath);

const processOne = async (
  audioPath: string,
  format: OutputFormat,
  dependencies: BatchDependencies,
): Promise<BatchFileResult> => {
  try {
    const result = await dependencies.processFile(audioPath);
    const outputPath = resolveOutputPath(audioPath, format);
    await dependencies.writeFile(outputPath, renderResult(result, format));
    console.log("Transcript written.", { audioPath, outputPath });
    return {
      audioPath,
      status: "completed",
      outputPath,
      recordCount: result.records.length,
    };
  } catch (error) {
    console.error("Failed to process audio file.", { audioPath, error });
    return { audioPath, status: "failed", error: describeError(error) };
  }
};

/**
 * Align every audio file in a directory. Files are independent: each runs
 * its own pipeline, and one failing file does not stop the rest.
 */
export async function processDirectory(
  directory: string,
  options: BatchOptions,
  dependencyOverrides: Partial<BatchDependencies> &
    Pick<BatchDependencies, "processFile">,
): Promise<BatchFileResult[]> {
  const dependencies: BatchDependencies = {
    listDirectory: async (dir) => await fs.readdir(dir),
    writeFile: async (filePath, contents) => {
      await fs.writeFile(filePath, contents, "utf8");
    },
    ...dependencyOverrides,
  };
  const format = options.format ?? "text";

  const audioFiles = (await dependencies.listDirectory(directory))
    .filter(isAudioFile)
    .sort()
    .map((fileName) => path.join(directory, fileName));

  if (audioFiles.length === 0) {
    console.warn("No audio files found.", { directory });
    return [];
  }

  const limiter = new Bottleneck({
    maxConcurrent: options.maxConcurrentFiles ?? BATCH_MAX_CONCURRENT_FILES,
  });
  return await Promise.all(
    audioFiles.map((audioPath) =>
      limiter.schedule(() => processOne(audioPath, format, dependencies)),
    ),
  );
}
