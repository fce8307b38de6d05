import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import ffmpeg from "fluent-ffmpeg";
import { EXTRACTION_PADDING_MS, EXTRACTION_SAMPLE_RATE } from "../constants";
import type { ExtractedAudio } from "../types/alignment";
import { AudioExtractionError, describeError } from "./alignmentErrors";

export type AudioExtractor = (
  audioPath: string,
  startMs: number,
  endMs: number,
) => Promise<ExtractedAudio>;

type RenderPcmInput = {
  inputPath: string;
  outputPath: string;
  startSeconds: number;
  durationSeconds: number;
  sampleRate: number;
};

type ExtractionDependencies = {
  makeTempDir: () => Promise<string>;
  renderPcm: (input: RenderPcmInput) => Promise<void>;
  readFile: (filePath: string) => Promise<Buffer>;
  removeTempDir: (dirPath: string) => Promise<void>;
};

export type AudioExtractorOptions = {
  paddingMs?: number;
  sampleRate?: number;
};

const BYTES_PER_FLOAT_SAMPLE = 4;

export const resolveExtractionWindow = (
  startMs: number,
  endMs: number,
  paddingMs: number,
) => ({
  startMs: Math.max(0, startMs - paddingMs),
  endMs: endMs + paddingMs,
});

export const decodeFloat32Pcm = (buffer: Buffer): Float32Array => {
  const sampleCount = Math.floor(buffer.length / BYTES_PER_FLOAT_SAMPLE);
  const samples = new Float32Array(sampleCount);
  for (let index = 0; index < sampleCount; index += 1) {
    samples[index] = buffer.readFloatLE(index * BYTES_PER_FLOAT_SAMPLE);
  }
  return samples;
};

const renderPcm = async (input: RenderPcmInput) =>
  await new Promise<void>((resolve, reject) => {
    ffmpeg(input.inputPath)
      .setStartTime(input.startSeconds)
      .setDuration(input.durationSeconds)
      .noVideo()
      .audioChannels(1)
      .audioFrequency(input.sampleRate)
      .audioCodec("pcm_f32le")
      .toFormat("f32le")
      .on("end", () => {
        resolve();
      })
      .on("error", (error) => {
        reject(error);
      })
      .save(input.outputPath);
  });

const defaultDependencies: ExtractionDependencies = {
  makeTempDir: async () =>
    await fs.mkdtemp(path.join(os.tmpdir(), "cascaded-align-")),
  renderPcm,
  readFile: async (filePath) => await fs.readFile(filePath),
  removeTempDir: async (dirPath) => {
    await fs.rm(dirPath, { recursive: true, force: true });
  },
};

/**
 * Slice `[startMs, endMs]` (plus padding) out of an audio file as mono
 * float samples.
 */
export function createAudioExtractor(
  options: AudioExtractorOptions = {},
  dependencyOverrides: Partial<ExtractionDependencies> = {},
): AudioExtractor {
  const dependencies: ExtractionDependencies = {
    ...defaultDependencies,
    ...dependencyOverrides,
  };
  const paddingMs = options.paddingMs ?? EXTRACTION_PADDING_MS;
  const sampleRate = options.sampleRate ?? EXTRACTION_SAMPLE_RATE;

  return async (audioPath, startMs, endMs) => {
    const window = resolveExtractionWindow(startMs, endMs, paddingMs);
    const durationMs = window.endMs - window.startMs;
    if (durationMs <= 0) {
      throw new AudioExtractionError(
        `Empty extraction window (${startMs}ms -> ${endMs}ms)`,
        startMs,
        endMs,
      );
    }

    const tempDir = await dependencies.makeTempDir();
    const outputPath = path.join(tempDir, "segment.f32le");
    try {
      await dependencies.renderPcm({
        inputPath: audioPath,
        outputPath,
        startSeconds: window.startMs / 1000,
        durationSeconds: durationMs / 1000,
        sampleRate,
      });
      const samples = decodeFloat32Pcm(await dependencies.readFile(outputPath));
      return { samples, sampleRate };
    } catch (error) {
      throw new AudioExtractionError(
        `Failed to extract audio segment: ${describeError(error)}`,
        startMs,
        endMs,
      );
    } finally {
      await dependencies.removeTempDir(tempDir);
    }
  };
}
