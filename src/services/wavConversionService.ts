import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import ffmpeg from "fluent-ffmpeg";
import {
  describeError,
  HighFidelityTranscriptionError,
} from "./alignmentErrors";

export type WavEncoder = (
  samples: Float32Array,
  sampleRate: number,
) => Promise<Buffer>;

type ConvertPcmInput = {
  pcmPath: string;
  wavPath: string;
  sampleRate: number;
};

type WavConversionDependencies = {
  makeTempDir: () => Promise<string>;
  writeFile: (filePath: string, contents: Buffer) => Promise<void>;
  convertPcmToWav: (input: ConvertPcmInput) => Promise<void>;
  readFile: (filePath: string) => Promise<Buffer>;
  removeTempDir: (dirPath: string) => Promise<void>;
};

/** Raw f32le bytes of the samples, without copying. */
export const toPcmBuffer = (samples: Float32Array): Buffer =>
  Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength);

const convertPcmToWav = async (input: ConvertPcmInput) =>
  await new Promise<void>((resolve, reject) => {
    ffmpeg(input.pcmPath)
      .inputOptions([`-f f32le`, `-ar ${input.sampleRate}`, `-ac 1`])
      .outputOptions([`-f wav`, `-c:a pcm_s16le`])
      .on("end", () => {
        resolve();
      })
      .on("error", (error) => {
        console.error("Error converting PCM to WAV.", {
          error: error.message,
        });
        reject(error);
      })
      .save(input.wavPath);
  });

const defaultDependencies: WavConversionDependencies = {
  makeTempDir: async () =>
    await fs.mkdtemp(path.join(os.tmpdir(), "cascaded-align-wav-")),
  writeFile: async (filePath, contents) => {
    await fs.writeFile(filePath, contents);
  },
  convertPcmToWav,
  readFile: async (filePath) => await fs.readFile(filePath),
  removeTempDir: async (dirPath) => {
    await fs.rm(dirPath, { recursive: true, force: true });
  },
};

/**
 * Mono float samples to a 16-bit PCM WAV file, converted by ffmpeg through
 * a temp directory that is removed afterwards.
 */
export function createWavEncoder(
  dependencyOverrides: Partial<WavConversionDependencies> = {},
): WavEncoder {
  const dependencies: WavConversionDependencies = {
    ...defaultDependencies,
    ...dependencyOverrides,
  };

  return async (samples, sampleRate) => {
    const tempDir = await dependencies.makeTempDir();
    const pcmPath = path.join(tempDir, "segment.f32le");
    const wavPath = path.join(tempDir, "segment.wav");
    try {
      await dependencies.writeFile(pcmPath, toPcmBuffer(samples));
      await dependencies.convertPcmToWav({ pcmPath, wavPath, sampleRate });
      return await dependencies.readFile(wavPath);
    } catch (error) {
      throw new HighFidelityTranscriptionError(
        `Failed to encode segment audio as WAV: ${describeError(error)}`,
      );
    } finally {
      await dependencies.removeTempDir(tempDir);
    }
  };
}
