import path from "node:path";
import { describe, expect, jest, test } from "@jest/globals";
import { HighFidelityTranscriptionError } from "../../src/services/alignmentErrors";
import {
  createWavEncoder,
  toPcmBuffer,
} from "../../src/services/wavConversionService";

const TEMP_DIR = "/tmp/cascaded-align-wav-test";
const WAV_BYTES = Buffer.from("RIFF-test-wav");

const buildDependencies = () => ({
  makeTempDir: jest.fn(async () => TEMP_DIR),
  writeFile: jest.fn(async (_filePath: string, _contents: Buffer) => undefined),
  convertPcmToWav: jest.fn(
    async (_input: { pcmPath: string; wavPath: string; sampleRate: number }) =>
      undefined,
  ),
  readFile: jest.fn(async (_filePath: string) => WAV_BYTES),
  removeTempDir: jest.fn(async (_dirPath: string) => undefined),
});

describe("toPcmBuffer", () => {
  test("exposes the samples as little-endian float bytes", () => {
    const buffer = toPcmBuffer(new Float32Array([0.5, -0.25]));
    expect(buffer.length).toBe(8);
    expect(buffer.readFloatLE(0)).toBe(0.5);
    expect(buffer.readFloatLE(4)).toBe(-0.25);
  });
});

describe("createWavEncoder", () => {
  test("converts the samples with ffmpeg and returns the WAV bytes", async () => {
    const dependencies = buildDependencies();
    const encodeWav = createWavEncoder(dependencies);

    await expect(
      encodeWav(new Float32Array([0.5, -0.25]), 16000),
    ).resolves.toBe(WAV_BYTES);

    const pcmPath = path.join(TEMP_DIR, "segment.f32le");
    const wavPath = path.join(TEMP_DIR, "segment.wav");
    const [writtenPath, writtenBytes] = dependencies.writeFile.mock.calls[0];
    expect(writtenPath).toBe(pcmPath);
    expect(writtenBytes.readFloatLE(4)).toBe(-0.25);
    expect(dependencies.convertPcmToWav).toHaveBeenCalledWith({
      pcmPath,
      wavPath,
      sampleRate: 16000,
    });
    expect(dependencies.readFile).toHaveBeenCalledWith(wavPath);
    expect(dependencies.removeTempDir).toHaveBeenCalledWith(TEMP_DIR);
  });

  test("wraps conversion failures and still removes the temp dir", async () => {
    const dependencies = buildDependencies();
    dependencies.convertPcmToWav.mockRejectedValue(new Error("ffmpeg exited"));
    const encodeWav = createWavEncoder(dependencies);

    await expect(encodeWav(new Float32Array([0.1]), 16000)).rejects.toThrow(
      HighFidelityTranscriptionError,
    );
    expect(dependencies.readFile).not.toHaveBeenCalled();
    expect(dependencies.removeTempDir).toHaveBeenCalledWith(TEMP_DIR);
  });
});
