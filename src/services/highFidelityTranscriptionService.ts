import OpenAI, { toFile } from "openai";
import {
  circuitBreaker,
  ConsecutiveBreaker,
  handleAll,
  timeout,
  TimeoutStrategy,
  wrap,
} from "cockatiel";
import Bottleneck from "bottleneck";
import {
  describeError,
  HighFidelityTranscriptionError,
} from "./alignmentErrors";
import type { TranscriptionConfig } from "./configService";
import { createWavEncoder, type WavEncoder } from "./wavConversionService";

export type HighFidelityTranscriber = (
  samples: Float32Array,
  sampleRate: number,
) => Promise<string>;

type TranscriptionRequest = {
  file: Buffer;
  fileName: string;
  model: string;
  language?: string;
  signal: AbortSignal;
};

type TranscriptionDependencies = {
  encodeWav: WavEncoder;
  requestTranscription: (request: TranscriptionRequest) => Promise<string>;
};

const createOpenAIClient = (config: TranscriptionConfig): OpenAI => {
  if (!config.apiKey) {
    throw new HighFidelityTranscriptionError(
      "OPENAI_API_KEY is required for high-fidelity transcription.",
    );
  }
  return new OpenAI({
    apiKey: config.apiKey,
    ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
  });
};

const createDefaultDependencies = (
  config: TranscriptionConfig,
): TranscriptionDependencies => {
  let client: OpenAI | null = null;
  return {
    encodeWav: createWavEncoder(),
    requestTranscription: async (request) => {
      if (!client) {
        client = createOpenAIClient(config);
      }
      const result = await client.audio.transcriptions.create(
        {
          file: await toFile(request.file, request.fileName, {
            type: "audio/wav",
          }),
          model: request.model,
          temperature: 0,
          response_format: "json",
          ...(request.language ? { language: request.language } : {}),
        },
        { signal: request.signal },
      );
      return result.text ?? "";
    },
  };
};

/**
 * Build the high-fidelity engine call. Calls are spaced by a rate limiter,
 * bounded by a timeout, and short-circuited while the engine keeps failing.
 * Failures are never retried; the caller degrades the segment instead.
 */
export function createHighFidelityTranscriber(
  config: TranscriptionConfig,
  dependencyOverrides: Partial<TranscriptionDependencies> = {},
): HighFidelityTranscriber {
  const dependencies: TranscriptionDependencies = {
    ...createDefaultDependencies(config),
    ...dependencyOverrides,
  };

  const timeoutPolicy = timeout(config.timeoutMs, TimeoutStrategy.Aggressive);
  const breakerPolicy = circuitBreaker(handleAll, {
    halfOpenAfter: config.breakDurationMs,
    breaker: new ConsecutiveBreaker(config.breakAfterConsecutiveFailures),
  });
  const policies = wrap(breakerPolicy, timeoutPolicy);
  const limiter = new Bottleneck({ minTime: config.rateMinTimeMs });

  return async (samples, sampleRate) => {
    if (samples.length === 0) {
      return "";
    }
    // Encoding failures stay outside the circuit breaker.
    const file = await dependencies.encodeWav(samples, sampleRate);
    try {
      return await policies.execute(({ signal }) =>
        limiter.schedule(() =>
          dependencies.requestTranscription({
            file,
            fileName: "segment.wav",
            model: config.model,
            language: config.language,
            signal,
          }),
        ),
      );
    } catch (error) {
      throw new HighFidelityTranscriptionError(
        `High-fidelity transcription failed: ${describeError(error)}`,
      );
    }
  };
}
