#!/usr/bin/env node
import "dotenv/config";
import { promises as fs } from "node:fs";
import yargs from "yargs/yargs";
import { hideBin } from "yargs/helpers";
import type { AlignmentConfig } from "./types/alignment";
import { createConsoleAlignmentObserver } from "./services/alignmentEvents";
import {
  type OutputFormat,
  processDirectory,
  renderResult,
} from "./services/batchProcessingService";
import { processAudioCascaded } from "./services/cascadedTranscriptionService";
import {
  type AlignmentConfigOverrides,
  getConfig,
} from "./services/configService";
import { createSidecarDiarizer } from "./services/diarizationService";
import { createHighFidelityTranscriber } from "./services/highFidelityTranscriptionService";

type AlignmentFlags = {
  speakerAnchors: boolean;
  minSimilarity?: number;
  minSilenceGapMs?: number;
  maxSegmentDurationMs?: number;
};

export const buildAlignmentOverrides = (
  base: AlignmentConfig,
  flags: AlignmentFlags,
): AlignmentConfigOverrides => ({
  ...base,
  splitOnSpeakerChange: flags.speakerAnchors,
  ...(flags.minSimilarity !== undefined
    ? { minSimilarity: flags.minSimilarity }
    : {}),
  ...(flags.minSilenceGapMs !== undefined
    ? { minSilenceGapMs: flags.minSilenceGapMs }
    : {}),
  ...(flags.maxSegmentDurationMs !== undefined
    ? { maxSegmentDurationMs: flags.maxSegmentDurationMs }
    : {}),
});

const resolveFormat = (json: boolean): OutputFormat => (json ? "json" : "text");

export async function main(rawArgs = hideBin(process.argv)) {
  const config = getConfig();
  const transcribe = createHighFidelityTranscriber(config.transcription);

  const parser = yargs(rawArgs)
    .scriptName("cascaded-align")
    .option("speaker-anchors", {
      type: "boolean",
      default: config.alignment.splitOnSpeakerChange,
      describe: "Start a new alignment segment at every speaker change",
    })
    .option("min-similarity", {
      type: "number",
      describe: "Weakest fuzzy match accepted (0-1)",
    })
    .option("min-silence-gap-ms", {
      type: "number",
      describe: "Silence that forces a new alignment segment",
    })
    .option("max-segment-duration-ms", {
      type: "number",
      describe: "Longest alignment segment before a forced split",
    })
    .option("json", {
      type: "boolean",
      default: false,
      describe: "Write records and source statistics as JSON",
    })
    .option("verbose", {
      type: "boolean",
      default: false,
      describe: "Log every segment and speaker group",
    })
    .command(
      "align <audio>",
      "Align one audio file's diarized and high-fidelity transcripts",
      (command) =>
        command
          .positional("audio", {
            type: "string",
            demandOption: true,
            describe: "Audio file to transcribe",
          })
          .option("sentences", {
            type: "string",
            describe: "Diarized sentences JSON (defaults to <audio>.sentences.json)",
          })
          .option("output", {
            type: "string",
            describe: "Write the transcript here instead of stdout",
          }),
      async (argv) => {
        const result = await processAudioCascaded(
          argv.audio,
          {
            alignment: buildAlignmentOverrides(config.alignment, argv),
            observer: createConsoleAlignmentObserver({ verbose: argv.verbose }),
          },
          {
            diarize: createSidecarDiarizer({ sentencesPath: argv.sentences }),
            transcribe,
          },
        );
        const rendered = renderResult(result, resolveFormat(argv.json));
        if (argv.output) {
          await fs.writeFile(argv.output, rendered, "utf8");
          console.log("Transcript written.", { outputPath: argv.output });
          return;
        }
        process.stdout.write(rendered);
      },
    )
    .command(
      "batch <directory>",
      "Align every audio file in a directory",
      (command) =>
        command
          .positional("directory", {
            type: "string",
            demandOption: true,
            describe: "Directory holding audio files and their sentence JSON",
          })
          .option("concurrency", {
            type: "number",
            describe: "Files processed at the same time",
          }),
      async (argv) => {
        const alignment = buildAlignmentOverrides(config.alignment, argv);
        const observer = createConsoleAlignmentObserver({
          verbose: argv.verbose,
        });
        const results = await processDirectory(
          argv.directory,
          {
            maxConcurrentFiles:
              argv.concurrency ?? config.batch.maxConcurrentFiles,
            format: resolveFormat(argv.json),
          },
          {
            processFile: async (audioPath) =>
              await processAudioCascaded(
                audioPath,
                { alignment, observer },
                { transcribe },
              ),
          },
        );
        const failed = results.filter((result) => result.status === "failed");
        console.log("Batch complete.", {
          files: results.length,
          failed: failed.length,
        });
        if (failed.length > 0) {
          process.exitCode = 1;
        }
      },
    )
    .demandCommand(1)
    .strict()
    .help();

  await parser.parseAsync();
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Cascaded alignment failed.", error);
    process.exit(1);
  });
}
