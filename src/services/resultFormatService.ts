import path from "node:path";
import type { AlignmentRecord } from "../types/alignment";
import type { CascadedTranscriptionResult } from "./cascadedTranscriptionService";

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(60);

export const formatRecordLine = (record: AlignmentRecord): string => {
  const line = `Speaker ${record.speaker}: ${record.text.trim()}`;
  return record.mergedCount > 1
    ? `${line} [merged ${record.mergedCount}]`
    : line;
};

/** Plain-text transcript: one line per record that still carries text. */
export function formatCascadedResult(
  records: AlignmentRecord[],
  audioPath: string,
): string {
  const lines = [
    `Audio file: ${path.basename(audioPath)}`,
    RULE,
    "Speaker-attributed transcript:",
    THIN_RULE,
  ];

  const withText = records.filter((record) => record.text.trim());
  if (withText.length === 0) {
    lines.push("No usable text detected.");
  } else {
    lines.push(...withText.map(formatRecordLine));
  }

  lines.push("", RULE);
  return `${lines.join("\n")}\n`;
}

export const formatCascadedResultJson = (
  result: CascadedTranscriptionResult,
): string =>
  `${JSON.stringify(
    {
      audioFile: path.basename(result.audioPath),
      segmentCount: result.segmentCount,
      sourceStats: result.sourceStats,
      timings: result.timings,
      records: result.records,
    },
    null,
    2,
  )}\n`;
