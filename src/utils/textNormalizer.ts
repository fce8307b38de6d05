import type { NormalizedText } from "../types/alignment";

// CJK and Latin punctuation plus any whitespace; these never take part in
// comparisons between the two transcripts.
const IGNORED_CHARACTER = /[，。！？、：；“”‘’（）【】《》…—\s,.!?;:'"()[\]{}]/;

export const isIgnoredCharacter = (char: string): boolean =>
  IGNORED_CHARACTER.test(char);

/**
 * Strip ignored characters and lower-case the rest, remembering where each
 * retained character came from in the original string.
 */
export function normalizeWithIndexMap(value: string): NormalizedText {
  let normalized = "";
  const indexMap: number[] = [];

  for (let index = 0; index < value.length; index += 1) {
    const char = value[index];
    if (isIgnoredCharacter(char)) continue;
    const lowered = char.toLowerCase();
    normalized += lowered;
    // Some characters lower-case into more than one code unit.
    for (let unit = 0; unit < lowered.length; unit += 1) {
      indexMap.push(index);
    }
  }

  return { normalized, indexMap };
}

export const normalizeText = (value: string): string =>
  normalizeWithIndexMap(value).normalized;

export const normalizedLength = (value: string): number =>
  normalizeText(value).length;

/**
 * Map a position in normalized text back to an offset in the original.
 * Positions at or past the end map to the original string's length.
 */
export const mapToOriginalPosition = (
  source: NormalizedText,
  normalizedPos: number,
  originalLength: number,
): number =>
  normalizedPos < source.indexMap.length
    ? source.indexMap[normalizedPos]
    : originalLength;
