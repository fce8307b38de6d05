import {
  MAX_WINDOW_EVALUATIONS,
  MIN_SEARCH_DISTANCE,
  MIN_SIMILARITY_THRESHOLD,
  SEARCH_DISTANCE_MULTIPLIER,
  WINDOW_MAX_RATIO,
  WINDOW_MIN_RATIO,
} from "../constants";
import type { AlignmentConfig, MatchResult } from "../types/alignment";
import { similarityRatio } from "./sequenceSimilarity";
import {
  mapToOriginalPosition,
  normalizeText,
  normalizeWithIndexMap,
} from "./textNormalizer";

export type FuzzySearchTuning = Pick<
  AlignmentConfig,
  | "searchDistanceMultiplier"
  | "minSearchDistance"
  | "windowMinRatio"
  | "windowMaxRatio"
  | "maxWindowEvaluations"
>;

export type FuzzySearchOptions = {
  minSimilarity?: number;
  maxSearchDistance?: number;
  tuning?: Partial<FuzzySearchTuning>;
};

type WindowCandidate = {
  start: number;
  end: number;
  similarity: number;
};

const DEFAULT_TUNING: FuzzySearchTuning = {
  searchDistanceMultiplier: SEARCH_DISTANCE_MULTIPLIER,
  minSearchDistance: MIN_SEARCH_DISTANCE,
  windowMinRatio: WINDOW_MIN_RATIO,
  windowMaxRatio: WINDOW_MAX_RATIO,
  maxWindowEvaluations: MAX_WINDOW_EVALUATIONS,
};

/** How far ahead a needle of this normalized length may claim text. */
export const resolveSearchDistance = (
  needleLength: number,
  tuning: Pick<
    FuzzySearchTuning,
    "searchDistanceMultiplier" | "minSearchDistance"
  >,
): number =>
  Math.max(
    needleLength * tuning.searchDistanceMultiplier,
    tuning.minSearchDistance,
  );

const findBestWindow = (
  needle: string,
  searchText: string,
  tuning: FuzzySearchTuning,
): WindowCandidate | undefined => {
  const minWindow = Math.max(
    1,
    Math.floor(needle.length * tuning.windowMinRatio),
  );
  const maxWindow = Math.min(
    searchText.length,
    Math.ceil(needle.length * tuning.windowMaxRatio),
  );

  let best: WindowCandidate | undefined;
  let evaluations = 0;

  for (let windowSize = minWindow; windowSize <= maxWindow; windowSize += 1) {
    for (let start = 0; start + windowSize <= searchText.length; start += 1) {
      if (evaluations >= tuning.maxWindowEvaluations) {
        return best;
      }
      evaluations += 1;
      const similarity = similarityRatio(
        needle,
        searchText.slice(start, start + windowSize),
      );
      // Strictly greater: ties keep the earliest, smallest window.
      if (similarity > (best?.similarity ?? 0)) {
        best = { start, end: start + windowSize, similarity };
      }
    }
  }

  return best;
};

/**
 * Find the window of `haystack` that best matches `needle`, looking no
 * further than `maxSearchDistance` characters in. Positions in the result
 * are offsets into `haystack`.
 */
export function fuzzySubstringSearch(
  haystack: string,
  needle: string,
  options: FuzzySearchOptions = {},
): MatchResult | undefined {
  const tuning: FuzzySearchTuning = { ...DEFAULT_TUNING, ...options.tuning };
  const minSimilarity = options.minSimilarity ?? MIN_SIMILARITY_THRESHOLD;

  const normalizedNeedle = normalizeText(needle);
  if (!normalizedNeedle) return undefined;

  const maxSearchDistance =
    options.maxSearchDistance ??
    resolveSearchDistance(normalizedNeedle.length, tuning);

  const searchText = haystack.slice(0, Math.max(0, maxSearchDistance));
  const searchSource = normalizeWithIndexMap(searchText);
  if (!searchSource.normalized) return undefined;

  const best = findBestWindow(
    normalizedNeedle,
    searchSource.normalized,
    tuning,
  );
  if (!best || best.similarity < minSimilarity) return undefined;

  const startPos = mapToOriginalPosition(
    searchSource,
    best.start,
    searchText.length,
  );
  const endPos = mapToOriginalPosition(
    searchSource,
    best.end,
    searchText.length,
  );

  return {
    text: searchText.slice(startPos, endPos),
    startPos,
    endPos,
    similarity: best.similarity,
  };
}
