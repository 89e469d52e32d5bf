import type { RagConfig } from "../config";
import type { RetrievalResult, RelevanceVerdict } from "../types/ragTypes";

export type RelevanceGateConfig = Pick<
  RagConfig,
  | "similarityThreshold"
  | "minRelevantDocs"
  | "minContextLength"
  | "requireSimilarityScores"
>;

const fmt = (n: number) => n.toFixed(2);

/**
 * Decides whether retrieved chunks are good enough to ground an answer.
 * Checks run cheapest first and stop at the first failure:
 *   1. anything retrieved at all
 *   2. mean similarity of the scored chunks
 *   3. number of chunks at or above the threshold
 *   4. trimmed length of the assembled context
 * The mean is taken over every retrieved chunk once any of them is scored.
 * Without `requireSimilarityScores`, a chunk lacking a score adds nothing to
 * the sum and counts as relevant; with it, a missing score counts as 0.
 */
export function isRelevant(
  result: RetrievalResult,
  contextText: string,
  config: RelevanceGateConfig
): RelevanceVerdict {
  const {
    similarityThreshold,
    minRelevantDocs,
    minContextLength,
    requireSimilarityScores,
  } = config;

  if (!result || result.length === 0) {
    return { accepted: false, reason: "no documents retrieved" };
  }

  const scores = result.map((chunk) =>
    chunk.score === undefined && requireSimilarityScores ? 0 : chunk.score
  );
  const scored = scores.filter((s): s is number => s !== undefined);

  let meanScore: number | null = null;
  if (scored.length > 0) {
    meanScore = scored.reduce((sum, s) => sum + s, 0) / result.length;
    if (meanScore < similarityThreshold) {
      return {
        accepted: false,
        reason: `low relevance score (mean ${fmt(meanScore)} < ${similarityThreshold})`,
      };
    }
  }

  const relevantDocs = scores.filter(
    (s) => s === undefined || s >= similarityThreshold
  ).length;
  if (relevantDocs < minRelevantDocs) {
    return {
      accepted: false,
      reason: `too few relevant documents (${relevantDocs} < ${minRelevantDocs})`,
    };
  }

  const contextLength = contextText.trim().length;
  if (contextLength < minContextLength) {
    return {
      accepted: false,
      reason: `insufficient context length (${contextLength} < ${minContextLength} chars)`,
    };
  }

  const scoreText = meanScore === null ? "N/A" : fmt(meanScore);
  return {
    accepted: true,
    reason: `relevant (mean score ${scoreText}, relevant docs ${relevantDocs}, context length ${contextLength})`,
  };
}

/** Chunk texts joined by a blank line. */
export const assembleContext = (result: RetrievalResult) =>
  result.map((chunk) => chunk.text).join("\n\n");
