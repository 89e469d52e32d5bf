import type { ChatTurn } from "../types/chatSessionTypes";

export function estimateTokens(text: string) {
  // ~4 characters per token, good enough for budgeting prompts
  return Math.ceil(text.length / 4);
}

/** Newest turns that fit in `maxTokens`, oldest first. */
export function truncateToTokenLimit<T extends ChatTurn>(
  turns: readonly T[],
  maxTokens: number
): T[] {
  let total = 0;
  const out: T[] = [];
  for (let i = turns.length - 1; i >= 0; i--) {
    const turn = turns[i];
    const t = estimateTokens(turn.content);
    if (total + t > maxTokens) break;
    out.unshift(turn);
    total += t;
  }
  return out;
}
