import { describe, expect, it } from "vitest";
import type { ChatTurn } from "../../src/types/chatSessionTypes";
import { estimateTokens, truncateToTokenLimit } from "../../src/utils/token";

describe("token budget", () => {
  it("estimates about four characters per token", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });

  it("keeps the newest turns that fit, oldest first", () => {
    const turns: ChatTurn[] = [
      { role: "user", content: "a".repeat(40) },
      { role: "assistant", content: "b".repeat(20) },
      { role: "user", content: "c".repeat(20) },
    ];

    expect(truncateToTokenLimit(turns, 10)).toEqual(turns.slice(1));
    expect(truncateToTokenLimit(turns, 4)).toEqual([]);
    expect(truncateToTokenLimit(turns, 100)).toEqual(turns);
  });
});
