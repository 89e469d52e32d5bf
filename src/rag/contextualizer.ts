import type { ChatCompleter } from "../llm/chatCompleter";
import type { ChatTurn } from "../types/chatSessionTypes";
import { CONTEXTUALIZE_PROMPT } from "./prompts";

/**
 * Rewrites a follow-up into a question that stands on its own, for retrieval
 * only. With no history there is nothing to resolve, so no model call.
 */
export class QueryContextualizer {
  constructor(private completer: ChatCompleter) {}

  async contextualize(
    question: string,
    transcript: readonly ChatTurn[]
  ): Promise<string> {
    if (transcript.length === 0) return question;

    const rewritten = await this.completer.complete({
      system: CONTEXTUALIZE_PROMPT,
      history: transcript,
      message: question,
    });

    return rewritten.trim() || question;
  }
}
