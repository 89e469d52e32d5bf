import type { ChatCompleter } from "../llm/chatCompleter";
import type { ChatTurn } from "../types/chatSessionTypes";
import { contextBlock, FALLBACK_PROMPT, GROUNDED_PROMPT } from "./prompts";

const NO_ANSWER = "Sorry, couldn't generate a response.";

/** Answers from retrieved document context plus general knowledge. */
export class GroundedAnswerGenerator {
  constructor(private completer: ChatCompleter) {}

  async generate(
    question: string,
    transcript: readonly ChatTurn[],
    contextText: string
  ) {
    const reply = await this.completer.complete({
      system: GROUNDED_PROMPT,
      history: transcript,
      context: contextBlock(contextText),
      message: question,
    });
    return reply || NO_ANSWER;
  }
}

/** General-purpose answer, no document context. */
export class FallbackAnswerGenerator {
  constructor(private completer: ChatCompleter) {}

  async generate(question: string, transcript: readonly ChatTurn[]) {
    const reply = await this.completer.complete({
      system: FALLBACK_PROMPT,
      history: transcript,
      message: question,
    });
    return reply || NO_ANSWER;
  }
}
