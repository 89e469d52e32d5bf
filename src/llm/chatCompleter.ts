import OpenAI from "openai";
import type { ChatTurn } from "../types/chatSessionTypes";
import { truncateToTokenLimit } from "../utils/token";

export interface CompletionRequest {
  system: string;
  history: readonly ChatTurn[];
  /** Extra system block placed after the history, ahead of the question. */
  context?: string;
  message: string;
}

export interface ChatCompleter {
  complete(request: CompletionRequest): Promise<string>;
}

interface OpenAIChatCompleterOptions {
  client: OpenAI;
  model: string;
  temperature: number;
  maxTokens: number;
  maxHistoryTokens: number;
  timeoutMs?: number;
}

type Message = OpenAI.Chat.ChatCompletionMessageParam;

export const buildMessages = (
  request: CompletionRequest,
  maxHistoryTokens: number
): Message[] => {
  const history: Message[] = truncateToTokenLimit(
    request.history,
    maxHistoryTokens
  ).map((turn): Message =>
    turn.role === "user"
      ? { role: "user", content: turn.content }
      : { role: "assistant", content: turn.content }
  );

  return [
    { role: "system", content: request.system },
    ...history,
    ...(request.context !== undefined
      ? [{ role: "system" as const, content: request.context }]
      : []),
    { role: "user", content: request.message },
  ];
};

export class OpenAIChatCompleter implements ChatCompleter {
  constructor(private options: OpenAIChatCompleterOptions) {}

  async complete(request: CompletionRequest): Promise<string> {
    const { client, model, temperature, maxTokens, maxHistoryTokens, timeoutMs } =
      this.options;

    const chatRes = await client.chat.completions.create(
      {
        model,
        messages: buildMessages(request, maxHistoryTokens),
        temperature,
        max_tokens: maxTokens,
      },
      timeoutMs ? { timeout: timeoutMs } : undefined
    );

    return chatRes.choices[0]?.message?.content ?? "";
  }
}
