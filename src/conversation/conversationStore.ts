import {
  CHAT_ROLES,
  ChatRole,
  ChatTurn,
  isChatRole,
} from "../types/chatSessionTypes";

export class InvalidRoleError extends Error {
  constructor(role: unknown) {
    super(`Invalid role "${String(role)}"; expected one of ${CHAT_ROLES.join(", ")}`);
    this.name = "InvalidRoleError";
  }
}

export const assertRole = (role: unknown): ChatRole => {
  if (!isChatRole(role)) throw new InvalidRoleError(role);
  return role;
};

/**
 * Ordered transcripts keyed by session id. Unknown sessions read as empty.
 */
export interface ConversationStore {
  append(sessionId: string, role: ChatRole, content: string): Promise<void>;
  /** Adds a user turn and the assistant reply together. */
  appendExchange(sessionId: string, question: string, answer: string): Promise<void>;
  get(sessionId: string): Promise<ChatTurn[]>;
  clear(sessionId: string): Promise<void>;
}

export class MemoryConversationStore implements ConversationStore {
  private transcripts = new Map<string, ChatTurn[]>();

  async append(sessionId: string, role: ChatRole, content: string) {
    const turn = { role: assertRole(role), content };
    const transcript = this.transcripts.get(sessionId);
    if (transcript) transcript.push(turn);
    else this.transcripts.set(sessionId, [turn]);
  }

  async appendExchange(sessionId: string, question: string, answer: string) {
    const turns: ChatTurn[] = [
      { role: "user", content: question },
      { role: "assistant", content: answer },
    ];
    this.transcripts.set(sessionId, [
      ...(this.transcripts.get(sessionId) ?? []),
      ...turns,
    ]);
  }

  async get(sessionId: string): Promise<ChatTurn[]> {
    return (this.transcripts.get(sessionId) ?? []).map((t) => ({ ...t }));
  }

  async clear(sessionId: string) {
    this.transcripts.delete(sessionId);
  }
}
