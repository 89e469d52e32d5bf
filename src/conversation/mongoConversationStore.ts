import type { Model } from "mongoose";
import ChatSessionModel from "../model/ragModel/chatSession";
import type { ChatRole, ChatSessionDocument, ChatTurn } from "../types/chatSessionTypes";
import { assertRole, ConversationStore } from "./conversationStore";

/**
 * Transcripts persisted as one ChatSession document per session id.
 */
export class MongoConversationStore implements ConversationStore {
  constructor(private model: Model<ChatSessionDocument> = ChatSessionModel) {}

  private async push(sessionId: string, turns: ChatTurn[]) {
    const now = new Date();
    await this.model.updateOne(
      { sessionId },
      {
        $push: {
          messages: { $each: turns.map((t) => ({ ...t, createdAt: now })) },
        },
        $set: { lastActiveAt: now },
      },
      { upsert: true }
    );
  }

  async append(sessionId: string, role: ChatRole, content: string) {
    await this.push(sessionId, [{ role: assertRole(role), content }]);
  }

  async appendExchange(sessionId: string, question: string, answer: string) {
    await this.push(sessionId, [
      { role: "user", content: question },
      { role: "assistant", content: answer },
    ]);
  }

  async get(sessionId: string): Promise<ChatTurn[]> {
    const session = await this.model.findOne({ sessionId }).lean();
    if (!session || !Array.isArray(session.messages)) return [];
    return session.messages.map((m) => ({ role: m.role, content: m.content }));
  }

  async clear(sessionId: string) {
    await this.model.deleteOne({ sessionId });
  }
}
