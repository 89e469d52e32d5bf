import mongoose from "mongoose";
import { CHAT_ROLES, ChatSessionDocument } from "../../types/chatSessionTypes";

const MessageSchema = new mongoose.Schema(
  {
    role: { type: String, enum: [...CHAT_ROLES], required: true },
    content: { type: String, required: true },
    createdAt: { type: Date, default: Date.now },
  },
  { _id: false }
);

const ChatSessionSchema = new mongoose.Schema<ChatSessionDocument>({
  sessionId: { type: String, required: true, unique: true },
  messages: [MessageSchema],
  lastActiveAt: { type: Date, default: Date.now },
  createdAt: { type: Date, default: Date.now },
});

const ChatSessionModel = mongoose.model<ChatSessionDocument>(
  "ChatSession",
  ChatSessionSchema
);

export default ChatSessionModel;
