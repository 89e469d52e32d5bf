import { Document } from "mongoose";

export const CHAT_ROLES = ["user", "assistant"] as const;

export type ChatRole = (typeof CHAT_ROLES)[number];

/**
 * Single turn of a session transcript
 */
export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export const isChatRole = (value: unknown): value is ChatRole =>
  typeof value === "string" && CHAT_ROLES.some((role) => role === value);

/**
 * Persisted transcript message
 */
export interface ChatMessage extends ChatTurn {
  createdAt?: Date;
}

/**
 * Chat session (document) structure
 */
export interface ChatSession {
  sessionId: string;
  messages: ChatMessage[];
  lastActiveAt?: Date;
  createdAt?: Date;
}

export interface ChatSessionDocument extends ChatSession, Document {}
