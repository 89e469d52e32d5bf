import OpenAI from "openai";

import createApp from "./src/app";
import { configEnv, ragConfig } from "./src/config";
import {
  ConversationStore,
  MemoryConversationStore,
} from "./src/conversation/conversationStore";
import { MongoConversationStore } from "./src/conversation/mongoConversationStore";
import connectDB, { disconnectDB } from "./src/db";
import { buildEngines } from "./src/engines";
import { OpenAIChatCompleter } from "./src/llm/chatCompleter";
import { createEmbeddings } from "./src/llm/embeddings";
import { MemoryVectorIndex } from "./src/rag/memoryVectorIndex";
import { PdfPageExtractor } from "./src/rag/pdfExtractor";
import { QdrantVectorIndex } from "./src/rag/qdrantVectorIndex";
import type { VectorIndex } from "./src/rag/vectorIndex";
import { MongoRecordStore } from "./src/records/mongoRecordStore";
import { MemoryRecordStore, RecordStore } from "./src/records/recordStore";

const createVectorIndex = (): VectorIndex =>
  configEnv.VECTOR_STORE === "memory"
    ? new MemoryVectorIndex()
    : new QdrantVectorIndex({
        url: configEnv.QDRANT_URL,
        apiKey: configEnv.API_KEY_QDRANT,
        vectorSize: ragConfig.embeddingDimensions,
      });

const createConversationStore = (): ConversationStore =>
  configEnv.CONVERSATION_STORE === "mongo"
    ? new MongoConversationStore()
    : new MemoryConversationStore();

const createRecordStore = (): RecordStore =>
  configEnv.RECORD_STORE === "memory"
    ? new MemoryRecordStore()
    : new MongoRecordStore();

const startServer = async () => {
  const PORT = configEnv.PORT || 3000;

  const usesMongo =
    configEnv.CONVERSATION_STORE === "mongo" || configEnv.RECORD_STORE !== "memory";
  if (usesMongo) await connectDB();

  // long-lived collaborator handles, one per process
  const openaiClient = new OpenAI({ apiKey: configEnv.OPENAI_API_KEY });
  const engines = buildEngines({
    index: createVectorIndex(),
    embeddings: createEmbeddings(configEnv.OPENAI_API_KEY, ragConfig),
    completer: new OpenAIChatCompleter({
      client: openaiClient,
      model: ragConfig.chatModel,
      temperature: ragConfig.temperature,
      maxTokens: ragConfig.maxTokens,
      maxHistoryTokens: ragConfig.maxHistoryTokens,
      timeoutMs: ragConfig.collaboratorTimeoutMs,
    }),
    extractor: new PdfPageExtractor(),
    conversations: createConversationStore(),
    records: createRecordStore(),
    recordConversations: new MemoryConversationStore(),
    config: ragConfig,
  });

  const app = createApp({
    engines,
    config: ragConfig,
    jwtSecret: configEnv.JWT_SESSION_SECRET_KEY,
    corsOrigins: configEnv.CORS_ORIGINS.split(",").map((o) => o.trim()),
  });

  const server = app.listen(PORT, () => {
    console.log(`Server is running on port ${PORT}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      engines.rag
        .close()
        .then(disconnectDB)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("Shutdown failed:", err);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

startServer().catch((err: unknown) => {
  console.error("Server failed to start:", err);
  process.exit(1);
});
