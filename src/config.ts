import "dotenv/config";

const _configEnv = {
  PORT: process.env.PORT || 3000,
  NODE_ENV: process.env.NODE_ENV || "development",
  MONGODB_URL_LOCAL:
    process.env.MONGODB_URL_LOCAL || "mongodb://localhost:27017/docqa",
  JWT_SESSION_SECRET_KEY:
    process.env.JWT_SESSION_SECRET_KEY || "your-session-secret-key",
  CORS_ORIGINS: process.env.CORS_ORIGINS || "http://localhost:3000",
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  QDRANT_URL: process.env.QDRANT_URL,
  API_KEY_QDRANT: process.env.API_KEY_QDRANT,
  // "qdrant" | "memory"
  VECTOR_STORE: process.env.VECTOR_STORE || "qdrant",
  // "memory" | "mongo"
  CONVERSATION_STORE: process.env.CONVERSATION_STORE || "memory",
  // "mongo" | "memory"
  RECORD_STORE: process.env.RECORD_STORE || "mongo",
};

export const configEnv = _configEnv;

export interface RagConfig {
  chunkSize: number;
  chunkOverlap: number;
  retrievalK: number;
  similarityThreshold: number;
  minRelevantDocs: number;
  minContextLength: number;
  /** When set, a chunk without a similarity score counts as score 0. */
  requireSimilarityScores: boolean;
  maxFileSizeMb: number;
  maxFileCount: number;
  allowedExtensions: string[];
  embeddingModel: string;
  embeddingDimensions: number;
  chatModel: string;
  temperature: number;
  maxTokens: number;
  maxHistoryTokens: number;
  collaboratorTimeoutMs: number;
}

export const defaultRagConfig: RagConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
  retrievalK: 8,
  similarityThreshold: 0.65,
  minRelevantDocs: 1,
  minContextLength: 200,
  requireSimilarityScores: false,
  maxFileSizeMb: 50,
  maxFileCount: 10,
  allowedExtensions: [".pdf"],
  embeddingModel: "text-embedding-3-small",
  embeddingDimensions: 384,
  chatModel: "gpt-4o-mini",
  temperature: 0.7,
  maxTokens: 2048,
  maxHistoryTokens: 4000,
  collaboratorTimeoutMs: 30000,
};

type Env = Record<string, string | undefined>;

const num = (value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const bool = (value: string | undefined, fallback: boolean) => {
  if (value === undefined || value.trim() === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
};

export const loadRagConfig = (env: Env = process.env): RagConfig => ({
  chunkSize: num(env.CHUNK_SIZE, defaultRagConfig.chunkSize),
  chunkOverlap: num(env.CHUNK_OVERLAP, defaultRagConfig.chunkOverlap),
  retrievalK: num(env.RETRIEVAL_K, defaultRagConfig.retrievalK),
  similarityThreshold: num(
    env.SIMILARITY_THRESHOLD,
    defaultRagConfig.similarityThreshold
  ),
  minRelevantDocs: num(env.MIN_RELEVANT_DOCS, defaultRagConfig.minRelevantDocs),
  minContextLength: num(
    env.MIN_CONTEXT_LENGTH,
    defaultRagConfig.minContextLength
  ),
  requireSimilarityScores: bool(
    env.REQUIRE_SIMILARITY_SCORES,
    defaultRagConfig.requireSimilarityScores
  ),
  maxFileSizeMb: num(env.MAX_FILE_SIZE_MB, defaultRagConfig.maxFileSizeMb),
  maxFileCount: num(env.MAX_FILE_COUNT, defaultRagConfig.maxFileCount),
  allowedExtensions: defaultRagConfig.allowedExtensions,
  embeddingModel: env.EMBEDDING_MODEL || defaultRagConfig.embeddingModel,
  embeddingDimensions: num(
    env.EMBEDDING_DIMENSIONS,
    defaultRagConfig.embeddingDimensions
  ),
  chatModel: env.CHAT_MODEL || defaultRagConfig.chatModel,
  temperature: num(env.TEMPERATURE, defaultRagConfig.temperature),
  maxTokens: num(env.MAX_TOKENS, defaultRagConfig.maxTokens),
  maxHistoryTokens: num(
    env.MAX_HISTORY_TOKENS,
    defaultRagConfig.maxHistoryTokens
  ),
  collaboratorTimeoutMs: num(
    env.COLLABORATOR_TIMEOUT_MS,
    defaultRagConfig.collaboratorTimeoutMs
  ),
});

export const ragConfig = loadRagConfig();
