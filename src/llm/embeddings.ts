import { OpenAIEmbeddings } from "@langchain/openai";
import type { RagConfig } from "../config";

export const createEmbeddings = (
  apiKey: string | undefined,
  config: Pick<RagConfig, "embeddingModel" | "embeddingDimensions">
) => {
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY missing in environment; cannot create embeddings");
  }
  return new OpenAIEmbeddings({
    apiKey,
    model: config.embeddingModel,
    dimensions: config.embeddingDimensions,
  });
};
