import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { RagConfig } from "../config";
import type { ConversationStore } from "../conversation/conversationStore";
import type { ChatCompleter } from "../llm/chatCompleter";
import {
  FallbackAnswerGenerator,
  GroundedAnswerGenerator,
} from "../rag/answerGenerator";
import { QueryContextualizer } from "../rag/contextualizer";
import { DocumentIngestor } from "../rag/ingestor";
import type { PageExtractor } from "../rag/pdfExtractor";
import { Retriever } from "../rag/retriever";
import { SessionIndexRegistry } from "../rag/sessionIndexRegistry";
import type { VectorIndex } from "../rag/vectorIndex";
import type { RecordStore } from "../records/recordStore";
import type { ChatEngine } from "./chatEngine";
import { RagEngine } from "./ragEngine";
import { StudentCommandEngine } from "./studentCommandEngine";

export interface RagEngineCollaborators {
  index: VectorIndex;
  embeddings: EmbeddingsInterface;
  completer: ChatCompleter;
  extractor: PageExtractor;
  conversations: ConversationStore;
  config: RagConfig;
}

export const buildRagEngine = ({
  index,
  embeddings,
  completer,
  extractor,
  conversations,
  config,
}: RagEngineCollaborators) => {
  const registry = new SessionIndexRegistry(index);
  return new RagEngine({
    registry,
    ingestor: new DocumentIngestor({ registry, embeddings, extractor, config }),
    retriever: new Retriever(index, embeddings),
    contextualizer: new QueryContextualizer(completer),
    grounded: new GroundedAnswerGenerator(completer),
    fallback: new FallbackAnswerGenerator(completer),
    conversations,
    config,
  });
};

export type EngineName = "rag" | "records";

export const ENGINE_NAMES: readonly EngineName[] = ["rag", "records"];

export const isEngineName = (value: unknown): value is EngineName =>
  typeof value === "string" && ENGINE_NAMES.some((name) => name === value);

/** Engines the HTTP layer can route to; `rag` also owns documents. */
export interface EngineSet {
  rag: RagEngine;
  records: ChatEngine;
}

export const buildEngines = (
  collaborators: RagEngineCollaborators & {
    records: RecordStore;
    recordConversations: ConversationStore;
  }
): EngineSet => ({
  rag: buildRagEngine(collaborators),
  records: new StudentCommandEngine(
    collaborators.records,
    collaborators.recordConversations
  ),
});
