import type { RagConfig } from "../config";
import type { ConversationStore } from "../conversation/conversationStore";
import type {
  FallbackAnswerGenerator,
  GroundedAnswerGenerator,
} from "../rag/answerGenerator";
import { appendCitations, formatCitations } from "../rag/citations";
import type { QueryContextualizer } from "../rag/contextualizer";
import type { DocumentIngestor } from "../rag/ingestor";
import { assembleContext, isRelevant } from "../rag/relevanceGate";
import type { Retriever } from "../rag/retriever";
import type { SessionIndexRegistry } from "../rag/sessionIndexRegistry";
import type { ChatTurn } from "../types/chatSessionTypes";
import type {
  IngestOutcome,
  RelevanceVerdict,
  RetrievalResult,
  UploadedFile,
} from "../types/ragTypes";
import { SessionLock } from "../utils/sessionLock";
import { withTimeout } from "../utils/timeout";
import type { ChatEngine } from "./chatEngine";

export type SessionState = "NO_PARTITION" | "READY";

export type AnswerRoute =
  | "no-partition"
  | "grounded"
  | "rejected"
  | "degraded"
  | "error";

/** What happened while answering; the caller only ever sees `answer`. */
export interface AnswerTrace {
  answer: string;
  route: AnswerRoute;
  standaloneQuestion?: string;
  retrieved?: RetrievalResult;
  verdict?: RelevanceVerdict;
  error?: string;
}

export type RagEngineConfig = Pick<
  RagConfig,
  | "retrievalK"
  | "similarityThreshold"
  | "minRelevantDocs"
  | "minContextLength"
  | "requireSimilarityScores"
  | "collaboratorTimeoutMs"
>;

export interface RagEngineDeps {
  registry: SessionIndexRegistry;
  ingestor: DocumentIngestor;
  retriever: Retriever;
  contextualizer: QueryContextualizer;
  grounded: GroundedAnswerGenerator;
  fallback: FallbackAnswerGenerator;
  conversations: ConversationStore;
  config: RagEngineConfig;
  lock?: SessionLock;
}

const errMessage = (err: unknown) =>
  err instanceof Error ? err.message : String(err);

/**
 * Answers questions against a session's uploaded documents, falling back to
 * general chat when the session has none or they are not relevant enough.
 * Work for one session id is serialized; different sessions run freely.
 */
export class RagEngine implements ChatEngine {
  private lock: SessionLock;

  constructor(private deps: RagEngineDeps) {
    this.lock = deps.lock ?? new SessionLock();
  }

  stateOf(sessionId: string): SessionState {
    return this.deps.registry.hasPartition(sessionId) ? "READY" : "NO_PARTITION";
  }

  hasDocuments(sessionId: string) {
    return this.stateOf(sessionId) === "READY";
  }

  async ingest(sessionId: string, files: UploadedFile[]): Promise<IngestOutcome> {
    return this.lock.run(sessionId, async () => {
      try {
        return await this.deps.ingestor.ingest(files, sessionId);
      } catch (err: unknown) {
        console.error("RAG Engine Ingest Error:", err);
        return {
          success: false,
          chunksCreated: 0,
          filesProcessed: 0,
          message: "",
          error: `Error during PDF ingestion: ${errMessage(err)}`,
          partition: null,
        };
      }
    });
  }

  async answer(sessionId: string, question: string) {
    const { answer } = await this.answerWithTrace(sessionId, question);
    return answer;
  }

  async answerWithTrace(sessionId: string, question: string): Promise<AnswerTrace> {
    return this.lock.run(sessionId, async () => {
      try {
        const transcript = await this.deps.conversations.get(sessionId);
        const trace = await this.resolve(sessionId, question, transcript);
        await this.deps.conversations.appendExchange(sessionId, question, trace.answer);
        return trace;
      } catch (err: unknown) {
        console.error("CHAT_ERROR", sessionId, err);
        return {
          answer: "⚠️ Sorry, I couldn't generate an answer right now. Please try again.",
          route: "error",
          error: errMessage(err),
        };
      }
    });
  }

  private timed<T>(work: Promise<T>, label: string) {
    return withTimeout(work, this.deps.config.collaboratorTimeoutMs, label);
  }

  private async resolve(
    sessionId: string,
    question: string,
    transcript: ChatTurn[]
  ): Promise<AnswerTrace> {
    const { registry, contextualizer, retriever, grounded, fallback, config } =
      this.deps;

    const partition = registry.getPartition(sessionId);
    if (!partition) {
      const answer = await this.timed(
        fallback.generate(question, transcript),
        "fallback generation"
      );
      return { answer, route: "no-partition" };
    }

    let standaloneQuestion: string | undefined;
    let retrieved: RetrievalResult | undefined;
    try {
      standaloneQuestion = await this.timed(
        contextualizer.contextualize(question, transcript),
        "contextualization"
      );
      retrieved = await this.timed(
        retriever.retrieve(partition, standaloneQuestion, config.retrievalK),
        "retrieval"
      );

      const contextText = assembleContext(retrieved);
      const verdict = isRelevant(retrieved, contextText, config);
      console.log("RELEVANCE:", sessionId, verdict.reason);

      if (!verdict.accepted) {
        const answer = await this.timed(
          fallback.generate(question, transcript),
          "fallback generation"
        );
        return { answer, route: "rejected", standaloneQuestion, retrieved, verdict };
      }

      const reply = await this.timed(
        grounded.generate(question, transcript, contextText),
        "grounded generation"
      );
      const answer = appendCitations(reply, formatCitations(retrieved));
      return { answer, route: "grounded", standaloneQuestion, retrieved, verdict };
    } catch (err: unknown) {
      console.warn("RAG pipeline failed, using general chat:", errMessage(err));
      const answer = await this.timed(
        fallback.generate(question, transcript),
        "fallback generation"
      );
      return {
        answer,
        route: "degraded",
        standaloneQuestion,
        retrieved,
        error: errMessage(err),
      };
    }
  }

  getHistory(sessionId: string): Promise<ChatTurn[]> {
    return this.deps.conversations.get(sessionId);
  }

  /** Clears the transcript only; ingested documents stay. */
  clearSession(sessionId: string) {
    return this.lock.run(sessionId, () => this.deps.conversations.clear(sessionId));
  }

  clearHistory(sessionId: string) {
    return this.clearSession(sessionId);
  }

  /** Drops the partition and the transcript. */
  async deleteSession(sessionId: string): Promise<boolean> {
    return this.lock.run(sessionId, async () => {
      try {
        const deleted = await this.timed(
          this.deps.registry.deletePartition(sessionId),
          "partition delete"
        );
        await this.deps.conversations.clear(sessionId);
        return deleted;
      } catch (err: unknown) {
        console.error(`Error deleting session ${sessionId}:`, err);
        return false;
      }
    });
  }

  async close() {
    await this.deps.registry.index.close();
  }
}
