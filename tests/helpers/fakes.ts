import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import { defaultRagConfig, RagConfig } from "../../src/config";
import { MemoryConversationStore } from "../../src/conversation/conversationStore";
import { buildRagEngine } from "../../src/engines";
import type { ChatCompleter, CompletionRequest } from "../../src/llm/chatCompleter";
import { MemoryVectorIndex } from "../../src/rag/memoryVectorIndex";
import type { PageExtractor } from "../../src/rag/pdfExtractor";
import {
  CONTEXTUALIZE_PROMPT,
  FALLBACK_PROMPT,
  GROUNDED_PROMPT,
} from "../../src/rag/prompts";
import type { PageText, UploadedFile } from "../../src/types/ragTypes";

export const GROUNDED_REPLY = "grounded answer";
export const FALLBACK_REPLY = "general answer";

// unit-length vectors: CHUNK·MATCHING = 0.9, CHUNK·UNRELATED = 0.2
export const CHUNK_VECTOR = [0.9, 0.4358898944, 0];
export const MATCHING_QUERY = [1, 0, 0];
export const UNRELATED_QUERY = [0.18, 0.0871779789, 0.9797958971];

export const BIOLOGY_PAGES: PageText[] = [
  {
    page: 1,
    text: "Photosynthesis is the process by which green plants convert light energy into chemical energy stored in glucose.",
  },
  {
    page: 2,
    text: "Chlorophyll in the chloroplasts absorbs mostly blue and red light, which drives the light dependent reactions.",
  },
  {
    page: 3,
    text: "The Calvin cycle uses ATP and NADPH from the light reactions to fix carbon dioxide into three carbon sugars.",
  },
];

export const pdf = (name: string, bytes = 16): UploadedFile => ({
  name,
  data: Buffer.alloc(bytes, name),
});

/** Documents embed to CHUNK_VECTOR; queries mentioning the keyword match. */
export class FakeEmbeddings implements EmbeddingsInterface {
  queryCalls: string[] = [];
  documentCalls = 0;
  failDocuments = false;
  hangDocuments = false;
  hangQueries = false;

  constructor(private keyword = "photosynthesis") {}

  async embedDocuments(documents: string[]) {
    this.documentCalls += 1;
    if (this.failDocuments) throw new Error("embedding service unavailable");
    if (this.hangDocuments) return new Promise<number[][]>(() => undefined);
    return documents.map(() => [...CHUNK_VECTOR]);
  }

  async embedQuery(document: string) {
    this.queryCalls.push(document);
    if (this.hangQueries) return new Promise<number[]>(() => undefined);
    return document.toLowerCase().includes(this.keyword)
      ? [...MATCHING_QUERY]
      : [...UNRELATED_QUERY];
  }
}

type Failure = "grounded" | "fallback" | "contextualize";

export class FakeCompleter implements ChatCompleter {
  requests: CompletionRequest[] = [];
  rewrites = new Map<string, string>();
  failing = new Set<Failure>();

  kindOf(request: CompletionRequest): Failure | "other" {
    if (request.system === CONTEXTUALIZE_PROMPT) return "contextualize";
    if (request.system === GROUNDED_PROMPT) return "grounded";
    if (request.system === FALLBACK_PROMPT) return "fallback";
    return "other";
  }

  calls(kind: Failure) {
    return this.requests.filter((r) => this.kindOf(r) === kind);
  }

  async complete(request: CompletionRequest) {
    this.requests.push(request);
    const kind = this.kindOf(request);
    if (kind !== "other" && this.failing.has(kind)) {
      throw new Error(`${kind} model error`);
    }
    if (kind === "contextualize") {
      return this.rewrites.get(request.message) ?? request.message;
    }
    return kind === "grounded" ? GROUNDED_REPLY : FALLBACK_REPLY;
  }
}

export class FakeExtractor implements PageExtractor {
  pages = new Map<string, PageText[] | Error>();

  async extractPages(file: UploadedFile): Promise<PageText[]> {
    const found = this.pages.get(file.name);
    if (found instanceof Error) throw found;
    return found ?? [];
  }
}

export const testConfig = (overrides: Partial<RagConfig> = {}): RagConfig => ({
  ...defaultRagConfig,
  collaboratorTimeoutMs: 1000,
  ...overrides,
});

export const makeRagHarness = (overrides: Partial<RagConfig> = {}) => {
  const index = new MemoryVectorIndex();
  const embeddings = new FakeEmbeddings();
  const completer = new FakeCompleter();
  const extractor = new FakeExtractor();
  const conversations = new MemoryConversationStore();
  const config = testConfig(overrides);
  extractor.pages.set("biology.pdf", BIOLOGY_PAGES);

  const engine = buildRagEngine({
    index,
    embeddings,
    completer,
    extractor,
    conversations,
    config,
  });

  return { engine, index, embeddings, completer, extractor, conversations, config };
};
