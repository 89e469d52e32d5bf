import { QdrantClient } from "@qdrant/js-client-rest";
import type {
  ChunkMetadata,
  ChunkRecord,
  PartitionHandle,
  RetrievedChunk,
} from "../types/ragTypes";
import type { VectorIndex } from "./vectorIndex";

interface QdrantVectorIndexOptions {
  url?: string;
  apiKey?: string;
  vectorSize: number;
  client?: QdrantClient;
}

const errorText = (e: unknown): string => {
  if (e && typeof e === "object" && "data" in e) {
    const data = e.data;
    if (data && typeof data === "object" && "status" in data) {
      const status = data.status;
      if (status && typeof status === "object" && "error" in status) {
        return String(status.error);
      }
    }
  }
  return e instanceof Error ? e.message : String(e);
};

const toMetadata = (value: unknown): ChunkMetadata => {
  const metadata: ChunkMetadata = { source: "Unknown", page: 0 };
  if (value && typeof value === "object") {
    if ("source" in value && typeof value.source === "string") {
      metadata.source = value.source;
    }
    if ("page" in value) {
      const page = Number(value.page);
      if (Number.isFinite(page)) metadata.page = page;
    }
  }
  return metadata;
};

/**
 * Qdrant-backed index. Each partition is a cosine collection; payloads hold
 * `{ content, metadata: { source, page } }`.
 */
export class QdrantVectorIndex implements VectorIndex {
  private client: QdrantClient;
  private vectorSize: number;

  constructor(options: QdrantVectorIndexOptions) {
    this.client =
      options.client ??
      new QdrantClient({ url: options.url, apiKey: options.apiKey });
    this.vectorSize = options.vectorSize;
  }

  async getOrCreate(name: string): Promise<PartitionHandle> {
    const { exists } = await this.client.collectionExists(name);
    if (exists) return { name };

    try {
      await this.client.createCollection(name, {
        vectors: { size: this.vectorSize, distance: "Cosine" },
      });
      console.log("Created Qdrant collection:", name);
    } catch (e: unknown) {
      // a concurrent ingest may have created it first
      if (errorText(e).toLowerCase().includes("already exists")) {
        console.log(`Collection ${name} already exists, reusing`);
      } else {
        throw e;
      }
    }
    return { name };
  }

  async add(handle: PartitionHandle, records: ChunkRecord[]) {
    if (records.length === 0) return;
    await this.client.upsert(handle.name, {
      wait: true,
      points: records.map((r) => ({
        id: r.id,
        vector: r.vector,
        payload: { content: r.text, metadata: { ...r.metadata } },
      })),
    });
  }

  async search(
    handle: PartitionHandle,
    vector: number[],
    k: number
  ): Promise<RetrievedChunk[]> {
    const { exists } = await this.client.collectionExists(handle.name);
    if (!exists || k <= 0) return [];

    const hits = await this.client.search(handle.name, {
      vector,
      limit: k,
      with_payload: true,
    });

    return hits.map((hit) => {
      const payload = hit.payload ?? {};
      return {
        text: typeof payload.content === "string" ? payload.content : "",
        metadata: toMetadata(payload.metadata),
        score: typeof hit.score === "number" ? hit.score : undefined,
      };
    });
  }

  async count(handle: PartitionHandle) {
    const { exists } = await this.client.collectionExists(handle.name);
    if (!exists) return 0;
    const { count } = await this.client.count(handle.name, { exact: true });
    return count;
  }

  async delete(name: string) {
    const { exists } = await this.client.collectionExists(name);
    if (!exists) return false;
    return this.client.deleteCollection(name);
  }

  async close() {
    // the REST client keeps no sockets of its own
  }
}
