import type {
  ChunkRecord,
  PartitionHandle,
  RetrievedChunk,
} from "../types/ragTypes";
import { cosine } from "./similarity";
import type { VectorIndex } from "./vectorIndex";

/**
 * In-process index: exact cosine search over every stored vector.
 * Records with the same id overwrite each other.
 */
export class MemoryVectorIndex implements VectorIndex {
  private collections = new Map<string, Map<string, ChunkRecord>>();

  async getOrCreate(name: string): Promise<PartitionHandle> {
    if (!this.collections.has(name)) this.collections.set(name, new Map());
    return { name };
  }

  async add(handle: PartitionHandle, records: ChunkRecord[]) {
    const collection = this.collections.get(handle.name);
    if (!collection) throw new Error(`Collection ${handle.name} not found`);
    for (const record of records) collection.set(record.id, record);
  }

  async search(
    handle: PartitionHandle,
    vector: number[],
    k: number
  ): Promise<RetrievedChunk[]> {
    const collection = this.collections.get(handle.name);
    if (!collection || k <= 0) return [];

    return [...collection.values()]
      .map((record) => ({
        text: record.text,
        metadata: { ...record.metadata },
        score: cosine(vector, record.vector),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  async count(handle: PartitionHandle) {
    return this.collections.get(handle.name)?.size ?? 0;
  }

  async delete(name: string) {
    return this.collections.delete(name);
  }

  async close() {
    this.collections.clear();
  }

  listCollections() {
    return [...this.collections.keys()];
  }
}
