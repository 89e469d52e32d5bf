import type {
  ChunkRecord,
  PartitionHandle,
  RetrievedChunk,
} from "../types/ragTypes";

/**
 * Vector store the core talks to. One collection per session partition.
 */
export interface VectorIndex {
  getOrCreate(name: string): Promise<PartitionHandle>;
  add(handle: PartitionHandle, records: ChunkRecord[]): Promise<void>;
  /** Up to `k` hits, best first. */
  search(
    handle: PartitionHandle,
    vector: number[],
    k: number
  ): Promise<RetrievedChunk[]>;
  count(handle: PartitionHandle): Promise<number>;
  /** Removes the collection; resolves false when there was nothing to delete. */
  delete(name: string): Promise<boolean>;
  close(): Promise<void>;
}
