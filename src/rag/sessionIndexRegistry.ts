import { sha256FromString } from "../helper/hashingHex";
import type { PartitionHandle } from "../types/ragTypes";
import type { VectorIndex } from "./vectorIndex";

/** Collection name for a session; same id, same partition. */
export const partitionNameFor = (sessionId: string) =>
  `session_${sha256FromString(sessionId)}`;

/**
 * Tracks which sessions own a partition in the vector index.
 */
export class SessionIndexRegistry {
  private partitions = new Map<string, PartitionHandle>();

  constructor(readonly index: VectorIndex) {}

  partitionNameFor(sessionId: string) {
    return partitionNameFor(sessionId);
  }

  async getOrCreatePartition(sessionId: string): Promise<PartitionHandle> {
    const known = this.partitions.get(sessionId);
    if (known) return known;

    const handle = await this.index.getOrCreate(partitionNameFor(sessionId));
    this.partitions.set(sessionId, handle);
    return handle;
  }

  hasPartition(sessionId: string) {
    return this.partitions.has(sessionId);
  }

  getPartition(sessionId: string): PartitionHandle | undefined {
    return this.partitions.get(sessionId);
  }

  /**
   * Idempotent: a session without a partition deletes successfully. A failed
   * index delete leaves the session with its partition.
   */
  async deletePartition(sessionId: string): Promise<boolean> {
    try {
      await this.index.delete(partitionNameFor(sessionId));
      this.partitions.delete(sessionId);
      return true;
    } catch (err: unknown) {
      console.error("DELETE_PARTITION_ERR:", sessionId, err);
      return false;
    }
  }
}
