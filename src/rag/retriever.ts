import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { PartitionHandle, RetrievalResult } from "../types/ragTypes";
import type { VectorIndex } from "./vectorIndex";

const byScoreDesc = (a?: number, b?: number) => {
  if (a === undefined && b === undefined) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return b - a;
};

export class Retriever {
  constructor(
    private index: VectorIndex,
    private embeddings: EmbeddingsInterface
  ) {}

  /**
   * Top `k` chunks for `question`. A missing partition and an empty one both
   * give an empty result.
   */
  async retrieve(
    partition: PartitionHandle | undefined,
    question: string,
    k: number
  ): Promise<RetrievalResult> {
    if (!partition || k <= 0) return [];

    const vector = await this.embeddings.embedQuery(question);
    const hits = await this.index.search(partition, vector, k);

    return hits
      .map((hit, position) => ({ hit, position }))
      .sort(
        (a, b) =>
          byScoreDesc(a.hit.score, b.hit.score) || a.position - b.position
      )
      .slice(0, k)
      .map(({ hit }) => hit);
  }
}
