import { describe, expect, it } from "vitest";
import { MemoryVectorIndex } from "../../src/rag/memoryVectorIndex";
import { Retriever } from "../../src/rag/retriever";
import type { VectorIndex } from "../../src/rag/vectorIndex";
import type { RetrievedChunk } from "../../src/types/ragTypes";
import { FakeEmbeddings } from "../helpers/fakes";

const hit = (text: string, score?: number): RetrievedChunk => ({
  text,
  metadata: { source: "a.pdf", page: 1 },
  score,
});

const stubIndex = (hits: RetrievedChunk[]): VectorIndex => {
  const memory = new MemoryVectorIndex();
  return {
    getOrCreate: (name) => memory.getOrCreate(name),
    add: (handle, records) => memory.add(handle, records),
    search: async () => hits,
    count: async () => hits.length,
    delete: (name) => memory.delete(name),
    close: () => memory.close(),
  };
};

describe("Retriever", () => {
  it("returns nothing without a partition and does not embed", async () => {
    const embeddings = new FakeEmbeddings();
    const retriever = new Retriever(new MemoryVectorIndex(), embeddings);

    expect(await retriever.retrieve(undefined, "anything", 4)).toEqual([]);
    expect(embeddings.queryCalls).toEqual([]);
  });

  it("returns nothing for an empty partition", async () => {
    const index = new MemoryVectorIndex();
    const handle = await index.getOrCreate("session_x");
    const retriever = new Retriever(index, new FakeEmbeddings());

    expect(await retriever.retrieve(handle, "photosynthesis", 4)).toEqual([]);
  });

  it("treats a deleted partition as empty", async () => {
    const index = new MemoryVectorIndex();
    const handle = await index.getOrCreate("session_x");
    await index.delete("session_x");
    const retriever = new Retriever(index, new FakeEmbeddings());

    expect(await retriever.retrieve(handle, "photosynthesis", 4)).toEqual([]);
  });

  it("orders by descending score with unscored hits last, capped at k", async () => {
    const retriever = new Retriever(
      stubIndex([hit("low", 0.3), hit("none"), hit("high", 0.9), hit("mid", 0.6)]),
      new FakeEmbeddings()
    );

    const result = await retriever.retrieve({ name: "p" }, "q", 3);

    expect(result.map((r) => r.text)).toEqual(["high", "mid", "low"]);
  });
});

describe("MemoryVectorIndex", () => {
  it("ranks stored records by cosine similarity", async () => {
    const index = new MemoryVectorIndex();
    const handle = await index.getOrCreate("p");
    await index.add(handle, [
      { id: "1", text: "x-axis", vector: [1, 0], metadata: { source: "a.pdf", page: 1 } },
      { id: "2", text: "y-axis", vector: [0, 1], metadata: { source: "a.pdf", page: 2 } },
    ]);

    const [best, second] = await index.search(handle, [0.1, 1], 2);

    expect(best.text).toBe("y-axis");
    expect(second.text).toBe("x-axis");
    expect(best.score).toBeGreaterThan(second.score ?? 0);
  });

  it("reports whether a delete removed anything", async () => {
    const index = new MemoryVectorIndex();
    await index.getOrCreate("p");

    expect(await index.delete("p")).toBe(true);
    expect(await index.delete("p")).toBe(false);
  });
});
