import { beforeEach, describe, expect, it, vi } from "vitest";
import type { RagConfig } from "../../src/config";
import { DocumentIngestor } from "../../src/rag/ingestor";
import { MemoryVectorIndex } from "../../src/rag/memoryVectorIndex";
import {
  partitionNameFor,
  SessionIndexRegistry,
} from "../../src/rag/sessionIndexRegistry";
import {
  BIOLOGY_PAGES,
  FakeEmbeddings,
  FakeExtractor,
  pdf,
  testConfig,
} from "../helpers/fakes";

describe("DocumentIngestor", () => {
  let index: MemoryVectorIndex;
  let registry: SessionIndexRegistry;
  let embeddings: FakeEmbeddings;
  let extractor: FakeExtractor;

  const makeIngestor = (overrides: Partial<RagConfig> = {}) =>
    new DocumentIngestor({
      registry,
      embeddings,
      extractor,
      config: testConfig(overrides),
    });

  beforeEach(() => {
    index = new MemoryVectorIndex();
    registry = new SessionIndexRegistry(index);
    embeddings = new FakeEmbeddings();
    extractor = new FakeExtractor();
    extractor.pages.set("biology.pdf", BIOLOGY_PAGES);
  });

  describe("validation", () => {
    it("rejects an empty upload", async () => {
      const outcome = await makeIngestor().ingest([], "s1");
      expect(outcome).toEqual({
        success: false,
        chunksCreated: 0,
        filesProcessed: 0,
        message: "",
        error: "No files uploaded.",
        partition: null,
      });
    });

    it("rejects too many files", async () => {
      const outcome = await makeIngestor({ maxFileCount: 2 }).ingest(
        [pdf("a.pdf"), pdf("b.pdf"), pdf("c.pdf")],
        "s1"
      );
      expect(outcome.error).toBe("Too many files. Max 2 PDFs allowed.");
    });

    it("rejects a non-pdf file", async () => {
      const outcome = await makeIngestor().ingest(
        [pdf("biology.pdf"), pdf("notes.txt")],
        "s1"
      );
      expect(outcome.error).toBe("Invalid file type: notes.txt. Only .pdf files allowed.");
    });

    it("accepts an upper-case extension", async () => {
      extractor.pages.set("SCAN.PDF", BIOLOGY_PAGES);
      const outcome = await makeIngestor().ingest([pdf("SCAN.PDF")], "s1");
      expect(outcome.success).toBe(true);
    });

    it("rejects an oversized file without writing anything", async () => {
      const outcome = await makeIngestor({ maxFileSizeMb: 1 }).ingest(
        [pdf("biology.pdf"), pdf("big.pdf", 2 * 1024 * 1024)],
        "s1"
      );
      expect(outcome.success).toBe(false);
      expect(outcome.error).toBe("File too large: big.pdf (2.00MB). Max 1MB allowed.");
      expect(index.listCollections()).toEqual([]);
      expect(embeddings.documentCalls).toBe(0);
    });
  });

  it("chunks every page and tags provenance", async () => {
    const outcome = await makeIngestor().ingest([pdf("biology.pdf")], "s1");

    expect(outcome).toEqual({
      success: true,
      chunksCreated: 3,
      filesProcessed: 1,
      message: "Processed 1 file(s) → 3 chunks created",
      partition: partitionNameFor("s1"),
    });
    expect(registry.hasPartition("s1")).toBe(true);

    const hits = await index.search({ name: partitionNameFor("s1") }, [1, 0, 0], 10);
    expect(hits.map((h) => h.metadata).sort((a, b) => a.page - b.page)).toEqual([
      { source: "biology.pdf", page: 1 },
      { source: "biology.pdf", page: 2 },
      { source: "biology.pdf", page: 3 },
    ]);
  });

  it("splits long pages into overlapping chunks within the size limit", async () => {
    const words = Array.from({ length: 60 }, (_, i) => `word${i}`).join(" ");
    extractor.pages.set("long.pdf", [{ page: 4, text: words }]);

    const chunks = await makeIngestor({ chunkSize: 100, chunkOverlap: 20 }).chunkFile(
      pdf("long.pdf"),
      "p"
    );

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.text.length).toBeLessThanOrEqual(100);
      expect(chunk.metadata).toEqual({ source: "long.pdf", page: 4 });
    }
    // consecutive chunks share their boundary words
    const lastWordOfFirst = chunks[0].text.split(" ").at(-1);
    expect(chunks[1].text.split(" ")).toContain(lastWordOfFirst);
  });

  it("skips files without extractable text", async () => {
    extractor.pages.set("blank.pdf", [{ page: 1, text: "   \n  " }]);

    const outcome = await makeIngestor().ingest(
      [pdf("blank.pdf"), pdf("biology.pdf")],
      "s1"
    );

    expect(outcome.success).toBe(true);
    expect(outcome.filesProcessed).toBe(1);
    expect(outcome.chunksCreated).toBe(3);
  });

  it("creates no partition when nothing could be extracted", async () => {
    extractor.pages.set("blank.pdf", []);

    const outcome = await makeIngestor().ingest([pdf("blank.pdf")], "s1");

    expect(outcome).toEqual({
      success: true,
      chunksCreated: 0,
      filesProcessed: 0,
      message: "No extractable text found; nothing was indexed.",
      partition: null,
    });
    expect(registry.hasPartition("s1")).toBe(false);
  });

  it("aborts the whole call when one file cannot be read", async () => {
    extractor.pages.set("broken.pdf", new Error("bad xref table"));

    const outcome = await makeIngestor().ingest(
      [pdf("biology.pdf"), pdf("broken.pdf")],
      "s1"
    );

    expect(outcome.success).toBe(false);
    expect(outcome.chunksCreated).toBe(0);
    expect(outcome.error).toBe("Error processing broken.pdf: bad xref table");
    expect(index.listCollections()).toEqual([]);
    expect(registry.hasPartition("s1")).toBe(false);
  });

  it("writes nothing when embedding fails", async () => {
    embeddings.failDocuments = true;

    const outcome = await makeIngestor().ingest([pdf("biology.pdf")], "s1");

    expect(outcome.success).toBe(false);
    expect(outcome.error).toBe("Ingestion failed: embedding service unavailable");
    expect(index.listCollections()).toEqual([]);
  });

  it("keeps identical files uploaded under different names apart", async () => {
    const bytes = Buffer.from("same pdf bytes");
    extractor.pages.set("a.pdf", BIOLOGY_PAGES);
    extractor.pages.set("b.pdf", BIOLOGY_PAGES);

    const outcome = await makeIngestor().ingest(
      [
        { name: "a.pdf", data: bytes },
        { name: "b.pdf", data: bytes },
      ],
      "s1"
    );

    expect(outcome.chunksCreated).toBe(6);
    expect(await index.count({ name: partitionNameFor("s1") })).toBe(6);
    const hits = await index.search({ name: partitionNameFor("s1") }, [1, 0, 0], 10);
    expect(new Set(hits.map((h) => h.metadata.source))).toEqual(new Set(["a.pdf", "b.pdf"]));
  });

  describe("time limits", () => {
    it("gives up on an embedding call that never settles", async () => {
      embeddings.hangDocuments = true;

      const outcome = await makeIngestor({ collaboratorTimeoutMs: 20 }).ingest(
        [pdf("biology.pdf")],
        "s1"
      );

      expect(outcome.success).toBe(false);
      expect(outcome.error).toBe("Ingestion failed: embedding timed out after 20ms");
      expect(index.listCollections()).toEqual([]);
      expect(registry.hasPartition("s1")).toBe(false);
    });

    it("gives up on a stuck extraction", async () => {
      vi.spyOn(extractor, "extractPages").mockReturnValue(new Promise(() => undefined));

      const outcome = await makeIngestor({ collaboratorTimeoutMs: 20 }).ingest(
        [pdf("biology.pdf")],
        "s1"
      );

      expect(outcome.error).toBe(
        "Error processing biology.pdf: text extraction timed out after 20ms"
      );
      expect(embeddings.documentCalls).toBe(0);
    });

    it("removes the partition it created when the index write hangs", async () => {
      vi.spyOn(index, "add").mockReturnValue(new Promise(() => undefined));

      const outcome = await makeIngestor({ collaboratorTimeoutMs: 20 }).ingest(
        [pdf("biology.pdf")],
        "s1"
      );

      expect(outcome.error).toBe("Ingestion failed: index write timed out after 20ms");
      expect(registry.hasPartition("s1")).toBe(false);
      expect(index.listCollections()).toEqual([]);
    });
  });

  it("does not duplicate chunks when the same upload is retried", async () => {
    const ingestor = makeIngestor();
    await ingestor.ingest([pdf("biology.pdf")], "s1");
    await ingestor.ingest([pdf("biology.pdf")], "s1");

    expect(index.listCollections()).toHaveLength(1);
    expect(await index.count({ name: partitionNameFor("s1") })).toBe(3);
  });
});
