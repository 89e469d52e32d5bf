import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import path from "path";
import { v5 as uuidv5 } from "uuid";

import type { RagConfig } from "../config";
import { sha256FromBuffer } from "../helper/hashingHex";
import type {
  ChunkMetadata,
  ChunkRecord,
  IngestOutcome,
  UploadedFile,
} from "../types/ragTypes";
import { withTimeout } from "../utils/timeout";
import type { PageExtractor } from "./pdfExtractor";
import type { SessionIndexRegistry } from "./sessionIndexRegistry";

export type IngestorConfig = Pick<
  RagConfig,
  | "chunkSize"
  | "chunkOverlap"
  | "maxFileSizeMb"
  | "maxFileCount"
  | "allowedExtensions"
  | "collaboratorTimeoutMs"
>;

interface DocumentIngestorDeps {
  registry: SessionIndexRegistry;
  embeddings: EmbeddingsInterface;
  extractor: PageExtractor;
  config: IngestorConfig;
}

interface StagedChunk {
  id: string;
  text: string;
  metadata: ChunkMetadata;
}

const failure = (error: string): IngestOutcome => ({
  success: false,
  chunksCreated: 0,
  filesProcessed: 0,
  message: "",
  error,
  partition: null,
});

const errMessage = (err: unknown) =>
  err instanceof Error ? err.message : String(err);

/**
 * Validates, extracts, chunks, embeds and writes uploaded PDFs into the
 * session's partition. A call either writes every chunk it produced or
 * none of them.
 */
export class DocumentIngestor {
  private registry: SessionIndexRegistry;
  private embeddings: EmbeddingsInterface;
  private extractor: PageExtractor;
  private config: IngestorConfig;
  private splitter: RecursiveCharacterTextSplitter;

  constructor({ registry, embeddings, extractor, config }: DocumentIngestorDeps) {
    this.registry = registry;
    this.embeddings = embeddings;
    this.extractor = extractor;
    this.config = config;
    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      separators: ["\n\n", "\n", " ", ""],
    });
  }

  validate(files: UploadedFile[]): string | null {
    const { maxFileCount, maxFileSizeMb, allowedExtensions } = this.config;

    if (!files || files.length === 0) return "No files uploaded.";

    if (files.length > maxFileCount) {
      return `Too many files. Max ${maxFileCount} PDFs allowed.`;
    }

    for (const file of files) {
      const ext = path.extname(file.name).toLowerCase();
      if (!allowedExtensions.includes(ext)) {
        return `Invalid file type: ${file.name}. Only ${allowedExtensions.join(", ")} files allowed.`;
      }

      const sizeMb = file.data.length / (1024 * 1024);
      if (sizeMb > maxFileSizeMb) {
        return `File too large: ${file.name} (${sizeMb.toFixed(2)}MB). Max ${maxFileSizeMb}MB allowed.`;
      }
    }

    return null;
  }

  private timed<T>(work: Promise<T>, label: string) {
    return withTimeout(work, this.config.collaboratorTimeoutMs, label);
  }

  /** Chunks of one file, pages in order; empty pages contribute nothing. */
  async chunkFile(file: UploadedFile, partition: string): Promise<StagedChunk[]> {
    const pages = await this.timed(
      this.extractor.extractPages(file),
      "text extraction"
    );
    const fileHash = sha256FromBuffer(file.data);
    const staged: StagedChunk[] = [];

    for (const page of pages) {
      if (page.text.trim().length === 0) continue;

      const pieces = await this.splitter.splitText(page.text);
      pieces.forEach((text, i) => {
        if (text.trim().length === 0) return;
        staged.push({
          id: uuidv5(
            `${partition}/${file.name}/${fileHash}/${page.page}/${i}`,
            uuidv5.URL
          ),
          text,
          metadata: { source: file.name, page: page.page },
        });
      });
    }

    return staged;
  }

  async ingest(files: UploadedFile[], sessionId: string): Promise<IngestOutcome> {
    const invalid = this.validate(files);
    if (invalid) return failure(invalid);

    const partitionName = this.registry.partitionNameFor(sessionId);

    // 1) extract + chunk everything before touching the index
    const staged: StagedChunk[] = [];
    let filesProcessed = 0;
    for (const file of files) {
      try {
        const chunks = await this.chunkFile(file, partitionName);
        if (chunks.length === 0) {
          console.log("No extractable text, skipping:", file.name);
          continue;
        }
        staged.push(...chunks);
        filesProcessed += 1;
        console.log(`  ${file.name}: ${chunks.length} text chunks`);
      } catch (err: unknown) {
        const error = `Error processing ${file.name}: ${errMessage(err)}`;
        console.error("INGEST_ERR:", error);
        return failure(error);
      }
    }

    if (staged.length === 0) {
      return {
        success: true,
        chunksCreated: 0,
        filesProcessed: 0,
        message: "No extractable text found; nothing was indexed.",
        partition: this.registry.getPartition(sessionId)?.name ?? null,
      };
    }

    // 2) embed + write
    const existed = this.registry.hasPartition(sessionId);
    try {
      const vectors = await this.timed(
        this.embeddings.embedDocuments(staged.map((c) => c.text)),
        "embedding"
      );
      if (vectors.length !== staged.length) {
        throw new Error(
          `Embedding count mismatch (${vectors.length} for ${staged.length} chunks)`
        );
      }

      const records: ChunkRecord[] = staged.map((c, i) => ({
        ...c,
        vector: vectors[i],
      }));

      try {
        const handle = await this.timed(
          this.registry.getOrCreatePartition(sessionId),
          "partition setup"
        );
        await this.timed(this.registry.index.add(handle, records), "index write");

        const message = `Processed ${filesProcessed} file(s) → ${records.length} chunks created`;
        console.log("Indexing done:", handle.name, message);
        return {
          success: true,
          chunksCreated: records.length,
          filesProcessed,
          message,
          partition: handle.name,
        };
      } catch (err: unknown) {
        if (!existed) await this.registry.deletePartition(sessionId);
        throw err;
      }
    } catch (err: unknown) {
      console.error("INGEST_ERR:", err);
      return failure(`Ingestion failed: ${errMessage(err)}`);
    }
  }
}
