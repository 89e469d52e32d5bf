/** A file handed to the ingestor: its name and raw bytes. */
export interface UploadedFile {
  name: string;
  data: Buffer;
}

/** Provenance stored with every chunk. Pages count from 1. */
export interface ChunkMetadata {
  source: string;
  page: number;
}

/** One extracted physical page of a document. */
export interface PageText {
  page: number;
  text: string;
}

export interface ChunkRecord {
  id: string;
  text: string;
  vector: number[];
  metadata: ChunkMetadata;
}

/** Ranked search hit; `score` is absent when the backend reports none. */
export interface RetrievedChunk {
  text: string;
  metadata: ChunkMetadata;
  score?: number;
}

export type RetrievalResult = RetrievedChunk[];

export interface RelevanceVerdict {
  accepted: boolean;
  reason: string;
}

export interface IngestOutcome {
  success: boolean;
  chunksCreated: number;
  filesProcessed: number;
  message: string;
  error?: string;
  partition: string | null;
}

/** Handle to a session's collection in the vector index. */
export interface PartitionHandle {
  name: string;
}
