import type { RetrievedChunk } from "../types/ragTypes";

export const SOURCES_MARKER = "📄 **Sources:**";

/**
 * "a.pdf (page 3), b.pdf (page 1)": one entry per (source, page), sorted by
 * source then page. Empty string for no chunks.
 */
export function formatCitations(chunks: readonly RetrievedChunk[]): string {
  const seen = new Map<string, { source: string; page: number }>();
  for (const { metadata } of chunks) {
    const key = `${metadata.source}\u0000${metadata.page}`;
    if (!seen.has(key)) seen.set(key, { source: metadata.source, page: metadata.page });
  }

  return [...seen.values()]
    .sort((a, b) =>
      a.source < b.source ? -1 : a.source > b.source ? 1 : a.page - b.page
    )
    .map(({ source, page }) => `${source} (page ${page})`)
    .join(", ");
}

export const appendCitations = (answer: string, citations: string) =>
  citations ? `${answer}\n\n${SOURCES_MARKER} ${citations}` : answer;
