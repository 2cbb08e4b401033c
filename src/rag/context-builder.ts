import type { Answer, Chunk } from "./types.js";

export const REFUSAL_MESSAGE = "I cannot answer this based on the provided study materials.";

export const SYSTEM_PROMPT =
  "You are a Bible study assistant. " +
  "Answer the user's question using only the provided context excerpts. " +
  `If the context does not contain the answer, reply with "${REFUSAL_MESSAGE}" ` +
  "Keep answers concise and factual.";

type Provenance = Pick<Chunk, "filename" | "pageNumber">;

export function citationTag(chunk: Provenance): string {
  return `[${chunk.filename} p.${chunk.pageNumber}]`;
}

export function sourceLabel(chunk: Provenance): string {
  return `${chunk.filename} (p.${chunk.pageNumber})`;
}

/** Context block in retrieval order, nearest first. */
export function buildContext(chunks: Pick<Chunk, "filename" | "pageNumber" | "text">[]): string {
  return chunks.map((chunk) => `${citationTag(chunk)} ${chunk.text}`).join("\n\n");
}

export function buildUserPrompt(question: string, context: string): string {
  return `Question: ${question}\n\nContext:\n${context}`;
}

/** One label per (file, page), sorted so the list doesn't shift with relevance scores. */
export function collectSources(chunks: Provenance[]): string[] {
  return [...new Set(chunks.map(sourceLabel))].sort();
}

export function formatAnswer(answer: Answer): string {
  const sources = answer.sources.length > 0 ? answer.sources.join("; ") : "None";
  return `${answer.body}\n\nSources: ${sources}`;
}
