import type { Chunk, SourceDocument } from "../types.js";

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: readonly string[];
}

export interface ChunkingStrategy {
  readonly name: string;
  split(documents: SourceDocument[]): Chunk[];
}
