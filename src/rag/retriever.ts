import type { RetrievedChunk } from "./types.js";

export const DEFAULT_RETRIEVAL_K = 4;

/** The part of the vector store the retriever needs. */
export interface SearchableIndex {
  search(query: string, k: number): Promise<RetrievedChunk[]>;
}

export class Retriever {
  constructor(
    private readonly index: SearchableIndex,
    readonly k: number = DEFAULT_RETRIEVAL_K,
  ) {}

  retrieve(query: string): Promise<RetrievedChunk[]> {
    return this.index.search(query, this.k);
  }
}
