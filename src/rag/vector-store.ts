import { access, rename, rm } from "node:fs/promises";
import path from "node:path";
import { LocalIndex } from "vectra";
import { RAG_CONFIG } from "./config.js";
import type { Embedder } from "./embedding-service.js";
import { EmbeddingError, IndexNotFoundError, IndexNotOpenError } from "./errors.js";
import type { Chunk, RetrievedChunk } from "./types.js";
import { getLogger, type Logger } from "../utils/logger.js";

export interface VectorStoreOptions {
  location: string;
  embedder: Embedder;
  logger?: Logger;
  onProgress?: (done: number, total: number) => void;
}

interface StoredItem {
  id: string;
  vector: number[];
  metadata: Record<string, unknown>;
}

/**
 * Cosine similarity. Both build and search go through this, so the ranking
 * never depends on a backend default.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  a.forEach((x, i) => {
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  });
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function chunkMetadata(chunk: Chunk) {
  return {
    text: chunk.text,
    filename: chunk.filename,
    pageNumber: chunk.pageNumber,
    sourceUrl: chunk.sourceUrl,
    chunkIndex: chunk.chunkIndex,
  };
}

function toChunk(item: StoredItem): Chunk | null {
  const { text, filename, pageNumber, sourceUrl, chunkIndex } = item.metadata;
  if (
    typeof text !== "string" ||
    typeof filename !== "string" ||
    typeof pageNumber !== "number" ||
    typeof sourceUrl !== "string" ||
    typeof chunkIndex !== "number"
  ) {
    return null;
  }
  return { id: item.id, text, filename, pageNumber, sourceUrl, chunkIndex };
}

function uniqueById(chunks: Chunk[]): Chunk[] {
  const seen = new Set<string>();
  return chunks.filter((chunk) => {
    if (seen.has(chunk.id)) return false;
    seen.add(chunk.id);
    return true;
  });
}

/**
 * Persistent vector index over chunks, stored as a vectra LocalIndex directory.
 * One writer at a time; readers must `load()` again to see a rebuild.
 */
export class VectorStore {
  readonly location: string;
  private readonly embedder: Embedder;
  private readonly logger: Logger;
  private readonly onProgress: ((done: number, total: number) => void) | undefined;
  private index: LocalIndex | null = null;

  constructor(options: VectorStoreOptions) {
    this.location = path.resolve(options.location);
    this.embedder = options.embedder;
    this.logger = options.logger ?? getLogger().child({ component: "vector-store" });
    this.onProgress = options.onProgress;
  }

  get isOpen(): boolean {
    return this.index !== null;
  }

  /** True only when the index file itself exists; an empty directory doesn't count. */
  async exists(): Promise<boolean> {
    try {
      await access(path.join(this.location, RAG_CONFIG.indexFile));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Embeds every chunk, then writes a fresh index. Nothing touches disk until all
   * embeddings are in hand, and the old index is only replaced once the new one is complete.
   * Returns the number of chunks written after dropping repeated ids.
   */
  async build(chunks: Chunk[]): Promise<number> {
    const unique = uniqueById(chunks);
    this.logger.info({ chunks: unique.length, location: this.location }, "building vector index");
    const vectors = await this.embed(unique);

    const stagingPath = `${this.location}.staging`;
    await rm(stagingPath, { recursive: true, force: true });
    const staging = new LocalIndex(stagingPath);
    await staging.createIndex({ version: 1, deleteIfExists: true });
    await this.insertAll(staging, unique, vectors);

    await rm(this.location, { recursive: true, force: true });
    await rename(stagingPath, this.location);
    this.index = new LocalIndex(this.location);
    this.logger.info({ chunks: unique.length }, "vector index built");
    return unique.length;
  }

  async load(): Promise<void> {
    if (!(await this.exists())) {
      throw new IndexNotFoundError(this.location);
    }
    const index = new LocalIndex(this.location);
    const items = await index.listItems();
    this.index = index;
    this.logger.info({ chunks: items.length, location: this.location }, "vector index loaded");
  }

  /** Appends chunks not already stored; ids already present are neither embedded nor written. */
  async add(chunks: Chunk[]): Promise<number> {
    const index = this.requireIndex();

    const fresh: Chunk[] = [];
    for (const chunk of uniqueById(chunks)) {
      if (!(await index.getItem(chunk.id))) fresh.push(chunk);
    }
    if (fresh.length === 0) {
      this.logger.info("no new chunks to add");
      return 0;
    }

    const vectors = await this.embed(fresh);
    const [existing] = await index.listItems();
    const dimensions = vectors[0]?.length;
    if (existing && dimensions !== undefined && existing.vector.length !== dimensions) {
      throw new EmbeddingError(
        "configuration",
        `Embedding dimension ${dimensions} does not match index dimension ${existing.vector.length}. Rebuild the index after changing EMBEDDING_MODEL.`,
      );
    }

    await this.insertAll(index, fresh, vectors);
    this.logger.info({ added: fresh.length }, "chunks added to vector index");
    return fresh.length;
  }

  async search(query: string, k: number): Promise<RetrievedChunk[]> {
    const index = this.requireIndex();
    if (!Number.isInteger(k) || k <= 0) {
      throw new RangeError(`k must be a positive integer, got ${k}`);
    }

    const items: StoredItem[] = await index.listItems();
    if (items.length === 0) return [];

    const queryVector = await this.embedder.embedQuery(query);
    const scored = items
      .map((item) => ({ item, score: cosineSimilarity(queryVector, item.vector) }))
      .sort((a, b) => b.score - a.score || a.item.id.localeCompare(b.item.id));

    const results: RetrievedChunk[] = [];
    for (const { item, score } of scored) {
      if (results.length >= k) break;
      const chunk = toChunk(item);
      if (!chunk) {
        this.logger.warn({ id: item.id }, "skipping index item with malformed metadata");
        continue;
      }
      results.push({ ...chunk, score });
    }
    return results;
  }

  async size(): Promise<number> {
    const items = await this.requireIndex().listItems();
    return items.length;
  }

  private requireIndex(): LocalIndex {
    if (!this.index) throw new IndexNotOpenError();
    return this.index;
  }

  private async embed(chunks: Chunk[]): Promise<number[][]> {
    const vectors = await this.embedder.embedTexts(
      chunks.map((c) => c.text),
      this.onProgress,
    );
    if (vectors.length !== chunks.length) {
      throw new EmbeddingError(
        "response",
        `Expected ${chunks.length} embeddings, received ${vectors.length}`,
      );
    }
    const dimensions = vectors[0]?.length;
    if (vectors.some((v) => v.length === 0 || v.length !== dimensions)) {
      throw new EmbeddingError("response", "Embedding vectors have inconsistent dimensions");
    }
    return vectors;
  }

  private async insertAll(index: LocalIndex, chunks: Chunk[], vectors: number[][]): Promise<void> {
    await index.beginUpdate();
    try {
      for (let i = 0; i < chunks.length; i++) {
        const chunk = chunks[i];
        const vector = vectors[i];
        if (!chunk || !vector) continue;
        await index.insertItem({
          id: chunk.id,
          vector,
          metadata: chunkMetadata(chunk),
        });
      }
      await index.endUpdate();
    } catch (err) {
      index.cancelUpdate();
      throw err;
    }
  }
}
