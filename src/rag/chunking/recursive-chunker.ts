import { createHash } from "node:crypto";
import { ConfigurationError } from "../errors.js";
import type { Chunk, SourceDocument } from "../types.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";

export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", ". ", " ", ""];

/** Stable identity of a chunk: same file, page and text always hash the same. */
export function chunkId(filename: string, pageNumber: number, text: string): string {
  return createHash("sha256")
    .update(`${filename}\u0000${pageNumber}\u0000${text}`)
    .digest("hex");
}

/**
 * Recursively splits text by trying separators in order: \n\n → \n → ". " → " " → characters,
 * then greedily merges the pieces back into windows of at most `chunkSize` characters,
 * carrying up to `chunkOverlap` characters from the end of one window into the next.
 */
export class RecursiveCharacterChunker implements ChunkingStrategy {
  readonly name = "recursive-character";
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly separators: readonly string[];

  constructor(options: ChunkingOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new ConfigurationError(`Chunk size must be a positive integer, got ${options.chunkSize}`);
    }
    if (
      !Number.isInteger(options.chunkOverlap) ||
      options.chunkOverlap < 0 ||
      options.chunkOverlap >= options.chunkSize
    ) {
      throw new ConfigurationError(
        `Chunk overlap must be between 0 and chunk size (${options.chunkSize}), got ${options.chunkOverlap}`,
      );
    }
    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
  }

  split(documents: SourceDocument[]): Chunk[] {
    const chunks: Chunk[] = [];

    for (const doc of documents) {
      const text = doc.text.trim();
      if (!text) continue;

      let chunkIndex = 0;
      for (const piece of this.splitText(text)) {
        const chunkText = piece.trim();
        if (!chunkText) continue;

        const pageNumber = doc.pageNumber ?? chunkIndex + 1;
        chunks.push({
          id: chunkId(doc.filename, pageNumber, chunkText),
          text: chunkText,
          filename: doc.filename,
          pageNumber,
          sourceUrl: doc.sourceUrl,
          chunkIndex,
          ...(doc.filePath !== undefined ? { filePath: doc.filePath } : {}),
        });
        chunkIndex++;
      }
    }

    return chunks;
  }

  splitText(text: string): string[] {
    return this.recursiveSplit(text, this.separators);
  }

  private recursiveSplit(text: string, separators: readonly string[]): string[] {
    // Fall back to the last separator; if it doesn't occur the text comes back whole.
    let separator = separators[separators.length - 1] ?? "";
    let remaining: readonly string[] = [];
    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i];
      if (candidate === undefined) continue;
      if (candidate === "") {
        separator = "";
        break;
      }
      if (text.includes(candidate)) {
        separator = candidate;
        remaining = separators.slice(i + 1);
        break;
      }
    }

    const splits = splitKeepingSeparator(text, separator);

    const result: string[] = [];
    let pending: string[] = [];
    for (const piece of splits) {
      if (piece.length <= this.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        result.push(...this.mergeSplits(pending));
        pending = [];
      }
      if (remaining.length === 0) {
        // Nothing finer to split on: keep the oversized piece as its own chunk.
        const whole = piece.trim();
        if (whole) result.push(whole);
      } else {
        result.push(...this.recursiveSplit(piece, remaining));
      }
    }
    if (pending.length > 0) {
      result.push(...this.mergeSplits(pending));
    }

    return result;
  }

  /** Pieces already carry their separators, so windows are plain concatenations. */
  private mergeSplits(splits: string[]): string[] {
    const merged: string[] = [];
    const current: string[] = [];
    let total = 0;

    for (const piece of splits) {
      if (total + piece.length > this.chunkSize && current.length > 0) {
        const doc = current.join("").trim();
        if (doc) merged.push(doc);

        // Drop from the front until what's left fits the overlap budget and leaves room.
        while (total > this.chunkOverlap || (total > 0 && total + piece.length > this.chunkSize)) {
          const first = current.shift();
          if (first === undefined) break;
          total -= first.length;
        }
      }

      current.push(piece);
      total += piece.length;
    }

    const doc = current.join("").trim();
    if (doc) merged.push(doc);
    return merged;
  }
}

/** Splits on `separator`, leaving each occurrence at the end of the piece before it. */
function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === "") return Array.from(text);
  const parts = text.split(separator);
  return parts
    .map((part, i) => (i < parts.length - 1 ? part + separator : part))
    .filter((part) => part !== "");
}
