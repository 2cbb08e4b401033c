import { ConfigurationError } from "../errors.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";
import { RecursiveCharacterChunker } from "./recursive-chunker.js";

type ChunkingStrategyFactory = (options: ChunkingOptions) => ChunkingStrategy;

const registry = new Map<string, ChunkingStrategyFactory>();

export function registerChunkingStrategy(name: string, factory: ChunkingStrategyFactory): void {
  registry.set(name, factory);
}

export function getChunkingStrategy(name: string, options: ChunkingOptions): ChunkingStrategy {
  const factory = registry.get(name);
  if (!factory) {
    throw new ConfigurationError(`Unknown chunking strategy: ${name}`);
  }
  return factory(options);
}

// Register defaults
registerChunkingStrategy("recursive-character", (options) => new RecursiveCharacterChunker(options));

export { RecursiveCharacterChunker, DEFAULT_SEPARATORS, chunkId } from "./recursive-chunker.js";
export type { ChunkingOptions, ChunkingStrategy } from "./types.js";
