import { AnswerAssembler } from "./answer-assembler.js";
import { OpenAIChatModel, type ChatModel } from "./chat-service.js";
import { getChunkingStrategy } from "./chunking/index.js";
import { RAG_CONFIG, type Settings } from "./config.js";
import { OpenAIEmbedder, type Embedder, type FetchLike } from "./embedding-service.js";
import { IngestionOrchestrator, type IngestionResult } from "./ingestion.js";
import { ManifestStore } from "./manifest-store.js";
import { Retriever } from "./retriever.js";
import { VectorStore } from "./vector-store.js";
import { PdfScraper, type PdfSource } from "../scraper/pdf-scraper.js";
import { getLogger, type Logger } from "../utils/logger.js";

export interface RagPipeline {
  orchestrator: IngestionOrchestrator;
  store: VectorStore;
  assembler: AnswerAssembler;
}

export interface ReadyRagPipeline extends RagPipeline {
  ingestion: IngestionResult;
}

export interface PipelineOverrides {
  embedder?: Embedder;
  chat?: ChatModel;
  source?: PdfSource;
  /** HTTP client for the scraper and the OpenAI calls; one per run. */
  fetch?: FetchLike;
  logger?: Logger;
  onEmbeddingProgress?: (done: number, total: number) => void;
}

/** Wires every component from settings. Nothing is read or fetched until `run` or `answer`. */
export function createRagPipeline(settings: Settings, overrides: PipelineOverrides = {}): RagPipeline {
  const logger = overrides.logger ?? getLogger();

  const embedder =
    overrides.embedder ??
    new OpenAIEmbedder({
      apiKey: settings.openaiApiKey,
      model: settings.embeddingModel,
      baseUrl: settings.openaiBaseUrl,
      fetch: overrides.fetch,
    });
  const chat =
    overrides.chat ??
    new OpenAIChatModel({
      apiKey: settings.openaiApiKey,
      model: settings.chatModel,
      baseUrl: settings.openaiBaseUrl,
      fetch: overrides.fetch,
    });

  const manifestStore = new ManifestStore(settings.manifestPath);
  const source =
    overrides.source ??
    new PdfScraper({
      downloadDir: settings.pdfDir,
      manifestStore,
      fetch: overrides.fetch,
      logger: logger.child({ component: "scraper" }),
    });

  const store = new VectorStore({
    location: settings.indexDir,
    embedder,
    logger: logger.child({ component: "vector-store" }),
    onProgress: overrides.onEmbeddingProgress,
  });

  const orchestrator = new IngestionOrchestrator({
    pdfDir: settings.pdfDir,
    seedUrls: RAG_CONFIG.seedUrls,
    source,
    manifestStore,
    chunker: getChunkingStrategy(RAG_CONFIG.defaultChunkingStrategy, {
      chunkSize: settings.chunkSize,
      chunkOverlap: settings.chunkOverlap,
    }),
    store,
    logger: logger.child({ component: "ingestion" }),
  });

  const assembler = new AnswerAssembler(
    new Retriever(store, settings.retrievalK),
    chat,
    logger.child({ component: "answer-assembler" }),
  );

  return { orchestrator, store, assembler };
}

export async function initRagPipeline(
  settings: Settings,
  options: PipelineOverrides & { forceRescrape?: boolean } = {},
): Promise<ReadyRagPipeline> {
  const pipeline = createRagPipeline(settings, options);
  const ingestion = await pipeline.orchestrator.run({ forceRescrape: options.forceRescrape });
  return { ...pipeline, ingestion };
}
