import path from "node:path";
import type { ChunkingStrategy } from "./chunking/index.js";
import { ExtractionError, NoDocumentsError, NoPdfsError } from "./errors.js";
import { listLocalPdfs, type ManifestStore } from "./manifest-store.js";
import { DEFAULT_STRATEGIES, extractPdf, type PdfTextStrategy } from "./pdf-extractor.js";
import type { Chunk, SourceDocument } from "./types.js";
import type { VectorStore } from "./vector-store.js";
import type { PdfSource } from "../scraper/pdf-scraper.js";
import { getLogger, type Logger } from "../utils/logger.js";

export type IngestionState = "NeedDownload" | "NeedProcessing" | "NeedIndexing" | "Ready";

export interface LocalState {
  pdfCount: number;
  indexExists: boolean;
  forceRescrape: boolean;
}

export function initialState({ pdfCount, indexExists, forceRescrape }: LocalState): IngestionState {
  if (forceRescrape || pdfCount === 0) return "NeedDownload";
  return indexExists ? "Ready" : "NeedProcessing";
}

/** A forced run never reuses the old index, even when it is still valid. */
export function stateAfterDownload({
  indexExists,
  forceRescrape,
}: Omit<LocalState, "pdfCount">): IngestionState {
  if (forceRescrape) return "NeedProcessing";
  return indexExists ? "Ready" : "NeedProcessing";
}

export interface IngestionDeps {
  pdfDir: string;
  seedUrls: readonly string[];
  source: PdfSource;
  manifestStore: ManifestStore;
  chunker: ChunkingStrategy;
  store: VectorStore;
  strategies?: readonly PdfTextStrategy[];
  logger?: Logger;
}

export interface IngestionOptions {
  forceRescrape?: boolean;
}

export interface IngestionResult {
  /** Every state visited, in order, ending with "Ready". */
  states: IngestionState[];
  /** Chunks written in this run; zero when an existing index was reused. */
  chunkCount: number;
}

export class IngestionOrchestrator {
  private readonly logger: Logger;
  private readonly strategies: readonly PdfTextStrategy[];

  constructor(private readonly deps: IngestionDeps) {
    this.logger = deps.logger ?? getLogger().child({ component: "ingestion" });
    this.strategies = deps.strategies ?? DEFAULT_STRATEGIES;
  }

  /** Drives the store to a loaded, searchable index, doing only the work still missing. */
  async run(options: IngestionOptions = {}): Promise<IngestionResult> {
    const { source, store, seedUrls, pdfDir } = this.deps;
    const forceRescrape = options.forceRescrape ?? false;

    let pdfs = await listLocalPdfs(pdfDir);
    let state = initialState({
      pdfCount: pdfs.length,
      indexExists: await store.exists(),
      forceRescrape,
    });
    const states: IngestionState[] = [state];
    let chunks: Chunk[] = [];
    let written: number | null = null;

    this.logger.info({ state, localPdfs: pdfs.length, forceRescrape }, "starting ingestion");

    while (state !== "Ready") {
      switch (state) {
        case "NeedDownload": {
          const result = await source.scrapeAndDownload(seedUrls, { force: forceRescrape });
          if (result.files.length === 0) throw new NoPdfsError();
          pdfs = forceRescrape ? result.files : await listLocalPdfs(pdfDir);
          state = stateAfterDownload({ indexExists: await store.exists(), forceRescrape });
          break;
        }
        case "NeedProcessing": {
          chunks = await this.processPdfs(pdfs);
          state = "NeedIndexing";
          break;
        }
        case "NeedIndexing": {
          written = await store.build(chunks);
          state = "Ready";
          break;
        }
      }
      states.push(state);
      this.logger.info({ state }, "ingestion state");
    }

    if (written === null) {
      await store.load();
    }

    return { states, chunkCount: written ?? 0 };
  }

  /** Extracts, chunks and appends the given PDFs, creating the index when there is none. */
  async addPdfs(pdfPaths: string[]): Promise<number> {
    const { store } = this.deps;
    const chunks = await this.processPdfs(pdfPaths);

    if (!(await store.exists())) {
      return store.build(chunks);
    }
    if (!store.isOpen) await store.load();
    return store.add(chunks);
  }

  /** Pages of every PDF, chunked. Files that yield nothing are skipped; no text at all is fatal. */
  async processPdfs(pdfPaths: string[]): Promise<Chunk[]> {
    const manifest = await this.deps.manifestStore.load();
    const documents: SourceDocument[] = [];

    this.logger.info({ count: pdfPaths.length }, "processing PDF files");
    for (const filePath of pdfPaths) {
      const doc = await extractPdf(filePath, this.strategies);
      for (const failure of doc.failures) {
        const err = new ExtractionError(doc.filePath, `${failure.strategy}: ${failure.reason}`);
        this.logger.warn({ file: doc.source, strategy: failure.strategy, err }, "extraction attempt failed");
      }
      if (doc.pages.length === 0) {
        this.logger.warn({ file: doc.source }, "no text extracted, skipping");
        continue;
      }

      const filename = path.basename(filePath);
      for (const page of doc.pages) {
        documents.push({
          text: page.text,
          filename,
          pageNumber: page.pageNumber,
          sourceUrl: manifest[filename] ?? "",
          filePath: doc.filePath,
        });
      }
      this.logger.debug({ file: filename, pages: doc.pages.length, strategy: doc.strategy }, "extracted");
    }

    if (documents.length === 0) throw new NoDocumentsError();

    const chunks = this.deps.chunker.split(documents);
    this.logger.info({ pages: documents.length, chunks: chunks.length }, "chunked documents");
    return chunks;
  }
}
