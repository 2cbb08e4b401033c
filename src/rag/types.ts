export interface PageContent {
  pageNumber: number;
  text: string;
}

export interface ExtractionFailure {
  strategy: string;
  reason: string;
}

export interface ExtractedDocument {
  source: string;
  filePath: string;
  pages: PageContent[];
  /** Name of the strategy whose output was kept, or null when none produced text. */
  strategy: string | null;
  failures: ExtractionFailure[];
}

/** One unit of text handed to the chunker, usually a single PDF page. */
export interface SourceDocument {
  text: string;
  filename: string;
  pageNumber?: number;
  sourceUrl: string;
  filePath?: string;
}

export interface Chunk {
  id: string;
  text: string;
  filename: string;
  pageNumber: number;
  sourceUrl: string;
  chunkIndex: number;
  filePath?: string;
}

export interface RetrievedChunk extends Chunk {
  score: number;
}

export interface Answer {
  body: string;
  sources: string[];
}

/** filename -> source URL */
export type Manifest = Record<string, string>;
