export type RagErrorCode =
  | "CONFIGURATION"
  | "MANIFEST"
  | "EXTRACTION"
  | "DOWNLOAD"
  | "EMBEDDING"
  | "GENERATION"
  | "INDEX_NOT_FOUND"
  | "INDEX_NOT_OPEN"
  | "NO_PDFS"
  | "NO_DOCUMENTS";

export class RagError extends Error {
  readonly code: RagErrorCode;

  constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or invalid setting. Fatal at startup. */
export class ConfigurationError extends RagError {
  constructor(message: string, readonly remediation?: string) {
    super("CONFIGURATION", message);
  }
}

export class ManifestError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MANIFEST", message, options);
  }
}

export class ExtractionError extends RagError {
  constructor(
    readonly filePath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("EXTRACTION", message, options);
  }
}

export class DownloadError extends RagError {
  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("DOWNLOAD", message, options);
  }
}

/**
 * `configuration` means the backend cannot be used at all (no key, bad model),
 * `request` a failed or rejected HTTP call, `response` a payload we could not use.
 */
export type EmbeddingErrorKind = "configuration" | "request" | "response";

export class EmbeddingError extends RagError {
  readonly status: number | undefined;

  constructor(
    readonly kind: EmbeddingErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super("EMBEDDING", message, options);
    this.status = options?.status;
  }
}

export class GenerationError extends RagError {
  readonly status: number | undefined;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("GENERATION", message, options);
    this.status = options?.status;
  }
}

export class IndexNotFoundError extends RagError {
  constructor(readonly location: string) {
    super("INDEX_NOT_FOUND", `No vector index found at ${location}`);
  }
}

export class IndexNotOpenError extends RagError {
  constructor() {
    super("INDEX_NOT_OPEN", "No vector index loaded. Build or load one first.");
  }
}

export class NoPdfsError extends RagError {
  constructor() {
    super("NO_PDFS", "No PDFs were downloaded");
  }
}

export class NoDocumentsError extends RagError {
  constructor() {
    super("NO_DOCUMENTS", "No documents were extracted from PDFs");
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
