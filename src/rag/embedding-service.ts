import { z } from "zod";
import { RAG_CONFIG } from "./config.js";
import { EmbeddingError, errorMessage } from "./errors.js";

export interface Embedder {
  readonly model: string;
  embedTexts(
    texts: string[],
    onProgress?: (done: number, total: number) => void,
  ): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface OpenAIEmbedderOptions {
  apiKey: string | undefined;
  model: string;
  baseUrl?: string;
  batchSize?: number;
  concurrency?: number;
  fetch?: FetchLike;
}

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().optional() })),
});

const errorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export async function readErrorDetail(res: Response): Promise<string> {
  const text = await res.text();
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) return parsed.data.error.message;
  } catch {
    // not JSON — fall through to the raw body
  }
  return text;
}

export function resolveBaseUrl(url?: string): string {
  if (!url) return "https://api.openai.com/v1/";
  return url.endsWith("/") ? url : `${url}/`;
}

/**
 * Splits `items` into batches, runs them through `worker` with at most `concurrency`
 * batches in flight and writes every result back at its input position.
 */
export async function runBatched<T, R>(
  items: T[],
  batchSize: number,
  concurrency: number,
  worker: (batch: T[]) => Promise<R[]>,
  onProgress?: (done: number, total: number) => void,
): Promise<R[]> {
  const batches: { items: T[]; startIdx: number }[] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push({ items: items.slice(i, i + batchSize), startIdx: i });
  }

  const results: R[] = new Array<R>(items.length);
  let completed = 0;

  const queue = [...batches];
  const workers = Array.from({ length: Math.min(concurrency, queue.length) }, async () => {
    for (let batch = queue.shift(); batch; batch = queue.shift()) {
      const output = await worker(batch.items);
      if (output.length !== batch.items.length) {
        throw new EmbeddingError(
          "response",
          `Expected ${batch.items.length} embeddings, received ${output.length}`,
        );
      }
      output.forEach((value, j) => {
        results[batch.startIdx + j] = value;
      });
      completed += batch.items.length;
      onProgress?.(Math.min(completed, items.length), items.length);
    }
  });

  try {
    await Promise.all(workers);
  } finally {
    // stop the remaining workers from picking up new batches after a failure
    queue.length = 0;
  }
  return results;
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAIEmbedderOptions) {
    if (!options.apiKey) {
      throw new EmbeddingError(
        "configuration",
        "Embedding configuration missing: OPENAI_API_KEY is not set.",
      );
    }
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = resolveBaseUrl(options.baseUrl);
    this.batchSize = options.batchSize ?? RAG_CONFIG.embeddingBatchSize;
    this.concurrency = options.concurrency ?? RAG_CONFIG.embeddingConcurrency;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async embedTexts(
    texts: string[],
    onProgress?: (done: number, total: number) => void,
  ): Promise<number[][]> {
    if (texts.length === 0) return [];
    return runBatched(
      texts,
      this.batchSize,
      this.concurrency,
      (batch) => this.embedBatch(batch),
      onProgress,
    );
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([query]);
    if (!embedding) {
      throw new EmbeddingError("response", "Embedding API returned no vector for the query");
    }
    return embedding;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    let res: Response;
    try {
      res = await this.fetchImpl(new URL("embeddings", this.baseUrl), {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.model,
          input: batch,
        }),
      });
    } catch (err) {
      throw new EmbeddingError("request", `Embedding request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (!res.ok) {
      const detail = await readErrorDetail(res);
      // 401/403/404 will not fix themselves on retry: bad key or unknown model
      const kind = [401, 403, 404].includes(res.status) ? "configuration" : "request";
      throw new EmbeddingError(kind, `Embedding API error (${res.status}): ${detail}`, {
        status: res.status,
      });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new EmbeddingError("response", "Embedding API response is not JSON", { cause: err });
    }

    const parsed = embeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingError("response", "Embedding API response is malformed", {
        cause: parsed.error,
      });
    }

    // The API may return items out of order; `index` puts them back.
    const data = [...parsed.data.data];
    if (data.every((item) => item.index !== undefined)) {
      data.sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    }
    return data.map((item) => item.embedding);
  }
}
