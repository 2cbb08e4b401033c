import { z } from "zod";
import { RAG_CONFIG } from "./config.js";
import { GenerationError, errorMessage } from "./errors.js";
import { readErrorDetail, resolveBaseUrl, type FetchLike } from "./embedding-service.js";

export interface ChatRequest {
  system: string;
  user: string;
}

export interface ChatModel {
  readonly model: string;
  complete(request: ChatRequest): Promise<string>;
}

export interface OpenAIChatModelOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature?: number;
  fetch?: FetchLike;
}

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

export class OpenAIChatModel implements ChatModel {
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly temperature: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAIChatModelOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = resolveBaseUrl(options.baseUrl);
    this.temperature = options.temperature ?? RAG_CONFIG.chatTemperature;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async complete(request: ChatRequest): Promise<string> {
    let res: Response;
    try {
      res = await this.fetchImpl(new URL("chat/completions", this.baseUrl), {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.model,
          temperature: this.temperature,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.user },
          ],
        }),
      });
    } catch (err) {
      throw new GenerationError(`Chat request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) {
      const detail = await readErrorDetail(res);
      throw new GenerationError(`API error (${res.status}): ${detail}`, { status: res.status });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new GenerationError("Chat API response is not JSON", { cause: err });
    }

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GenerationError("Chat API response is malformed", { cause: parsed.error });
    }

    const content = parsed.data.choices[0]?.message.content;
    if (!content) {
      throw new GenerationError("Chat API returned an empty reply");
    }
    return content.trim();
  }
}
