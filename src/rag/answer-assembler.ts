import type { ChatModel } from "./chat-service.js";
import {
  REFUSAL_MESSAGE,
  SYSTEM_PROMPT,
  buildContext,
  buildUserPrompt,
  collectSources,
} from "./context-builder.js";
import { GenerationError, errorMessage } from "./errors.js";
import type { Answer, RetrievedChunk } from "./types.js";
import { getLogger, type Logger } from "../utils/logger.js";

export interface ChunkRetriever {
  retrieve(query: string): Promise<RetrievedChunk[]>;
}

export class AnswerAssembler {
  private readonly logger: Logger;

  constructor(
    private readonly retriever: ChunkRetriever,
    private readonly chat: ChatModel,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger().child({ component: "answer-assembler" });
  }

  async answer(question: string): Promise<Answer> {
    const chunks = await this.retriever.retrieve(question);
    if (chunks.length === 0) {
      this.logger.debug({ question }, "no context retrieved, refusing");
      return { body: REFUSAL_MESSAGE, sources: [] };
    }

    const context = buildContext(chunks);
    let body: string;
    try {
      body = await this.chat.complete({
        system: SYSTEM_PROMPT,
        user: buildUserPrompt(question, context),
      });
    } catch (err) {
      if (err instanceof GenerationError) throw err;
      throw new GenerationError(`Chat model failed: ${errorMessage(err)}`, { cause: err });
    }

    return { body, sources: collectSources(chunks) };
  }
}
