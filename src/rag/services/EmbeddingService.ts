import OpenAI from "openai";
import logger from "../../logger";
import { MissingCredentialError, toUpstreamError } from "../errors";
import type { Embedder } from "../types/rag.types";

const MAX_INPUT_CHARS = 8000;

export interface EmbeddingServiceOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
}

/** OpenAI embeddings endpoint behind the Embedder interface. */
export class EmbeddingService implements Embedder {
  readonly model: string;
  readonly dimensions: number;
  private readonly openai: OpenAI;

  constructor(options: EmbeddingServiceOptions) {
    if (!options.apiKey) throw new MissingCredentialError("OPENAI_API_KEY");
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.openai.embeddings.create({
        model: this.model,
        input: texts.map((t) => t.slice(0, MAX_INPUT_CHARS)),
        dimensions: this.dimensions,
      });

      if (response.data.length !== texts.length) {
        throw new Error(
          `expected ${texts.length} embeddings, received ${response.data.length}`
        );
      }

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
    } catch (error) {
      logger.error("EmbeddingService.embed failed", { error, inputs: texts.length });
      throw toUpstreamError("Embedding request", error);
    }
  }
}
