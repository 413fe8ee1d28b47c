import OpenAI from "openai";
import logger from "../../logger";
import { MissingCredentialError, UpstreamError, toUpstreamError } from "../errors";
import type { CompletionClient, CompletionResult, PromptMessages } from "../types/rag.types";

export interface ChatCompletionServiceOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export class ChatCompletionService implements CompletionClient {
  readonly model: string;
  private readonly openai: OpenAI;

  constructor(private readonly options: ChatCompletionServiceOptions) {
    if (!options.apiKey) throw new MissingCredentialError("OPENAI_API_KEY");
    this.model = options.model;
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(prompt: PromptMessages): Promise<CompletionResult> {
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
        max_tokens: this.options.maxTokens,
        temperature: this.options.temperature,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new UpstreamError("Chat completion", "the model returned no answer");
      }

      return { content, tokensUsed: response.usage?.total_tokens ?? 0 };
    } catch (error) {
      logger.error("ChatCompletionService.complete failed", { error, model: this.model });
      throw toUpstreamError("Chat completion", error);
    }
  }
}
