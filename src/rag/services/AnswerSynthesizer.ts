import logger from "../../logger";
import type {
  CompletionClient,
  PromptMessages,
  RetrievalResult,
} from "../types/rag.types";

export const NOT_FOUND_ANSWER = "Answer not found in provided documents.";

const buildSystemPrompt = (assistantName: string) =>
  `You are an AI assistant for ${assistantName}. You answer questions using only the provided document context.
Follow these guidelines:
1. Only answer based on the provided context.
2. If the answer is not in the context, reply exactly: "${NOT_FOUND_ANSWER}"
3. Be concise and accurate.
4. Mention the source when you quote specific details such as dates, times or fees.
5. Do not make up information that is not in the context.`;

export interface SynthesizedAnswer {
  answer: string;
  model: string;
  tokensUsed: number;
}

export class AnswerSynthesizer {
  constructor(
    private readonly client: CompletionClient,
    private readonly assistantName: string
  ) {}

  buildPrompt(question: string, result: RetrievalResult): PromptMessages {
    const context = result.hits
      .map(({ chunk }, i) => `[Source ${i + 1}: ${chunk.sourceId}]\n${chunk.text}`)
      .join("\n\n---\n\n");

    return {
      system: buildSystemPrompt(this.assistantName),
      user: `Context:\n${context}\n\nQuestion: ${question}`,
    };
  }

  /**
   * One completion call, no retry. The answer is returned as the model wrote
   * it; nothing checks that it is grounded in the context.
   */
  async synthesize(question: string, result: RetrievalResult): Promise<SynthesizedAnswer> {
    if (result.hits.length === 0) {
      logger.info("AnswerSynthesizer.synthesize: no relevant context", { question });
      return { answer: NOT_FOUND_ANSWER, model: this.client.model, tokensUsed: 0 };
    }

    const { content, tokensUsed } = await this.client.complete(
      this.buildPrompt(question, result)
    );
    return { answer: content, model: this.client.model, tokensUsed };
  }
}
