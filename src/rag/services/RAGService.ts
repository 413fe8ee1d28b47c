import { v4 as uuidv4 } from "uuid";
import logger from "../../logger";
import { InvalidQuestionError } from "../errors";
import type { ChatSession, RAGChatResponse, RAGSource } from "../types/rag.types";
import type { AnswerSynthesizer } from "./AnswerSynthesizer";
import type { Retriever } from "./Retriever";

const SNIPPET_LENGTH = 200;

export interface SessionLimits {
  /** Turns kept per session, oldest dropped first. */
  historyLimit: number;
  /** Sessions kept in memory; the least recently used one is evicted past this. */
  maxSessions: number;
}

/**
 * ask(question) -> answer, plus per-session turn history kept in memory only.
 */
export class RAGService {
  // Insertion order doubles as recency order: a session is re-inserted on every turn
  private sessions: Map<string, ChatSession> = new Map();

  constructor(
    private readonly retriever: Retriever,
    private readonly synthesizer: AnswerSynthesizer,
    private readonly limits: SessionLimits
  ) {}

  async ask(question: string, sessionId?: string): Promise<RAGChatResponse> {
    const startTime = Date.now();
    const trimmed = question.trim();
    if (!trimmed) throw new InvalidQuestionError("question is empty");

    try {
      const retrieval = await this.retriever.retrieve(trimmed);
      const { answer, model, tokensUsed } = await this.synthesizer.synthesize(trimmed, retrieval);

      const sources: RAGSource[] = retrieval.hits.map(({ chunk, score }) => ({
        chunkId: chunk.chunkId,
        sourceId: chunk.sourceId,
        relevanceScore: score,
        snippet:
          chunk.text.length > SNIPPET_LENGTH
            ? chunk.text.slice(0, SNIPPET_LENGTH) + "..."
            : chunk.text,
      }));

      const session = this.resolveSession(sessionId);
      session.turns.push({ question: trimmed, answer, sources, askedAt: new Date() });
      if (session.turns.length > this.limits.historyLimit) {
        session.turns.splice(0, session.turns.length - this.limits.historyLimit);
      }
      session.updatedAt = new Date();
      this.touch(session);

      const processingTimeMs = Date.now() - startTime;
      logger.info("RAGService.ask completed", {
        sessionId: session.id,
        chunksUsed: sources.length,
        processingTimeMs,
      });

      return {
        answer,
        sessionId: session.id,
        sources,
        metadata: { model, chunksUsed: sources.length, processingTimeMs, tokensUsed },
      };
    } catch (error) {
      logger.error("RAGService.ask failed", { error, sessionId });
      throw error;
    }
  }

  getSession(sessionId: string): ChatSession | undefined {
    return this.sessions.get(sessionId);
  }

  clearSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private resolveSession(sessionId?: string): ChatSession {
    const existing = sessionId ? this.sessions.get(sessionId) : undefined;
    if (existing) return existing;

    return {
      id: uuidv4(),
      turns: [],
      createdAt: new Date(),
      updatedAt: new Date(),
    };
  }

  private touch(session: ChatSession): void {
    this.sessions.delete(session.id);
    this.sessions.set(session.id, session);

    for (const staleId of this.sessions.keys()) {
      if (this.sessions.size <= this.limits.maxSessions) break;
      this.sessions.delete(staleId);
      logger.debug("RAGService evicted idle session", { sessionId: staleId });
    }
  }
}
