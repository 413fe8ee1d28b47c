export type DocumentKind = "pdf" | "web" | "text";

export interface Document {
  /** File path or URL the text came from. */
  sourceId: string;
  kind: DocumentKind;
  rawText: string;
}

export interface Chunk {
  chunkId: string;
  sourceId: string;
  chunkIndex: number;
  text: string;
  /** Offset of `text` inside the source document's raw text. */
  startOffset: number;
}

export interface ChunkingOptions {
  maxChunkSize: number;
  overlapSize: number;
}

export interface RetrievalOptions {
  topK: number;
  minScore: number;
}

export interface RetrievedChunk {
  chunk: Chunk;
  score: number;
}

export interface RetrievalResult {
  question: string;
  hits: RetrievedChunk[];
}

export interface IndexManifest {
  formatVersion: 1;
  embeddingModel: string;
  dimensions: number;
  metric: "cosine";
  chunkCount: number;
  sources: string[];
  builtAt: string;
}

export interface PromptMessages {
  system: string;
  user: string;
}

export interface CompletionResult {
  content: string;
  tokensUsed: number;
}

/** Anything that turns text into fixed-dimension vectors. */
export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
}

export interface CompletionClient {
  readonly model: string;
  complete(prompt: PromptMessages): Promise<CompletionResult>;
}

export interface RAGSource {
  chunkId: string;
  sourceId: string;
  relevanceScore: number;
  snippet: string;
}

export interface RAGResponseMetadata {
  model: string;
  chunksUsed: number;
  processingTimeMs: number;
  tokensUsed?: number;
}

export interface RAGChatResponse {
  answer: string;
  sessionId: string;
  sources: RAGSource[];
  metadata: RAGResponseMetadata;
}

export interface ConversationTurn {
  question: string;
  answer: string;
  sources: RAGSource[];
  askedAt: Date;
}

export interface ChatSession {
  id: string;
  turns: ConversationTurn[];
  createdAt: Date;
  updatedAt: Date;
}

export interface IndexBuildReport {
  indexDir: string;
  documentsLoaded: number;
  chunksIndexed: number;
  skipped: Array<{ source: string; code: string; reason: string }>;
  processingTimeMs: number;
}
