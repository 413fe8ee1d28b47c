export * from "./types/rag.types";
export * from "./errors";
export { loadRagConfig, RAG_DEFAULTS, type RagConfig } from "./config";
export { createRagContext, type RagContext, type RagContextOverrides } from "./context";
export { chunkDocument, chunkCorpus } from "./services/Chunker";
export { DocumentLoader } from "./services/DocumentLoader";
export { WebScraper, extractPageText, readSourceUrls } from "./services/WebScraper";
export { EmbeddingService } from "./services/EmbeddingService";
export { ChatCompletionService } from "./services/ChatCompletionService";
export { VectorStore } from "./services/VectorStore";
export { IndexBuilder } from "./services/IndexBuilder";
export { Retriever, PersistedIndex, type IndexHandle } from "./services/Retriever";
export { AnswerSynthesizer, NOT_FOUND_ANSWER } from "./services/AnswerSynthesizer";
export { RAGService, type SessionLimits } from "./services/RAGService";
export { IngestionService } from "./services/IngestionService";
