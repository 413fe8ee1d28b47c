import type { RagConfig } from "./config";
import { AnswerSynthesizer } from "./services/AnswerSynthesizer";
import { ChatCompletionService } from "./services/ChatCompletionService";
import { DocumentLoader } from "./services/DocumentLoader";
import { EmbeddingService } from "./services/EmbeddingService";
import { IngestionService } from "./services/IngestionService";
import { RAGService } from "./services/RAGService";
import { PersistedIndex, Retriever, type IndexHandle } from "./services/Retriever";
import type { CompletionClient, Embedder } from "./types/rag.types";

/**
 * Everything a request or a batch job needs, built once and passed down.
 */
export interface RagContext {
  config: RagConfig;
  embedder: Embedder;
  completion: CompletionClient;
  index: IndexHandle;
  retriever: Retriever;
  synthesizer: AnswerSynthesizer;
  rag: RAGService;
  ingestion: IngestionService;
}

/** Tests swap the network-bound pieces for fakes. */
export interface RagContextOverrides {
  embedder?: Embedder;
  completion?: CompletionClient;
  index?: IndexHandle;
  loader?: DocumentLoader;
}

/**
 * Throws MissingCredentialError when OPENAI_API_KEY is absent and no fake
 * embedder/completion client is supplied.
 */
export function createRagContext(
  config: RagConfig,
  overrides: RagContextOverrides = {}
): RagContext {
  const { apiKey, baseURL } = config.openai;

  const embedder =
    overrides.embedder ??
    new EmbeddingService({
      apiKey,
      baseURL,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions,
      timeoutMs: config.requestTimeoutMs,
    });

  const completion =
    overrides.completion ??
    new ChatCompletionService({
      apiKey,
      baseURL,
      model: config.completion.model,
      maxTokens: config.completion.maxTokens,
      temperature: config.completion.temperature,
      timeoutMs: config.requestTimeoutMs,
    });

  const index = overrides.index ?? new PersistedIndex(config.paths.indexDir, embedder);
  const retriever = new Retriever(embedder, index, config.retrieval);
  const synthesizer = new AnswerSynthesizer(completion, config.assistantName);

  return {
    config,
    embedder,
    completion,
    index,
    retriever,
    synthesizer,
    rag: new RAGService(retriever, synthesizer, {
      historyLimit: config.historyLimit,
      maxSessions: config.maxSessions,
    }),
    ingestion: new IngestionService(
      overrides.loader ?? new DocumentLoader(),
      embedder,
      {
        handbookDir: config.paths.handbookDir,
        scrapedDir: config.paths.scrapedDir,
        indexDir: config.paths.indexDir,
        chunking: config.chunking,
        embeddingBatchSize: config.embedding.batchSize,
      }
    ),
  };
}
