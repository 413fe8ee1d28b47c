import path from "path";
import { EnvLoader } from "../util/EnvLoader";

export const RAG_DEFAULTS = {
  HANDBOOK_DIR: "data/handbook",
  SCRAPED_DIR: "data/scraped",
  INDEX_DIR: "data/vector_store",
  SOURCES_FILE: "config/sources.json",
  CHUNK_SIZE: 500,
  CHUNK_OVERLAP: 50,
  EMBEDDING_MODEL: "text-embedding-3-small",
  EMBEDDING_DIMENSIONS: 384,
  EMBEDDING_BATCH_SIZE: 64,
  TOP_K: 3,
  MIN_RELEVANCE_SCORE: 0.2,
  CHAT_MODEL: "gpt-4o-mini",
  MAX_ANSWER_TOKENS: 512,
  CHAT_TEMPERATURE: 0.3,
  REQUEST_TIMEOUT_MS: 30_000,
  HISTORY_LIMIT: 50,
  MAX_SESSIONS: 1000,
  ASSISTANT_NAME: "the campus",
} as const;

export interface RagConfig {
  paths: {
    handbookDir: string;
    scrapedDir: string;
    indexDir: string;
    sourcesFile: string;
  };
  chunking: { maxChunkSize: number; overlapSize: number };
  embedding: { model: string; dimensions: number; batchSize: number };
  retrieval: { topK: number; minScore: number };
  completion: { model: string; maxTokens: number; temperature: number };
  openai: { apiKey?: string; baseURL?: string };
  scrapeUrls?: string[];
  assistantName: string;
  requestTimeoutMs: number;
  historyLimit: number;
  maxSessions: number;
}

const positive = (key: string, value: number): number => {
  if (value <= 0) throw new Error(`${key} must be greater than zero (got ${value}).`);
  return value;
};

const resolvePath = (value: string) => path.resolve(process.cwd(), value);

/**
 * Reads the pipeline settings from the environment once.
 * The API key is optional here; the services that need it enforce it.
 */
export function loadRagConfig(): RagConfig {
  const maxChunkSize = positive("CHUNK_SIZE", EnvLoader.getInt("CHUNK_SIZE") ?? RAG_DEFAULTS.CHUNK_SIZE);
  const overlapSize = EnvLoader.getInt("CHUNK_OVERLAP") ?? RAG_DEFAULTS.CHUNK_OVERLAP;
  if (overlapSize < 0 || overlapSize >= maxChunkSize) {
    throw new Error(
      `CHUNK_OVERLAP must be between 0 and CHUNK_SIZE - 1 (got ${overlapSize} with CHUNK_SIZE=${maxChunkSize}).`
    );
  }

  const minScore = EnvLoader.getFloat("MIN_RELEVANCE_SCORE") ?? RAG_DEFAULTS.MIN_RELEVANCE_SCORE;
  if (minScore < -1 || minScore > 1) {
    throw new Error(`MIN_RELEVANCE_SCORE must be a cosine similarity in [-1, 1] (got ${minScore}).`);
  }

  const config: RagConfig = {
    paths: {
      handbookDir: resolvePath(EnvLoader.get("HANDBOOK_DIR") ?? RAG_DEFAULTS.HANDBOOK_DIR),
      scrapedDir: resolvePath(EnvLoader.get("SCRAPED_DIR") ?? RAG_DEFAULTS.SCRAPED_DIR),
      indexDir: resolvePath(EnvLoader.get("INDEX_DIR") ?? RAG_DEFAULTS.INDEX_DIR),
      sourcesFile: resolvePath(EnvLoader.get("SOURCES_FILE") ?? RAG_DEFAULTS.SOURCES_FILE),
    },
    chunking: { maxChunkSize, overlapSize },
    embedding: {
      model: EnvLoader.get("EMBEDDING_MODEL") ?? RAG_DEFAULTS.EMBEDDING_MODEL,
      dimensions: positive(
        "EMBEDDING_DIMENSIONS",
        EnvLoader.getInt("EMBEDDING_DIMENSIONS") ?? RAG_DEFAULTS.EMBEDDING_DIMENSIONS
      ),
      batchSize: positive(
        "EMBEDDING_BATCH_SIZE",
        EnvLoader.getInt("EMBEDDING_BATCH_SIZE") ?? RAG_DEFAULTS.EMBEDDING_BATCH_SIZE
      ),
    },
    retrieval: {
      topK: positive("TOP_K", EnvLoader.getInt("TOP_K") ?? RAG_DEFAULTS.TOP_K),
      minScore,
    },
    completion: {
      model: EnvLoader.get("CHAT_MODEL") ?? RAG_DEFAULTS.CHAT_MODEL,
      maxTokens: positive(
        "MAX_ANSWER_TOKENS",
        EnvLoader.getInt("MAX_ANSWER_TOKENS") ?? RAG_DEFAULTS.MAX_ANSWER_TOKENS
      ),
      temperature: EnvLoader.getFloat("CHAT_TEMPERATURE") ?? RAG_DEFAULTS.CHAT_TEMPERATURE,
    },
    openai: {
      apiKey: EnvLoader.get("OPENAI_API_KEY"),
      baseURL: EnvLoader.get("OPENAI_BASE_URL"),
    },
    scrapeUrls: EnvLoader.getList("SCRAPE_URLS"),
    assistantName: EnvLoader.get("ASSISTANT_NAME") ?? RAG_DEFAULTS.ASSISTANT_NAME,
    requestTimeoutMs: positive(
      "REQUEST_TIMEOUT_MS",
      EnvLoader.getInt("REQUEST_TIMEOUT_MS") ?? RAG_DEFAULTS.REQUEST_TIMEOUT_MS
    ),
    historyLimit: positive("HISTORY_LIMIT", EnvLoader.getInt("HISTORY_LIMIT") ?? RAG_DEFAULTS.HISTORY_LIMIT),
    maxSessions: positive("MAX_SESSIONS", EnvLoader.getInt("MAX_SESSIONS") ?? RAG_DEFAULTS.MAX_SESSIONS),
  };

  return Object.freeze(config);
}
