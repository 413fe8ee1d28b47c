import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { RAG_DEFAULTS, loadRagConfig } from "../config";

const VARIABLES = [
  "HANDBOOK_DIR",
  "SCRAPED_DIR",
  "INDEX_DIR",
  "SOURCES_FILE",
  "CHUNK_SIZE",
  "CHUNK_OVERLAP",
  "EMBEDDING_MODEL",
  "EMBEDDING_DIMENSIONS",
  "EMBEDDING_BATCH_SIZE",
  "TOP_K",
  "MIN_RELEVANCE_SCORE",
  "CHAT_MODEL",
  "MAX_ANSWER_TOKENS",
  "CHAT_TEMPERATURE",
  "OPENAI_API_KEY",
  "OPENAI_BASE_URL",
  "SCRAPE_URLS",
  "ASSISTANT_NAME",
  "REQUEST_TIMEOUT_MS",
  "HISTORY_LIMIT",
  "MAX_SESSIONS",
];

const clearEnvironment = () => {
  for (const name of VARIABLES) vi.stubEnv(name, "");
};

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("loadRagConfig", () => {
  it("falls back to the defaults", () => {
    clearEnvironment();

    const config = loadRagConfig();

    expect(config.paths.indexDir).toBe(path.resolve(process.cwd(), "data/vector_store"));
    expect(config.chunking).toEqual({ maxChunkSize: 500, overlapSize: 50 });
    expect(config.embedding).toEqual({
      model: RAG_DEFAULTS.EMBEDDING_MODEL,
      dimensions: 384,
      batchSize: 64,
    });
    expect(config.retrieval).toEqual({ topK: 3, minScore: 0.2 });
    expect(config.completion).toEqual({ model: "gpt-4o-mini", maxTokens: 512, temperature: 0.3 });
    expect(config.openai).toEqual({ apiKey: undefined, baseURL: undefined });
    expect(config.scrapeUrls).toBeUndefined();
    expect(config.maxSessions).toBe(1000);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("reads overrides from the environment", () => {
    clearEnvironment();
    vi.stubEnv("CHUNK_SIZE", "800");
    vi.stubEnv("CHUNK_OVERLAP", "100");
    vi.stubEnv("TOP_K", "5");
    vi.stubEnv("MIN_RELEVANCE_SCORE", "0.35");
    vi.stubEnv("OPENAI_API_KEY", "test-secret");
    vi.stubEnv("SCRAPE_URLS", "https://www.example.edu/, https://www.example.edu/fees,");
    vi.stubEnv("INDEX_DIR", "/srv/index");

    const config = loadRagConfig();

    expect(config.chunking).toEqual({ maxChunkSize: 800, overlapSize: 100 });
    expect(config.retrieval).toEqual({ topK: 5, minScore: 0.35 });
    expect(config.openai.apiKey).toBe("test-secret");
    expect(config.scrapeUrls).toEqual(["https://www.example.edu/", "https://www.example.edu/fees"]);
    expect(config.paths.indexDir).toBe(path.resolve("/srv/index"));
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    clearEnvironment();
    vi.stubEnv("CHUNK_SIZE", "100");
    vi.stubEnv("CHUNK_OVERLAP", "100");

    expect(() => loadRagConfig()).toThrow(
      "CHUNK_OVERLAP must be between 0 and CHUNK_SIZE - 1 (got 100 with CHUNK_SIZE=100)."
    );
  });

  it("rejects malformed numbers", () => {
    clearEnvironment();
    vi.stubEnv("TOP_K", "three");

    expect(() => loadRagConfig()).toThrow('Environment variable "TOP_K" must be an integer.');
  });

  it("rejects a threshold outside the cosine range", () => {
    clearEnvironment();
    vi.stubEnv("MIN_RELEVANCE_SCORE", "1.5");

    expect(() => loadRagConfig()).toThrow("MIN_RELEVANCE_SCORE must be a cosine similarity in [-1, 1] (got 1.5).");
  });

  it("rejects non-positive sizes", () => {
    clearEnvironment();
    vi.stubEnv("HISTORY_LIMIT", "0");

    expect(() => loadRagConfig()).toThrow("HISTORY_LIMIT must be greater than zero (got 0).");
  });
});
