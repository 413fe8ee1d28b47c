import logger from "../../logger";
import { IndexModelMismatchError, UpstreamError } from "../errors";
import type { Embedder, RetrievalOptions, RetrievalResult } from "../types/rag.types";
import { VectorStore } from "./VectorStore";

/** Where the retriever gets its (read-only) index from. */
export interface IndexHandle {
  getIndex(): Promise<VectorStore>;
  /** Forget the loaded index so the next query reads the directory again. */
  reload(): void;
}

/**
 * Index directory loaded on first use and kept for the life of the process.
 * Failed loads are not cached, so building the index later is picked up.
 */
export class PersistedIndex implements IndexHandle {
  private loading: Promise<VectorStore> | null = null;

  constructor(
    private readonly indexDir: string,
    private readonly embedder: Pick<Embedder, "model" | "dimensions">
  ) {}

  getIndex(): Promise<VectorStore> {
    if (!this.loading) {
      this.loading = this.loadChecked().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  reload(): void {
    this.loading = null;
  }

  private async loadChecked(): Promise<VectorStore> {
    const store = await VectorStore.load(this.indexDir);
    const { embeddingModel, dimensions } = store.manifest;

    if (embeddingModel !== this.embedder.model || dimensions !== this.embedder.dimensions) {
      throw new IndexModelMismatchError(
        `${this.embedder.model} (${this.embedder.dimensions} dimensions)`,
        `${embeddingModel} (${dimensions} dimensions)`
      );
    }
    return store;
  }
}

export class Retriever {
  constructor(
    private readonly embedder: Embedder,
    private readonly index: IndexHandle,
    private readonly defaults: RetrievalOptions
  ) {}

  /**
   * Top-k chunks for a question, most similar first.
   * Throws IndexNotFoundError before anything is embedded when no index exists.
   */
  async retrieve(
    question: string,
    options: Partial<RetrievalOptions> = {}
  ): Promise<RetrievalResult> {
    const store = await this.index.getIndex();
    const settings: RetrievalOptions = { ...this.defaults, ...options };

    const [vector] = await this.embedder.embed([question]);
    if (!vector) {
      throw new UpstreamError("Embedding request", "no vector returned for the question");
    }

    const hits = await store.search(vector, settings);
    logger.debug("Retriever.retrieve completed", {
      topK: settings.topK,
      minScore: settings.minScore,
      hits: hits.length,
      bestScore: hits[0]?.score,
    });
    return { question, hits };
  }
}
