import logger from "../../logger";
import { IndexBuildError, foldOutcomes, type BatchOutcome, type Outcome } from "../errors";
import type { Chunk, Embedder } from "../types/rag.types";
import { VectorStore, type IndexEntry } from "./VectorStore";

export interface IndexBuildResult {
  store: VectorStore;
  outcome: BatchOutcome<IndexEntry>;
}

/**
 * Embeds every chunk and assembles a fresh VectorStore.
 * Chunks that cannot be embedded are skipped and reported, never fatal,
 * unless none at all can be embedded.
 */
export class IndexBuilder {
  constructor(
    private readonly embedder: Embedder,
    private readonly batchSize: number
  ) {}

  async build(chunks: Chunk[]): Promise<IndexBuildResult> {
    const outcomes: Outcome<IndexEntry>[] = [];
    const embeddable: Chunk[] = [];

    // Two files naming the same page share a sourceId, hence chunk ids; the first one wins
    const seenIds = new Set<string>();
    for (const chunk of chunks) {
      if (seenIds.has(chunk.chunkId)) {
        outcomes.push(this.failed(chunk, "duplicate chunk id"));
      } else if (!chunk.text.trim()) {
        outcomes.push(this.failed(chunk, "chunk has no text"));
      } else {
        seenIds.add(chunk.chunkId);
        embeddable.push(chunk);
      }
    }

    for (let i = 0; i < embeddable.length; i += this.batchSize) {
      const batch = embeddable.slice(i, i + this.batchSize);
      outcomes.push(...(await this.embedBatch(batch)));
    }

    const outcome = foldOutcomes(outcomes);
    for (const { source, error } of outcome.skipped) {
      logger.warn("IndexBuilder.build skipped chunk", { chunkId: source, reason: error.message });
    }

    if (outcome.succeeded.length === 0) {
      throw new IndexBuildError(null, `none of ${chunks.length} chunks could be embedded`);
    }

    // Batches run in corpus order, so succeeded entries are already in insertion order
    const entries = outcome.succeeded;
    const store = await VectorStore.create({
      embeddingModel: this.embedder.model,
      dimensions: this.embedder.dimensions,
      entries,
    });

    logger.info("IndexBuilder.build completed", {
      chunksIndexed: entries.length,
      chunksSkipped: outcome.skipped.length,
    });
    return { store, outcome };
  }

  private async embedBatch(batch: Chunk[]): Promise<Outcome<IndexEntry>[]> {
    try {
      const vectors = await this.embedder.embed(batch.map((c) => c.text));
      return batch.map((chunk, i) => this.toEntry(chunk, vectors[i]));
    } catch (error) {
      if (batch.length === 1) return batch.map((chunk) => this.failed(chunk, error));
      logger.warn("IndexBuilder.embedBatch failed, retrying chunk by chunk", {
        error,
        batchSize: batch.length,
      });
    }

    const outcomes: Outcome<IndexEntry>[] = [];
    for (const chunk of batch) {
      outcomes.push(...(await this.embedBatch([chunk])));
    }
    return outcomes;
  }

  private toEntry(chunk: Chunk, vector: number[] | undefined): Outcome<IndexEntry> {
    if (!vector || vector.length !== this.embedder.dimensions) {
      return this.failed(
        chunk,
        `expected a ${this.embedder.dimensions}-dimension vector, got ${vector?.length ?? "none"}`
      );
    }
    return { ok: true, value: { chunk, embedding: vector } };
  }

  private failed(chunk: Chunk, reason: unknown): Outcome<IndexEntry> {
    const error =
      typeof reason === "string"
        ? new IndexBuildError(chunk.chunkId, reason)
        : new IndexBuildError(
            chunk.chunkId,
            `embedding failed: ${reason instanceof Error ? reason.message : String(reason)}`,
            reason
          );
    return { ok: false, source: chunk.chunkId, error };
  }
}
