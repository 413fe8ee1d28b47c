import logger from "../../logger";
import {
  foldOutcomes,
  settle,
  type BatchOutcome,
  type Outcome,
} from "../errors";
import type { ChunkingOptions, Document, Embedder, IndexBuildReport } from "../types/rag.types";
import { chunkCorpus } from "./Chunker";
import type { DocumentLoader } from "./DocumentLoader";
import { IndexBuilder } from "./IndexBuilder";

export interface IngestionSettings {
  handbookDir: string;
  scrapedDir: string;
  indexDir: string;
  chunking: ChunkingOptions;
  embeddingBatchSize: number;
}

/**
 * The offline half of the pipeline: load the handbooks and scraped pages,
 * chunk them and embed the whole corpus into a new index.
 */
export class IngestionService {
  constructor(
    private readonly loader: DocumentLoader,
    private readonly embedder: Embedder,
    private readonly settings: IngestionSettings
  ) {}

  async loadCorpus(): Promise<BatchOutcome<Document>> {
    const files = await this.loader.listCorpusFiles(
      this.settings.handbookDir,
      this.settings.scrapedDir
    );

    const outcomes: Outcome<Document>[] = [];
    for (const file of files) {
      outcomes.push(await settle(file, () => this.loader.load(file)));
    }

    const result = foldOutcomes(outcomes);
    for (const { source, error } of result.skipped) {
      logger.warn("IngestionService.loadCorpus skipped file", { file: source, reason: error.message });
    }
    return result;
  }

  /**
   * Full rebuild. The previous index is only replaced once the new one has
   * been embedded; a build that fails outright leaves it untouched.
   */
  async buildIndex(): Promise<IndexBuildReport> {
    const startTime = Date.now();

    const corpus = await this.loadCorpus();
    const chunks = chunkCorpus(corpus.succeeded, this.settings.chunking);
    logger.info("IngestionService.buildIndex chunked corpus", {
      documents: corpus.succeeded.length,
      chunks: chunks.length,
    });

    const builder = new IndexBuilder(this.embedder, this.settings.embeddingBatchSize);
    const { store, outcome } = await builder.build(chunks);
    await store.save(this.settings.indexDir);

    const report: IndexBuildReport = {
      indexDir: this.settings.indexDir,
      documentsLoaded: corpus.succeeded.length,
      chunksIndexed: store.size,
      skipped: [...corpus.skipped, ...outcome.skipped].map(({ source, error }) => ({
        source,
        code: error.code,
        reason: error.message,
      })),
      processingTimeMs: Date.now() - startTime,
    };

    logger.info("IngestionService.buildIndex completed", {
      indexDir: report.indexDir,
      documentsLoaded: report.documentsLoaded,
      chunksIndexed: report.chunksIndexed,
      skipped: report.skipped.length,
      processingTimeMs: report.processingTimeMs,
    });
    return report;
  }
}
