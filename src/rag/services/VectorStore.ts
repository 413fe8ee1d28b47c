import { create, insertMultiple, search as oramaSearch, type AnyOrama } from "@orama/orama";
import { persist, restore } from "@orama/plugin-data-persistence";
import fs from "fs";
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import logger from "../../logger";
import { IndexModelMismatchError, IndexNotFoundError } from "../errors";
import type {
  Chunk,
  IndexManifest,
  RetrievalOptions,
  RetrievedChunk,
} from "../types/rag.types";

export const MANIFEST_FILE = "manifest.json";
export const CHUNKS_FILE = "chunks.json";
export const INDEX_FILE = "index.json";

const VECTOR_PROPERTY = "embedding";

const manifestSchema: z.ZodType<IndexManifest> = z.object({
  formatVersion: z.literal(1),
  embeddingModel: z.string().min(1),
  dimensions: z.number().int().positive(),
  metric: z.literal("cosine"),
  chunkCount: z.number().int().nonnegative(),
  sources: z.array(z.string()),
  builtAt: z.string(),
});

const chunkSchema: z.ZodType<Chunk> = z.object({
  chunkId: z.string().min(1),
  sourceId: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  text: z.string(),
  startOffset: z.number().int().nonnegative(),
});

const sideTableSchema = z.object({ chunks: z.array(chunkSchema) });

export interface IndexEntry {
  chunk: Chunk;
  embedding: number[];
}

const readJson = async (filePath: string): Promise<unknown> =>
  JSON.parse(await readFile(filePath, "utf8"));

/**
 * Orama vector database plus the side table of chunk texts.
 * Built once, saved as a directory, then only searched.
 */
export class VectorStore {
  private constructor(
    private readonly db: AnyOrama,
    private readonly chunks: Map<string, Chunk>,
    readonly manifest: IndexManifest
  ) {}

  static async create(params: {
    embeddingModel: string;
    dimensions: number;
    entries: IndexEntry[];
  }): Promise<VectorStore> {
    const { embeddingModel, dimensions, entries } = params;
    const vectorType: `vector[${number}]` = `vector[${dimensions}]`;

    const db: AnyOrama = create({
      schema: { id: "string", [VECTOR_PROPERTY]: vectorType } as const,
    });

    if (entries.length > 0) {
      await insertMultiple(
        db,
        entries.map(({ chunk, embedding }) => ({
          id: chunk.chunkId,
          [VECTOR_PROPERTY]: embedding,
        }))
      );
    }

    const manifest: IndexManifest = {
      formatVersion: 1,
      embeddingModel,
      dimensions,
      metric: "cosine",
      chunkCount: entries.length,
      sources: [...new Set(entries.map((e) => e.chunk.sourceId))],
      builtAt: new Date().toISOString(),
    };

    return new VectorStore(
      db,
      new Map(entries.map(({ chunk }) => [chunk.chunkId, chunk])),
      manifest
    );
  }

  /**
   * Loads a saved index. A missing directory, or one that cannot be parsed,
   * is reported as IndexNotFoundError so the caller is told to rebuild.
   */
  static async load(indexDir: string): Promise<VectorStore> {
    if (!fs.existsSync(path.join(indexDir, MANIFEST_FILE))) {
      throw new IndexNotFoundError(indexDir);
    }

    try {
      const manifest = manifestSchema.parse(await readJson(path.join(indexDir, MANIFEST_FILE)));
      const { chunks } = sideTableSchema.parse(await readJson(path.join(indexDir, CHUNKS_FILE)));
      if (chunks.length !== manifest.chunkCount) {
        throw new Error(
          `manifest lists ${manifest.chunkCount} chunks but the side table has ${chunks.length}`
        );
      }

      const db = await restore("json", await readFile(path.join(indexDir, INDEX_FILE), "utf8"));

      logger.info("VectorStore.load completed", {
        indexDir,
        chunkCount: manifest.chunkCount,
        embeddingModel: manifest.embeddingModel,
      });
      return new VectorStore(db, new Map(chunks.map((c) => [c.chunkId, c])), manifest);
    } catch (error) {
      logger.error("VectorStore.load failed", { error, indexDir });
      throw new IndexNotFoundError(indexDir, error);
    }
  }

  get size(): number {
    return this.chunks.size;
  }

  /**
   * Cosine k-nearest-neighbour search, best first.
   * Equal scores keep the order Orama returns them in.
   */
  async search(vector: number[], { topK, minScore }: RetrievalOptions): Promise<RetrievedChunk[]> {
    if (vector.length !== this.manifest.dimensions) {
      throw new IndexModelMismatchError(
        `${vector.length}-dimension query vectors`,
        `${this.manifest.embeddingModel} (${this.manifest.dimensions} dimensions)`
      );
    }
    if (this.chunks.size === 0) return [];

    const results = await oramaSearch(this.db, {
      mode: "vector",
      vector: { value: vector, property: VECTOR_PROPERTY },
      similarity: minScore,
      limit: topK,
    });

    const hits: RetrievedChunk[] = [];
    for (const hit of results.hits) {
      const chunk = this.chunks.get(hit.id);
      if (!chunk) {
        logger.warn("VectorStore.search: hit without a side-table entry", { id: hit.id });
        continue;
      }
      hits.push({ chunk, score: hit.score });
    }

    return hits.sort((a, b) => b.score - a.score);
  }

  /**
   * Writes the whole index to a staging directory, then swaps it in place of
   * `indexDir`. Concurrent saves are not coordinated; the last rename wins.
   */
  async save(indexDir: string): Promise<void> {
    await mkdir(path.dirname(indexDir), { recursive: true });
    const staging = `${indexDir}.staging-${uuidv4()}`;
    await mkdir(staging);

    try {
      const serialized = await persist(this.db, "json");
      await writeFile(path.join(staging, INDEX_FILE), String(serialized), "utf8");
      await writeFile(
        path.join(staging, CHUNKS_FILE),
        JSON.stringify({ chunks: [...this.chunks.values()] }),
        "utf8"
      );
      await writeFile(
        path.join(staging, MANIFEST_FILE),
        JSON.stringify(this.manifest, null, 2),
        "utf8"
      );

      await rm(indexDir, { recursive: true, force: true });
      await rename(staging, indexDir);
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      logger.error("VectorStore.save failed", { error, indexDir });
      throw error;
    }

    logger.info("VectorStore.save completed", { indexDir, chunkCount: this.manifest.chunkCount });
  }
}
