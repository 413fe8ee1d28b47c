import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { IndexBuildError, IndexModelMismatchError, IndexNotFoundError } from "../errors";
import { chunkCorpus } from "../services/Chunker";
import { IndexBuilder } from "../services/IndexBuilder";
import { CHUNKS_FILE, INDEX_FILE, MANIFEST_FILE, VectorStore } from "../services/VectorStore";
import { FakeEmbedder, conceptVector, makeChunk, tempDir } from "./helpers/fakes";

const RETRIEVAL = { topK: 3, minScore: 0.1 };

const campusChunks = () => [
  makeChunk("The library is open 9am to 6pm on weekdays.", 0),
  makeChunk("Hostel rooms are allotted every semester.", 1),
  makeChunk("Tuition fees are paid in two instalments.", 2, "https://www.example.edu/fees"),
];

describe("IndexBuilder", () => {
  it("embeds every chunk in batches", async () => {
    const embedder = new FakeEmbedder();

    const { store, outcome } = await new IndexBuilder(embedder, 2).build(campusChunks());

    expect(store.size).toBe(3);
    expect(outcome.skipped).toEqual([]);
    expect(embedder.calls.map((batch) => batch.length)).toEqual([2, 1]);
    expect(store.manifest).toMatchObject({
      formatVersion: 1,
      embeddingModel: "fake-concepts-v1",
      dimensions: 8,
      metric: "cosine",
      chunkCount: 3,
      sources: ["handbook.pdf", "https://www.example.edu/fees"],
    });
  });

  it("skips chunks with no text without sending them to the embedder", async () => {
    const embedder = new FakeEmbedder();
    const chunks = [...campusChunks(), makeChunk("   \n  ", 3)];

    const { store, outcome } = await new IndexBuilder(embedder, 10).build(chunks);

    expect(store.size).toBe(3);
    expect(outcome.skipped.map((s) => s.source)).toEqual(["handbook.pdf-3"]);
    expect(outcome.skipped[0]?.error.message).toBe("Chunk handbook.pdf-3 not indexed: chunk has no text");
    expect(embedder.calls.flat()).not.toContain("   \n  ");
  });

  it("skips a chunk whose id was already taken", async () => {
    const embedder = new FakeEmbedder();
    const chunks = [...campusChunks(), makeChunk("The library lends books for two weeks.", 0)];

    const { store, outcome } = await new IndexBuilder(embedder, 10).build(chunks);

    expect(store.size).toBe(3);
    expect(outcome.skipped.map((s) => s.error.message)).toEqual([
      "Chunk handbook.pdf-0 not indexed: duplicate chunk id",
    ]);
    expect(embedder.calls.flat()).not.toContain("The library lends books for two weeks.");
  });

  it("retries a failed batch one chunk at a time and skips only the bad chunk", async () => {
    const embedder = new FakeEmbedder({ failWhen: (text) => text.includes("POISON") });
    const chunks = [...campusChunks(), makeChunk("POISON entry", 3)];

    const { store, outcome } = await new IndexBuilder(embedder, 4).build(chunks);

    expect(store.size).toBe(3);
    expect(outcome.skipped).toHaveLength(1);
    expect(outcome.skipped[0]?.error).toBeInstanceOf(IndexBuildError);
    expect(outcome.skipped[0]?.error.message).toBe(
      "Chunk handbook.pdf-3 not indexed: embedding failed: embedding backend rejected the input"
    );
    expect(embedder.calls.map((batch) => batch.length)).toEqual([4, 1, 1, 1, 1]);
  });

  it("skips vectors with the wrong dimension", async () => {
    const embedder = new FakeEmbedder({
      vectorFor: (text) => (text.startsWith("Hostel") ? [1, 2, 3] : conceptVector(text)),
    });

    const { store, outcome } = await new IndexBuilder(embedder, 8).build(campusChunks());

    expect(store.size).toBe(2);
    expect(outcome.skipped[0]?.error.message).toBe(
      "Chunk handbook.pdf-1 not indexed: expected a 8-dimension vector, got 3"
    );
  });

  it("fails the build when nothing can be embedded", async () => {
    const embedder = new FakeEmbedder({ failWhen: () => true });

    const error = await new IndexBuilder(embedder, 8).build(campusChunks()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IndexBuildError);
    if (!(error instanceof IndexBuildError)) return;
    expect(error.chunkId).toBeNull();
    expect(error.message).toBe("Index build failed: none of 3 chunks could be embedded");
  });

  it("indexes the same chunks on every run over the same corpus", async () => {
    const corpus = [
      { sourceId: "handbook.pdf", kind: "pdf" as const, rawText: "The library is open 9am to 6pm. ".repeat(40) },
    ];
    const options = { maxChunkSize: 120, overlapSize: 20 };

    const first = await new IndexBuilder(new FakeEmbedder(), 16).build(chunkCorpus(corpus, options));
    const second = await new IndexBuilder(new FakeEmbedder(), 16).build(chunkCorpus(corpus, options));

    expect(second.outcome.succeeded.map((e) => e.chunk)).toEqual(first.outcome.succeeded.map((e) => e.chunk));
  });
});

describe("VectorStore", () => {
  it("finds a stored chunk from its own text", async () => {
    const { store } = await new IndexBuilder(new FakeEmbedder(), 8).build(campusChunks());

    const hits = await store.search(conceptVector("Hostel rooms are allotted every semester."), RETRIEVAL);

    expect(hits[0]?.chunk.chunkId).toBe("handbook.pdf-1");
    expect(hits[0]?.score).toBeCloseTo(1, 5);
  });

  it("rejects a query vector of the wrong dimension", async () => {
    const { store } = await new IndexBuilder(new FakeEmbedder(), 8).build(campusChunks());

    await expect(store.search([1, 0, 0], RETRIEVAL)).rejects.toBeInstanceOf(IndexModelMismatchError);
  });

  it("saves to a directory and loads back the same index", async () => {
    const { store } = await new IndexBuilder(new FakeEmbedder(), 8).build(campusChunks());
    const indexDir = path.join(tempDir("index"), "vector_store");

    await store.save(indexDir);
    const loaded = await VectorStore.load(indexDir);

    expect(loaded.manifest).toEqual(store.manifest);
    expect(loaded.size).toBe(3);
    const hits = await loaded.search(conceptVector("Tuition fees are paid in two instalments."), RETRIEVAL);
    expect(hits[0]?.chunk).toEqual(campusChunks()[2]);
    expect(JSON.parse(readFileSync(path.join(indexDir, MANIFEST_FILE), "utf8"))).toEqual(store.manifest);
  });

  it("replaces the previous index directory on save", async () => {
    const { store } = await new IndexBuilder(new FakeEmbedder(), 8).build(campusChunks());
    const indexDir = path.join(tempDir("index"), "vector_store");
    mkdirSync(indexDir);
    writeFileSync(path.join(indexDir, "stale.bin"), "left over from an older build");

    await store.save(indexDir);

    expect(existsSync(path.join(indexDir, "stale.bin"))).toBe(false);
    for (const file of [MANIFEST_FILE, CHUNKS_FILE, INDEX_FILE]) {
      expect(existsSync(path.join(indexDir, file))).toBe(true);
    }
  });

  it("reports a missing index as IndexNotFoundError", async () => {
    const indexDir = path.join(tempDir("index"), "never-built");

    await expect(VectorStore.load(indexDir)).rejects.toBeInstanceOf(IndexNotFoundError);
  });

  it("reports an index whose side table disagrees with the manifest", async () => {
    const { store } = await new IndexBuilder(new FakeEmbedder(), 8).build(campusChunks());
    const indexDir = path.join(tempDir("index"), "vector_store");
    await store.save(indexDir);
    writeFileSync(path.join(indexDir, CHUNKS_FILE), JSON.stringify({ chunks: [] }));

    const error = await VectorStore.load(indexDir).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IndexNotFoundError);
    if (!(error instanceof IndexNotFoundError)) return;
    expect(error.message).toBe(
      `No usable index at "${indexDir}": manifest lists 3 chunks but the side table has 0`
    );
  });
});
