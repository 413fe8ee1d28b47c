import path from "path";
import { describe, expect, it } from "vitest";
import { IndexModelMismatchError, IndexNotFoundError } from "../errors";
import { IndexBuilder } from "../services/IndexBuilder";
import { PersistedIndex, Retriever } from "../services/Retriever";
import { FakeEmbedder, makeChunk, staticIndex, tempDir } from "./helpers/fakes";

const LIBRARY_HOURS = "The library is open 9am to 6pm on weekdays.";

const corpus = [
  makeChunk(LIBRARY_HOURS, 0),
  makeChunk("Hostel rooms are allotted every semester.", 1),
  makeChunk("Tuition fees are paid in two instalments.", 2),
  makeChunk("The library lends books for two weeks.", 3),
  makeChunk("Admission to the hostel needs a fee receipt.", 4),
];

const buildStore = async () => (await new IndexBuilder(new FakeEmbedder(), 8).build(corpus)).store;

describe("Retriever", () => {
  it("returns the chunk whose text is the question first", async () => {
    const embedder = new FakeEmbedder();
    const retriever = new Retriever(embedder, staticIndex(await buildStore()), { topK: 3, minScore: 0.001 });

    const { question, hits } = await retriever.retrieve("Tuition fees are paid in two instalments.");

    expect(question).toBe("Tuition fees are paid in two instalments.");
    expect(hits[0]?.chunk.chunkId).toBe("handbook.pdf-2");
    expect(hits[0]?.score).toBeCloseTo(1, 5);
  });

  it("finds the library hours for a paraphrased question", async () => {
    const retriever = new Retriever(new FakeEmbedder(), staticIndex(await buildStore()), {
      topK: 3,
      minScore: 0.2,
    });

    const { hits } = await retriever.retrieve("What are the library timings?");

    expect(hits[0]?.chunk.text).toBe(LIBRARY_HOURS);
    expect(hits[0]?.score).toBeGreaterThan(0.3);
  });

  it("orders hits by descending score and honours topK", async () => {
    const retriever = new Retriever(new FakeEmbedder(), staticIndex(await buildStore()), {
      topK: 2,
      minScore: 0.001,
    });

    const { hits } = await retriever.retrieve("library hostel fees");

    expect(hits).toHaveLength(2);
    const [first, second] = hits;
    expect(first && second && first.score >= second.score).toBe(true);
  });

  it("lets a call override the default options", async () => {
    const retriever = new Retriever(new FakeEmbedder(), staticIndex(await buildStore()), {
      topK: 1,
      minScore: 0.001,
    });

    const { hits } = await retriever.retrieve("library", { topK: 5, minScore: 0.25 });

    expect(hits.map((h) => h.chunk.chunkId).sort()).toEqual(["handbook.pdf-0", "handbook.pdf-3"]);
  });

  it("returns no hits when nothing clears the score threshold", async () => {
    const retriever = new Retriever(new FakeEmbedder(), staticIndex(await buildStore()), {
      topK: 3,
      minScore: 0.9,
    });

    await expect(retriever.retrieve("Where is the cafeteria?")).resolves.toEqual({
      question: "Where is the cafeteria?",
      hits: [],
    });
  });
});

describe("PersistedIndex", () => {
  it("fails with IndexNotFoundError before embedding anything", async () => {
    const embedder = new FakeEmbedder();
    const index = new PersistedIndex(path.join(tempDir("index"), "vector_store"), embedder);
    const retriever = new Retriever(embedder, index, { topK: 3, minScore: 0.2 });

    await expect(retriever.retrieve("library hours")).rejects.toBeInstanceOf(IndexNotFoundError);
    expect(embedder.calls).toEqual([]);
  });

  it("picks up an index built after a failed load", async () => {
    const indexDir = path.join(tempDir("index"), "vector_store");
    const embedder = new FakeEmbedder();
    const index = new PersistedIndex(indexDir, embedder);

    await expect(index.getIndex()).rejects.toBeInstanceOf(IndexNotFoundError);
    await (await buildStore()).save(indexDir);

    expect((await index.getIndex()).size).toBe(5);
  });

  it("reloads the directory after reload()", async () => {
    const indexDir = path.join(tempDir("index"), "vector_store");
    const embedder = new FakeEmbedder();
    await (await buildStore()).save(indexDir);
    const index = new PersistedIndex(indexDir, embedder);
    const before = await index.getIndex();

    const smaller = await new IndexBuilder(embedder, 8).build(corpus.slice(0, 2));
    await smaller.store.save(indexDir);

    expect(await index.getIndex()).toBe(before);
    index.reload();
    expect((await index.getIndex()).size).toBe(2);
  });

  it("refuses an index built with another embedding model", async () => {
    const indexDir = path.join(tempDir("index"), "vector_store");
    await (await buildStore()).save(indexDir);
    const index = new PersistedIndex(indexDir, new FakeEmbedder({ model: "other-model" }));

    const error = await index.getIndex().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IndexModelMismatchError);
    if (!(error instanceof IndexModelMismatchError)) return;
    expect(error.message).toBe(
      "Index was built with fake-concepts-v1 (8 dimensions) but the configured embedder is other-model (8 dimensions)"
    );
  });
});
