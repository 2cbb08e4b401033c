import { mkdir } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RecursiveCharacterChunker } from "./chunking/index.js";
import { OpenAIEmbedder } from "./embedding-service.js";
import { EmbeddingError, IndexNotFoundError, IndexNotOpenError } from "./errors.js";
import type { Chunk, SourceDocument } from "./types.js";
import { VectorStore, cosineSimilarity } from "./vector-store.js";
import { FakeEmbedder, makeTempDir, removeDir, silentLogger } from "../testing/fakes.js";

const chunker = new RecursiveCharacterChunker({ chunkSize: 1000, chunkOverlap: 200 });

function chunksOf(docs: SourceDocument[]): Chunk[] {
  return chunker.split(docs);
}

const exodus: SourceDocument = {
  text: "Moses parted the Red Sea.",
  filename: "exodus.pdf",
  pageNumber: 1,
  sourceUrl: "http://example.com/exodus.pdf",
};
const acts: SourceDocument = {
  text: "Paul wrote letters to early churches.",
  filename: "acts.pdf",
  pageNumber: 3,
  sourceUrl: "http://example.com/acts.pdf",
};
const genesis: SourceDocument = {
  text: "God created the heavens and the earth.",
  filename: "genesis.pdf",
  pageNumber: 1,
  sourceUrl: "",
};

describe("cosineSimilarity", () => {
  it("is 1 for parallel vectors and 0 for orthogonal ones", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
  });

  it("is 0 when either vector is all zeros", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("rejects vectors of different dimensions", () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow(RangeError);
  });
});

describe("VectorStore", () => {
  let dir: string;
  let location: string;
  let embedder: FakeEmbedder;

  beforeEach(async () => {
    dir = await makeTempDir();
    location = path.join(dir, "vector-index");
    embedder = new FakeEmbedder();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function openStore(withEmbedder: FakeEmbedder = embedder): VectorStore {
    return new VectorStore({ location, embedder: withEmbedder, logger: silentLogger() });
  }

  it("returns only the exodus chunk for 'Red Sea' at k=1", async () => {
    const store = openStore();
    await store.build(chunksOf([exodus, acts]));

    const results = await store.search("Red Sea", 1);

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      filename: "exodus.pdf",
      pageNumber: 1,
      sourceUrl: "http://example.com/exodus.pdf",
      text: "Moses parted the Red Sea.",
    });
  });

  it("orders results nearest first", async () => {
    const store = openStore();
    await store.build(chunksOf([exodus, acts]));

    const results = await store.search("Paul wrote to the churches", 2);

    expect(results.map((r) => r.filename)).toEqual(["acts.pdf", "exodus.pdf"]);
    const [first, second] = results;
    expect(first?.score ?? 0).toBeGreaterThan(second?.score ?? 0);
  });

  it("writes each chunk id once and reports how many were written", async () => {
    const chunks = chunksOf([exodus, acts]);
    const store = openStore();

    expect(await store.build([...chunks, ...chunks])).toBe(2);
    expect(await store.size()).toBe(2);
    expect(embedder.embeddedTexts).toHaveLength(2);
  });

  it("reopens a persisted index without embedding again", async () => {
    await openStore().build(chunksOf([exodus, acts]));

    const reader = new FakeEmbedder();
    const store = openStore(reader);
    await store.load();

    expect(reader.batches).toEqual([]);
    expect(await store.size()).toBe(2);
    const [hit] = await store.search("Red Sea", 1);
    expect(hit?.filename).toBe("exodus.pdf");
  });

  it("does not count an empty directory as an index", async () => {
    await mkdir(location, { recursive: true });
    const store = openStore();

    expect(await store.exists()).toBe(false);
    await expect(store.load()).rejects.toBeInstanceOf(IndexNotFoundError);
  });

  it("refuses to search or add before the index is opened", async () => {
    const store = openStore();

    await expect(store.search("Red Sea", 1)).rejects.toBeInstanceOf(IndexNotOpenError);
    await expect(store.add(chunksOf([exodus]))).rejects.toBeInstanceOf(IndexNotOpenError);
  });

  it("rejects a non-positive k", async () => {
    const store = openStore();
    await store.build(chunksOf([exodus]));

    await expect(store.search("Red Sea", 0)).rejects.toBeInstanceOf(RangeError);
    await expect(store.search("Red Sea", -1)).rejects.toBeInstanceOf(RangeError);
  });

  it("returns nothing from an empty index without embedding the query", async () => {
    const store = openStore();
    await store.build([]);

    expect(await store.search("Red Sea", 4)).toEqual([]);
    expect(embedder.queries).toEqual([]);
  });

  it("adds only chunks that are not stored yet", async () => {
    const store = openStore();
    await store.build(chunksOf([exodus]));

    const added = await store.add(chunksOf([exodus, acts]));

    expect(added).toBe(1);
    expect(embedder.embeddedTexts).toEqual([
      "Moses parted the Red Sea.",
      "Paul wrote letters to early churches.",
    ]);
    expect(await store.size()).toBe(2);
    expect(await store.add(chunksOf([acts]))).toBe(0);
  });

  it("searches an incrementally grown index like one built in a single pass", async () => {
    const grown = openStore();
    await grown.build(chunksOf([exodus]));
    await grown.add(chunksOf([acts, genesis]));
    const grownResults = await grown.search("the Red Sea and the earth", 3);

    const rebuilt = new VectorStore({
      location: path.join(dir, "rebuilt"),
      embedder,
      logger: silentLogger(),
    });
    await rebuilt.build(chunksOf([exodus, acts, genesis]));
    const rebuiltResults = await rebuilt.search("the Red Sea and the earth", 3);

    expect(grownResults.map((r) => r.id)).toEqual(rebuiltResults.map((r) => r.id));
  });

  it("writes nothing when embedding fails", async () => {
    embedder.failWith = new EmbeddingError("request", "Embedding API error (500): boom");
    const store = openStore();

    await expect(store.build(chunksOf([exodus]))).rejects.toBeInstanceOf(EmbeddingError);
    expect(await store.exists()).toBe(false);
    expect(store.isOpen).toBe(false);
  });

  it("keeps the previous index when a rebuild fails", async () => {
    await openStore().build(chunksOf([exodus]));
    embedder.failWith = new EmbeddingError("request", "Embedding API error (500): boom");

    await expect(openStore().build(chunksOf([acts]))).rejects.toBeInstanceOf(EmbeddingError);

    const store = openStore(new FakeEmbedder());
    await store.load();
    expect(await store.size()).toBe(1);
  });

  it("fails fast with a configuration error when the API key is missing", () => {
    let caught: unknown;
    try {
      new OpenAIEmbedder({ apiKey: undefined, model: "text-embedding-3-small" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(EmbeddingError);
    expect(caught).toMatchObject({ kind: "configuration" });
  });
});
