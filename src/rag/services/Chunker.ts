import { v5 as uuidv5 } from "uuid";
import type { Chunk, ChunkingOptions, Document } from "../types/rag.types";

// Fixed namespace so the same (source, position) always maps to the same chunk id
const CHUNK_ID_NAMESPACE = "6f1c2a3e-8d4b-4f5a-9c7e-2b1d0e3f4a5b";

const WHITESPACE = /\s/;

export function chunkId(sourceId: string, chunkIndex: number): string {
  return uuidv5(`${sourceId}#${chunkIndex}`, CHUNK_ID_NAMESPACE);
}

function assertValidOptions({ maxChunkSize, overlapSize }: ChunkingOptions) {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize < 1) {
    throw new RangeError(`maxChunkSize must be a positive integer (got ${maxChunkSize})`);
  }
  if (!Number.isInteger(overlapSize) || overlapSize < 0 || overlapSize >= maxChunkSize) {
    throw new RangeError(
      `overlapSize must be an integer in [0, ${maxChunkSize - 1}] (got ${overlapSize})`
    );
  }
}

/**
 * Picks where a non-final chunk ends: just after the last whitespace in the
 * second half of the window, or the hard limit when there is none.
 * The result is always greater than `start + overlapSize`.
 */
function findChunkEnd(
  text: string,
  start: number,
  { maxChunkSize, overlapSize }: ChunkingOptions
): number {
  const hardEnd = start + maxChunkSize;
  const floor = Math.max(start + overlapSize + 1, start + Math.floor(maxChunkSize / 2));

  for (let i = hardEnd - 1; i >= floor; i--) {
    if (WHITESPACE.test(text.charAt(i))) return i + 1;
  }
  return hardEnd;
}

function* generateChunks(doc: Document, options: ChunkingOptions): Generator<Chunk> {
  const text = doc.rawText;
  let start = 0;
  let chunkIndex = 0;

  while (start < text.length) {
    const end =
      start + options.maxChunkSize >= text.length
        ? text.length
        : findChunkEnd(text, start, options);

    yield {
      chunkId: chunkId(doc.sourceId, chunkIndex),
      sourceId: doc.sourceId,
      chunkIndex,
      text: text.slice(start, end),
      startOffset: start,
    };

    if (end >= text.length) return;
    start = end - options.overlapSize;
    chunkIndex++;
  }
}

/**
 * Splits a document into overlapping character windows.
 *
 * The returned iterable is lazy and can be iterated any number of times.
 * Chunk `n + 1` begins with the last `overlapSize` characters of chunk `n`,
 * so dropping that prefix from every chunk after the first and concatenating
 * gives back `doc.rawText` exactly.
 */
export function chunkDocument(doc: Document, options: ChunkingOptions): Iterable<Chunk> {
  assertValidOptions(options);
  return {
    [Symbol.iterator]: () => generateChunks(doc, options),
  };
}

export function chunkCorpus(documents: Iterable<Document>, options: ChunkingOptions): Chunk[] {
  const chunks: Chunk[] = [];
  for (const doc of documents) {
    for (const chunk of chunkDocument(doc, options)) chunks.push(chunk);
  }
  return chunks;
}
