export type RagErrorCode =
  | "SOURCE_UNREADABLE"
  | "FETCH_FAILED"
  | "INDEX_BUILD_FAILED"
  | "INDEX_NOT_FOUND"
  | "INDEX_MODEL_MISMATCH"
  | "UPSTREAM_FAILED"
  | "MISSING_CREDENTIAL"
  | "INVALID_QUESTION";

/**
 * Base class of every failure the pipeline knows how to report.
 * `message` is for logs, `userMessage` is safe to show in the chat.
 */
export abstract class RagError extends Error {
  abstract readonly code: RagErrorCode;
  readonly userMessage: string;

  protected constructor(
    message: string,
    userMessage: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.userMessage = userMessage;
  }
}

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

export class SourceUnreadableError extends RagError {
  readonly code = "SOURCE_UNREADABLE";

  constructor(readonly source: string, cause?: unknown) {
    super(
      `Cannot read source "${source}"` +
        (cause === undefined ? "" : `: ${describeCause(cause)}`),
      "A source document could not be read.",
      { cause }
    );
  }
}

export class FetchError extends RagError {
  readonly code = "FETCH_FAILED";

  constructor(
    readonly url: string,
    reason: string,
    readonly status?: number,
    cause?: unknown
  ) {
    super(`Fetching ${url} failed: ${reason}`, "A web page could not be fetched.", {
      cause,
    });
  }
}

export class IndexBuildError extends RagError {
  readonly code = "INDEX_BUILD_FAILED";

  /** `chunkId` is null when the whole build failed rather than one chunk. */
  constructor(readonly chunkId: string | null, reason: string, cause?: unknown) {
    super(
      chunkId ? `Chunk ${chunkId} not indexed: ${reason}` : `Index build failed: ${reason}`,
      "The knowledge base could not be built.",
      { cause }
    );
  }
}

export class IndexNotFoundError extends RagError {
  readonly code = "INDEX_NOT_FOUND";

  constructor(readonly indexDir: string, cause?: unknown) {
    super(
      `No usable index at "${indexDir}"` +
        (cause === undefined ? "" : `: ${describeCause(cause)}`),
      "The knowledge base has not been built yet. Run `npm run index:build` and try again.",
      { cause }
    );
  }
}

export class IndexModelMismatchError extends RagError {
  readonly code = "INDEX_MODEL_MISMATCH";

  constructor(readonly expected: string, readonly actual: string) {
    super(
      `Index was built with ${actual} but the configured embedder is ${expected}`,
      "The knowledge base was built with a different embedding model. Run `npm run index:build` to rebuild it.",
    );
  }
}

export class UpstreamError extends RagError {
  readonly code = "UPSTREAM_FAILED";

  constructor(
    readonly operation: string,
    reason: string,
    readonly status?: number,
    cause?: unknown
  ) {
    super(
      `${operation} failed` + (status ? ` (HTTP ${status})` : "") + `: ${reason}`,
      "The language model service is unavailable right now. Please try again in a moment.",
      { cause }
    );
  }
}

export class MissingCredentialError extends RagError {
  readonly code = "MISSING_CREDENTIAL";

  constructor(readonly variable: string) {
    super(
      `Environment variable "${variable}" is missing.`,
      `The assistant is not configured: set ${variable} and restart it.`
    );
  }
}

export class InvalidQuestionError extends RagError {
  readonly code = "INVALID_QUESTION";

  constructor(reason: string) {
    super(`Invalid question: ${reason}`, "Please type a question.");
  }
}

/**
 * Normalises a failure from the OpenAI SDK (or fetch) into an UpstreamError.
 * SDK errors carry a numeric `status`; connection errors and timeouts do not.
 */
export function toUpstreamError(operation: string, error: unknown): UpstreamError {
  if (error instanceof UpstreamError) return error;
  const status =
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
      ? error.status
      : undefined;
  return new UpstreamError(operation, describeCause(error), status, error);
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; source: string; error: RagError };

export interface SkippedItem {
  source: string;
  error: RagError;
}

export interface BatchOutcome<T> {
  succeeded: T[];
  skipped: SkippedItem[];
}

/**
 * Runs one ingestion step and turns a RagError into a value.
 * Anything that is not a RagError is a bug and keeps propagating.
 */
export async function settle<T>(
  source: string,
  step: () => Promise<T>
): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await step() };
  } catch (error) {
    if (error instanceof RagError) return { ok: false, source, error };
    throw error;
  }
}

export function foldOutcomes<T>(outcomes: Iterable<Outcome<T>>): BatchOutcome<T> {
  const result: BatchOutcome<T> = { succeeded: [], skipped: [] };
  for (const outcome of outcomes) {
    if (outcome.ok) result.succeeded.push(outcome.value);
    else result.skipped.push({ source: outcome.source, error: outcome.error });
  }
  return result;
}
