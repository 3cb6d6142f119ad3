export type RagErrorKind =
  | "configuration"
  | "embedding"
  | "store_unavailable"
  | "retrieval"
  | "ingestion";

/** Structured failure handed to callers of the public entry points. */
export type RagFailure = {
  kind: RagErrorKind;
  message: string;
};

/**
 * Base class for every failure raised by the retrieval core. `message` is
 * safe to show to users; backend details only travel in `cause`.
 */
export abstract class RagError extends Error {
  abstract readonly kind: RagErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Whether a retry policy may try the failed call again. */
  get retryable(): boolean {
    return false;
  }
}

/** Invalid chunking, budget or environment settings. Never retried. */
export class ConfigurationError extends RagError {
  readonly kind = "configuration" as const;
}

export class EmbeddingError extends RagError {
  readonly kind = "embedding" as const;
  private readonly transient: boolean;

  constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, options);
    this.transient = options?.retryable ?? true;
  }

  override get retryable(): boolean {
    return this.transient;
  }
}

/** The vector index or the company directory could not be reached in time. */
export class StoreUnavailableError extends RagError {
  readonly kind = "store_unavailable" as const;

  override get retryable(): boolean {
    return true;
  }
}

export class RetrievalError extends RagError {
  readonly kind = "retrieval" as const;
}

export class IngestionError extends RagError {
  readonly kind = "ingestion" as const;
}

export function isRagError(err: unknown): err is RagError {
  return err instanceof RagError;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

/**
 * Convert anything thrown by the core into a {@link RagFailure}. Unknown errors
 * are reported without their message, which may carry connection strings.
 */
export function toFailure(err: unknown): RagFailure {
  if (isRagError(err)) return { kind: err.kind, message: err.message };
  return { kind: "retrieval", message: "Unexpected internal failure." };
}

/** Short, log-friendly description of an error and its cause chain. */
export function describeError(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;
  for (let depth = 0; current != null && depth < 4; depth += 1) {
    parts.push(current instanceof Error ? `${current.name}: ${current.message}` : String(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return parts.join(" <- ");
}
