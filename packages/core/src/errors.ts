import type { FailureKind, RetrievalFailure } from "./types.js";

export class RetrievalError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RetrievalError";
    this.kind = kind;
  }
}

/** Corpus directory missing, nothing indexable, or invalid configuration. */
export class ConfigurationError extends RetrievalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("configuration", message, options);
    this.name = "ConfigurationError";
  }
}

export class EmbeddingUnavailableError extends RetrievalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("unavailable", message, options);
    this.name = "EmbeddingUnavailableError";
  }
}

/** Embedding, index or write failure during a rebuild. The previous snapshot stays usable. */
export class TransientBuildError extends RetrievalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transient-build", message, options);
    this.name = "TransientBuildError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Converts anything thrown inside a component into a structured failure.
 * Unclassified errors take `fallbackKind`.
 */
export function toFailure(error: unknown, fallbackKind: FailureKind): RetrievalFailure {
  if (error instanceof RetrievalError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: fallbackKind, message: errorMessage(error) };
}
