import {
  configFromEnv,
  formatDuration,
  type IndexStoreProgressEvent,
  type RetrievalConfigInput,
  type RetrievalFailure,
} from "@appliance-rag/core";

/** Options shared by every command. */
export interface GlobalOptions {
  corpusDir?: string;
  indexDir?: string;
  embeddingProvider?: string;
  embeddingModel?: string;
}

export function parseIntOption(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`expected a positive integer, got '${value}'`);
  }
  return parsed;
}

export function normalizeProvider(value: string): "transformers" | "hash" {
  const normalized = value.trim().toLowerCase();
  if (normalized === "transformers" || normalized === "hash") {
    return normalized;
  }

  throw new Error(`unsupported embedding provider '${value}'. Expected one of: transformers, hash`);
}

/** Environment first, then command-line flags on top. */
export function resolveConfigInput(
  options: GlobalOptions,
  env: Record<string, string | undefined> = process.env,
  onWarning?: (message: string) => void,
): RetrievalConfigInput {
  const input = configFromEnv(env, onWarning);
  if (options.corpusDir !== undefined) {
    input.corpusDir = options.corpusDir;
  }
  if (options.indexDir !== undefined) {
    input.indexDir = options.indexDir;
  }

  if (options.embeddingProvider !== undefined || options.embeddingModel !== undefined) {
    const embedding: NonNullable<RetrievalConfigInput["embedding"]> = { ...input.embedding };
    if (options.embeddingProvider !== undefined) {
      embedding.provider = normalizeProvider(options.embeddingProvider);
    }
    if (options.embeddingModel !== undefined) {
      embedding.model = options.embeddingModel;
    }
    input.embedding = embedding;
  }
  return input;
}

export function formatProgress(event: IndexStoreProgressEvent): string {
  switch (event.step) {
    case "fingerprinting":
      return "Fingerprinting corpus...";
    case "chunking":
      return `Chunking [${event.completed}/${event.total}]...`;
    case "embedding": {
      const pct = event.total > 0 ? ((event.completed / event.total) * 100).toFixed(1) : "100.0";
      return `Embedding: ${event.completed}/${event.total} (${pct}%)`;
    }
    case "writing-snapshot":
      return "Writing index snapshot...";
  }
}

export function formatFailure(failure: RetrievalFailure): string {
  return `error [${failure.kind}]: ${failure.message}`;
}

export function formatBuildLine(
  status: "built" | "loaded",
  documents: number,
  elapsedSec: number,
): string {
  const verb = status === "built" ? "Built" : "Loaded";
  return `${verb} index with ${documents.toLocaleString("en-US")} passages in ${formatDuration(elapsedSec)}`;
}
