import { createHash } from "node:crypto";
import { EmbeddingUnavailableError, errorMessage } from "./errors.js";
import type {
  EmbeddingAvailability,
  EmbeddingProvider,
  EmbeddingRole,
  EmbedProgressEvent,
} from "./types.js";

/**
 * Asymmetric e5-style prefixes. Queries and passages are encoded with
 * different prefixes; every text sent to a model goes through here.
 */
export const ROLE_PREFIXES: Record<EmbeddingRole, string> = {
  query: "query: ",
  passage: "passage: ",
};

export function toEmbeddingInput(text: string, role: EmbeddingRole): string {
  return `${ROLE_PREFIXES[role]}${text}`;
}

export function sha256hex(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

export function computeConfigFingerprint(fields: Record<string, string | number>): string {
  const parts = Object.entries(fields)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`);
  return sha256hex(parts.join("\0"));
}

export function normalizeVector(vector: number[]): number[] {
  let norm = 0;
  for (const value of vector) {
    norm += value * value;
  }
  norm = Math.sqrt(norm);

  if (!norm) {
    return vector;
  }

  return vector.map((value) => value / norm);
}

/**
 * Deterministic, offline provider: lower-cased word tokens are hashed into
 * buckets and the counts are L2-normalised. Texts that share words score
 * higher, which is enough for smoke tests and air-gapped builds.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly name = "hash";
  readonly model: string;
  readonly dimensions: number;
  readonly configFingerprint: string;

  constructor(options: { dimensions?: number; model?: string } = {}) {
    this.dimensions = options.dimensions ?? 512;
    this.model = options.model ?? "hash-v1";
    this.configFingerprint = computeConfigFingerprint({
      provider: "hash",
      model: this.model,
      dimensions: this.dimensions,
    });
  }

  async availability(): Promise<EmbeddingAvailability> {
    return { available: true };
  }

  async embed(texts: string[], role: EmbeddingRole): Promise<number[][]> {
    return texts.map((text) => hashToUnitVector(toEmbeddingInput(text, role), this.dimensions));
  }
}

export interface TransformersEmbeddingProviderOptions {
  model?: string;
  dimensions?: number;
  batchSize?: number;
  cacheDir?: string;
  /** Replaces the dynamic import of the model runtime; used to run without it. */
  loadExtractor?: (model: string) => Promise<FeatureExtractor>;
}

/** The slice of a transformers.js feature-extraction pipeline this package uses. */
export type FeatureExtractor = (
  texts: string[],
  options: { pooling: "mean"; normalize: boolean },
) => Promise<{ tolist(): unknown }>;

/**
 * The model runtime is an optional dependency: its native backend may be
 * missing, in which case the provider reports itself unavailable. The
 * specifier is kept out of static resolution so the package type-checks
 * without it.
 */
const TRANSFORMERS_MODULE = "@huggingface/transformers";

interface TransformersModule {
  env: Record<string, unknown>;
  pipeline: (task: string, model: string, options: { dtype: string }) => Promise<unknown>;
}

const KNOWN_DIMENSIONS: Record<string, number> = {
  "Xenova/e5-small-v2": 384,
  "Xenova/e5-base-v2": 768,
  "Xenova/e5-large-v2": 1024,
  "Xenova/multilingual-e5-small": 384,
};

/**
 * Local sentence embeddings through `@huggingface/transformers`. The model is
 * loaded on first use, once; a failed load is remembered and reported by
 * `availability()` instead of being retried.
 */
export class TransformersEmbeddingProvider implements EmbeddingProvider {
  readonly name = "transformers";
  readonly model: string;
  readonly dimensions: number;
  readonly batchSize: number;
  readonly configFingerprint: string;

  private readonly cacheDir: string | undefined;
  private readonly loadExtractor: (model: string) => Promise<FeatureExtractor>;
  private loading: Promise<FeatureExtractor> | null = null;

  constructor(options: TransformersEmbeddingProviderOptions = {}) {
    this.model = options.model ?? "Xenova/e5-small-v2";
    this.dimensions = options.dimensions ?? KNOWN_DIMENSIONS[this.model] ?? 384;
    this.batchSize = options.batchSize ?? 32;
    this.cacheDir = options.cacheDir;
    this.loadExtractor = options.loadExtractor ?? ((model) => this.importExtractor(model));
    this.configFingerprint = computeConfigFingerprint({
      provider: "transformers",
      model: this.model,
      dimensions: this.dimensions,
    });
  }

  async availability(): Promise<EmbeddingAvailability> {
    try {
      await this.extractor();
      return { available: true };
    } catch (error) {
      return { available: false, reason: errorMessage(error) };
    }
  }

  async embed(texts: string[], role: EmbeddingRole): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const extractor = await this.extractor();
    const inputs = texts.map((text) => toEmbeddingInput(text, role));
    const output = await extractor(inputs, { pooling: "mean", normalize: true });
    const vectors = toVectorRows(output.tolist());

    if (vectors.length !== texts.length) {
      throw new Error(
        `embedding model returned ${vectors.length} vectors for ${texts.length} inputs`,
      );
    }
    for (const vector of vectors) {
      if (vector.length !== this.dimensions) {
        throw new Error(
          `embedding model ${this.model} returned ${vector.length} dimensions, expected ${this.dimensions}`,
        );
      }
    }

    return vectors.map(normalizeVector);
  }

  private extractor(): Promise<FeatureExtractor> {
    if (!this.loading) {
      this.loading = this.loadExtractor(this.model).catch((error: unknown) => {
        throw new EmbeddingUnavailableError(
          `failed to load embedding model ${this.model}: ${errorMessage(error)}`,
          { cause: error },
        );
      });
    }
    return this.loading;
  }

  private async importExtractor(model: string): Promise<FeatureExtractor> {
    const transformers: unknown = await import(TRANSFORMERS_MODULE);
    if (!isTransformersModule(transformers)) {
      throw new Error(`${TRANSFORMERS_MODULE} does not export a pipeline factory`);
    }
    if (this.cacheDir) {
      transformers.env.cacheDir = this.cacheDir;
    }

    const extractor = await transformers.pipeline("feature-extraction", model, {
      dtype: "fp32",
    });
    if (!isFeatureExtractor(extractor)) {
      throw new Error(`model ${model} did not produce a feature-extraction pipeline`);
    }
    return extractor;
  }
}

export function createEmbeddingProvider(input: {
  provider: "transformers" | "hash";
  model?: string;
  dimensions?: number;
  batchSize?: number;
  cacheDir?: string;
}): EmbeddingProvider {
  if (input.provider !== "transformers" && input.provider !== "hash") {
    throw new Error(
      `unsupported embedding provider '${String(input.provider)}'. Expected one of: transformers, hash`,
    );
  }

  if (input.provider === "hash") {
    const options: { dimensions?: number; model?: string } = {};
    if (input.dimensions !== undefined) {
      options.dimensions = input.dimensions;
    }
    if (input.model !== undefined) {
      options.model = input.model;
    }
    return new HashEmbeddingProvider(options);
  }

  const options: TransformersEmbeddingProviderOptions = {};
  if (input.model !== undefined) {
    options.model = input.model;
  }
  if (input.dimensions !== undefined) {
    options.dimensions = input.dimensions;
  }
  if (input.batchSize !== undefined) {
    options.batchSize = input.batchSize;
  }
  if (input.cacheDir !== undefined) {
    options.cacheDir = input.cacheDir;
  }
  return new TransformersEmbeddingProvider(options);
}

/**
 * Embeds passage texts in batches and checks that the provider returned one
 * normalised vector per text.
 */
export async function embedPassages(
  provider: EmbeddingProvider,
  texts: string[],
  options: { batchSize?: number; onProgress?: (event: EmbedProgressEvent) => void } = {},
): Promise<number[][]> {
  const batchSize = Math.max(1, options.batchSize ?? provider.batchSize ?? texts.length);
  const vectors: number[][] = [];

  for (let offset = 0; offset < texts.length; offset += batchSize) {
    const batch = texts.slice(offset, offset + batchSize);
    const batchVectors = await provider.embed(batch, "passage");
    if (batchVectors.length !== batch.length) {
      throw new Error(
        `Embedding provider returned ${batchVectors.length} vectors for ${batch.length} passages`,
      );
    }
    vectors.push(...batchVectors.map(normalizeVector));
    options.onProgress?.({
      phase: "embedding",
      completed: vectors.length,
      total: texts.length,
    });
  }

  return vectors;
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds}s`;
  const m = Math.floor(seconds / 60);
  const s = seconds % 60;
  return s > 0 ? `${m}m${s}s` : `${m}m`;
}

function hashToUnitVector(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);

  for (const token of text.toLowerCase().split(/[^a-z0-9]+/g)) {
    if (!token) {
      continue;
    }
    const digest = createHash("sha256").update(token).digest();
    const bucket = digest.readUInt32BE(0) % dimensions;
    const sign = (digest[4] ?? 0) % 2 === 0 ? 1 : -1;
    vector[bucket] = (vector[bucket] ?? 0) + sign;
  }

  return normalizeVector(vector);
}

function isTransformersModule(value: unknown): value is TransformersModule {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "pipeline" in value &&
    typeof value.pipeline === "function" &&
    "env" in value &&
    typeof value.env === "object" &&
    value.env !== null
  );
}

function isFeatureExtractor(value: unknown): value is FeatureExtractor {
  return typeof value === "function";
}

function toVectorRows(value: unknown): number[][] {
  if (!Array.isArray(value)) {
    throw new Error("embedding model output is not a list of vectors");
  }
  return value.map((row, index) => {
    if (!Array.isArray(row) || !row.every((entry) => typeof entry === "number")) {
      throw new Error(`embedding model output row ${index} is not a numeric vector`);
    }
    return row.map(Number);
  });
}
