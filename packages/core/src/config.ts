import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_COMPONENT_KEYWORDS = [
  "motor",
  "fan",
  "valve",
  "pump",
  "control",
  "switch",
  "sensor",
  "heater",
  "thermostat",
];

export const EmbeddingConfigSchema = z
  .object({
    provider: z
      .enum(["transformers", "hash"])
      .default("transformers")
      .describe("'transformers' runs a local e5 model; 'hash' is a deterministic offline provider."),
    model: z.string().min(1).default("Xenova/e5-small-v2"),
    dimensions: z.int().positive().optional(),
    batchSize: z.int().positive().default(32),
    cacheDir: z
      .string()
      .min(1)
      .optional()
      .describe("Where downloaded model weights are kept between runs."),
  })
  .prefault({});

export const ChunkingConfigSchema = z
  .object({
    windowSize: z.int().positive().default(2200),
    overlap: z.int().nonnegative().default(300),
  })
  .refine((value) => value.overlap < value.windowSize, {
    message: "overlap must be smaller than windowSize",
    path: ["overlap"],
  })
  .prefault({});

export const SearchConfigSchema = z
  .object({
    defaultTopK: z.int().positive().default(8),
    maxTopK: z.int().positive().default(50),
    fetchMultiplier: z.int().positive().default(3),
    minFetch: z.int().positive().default(20),
    fallbackTopK: z.int().positive().default(12),
    fallbackEnabled: z.boolean().default(true),
  })
  .prefault({});

export const GuidesConfigSchema = z
  .object({
    topKPerQuery: z.int().positive().default(15),
    componentKeywords: z.array(z.string().min(1)).default(DEFAULT_COMPONENT_KEYWORDS),
    maxCitations: z.int().positive().default(3),
  })
  .prefault({});

export const CacheConfigSchema = z
  .object({
    ttlMs: z.int().positive().default(30 * 60 * 1000),
  })
  .prefault({});

export const RetrievalConfigSchema = z.object({
  corpusDir: z.string().min(1).default("data"),
  indexDir: z.string().min(1).default(".rag_index"),
  excludedFiles: z
    .array(z.string().min(1))
    .default(["scraped_parts.json"])
    .describe("File names skipped during ingestion and fingerprinting (raw scrape caches)."),
  embedding: EmbeddingConfigSchema,
  chunking: ChunkingConfigSchema,
  search: SearchConfigSchema,
  guides: GuidesConfigSchema,
  cache: CacheConfigSchema,
});

export type RetrievalConfig = z.output<typeof RetrievalConfigSchema>;
export type RetrievalConfigInput = z.input<typeof RetrievalConfigSchema>;

export function parseRetrievalConfig(input: unknown): RetrievalConfig {
  const result = RetrievalConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`invalid retrieval config: ${details}`);
  }
  return result.data;
}

type Env = Record<string, string | undefined>;

/**
 * Reads `APPLIANCE_RAG_*` variables into a config input. Invalid numbers are
 * skipped with a warning so that the schema defaults apply.
 */
export function configFromEnv(
  env: Env = process.env,
  onWarning: (message: string) => void = (message) => console.warn(`warn: ${message}`),
): RetrievalConfigInput {
  const readInt = (name: string): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") {
      return undefined;
    }
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed) || parsed < 0) {
      onWarning(`ignoring invalid ${name} value '${raw}'`);
      return undefined;
    }
    return parsed;
  };
  const readString = (name: string): string | undefined => {
    const raw = env[name]?.trim();
    return raw ? raw : undefined;
  };

  const input: RetrievalConfigInput = {};
  const corpusDir = readString("APPLIANCE_RAG_CORPUS_DIR");
  if (corpusDir !== undefined) {
    input.corpusDir = corpusDir;
  }
  const indexDir = readString("APPLIANCE_RAG_INDEX_DIR");
  if (indexDir !== undefined) {
    input.indexDir = indexDir;
  }

  const embedding: NonNullable<RetrievalConfigInput["embedding"]> = {};
  const provider = readString("APPLIANCE_RAG_EMBEDDING_PROVIDER");
  if (provider !== undefined) {
    if (provider === "transformers" || provider === "hash") {
      embedding.provider = provider;
    } else {
      onWarning(`ignoring invalid APPLIANCE_RAG_EMBEDDING_PROVIDER value '${provider}'`);
    }
  }
  const model = readString("APPLIANCE_RAG_EMBEDDING_MODEL");
  if (model !== undefined) {
    embedding.model = model;
  }
  const modelCacheDir = readString("APPLIANCE_RAG_MODEL_CACHE_DIR");
  if (modelCacheDir !== undefined) {
    embedding.cacheDir = modelCacheDir;
  }
  if (Object.keys(embedding).length > 0) {
    input.embedding = embedding;
  }

  const chunking: NonNullable<RetrievalConfigInput["chunking"]> = {};
  const windowSize = readInt("APPLIANCE_RAG_CHUNK_SIZE");
  if (windowSize !== undefined) {
    chunking.windowSize = windowSize;
  }
  const overlap = readInt("APPLIANCE_RAG_CHUNK_OVERLAP");
  if (overlap !== undefined) {
    chunking.overlap = overlap;
  }
  if (Object.keys(chunking).length > 0) {
    input.chunking = chunking;
  }

  const ttlMs = readInt("APPLIANCE_RAG_CACHE_TTL_MS");
  if (ttlMs !== undefined) {
    input.cache = { ttlMs };
  }

  return input;
}
