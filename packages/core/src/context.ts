import { parseRetrievalConfig, type RetrievalConfig } from "./config.js";
import { collectPassages } from "./corpus.js";
import { createEmbeddingProvider } from "./embedding.js";
import { buildRepairGuide, type RepairGuideRequest } from "./guides.js";
import { IndexStore, type BuildOutcome, type IndexStoreProgressEvent } from "./index-store.js";
import { LexicalSearchEngine } from "./lexical.js";
import { ResultCache, cacheKey } from "./result-cache.js";
import { RetrievalEngine } from "./search.js";
import {
  isRepairGuideError,
  isSearchError,
  type EmbeddingProvider,
  type RepairGuideResponse,
  type SearchRequest,
  type SearchResponse,
} from "./types.js";

export const SEARCH_TOOL = "search_repair_guides";
export const GUIDES_TOOL = "get_repair_guides";

export interface RetrievalContextOverrides {
  /** Replaces the provider the config would create. */
  provider?: EmbeddingProvider;
  /** Clock in epoch milliseconds, shared by the caches and snapshot timestamps. */
  now?: () => number;
  onWarning?: (message: string) => void;
  onProgress?: (event: IndexStoreProgressEvent) => void;
}

/**
 * Owns one embedding provider, index store, set of engines and result
 * caches. Created once by the host process; nothing here is module-global.
 */
export class RetrievalContext {
  readonly config: RetrievalConfig;
  readonly provider: EmbeddingProvider;
  readonly store: IndexStore;
  readonly lexical: LexicalSearchEngine;
  readonly engine: RetrievalEngine;

  private readonly searchCache: ResultCache<SearchResponse>;
  private readonly guideCache: ResultCache<RepairGuideResponse>;

  constructor(config: RetrievalConfig, overrides: RetrievalContextOverrides = {}) {
    this.config = config;
    const onWarning = overrides.onWarning ?? ((message: string) => console.warn(`warn: ${message}`));
    const now = overrides.now ?? Date.now;

    this.provider = overrides.provider ?? createProviderFromConfig(config);
    this.store = new IndexStore({
      corpusDir: config.corpusDir,
      indexDir: config.indexDir,
      provider: this.provider,
      excludedFiles: config.excludedFiles,
      chunking: config.chunking,
      onWarning,
      now: () => new Date(now()),
      ...(overrides.onProgress ? { onProgress: overrides.onProgress } : {}),
    });

    this.lexical = new LexicalSearchEngine({
      loadPassages: async () => {
        const snapshot = this.store.current();
        if (snapshot) {
          return snapshot.passages;
        }
        const { passages } = await collectPassages({
          corpusDir: config.corpusDir,
          excludedFiles: config.excludedFiles,
          chunking: config.chunking,
          onWarning,
        });
        return passages;
      },
      limits: config.search,
    });

    this.engine = new RetrievalEngine({
      store: this.store,
      provider: this.provider,
      lexical: this.lexical,
      settings: config.search,
      onWarning,
    });

    this.searchCache = new ResultCache({ ttlMs: config.cache.ttlMs, now });
    this.guideCache = new ResultCache({ ttlMs: config.cache.ttlMs, now });
  }

  /** Loads or rebuilds the index. A fresh build invalidates cached responses. */
  async buildIndex(forceRebuild = false): Promise<BuildOutcome> {
    const outcome = await this.store.loadOrBuild(forceRebuild);
    if (outcome.ok && outcome.summary.status === "built") {
      this.searchCache.clear();
      this.guideCache.clear();
    }
    return outcome;
  }

  async searchRepairGuides(request: SearchRequest): Promise<SearchResponse> {
    const key = cacheKey(SEARCH_TOOL, {
      query: request.query.trim(),
      applianceType: request.applianceType,
      topK: request.topK,
    });
    const cached = this.searchCache.get(key);
    if (cached) {
      return cached;
    }

    const response = await this.engine.search(request);
    if (!isSearchError(response)) {
      this.searchCache.put(key, response);
    }
    return response;
  }

  async getRepairGuides(request: RepairGuideRequest): Promise<RepairGuideResponse> {
    const key = cacheKey(GUIDES_TOOL, {
      applianceType: request.applianceType,
      focus: request.focus,
    });
    const cached = this.guideCache.get(key);
    if (cached) {
      return cached;
    }

    const response = await buildRepairGuide(this.engine, request, this.config.guides);
    if (!isRepairGuideError(response)) {
      this.guideCache.put(key, response);
    }
    return response;
  }
}

export function createRetrievalContext(
  input: unknown = {},
  overrides: RetrievalContextOverrides = {},
): RetrievalContext {
  return new RetrievalContext(parseRetrievalConfig(input), overrides);
}

function createProviderFromConfig(config: RetrievalConfig): EmbeddingProvider {
  const { embedding } = config;
  return createEmbeddingProvider({
    provider: embedding.provider,
    // The configured model names a transformers checkpoint; the hash provider keeps its own.
    ...(embedding.provider === "transformers" ? { model: embedding.model } : {}),
    batchSize: embedding.batchSize,
    ...(embedding.dimensions !== undefined ? { dimensions: embedding.dimensions } : {}),
    ...(embedding.cacheDir !== undefined ? { cacheDir: embedding.cacheDir } : {}),
  });
}
