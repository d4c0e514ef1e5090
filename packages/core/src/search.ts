import { normalizeVector } from "./embedding.js";
import { errorMessage } from "./errors.js";
import type { SnapshotOutcome } from "./index-store.js";
import type { LexicalSearchEngine } from "./lexical.js";
import {
  clampTopK,
  fetchCount,
  issueKey,
  matchesApplianceType,
  normalizeApplianceFilter,
  searchError,
  toSearchHit,
} from "./search-common.js";
import {
  SEARCH_METHOD_MULTI_QUERY,
  SEARCH_METHOD_VECTOR,
  type EmbeddingProvider,
  type MultiSearchRequest,
  type RetrievalFailure,
  type SearchHit,
  type SearchRequest,
  type SearchResponse,
  type VectorMatch,
} from "./types.js";

export interface SearchSettings {
  defaultTopK: number;
  maxTopK: number;
  fetchMultiplier: number;
  minFetch: number;
  fallbackTopK: number;
  fallbackEnabled: boolean;
}

/** Anything that can hand out the current index snapshot. */
export interface SnapshotSource {
  ensureSnapshot(): Promise<SnapshotOutcome>;
}

export interface RetrievalEngineOptions {
  store: SnapshotSource;
  provider: EmbeddingProvider;
  lexical: LexicalSearchEngine;
  settings: SearchSettings;
  onWarning?: (message: string) => void;
}

type VectorOutcome = { ok: true; hits: SearchHit[] } | { ok: false; failure: RetrievalFailure };

/**
 * Semantic search over the current snapshot. When the vector path cannot
 * serve a query the lexical engine answers instead and the response is
 * tagged with the fallback method.
 */
export class RetrievalEngine {
  private readonly store: SnapshotSource;
  private readonly provider: EmbeddingProvider;
  private readonly lexical: LexicalSearchEngine;
  private readonly settings: SearchSettings;
  private readonly onWarning: (message: string) => void;
  private degradedNoticeSent = false;

  constructor(options: RetrievalEngineOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.lexical = options.lexical;
    this.settings = options.settings;
    this.onWarning = options.onWarning ?? ((message: string) => console.warn(`warn: ${message}`));
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const query = request.query.trim();
    const applianceType = normalizeApplianceFilter(request.applianceType);
    if (!query) {
      return searchError("query is required", "invalid-request", request.query, applianceType);
    }

    const topK = clampTopK(request.topK, this.settings);
    const outcome = await this.vectorSearch(query, applianceType, topK);
    if (!outcome.ok) {
      return this.fallback(query, applianceType, topK, outcome.failure);
    }

    return {
      query,
      applianceType,
      results: outcome.hits,
      totalFound: outcome.hits.length,
      method: SEARCH_METHOD_VECTOR,
    };
  }

  /**
   * Runs each query in turn and merges the results in query order, keeping
   * the first hit seen for every `(symptom, issueTitle)` pair.
   */
  async searchMany(request: MultiSearchRequest): Promise<SearchResponse> {
    const queries = request.queries.map((query) => query.trim()).filter(Boolean);
    const applianceType = normalizeApplianceFilter(request.applianceType);
    const joined = queries.join(" | ");
    const [firstQuery] = queries;
    if (firstQuery === undefined) {
      return searchError("at least one query is required", "invalid-request", joined, applianceType);
    }

    const topK = clampTopK(request.topK, this.settings);
    const merged: SearchHit[] = [];
    const seen = new Set<string>();

    for (const query of queries) {
      const outcome = await this.vectorSearch(query, applianceType, topK);
      if (!outcome.ok) {
        return this.fallback(firstQuery, applianceType, this.settings.fallbackTopK, outcome.failure);
      }

      for (const hit of outcome.hits) {
        const key = issueKey(hit);
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
        merged.push(hit);
      }
    }

    return {
      query: joined,
      applianceType,
      results: merged,
      totalFound: merged.length,
      method: SEARCH_METHOD_MULTI_QUERY,
    };
  }

  private async vectorSearch(
    query: string,
    applianceType: string | null,
    topK: number,
  ): Promise<VectorOutcome> {
    const availability = await this.provider.availability();
    if (!availability.available) {
      return {
        ok: false,
        failure: {
          kind: "unavailable",
          message: `embedding provider unavailable: ${availability.reason}`,
        },
      };
    }

    const outcome = await this.store.ensureSnapshot();
    if (!outcome.ok) {
      return outcome;
    }
    const { index, passages } = outcome.snapshot;

    let matches: VectorMatch[];
    try {
      const [vector] = await this.provider.embed([query], "query");
      if (!vector) {
        throw new Error("embedding provider returned no vector for the query");
      }
      matches = index.search(normalizeVector(vector), fetchCount(topK, this.settings));
    } catch (error) {
      return {
        ok: false,
        failure: { kind: "unavailable", message: `vector search failed: ${errorMessage(error)}` },
      };
    }

    const hits: SearchHit[] = [];
    for (const match of matches) {
      const passage = passages[match.row];
      if (!passage || !matchesApplianceType(passage, applianceType)) {
        continue;
      }
      hits.push(toSearchHit(passage, match.score));
      if (hits.length >= topK) {
        break;
      }
    }
    return { ok: true, hits };
  }

  private async fallback(
    query: string,
    applianceType: string | null,
    topK: number,
    failure: RetrievalFailure,
  ): Promise<SearchResponse> {
    if (!this.settings.fallbackEnabled) {
      return searchError(failure.message, failure.kind, query, applianceType);
    }

    if (!this.degradedNoticeSent) {
      this.degradedNoticeSent = true;
      this.onWarning(`vector search unavailable (${failure.message}); using simple text search`);
    }

    const request: SearchRequest = { query, topK };
    if (applianceType !== null) {
      request.applianceType = applianceType;
    }
    return this.lexical.search(request);
  }
}
