import { toFailure } from "./errors.js";
import {
  clampTopK,
  matchesApplianceType,
  normalizeApplianceFilter,
  queryWords,
  searchError,
  toSearchHit,
  type TopKLimits,
} from "./search-common.js";
import {
  SEARCH_METHOD_FALLBACK,
  type Passage,
  type SearchRequest,
  type SearchResponse,
} from "./types.js";

export interface LexicalSearchOptions {
  /** Supplies the passages to scan; called once per search. */
  loadPassages: () => Promise<readonly Passage[]>;
  limits?: TopKLimits;
}

/**
 * Word-overlap search that needs no embedding model. A passage scores the
 * fraction of distinct query words found in its lower-cased content; passages
 * matching no word are dropped.
 */
export class LexicalSearchEngine {
  private readonly loadPassages: () => Promise<readonly Passage[]>;
  private readonly limits: TopKLimits | undefined;

  constructor(options: LexicalSearchOptions) {
    this.loadPassages = options.loadPassages;
    this.limits = options.limits;
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const query = request.query.trim();
    const applianceType = normalizeApplianceFilter(request.applianceType);
    if (!query) {
      return searchError("query is required", "invalid-request", request.query, applianceType);
    }

    const topK = clampTopK(request.topK, this.limits);
    const words = queryWords(query);

    let passages: readonly Passage[];
    try {
      passages = await this.loadPassages();
    } catch (error) {
      const failure = toFailure(error, "configuration");
      return searchError(failure.message, failure.kind, query, applianceType);
    }

    const scored = passages
      .map((passage, position) => ({
        passage,
        position,
        score: scorePassage(passage, words),
      }))
      .filter((entry) => entry.score > 0 && matchesApplianceType(entry.passage, applianceType))
      .sort((a, b) => b.score - a.score || a.position - b.position);

    const results = scored.slice(0, topK).map(({ passage, score }) => toSearchHit(passage, score));

    return {
      query,
      applianceType,
      results,
      totalFound: results.length,
      method: SEARCH_METHOD_FALLBACK,
    };
  }
}

export function scorePassage(passage: Passage, words: string[]): number {
  if (words.length === 0) {
    return 0;
  }

  const haystack = [passage.symptom, passage.issueTitle, passage.text, ...passage.instructions]
    .join(" ")
    .toLowerCase();

  let matched = 0;
  for (const word of words) {
    if (haystack.includes(word)) {
      matched += 1;
    }
  }
  return matched / words.length;
}
