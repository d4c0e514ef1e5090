import type {
  FailureKind,
  Passage,
  SearchError,
  SearchHit,
} from "./types.js";

export interface TopKLimits {
  defaultTopK: number;
  maxTopK: number;
}

const DEFAULT_LIMITS: TopKLimits = { defaultTopK: 8, maxTopK: 50 };

export function clampTopK(topK: number | undefined, limits: TopKLimits = DEFAULT_LIMITS): number {
  if (topK === undefined || !Number.isInteger(topK)) {
    return limits.defaultTopK;
  }

  return Math.max(1, Math.min(limits.maxTopK, topK));
}

/**
 * Number of raw candidates to pull before appliance filtering. The vector
 * search itself knows nothing about appliance types.
 */
export function fetchCount(
  topK: number,
  options: { fetchMultiplier: number; minFetch: number },
): number {
  return Math.max(options.fetchMultiplier * topK, options.minFetch);
}

/** Trimmed filter value, or null when no filter applies. */
export function normalizeApplianceFilter(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function matchesApplianceType(passage: Passage, filter: string | null): boolean {
  if (filter === null) {
    return true;
  }
  return passage.applianceType.toLowerCase() === filter.toLowerCase();
}

export function normalizeSearchText(value: string): string {
  return value.toLowerCase().replace(/\s+/g, " ").trim();
}

/** Distinct lower-cased whitespace-separated words, in first-seen order. */
export function queryWords(query: string): string[] {
  return [...new Set(normalizeSearchText(query).split(" ").filter(Boolean))];
}

/** `(symptom, issueTitle)` identity used to collapse the same issue across queries. */
export function issueKey(hit: Pick<SearchHit, "symptom" | "issueTitle">): string {
  return `${hit.symptom}\u0000${hit.issueTitle}`;
}

export function toSearchHit(passage: Passage, score: number): SearchHit {
  return {
    id: passage.id,
    score,
    applianceType: passage.applianceType,
    symptom: passage.symptom,
    issueTitle: passage.issueTitle,
    text: passage.text,
    instructions: [...passage.instructions],
    relatedParts: passage.relatedParts.map((part) => ({ ...part })),
    sourceFile: passage.sourceFile,
    url: passage.url,
  };
}

export function searchError(
  message: string,
  kind: FailureKind,
  query: string,
  applianceType: string | null,
): SearchError {
  return { error: message, kind, query, applianceType };
}
