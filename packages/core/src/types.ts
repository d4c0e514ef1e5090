export const APPLIANCE_TYPES = ["Refrigerator", "Dishwasher", "Washer", "Dryer", "General"] as const;

export type ApplianceType = (typeof APPLIANCE_TYPES)[number];

export interface RelatedPart {
  name: string;
  url: string;
}

export interface Passage {
  id: string;
  text: string;
  applianceType: ApplianceType;
  symptom: string;
  issueTitle: string;
  instructions: string[];
  relatedParts: RelatedPart[];
  sourceFile: string;
  url: string;
}

export interface ChunkingOptions {
  windowSize: number;
  overlap: number;
}

export type EmbeddingRole = "query" | "passage";

export type EmbeddingAvailability =
  | { available: true }
  | { available: false; reason: string };

export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;
  readonly configFingerprint: string;
  readonly batchSize?: number;
  /**
   * Capability probe. Loads the underlying model on first call; the outcome
   * is remembered for the lifetime of the provider.
   */
  availability(): Promise<EmbeddingAvailability>;
  embed(texts: string[], role: EmbeddingRole): Promise<number[][]>;
}

export interface EmbedProgressEvent {
  phase: "embedding";
  completed: number;
  total: number;
}

export interface VectorMatch {
  row: number;
  score: number;
}

export type FailureKind = "configuration" | "unavailable" | "transient-build" | "invalid-request";

export interface RetrievalFailure {
  kind: FailureKind;
  message: string;
}

export const SEARCH_METHOD_VECTOR = "RAG (Vector search)";
export const SEARCH_METHOD_MULTI_QUERY = "RAG (Multi-query search)";
export const SEARCH_METHOD_FALLBACK = "Simple text search (fallback)";

export type SearchMethod =
  | typeof SEARCH_METHOD_VECTOR
  | typeof SEARCH_METHOD_MULTI_QUERY
  | typeof SEARCH_METHOD_FALLBACK;

export interface SearchRequest {
  query: string;
  applianceType?: string;
  topK?: number;
}

export interface MultiSearchRequest {
  queries: string[];
  applianceType?: string;
  topK?: number;
}

export interface SearchHit {
  id: string;
  score: number;
  applianceType: ApplianceType;
  symptom: string;
  issueTitle: string;
  text: string;
  instructions: string[];
  relatedParts: RelatedPart[];
  sourceFile: string;
  url: string;
}

export interface SearchSuccess {
  query: string;
  applianceType: string | null;
  results: SearchHit[];
  totalFound: number;
  method: SearchMethod;
}

export interface SearchError {
  error: string;
  kind: FailureKind;
  query: string;
  applianceType: string | null;
}

export type SearchResponse = SearchSuccess | SearchError;

export interface RepairSection {
  id: string;
  symptom: string;
  issueTitle: string;
  description: string;
  instructions: string[];
  relatedParts: RelatedPart[];
  confidenceScore: number;
  score: number;
  source: string;
}

export interface Citation {
  id: string;
  source: string;
  score: number;
}

export interface RepairGuideGroup {
  key: string;
  representative: RepairSection;
  sections: RepairSection[];
  citations: Citation[];
}

export interface RepairGuide {
  applianceType: string;
  query: string;
  method: SearchMethod;
  totalIssuesFound: number;
  groupedBy: "symptom" | "component";
  groups: RepairGuideGroup[];
  note: string;
}

export interface RepairGuideError {
  error: string;
  kind: FailureKind;
  applianceType: string;
}

export type RepairGuideResponse = RepairGuide | RepairGuideError;

export function isSearchError(response: SearchResponse): response is SearchError {
  return "error" in response;
}

export function isRepairGuideError(response: RepairGuideResponse): response is RepairGuideError {
  return "error" in response;
}
