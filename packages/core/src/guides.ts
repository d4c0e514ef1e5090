import { normalizeApplianceFilter } from "./search-common.js";
import type { RetrievalEngine } from "./search.js";
import {
  SEARCH_METHOD_FALLBACK,
  isSearchError,
  type Citation,
  type RepairGuideGroup,
  type RepairGuideResponse,
  type RepairSection,
  type SearchHit,
} from "./types.js";

export interface GuideSettings {
  topKPerQuery: number;
  componentKeywords: string[];
  maxCitations: number;
}

export interface RepairGuideRequest {
  applianceType: string;
  focus?: string;
}

const GENERAL_GROUP = "General";

/** Symptom-, repair- and failure-oriented paraphrases of the same subject. */
export function repairGuideQueries(applianceType: string, focus?: string): string[] {
  const subject = [applianceType.trim(), focus?.trim() ?? ""].filter(Boolean).join(" ");
  return [
    `common ${subject} symptoms problems`,
    `${subject} repair issues troubleshooting`,
    `${subject} not working broken symptoms`,
  ];
}

export function toRepairSection(hit: SearchHit): RepairSection {
  return {
    id: hit.id,
    symptom: hit.symptom,
    issueTitle: hit.issueTitle,
    description: descriptionFromText(hit.text),
    instructions: [...hit.instructions],
    relatedParts: hit.relatedParts.map((part) => ({ ...part })),
    confidenceScore: Math.round(hit.score * 1000) / 1000,
    score: hit.score,
    source: hit.sourceFile,
  };
}

function descriptionFromText(text: string): string {
  for (const line of text.split("\n")) {
    if (line.startsWith("Description:")) {
      return line.slice("Description:".length).trim();
    }
  }
  return "";
}

/** Keeps the first section for each case-insensitive `symptom_issueTitle`. */
export function dedupeSections(sections: RepairSection[]): RepairSection[] {
  const seen = new Set<string>();
  const unique: RepairSection[] = [];
  for (const section of sections) {
    const key = `${section.symptom}_${section.issueTitle}`.toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(section);
  }
  return unique;
}

/**
 * Groups sections by symptom. When the query names a component and grouping
 * by issue title gives strictly fewer buckets, the component view wins.
 */
export function groupSections(
  sections: RepairSection[],
  queryText: string,
  settings: Pick<GuideSettings, "componentKeywords" | "maxCitations">,
): { groupedBy: "symptom" | "component"; groups: RepairGuideGroup[] } {
  const bySymptom = bucket(sections, (section) => section.symptom || GENERAL_GROUP);

  const lowered = queryText.toLowerCase();
  const mentionsComponent = settings.componentKeywords.some((keyword) =>
    lowered.includes(keyword.toLowerCase()),
  );
  if (mentionsComponent) {
    const byComponent = bucket(
      sections,
      (section) => `Component: ${section.issueTitle || GENERAL_GROUP}`,
    );
    if (byComponent.size < bySymptom.size) {
      return { groupedBy: "component", groups: rankGroups(byComponent, settings.maxCitations) };
    }
  }

  return { groupedBy: "symptom", groups: rankGroups(bySymptom, settings.maxCitations) };
}

function bucket(
  sections: RepairSection[],
  keyOf: (section: RepairSection) => string,
): Map<string, RepairSection[]> {
  const buckets = new Map<string, RepairSection[]>();
  for (const section of sections) {
    const key = keyOf(section);
    const list = buckets.get(key) ?? [];
    list.push(section);
    buckets.set(key, list);
  }
  return buckets;
}

function rankGroups(buckets: Map<string, RepairSection[]>, maxCitations: number): RepairGuideGroup[] {
  const groups: RepairGuideGroup[] = [];
  for (const [key, members] of buckets) {
    const sorted = [...members].sort((a, b) => b.score - a.score);
    const [representative] = sorted;
    if (!representative) {
      continue;
    }
    const citations: Citation[] = sorted
      .slice(0, maxCitations)
      .map((section) => ({ id: section.id, source: section.source, score: section.score }));
    groups.push({ key, representative, sections: sorted, citations });
  }
  return groups.sort((a, b) => b.representative.score - a.representative.score);
}

/**
 * Composes a grouped repair guide for one appliance from several
 * paraphrased searches.
 */
export async function buildRepairGuide(
  engine: Pick<RetrievalEngine, "searchMany">,
  request: RepairGuideRequest,
  settings: GuideSettings,
): Promise<RepairGuideResponse> {
  const applianceType = normalizeApplianceFilter(request.applianceType);
  if (applianceType === null) {
    return { error: "applianceType is required", kind: "invalid-request", applianceType: "" };
  }

  const queries = repairGuideQueries(applianceType, request.focus);
  const response = await engine.searchMany({
    queries,
    applianceType,
    topK: settings.topKPerQuery,
  });
  if (isSearchError(response)) {
    return { error: response.error, kind: response.kind, applianceType };
  }

  const sections = dedupeSections(response.results.map(toRepairSection));
  const { groupedBy, groups } = groupSections(sections, queries.join(" "), settings);

  return {
    applianceType,
    query: response.query,
    method: response.method,
    totalIssuesFound: sections.length,
    groupedBy,
    groups,
    note:
      response.method === SEARCH_METHOD_FALLBACK
        ? "Data retrieved from local repair database using simple text search"
        : "Data retrieved from local repair database using semantic search",
  };
}
