import { sha256hex } from "./embedding.js";
import type { ApplianceType, ChunkingOptions, Passage, RelatedPart } from "./types.js";

type JsonRecord = Record<string, unknown>;

export type ClassifiedDocument =
  | { shape: "list"; records: JsonRecord[] }
  | { shape: "items"; records: JsonRecord[] }
  | { shape: "single"; records: JsonRecord[] }
  | { shape: "invalid"; records: [] };

/** Passage fields before an id is assigned. */
type PassageDraft = Omit<Passage, "id" | "sourceFile" | "applianceType">;

export const DEFAULT_CHUNKING: ChunkingOptions = {
  windowSize: 2200,
  overlap: 300,
};

/** Checked in order: "dishwasher" has to win over "washer". */
const PATH_APPLIANCE_KEYS: Array<[string, ApplianceType]> = [
  ["refrigerator", "Refrigerator"],
  ["dishwasher", "Dishwasher"],
  ["washer", "Washer"],
  ["dryer", "Dryer"],
];

const FLAT_RECORD_FIELDS = [
  "issue",
  "title",
  "symptom",
  "description",
  "summary",
  "steps",
  "causes",
  "fix",
  "how_to",
  "notes",
] as const;

// ─── Public API ──────────────────────────────────────────────────

/**
 * Derives the appliance label from a file path alone. Document content is
 * never consulted.
 */
export function applianceTypeFromPath(filepath: string): ApplianceType {
  const lowered = filepath.toLowerCase();
  for (const [key, label] of PATH_APPLIANCE_KEYS) {
    if (lowered.includes(key)) {
      return label;
    }
  }
  return "General";
}

export function classifyDocument(raw: unknown): ClassifiedDocument {
  if (Array.isArray(raw)) {
    return { shape: "list", records: raw.filter(isRecord) };
  }
  if (!isRecord(raw)) {
    return { shape: "invalid", records: [] };
  }
  if (Array.isArray(raw.items)) {
    return { shape: "items", records: raw.items.filter(isRecord) };
  }
  return { shape: "single", records: [raw] };
}

/**
 * Splits text into overlapping character windows. The last window is the
 * first one that reaches the end of the text.
 */
export function chunkText(text: string, options: ChunkingOptions = DEFAULT_CHUNKING): string[] {
  if (!text) {
    return [];
  }
  if (options.windowSize <= 0 || options.overlap < 0 || options.overlap >= options.windowSize) {
    throw new Error(
      `invalid chunking window (windowSize=${options.windowSize}, overlap=${options.overlap})`,
    );
  }

  const step = options.windowSize - options.overlap;
  const windows: string[] = [];
  for (let start = 0; start < text.length; start += step) {
    windows.push(text.slice(start, start + options.windowSize));
    if (start + options.windowSize >= text.length) {
      break;
    }
  }
  return windows;
}

export interface BuildPassagesInput {
  /** Corpus-relative POSIX path; used for provenance, ids and the appliance label. */
  sourceFile: string;
  document: unknown;
  chunking?: ChunkingOptions;
}

export function buildPassages(input: BuildPassagesInput): Passage[] {
  if (!input.sourceFile.trim()) {
    throw new Error("sourceFile is required");
  }

  const chunking = input.chunking ?? DEFAULT_CHUNKING;
  const applianceType = applianceTypeFromPath(input.sourceFile);
  const { records } = classifyDocument(input.document);

  const drafts: PassageDraft[] = [];
  for (const record of records) {
    drafts.push(...extractRecord(record, applianceType, chunking));
  }

  return drafts
    .filter((draft) => draft.text.trim().length > 0)
    .map((draft, offset) => ({
      id: `${input.sourceFile}#${sha256hex(draft.text).slice(0, 12)}-${offset}`,
      applianceType,
      sourceFile: input.sourceFile,
      ...draft,
    }));
}

/**
 * Parses a JSON document and builds its passages. A document that fails to
 * parse contributes nothing; the warning hook is told why.
 */
export function buildPassagesFromJson(input: {
  sourceFile: string;
  json: string;
  chunking?: ChunkingOptions;
  onWarning?: (message: string) => void;
}): Passage[] {
  let document: unknown;
  try {
    document = JSON.parse(input.json);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    input.onWarning?.(`skipping ${input.sourceFile}: invalid JSON (${detail})`);
    return [];
  }

  const passages = buildPassages({
    sourceFile: input.sourceFile,
    document,
    ...(input.chunking ? { chunking: input.chunking } : {}),
  });
  if (passages.length === 0) {
    input.onWarning?.(`skipping ${input.sourceFile}: no indexable text`);
  }
  return passages;
}

// ─── Record extraction ───────────────────────────────────────────

function extractRecord(
  record: JsonRecord,
  applianceType: ApplianceType,
  chunking: ChunkingOptions,
): PassageDraft[] {
  const structured = [
    ...(Array.isArray(record.repair_sections) ? extractRepairSections(record) : []),
    ...(Array.isArray(record.common_symptoms) ? extractCommonSymptoms(record, applianceType) : []),
    ...(Array.isArray(record.troubleshooting_videos)
      ? extractTroubleshootingVideos(record, applianceType)
      : []),
  ];

  const hasStructuredKeys =
    "repair_sections" in record || "common_symptoms" in record || "troubleshooting_videos" in record;
  if (hasStructuredKeys) {
    return structured;
  }

  return extractFlatRecord(record, chunking);
}

function extractRepairSections(record: JsonRecord): PassageDraft[] {
  const symptom = asString(record.symptom_title);
  const url = asString(record.url);

  return asRecords(record.repair_sections).map((section) => {
    const issueTitle = asString(section.title);
    const instructions = asStrings(section.instructions);
    const relatedParts = asRelatedParts(section.related_parts);
    const partNames = relatedParts.map((part) => part.name).filter(Boolean);

    const text = joinLines([
      symptom && `Symptom: ${symptom}`,
      issueTitle && `Issue: ${issueTitle}`,
      asString(section.description) && `Description: ${asString(section.description)}`,
      instructions.length > 0 && `Instructions: ${instructions.join(" | ")}`,
      partNames.length > 0 && `Related Parts: ${partNames.join(" | ")}`,
    ]);

    return { text, symptom, issueTitle, instructions, relatedParts, url };
  });
}

function extractCommonSymptoms(record: JsonRecord, applianceType: ApplianceType): PassageDraft[] {
  const applianceLabel = asString(record.appliance_type) || applianceType;

  return asRecords(record.common_symptoms).map((entry) => {
    const title = asString(entry.title);
    const description = asString(entry.description);
    const percentage = asNumber(entry.reported_by_percentage);

    const text = joinLines([
      title && `Common Symptom: ${title}`,
      description && `Description: ${description}`,
      percentage > 0 && `Reported by ${percentage}% of customers`,
      `Appliance: ${applianceLabel}`,
    ]);

    return {
      // A passage holding only the appliance label carries no content.
      text: title || description ? text : "",
      symptom: title,
      issueTitle: title ? `Common ${title} Problem` : "",
      instructions: description ? [description] : [],
      relatedParts: [],
      url: asString(entry.url),
    };
  });
}

function extractTroubleshootingVideos(
  record: JsonRecord,
  applianceType: ApplianceType,
): PassageDraft[] {
  const applianceLabel = asString(record.appliance_type) || applianceType;

  return asRecords(record.troubleshooting_videos).map((video) => {
    const title = asString(video.title);
    const url = asString(video.url);
    const videoId = asString(video.video_id);

    const text = joinLines([
      title && `Troubleshooting Video: ${title}`,
      url && `Video URL: ${url}`,
      videoId && `Video ID: ${videoId}`,
      `Appliance: ${applianceLabel}`,
      "Video troubleshooting guide available",
    ]);

    return {
      text: title || url ? text : "",
      symptom: "Video Guide",
      issueTitle: title,
      instructions: url ? [`Watch troubleshooting video: ${url}`] : [],
      relatedParts: [],
      url,
    };
  });
}

function extractFlatRecord(record: JsonRecord, chunking: ChunkingOptions): PassageDraft[] {
  const lines: string[] = [];
  for (const key of FLAT_RECORD_FIELDS) {
    const value = record[key];
    const rendered = Array.isArray(value)
      ? value.filter(isScalar).map(String).join(" | ")
      : isScalar(value)
        ? String(value)
        : "";
    if (rendered.trim()) {
      lines.push(`${key}: ${rendered}`);
    }
  }

  const text = lines.join("\n").trim();
  const symptom = asString(record.symptom);
  const issueTitle = asString(record.issue) || asString(record.title);
  const instructions = asStrings(record.steps);
  const url = asString(record.url);

  return chunkText(text, chunking).map((window) => ({
    text: window,
    symptom,
    issueTitle,
    instructions,
    relatedParts: [],
    url,
  }));
}

// ─── Helpers ─────────────────────────────────────────────────────

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function asString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function asNumber(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function asStrings(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is string => typeof entry === "string" && entry.trim() !== "");
}

function asRecords(value: unknown): JsonRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function asRelatedParts(value: unknown): RelatedPart[] {
  return asRecords(value)
    .filter((part) => typeof part.name === "string")
    .map((part) => ({ name: asString(part.name), url: asString(part.url) }));
}

function joinLines(lines: Array<string | false>): string {
  return lines.filter((line): line is string => typeof line === "string" && line !== "").join("\n");
}
