import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { collectPassages, computeCorpusFingerprint } from "./corpus.js";
import { embedPassages } from "./embedding.js";
import {
  ConfigurationError,
  EmbeddingUnavailableError,
  TransientBuildError,
  errorMessage,
  toFailure,
} from "./errors.js";
import { readVectorTable, writeVectorTable } from "./lancedb.js";
import {
  APPLIANCE_TYPES,
  type ApplianceType,
  type ChunkingOptions,
  type EmbeddingProvider,
  type Passage,
  type RetrievalFailure,
} from "./types.js";
import { FlatVectorIndex } from "./vector-index.js";

/** Bumped when the persisted layout changes; older snapshots are rebuilt. */
export const SNAPSHOT_VERSION = "1";

const SNAPSHOT_DIR_NAME = "snapshot";
const SNAPSHOT_TMP_DIR_NAME = "snapshot.tmp";
const SNAPSHOT_OLD_DIR_NAME = "snapshot.old";
const SNAPSHOT_META_FILE = "snapshot-meta.json";
const SNAPSHOT_DB_DIR = ".lancedb";

const PassageSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  applianceType: z.enum(APPLIANCE_TYPES),
  symptom: z.string(),
  issueTitle: z.string(),
  instructions: z.array(z.string()),
  relatedParts: z.array(z.object({ name: z.string(), url: z.string() })),
  sourceFile: z.string(),
  url: z.string(),
});

const SnapshotMetaSchema = z
  .object({
    snapshot_version: z.literal(SNAPSHOT_VERSION),
    model: z.string(),
    provider: z.string(),
    provider_fingerprint: z.string(),
    corpus_fingerprint: z.string(),
    documents_count: z.int().nonnegative(),
    dimensions: z.int().positive(),
    created_at: z.string(),
    passages: z.array(PassageSchema),
  })
  .refine((meta) => meta.documents_count === meta.passages.length, {
    message: "documents_count does not match the number of passages",
  });

type SnapshotMeta = z.output<typeof SnapshotMetaSchema>;

/**
 * An index paired with its row-aligned passages. Never mutated after
 * construction; a rebuild produces a new snapshot and swaps the reference.
 */
export interface IndexSnapshot {
  readonly index: FlatVectorIndex;
  readonly passages: readonly Passage[];
  readonly model: string;
  readonly provider: string;
  readonly providerFingerprint: string;
  readonly corpusFingerprint: string;
  readonly documentCount: number;
  readonly createdAt: string;
}

export interface BuildSummary {
  status: "built" | "loaded";
  documents: number;
  appliances: ApplianceType[];
  fingerprint: string;
  model: string;
  createdAt: string;
}

export type BuildOutcome =
  | { ok: true; summary: BuildSummary; snapshot: IndexSnapshot }
  | { ok: false; failure: RetrievalFailure };

export type SnapshotOutcome =
  | { ok: true; snapshot: IndexSnapshot }
  | { ok: false; failure: RetrievalFailure };

export type IndexStoreProgressEvent =
  | { step: "fingerprinting" }
  | { step: "chunking"; completed: number; total: number }
  | { step: "embedding"; completed: number; total: number }
  | { step: "writing-snapshot" };

export interface SnapshotDescription {
  inMemory: boolean;
  persisted: {
    model: string;
    provider: string;
    corpusFingerprint: string;
    documents: number;
    dimensions: number;
    createdAt: string;
  } | null;
}

export interface IndexStoreOptions {
  corpusDir: string;
  indexDir: string;
  provider: EmbeddingProvider;
  excludedFiles?: string[];
  chunking?: ChunkingOptions;
  onWarning?: (message: string) => void;
  onProgress?: (event: IndexStoreProgressEvent) => void;
  now?: () => Date;
}

export class IndexStore {
  private readonly corpusDir: string;
  private readonly indexDir: string;
  private readonly provider: EmbeddingProvider;
  private readonly excludedFiles: string[];
  private readonly chunking: ChunkingOptions | undefined;
  private readonly onWarning: (message: string) => void;
  private readonly onProgress: ((event: IndexStoreProgressEvent) => void) | undefined;
  private readonly now: () => Date;

  private snapshot: IndexSnapshot | null = null;
  private initializing: Promise<SnapshotOutcome> | null = null;
  /** Last failed build; queries do not retry it while the corpus is unchanged. */
  private failedBuild: { fingerprint: string; failure: RetrievalFailure } | null = null;
  /** Tail of the single-writer queue; every load-or-build runs behind it. */
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(options: IndexStoreOptions) {
    this.corpusDir = path.resolve(options.corpusDir);
    this.indexDir = path.resolve(options.indexDir);
    this.provider = options.provider;
    this.excludedFiles = options.excludedFiles ?? [];
    this.chunking = options.chunking;
    this.onWarning = options.onWarning ?? ((message: string) => console.warn(`warn: ${message}`));
    this.onProgress = options.onProgress;
    this.now = options.now ?? (() => new Date());
  }

  /** The snapshot currently served to queries, if any. */
  current(): IndexSnapshot | null {
    return this.snapshot;
  }

  /**
   * Makes a snapshot available without rebuilding on every call: the first
   * caller starts a load-or-build, concurrent callers share it, later callers
   * get the cached snapshot. After a failed build, callers get that failure
   * back until the corpus changes or `loadOrBuild` is called directly.
   */
  async ensureSnapshot(): Promise<SnapshotOutcome> {
    const existing = this.snapshot;
    if (existing) {
      return { ok: true, snapshot: existing };
    }

    if (!this.initializing) {
      this.initializing = this.loadUnlessFailed()
        .then((outcome): SnapshotOutcome =>
          outcome.ok ? { ok: true, snapshot: outcome.snapshot } : outcome,
        )
        .finally(() => {
          this.initializing = null;
        });
    }
    return this.initializing;
  }

  /**
   * Loads the persisted snapshot when it is still fresh, otherwise runs a full
   * ingestion. Calls are serialised; a rebuild never interleaves with another.
   */
  loadOrBuild(forceRebuild = false): Promise<BuildOutcome> {
    const run = this.writeQueue.then(() => this.runLoadOrBuild(forceRebuild));
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  async describe(): Promise<SnapshotDescription> {
    const meta = await this.readMeta();
    return {
      inMemory: this.snapshot !== null,
      persisted: meta
        ? {
            model: meta.model,
            provider: meta.provider,
            corpusFingerprint: meta.corpus_fingerprint,
            documents: meta.documents_count,
            dimensions: meta.dimensions,
            createdAt: meta.created_at,
          }
        : null,
    };
  }

  fingerprint(): Promise<string> {
    return computeCorpusFingerprint({
      corpusDir: this.corpusDir,
      excludedFiles: this.excludedFiles,
    });
  }

  private async loadUnlessFailed(): Promise<BuildOutcome> {
    const failed = this.failedBuild;
    if (failed) {
      let fingerprint: string;
      try {
        fingerprint = await this.fingerprint();
      } catch (error) {
        return { ok: false, failure: toFailure(error, "configuration") };
      }
      if (fingerprint === failed.fingerprint) {
        return { ok: false, failure: failed.failure };
      }
    }
    return this.loadOrBuild(false);
  }

  private async runLoadOrBuild(forceRebuild: boolean): Promise<BuildOutcome> {
    let fingerprint: string;
    try {
      this.onProgress?.({ step: "fingerprinting" });
      fingerprint = await this.fingerprint();
    } catch (error) {
      return { ok: false, failure: toFailure(error, "configuration") };
    }

    if (!forceRebuild) {
      const inMemory = this.snapshot;
      if (inMemory && this.isFresh(inMemory, fingerprint)) {
        this.failedBuild = null;
        return { ok: true, snapshot: inMemory, summary: summarize(inMemory, "loaded") };
      }

      await this.recoverInterruptedSwap();
      const persisted = await this.readPersisted();
      if (persisted && this.isFresh(persisted, fingerprint)) {
        this.snapshot = persisted;
        this.failedBuild = null;
        return { ok: true, snapshot: persisted, summary: summarize(persisted, "loaded") };
      }
      if (persisted) {
        this.onWarning(
          persisted.corpusFingerprint !== fingerprint
            ? `corpus changed (fingerprint ${persisted.corpusFingerprint.slice(0, 16)} -> ${fingerprint.slice(0, 16)}); rebuilding index`
            : `embedding provider changed since the snapshot was built; rebuilding index`,
        );
      }
    } else {
      await this.recoverInterruptedSwap();
    }

    try {
      const { snapshot, vectors } = await this.buildSnapshot(fingerprint);
      await this.persist(snapshot, vectors);
      this.snapshot = snapshot;
      this.failedBuild = null;
      return { ok: true, snapshot, summary: summarize(snapshot, "built") };
    } catch (error) {
      const failure = toFailure(error, "transient-build");
      this.failedBuild = { fingerprint, failure };
      return { ok: false, failure };
    }
  }

  private isFresh(snapshot: IndexSnapshot, fingerprint: string): boolean {
    return (
      snapshot.corpusFingerprint === fingerprint &&
      snapshot.providerFingerprint === this.provider.configFingerprint
    );
  }

  private async buildSnapshot(
    fingerprint: string,
  ): Promise<{ snapshot: IndexSnapshot; vectors: number[][] }> {
    const availability = await this.provider.availability();
    if (!availability.available) {
      throw new EmbeddingUnavailableError(`embedding provider unavailable: ${availability.reason}`);
    }

    const { passages } = await collectPassages({
      corpusDir: this.corpusDir,
      excludedFiles: this.excludedFiles,
      onWarning: this.onWarning,
      ...(this.chunking ? { chunking: this.chunking } : {}),
      onFile: (_file, index, total) =>
        this.onProgress?.({ step: "chunking", completed: index + 1, total }),
    });
    if (passages.length === 0) {
      throw new ConfigurationError(`No repair data found to index in ${this.corpusDir}`);
    }

    let vectors: number[][];
    try {
      vectors = await embedPassages(
        this.provider,
        passages.map((passage) => passage.text),
        {
          onProgress: (event) =>
            this.onProgress?.({ step: "embedding", completed: event.completed, total: event.total }),
        },
      );
    } catch (error) {
      if (error instanceof EmbeddingUnavailableError) {
        throw error;
      }
      throw new TransientBuildError(`Failed to generate embeddings: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const index = new FlatVectorIndex();
    try {
      index.add(vectors);
    } catch (error) {
      throw new TransientBuildError(`Failed to create vector index: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (index.size !== passages.length || index.dimensions === null) {
      throw new TransientBuildError(
        `vector index holds ${index.size} rows for ${passages.length} passages`,
      );
    }

    return {
      snapshot: {
        index,
        passages,
        model: this.provider.model,
        provider: this.provider.name,
        providerFingerprint: this.provider.configFingerprint,
        corpusFingerprint: fingerprint,
        documentCount: passages.length,
        createdAt: this.now().toISOString(),
      },
      vectors,
    };
  }

  /**
   * Writes the snapshot next to the live one and swaps directories, so a
   * crash mid-write leaves the previous snapshot in place.
   */
  private async persist(snapshot: IndexSnapshot, vectors: number[][]): Promise<void> {
    const { liveDir, tmpDir, oldDir } = this.snapshotDirs();
    const meta: SnapshotMeta = {
      snapshot_version: SNAPSHOT_VERSION,
      model: snapshot.model,
      provider: snapshot.provider,
      provider_fingerprint: snapshot.providerFingerprint,
      corpus_fingerprint: snapshot.corpusFingerprint,
      documents_count: snapshot.documentCount,
      dimensions: snapshot.index.dimensions ?? 0,
      created_at: snapshot.createdAt,
      passages: [...snapshot.passages],
    };

    try {
      this.onProgress?.({ step: "writing-snapshot" });
      await mkdir(this.indexDir, { recursive: true });
      await rm(tmpDir, { recursive: true, force: true });
      await mkdir(tmpDir, { recursive: true });
      await writeVectorTable(path.join(tmpDir, SNAPSHOT_DB_DIR), vectors);
      await writeFile(path.join(tmpDir, SNAPSHOT_META_FILE), JSON.stringify(meta, null, 2));

      await rm(oldDir, { recursive: true, force: true });
      if (await exists(liveDir)) {
        await rename(liveDir, oldDir);
      }
      await rename(tmpDir, liveDir);
    } catch (error) {
      await rm(tmpDir, { recursive: true, force: true }).catch((cleanupError: unknown) => {
        this.onWarning(`failed to remove ${tmpDir}: ${errorMessage(cleanupError)}`);
      });
      throw new TransientBuildError(`Failed to save index files: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    await rm(oldDir, { recursive: true, force: true }).catch((cleanupError: unknown) => {
      this.onWarning(`failed to remove ${oldDir}: ${errorMessage(cleanupError)}`);
    });
  }

  /**
   * A crash between the two renames leaves only `snapshot.old`; put it back.
   * Partial `snapshot.tmp` directories are discarded.
   */
  private async recoverInterruptedSwap(): Promise<void> {
    const { liveDir, tmpDir, oldDir } = this.snapshotDirs();
    try {
      if (!(await exists(liveDir)) && (await exists(oldDir))) {
        this.onWarning("restoring previous index snapshot after an interrupted write");
        await rename(oldDir, liveDir);
      }
      await rm(tmpDir, { recursive: true, force: true });
    } catch (error) {
      this.onWarning(`could not tidy index directory: ${errorMessage(error)}`);
    }
  }

  private async readMeta(): Promise<SnapshotMeta | null> {
    const metaPath = path.join(this.snapshotDirs().liveDir, SNAPSHOT_META_FILE);

    let raw: string;
    try {
      raw = await readFile(metaPath, "utf8");
    } catch {
      // No snapshot yet.
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.onWarning("index snapshot invalidated: corrupt snapshot-meta.json");
      return null;
    }

    const parsed = SnapshotMetaSchema.safeParse(json);
    if (!parsed.success) {
      this.onWarning("index snapshot invalidated: unrecognised snapshot format");
      return null;
    }
    return parsed.data;
  }

  private async readPersisted(): Promise<IndexSnapshot | null> {
    const meta = await this.readMeta();
    if (!meta) {
      return null;
    }

    let vectors: number[][];
    try {
      vectors = await readVectorTable(path.join(this.snapshotDirs().liveDir, SNAPSHOT_DB_DIR));
    } catch (error) {
      this.onWarning(`index snapshot invalidated: ${errorMessage(error)}`);
      return null;
    }

    if (vectors.length !== meta.passages.length) {
      this.onWarning(
        `index snapshot invalidated: ${vectors.length} vectors for ${meta.passages.length} passages`,
      );
      return null;
    }

    const index = new FlatVectorIndex(meta.dimensions);
    try {
      index.add(vectors);
    } catch (error) {
      this.onWarning(`index snapshot invalidated: ${errorMessage(error)}`);
      return null;
    }

    return {
      index,
      passages: meta.passages,
      model: meta.model,
      provider: meta.provider,
      providerFingerprint: meta.provider_fingerprint,
      corpusFingerprint: meta.corpus_fingerprint,
      documentCount: meta.documents_count,
      createdAt: meta.created_at,
    };
  }

  private snapshotDirs(): { liveDir: string; tmpDir: string; oldDir: string } {
    return {
      liveDir: path.join(this.indexDir, SNAPSHOT_DIR_NAME),
      tmpDir: path.join(this.indexDir, SNAPSHOT_TMP_DIR_NAME),
      oldDir: path.join(this.indexDir, SNAPSHOT_OLD_DIR_NAME),
    };
  }
}

export function listAppliances(passages: readonly Passage[]): ApplianceType[] {
  return [...new Set(passages.map((passage) => passage.applianceType))].sort((a, b) =>
    a.localeCompare(b),
  );
}

function summarize(snapshot: IndexSnapshot, status: BuildSummary["status"]): BuildSummary {
  return {
    status,
    documents: snapshot.documentCount,
    appliances: listAppliances(snapshot.passages),
    fingerprint: snapshot.corpusFingerprint,
    model: snapshot.model,
    createdAt: snapshot.createdAt,
  };
}

async function exists(targetPath: string): Promise<boolean> {
  try {
    await stat(targetPath);
    return true;
  } catch {
    return false;
  }
}
