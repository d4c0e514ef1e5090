import { readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { IndexStore, type IndexStoreOptions } from "../src/index-store.js";
import type { EmbeddingProvider } from "../src/types.js";
import {
  DISHWASHER_DOCUMENT,
  ICE_MAKER_DOCUMENT,
  KeywordEmbeddingProvider,
  REPAIR_VOCABULARY,
  UnavailableEmbeddingProvider,
  makeTempDir,
  removeTempDirs,
  writeCorpus,
} from "./helpers.js";

const tempDirs: string[] = [];
const BUILT_AT = new Date("2026-01-02T03:04:05.000Z");

const MANY_FAULTS_DOCUMENT = {
  symptom_title: "Won't start",
  url: "https://example.com/dryer/wont-start",
  repair_sections: Array.from({ length: 12 }, (_, index) => ({
    title: `Fault ${index + 1}`,
    description: `Check the drum motor wiring, step ${index + 1}`,
    instructions: ["Unplug the dryer first"],
  })),
};

afterEach(async () => {
  await removeTempDirs(tempDirs);
});

async function setup(files: Record<string, unknown> = {
  "refrigerator/ice-maker.json": ICE_MAKER_DOCUMENT,
  "dishwasher/drain.json": DISHWASHER_DOCUMENT,
}) {
  const root = await makeTempDir(tempDirs, "appliance-rag-store-");
  const corpusDir = path.join(root, "data");
  const indexDir = path.join(root, ".rag_index");
  await writeCorpus(corpusDir, files);
  const warnings: string[] = [];

  const openStore = (
    provider: EmbeddingProvider,
    overrides: Partial<IndexStoreOptions> = {},
  ): IndexStore =>
    new IndexStore({
      corpusDir,
      indexDir,
      provider,
      onWarning: (message) => warnings.push(message),
      now: () => BUILT_AT,
      ...overrides,
    });

  return { corpusDir, indexDir, warnings, openStore };
}

describe("IndexStore.loadOrBuild", () => {
  it("builds once and then loads for an unchanged corpus", async () => {
    const { openStore } = await setup();
    const provider = new KeywordEmbeddingProvider(REPAIR_VOCABULARY);
    const store = openStore(provider);

    const first = await store.loadOrBuild();
    const second = await store.loadOrBuild();

    if (!first.ok || !second.ok) throw new Error("expected both builds to succeed");
    expect(first.summary).toEqual({
      status: "built",
      documents: 3,
      appliances: ["Dishwasher", "Refrigerator"],
      fingerprint: first.summary.fingerprint,
      model: "keyword-test",
      createdAt: "2026-01-02T03:04:05.000Z",
    });
    expect(second.summary.status).toBe("loaded");
    expect(second.summary.fingerprint).toBe(first.summary.fingerprint);
    expect(provider.embedCalls).toBe(1);
    expect(provider.roles).toEqual(["passage"]);
  });

  it("reloads a snapshot of more than ten passages without re-embedding", async () => {
    const { openStore, warnings } = await setup({ "dryer/wont-start.json": MANY_FAULTS_DOCUMENT });
    const built = await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).loadOrBuild();
    if (!built.ok) throw new Error("expected the build to succeed");
    expect(built.summary.documents).toBe(12);

    const provider = new KeywordEmbeddingProvider(REPAIR_VOCABULARY);
    const reopened = openStore(provider);
    const loaded = await reopened.loadOrBuild();

    expect(loaded.ok && loaded.summary.status).toBe("loaded");
    expect(provider.embedCalls).toBe(0);
    expect(reopened.current()?.index.size).toBe(12);
    expect(warnings).toEqual([]);
  });

  it("loads the persisted snapshot in a new store", async () => {
    const { openStore } = await setup();
    const built = await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).loadOrBuild();

    const provider = new KeywordEmbeddingProvider(REPAIR_VOCABULARY);
    const reopened = openStore(provider);
    const loaded = await reopened.loadOrBuild();

    if (!built.ok || !loaded.ok) throw new Error("expected both builds to succeed");
    expect(loaded.summary.status).toBe("loaded");
    expect(loaded.summary.fingerprint).toBe(built.summary.fingerprint);
    expect(loaded.snapshot.passages.map((passage) => passage.id)).toEqual(
      built.snapshot.passages.map((passage) => passage.id),
    );
    expect(provider.embedCalls).toBe(0);
  });

  it("keeps vectors aligned with passages across persistence", async () => {
    const { openStore } = await setup();
    const built = await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).loadOrBuild();
    const loaded = await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).loadOrBuild();

    if (!built.ok || !loaded.ok) throw new Error("expected both builds to succeed");
    const { snapshot } = loaded;
    expect(snapshot.index.size).toBe(snapshot.passages.length);
    expect(snapshot.index.dimensions).toBe(REPAIR_VOCABULARY.length);

    for (let row = 0; row < snapshot.index.size; row += 1) {
      const expected = built.snapshot.index.vectorAt(row) ?? [];
      const actual = snapshot.index.vectorAt(row) ?? [];
      expect(actual).toHaveLength(expected.length);
      actual.forEach((value, i) => expect(value).toBeCloseTo(expected[i] ?? Number.NaN, 6));
    }
  });

  it("rebuilds when a source file changes", async () => {
    const { corpusDir, openStore, warnings } = await setup();
    const store = openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY));
    const first = await store.loadOrBuild();

    await writeCorpus(corpusDir, {
      "dishwasher/drain.json": {
        ...DISHWASHER_DOCUMENT,
        symptom_title: "Not draining!",
      },
    });
    const second = await store.loadOrBuild();

    if (!first.ok || !second.ok) throw new Error("expected both builds to succeed");
    expect(second.summary.status).toBe("built");
    expect(second.summary.fingerprint).not.toBe(first.summary.fingerprint);
    expect(second.snapshot.passages[0]?.symptom).toBe("Not draining!");
    expect(warnings.some((message) => message.startsWith("corpus changed"))).toBe(true);
  });

  it("rebuilds when forced", async () => {
    const { openStore } = await setup();
    const provider = new KeywordEmbeddingProvider(REPAIR_VOCABULARY);
    const store = openStore(provider);
    await store.loadOrBuild();

    const forced = await store.loadOrBuild(true);

    expect(forced.ok && forced.summary.status).toBe("built");
    expect(provider.embedCalls).toBe(2);
  });

  it("rebuilds when the embedding provider changes", async () => {
    const { openStore, warnings } = await setup();
    await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).loadOrBuild();

    const other = await openStore(
      new KeywordEmbeddingProvider(["ice", "maker", "drain"]),
    ).loadOrBuild();

    expect(other.ok && other.summary.status).toBe("built");
    expect(warnings).toContain(
      "embedding provider changed since the snapshot was built; rebuilding index",
    );
  });

  it("treats corrupt metadata as no snapshot", async () => {
    const { indexDir, openStore, warnings } = await setup();
    await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).loadOrBuild();
    await writeFile(path.join(indexDir, "snapshot", "snapshot-meta.json"), "{not json");

    const rebuilt = await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).loadOrBuild();

    expect(rebuilt.ok && rebuilt.summary.status).toBe("built");
    expect(warnings).toContain("index snapshot invalidated: corrupt snapshot-meta.json");
  });

  it("treats an older snapshot format as no snapshot", async () => {
    const { indexDir, openStore, warnings } = await setup();
    await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).loadOrBuild();
    const metaPath = path.join(indexDir, "snapshot", "snapshot-meta.json");
    await writeFile(
      metaPath,
      JSON.stringify({ model: "keyword-test", fingerprint: "abc", documents: [] }),
    );

    const rebuilt = await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).loadOrBuild();

    expect(rebuilt.ok && rebuilt.summary.status).toBe("built");
    expect(warnings).toContain("index snapshot invalidated: unrecognised snapshot format");
    const meta: unknown = JSON.parse(await readFile(metaPath, "utf8"));
    expect(meta).toMatchObject({ snapshot_version: "1", documents_count: 3 });
  });

  it("keeps the previous snapshot when a rebuild fails", async () => {
    const { corpusDir, openStore } = await setup();
    const provider = new KeywordEmbeddingProvider(REPAIR_VOCABULARY);
    const store = openStore(provider);
    const first = await store.loadOrBuild();
    if (!first.ok) throw new Error("expected the first build to succeed");

    await writeCorpus(corpusDir, { "washer/new.json": { issue: "Water on the floor" } });
    provider.failEmbeddings = true;
    const failed = await store.loadOrBuild();

    expect(failed).toEqual({
      ok: false,
      failure: {
        kind: "transient-build",
        message: "Failed to generate embeddings: embedding backend crashed",
      },
    });
    expect(store.current()).toBe(first.snapshot);

    const description = await store.describe();
    expect(description.persisted?.corpusFingerprint).toBe(first.summary.fingerprint);
  });

  it("reports a missing corpus directory as a configuration failure", async () => {
    const { corpusDir, openStore } = await setup();
    const missing = path.join(corpusDir, "missing");
    const store = openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY), {
      corpusDir: missing,
    });

    expect(await store.loadOrBuild()).toEqual({
      ok: false,
      failure: { kind: "configuration", message: `Data directory does not exist: ${missing}` },
    });
  });

  it("reports a corpus with nothing to index", async () => {
    const { corpusDir, openStore } = await setup({ "notes.json": [] });

    expect(await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).loadOrBuild()).toEqual({
      ok: false,
      failure: {
        kind: "configuration",
        message: `No repair data found to index in ${corpusDir}`,
      },
    });
  });

  it("reports an unavailable embedding provider", async () => {
    const { openStore } = await setup();

    expect(await openStore(new UnavailableEmbeddingProvider()).loadOrBuild()).toEqual({
      ok: false,
      failure: {
        kind: "unavailable",
        message: "embedding provider unavailable: model runtime not installed",
      },
    });
  });

  it("restores a snapshot left behind by an interrupted swap", async () => {
    const { indexDir, openStore, warnings } = await setup();
    await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).loadOrBuild();
    await rename(path.join(indexDir, "snapshot"), path.join(indexDir, "snapshot.old"));

    const provider = new KeywordEmbeddingProvider(REPAIR_VOCABULARY);
    const recovered = await openStore(provider).loadOrBuild();

    expect(recovered.ok && recovered.summary.status).toBe("loaded");
    expect(provider.embedCalls).toBe(0);
    expect(warnings).toContain("restoring previous index snapshot after an interrupted write");
  });
});

describe("IndexStore.ensureSnapshot", () => {
  it("shares one initialisation between concurrent callers", async () => {
    const { openStore } = await setup();
    const provider = new KeywordEmbeddingProvider(REPAIR_VOCABULARY);
    const store = openStore(provider);

    const [a, b] = await Promise.all([store.ensureSnapshot(), store.ensureSnapshot()]);
    const c = await store.ensureSnapshot();

    if (!a.ok || !b.ok || !c.ok) throw new Error("expected snapshots");
    expect(b.snapshot).toBe(a.snapshot);
    expect(c.snapshot).toBe(a.snapshot);
    expect(provider.embedCalls).toBe(1);
  });

  it("does not retry a failed build until the corpus changes", async () => {
    const { corpusDir, openStore } = await setup();
    const provider = new KeywordEmbeddingProvider(REPAIR_VOCABULARY);
    provider.failEmbeddings = true;
    const store = openStore(provider);

    const outcomes = [
      await store.ensureSnapshot(),
      await store.ensureSnapshot(),
      await store.ensureSnapshot(),
    ];

    const failure = {
      kind: "transient-build",
      message: "Failed to generate embeddings: embedding backend crashed",
    };
    expect(outcomes).toEqual([
      { ok: false, failure },
      { ok: false, failure },
      { ok: false, failure },
    ]);
    expect(provider.embedCalls).toBe(1);

    await writeCorpus(corpusDir, { "washer/noisy.json": { issue: "Noisy drum" } });
    await store.ensureSnapshot();
    expect(provider.embedCalls).toBe(2);
  });

  it("builds again when asked directly after a failed build", async () => {
    const { openStore } = await setup();
    const provider = new KeywordEmbeddingProvider(REPAIR_VOCABULARY);
    provider.failEmbeddings = true;
    const store = openStore(provider);
    await store.ensureSnapshot();

    provider.failEmbeddings = false;
    expect((await store.ensureSnapshot()).ok).toBe(false);

    const rebuilt = await store.loadOrBuild();
    const served = await store.ensureSnapshot();

    expect(rebuilt.ok && rebuilt.summary.status).toBe("built");
    expect(served.ok && served.snapshot).toBe(store.current());
    expect(provider.embedCalls).toBe(2);
  });

  it("serialises concurrent rebuilds", async () => {
    const { openStore } = await setup();
    const provider = new KeywordEmbeddingProvider(REPAIR_VOCABULARY);
    const store = openStore(provider);

    const outcomes = await Promise.all([store.loadOrBuild(true), store.loadOrBuild(true)]);

    expect(outcomes.map((outcome) => outcome.ok && outcome.summary.status)).toEqual([
      "built",
      "built",
    ]);
    const second = outcomes[1];
    if (!second?.ok) throw new Error("expected the second build to succeed");
    expect(store.current()).toBe(second.snapshot);
  });
});

describe("IndexStore.describe", () => {
  it("reports nothing before the first build", async () => {
    const { openStore } = await setup();
    expect(await openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY)).describe()).toEqual({
      inMemory: false,
      persisted: null,
    });
  });

  it("reports the persisted metadata", async () => {
    const { openStore } = await setup();
    const store = openStore(new KeywordEmbeddingProvider(REPAIR_VOCABULARY));
    const built = await store.loadOrBuild();
    if (!built.ok) throw new Error("expected the build to succeed");

    expect(await store.describe()).toEqual({
      inMemory: true,
      persisted: {
        model: "keyword-test",
        provider: "keyword",
        corpusFingerprint: built.summary.fingerprint,
        documents: 3,
        dimensions: REPAIR_VOCABULARY.length,
        createdAt: "2026-01-02T03:04:05.000Z",
      },
    });
  });
});
