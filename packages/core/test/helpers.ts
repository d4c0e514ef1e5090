import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { computeConfigFingerprint, normalizeVector } from "../src/embedding.js";
import type { EmbeddingAvailability, EmbeddingProvider, EmbeddingRole } from "../src/types.js";

/**
 * One dimension per vocabulary word, counting exact token matches. Rankings
 * are predictable by hand, which a real model's are not.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly name = "keyword";
  readonly model = "keyword-test";
  readonly dimensions: number;
  readonly configFingerprint: string;
  readonly vocabulary: string[];

  embedCalls = 0;
  /** Role of every `embed` call, in call order. */
  readonly roles: EmbeddingRole[] = [];
  failEmbeddings = false;

  constructor(vocabulary: string[]) {
    this.vocabulary = vocabulary;
    this.dimensions = vocabulary.length;
    this.configFingerprint = computeConfigFingerprint({
      provider: this.name,
      model: this.model,
      dimensions: this.dimensions,
      vocabulary: vocabulary.join(","),
    });
  }

  async availability(): Promise<EmbeddingAvailability> {
    return { available: true };
  }

  async embed(texts: string[], role: EmbeddingRole): Promise<number[][]> {
    this.embedCalls += 1;
    this.roles.push(role);
    if (this.failEmbeddings) {
      throw new Error("embedding backend crashed");
    }
    return texts.map((text) => {
      const tokens = text.toLowerCase().split(/[^a-z0-9]+/g);
      return normalizeVector(
        this.vocabulary.map((word) => tokens.filter((token) => token === word).length),
      );
    });
  }
}

/** Behaves like a provider whose model runtime failed to load. */
export class UnavailableEmbeddingProvider implements EmbeddingProvider {
  readonly name = "unavailable";
  readonly model = "missing-model";
  readonly dimensions = 4;
  readonly configFingerprint = "unavailable-test";

  async availability(): Promise<EmbeddingAvailability> {
    return { available: false, reason: "model runtime not installed" };
  }

  async embed(): Promise<number[][]> {
    throw new Error("model runtime not installed");
  }
}

export const REPAIR_VOCABULARY = [
  "ice",
  "maker",
  "door",
  "seal",
  "leaking",
  "water",
  "drain",
  "pump",
  "noisy",
  "fan",
  "motor",
  "drum",
];

export const ICE_MAKER_DOCUMENT = {
  symptom_title: "Refrigerator problems",
  url: "https://example.com/refrigerator/problems",
  repair_sections: [
    {
      title: "Ice maker not working",
      description: "The ice maker stopped making ice",
      instructions: ["Check the water inlet valve"],
      related_parts: [{ name: "Water Inlet Valve", url: "https://example.com/parts/inlet-valve" }],
    },
    {
      title: "Door seal leaking",
      description: "Warm air enters through a torn door seal",
      instructions: ["Replace the door gasket"],
    },
  ],
};

export const DISHWASHER_DOCUMENT = {
  symptom_title: "Not draining",
  url: "https://example.com/dishwasher/not-draining",
  repair_sections: [
    {
      title: "Drain pump clogged",
      description: "Water stays in the tub after a cycle",
      instructions: ["Clean the drain pump filter"],
    },
  ],
};

export const WASHER_NOISE_DOCUMENT = {
  symptom_title: "Noisy",
  url: "https://example.com/washer/noisy",
  repair_sections: [
    {
      title: "Fan motor",
      description: "The fan motor grinds during the spin cycle",
      instructions: ["Replace the motor"],
    },
    {
      title: "Drum bearing",
      description: "A worn drum bearing rumbles loudly",
      instructions: ["Replace the drum bearing"],
    },
  ],
};

export async function makeTempDir(tempDirs: string[], prefix = "appliance-rag-"): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function removeTempDirs(tempDirs: string[]): Promise<void> {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
}

/** Writes each value as JSON at its corpus-relative path. */
export async function writeCorpus(corpusDir: string, files: Record<string, unknown>): Promise<void> {
  for (const [relative, document] of Object.entries(files)) {
    const target = path.join(corpusDir, ...relative.split("/"));
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, JSON.stringify(document, null, 2));
  }
}
