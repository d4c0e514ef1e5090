import { createHash } from "node:crypto";
import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { buildPassagesFromJson } from "./chunking.js";
import { ConfigurationError } from "./errors.js";
import type { ChunkingOptions, Passage } from "./types.js";

export interface CorpusFile {
  /** Absolute path on disk. */
  absolutePath: string;
  /** Corpus-relative POSIX path. */
  relativePath: string;
}

export interface CorpusOptions {
  corpusDir: string;
  excludedFiles?: string[];
}

export async function assertCorpusDir(corpusDir: string): Promise<string> {
  const resolved = path.resolve(corpusDir);
  let isDirectory = false;
  try {
    isDirectory = (await stat(resolved)).isDirectory();
  } catch {
    isDirectory = false;
  }
  if (!isDirectory) {
    throw new ConfigurationError(`Data directory does not exist: ${resolved}`);
  }
  return resolved;
}

/**
 * Every JSON document under the corpus directory, in lexicographic order of
 * its relative path. Excluded names (raw scrape caches) are skipped.
 */
export async function listCorpusFiles(options: CorpusOptions): Promise<CorpusFile[]> {
  const corpusDir = await assertCorpusDir(options.corpusDir);
  const excluded = new Set(options.excludedFiles ?? []);

  const entries = await fg(["**/*.json"], {
    cwd: corpusDir,
    onlyFiles: true,
    dot: false,
  });

  return entries
    .filter((relative) => !excluded.has(path.posix.basename(relative)))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((relative) => ({
      absolutePath: path.join(corpusDir, ...relative.split("/")),
      relativePath: relative,
    }));
}

/**
 * Hash of the corpus identity: for every eligible file, its relative path,
 * modification time and full content, folded in enumeration order.
 */
export async function computeCorpusFingerprint(options: CorpusOptions): Promise<string> {
  const files = await listCorpusFiles(options);
  const hash = createHash("sha256");

  for (const file of files) {
    const [info, bytes] = await Promise.all([stat(file.absolutePath), readFile(file.absolutePath)]);
    hash.update(file.relativePath);
    hash.update("\0");
    hash.update(String(info.mtimeMs));
    hash.update("\0");
    hash.update(bytes);
    hash.update("\0");
  }

  return hash.digest("hex");
}

export interface CollectPassagesResult {
  passages: Passage[];
  files: number;
  skippedFiles: string[];
}

/**
 * Reads and chunks every corpus document. Unreadable or empty documents are
 * reported and skipped; they never fail the run.
 */
export async function collectPassages(
  options: CorpusOptions & {
    chunking?: ChunkingOptions;
    onWarning?: (message: string) => void;
    onFile?: (file: CorpusFile, index: number, total: number) => void;
  },
): Promise<CollectPassagesResult> {
  const files = await listCorpusFiles(options);
  const passages: Passage[] = [];
  const skippedFiles: string[] = [];

  for (const [index, file] of files.entries()) {
    options.onFile?.(file, index, files.length);

    let json: string;
    try {
      json = await readFile(file.absolutePath, "utf8");
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      options.onWarning?.(`skipping ${file.relativePath}: ${detail}`);
      skippedFiles.push(file.relativePath);
      continue;
    }

    const filePassages = buildPassagesFromJson({
      sourceFile: file.relativePath,
      json,
      ...(options.chunking ? { chunking: options.chunking } : {}),
      ...(options.onWarning ? { onWarning: options.onWarning } : {}),
    });
    if (filePassages.length === 0) {
      skippedFiles.push(file.relativePath);
    }
    passages.push(...filePassages);
  }

  return { passages, files: files.length, skippedFiles };
}
