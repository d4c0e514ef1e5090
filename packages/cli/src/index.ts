#!/usr/bin/env node

import { createRequire } from "node:module";
import { Command } from "commander";
import {
  createRetrievalContext,
  errorMessage,
  isRepairGuideError,
  isSearchError,
  toFailure,
  type IndexStoreProgressEvent,
  type RetrievalContext,
  type SearchRequest,
} from "@appliance-rag/core";
import {
  formatBuildLine,
  formatFailure,
  formatProgress,
  parseIntOption,
  resolveConfigInput,
  type GlobalOptions,
} from "./options.js";

const require = createRequire(import.meta.url);
const { version: CLI_VERSION } = require("../package.json") as {
  version: string;
};

const program = new Command();

const isTTY = process.stderr.isTTY ?? false;
let progressVisible = false;

function writeProgress(event: IndexStoreProgressEvent) {
  if (!isTTY) return;
  process.stderr.write(`\r\x1b[K${formatProgress(event)}`);
  progressVisible = true;
}

function clearProgress() {
  if (!isTTY || !progressVisible) return;
  process.stderr.write("\r\x1b[K");
  progressVisible = false;
}

function printJson(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}

function openContext(): RetrievalContext | null {
  try {
    return createRetrievalContext(resolveConfigInput(program.opts<GlobalOptions>()), {
      onProgress: writeProgress,
    });
  } catch (error) {
    console.error(formatFailure(toFailure(error, "configuration")));
    process.exitCode = 1;
    return null;
  }
}

program
  .name("appliance-rag")
  .description("Build and query the local appliance repair index")
  .version(CLI_VERSION)
  .option("--corpus-dir <path>", "Directory of repair JSON documents")
  .option("--index-dir <path>", "Directory holding the persisted index snapshot")
  .option("--embedding-provider <provider>", "Embedding provider: transformers | hash")
  .option("--embedding-model <value>", "Embedding model override");

program
  .command("build")
  .description("Load the index snapshot, rebuilding it when the corpus changed")
  .option("--rebuild", "Re-ingest the corpus even if the snapshot is fresh")
  .action(async (options: { rebuild?: boolean }) => {
    const context = openContext();
    if (!context) return;

    const startedAt = Date.now();
    const outcome = await context.buildIndex(options.rebuild ?? false);
    clearProgress();

    if (!outcome.ok) {
      console.error(formatFailure(outcome.failure));
      process.exitCode = 1;
      return;
    }

    const elapsedSec = Math.round((Date.now() - startedAt) / 1000);
    console.warn(formatBuildLine(outcome.summary.status, outcome.summary.documents, elapsedSec));
    printJson(outcome.summary);
  });

program
  .command("search")
  .description("Search repair guides")
  .argument("<query>", "Free-text symptom or repair question")
  .option("--appliance <type>", "Only return results for this appliance type")
  .option("--top-k <number>", "Number of results", parseIntOption)
  .action(async (query: string, options: { appliance?: string; topK?: number }) => {
    const context = openContext();
    if (!context) return;

    const request: SearchRequest = { query };
    if (options.appliance !== undefined) {
      request.applianceType = options.appliance;
    }
    if (options.topK !== undefined) {
      request.topK = options.topK;
    }

    const response = await context.searchRepairGuides(request);
    clearProgress();
    printJson(response);
    if (isSearchError(response)) {
      process.exitCode = 1;
    }
  });

program
  .command("guides")
  .description("Compose a grouped repair guide for one appliance type")
  .argument("<appliance>", "Appliance type, e.g. Refrigerator")
  .option("--focus <text>", "Narrow the guide to a symptom or component")
  .action(async (appliance: string, options: { focus?: string }) => {
    const context = openContext();
    if (!context) return;

    const response = await context.getRepairGuides(
      options.focus !== undefined
        ? { applianceType: appliance, focus: options.focus }
        : { applianceType: appliance },
    );
    clearProgress();
    printJson(response);
    if (isRepairGuideError(response)) {
      process.exitCode = 1;
    }
  });

program
  .command("fingerprint")
  .description("Print the corpus fingerprint without building")
  .action(async () => {
    const context = openContext();
    if (!context) return;

    try {
      printJson({ corpusDir: context.config.corpusDir, fingerprint: await context.store.fingerprint() });
    } catch (error) {
      console.error(formatFailure(toFailure(error, "configuration")));
      process.exitCode = 1;
    }
  });

program
  .command("inspect")
  .description("Describe the persisted index snapshot")
  .action(async () => {
    const context = openContext();
    if (!context) return;

    try {
      printJson({ indexDir: context.config.indexDir, ...(await context.store.describe()) });
    } catch (error) {
      console.error(`error: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });

void program.parseAsync(process.argv);
