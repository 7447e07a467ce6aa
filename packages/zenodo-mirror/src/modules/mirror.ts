import { Command } from "commander";
import chalk from "chalk";
import { resolve } from "path";
import {
  createApiClient,
  requireApiKey,
  type ApiClient,
  type KeyStore,
} from "../lib/api-client.js";
import { getMirrorLimits, DEBUG_LIMITS, type ResolvedConfig } from "../lib/config.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { enumerateRecords } from "../lib/enumerator.js";
import { writeMetadataIndex } from "../lib/metadata-index.js";
import { mirrorRecord, selectFiles, type FileStatus, type MirrorEvent } from "../lib/file-mirror.js";
import { getRecordTitle } from "../lib/records.js";
import { createFetchDownloadService } from "../lib/adapters/index.js";
import type { DelayFn, DownloadService } from "../lib/ports/index.js";
import { noRecordsFound } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isJsonMode } from "../lib/cli-context.js";
import { createSpinner } from "../lib/spinner.js";
import { outputSuccess, type MirrorRecordJson, type MirrorResultJson } from "../lib/json-output.js";
import { CLI_VERSION } from "../lib/version.js";
import { addRunOptions, loadRunConfig, type RunOptions } from "./run-options.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MirrorDependencies {
  keyStore: KeyStore;
  /** Built from the resolved config and key when omitted */
  api?: ApiClient;
  download?: DownloadService;
  delay?: DelayFn;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

function say(line: string): void {
  if (!isJsonMode()) {
    console.log(line);
  }
}

function printEvent(event: MirrorEvent): void {
  switch (event.type) {
    case "no-files":
      say(chalk.yellow("  No files to download"));
      break;
    case "skipped":
      say(chalk.gray(`  Skipping ${event.file} (already exists)`));
      break;
    case "downloading":
      say(`  Downloading ${event.file} (${event.size} bytes)...`);
      break;
    case "downloaded":
      say(chalk.green(`  ✓ Downloaded ${event.file}`));
      break;
    case "failed":
      say(chalk.red(`  ✗ Error downloading ${event.file}: ${event.error}`));
      break;
  }
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

/**
 * Mirror a community: list its records, write the metadata index, then
 * download every record's files in listing order.
 *
 * Throws only before any file work starts: when there is no API key, or
 * when the listing produced no records. Failed pages and failed files are
 * reported in the returned summary.
 */
export async function runMirror(
  config: ResolvedConfig,
  deps: MirrorDependencies
): Promise<MirrorResultJson> {
  const apiKey = requireApiKey(config.apiKey, deps.keyStore);
  const logger =
    deps.logger ?? createLogger({ level: config.logLevel, json: config.logJson, redact: [apiKey] });
  const api = deps.api ?? createApiClient({ baseUrl: config.baseUrl, accessToken: apiKey });
  const download = deps.download ?? createFetchDownloadService({ accessToken: apiKey });
  const limits = getMirrorLimits(config);

  say(chalk.bold.cyan("Zenodo Community Mirror"));
  say(chalk.dim("─".repeat(40)));
  if (limits) {
    say(
      chalk.yellow(
        `DEBUG MODE: limiting to ${DEBUG_LIMITS.records} records and ${DEBUG_LIMITS.filesPerRecord} files per record`
      )
    );
  }

  const spinner = createSpinner("Fetching records...").start();
  const listing = await enumerateRecords({
    api,
    communityId: config.communityId,
    pageSize: config.pageSize,
    pageDelayMs: config.pageDelayMs,
    limits,
    logger,
    delay: deps.delay,
    onPage: ({ page, fetched }) => {
      spinner.text = `Fetched page ${page}, total records so far: ${fetched}`;
    },
  });
  spinner.stop();

  const { records } = listing;
  if (records.length === 0) {
    throw noRecordsFound(config.communityId);
  }

  say(`Found ${records.length} records`);
  if (listing.stoppedEarly) {
    say(chalk.yellow("Listing stopped early; continuing with the records fetched so far"));
  }

  const metadataFile = writeMetadataIndex(config.dataDir, config.metadataFileName, records);
  say(`Metadata saved to ${metadataFile}`);

  const summaries: MirrorRecordJson[] = [];

  for (const [index, record] of records.entries()) {
    const title = getRecordTitle(record);
    say(chalk.bold(`\n[${index + 1}/${records.length}] Processing record ${record.id}: ${title}`));

    const fileCount = selectFiles(record, limits).length;
    if (fileCount > 0) {
      const note = fileCount < record.files.length ? chalk.yellow(" (DEBUG MODE - limiting files)") : "";
      say(`Files to download: ${fileCount}${note}`);
    }

    const result = await mirrorRecord(record, {
      dataDir: config.dataDir,
      download,
      logger,
      concurrency: config.concurrency,
      limits,
      onEvent: printEvent,
    });

    if (result.total > 0) {
      say(`  Downloaded ${result.succeeded}/${result.total} files successfully`);
    }

    const count = (status: FileStatus) => result.outcomes.filter((o) => o.status === status).length;
    summaries.push({
      id: record.id,
      title,
      directory: result.directory,
      total: result.total,
      succeeded: result.succeeded,
      skipped: count("skipped"),
      downloaded: count("downloaded"),
      failed: count("failed"),
    });
  }

  const dataDir = resolve(config.dataDir);
  say(chalk.green(`\n✓ Download complete! Data saved to ${dataDir}`));

  return {
    community: config.communityId,
    dataDir,
    metadataFile,
    debug: config.debug,
    stoppedEarly: listing.stoppedEarly,
    records: summaries,
    summary: {
      records: summaries.length,
      files: summaries.reduce((sum, r) => sum + r.total, 0),
      downloaded: summaries.reduce((sum, r) => sum + r.downloaded, 0),
      skipped: summaries.reduce((sum, r) => sum + r.skipped, 0),
      failed: summaries.reduce((sum, r) => sum + r.failed, 0),
    },
  };
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerMirrorCommand(program: Command, deps: MirrorDependencies): void {
  const mirror = program
    .command("mirror", { isDefault: true })
    .description("Mirror a community's metadata and files to the local data directory")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  zenodo-mirror                          ${chalk.gray("Mirror the configured community")}
  zenodo-mirror --debug                  ${chalk.gray("Try it on 2 records, 2 files each")}
  zenodo-mirror --data-dir /srv/mirror   ${chalk.gray("Write somewhere else")}
  zenodo-mirror --json                   ${chalk.gray("Print a JSON summary when done")}
`
    );

  addRunOptions(mirror).action(async (options: RunOptions) => {
    try {
      const startedAt = Date.now();
      const config = loadRunConfig(options);
      const result = await runMirror(config, deps);
      if (isJsonMode()) {
        outputSuccess(result, { version: CLI_VERSION, duration: Date.now() - startedAt });
      }
    } catch (error) {
      renderUnknownError(error);
      process.exitCode = 1;
    }
  });
}
