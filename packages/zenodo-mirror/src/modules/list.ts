import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { createApiClient, requireApiKey, type ApiClient, type KeyStore } from "../lib/api-client.js";
import { getMirrorLimits, type ResolvedConfig } from "../lib/config.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { enumerateRecords } from "../lib/enumerator.js";
import { buildMetadataIndex } from "../lib/metadata-index.js";
import { getRecordSize, getRecordTitle, type ArchiveRecord } from "../lib/records.js";
import type { DelayFn } from "../lib/ports/timer.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isJsonMode } from "../lib/cli-context.js";
import { createSpinner } from "../lib/spinner.js";
import { outputSuccess, type ListResultJson } from "../lib/json-output.js";
import { addRunOptions, loadRunConfig, type RunOptions } from "./run-options.js";

export interface ListDependencies {
  keyStore: KeyStore;
  api?: ApiClient;
  delay?: DelayFn;
  logger?: Logger;
}

export interface ListResult {
  records: ArchiveRecord[];
  stoppedEarly: boolean;
}

const TITLE_COLUMN_WIDTH = 50;

/**
 * Human-readable byte count, e.g. `1.5 MB`.
 */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

function truncate(text: string, width: number): string {
  const chars = Array.from(text);
  return chars.length > width ? `${chars.slice(0, width - 1).join("")}…` : text;
}

export function formatRecordTable(records: ArchiveRecord[]): string {
  const table = new CliTable3({
    head: [
      chalk.cyan("ID"),
      chalk.cyan("Title"),
      chalk.cyan("Files"),
      chalk.cyan("Size"),
      chalk.cyan("Published"),
    ],
  });

  for (const record of records) {
    table.push([
      String(record.id),
      truncate(getRecordTitle(record), TITLE_COLUMN_WIDTH),
      String(record.files.length),
      formatBytes(getRecordSize(record)),
      record.metadata.publication_date ?? "-",
    ]);
  }

  return table.toString();
}

/**
 * Enumerate a community without downloading anything.
 */
export async function runList(config: ResolvedConfig, deps: ListDependencies): Promise<ListResult> {
  const apiKey = requireApiKey(config.apiKey, deps.keyStore);
  const logger =
    deps.logger ?? createLogger({ level: config.logLevel, json: config.logJson, redact: [apiKey] });
  const api = deps.api ?? createApiClient({ baseUrl: config.baseUrl, accessToken: apiKey });

  const spinner = createSpinner("Fetching records...").start();
  const { records, stoppedEarly } = await enumerateRecords({
    api,
    communityId: config.communityId,
    pageSize: config.pageSize,
    pageDelayMs: config.pageDelayMs,
    limits: getMirrorLimits(config),
    logger,
    delay: deps.delay,
    onPage: ({ page, fetched, total }) => {
      spinner.text = `Fetched page ${page} (${fetched}/${total} records)`;
    },
  });

  if (stoppedEarly) {
    spinner.fail(`Listing stopped early after ${records.length} records`);
  } else {
    spinner.succeed(`Found ${records.length} records`);
  }

  return { records, stoppedEarly };
}

export function registerListCommand(program: Command, deps: ListDependencies): void {
  const list = program
    .command("list")
    .description("List a community's records without downloading anything");

  addRunOptions(list).action(async (options: RunOptions) => {
    try {
      const config = loadRunConfig(options);
      const { records, stoppedEarly } = await runList(config, deps);

      if (isJsonMode()) {
        const result: ListResultJson = {
          community: config.communityId,
          total: records.length,
          stoppedEarly,
          records: buildMetadataIndex(records),
        };
        outputSuccess(result);
        return;
      }

      if (records.length === 0) {
        console.log(chalk.yellow("No records found."));
        return;
      }

      console.log(formatRecordTable(records));
      console.log(
        chalk.gray(`${records.length} records, ${formatBytes(records.reduce((s, r) => s + getRecordSize(r), 0))}`)
      );
    } catch (error) {
      renderUnknownError(error);
      process.exitCode = 1;
    }
  });
}
