import type { Command } from "commander";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import { invalidConfig, invalidOption } from "../lib/errors/catalog.js";

/** Flags shared by the commands that talk to the archive */
export interface RunOptions {
  debug?: boolean;
  community?: string;
  dataDir?: string;
  pageSize?: string;
  concurrency?: string;
  config?: string;
}

export function addRunOptions(command: Command): Command {
  return command
    .option("--debug", "Limited mode: at most 2 records and 2 files per record")
    .option("--community <id>", "Community identifier to mirror")
    .option("--data-dir <dir>", "Directory the mirror is written to")
    .option("--page-size <n>", "Records requested per listing page (1-100)")
    .option("--concurrency <n>", "Parallel file downloads within a record (1-8)")
    .option("-c, --config <path>", "Use a specific config file");
}

/**
 * Parse an integer flag. Undefined when the flag wasn't given.
 */
export function parseIntegerOption(
  name: string,
  value: string | undefined,
  min: number,
  max: number
): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw invalidOption(name, `expected a whole number from ${min} to ${max}, got "${value}"`);
  }
  return parsed;
}

/**
 * Config values given on the command line.
 */
export function toConfigOverrides(options: RunOptions): Partial<ResolvedConfig> {
  return {
    debug: options.debug,
    communityId: options.community,
    dataDir: options.dataDir,
    pageSize: parseIntegerOption("page-size", options.pageSize, 1, 100),
    concurrency: parseIntegerOption("concurrency", options.concurrency, 1, 8),
  };
}

/**
 * Resolve the configuration for a run from the flags, the environment and
 * the config files. A broken config file becomes a validation error.
 */
export function loadRunConfig(options: RunOptions, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const overrides = toConfigOverrides(options);
  try {
    return loadConfig(options.config, overrides, env).config;
  } catch (error) {
    throw invalidConfig(error instanceof Error ? error.message : String(error));
  }
}
