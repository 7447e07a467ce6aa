/**
 * Doctor command - diagnostics and health check.
 * Verifies the Node.js runtime, configuration, API key, archive connectivity
 * and the data directory.
 */

import { Command } from "commander";
import chalk from "chalk";
import os from "os";
import { accessSync, constants, mkdirSync } from "fs";
import { resolve } from "path";
import { createApiClient, resolveApiKey, type ApiClient, type KeyStore } from "../lib/api-client.js";
import { loadConfig, readEnvOverrides, type ResolvedConfig } from "../lib/config.js";
import { createSpinner } from "../lib/spinner.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outputSuccess, type DoctorResultJson } from "../lib/json-output.js";
import { CLI_VERSION } from "../lib/version.js";
import { isCLIError } from "../lib/errors/types.js";

type CheckResult = DoctorResultJson["checks"][number];

export interface DoctorDependencies {
  keyStore: KeyStore;
  /** Builds the client used for the connectivity check */
  createApi?: (baseUrl: string, accessToken: string) => ApiClient;
  /** Loads the configuration; a throw is reported as a failed check */
  loadConfig?: (explicitPath?: string) => { config: ResolvedConfig; sources: string[] };
  now?: () => number;
  /** Environment read for the key when the configuration fails to load */
  env?: NodeJS.ProcessEnv;
}

/** Oldest Node.js major this tool runs on */
export const MIN_NODE_MAJOR = 20;

export function registerDoctorCommand(program: Command, deps: DoctorDependencies): void {
  program
    .command("doctor")
    .description("Check configuration, API key and connectivity")
    .option("--verbose", "Show detailed diagnostic information")
    .option("-c, --config <path>", "Use a specific config file")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("What it checks:")}
  ${chalk.yellow("•")} Node.js version compatibility
  ${chalk.yellow("•")} Configuration file validity
  ${chalk.yellow("•")} API key presence and acceptance
  ${chalk.yellow("•")} Network connectivity to the archive
  ${chalk.yellow("•")} Data directory is writable

${chalk.bold.cyan("Examples:")}
  zenodo-mirror doctor              ${chalk.gray("Run all diagnostic checks")}
  zenodo-mirror doctor --verbose    ${chalk.gray("Show detailed information")}
  zenodo-mirror doctor --json       ${chalk.gray("Output as JSON for scripting")}
`
    )
    .action(async (options: { verbose?: boolean; config?: string }) => {
      const result = await runDoctor(deps, options.config);
      printDoctorReport(result, options.verbose ?? false);
    });
}

export function checkNodeVersion(version: string): CheckResult {
  const major = parseInt(version.replace(/^v/, "").split(".")[0], 10);
  if (major >= MIN_NODE_MAJOR) {
    return { name: "Node.js version", status: "pass", message: `Node.js ${version}` };
  }
  return {
    name: "Node.js version",
    status: "fail",
    message: `Node.js ${version} (requires >= ${MIN_NODE_MAJOR})`,
    details: `Upgrade Node.js to version ${MIN_NODE_MAJOR} or higher`,
  };
}

export function checkDataDir(dataDir: string): CheckResult {
  const path = resolve(dataDir);
  try {
    mkdirSync(path, { recursive: true });
    accessSync(path, constants.W_OK);
    return { name: "Data directory", status: "pass", message: `${path} is writable` };
  } catch (error) {
    return {
      name: "Data directory",
      status: "fail",
      message: `${path} is not writable`,
      details: error instanceof Error ? error.message : String(error),
    };
  }
}

export async function runDoctor(
  deps: DoctorDependencies,
  explicitConfigPath?: string
): Promise<DoctorResultJson> {
  const load = deps.loadConfig ?? loadConfig;
  const createApi =
    deps.createApi ?? ((baseUrl: string, accessToken: string) => createApiClient({ baseUrl, accessToken }));
  const now = deps.now ?? Date.now;

  const spinner = createSpinner("Running diagnostics...").start();
  const checks: CheckResult[] = [checkNodeVersion(process.version)];

  // Configuration
  let config: ResolvedConfig | undefined;
  let sources: string[] = [];
  try {
    ({ config, sources } = load(explicitConfigPath));
    checks.push({
      name: "Configuration",
      status: "pass",
      message: sources.length > 0 ? `Loaded ${sources.join(", ")}` : "Using defaults (no config file)",
    });
  } catch (error) {
    checks.push({
      name: "Configuration",
      status: "fail",
      message: "Config file has errors",
      details: error instanceof Error ? error.message : String(error),
    });
  }

  // API key
  const envKey = config ? config.apiKey : readEnvOverrides(deps.env).apiKey;
  const { apiKey, source } = resolveApiKey(envKey, deps.keyStore);
  if (apiKey) {
    checks.push({
      name: "API key",
      status: "pass",
      message: source === "environment" ? "ZENODO_API_KEY is set" : "Using the stored key",
    });
  } else {
    checks.push({
      name: "API key",
      status: "fail",
      message: "No API key",
      details: "Set ZENODO_API_KEY or run: zenodo-mirror auth set-key",
    });
  }

  // Connectivity, with a one-record listing
  const baseUrl = config?.baseUrl ?? "";
  let reachable = false;
  let latencyMs: number | undefined;

  if (config && apiKey) {
    spinner.text = "Contacting the archive...";
    const api = createApi(config.baseUrl, apiKey);
    const startTime = now();
    try {
      const page = await api.listRecords({ communityId: config.communityId, page: 1, size: 1 });
      latencyMs = now() - startTime;
      reachable = true;
      checks.push({
        name: "Archive connectivity",
        status: "pass",
        message: `Connected to ${baseUrl} (${latencyMs}ms)`,
        details: `Community lists ${page.total} records`,
      });
    } catch (error) {
      checks.push({
        name: "Archive connectivity",
        status: "fail",
        message: error instanceof Error ? error.message : "Request failed",
        details: isCLIError(error) ? error.details : undefined,
      });
    }
  }

  if (config) {
    checks.push(checkDataDir(config.dataDir));
  }

  spinner.stop();

  return {
    checks: checks.map((c) => ({
      name: c.name,
      status: c.status,
      message: c.message,
      ...(c.details && { details: c.details }),
    })),
    system: {
      os: `${os.platform()} ${os.release()}`,
      nodeVersion: process.version,
      cliVersion: CLI_VERSION,
      configSources: sources,
    },
    network: {
      baseUrl,
      reachable,
      ...(latencyMs !== undefined && { latencyMs }),
    },
    auth: {
      hasCredentials: apiKey !== undefined,
      source,
    },
  };
}

function printDoctorReport(result: DoctorResultJson, verbose: boolean): void {
  const failCount = result.checks.filter((c) => c.status === "fail").length;
  if (failCount > 0) {
    process.exitCode = 1;
  }

  if (isJsonMode()) {
    outputSuccess(result);
    return;
  }

  console.log("");
  console.log(chalk.bold.cyan("Diagnostics Report"));
  console.log(chalk.dim("─".repeat(50)));

  for (const check of result.checks) {
    const icon = check.status === "pass" ? chalk.green("✓") :
                 check.status === "warn" ? chalk.yellow("⚠") :
                 chalk.red("✗");
    console.log(`${icon} ${chalk.bold(check.name)}: ${check.message}`);
    if (verbose && check.details) {
      console.log(chalk.dim(`    ${check.details}`));
    }
  }

  console.log("");
  console.log(chalk.dim("─".repeat(50)));
  console.log(chalk.bold("System Information:"));
  console.log(`  OS: ${result.system.os}`);
  console.log(`  Node.js: ${result.system.nodeVersion}`);
  console.log(`  CLI: v${result.system.cliVersion}`);
  console.log(`  API: ${result.network.baseUrl}`);

  const passCount = result.checks.filter((c) => c.status === "pass").length;
  const warnCount = result.checks.filter((c) => c.status === "warn").length;

  console.log("");
  if (failCount > 0) {
    console.log(chalk.red(`✗ ${failCount} check(s) failed`));
  } else if (warnCount > 0) {
    console.log(chalk.yellow(`⚠ ${passCount} passed, ${warnCount} warning(s)`));
  } else {
    console.log(chalk.green(`✓ All ${passCount} checks passed`));
  }

  if (!verbose && (failCount > 0 || warnCount > 0)) {
    console.log(chalk.dim("\nRun with --verbose for more details"));
  }
}
