import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outputSuccess, type ConfigShowJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# zenodo-mirror Configuration
# Place at ~/.config/zenodo-mirror/config.yaml (user) or
# /etc/zenodo-mirror/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. Environment (ZENODO_API_KEY, DEBUG)
# 3. User config (~/.config/zenodo-mirror/config.yaml)
# 4. System config (/etc/zenodo-mirror/config.yaml)
# 5. Built-in defaults
#
# The API key is never read from this file. Export ZENODO_API_KEY or run
# 'zenodo-mirror auth set-key'.

# Community to mirror
community:
  # Community identifier (UUID)
  id: "c2f742bc-82f9-4f1e-911e-d1542e88cad7"

  # Name of the metadata index written to the data directory
  metadataFile: "iodp_metadata.json"

# Record listing
api:
  baseUrl: "https://zenodo.org/api"

  # Records per listing page (1-100)
  pageSize: 50

  # Pause between listing pages (ms)
  pageDelayMs: 100

# Local mirror
mirror:
  # Directory records and the metadata index are written to
  dataDir: "data"

  # Parallel file downloads within a record (1-8)
  concurrency: 1

# Logging configuration
logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON logs (recommended for cron/systemd)
  json: false
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage zenodo-mirror configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/zenodo-mirror/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${(error as Error).message}`)
        );
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${(error as Error).message}`));
          hasErrors = true;
        }
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'zenodo-mirror config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);
        const { apiKey, ...settings } = resolved;

        if (isJsonMode()) {
          const result: ConfigShowJson = {
            effective: { ...settings, apiKeySet: apiKey !== undefined },
            sources,
          };
          outputSuccess(result);
          return;
        }

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        console.log();
        console.log(chalk.bold("Community:"));
        console.log(`  id:             ${settings.communityId}`);
        console.log(`  metadataFile:   ${settings.metadataFileName}`);

        console.log();
        console.log(chalk.bold("API:"));
        console.log(`  baseUrl:        ${settings.baseUrl}`);
        console.log(`  pageSize:       ${settings.pageSize}`);
        console.log(`  pageDelayMs:    ${settings.pageDelayMs}`);
        console.log(`  apiKey:         ${apiKey ? "(set from ZENODO_API_KEY)" : "(not set)"}`);

        console.log();
        console.log(chalk.bold("Mirror:"));
        console.log(`  dataDir:        ${settings.dataDir}`);
        console.log(`  concurrency:    ${settings.concurrency}`);
        console.log(`  debug:          ${settings.debug}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:          ${settings.logLevel}`);
        console.log(`  json:           ${settings.logJson}`);
      } catch (error) {
        console.error(
          chalk.red(`Failed to load config: ${(error as Error).message}`)
        );
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
