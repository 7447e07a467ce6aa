import { Command } from "commander";
import prompts from "prompts";
import chalk from "chalk";
import { resolveApiKey, type KeyStore } from "../lib/api-client.js";
import { readEnvOverrides } from "../lib/config.js";
import { maybeOutputJson, type AuthStatusJson } from "../lib/json-output.js";

export interface SetKeyOptions {
  key?: string;
  nonInteractive?: boolean;
}

export function registerAuthCommands(program: Command, store: KeyStore): void {
  const auth = program.command("auth").description("Manage the Zenodo API key");

  auth
    .command("set-key")
    .description("Store an API key for future runs")
    .option("-k, --key <key>", "Personal access token")
    .option("--non-interactive", "Fail instead of prompting for input", false)
    .action(async (options: SetKeyOptions) => {
      try {
        const key = await resolveKey(options);
        store.setKey(key);
        console.log(chalk.green("API key saved locally."));
        if (readEnvOverrides().apiKey) {
          console.log(chalk.yellow("Note: ZENODO_API_KEY is set and takes precedence over the stored key."));
        }
      } catch (error) {
        console.error(chalk.red((error as Error).message));
        process.exitCode = 1;
      }
    });

  auth
    .command("status")
    .description("Show where the API key comes from")
    .action(() => {
      const status = getAuthStatus(readEnvOverrides().apiKey, store);

      if (maybeOutputJson(status)) {
        return;
      }

      switch (status.source) {
        case "environment":
          console.log(chalk.green("Using the API key from ZENODO_API_KEY."));
          break;
        case "stored":
          console.log(chalk.green("Using the stored API key."));
          break;
        case "none":
          console.log(chalk.yellow("No API key configured."));
          console.log(chalk.gray("Set ZENODO_API_KEY or run: zenodo-mirror auth set-key"));
          process.exitCode = 1;
          break;
      }
    });

  auth
    .command("clear")
    .description("Remove the stored API key")
    .action(() => {
      store.clearKey();
      console.log(chalk.green("Stored API key removed."));
    });
}

/**
 * Where the effective key comes from. The key itself is never included.
 */
export function getAuthStatus(envKey: string | undefined, store: KeyStore): AuthStatusJson {
  const { source } = resolveApiKey(envKey, store);
  return { authenticated: source !== "none", source };
}

export async function resolveKey(options: SetKeyOptions): Promise<string> {
  if (options.key) return options.key;
  if (options.nonInteractive) {
    throw new Error("No key supplied and interactive prompts disabled.");
  }

  const { key } = await prompts({
    type: "password",
    name: "key",
    message: "Paste your Zenodo personal access token",
  });

  if (typeof key !== "string" || !key.trim()) {
    throw new Error("An API key is required.");
  }

  return key.trim();
}
