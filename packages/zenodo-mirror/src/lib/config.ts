import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/zenodo-mirror/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "zenodo-mirror",
  "config.yaml"
);

/** The IODP community on Zenodo */
export const IODP_COMMUNITY_ID = "c2f742bc-82f9-4f1e-911e-d1542e88cad7";

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  communityId: IODP_COMMUNITY_ID,
  metadataFileName: "iodp_metadata.json",
  baseUrl: "https://zenodo.org/api",
  pageSize: 50,
  pageDelayMs: 100,
  dataDir: "data",
  concurrency: 1,
} as const;

/** Record and file caps applied in limited (debug) mode */
export const DEBUG_LIMITS = {
  records: 2,
  filesPerRecord: 2,
} as const;

/** Values of the DEBUG environment variable that enable limited mode */
const TRUTHY_ENV_VALUES = ["true", "1", "yes"];

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  community: z
    .object({
      id: z.string().min(1).optional(),
      metadataFile: z.string().min(1).optional(),
    })
    .optional(),
  api: z
    .object({
      baseUrl: z.string().url().optional(),
      pageSize: z.number().int().min(1).max(100).optional(),
      pageDelayMs: z.number().int().min(0).max(60000).optional(),
    })
    .optional(),
  mirror: z
    .object({
      dataDir: z.string().min(1).optional(),
      concurrency: z.number().int().min(1).max(8).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: LogLevelSchema.optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Record/file caps for a reduced-volume run */
export interface MirrorLimits {
  records: number;
  filesPerRecord: number;
}

/**
 * Resolved configuration with all defaults applied.
 * Passed explicitly to every component; nothing reads process state later.
 */
export interface ResolvedConfig {
  communityId: string;
  metadataFileName: string;
  baseUrl: string;
  pageSize: number;
  pageDelayMs: number;
  dataDir: string;
  concurrency: number;
  logLevel: z.infer<typeof LogLevelSchema>;
  logJson: boolean;
  debug: boolean;
  apiKey?: string;
}

/** Values read from environment variables */
export interface EnvOverrides {
  apiKey?: string;
  debug?: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws with helpful message if file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new Error(
      `Cannot read config file ${path}: ${(err as Error).message}`
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Invalid YAML in ${path}: ${(err as Error).message}`);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Config validation failed for ${path}:\n${issues}`);
  }

  return result.data;
}

/**
 * Parse a DEBUG-style flag: `true`, `1` or `yes`, case-insensitive.
 */
export function parseDebugFlag(value: string | undefined): boolean {
  if (value === undefined) return false;
  return TRUTHY_ENV_VALUES.includes(value.trim().toLowerCase());
}

/**
 * Read the environment variables the mirror understands.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): EnvOverrides {
  const apiKey = env.ZENODO_API_KEY?.trim();
  return {
    apiKey: apiKey ? apiKey : undefined,
    debug: parseDebugFlag(env.DEBUG),
  };
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.community?.id !== undefined) {
    target.communityId = source.community.id;
  }
  if (source.community?.metadataFile !== undefined) {
    target.metadataFileName = source.community.metadataFile;
  }
  if (source.api?.baseUrl !== undefined) {
    target.baseUrl = source.api.baseUrl;
  }
  if (source.api?.pageSize !== undefined) {
    target.pageSize = source.api.pageSize;
  }
  if (source.api?.pageDelayMs !== undefined) {
    target.pageDelayMs = source.api.pageDelayMs;
  }
  if (source.mirror?.dataDir !== undefined) {
    target.dataDir = source.mirror.dataDir;
  }
  if (source.mirror?.concurrency !== undefined) {
    target.concurrency = source.mirror.concurrency;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > Environment > User config > System config > Defaults
 *
 * The debug flag is OR'd across the CLI and the environment.
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  env: EnvOverrides = {}
): ResolvedConfig {
  const config: ResolvedConfig = {
    communityId: CONFIG_DEFAULTS.communityId,
    metadataFileName: CONFIG_DEFAULTS.metadataFileName,
    baseUrl: CONFIG_DEFAULTS.baseUrl,
    pageSize: CONFIG_DEFAULTS.pageSize,
    pageDelayMs: CONFIG_DEFAULTS.pageDelayMs,
    dataDir: CONFIG_DEFAULTS.dataDir,
    concurrency: CONFIG_DEFAULTS.concurrency,
    logLevel: "info",
    logJson: false,
    debug: false,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  if (env.apiKey !== undefined) {
    config.apiKey = env.apiKey;
  }

  const { debug: cliDebug, ...rest } = cliOptions;
  Object.assign(config, filterUndefined(rest));
  config.debug = Boolean(cliDebug) || Boolean(env.debug);

  return config;
}

/**
 * Record and file caps for the run, or undefined for a full mirror.
 */
export function getMirrorLimits(config: Pick<ResolvedConfig, "debug">): MirrorLimits | undefined {
  return config.debug ? { ...DEBUG_LIMITS } : undefined;
}

/**
 * Load configuration from all sources.
 * Optionally accepts explicit config path from CLI.
 *
 * @param explicitPath - Optional path to a specific config file
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    // Explicit path takes precedence, used as "user config"
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(
    cliOptions,
    userConfig,
    systemConfig,
    readEnvOverrides(env)
  );

  return { config, sources };
}
