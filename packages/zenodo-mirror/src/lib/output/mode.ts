/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "tui" | "static" | "json";

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `tui`: Interactive terminal (colours, spinners)
 * - `static`: Plain text output (for CI, pipes, non-interactive)
 * - `json`: Structured JSON output for scripting
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = Boolean(process.stdout.isTTY)
): OutputMode {
  if (argv.includes("--json") || env.ZENODO_MIRROR_JSON === "1" || env.ZENODO_MIRROR_JSON === "true") {
    return "json";
  }

  if (env.CI) {
    return "static";
  }

  if (!isTTY) {
    return "static";
  }

  if (env.TERM === "dumb") {
    return "static";
  }

  return "tui";
}
