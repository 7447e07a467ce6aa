import { readFileSync } from "fs";
import { z } from "zod";

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Version of this package, read from the package.json next to `src/` and `dist/`.
 */
export function readCliVersion(): string {
  const raw = readFileSync(new URL("../../package.json", import.meta.url), "utf-8");
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

export const CLI_VERSION = readCliVersion();
