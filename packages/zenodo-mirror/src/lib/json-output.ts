/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";
import type { MetadataIndexEntry } from "./metadata-index.js";
import type { KeySource } from "./api-client.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface MirrorRecordJson {
  id: number;
  title: string;
  directory: string;
  total: number;
  succeeded: number;
  skipped: number;
  downloaded: number;
  failed: number;
}

export interface MirrorResultJson {
  community: string;
  dataDir: string;
  metadataFile: string;
  debug: boolean;
  stoppedEarly: boolean;
  records: MirrorRecordJson[];
  summary: {
    records: number;
    files: number;
    downloaded: number;
    skipped: number;
    failed: number;
  };
}

export interface ListResultJson {
  community: string;
  total: number;
  stoppedEarly: boolean;
  records: MetadataIndexEntry[];
}

export interface AuthStatusJson {
  authenticated: boolean;
  source: KeySource;
}

export interface DoctorResultJson {
  checks: Array<{
    name: string;
    status: "pass" | "fail" | "warn";
    message: string;
    details?: string;
  }>;
  system: {
    os: string;
    nodeVersion: string;
    cliVersion: string;
    configSources: string[];
  };
  network: {
    baseUrl: string;
    reachable: boolean;
    latencyMs?: number;
  };
  auth: {
    hasCredentials: boolean;
    source: KeySource;
  };
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 * Use this to check if JSON mode is enabled before outputting.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
