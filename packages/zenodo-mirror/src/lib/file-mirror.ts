import { mkdirSync } from "fs";
import { dirname, join, resolve, sep } from "path";
import type { MirrorLimits } from "./config.js";
import type { Logger } from "./logger.js";
import type { DownloadService } from "./ports/download.js";
import { getRecordTitle, type ArchiveRecord, type RecordFile } from "./records.js";
import { isAlreadyMirrored } from "./file-identity.js";
import { createQueue } from "./queue.js";
import { unsafeFilePath } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MirrorEvent =
  | { type: "no-files"; recordId: number }
  | { type: "skipped"; recordId: number; file: string }
  | { type: "downloading"; recordId: number; file: string; size: number }
  | { type: "downloaded"; recordId: number; file: string; bytes: number }
  | { type: "failed"; recordId: number; file: string; error: string };

export type FileStatus = "skipped" | "downloaded" | "failed";

export interface FileOutcome {
  key: string;
  size: number;
  path: string;
  status: FileStatus;
  error?: string;
}

export interface RecordMirrorResult {
  recordId: number;
  directory: string;
  /** Files considered for this run, after limits */
  total: number;
  /** Files skipped or downloaded */
  succeeded: number;
  /** True when limits dropped some of the record's files */
  limited: boolean;
  outcomes: FileOutcome[];
}

export interface MirrorRecordOptions {
  dataDir: string;
  download: DownloadService;
  logger: Logger;
  /** Parallel downloads within the record; 1 keeps them sequential */
  concurrency?: number;
  limits?: MirrorLimits;
  onEvent?: (event: MirrorEvent) => void;
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/** Longest directory name derived from a record title */
export const TITLE_MAX_LENGTH = 100;

/**
 * Directory name for a record title: letters, digits, spaces, hyphens and
 * underscores only, trailing whitespace removed, at most 100 characters.
 */
export function sanitizeTitle(title: string): string {
  const kept = title.replace(/[^\p{L}\p{N} _-]/gu, "").trimEnd();
  return Array.from(kept).slice(0, TITLE_MAX_LENGTH).join("");
}

/**
 * `<dataDir>/record_<id>/<sanitized title>`
 */
export function recordDirectory(dataDir: string, record: ArchiveRecord): string {
  return join(dataDir, `record_${record.id}`, sanitizeTitle(getRecordTitle(record)));
}

/**
 * Target path of a file inside its record directory.
 * Throws when the file name would escape that directory.
 */
export function resolveFilePath(directory: string, key: string): string {
  const base = resolve(directory);
  const target = resolve(base, key);
  if (!target.startsWith(`${base}${sep}`)) {
    throw unsafeFilePath(key);
  }
  return join(directory, key);
}

// ---------------------------------------------------------------------------
// Mirroring
// ---------------------------------------------------------------------------

/**
 * Files of a record considered for this run, in record order.
 */
export function selectFiles(record: ArchiveRecord, limits?: MirrorLimits): RecordFile[] {
  return limits ? record.files.slice(0, limits.filesPerRecord) : record.files;
}

async function mirrorFile(
  record: ArchiveRecord,
  file: RecordFile,
  directory: string,
  options: MirrorRecordOptions
): Promise<FileOutcome> {
  const { download, onEvent } = options;
  const logger = options.logger.child({ recordId: record.id, file: file.key });
  let path = join(directory, file.key);

  const fail = (message: string): FileOutcome => {
    logger.error("Error downloading file", { error: message });
    onEvent?.({ type: "failed", recordId: record.id, file: file.key, error: message });
    return { key: file.key, size: file.size, path, status: "failed", error: message };
  };

  try {
    path = resolveFilePath(directory, file.key);
  } catch (error) {
    return fail((error as Error).message);
  }

  if (isAlreadyMirrored(path, file.size)) {
    logger.debug("File already mirrored", { size: file.size });
    onEvent?.({ type: "skipped", recordId: record.id, file: file.key });
    return { key: file.key, size: file.size, path, status: "skipped" };
  }

  const link = file.links.self;
  if (!link) {
    return fail("No download link");
  }

  onEvent?.({ type: "downloading", recordId: record.id, file: file.key, size: file.size });

  try {
    mkdirSync(dirname(path), { recursive: true });
    const bytes = await download.download(link, path);
    if (bytes !== file.size) {
      logger.warn("Downloaded size differs from reported size", {
        expected: file.size,
        actual: bytes,
      });
    }
    onEvent?.({ type: "downloaded", recordId: record.id, file: file.key, bytes });
    return { key: file.key, size: file.size, path, status: "downloaded" };
  } catch (error) {
    return fail(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Make sure every file of a record is present under its record directory.
 *
 * Files already present with the remote size are skipped without a request.
 * A failed file is logged and reported; it never stops the others.
 * Outcomes are returned in the record's file order.
 */
export async function mirrorRecord(
  record: ArchiveRecord,
  options: MirrorRecordOptions
): Promise<RecordMirrorResult> {
  const { dataDir, limits, logger, onEvent } = options;
  const directory = recordDirectory(dataDir, record);

  const files = selectFiles(record, limits);
  const limited = files.length < record.files.length;

  if (files.length === 0) {
    onEvent?.({ type: "no-files", recordId: record.id });
    return { recordId: record.id, directory, total: 0, succeeded: 0, limited, outcomes: [] };
  }

  const outcomes: FileOutcome[] = [];
  const queue = createQueue({ concurrency: options.concurrency ?? 1, logger });

  // Files sharing a key write the same path, so they run one after another
  const byKey = new Map<string, number[]>();
  files.forEach((file, index) => {
    const indices = byKey.get(file.key);
    if (indices) {
      indices.push(index);
    } else {
      byKey.set(file.key, [index]);
    }
  });

  for (const indices of byKey.values()) {
    queue.enqueue({
      id: `${record.id}:${indices[0]}`,
      execute: async () => {
        for (const index of indices) {
          const file = files[index];
          if (file) {
            outcomes[index] = await mirrorFile(record, file, directory, options);
          }
        }
      },
    });
  }
  await queue.drain();

  const succeeded = outcomes.filter((o) => o.status !== "failed").length;
  return { recordId: record.id, directory, total: files.length, succeeded, limited, outcomes };
}
