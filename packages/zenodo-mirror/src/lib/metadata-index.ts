import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { getRecordDoi, type ArchiveRecord, type Creator } from "./records.js";

export interface MetadataIndexEntry {
  id: number;
  title: string | null;
  description: string | null;
  creators: Creator[];
  publication_date: string | null;
  doi: string | null;
  files: Array<{ key: string; size: number }>;
}

/**
 * Project the fields kept in the metadata index. Download links are left out.
 */
export function toIndexEntry(record: ArchiveRecord): MetadataIndexEntry {
  const { metadata } = record;
  return {
    id: record.id,
    title: metadata.title ?? null,
    description: metadata.description ?? null,
    creators: metadata.creators,
    publication_date: metadata.publication_date ?? null,
    doi: getRecordDoi(record),
    files: record.files.map((file) => ({ key: file.key, size: file.size })),
  };
}

export function buildMetadataIndex(records: ArchiveRecord[]): MetadataIndexEntry[] {
  return records.map(toIndexEntry);
}

/**
 * Write the index for this run to `<dataDir>/<fileName>`, replacing any
 * previous one.
 *
 * @returns The path written
 */
export function writeMetadataIndex(
  dataDir: string,
  fileName: string,
  records: ArchiveRecord[]
): string {
  mkdirSync(dataDir, { recursive: true });
  const path = join(dataDir, fileName);
  writeFileSync(path, JSON.stringify(buildMetadataIndex(records), null, 2), "utf-8");
  return path;
}
