import { z } from "zod";

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/** One creator of a record, copied into the metadata index as received */
export const CreatorSchema = z.record(z.unknown());

/** A file attached to a record */
export const RecordFileSchema = z.object({
  key: z.string().min(1),
  size: z.number().int().nonnegative().default(0),
  links: z
    .object({
      self: z.string().min(1).optional(),
    })
    .default({}),
});

export const RecordMetadataSchema = z.object({
  title: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  creators: z.array(CreatorSchema).default([]),
  publication_date: z.string().nullable().optional(),
  doi: z.string().nullable().optional(),
});

export const RecordSchema = z.object({
  id: z.number().int(),
  doi: z.string().nullable().optional(),
  metadata: RecordMetadataSchema,
  files: z.array(RecordFileSchema).default([]),
});

/** `GET /records` response body */
export const RecordsPageSchema = z.object({
  hits: z
    .object({
      hits: z.array(RecordSchema).default([]),
      total: z.number().int().nonnegative().default(0),
    })
    .default({}),
});

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Creator = z.infer<typeof CreatorSchema>;
export type RecordFile = z.infer<typeof RecordFileSchema>;
export type RecordMetadata = z.infer<typeof RecordMetadataSchema>;
export type ArchiveRecord = z.infer<typeof RecordSchema>;

export interface RecordsPage {
  records: ArchiveRecord[];
  total: number;
}

/** Title used for directories when a record has none */
export const UNKNOWN_TITLE = "Unknown Title";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Validate a listing payload.
 * Throws a summary of the schema issues when the payload doesn't match.
 */
export function parseRecordsPage(payload: unknown): RecordsPage {
  const result = RecordsPageSchema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(issues);
  }
  return {
    records: result.data.hits.hits,
    total: result.data.hits.total,
  };
}

/**
 * DOI of a record: the top-level one, then the one in its metadata.
 */
export function getRecordDoi(record: ArchiveRecord): string | null {
  return record.doi ?? record.metadata.doi ?? null;
}

/**
 * Display title of a record.
 */
export function getRecordTitle(record: ArchiveRecord): string {
  return record.metadata.title ?? UNKNOWN_TITLE;
}

/**
 * Sum of the remote sizes of a record's files.
 */
export function getRecordSize(record: ArchiveRecord): number {
  return record.files.reduce((sum, file) => sum + file.size, 0);
}
