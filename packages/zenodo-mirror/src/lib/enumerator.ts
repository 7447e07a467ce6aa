import type { ApiClient } from "./api-client.js";
import type { MirrorLimits } from "./config.js";
import type { Logger } from "./logger.js";
import type { DelayFn } from "./ports/timer.js";
import type { ArchiveRecord, RecordsPage } from "./records.js";
import { realDelay } from "./adapters/real-timers.js";
import { isCLIError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PageProgress {
  page: number;
  /** Records accumulated so far */
  fetched: number;
  /** Total reported by the server on this page */
  total: number;
}

export interface EnumerateOptions {
  api: ApiClient;
  communityId: string;
  pageSize: number;
  /** Wait between two listing requests */
  pageDelayMs: number;
  /** Caps for limited mode; the page size shrinks to the record cap */
  limits?: MirrorLimits;
  logger: Logger;
  delay?: DelayFn;
  onPage?: (progress: PageProgress) => void;
}

export interface EnumerationResult {
  records: ArchiveRecord[];
  /** Last total reported by the server (0 when no page succeeded) */
  reportedTotal: number;
  /** True when a failed page cut the listing short */
  stoppedEarly: boolean;
}

// ---------------------------------------------------------------------------
// Enumeration
// ---------------------------------------------------------------------------

/**
 * Page through a community's record listing until it is exhausted.
 *
 * Stops on an empty page, once the accumulated count reaches the reported
 * total, or once the record cap of `limits` is reached. A failed page is
 * logged and ends the listing; the records gathered so far are returned.
 */
export async function enumerateRecords(options: EnumerateOptions): Promise<EnumerationResult> {
  const {
    api,
    communityId,
    pageDelayMs,
    limits,
    logger,
    delay = realDelay,
    onPage,
  } = options;

  const size = limits ? Math.min(options.pageSize, limits.records) : options.pageSize;

  let records: ArchiveRecord[] = [];
  let reportedTotal = 0;
  let page = 1;

  while (true) {
    logger.debug("Requesting record page", { communityId, page, size });

    let result: RecordsPage;
    try {
      result = await api.listRecords({ communityId, page, size });
    } catch (error) {
      logger.error("Error fetching records", {
        page,
        fetched: records.length,
        ...(isCLIError(error)
          ? { code: error.code, status: error.status, details: error.details }
          : {}),
        error: error instanceof Error ? error.message : String(error),
      });
      return { records, reportedTotal, stoppedEarly: true };
    }

    if (result.records.length === 0) {
      break;
    }

    records.push(...result.records);
    reportedTotal = result.total;
    onPage?.({ page, fetched: records.length, total: reportedTotal });

    if (limits && records.length >= limits.records) {
      records = records.slice(0, limits.records);
      break;
    }

    if (records.length >= reportedTotal) {
      break;
    }

    page++;
    await delay(pageDelayMs);
  }

  return { records, reportedTotal, stoppedEarly: false };
}
