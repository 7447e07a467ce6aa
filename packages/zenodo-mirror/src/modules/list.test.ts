import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    bold: (s: string) => s,
  },
}));

import { formatBytes, formatRecordTable, runList } from "./list.js";
import { resolveConfig } from "../lib/config.js";
import type { ApiClient, KeyStore, RecordsQuery } from "../lib/api-client.js";
import type { ArchiveRecord } from "../lib/records.js";
import { createNoopLogger } from "../lib/logger.js";
import { initContext, resetContext } from "../lib/cli-context.js";

const emptyStore: KeyStore = {
  getKey: () => undefined,
  setKey: () => {},
  clearKey: () => {},
};

const record = (id: number, title: string, sizes: number[]): ArchiveRecord => ({
  id,
  metadata: { title, creators: [], publication_date: "2019-06-30" },
  files: sizes.map((size, i) => ({ key: `f${i}.dat`, size, links: {} })),
});

describe("formatBytes", () => {
  it("keeps small sizes in bytes", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(1023)).toBe("1023 B");
  });

  it("scales to the largest whole unit", () => {
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(5 * 1024 * 1024)).toBe("5.0 MB");
  });
});

describe("formatRecordTable", () => {
  it("renders one row per record", () => {
    const table = formatRecordTable([record(12, "Alpha", [1024, 512])]);

    expect(table).toContain("ID");
    expect(table).toContain("12");
    expect(table).toContain("Alpha");
    expect(table).toContain("1.5 KB");
    expect(table).toContain("2019-06-30");
  });

  it("shortens long titles", () => {
    const table = formatRecordTable([record(1, "x".repeat(80), [])]);

    expect(table).toContain(`${"x".repeat(49)}…`);
    expect(table).not.toContain("x".repeat(50));
  });
});

describe("runList", () => {
  beforeEach(() => {
    initContext(["node", "zenodo-mirror", "--quiet"], {});
  });

  afterEach(() => {
    resetContext();
  });

  it("enumerates with the configured page size", async () => {
    const calls: RecordsQuery[] = [];
    const api: ApiClient = {
      async listRecords(query) {
        calls.push(query);
        return { records: [record(1, "Alpha", [1])], total: 1 };
      },
      redact: (text) => text,
    };
    const config = resolveConfig({ communityId: "test-community", pageSize: 10 }, undefined, undefined, {
      apiKey: "test-key",
    });

    const result = await runList(config, { keyStore: emptyStore, api, logger: createNoopLogger() });

    expect(result.records.map((r) => r.id)).toEqual([1]);
    expect(result.stoppedEarly).toBe(false);
    expect(calls).toEqual([{ communityId: "test-community", page: 1, size: 10 }]);
  });

  it("requires an API key", async () => {
    const api: ApiClient = {
      listRecords: vi.fn(),
      redact: (text) => text,
    };
    const config = resolveConfig({}, undefined, undefined, {});

    await expect(runList(config, { keyStore: emptyStore, api })).rejects.toMatchObject({
      code: "AUTH_MISSING_API_KEY",
    });
    expect(api.listRecords).not.toHaveBeenCalled();
  });
});
