import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join, resolve } from "path";
import { runMirror, type MirrorDependencies } from "./mirror.js";
import { resolveConfig, type ResolvedConfig } from "../lib/config.js";
import type { ApiClient, KeyStore, RecordsQuery } from "../lib/api-client.js";
import type { DownloadService } from "../lib/ports/download.js";
import type { ArchiveRecord, RecordsPage } from "../lib/records.js";
import { createNoopLogger } from "../lib/logger.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { serverError } from "../lib/errors/catalog.js";

class MemoryStore implements KeyStore {
  constructor(private value?: string) {}
  getKey() {
    return this.value;
  }
  setKey(apiKey: string) {
    this.value = apiKey;
  }
  clearKey() {
    this.value = undefined;
  }
}

const record = (id: number, title: string, keys: string[]): ArchiveRecord => ({
  id,
  metadata: { title, creators: [], publication_date: "2020-01-01" },
  files: keys.map((key) => ({
    key,
    size: 3,
    links: { self: `https://example.org/records/${id}/files/${key}` },
  })),
});

function createFakeApi(pages: Array<RecordsPage | Error>): ApiClient & { calls: RecordsQuery[] } {
  const calls: RecordsQuery[] = [];
  return {
    calls,
    async listRecords(query) {
      calls.push(query);
      const page = pages[query.page - 1] ?? { records: [], total: 0 };
      if (page instanceof Error) throw page;
      return page;
    },
    redact: (text) => text,
  };
}

function createFakeDownloader(failing: string[] = []): DownloadService & { urls: string[] } {
  const urls: string[] = [];
  return {
    urls,
    async download(url, outputPath) {
      urls.push(url);
      if (failing.some((name) => url.endsWith(name))) {
        throw new Error("Failed to download file: 503 Service Unavailable");
      }
      writeFileSync(outputPath, "abc");
      return 3;
    },
  };
}

describe("runMirror", () => {
  let dataDir: string;
  let config: ResolvedConfig;
  let logSpy: MockInstance;

  const deps = (overrides: Partial<MirrorDependencies>): MirrorDependencies => ({
    keyStore: new MemoryStore(),
    logger: createNoopLogger(),
    delay: async () => {},
    ...overrides,
  });

  const printed = (): string[] => logSpy.mock.calls.map((call) => String(call[0]));

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), "zenodo-mirror-run-"));
    config = resolveConfig(
      { dataDir, communityId: "test-community", pageSize: 2 },
      undefined,
      undefined,
      { apiKey: "test-key" }
    );
    initContext(["node", "zenodo-mirror", "--quiet"], {});
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetContext();
    rmSync(dataDir, { recursive: true, force: true });
  });

  it("fails before any request when there is no API key", async () => {
    const api = createFakeApi([]);
    const withoutKey: ResolvedConfig = { ...config, apiKey: undefined };

    await expect(runMirror(withoutKey, deps({ api }))).rejects.toMatchObject({
      code: "AUTH_MISSING_API_KEY",
      message: "ZENODO_API_KEY environment variable not set",
    });
    expect(api.calls).toEqual([]);
  });

  it("uses the stored key when the environment has none", async () => {
    const api = createFakeApi([{ records: [record(1, "Alpha", [])], total: 1 }]);
    const withoutKey: ResolvedConfig = { ...config, apiKey: undefined };

    const result = await runMirror(withoutKey, deps({ api, keyStore: new MemoryStore("stored-key") }));

    expect(result.summary.records).toBe(1);
  });

  it("fails without writing the index when the community is empty", async () => {
    const api = createFakeApi([{ records: [], total: 0 }]);

    await expect(runMirror(config, deps({ api, download: createFakeDownloader() }))).rejects.toMatchObject({
      code: "MIRROR_NO_RECORDS",
      message: "No records found. Exiting.",
    });
    expect(existsSync(join(dataDir, "iodp_metadata.json"))).toBe(false);
  });

  it("writes the index and mirrors every record in order", async () => {
    const api = createFakeApi([
      { records: [record(1, "Alpha", ["a.txt", "b.txt"]), record(2, "Beta: Two", [])], total: 3 },
      { records: [record(3, "Gamma", ["c.txt"])], total: 3 },
    ]);
    const download = createFakeDownloader();

    const result = await runMirror(config, deps({ api, download }));

    expect(api.calls.map((c) => c.page)).toEqual([1, 2]);
    const index: unknown = JSON.parse(readFileSync(join(dataDir, "iodp_metadata.json"), "utf-8"));
    expect(Array.isArray(index) && index.map((entry: { id: number }) => entry.id)).toEqual([1, 2, 3]);

    expect(readFileSync(join(dataDir, "record_1", "Alpha", "a.txt"), "utf-8")).toBe("abc");
    expect(existsSync(join(dataDir, "record_3", "Gamma", "c.txt"))).toBe(true);
    expect(existsSync(join(dataDir, "record_2"))).toBe(false);

    expect(result).toEqual({
      community: "test-community",
      dataDir: resolve(dataDir),
      metadataFile: join(dataDir, "iodp_metadata.json"),
      debug: false,
      stoppedEarly: false,
      records: [
        {
          id: 1,
          title: "Alpha",
          directory: join(dataDir, "record_1", "Alpha"),
          total: 2,
          succeeded: 2,
          skipped: 0,
          downloaded: 2,
          failed: 0,
        },
        {
          id: 2,
          title: "Beta: Two",
          directory: join(dataDir, "record_2", "Beta Two"),
          total: 0,
          succeeded: 0,
          skipped: 0,
          downloaded: 0,
          failed: 0,
        },
        {
          id: 3,
          title: "Gamma",
          directory: join(dataDir, "record_3", "Gamma"),
          total: 1,
          succeeded: 1,
          skipped: 0,
          downloaded: 1,
          failed: 0,
        },
      ],
      summary: { records: 3, files: 3, downloaded: 3, skipped: 0, failed: 0 },
    });

    const lines = printed();
    expect(lines).toContainEqual(expect.stringContaining("[1/3] Processing record 1: Alpha"));
    expect(lines).toContainEqual(expect.stringContaining("  No files to download"));
    expect(lines).toContainEqual(expect.stringContaining("  Downloaded 2/2 files successfully"));
    expect(lines[lines.length - 1]).toContain(`✓ Download complete! Data saved to ${resolve(dataDir)}`);
  });

  it("skips everything on a second run", async () => {
    const pages = [{ records: [record(1, "Alpha", ["a.txt"])], total: 1 }];
    await runMirror(config, deps({ api: createFakeApi(pages), download: createFakeDownloader() }));

    const download = createFakeDownloader();
    const result = await runMirror(config, deps({ api: createFakeApi(pages), download }));

    expect(download.urls).toEqual([]);
    expect(result.summary).toEqual({ records: 1, files: 1, downloaded: 0, skipped: 1, failed: 0 });
    expect(printed()).toContainEqual(expect.stringContaining("  Skipping a.txt (already exists)"));
  });

  it("finishes normally when a file fails", async () => {
    const api = createFakeApi([{ records: [record(1, "Alpha", ["bad.txt", "good.txt"])], total: 1 }]);

    const result = await runMirror(config, deps({ api, download: createFakeDownloader(["bad.txt"]) }));

    expect(result.records[0]).toMatchObject({ total: 2, succeeded: 1, failed: 1 });
    expect(printed()).toContainEqual(
      expect.stringContaining("  ✗ Error downloading bad.txt: Failed to download file: 503 Service Unavailable")
    );
    expect(printed()).toContainEqual(expect.stringContaining("  Downloaded 1/2 files successfully"));
  });

  it("continues with the records listed before a failed page", async () => {
    const api = createFakeApi([
      { records: [record(1, "Alpha", []), record(2, "Beta", [])], total: 5 },
      serverError(500),
    ]);

    const result = await runMirror(config, deps({ api, download: createFakeDownloader() }));

    expect(result.stoppedEarly).toBe(true);
    expect(result.records.map((r) => r.id)).toEqual([1, 2]);
  });

  it("caps records and files in debug mode", async () => {
    const debugConfig: ResolvedConfig = { ...config, debug: true, pageSize: 50 };
    const api = createFakeApi([
      {
        records: [record(1, "Alpha", ["1.txt", "2.txt", "3.txt"]), record(2, "Beta", ["4.txt"])],
        total: 10,
      },
    ]);
    const download = createFakeDownloader();

    const result = await runMirror(debugConfig, deps({ api, download }));

    expect(api.calls).toEqual([{ communityId: "test-community", page: 1, size: 2 }]);
    expect(result.debug).toBe(true);
    expect(result.summary.files).toBe(3);
    expect(download.urls).toHaveLength(3);
    expect(printed()).toContainEqual(
      expect.stringContaining("DEBUG MODE: limiting to 2 records and 2 files per record")
    );
  });

  it("prints nothing itself in JSON mode", async () => {
    initContext(["node", "zenodo-mirror", "--json"], {});
    const api = createFakeApi([{ records: [record(1, "Alpha", ["a.txt"])], total: 1 }]);

    const result = await runMirror(config, deps({ api, download: createFakeDownloader() }));

    expect(result.summary.downloaded).toBe(1);
    expect(logSpy).not.toHaveBeenCalled();
  });
});
