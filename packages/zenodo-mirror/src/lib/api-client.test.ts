import { describe, expect, it, vi } from "vitest";
import {
  createApiClient,
  resolveApiKey,
  withAccessToken,
  type FetchResponse,
  type KeyStore,
} from "./api-client.js";
import { isCLIError } from "./errors/types.js";

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

const jsonResponse = (payload: unknown, status = 200, statusText = "OK"): FetchResponse => ({
  ok: status >= 200 && status < 300,
  status,
  statusText,
  body: null,
  text: async () => (typeof payload === "string" ? payload : JSON.stringify(payload)),
});

const listing = {
  hits: {
    total: 1,
    hits: [
      {
        id: 11,
        metadata: { title: "Cores", creators: [{ name: "Doe, Jane" }] },
        files: [{ key: "a.csv", size: 3, links: { self: "https://example.org/files/a.csv" } }],
      },
    ],
  },
};

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected a rejection");
}

describe("createApiClient", () => {
  it("requests the community listing with paging and the access token", async () => {
    const fetchImpl = vi.fn(async (_url: string) => jsonResponse(listing));
    const client = createApiClient({
      baseUrl: "https://example.org/api/",
      accessToken: "test-secret",
      fetchImpl,
    });

    const page = await client.listRecords({ communityId: "test-community", page: 2, size: 25 });

    const url = new URL(fetchImpl.mock.calls[0]?.[0] ?? "");
    expect(url.origin + url.pathname).toBe("https://example.org/api/records");
    expect(url.searchParams.get("communities")).toBe("test-community");
    expect(url.searchParams.get("page")).toBe("2");
    expect(url.searchParams.get("size")).toBe("25");
    expect(url.searchParams.get("access_token")).toBe("test-secret");
    expect(page.total).toBe(1);
    expect(page.records[0]).toEqual({
      id: 11,
      metadata: { title: "Cores", creators: [{ name: "Doe, Jane" }] },
      files: [{ key: "a.csv", size: 3, links: { self: "https://example.org/files/a.csv" } }],
    });
  });

  it("fills defaults for missing files and hits", async () => {
    const fetchImpl = vi.fn(async (_url: string) =>
      jsonResponse({ hits: { hits: [{ id: 1, metadata: {} }] } })
    );
    const client = createApiClient({ baseUrl: "https://example.org/api", accessToken: "t", fetchImpl });

    const page = await client.listRecords({ communityId: "c", page: 1, size: 1 });

    expect(page.total).toBe(0);
    expect(page.records[0]?.files).toEqual([]);
    expect(page.records[0]?.metadata.creators).toEqual([]);
  });

  it.each([
    [401, "AUTH_INVALID_TOKEN"],
    [403, "AUTH_FORBIDDEN"],
    [404, "API_NOT_FOUND"],
    [429, "API_RATE_LIMITED"],
    [400, "API_BAD_REQUEST"],
    [503, "API_SERVER_ERROR"],
    [418, "UNKNOWN_ERROR"],
  ])("maps status %i to %s", async (status, code) => {
    const fetchImpl = vi.fn(async (_url: string) =>
      jsonResponse({ status, message: "nope" }, status, "Error")
    );
    const client = createApiClient({ baseUrl: "https://example.org/api", accessToken: "t", fetchImpl });

    const error = await captureError(client.listRecords({ communityId: "c", page: 1, size: 1 }));

    expect(isCLIError(error) && error.code).toBe(code);
  });

  it("keeps the server message as error details", async () => {
    const fetchImpl = vi.fn(async (_url: string) =>
      jsonResponse({ status: 500, message: "Internal server error." }, 500, "Internal Server Error")
    );
    const client = createApiClient({ baseUrl: "https://example.org/api", accessToken: "t", fetchImpl });

    const error = await captureError(client.listRecords({ communityId: "c", page: 1, size: 1 }));

    expect(isCLIError(error) && error.details).toBe("Internal server error.");
    expect(isCLIError(error) && error.status).toBe(500);
  });

  it("redacts the token from error details and network failures", async () => {
    const echo = vi.fn(async (url: string) => jsonResponse(`bad url ${url}`, 400, "Bad Request"));
    const client = createApiClient({
      baseUrl: "https://example.org/api",
      accessToken: "test-secret",
      fetchImpl: echo,
    });

    const badRequest = await captureError(client.listRecords({ communityId: "c", page: 1, size: 1 }));
    expect(isCLIError(badRequest) && badRequest.details).toBe(
      "bad url https://example.org/api/records?communities=c&page=1&size=1&access_token=***"
    );

    const offline = createApiClient({
      baseUrl: "https://example.org/api",
      accessToken: "test-secret",
      fetchImpl: async (url: string): Promise<FetchResponse> => {
        throw new Error(`request to ${url} failed`);
      },
    });
    const networkError = await captureError(offline.listRecords({ communityId: "c", page: 1, size: 1 }));
    expect(isCLIError(networkError) && networkError.code).toBe("NETWORK_OFFLINE");
    expect(isCLIError(networkError) && networkError.details).toBe(
      "request to https://example.org/api/records?communities=c&page=1&size=1&access_token=*** failed"
    );
  });

  it("rejects payloads that do not match the listing shape", async () => {
    const fetchImpl = vi.fn(async (_url: string) =>
      jsonResponse({ hits: { hits: [{ id: "eleven", metadata: {} }] } })
    );
    const client = createApiClient({ baseUrl: "https://example.org/api", accessToken: "t", fetchImpl });

    const error = await captureError(client.listRecords({ communityId: "c", page: 1, size: 1 }));

    expect(isCLIError(error) && error.code).toBe("API_INVALID_RESPONSE");
    expect(isCLIError(error) && error.details).toContain("hits.hits.0.id");
  });

  it("rejects non-JSON success bodies", async () => {
    const fetchImpl = vi.fn(async (_url: string) => jsonResponse("<html></html>"));
    const client = createApiClient({ baseUrl: "https://example.org/api", accessToken: "t", fetchImpl });

    const error = await captureError(client.listRecords({ communityId: "c", page: 1, size: 1 }));

    expect(isCLIError(error) && error.code).toBe("API_INVALID_RESPONSE");
  });

  it("redacts the token on demand", () => {
    const client = createApiClient({
      baseUrl: "https://example.org/api",
      accessToken: "test-secret",
      fetchImpl: vi.fn(async (_url: string) => jsonResponse({})),
    });

    expect(client.redact("token=test-secret")).toBe("token=***");
  });
});

describe("withAccessToken", () => {
  it("keeps existing query parameters", () => {
    expect(withAccessToken("https://example.org/f?download=1", "test-key")).toBe(
      "https://example.org/f?download=1&access_token=test-key"
    );
  });
});

describe("resolveApiKey", () => {
  it("prefers the environment", () => {
    expect(resolveApiKey("env-key", new MemoryStore("stored-key"))).toEqual({
      apiKey: "env-key",
      source: "environment",
    });
  });

  it("falls back to the stored key", () => {
    expect(resolveApiKey(undefined, new MemoryStore("stored-key"))).toEqual({
      apiKey: "stored-key",
      source: "stored",
    });
  });

  it("reports when no key is available", () => {
    expect(resolveApiKey(undefined, new MemoryStore())).toEqual({ source: "none" });
  });
});
