import fetch, { type RequestInit } from "node-fetch";
import Conf from "conf";
import {
  fromHttpStatus,
  invalidResponse,
  missingApiKey,
  networkOffline,
} from "./errors/catalog.js";
import { redactSecrets } from "./logger.js";
import { parseRecordsPage, type RecordsPage } from "./records.js";

// ---------------------------------------------------------------------------
// Key storage
// ---------------------------------------------------------------------------

export interface StoredKey {
  apiKey?: string;
}

export interface KeyStore {
  getKey(): string | undefined;
  setKey(apiKey: string): void;
  clearKey(): void;
}

/**
 * API key persisted in the per-user settings directory.
 */
export class ConfKeyStore implements KeyStore {
  private readonly conf = new Conf<StoredKey>({ projectName: "zenodo-mirror" });

  getKey(): string | undefined {
    return this.conf.get("apiKey");
  }

  setKey(apiKey: string): void {
    if (!apiKey.trim()) {
      throw new Error("Refusing to store an empty API key.");
    }
    this.conf.set("apiKey", apiKey.trim());
  }

  clearKey(): void {
    this.conf.delete("apiKey");
  }
}

export type KeySource = "environment" | "stored" | "none";

/**
 * Pick the effective API key. The environment always wins over the store.
 */
export function resolveApiKey(
  envKey: string | undefined,
  store: KeyStore
): { apiKey?: string; source: KeySource } {
  if (envKey) return { apiKey: envKey, source: "environment" };
  const stored = store.getKey();
  if (stored) return { apiKey: stored, source: "stored" };
  return { source: "none" };
}

/**
 * The effective API key, or a missing-key error before any request is made.
 */
export function requireApiKey(envKey: string | undefined, store: KeyStore): string {
  const { apiKey } = resolveApiKey(envKey, store);
  if (!apiKey) {
    throw missingApiKey();
  }
  return apiKey;
}

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

/** The parts of a fetch response the client reads */
export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  body: NodeJS.ReadableStream | null;
  text(): Promise<string>;
}

export type FetchImpl = (url: string, init?: RequestInit) => Promise<FetchResponse>;

export interface ApiClientOptions {
  baseUrl: string;
  accessToken: string;
  fetchImpl?: FetchImpl;
}

export interface RecordsQuery {
  communityId: string;
  page: number;
  size: number;
}

export interface ApiClient {
  /** Fetch one page of a community's record listing */
  listRecords(query: RecordsQuery): Promise<RecordsPage>;
  /** Remove the access token from text that may be shown or logged */
  redact(text: string): string;
}

/**
 * Append the `access_token` query parameter to a URL.
 */
export function withAccessToken(url: string, accessToken: string): string {
  const target = new URL(url);
  target.searchParams.set("access_token", accessToken);
  return target.toString();
}

/**
 * Parse a response body as JSON, keeping the raw text when it isn't JSON.
 */
function parseBody(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function createApiClient({
  baseUrl,
  accessToken,
  fetchImpl = fetch,
}: ApiClientOptions): ApiClient {
  const root = baseUrl.replace(/\/+$/, "");
  const redact = (text: string) => redactSecrets(text, [accessToken]);

  async function request(path: string, params: Record<string, string | number>): Promise<unknown> {
    const url = new URL(`${root}${path}`);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, String(value));
    }
    url.searchParams.set("access_token", accessToken);

    let response: FetchResponse;
    try {
      response = await fetchImpl(url.toString(), {
        method: "GET",
        headers: { Accept: "application/json" },
      });
    } catch (error) {
      throw networkOffline(redact((error as Error).message));
    }

    const text = await response.text();
    if (!response.ok) {
      throw fromHttpStatus(response.status, response.statusText, parseBody(redact(text)));
    }

    const data = parseBody(text);
    if (typeof data !== "object" || data === null) {
      throw invalidResponse(`expected a JSON object from ${path}`);
    }
    return data;
  }

  return {
    async listRecords({ communityId, page, size }) {
      const data = await request("/records", {
        communities: communityId,
        page,
        size,
      });

      try {
        return parseRecordsPage(data);
      } catch (error) {
        throw invalidResponse((error as Error).message);
      }
    },
    redact,
  };
}
