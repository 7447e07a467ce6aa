import fetch from "node-fetch";
import { createWriteStream } from "fs";
import { rename, rm, stat } from "fs/promises";
import { pipeline } from "stream/promises";
import type { DownloadService } from "../ports/download.js";
import { withAccessToken, type FetchImpl } from "../api-client.js";
import { redactSecrets } from "../logger.js";

/** Size of each chunk read from the response and written to disk */
export const DOWNLOAD_CHUNK_BYTES = 8192;

/** Suffix of the temporary file a download streams into */
export const PARTIAL_SUFFIX = ".part";

export interface FetchDownloadOptions {
  /** Appended as the `access_token` query parameter and redacted from errors */
  accessToken: string;
  fetchImpl?: FetchImpl;
}

/**
 * Create a download service using node-fetch.
 * The body is streamed into `<outputPath>.part` and renamed over
 * `outputPath` once complete; the partial file is removed on failure.
 */
export function createFetchDownloadService({
  accessToken,
  fetchImpl = fetch,
}: FetchDownloadOptions): DownloadService {
  const redact = (text: string) => redactSecrets(text, [accessToken]);

  return {
    async download(url: string, outputPath: string): Promise<number> {
      const partialPath = `${outputPath}${PARTIAL_SUFFIX}`;

      try {
        const response = await fetchImpl(withAccessToken(url, accessToken), {
          highWaterMark: DOWNLOAD_CHUNK_BYTES,
        });

        if (!response.ok) {
          throw new Error(`Failed to download file: ${response.status} ${response.statusText}`);
        }

        if (!response.body) {
          throw new Error("No response body");
        }

        await pipeline(
          response.body,
          createWriteStream(partialPath, { highWaterMark: DOWNLOAD_CHUNK_BYTES })
        );
        const { size } = await stat(partialPath);
        await rename(partialPath, outputPath);
        return size;
      } catch (error) {
        await rm(partialPath, { force: true });
        throw new Error(redact(error instanceof Error ? error.message : String(error)), {
          cause: error,
        });
      }
    },
  };
}
