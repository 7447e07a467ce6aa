/**
 * Abstraction for file download operations.
 * Allows testing without actual network requests.
 */
export interface DownloadService {
  /**
   * Stream `url` into `outputPath`, replacing any existing file only once the
   * transfer is complete. Resolves with the number of bytes written.
   */
  download(url: string, outputPath: string): Promise<number>;
}
