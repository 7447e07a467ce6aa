export { realDelay } from "./real-timers.js";
export { createFetchDownloadService, DOWNLOAD_CHUNK_BYTES, PARTIAL_SUFFIX } from "./fetch-download.js";
