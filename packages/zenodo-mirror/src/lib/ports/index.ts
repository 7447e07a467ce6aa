export type { DelayFn } from "./timer.js";
export type { DownloadService } from "./download.js";
