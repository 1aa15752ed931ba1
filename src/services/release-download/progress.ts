/**
 * Terminal progress output for asset downloads.
 */

import * as path from "node:path";
import type { DownloadProgress, DownloadProgressCallback } from "./types.js";

/**
 * Minimal writable target, satisfied by process.stderr.
 */
export interface ProgressOutput {
  write(text: string): unknown;
}

/**
 * Format bytes for display.
 *
 * @example
 * formatBytes(512)     // "512 B"
 * formatBytes(1536)    // "1.5 KB"
 * formatBytes(3145728) // "3.0 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Render one progress line (without carriage return or newline).
 */
export function formatProgressLine(progress: DownloadProgress): string {
  const name = path.posix.basename(progress.url);
  const downloaded = formatBytes(progress.bytesDownloaded);
  if (progress.totalBytes === null || progress.totalBytes === 0) {
    return `Downloading ${name}: ${downloaded}`;
  }
  const total = formatBytes(progress.totalBytes);
  const percent = Math.round((progress.bytesDownloaded / progress.totalBytes) * 100);
  return `Downloading ${name}: ${downloaded} / ${total} (${percent}%)`;
}

/**
 * Progress callback that rewrites a single terminal line and ends it on completion.
 */
export function createTerminalProgressReporter(
  output: ProgressOutput = process.stderr
): DownloadProgressCallback {
  return (progress: DownloadProgress) => {
    output.write(`\r${formatProgressLine(progress)}`);
    if (progress.complete) {
      output.write("\n");
    }
  };
}
