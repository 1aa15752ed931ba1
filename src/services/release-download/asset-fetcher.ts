/**
 * Fetch engine: transfers a URL into a directory, optionally unpacking archives.
 */

import * as os from "node:os";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import { AssetDownloadError } from "./errors.js";
import type { ArchiveExtractor } from "./archive-extractor.js";
import { DefaultArchiveExtractor, isSupportedArchive, ARCHIVE_SUFFIXES } from "./archive-extractor.js";
import type { FetchOptions } from "./types.js";
import type { HttpClient, Response } from "../platform/network.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { Logger } from "../logging/index.js";
import { SILENT_LOGGER } from "../logging/index.js";
import { getErrorMessage } from "../errors.js";

/** Per-request ceiling for asset downloads */
export const DOWNLOAD_TIMEOUT_MS = 300000;

/**
 * Transfers a single URL into a destination directory.
 */
export interface AssetFetcher {
  /**
   * Fetch `url` into `destDir`.
   *
   * In "raw" mode (and for non-archives in "auto" mode) the file is stored as
   * `<destDir>/<basename(url)>`. In "auto" mode recognised archives are unpacked
   * directly into `destDir`.
   *
   * @returns Path of the raw file, or destDir when an archive was unpacked
   * @throws AssetDownloadError on transfer or write failure
   * @throws ArchiveError when unpacking fails
   */
  fetch(url: string, destDir: string, options?: FetchOptions): Promise<string>;
}

/**
 * File name a URL is stored under: the last segment of its path.
 *
 * @example
 * assetFileName("https://github.com/o/r/releases/download/v1/tool.tar.gz") // "tool.tar.gz"
 */
export function assetFileName(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  const base = path.posix.basename(pathname);
  if (base === "" || base === "/") {
    return "download";
  }
  try {
    return decodeURIComponent(base);
  } catch {
    return base;
  }
}

function archiveSuffix(fileName: string): string {
  const lower = fileName.toLowerCase();
  return ARCHIVE_SUFFIXES.find((suffix) => lower.endsWith(suffix)) ?? "";
}

/**
 * Dependencies for HttpAssetFetcher.
 */
export interface HttpAssetFetcherDeps {
  readonly httpClient: HttpClient;
  readonly fileSystemLayer: FileSystemLayer;
  /** Used in "auto" mode. Default: DefaultArchiveExtractor */
  readonly archiveExtractor?: ArchiveExtractor;
  readonly logger?: Logger;
  /** Directory for archives awaiting extraction. Default: os.tmpdir() */
  readonly tempDir?: string;
}

/**
 * AssetFetcher that downloads through an HttpClient.
 */
export class HttpAssetFetcher implements AssetFetcher {
  private readonly httpClient: HttpClient;
  private readonly fileSystemLayer: FileSystemLayer;
  private readonly archiveExtractor: ArchiveExtractor;
  private readonly logger: Logger;
  private readonly tempDir: string;

  constructor(deps: HttpAssetFetcherDeps) {
    this.httpClient = deps.httpClient;
    this.fileSystemLayer = deps.fileSystemLayer;
    this.archiveExtractor = deps.archiveExtractor ?? new DefaultArchiveExtractor();
    this.logger = deps.logger ?? SILENT_LOGGER;
    this.tempDir = deps.tempDir ?? os.tmpdir();
  }

  async fetch(url: string, destDir: string, options: FetchOptions = {}): Promise<string> {
    const mode = options.mode ?? "auto";
    const fileName = assetFileName(url);

    this.logger.info("Fetching asset", { url, dest: destDir, mode });

    const buffer = await this.download(url, options);

    try {
      await this.fileSystemLayer.mkdir(destDir);
    } catch (error) {
      throw new AssetDownloadError(
        `Failed to create ${destDir}: ${getErrorMessage(error)}`,
        "WRITE_FAILED",
        { cause: error }
      );
    }

    if (mode === "auto" && isSupportedArchive(fileName)) {
      await this.unpack(buffer, fileName, destDir);
      return destDir;
    }

    const target = path.join(destDir, fileName);
    await this.write(target, buffer);
    this.logger.debug("Stored asset", { path: target, bytes: buffer.byteLength });
    return target;
  }

  /**
   * Save the archive in the temp dir, keeping its suffix so the
   * extractor can pick a format, then unpack and remove it.
   */
  private async unpack(buffer: Buffer, fileName: string, destDir: string): Promise<void> {
    const tempFile = path.join(this.tempDir, `release-fetch-${randomUUID()}${archiveSuffix(fileName)}`);
    await this.write(tempFile, buffer);
    try {
      await this.archiveExtractor.extract(tempFile, destDir);
      this.logger.debug("Unpacked asset", { archive: fileName, dest: destDir });
    } finally {
      await this.fileSystemLayer.rm(tempFile, { force: true });
    }
  }

  private async write(target: string, buffer: Buffer): Promise<void> {
    try {
      await this.fileSystemLayer.writeFileBuffer(target, buffer);
    } catch (error) {
      throw new AssetDownloadError(
        `Failed to write download to ${target}: ${getErrorMessage(error)}`,
        "WRITE_FAILED",
        { cause: error }
      );
    }
  }

  /**
   * Download a URL into memory with progress reporting.
   */
  private async download(url: string, options: FetchOptions): Promise<Buffer> {
    const { signal, onProgress } = options;

    let response: Response;
    try {
      response = await this.httpClient.fetch(url, {
        timeout: DOWNLOAD_TIMEOUT_MS,
        ...(signal && { signal }),
        ...(options.proxy ? { proxy: options.proxy } : {}),
      });
    } catch (error) {
      throw transferError(url, error, signal);
    }

    if (!response.ok) {
      throw new AssetDownloadError(
        `received status code ${response.status} downloading ${url}`,
        "NETWORK_ERROR"
      );
    }

    if (!response.body) {
      throw new AssetDownloadError(`Response body is null for ${url}`, "NETWORK_ERROR");
    }

    const lengthHeader = response.headers.get("content-length");
    const parsedLength = lengthHeader ? parseInt(lengthHeader, 10) : NaN;
    const totalBytes = Number.isNaN(parsedLength) ? null : parsedLength;

    const chunks: Uint8Array[] = [];
    let bytesDownloaded = 0;
    const reader = response.body.getReader();

    try {
      while (true) {
        if (signal?.aborted) {
          await reader.cancel();
          throw new AssetDownloadError(`Download of ${url} was aborted`, "ABORTED");
        }
        const { done, value } = await reader.read();
        if (done) break;

        chunks.push(value);
        bytesDownloaded += value.byteLength;
        onProgress?.({ url, bytesDownloaded, totalBytes, complete: false });
      }
    } catch (error) {
      throw transferError(url, error, signal);
    }

    onProgress?.({ url, bytesDownloaded, totalBytes, complete: true });
    return Buffer.concat(chunks);
  }
}

/**
 * Map a transfer failure to AssetDownloadError. Only a caller abort counts as ABORTED;
 * a timeout is a network error.
 */
function transferError(url: string, error: unknown, signal: AbortSignal | undefined): AssetDownloadError {
  if (error instanceof AssetDownloadError) {
    return error;
  }
  if (signal?.aborted) {
    return new AssetDownloadError(`Download of ${url} was aborted`, "ABORTED", { cause: error });
  }
  return new AssetDownloadError(
    `Network error downloading ${url}: ${getErrorMessage(error)}`,
    "NETWORK_ERROR",
    { cause: error }
  );
}
