/**
 * Downloads release assets of one repository into a directory.
 */

import * as path from "node:path";
import { AssetNotFoundError } from "./errors.js";
import type { ReleaseApi } from "./release-api.js";
import { assetFileName, type AssetFetcher } from "./asset-fetcher.js";
import type { ArchiveExtractor } from "./archive-extractor.js";
import { StripTarGzExtractor } from "./strip-tar-gz-extractor.js";
import type { DownloadProgressCallback, FetchOptions, RepoSlug, RetryPolicy } from "./types.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { Logger } from "../logging/index.js";
import { SILENT_LOGGER } from "../logging/index.js";
import { getErrorMessage } from "../errors.js";

/**
 * Transfer settings shared by every download of a client.
 */
export interface DownloadSettings {
  readonly retry: RetryPolicy;
  readonly proxy?: string;
  readonly onProgress?: DownloadProgressCallback;
  readonly signal?: AbortSignal;
}

export interface ReleaseDownloaderDeps {
  readonly releaseApi: ReleaseApi;
  readonly assetFetcher: AssetFetcher;
  readonly fileSystemLayer: FileSystemLayer;
  /** Extractor for .tar.gz assets. Default: StripTarGzExtractor */
  readonly tarGzExtractor?: ArchiveExtractor;
  readonly logger?: Logger;
}

/**
 * Result of a completed download.
 */
export interface DownloadedAsset {
  readonly assetName: string;
  /** Tag the asset was downloaded from (resolved when "latest" was requested) */
  readonly version: string;
  readonly url: string;
}

/**
 * Downloads a named asset of a release into a directory.
 */
export interface AssetDownloader {
  downloadAsset(assetName: string, version: string, destDir: string): Promise<DownloadedAsset>;
}

/**
 * Compile a user-supplied asset pattern.
 *
 * @throws AssetNotFoundError INVALID_PATTERN
 */
export function compileAssetPattern(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    return pattern;
  }
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new AssetNotFoundError(
      `Invalid asset pattern "${pattern}": ${getErrorMessage(error)}`,
      "INVALID_PATTERN",
      { cause: error }
    );
  }
}

/**
 * Downloads release assets of a single repository.
 *
 * `.tar.gz` assets are stored raw, unpacked with their wrapper directory
 * stripped, and the container removed. Everything else goes through the
 * fetch engine in "auto" mode.
 */
export class ReleaseDownloader implements AssetDownloader {
  private readonly releaseApi: ReleaseApi;
  private readonly assetFetcher: AssetFetcher;
  private readonly fileSystemLayer: FileSystemLayer;
  private readonly tarGzExtractor: ArchiveExtractor;
  private readonly logger: Logger;

  constructor(
    readonly repo: RepoSlug,
    deps: ReleaseDownloaderDeps,
    private readonly settings: DownloadSettings
  ) {
    this.releaseApi = deps.releaseApi;
    this.assetFetcher = deps.assetFetcher;
    this.fileSystemLayer = deps.fileSystemLayer;
    this.logger = deps.logger ?? SILENT_LOGGER;
    this.tarGzExtractor = deps.tarGzExtractor ?? new StripTarGzExtractor(this.logger);
  }

  /**
   * Download `assetName` of release `version` into `destDir`.
   * An empty version downloads from the latest release.
   *
   * @throws ReleaseResolutionError when the latest tag cannot be resolved
   * @throws AssetDownloadError on transfer failure
   * @throws ArchiveError when unpacking fails
   */
  async downloadAsset(assetName: string, version: string, destDir: string): Promise<DownloadedAsset> {
    const tag =
      version === "" ? await this.releaseApi.resolveLatest(this.repo, this.settings.retry) : version;
    const url = this.releaseApi.assetUrl(this.repo, tag, assetName);

    this.logger.info("Downloading release asset", { repo: this.repo, tag, asset: assetName });

    if (url.endsWith(".tar.gz")) {
      await this.fetchStrippedTarGz(url, destDir);
    } else {
      await this.assetFetcher.fetch(url, destDir, { ...this.fetchOptions(), mode: "auto" });
    }

    return { assetName, version: tag, url };
  }

  /**
   * Download the first latest-release asset whose name matches `pattern`.
   *
   * @throws AssetNotFoundError NO_MATCHING_ASSET when nothing matches
   * @throws AssetNotFoundError INVALID_PATTERN for an invalid regular expression
   */
  async downloadLatestMatching(pattern: string | RegExp, destDir: string): Promise<DownloadedAsset> {
    const regex = compileAssetPattern(pattern);
    const names = await this.releaseApi.listLatestAssets(this.repo);
    const match = names.find((name) => regex.test(name));

    if (match === undefined) {
      throw new AssetNotFoundError(
        `no matching asset found for pattern ${regex.source} in latest release of ${this.repo}`,
        "NO_MATCHING_ASSET"
      );
    }

    this.logger.debug("Matched release asset", { repo: this.repo, pattern: regex.source, asset: match });
    return this.downloadAsset(match, "", destDir);
  }

  private async fetchStrippedTarGz(url: string, destDir: string): Promise<void> {
    // Removed even when the transfer fails partway
    const archivePath = path.join(destDir, assetFileName(url));
    try {
      await this.assetFetcher.fetch(url, destDir, { ...this.fetchOptions(), mode: "raw" });
      await this.tarGzExtractor.extract(archivePath, destDir);
    } finally {
      await this.fileSystemLayer.rm(archivePath, { force: true });
    }
  }

  private fetchOptions(): FetchOptions {
    const { proxy, onProgress, signal } = this.settings;
    return {
      ...(proxy ? { proxy } : {}),
      ...(onProgress && { onProgress }),
      ...(signal && { signal }),
    };
  }
}
