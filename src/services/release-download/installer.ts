/**
 * Install/upgrade state machine for a single install directory.
 *
 * not-installed ──install──▶ installed-current
 * installed-stale ──upgrade (rm -rf, download, record)──▶ installed-current
 */

import {
  InstallError,
  ReleaseResolutionError,
  VersionRecordError,
  type InstallErrorCode,
} from "./errors.js";
import type { ReleaseApi } from "./release-api.js";
import type { AssetDownloader, DownloadedAsset } from "./release-downloader.js";
import type { VersionRecordStore } from "./version-record-store.js";
import type {
  InstallOutcome,
  InstallRequest,
  InstallState,
  RepoSlug,
  RetryPolicy,
  VersionRecord,
} from "./types.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { Logger } from "../logging/index.js";
import { SILENT_LOGGER } from "../logging/index.js";
import { getErrorMessage } from "../errors.js";

export interface ReleaseInstallerDeps {
  readonly releaseApi: ReleaseApi;
  readonly downloader: AssetDownloader;
  readonly recordStore: VersionRecordStore;
  readonly fileSystemLayer: FileSystemLayer;
  readonly logger?: Logger;
}

function wrap(code: InstallErrorCode, context: string, error: unknown): InstallError {
  return new InstallError(`${context}: ${getErrorMessage(error)}`, code, { cause: error });
}

/**
 * Installs release assets of one repository into one directory and keeps
 * `version.json` in step with what was installed.
 *
 * Failures abort the operation; nothing is rolled back.
 */
export class ReleaseInstaller {
  private readonly releaseApi: ReleaseApi;
  private readonly downloader: AssetDownloader;
  private readonly recordStore: VersionRecordStore;
  private readonly fileSystemLayer: FileSystemLayer;
  private readonly logger: Logger;

  constructor(
    readonly repo: RepoSlug,
    readonly installDir: string,
    private readonly retry: RetryPolicy,
    deps: ReleaseInstallerDeps
  ) {
    this.releaseApi = deps.releaseApi;
    this.downloader = deps.downloader;
    this.recordStore = deps.recordStore;
    this.fileSystemLayer = deps.fileSystemLayer;
    this.logger = deps.logger ?? SILENT_LOGGER;
  }

  /**
   * Classify the install directory against the latest release.
   * Resolves the latest tag only when a record exists.
   *
   * @throws VersionRecordError MALFORMED_RECORD or REPO_MISMATCH
   * @throws InstallError RESOLUTION_FAILED
   */
  async inspect(): Promise<InstallState> {
    const record = await this.readOwnRecord();
    if (record === null) {
      return { kind: "not-installed" };
    }
    const latest = await this.resolveLatest();
    return latest === record.tag
      ? { kind: "installed-current", record }
      : { kind: "installed-stale", record, latest };
  }

  /**
   * Install the requested asset, or upgrade an existing install when allowed.
   *
   * @throws VersionRecordError MALFORMED_RECORD or REPO_MISMATCH; the directory is left untouched
   * @throws InstallError DOWNLOAD_FAILED, RESOLUTION_FAILED, RECORD_WRITE_FAILED or CLEANUP_FAILED
   */
  async installAsset(request: InstallRequest): Promise<InstallOutcome> {
    const record = await this.readOwnRecord();

    if (record === null) {
      const downloaded = await this.download(request.assetName, request.version);
      await this.writeRecord(downloaded.version);
      this.logger.info("Installed", { repo: this.repo, tag: downloaded.version, dir: this.installDir });
      return "installed";
    }

    if (!request.allowUpgrade) {
      this.logger.debug("Install present, upgrades disabled", { repo: this.repo, tag: record.tag });
      return "unchanged";
    }

    const latest = request.latestTag ?? (await this.resolveLatest());
    if (latest === record.tag) {
      this.logger.debug("Install up to date", { repo: this.repo, tag: record.tag });
      return "up-to-date";
    }

    this.logger.info("Upgrading", { repo: this.repo, from: record.tag, to: latest });
    await this.clearInstallDir();
    const assetName = request.assetNameFor ? request.assetNameFor(latest) : request.assetName;
    const downloaded = await this.download(assetName, latest);
    await this.writeRecord(downloaded.version);
    this.logger.info("Upgraded", { repo: this.repo, tag: downloaded.version, dir: this.installDir });
    return "upgraded";
  }

  /**
   * Read the record of this directory, or null when there is none.
   * A record written for another repository is an error.
   */
  private async readOwnRecord(): Promise<VersionRecord | null> {
    if (!(await this.recordStore.exists(this.installDir))) {
      return null;
    }
    const record = await this.recordStore.read(this.installDir);
    if (record.repo !== this.repo) {
      throw new VersionRecordError(
        `${this.installDir} holds ${record.repo}, not ${this.repo}`,
        "REPO_MISMATCH"
      );
    }
    return record;
  }

  private async resolveLatest(): Promise<string> {
    try {
      return await this.releaseApi.resolveLatest(this.repo, this.retry);
    } catch (error) {
      throw wrap("RESOLUTION_FAILED", `Failed to resolve latest release of ${this.repo}`, error);
    }
  }

  private async download(assetName: string, version: string): Promise<DownloadedAsset> {
    try {
      return await this.downloader.downloadAsset(assetName, version, this.installDir);
    } catch (error) {
      if (error instanceof ReleaseResolutionError) {
        throw wrap("RESOLUTION_FAILED", `Failed to resolve latest release of ${this.repo}`, error);
      }
      throw wrap("DOWNLOAD_FAILED", `Failed to download ${assetName}`, error);
    }
  }

  private async writeRecord(tag: string): Promise<void> {
    try {
      await this.recordStore.write(this.installDir, { tag, repo: this.repo });
    } catch (error) {
      throw wrap("RECORD_WRITE_FAILED", `Failed to record version ${tag}`, error);
    }
  }

  private async clearInstallDir(): Promise<void> {
    try {
      await this.fileSystemLayer.rm(this.installDir, { recursive: true, force: true });
    } catch (error) {
      throw wrap("CLEANUP_FAILED", `Failed to remove ${this.installDir}`, error);
    }
  }
}
