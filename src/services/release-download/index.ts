/**
 * Release resolution, download and installation.
 */

export type {
  RepoSlug,
  RetryPolicy,
  VersionRecord,
  DownloadProgress,
  DownloadProgressCallback,
  AssetNameResolver,
  FetchMode,
  FetchOptions,
  InstallState,
  InstallOutcome,
  InstallRequest,
} from "./types.js";
export {
  ReleaseResolutionError,
  AssetDownloadError,
  ArchiveError,
  AssetNotFoundError,
  VersionRecordError,
  InstallError,
} from "./errors.js";
export type {
  ReleaseResolutionErrorCode,
  AssetDownloadErrorCode,
  ArchiveErrorCode,
  AssetNotFoundErrorCode,
  VersionRecordErrorCode,
  InstallErrorCode,
} from "./errors.js";
export { retryFixed, defaultSleep, type Sleep, type RetryResult, type RetryOptions } from "./retry.js";
export {
  GitHubReleaseApi,
  GITHUB_API_BASE_URL,
  GITHUB_DOWNLOAD_BASE_URL,
  GITHUB_API_HEADERS,
  type ReleaseApi,
  type GitHubReleaseApiDeps,
} from "./release-api.js";
export {
  HttpAssetFetcher,
  assetFileName,
  DOWNLOAD_TIMEOUT_MS,
  type AssetFetcher,
  type HttpAssetFetcherDeps,
} from "./asset-fetcher.js";
export {
  DefaultArchiveExtractor,
  TarExtractor,
  ZipExtractor,
  isSupportedArchive,
  type ArchiveExtractor,
} from "./archive-extractor.js";
export { StripTarGzExtractor, stripFirstSegment } from "./strip-tar-gz-extractor.js";
export {
  ReleaseDownloader,
  compileAssetPattern,
  type AssetDownloader,
  type DownloadedAsset,
  type DownloadSettings,
  type ReleaseDownloaderDeps,
} from "./release-downloader.js";
export {
  FileVersionRecordStore,
  VERSION_RECORD_FILE,
  versionRecordPath,
  serializeVersionRecord,
  parseVersionRecord,
  type VersionRecordStore,
} from "./version-record-store.js";
export { ReleaseInstaller, type ReleaseInstallerDeps } from "./installer.js";
export {
  createTerminalProgressReporter,
  formatBytes,
  formatProgressLine,
  type ProgressOutput,
} from "./progress.js";
