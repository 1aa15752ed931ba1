/**
 * Re-export release download error types from central errors module.
 */

export type {
  ReleaseResolutionErrorCode,
  AssetDownloadErrorCode,
  ArchiveErrorCode,
  AssetNotFoundErrorCode,
  VersionRecordErrorCode,
  InstallErrorCode,
} from "../errors.js";
export {
  ReleaseResolutionError,
  AssetDownloadError,
  ArchiveError,
  AssetNotFoundError,
  VersionRecordError,
  InstallError,
} from "../errors.js";
