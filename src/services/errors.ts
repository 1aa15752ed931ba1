/**
 * Service error definitions with serialization support.
 */

import type { FileSystemErrorCode } from "./platform/filesystem.js";

/**
 * Error codes for release metadata lookups against the hosting API.
 */
export const RELEASE_RESOLUTION_ERROR_CODES = [
  "RESOLUTION_FAILED",
  "NETWORK_ERROR",
  "INVALID_RESPONSE",
] as const;
export type ReleaseResolutionErrorCode = (typeof RELEASE_RESOLUTION_ERROR_CODES)[number];

/**
 * Error codes for asset transfers.
 */
export const ASSET_DOWNLOAD_ERROR_CODES = ["NETWORK_ERROR", "WRITE_FAILED", "ABORTED"] as const;
export type AssetDownloadErrorCode = (typeof ASSET_DOWNLOAD_ERROR_CODES)[number];

/**
 * Error codes for archive extraction operations.
 */
export const ARCHIVE_ERROR_CODES = [
  "INVALID_ARCHIVE",
  "EXTRACTION_FAILED",
  "PERMISSION_DENIED",
] as const;
export type ArchiveErrorCode = (typeof ARCHIVE_ERROR_CODES)[number];

/**
 * Error codes for pattern-based asset lookups.
 */
export const ASSET_NOT_FOUND_ERROR_CODES = ["NO_MATCHING_ASSET", "INVALID_PATTERN"] as const;
export type AssetNotFoundErrorCode = (typeof ASSET_NOT_FOUND_ERROR_CODES)[number];

/**
 * Error codes for the persisted version record.
 */
export const VERSION_RECORD_ERROR_CODES = ["NOT_FOUND", "MALFORMED_RECORD", "REPO_MISMATCH"] as const;
export type VersionRecordErrorCode = (typeof VERSION_RECORD_ERROR_CODES)[number];

/**
 * Error codes for install/upgrade orchestration.
 */
export const INSTALL_ERROR_CODES = [
  "DOWNLOAD_FAILED",
  "RESOLUTION_FAILED",
  "RECORD_WRITE_FAILED",
  "CLEANUP_FAILED",
] as const;
export type InstallErrorCode = (typeof INSTALL_ERROR_CODES)[number];

/**
 * Error codes for client configuration.
 */
export const CONFIG_ERROR_CODES = ["INVALID_REPO", "INVALID_CONFIG"] as const;
export type ConfigErrorCode = (typeof CONFIG_ERROR_CODES)[number];

const FILE_SYSTEM_ERROR_CODES: readonly FileSystemErrorCode[] = [
  "ENOENT",
  "EACCES",
  "EEXIST",
  "ENOTDIR",
  "EISDIR",
  "ENOTEMPTY",
  "UNKNOWN",
];

/**
 * Serialized error format.
 */
export interface SerializedError {
  readonly type:
    | "release-resolution"
    | "asset-download"
    | "archive"
    | "asset-not-found"
    | "version-record"
    | "install"
    | "config"
    | "filesystem";
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
}

/**
 * Narrow a serialized code back to one of the known codes of an error class.
 */
function knownCode<T extends string>(codes: readonly T[], code: string | undefined): T | undefined {
  return codes.find((known) => known === code);
}

/**
 * Base class for all service errors.
 * Provides serialization so callers can hand errors across process boundaries.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize the error.
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }

  /**
   * Deserialize an error.
   * Recreates the appropriate ServiceError subclass based on the type field.
   * Codes that the target class does not know are dropped.
   *
   * @example
   * ```typescript
   * const error = ServiceError.fromJSON(JSON.parse(line));
   * if (error instanceof VersionRecordError && error.errorCode === "REPO_MISMATCH") {
   *   // directory belongs to another repository
   * }
   * ```
   */
  static fromJSON(json: SerializedError): ServiceError {
    switch (json.type) {
      case "release-resolution":
        return new ReleaseResolutionError(
          json.message,
          knownCode(RELEASE_RESOLUTION_ERROR_CODES, json.code)
        );
      case "asset-download":
        return new AssetDownloadError(json.message, knownCode(ASSET_DOWNLOAD_ERROR_CODES, json.code));
      case "archive":
        return new ArchiveError(json.message, knownCode(ARCHIVE_ERROR_CODES, json.code));
      case "asset-not-found":
        return new AssetNotFoundError(
          json.message,
          knownCode(ASSET_NOT_FOUND_ERROR_CODES, json.code)
        );
      case "version-record":
        return new VersionRecordError(
          json.message,
          knownCode(VERSION_RECORD_ERROR_CODES, json.code)
        );
      case "install":
        return new InstallError(json.message, knownCode(INSTALL_ERROR_CODES, json.code));
      case "config":
        return new ConfigError(json.message, knownCode(CONFIG_ERROR_CODES, json.code));
      case "filesystem":
        return new FileSystemError(
          knownCode(FILE_SYSTEM_ERROR_CODES, json.code) ?? "UNKNOWN",
          json.path ?? "",
          json.message
        );
    }
  }
}

/**
 * Error from resolving release metadata (latest tag, asset listing).
 */
export class ReleaseResolutionError extends ServiceError {
  readonly type = "release-resolution" as const;

  constructor(
    message: string,
    readonly errorCode?: ReleaseResolutionErrorCode,
    options?: ErrorOptions
  ) {
    super(message, errorCode, options);
    this.name = "ReleaseResolutionError";
  }
}

/**
 * Error from transferring an asset to disk.
 */
export class AssetDownloadError extends ServiceError {
  readonly type = "asset-download" as const;

  constructor(
    message: string,
    readonly errorCode?: AssetDownloadErrorCode,
    options?: ErrorOptions
  ) {
    super(message, errorCode, options);
    this.name = "AssetDownloadError";
  }
}

/**
 * Error from archive extraction operations (tar.gz, tgz, zip).
 */
export class ArchiveError extends ServiceError {
  readonly type = "archive" as const;

  constructor(
    message: string,
    readonly errorCode?: ArchiveErrorCode,
    options?: ErrorOptions
  ) {
    super(message, errorCode, options);
    this.name = "ArchiveError";
  }
}

/**
 * A pattern-based lookup found no asset on the latest release.
 */
export class AssetNotFoundError extends ServiceError {
  readonly type = "asset-not-found" as const;

  constructor(
    message: string,
    readonly errorCode?: AssetNotFoundErrorCode,
    options?: ErrorOptions
  ) {
    super(message, errorCode, options);
    this.name = "AssetNotFoundError";
  }
}

/**
 * Error reading or validating the version.json record of an install directory.
 */
export class VersionRecordError extends ServiceError {
  readonly type = "version-record" as const;

  constructor(
    message: string,
    readonly errorCode?: VersionRecordErrorCode,
    options?: ErrorOptions
  ) {
    super(message, errorCode, options);
    this.name = "VersionRecordError";
  }
}

/**
 * Error from the install/upgrade flow. The failing step is kept as `cause`.
 */
export class InstallError extends ServiceError {
  readonly type = "install" as const;

  constructor(
    message: string,
    readonly errorCode?: InstallErrorCode,
    options?: ErrorOptions
  ) {
    super(message, errorCode, options);
    this.name = "InstallError";
  }
}

/**
 * Invalid client configuration (repository name, retry settings, proxy URL).
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;

  constructor(
    message: string,
    readonly errorCode?: ConfigErrorCode,
    options?: ErrorOptions
  ) {
    super(message, errorCode, options);
    this.name = "ConfigError";
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode, cause ? { cause } : undefined);
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

export { getErrorMessage } from "../shared/error-utils.js";
