/**
 * Services layer public API.
 */

export * from "./release-download/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export {
  ServiceError,
  ConfigError,
  FileSystemError,
  isServiceError,
  getErrorMessage,
  type SerializedError,
  type ConfigErrorCode,
} from "./errors.js";
export {
  DefaultNetworkLayer,
  type HttpClient,
  type HttpRequestOptions,
  type NetworkLayerConfig,
} from "./platform/network.js";
export {
  DefaultFileSystemLayer,
  type FileSystemLayer,
  type FileSystemErrorCode,
  type MkdirOptions,
  type RmOptions,
} from "./platform/filesystem.js";
