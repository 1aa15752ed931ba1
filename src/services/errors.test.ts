// @vitest-environment node
import { describe, it, expect } from "vitest";
import {
  ServiceError,
  ReleaseResolutionError,
  AssetDownloadError,
  ArchiveError,
  AssetNotFoundError,
  VersionRecordError,
  InstallError,
  ConfigError,
  FileSystemError,
  isServiceError,
  getErrorMessage,
  type SerializedError,
} from "./errors.js";

describe("ServiceError", () => {
  describe("VersionRecordError", () => {
    it("has correct type", () => {
      const error = new VersionRecordError("Record is malformed");
      expect(error.type).toBe("version-record");
    });

    it("preserves message and code", () => {
      const error = new VersionRecordError("/opt/tool holds a/b, not c/d", "REPO_MISMATCH");
      expect(error.message).toBe("/opt/tool holds a/b, not c/d");
      expect(error.code).toBe("REPO_MISMATCH");
      expect(error.errorCode).toBe("REPO_MISMATCH");
    });

    it("is instanceof Error and ServiceError", () => {
      const error = new VersionRecordError("test");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ServiceError);
      expect(error.name).toBe("VersionRecordError");
    });

    it("serializes to JSON", () => {
      const error = new VersionRecordError("No version record", "NOT_FOUND");

      expect(error.toJSON()).toEqual({
        type: "version-record",
        message: "No version record",
        code: "NOT_FOUND",
      });
    });

    it("serializes without code when not provided", () => {
      const error = new VersionRecordError("No version record");

      expect(error.toJSON()).toEqual({
        type: "version-record",
        message: "No version record",
      });
    });
  });

  describe("InstallError", () => {
    it("keeps the cause", () => {
      const cause = new AssetDownloadError("received status code 404", "NETWORK_ERROR");
      const error = new InstallError("Failed to download tool.zip", "DOWNLOAD_FAILED", { cause });

      expect(error.cause).toBe(cause);
      expect(error.type).toBe("install");
    });
  });

  describe("FileSystemError", () => {
    it("serializes path and fs code", () => {
      const error = new FileSystemError("ENOENT", "/opt/tool/version.json", "File not found");

      expect(error.toJSON()).toEqual({
        type: "filesystem",
        message: "File not found",
        path: "/opt/tool/version.json",
        code: "ENOENT",
      });
    });

    it("keeps the original code and cause", () => {
      const cause = new Error("ENOSPC: no space left on device");
      const error = new FileSystemError("UNKNOWN", "/opt/tool", "Write failed", cause, "ENOSPC");

      expect(error.originalCode).toBe("ENOSPC");
      expect(error.cause).toBe(cause);
    });
  });

  describe("fromJSON", () => {
    const cases: [SerializedError, new (...args: never[]) => ServiceError][] = [
      [{ type: "release-resolution", message: "m", code: "RESOLUTION_FAILED" }, ReleaseResolutionError],
      [{ type: "asset-download", message: "m", code: "WRITE_FAILED" }, AssetDownloadError],
      [{ type: "archive", message: "m", code: "INVALID_ARCHIVE" }, ArchiveError],
      [{ type: "asset-not-found", message: "m", code: "NO_MATCHING_ASSET" }, AssetNotFoundError],
      [{ type: "version-record", message: "m", code: "MALFORMED_RECORD" }, VersionRecordError],
      [{ type: "install", message: "m", code: "CLEANUP_FAILED" }, InstallError],
      [{ type: "config", message: "m", code: "INVALID_REPO" }, ConfigError],
    ];

    it.each(cases)("recreates %o", (json, expectedClass) => {
      const error = ServiceError.fromJSON(json);

      expect(error).toBeInstanceOf(expectedClass);
      expect(error.toJSON()).toEqual(json);
    });

    it("drops codes the error class does not know", () => {
      const error = ServiceError.fromJSON({ type: "install", message: "m", code: "ENOENT" });

      expect(error.code).toBeUndefined();
    });

    it("recreates FileSystemError with path", () => {
      const error = ServiceError.fromJSON({
        type: "filesystem",
        message: "denied",
        code: "EACCES",
        path: "/opt/tool",
      });

      expect(error).toBeInstanceOf(FileSystemError);
      expect(error.toJSON()).toEqual({
        type: "filesystem",
        message: "denied",
        code: "EACCES",
        path: "/opt/tool",
      });
    });

    it("maps unknown filesystem codes to UNKNOWN", () => {
      const error = ServiceError.fromJSON({ type: "filesystem", message: "m", code: "EMFILE" });

      expect(error.code).toBe("UNKNOWN");
    });
  });
});

describe("isServiceError", () => {
  it("returns true for service errors", () => {
    expect(isServiceError(new ConfigError("bad repo", "INVALID_REPO"))).toBe(true);
  });

  it("returns false for plain errors and values", () => {
    expect(isServiceError(new Error("plain"))).toBe(false);
    expect(isServiceError("string")).toBe(false);
  });
});

describe("getErrorMessage", () => {
  it("returns the message of an Error", () => {
    expect(getErrorMessage(new TypeError("fetch failed"))).toBe("fetch failed");
  });

  it("stringifies other values", () => {
    expect(getErrorMessage(42)).toBe("42");
  });
});
