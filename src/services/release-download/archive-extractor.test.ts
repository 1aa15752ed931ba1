import { describe, it, expect } from "vitest";
import * as path from "node:path";
import {
  DefaultArchiveExtractor,
  isInsideDir,
  isSupportedArchive,
  toArchiveError,
} from "./archive-extractor.js";
import { stripFirstSegment } from "./strip-tar-gz-extractor.js";
import { ArchiveError } from "./errors.js";

describe("stripFirstSegment", () => {
  it.each([
    ["tool-v1/bin/tool", "bin/tool"],
    ["./tool-v1/README", "tool-v1/README"],
    ["./", ""],
    ["tool-v1/./bin/tool", "bin/tool"],
    ["tool-v1/", ""],
    ["tool-v1", ""],
    ["tool-v1//lib/x.so", "lib/x.so"],
    ["tool-v1\\bin\\tool.exe", "bin/tool.exe"],
  ])("strips %s to %j", (input, expected) => {
    expect(stripFirstSegment(input)).toBe(expected);
  });
});

describe("isInsideDir", () => {
  const root = path.resolve("/opt/tool");

  it("accepts the root and paths below it", () => {
    expect(isInsideDir(root, root)).toBe(true);
    expect(isInsideDir(root, path.join(root, "bin", "tool"))).toBe(true);
  });

  it("rejects escapes and sibling prefixes", () => {
    expect(isInsideDir(root, path.join(root, "..", "evil"))).toBe(false);
    expect(isInsideDir(root, path.resolve("/opt/tool-other/x"))).toBe(false);
  });
});

describe("isSupportedArchive", () => {
  it.each([
    ["tool.tar.gz", true],
    ["TOOL.TGZ", true],
    ["tool.tar", true],
    ["tool.zip", true],
    ["tool.exe", false],
    ["tool.gz", false],
  ])("%s -> %s", (name, expected) => {
    expect(isSupportedArchive(name)).toBe(expected);
  });
});

describe("toArchiveError", () => {
  it("passes ArchiveError through", () => {
    const original = new ArchiveError("bad", "INVALID_ARCHIVE");

    expect(toArchiveError(original, "/tmp/a.tgz", "/opt/tool")).toBe(original);
  });

  it("maps permission errors to PERMISSION_DENIED", () => {
    const cause = Object.assign(new Error("EACCES: permission denied, open '/opt/tool/bin'"), {
      code: "EACCES",
    });

    const error = toArchiveError(cause, "/tmp/a.tgz", "/opt/tool");

    expect(error.code).toBe("PERMISSION_DENIED");
    expect(error.cause).toBe(cause);
  });

  it("maps tar and zlib failures to INVALID_ARCHIVE", () => {
    const tarFailure = Object.assign(new Error("invalid entry"), { code: "TAR_ENTRY_INVALID" });
    const zlibFailure = Object.assign(new Error("zlib: incorrect header check"), {
      code: "Z_DATA_ERROR",
    });

    expect(toArchiveError(tarFailure, "/tmp/a.tgz", "/opt/tool").code).toBe("INVALID_ARCHIVE");
    expect(toArchiveError(zlibFailure, "/tmp/a.tgz", "/opt/tool").code).toBe("INVALID_ARCHIVE");
  });

  it("maps anything else to EXTRACTION_FAILED", () => {
    const error = toArchiveError(new Error("disk full"), "/tmp/a.tgz", "/opt/tool");

    expect(error.code).toBe("EXTRACTION_FAILED");
    expect(error.message).toBe("Failed to extract /tmp/a.tgz: disk full");
  });
});

describe("DefaultArchiveExtractor", () => {
  it("rejects unsupported formats", async () => {
    const extractor = new DefaultArchiveExtractor();

    await expect(extractor.extract("/tmp/tool.7z", "/opt/tool")).rejects.toMatchObject({
      type: "archive",
      code: "INVALID_ARCHIVE",
    });
  });
});
