/**
 * Tests for the install/upgrade state machine.
 *
 * The installer runs against the real API client, downloader and record store
 * on top of a mock HTTP client and an in-memory filesystem.
 */

import { describe, it, expect, vi } from "vitest";
import { ReleaseInstaller } from "./installer.js";
import { GitHubReleaseApi } from "./release-api.js";
import { HttpAssetFetcher } from "./asset-fetcher.js";
import { ReleaseDownloader } from "./release-downloader.js";
import { FileVersionRecordStore } from "./version-record-store.js";
import { InstallError, VersionRecordError } from "./errors.js";
import { createMockArchiveExtractor } from "./archive-extractor.test-utils.js";
import { createMockHttpClient } from "../platform/network.test-utils.js";
import {
  createFileSystemMock,
  directory,
  file,
  type Entry,
} from "../platform/filesystem.state-mock.js";

const LATEST_URL = "https://api.github.com/repos/owner/tool/releases/latest";
const DOWNLOAD = "https://github.com/owner/tool/releases/download";

function record(tag: string, repo = "owner/tool"): string {
  return JSON.stringify({ tag_name: tag, repo });
}

function createInstaller(entries: Record<string, Entry> = {}) {
  const httpClient = createMockHttpClient();
  const fileSystemLayer = createFileSystemMock({ entries: { "/tmp": directory(), ...entries } });
  const releaseApi = new GitHubReleaseApi({ httpClient, sleep: vi.fn(async () => {}) });
  const retry = { count: 2, delayMs: 0 };
  const downloader = new ReleaseDownloader(
    "owner/tool",
    {
      releaseApi,
      assetFetcher: new HttpAssetFetcher({
        httpClient,
        fileSystemLayer,
        archiveExtractor: createMockArchiveExtractor(),
        tempDir: "/tmp",
      }),
      fileSystemLayer,
      tarGzExtractor: createMockArchiveExtractor(),
    },
    { retry }
  );
  const installer = new ReleaseInstaller("owner/tool", "/opt/tool", retry, {
    releaseApi,
    downloader,
    recordStore: new FileVersionRecordStore(fileSystemLayer),
    fileSystemLayer,
  });
  return { installer, httpClient, fileSystemLayer };
}

describe("ReleaseInstaller", () => {
  describe("fresh install", () => {
    it("downloads the pinned version and records it", async () => {
      const { installer, httpClient, fileSystemLayer } = createInstaller();
      httpClient.setResponse(`${DOWNLOAD}/v2.0.0/tool`, { body: "elf" });

      const outcome = await installer.installAsset({
        assetName: "tool",
        version: "v2.0.0",
        allowUpgrade: false,
      });

      expect(outcome).toBe("installed");
      expect(fileSystemLayer.$.readText("/opt/tool/version.json")).toBe(record("v2.0.0"));
      expect(fileSystemLayer.$.listTree("/opt/tool")).toEqual(["tool", "version.json"]);
      expect(httpClient.$.requestsTo(LATEST_URL)).toHaveLength(0);
    });

    it("records the resolved tag when installing latest", async () => {
      const { installer, httpClient, fileSystemLayer } = createInstaller();
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v2.1.0" }) });
      httpClient.setResponse(`${DOWNLOAD}/v2.1.0/tool.zip`, { body: "zip" });

      await installer.installAsset({ assetName: "tool.zip", version: "", allowUpgrade: true });

      expect(fileSystemLayer.$.readText("/opt/tool/version.json")).toBe(record("v2.1.0"));
    });

    it("is idempotent when upgrades are disabled", async () => {
      const { installer, httpClient } = createInstaller();
      httpClient.setResponse(`${DOWNLOAD}/v1.0.0/tool`, { body: "elf" });
      const request = { assetName: "tool", version: "v1.0.0", allowUpgrade: false };

      await installer.installAsset(request);
      const requestsAfterFirst = httpClient.$.requests.length;

      await expect(installer.installAsset(request)).resolves.toBe("unchanged");
      expect(httpClient.$.requests).toHaveLength(requestsAfterFirst);
    });
  });

  describe("existing install", () => {
    it("leaves a pinned install alone even when it differs from the request", async () => {
      const { installer, httpClient, fileSystemLayer } = createInstaller({
        "/opt/tool/version.json": file(record("v1.0.0")),
      });

      const outcome = await installer.installAsset({
        assetName: "tool",
        version: "v3.0.0",
        allowUpgrade: false,
      });

      expect(outcome).toBe("unchanged");
      expect(fileSystemLayer.$.readText("/opt/tool/version.json")).toBe(record("v1.0.0"));
      expect(httpClient.$.requests).toHaveLength(0);
    });

    it("reports up-to-date after a single resolution", async () => {
      const { installer, httpClient } = createInstaller({
        "/opt/tool/version.json": file(record("v2.0.0")),
      });
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v2.0.0" }) });

      const outcome = await installer.installAsset({
        assetName: "tool",
        version: "",
        allowUpgrade: true,
      });

      expect(outcome).toBe("up-to-date");
      expect(httpClient.$.requests.map((r) => r.url)).toEqual([LATEST_URL]);
    });

    it("uses a latest tag the caller already resolved", async () => {
      const { installer, httpClient } = createInstaller({
        "/opt/tool/version.json": file(record("v2.0.0")),
      });

      const outcome = await installer.installAsset({
        assetName: "tool",
        version: "v2.0.0",
        allowUpgrade: true,
        latestTag: "v2.0.0",
      });

      expect(outcome).toBe("up-to-date");
      expect(httpClient.$.requests).toHaveLength(0);
    });

    it("upgrades a stale install: clears the directory, downloads the new asset, records the new tag", async () => {
      const { installer, httpClient, fileSystemLayer } = createInstaller({
        "/opt/tool/version.json": file(record("v1.0.0")),
        "/opt/tool/bin/tool-v1.0.0": file("old"),
      });
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v2.0.0" }) });
      httpClient.setResponse(`${DOWNLOAD}/v2.0.0/tool-v2.0.0`, { body: "new" });

      const outcome = await installer.installAsset({
        assetName: "tool-v1.0.0",
        version: "",
        allowUpgrade: true,
        assetNameFor: (tag) => `tool-${tag}`,
      });

      expect(outcome).toBe("upgraded");
      expect(fileSystemLayer.$.listTree("/opt/tool")).toEqual(["tool-v2.0.0", "version.json"]);
      expect(fileSystemLayer.$.readText("/opt/tool/version.json")).toBe(record("v2.0.0"));
      expect(fileSystemLayer.$.operations).toContain("rm /opt/tool");
    });

    it("reuses the request's asset name when no resolver is given", async () => {
      const { installer, httpClient } = createInstaller({
        "/opt/tool/version.json": file(record("v1.0.0")),
      });
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v2.0.0" }) });
      httpClient.setResponse(`${DOWNLOAD}/v2.0.0/tool`, { body: "new" });

      await installer.installAsset({ assetName: "tool", version: "", allowUpgrade: true });

      expect(httpClient.$.requestsTo(`${DOWNLOAD}/v2.0.0/tool`)).toHaveLength(1);
    });

    it("refuses a directory recorded for another repository and leaves it untouched", async () => {
      const { installer, httpClient, fileSystemLayer } = createInstaller({
        "/opt/tool/version.json": file(record("v1.0.0", "other/tool")),
        "/opt/tool/bin/other": file("other"),
      });

      const error = await installer
        .installAsset({ assetName: "tool", version: "", allowUpgrade: true })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(VersionRecordError);
      expect(error).toMatchObject({
        message: "/opt/tool holds other/tool, not owner/tool",
        code: "REPO_MISMATCH",
      });
      expect(fileSystemLayer.$.listTree("/opt/tool")).toEqual(["bin", "bin/other", "version.json"]);
      expect(httpClient.$.requests).toHaveLength(0);
    });

    it("refuses another repository's record even when upgrades are disabled", async () => {
      const { installer } = createInstaller({
        "/opt/tool/version.json": file(record("v1.0.0", "other/tool")),
      });

      await expect(
        installer.installAsset({ assetName: "tool", version: "v1.0.0", allowUpgrade: false })
      ).rejects.toMatchObject({ code: "REPO_MISMATCH" });
    });

    it("reports a malformed record", async () => {
      const { installer } = createInstaller({ "/opt/tool/version.json": file("v1.0.0") });

      await expect(
        installer.installAsset({ assetName: "tool", version: "", allowUpgrade: true })
      ).rejects.toMatchObject({ type: "version-record", code: "MALFORMED_RECORD" });
    });
  });

  describe("failures", () => {
    it("wraps download failures as DOWNLOAD_FAILED and writes no record", async () => {
      const { installer, fileSystemLayer } = createInstaller();

      const error = await installer
        .installAsset({ assetName: "tool.zip", version: "v2.0.0", allowUpgrade: false })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InstallError);
      expect(error).toMatchObject({
        message: `Failed to download tool.zip: received status code 404 downloading ${DOWNLOAD}/v2.0.0/tool.zip`,
        code: "DOWNLOAD_FAILED",
      });
      expect(fileSystemLayer.$.readText("/opt/tool/version.json")).toBeUndefined();
    });

    it("wraps a failed latest lookup during a fresh install as RESOLUTION_FAILED", async () => {
      const { installer, httpClient } = createInstaller();
      httpClient.setResponse(LATEST_URL, { status: 503 });

      await expect(
        installer.installAsset({ assetName: "tool", version: "", allowUpgrade: true })
      ).rejects.toMatchObject({
        message:
          "Failed to resolve latest release of owner/tool: unable to fetch latest version of owner/tool",
        code: "RESOLUTION_FAILED",
      });
    });

    it("wraps a failed latest lookup during an upgrade check as RESOLUTION_FAILED", async () => {
      const { installer, httpClient, fileSystemLayer } = createInstaller({
        "/opt/tool/version.json": file(record("v1.0.0")),
      });
      httpClient.simulateNetworkDown();

      await expect(
        installer.installAsset({ assetName: "tool", version: "", allowUpgrade: true })
      ).rejects.toMatchObject({ code: "RESOLUTION_FAILED" });
      expect(fileSystemLayer.$.readText("/opt/tool/version.json")).toBe(record("v1.0.0"));
    });

    it("wraps record write failures as RECORD_WRITE_FAILED", async () => {
      const { installer, httpClient, fileSystemLayer } = createInstaller();
      httpClient.setResponse(`${DOWNLOAD}/v2.0.0/tool`, { body: "elf" });
      fileSystemLayer.$.failOperation("rename", "EACCES");

      await expect(
        installer.installAsset({ assetName: "tool", version: "v2.0.0", allowUpgrade: false })
      ).rejects.toMatchObject({ code: "RECORD_WRITE_FAILED" });
    });

    it("wraps directory removal failures as CLEANUP_FAILED", async () => {
      const { installer, httpClient, fileSystemLayer } = createInstaller({
        "/opt/tool/version.json": file(record("v1.0.0")),
      });
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v2.0.0" }) });
      fileSystemLayer.$.failOperation("rm", "EACCES");

      await expect(
        installer.installAsset({ assetName: "tool", version: "", allowUpgrade: true })
      ).rejects.toMatchObject({
        message: "Failed to remove /opt/tool: Mock rm failure: EACCES",
        code: "CLEANUP_FAILED",
      });
    });
  });

  describe("inspect", () => {
    it("reports not-installed without network access", async () => {
      const { installer, httpClient } = createInstaller();

      await expect(installer.inspect()).resolves.toEqual({ kind: "not-installed" });
      expect(httpClient.$.requests).toHaveLength(0);
    });

    it("reports installed-current", async () => {
      const { installer, httpClient } = createInstaller({
        "/opt/tool/version.json": file(record("v2.0.0")),
      });
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v2.0.0" }) });

      await expect(installer.inspect()).resolves.toEqual({
        kind: "installed-current",
        record: { tag: "v2.0.0", repo: "owner/tool" },
      });
    });

    it("reports installed-stale with the latest tag", async () => {
      const { installer, httpClient } = createInstaller({
        "/opt/tool/version.json": file(record("v1.0.0")),
      });
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v2.0.0" }) });

      await expect(installer.inspect()).resolves.toEqual({
        kind: "installed-stale",
        record: { tag: "v1.0.0", repo: "owner/tool" },
        latest: "v2.0.0",
      });
    });
  });
});
