/**
 * Tests for GitHubReleaseApi against a mock HttpClient.
 */

import { describe, it, expect, vi } from "vitest";
import { GitHubReleaseApi, GITHUB_API_HEADERS } from "./release-api.js";
import { ReleaseResolutionError } from "./errors.js";
import { createMockHttpClient } from "../platform/network.test-utils.js";

const LATEST_URL = "https://api.github.com/repos/owner/tool/releases/latest";
const RETRY = { count: 3, delayMs: 3000 };

function createApi(options: { proxy?: string } = {}) {
  const httpClient = createMockHttpClient();
  const sleep = vi.fn(async () => {});
  const api = new GitHubReleaseApi({ httpClient, sleep, ...options });
  return { api, httpClient, sleep };
}

describe("GitHubReleaseApi", () => {
  describe("resolveLatest", () => {
    it("returns the tag verbatim", async () => {
      const { api, httpClient } = createApi();
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v1.4.2" }) });

      await expect(api.resolveLatest("owner/tool", RETRY)).resolves.toBe("v1.4.2");
    });

    it("sends the GitHub API headers", async () => {
      const { api, httpClient } = createApi();
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v1.0.0" }) });

      await api.resolveLatest("owner/tool", RETRY);

      const [request] = httpClient.$.requestsTo(LATEST_URL);
      expect(request?.options?.headers).toEqual(GITHUB_API_HEADERS);
      expect(request?.options?.proxy).toBeUndefined();
    });

    it("routes requests through the configured proxy", async () => {
      const { api, httpClient } = createApi({ proxy: "http://proxy.test:3128" });
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v1.0.0" }) });

      await api.resolveLatest("owner/tool", RETRY);

      expect(httpClient.$.requestsTo(LATEST_URL)[0]?.options?.proxy).toBe("http://proxy.test:3128");
    });

    it("retries failed lookups and returns the first success", async () => {
      const { api, httpClient, sleep } = createApi();
      httpClient.setResponseSequence(LATEST_URL, [
        { status: 500 },
        { status: 502 },
        { body: JSON.stringify({ tag_name: "v3.0.0" }) },
      ]);

      await expect(api.resolveLatest("owner/tool", RETRY)).resolves.toBe("v3.0.0");
      expect(httpClient.$.requestsTo(LATEST_URL)).toHaveLength(3);
      expect(sleep.mock.calls).toEqual([[3000], [3000]]);
    });

    it("gives up after exactly count attempts", async () => {
      const { api, httpClient } = createApi();
      httpClient.simulateNetworkDown();

      const error = await api.resolveLatest("owner/tool", RETRY).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ReleaseResolutionError);
      expect(error).toMatchObject({
        message: "unable to fetch latest version of owner/tool",
        code: "RESOLUTION_FAILED",
      });
      expect(httpClient.$.requests).toHaveLength(3);
    });

    it("treats a payload without tag_name as a failed attempt", async () => {
      const { api, httpClient } = createApi();
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ name: "Release 1" }) });

      await expect(api.resolveLatest("owner/tool", { count: 2, delayMs: 0 })).rejects.toMatchObject({
        code: "RESOLUTION_FAILED",
      });
      expect(httpClient.$.requests).toHaveLength(2);
    });

    it("fails without any request when count is zero", async () => {
      const { api, httpClient } = createApi();

      await expect(api.resolveLatest("owner/tool", { count: 0, delayMs: 0 })).rejects.toMatchObject({
        code: "RESOLUTION_FAILED",
      });
      expect(httpClient.$.requests).toHaveLength(0);
    });
  });

  describe("assetUrl", () => {
    it("builds the release download URL without network access", () => {
      const { api, httpClient } = createApi();

      expect(api.assetUrl("owner/tool", "v1.2.0", "tool-linux-amd64.tar.gz")).toBe(
        "https://github.com/owner/tool/releases/download/v1.2.0/tool-linux-amd64.tar.gz"
      );
      expect(httpClient.$.requests).toHaveLength(0);
    });

    it("uses the download base URL override", () => {
      const api = new GitHubReleaseApi({
        httpClient: createMockHttpClient(),
        downloadBaseUrl: "http://127.0.0.1:9000",
      });

      expect(api.assetUrl("owner/tool", "v1", "tool.zip")).toBe(
        "http://127.0.0.1:9000/owner/tool/releases/download/v1/tool.zip"
      );
    });
  });

  describe("latestAssetUrl", () => {
    it("resolves the latest tag into the asset URL", async () => {
      const { api, httpClient } = createApi();
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v2.1.0" }) });

      await expect(api.latestAssetUrl("owner/tool", "tool.zip", RETRY)).resolves.toBe(
        "https://github.com/owner/tool/releases/download/v2.1.0/tool.zip"
      );
    });
  });

  describe("listLatestAssets", () => {
    it("returns asset names in release order", async () => {
      const { api, httpClient } = createApi();
      httpClient.setResponse(LATEST_URL, {
        body: JSON.stringify({
          tag_name: "v1.0.0",
          assets: [{ name: "tool-linux.tar.gz" }, { name: "tool-darwin.zip" }],
        }),
      });

      await expect(api.listLatestAssets("owner/tool")).resolves.toEqual([
        "tool-linux.tar.gz",
        "tool-darwin.zip",
      ]);
    });

    it("reports non-200 responses as NETWORK_ERROR without retrying", async () => {
      const { api, httpClient } = createApi();
      httpClient.setResponse(LATEST_URL, { status: 404, body: "Not Found" });

      await expect(api.listLatestAssets("owner/tool")).rejects.toMatchObject({
        message: "received status code 404 from GitHub API: Not Found",
        code: "NETWORK_ERROR",
      });
      expect(httpClient.$.requests).toHaveLength(1);
    });

    it("reports malformed JSON as INVALID_RESPONSE", async () => {
      const { api, httpClient } = createApi();
      httpClient.setResponse(LATEST_URL, { body: "<html>" });

      await expect(api.listLatestAssets("owner/tool")).rejects.toMatchObject({
        code: "INVALID_RESPONSE",
      });
    });

    it("reports a payload without assets as INVALID_RESPONSE", async () => {
      const { api, httpClient } = createApi();
      httpClient.setResponse(LATEST_URL, { body: JSON.stringify({ tag_name: "v1" }) });

      await expect(api.listLatestAssets("owner/tool")).rejects.toMatchObject({
        message: "Unexpected latest release payload for owner/tool: assets: Required",
        code: "INVALID_RESPONSE",
      });
    });
  });
});
