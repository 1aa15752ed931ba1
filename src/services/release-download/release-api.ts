/**
 * Release metadata lookups and download URL construction for GitHub-hosted repositories.
 */

import { z } from "zod";
import type { HttpClient, HttpRequestOptions, Response } from "../platform/network.js";
import type { Logger } from "../logging/index.js";
import { SILENT_LOGGER } from "../logging/index.js";
import { getErrorMessage } from "../errors.js";
import { ReleaseResolutionError } from "./errors.js";
import { retryFixed, type Sleep } from "./retry.js";
import type { RepoSlug, RetryPolicy } from "./types.js";

export const GITHUB_API_BASE_URL = "https://api.github.com";
export const GITHUB_DOWNLOAD_BASE_URL = "https://github.com";

/**
 * Headers required by the GitHub REST API.
 */
export const GITHUB_API_HEADERS: Readonly<Record<string, string>> = {
  Accept: "application/vnd.github+json",
  "X-GitHub-Api-Version": "2022-11-28",
  "User-Agent": "release-fetch",
};

/** Per-request ceiling for API calls */
const API_TIMEOUT_MS = 30000;

const LatestReleaseSchema = z.object({
  tag_name: z.string(),
});

const ReleaseAssetsSchema = z.object({
  assets: z.array(z.object({ name: z.string() })),
});

/**
 * Resolves release tags and locates release assets.
 */
export interface ReleaseApi {
  /**
   * Resolve the tag of the latest release, retrying every failure per `retry`.
   *
   * @returns Tag name exactly as reported (a leading "v" is kept)
   * @throws ReleaseResolutionError with code RESOLUTION_FAILED once all attempts fail
   */
  resolveLatest(repo: RepoSlug, retry: RetryPolicy): Promise<string>;

  /**
   * Build the download URL of a release asset. Pure; no network access.
   */
  assetUrl(repo: RepoSlug, version: string, assetName: string): string;

  /**
   * Resolve the latest tag, then build the asset's download URL.
   *
   * @throws ReleaseResolutionError with code RESOLUTION_FAILED once all attempts fail
   */
  latestAssetUrl(repo: RepoSlug, assetName: string, retry: RetryPolicy): Promise<string>;

  /**
   * List every asset name attached to the latest release. Not retried.
   *
   * @throws ReleaseResolutionError with code NETWORK_ERROR or INVALID_RESPONSE
   */
  listLatestAssets(repo: RepoSlug): Promise<string[]>;
}

/**
 * Dependencies for GitHubReleaseApi.
 */
export interface GitHubReleaseApiDeps {
  readonly httpClient: HttpClient;
  /** HTTP(S) proxy URL used for every API call */
  readonly proxy?: string;
  readonly logger?: Logger;
  readonly sleep?: Sleep;
  /** Override for GitHub Enterprise or test servers */
  readonly apiBaseUrl?: string;
  /** Override for GitHub Enterprise or test servers */
  readonly downloadBaseUrl?: string;
}

/**
 * ReleaseApi backed by the GitHub REST API "latest release" endpoint.
 */
export class GitHubReleaseApi implements ReleaseApi {
  private readonly httpClient: HttpClient;
  private readonly proxy: string | undefined;
  private readonly logger: Logger;
  private readonly sleep: Sleep | undefined;
  private readonly apiBaseUrl: string;
  private readonly downloadBaseUrl: string;

  constructor(deps: GitHubReleaseApiDeps) {
    this.httpClient = deps.httpClient;
    this.proxy = deps.proxy;
    this.logger = deps.logger ?? SILENT_LOGGER;
    this.sleep = deps.sleep;
    this.apiBaseUrl = deps.apiBaseUrl ?? GITHUB_API_BASE_URL;
    this.downloadBaseUrl = deps.downloadBaseUrl ?? GITHUB_DOWNLOAD_BASE_URL;
  }

  /**
   * URL of the "latest release" endpoint for a repository.
   */
  latestReleaseUrl(repo: RepoSlug): string {
    return `${this.apiBaseUrl}/repos/${repo}/releases/latest`;
  }

  async resolveLatest(repo: RepoSlug, retry: RetryPolicy): Promise<string> {
    const result = await retryFixed(
      retry,
      async () => {
        const body = await this.fetchLatestRelease(repo);
        return this.parse(LatestReleaseSchema, body, repo).tag_name;
      },
      {
        ...(this.sleep && { sleep: this.sleep }),
        onAttemptFailed: (attempt, error) => {
          this.logger.debug("Latest release lookup failed", {
            repo,
            attempt,
            error: getErrorMessage(error),
          });
        },
      }
    );

    if (!result.ok) {
      throw new ReleaseResolutionError(
        `unable to fetch latest version of ${repo}`,
        "RESOLUTION_FAILED"
      );
    }

    this.logger.debug("Resolved latest release", { repo, tag: result.value });
    return result.value;
  }

  assetUrl(repo: RepoSlug, version: string, assetName: string): string {
    return `${this.downloadBaseUrl}/${repo}/releases/download/${version}/${assetName}`;
  }

  async latestAssetUrl(repo: RepoSlug, assetName: string, retry: RetryPolicy): Promise<string> {
    const version = await this.resolveLatest(repo, retry);
    return this.assetUrl(repo, version, assetName);
  }

  async listLatestAssets(repo: RepoSlug): Promise<string[]> {
    const body = await this.fetchLatestRelease(repo);
    const release = this.parse(ReleaseAssetsSchema, body, repo);
    const names = release.assets.map((asset) => asset.name);
    this.logger.debug("Listed latest release assets", { repo, count: names.length });
    return names;
  }

  /**
   * GET the latest release and decode its JSON body.
   */
  private async fetchLatestRelease(repo: RepoSlug): Promise<unknown> {
    const url = this.latestReleaseUrl(repo);
    const options: HttpRequestOptions = {
      timeout: API_TIMEOUT_MS,
      headers: GITHUB_API_HEADERS,
      ...(this.proxy ? { proxy: this.proxy } : {}),
    };

    let response: Response;
    try {
      response = await this.httpClient.fetch(url, options);
    } catch (error) {
      throw new ReleaseResolutionError(
        `Network error requesting ${url}: ${getErrorMessage(error)}`,
        "NETWORK_ERROR",
        { cause: error }
      );
    }

    if (response.status !== 200) {
      const text = await response.text().catch(() => "");
      throw new ReleaseResolutionError(
        `received status code ${response.status} from GitHub API: ${text}`,
        "NETWORK_ERROR"
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ReleaseResolutionError(
        `Invalid JSON from ${url}: ${getErrorMessage(error)}`,
        "INVALID_RESPONSE",
        { cause: error }
      );
    }
  }

  private parse<T>(schema: z.ZodType<T>, body: unknown, repo: RepoSlug): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ReleaseResolutionError(
        `Unexpected latest release payload for ${repo}: ${issues}`,
        "INVALID_RESPONSE"
      );
    }
    return parsed.data;
  }
}
