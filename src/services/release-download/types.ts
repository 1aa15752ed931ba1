/**
 * Types for release resolution, download and installation.
 */

/**
 * Repository identifier in `<owner>/<name>` form.
 */
export type RepoSlug = string;

/**
 * Fixed-count, fixed-delay retry policy for release resolution.
 * `count` is the total number of attempts; a delay follows every failed attempt.
 */
export interface RetryPolicy {
  readonly count: number;
  readonly delayMs: number;
}

/**
 * Persisted `{tag, repo}` marker of an install directory.
 */
export interface VersionRecord {
  readonly tag: string;
  readonly repo: RepoSlug;
}

/**
 * Progress information for asset downloads.
 */
export interface DownloadProgress {
  /** URL being downloaded */
  readonly url: string;
  /** Number of bytes downloaded so far */
  readonly bytesDownloaded: number;
  /** Total bytes to download, null if Content-Length not provided */
  readonly totalBytes: number | null;
  /** True for the final event of a download */
  readonly complete: boolean;
}

/**
 * Callback for download progress updates.
 */
export type DownloadProgressCallback = (progress: DownloadProgress) => void;

/**
 * Maps a resolved version string to an asset filename.
 */
export type AssetNameResolver = (version: string) => string;

/**
 * How the fetch engine treats the downloaded file.
 * - raw: store as `<destDir>/<basename(url)>`
 * - auto: extract recognised archives into destDir, store anything else raw
 */
export type FetchMode = "raw" | "auto";

/**
 * Options for a single asset transfer.
 */
export interface FetchOptions {
  readonly mode?: FetchMode;
  /** HTTP(S) proxy URL */
  readonly proxy?: string;
  readonly onProgress?: DownloadProgressCallback;
  readonly signal?: AbortSignal;
}

/**
 * State of an install directory relative to the latest remote release.
 */
export type InstallState =
  | { readonly kind: "not-installed" }
  | { readonly kind: "installed-current"; readonly record: VersionRecord }
  | { readonly kind: "installed-stale"; readonly record: VersionRecord; readonly latest: string };

/**
 * What installAsset ended up doing.
 * - installed: fresh install into an empty directory
 * - unchanged: already installed and upgrades are not allowed
 * - up-to-date: already installed at the latest tag
 * - upgraded: stale install removed and replaced
 */
export type InstallOutcome = "installed" | "unchanged" | "up-to-date" | "upgraded";

/**
 * Request for ReleaseInstaller.installAsset.
 */
export interface InstallRequest {
  /** Asset filename for a fresh install */
  readonly assetName: string;
  /** Tag to install; empty string means latest */
  readonly version: string;
  /** Replace a stale install with the latest release */
  readonly allowUpgrade: boolean;
  /** Recomputes the asset filename for the tag an upgrade installs */
  readonly assetNameFor?: AssetNameResolver;
  /** Latest tag, when the caller already resolved it */
  readonly latestTag?: string;
}
