/**
 * Immutable builder surface: ReleaseFetch → RepoSelection → VersionSelection.
 *
 * @example
 * const outcome = await new ReleaseFetch()
 *   .withInstallDir("./tools/cli")
 *   .withRetryCount(5)
 *   .repo("owner/tool")
 *   .latest()
 *   .install((version) => `tool-${version}-linux-x64.tar.gz`);
 */

import {
  createReleaseFetchConfig,
  resolveProxyFromEnv,
  type ReleaseFetchConfig,
  type ReleaseFetchConfigOverrides,
} from "./services/config/index.js";
import { ConfigError, InstallError, getErrorMessage } from "./services/errors.js";
import type { Logger, LoggerName, LoggingService } from "./services/logging/index.js";
import { DefaultNetworkLayer, type HttpClient } from "./services/platform/network.js";
import { DefaultFileSystemLayer, type FileSystemLayer } from "./services/platform/filesystem.js";
import {
  FileVersionRecordStore,
  GitHubReleaseApi,
  HttpAssetFetcher,
  ReleaseDownloader,
  ReleaseInstaller,
  StripTarGzExtractor,
  type ArchiveExtractor,
  type AssetNameResolver,
  type DownloadedAsset,
  type DownloadProgressCallback,
  type InstallOutcome,
  type InstallState,
  type ReleaseApi,
  type RepoSlug,
  type Sleep,
  type VersionRecord,
  type VersionRecordStore,
} from "./services/release-download/index.js";

const REPO_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

/**
 * Replaceable collaborators. Defaults talk to GitHub over the network and to the local filesystem.
 */
export interface ReleaseFetchServices {
  readonly httpClient?: HttpClient;
  readonly fileSystemLayer?: FileSystemLayer;
  /** Extractor for .zip/.tgz/.tar assets */
  readonly archiveExtractor?: ArchiveExtractor;
  /** Extractor for .tar.gz assets */
  readonly tarGzExtractor?: ArchiveExtractor;
  readonly sleep?: Sleep;
  readonly apiBaseUrl?: string;
  readonly downloadBaseUrl?: string;
  /** Directory for archives awaiting extraction */
  readonly tempDir?: string;
}

export interface ReleaseFetchOptions {
  /** Initial settings; omitted fields take their defaults */
  readonly config?: ReleaseFetchConfigOverrides;
  /** Read once for the default proxy when `config.proxy` is omitted. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
  readonly services?: ReleaseFetchServices;
}

/**
 * Validate an `owner/name` repository identifier.
 *
 * @throws ConfigError INVALID_REPO
 */
export function parseRepoSlug(repo: string): RepoSlug {
  const trimmed = repo.trim();
  if (!REPO_PATTERN.test(trimmed)) {
    throw new ConfigError(`Repository must have the form owner/name, got "${repo}"`, "INVALID_REPO");
  }
  return trimmed;
}

/**
 * Entry point of the client. Every `with*` call returns a new instance.
 *
 * @throws ConfigError INVALID_CONFIG from the constructor and setters for invalid values
 */
export class ReleaseFetch {
  /** Frozen configuration of this instance */
  readonly config: ReleaseFetchConfig;
  private readonly settings: ReleaseFetchConfigOverrides;
  private readonly services: ReleaseFetchServices;

  constructor(options: ReleaseFetchOptions = {}) {
    const initial = options.config ?? {};
    this.settings =
      initial.proxy === undefined
        ? { ...initial, proxy: resolveProxyFromEnv(options.env) ?? null }
        : initial;
    this.services = options.services ?? {};
    this.config = createReleaseFetchConfig(this.settings);
  }

  withInstallDir(installDir: string): ReleaseFetch {
    return this.derive({ installDir });
  }

  withRetryCount(count: number): ReleaseFetch {
    return this.derive({ retryCount: count });
  }

  withRetryDelay(seconds: number): ReleaseFetch {
    return this.derive({ retryDelayMs: seconds * 1000 });
  }

  /** An empty string disables the proxy */
  withProxy(proxy: string): ReleaseFetch {
    return this.derive({ proxy });
  }

  withProgress(onProgress: DownloadProgressCallback): ReleaseFetch {
    return this.derive({ onProgress });
  }

  withoutProgress(): ReleaseFetch {
    return this.derive({ onProgress: null });
  }

  withLogger(logger: Logger): ReleaseFetch {
    return this.derive({ logger });
  }

  /** One named logger per component, e.g. to filter by name */
  withLogging(loggingService: LoggingService): ReleaseFetch {
    return this.derive({ loggingService });
  }

  /**
   * Select a repository.
   *
   * @throws ConfigError INVALID_REPO
   */
  repo(repo: string): RepoSelection {
    return new RepoSelection(createRepoContext(parseRepoSlug(repo), this.config, this.services));
  }

  private derive(change: ReleaseFetchConfigOverrides): ReleaseFetch {
    return new ReleaseFetch({
      config: { ...this.settings, ...change },
      services: this.services,
    });
  }
}

/**
 * Collaborators wired for one repository.
 */
export interface RepoContext {
  readonly repo: RepoSlug;
  readonly config: ReleaseFetchConfig;
  readonly releaseApi: ReleaseApi;
  readonly downloader: ReleaseDownloader;
  readonly recordStore: VersionRecordStore;
  readonly installer: ReleaseInstaller;
}

/**
 * Wire the default service graph for a repository.
 */
export function createRepoContext(
  repo: RepoSlug,
  config: ReleaseFetchConfig,
  services: ReleaseFetchServices = {}
): RepoContext {
  const loggerFor = (name: LoggerName): Logger =>
    config.loggingService?.createLogger(name) ?? config.logger;
  const httpClient = services.httpClient ?? new DefaultNetworkLayer(loggerFor("network"));
  const fileSystemLayer = services.fileSystemLayer ?? new DefaultFileSystemLayer(loggerFor("fs"));

  const releaseApi = new GitHubReleaseApi({
    httpClient,
    logger: loggerFor("release-api"),
    ...(config.proxy ? { proxy: config.proxy } : {}),
    ...(services.sleep && { sleep: services.sleep }),
    ...(services.apiBaseUrl ? { apiBaseUrl: services.apiBaseUrl } : {}),
    ...(services.downloadBaseUrl ? { downloadBaseUrl: services.downloadBaseUrl } : {}),
  });

  const fetchLogger = loggerFor("fetch");
  const assetFetcher = new HttpAssetFetcher({
    httpClient,
    fileSystemLayer,
    logger: fetchLogger,
    ...(services.archiveExtractor && { archiveExtractor: services.archiveExtractor }),
    ...(services.tempDir ? { tempDir: services.tempDir } : {}),
  });

  const downloader = new ReleaseDownloader(
    repo,
    {
      releaseApi,
      assetFetcher,
      fileSystemLayer,
      logger: fetchLogger,
      tarGzExtractor: services.tarGzExtractor ?? new StripTarGzExtractor(loggerFor("archive")),
    },
    {
      retry: config.retry,
      ...(config.proxy ? { proxy: config.proxy } : {}),
      ...(config.onProgress && { onProgress: config.onProgress }),
    }
  );

  const installerLogger = loggerFor("installer");
  const recordStore = new FileVersionRecordStore(fileSystemLayer, installerLogger);

  const installer = new ReleaseInstaller(repo, config.installDir, config.retry, {
    releaseApi,
    downloader,
    recordStore,
    fileSystemLayer,
    logger: installerLogger,
  });

  return { repo, config, releaseApi, downloader, recordStore, installer };
}

/**
 * A selected repository.
 */
export class RepoSelection {
  constructor(private readonly context: RepoContext) {}

  get repo(): RepoSlug {
    return this.context.repo;
  }

  /** Track the latest release; installs upgrade in place. */
  latest(): VersionSelection {
    return new VersionSelection(this.context, null);
  }

  /**
   * Pin a release tag, used verbatim. Pinned installs never upgrade.
   *
   * @throws ConfigError INVALID_CONFIG for an empty tag
   */
  version(tag: string): VersionSelection {
    if (tag.trim() === "") {
      throw new ConfigError("Version tag must not be empty", "INVALID_CONFIG");
    }
    return new VersionSelection(this.context, tag);
  }

  /**
   * Record of the configured install directory, or null when nothing is installed there.
   *
   * @throws VersionRecordError MALFORMED_RECORD
   */
  async installedVersion(): Promise<VersionRecord | null> {
    const { recordStore, config } = this.context;
    if (!(await recordStore.exists(config.installDir))) {
      return null;
    }
    return recordStore.read(config.installDir);
  }

  /**
   * Compare the install directory with the latest release.
   */
  inspect(): Promise<InstallState> {
    return this.context.installer.inspect();
  }

  /** Asset names of the latest release. */
  listLatestAssets(): Promise<string[]> {
    return this.context.releaseApi.listLatestAssets(this.context.repo);
  }

  /**
   * Download the first latest-release asset whose name matches `pattern`.
   * No version record is written.
   */
  downloadLatestMatching(pattern: string | RegExp, destDir?: string): Promise<DownloadedAsset> {
    return this.context.downloader.downloadLatestMatching(
      pattern,
      destDir ?? this.context.config.installDir
    );
  }
}

/**
 * A repository with a version strategy: latest (tag null) or a pinned tag.
 */
export class VersionSelection {
  constructor(
    private readonly context: RepoContext,
    private readonly pinnedTag: string | null
  ) {}

  get isLatest(): boolean {
    return this.pinnedTag === null;
  }

  /**
   * Install into the configured directory, upgrading a stale install when tracking latest.
   *
   * @param assetFor - Maps the resolved tag to the asset filename
   * @throws InstallError, VersionRecordError
   */
  async install(assetFor: AssetNameResolver): Promise<InstallOutcome> {
    const tag = await this.resolveTag();
    return this.context.installer.installAsset({
      assetName: assetFor(tag),
      version: tag,
      allowUpgrade: this.isLatest,
      assetNameFor: assetFor,
      ...(this.isLatest && { latestTag: tag }),
    });
  }

  /**
   * Download the asset without touching the version record.
   *
   * @param destDir - Default: the configured install directory
   */
  async download(assetFor: AssetNameResolver, destDir?: string): Promise<DownloadedAsset> {
    const tag = await this.resolveTag();
    return this.context.downloader.downloadAsset(
      assetFor(tag),
      tag,
      destDir ?? this.context.config.installDir
    );
  }

  private async resolveTag(): Promise<string> {
    if (this.pinnedTag !== null) {
      return this.pinnedTag;
    }
    const { releaseApi, repo, config } = this.context;
    try {
      return await releaseApi.resolveLatest(repo, config.retry);
    } catch (error) {
      throw new InstallError(
        `Failed to resolve latest release of ${repo}: ${getErrorMessage(error)}`,
        "RESOLUTION_FAILED",
        { cause: error }
      );
    }
  }
}
