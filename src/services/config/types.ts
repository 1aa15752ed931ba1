/**
 * Configuration types for a release-fetch client.
 *
 * A config is created once per builder step and never mutated.
 */

import type { Logger, LoggingService } from "../logging/index.js";
import type { DownloadProgressCallback, RetryPolicy } from "../release-download/types.js";

/**
 * Resolved client configuration.
 */
export interface ReleaseFetchConfig {
  /** Directory assets are installed into and `version.json` lives in */
  readonly installDir: string;
  /** Retry policy for latest-release resolution */
  readonly retry: RetryPolicy;
  /** HTTP(S) proxy URL; undefined for a direct connection */
  readonly proxy: string | undefined;
  /** Progress sink for downloads; undefined for silent downloads */
  readonly onProgress: DownloadProgressCallback | undefined;
  /** Logger for every component when no logging service is set */
  readonly logger: Logger;
  /** Source of one named logger per component; takes precedence over `logger` */
  readonly loggingService: LoggingService | undefined;
}

/**
 * Overrides accepted by createReleaseFetchConfig.
 * Omitted fields take their defaults; `null` switches a feature off.
 */
export interface ReleaseFetchConfigOverrides {
  readonly installDir?: string;
  readonly retryCount?: number;
  readonly retryDelayMs?: number;
  /** Omitted: read from the environment. null or "": no proxy */
  readonly proxy?: string | null;
  /** Omitted: terminal progress on stderr. null: no progress output */
  readonly onProgress?: DownloadProgressCallback | null;
  readonly logger?: Logger;
  /** null: back to the single `logger` */
  readonly loggingService?: LoggingService | null;
}

export const DEFAULT_INSTALL_DIR = ".";
export const DEFAULT_RETRY_COUNT = 3;
export const DEFAULT_RETRY_DELAY_MS = 3000;
