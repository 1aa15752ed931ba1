/**
 * Creation and validation of ReleaseFetchConfig.
 */

import { z } from "zod";
import { ConfigError } from "../errors.js";
import { SILENT_LOGGER } from "../logging/index.js";
import { createTerminalProgressReporter } from "../release-download/progress.js";
import {
  DEFAULT_INSTALL_DIR,
  DEFAULT_RETRY_COUNT,
  DEFAULT_RETRY_DELAY_MS,
  type ReleaseFetchConfig,
  type ReleaseFetchConfigOverrides,
} from "./types.js";

const ProxyUrlSchema = z.string().url("proxy must be a URL");

const ConfigValuesSchema = z.object({
  installDir: z.string().min(1, "install directory must not be empty"),
  retryCount: z.number().int().nonnegative(),
  retryDelayMs: z.number().finite().nonnegative(),
  proxy: ProxyUrlSchema.optional(),
});

const SCHEME_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;

/**
 * Proxy URL from the environment: HTTP_PROXY, then HTTPS_PROXY.
 *
 * Empty values count as unset. A value without a scheme (`10.0.0.1:3128`) is
 * taken as `http://`; a value that still does not parse is skipped.
 */
export function resolveProxyFromEnv(env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const value of [env.HTTP_PROXY, env.HTTPS_PROXY]) {
    if (!value) continue;
    const candidate = SCHEME_PATTERN.test(value) ? value : `http://${value}`;
    if (ProxyUrlSchema.safeParse(candidate).success) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Build a frozen config from defaults and overrides.
 *
 * @param env - Environment consulted when no proxy override is given
 * @throws ConfigError INVALID_CONFIG when a value fails validation
 *
 * @example
 * const config = createReleaseFetchConfig({ installDir: "./bin", retryCount: 5, proxy: null });
 */
export function createReleaseFetchConfig(
  overrides: ReleaseFetchConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ReleaseFetchConfig {
  const proxy = overrides.proxy === undefined ? resolveProxyFromEnv(env) : overrides.proxy || undefined;

  const parsed = ConfigValuesSchema.safeParse({
    installDir: overrides.installDir ?? DEFAULT_INSTALL_DIR,
    retryCount: overrides.retryCount ?? DEFAULT_RETRY_COUNT,
    retryDelayMs: overrides.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
    proxy,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`, "INVALID_CONFIG");
  }

  const values = parsed.data;
  const onProgress =
    overrides.onProgress === undefined
      ? createTerminalProgressReporter()
      : (overrides.onProgress ?? undefined);

  return Object.freeze({
    installDir: values.installDir,
    retry: Object.freeze({ count: values.retryCount, delayMs: values.retryDelayMs }),
    proxy: values.proxy,
    onProgress,
    logger: overrides.logger ?? SILENT_LOGGER,
    loggingService: overrides.loggingService ?? undefined,
  });
}
