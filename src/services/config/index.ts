/**
 * Client configuration module.
 */

export { createReleaseFetchConfig, resolveProxyFromEnv } from "./release-fetch-config.js";
export {
  type ReleaseFetchConfig,
  type ReleaseFetchConfigOverrides,
  DEFAULT_INSTALL_DIR,
  DEFAULT_RETRY_COUNT,
  DEFAULT_RETRY_DELAY_MS,
} from "./types.js";
