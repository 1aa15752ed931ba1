/**
 * release-fetch: resolve, download and install GitHub release assets.
 */

export {
  ReleaseFetch,
  RepoSelection,
  VersionSelection,
  createRepoContext,
  parseRepoSlug,
  type RepoContext,
  type ReleaseFetchOptions,
  type ReleaseFetchServices,
} from "./release-fetch.js";
export * from "./services/index.js";
