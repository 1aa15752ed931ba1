/**
 * Shared test utilities for services.
 */

import { mkdtemp, realpath, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a temporary directory for testing.
 * Returns the canonical path and a cleanup function.
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const tempPath = await mkdtemp(join(tmpdir(), "release-fetch-test-"));
  // Canonical path avoids mismatches with symlinked temp dirs (macOS /var -> /private/var)
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, { recursive: true, force: true, maxRetries: 5, retryDelay: 200 });
    },
  };
}
