/**
 * Test utilities for ArchiveExtractor.
 */

import { vi, type Mock } from "vitest";
import type { ArchiveErrorCode } from "./errors.js";
import { ArchiveError } from "./errors.js";

/**
 * Options for creating a mock archive extractor.
 */
export interface MockArchiveExtractorOptions {
  /**
   * If provided, the extract method will reject with this error.
   */
  error?: {
    message: string;
    code: ArchiveErrorCode;
  };
}

/**
 * Mock ArchiveExtractor type with spy on extract.
 */
export interface MockArchiveExtractor {
  extract: Mock<(archivePath: string, destDir: string) => Promise<void>>;
}

/**
 * Create a mock ArchiveExtractor with controllable behavior.
 *
 * @example
 * const tarGzExtractor = createMockArchiveExtractor();
 * await downloader.downloadAsset("tool.tar.gz", "v1.0.0", "/opt/tool");
 * expect(tarGzExtractor.extract).toHaveBeenCalledWith("/opt/tool/tool.tar.gz", "/opt/tool");
 */
export function createMockArchiveExtractor(
  options: MockArchiveExtractorOptions = {}
): MockArchiveExtractor {
  return {
    extract: vi.fn(async (): Promise<void> => {
      if (options.error) {
        throw new ArchiveError(options.error.message, options.error.code);
      }
    }),
  };
}
