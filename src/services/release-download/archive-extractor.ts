/**
 * Archive extraction interface and implementations.
 */

import * as tar from "tar";
import yauzl from "yauzl";
import * as fs from "node:fs";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { ArchiveError } from "./errors.js";
import { getErrorMessage } from "../errors.js";
import { extractErrorCode } from "../platform/filesystem.js";

/**
 * Interface for extracting archives.
 */
export interface ArchiveExtractor {
  /**
   * Extract an archive to a destination directory.
   *
   * @param archivePath - Path to the archive file
   * @param destDir - Directory to extract to (will be created if it doesn't exist)
   * @throws ArchiveError on extraction failure
   */
  extract(archivePath: string, destDir: string): Promise<void>;
}

/**
 * True when `target` is `root` or lies inside it.
 */
export function isInsideDir(root: string, target: string): boolean {
  const resolvedRoot = path.resolve(root);
  const resolvedTarget = path.resolve(target);
  return (
    resolvedTarget === resolvedRoot || resolvedTarget.startsWith(resolvedRoot + path.sep)
  );
}

/**
 * Map a failure during extraction to an ArchiveError.
 * Malformed tar/gzip input maps to INVALID_ARCHIVE.
 */
export function toArchiveError(error: unknown, archivePath: string, destDir: string): ArchiveError {
  if (error instanceof ArchiveError) {
    return error;
  }
  const message = getErrorMessage(error);
  const code = extractErrorCode(error) ?? "";
  if (code === "EACCES" || code === "EPERM" || /EACCES|EPERM/.test(message)) {
    return new ArchiveError(
      `Permission denied extracting to ${destDir}: ${message}`,
      "PERMISSION_DENIED",
      { cause: error }
    );
  }
  if (
    code.startsWith("TAR_") ||
    code.startsWith("Z_") ||
    /TAR_|zlib|unexpected end|incorrect header check/.test(message)
  ) {
    return new ArchiveError(
      `Invalid or corrupt archive at ${archivePath}: ${message}`,
      "INVALID_ARCHIVE",
      { cause: error }
    );
  }
  return new ArchiveError(`Failed to extract ${archivePath}: ${message}`, "EXTRACTION_FAILED", {
    cause: error,
  });
}

/**
 * Extractor for .tgz and .tar archives using the `tar` package.
 * Entries are extracted as stored, without stripping a wrapper directory.
 */
export class TarExtractor implements ArchiveExtractor {
  async extract(archivePath: string, destDir: string): Promise<void> {
    try {
      await fs.promises.mkdir(destDir, { recursive: true });
      await tar.extract({
        file: archivePath,
        cwd: destDir,
        strict: true,
      });
    } catch (error) {
      throw toArchiveError(error, archivePath, destDir);
    }
  }
}

/**
 * Extractor for .zip archives using the `yauzl` package.
 */
export class ZipExtractor implements ArchiveExtractor {
  async extract(archivePath: string, destDir: string): Promise<void> {
    try {
      await fs.promises.mkdir(destDir, { recursive: true });
      await this.extractZip(archivePath, destDir);
    } catch (error) {
      throw toArchiveError(error, archivePath, destDir);
    }
  }

  private extractZip(archivePath: string, destDir: string): Promise<void> {
    return new Promise((resolve, reject) => {
      yauzl.open(archivePath, { lazyEntries: true }, (err, zipfile) => {
        if (err || !zipfile) {
          const message = err ? err.message : "no zip file handle";
          if (message.includes("end of central directory")) {
            reject(
              new ArchiveError(
                `Invalid or corrupt zip archive at ${archivePath}: ${message}`,
                "INVALID_ARCHIVE"
              )
            );
          } else {
            reject(
              new ArchiveError(
                `Failed to open zip archive at ${archivePath}: ${message}`,
                "EXTRACTION_FAILED"
              )
            );
          }
          return;
        }

        zipfile.readEntry();
        zipfile.on("entry", (entry: yauzl.Entry) => {
          const entryPath = path.join(destDir, entry.fileName);

          if (!isInsideDir(destDir, entryPath)) {
            zipfile.close();
            reject(
              new ArchiveError(
                `Path traversal detected in archive: ${entry.fileName}`,
                "INVALID_ARCHIVE"
              )
            );
            return;
          }

          if (entry.fileName.endsWith("/")) {
            fs.promises
              .mkdir(entryPath, { recursive: true })
              .then(() => zipfile.readEntry())
              .catch(reject);
            return;
          }

          fs.promises
            .mkdir(path.dirname(entryPath), { recursive: true })
            .then(() => {
              zipfile.openReadStream(entry, (streamErr, readStream) => {
                if (streamErr || !readStream) {
                  reject(
                    new ArchiveError(
                      `Failed to read entry ${entry.fileName}: ${streamErr ? streamErr.message : "no stream"}`,
                      "EXTRACTION_FAILED"
                    )
                  );
                  return;
                }

                pipeline(readStream, fs.createWriteStream(entryPath))
                  .then(async () => {
                    // Unix mode is in the upper 16 bits of the external attributes
                    const mode = (entry.externalFileAttributes >>> 16) & 0o777;
                    if (mode !== 0) {
                      await fs.promises.chmod(entryPath, mode);
                    }
                  })
                  .then(() => zipfile.readEntry())
                  .catch(reject);
              });
            })
            .catch(reject);
        });

        zipfile.on("end", () => resolve());
        zipfile.on("error", (zipErr: Error) => {
          reject(
            new ArchiveError(`Error reading zip archive: ${zipErr.message}`, "EXTRACTION_FAILED")
          );
        });
      });
    });
  }
}

/**
 * File suffixes the default extractor recognises, lower-case.
 */
export const ARCHIVE_SUFFIXES = [".tar.gz", ".tgz", ".tar", ".zip"] as const;

/**
 * True when the path (or URL) names an archive the default extractor handles.
 */
export function isSupportedArchive(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return ARCHIVE_SUFFIXES.some((suffix) => lower.endsWith(suffix));
}

/**
 * Archive extractor that selects the appropriate implementation based on file extension.
 */
export class DefaultArchiveExtractor implements ArchiveExtractor {
  private readonly tarExtractor = new TarExtractor();
  private readonly zipExtractor = new ZipExtractor();

  async extract(archivePath: string, destDir: string): Promise<void> {
    const lowerPath = archivePath.toLowerCase();

    if (lowerPath.endsWith(".tar.gz") || lowerPath.endsWith(".tgz") || lowerPath.endsWith(".tar")) {
      return this.tarExtractor.extract(archivePath, destDir);
    }

    if (lowerPath.endsWith(".zip")) {
      return this.zipExtractor.extract(archivePath, destDir);
    }

    throw new ArchiveError(
      `Unsupported archive format: ${archivePath}. Supported formats: .tar.gz, .tgz, .tar, .zip`,
      "INVALID_ARCHIVE"
    );
  }
}
