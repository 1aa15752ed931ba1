/**
 * Gzip-compressed tar extraction that drops each entry's first path component.
 *
 * Release tarballs usually wrap their contents in a single top-level directory
 * (`tool-v1.2.0/bin/tool`). This extractor writes `bin/tool` instead.
 */

import { Parser, type ReadEntry } from "tar";
import * as fs from "node:fs";
import * as path from "node:path";
import type { ArchiveExtractor } from "./archive-extractor.js";
import { isInsideDir, toArchiveError } from "./archive-extractor.js";
import { ArchiveError } from "./errors.js";
import type { Logger } from "../logging/index.js";
import { SILENT_LOGGER } from "../logging/index.js";
import { extractErrorCode } from "../platform/filesystem.js";

const DEFAULT_DIR_MODE = 0o755;
const DEFAULT_FILE_MODE = 0o644;

/**
 * Remove the first segment of an archive entry path.
 * A leading "." counts as that segment, so "./tool-v1/README" keeps its wrapper.
 * Returns "" for entries that are only a top-level name.
 *
 * @example
 * stripFirstSegment("tool-v1/bin/tool") // "bin/tool"
 * stripFirstSegment("./tool-v1/README") // "tool-v1/README"
 * stripFirstSegment("tool-v1/")         // ""
 */
export function stripFirstSegment(entryPath: string): string {
  const segments = entryPath
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment !== "");
  return segments
    .slice(1)
    .filter((segment) => segment !== ".")
    .join("/");
}

/**
 * Extracts .tar.gz archives, stripping one leading path component.
 * Directory, regular file and symbolic link entries are recreated; other entry types are skipped.
 */
export class StripTarGzExtractor implements ArchiveExtractor {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? SILENT_LOGGER;
  }

  async extract(archivePath: string, destDir: string): Promise<void> {
    try {
      await fs.promises.mkdir(destDir, { recursive: true });
      await this.parse(archivePath, destDir);
      this.logger.debug("Extracted archive", { archive: archivePath, dest: destDir });
    } catch (error) {
      throw toArchiveError(error, archivePath, destDir);
    }
  }

  /**
   * Stream the archive through tar's parser, replaying entries one at a time.
   */
  private parse(archivePath: string, destDir: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const parser = new Parser({ strict: true });
      const source = fs.createReadStream(archivePath);
      let chain: Promise<void> = Promise.resolve();
      let failed = false;

      const fail = (error: unknown): void => {
        if (failed) return;
        failed = true;
        source.destroy();
        reject(error);
      };

      parser.on("entry", (entry: ReadEntry) => {
        chain = chain.then(() => {
          if (failed) {
            entry.resume();
            return;
          }
          return this.replayEntry(entry, destDir);
        });
        chain.catch(fail);
      });
      parser.on("error", fail);
      parser.on("drain", () => source.resume());
      parser.on("end", () => {
        chain.then(() => {
          if (!failed) resolve();
        }, fail);
      });

      source.on("data", (chunk: string | Buffer) => {
        const data = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
        if (!parser.write(data)) {
          source.pause();
        }
      });
      source.on("end", () => parser.end());
      source.on("error", fail);
    });
  }

  private async replayEntry(entry: ReadEntry, destDir: string): Promise<void> {
    const relative = stripFirstSegment(entry.path);
    if (relative === "") {
      entry.resume();
      return;
    }

    const target = path.join(destDir, relative);
    if (!isInsideDir(destDir, target)) {
      entry.resume();
      throw new ArchiveError(`Path traversal detected in archive: ${entry.path}`, "INVALID_ARCHIVE");
    }

    const type: string = entry.type;
    switch (type) {
      case "Directory":
        await fs.promises.mkdir(target, {
          recursive: true,
          mode: permissionBits(entry.mode, DEFAULT_DIR_MODE),
        });
        entry.resume();
        return;

      case "File":
      case "OldFile":
      case "ContiguousFile":
        await fs.promises.mkdir(path.dirname(target), { recursive: true, mode: DEFAULT_DIR_MODE });
        await this.writeFileEntry(entry, target);
        return;

      case "SymbolicLink":
        await fs.promises.mkdir(path.dirname(target), { recursive: true, mode: DEFAULT_DIR_MODE });
        await this.createSymlink(entry.linkpath ?? "", target);
        entry.resume();
        return;

      default:
        this.logger.debug("Skipping archive entry", { path: entry.path, type });
        entry.resume();
    }
  }

  private async writeFileEntry(entry: ReadEntry, target: string): Promise<void> {
    const mode = permissionBits(entry.mode, DEFAULT_FILE_MODE);
    const handle = await fs.promises.open(target, "w", mode);
    try {
      for await (const chunk of entry) {
        await handle.write(chunk);
      }
    } finally {
      await handle.close();
    }
    // open() applies the umask; chmod restores the stored mode
    await fs.promises.chmod(target, mode);
  }

  private async createSymlink(linkpath: string, target: string): Promise<void> {
    try {
      await fs.promises.symlink(linkpath, target);
    } catch (error) {
      if (extractErrorCode(error) !== "EEXIST") {
        throw error;
      }
    }
  }
}

function permissionBits(mode: number | undefined, fallback: number): number {
  return mode === undefined ? fallback : mode & 0o7777;
}
