/**
 * Persistence of the `version.json` marker inside an install directory.
 */

import * as path from "node:path";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { VersionRecordError } from "./errors.js";
import type { RepoSlug, VersionRecord } from "./types.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import { FileSystemError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import { SILENT_LOGGER } from "../logging/index.js";

export const VERSION_RECORD_FILE = "version.json";

/**
 * On-disk shape. Field names are part of the file format.
 */
const VersionRecordFileSchema = z.object({
  tag_name: z.string(),
  repo: z.string(),
});

/**
 * Reads and writes the version record of an install directory.
 */
export interface VersionRecordStore {
  /**
   * Create `dir` if needed and persist `{tag, repo}`, replacing any existing record.
   */
  write(dir: string, record: VersionRecord): Promise<void>;

  /**
   * @throws VersionRecordError NOT_FOUND when no record exists
   * @throws VersionRecordError MALFORMED_RECORD when the file cannot be decoded
   */
  read(dir: string): Promise<VersionRecord>;

  /**
   * True when `dir` contains a record file, whatever its content.
   */
  exists(dir: string): Promise<boolean>;
}

/**
 * Path of the version record inside an install directory.
 */
export function versionRecordPath(dir: string): string {
  return path.join(dir, VERSION_RECORD_FILE);
}

/**
 * Serialize a record in the on-disk format.
 *
 * @example
 * serializeVersionRecord({ tag: "v1.2.0", repo: "owner/tool" })
 * // '{"tag_name":"v1.2.0","repo":"owner/tool"}'
 */
export function serializeVersionRecord(record: VersionRecord): string {
  return JSON.stringify({ tag_name: record.tag, repo: record.repo });
}

/**
 * Version record store on top of a FileSystemLayer.
 * Writes go to a temp file in the same directory, then rename over `version.json`.
 */
export class FileVersionRecordStore implements VersionRecordStore {
  private readonly logger: Logger;

  constructor(
    private readonly fileSystemLayer: FileSystemLayer,
    logger?: Logger
  ) {
    this.logger = logger ?? SILENT_LOGGER;
  }

  async write(dir: string, record: VersionRecord): Promise<void> {
    const target = versionRecordPath(dir);
    const temp = path.join(dir, `.${VERSION_RECORD_FILE}.${randomUUID()}.tmp`);

    await this.fileSystemLayer.mkdir(dir);
    await this.fileSystemLayer.writeFile(temp, serializeVersionRecord(record));
    try {
      await this.fileSystemLayer.rename(temp, target);
    } catch (error) {
      await this.fileSystemLayer.rm(temp, { force: true });
      throw error;
    }
    this.logger.debug("Wrote version record", { dir, tag: record.tag, repo: record.repo });
  }

  async read(dir: string): Promise<VersionRecord> {
    const target = versionRecordPath(dir);

    let content: string;
    try {
      content = await this.fileSystemLayer.readFile(target);
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        throw new VersionRecordError(`No version record at ${target}`, "NOT_FOUND", {
          cause: error,
        });
      }
      throw error;
    }

    return parseVersionRecord(content, target);
  }

  async exists(dir: string): Promise<boolean> {
    try {
      await this.fileSystemLayer.readFile(versionRecordPath(dir));
      return true;
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        return false;
      }
      throw error;
    }
  }
}

/**
 * Decode the content of a version record file.
 *
 * @param source - Path used in error messages
 * @throws VersionRecordError MALFORMED_RECORD
 */
export function parseVersionRecord(content: string, source: string): VersionRecord {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new VersionRecordError(`Version record at ${source} is not valid JSON`, "MALFORMED_RECORD", {
      cause: error,
    });
  }

  const parsed = VersionRecordFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new VersionRecordError(
      `Version record at ${source} is malformed: ${issues}`,
      "MALFORMED_RECORD"
    );
  }

  const repo: RepoSlug = parsed.data.repo;
  return { tag: parsed.data.tag_name, repo };
}
