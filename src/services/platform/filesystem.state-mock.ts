/**
 * Behavioral mock for FileSystemLayer with in-memory state.
 *
 * Provides a stateful mock that simulates real filesystem behavior:
 * - In-memory file/directory storage keyed by normalized POSIX paths
 * - Proper error handling (ENOENT, EISDIR, EEXIST, ENOTEMPTY)
 * - Per-operation failure injection
 *
 * @example
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/opt/tool": directory(),
 *     "/opt/tool/version.json": file('{"tag_name":"v1.0.0","repo":"owner/tool"}'),
 *   },
 * });
 *
 * await mock.writeFile("/opt/tool/data.json", "{}");
 * expect(mock.$.readText("/opt/tool/data.json")).toBe("{}");
 */

import * as path from "node:path";
import type { FileSystemErrorCode, FileSystemLayer, MkdirOptions, RmOptions } from "./filesystem.js";
import { FileSystemError } from "../errors.js";

// =============================================================================
// Entry Types
// =============================================================================

/**
 * File entry in the mock filesystem.
 */
export interface FileEntry {
  readonly type: "file";
  readonly content: string | Buffer;
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

/**
 * Directory entry in the mock filesystem.
 */
export interface DirectoryEntry {
  readonly type: "directory";
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

export type Entry = FileEntry | DirectoryEntry;

/**
 * Create a file entry.
 *
 * @example
 * file("hello world")
 * file(Buffer.from([0x50, 0x4b, 0x03, 0x04]))  // Binary
 * file("secret", { error: "EACCES" })
 */
export function file(content: string | Buffer, options?: { error?: FileSystemErrorCode }): FileEntry {
  return {
    type: "file" as const,
    content,
    ...(options?.error !== undefined && { error: options.error }),
  };
}

/**
 * Create a directory entry.
 */
export function directory(options?: { error?: FileSystemErrorCode }): DirectoryEntry {
  return {
    type: "directory" as const,
    ...(options?.error !== undefined && { error: options.error }),
  };
}

// =============================================================================
// State Interface
// =============================================================================

export type FileSystemOperation = keyof FileSystemLayer;

/**
 * State interface for the filesystem mock.
 */
export interface FileSystemMockState {
  /** Read-only access to all entries, keyed by normalized path */
  readonly entries: ReadonlyMap<string, Entry>;
  /** Operations performed, in order, as "<operation> <path>" */
  readonly operations: readonly string[];
  /**
   * Set an entry, creating parent directories.
   * Test helper - does NOT follow real filesystem semantics.
   */
  setEntry(path: string, entry: Entry): void;
  /** Make every call of `operation` throw `code` until cleared with null */
  failOperation(operation: FileSystemOperation, code: FileSystemErrorCode | null): void;
  /** Text content of a file entry, or undefined */
  readText(path: string): string | undefined;
  /** Sorted paths below `dir`, relative to it */
  listTree(dir: string): string[];
  /** Human-readable representation, sorted for deterministic output */
  toString(): string;
}

/**
 * FileSystemLayer with behavioral mock state access via `$` property.
 */
export type MockFileSystemLayer = FileSystemLayer & { readonly $: FileSystemMockState };

export interface MockFileSystemOptions {
  /** Initial entries; parents are created automatically */
  entries?: Record<string, Entry>;
}

// =============================================================================
// Implementation
// =============================================================================

function normalizePath(p: string): string {
  return path.posix.resolve("/", p.replace(/\\/g, "/"));
}

function getParentPath(normalizedPath: string): string | null {
  if (normalizedPath === "/") return null;
  return path.posix.dirname(normalizedPath);
}

function childPrefix(normalizedPath: string): string {
  return normalizedPath === "/" ? "/" : normalizedPath + "/";
}

/**
 * Create a behavioral mock for FileSystemLayer.
 *
 * @example Error simulation
 * const mock = createFileSystemMock();
 * mock.$.failOperation("rename", "EACCES");
 */
export function createFileSystemMock(options?: MockFileSystemOptions): MockFileSystemLayer {
  const entries = new Map<string, Entry>([["/", directory()]]);
  const operations: string[] = [];
  const failures = new Map<FileSystemOperation, FileSystemErrorCode>();

  const setEntry = (p: string, entry: Entry): void => {
    const normalized = normalizePath(p);
    let parent = getParentPath(normalized);
    while (parent !== null) {
      if (!entries.has(parent)) {
        entries.set(parent, directory());
      }
      parent = getParentPath(parent);
    }
    entries.set(normalized, entry);
  };

  for (const [key, entry] of Object.entries(options?.entries ?? {})) {
    setEntry(key, entry);
  }

  const begin = (operation: FileSystemOperation, p: string): string => {
    const normalized = normalizePath(p);
    operations.push(`${operation} ${normalized}`);
    const code = failures.get(operation);
    if (code) {
      throw new FileSystemError(code, normalized, `Mock ${operation} failure: ${code}`);
    }
    return normalized;
  };

  const throwIfError = (entry: Entry, p: string): void => {
    if (entry.error) {
      throw new FileSystemError(entry.error, p, `Mock error: ${entry.error}`);
    }
  };

  const requireParentDir = (p: string): void => {
    const parent = getParentPath(p);
    if (parent === null) return;
    const parentEntry = entries.get(parent);
    if (!parentEntry || parentEntry.type !== "directory") {
      throw new FileSystemError("ENOENT", p, `Parent directory not found: ${parent}`);
    }
  };

  const writeEntry = (p: string, content: string | Buffer): void => {
    const existing = entries.get(p);
    if (existing?.type === "directory") {
      throw new FileSystemError("EISDIR", p, `Is a directory: ${p}`);
    }
    if (existing) throwIfError(existing, p);
    requireParentDir(p);
    entries.set(p, file(content));
  };

  const descendants = (p: string): string[] => {
    const prefix = childPrefix(p);
    return [...entries.keys()].filter((key) => key.startsWith(prefix));
  };

  const state: FileSystemMockState = {
    get entries(): ReadonlyMap<string, Entry> {
      return entries;
    },
    get operations(): readonly string[] {
      return operations;
    },
    setEntry,
    failOperation(operation, code): void {
      if (code === null) {
        failures.delete(operation);
      } else {
        failures.set(operation, code);
      }
    },
    readText(p: string): string | undefined {
      const entry = entries.get(normalizePath(p));
      if (entry?.type !== "file") return undefined;
      return typeof entry.content === "string" ? entry.content : entry.content.toString("utf-8");
    },
    listTree(dir: string): string[] {
      const normalized = normalizePath(dir);
      const prefix = childPrefix(normalized);
      return descendants(normalized)
        .map((key) => key.substring(prefix.length))
        .sort();
    },
    toString(): string {
      return [...entries.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([p, entry]) => {
          if (entry.type === "directory") return `${p}: directory`;
          const content =
            typeof entry.content === "string"
              ? JSON.stringify(entry.content)
              : `<Buffer ${entry.content.length} bytes>`;
          return `${p}: file(${content})`;
        })
        .join("\n");
    },
  };

  return {
    $: state,

    async readFile(p: string): Promise<string> {
      const normalized = begin("readFile", p);
      const entry = entries.get(normalized);
      if (!entry) {
        throw new FileSystemError("ENOENT", normalized, `File not found: ${normalized}`);
      }
      throwIfError(entry, normalized);
      if (entry.type === "directory") {
        throw new FileSystemError("EISDIR", normalized, `Is a directory: ${normalized}`);
      }
      return typeof entry.content === "string" ? entry.content : entry.content.toString("utf-8");
    },

    async writeFile(p: string, content: string): Promise<void> {
      writeEntry(begin("writeFile", p), content);
    },

    async writeFileBuffer(p: string, content: Buffer): Promise<void> {
      writeEntry(begin("writeFileBuffer", p), content);
    },

    async mkdir(p: string, mkdirOptions?: MkdirOptions): Promise<void> {
      const normalized = begin("mkdir", p);
      const recursive = mkdirOptions?.recursive ?? true;
      const existing = entries.get(normalized);

      if (existing?.type === "directory") return;
      if (existing?.type === "file") {
        throw new FileSystemError("EEXIST", normalized, `File exists at path: ${normalized}`);
      }

      if (recursive) {
        let current = "";
        for (const segment of normalized.split("/").filter(Boolean)) {
          current = current + "/" + segment;
          const entry = entries.get(current);
          if (!entry) {
            entries.set(current, directory());
          } else if (entry.type !== "directory") {
            throw new FileSystemError("EEXIST", current, `Not a directory: ${current}`);
          }
        }
      } else {
        requireParentDir(normalized);
        entries.set(normalized, directory());
      }
    },

    async rm(p: string, rmOptions?: RmOptions): Promise<void> {
      const normalized = begin("rm", p);
      const recursive = rmOptions?.recursive ?? false;
      const force = rmOptions?.force ?? false;
      const entry = entries.get(normalized);

      if (!entry) {
        if (force) return;
        throw new FileSystemError("ENOENT", normalized, `Path not found: ${normalized}`);
      }

      if (entry.type === "directory") {
        const children = descendants(normalized);
        if (children.length > 0 && !recursive) {
          throw new FileSystemError("ENOTEMPTY", normalized, `Directory not empty: ${normalized}`);
        }
        for (const child of children) {
          entries.delete(child);
        }
      }
      entries.delete(normalized);
    },

    async rename(oldPath: string, newPath: string): Promise<void> {
      const from = begin("rename", oldPath);
      const to = normalizePath(newPath);
      const entry = entries.get(from);
      if (!entry) {
        throw new FileSystemError("ENOENT", from, `Path not found: ${from}`);
      }
      if (entry.type === "directory") {
        throw new FileSystemError("EISDIR", from, `Mock rename supports files only: ${from}`);
      }
      if (entries.get(to)?.type === "directory") {
        throw new FileSystemError("EISDIR", to, `Is a directory: ${to}`);
      }
      requireParentDir(to);
      entries.delete(from);
      entries.set(to, entry);
    },
  };
}
