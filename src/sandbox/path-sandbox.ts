import type { Dirent } from "node:fs";
import { readdir, realpath, stat } from "node:fs/promises";
import { basename, dirname, join, posix, relative, resolve, sep } from "node:path";
import type { RootKey, RootMapping } from "../config/types.js";
import { ConversionError, errnoCode } from "../shared/index.js";
import type { DirectoryEntry, DirectoryListing, ListOptions } from "./types.js";

function isPathInside(candidate: string, root: string): boolean {
  const resolvedCandidate = resolve(candidate);
  const resolvedRoot = resolve(root);
  if (resolvedRoot === sep) return resolvedCandidate.startsWith(sep);
  if (resolvedCandidate === resolvedRoot) return true;
  return resolvedCandidate.startsWith(`${resolvedRoot}${sep}`);
}

/**
 * Real path of `path`. When the path does not exist yet, the longest existing
 * ancestor is resolved and the missing tail is appended to it.
 */
async function canonicalizePath(path: string): Promise<string> {
  const tail: string[] = [];
  let current = resolve(path);
  for (;;) {
    try {
      const real = await realpath(current);
      return tail.length > 0 ? join(real, ...tail.reverse()) : real;
    } catch {
      const parent = dirname(current);
      if (parent === current) return resolve(path);
      tail.push(basename(current));
      current = parent;
    }
  }
}

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

/** Root-relative input: backslashes count as separators and leading separators are dropped. */
function normalizeRelative(relativePath: string): string {
  return relativePath.replace(/\\/g, "/").replace(/^\/+/, "");
}

function compareEntries(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a.type !== b.type) return a.type === "dir" ? -1 : 1;
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left !== right) return left < right ? -1 : 1;
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

export class PathSandbox {
  constructor(private readonly roots: RootMapping) {}

  isConfigured(rootKey: RootKey): boolean {
    return this.roots[rootKey] !== undefined;
  }

  rootDir(rootKey: RootKey): string {
    const dir = this.roots[rootKey];
    if (dir === undefined) {
      throw new ConversionError("RootNotConfigured", `No directory is configured for the ${rootKey} root.`);
    }
    return dir;
  }

  /** Absolute real path of `relativePath` inside the given root. */
  async resolve(rootKey: RootKey, relativePath: string): Promise<string> {
    const rootDir = this.rootDir(rootKey);
    if (relativePath.includes("\0")) {
      throw new ConversionError("PathViolation", "Path contains a NUL byte.");
    }

    const lexical = resolve(rootDir, normalizeRelative(relativePath));
    if (!isPathInside(lexical, rootDir)) {
      throw new ConversionError("PathViolation", `Path escapes the ${rootKey} root: ${relativePath}`);
    }

    const [realRoot, realCandidate] = await Promise.all([
      canonicalizePath(rootDir),
      canonicalizePath(lexical),
    ]);
    if (!isPathInside(realCandidate, realRoot)) {
      throw new ConversionError(
        "PathViolation",
        `Path resolves outside the ${rootKey} root through a symbolic link: ${relativePath}`,
      );
    }
    return realCandidate;
  }

  /** Root-relative, `/`-separated form of an absolute path previously returned by `resolve`. */
  async relativePath(rootKey: RootKey, absolutePath: string): Promise<string> {
    const realRoot = await canonicalizePath(this.rootDir(rootKey));
    return toPosix(relative(realRoot, absolutePath));
  }

  async list(rootKey: RootKey, relativePath: string, options: ListOptions = {}): Promise<DirectoryListing> {
    const dirPath = await this.resolve(rootKey, relativePath);

    let dirents: Dirent[];
    try {
      const info = await stat(dirPath);
      if (!info.isDirectory()) {
        throw new ConversionError("NotFound", `Not a directory: ${relativePath}`);
      }
      dirents = await readdir(dirPath, { withFileTypes: true });
    } catch (err) {
      if (err instanceof ConversionError) throw err;
      const code = errnoCode(err);
      if (code === "EACCES" || code === "EPERM") {
        throw new ConversionError("PathViolation", `Permission denied: ${relativePath}`, { cause: err });
      }
      throw new ConversionError("NotFound", `Directory not found: ${relativePath}`, { cause: err });
    }

    const currentPath = await this.relativePath(rootKey, dirPath);
    const entries: DirectoryEntry[] = [];

    for (const dirent of dirents) {
      if (!options.showHidden && dirent.name.startsWith(".")) continue;

      let type: DirectoryEntry["type"] | undefined;
      if (dirent.isDirectory()) {
        type = "dir";
      } else if (dirent.isFile()) {
        type = "file";
      } else if (dirent.isSymbolicLink()) {
        type = await this.followLink(rootKey, join(dirPath, dirent.name));
      }
      if (!type) continue;

      entries.push({
        name: dirent.name,
        path: currentPath ? `${currentPath}/${dirent.name}` : dirent.name,
        type,
      });
    }

    entries.sort(compareEntries);

    let parentPath: string | null = null;
    if (currentPath !== "") {
      const parent = posix.dirname(currentPath);
      parentPath = parent === "." ? "" : parent;
    }

    return { root: rootKey, entries, currentPath, parentPath };
  }

  private async followLink(rootKey: RootKey, linkPath: string): Promise<DirectoryEntry["type"] | undefined> {
    const realRoot = await canonicalizePath(this.rootDir(rootKey));
    const target = await canonicalizePath(linkPath);
    if (!isPathInside(target, realRoot)) return undefined;
    try {
      const info = await stat(target);
      if (info.isDirectory()) return "dir";
      if (info.isFile()) return "file";
      return undefined;
    } catch {
      return undefined;
    }
  }
}
