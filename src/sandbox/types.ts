import type { RootKey } from "../config/types.js";

export interface DirectoryEntry {
  name: string;
  /** Root-relative, `/`-separated. */
  path: string;
  type: "dir" | "file";
}

export interface DirectoryListing {
  root: RootKey;
  entries: DirectoryEntry[];
  currentPath: string;
  /** `null` when `currentPath` is the root itself. */
  parentPath: string | null;
}

export interface ListOptions {
  showHidden?: boolean;
}
