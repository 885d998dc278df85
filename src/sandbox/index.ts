export { PathSandbox } from "./path-sandbox.js";
export type { DirectoryEntry, DirectoryListing, ListOptions } from "./types.js";
