export { DEFAULT_CATALOG_PATH, expandHome, loadAppConfig, parseEnvFile } from "./app-config.js";
export type { LoadAppConfigOptions } from "./app-config.js";
export { CONTENT_PLACEHOLDER, findPreset, loadCatalog, parseCatalog } from "./catalog.js";
export type { CatalogLoadResult } from "./catalog.js";
export { ROOT_KEYS } from "./types.js";
export type { AppConfig, Catalog, LanguagePreset, RootKey, RootMapping } from "./types.js";
