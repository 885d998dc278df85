export type RootKey = "input" | "output" | "copy";

export const ROOT_KEYS: readonly RootKey[] = ["input", "output", "copy"];

/** Absolute host directories per logical root. A missing entry means the root is unusable. */
export type RootMapping = Readonly<Partial<Record<RootKey, string>>>;

export interface LanguagePreset {
  readonly key: string;
  readonly label: string;
  readonly systemPrompt: string;
  /** Must contain the `{{content}}` placeholder. */
  readonly userTemplate: string;
}

export interface Catalog {
  readonly models: readonly string[];
  readonly defaultModel: string;
  readonly defaultLanguage: string;
  readonly languages: readonly LanguagePreset[];
}

export interface AppConfig {
  readonly apiKey: string | undefined;
  readonly roots: RootMapping;
  readonly catalog: Catalog;
  readonly port: number;
  readonly modelTimeoutMs: number;
  readonly rateLimitBackoffMs: number;
  readonly maxUploadBytes: number;
  readonly includeSpeakerNotes: boolean;
}
