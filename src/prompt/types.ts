export interface ModelRequest {
  readonly modelId: string;
  readonly systemPrompt: string;
  readonly userPrompt: string;
}

export interface ComposeOptions {
  /** Appended to the preset's system prompt as its own paragraph. */
  styleHint?: string;
  /** Leave segments without any content out of the prompt. Numbering is unaffected. */
  skipEmptySegments?: boolean;
}
