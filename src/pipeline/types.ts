import type { PlacementResult } from "../notes/types.js";
import type { ConversionErrorKind } from "../shared/index.js";

export type PipelineStage =
  | "received"
  | "resolving"
  | "extracting"
  | "composing"
  | "invoking"
  | "placing"
  | "done";

export interface UploadSource {
  upload: { fileName: string; bytes: Uint8Array };
}

export interface InputPathSource {
  /** Input-root-relative path of the document. */
  path: string;
}

export type ConversionSource = UploadSource | InputPathSource;

export interface ConversionRequest {
  source: ConversionSource;
  modelId: string;
  languageKey: string;
  /** Output-root-relative directory. `""` is the root itself. */
  outputDir: string;
  copyDir?: string;
  styleHint?: string;
  includeNotes?: boolean;
}

export interface ConversionFailure {
  stage: PipelineStage;
  kind: ConversionErrorKind;
  message: string;
}

export type ConversionOutcome =
  | { ok: true; result: PlacementResult; stages: PipelineStage[] }
  | { ok: false; failure: ConversionFailure; stages: PipelineStage[] };

export interface ConvertOptions {
  signal?: AbortSignal;
  onStage?: (stage: PipelineStage) => void;
}
