export { ConversionPipeline } from "./orchestrator.js";
export type { PipelineDeps } from "./orchestrator.js";
export type {
  ConversionFailure,
  ConversionOutcome,
  ConversionRequest,
  ConversionSource,
  ConvertOptions,
  InputPathSource,
  PipelineStage,
  UploadSource,
} from "./types.js";
