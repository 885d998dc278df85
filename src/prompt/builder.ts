import { CONTENT_PLACEHOLDER } from "../config/catalog.js";
import type { LanguagePreset } from "../config/types.js";
import type { ExtractedContent } from "../documents/types.js";
import { ConversionError } from "../shared/index.js";
import { isEmptySegment, renderSegmentSection } from "./sections/segment.js";
import { joinPromptBlocks } from "./sections/shared.js";
import type { ComposeOptions, ModelRequest } from "./types.js";

export function renderContent(content: ExtractedContent, options: ComposeOptions = {}): string {
  const segments = options.skipEmptySegments
    ? content.segments.filter((segment) => !isEmptySegment(segment))
    : content.segments;
  return segments.map(renderSegmentSection).join("\n\n");
}

export function composePrompt(
  content: ExtractedContent,
  preset: LanguagePreset,
  modelId: string,
  options: ComposeOptions = {},
): ModelRequest {
  if (content.segments.every(isEmptySegment)) {
    throw new ConversionError("EmptyDocument", "No text was found in the selected file.");
  }

  const rendered = renderContent(content, options);
  const systemPrompt = joinPromptBlocks([preset.systemPrompt, options.styleHint ?? ""]);
  const userPrompt = preset.userTemplate.split(CONTENT_PLACEHOLDER).join(rendered);

  return { modelId, systemPrompt, userPrompt };
}
