export { composePrompt, renderContent } from "./builder.js";
export type { ComposeOptions, ModelRequest } from "./types.js";
