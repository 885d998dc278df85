export type {
  CreateInvoker,
  InvokeOptions,
  InvokerSettings,
  ModelInvoker,
} from "./contracts/model-invoker.js";
export { loadInvoker } from "./runtime/invoker-loader.js";
export type { InvokerFactory } from "./runtime/invoker-loader.js";
