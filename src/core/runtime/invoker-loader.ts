import type { CreateInvoker } from "../contracts/model-invoker.js";

export type InvokerFactory = () => Promise<{ default: CreateInvoker }>;

export async function loadInvoker(factory: InvokerFactory): Promise<CreateInvoker> {
  const loaded = await factory();
  if (typeof loaded?.default !== "function") {
    throw new Error("Invalid invoker module: expected a default export.");
  }
  return loaded.default;
}
