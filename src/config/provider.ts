import type { InvokerFactory } from "../core/index.js";

const invokerFactory: InvokerFactory = () => import("../providers/openai/index.js");

export default invokerFactory;
