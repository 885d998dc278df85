import { main } from "./app/main.js";
import { createLogger } from "./shared/index.js";

main().catch((err: unknown) => {
  createLogger("app").error("Failed to start:", err);
  process.exitCode = 1;
});
