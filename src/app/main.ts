import invokerFactory from "../config/provider.js";
import { loadAppConfig } from "../config/index.js";
import { loadInvoker } from "../core/index.js";
import { NoteEngine } from "../engine/index.js";
import { WsServer } from "../server/index.js";
import { createLogger } from "../shared/index.js";

const log = createLogger("app");

/** Base64 frames are a third larger than the bytes they carry. */
function maxFrameBytes(maxUploadBytes: number): number {
  return Math.ceil((maxUploadBytes * 4) / 3) + 1024 * 1024;
}

export async function main(): Promise<void> {
  const createInvoker = await loadInvoker(invokerFactory);
  const initialConfig = await loadAppConfig();
  let engine: NoteEngine | null = null;

  const wsServer = new WsServer({
    port: initialConfig.port,
    maxPayload: maxFrameBytes(initialConfig.maxUploadBytes),
    onMessage: (clientId, data) => {
      engine?.handleMessage(clientId, data).catch((err: unknown) => {
        log.error(`Unhandled failure for ${clientId}:`, err);
      });
    },
    onDisconnect: (clientId) => engine?.abortClient(clientId),
  });

  let configLoads = 0;
  const noteEngine = new NoteEngine({
    onReply: wsServer.send.bind(wsServer),
    loadConfig: () => (configLoads++ === 0 ? Promise.resolve(initialConfig) : loadAppConfig()),
    createInvoker,
  });
  engine = noteEngine;

  await noteEngine.start();
  await wsServer.start();

  log.info(`note-maker ready on port ${initialConfig.port}`);

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    await noteEngine.stop();
    await wsServer.stop();
  };

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      log.error("Shutdown failed:", err);
      process.exitCode = 1;
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}
