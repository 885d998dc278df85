import { randomUUID } from "node:crypto";
import { WebSocketServer, WebSocket } from "ws";
import type { RawData } from "ws";
import { createLogger } from "../shared/index.js";

const log = createLogger("server");

const DEFAULT_PORT = 8080;
const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 30_000;
const MAX_RETRIES = 10;
/** Frames are base64 uploads; leave headroom over the configured byte limit. */
const DEFAULT_MAX_PAYLOAD = 100 * 1024 * 1024;
const DEFAULT_HEARTBEAT_MS = 30_000;

export interface WsServerOptions {
  port?: number;
  host?: string;
  maxPayload?: number;
  /** Ping interval; a client that misses one pong is dropped. 0 disables it. */
  heartbeatMs?: number;
  onMessage: (clientId: string, data: unknown) => void;
  onDisconnect?: (clientId: string) => void;
}

interface ClientState {
  socket: WebSocket;
  alive: boolean;
}

function decodeFrame(raw: RawData): { ok: true; value: unknown } | { ok: false; length: number } {
  const text = raw.toString();
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false, length: text.length };
  }
}

export class WsServer {
  private readonly port: number;
  private readonly host: string | undefined;
  private readonly maxPayload: number;
  private readonly heartbeatMs: number;
  private readonly onMessage: (clientId: string, data: unknown) => void;
  private readonly onDisconnect: ((clientId: string) => void) | undefined;
  private wss: WebSocketServer | null = null;
  private readonly clients = new Map<string, ClientState>();
  private retryCount = 0;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private stopping = false;

  constructor(options: WsServerOptions) {
    this.port = options.port ?? DEFAULT_PORT;
    this.host = options.host;
    this.maxPayload = options.maxPayload ?? DEFAULT_MAX_PAYLOAD;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.onMessage = options.onMessage;
    this.onDisconnect = options.onDisconnect;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  async start(): Promise<void> {
    this.stopping = false;
    this.retryCount = 0;
    await this.bind();
    this.startHeartbeat();
  }

  private bind(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const wss = new WebSocketServer({
        port: this.port,
        maxPayload: this.maxPayload,
        ...(this.host ? { host: this.host } : {}),
      });
      this.wss = wss;
      let listening = false;

      wss.on("listening", () => {
        listening = true;
        log.info(`Listening on ${this.host ?? "*"}:${this.port}`);
        this.retryCount = 0;
        resolve();
      });

      wss.on("connection", (socket) => this.handleConnection(socket));

      wss.on("error", (err: NodeJS.ErrnoException) => {
        log.error(`Server error (${err.code ?? "unknown"}): ${err.message}`);
        if (!listening && this.retryCount === 0) {
          // start() fails outright; only a server that once listened rebinds
          reject(err);
          return;
        }
        this.scheduleRetry();
      });
    });
  }

  private handleConnection(socket: WebSocket): void {
    const clientId = randomUUID();
    const state: ClientState = { socket, alive: true };
    this.clients.set(clientId, state);
    log.info(`Client connected: ${clientId}`);

    socket.on("pong", () => {
      state.alive = true;
    });

    socket.on("message", (raw) => {
      const frame = decodeFrame(raw);
      if (!frame.ok) {
        log.warn(`Invalid JSON from ${clientId} (${frame.length} chars)`);
        socket.send(JSON.stringify({ error: "Invalid JSON" }));
        return;
      }
      this.onMessage(clientId, frame.value);
    });

    socket.on("close", (code) => {
      this.clients.delete(clientId);
      log.info(`Client disconnected: ${clientId} (${code})`);
      this.onDisconnect?.(clientId);
    });

    socket.on("error", (err) => {
      log.error(`Client error (${clientId}):`, err.message);
    });
  }

  private startHeartbeat(): void {
    if (this.heartbeatMs <= 0 || this.heartbeatTimer) return;
    this.heartbeatTimer = setInterval(() => {
      for (const [clientId, state] of this.clients) {
        if (!state.alive) {
          log.warn(`No pong from ${clientId}; dropping it`);
          state.socket.terminate();
          continue;
        }
        state.alive = false;
        state.socket.ping();
      }
    }, this.heartbeatMs);
    this.heartbeatTimer.unref();
  }

  private scheduleRetry(): void {
    if (this.stopping) return;

    if (this.retryCount >= MAX_RETRIES) {
      log.error(`Giving up after ${MAX_RETRIES} retries`);
      return;
    }

    const backoff = Math.min(INITIAL_BACKOFF_MS * 2 ** this.retryCount, MAX_BACKOFF_MS);
    this.retryCount++;
    log.warn(`Rebinding in ${backoff}ms (attempt ${this.retryCount}/${MAX_RETRIES})`);

    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      if (this.stopping) return;
      this.bind().then(
        () => this.startHeartbeat(),
        (err: unknown) => log.debug("Rebind failed:", err),
      );
    }, backoff);
  }

  send(clientId: string, data: unknown): void {
    const socket = this.clients.get(clientId)?.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      log.debug(`send(): client ${clientId} is gone`);
      return;
    }
    socket.send(JSON.stringify(data));
  }

  async stop(): Promise<void> {
    this.stopping = true;

    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    for (const { socket } of this.clients.values()) {
      socket.close(1001, "Server shutting down");
    }
    this.clients.clear();

    const wss = this.wss;
    this.wss = null;
    if (!wss) return;
    await new Promise<void>((resolve) => {
      wss.close(() => {
        log.info("Server stopped");
        resolve();
      });
    });
  }
}
