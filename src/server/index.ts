export { WsServer } from "./ws-server.js";
export type { WsServerOptions } from "./ws-server.js";
