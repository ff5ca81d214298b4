export type { AppConfig } from "./app.js";
export type { ServerConfig } from "./server.js";

export { createApp } from "./app.js";
export { startServer, stopServer } from "./server.js";
