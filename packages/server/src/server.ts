import { serve, type ServerType } from "@hono/node-server";
import { createLogger, getOptions } from "@wdom/core";
import { createApp, type AppConfig } from "./app.js";

export type ServerConfig = AppConfig & {
  port?: number;
  host?: string;
};

const logger = createLogger("server");

export function startServer(config: ServerConfig = {}): ServerType {
  const options = getOptions();
  const port = config.port ?? options.port;
  const hostname = config.host ?? options.host;
  const app = createApp(config);
  return serve({ fetch: app.fetch, port, hostname }, (info) => {
    logger.info(`listening on http://${hostname}:${info.port}`);
  });
}

export function stopServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      logger.info("server stopped");
      resolve();
    });
  });
}
