import { getDocument, getOptions } from "@wdom/core";
import { startServer, stopServer } from "./server.js";

const options = getOptions();
const document = getDocument();
const server = startServer({ document, staticDir: options.staticDir, debug: options.debug });

const shutdown = (): void => {
  stopServer(server)
    .then(() => {
      document.dispose();
      process.exit(0);
    })
    .catch((error: unknown) => {
      console.error("[wdom] failed to stop server", error);
      process.exit(1);
    });
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
