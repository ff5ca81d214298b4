import { Hono } from "hono";
import { serveStatic } from "@hono/node-server/serve-static";
import { createLogger, createWdomError, describeError, escapeHtml, getDocument, getOptions } from "@wdom/core";
import type { WdomDocument } from "@wdom/core";

export type AppConfig = {
  /** Document to serve; defaults to the current root document at request time. */
  document?: WdomDocument;
  staticDir?: string;
  debug?: boolean;
};

const STATIC_PREFIX = "/_static";
const TEMP_PREFIX = "/tmp";

const logger = createLogger("server");

export function createApp(config: AppConfig = {}): Hono {
  const currentDocument = (): WdomDocument => config.document ?? getDocument();
  const app = new Hono();

  app.use("*", async (c, next) => {
    await next();
    logger.info(`${c.req.method} ${c.req.path} ${c.res.status}`);
  });

  app.get("/", (c) => {
    c.header("Content-Type", "text/html; charset=utf-8");
    return c.body(currentDocument().build(), 200);
  });

  app.use(`${STATIC_PREFIX}/*`, (c, next) => {
    const staticDir = config.staticDir ?? getOptions().staticDir;
    if (!staticDir) {
      return next();
    }
    return serveStatic({ root: staticDir, rewriteRequestPath: stripPrefix(STATIC_PREFIX) })(c, next);
  });

  // the root document can be replaced between requests, so the directory is looked up each time
  app.use(`${TEMP_PREFIX}/*`, (c, next) =>
    serveStatic({ root: currentDocument().tempdir, rewriteRequestPath: stripPrefix(TEMP_PREFIX) })(c, next)
  );

  app.onError((error, c) => {
    const failure = createWdomError("request", describeError(error), {
      path: c.req.path,
      method: c.req.method,
      status: 500
    });
    logger.error("request failed", { ...failure });
    c.header("Content-Type", "text/html; charset=utf-8");
    const page = renderErrorPage(error, {
      title: currentDocument().title,
      method: c.req.method,
      path: c.req.path,
      debug: config.debug ?? getOptions().debug
    });
    return c.body(page, 500);
  });

  return app;
}

function stripPrefix(prefix: string): (path: string) => string {
  return (path) => path.slice(prefix.length);
}

type ErrorPageContext = {
  title: string;
  method: string;
  path: string;
  debug: boolean;
};

function renderErrorPage(error: unknown, context: ErrorPageContext): string {
  const title = escapeHtml(context.title);
  const request = escapeHtml(`${context.method} ${context.path}`);
  const stack = context.debug && error instanceof Error && error.stack ? `<pre>${escapeHtml(error.stack)}</pre>` : "";
  return [
    `<!DOCTYPE html><html><head><meta charset="utf-8"><title>${title} (500)</title></head>`,
    `<body><h1>${title}</h1>`,
    `<p>Could not build <code>${request}</code>: ${escapeHtml(describeError(error))}</p>`,
    stack,
    "</body></html>"
  ].join("");
}
