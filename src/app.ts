import express from "express";
import type { ErrorRequestHandler, Express } from "express";
import type { Server } from "http";
import type { ActionStore } from "./actions/actions.store.js";
import { createActionsRouter } from "./routes/actions.routes.js";

// body-parser tags JSON syntax errors with a 400 status
function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && "status" in err && err.status === 400;
}

// body-parser's HttpErrors (413 too large, 415 bad charset, ...) carry the status to send
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) return null;
  const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

const onError: ErrorRequestHandler = (err, _req, res, _next) => {
  if (isMalformedBody(err)) {
    return res.status(400).json({ error: "Malformed JSON body" });
  }

  const status = clientErrorStatus(err);
  if (status !== null) {
    const message = err instanceof Error && err.message ? err.message : "Bad request";
    return res.status(status).json({ error: message });
  }

  console.error("unhandled error:", err);
  return res.status(500).json({ error: "Internal server error" });
};

export function createApp(store: ActionStore) {
  const app = express();

  app.use(express.json());

  app.use("/api/actions", createActionsRouter(store));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use(onError);

  return app;
}

/** Resolves once the port is bound; bind failures (EADDRINUSE, ...) reject. */
export function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host);

    const onBindError = (err: Error) => reject(err);
    server.once("error", onBindError);
    server.once("listening", () => {
      server.off("error", onBindError);
      resolve(server);
    });
  });
}
