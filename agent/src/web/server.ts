/**
 * Serves the web control surface on the configured port. A port that cannot
 * be bound is logged and the companion carries on without the surface.
 */

import type { Server } from "net";
import { serve } from "@hono/node-server";
import type { Hono } from "hono";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("web");

export interface WebServerHandle {
  port: number;
  /** true once listening, false if the server failed before it could */
  ready: Promise<boolean>;
  close(): Promise<void>;
}

export function startWebServer(app: Hono, port: number): WebServerHandle {
  const server: Server = serve({ fetch: app.fetch, port }, (info) => {
    log.info(`Web UI running on http://localhost:${info.port}`);
  });

  const ready = new Promise<boolean>(resolve => {
    server.once("listening", () => resolve(true));
    server.on("error", (err: Error) => {
      log.error(server.listening ? "Web server error" : `Web UI unavailable on port ${port}`, err);
      resolve(false);
    });
  });

  return {
    port,
    ready,
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!server.listening) {
          resolve();
          return;
        }
        server.close((err?: Error) => (err ? reject(err) : resolve()));
      }),
  };
}
