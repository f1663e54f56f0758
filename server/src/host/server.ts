/**
 * Host: Node HTTP server
 *
 * Serves the host app, starts the TaskLoop once listening and stops it on
 * SIGINT / SIGTERM before the process exits.
 */

import { serve } from "@hono/node-server";
import { createComponentLogger, getServerLogger } from "#logging.js";
import { createHost, type Host, type HostOptions } from "./app.js";

export interface ServerOptions extends HostOptions {
  port: number;
  hostname?: string;
}

export interface RunningServer {
  host: Host;
  /** Stop the TaskLoop, then stop accepting connections */
  close(): Promise<void>;
}

export function configureServer(options: ServerOptions): RunningServer {
  const log = createComponentLogger("host.server");
  const host = createHost(options);
  const { port, hostname = "0.0.0.0" } = options;

  const server = serve({ fetch: host.app.fetch, port, hostname }, (info) => {
    log.info(`HTTP API running on http://${hostname}:${info.port}`);
    host.startup();
  });

  let closing: Promise<void> | null = null;

  const close = (): Promise<void> => {
    if (closing) return closing;
    closing = (async () => {
      await host.shutdown();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      log.info("HTTP server closed");
    })();
    return closing;
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    log.info(`Received ${signal}, shutting down`);
    close()
      .then(() => getServerLogger().close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.fatal("Shutdown failed", error);
        process.exit(1);
      });
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  return { host, close };
}
