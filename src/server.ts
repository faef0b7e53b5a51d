import http from "http";
import type { ServerConfigType } from "./config/index.js";
import { formatListenAddr } from "./config/index.js";
import type { Logger } from "./logger.js";
import { createApp, type AppDeps } from "./server/app.js";
import { HealthState } from "./server/health.js";

export type StartServerOptions = Omit<AppDeps, "health"> & {
  server: ServerConfigType;
  /** Overrides `server.host`/`server.port`, e.g. from `--listen-addr`. */
  listen?: { host: string | undefined; port: number };
  health?: HealthState;
};

export type RunningServer = {
  server: http.Server;
  health: HealthState;
  port: number;
  address: string;
  /** Marks unhealthy, stops accepting and drains within the shutdown budget. */
  close(): Promise<void>;
};

function listen(server: http.Server, port: number, host: string | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once("error", onError);
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    if (host) {
      server.listen(port, host, onListening);
    } else {
      server.listen(port, onListening);
    }
  });
}

function closeWithin(
  server: http.Server,
  timeoutMs: number,
  logger: Logger
): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      logger.warn(`connections still open after ${timeoutMs}ms, closing them`);
      server.closeAllConnections();
      reject(new Error(`shutdown did not finish within ${timeoutMs}ms`));
    }, timeoutMs);
    timer.unref();
    server.close((err) => {
      clearTimeout(timer);
      if (err) reject(err);
      else resolve();
    });
    server.closeIdleConnections();
  });
}

export async function startServer(options: StartServerOptions): Promise<RunningServer> {
  const { logger } = options;
  const health = options.health ?? new HealthState();
  const app = createApp({ ...options, health });
  const server = http.createServer(
    {
      requestTimeout: options.server.readTimeoutMs,
      headersTimeout: options.server.readTimeoutMs,
    },
    app
  );
  server.keepAliveTimeout = options.server.idleTimeoutMs;
  server.setTimeout(options.server.writeTimeoutMs);

  const host = options.listen ? options.listen.host : options.server.host;
  const requestedPort = options.listen ? options.listen.port : options.server.port;
  await listen(server, requestedPort, host);

  const bound = server.address();
  const port = bound && typeof bound === "object" ? bound.port : requestedPort;
  const address = formatListenAddr(host, port);
  health.markReady();
  logger.info(`Server is ready to handle requests at ${address}`);

  let closing: Promise<void> | null = null;
  return {
    server,
    health,
    port,
    address,
    close() {
      if (!closing) {
        health.markShuttingDown();
        closing = closeWithin(server, options.server.shutdownTimeoutMs, logger);
      }
      return closing;
    },
  };
}
