#!/usr/bin/env node
import process from "process";
import { Effect } from "effect";
import { makeClockifyClient } from "./clockify/client.js";
import {
  Config,
  ConfigLive,
  formatConfigError,
  parseListenAddr,
  type ListenAddress,
} from "./config/index.js";
import { createLogger, type Logger } from "./logger.js";
import { disposeObservability, runPromise } from "./observability/index.js";
import { startServer, type RunningServer } from "./server.js";
import { WorkStateStore } from "./tracker/store.js";
import { makeWorkTracker } from "./tracker/service.js";
import { loadTags } from "./tracker/tags.js";

const args = process.argv.slice(2);

function readArg(name: string): string | undefined {
  const names = [`--${name}`, `-${name}`];
  const index = args.findIndex(
    (arg) => names.includes(arg) || names.some((n) => arg.startsWith(`${n}=`))
  );
  if (index === -1) return undefined;
  const arg = args[index];
  if (arg.includes("=")) {
    return arg.split("=").slice(1).join("=");
  }
  return args[index + 1];
}

function hasFlag(name: string): boolean {
  return args.includes(name);
}

function printHelp(): void {
  process.stdout.write(`auto-timetracker\n\n`);
  process.stdout.write(`Usage:\n  auto-timetracker [options]\n\n`);
  process.stdout.write(`Options:\n`);
  process.stdout.write(`  --listen-addr <addr>  Listen address, host:port or :port (default :$PORT)\n`);
  process.stdout.write(`  -h, --help            Show help\n\n`);
  process.stdout.write(`Environment:\n`);
  process.stdout.write(`  AUTH_KEY              Key expected in the auth query parameter\n`);
  process.stdout.write(`  CLOCKIFY_KEY          Clockify API key\n`);
  process.stdout.write(`  CLOCKIFY_WORKSPACE    Clockify workspace id\n`);
  process.stdout.write(`  CLOCKIFY_PROJECT      Clockify project id for new entries\n`);
  process.stdout.write(`  PORT, HOST            Bind address (default 0.0.0.0:8080)\n`);
  process.stdout.write(`  TRACKER_DEBUG=1       Verbose logging\n`);
}

if (hasFlag("--help") || hasFlag("-h")) {
  printHelp();
  process.exit(0);
}

const bootLogger = createLogger("http");
bootLogger.info("Server is starting...");

let listen: ListenAddress | undefined;
const listenArg = readArg("listen-addr");
if (listenArg !== undefined) {
  const parsed = parseListenAddr(listenArg);
  if (!parsed) {
    bootLogger.fatal(`invalid --listen-addr ${JSON.stringify(listenArg)}`);
    process.exit(2);
  }
  listen = parsed;
}

let running: RunningServer | null = null;
let stopping = false;

function exitAfterFlush(code: number): void {
  void disposeObservability()
    .catch(() => undefined)
    .finally(() => process.exit(code));
}

const program = Effect.gen(function* () {
  const config = yield* Config;
  const logger: Logger = createLogger("http", { debug: config.debug.enabled });
  const client = makeClockifyClient(config.clockify);
  const tags = yield* loadTags(client, logger);
  const tracker = makeWorkTracker({
    client,
    store: new WorkStateStore(),
    tags,
    logger: logger.child("tracker"),
  });
  running = yield* Effect.tryPromise({
    try: () =>
      startServer({
        server: config.server,
        listen,
        authKey: config.auth.key,
        tracker,
        logger,
        onFatal: (err) => {
          logger.fatal("upstream request failed", err);
          exitAfterFlush(1);
        },
      }),
    catch: (err) => err,
  });
}).pipe(
  Effect.provide(ConfigLive),
  Effect.catchAll((err) =>
    Effect.sync(() => {
      bootLogger.fatal("could not start:", formatConfigError(err));
      exitAfterFlush(1);
    })
  )
);

runPromise(program).catch((err) => {
  bootLogger.fatal("could not start:", err);
  exitAfterFlush(1);
});

async function shutdown(): Promise<void> {
  if (stopping) return;
  stopping = true;
  bootLogger.info("Server is shutting down...");
  try {
    if (running) await running.close();
    await disposeObservability().catch(() => undefined);
    bootLogger.info("Server stopped");
    process.exit(0);
  } catch (err) {
    bootLogger.fatal("Could not gracefully shutdown the server:", err);
    exitAfterFlush(1);
  }
}

process.on("SIGINT", () => {
  void shutdown();
});
process.on("SIGTERM", () => {
  void shutdown();
});
