import express, { type Express } from "express";
import { Effect } from "effect";
import type { ClockifyError } from "../clockify/types.js";
import type { Logger } from "../logger.js";
import {
  annotateSpan,
  runPromise,
  withSpan,
} from "../observability/index.js";
import type { WorkTracker } from "../tracker/service.js";
import { WORK_SIGNALS, type WorkSignal } from "../tracker/types.js";
import type { HealthState } from "./health.js";
import { firstQueryValue, sendText } from "./http.js";
import {
  requestLogging,
  requireAuthKey,
  tracing,
  type RequestIdFactory,
} from "./middleware.js";

export type AppDeps = {
  authKey: string;
  tracker: WorkTracker;
  health: HealthState;
  logger: Logger;
  /** Called after a 502 has been sent for a failed upstream call. */
  onFatal: (err: ClockifyError) => void;
  nextRequestId?: RequestIdFactory;
};

const ROUTES = new Set<string>(["/", "/health", ...WORK_SIGNALS.map((signal) => `/${signal}`)]);

export function parseStateParam(raw: string): boolean | null {
  if (raw === "true") return true;
  if (raw === "false") return false;
  return null;
}

export function createApp(deps: AppDeps): Express {
  const { logger } = deps;
  const app = express();
  app.disable("x-powered-by");

  function runHttpEffect(
    req: express.Request,
    route: string,
    effect: Effect.Effect<number, never, never>
  ): void {
    const instrumented = effect.pipe(
      Effect.tap((status) => annotateSpan({ "http.status_code": status })),
      withSpan("http.request", {
        attributes: {
          "http.method": req.method,
          "http.route": route,
        },
      })
    );
    void runPromise(instrumented).catch((err) => {
      logger.error("http handler failed", err);
    });
  }

  app.use(
    tracing(deps.nextRequestId),
    requestLogging(logger, ROUTES),
    requireAuthKey(deps.authKey)
  );

  app.all("/", (_req, res) => {
    sendText(res, 200, "Hello, World!");
  });

  app.get("/health", (req, res) => {
    runHttpEffect(
      req,
      "/health",
      Effect.sync(() => {
        const status = deps.health.isHealthy() ? 204 : 503;
        res.status(status).end();
        return status;
      })
    );
  });

  const toggle =
    (signal: WorkSignal): express.RequestHandler =>
    (req, res) => {
      const effect = Effect.gen(function* () {
        const raw = firstQueryValue(req.query.state);
        if (raw === undefined) {
          sendText(res, 400, "Missing state parameter.");
          return 400;
        }
        const value = parseStateParam(raw);
        if (value === null) {
          sendText(res, 400, "Invalid state parameter, expected true or false.");
          return 400;
        }
        logger.debug(`${signal} state=${value}`);
        yield* deps.tracker.report(signal, value);
        sendText(res, 200, "Succeeded");
        return 200;
      }).pipe(
        Effect.catchTag("ClockifyError", (err) =>
          Effect.sync(() => {
            logger.error(`${signal} upstream call failed`, err);
            sendText(res, 502, "Upstream request failed.");
            deps.onFatal(err);
            return 502;
          })
        )
      );
      runHttpEffect(req, `/${signal}`, effect);
    };

  for (const signal of WORK_SIGNALS) {
    const handler = toggle(signal);
    app.route(`/${signal}`).get(handler).post(handler);
  }

  app.use((_req, res) => {
    sendText(res, 404, "Not Found");
  });

  return app;
}
