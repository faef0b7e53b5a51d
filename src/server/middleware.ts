import { timingSafeEqual } from "crypto";
import type express from "express";
import type { RequestHandler } from "express";
import type { Logger } from "../logger.js";
import { recordHttpMetrics, runPromise } from "../observability/index.js";
import { firstQueryValue, sendText } from "./http.js";

export type RequestIdFactory = () => string;

const requestIds = new WeakMap<express.Request, string>();

let requestSeq = 0;

export const defaultRequestId: RequestIdFactory = () => {
  requestSeq = (requestSeq + 1) % 1000;
  return `${Date.now()}${String(requestSeq).padStart(3, "0")}`;
};

export function requestIdOf(req: express.Request): string {
  return requestIds.get(req) ?? "unknown";
}

/** Reuses the caller's X-Request-Id or mints one, and echoes it back. */
export function tracing(nextRequestId: RequestIdFactory = defaultRequestId): RequestHandler {
  return (req, res, next) => {
    const incoming = req.get("X-Request-Id")?.trim();
    const requestId = incoming || nextRequestId();
    requestIds.set(req, requestId);
    res.setHeader("X-Request-Id", requestId);
    next();
  };
}

function pathOf(req: express.Request): string {
  const url = req.originalUrl || req.url;
  const query = url.indexOf("?");
  return query === -1 ? url : url.slice(0, query);
}

/**
 * Logs one line per finished request. The query string is left out since it
 * carries the auth key.
 */
export function requestLogging(
  logger: Logger,
  knownRoutes: ReadonlySet<string>
): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      const path = pathOf(req);
      logger.info(
        `${requestIdOf(req)} ${req.method} ${path} ${req.socket.remoteAddress ?? "-"} ${req.get("User-Agent") ?? "-"}`
      );
      void runPromise(
        recordHttpMetrics({
          method: req.method,
          route: knownRoutes.has(path) ? path : "unmatched",
          status: String(res.statusCode),
          durationMs: Date.now() - startedAt,
        })
      ).catch((err) => {
        logger.error("metrics", err);
      });
    });
    next();
  };
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided, "utf8");
  const b = Buffer.from(expected, "utf8");
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}

/** Rejects any request whose `auth` query parameter differs from the key. */
export function requireAuthKey(key: string): RequestHandler {
  return (req, res, next) => {
    const provided = firstQueryValue(req.query.auth);
    if (provided === undefined || !keysMatch(provided, key)) {
      sendText(res, 401, "Unauthorized.");
      return;
    }
    next();
  };
}
