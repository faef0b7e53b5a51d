import type express from "express";

/** First value of a query parameter; repeated parameters keep the first. */
export function firstQueryValue(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === "string" ? first : undefined;
  }
  return undefined;
}

/** Plain-text reply with a trailing newline. */
export function sendText(res: express.Response, status: number, message: string): void {
  res
    .status(status)
    .type("text/plain; charset=utf-8")
    .set("X-Content-Type-Options", "nosniff")
    .send(`${message}\n`);
}
