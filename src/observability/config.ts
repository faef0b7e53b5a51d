import fs from "fs";
import { loadObservabilityConfigSync } from "../config/fromEnv.js";
import type { ObservabilityConfigType } from "../config/schema.js";

export type ObservabilityConfig = ObservabilityConfigType;

const packageJsonUrl = new URL("../../package.json", import.meta.url);

function readPackageVersion(): string | undefined {
  try {
    const data: unknown = JSON.parse(fs.readFileSync(packageJsonUrl, "utf8"));
    if (data && typeof data === "object" && "version" in data) {
      return typeof data.version === "string" ? data.version : undefined;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Decodes the TRACKER_OTEL_* variables. The service version comes from
 * TRACKER_OTEL_VERSION, then npm's package version, then package.json.
 */
export function readObservabilityConfig(
  env: NodeJS.ProcessEnv = process.env
): ObservabilityConfig {
  return loadObservabilityConfigSync({
    ...env,
    TRACKER_OTEL_VERSION:
      env.TRACKER_OTEL_VERSION || env.npm_package_version || readPackageVersion(),
  });
}
