import { Layer } from "effect";
import * as NodeSdk from "@effect/opentelemetry/NodeSdk";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  ParentBasedSampler,
  TraceIdRatioBasedSampler,
  type SpanExporter,
} from "@opentelemetry/sdk-trace-base";
import {
  ConsoleMetricExporter,
  PeriodicExportingMetricReader,
  type PushMetricExporter,
} from "@opentelemetry/sdk-metrics";
import { readObservabilityConfig, type ObservabilityConfig } from "./config.js";

const config = readObservabilityConfig();

function normalizeEndpoint(endpoint: string): string {
  return endpoint.replace(/\/$/, "");
}

export function otlpUrl(endpoint: string, path: string): string {
  const normalized = normalizeEndpoint(endpoint);
  const suffix = path.startsWith("/") ? path : `/${path}`;
  return `${normalized}${suffix}`;
}

function buildTraceExporter(cfg: ObservabilityConfig): SpanExporter | null {
  if (cfg.otlpEndpoint) {
    return new OTLPTraceExporter({
      url: otlpUrl(cfg.otlpEndpoint, "/v1/traces"),
    });
  }
  if (cfg.consoleFallback) {
    return new ConsoleSpanExporter();
  }
  return null;
}

function buildMetricExporter(cfg: ObservabilityConfig): PushMetricExporter | null {
  if (cfg.otlpEndpoint) {
    return new OTLPMetricExporter({
      url: otlpUrl(cfg.otlpEndpoint, "/v1/metrics"),
    });
  }
  if (cfg.consoleFallback) {
    return new ConsoleMetricExporter();
  }
  return null;
}

// Exporters are only built when telemetry is switched on.
function buildLayer(cfg: ObservabilityConfig): Layer.Layer<never> | null {
  if (!cfg.enabled) return null;
  const traceExporter = buildTraceExporter(cfg);
  const metricExporter = buildMetricExporter(cfg);
  if (!traceExporter || !metricExporter) return null;
  const spanProcessor = new BatchSpanProcessor(traceExporter);
  const metricReader = new PeriodicExportingMetricReader({
    exporter: metricExporter,
    exportIntervalMillis: cfg.metricIntervalMs,
  });
  const sampler = new ParentBasedSampler({
    root: new TraceIdRatioBasedSampler(cfg.sampleRatio),
  });
  return NodeSdk.layer(() => ({
    resource: {
      serviceName: cfg.serviceName,
      serviceVersion: cfg.serviceVersion,
      attributes: {
        "deployment.environment": cfg.environment,
      },
    },
    spanProcessor,
    metricReader,
    tracerConfig: { sampler },
  }));
}

const sdkLayer = buildLayer(config);

export const observabilityConfig = config;
export const observabilityEnabled = sdkLayer !== null;

export const observabilityLayer: Layer.Layer<never> = sdkLayer ?? Layer.empty;
