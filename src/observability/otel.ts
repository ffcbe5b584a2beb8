import fs from "fs";
import { Layer } from "effect";
import * as NodeSdk from "@effect/opentelemetry/NodeSdk";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  ParentBasedSampler,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-base";
import {
  ConsoleMetricExporter,
  PeriodicExportingMetricReader,
} from "@opentelemetry/sdk-metrics";
import type { OtelConfigType } from "../config/index.js";

const PACKAGE_JSON = new URL("../../package.json", import.meta.url);

function packageVersion(): string {
  try {
    const data: unknown = JSON.parse(fs.readFileSync(PACKAGE_JSON, "utf8"));
    if (typeof data === "object" && data !== null && "version" in data) {
      return typeof data.version === "string" ? data.version : "unknown";
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

function otlpUrl(endpoint: string, signal: "traces" | "metrics"): string {
  return `${endpoint.replace(/\/$/, "")}/v1/${signal}`;
}

/**
 * NodeSdk layer exporting spans and Effect metrics. Empty when export is
 * disabled, or when there is no endpoint and the console fallback is off.
 */
export function telemetryLayer(config: OtelConfigType): Layer.Layer<never> {
  if (!config.enabled) return Layer.empty;
  const endpoint = config.endpoint;
  if (endpoint === undefined && !config.consoleFallback) return Layer.empty;

  const spanExporter = endpoint
    ? new OTLPTraceExporter({ url: otlpUrl(endpoint, "traces") })
    : new ConsoleSpanExporter();
  const metricExporter = endpoint
    ? new OTLPMetricExporter({ url: otlpUrl(endpoint, "metrics") })
    : new ConsoleMetricExporter();

  return NodeSdk.layer(() => ({
    resource: {
      serviceName: config.serviceName,
      serviceVersion: packageVersion(),
      attributes: { "deployment.environment": config.environment },
    },
    spanProcessor: new BatchSpanProcessor(spanExporter),
    metricReader: new PeriodicExportingMetricReader({
      exporter: metricExporter,
      exportIntervalMillis: config.metricIntervalMs,
    }),
    tracerConfig: {
      sampler: new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(config.sampleRatio) }),
    },
  }));
}
