import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-proto";
import { PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";

// Only exports when a collector is configured; the CLIs are usually run by hand.
const endpoint = process.env["OTEL_EXPORTER_OTLP_ENDPOINT"];

const sdk =
  endpoint == null
    ? undefined
    : new NodeSDK({
        serviceName: process.env["OTEL_SERVICE_NAME"] ?? "lake-weather-tools",
        traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }),
        metricReader: new PeriodicExportingMetricReader({
          exporter: new OTLPMetricExporter({ url: `${endpoint}/v1/metrics` }),
          exportIntervalMillis: 60_000,
        }),
        instrumentations: [getNodeAutoInstrumentations()],
      });

sdk?.start();

/**
 * Flushes pending spans and metrics. The CLIs call this before exiting.
 */
export async function shutdownInstrumentation(): Promise<void> {
  await sdk?.shutdown();
}
