import { trace } from "@opentelemetry/api";
import pino from "pino";
import { LOG_LEVEL } from "./config.ts";

// stdout carries the data rows, so everything logged goes to stderr.
export const logger = pino(
  {
    level: LOG_LEVEL,
    mixin() {
      const span = trace.getActiveSpan();
      if (!span) return {};
      const { traceId, spanId } = span.spanContext();
      return { trace_id: traceId, span_id: spanId };
    },
  },
  pino.destination({ dest: 2, sync: true }),
);
