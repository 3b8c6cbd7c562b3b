import {
  type Attributes,
  type Span,
  SpanStatusCode,
  trace,
} from "@opentelemetry/api";

const tracer = trace.getTracer("lake-weather-tools");

function markFailed(span: Span, e: unknown) {
  span.setStatus({ code: SpanStatusCode.ERROR, message: String(e) });
  if (e instanceof Error) span.recordException(e);
}

export function withSpan<T>(
  name: string,
  fn: (span: Span) => T,
  attributes?: Attributes,
): T {
  return tracer.startActiveSpan(name, { attributes }, (span) => {
    let result: T;
    try {
      result = fn(span);
    } catch (e) {
      markFailed(span, e);
      span.end();
      throw e;
    }
    if (result instanceof Promise) {
      return result
        .catch((e: unknown) => {
          markFailed(span, e);
          throw e;
        })
        .finally(() => span.end()) as T;
    }
    span.end();
    return result;
  });
}
