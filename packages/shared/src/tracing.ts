/**
 * Tracing utilities — thin wrapper around OpenTelemetry API.
 *
 * No SDK is registered by this library. Applications that register one get
 * spans for job submissions and uploads; everyone else gets no-op spans.
 */
import { trace, SpanStatusCode, type Span, type Tracer } from '@opentelemetry/api';

const TRACER_NAME = 'procrun';

/** Get a tracer instance */
export function getTracer(): Tracer {
  return trace.getTracer(TRACER_NAME);
}

/**
 * Wrap an async function in an OTel span.
 * Automatically records errors and sets span status.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const tracer = getTracer();
  return tracer.startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      throw error;
    } finally {
      span.end();
    }
  });
}
