import { SpanStatusCode, trace, type Span, type Tracer } from '@opentelemetry/api';

import { isObservabilityEnabled, SERVICE_NAME } from '@/config/observability';
import type { ObservabilityRuntime } from '@/config/flags';
import type { TelemetryAttributes } from '@/lib/observability/vendors/types';

type Primitive = string | number | boolean;
type AttributeInput = Primitive | Date | null | undefined;
export type SpanAttributesInput = Record<string, AttributeInput>;

type WithSpanOptions = {
  runtime?: ObservabilityRuntime;
};

type SpanErrorLog = {
  span: string;
  message: string;
  name?: string;
  runtime: ObservabilityRuntime;
  attributes?: TelemetryAttributes;
};

const TRACER_NAME = `${SERVICE_NAME}-domain`;

const MAX_STRING_LENGTH = 256;
const MAX_ERROR_MESSAGE_LENGTH = 512;

let cachedTracer: Tracer | null = null;

const resolveRuntime = (runtime?: ObservabilityRuntime): ObservabilityRuntime =>
  runtime ?? 'node';

const sanitizeString = (value: string) => value.slice(0, MAX_STRING_LENGTH);

const sanitizePrimitive = (value: unknown): Primitive | undefined => {
  if (typeof value === 'string') return sanitizeString(value);
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'boolean') return value;
  if (value instanceof Date && Number.isFinite(value.getTime())) {
    return sanitizeString(value.toISOString());
  }
  return undefined;
};

export const sanitizeAttributes = (
  attributes?: SpanAttributesInput,
): TelemetryAttributes | undefined => {
  if (!attributes) return undefined;
  const sanitized: TelemetryAttributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    const primitive = sanitizePrimitive(value);
    if (primitive !== undefined) {
      sanitized[key] = primitive;
    }
  }
  return Object.keys(sanitized).length ? sanitized : undefined;
};

const getTracer = (): Tracer => {
  if (cachedTracer) return cachedTracer;
  cachedTracer = trace.getTracer(TRACER_NAME);
  return cachedTracer;
};

const normalizeError = (error: unknown) => {
  if (error instanceof Error) {
    return {
      message: sanitizeString(error.message || 'Unknown error').slice(0, MAX_ERROR_MESSAGE_LENGTH),
      name: error.name,
    };
  }
  if (typeof error === 'string') {
    return {
      message: sanitizeString(error).slice(0, MAX_ERROR_MESSAGE_LENGTH),
      name: 'Error',
    };
  }
  return {
    message: 'Unknown error',
    name: 'Error',
  };
};

const emitSpanErrorLog = (details: SpanErrorLog) => {
  if (process.env.NODE_ENV !== 'production') {
    console.warn('[observability] Span error captured.', details);
  }
};

export const recordSpanError = (
  span: Span | null | undefined,
  error: unknown,
  attributes?: SpanAttributesInput,
  options?: { spanName?: string; runtime?: ObservabilityRuntime },
) => {
  const runtime = resolveRuntime(options?.runtime);
  const normalizedError = normalizeError(error);
  const sanitizedAttributes = sanitizeAttributes(attributes);

  if (span) {
    span.recordException(normalizedError);
    span.setStatus({ code: SpanStatusCode.ERROR, message: normalizedError.message });
    span.setAttribute('error.message', normalizedError.message);
    span.setAttribute('error.name', normalizedError.name);
    if (sanitizedAttributes) span.setAttributes(sanitizedAttributes);
  }

  emitSpanErrorLog({
    span: options?.spanName ?? 'unknown-span',
    message: normalizedError.message,
    name: normalizedError.name,
    runtime,
    ...(sanitizedAttributes ? { attributes: sanitizedAttributes } : {}),
  });
};

// Engine commands are synchronous, so only the synchronous form is kept.
export const withSpanSync = <T>(
  name: string,
  attributes: SpanAttributesInput,
  callback: (span: Span | null) => T,
  options: WithSpanOptions = {},
): T => {
  const runtime = resolveRuntime(options.runtime);
  if (!isObservabilityEnabled(runtime)) {
    return callback(null);
  }

  const sanitizedAttributes = sanitizeAttributes(attributes);
  const spanOptions = sanitizedAttributes ? { attributes: sanitizedAttributes } : {};
  return getTracer().startActiveSpan(name, spanOptions, (span) => {
    try {
      const result = callback(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordSpanError(span, error, attributes, { spanName: name, runtime });
      throw error;
    } finally {
      span.end();
    }
  });
};
