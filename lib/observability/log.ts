import { createConsoleTelemetryAdapter } from '@/lib/observability/vendors/console-adapter';
import type { TelemetryAdapter } from '@/lib/observability/vendors/types';
import { sanitizeAttributes, type SpanAttributesInput } from '@/lib/observability/spans';

let adapter: TelemetryAdapter = createConsoleTelemetryAdapter();

export const setTelemetryAdapter = (next: TelemetryAdapter | null) => {
  adapter = next ?? createConsoleTelemetryAdapter();
};

export function logEvent(type: string, extra?: SpanAttributesInput) {
  adapter.addAction(type, sanitizeAttributes(extra) ?? {});
}

export function logException(error: unknown, extra?: SpanAttributesInput) {
  adapter.recordException(error, sanitizeAttributes(extra) ?? {});
}
