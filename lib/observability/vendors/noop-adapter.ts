import type { TelemetryAdapter } from '@/lib/observability/vendors/types';

const noop = () => {};

export const createNoopTelemetryAdapter = (): TelemetryAdapter => ({
  addAction: noop,
  recordException: noop,
});
