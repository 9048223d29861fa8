import type { TelemetryAdapter } from '@/lib/observability/vendors/types';

export const createConsoleTelemetryAdapter = (): TelemetryAdapter => ({
  addAction: (event, attributes) => {
    if (process.env.NODE_ENV !== 'production') {
      console.info(`[observability] ${event}`, attributes ?? {});
    }
  },
  recordException: (error, attributes) => {
    console.error('[observability] exception', error, attributes ?? {});
  },
});
