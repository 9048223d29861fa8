export type TelemetryAttributes = Record<string, string | number | boolean>;

export type TelemetryAdapter = {
  addAction: (event: string, attributes?: TelemetryAttributes) => void;
  recordException: (error: unknown, attributes?: TelemetryAttributes) => void;
};
