import { getObservabilityFlags, type ObservabilityRuntime } from './flags';

export const SERVICE_NAME = 'watten-engine';

export const isObservabilityEnabled = (runtime: ObservabilityRuntime) => {
  const flags = getObservabilityFlags();
  return flags[runtime];
};
