import { z } from 'zod';

export type ObservabilityRuntime = 'node';

export const truthyValues = new Set(['1', 'true', 'yes', 'on']);
export const falsyValues = new Set(['0', 'false', 'no', 'off']);

const ObservabilityFlagsSchema = z.object({
  node: z.boolean(),
});

type ObservabilityFlagMap = z.infer<typeof ObservabilityFlagsSchema>;

type FeatureFlags = {
  observability: ObservabilityFlagMap;
};

export const getRawFlagValue = (value: string | undefined) => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (truthyValues.has(normalized)) return true;
  if (falsyValues.has(normalized)) return false;
  return undefined;
};

const coerceBooleanFlag = (value: string | undefined) => getRawFlagValue(value) ?? false;

export const getFeatureFlags = (): FeatureFlags => ({
  observability: ObservabilityFlagsSchema.parse({
    node: coerceBooleanFlag(process.env.WATTEN_OBSERVABILITY_ENABLED),
  }),
});

export const getObservabilityFlags = (): ObservabilityFlagMap => getFeatureFlags().observability;
