import { z } from 'zod';

import { getRawFlagValue } from './flags';

export const WattenOptionsSchema = z.object({
  // King of Hearts, 7 of Clubs and 7 of Spades outrank everything
  useCriticals: z.boolean().default(true),
  // Cut the deck before dealing
  useSchleck: z.boolean().default(true),
  // Only the cutter and the dealer must follow trump
  useBlind: z.boolean().default(false),
});

export type WattenOptionsInput = z.input<typeof WattenOptionsSchema>;

export const DEFAULT_WATTEN_OPTIONS = WattenOptionsSchema.parse({});

const seat = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]);

export const MatchConfigSchema = z.object({
  options: WattenOptionsSchema.default({}),
  seed: z.number().int().nonnegative().default(() => Date.now() >>> 0),
  firstDealer: seat.default(4),
  humanSeats: z
    .array(seat)
    .max(4)
    .default([1])
    .refine((seats) => new Set(seats).size === seats.length, { message: 'Duplicate human seat' }),
});

export type MatchConfigInput = z.input<typeof MatchConfigSchema>;
export type MatchConfigResolved = z.output<typeof MatchConfigSchema>;

export const resolveWattenOptions = (input: WattenOptionsInput = {}) =>
  WattenOptionsSchema.parse(input);

export const resolveMatchConfig = (input: MatchConfigInput = {}): MatchConfigResolved =>
  MatchConfigSchema.parse(input);

const OPTION_ENV_KEYS: ReadonlyArray<readonly [keyof WattenOptionsInput, string]> = [
  ['useCriticals', 'WATTEN_USE_CRITICALS'],
  ['useSchleck', 'WATTEN_USE_SCHLECK'],
  ['useBlind', 'WATTEN_USE_BLIND'],
];

// Unset or unrecognised values fall back to the defaults.
export const readWattenOptionsFromEnv = (
  env: Record<string, string | undefined> = process.env,
) => {
  const input: WattenOptionsInput = {};
  for (const [key, envKey] of OPTION_ENV_KEYS) {
    const value = getRawFlagValue(env[envKey]);
    if (value !== undefined) input[key] = value;
  }
  return resolveWattenOptions(input);
};
