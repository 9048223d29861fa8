import { z } from 'zod';

const seat = z.number().int().min(1).max(4);
const team = z.enum(['A', 'B']);
const suit = z.enum(['clubs', 'diamonds', 'hearts', 'spades']);
const trumpRank = z.number().int().min(1).max(13);
const card = z.object({
  suit,
  rank: z.union([z.literal(1), z.number().int().min(7).max(13)]),
  value: z.number().int().min(7).max(14),
});
const handNo = z.number().int().positive();
const trickNo = z.number().int().min(1).max(5);
const tally = z.object({ A: z.number().int().nonnegative(), B: z.number().int().nonnegative() });

export const eventPayloadSchemas = {
  'hand/started': z.object({ handNo, dealer: seat, rankSelector: seat, cutting: z.boolean() }),
  'cut/revealed': z.object({
    seat,
    card,
    critical: z.number().int().min(1).max(3).nullable(),
    message: z.string().min(1),
  }),
  'trump/rank-chosen': z.object({ seat, rank: trumpRank }),
  'trump/suit-chosen': z.object({ seat, suit }),
  'card/played': z.object({ seat, card, trickNo }),
  'trick/resolved': z.object({ trickNo, winner: seat, team, tricks: tally }),
  'hand/resolved': z.object({ handNo, team, tricks: tally }),
  'match/resolved': z.object({ team, scores: tally }),
} as const;

export type WattenEventType = keyof typeof eventPayloadSchemas;

export type EventPayloadByType<T extends WattenEventType> = z.infer<
  (typeof eventPayloadSchemas)[T]
>;

export const eventEnvelopeSchema = z.object({
  eventId: z.string().min(1),
  ts: z.number().finite(),
  type: z.string().min(1),
  payload: z.unknown(),
});
