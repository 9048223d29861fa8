import { uuid } from '@/lib/utils';
import type { EventPayloadByType, WattenEventType } from '@/schema/events';

export type { WattenEventType, EventPayloadByType } from '@/schema/events';

export type WattenEventOf<T extends WattenEventType> = Readonly<{
  type: T;
  payload: EventPayloadByType<T>;
  eventId: string;
  ts: number;
}>;

export type KnownWattenEvent = { [T in WattenEventType]: WattenEventOf<T> }[WattenEventType];

export type WattenEventListener = (event: KnownWattenEvent) => void;

type Meta = { eventId?: string; ts?: number };

export function makeEvent<T extends WattenEventType>(
  type: T,
  payload: EventPayloadByType<T>,
  meta?: Meta,
): WattenEventOf<T> {
  return {
    type,
    payload,
    eventId: meta?.eventId ?? uuid(),
    ts: meta?.ts ?? Date.now(),
  };
}

export const events = {
  handStarted: (p: EventPayloadByType<'hand/started'>, m?: Meta) => makeEvent('hand/started', p, m),
  cutRevealed: (p: EventPayloadByType<'cut/revealed'>, m?: Meta) => makeEvent('cut/revealed', p, m),
  trumpRankChosen: (p: EventPayloadByType<'trump/rank-chosen'>, m?: Meta) =>
    makeEvent('trump/rank-chosen', p, m),
  trumpSuitChosen: (p: EventPayloadByType<'trump/suit-chosen'>, m?: Meta) =>
    makeEvent('trump/suit-chosen', p, m),
  cardPlayed: (p: EventPayloadByType<'card/played'>, m?: Meta) => makeEvent('card/played', p, m),
  trickResolved: (p: EventPayloadByType<'trick/resolved'>, m?: Meta) =>
    makeEvent('trick/resolved', p, m),
  handResolved: (p: EventPayloadByType<'hand/resolved'>, m?: Meta) =>
    makeEvent('hand/resolved', p, m),
  matchResolved: (p: EventPayloadByType<'match/resolved'>, m?: Meta) =>
    makeEvent('match/resolved', p, m),
};
