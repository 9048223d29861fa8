import type {
  Card,
  CriticalLevel,
  Hands,
  PlayContext,
  Seat,
  Suit,
  TrickPlay,
  TrumpContext,
} from './types';

type CriticalCard = Readonly<{ suit: Suit; rank: number; level: CriticalLevel }>;

// Fixed table of critical cards, strongest first.
export const CRITICAL_CARDS: readonly CriticalCard[] = [
  { suit: 'hearts', rank: 13, level: 1 }, // King of Hearts
  { suit: 'clubs', rank: 7, level: 2 },
  { suit: 'spades', rank: 7, level: 3 },
];

export const SCORE = {
  critical: { 1: 10000, 2: 9000, 3: 8000 },
  rechte: 5000,
  trumpRank: 3000,
  trumpSuit: 1000,
  leadSuit: 500,
} as const;

export function isCriticalCard(card: Card, enabled: boolean): CriticalLevel | null {
  if (!enabled) return null;
  const hit = CRITICAL_CARDS.find((c) => c.suit === card.suit && c.rank === card.rank);
  return hit ? hit.level : null;
}

/**
 * Strength of a card under the current trump. Higher wins.
 *
 * Categories, strongest first: critical (flat), Rechte (flat), trump rank,
 * trump suit, lead suit. With a lead suit, anything else scores 0 and cannot
 * win; without one (the leading card) the bare value is used.
 */
export function getCardScore(card: Card, ctx: TrumpContext, leadSuit?: Suit): number {
  const critical = isCriticalCard(card, ctx.useCriticals);
  if (critical) return SCORE.critical[critical];

  const isTrumpRank = card.rank === ctx.trumpRank;
  const isTrumpSuit = card.suit === ctx.trumpSuit;
  if (isTrumpRank && isTrumpSuit) return SCORE.rechte;
  if (isTrumpRank) return SCORE.trumpRank + card.value;
  if (isTrumpSuit) return SCORE.trumpSuit + card.value;
  if (leadSuit && leadSuit !== ctx.trumpSuit && card.suit === leadSuit) {
    return SCORE.leadSuit + card.value;
  }
  if (leadSuit && card.suit !== leadSuit) return 0;
  return card.value;
}

// Lead suit of a trick; a critical lead carries no suit.
export function leadSuitOf(
  plays: ReadonlyArray<TrickPlay>,
  useCriticals: boolean,
): Suit | undefined {
  const first = plays[0];
  if (!first) return undefined;
  return isCriticalCard(first.card, useCriticals) ? undefined : first.card.suit;
}

// True when the hand holds a plain trump-suit card (not critical, not trump rank).
export function holdsPlainTrump(hand: readonly Card[], ctx: TrumpContext): boolean {
  return hand.some(
    (c) =>
      c.suit === ctx.trumpSuit && !isCriticalCard(c, ctx.useCriticals) && c.rank !== ctx.trumpRank,
  );
}

export function isCardPlayValid(
  card: Card,
  seat: Seat,
  hands: Hands,
  trickSoFar: ReadonlyArray<TrickPlay>,
  ctx: PlayContext,
): boolean {
  const first = trickSoFar[0];
  if (!first) return true;
  const firstCard = first.card;

  if (isCriticalCard(card, ctx.useCriticals)) return true;
  // A critical lead belongs to no suit.
  if (isCriticalCard(firstCard, ctx.useCriticals)) return true;
  if (firstCard.suit !== ctx.trumpSuit) return true;

  // Blind: only the cutter and the dealer know the trump.
  if (ctx.useBlind && seat !== ctx.cutter && seat !== ctx.dealer) return true;

  if (!holdsPlainTrump(hands[seat], ctx)) return true;
  if (card.suit === ctx.trumpSuit) return true;

  const lead = leadSuitOf(trickSoFar, ctx.useCriticals);
  return getCardScore(card, ctx, lead) > getCardScore(firstCard, ctx, lead);
}

export function legalCards(
  seat: Seat,
  hands: Hands,
  trickSoFar: ReadonlyArray<TrickPlay>,
  ctx: PlayContext,
): Card[] {
  return hands[seat].filter((c) => isCardPlayValid(c, seat, hands, trickSoFar, ctx));
}
