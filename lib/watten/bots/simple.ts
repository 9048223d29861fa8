import type { Card, Hands, PlayContext, Seat, Suit, TrickPlay, TrumpRank } from '../types';
import { getCardScore, leadSuitOf, legalCards } from '../rules';
import { winningPlayOf } from '../trick';
import { areTeammates, SUITS } from '../ordering';
import { logEvent } from '@/lib/observability/log';

export type BotContext = Readonly<{
  seat: Seat;
  hands: Hands;
  trick: ReadonlyArray<TrickPlay>;
  play: PlayContext;
}>;

// First card wins a tie, so choices follow hand order.
function pickBy(
  cards: readonly Card[],
  score: (c: Card) => number,
  better: (a: number, b: number) => boolean,
): Card | undefined {
  let best: Card | undefined;
  let bestScore = 0;
  for (const c of cards) {
    const s = score(c);
    if (!best || better(s, bestScore)) {
      best = c;
      bestScore = s;
    }
  }
  return best;
}

const lowest = (cards: readonly Card[], score: (c: Card) => number) =>
  pickBy(cards, score, (a, b) => a < b);
const highest = (cards: readonly Card[], score: (c: Card) => number) =>
  pickBy(cards, score, (a, b) => a > b);

/**
 * Greedy play: lead with the strongest card, duck when the partner is
 * winning, otherwise win as cheaply as possible or throw the weakest card.
 */
export function botPlay(ctx: BotContext): Card {
  const { seat, hands, trick, play } = ctx;
  const hand = hands[seat];
  const first = hand[0];
  if (!first) throw new Error(`Seat ${seat} has no cards to play`);

  const legal = legalCards(seat, hands, trick, play);
  if (legal.length === 0) {
    logEvent('watten.invariant.empty-legal-set', {
      seat,
      handSize: hand.length,
      trickSize: trick.length,
    });
    return first;
  }

  if (trick.length === 0) {
    return highest(legal, (c) => getCardScore(c, play)) ?? first;
  }

  const lead = leadSuitOf(trick, play.useCriticals);
  const scoreOf = (c: Card) => getCardScore(c, play, lead);
  const winning = winningPlayOf(trick, play);
  if (!winning || areTeammates(seat, winning.seat)) {
    return lowest(legal, scoreOf) ?? first;
  }
  const beating = legal.filter((c) => scoreOf(c) > winning.score);
  return lowest(beating.length > 0 ? beating : legal, scoreOf) ?? first;
}

// Most frequent rank in hand; ties go to the lower rank number.
export function botChooseRank(hand: readonly Card[]): TrumpRank {
  const counts = new Map<TrumpRank, number>();
  for (const c of hand) counts.set(c.rank, (counts.get(c.rank) ?? 0) + 1);
  let bestRank: TrumpRank = 13;
  let bestCount = 0;
  for (const [rank, count] of counts) {
    if (count > bestCount || (count === bestCount && rank < bestRank)) {
      bestRank = rank;
      bestCount = count;
    }
  }
  return bestRank;
}

// Suit with the greatest summed card value; ties go to the earlier suit.
export function botChooseSuit(hand: readonly Card[]): Suit {
  let bestSuit: Suit = 'clubs';
  let bestValue = 0;
  for (const suit of SUITS) {
    const total = hand.filter((c) => c.suit === suit).reduce((a, c) => a + c.value, 0);
    if (total > bestValue) {
      bestSuit = suit;
      bestValue = total;
    }
  }
  return bestSuit;
}
