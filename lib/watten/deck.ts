import { RANKS, SUITS, makeCard } from './ordering';
import { wattenError } from './errors';
import type { Card, RNG } from './types';

export const DECK_SIZE = 32;

// Canonical order: suit by suit, 7 through King, then Ace.
export function wattenDeck(): Card[] {
  const out: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      out.push(makeCard(suit, rank));
    }
  }
  return out;
}

export function shuffleInPlace<T>(arr: T[], rng: RNG): void {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
}

// Takes the top card (end of the array).
export function draw(deck: Card[]): Card {
  const card = deck.pop();
  if (!card) throw wattenError('deck.empty', 'No cards left to draw');
  return card;
}

/**
 * Deals round-robin: one card to each player per pass, skipping players whose
 * count is already satisfied. Nothing is drawn when the deck is too short.
 */
export function dealCounts(deck: Card[], counts: readonly number[]): Card[][] {
  const needed = counts.reduce((a, n) => a + n, 0);
  if (needed > deck.length) {
    throw wattenError('deck.insufficient_cards', `Need ${needed} cards, deck has ${deck.length}`, {
      needed,
      remaining: deck.length,
    });
  }
  const hands: Card[][] = counts.map(() => []);
  const rounds = Math.max(0, ...counts);
  for (let r = 0; r < rounds; r++) {
    hands.forEach((hand, p) => {
      if (r < (counts[p] ?? 0)) hand.push(draw(deck));
    });
  }
  return hands;
}

export function deal(deck: Card[], numPlayers: number, perPlayer: number): Card[][] {
  return dealCounts(deck, Array.from({ length: numPlayers }, () => perPlayer));
}
