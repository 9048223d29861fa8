import { describe, it, expect } from 'vitest';
import { DECK_SIZE, deal, dealCounts, draw, shuffleInPlace, wattenDeck } from '@/lib/watten/deck';
import { isWattenError } from '@/lib/watten/errors';
import { mulberry32 } from '@/lib/watten/rng';
import { C } from '../utils/watten-fixtures';

const key = (c: { suit: string; rank: number }) => `${c.suit}:${c.rank}`;

describe('watten deck', () => {
  it('builds the 32-card short deck in canonical order', () => {
    const deck = wattenDeck();
    expect(deck).toHaveLength(DECK_SIZE);
    expect(new Set(deck.map(key)).size).toBe(32);
    expect(deck.every((c) => c.rank === 1 || (c.rank >= 7 && c.rank <= 13))).toBe(true);
    expect(deck[0]).toEqual({ suit: 'clubs', rank: 7, value: 7 });
    expect(deck[7]).toEqual({ suit: 'clubs', rank: 1, value: 14 });
    expect(deck[31]).toEqual({ suit: 'spades', rank: 1, value: 14 });
  });

  it('shuffles into a permutation, deterministically per seed', () => {
    const a = wattenDeck();
    const b = wattenDeck();
    shuffleInPlace(a, mulberry32(7));
    shuffleInPlace(b, mulberry32(7));
    expect(a).toEqual(b);
    expect(a.map(key).sort()).toEqual(wattenDeck().map(key).sort());
  });

  it('draws from the top and fails on an empty deck', () => {
    const deck = [C('clubs', 7), C('hearts', 13)];
    expect(draw(deck)).toEqual(C('hearts', 13));
    expect(deck).toHaveLength(1);
    draw(deck);
    let caught: unknown;
    try {
      draw(deck);
    } catch (e) {
      caught = e;
    }
    expect(isWattenError(caught, 'deck.empty')).toBe(true);
    expect(caught).toMatchObject({ name: 'EmptyDeck' });
  });

  it('deals round-robin, one card per player per pass', () => {
    const deck = wattenDeck();
    const [p0, p1] = dealCounts(deck, [2, 2]);
    expect(p0).toEqual([C('spades', 1), C('spades', 12)]);
    expect(p1).toEqual([C('spades', 13), C('spades', 11)]);
    expect(deck).toHaveLength(28);
  });

  it('skips players whose count is already met', () => {
    const deck = wattenDeck();
    const hands = dealCounts(deck, [5, 4, 5, 5]);
    expect(hands.map((h) => h.length)).toEqual([5, 4, 5, 5]);
    expect(deck).toHaveLength(13);
  });

  it('deal gives every player the same count', () => {
    const deck = wattenDeck();
    const hands = deal(deck, 4, 5);
    expect(hands.map((h) => h.length)).toEqual([5, 5, 5, 5]);
    expect(deck).toHaveLength(12);
  });

  it('refuses to deal more cards than the deck holds and draws nothing', () => {
    const deck = [C('clubs', 7), C('clubs', 8), C('clubs', 9)];
    let caught: unknown;
    try {
      dealCounts(deck, [2, 2]);
    } catch (e) {
      caught = e;
    }
    expect(isWattenError(caught, 'deck.insufficient_cards')).toBe(true);
    expect(caught).toMatchObject({
      name: 'InsufficientCards',
      info: { code: 'deck.insufficient_cards', details: { needed: 4, remaining: 3 } },
    });
    expect(deck).toHaveLength(3);
  });
});
