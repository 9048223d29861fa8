import type { Card, Rank, Seat, Suit, Team } from './types';

export const SUITS: Suit[] = ['clubs', 'diamonds', 'hearts', 'spades'];
export const RANKS: Rank[] = [7, 8, 9, 10, 11, 12, 13, 1];
export const SEATS: Seat[] = [1, 2, 3, 4];

export const RANK_NAMES: Readonly<Record<number, string>> = {
  1: 'Ace',
  2: '2',
  3: '3',
  4: '4',
  5: '5',
  6: '6',
  7: '7',
  8: '8',
  9: '9',
  10: '10',
  11: 'Jack',
  12: 'Queen',
  13: 'King',
};

export const SUIT_NAMES: Readonly<Record<Suit, string>> = {
  clubs: 'Clubs',
  diamonds: 'Diamonds',
  hearts: 'Hearts',
  spades: 'Spades',
};

export function valueOfRank(rank: Rank): number {
  return rank === 1 ? 14 : rank;
}

export function makeCard(suit: Suit, rank: Rank): Card {
  return { suit, rank, value: valueOfRank(rank) };
}

export function sameFace(a: Card, b: Card): boolean {
  return a.suit === b.suit && a.rank === b.rank;
}

export function describeCard(card: Card): string {
  return `${RANK_NAMES[card.rank] ?? String(card.rank)} of ${SUIT_NAMES[card.suit]}`;
}

// Seats run clockwise 1 → 2 → 3 → 4 → 1.
export function nextSeat(seat: Seat): Seat {
  return SEATS[seat % 4] ?? 1;
}

export function teamOf(seat: Seat): Team {
  return seat === 1 || seat === 3 ? 'A' : 'B';
}

export function areTeammates(a: Seat, b: Seat): boolean {
  return teamOf(a) === teamOf(b);
}
