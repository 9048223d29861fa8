export type Suit = 'clubs' | 'diamonds' | 'hearts' | 'spades';
export type Rank = 1 | 7 | 8 | 9 | 10 | 11 | 12 | 13; // 1 = Ace, J=11,Q=12,K=13
// The rank selector may name any rank, including ones the short deck does not hold.
export type TrumpRank = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13;

export type Card = Readonly<{
  suit: Suit;
  rank: Rank;
  value: number; // Ace=14, otherwise rank
}>;

export type Seat = 1 | 2 | 3 | 4;
export type Team = 'A' | 'B'; // A = seats 1 & 3, B = seats 2 & 4

export type CriticalLevel = 1 | 2 | 3;

export type TrickPlay = Readonly<{
  seat: Seat;
  card: Card;
}>;

export type CompletedTrick = Readonly<{
  plays: readonly TrickPlay[];
  winner: Seat;
}>;

export type Phase =
  | 'cutting'
  | 'selecting_rank'
  | 'selecting_suit'
  | 'playing'
  | 'trick_complete'
  | 'hand_complete';

export type WattenOptions = Readonly<{
  useCriticals: boolean;
  useSchleck: boolean;
  useBlind: boolean;
}>;

export type TrumpContext = Readonly<{
  trumpRank: TrumpRank;
  trumpSuit: Suit;
  useCriticals: boolean;
}>;

export type PlayContext = TrumpContext &
  Readonly<{
    useBlind: boolean;
    cutter: Seat;
    dealer: Seat;
  }>;

export type CutOutcome = Readonly<{
  seat: Seat;
  card: Card;
  critical: CriticalLevel | null;
  message: string;
}>;

export type Hands = Readonly<Record<Seat, readonly Card[]>>;
export type TeamTally = Readonly<Record<Team, number>>;

export type RNG = () => number; // [0,1)
