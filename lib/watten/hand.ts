import type {
  Card,
  CompletedTrick,
  CutOutcome,
  Hands,
  Phase,
  PlayContext,
  RNG,
  Seat,
  Suit,
  Team,
  TeamTally,
  TrickPlay,
  TrumpRank,
  WattenOptions,
} from './types';
import { dealCounts, shuffleInPlace, wattenDeck } from './deck';
import { wattenError } from './errors';
import { events, type KnownWattenEvent } from './events';
import { describeCard, nextSeat, sameFace, SEATS, SUITS, teamOf } from './ordering';
import { phaseAfter, phasePlan } from './phases';
import { isCardPlayValid, isCriticalCard } from './rules';
import { winningPlayOf } from './trick';
import { accept, reject, type CommandResult } from './command';

export const HAND_SIZE = 5;
export const TRICKS_TO_WIN_HAND = 3;
export const TRICK_SIZE = 4;

export type HandConfig = Readonly<{
  handNo: number;
  dealer: Seat;
  options: WattenOptions;
}>;

export type HandState = Readonly<{
  handNo: number;
  options: WattenOptions;
  plan: readonly Phase[];
  phase: Phase;
  dealer: Seat;
  // Sits left of the dealer: cuts, names the trump rank and leads the first trick.
  cutter: Seat;
  deck: readonly Card[];
  hands: Hands;
  cut: CutOutcome | null;
  trumpRank: TrumpRank | null;
  trumpSuit: Suit | null;
  currentPlayer: Seat;
  trick: readonly TrickPlay[];
  // Winner of the full trick on the table while in trick_complete.
  trickWinner: Seat | null;
  completedTricks: readonly CompletedTrick[];
  tricksWon: TeamTally;
  winner: Team | null;
}>;

export type HandStart = Readonly<{ state: HandState; events: KnownWattenEvent[] }>;

const emptyHands = (): Record<Seat, Card[]> => ({ 1: [], 2: [], 3: [], 4: [] });

// Dealing starts with the seat after the dealer and ends with the dealer.
export function dealOrder(dealer: Seat): Seat[] {
  const out: Seat[] = [];
  let seat = dealer;
  for (let i = 0; i < SEATS.length; i++) {
    seat = nextSeat(seat);
    out.push(seat);
  }
  return out;
}

function dealHands(deck: Card[], dealer: Seat, cutter: Seat, cutCard: Card | null): Hands {
  const order = dealOrder(dealer);
  const counts = order.map((s) => (s === cutter && cutCard ? HAND_SIZE - 1 : HAND_SIZE));
  const dealt = dealCounts(deck, counts);
  const hands = emptyHands();
  order.forEach((s, i) => {
    const kept = s === cutter && cutCard ? [cutCard] : [];
    hands[s] = [...kept, ...(dealt[i] ?? [])];
  });
  return hands;
}

export function isTrumpRank(value: number): value is TrumpRank {
  return Number.isInteger(value) && value >= 1 && value <= 13;
}

export function isSuit(value: string): value is Suit {
  return SUITS.some((s) => s === value);
}

export function createHand(cfg: HandConfig, rng: RNG): HandStart {
  const plan = phasePlan(cfg.options);
  const deck = wattenDeck();
  shuffleInPlace(deck, rng);
  const cutter = nextSeat(cfg.dealer);
  const cutting = plan[0] === 'cutting';
  const hands = cutting ? emptyHands() : dealHands(deck, cfg.dealer, cutter, null);
  const state: HandState = {
    handNo: cfg.handNo,
    options: cfg.options,
    plan,
    phase: plan[0] ?? 'selecting_rank',
    dealer: cfg.dealer,
    cutter,
    deck,
    hands,
    cut: null,
    trumpRank: null,
    trumpSuit: null,
    currentPlayer: cutter,
    trick: [],
    trickWinner: null,
    completedTricks: [],
    tricksWon: { A: 0, B: 0 },
    winner: null,
  };
  return {
    state,
    events: [
      events.handStarted({ handNo: cfg.handNo, dealer: cfg.dealer, rankSelector: cutter, cutting }),
    ],
  };
}

function cutMessage(seat: Seat, card: Card, critical: boolean): string {
  return critical
    ? `Critical! Player ${seat} keeps the ${describeCard(card)}!`
    : `Player ${seat} cut the ${describeCard(card)}.`;
}

/**
 * The cutter reveals a random card. A critical is kept and the cutter is dealt
 * one card fewer; any other card stays in the deck.
 */
export function performCut(state: HandState, rng: RNG): CommandResult<HandState> {
  if (state.phase !== 'cutting') {
    return reject(state, 'phase.invalid_action', 'not-cutting', { phase: state.phase });
  }
  const deck = [...state.deck];
  const idx = Math.floor(rng() * deck.length);
  const card = deck[idx];
  if (!card) throw wattenError('deck.empty', 'No card to cut');
  const critical = isCriticalCard(card, state.options.useCriticals);
  if (critical) deck.splice(idx, 1);
  const hands = dealHands(deck, state.dealer, state.cutter, critical ? card : null);
  const cut: CutOutcome = {
    seat: state.cutter,
    card,
    critical,
    message: cutMessage(state.cutter, card, critical !== null),
  };
  return accept({ ...state, phase: phaseAfter(state.plan, 'cutting'), deck, hands, cut }, [
    events.cutRevealed({ seat: cut.seat, card, critical, message: cut.message }),
  ]);
}

export function selectTrumpRank(state: HandState, rank: number): CommandResult<HandState> {
  if (state.phase !== 'selecting_rank') {
    return reject(state, 'phase.invalid_action', 'not-selecting-rank', { phase: state.phase });
  }
  if (!isTrumpRank(rank)) {
    return reject(state, 'phase.invalid_action', 'invalid-rank', { rank });
  }
  return accept(
    { ...state, trumpRank: rank, phase: phaseAfter(state.plan, 'selecting_rank') },
    [events.trumpRankChosen({ seat: state.cutter, rank })],
  );
}

export function selectTrumpSuit(state: HandState, suit: string): CommandResult<HandState> {
  if (state.phase !== 'selecting_suit') {
    return reject(state, 'phase.invalid_action', 'not-selecting-suit', { phase: state.phase });
  }
  if (!isSuit(suit)) {
    return reject(state, 'phase.invalid_action', 'invalid-suit', { suit });
  }
  return accept(
    { ...state, trumpSuit: suit, phase: phaseAfter(state.plan, 'selecting_suit') },
    [events.trumpSuitChosen({ seat: state.dealer, suit })],
  );
}

export function playContextOf(state: HandState): PlayContext | null {
  if (state.trumpRank === null || state.trumpSuit === null) return null;
  return {
    trumpRank: state.trumpRank,
    trumpSuit: state.trumpSuit,
    useCriticals: state.options.useCriticals,
    useBlind: state.options.useBlind,
    cutter: state.cutter,
    dealer: state.dealer,
  };
}

export function resolveTrick(plays: ReadonlyArray<TrickPlay>, ctx: PlayContext): CompletedTrick {
  const best = winningPlayOf(plays, ctx);
  if (!best) throw new Error('Cannot resolve an empty trick');
  return { plays: [...plays], winner: best.seat };
}

export function playCard(state: HandState, seat: Seat, card: Card): CommandResult<HandState> {
  const ctx = playContextOf(state);
  if (state.phase !== 'playing' || !ctx) {
    return reject(state, 'phase.invalid_action', 'not-playing', { phase: state.phase });
  }
  if (seat !== state.currentPlayer) {
    return reject(state, 'play.illegal', 'not-your-turn', { seat, expected: state.currentPlayer });
  }
  const hand = state.hands[seat];
  const idx = hand.findIndex((c) => sameFace(c, card));
  const held = hand[idx];
  if (idx < 0 || !held) return reject(state, 'play.illegal', 'card-not-in-hand', { seat, card });
  if (!isCardPlayValid(held, seat, state.hands, state.trick, ctx)) {
    return reject(state, 'play.illegal', 'must-follow-trump', { seat, card });
  }

  const trickNo = state.completedTricks.length + 1;
  const hands: Hands = { ...state.hands, [seat]: hand.filter((_, i) => i !== idx) };
  const trick = [...state.trick, { seat, card: held }];
  const played = events.cardPlayed({ seat, card: held, trickNo });

  if (trick.length < TRICK_SIZE) {
    return accept({ ...state, hands, trick, currentPlayer: nextSeat(seat) }, [played]);
  }

  const { winner } = resolveTrick(trick, ctx);
  const team = teamOf(winner);
  const tricksWon = { ...state.tricksWon, [team]: state.tricksWon[team] + 1 };
  const handWinner = tricksWon[team] >= TRICKS_TO_WIN_HAND ? team : null;
  const batch: KnownWattenEvent[] = [
    played,
    events.trickResolved({ trickNo, winner, team, tricks: tricksWon }),
  ];
  if (handWinner) {
    batch.push(events.handResolved({ handNo: state.handNo, team: handWinner, tricks: tricksWon }));
  }
  return accept(
    {
      ...state,
      hands,
      trick,
      trickWinner: winner,
      tricksWon,
      winner: handWinner,
      currentPlayer: winner,
      phase: 'trick_complete',
    },
    batch,
  );
}

// Clears the resolved trick: the winner leads the next one, or the hand is over.
export function completeTrick(state: HandState): CommandResult<HandState> {
  if (state.phase !== 'trick_complete' || state.trickWinner === null) {
    return reject(state, 'phase.invalid_action', 'no-trick-to-complete', { phase: state.phase });
  }
  return accept({
    ...state,
    completedTricks: [...state.completedTricks, { plays: state.trick, winner: state.trickWinner }],
    trick: [],
    trickWinner: null,
    phase: state.winner ? 'hand_complete' : 'playing',
  });
}

// Seat expected to act next, or null while nobody has to.
export function actingSeat(state: HandState): Seat | null {
  switch (state.phase) {
    case 'cutting':
    case 'selecting_rank':
      return state.cutter;
    case 'selecting_suit':
      return state.dealer;
    case 'playing':
      return state.currentPlayer;
    default:
      return null;
  }
}

export function isHandOver(state: HandState): boolean {
  return state.winner !== null;
}

// Every card of the deck sits in exactly one of these places.
export function cardsInPlay(state: HandState): number {
  const inHands = SEATS.reduce((a, s) => a + state.hands[s].length, 0);
  const inHistory = state.completedTricks.reduce((a, t) => a + t.plays.length, 0);
  return inHands + state.trick.length + inHistory + state.deck.length;
}
