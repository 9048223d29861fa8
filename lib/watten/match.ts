import type { Card, Seat, Team, TeamTally, WattenOptions } from './types';
import { events, type KnownWattenEvent } from './events';
import { nextSeat } from './ordering';
import { mulberry32 } from './rng';
import { deriveSeed, SEED_STREAMS } from './seed';
import { accept, reject, type CommandResult } from './command';
import * as hand from './hand';
import type { HandState } from './hand';

export const POINTS_PER_HAND = 2;
export const WINNING_SCORE = 11;

export type MatchConfig = Readonly<{
  options: WattenOptions;
  seed: number;
  // Deals before the first hand's rotation; the first hand is dealt by the next seat.
  firstDealer?: Seat;
}>;

export type MatchState = Readonly<{
  options: WattenOptions;
  seed: number;
  dealer: Seat;
  handNo: number;
  scores: TeamTally;
  hand: HandState | null;
  winner: Team | null;
}>;

export function createMatch(cfg: MatchConfig): MatchState {
  return {
    options: cfg.options,
    seed: cfg.seed >>> 0,
    dealer: cfg.firstDealer ?? 4,
    handNo: 0,
    scores: { A: 0, B: 0 },
    hand: null,
    winner: null,
  };
}

export function isMatchOver(match: MatchState): boolean {
  return match.winner !== null;
}

export function winnerOf(match: MatchState): Team | null {
  return match.winner;
}

// The dealer moves one seat clockwise at the start of every hand.
function beginHand(match: MatchState): CommandResult<MatchState> {
  const handNo = match.handNo + 1;
  const dealer = nextSeat(match.dealer);
  const rng = mulberry32(deriveSeed(match.seed, handNo, SEED_STREAMS.shuffle));
  const started = hand.createHand({ handNo, dealer, options: match.options }, rng);
  return accept({ ...match, handNo, dealer, hand: started.state }, started.events);
}

export function startMatch(match: MatchState): CommandResult<MatchState> {
  if (match.handNo > 0 || match.hand) {
    return reject(match, 'phase.invalid_action', 'match-already-started');
  }
  return beginHand(match);
}

export function startNextHand(match: MatchState): CommandResult<MatchState> {
  if (match.winner) return reject(match, 'phase.invalid_action', 'match-over');
  if (!match.hand) return reject(match, 'phase.invalid_action', 'match-not-started');
  if (match.hand.phase !== 'hand_complete') {
    return reject(match, 'phase.invalid_action', 'hand-in-progress', {
      phase: match.hand.phase,
    });
  }
  return beginHand(match);
}

export function onHandComplete(
  match: MatchState,
  team: Team,
): Readonly<{ state: MatchState; events: KnownWattenEvent[] }> {
  const scores = { ...match.scores, [team]: match.scores[team] + POINTS_PER_HAND };
  if (scores[team] >= WINNING_SCORE) {
    return {
      state: { ...match, scores, winner: team },
      events: [events.matchResolved({ team, scores })],
    };
  }
  return { state: { ...match, scores }, events: [] };
}

// Runs a hand command and books the hand result the moment the hand is won.
function withHand(
  match: MatchState,
  run: (current: HandState) => CommandResult<HandState>,
  allowAfterMatch = false,
): CommandResult<MatchState> {
  if (match.winner && !allowAfterMatch) return reject(match, 'phase.invalid_action', 'match-over');
  const current = match.hand;
  if (!current) return reject(match, 'phase.invalid_action', 'match-not-started');
  const res = run(current);
  if (!res.ok) return { ok: false, state: match, reason: res.reason, error: res.error };

  const next: MatchState = { ...match, hand: res.state };
  if (current.winner === null && res.state.winner !== null) {
    const booked = onHandComplete(next, res.state.winner);
    return accept(booked.state, [...res.events, ...booked.events]);
  }
  return accept(next, res.events);
}

export function performCut(match: MatchState): CommandResult<MatchState> {
  const rng = mulberry32(deriveSeed(match.seed, match.handNo, SEED_STREAMS.cut));
  return withHand(match, (h) => hand.performCut(h, rng));
}

export function selectTrumpRank(match: MatchState, rank: number): CommandResult<MatchState> {
  return withHand(match, (h) => hand.selectTrumpRank(h, rank));
}

export function selectTrumpSuit(match: MatchState, suit: string): CommandResult<MatchState> {
  return withHand(match, (h) => hand.selectTrumpSuit(h, suit));
}

export function playCard(match: MatchState, seat: Seat, card: Card): CommandResult<MatchState> {
  return withHand(match, (h) => hand.playCard(h, seat, card));
}

// Still accepted after the match is decided, so the last trick can be cleared.
export function completeTrick(match: MatchState): CommandResult<MatchState> {
  return withHand(match, (h) => hand.completeTrick(h), true);
}
