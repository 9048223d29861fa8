import type {
  Card,
  CompletedTrick,
  CutOutcome,
  Hands,
  Phase,
  Seat,
  Suit,
  Team,
  TeamTally,
  TrickPlay,
  TrumpRank,
  WattenOptions,
} from './types';
import type { WattenError } from './errors';
import type { KnownWattenEvent, WattenEventListener } from './events';
import type { CommandResult } from './command';
import { accept, reject } from './command';
import * as hand from './hand';
import * as match from './match';
import type { MatchState } from './match';
import { applyBotAction, computeBotAction } from './engine';
import { legalCards } from './rules';
import { validateEventStrict } from './validation';
import { resolveMatchConfig, type MatchConfigInput } from '@/config/options';
import { withSpanSync, type SpanAttributesInput } from '@/lib/observability/spans';
import { logException } from '@/lib/observability/log';

export type SessionConfig = MatchConfigInput;

export type SessionResult =
  | Readonly<{ ok: true; events: KnownWattenEvent[] }>
  | Readonly<{ ok: false; reason: string; error: WattenError }>;

// `not_started` until the first hand is dealt.
export type SessionPhase = Phase | 'not_started';

export type WattenSession = {
  // queries
  getState: () => MatchState;
  options: () => WattenOptions;
  currentPhase: () => SessionPhase;
  hands: () => Hands;
  trickSoFar: () => readonly TrickPlay[];
  completedTricks: () => readonly CompletedTrick[];
  trumpRank: () => TrumpRank | null;
  trumpSuit: () => Suit | null;
  scores: () => TeamTally;
  tricksWonThisHand: () => TeamTally;
  dealerSeat: () => Seat | null;
  currentPlayerSeat: () => Seat | null;
  actingSeat: () => Seat | null;
  cutOutcome: () => CutOutcome | null;
  handNumber: () => number;
  isHandOver: () => boolean;
  isMatchOver: () => boolean;
  winner: () => Team | null;
  isHumanSeat: (seat: Seat) => boolean;
  isBotTurn: () => boolean;
  legalCardsFor: (seat: Seat) => readonly Card[];
  // commands
  startMatch: () => SessionResult;
  performCut: () => SessionResult;
  selectTrumpRank: (rank: number) => SessionResult;
  selectTrumpSuit: (suit: string) => SessionResult;
  playCard: (seat: Seat, card: Card) => SessionResult;
  completeTrick: () => SessionResult;
  startNextHand: () => SessionResult;
  runBotTurn: () => SessionResult;
  resetMatch: (next?: SessionConfig) => SessionResult;
  subscribe: (listener: WattenEventListener) => () => void;
};

const NO_HANDS: Hands = { 1: [], 2: [], 3: [], 4: [] };
const NO_TRICKS: TeamTally = { A: 0, B: 0 };

export function createSession(input: SessionConfig = {}): WattenSession {
  let config = resolveMatchConfig(input);
  let humanSeats = new Set<Seat>(config.humanSeats);
  let state: MatchState = match.createMatch(config);
  const listeners = new Set<WattenEventListener>();

  const current = () => state.hand;

  function notify(emitted: readonly KnownWattenEvent[]) {
    for (const event of emitted) {
      for (const listener of listeners) {
        try {
          listener(event);
        } catch (error) {
          logException(error, { source: 'watten.session.listener', event: event.type });
        }
      }
    }
  }

  function run(
    command: string,
    attributes: SpanAttributesInput,
    step: (m: MatchState) => CommandResult<MatchState>,
  ): SessionResult {
    return withSpanSync<SessionResult>(
      `watten.${command}`,
      { handNo: state.handNo, phase: current()?.phase ?? 'not_started', ...attributes },
      (span) => {
        const res = step(state);
        if (!res.ok) {
          span?.setAttribute('watten.rejected', res.reason);
          return { ok: false, reason: res.reason, error: res.error };
        }
        const emitted = res.events.map((e) => validateEventStrict(e));
        state = res.state;
        notify(emitted);
        return { ok: true, events: emitted };
      },
    );
  }

  function isBotTurn() {
    const h = current();
    const seat = h ? hand.actingSeat(h) : null;
    return !state.winner && seat !== null && !humanSeats.has(seat);
  }

  function runBotTurn(): SessionResult {
    return run('runBotTurn', {}, (m) => {
      if (!isBotTurn()) return reject(m, 'phase.invalid_action', 'not-bot-turn');
      const action = computeBotAction(m);
      if (!action) return reject(m, 'phase.invalid_action', 'no-bot-action');
      return applyBotAction(m, action);
    });
  }

  // Only between hands: before the first deal, after a hand is complete, or once the match is over.
  function resetMatch(next?: SessionConfig): SessionResult {
    return run('resetMatch', {}, (m) => {
      const h = m.hand;
      if (h && h.phase !== 'hand_complete' && !m.winner) {
        return reject(m, 'phase.invalid_action', 'hand-in-progress', { phase: h.phase });
      }
      if (next) {
        config = resolveMatchConfig(next);
        humanSeats = new Set<Seat>(config.humanSeats);
      }
      return accept(match.createMatch(config));
    });
  }

  return {
    getState: () => state,
    options: () => state.options,
    currentPhase: () => current()?.phase ?? 'not_started',
    hands: () => current()?.hands ?? NO_HANDS,
    trickSoFar: () => current()?.trick ?? [],
    completedTricks: () => current()?.completedTricks ?? [],
    trumpRank: () => current()?.trumpRank ?? null,
    trumpSuit: () => current()?.trumpSuit ?? null,
    scores: () => state.scores,
    tricksWonThisHand: () => current()?.tricksWon ?? NO_TRICKS,
    dealerSeat: () => current()?.dealer ?? null,
    currentPlayerSeat: () => current()?.currentPlayer ?? null,
    actingSeat: () => {
      const h = current();
      return h ? hand.actingSeat(h) : null;
    },
    cutOutcome: () => current()?.cut ?? null,
    handNumber: () => state.handNo,
    isHandOver: () => {
      const h = current();
      return h ? hand.isHandOver(h) : false;
    },
    isMatchOver: () => match.isMatchOver(state),
    winner: () => match.winnerOf(state),
    isHumanSeat: (seat) => humanSeats.has(seat),
    isBotTurn,
    legalCardsFor: (seat) => {
      const h = current();
      const ctx = h && h.phase === 'playing' ? hand.playContextOf(h) : null;
      return h && ctx ? legalCards(seat, h.hands, h.trick, ctx) : [];
    },
    startMatch: () => run('startMatch', {}, match.startMatch),
    performCut: () => run('performCut', {}, match.performCut),
    selectTrumpRank: (rank) =>
      run('selectTrumpRank', { rank }, (m) => match.selectTrumpRank(m, rank)),
    selectTrumpSuit: (suit) =>
      run('selectTrumpSuit', { suit }, (m) => match.selectTrumpSuit(m, suit)),
    playCard: (seat, card) =>
      run('playCard', { seat, suit: card.suit, rank: card.rank }, (m) =>
        match.playCard(m, seat, card),
      ),
    completeTrick: () => run('completeTrick', {}, match.completeTrick),
    startNextHand: () => run('startNextHand', {}, match.startNextHand),
    runBotTurn,
    resetMatch,
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
