import { describe, it, expect, vi } from 'vitest';
import {
  createSession,
  isWattenError,
  type KnownWattenEvent,
  type SessionResult,
  type WattenSession,
} from '@/lib/watten';
import { setTelemetryAdapter } from '@/lib/observability/log';

function expectOk(res: SessionResult): KnownWattenEvent[] {
  if (!res.ok) throw new Error(`unexpected rejection: ${res.reason}`);
  return res.events;
}

const advance = (session: WattenSession) =>
  session.currentPhase() === 'trick_complete' ? session.completeTrick() : session.runBotTurn();

// Advances until seat 1 (human) has to act or the hand is won.
function runBots(session: WattenSession) {
  for (let i = 0; i < 100 && !session.isHandOver(); i++) {
    const phase = session.currentPhase();
    if (phase === 'trick_complete') {
      expectOk(session.completeTrick());
    } else if (session.isBotTurn()) {
      expectOk(session.runBotTurn());
    } else {
      return;
    }
  }
}

describe('watten session', () => {
  it('exposes an empty table before the match starts', () => {
    const session = createSession({ seed: 42 });
    expect(session.currentPhase()).toBe('not_started');
    expect(session.hands()).toEqual({ 1: [], 2: [], 3: [], 4: [] });
    expect(session.scores()).toEqual({ A: 0, B: 0 });
    expect(session.dealerSeat()).toBeNull();
    expect(session.actingSeat()).toBeNull();
    expect(session.isBotTurn()).toBe(false);
    expect(session.legalCardsFor(1)).toEqual([]);
    expect(session.handNumber()).toBe(0);
    expect(session.options()).toEqual({ useCriticals: true, useSchleck: true, useBlind: false });
  });

  it('runs the setup phases with the bots and the human dealer', () => {
    const session = createSession({ seed: 42 });
    const seen: string[] = [];
    const unsubscribe = session.subscribe((e) => seen.push(e.type));

    expect(expectOk(session.startMatch()).map((e) => e.type)).toEqual(['hand/started']);
    expect(session.currentPhase()).toBe('cutting');
    expect(session.dealerSeat()).toBe(1);
    expect(session.actingSeat()).toBe(2);
    expect(session.isBotTurn()).toBe(true);

    expectOk(session.runBotTurn());
    expect(session.cutOutcome()?.seat).toBe(2);
    expect(session.currentPhase()).toBe('selecting_rank');

    expectOk(session.runBotTurn());
    expect(session.trumpRank()).not.toBeNull();
    expect(session.currentPhase()).toBe('selecting_suit');
    expect(session.actingSeat()).toBe(1);
    expect(session.isBotTurn()).toBe(false);

    const notBot = session.runBotTurn();
    expect(notBot.ok).toBe(false);
    if (!notBot.ok) {
      expect(notBot.reason).toBe('not-bot-turn');
      expect(isWattenError(notBot.error, 'phase.invalid_action')).toBe(true);
    }

    const badSuit = session.selectTrumpSuit('stars');
    expect(badSuit.ok).toBe(false);
    if (!badSuit.ok) expect(badSuit.error.info.code).toBe('phase.invalid_action');

    expectOk(session.selectTrumpSuit('hearts'));
    expect(session.trumpSuit()).toBe('hearts');
    expect(session.currentPhase()).toBe('playing');
    expect(session.currentPlayerSeat()).toBe(2);

    const [mine] = session.hands()[1];
    if (!mine) throw new Error('seat 1 holds no cards');
    const early = session.playCard(1, mine);
    expect(early.ok).toBe(false);
    if (!early.ok) expect(early.reason).toBe('not-your-turn');

    expect(seen).toEqual([
      'hand/started',
      'cut/revealed',
      'trump/rank-chosen',
      'trump/suit-chosen',
    ]);
    unsubscribe();
    expectOk(session.runBotTurn());
    expect(seen).toHaveLength(4);
  });

  it('plays a whole hand with the human following the legal cards', () => {
    const session = createSession({ seed: 7 });
    const log: KnownWattenEvent[] = [];
    session.subscribe((e) => log.push(e));
    expectOk(session.startMatch());

    for (let turn = 0; turn < 60 && !session.isHandOver(); turn++) {
      runBots(session);
      if (session.isHandOver()) break;
      const phase = session.currentPhase();
      if (phase === 'selecting_suit') {
        expectOk(session.selectTrumpSuit('clubs'));
      } else if (phase === 'selecting_rank') {
        expectOk(session.selectTrumpRank(9));
      } else if (phase === 'playing') {
        const [card] = session.legalCardsFor(1);
        if (!card) throw new Error('human has no legal card');
        expectOk(session.playCard(1, card));
      }
    }

    expect(session.isHandOver()).toBe(true);
    const tricks = session.tricksWonThisHand();
    expect(Math.max(tricks.A, tricks.B)).toBe(3);
    expect(session.scores().A + session.scores().B).toBe(2);

    const resolved = log.filter((e) => e.type === 'hand/resolved');
    expect(resolved).toHaveLength(1);
    expect(log.filter((e) => e.type === 'trick/resolved')).toHaveLength(tricks.A + tricks.B);

    expect(session.currentPhase()).toBe('trick_complete');
    expectOk(session.completeTrick());
    expect(session.currentPhase()).toBe('hand_complete');
    expect(session.completedTricks()).toHaveLength(tricks.A + tricks.B);
    expect(session.trickSoFar()).toEqual([]);

    expectOk(session.startNextHand());
    expect(session.handNumber()).toBe(2);
    expect(session.dealerSeat()).toBe(2);
  });

  it('reports a throwing subscriber and keeps notifying the others', () => {
    const recordException = vi.fn();
    setTelemetryAdapter({ addAction: vi.fn(), recordException });
    const session = createSession({ seed: 3 });
    const boom = new Error('subscriber failed');
    session.subscribe(() => {
      throw boom;
    });
    const received: string[] = [];
    session.subscribe((e) => received.push(e.type));

    expectOk(session.startMatch());

    expect(received).toEqual(['hand/started']);
    expect(recordException).toHaveBeenCalledWith(boom, {
      source: 'watten.session.listener',
      event: 'hand/started',
    });
  });

  it('resets only between hands', () => {
    const session = createSession({ seed: 11, humanSeats: [] });
    expectOk(session.resetMatch());
    expectOk(session.startMatch());
    expectOk(session.runBotTurn());

    const refused = session.resetMatch();
    expect(refused.ok).toBe(false);
    if (!refused.ok) expect(refused.reason).toBe('hand-in-progress');

    while (session.currentPhase() !== 'hand_complete') {
      expectOk(advance(session));
    }
    expect(session.scores().A + session.scores().B).toBe(2);

    expect(expectOk(session.resetMatch({ seed: 12, humanSeats: [3] }))).toEqual([]);
    expect(session.currentPhase()).toBe('not_started');
    expect(session.scores()).toEqual({ A: 0, B: 0 });
    expect(session.handNumber()).toBe(0);
    expect(session.isHumanSeat(3)).toBe(true);
    expect(session.isHumanSeat(1)).toBe(false);
  });

  it('replays the same match for the same seed', () => {
    const strip = (e: KnownWattenEvent) => ({ type: e.type, payload: e.payload });
    const run = () => {
      const session = createSession({ seed: 2024, humanSeats: [] });
      const out: ReturnType<typeof strip>[] = [];
      session.subscribe((e) => out.push(strip(e)));
      expectOk(session.startMatch());
      for (let i = 0; i < 40 && session.currentPhase() !== 'hand_complete'; i++) {
        expectOk(advance(session));
      }
      return out;
    };
    expect(run()).toEqual(run());
  });
});
