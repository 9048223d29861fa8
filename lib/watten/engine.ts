import type { Card, Seat, Suit, TrumpRank } from './types';
import { actingSeat, playContextOf } from './hand';
import * as match from './match';
import type { MatchState } from './match';
import type { CommandResult } from './command';
import * as bots from './bots/simple';

export type BotAction =
  | Readonly<{ kind: 'cut'; seat: Seat }>
  | Readonly<{ kind: 'rank'; seat: Seat; rank: TrumpRank }>
  | Readonly<{ kind: 'suit'; seat: Seat; suit: Suit }>
  | Readonly<{ kind: 'play'; seat: Seat; card: Card }>;

// What the acting seat's bot would do now; null when nobody has to act or `only` is not up.
export function computeBotAction(state: MatchState, only?: Seat): BotAction | null {
  if (state.winner) return null;
  const h = state.hand;
  const seat = h ? actingSeat(h) : null;
  if (!h || seat === null || (only !== undefined && only !== seat)) return null;
  switch (h.phase) {
    case 'cutting':
      return { kind: 'cut', seat };
    case 'selecting_rank':
      return { kind: 'rank', seat, rank: bots.botChooseRank(h.hands[seat]) };
    case 'selecting_suit':
      return { kind: 'suit', seat, suit: bots.botChooseSuit(h.hands[seat]) };
    case 'playing': {
      const play = playContextOf(h);
      if (!play || h.hands[seat].length === 0) return null;
      return {
        kind: 'play',
        seat,
        card: bots.botPlay({ seat, hands: h.hands, trick: h.trick, play }),
      };
    }
    default:
      return null;
  }
}

export function applyBotAction(state: MatchState, action: BotAction): CommandResult<MatchState> {
  switch (action.kind) {
    case 'cut':
      return match.performCut(state);
    case 'rank':
      return match.selectTrumpRank(state, action.rank);
    case 'suit':
      return match.selectTrumpSuit(state, action.suit);
    case 'play':
      return match.playCard(state, action.seat, action.card);
  }
}
