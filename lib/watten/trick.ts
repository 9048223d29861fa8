import type { Card, Seat, TrickPlay, TrumpContext } from './types';
import { getCardScore, leadSuitOf } from './rules';

export type WinningPlay = Readonly<{ seat: Seat; card: Card; score: number }>;

// Arg-max over a full or partial trick; the earlier play keeps a tie.
export function winningPlayOf(
  plays: ReadonlyArray<TrickPlay>,
  ctx: TrumpContext,
): WinningPlay | undefined {
  const lead = leadSuitOf(plays, ctx.useCriticals);
  let best: WinningPlay | undefined;
  for (const p of plays) {
    const score = getCardScore(p.card, ctx, lead);
    if (!best || score > best.score) best = { seat: p.seat, card: p.card, score };
  }
  return best;
}

export function winnerOfTrick(
  plays: ReadonlyArray<TrickPlay>,
  ctx: TrumpContext,
): Seat | undefined {
  return winningPlayOf(plays, ctx)?.seat;
}
