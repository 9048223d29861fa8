import type { Phase, WattenOptions } from './types';

export type SetupPhase = 'cutting' | 'selecting_rank' | 'selecting_suit';

/**
 * Setup phases a hand walks through before play, fixed once per hand.
 * Cutting only happens when both criticals and the cut are enabled.
 */
export function phasePlan(options: WattenOptions): readonly Phase[] {
  const cut: Phase[] = options.useCriticals && options.useSchleck ? ['cutting'] : [];
  return [...cut, 'selecting_rank', 'selecting_suit', 'playing'];
}

export function phaseAfter(plan: readonly Phase[], phase: SetupPhase): Phase {
  const next = plan[plan.indexOf(phase) + 1];
  if (!plan.includes(phase) || next === undefined) {
    throw new Error(`Phase ${phase} is not part of this hand's plan`);
  }
  return next;
}
