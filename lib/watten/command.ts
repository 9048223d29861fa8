import { wattenError, type WattenError, type WattenFailureCode } from './errors';
import type { KnownWattenEvent } from './events';

export type CommandOk<S> = Readonly<{ ok: true; state: S; events: KnownWattenEvent[] }>;

// A rejected command hands back the state it was given, untouched.
export type CommandRejected<S> = Readonly<{
  ok: false;
  state: S;
  reason: string;
  error: WattenError;
}>;

export type CommandResult<S> = CommandOk<S> | CommandRejected<S>;

export function accept<S>(state: S, events: KnownWattenEvent[] = []): CommandOk<S> {
  return { ok: true, state, events };
}

export function reject<S>(
  state: S,
  code: WattenFailureCode,
  reason: string,
  details?: unknown,
): CommandRejected<S> {
  return { ok: false, state, reason, error: wattenError(code, reason, details) };
}
