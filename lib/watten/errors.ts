export type WattenFailureCode =
  | 'deck.empty'
  | 'deck.insufficient_cards'
  | 'play.illegal'
  | 'phase.invalid_action';

export type WattenFailure = {
  code: WattenFailureCode;
  reason: string;
  details?: unknown;
};

export type WattenError = Error & { info: WattenFailure };

const ERROR_NAMES: Record<WattenFailureCode, string> = {
  'deck.empty': 'EmptyDeck',
  'deck.insufficient_cards': 'InsufficientCards',
  'play.illegal': 'IllegalPlay',
  'phase.invalid_action': 'InvalidPhaseAction',
};

export function wattenError(
  code: WattenFailureCode,
  reason: string,
  details?: unknown,
): WattenError {
  const name = ERROR_NAMES[code];
  const info: WattenFailure = details === undefined ? { code, reason } : { code, reason, details };
  return Object.assign(new Error(`${name}: ${reason}`), { name, info });
}

export function isWattenError(error: unknown, code?: WattenFailureCode): error is WattenError {
  if (!(error instanceof Error) || !('info' in error)) return false;
  const info = error.info;
  if (typeof info !== 'object' || info === null || !('code' in info)) return false;
  const found = info.code;
  if (typeof found !== 'string' || !(found in ERROR_NAMES)) return false;
  return code === undefined || found === code;
}
