export * from './types';
export * from './ordering';
export * from './deck';
export * from './rules';
export * from './trick';
export * from './phases';
export * from './errors';
export * from './events';
export * from './command';
export { deriveSeed, SEED_STREAMS } from './seed';
export { mulberry32 } from './rng';
export * as hand from './hand';
export * as match from './match';
export * as bots from './bots/simple';
export { computeBotAction, applyBotAction, type BotAction } from './engine';
export { validateEventStrict, type InvalidEventError } from './validation';
export {
  createSession,
  type WattenSession,
  type SessionConfig,
  type SessionResult,
  type SessionPhase,
} from './session';
