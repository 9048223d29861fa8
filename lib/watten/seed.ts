// Random streams drawn per hand: the deal shuffle and the cut.
export const SEED_STREAMS = {
  shuffle: 0,
  cut: 1,
} as const;

const HAND_SALT = 0x9e3779b9;
const STREAM_SALT = 0x85ebca6b;

const salted = (value: number, salt: number) => ((Math.floor(value) + 1) * salt) >>> 0;

// 32-bit avalanche so neighbouring hands land far apart.
function avalanche(x: number): number {
  let h = x >>> 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x7feb352d) >>> 0;
  h ^= h >>> 15;
  h = Math.imul(h, 0x846ca68b) >>> 0;
  h ^= h >>> 16;
  return h >>> 0;
}

/**
 * Seed for one stream of one hand of a match. The same match seed replays every deal and cut;
 * the result is an unsigned 32-bit integer for `mulberry32`.
 */
export function deriveSeed(matchSeed: number, handNo: number, stream = 0): number {
  const hand = (Math.floor(matchSeed) >>> 0) ^ salted(handNo, HAND_SALT);
  return avalanche(hand ^ salted(stream, STREAM_SALT));
}
