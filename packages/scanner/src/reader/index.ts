export { PositionTracker } from './position.js';
export type { Position } from './position.js';
export { EOF, RuneReader } from './rune-reader.js';
export type { Rune, RuneReaderOptions, RuneSource } from './rune-reader.js';
