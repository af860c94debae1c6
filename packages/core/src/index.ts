export { RandomSourceError, ClockError } from './errors.js';
export { SeededRandom, type RandomSource } from './random.js';
export { systemClock, formatTimestamp, type Clock } from './clock.js';
export {
  ALPHANUMERIC,
  DEFAULT_WORD_LENGTH,
  UUID_PATTERN,
  TIMESTAMP_PATTERN,
  randomWord,
  uuid,
  timestamp,
  IdentifierGenerator,
} from './identifiers.js';
