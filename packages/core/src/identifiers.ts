/**
 * Identifier generation: random words, UUIDs and timestamps
 */

import { formatTimestamp, systemClock, type Clock } from './clock.js';
import type { RandomSource } from './random.js';

/** Digits, then upper case, then lower case: 62 symbols */
export const ALPHANUMERIC = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';

export const DEFAULT_WORD_LENGTH = 8;

const UUID_TEMPLATE = 'xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx';

export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}-\d{6}$/;

/**
 * Draw `length` symbols uniformly from the alphanumeric alphabet
 */
export function randomWord(random: RandomSource, length: number = DEFAULT_WORD_LENGTH): string {
  let word = '';
  for (let i = 0; i < length; i++) {
    word += ALPHANUMERIC[random.nextInt(ALPHANUMERIC.length)];
  }
  return word;
}

/**
 * Version 4 layout. `x` is any hex digit, `y` is restricted to 8-b.
 */
export function uuid(random: RandomSource): string {
  return UUID_TEMPLATE.replace(/[xy]/g, (slot) => {
    const nibble = random.nextInt(16);
    return (slot === 'x' ? nibble : (nibble & 0x3) | 0x8).toString(16);
  });
}

/**
 * Current local time, microsecond resolution
 */
export function timestamp(clock: Clock = systemClock): string {
  return formatTimestamp(clock());
}

/**
 * One random source and one clock, shared by everything that names a folder
 * or a file during a run.
 */
export class IdentifierGenerator {
  constructor(
    readonly random: RandomSource,
    readonly clock: Clock = systemClock
  ) {}

  randomWord(length: number = DEFAULT_WORD_LENGTH): string {
    return randomWord(this.random, length);
  }

  uuid(): string {
    return uuid(this.random);
  }

  timestamp(): string {
    return timestamp(this.clock);
  }
}
