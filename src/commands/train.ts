// src/commands/train.ts

import { TRAIN } from '../constants/constants.js';
import { PulseGenRangeError } from '../errors.js';

export const TRAIN_COUNT_COMMAND = 'TC';
export const TRAIN_SPACING_COMMAND = 'TS';

const MAX_SPACING_TICKS = TRAIN.MAX_SPACING_NS / TRAIN.TICK_NS;

/**
 * Maps a pulse count onto the TC register (count - 1).
 * @throws PulseGenRangeError outside [1, 2^32]
 */
export function encodeTrainCount(count: number): number {
  if (!Number.isInteger(count) || count < 1) {
    throw new PulseGenRangeError(`Train count must be a positive integer, got ${count}`);
  }
  if (count > TRAIN.MAX_PULSES) {
    throw new PulseGenRangeError(`Maximum number of pulses is 2^32, got ${count}`);
  }
  return count - 1;
}

export function decodeTrainCount(register: number): number {
  return register + 1;
}

export function buildTrainCountCommand(count: number): string {
  return `${TRAIN_COUNT_COMMAND} ${encodeTrainCount(count)}`;
}

/**
 * @throws PulseGenRangeError outside [1, 10 s / 20 ns]
 */
export function buildTrainSpacingCommand(ticks: number): string {
  if (!Number.isInteger(ticks) || ticks < 1 || ticks > MAX_SPACING_TICKS) {
    throw new PulseGenRangeError(
      `Train spacing must be 1..${MAX_SPACING_TICKS} ticks of ${TRAIN.TICK_NS} ns, got ${ticks}`
    );
  }
  return `${TRAIN_SPACING_COMMAND} ${ticks}`;
}
