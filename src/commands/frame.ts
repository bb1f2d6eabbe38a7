// src/commands/frame.ts

import { FRAME, WIRE } from '../constants/constants.js';
import { PulseGenDecodeError, PulseGenDeviceRejectedError, PulseGenRangeError } from '../errors.js';
import { FrameStateMode } from '../types/pulsegen-types.js';

export const FRAME_FIRST_COMMAND = 'FA';
export const FRAME_LAST_COMMAND = 'FB';
export const FRAME_LOOPS_COMMAND = 'FC';
export const FRAME_STATE_COMMAND = 'FR';
export const FRAME_START_COMMAND = 'FR GO';
export const FRAME_STOP_COMMAND = 'FR OF';
export const FRAME_RESET_COMMAND = 'RZ';

/**
 * Validates a frame slot index
 * @throws PulseGenRangeError outside [0, FRAME.MAX_NUM)
 */
export function validateFrameIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= FRAME.MAX_NUM) {
    throw new PulseGenRangeError(
      `Frame index must be an integer in [0, ${FRAME.MAX_NUM - 1}], got ${index}`
    );
  }
}

export function buildFrameFirstCommand(index: number): string {
  validateFrameIndex(index);
  return `${FRAME_FIRST_COMMAND} ${index}`;
}

export function buildFrameLastCommand(index: number): string {
  validateFrameIndex(index);
  return `${FRAME_LAST_COMMAND} ${index}`;
}

/** Stores the active configuration into frame `index` */
export function buildFrameStoreCommand(index: number): string {
  validateFrameIndex(index);
  return `${FRAME_STATE_COMMAND} ${index}`;
}

/**
 * Maps the visible loop count onto the FC register. FRAME GO plays the
 * frames FC+1 times, so n loops is FC n-1; 0 (forever) is the sentinel.
 * @throws PulseGenRangeError outside [0, FRAME.MAX_LOOPS + 1]
 */
export function encodeLoopCount(loops: number): number {
  if (!Number.isInteger(loops) || loops < 0) {
    throw new PulseGenRangeError(`The number of loops must be a non-negative integer, got ${loops}`);
  }
  if (loops > FRAME.MAX_LOOPS + 1) {
    throw new PulseGenRangeError(`The device can loop at most ${FRAME.MAX_LOOPS + 1} times, got ${loops}`);
  }
  return loops === 0 ? FRAME.FOREVER : loops - 1;
}

export function decodeLoopCount(register: number): number {
  return register === FRAME.FOREVER ? 0 : register + 1;
}

export function buildFrameLoopsCommand(loops: number): string {
  return `${FRAME_LOOPS_COMMAND} ${encodeLoopCount(loops)}`;
}

/**
 * Classifies a FR reply.
 * @returns true while frames are still playing
 * @throws PulseGenDeviceRejectedError for the error sentinel
 * @throws PulseGenDecodeError for an unrecognised token in strict mode
 */
export function parseFrameStateResponse(
  reply: string,
  mode: FrameStateMode = 'lenient'
): { looping: boolean; recognised: boolean } {
  const token = reply.trim().toUpperCase();
  if (token === WIRE.ERROR_SENTINEL) {
    throw new PulseGenDeviceRejectedError(FRAME_STATE_COMMAND, token);
  }
  if ((FRAME.TERMINAL_STATES as readonly string[]).includes(token)) {
    return { looping: false, recognised: true };
  }
  const recognised =
    (FRAME.RUNNING_STATES as readonly string[]).includes(token) || /^\d+$/.test(token);
  if (!recognised && mode === 'strict') {
    throw new PulseGenDecodeError(FRAME_STATE_COMMAND, reply, 'OFF, DONE, GO, ON, RUN or a frame number');
  }
  return { looping: true, recognised };
}
