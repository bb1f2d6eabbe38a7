// src/commands/system.ts

import { AUTOINSTALL_CODES, SYNTH } from '../constants/constants.js';
import { PulseGenDecodeError, PulseGenInvalidArgumentError, PulseGenRangeError } from '../errors.js';
import { AutoinstallLike, AutoinstallMode } from '../types/pulsegen-types.js';
import { toFixedArg } from '../utils/utils.js';
import { parseIntegerReply } from './reply.js';

export const VERBOSE_OFF_COMMAND = 'VE 0';
export const AUTOINSTALL_COMMAND = 'AU';
export const TRIGGER_SYNTH_COMMAND = 'TR SY';
export const TRIGGER_REMOTE_COMMAND = 'TR RE';
export const FIRE_COMMAND = 'FI';
export const INSTALL_COMMAND = 'IN';
export const SAVE_COMMAND = 'SA';
export const RECALL_COMMAND = 'RE';
export const STATUS_COMMAND = 'STATUS';
export const CLOCK_COMMAND = 'CL';
export const CLOCK_OUT_COMMAND = 'CL OU';
export const CLOCK_IN_COMMAND = 'CL IN';

/**
 * @throws PulseGenInvalidArgumentError for anything but off/install/queue or 0/1/2
 */
export function normalizeAutoinstall(mode: AutoinstallLike): AutoinstallMode {
  switch (mode) {
    case 0:
    case 'off':
      return 'off';
    case 1:
    case 'install':
      return 'install';
    case 2:
    case 'queue':
      return 'queue';
    default:
      throw new PulseGenInvalidArgumentError(mode, 'autoinstall 0/off, 1/install or 2/queue');
  }
}

export function buildAutoinstallCommand(mode: AutoinstallLike): string {
  return `${AUTOINSTALL_COMMAND} ${AUTOINSTALL_CODES[normalizeAutoinstall(mode)]}`;
}

const AUTOINSTALL_BY_CODE: readonly AutoinstallMode[] = ['off', 'install', 'queue'];

export function parseAutoinstallResponse(reply: string): AutoinstallMode {
  const code = parseIntegerReply(AUTOINSTALL_COMMAND, reply);
  const mode = AUTOINSTALL_BY_CODE[code];
  if (!mode) {
    throw new PulseGenDecodeError(AUTOINSTALL_COMMAND, reply, 'autoinstall code 0, 1 or 2');
  }
  return mode;
}

/**
 * @throws PulseGenRangeError outside (0, 16 MHz]
 */
export function validateFrequency(hz: number): void {
  if (!Number.isFinite(hz) || hz <= 0 || hz > SYNTH.MAX_FREQUENCY_HZ) {
    throw new PulseGenRangeError(
      `Frequency must be in (0, ${SYNTH.MAX_FREQUENCY_HZ}] Hz, got ${hz} Hz`
    );
  }
}

export function buildSynthFrequencyCommand(hz: number): string {
  validateFrequency(hz);
  return `SY ${toFixedArg(hz)}`;
}

export function buildTriggerLevelCommand(volts: number): string {
  if (!Number.isFinite(volts)) {
    throw new PulseGenInvalidArgumentError(volts, 'a finite trigger level in volts');
  }
  return `TLEVEL ${volts}`;
}
