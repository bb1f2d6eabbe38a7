// src/constants/constants.ts

/**
 * Wire framing
 */
export const WIRE = {
  /** Separates commands on the way out and closes each reply on the way back */
  DELIMITER: ';',
  /** Terminates an outbound frame */
  TERMINATOR: '\r',
  /** Trails every reply batch */
  END_MARKER: '\r\n',
  /** Returned in place of a normal reply when a command fails */
  ERROR_SENTINEL: '??',
} as const;

/**
 * Frame memory
 */
export const FRAME = {
  /** Number of frame slots; valid indices are 0..MAX_NUM-1 */
  MAX_NUM: 8191,
  /** Largest FC value that is not the forever sentinel */
  MAX_LOOPS: 65534,
  /** FC value that loops until FRAME OFF */
  FOREVER: 65535,
  /** FR replies meaning playback is over */
  TERMINAL_STATES: ['OFF', 'DONE'],
  /** FR replies meaning playback is running (besides a frame number) */
  RUNNING_STATES: ['GO', 'ON', 'RUN'],
} as const;

/**
 * Train mode
 */
export const TRAIN = {
  /** Spacing register resolution, ns */
  TICK_NS: 20,
  /** Channels with a shorter delay are left out of the train */
  MIN_DELAY_NS: 20,
  /** Added to the first-rise to last-fall window */
  GUARD_NS: 80,
  MAX_SPACING_NS: 10_000_000_000,
  MAX_PULSES: 2 ** 32,
} as const;

/**
 * Timing synthesizer
 */
export const SYNTH = {
  MAX_FREQUENCY_HZ: 16_000_000,
  DEFAULT_FREQUENCY_HZ: 16_000_000,
} as const;

export const AUTOINSTALL_CODES = {
  off: 0,
  install: 1,
  queue: 2,
} as const;

/**
 * Device error bits. Bit n of the error word selects entry n; the last entry
 * applies when the sentinel came back with no bit set.
 */
export const DEVICE_ERROR_MESSAGES = [
  'VCXO trim value lost',
  'saved setup recall failed',
  'calibration table lost; default cals are used',
  'internal logic error',
  'VCXO failed to lock to external source',
  'powerup DPLL calibration error',
  'DPLL stability error',
  'other error (likely something wrong with the command)',
] as const;

export const CHANNEL_IDS = ['A', 'B', 'C', 'D'] as const;
