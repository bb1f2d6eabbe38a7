// src/utils/units.ts

import { PulseGenInvalidArgumentError } from '../errors.js';
import {
  FrequencyInput,
  FrequencyUnit,
  PhysicalUnit,
  Quantity,
  QuantityNormalizer,
  TimeInput,
  TimeUnit,
} from '../types/pulsegen-types.js';

/** Size of one unit expressed in the base unit of its dimension */
const TIME_SCALE: Record<TimeUnit, number> = {
  s: 1e9,
  ms: 1e6,
  us: 1e3,
  ns: 1,
  ps: 1e-3,
};

const FREQUENCY_SCALE: Record<FrequencyUnit, number> = {
  Hz: 1,
  kHz: 1e3,
  MHz: 1e6,
  GHz: 1e9,
};

function isTimeUnit(unit: string): unit is TimeUnit {
  return Object.prototype.hasOwnProperty.call(TIME_SCALE, unit);
}

function isFrequencyUnit(unit: string): unit is FrequencyUnit {
  return Object.prototype.hasOwnProperty.call(FREQUENCY_SCALE, unit);
}

/**
 * Default normalizer: SI time units to nanoseconds, SI frequency units to hertz.
 */
export const normalizeQuantity: QuantityNormalizer = (magnitude, unit, target) => {
  if (unit === undefined) return magnitude;
  if (target === 'ns') {
    if (!isTimeUnit(unit)) throw new PulseGenInvalidArgumentError(unit, 'a time unit');
    return magnitude * TIME_SCALE[unit];
  }
  if (!isFrequencyUnit(unit)) throw new PulseGenInvalidArgumentError(unit, 'a frequency unit');
  return magnitude * FREQUENCY_SCALE[unit];
};

// Prefixed units are case-sensitive: "mHz" and "MHz", "ms" and "Ms" differ by 10^9
const UNIT_ALIASES: Record<string, PhysicalUnit> = {
  ms: 'ms',
  msec: 'ms',
  us: 'us',
  'µs': 'us',
  usec: 'us',
  ns: 'ns',
  nsec: 'ns',
  ps: 'ps',
  kHz: 'kHz',
  MHz: 'MHz',
  GHz: 'GHz',
};

// Unprefixed spellings, matched in any case
const FOLDED_UNIT_ALIASES: Record<string, PhysicalUnit> = {
  s: 's',
  sec: 's',
  hz: 'Hz',
};

function lookupUnit(text: string): PhysicalUnit | undefined {
  if (Object.prototype.hasOwnProperty.call(UNIT_ALIASES, text)) return UNIT_ALIASES[text];
  const folded = text.toLowerCase();
  if (Object.prototype.hasOwnProperty.call(FOLDED_UNIT_ALIASES, folded)) return FOLDED_UNIT_ALIASES[folded];
  return undefined;
}

const TAGGED_QUANTITY = /^([+-]?\d*\.?\d+(?:[eE][+-]?\d+)?)\s*([a-zA-Zµ]+)$/;

/**
 * Parses a unit-tagged string such as "500us" or "1.5 MHz".
 * Untagged strings are rejected; a bare number must be passed as a number.
 */
export function parseQuantity(text: string): Quantity {
  const match = text.trim().match(TAGGED_QUANTITY);
  if (!match || match[1] === undefined || match[2] === undefined) {
    throw new PulseGenInvalidArgumentError(text, 'a number followed by a unit, e.g. "500us"');
  }
  const unit = lookupUnit(match[2]);
  if (!unit) {
    throw new PulseGenInvalidArgumentError(match[2], 'one of s, ms, us, ns, ps, Hz, kHz, MHz, GHz');
  }
  return { magnitude: parseFloat(match[1]), unit };
}

function toQuantity(input: number | Quantity | string): { magnitude: number; unit?: PhysicalUnit } {
  if (typeof input === 'number') return { magnitude: input };
  if (typeof input === 'string') return parseQuantity(input);
  return input;
}

/**
 * Resolves any accepted time input to nanoseconds.
 */
export function toNanoseconds(
  input: TimeInput,
  normalizer: QuantityNormalizer = normalizeQuantity
): number {
  const { magnitude, unit } = toQuantity(input);
  if (!Number.isFinite(magnitude)) {
    throw new PulseGenInvalidArgumentError(input, 'a finite time');
  }
  return normalizer(magnitude, unit, 'ns');
}

/**
 * Resolves any accepted frequency input to hertz.
 */
export function toHertz(
  input: FrequencyInput,
  normalizer: QuantityNormalizer = normalizeQuantity
): number {
  const { magnitude, unit } = toQuantity(input);
  if (!Number.isFinite(magnitude)) {
    throw new PulseGenInvalidArgumentError(input, 'a finite frequency');
  }
  return normalizer(magnitude, unit, 'Hz');
}
