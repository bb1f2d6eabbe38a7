import { describe, it, expect } from 'vitest';
import { normalizeQuantity, parseQuantity, toHertz, toNanoseconds } from '../src/utils/units.js';
import { PulseGenInvalidArgumentError } from '../src/errors.js';
import { QuantityNormalizer } from '../src/types/pulsegen-types.js';

describe('toNanoseconds', () => {
  it('takes bare numbers as nanoseconds', () => {
    expect(toNanoseconds(250)).toBe(250);
  });

  it('converts tagged strings and quantities', () => {
    expect(toNanoseconds('500us')).toBe(500_000);
    expect(toNanoseconds('2 ns')).toBe(2);
    expect(toNanoseconds('1 µs')).toBe(1000);
    expect(toNanoseconds('3 msec')).toBe(3_000_000);
    expect(toNanoseconds({ magnitude: 1.5, unit: 'ms' })).toBe(1_500_000);
    expect(toNanoseconds({ magnitude: 2, unit: 's' })).toBe(2e9);
  });

  it('rejects untagged strings and unknown units', () => {
    expect(() => toNanoseconds('fast')).toThrow(PulseGenInvalidArgumentError);
    expect(() => toNanoseconds('250')).toThrow(PulseGenInvalidArgumentError);
    expect(() => toNanoseconds('5 furlongs')).toThrow(PulseGenInvalidArgumentError);
  });

  it('rejects a frequency where a time is expected', () => {
    expect(() => toNanoseconds('1 MHz')).toThrow('expected a time unit');
  });

  it('rejects non-finite magnitudes', () => {
    expect(() => toNanoseconds(Number.NaN)).toThrow(PulseGenInvalidArgumentError);
    expect(() => toNanoseconds(Number.POSITIVE_INFINITY)).toThrow(PulseGenInvalidArgumentError);
  });

  it('hands conversion to an injected normalizer', () => {
    const calls: unknown[][] = [];
    const normalizer: QuantityNormalizer = (magnitude, unit, target) => {
      calls.push([magnitude, unit, target]);
      return magnitude * 7;
    };
    expect(toNanoseconds('3 us', normalizer)).toBe(21);
    expect(calls).toEqual([[3, 'us', 'ns']]);
  });
});

describe('toHertz', () => {
  it('converts frequency units', () => {
    expect(toHertz(1000)).toBe(1000);
    expect(toHertz('1.5 MHz')).toBe(1_500_000);
    expect(toHertz('10kHz')).toBe(10_000);
    expect(toHertz({ magnitude: 2, unit: 'MHz' })).toBe(2_000_000);
  });

  it('rejects a time where a frequency is expected', () => {
    expect(() => toHertz('5 ns')).toThrow(PulseGenInvalidArgumentError);
  });
});

describe('parseQuantity', () => {
  it('splits magnitude and canonical unit', () => {
    expect(parseQuantity('1e3 ns')).toEqual({ magnitude: 1000, unit: 'ns' });
    expect(parseQuantity(' .5GHz ')).toEqual({ magnitude: 0.5, unit: 'GHz' });
  });

  it('matches unprefixed units in any case', () => {
    expect(parseQuantity('2 S')).toEqual({ magnitude: 2, unit: 's' });
    expect(parseQuantity('3 SEC')).toEqual({ magnitude: 3, unit: 's' });
    expect(parseQuantity('50 hz')).toEqual({ magnitude: 50, unit: 'Hz' });
    expect(parseQuantity('50 HZ')).toEqual({ magnitude: 50, unit: 'Hz' });
  });

  it('keeps the case of SI prefixes', () => {
    expect(() => parseQuantity('1 mHz')).toThrow(PulseGenInvalidArgumentError);
    expect(() => parseQuantity('1 Ms')).toThrow(PulseGenInvalidArgumentError);
    expect(() => parseQuantity('1 mhz')).toThrow(PulseGenInvalidArgumentError);
    expect(() => parseQuantity('1 NS')).toThrow(PulseGenInvalidArgumentError);
    expect(() => toHertz('1 mHz')).toThrow(PulseGenInvalidArgumentError);
    expect(() => toNanoseconds('1 Ms')).toThrow(PulseGenInvalidArgumentError);
  });
});

describe('normalizeQuantity', () => {
  it('passes untagged magnitudes through', () => {
    expect(normalizeQuantity(42, undefined, 'ns')).toBe(42);
    expect(normalizeQuantity(42, undefined, 'Hz')).toBe(42);
  });
});
