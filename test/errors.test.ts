import { describe, it, expect } from 'vitest';
import {
  NodeSerialReadError,
  PulseGenDecodeError,
  PulseGenDeviceRejectedError,
  PulseGenError,
  PulseGenFramingError,
  PulseGenTransportError,
  decodeDeviceErrorBits,
} from '../src/errors.js';
import { assertAccepted } from '../src/commands/reply.js';

const CATCH_ALL = 'other error (likely something wrong with the command)';

describe('decodeDeviceErrorBits', () => {
  it('falls back to the catch-all without an error word', () => {
    expect(decodeDeviceErrorBits()).toEqual([CATCH_ALL]);
    expect(decodeDeviceErrorBits(0)).toEqual([CATCH_ALL]);
  });

  it('lists one message per set bit', () => {
    expect(decodeDeviceErrorBits(0b101)).toEqual([
      'VCXO trim value lost',
      'calibration table lost; default cals are used',
    ]);
    expect(decodeDeviceErrorBits(1 << 6)).toEqual(['DPLL stability error']);
  });
});

describe('error taxonomy', () => {
  it('describes a rejected command', () => {
    const err = new PulseGenDeviceRejectedError('AD 5', '??');
    expect(err.message).toBe(`Device rejected "AD 5" (??): ${CATCH_ALL}`);
    expect(err.name).toBe('PulseGenDeviceRejectedError');
    expect(err.command).toBe('AD 5');
    expect(err.errorBits).toBeUndefined();
    expect(err).toBeInstanceOf(PulseGenError);
  });

  it('carries decoded explanations for an error word', () => {
    const err = new PulseGenDeviceRejectedError('RE', '??', 0b10);
    expect(err.explanations).toEqual(['saved setup recall failed']);
  });

  it('leaves the error word unset for a plain sentinel reply', () => {
    let caught: unknown;
    try {
      assertAccepted('AW 5', '??');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PulseGenDeviceRejectedError);
    if (!(caught instanceof PulseGenDeviceRejectedError)) return;
    expect(caught.errorBits).toBeUndefined();
    expect(caught.explanations).toEqual([CATCH_ALL]);
  });

  it('groups transport failures under PulseGenTransportError', () => {
    expect(new PulseGenFramingError()).toBeInstanceOf(PulseGenTransportError);
    expect(new PulseGenDecodeError('FA', 'x', 'an integer')).toBeInstanceOf(PulseGenTransportError);
    expect(new NodeSerialReadError('Port closed')).toBeInstanceOf(PulseGenTransportError);
  });
});
