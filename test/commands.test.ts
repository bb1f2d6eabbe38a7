import { describe, it, expect } from 'vitest';
import {
  buildChannelDelayCommand,
  buildChannelEnableCommand,
  buildChannelPolarityCommand,
  buildChannelWidthCommand,
  parseChannelStatusResponse,
} from '../src/commands/channel.js';
import {
  buildFrameLoopsCommand,
  buildFrameStoreCommand,
  decodeLoopCount,
  encodeLoopCount,
  parseFrameStateResponse,
  validateFrameIndex,
} from '../src/commands/frame.js';
import { parseIntegerReply } from '../src/commands/reply.js';
import {
  buildAutoinstallCommand,
  buildSynthFrequencyCommand,
  buildTriggerLevelCommand,
  parseAutoinstallResponse,
} from '../src/commands/system.js';
import {
  buildTrainCountCommand,
  buildTrainSpacingCommand,
  decodeTrainCount,
  encodeTrainCount,
} from '../src/commands/train.js';
import {
  PulseGenDecodeError,
  PulseGenDeviceRejectedError,
  PulseGenInvalidArgumentError,
  PulseGenRangeError,
} from '../src/errors.js';

describe('loop count encoding', () => {
  it.each([
    [0, 65535],
    [1, 0],
    [2, 1],
    [65534, 65533],
    [65535, 65534],
  ])('%i loops is register %i and decodes back', (loops, register) => {
    expect(encodeLoopCount(loops)).toBe(register);
    expect(decodeLoopCount(register)).toBe(loops);
  });

  it('rejects more loops than the register holds', () => {
    expect(() => encodeLoopCount(65536)).toThrow(
      'The device can loop at most 65535 times, got 65536'
    );
  });

  it('rejects negative and fractional loop counts', () => {
    expect(() => encodeLoopCount(-1)).toThrow(PulseGenRangeError);
    expect(() => encodeLoopCount(1.5)).toThrow(PulseGenRangeError);
  });

  it('builds the FC command from the visible count', () => {
    expect(buildFrameLoopsCommand(3)).toBe('FC 2');
    expect(buildFrameLoopsCommand(0)).toBe('FC 65535');
  });
});

describe('train count encoding', () => {
  it.each([
    [1, 0],
    [2, 1],
    [2 ** 32, 2 ** 32 - 1],
  ])('%i pulses is register %i and decodes back', (count, register) => {
    expect(encodeTrainCount(count)).toBe(register);
    expect(decodeTrainCount(register)).toBe(count);
  });

  it('rejects counts outside [1, 2^32]', () => {
    expect(() => encodeTrainCount(0)).toThrow(PulseGenRangeError);
    expect(() => encodeTrainCount(2 ** 32 + 1)).toThrow(
      'Maximum number of pulses is 2^32, got 4294967297'
    );
  });

  it('builds TC and TS commands', () => {
    expect(buildTrainCountCommand(5)).toBe('TC 4');
    expect(buildTrainSpacingCommand(500_000_000)).toBe('TS 500000000');
    expect(() => buildTrainSpacingCommand(0)).toThrow(PulseGenRangeError);
    expect(() => buildTrainSpacingCommand(500_000_001)).toThrow(PulseGenRangeError);
  });
});

describe('channel commands', () => {
  it('formats enable, polarity, delay and width', () => {
    expect(buildChannelEnableCommand('A', true)).toBe('AS ON');
    expect(buildChannelEnableCommand('Q', false)).toBe('QS OF');
    expect(buildChannelPolarityCommand('C', 'low')).toBe('CS NE');
    expect(buildChannelDelayCommand('A', 100)).toBe('AD 100.000000');
    expect(buildChannelWidthCommand('B', 2000)).toBe('BW 2000.000000');
  });

  it('rejects negative times before formatting', () => {
    expect(() => buildChannelDelayCommand('A', -1)).toThrow(PulseGenRangeError);
    expect(() => buildChannelWidthCommand('A', Number.NaN)).toThrow(PulseGenRangeError);
  });

  it('parses a status line into nanoseconds', () => {
    const status = parseChannelStatusResponse(
      'AS',
      'Ch A  POS  ON     Dly  00.000,000,100,000  Wid  00.000,002,000,000'
    );
    expect(status).toEqual({ polarity: 'high', enabled: true, delayNs: 100, widthNs: 2000 });
  });

  it('parses a negative, disabled channel', () => {
    const status = parseChannelStatusResponse(
      'CS',
      'Ch C  NEG  OFF    Dly  00.000,000,300,000  Wid  01.500,000,000,000'
    );
    expect(status).toEqual({ polarity: 'low', enabled: false, delayNs: 300, widthNs: 1.5e9 });
  });

  it('raises a device rejection for the sentinel', () => {
    expect(() => parseChannelStatusResponse('AS', '??')).toThrow(PulseGenDeviceRejectedError);
  });

  it('raises a decode error for a malformed status line', () => {
    expect(() => parseChannelStatusResponse('AS', 'Ch A POS')).toThrow(PulseGenDecodeError);
    expect(() =>
      parseChannelStatusResponse('AS', 'Ch A  MID  ON  Dly  00.000  Wid  00.000')
    ).toThrow(PulseGenDecodeError);
    expect(() =>
      parseChannelStatusResponse('AS', 'Ch A  POS  ON  Dly  soon  Wid  00.000')
    ).toThrow(PulseGenDecodeError);
  });
});

describe('frame commands', () => {
  it('validates frame indices', () => {
    expect(() => validateFrameIndex(8190)).not.toThrow();
    expect(() => validateFrameIndex(8191)).toThrow(PulseGenRangeError);
    expect(() => validateFrameIndex(-1)).toThrow(PulseGenRangeError);
    expect(buildFrameStoreCommand(7)).toBe('FR 7');
  });

  it.each(['OFF', 'DONE', ' done '])('treats %j as stopped', reply => {
    expect(parseFrameStateResponse(reply)).toEqual({ looping: false, recognised: true });
  });

  it.each(['GO', 'ON', 'RUN', '17'])('treats %j as looping', reply => {
    expect(parseFrameStateResponse(reply, 'strict')).toEqual({ looping: true, recognised: true });
  });

  it('treats unknown tokens as looping in lenient mode', () => {
    expect(parseFrameStateResponse('WAIT')).toEqual({ looping: true, recognised: false });
  });

  it('rejects unknown tokens in strict mode', () => {
    expect(() => parseFrameStateResponse('WAIT', 'strict')).toThrow(PulseGenDecodeError);
  });

  it('raises a device rejection for the sentinel in either mode', () => {
    expect(() => parseFrameStateResponse('??')).toThrow(PulseGenDeviceRejectedError);
    expect(() => parseFrameStateResponse('??', 'strict')).toThrow(PulseGenDeviceRejectedError);
  });
});

describe('system commands', () => {
  it('maps autoinstall modes to codes and back', () => {
    expect(buildAutoinstallCommand('off')).toBe('AU 0');
    expect(buildAutoinstallCommand(1)).toBe('AU 1');
    expect(buildAutoinstallCommand('queue')).toBe('AU 2');
    expect(parseAutoinstallResponse('2')).toBe('queue');
    expect(() => parseAutoinstallResponse('3')).toThrow(PulseGenDecodeError);
  });

  it('bounds the synthesizer frequency to (0, 16 MHz]', () => {
    expect(buildSynthFrequencyCommand(16e6)).toBe('SY 16000000.000000');
    expect(() => buildSynthFrequencyCommand(16e6 + 1)).toThrow(PulseGenRangeError);
    expect(() => buildSynthFrequencyCommand(0)).toThrow(PulseGenRangeError);
  });

  it('formats the trigger level', () => {
    expect(buildTriggerLevelCommand(1.25)).toBe('TLEVEL 1.25');
    expect(() => buildTriggerLevelCommand(Number.POSITIVE_INFINITY)).toThrow(
      PulseGenInvalidArgumentError
    );
  });
});

describe('parseIntegerReply', () => {
  it('ignores grouping commas', () => {
    expect(parseIntegerReply('TS', '1,024')).toBe(1024);
  });

  it('rejects non-numeric replies', () => {
    expect(() => parseIntegerReply('TS', 'OK')).toThrow(PulseGenDecodeError);
    expect(() => parseIntegerReply('TS', '??')).toThrow(PulseGenDeviceRejectedError);
  });
});
