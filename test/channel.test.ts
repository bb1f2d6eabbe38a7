import { describe, it, expect, beforeEach } from 'vitest';
import { BroadcastChannel, Channel, normalizeChannel, normalizePolarity } from '../src/channel.js';
import PulseGeneratorEmulator from '../src/emulator/pulse-generator-emulator.js';
import { CommandFramer } from '../src/framers/command-framer.js';
import { PulseGenDeviceRejectedError, PulseGenInvalidArgumentError, PulseGenRangeError } from '../src/errors.js';

describe('normalizeChannel', () => {
  it('accepts indices and either case', () => {
    expect(normalizeChannel(0)).toBe('A');
    expect(normalizeChannel(2)).toBe('C');
    expect(normalizeChannel('b')).toBe('B');
    expect(normalizeChannel('D')).toBe('D');
    expect(normalizeChannel('q')).toBe('Q');
  });
});

describe('normalizePolarity', () => {
  it('accepts high/low and the device spellings', () => {
    expect(normalizePolarity('HIGH')).toBe('high');
    expect(normalizePolarity('pos')).toBe('high');
    expect(normalizePolarity('NE')).toBe('low');
    expect(() => normalizePolarity('up')).toThrow(PulseGenInvalidArgumentError);
  });
});

describe('Channel', () => {
  let emulator: PulseGeneratorEmulator;
  let framer: CommandFramer;
  let channel: Channel;

  beforeEach(async () => {
    emulator = new PulseGeneratorEmulator();
    await emulator.connect();
    framer = new CommandFramer(emulator);
    channel = new Channel(framer, 'A');
  });

  it('starts with every attribute pending', () => {
    expect(channel.pendingAttributes()).toEqual(['polarity', 'enabled', 'delay', 'width']);
  });

  it('confirms every attribute on query', async () => {
    const settings = await channel.query();

    expect(settings).toEqual({ id: 'A', polarity: 'high', enabled: false, delayNs: 0, widthNs: 0 });
    expect(channel.hasPendingWrites).toBe(false);
    expect(emulator.receivedFrames).toEqual([['AS']]);
  });

  it('writes optimistically and marks the attribute pending', async () => {
    await channel.query();
    await channel.setDelay('100ns');
    await channel.setWidth({ magnitude: 2, unit: 'us' });
    await channel.setPolarity('low');
    await channel.setEnabled(true);

    expect(channel.settings).toEqual({ id: 'A', polarity: 'low', enabled: true, delayNs: 100, widthNs: 2000 });
    expect(channel.pendingAttributes()).toEqual(['polarity', 'enabled', 'delay', 'width']);
    expect(emulator.receivedFrames.slice(1)).toEqual([
      ['AD 100.000000'],
      ['AW 2000.000000'],
      ['AS NE'],
      ['AS ON'],
    ]);
    expect(emulator.state.channels.A).toEqual({ polarity: 'low', enabled: true, delayNs: 100, widthNs: 2000 });
  });

  it('only re-queries when something is pending', async () => {
    await channel.query();
    await channel.refreshIfPending();
    expect(emulator.receivedFrames).toHaveLength(1);

    await channel.setDelay(50);
    expect(channel.syncState('delay')).toBe('pending');
    await channel.refreshIfPending();

    expect(emulator.receivedFrames).toHaveLength(3);
    expect(channel.syncState('delay')).toBe('confirmed');
  });

  it('keeps the optimistic value of a rejected write until refreshed', async () => {
    await channel.query();
    emulator.reject('AW');

    await expect(channel.setWidth(50)).rejects.toBeInstanceOf(PulseGenDeviceRejectedError);
    expect(channel.widthNs).toBe(50);
    expect(channel.syncState('width')).toBe('pending');

    emulator.clearRejections();
    await channel.refreshIfPending();
    expect(channel.widthNs).toBe(0);
  });

  it('validates times before sending', async () => {
    await expect(channel.setDelay(-5)).rejects.toBeInstanceOf(PulseGenRangeError);
    expect(emulator.receivedFrames).toEqual([]);
  });
});

describe('BroadcastChannel', () => {
  it('writes all four channels and leaves them pending', async () => {
    const emulator = new PulseGeneratorEmulator();
    await emulator.connect();
    const framer = new CommandFramer(emulator);
    const channels = (['A', 'B', 'C', 'D'] as const).map(id => new Channel(framer, id));
    for (const ch of channels) await ch.query();
    const all = new BroadcastChannel(framer, channels);

    await all.setEnabled(true);
    await all.setWidth('1us');

    for (const ch of channels) {
      expect(ch.enabled).toBe(true);
      expect(ch.widthNs).toBe(1000);
      expect(ch.pendingAttributes()).toEqual(['enabled', 'width']);
      expect(emulator.state.channels[ch.id].widthNs).toBe(1000);
    }
    expect(emulator.receivedFrames.slice(4)).toEqual([['QS ON'], ['QW 1000.000000']]);
  });
});
