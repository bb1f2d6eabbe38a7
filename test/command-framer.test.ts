import { describe, it, expect } from 'vitest';
import { CommandFramer, buildFrame } from '../src/framers/command-framer.js';
import {
  PulseGenCommandError,
  PulseGenFramingError,
  PulseGenNotConnectedError,
  PulseGenTimeoutError,
} from '../src/errors.js';
import PulseGeneratorEmulator from '../src/emulator/pulse-generator-emulator.js';
import { bytesToAscii } from '../src/utils/utils.js';
import { ScriptedTransport } from './helpers/scripted-transport.js';

describe('buildFrame', () => {
  it('joins commands and closes the frame with delimiter and carriage return', () => {
    expect(bytesToAscii(buildFrame(['AS ON', 'FA']))).toBe('AS ON;FA;\r');
  });

  it('rejects an empty batch', () => {
    expect(() => buildFrame([])).toThrow(PulseGenCommandError);
  });

  it('rejects commands carrying frame characters', () => {
    expect(() => buildFrame(['AS ON;BS ON'])).toThrow(PulseGenCommandError);
    expect(() => buildFrame(['AS\rON'])).toThrow(PulseGenCommandError);
    expect(() => buildFrame(['AS\nON'])).toThrow(PulseGenCommandError);
  });
});

describe('CommandFramer', () => {
  it('returns one reply per command in order', async () => {
    const transport = new ScriptedTransport(['OK;12;??;\r\n']);
    const framer = new CommandFramer(transport);

    const replies = await framer.execute(['AS ON', 'FA', 'XX']);

    expect(replies).toEqual(['OK', '12', '??']);
    expect(transport.writes).toEqual(['AS ON;FA;XX;\r']);
  });

  it('drains the end marker so the next frame starts clean', async () => {
    const transport = new ScriptedTransport(['OK;\r\n', '3;\r\n']);
    const framer = new CommandFramer(transport);

    expect(await framer.execute(['AU 1'])).toEqual(['OK']);
    expect(await framer.execute(['AU'])).toEqual(['3']);
  });

  it('fails an invalid batch before any I/O', async () => {
    const transport = new ScriptedTransport();
    const framer = new CommandFramer(transport);

    await expect(framer.execute([])).rejects.toBeInstanceOf(PulseGenCommandError);
    await expect(framer.execute(['FA;FB'])).rejects.toBeInstanceOf(PulseGenCommandError);
    expect(transport.writes).toEqual([]);
    expect(framer.isDesynchronized).toBe(false);
  });

  it('fails within the read budget when the end marker never arrives', async () => {
    const transport = new ScriptedTransport(['OK;'], 10);
    const framer = new CommandFramer(transport);

    await expect(framer.execute(['AS ON'])).rejects.toBeInstanceOf(PulseGenTimeoutError);
    // three single-byte reads, then the marker read that comes up short
    expect(transport.reads).toBe(4);
    expect(framer.isDesynchronized).toBe(true);
  });

  it('fails when the reply stream never delimits', async () => {
    const transport = new ScriptedTransport(['OKOKOK'], 5);
    const framer = new CommandFramer(transport);

    await expect(framer.execute(['AS ON'])).rejects.toBeInstanceOf(PulseGenTimeoutError);
    expect(transport.reads).toBe(6);
  });

  it('reports a wrong end marker as a framing error', async () => {
    const transport = new ScriptedTransport(['OK;X\n']);
    const framer = new CommandFramer(transport);

    await expect(framer.execute(['AS ON'])).rejects.toThrow(
      'Expected end marker "\\r\\n", got "X\\n"'
    );
  });

  it('refuses new frames while desynchronized until resync()', async () => {
    const transport = new ScriptedTransport(['OK;'], 10);
    const framer = new CommandFramer(transport);
    await expect(framer.execute(['AS ON'])).rejects.toBeInstanceOf(PulseGenTimeoutError);

    await expect(framer.execute(['FA'])).rejects.toBeInstanceOf(PulseGenFramingError);
    expect(transport.writes).toHaveLength(1);

    await framer.resync();
    expect(transport.flushes).toBe(1);
    expect(framer.isDesynchronized).toBe(false);

    transport.script('0;\r\n');
    expect(await framer.execute(['FA'])).toEqual(['0']);
  });

  it('stays in sync when a closed transport refuses the write', async () => {
    const emulator = new PulseGeneratorEmulator();
    const framer = new CommandFramer(emulator);

    await expect(framer.execute(['FA'])).rejects.toBeInstanceOf(PulseGenNotConnectedError);
    expect(framer.isDesynchronized).toBe(false);

    await emulator.connect();
    expect(await framer.execute(['FA'])).toEqual(['0']);
  });

  it('serializes concurrent batches', async () => {
    const transport = new ScriptedTransport(['A;\r\n', 'B;\r\n']);
    const framer = new CommandFramer(transport);

    const results = await Promise.all([framer.execute(['X']), framer.execute(['Y'])]);

    expect(results).toEqual([['A'], ['B']]);
    expect(transport.writes).toEqual(['X;\r', 'Y;\r']);
  });
});
