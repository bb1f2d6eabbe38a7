import { describe, it, expect, beforeEach, vi } from 'vitest';
import NodeSerialTransport from '../src/transport/node-serialport.js';
import { NodeSerialConnectionError } from '../src/errors.js';

const { openedWith } = vi.hoisted(() => {
  const openedWith: unknown[] = [];
  return { openedWith };
});

vi.mock('serialport', () => ({
  SerialPort: class {
    isOpen = false;

    constructor(options: unknown) {
      openedWith.push(options);
    }

    open(callback: (err: Error | null) => void): void {
      this.isOpen = true;
      callback(null);
    }

    close(callback: (err: Error | null) => void): void {
      this.isOpen = false;
      callback(null);
    }

    on(): this {
      return this;
    }

    removeAllListeners(): this {
      return this;
    }
  },
}));

describe('NodeSerialTransport', () => {
  beforeEach(() => {
    openedWith.length = 0;
  });

  it('opens at 38400 baud 8N1 by default', async () => {
    const transport = new NodeSerialTransport('/dev/ttyTEST0');

    await transport.connect();

    expect(transport.isOpen).toBe(true);
    expect(openedWith).toEqual([
      {
        path: '/dev/ttyTEST0',
        baudRate: 38400,
        dataBits: 8,
        stopBits: 1,
        parity: 'none',
        autoOpen: false,
      },
    ]);
    await transport.disconnect();
    expect(transport.isOpen).toBe(false);
  });

  it('takes the baud rate from the options', async () => {
    const transport = new NodeSerialTransport('/dev/ttyTEST0', { baudRate: 9600 });

    await transport.connect();

    expect(openedWith).toEqual([expect.objectContaining({ baudRate: 9600 })]);
  });

  it('refuses a baud rate outside the supported range', async () => {
    const transport = new NodeSerialTransport('/dev/ttyTEST0', { baudRate: 230400 });

    await expect(transport.connect()).rejects.toBeInstanceOf(NodeSerialConnectionError);
    expect(openedWith).toEqual([]);
  });
});
