// src/framers/command-framer.ts

import { Mutex } from 'async-mutex';
import { WIRE } from '../constants/constants.js';
import { PulseGenCommandError, PulseGenFramingError, PulseGenNotConnectedError } from '../errors.js';
import { pulsegenLogger } from '../logger.js';
import { Transport } from '../types/pulsegen-types.js';
import { asciiToBytes, bytesToAscii, escapeControl } from '../utils/utils.js';

const logger = pulsegenLogger.createLogger('CommandFramer');

const DELIMITER_BYTE = WIRE.DELIMITER.charCodeAt(0);
const FORBIDDEN_IN_COMMAND = [WIRE.DELIMITER, '\r', '\n'];

export interface CommandFramerOptions {
  /**
   * Per-byte read deadline handed to the transport, ms. Left unset the
   * transport's own behaviour applies. A deadline that expires mid-frame
   * leaves the framer desynchronized.
   */
  readTimeout?: number;
}

/**
 * Validates a command batch before anything reaches the wire.
 * @throws PulseGenCommandError for an empty batch or a command carrying a frame delimiter
 */
export function validateCommands(commands: readonly string[]): void {
  if (commands.length === 0) {
    throw new PulseGenCommandError('At least one command is required per frame');
  }
  for (const command of commands) {
    const bad = FORBIDDEN_IN_COMMAND.find(ch => command.includes(ch));
    if (bad !== undefined) {
      throw new PulseGenCommandError(
        `Command "${escapeControl(command)}" contains the frame character "${escapeControl(bad)}"`
      );
    }
  }
}

/**
 * Joins a batch into one wire frame: "CMD1;CMD2;...;\r". The trailing
 * delimiter makes the device close every reply with a delimiter as well.
 */
export function buildFrame(commands: readonly string[]): Uint8Array {
  validateCommands(commands);
  return asciiToBytes(commands.join(WIRE.DELIMITER) + WIRE.DELIMITER + WIRE.TERMINATOR);
}

/**
 * Sends command batches and collects one reply per command.
 *
 * The device answers a frame of K commands with K delimiter-terminated
 * replies and a two byte end marker. Replies are read one byte at a time;
 * the end marker is drained before returning so the next frame starts clean.
 * Round trips are serialized so replies stay attributable.
 */
export class CommandFramer {
  private _mutex: Mutex = new Mutex();
  private _desynchronized: boolean = false;
  private readonly _readTimeout: number | undefined;

  constructor(
    private _transport: Transport,
    options: CommandFramerOptions = {}
  ) {
    this._readTimeout = options.readTimeout;
  }

  public get transport(): Transport {
    return this._transport;
  }

  /** True after a frame was abandoned part way; cleared by resync() */
  public get isDesynchronized(): boolean {
    return this._desynchronized;
  }

  /**
   * Executes a batch and returns the raw replies in command order.
   * Replies are not interpreted; the error sentinel comes back like any other text.
   * @throws PulseGenCommandError before any I/O for an invalid batch
   * @throws PulseGenFramingError when the reply stream does not match the frame
   */
  public async execute(commands: readonly string[]): Promise<string[]> {
    const frame = buildFrame(commands);
    return this._mutex.runExclusive(() => this._exchange(commands, frame));
  }

  /**
   * Drops whatever is left in the transport input and accepts new frames again.
   */
  public async resync(): Promise<void> {
    await this._mutex.runExclusive(async () => {
      if (this._transport.flush) {
        await this._transport.flush();
      }
      this._desynchronized = false;
      logger.info('Framer resynchronized');
    });
  }

  private async _exchange(commands: readonly string[], frame: Uint8Array): Promise<string[]> {
    if (this._desynchronized) {
      throw new PulseGenFramingError(
        'Framer is desynchronized after an aborted exchange; call resync() first'
      );
    }

    logger.trace(`TX ${escapeControl(bytesToAscii(frame))}`, { commands: commands.length });

    let sent = false;
    try {
      await this._transport.write(frame);
      sent = true;

      const replies: string[] = [];
      let current = '';
      while (replies.length < commands.length) {
        const byte = await this._readByte();
        if (byte === DELIMITER_BYTE) {
          replies.push(current);
          current = '';
        } else {
          current += String.fromCharCode(byte);
        }
      }

      const marker = bytesToAscii(
        await this._transport.read(WIRE.END_MARKER.length, this._readTimeout)
      );
      if (marker !== WIRE.END_MARKER) {
        throw new PulseGenFramingError(
          `Expected end marker "${escapeControl(WIRE.END_MARKER)}", got "${escapeControl(marker)}"`
        );
      }

      logger.trace(`RX ${replies.map(escapeControl).join(' | ')}`);
      return replies;
    } catch (err: unknown) {
      // a closed transport refuses the write before any byte leaves
      if (sent || !(err instanceof PulseGenNotConnectedError)) {
        this._desynchronized = true;
        logger.error('Exchange aborted, framer desynchronized', err);
      }
      throw err;
    }
  }

  private async _readByte(): Promise<number> {
    const chunk = await this._transport.read(1, this._readTimeout);
    const byte = chunk[0];
    if (chunk.length !== 1 || byte === undefined) {
      throw new PulseGenFramingError(`Short read: expected 1 byte, got ${chunk.length}`);
    }
    return byte;
  }
}
