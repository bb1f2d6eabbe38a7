// src/frame-sequencer.ts

import { Channel } from './channel.js';
import {
  FRAME_FIRST_COMMAND,
  FRAME_LAST_COMMAND,
  FRAME_LOOPS_COMMAND,
  FRAME_RESET_COMMAND,
  FRAME_START_COMMAND,
  FRAME_STATE_COMMAND,
  FRAME_STOP_COMMAND,
  buildFrameFirstCommand,
  buildFrameLastCommand,
  buildFrameLoopsCommand,
  buildFrameStoreCommand,
  decodeLoopCount,
  encodeLoopCount,
  parseFrameStateResponse,
  validateFrameIndex,
} from './commands/frame.js';
import { assertAccepted, parseIntegerReply } from './commands/reply.js';
import { PulseGenPreconditionError, PulseGenTimeoutError } from './errors.js';
import { CommandFramer } from './framers/command-framer.js';
import { pulsegenLogger } from './logger.js';
import {
  ChannelId,
  ChannelSettings,
  FrameSequenceState,
  FrameSnapshot,
  FrameStateMode,
  WaitUntilDoneOptions,
} from './types/pulsegen-types.js';
import { sleep } from './utils/utils.js';

const logger = pulsegenLogger.createLogger('FrameSequencer');

const DEFAULT_POLL_INTERVAL_MS = 50;

/**
 * Frame memory and playback.
 *
 * Frames are stored on the device by index. The local map only mirrors what
 * was saved through this object, which is why a fresh connection starts with
 * an empty map even if the device memory holds frames.
 *
 * The FC register is off by one: FRAME GO plays the frames FC+1 times, and
 * 65535 loops until stopped. `loopCount` hides this; 0 means forever.
 */
export class FrameSequencer {
  private readonly framer: CommandFramer;
  private readonly channels: readonly Channel[];
  private readonly stateMode: FrameStateMode;
  private readonly _frames: Map<number, FrameSnapshot> = new Map();
  private _first: number = 0;
  private _last: number = 0;
  private _loopRegister: number = 0;

  constructor(framer: CommandFramer, channels: readonly Channel[], stateMode: FrameStateMode = 'lenient') {
    this.framer = framer;
    this.channels = channels;
    this.stateMode = stateMode;
  }

  get first(): number {
    return this._first;
  }

  get last(): number {
    return this._last;
  }

  /** 0 means loop forever */
  get loopCount(): number {
    return decodeLoopCount(this._loopRegister);
  }

  get frames(): ReadonlyMap<number, FrameSnapshot> {
    return this._frames;
  }

  get state(): FrameSequenceState {
    return { first: this._first, last: this._last, loopCount: this.loopCount };
  }

  /**
   * Seeds first, last and the loop register from the device in one batch.
   */
  async readState(): Promise<FrameSequenceState> {
    const commands = [FRAME_FIRST_COMMAND, FRAME_LAST_COMMAND, FRAME_LOOPS_COMMAND];
    const [first = '', last = '', loops = ''] = await this.framer.execute(commands);
    this._first = parseIntegerReply(FRAME_FIRST_COMMAND, first);
    this._last = parseIntegerReply(FRAME_LAST_COMMAND, last);
    this._loopRegister = parseIntegerReply(FRAME_LOOPS_COMMAND, loops);
    logger.debug('Frame registers read back', { ...this.state });
    return this.state;
  }

  /**
   * Reads FC from the device and returns the visible loop count.
   */
  async readLoopCount(): Promise<number> {
    const [reply = ''] = await this.framer.execute([FRAME_LOOPS_COMMAND]);
    this._loopRegister = parseIntegerReply(FRAME_LOOPS_COMMAND, reply);
    return this.loopCount;
  }

  /**
   * Stores the live channel settings into a frame.
   *
   * Without an index the next slot after the saved frames is used and `last`
   * is extended to cover it. With an index the frame is edited in place and
   * first/last stay as they are.
   * @returns the index written
   * @throws PulseGenRangeError for an index outside [0, 8191)
   */
  async save(index?: number): Promise<number> {
    const extend = index === undefined;
    const target = index ?? this._first + this._frames.size;
    validateFrameIndex(target);

    const snapshot = await this.captureSnapshot();
    const command = buildFrameStoreCommand(target);
    const [reply = ''] = await this.framer.execute([command]);
    assertAccepted(command, reply);
    this._frames.set(target, snapshot);

    // last only moves over a slot the device has stored
    if (extend) {
      await this.setLast(target);
    }
    logger.info(extend ? 'Frame appended' : 'Frame overwritten', { frame: target });
    return target;
  }

  /**
   * Resets frame memory. first/last follow what the device reports afterwards.
   */
  async clear(): Promise<void> {
    this._frames.clear();
    const commands = [FRAME_RESET_COMMAND, FRAME_FIRST_COMMAND, FRAME_LAST_COMMAND];
    const [reset = '', first = '', last = ''] = await this.framer.execute(commands);
    assertAccepted(FRAME_RESET_COMMAND, reset);
    this._first = parseIntegerReply(FRAME_FIRST_COMMAND, first);
    this._last = parseIntegerReply(FRAME_LAST_COMMAND, last);
    logger.info('Frame memory cleared', { ...this.state });
  }

  /**
   * @param loops - number of passes through the frames; 0 loops forever
   * @throws PulseGenRangeError outside [0, 65535]
   */
  async setLoopCount(loops: number): Promise<void> {
    const command = buildFrameLoopsCommand(loops);
    this._loopRegister = encodeLoopCount(loops);
    const [reply = ''] = await this.framer.execute([command]);
    assertAccepted(command, reply);
  }

  async setFirst(index: number): Promise<void> {
    const command = buildFrameFirstCommand(index);
    this._first = index;
    const [reply = ''] = await this.framer.execute([command]);
    assertAccepted(command, reply);
  }

  /**
   * @throws PulseGenPreconditionError when `index` is not after `first`
   *   while more than one frame is saved
   */
  async setLast(index: number): Promise<void> {
    if (index <= this._first && this._frames.size > 1) {
      throw new PulseGenPreconditionError(
        `Last frame must come after first frame ${this._first}, got ${index}`
      );
    }
    const command = buildFrameLastCommand(index);
    this._last = index;
    const [reply = ''] = await this.framer.execute([command]);
    assertAccepted(command, reply);
  }

  /**
   * Plays the frames. Regular triggers do not resume after playback ends
   * until stop() is sent.
   */
  async start(): Promise<void> {
    const [reply = ''] = await this.framer.execute([FRAME_START_COMMAND]);
    assertAccepted(FRAME_START_COMMAND, reply);
    logger.info('Frame playback started', { ...this.state });
  }

  async stop(): Promise<void> {
    const [reply = ''] = await this.framer.execute([FRAME_STOP_COMMAND]);
    assertAccepted(FRAME_STOP_COMMAND, reply);
    logger.info('Frame playback stopped');
  }

  /**
   * Asks the device whether frames are still playing. OFF and DONE mean
   * stopped; see FrameStateMode for how other replies are treated.
   */
  async isLooping(): Promise<boolean> {
    const [reply = ''] = await this.framer.execute([FRAME_STATE_COMMAND]);
    const { looping, recognised } = parseFrameStateResponse(reply, this.stateMode);
    if (!recognised) {
      logger.warn(`Unrecognised frame state "${reply.trim()}" treated as looping`);
    }
    return looping;
  }

  /**
   * Polls isLooping() until playback ends.
   * @throws PulseGenTimeoutError when `timeout` passes first
   */
  async waitUntilDone(options: WaitUntilDoneOptions = {}): Promise<void> {
    const pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL_MS;
    const timeout = options.timeout ?? Infinity;
    const start = Date.now();

    while (await this.isLooping()) {
      if (Date.now() - start >= timeout) {
        throw new PulseGenTimeoutError(`Frames still playing after ${timeout} ms`);
      }
      await sleep(pollInterval);
    }
  }

  private async captureSnapshot(): Promise<FrameSnapshot> {
    const entries: [ChannelId, ChannelSettings][] = [];
    for (const channel of this.channels) {
      entries.push([channel.id, { ...(await channel.refreshIfPending()) }]);
    }
    const snapshot: Partial<Record<ChannelId, ChannelSettings>> = Object.fromEntries(entries);
    const { A, B, C, D } = snapshot;
    if (!A || !B || !C || !D) {
      throw new PulseGenPreconditionError('A frame snapshot needs all four channels');
    }
    return { A, B, C, D };
  }
}
