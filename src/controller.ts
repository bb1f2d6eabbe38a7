// src/controller.ts

import { BroadcastChannel, Channel, normalizeChannel } from './channel.js';
import { buildChannelWidthCommand } from './commands/channel.js';
import { assertAccepted, assertAllAccepted, parseIntegerReply } from './commands/reply.js';
import {
  AUTOINSTALL_COMMAND,
  CLOCK_COMMAND,
  CLOCK_IN_COMMAND,
  CLOCK_OUT_COMMAND,
  FIRE_COMMAND,
  INSTALL_COMMAND,
  RECALL_COMMAND,
  SAVE_COMMAND,
  STATUS_COMMAND,
  TRIGGER_REMOTE_COMMAND,
  TRIGGER_SYNTH_COMMAND,
  VERBOSE_OFF_COMMAND,
  buildAutoinstallCommand,
  buildSynthFrequencyCommand,
  buildTriggerLevelCommand,
  normalizeAutoinstall,
  parseAutoinstallResponse,
  validateFrequency,
} from './commands/system.js';
import {
  TRAIN_COUNT_COMMAND,
  TRAIN_SPACING_COMMAND,
  buildTrainCountCommand,
  buildTrainSpacingCommand,
  decodeTrainCount,
  encodeTrainCount,
} from './commands/train.js';
import { SYNTH } from './constants/constants.js';
import { PulseGenInvalidArgumentError, PulseGenRangeError } from './errors.js';
import { CommandFramer } from './framers/command-framer.js';
import { FrameSequencer } from './frame-sequencer.js';
import { pulsegenLogger } from './logger.js';
import { computeTrainSpacing, ticksToSpacing, validateRequestedSpacing } from './train-timing.js';
import {
  AutoinstallLike,
  AutoinstallMode,
  ChannelId,
  ChannelLike,
  ChannelSettings,
  FrequencyInput,
  LogLevel,
  PulseGeneratorOptions,
  QuantityNormalizer,
  TimeInput,
  TrainConfig,
  TrainSpacing,
  Transport,
} from './types/pulsegen-types.js';
import { normalizeQuantity, toHertz, toNanoseconds } from './utils/units.js';

const logger = pulsegenLogger.createLogger('PulseGenerator');

const NS_PER_SECOND = 1e9;

/**
 * Controller for a 4-channel digital delay and pulse train generator.
 *
 * Create it with PulseGenerator.connect(); the constructor does no I/O.
 * Every operation is one or more blocking round trips through a single
 * CommandFramer, so concurrent callers are serialized frame by frame.
 *
 * @example
 * const gen = await PulseGenerator.connect(new NodeSerialTransport('/dev/ttyUSB0'));
 * await gen.a.setDelay('500us');
 * await gen.a.setWidth({ magnitude: 1, unit: 'ms' });
 * await gen.a.setEnabled(true);
 * await gen.frames.save();
 */
export class PulseGenerator {
  readonly framer: CommandFramer;
  readonly a: Channel;
  readonly b: Channel;
  readonly c: Channel;
  readonly d: Channel;
  /** Write-only pseudo channel addressing all four outputs */
  readonly all: BroadcastChannel;
  readonly frames: FrameSequencer;

  private readonly normalizer: QuantityNormalizer;
  private _frequencyHz: number = SYNTH.DEFAULT_FREQUENCY_HZ;
  private _autoinstall: AutoinstallMode = 'install';
  private _triggerLevel: number | undefined;
  private _trainRegister: number = 0;
  private _trainTicks: number = 0;

  constructor(transport: Transport, options: PulseGeneratorOptions = {}) {
    this.framer = new CommandFramer(transport);
    this.normalizer = options.normalizer ?? normalizeQuantity;
    this.a = new Channel(this.framer, 'A', this.normalizer);
    this.b = new Channel(this.framer, 'B', this.normalizer);
    this.c = new Channel(this.framer, 'C', this.normalizer);
    this.d = new Channel(this.framer, 'D', this.normalizer);
    this.all = new BroadcastChannel(this.framer, this.channels, this.normalizer);
    this.frames = new FrameSequencer(this.framer, this.channels, options.frameStateMode ?? 'lenient');
  }

  /**
   * Opens the transport if needed and brings the device into a known state:
   * verbose echo off, autoinstall, synthesizer frequency, all channels read
   * back and disabled, frame and train registers seeded from the device,
   * frame memory cleared.
   */
  static async connect(transport: Transport, options: PulseGeneratorOptions = {}): Promise<PulseGenerator> {
    if (options.logLevel) {
      PulseGenerator.setLogLevel(options.logLevel);
    }
    if (!transport.isOpen) {
      await transport.connect();
    }

    const generator = new PulseGenerator(transport, options);
    await generator.initialize(options);
    return generator;
  }

  static setLogLevel(level: LogLevel): void {
    pulsegenLogger.setLevel(level);
  }

  private async initialize(options: PulseGeneratorOptions): Promise<void> {
    await this.execute(VERBOSE_OFF_COMMAND);
    await this.setAutoinstall(options.autoinstall ?? 'install');
    await this.setFrequency(options.frequency ?? SYNTH.DEFAULT_FREQUENCY_HZ);

    for (const channel of this.channels) {
      await channel.query();
      await channel.setEnabled(false);
    }

    await this.frames.readState();
    await this.readTrain();
    await this.frames.clear();
    logger.info('Pulse generator ready', { frequency: this._frequencyHz, autoinstall: this._autoinstall });
  }

  get channels(): readonly Channel[] {
    return [this.a, this.b, this.c, this.d];
  }

  /**
   * @param id - A-D in either case or index 0-3
   */
  channel(id: ChannelLike): Channel {
    const target = normalizeChannel(id);
    if (target === 'Q') {
      throw new PulseGenInvalidArgumentError(id, 'a readable channel A-D (Q is write-only, use `all`)');
    }
    return this.channelById(target);
  }

  private channelById(id: ChannelId): Channel {
    switch (id) {
      case 'A':
        return this.a;
      case 'B':
        return this.b;
      case 'C':
        return this.c;
      case 'D':
        return this.d;
    }
  }

  /**
   * Sends raw commands in one frame and returns the raw replies.
   */
  async execute(...commands: string[]): Promise<string[]> {
    return this.framer.execute(commands);
  }

  async disconnect(): Promise<void> {
    await this.framer.transport.disconnect();
    logger.info('Transport released');
  }

  // ========== SYNTHESIZER ==========

  /** Timing cycle frequency, Hz */
  get frequency(): number {
    return this._frequencyHz;
  }

  /** Timing cycle period, ns */
  get period(): number {
    return NS_PER_SECOND / this._frequencyHz;
  }

  /**
   * Sets the internal synthesizer and resyncs the trigger to it.
   * @param frequency - bare numbers are hertz
   * @throws PulseGenRangeError outside (0, 16 MHz]
   */
  async setFrequency(frequency: FrequencyInput): Promise<void> {
    const hz = toHertz(frequency, this.normalizer);
    const commands = [buildSynthFrequencyCommand(hz), TRIGGER_SYNTH_COMMAND];
    this._frequencyHz = hz;
    assertAllAccepted(commands, await this.framer.execute(commands));
  }

  /**
   * @param period - bare numbers are nanoseconds
   * @throws PulseGenRangeError when the implied frequency is above 16 MHz
   */
  async setPeriod(period: TimeInput): Promise<void> {
    const ns = toNanoseconds(period, this.normalizer);
    if (!(ns > 0)) {
      throw new PulseGenRangeError(`Period must be positive, got ${ns} ns`);
    }
    const hz = NS_PER_SECOND / ns;
    validateFrequency(hz);
    await this.setFrequency(hz);
  }

  // ========== MODES AND TRIGGERS ==========

  /** Last autoinstall mode written or read */
  get autoinstall(): AutoinstallMode {
    return this._autoinstall;
  }

  async getAutoinstall(): Promise<AutoinstallMode> {
    const [reply = ''] = await this.framer.execute([AUTOINSTALL_COMMAND]);
    this._autoinstall = parseAutoinstallResponse(reply);
    return this._autoinstall;
  }

  /**
   * @param mode - off (0), install (1) applies channel edits at once,
   *   queue (2) holds them until install()
   */
  async setAutoinstall(mode: AutoinstallLike): Promise<void> {
    const command = buildAutoinstallCommand(mode);
    this._autoinstall = normalizeAutoinstall(mode);
    const [reply = ''] = await this.framer.execute([command]);
    assertAccepted(command, reply);
  }

  /** Last trigger level written, volts; undefined until set */
  get triggerLevel(): number | undefined {
    return this._triggerLevel;
  }

  async setTriggerLevel(volts: number): Promise<void> {
    const command = buildTriggerLevelCommand(volts);
    this._triggerLevel = volts;
    await this.run(command);
  }

  /** Switches the trigger to remote (software) mode */
  async armSoftwareTrigger(): Promise<void> {
    await this.run(TRIGGER_REMOTE_COMMAND);
  }

  async fireTrigger(): Promise<void> {
    await this.run(FIRE_COMMAND);
  }

  /** Applies queued channel settings */
  async install(): Promise<void> {
    await this.run(INSTALL_COMMAND);
  }

  /**
   * Emits one pulse of the given width: width, remote trigger, install and
   * fire go out in a single frame. Channel Q pulses all four outputs.
   */
  async firePulse(channel: ChannelLike, width: TimeInput): Promise<void> {
    const id = normalizeChannel(channel);
    const targets = id === 'Q' ? this.channels : [this.channelById(id)];
    const ns = toNanoseconds(width, this.normalizer);
    const commands = [
      buildChannelWidthCommand(id, ns),
      TRIGGER_REMOTE_COMMAND,
      INSTALL_COMMAND,
      FIRE_COMMAND,
    ];
    for (const target of targets) {
      target.markWritten('width', s => {
        s.widthNs = ns;
      });
    }
    assertAllAccepted(commands, await this.framer.execute(commands));
  }

  // ========== SETUP MEMORY ==========

  /** Saves the current settings to nonvolatile memory */
  async saveSettings(): Promise<void> {
    await this.run(SAVE_COMMAND);
  }

  /**
   * Loads the settings saved in nonvolatile memory and re-reads the channel
   * and train mirrors.
   */
  async recallSettings(): Promise<void> {
    await this.run(RECALL_COMMAND);
    for (const channel of this.channels) {
      await channel.query();
    }
    await this.readTrain();
  }

  async status(): Promise<string> {
    return this.run(STATUS_COMMAND);
  }

  // ========== CLOCK ==========

  /** Drives the 10 MHz reference out of the CLOCK connector */
  async clockOut(): Promise<string> {
    return this.run(CLOCK_OUT_COMMAND);
  }

  /** Locks to an external reference on the CLOCK connector */
  async clockIn(): Promise<string> {
    return this.run(CLOCK_IN_COMMAND);
  }

  async clockStatus(): Promise<string> {
    return this.run(CLOCK_COMMAND);
  }

  // ========== TRAIN MODE ==========

  /** Pulses per trigger; 1 means train mode is off */
  get trainCount(): number {
    return decodeTrainCount(this._trainRegister);
  }

  get trainSpacingNs(): number {
    return ticksToSpacing(this._trainTicks);
  }

  get train(): TrainConfig {
    return { pulseCount: this.trainCount, spacingTicks: this._trainTicks };
  }

  /**
   * Re-reads the TC and TS registers.
   */
  async readTrain(): Promise<TrainConfig> {
    const [count = '', spacing = ''] = await this.framer.execute([
      TRAIN_COUNT_COMMAND,
      TRAIN_SPACING_COMMAND,
    ]);
    this._trainRegister = parseIntegerReply(TRAIN_COUNT_COMMAND, count);
    this._trainTicks = parseIntegerReply(TRAIN_SPACING_COMMAND, spacing);
    return this.train;
  }

  /**
   * @throws PulseGenRangeError outside [1, 2^32]
   */
  async setTrainCount(count: number): Promise<void> {
    const command = buildTrainCountCommand(count);
    this._trainRegister = encodeTrainCount(count);
    const [reply = ''] = await this.framer.execute([command]);
    assertAccepted(command, reply);
  }

  /**
   * Sets the spacing between pulses of a train. Channels with pending writes
   * are read back first so the timing window reflects the device.
   * @param spacing - bare numbers are nanoseconds
   * @returns the spacing actually programmed
   * @throws PulseGenPreconditionError when no channel takes part in the train
   */
  async setTrainSpacing(spacing: TimeInput): Promise<TrainSpacing> {
    const requestedNs = toNanoseconds(spacing, this.normalizer);
    validateRequestedSpacing(requestedNs);
    const live: Readonly<ChannelSettings>[] = [];
    for (const channel of this.channels) {
      live.push(await channel.refreshIfPending());
    }

    const result = computeTrainSpacing(live, requestedNs);
    const command = buildTrainSpacingCommand(result.ticks);
    this._trainTicks = result.ticks;
    const [reply = ''] = await this.framer.execute([command]);
    assertAccepted(command, reply);

    if (result.effectiveNs !== requestedNs) {
      logger.debug(`Train spacing ${requestedNs} ns programmed as ${result.effectiveNs} ns`, {
        ticks: result.ticks,
      });
    }
    return result;
  }

  private async run(command: string): Promise<string> {
    const [reply = ''] = await this.framer.execute([command]);
    return assertAccepted(command, reply);
  }
}
