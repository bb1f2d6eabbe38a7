// src/emulator/pulse-generator-emulator.ts

import { decodeLoopCount } from '../commands/frame.js';
import { AUTOINSTALL_CODES, CHANNEL_IDS, FRAME, SYNTH, TRAIN, WIRE } from '../constants/constants.js';
import { PulseGenNotConnectedError, PulseGenTimeoutError } from '../errors.js';
import Logger from '../logger.js';
import {
  ChannelId,
  ChannelSettings,
  EmulatorOptions,
  LoggerInstance,
  Transport,
} from '../types/pulsegen-types.js';
import { asciiToBytes, bytesToAscii, concatUint8Arrays, allocUint8Array, escapeControl } from '../utils/utils.js';

const ACK = 'OK';
const PS_PER_SECOND = 1e12;
const MAX_SPACING_TICKS = TRAIN.MAX_SPACING_NS / TRAIN.TICK_NS;
const MAX_TRAIN_REGISTER = TRAIN.MAX_PULSES - 1;

type EmulatedChannel = Omit<ChannelSettings, 'id'>;
type PlaybackState = 'idle' | 'running' | 'done';

/** Register snapshot exposed for assertions */
export interface EmulatorState {
  channels: Record<ChannelId, Readonly<EmulatedChannel>>;
  frameFirst: number;
  frameLast: number;
  loopRegister: number;
  trainRegister: number;
  trainTicks: number;
  autoinstall: number;
  frequencyHz: number;
  triggerSource: 'SY' | 'RE';
  triggerLevel: number;
  verbose: boolean;
  storedFrames: number[];
  fired: number;
  installs: number;
}

interface SetupMemory {
  channels: Record<ChannelId, EmulatedChannel>;
  frequencyHz: number;
  trainRegister: number;
  trainTicks: number;
  autoinstall: number;
}

function defaultChannels(): Record<ChannelId, EmulatedChannel> {
  const channel = (): EmulatedChannel => ({ polarity: 'high', enabled: false, delayNs: 0, widthNs: 0 });
  return { A: channel(), B: channel(), C: channel(), D: channel() };
}

function cloneChannels(channels: Record<ChannelId, EmulatedChannel>): Record<ChannelId, EmulatedChannel> {
  return { A: { ...channels.A }, B: { ...channels.B }, C: { ...channels.C }, D: { ...channels.D } };
}

function toChannelId(letter: string): ChannelId | undefined {
  return CHANNEL_IDS.find(id => id === letter);
}

function parseRegister(arg: string, max: number): number | undefined {
  if (!/^\d+$/.test(arg)) return undefined;
  const value = parseInt(arg, 10);
  return value <= max ? value : undefined;
}

/**
 * Formats a time the way the device prints it: whole seconds, then the
 * fraction to picoseconds in comma separated groups of three.
 * 100 ns -> "00.000,000,100,000"
 */
export function formatDeviceSeconds(ns: number): string {
  const ps = Math.round(ns * 1000);
  const whole = Math.floor(ps / PS_PER_SECOND);
  const fraction = String(ps % PS_PER_SECOND).padStart(12, '0');
  const groups = fraction.match(/\d{3}/g) ?? [];
  return `${String(whole).padStart(2, '0')}.${groups.join(',')}`;
}

/**
 * In-process model of the pulse generator that speaks the wire protocol.
 *
 * Written frames are answered at once: each command gets a reply followed by
 * the delimiter and the batch ends with the two byte end marker. read() never
 * waits; asking for bytes that are not there fails with a timeout, so a
 * client that expects more than the device sent cannot hang a test.
 *
 * Frame playback is modelled by counting FR polls: every poll while running
 * advances `framesPerPoll` frames until first..last has been played the
 * programmed number of times.
 */
class PulseGeneratorEmulator implements Transport {
  private channels: Record<ChannelId, EmulatedChannel> = defaultChannels();
  private frames: Map<number, Record<ChannelId, EmulatedChannel>> = new Map();
  private frameFirst: number = 0;
  private frameLast: number = 0;
  private loopRegister: number = 0;
  private trainRegister: number = 0;
  private trainTicks: number = 1;
  private autoinstall: number = AUTOINSTALL_CODES.install;
  private frequencyHz: number = SYNTH.DEFAULT_FREQUENCY_HZ;
  private triggerSource: 'SY' | 'RE' = 'SY';
  private triggerLevel: number = 0;
  private clockSource: 'IN' | 'OU' | 'INT' = 'INT';
  private verbose: boolean = true;
  private fired: number = 0;
  private installs: number = 0;
  private setup: SetupMemory | null = null;

  private playback: PlaybackState = 'idle';
  private played: number = 0;

  private inbound: string = '';
  private outbound: Uint8Array = allocUint8Array(0);
  private rejected: Set<string> = new Set();
  private frameLog: string[][] = [];
  private _connected: boolean = false;

  private readonly framesPerPoll: number;
  private loggerEnabled: boolean;
  private logger: LoggerInstance;

  constructor(options: EmulatorOptions = {}) {
    this.framesPerPoll = options.framesPerPoll ?? 1;
    this.loggerEnabled = !!options.loggerEnabled;
    const loggerInstance = new Logger();
    this.logger = loggerInstance.createLogger('Emulator');
    this.logger.setLevel(this.loggerEnabled ? 'debug' : 'error');
  }

  enableLogger(): void {
    this.loggerEnabled = true;
    this.logger.setLevel('debug');
  }

  disableLogger(): void {
    this.loggerEnabled = false;
    this.logger.setLevel('error');
  }

  // ========== TRANSPORT ==========

  get isOpen(): boolean {
    return this._connected;
  }

  async connect(): Promise<void> {
    this._connected = true;
    this.logger.info('Connected');
  }

  async disconnect(): Promise<void> {
    this._connected = false;
    this.inbound = '';
    this.outbound = allocUint8Array(0);
    this.logger.info('Disconnected');
  }

  async write(buffer: Uint8Array): Promise<void> {
    if (!this._connected) throw new PulseGenNotConnectedError();
    this.inbound += bytesToAscii(buffer);

    let end = this.inbound.indexOf(WIRE.TERMINATOR);
    while (end !== -1) {
      const frame = this.inbound.slice(0, end);
      this.inbound = this.inbound.slice(end + WIRE.TERMINATOR.length);
      this.queue(this.handleFrame(frame));
      end = this.inbound.indexOf(WIRE.TERMINATOR);
    }
  }

  /**
   * @throws PulseGenTimeoutError when fewer than `length` bytes are queued
   */
  async read(length: number): Promise<Uint8Array> {
    if (!this._connected) throw new PulseGenNotConnectedError();
    if (this.outbound.length < length) {
      throw new PulseGenTimeoutError(
        `Emulator has ${this.outbound.length} of ${length} requested bytes queued`
      );
    }
    const data = this.outbound.slice(0, length);
    this.outbound = this.outbound.slice(length);
    return data;
  }

  async flush(): Promise<void> {
    this.outbound = allocUint8Array(0);
    this.inbound = '';
  }

  // ========== TEST CONTROLS ==========

  /** Makes every command starting with `keyword` answer with the error sentinel */
  reject(keyword: string): void {
    this.rejected.add(keyword.toUpperCase());
  }

  clearRejections(): void {
    this.rejected.clear();
  }

  /** Appends raw bytes to the reply stream, e.g. to simulate line noise */
  inject(raw: string): void {
    this.queue(raw);
  }

  /** Command batches received so far, one array per frame */
  get receivedFrames(): readonly (readonly string[])[] {
    return this.frameLog;
  }

  get pendingBytes(): number {
    return this.outbound.length;
  }

  get state(): EmulatorState {
    return {
      channels: cloneChannels(this.channels),
      frameFirst: this.frameFirst,
      frameLast: this.frameLast,
      loopRegister: this.loopRegister,
      trainRegister: this.trainRegister,
      trainTicks: this.trainTicks,
      autoinstall: this.autoinstall,
      frequencyHz: this.frequencyHz,
      triggerSource: this.triggerSource,
      triggerLevel: this.triggerLevel,
      verbose: this.verbose,
      storedFrames: [...this.frames.keys()].sort((x, y) => x - y),
      fired: this.fired,
      installs: this.installs,
    };
  }

  /** Stored frame contents, or undefined for an empty slot */
  storedFrame(index: number): Record<ChannelId, Readonly<EmulatedChannel>> | undefined {
    const frame = this.frames.get(index);
    return frame ? cloneChannels(frame) : undefined;
  }

  // ========== PROTOCOL ==========

  private queue(text: string): void {
    this.outbound = concatUint8Arrays([this.outbound, asciiToBytes(text)]);
  }

  private handleFrame(frame: string): string {
    const commands = frame.split(WIRE.DELIMITER);
    // The trailing delimiter leaves one empty entry at the end
    if (commands[commands.length - 1] === '') commands.pop();
    this.frameLog.push(commands);

    const replies = commands.map(command => {
      const reply = this.handleCommand(command);
      this.logger.debug(`${command} -> ${reply}`, { command });
      return reply + WIRE.DELIMITER;
    });
    const out = replies.join('') + WIRE.END_MARKER;
    this.logger.trace(`TX ${escapeControl(out)}`);
    return out;
  }

  private handleCommand(raw: string): string {
    const upper = raw.trim().toUpperCase();
    const [keyword = '', ...args] = upper.split(/\s+/);
    for (const prefix of this.rejected) {
      if (upper.startsWith(prefix)) return WIRE.ERROR_SENTINEL;
    }
    const arg = args.join(' ');

    // Channel commands: AS, AD, AW, ... and QS/QD/QW for all four
    if (keyword.length === 2) {
      const target = keyword.charAt(0);
      const op = keyword.charAt(1);
      const ids: ChannelId[] | undefined =
        target === 'Q' ? [...CHANNEL_IDS] : [toChannelId(target)].filter((id): id is ChannelId => !!id);
      if (ids.length > 0 && (op === 'S' || op === 'D' || op === 'W')) {
        return this.handleChannel(ids, target === 'Q', op, arg);
      }
    }

    switch (keyword) {
      case 'VE':
        if (arg !== '0' && arg !== '1') return WIRE.ERROR_SENTINEL;
        this.verbose = arg === '1';
        return ACK;
      case 'AU':
        return this.handleRegister(arg, () => this.autoinstall, v => (this.autoinstall = v), 2);
      case 'SY':
        return this.handleSynth(arg);
      case 'TR':
        if (arg !== 'SY' && arg !== 'RE') return WIRE.ERROR_SENTINEL;
        this.triggerSource = arg;
        return ACK;
      case 'TLEVEL': {
        const volts = Number(arg);
        if (arg === '' || !Number.isFinite(volts)) return WIRE.ERROR_SENTINEL;
        this.triggerLevel = volts;
        return ACK;
      }
      case 'FI':
        this.fired++;
        return ACK;
      case 'IN':
        this.installs++;
        return ACK;
      case 'SA':
        this.setup = {
          channels: cloneChannels(this.channels),
          frequencyHz: this.frequencyHz,
          trainRegister: this.trainRegister,
          trainTicks: this.trainTicks,
          autoinstall: this.autoinstall,
        };
        return ACK;
      case 'RE':
        if (!this.setup) return WIRE.ERROR_SENTINEL;
        this.channels = cloneChannels(this.setup.channels);
        this.frequencyHz = this.setup.frequencyHz;
        this.trainRegister = this.setup.trainRegister;
        this.trainTicks = this.setup.trainTicks;
        this.autoinstall = this.setup.autoinstall;
        return ACK;
      case 'STATUS':
        return `FREQ ${this.frequencyHz} TRIG ${this.triggerSource} AU ${this.autoinstall}`;
      case 'CL':
        if (arg === '') return this.clockSource;
        if (arg !== 'IN' && arg !== 'OU') return WIRE.ERROR_SENTINEL;
        this.clockSource = arg;
        return ACK;
      case 'FA':
        return this.handleRegister(arg, () => this.frameFirst, v => (this.frameFirst = v), FRAME.MAX_NUM - 1);
      case 'FB':
        return this.handleRegister(arg, () => this.frameLast, v => (this.frameLast = v), FRAME.MAX_NUM - 1);
      case 'FC':
        return this.handleRegister(arg, () => this.loopRegister, v => (this.loopRegister = v), FRAME.FOREVER);
      case 'FR':
        return this.handleFrameCommand(arg);
      case 'RZ':
        this.frames.clear();
        this.frameFirst = 0;
        this.frameLast = 0;
        this.playback = 'idle';
        return ACK;
      case 'TC':
        return this.handleRegister(arg, () => this.trainRegister, v => (this.trainRegister = v), MAX_TRAIN_REGISTER);
      case 'TS': {
        if (arg === '') return String(this.trainTicks);
        const ticks = parseRegister(arg, MAX_SPACING_TICKS);
        if (ticks === undefined || ticks < 1) return WIRE.ERROR_SENTINEL;
        this.trainTicks = ticks;
        return ACK;
      }
      default:
        this.logger.warn(`Unknown command "${raw}"`, { command: raw });
        return WIRE.ERROR_SENTINEL;
    }
  }

  private handleChannel(ids: ChannelId[], broadcast: boolean, op: string, arg: string): string {
    if (op === 'S') {
      if (arg === '') {
        const [id] = ids;
        if (broadcast || id === undefined) return WIRE.ERROR_SENTINEL;
        return this.statusLine(id);
      }
      let update: (ch: EmulatedChannel) => void;
      switch (arg) {
        case 'ON':
          update = ch => (ch.enabled = true);
          break;
        case 'OF':
        case 'OFF':
          update = ch => (ch.enabled = false);
          break;
        case 'PO':
          update = ch => (ch.polarity = 'high');
          break;
        case 'NE':
          update = ch => (ch.polarity = 'low');
          break;
        default:
          return WIRE.ERROR_SENTINEL;
      }
      for (const id of ids) update(this.channels[id]);
      return ACK;
    }

    const field = op === 'D' ? 'delayNs' : 'widthNs';
    if (arg === '') {
      const [id] = ids;
      if (broadcast || id === undefined) return WIRE.ERROR_SENTINEL;
      return formatDeviceSeconds(this.channels[id][field]);
    }
    const ns = Number(arg);
    if (!Number.isFinite(ns) || ns < 0) return WIRE.ERROR_SENTINEL;
    for (const id of ids) this.channels[id][field] = ns;
    return ACK;
  }

  private statusLine(id: ChannelId): string {
    const ch = this.channels[id];
    const polarity = ch.polarity === 'high' ? 'POS' : 'NEG';
    const state = ch.enabled ? 'ON ' : 'OFF';
    return `Ch ${id}  ${polarity}  ${state}    Dly  ${formatDeviceSeconds(ch.delayNs)}  Wid  ${formatDeviceSeconds(ch.widthNs)}`;
  }

  private handleRegister(
    arg: string,
    get: () => number,
    set: (value: number) => void,
    max: number
  ): string {
    if (arg === '') return String(get());
    const value = parseRegister(arg, max);
    if (value === undefined) return WIRE.ERROR_SENTINEL;
    set(value);
    return ACK;
  }

  private handleSynth(arg: string): string {
    if (arg === '') return this.frequencyHz.toFixed(6);
    const hz = Number(arg);
    if (!Number.isFinite(hz) || hz <= 0 || hz > SYNTH.MAX_FREQUENCY_HZ) return WIRE.ERROR_SENTINEL;
    this.frequencyHz = hz;
    return ACK;
  }

  private handleFrameCommand(arg: string): string {
    if (arg === '') return this.pollPlayback();
    if (arg === 'GO') {
      this.playback = 'running';
      this.played = 0;
      return ACK;
    }
    if (arg === 'OF' || arg === 'OFF') {
      this.playback = 'idle';
      return ACK;
    }
    const index = parseRegister(arg, FRAME.MAX_NUM - 1);
    if (index === undefined) return WIRE.ERROR_SENTINEL;
    this.frames.set(index, cloneChannels(this.channels));
    return ACK;
  }

  // Reports the frame being played and moves playback forward
  private pollPlayback(): string {
    if (this.playback === 'idle') return 'OFF';
    if (this.playback === 'done') return 'DONE';

    const span = Math.max(this.frameLast - this.frameFirst + 1, 1);
    const loops = decodeLoopCount(this.loopRegister);
    const total = loops === 0 ? Infinity : span * loops;
    if (this.played >= total) {
      this.playback = 'done';
      return 'DONE';
    }
    const current = this.frameFirst + (this.played % span);
    this.played += this.framesPerPoll;
    return String(current);
  }
}

export default PulseGeneratorEmulator;
