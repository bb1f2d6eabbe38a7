// src/channel.ts

import {
  buildChannelDelayCommand,
  buildChannelEnableCommand,
  buildChannelPolarityCommand,
  buildChannelStatusCommand,
  buildChannelWidthCommand,
  parseChannelStatusResponse,
} from './commands/channel.js';
import { assertAccepted } from './commands/reply.js';
import { CHANNEL_IDS } from './constants/constants.js';
import { PulseGenInvalidArgumentError } from './errors.js';
import { CommandFramer } from './framers/command-framer.js';
import { pulsegenLogger } from './logger.js';
import {
  ChannelAttribute,
  ChannelId,
  ChannelLike,
  ChannelSettings,
  ChannelTarget,
  Polarity,
  QuantityNormalizer,
  SyncState,
  TimeInput,
} from './types/pulsegen-types.js';
import { normalizeQuantity, toNanoseconds } from './utils/units.js';

const logger = pulsegenLogger.createLogger('Channel');

const ATTRIBUTES: readonly ChannelAttribute[] = ['polarity', 'enabled', 'delay', 'width'];

/**
 * Normalizes integer/lowercase/uppercase channel names to A, B, C, D or Q.
 * @throws PulseGenInvalidArgumentError
 */
export function normalizeChannel(channel: ChannelLike): ChannelTarget {
  if (typeof channel === 'number') {
    const id = CHANNEL_IDS[channel];
    if (id) return id;
  } else {
    const upper = channel.toUpperCase();
    if (upper === 'Q') return 'Q';
    const id = CHANNEL_IDS.find(c => c === upper);
    if (id) return id;
  }
  throw new PulseGenInvalidArgumentError(channel, 'a channel A-D, Q or index 0-3');
}

/**
 * Accepts 'high'/'low' and the device spellings 'po'/'pos'/'ne'/'neg'.
 * @throws PulseGenInvalidArgumentError
 */
export function normalizePolarity(polarity: string): Polarity {
  switch (polarity.toLowerCase()) {
    case 'high':
    case 'po':
    case 'pos':
      return 'high';
    case 'low':
    case 'ne':
    case 'neg':
      return 'low';
    default:
      throw new PulseGenInvalidArgumentError(polarity, 'polarity high/pos or low/neg');
  }
}

/**
 * Client side mirror of one output channel.
 *
 * Setters update the cache before transmitting and never read the value
 * back. Each attribute records whether its cached value was read from the
 * device (`confirmed`) or only written (`pending`); refreshIfPending()
 * brings pending attributes back in line with the device.
 */
export class Channel {
  readonly id: ChannelId;
  private readonly framer: CommandFramer;
  private readonly normalizer: QuantityNormalizer;
  private _settings: ChannelSettings;
  private _sync: Record<ChannelAttribute, SyncState>;

  constructor(framer: CommandFramer, id: ChannelId, normalizer: QuantityNormalizer = normalizeQuantity) {
    this.framer = framer;
    this.id = id;
    this.normalizer = normalizer;
    // Nothing is known until the first query
    this._settings = { id, polarity: 'high', enabled: false, delayNs: 0, widthNs: 0 };
    this._sync = { polarity: 'pending', enabled: 'pending', delay: 'pending', width: 'pending' };
  }

  /** Cached settings; no device I/O */
  get settings(): Readonly<ChannelSettings> {
    return { ...this._settings };
  }

  get enabled(): boolean {
    return this._settings.enabled;
  }

  get polarity(): Polarity {
    return this._settings.polarity;
  }

  get delayNs(): number {
    return this._settings.delayNs;
  }

  get widthNs(): number {
    return this._settings.widthNs;
  }

  syncState(attribute: ChannelAttribute): SyncState {
    return this._sync[attribute];
  }

  pendingAttributes(): ChannelAttribute[] {
    return ATTRIBUTES.filter(attr => this._sync[attr] === 'pending');
  }

  get hasPendingWrites(): boolean {
    return this.pendingAttributes().length > 0;
  }

  /**
   * Reads the channel status from the device and replaces the cache.
   * @throws PulseGenDeviceRejectedError | PulseGenDecodeError
   */
  async query(): Promise<Readonly<ChannelSettings>> {
    const command = buildChannelStatusCommand(this.id);
    const [reply = ''] = await this.framer.execute([command]);
    const status = parseChannelStatusResponse(command, reply);

    this._settings = { id: this.id, ...status };
    for (const attr of ATTRIBUTES) this._sync[attr] = 'confirmed';
    logger.debug('Status read back', { channel: this.id, ...status });
    return this.settings;
  }

  /**
   * Re-queries the channel when any attribute has not been read back.
   */
  async refreshIfPending(): Promise<Readonly<ChannelSettings>> {
    if (this.hasPendingWrites) {
      logger.debug(`Refreshing pending ${this.pendingAttributes().join(', ')}`, { channel: this.id });
      return this.query();
    }
    return this.settings;
  }

  async setEnabled(enabled: boolean): Promise<void> {
    await this.apply('enabled', buildChannelEnableCommand(this.id, enabled), () => {
      this._settings.enabled = enabled;
    });
  }

  async setPolarity(polarity: Polarity | string): Promise<void> {
    const normalized = normalizePolarity(polarity);
    await this.apply('polarity', buildChannelPolarityCommand(this.id, normalized), () => {
      this._settings.polarity = normalized;
    });
  }

  /**
   * @param delay - bare numbers are nanoseconds
   */
  async setDelay(delay: TimeInput): Promise<void> {
    const ns = toNanoseconds(delay, this.normalizer);
    await this.apply('delay', buildChannelDelayCommand(this.id, ns), () => {
      this._settings.delayNs = ns;
    });
  }

  /**
   * @param width - bare numbers are nanoseconds
   */
  async setWidth(width: TimeInput): Promise<void> {
    const ns = toNanoseconds(width, this.normalizer);
    await this.apply('width', buildChannelWidthCommand(this.id, ns), () => {
      this._settings.widthNs = ns;
    });
  }

  /**
   * Records a value written by someone else (broadcast channel, combined
   * command batch) without any I/O. The attribute becomes pending.
   */
  markWritten(attribute: ChannelAttribute, update: (settings: ChannelSettings) => void): void {
    update(this._settings);
    this._sync[attribute] = 'pending';
  }

  // Cache first, then one command; a rejected write keeps the optimistic value
  private async apply(attribute: ChannelAttribute, command: string, update: () => void): Promise<void> {
    update();
    this._sync[attribute] = 'pending';
    logger.debug(`Write ${attribute}`, { channel: this.id, command });
    const [reply = ''] = await this.framer.execute([command]);
    assertAccepted(command, reply);
  }
}

/**
 * Write-only pseudo channel Q addressing all four outputs at once. Written
 * values are mirrored into every channel as pending.
 */
export class BroadcastChannel {
  readonly id = 'Q' as const;
  private readonly framer: CommandFramer;
  private readonly channels: readonly Channel[];
  private readonly normalizer: QuantityNormalizer;

  constructor(framer: CommandFramer, channels: readonly Channel[], normalizer: QuantityNormalizer = normalizeQuantity) {
    this.framer = framer;
    this.channels = channels;
    this.normalizer = normalizer;
  }

  async setEnabled(enabled: boolean): Promise<void> {
    await this.apply('enabled', buildChannelEnableCommand(this.id, enabled), s => {
      s.enabled = enabled;
    });
  }

  async setPolarity(polarity: Polarity | string): Promise<void> {
    const normalized = normalizePolarity(polarity);
    await this.apply('polarity', buildChannelPolarityCommand(this.id, normalized), s => {
      s.polarity = normalized;
    });
  }

  async setDelay(delay: TimeInput): Promise<void> {
    const ns = toNanoseconds(delay, this.normalizer);
    await this.apply('delay', buildChannelDelayCommand(this.id, ns), s => {
      s.delayNs = ns;
    });
  }

  async setWidth(width: TimeInput): Promise<void> {
    const ns = toNanoseconds(width, this.normalizer);
    await this.apply('width', buildChannelWidthCommand(this.id, ns), s => {
      s.widthNs = ns;
    });
  }

  private async apply(
    attribute: ChannelAttribute,
    command: string,
    update: (settings: ChannelSettings) => void
  ): Promise<void> {
    for (const channel of this.channels) channel.markWritten(attribute, update);
    logger.debug(`Broadcast ${attribute}`, { channel: this.id, command });
    const [reply = ''] = await this.framer.execute([command]);
    assertAccepted(command, reply);
  }
}
