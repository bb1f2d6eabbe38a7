// src/types/pulsegen-types.ts

// !=============================================================================
// ! Channels
// !=============================================================================

/** Physical output channels */
export type ChannelId = 'A' | 'B' | 'C' | 'D';

/** Physical channels plus the write-only broadcast pseudo channel */
export type ChannelTarget = ChannelId | 'Q';

/** Accepted spellings of a channel: letter in either case or index 0..3 */
export type ChannelLike = ChannelTarget | Lowercase<ChannelTarget> | 0 | 1 | 2 | 3;

export type Polarity = 'high' | 'low';

export interface ChannelSettings {
  id: ChannelId;
  polarity: Polarity;
  enabled: boolean;
  delayNs: number;
  widthNs: number;
}

export type ChannelAttribute = 'polarity' | 'enabled' | 'delay' | 'width';

/**
 * `confirmed` - value was read back from the device by a status query.
 * `pending` - value was written optimistically and has not been read back.
 */
export type SyncState = 'confirmed' | 'pending';

// !=============================================================================
// ! Quantities
// !=============================================================================

export type TimeUnit = 's' | 'ms' | 'us' | 'ns' | 'ps';
export type FrequencyUnit = 'Hz' | 'kHz' | 'MHz' | 'GHz';
export type PhysicalUnit = TimeUnit | FrequencyUnit;

/** A magnitude tagged with its unit */
export interface Quantity<U extends PhysicalUnit = PhysicalUnit> {
  magnitude: number;
  unit: U;
}

/** Bare numbers are nanoseconds; strings must carry a unit suffix ("500us") */
export type TimeInput = number | Quantity<TimeUnit> | string;

/** Bare numbers are hertz; strings must carry a unit suffix ("10MHz") */
export type FrequencyInput = number | Quantity<FrequencyUnit> | string;

/**
 * Converts a magnitude with an optional unit into the given base unit.
 * An omitted unit means the value is already in the base unit.
 */
export type QuantityNormalizer = (
  magnitude: number,
  unit: PhysicalUnit | undefined,
  target: 'ns' | 'Hz'
) => number;

// !=============================================================================
// ! Frames
// !=============================================================================

export type FrameSnapshot = Readonly<Record<ChannelId, Readonly<ChannelSettings>>>;

export interface FrameSequenceState {
  first: number;
  last: number;
  /** 0 means loop forever */
  loopCount: number;
}

export type FrameStateMode = 'lenient' | 'strict';

export interface WaitUntilDoneOptions {
  /** Delay between polls, ms */
  pollInterval?: number;
  /** Give up after this many ms; Infinity waits forever */
  timeout?: number;
}

// !=============================================================================
// ! Train mode
// !=============================================================================

export interface TrainWindow {
  /** Channels that take part in the repeated train */
  included: ChannelId[];
  windowStartNs: number;
  windowEndNs: number;
  minSpacingNs: number;
}

export interface TrainSpacing extends TrainWindow {
  requestedNs: number;
  /** Spacing actually programmed: ticks * 20 ns */
  effectiveNs: number;
  ticks: number;
}

export interface TrainConfig {
  pulseCount: number;
  spacingTicks: number;
}

// !=============================================================================
// ! Instrument
// !=============================================================================

export type AutoinstallMode = 'off' | 'install' | 'queue';

export type AutoinstallLike = AutoinstallMode | 0 | 1 | 2;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Logging context */
export interface LogContext {
  logger?: string;
  channel?: string;
  command?: string;
  frame?: number;
  transport?: string;
  [key: string]: string | number | boolean | undefined;
}

/** Category logger instance */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

export interface PulseGeneratorOptions {
  /** Startup frequency of the internal synthesizer, Hz */
  frequency?: FrequencyInput;
  /** Autoinstall mode applied at connect time */
  autoinstall?: AutoinstallMode;
  frameStateMode?: FrameStateMode;
  /** Replaces the built-in unit conversion */
  normalizer?: QuantityNormalizer;
  logLevel?: LogLevel;
}

// !=============================================================================
// ! Transport
// !=============================================================================

export interface Transport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  write(buffer: Uint8Array): Promise<void>;
  /**
   * Resolves with exactly `length` bytes. Without a timeout the transport
   * decides how long to wait.
   */
  read(length: number, timeout?: number): Promise<Uint8Array>;
  /** Drops any buffered input */
  flush?(): Promise<void>;
}

/** Options for the Node.js SerialPort transport */
export interface NodeSerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  /** ms; Infinity blocks until data arrives */
  readTimeout?: number;
  maxBufferSize?: number;
}

export interface EmulatorOptions {
  loggerEnabled?: boolean;
  /** Frames played per `FR` poll while running */
  framesPerPoll?: number;
}
