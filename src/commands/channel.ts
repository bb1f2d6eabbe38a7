// src/commands/channel.ts

import { PulseGenDecodeError, PulseGenRangeError } from '../errors.js';
import { ChannelId, ChannelTarget, Polarity } from '../types/pulsegen-types.js';
import { toFixedArg } from '../utils/utils.js';
import { assertAccepted } from './reply.js';

const NS_PER_SECOND = 1e9;
// Read-back times are kept to picosecond resolution
const PS_PER_NS = 1000;
const STATUS_TOKEN_COUNT = 8;

// Token positions in "Ch A  POS  ON     Dly  00.000,000,000,000  Wid  00.000,002,000,000"
const STATUS_FIELDS = Object.freeze({
  POLARITY: 2,
  ENABLED: 3,
  DELAY: 5,
  WIDTH: 7,
});

export interface ChannelStatusResponse {
  polarity: Polarity;
  enabled: boolean;
  delayNs: number;
  widthNs: number;
}

function validateTime(what: string, ns: number): void {
  if (!Number.isFinite(ns) || ns < 0) {
    throw new PulseGenRangeError(`${what} must be a non-negative time, got ${ns} ns`);
  }
}

export function buildChannelStatusCommand(channel: ChannelId): string {
  return `${channel}S`;
}

export function buildChannelEnableCommand(channel: ChannelTarget, enabled: boolean): string {
  return `${channel}S ${enabled ? 'ON' : 'OF'}`;
}

export function buildChannelPolarityCommand(channel: ChannelTarget, polarity: Polarity): string {
  return `${channel}S ${polarity === 'high' ? 'PO' : 'NE'}`;
}

/**
 * @param delayNs - delay from trigger to the leading edge, ns
 * @throws PulseGenRangeError for a negative or non-finite delay
 */
export function buildChannelDelayCommand(channel: ChannelTarget, delayNs: number): string {
  validateTime('Delay', delayNs);
  return `${channel}D ${toFixedArg(delayNs)}`;
}

/**
 * @param widthNs - pulse width, ns
 * @throws PulseGenRangeError for a negative or non-finite width
 */
export function buildChannelWidthCommand(channel: ChannelTarget, widthNs: number): string {
  validateTime('Width', widthNs);
  return `${channel}W ${toFixedArg(widthNs)}`;
}

function secondsToNs(seconds: number): number {
  return Math.round(seconds * NS_PER_SECOND * PS_PER_NS) / PS_PER_NS;
}

function parseSeconds(command: string, reply: string, token: string | undefined): number {
  const cleaned = (token ?? '').replace(/,/g, '');
  const seconds = Number(cleaned);
  if (cleaned === '' || !Number.isFinite(seconds)) {
    throw new PulseGenDecodeError(command, reply, 'a time in seconds');
  }
  return seconds;
}

/**
 * Parses a channel status line. Times come back in seconds and are returned in ns.
 * @throws PulseGenDeviceRejectedError when the reply is the error sentinel
 * @throws PulseGenDecodeError when the line does not have the status shape
 */
export function parseChannelStatusResponse(command: string, reply: string): ChannelStatusResponse {
  assertAccepted(command, reply);
  const terms = reply.trim().split(/\s+/);
  if (terms.length < STATUS_TOKEN_COUNT) {
    throw new PulseGenDecodeError(command, reply, `${STATUS_TOKEN_COUNT} status fields`);
  }

  const polarityToken = terms[STATUS_FIELDS.POLARITY];
  const enabledToken = terms[STATUS_FIELDS.ENABLED];
  if (polarityToken !== 'POS' && polarityToken !== 'NEG') {
    throw new PulseGenDecodeError(command, reply, 'polarity POS or NEG');
  }
  if (enabledToken !== 'ON' && enabledToken !== 'OFF') {
    throw new PulseGenDecodeError(command, reply, 'state ON or OFF');
  }

  return {
    polarity: polarityToken === 'POS' ? 'high' : 'low',
    enabled: enabledToken === 'ON',
    delayNs: secondsToNs(parseSeconds(command, reply, terms[STATUS_FIELDS.DELAY])),
    widthNs: secondsToNs(parseSeconds(command, reply, terms[STATUS_FIELDS.WIDTH])),
  };
}
