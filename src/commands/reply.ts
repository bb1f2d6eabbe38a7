// src/commands/reply.ts

import { WIRE } from '../constants/constants.js';
import { PulseGenDecodeError, PulseGenDeviceRejectedError } from '../errors.js';

export function isErrorSentinel(reply: string): boolean {
  return reply.trim() === WIRE.ERROR_SENTINEL;
}

/**
 * Throws when the device answered a command with the error sentinel.
 * @throws PulseGenDeviceRejectedError
 */
export function assertAccepted(command: string, reply: string): string {
  if (isErrorSentinel(reply)) {
    throw new PulseGenDeviceRejectedError(command, reply.trim());
  }
  return reply;
}

/**
 * Checks every reply of a batch against its command.
 */
export function assertAllAccepted(commands: readonly string[], replies: readonly string[]): string[] {
  return commands.map((command, i) => assertAccepted(command, replies[i] ?? ''));
}

/**
 * Parses a register read-back. Grouping commas inserted by verbose mode are ignored.
 * @throws PulseGenDeviceRejectedError | PulseGenDecodeError
 */
export function parseIntegerReply(command: string, reply: string): number {
  assertAccepted(command, reply);
  const digits = reply.trim().replace(/,/g, '');
  if (!/^\d+$/.test(digits)) {
    throw new PulseGenDecodeError(command, reply, 'a non-negative integer');
  }
  return parseInt(digits, 10);
}
