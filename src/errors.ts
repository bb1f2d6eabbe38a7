// src/errors.ts

import { DEVICE_ERROR_MESSAGES } from './constants/constants.js';

/**
 * Base class for all pulse generator errors
 */
export class PulseGenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PulseGenError';
  }
}

// --- Errors for Transport and Framing ---

/**
 * Error class for failures below the command layer
 */
export class PulseGenTransportError extends PulseGenError {
  constructor(message: string = 'Transport failure') {
    super(message);
    this.name = 'PulseGenTransportError';
  }
}

/**
 * Error class for a reply stream that does not match the frame that was sent.
 * Once raised mid-frame the framer stays desynchronized until resync().
 */
export class PulseGenFramingError extends PulseGenTransportError {
  constructor(message: string = 'Reply framing lost') {
    super(message);
    this.name = 'PulseGenFramingError';
  }
}

/**
 * Error class for a reply whose shape cannot be decoded
 */
export class PulseGenDecodeError extends PulseGenTransportError {
  command: string;
  reply: string;

  constructor(command: string, reply: string, expected: string) {
    super(`Cannot decode reply to "${command}": got "${reply}", expected ${expected}`);
    this.name = 'PulseGenDecodeError';
    this.command = command;
    this.reply = reply;
  }
}

/**
 * Error class for not connected
 */
export class PulseGenNotConnectedError extends PulseGenTransportError {
  constructor() {
    super('Not connected to pulse generator');
    this.name = 'PulseGenNotConnectedError';
  }
}

/**
 * Error class for an operation that ran past its deadline
 */
export class PulseGenTimeoutError extends PulseGenTransportError {
  constructor(message: string = 'Operation timed out') {
    super(message);
    this.name = 'PulseGenTimeoutError';
  }
}

// --- Errors reported by the device ---

/**
 * Decodes a device error word into the messages of its set bits.
 * With no bit set (or no word at all) the catch-all message applies.
 */
export function decodeDeviceErrorBits(errorBits?: number): string[] {
  const catchAll: string = DEVICE_ERROR_MESSAGES[7];
  const messages: string[] = [];
  if (errorBits !== undefined) {
    for (let bit = 0; bit < DEVICE_ERROR_MESSAGES.length - 1; bit++) {
      if (errorBits & (1 << bit)) {
        messages.push(DEVICE_ERROR_MESSAGES[bit] ?? catchAll);
      }
    }
  }
  if (messages.length === 0) messages.push(catchAll);
  return messages;
}

/**
 * Error class for a command answered with the error sentinel.
 *
 * The `??` reply says nothing about the cause, and the device's error word is
 * not read back after a rejection, so `errorBits` is only set by callers that
 * queried the word themselves. Without it the explanation is the catch-all.
 */
export class PulseGenDeviceRejectedError extends PulseGenError {
  command: string;
  reply: string;
  errorBits: number | undefined;
  explanations: string[];

  constructor(command: string, reply: string, errorBits?: number) {
    const explanations = decodeDeviceErrorBits(errorBits);
    super(`Device rejected "${command}" (${reply}): ${explanations.join('; ')}`);
    this.name = 'PulseGenDeviceRejectedError';
    this.command = command;
    this.reply = reply;
    this.errorBits = errorBits;
    this.explanations = explanations;
  }
}

// --- Errors for Data Validation ---

/**
 * Error class for a value outside its documented bounds
 */
export class PulseGenRangeError extends PulseGenError {
  constructor(message: string) {
    super(message);
    this.name = 'PulseGenRangeError';
  }
}

/**
 * Error class for an operation whose preconditions do not hold
 */
export class PulseGenPreconditionError extends PulseGenError {
  constructor(message: string) {
    super(message);
    this.name = 'PulseGenPreconditionError';
  }
}

/**
 * Error class for a command batch that cannot be framed
 */
export class PulseGenCommandError extends PulseGenError {
  constructor(message: string) {
    super(message);
    this.name = 'PulseGenCommandError';
  }
}

/**
 * Error class for an argument of the wrong kind (unit, channel, mode)
 */
export class PulseGenInvalidArgumentError extends PulseGenError {
  constructor(value: unknown, expected: string) {
    super(`Invalid argument ${JSON.stringify(value)}, expected ${expected}`);
    this.name = 'PulseGenInvalidArgumentError';
  }
}

// --- Errors for Node serial transport ---

/**
 * Base error class for Node serial transport
 */
export class NodeSerialTransportError extends PulseGenTransportError {
  constructor(message: string = 'Node serial transport error') {
    super(message);
    this.name = 'NodeSerialTransportError';
  }
}

/**
 * Error class for Node serial connection
 */
export class NodeSerialConnectionError extends NodeSerialTransportError {
  constructor(message: string = 'Node serial connection error') {
    super(message);
    this.name = 'NodeSerialConnectionError';
  }
}

/**
 * Error class for Node serial read error
 */
export class NodeSerialReadError extends NodeSerialTransportError {
  constructor(message: string = 'Node serial read error') {
    super(message);
    this.name = 'NodeSerialReadError';
  }
}

/**
 * Error class for Node serial write error
 */
export class NodeSerialWriteError extends NodeSerialTransportError {
  constructor(message: string = 'Node serial write error') {
    super(message);
    this.name = 'NodeSerialWriteError';
  }
}

/**
 * Error class for buffer overflow
 */
export class NodeSerialBufferOverflowError extends NodeSerialTransportError {
  constructor(size: number, max: number) {
    super(`Buffer overflow: ${size} bytes exceeds maximum ${max} bytes`);
    this.name = 'NodeSerialBufferOverflowError';
  }
}
