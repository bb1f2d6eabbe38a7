// src/transport/node-serialport.ts

import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array } from '../utils/utils.js';
import { pulsegenLogger } from '../logger.js';
import {
  NodeSerialBufferOverflowError,
  NodeSerialConnectionError,
  NodeSerialReadError,
  NodeSerialTransportError,
  NodeSerialWriteError,
  PulseGenNotConnectedError,
  PulseGenTimeoutError,
} from '../errors.js';
import { NodeSerialTransportOptions, Transport } from '../types/pulsegen-types.js';

// ========== CONSTANTS ==========
const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 115200,
  DEFAULT_BAUD_RATE: 38400,
  DEFAULT_MAX_BUFFER_SIZE: 4096,
  POLL_INTERVAL_MS: 5,
} as const;

const logger = pulsegenLogger.createLogger('NodeSerialTransport');

function toConnectionError(err: Error): NodeSerialConnectionError {
  const message = err.message.toLowerCase();
  if (message.includes('permission')) return new NodeSerialConnectionError('Permission denied');
  if (message.includes('busy')) return new NodeSerialConnectionError('Serial port is busy');
  if (message.includes('no such file')) {
    return new NodeSerialConnectionError('Serial port does not exist');
  }
  return new NodeSerialConnectionError(err.message);
}

/**
 * Serial link to the pulse generator through the `serialport` package.
 *
 * Incoming bytes are buffered as they arrive and handed out by read(), which
 * polls the buffer until enough bytes are there or the deadline passes.
 */
class NodeSerialTransport implements Transport {
  private readonly path: string;
  private readonly options: Required<NodeSerialTransportOptions>;
  private port: SerialPort | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private _isOpen: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(path: string, options: NodeSerialTransportOptions = {}) {
    this.path = path;
    this.options = {
      baudRate: NODE_SERIAL_CONSTANTS.DEFAULT_BAUD_RATE,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      readTimeout: Infinity,
      maxBufferSize: NODE_SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      ...options,
    };
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async connect(): Promise<void> {
    if (this._isOpen) {
      logger.warn(`Serial port ${this.path} already open`);
      return;
    }
    if (
      this.options.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new NodeSerialConnectionError(`Invalid baud rate: ${this.options.baudRate}`);
    }

    const port = new SerialPort({
      path: this.path,
      baudRate: this.options.baudRate,
      dataBits: this.options.dataBits,
      stopBits: this.options.stopBits,
      parity: this.options.parity,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err: Error | null) => {
        if (err) reject(toConnectionError(err));
        else resolve();
      });
    });

    this.port = port;
    this.readBuffer = allocUint8Array(0);
    this._isOpen = true;
    port.on('data', (data: Buffer) => this._onData(data));
    port.on('error', (err: Error) => this._onError(err));
    port.on('close', () => this._onClose());
    logger.info(`Serial port ${this.path} opened`, { transport: this.path });
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    this.port = null;
    this._isOpen = false;
    this.readBuffer = allocUint8Array(0);
    if (!port) return;

    port.removeAllListeners('data');
    port.removeAllListeners('error');
    port.removeAllListeners('close');
    if (!port.isOpen) return;

    await new Promise<void>((resolve, reject) => {
      port.close((err: Error | null) => {
        if (err) reject(new NodeSerialConnectionError(err.message));
        else resolve();
      });
    });
    logger.info(`Serial port ${this.path} closed`, { transport: this.path });
  }

  async write(buffer: Uint8Array): Promise<void> {
    const port = this.requirePort();
    await this._operationMutex.runExclusive(
      () =>
        new Promise<void>((resolve, reject) => {
          port.write(Buffer.from(buffer), (err: Error | null | undefined) => {
            if (err) {
              reject(new NodeSerialWriteError(err.message));
              return;
            }
            port.drain((drainErr: Error | null) => {
              if (drainErr) reject(new NodeSerialWriteError(drainErr.message));
              else resolve();
            });
          });
        })
    );
  }

  /**
   * @param timeout - ms; defaults to the `readTimeout` option, Infinity blocks
   * @throws PulseGenTimeoutError when fewer than `length` bytes arrived in time
   */
  async read(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (!Number.isInteger(length) || length <= 0) {
      throw new NodeSerialReadError(`Read length must be a positive integer, got ${length}`);
    }
    this.requirePort();

    return this._operationMutex.runExclusive(
      () =>
        new Promise<Uint8Array>((resolve, reject) => {
          const start = Date.now();
          const check = (): void => {
            if (!this._isOpen) {
              reject(new NodeSerialReadError('Port closed'));
              return;
            }
            if (this.readBuffer.length >= length) {
              const data = sliceUint8Array(this.readBuffer, 0, length).slice();
              this.readBuffer = sliceUint8Array(this.readBuffer, length);
              resolve(data);
              return;
            }
            if (Date.now() - start >= timeout) {
              reject(
                new PulseGenTimeoutError(
                  `Read timeout: ${this.readBuffer.length}/${length} bytes after ${timeout} ms`
                )
              );
              return;
            }
            setTimeout(check, NODE_SERIAL_CONSTANTS.POLL_INTERVAL_MS);
          };
          check();
        })
    );
  }

  /** Drops buffered input, ours and the OS driver's */
  async flush(): Promise<void> {
    this.readBuffer = allocUint8Array(0);
    const port = this.port;
    if (!port || !port.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      port.flush((err: Error | null) => {
        if (err) reject(new NodeSerialTransportError(err.message));
        else resolve();
      });
    });
    logger.debug('Input flushed', { transport: this.path });
  }

  private requirePort(): SerialPort {
    if (!this._isOpen || !this.port) {
      throw new PulseGenNotConnectedError();
    }
    return this.port;
  }

  private _onData(data: Buffer): void {
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    const size = this.readBuffer.length + chunk.length;
    if (size > this.options.maxBufferSize) {
      // Oldest bytes go; the framer will see a broken reply and desynchronize
      const err = new NodeSerialBufferOverflowError(size, this.options.maxBufferSize);
      logger.error(err.message, { transport: this.path });
      const merged = concatUint8Arrays([this.readBuffer, chunk]);
      this.readBuffer = sliceUint8Array(merged, -this.options.maxBufferSize);
      return;
    }
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
  }

  private _onError(err: Error): void {
    logger.error(`Serial port ${this.path} error: ${err.message}`, { transport: this.path });
  }

  private _onClose(): void {
    logger.warn(`Serial port ${this.path} closed by the driver`, { transport: this.path });
    this._isOpen = false;
    this.port = null;
  }
}

export default NodeSerialTransport;
