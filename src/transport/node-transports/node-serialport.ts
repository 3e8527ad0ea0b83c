// src/transport/node-transports/node-serialport.ts

import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array, describeBytes, sleep } from '../../utils/utils.js';
import { rootLogger } from '../../logger.js';
import {
  Iec62056NotConnectedError,
  Iec62056TimeoutError,
  Iec62056TransportError,
  Iec62056ValidationError,
} from '../../errors.js';
import type { NodeSerialTransportOptions, Transport } from '../../types/iec-types.js';

// ========== CONSTANTS ==========
const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 19200,
  DEFAULT_MAX_BUFFER_SIZE: 65536,
  POLL_INTERVAL_MS: 10,
  SWITCHOVER_DELAY_MS: 500,
} as const;

const logger = rootLogger.createLogger('NodeSerialTransport');

/**
 * Maps the messages serialport reports on open into something a user can act on.
 */
function describeOpenError(err: Error): string {
  const message = err.message.toLowerCase();
  if (message.includes('permission')) return 'Permission denied';
  if (message.includes('busy')) return 'Serial port is busy';
  if (message.includes('no such file')) return 'Serial port does not exist';
  return err.message;
}

/**
 * Serial line (optical probe or RS-232/485 converter) driven by `serialport`.
 * Opens at 300 baud 7E1 as mode C requires; incoming bytes are buffered and read by polling.
 */
export class NodeSerialTransport implements Transport {
  readonly requiresAddress = false;

  private path: string;
  private options: Required<NodeSerialTransportOptions>;
  private port: SerialPort | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private _isOpen: boolean = false;
  private _operationMutex: Mutex = new Mutex();
  // Set when unread data was discarded; the next recv fails instead of returning a gap
  private _overflowed: boolean = false;

  constructor(path: string, options: NodeSerialTransportOptions = {}) {
    this.path = path;
    this.options = {
      baudRate: 300,
      dataBits: 7,
      stopBits: 1,
      parity: 'even',
      readTimeout: 30000,
      maxBufferSize: NODE_SERIAL_CONSTANTS.DEFAULT_MAX_BUFFER_SIZE,
      switchoverDelay: NODE_SERIAL_CONSTANTS.SWITCHOVER_DELAY_MS,
      ...options,
    };
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  get baudRate(): number {
    return this.options.baudRate;
  }

  async connect(): Promise<void> {
    if (this._isOpen) {
      logger.warn(`Serial port ${this.path} is already open`);
      return;
    }
    this.validateBaudRate(this.options.baudRate);
    if (this.port) {
      await this._releaseAllResources();
    }

    try {
      await this._createAndOpenPort();
      logger.info(`Serial port ${this.path} opened at ${this.options.baudRate} baud`);
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Iec62056TransportError(String(err));
      logger.error(`Failed to open serial port ${this.path}: ${error.message}`);
      this._isOpen = false;
      throw error;
    }
  }

  private _createAndOpenPort(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const port = new SerialPort({
        path: this.path,
        baudRate: this.options.baudRate,
        dataBits: this.options.dataBits,
        stopBits: this.options.stopBits,
        parity: this.options.parity,
        autoOpen: false,
      });
      this.port = port;

      port.open((err: Error | null) => {
        if (err) {
          this._isOpen = false;
          reject(new Iec62056TransportError(describeOpenError(err)));
          return;
        }
        this._isOpen = true;
        this._removeAllListeners();
        port.on('data', this._onData.bind(this));
        port.on('error', this._onError.bind(this));
        port.on('close', this._onClose.bind(this));
        resolve();
      });
    });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
    if (this.readBuffer.length > this.options.maxBufferSize) {
      logger.error(
        `Read buffer overflow (${this.readBuffer.length} > ${this.options.maxBufferSize}), discarding unread data`
      );
      this.readBuffer = allocUint8Array(0);
      this._overflowed = true;
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port ${this.path} error: ${err.message}`);
  }

  private _onClose(): void {
    logger.info(`Serial port ${this.path} closed`);
    this._isOpen = false;
  }

  private _removeAllListeners(): void {
    if (this.port) {
      this.port.removeAllListeners('data');
      this.port.removeAllListeners('error');
      this.port.removeAllListeners('close');
    }
  }

  private async _releaseAllResources(): Promise<void> {
    logger.debug('Releasing serial port resources');
    this._removeAllListeners();

    const port = this.port;
    if (port && port.isOpen) {
      await new Promise<void>((resolve, reject) => {
        port.close((err: Error | null) => {
          if (err) reject(new Iec62056TransportError(err.message));
          else resolve();
        });
      });
    }

    this.port = null;
    this._isOpen = false;
    this.readBuffer = allocUint8Array(0);
    this._overflowed = false;
  }

  private requirePort(): SerialPort {
    if (!this._isOpen || !this.port?.isOpen) {
      throw new Iec62056NotConnectedError();
    }
    return this.port;
  }

  private validateBaudRate(baudRate: number): void {
    if (
      baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new Iec62056ValidationError(`Invalid baud rate: ${baudRate}`);
    }
  }

  async flush(): Promise<void> {
    const release = await this._operationMutex.acquire();
    try {
      this.readBuffer = allocUint8Array(0);
      this._overflowed = false;
    } finally {
      release();
    }
  }

  async send(buffer: Uint8Array): Promise<void> {
    const port = this.requirePort();
    const release = await this._operationMutex.acquire();
    try {
      logger.debug(`Sending ${describeBytes(buffer)}`, { bytes: buffer.length });
      await new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(buffer), 'binary', (err: Error | null | undefined) => {
          if (err) {
            reject(new Iec62056TransportError(`Write failed: ${err.message}`));
            return;
          }
          port.drain((drainErr: Error | null) => {
            if (drainErr) {
              reject(new Iec62056TransportError(`Drain failed: ${drainErr.message}`));
              return;
            }
            resolve();
          });
        });
      });
    } finally {
      release();
    }
  }

  async recv(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (length <= 0) throw new Iec62056ValidationError(`Read length must be positive: ${length}`);
    const release = await this._operationMutex.acquire();
    const start = Date.now();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const check = () => {
          if (this._overflowed) {
            this._overflowed = false;
            reject(new Iec62056TransportError('Read buffer overflow'));
            return;
          }
          if (!this._isOpen || !this.port?.isOpen) {
            reject(new Iec62056NotConnectedError());
            return;
          }
          if (this.readBuffer.length >= length) {
            const data = sliceUint8Array(this.readBuffer, 0, length);
            this.readBuffer = sliceUint8Array(this.readBuffer, length);
            resolve(data);
            return;
          }
          if (Date.now() - start > timeout) {
            reject(new Iec62056TimeoutError(`Read timeout after ${timeout}ms`));
            return;
          }
          setTimeout(check, NODE_SERIAL_CONSTANTS.POLL_INTERVAL_MS);
        };
        check();
      });
    } finally {
      release();
    }
  }

  /**
   * Re-clocks the open port. The device switches after it has sent the acknowledgement
   * of the option select, so the port waits `switchoverDelay` first.
   */
  async switchBaudrate(baudRate: number): Promise<void> {
    this.validateBaudRate(baudRate);
    const port = this.requirePort();
    await sleep(this.options.switchoverDelay);
    await new Promise<void>((resolve, reject) => {
      port.update({ baudRate }, (err: Error | null | undefined) => {
        if (err) reject(new Iec62056TransportError(`Baud rate switch failed: ${err.message}`));
        else resolve();
      });
    });
    this.options.baudRate = baudRate;
    logger.info(`Serial port ${this.path} switched to ${baudRate} baud`);
  }

  async disconnect(): Promise<void> {
    if (!this.port) {
      this._isOpen = false;
      return;
    }
    await this._releaseAllResources();
    logger.info(`Serial port ${this.path} disconnected`);
  }
}
