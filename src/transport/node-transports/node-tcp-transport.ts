// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array, describeBytes } from '../../utils/utils.js';
import { rootLogger } from '../../logger.js';
import {
  Iec62056NotConnectedError,
  Iec62056TimeoutError,
  Iec62056TransportError,
  Iec62056ValidationError,
} from '../../errors.js';
import type { NodeTcpTransportOptions, Transport } from '../../types/iec-types.js';

const POLL_INTERVAL_MS = 10;

const logger = rootLogger.createLogger('NodeTcpTransport');

/**
 * Meter reached through a TCP socket (terminal server, GSM/IP modem). Several meters can
 * share the link, so the request message carries the device address. The line speed is
 * fixed by the far end; a baud switch does nothing here.
 */
export class NodeTcpTransport implements Transport {
  readonly requiresAddress = true;

  private host: string;
  private port: number;
  private options: Required<NodeTcpTransportOptions>;
  private socket: net.Socket | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private _isOpen: boolean = false;
  private _isConnecting: boolean = false;
  private _operationMutex: Mutex = new Mutex();
  // Set when unread data was discarded; the next recv fails instead of returning a gap
  private _overflowed: boolean = false;

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      readTimeout: options.readTimeout ?? 30000,
      connectTimeout: options.connectTimeout ?? 10000,
      maxBufferSize: options.maxBufferSize ?? 65536,
    };
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async connect(): Promise<void> {
    if (this._isConnecting || this._isOpen) return;
    this._isConnecting = true;

    await new Promise<void>((resolve, reject) => {
      logger.info(`Connecting to ${this.host}:${this.port}...`);

      const socket = net.connect({ host: this.host, port: this.port }, () => {
        this._isOpen = true;
        this._isConnecting = false;
        socket.setTimeout(0);
        socket.setNoDelay(true);
        logger.info(`Connected to ${this.host}:${this.port}`);
        resolve();
      });
      this.socket = socket;

      socket.on('data', (data: Buffer) => this._onData(data));

      socket.on('error', (err: Error) => {
        if (this._isConnecting) {
          this._isConnecting = false;
          reject(new Iec62056TransportError(`Connection to ${this.host}:${this.port} failed: ${err.message}`));
        }
        this._onError(err);
      });

      socket.on('close', () => this._onClose());
      socket.setTimeout(this.options.connectTimeout);
      socket.on('timeout', () => {
        if (this._isConnecting) {
          this._isConnecting = false;
          socket.destroy();
          reject(new Iec62056TimeoutError(`TCP connection timeout after ${this.options.connectTimeout}ms`));
        }
      });
    });
  }

  private _onData(data: Buffer): void {
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    logger.trace(`Received ${describeBytes(chunk)}`, { bytes: chunk.length });
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
    logger.error(`Socket error: ${err.message}`);
  }

  private _onClose(): void {
    const wasOpen = this._isOpen;
    this._isOpen = false;
    if (wasOpen) {
      logger.warn(`Connection closed for ${this.host}:${this.port}`);
    }
  }

  async send(buffer: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!this._isOpen || !socket) throw new Iec62056NotConnectedError();
    const release = await this._operationMutex.acquire();
    try {
      logger.debug(`Sending ${describeBytes(buffer)}`, { bytes: buffer.length });
      await new Promise<void>((resolve, reject) => {
        socket.write(Buffer.from(buffer), (err?: Error | null) => {
          if (err) reject(new Iec62056TransportError(`Write failed: ${err.message}`));
          else resolve();
        });
      });
    } finally {
      release();
    }
  }

  async recv(length: number, timeout: number = this.options.readTimeout): Promise<Uint8Array> {
    if (length <= 0) throw new Iec62056ValidationError(`Read length must be positive: ${length}`);
    const start = Date.now();
    const release = await this._operationMutex.acquire();
    try {
      return await new Promise<Uint8Array>((resolve, reject) => {
        const check = () => {
          if (this._overflowed) {
            this._overflowed = false;
            reject(new Iec62056TransportError('Read buffer overflow'));
            return;
          }
          if (this.readBuffer.length >= length) {
            const data = sliceUint8Array(this.readBuffer, 0, length);
            this.readBuffer = sliceUint8Array(this.readBuffer, length);
            resolve(data);
            return;
          }
          if (!this._isOpen) {
            reject(new Iec62056NotConnectedError());
            return;
          }
          if (Date.now() - start > timeout) {
            reject(new Iec62056TimeoutError(`Read timeout after ${timeout}ms`));
            return;
          }
          setTimeout(check, POLL_INTERVAL_MS);
        };
        check();
      });
    } finally {
      release();
    }
  }

  async switchBaudrate(baudRate: number): Promise<void> {
    logger.debug(`Baud rate switch to ${baudRate} ignored on TCP`);
  }

  async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    await new Promise<void>(resolve => {
      socket.end(() => resolve());
    });
    this._isOpen = false;
    this.socket = null;
    this.readBuffer = allocUint8Array(0);
    this._overflowed = false;
    logger.info(`Disconnected from ${this.host}:${this.port}`);
  }

  async flush(): Promise<void> {
    this.readBuffer = allocUint8Array(0);
    this._overflowed = false;
  }
}
