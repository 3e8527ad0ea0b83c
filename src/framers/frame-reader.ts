// src/framers/frame-reader.ts

import {
  CONTROL_BYTES,
  DEFAULT_MAX_CHECKSUM_RETRIES,
  DEFAULT_TIMEOUT_MS,
} from '../constants/constants.js';
import { Iec62056ChecksumError, Iec62056TimeoutError, Iec62056TransportError } from '../errors.js';
import { rootLogger } from '../logger.js';
import type { Transport } from '../types/iec-types.js';
import { addBcc, isBccValid } from '../utils/bcc.js';
import { concatUint8Arrays, describeBytes } from '../utils/utils.js';

const logger = rootLogger.createLogger('FrameReader');

const START_BYTES: ReadonlySet<number> = new Set<number>([CONTROL_BYTES.SOH, CONTROL_BYTES.STX]);
const END_BYTES: ReadonlySet<number> = new Set<number>([CONTROL_BYTES.ETX, CONTROL_BYTES.EOT]);
const CONTROL_REPLY_BYTES: ReadonlySet<number> = new Set<number>([CONTROL_BYTES.ACK, CONTROL_BYTES.NACK]);
const LINE_END_BYTES = Uint8Array.of(CONTROL_BYTES.CR, CONTROL_BYTES.LF);

export interface FrameReaderOptions {
  /** Time allowed for one packet to arrive completely, ms */
  timeout?: number;
  /** Consecutive BCC failures tolerated for one packet */
  maxChecksumRetries?: number;
}

/**
 * One packet as it came off the line.
 * `start` is null for a bare ACK/NACK reply.
 */
interface Packet {
  data: Uint8Array;
  start: number | null;
  end: number;
}

/**
 * Reads frames off a byte transport: finds frame boundaries, checks BCCs, answers
 * partial blocks with ACK and bad packets with NACK, and glues partial blocks back
 * into one message.
 */
export class FrameReader {
  private readonly transport: Transport;
  private readonly timeout: number;
  private readonly maxChecksumRetries: number;

  constructor(transport: Transport, options: FrameReaderOptions = {}) {
    this.transport = transport;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.maxChecksumRetries = options.maxChecksumRetries ?? DEFAULT_MAX_CHECKSUM_RETRIES;
  }

  /**
   * Reads one logical message. Returns:
   * - an SOH frame including its BCC, unchecked (command replies such as a password challenge);
   * - an STX frame with a valid BCC; a partial block readout comes back as one frame whose
   *   BCC is recomputed over the reassembled data;
   * - a single ACK or NACK byte when that arrives instead of a frame.
   * @throws Iec62056TimeoutError if a packet does not complete in time
   * @throws Iec62056ChecksumError after more than `maxChecksumRetries` bad BCCs in a row
   */
  async read(): Promise<Uint8Array> {
    const parts: Uint8Array[] = [];
    let accepted = 0;
    let failures = 0;

    while (true) {
      const packet = await this.readPacket();

      if (packet.start === null) {
        logger.debug(`Control reply ${describeBytes(packet.data)}`);
        return packet.data;
      }

      if (packet.start === CONTROL_BYTES.SOH) {
        logger.debug(`Command frame ${describeBytes(packet.data)}`, { bytes: packet.data.length });
        return packet.data;
      }

      if (!isBccValid(packet.data)) {
        failures++;
        logger.warn(`BCC mismatch on packet ${accepted + 1} (attempt ${failures})`, {
          bytes: packet.data.length,
        });
        if (failures > this.maxChecksumRetries) {
          throw new Iec62056ChecksumError(
            `BCC not valid after ${this.maxChecksumRetries} retries`
          );
        }
        await this.transport.send(Uint8Array.of(CONTROL_BYTES.NACK));
        continue;
      }

      failures = 0;
      accepted++;
      // Every packet after the first loses its own STX when glued on.
      const body = accepted > 1 ? packet.data.subarray(1) : packet.data;

      if (packet.end === CONTROL_BYTES.EOT) {
        await this.transport.send(Uint8Array.of(CONTROL_BYTES.ACK));
        parts.push(body.subarray(0, body.length - 2), LINE_END_BYTES);
        logger.debug(`Partial block ${accepted} accepted`, { bytes: packet.data.length });
        continue;
      }

      parts.push(body);
      const total = concatUint8Arrays(parts);
      if (accepted === 1) {
        logger.debug(`Frame ${describeBytes(total)}`, { bytes: total.length });
        return total;
      }
      // Per-packet BCCs were checked on the way; the whole needs its own.
      const reassembled = addBcc(total.subarray(0, total.length - 1));
      logger.debug(`Reassembled ${accepted} partial blocks`, { bytes: reassembled.length });
      return reassembled;
    }
  }

  /**
   * Reads from the first `startChar` through the first following `endChar`, discarding
   * whatever came before the start. Used for the identification message.
   */
  async readUntil(startChar: string | number, endChar: string | number): Promise<Uint8Array> {
    const start = toByte(startChar);
    const end = toByte(endChar);
    const deadline = Date.now() + this.timeout;
    const data: number[] = [];

    while (true) {
      const byte = await this.recvByte(deadline);
      if (data.length === 0) {
        if (byte === start) data.push(byte);
        continue;
      }
      data.push(byte);
      if (byte === end) break;
    }

    const result = Uint8Array.from(data);
    logger.debug(`Received ${describeBytes(result)}`, { bytes: result.length });
    return result;
  }

  /**
   * Reads a single byte, e.g. the ACK/NACK answering a write.
   */
  async readControl(): Promise<number> {
    return this.recvByte(Date.now() + this.timeout);
  }

  private async readPacket(): Promise<Packet> {
    const deadline = Date.now() + this.timeout;
    const data: number[] = [];
    let start: number | null = null;

    while (true) {
      const byte = await this.recvByte(deadline);

      if (start === null) {
        if (START_BYTES.has(byte)) {
          start = byte;
          data.push(byte);
        } else if (CONTROL_REPLY_BYTES.has(byte)) {
          return { data: Uint8Array.of(byte), start: null, end: byte };
        }
        continue;
      }

      data.push(byte);
      if (END_BYTES.has(byte)) {
        data.push(await this.recvByte(deadline));
        return { data: Uint8Array.from(data), start, end: byte };
      }
    }
  }

  private async recvByte(deadline: number): Promise<number> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new Iec62056TimeoutError(`Read timed out after ${this.timeout}ms`);
    }
    const chunk = await this.transport.recv(1, remaining);
    const byte = chunk[0];
    if (byte === undefined) {
      throw new Iec62056TransportError('Transport returned no data');
    }
    return byte;
  }
}

function toByte(char: string | number): number {
  return typeof char === 'number' ? char : char.charCodeAt(0) & 0xff;
}
