// test/mock-transport.ts

import { Iec62056TimeoutError } from '../src/errors.js';
import type { Transport } from '../src/types/iec-types.js';
import { decodeText, encodeText } from '../src/utils/utils.js';

/**
 * In-process transport: replays queued device bytes and records what the client sends.
 * A read that cannot be satisfied from the queue times out at once.
 */
export class MockTransport implements Transport {
  readonly requiresAddress: boolean;
  isOpen = false;
  readonly sent: Uint8Array[] = [];
  readonly baudRates: number[] = [];
  private incoming: number[] = [];

  constructor({ requiresAddress = false }: { requiresAddress?: boolean } = {}) {
    this.requiresAddress = requiresAddress;
  }

  /** Queues bytes the device will send */
  queue(...chunks: Array<string | Uint8Array>): this {
    for (const chunk of chunks) {
      const bytes = typeof chunk === 'string' ? encodeText(chunk) : chunk;
      this.incoming.push(...bytes);
    }
    return this;
  }

  get pending(): number {
    return this.incoming.length;
  }

  /** Everything sent so far, one string per send() */
  get sentText(): string[] {
    return this.sent.map(bytes => decodeText(bytes));
  }

  async connect(): Promise<void> {
    this.isOpen = true;
  }

  async disconnect(): Promise<void> {
    this.isOpen = false;
  }

  async send(buffer: Uint8Array): Promise<void> {
    this.sent.push(Uint8Array.from(buffer));
  }

  async recv(length: number): Promise<Uint8Array> {
    if (this.incoming.length < length) {
      throw new Iec62056TimeoutError('Mock transport has no more data');
    }
    return Uint8Array.from(this.incoming.splice(0, length));
  }

  async switchBaudrate(baudRate: number): Promise<void> {
    this.baudRates.push(baudRate);
  }

  async flush(): Promise<void> {
    this.incoming = [];
  }
}
