import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'net';
import { createTransport } from '../src/transport/factory.js';
import { NodeTcpTransport } from '../src/transport/node-transports/node-tcp-transport.js';
import {
  Iec62056ClientError,
  Iec62056NotConnectedError,
  Iec62056TimeoutError,
  Iec62056TransportError,
} from '../src/errors.js';
import { FrameReader } from '../src/framers/frame-reader.js';
import { DataBlock, DataLine, DataSet, ReadoutDataMessage } from '../src/messages/index.js';
import { decodeText, encodeText } from '../src/utils/utils.js';

const IDENTIFICATION = encodeText('/Els6\\2EK280\r\n');

describe('createTransport', () => {
  it('creates an unopened TCP transport', async () => {
    const transport = await createTransport('tcp', { host: '127.0.0.1', port: 5000 });
    expect(transport).toBeInstanceOf(NodeTcpTransport);
    expect(transport.requiresAddress).toBe(true);
    expect(transport.isOpen).toBe(false);
  });

  it('requires a path for serial transports', async () => {
    await expect(createTransport('serial', { path: '' })).rejects.toThrow(Iec62056ClientError);
  });

  it('requires a host for TCP transports', async () => {
    await expect(createTransport('tcp', { host: '', port: 5000 })).rejects.toThrow(
      Iec62056ClientError
    );
  });
});

describe('NodeTcpTransport', () => {
  let server: net.Server | null = null;

  afterEach(async () => {
    const running = server;
    server = null;
    if (running) {
      await new Promise<void>(resolve => running.close(() => resolve()));
    }
  });

  /** Local meter stand-in answering every request message with `reply` in one write */
  function startMeter(reply: Uint8Array = IDENTIFICATION): Promise<number> {
    return new Promise((resolve, reject) => {
      const meter = net.createServer(socket => {
        socket.on('data', data => {
          if (data.toString('latin1').startsWith('/?')) {
            socket.write(Buffer.from(reply));
          }
        });
      });
      server = meter;
      meter.once('error', reject);
      meter.listen(0, '127.0.0.1', () => {
        const address = meter.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('No TCP port assigned'));
          return;
        }
        resolve(address.port);
      });
    });
  }

  it('exchanges bytes with the far end', async () => {
    const port = await startMeter();
    const transport = new NodeTcpTransport('127.0.0.1', port, { readTimeout: 2000 });

    await transport.connect();
    expect(transport.isOpen).toBe(true);

    await transport.send(encodeText('/?12345678!\r\n'));
    const reply = await transport.recv(14);
    expect(decodeText(reply)).toBe('/Els6\\2EK280\r\n');

    await transport.switchBaudrate(9600);
    await transport.disconnect();
    expect(transport.isOpen).toBe(false);
  });

  it('times out when nothing arrives', async () => {
    const port = await startMeter();
    const transport = new NodeTcpTransport('127.0.0.1', port);
    await transport.connect();

    await expect(transport.recv(1, 50)).rejects.toThrow(Iec62056TimeoutError);

    await transport.disconnect();
  });

  it('delivers a readout of more than 8 KiB intact', async () => {
    const lines = Array.from(
      { length: 600 },
      (_, i) => new DataLine([new DataSet({ address: `1.8.${i}`, value: '00012345.6', unit: 'kWh' })])
    );
    const readout = new ReadoutDataMessage(new DataBlock(lines)).toBytes();
    expect(readout.length).toBeGreaterThan(8192);

    const port = await startMeter(readout);
    const transport = new NodeTcpTransport('127.0.0.1', port);
    await transport.connect();
    await transport.send(encodeText('/?12345678!\r\n'));

    const frame = await new FrameReader(transport, { timeout: 5000 }).read();

    expect(frame.length).toBe(readout.length);
    const parsed = ReadoutDataMessage.fromBytes(frame);
    expect(parsed.data).toHaveLength(600);
    expect(parsed.data[599]?.address).toBe('1.8.599');

    await transport.disconnect();
  });

  it('fails the read instead of dropping bytes when the buffer overflows', async () => {
    const port = await startMeter(encodeText('x'.repeat(100)));
    const transport = new NodeTcpTransport('127.0.0.1', port, { maxBufferSize: 64 });
    await transport.connect();
    await transport.send(encodeText('/?12345678!\r\n'));

    const error = await transport.recv(200, 2000).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(Iec62056TransportError);
    expect(error instanceof Error && error.message).toBe('Read buffer overflow');
    // The discarded bytes are gone; nothing is left to read
    await expect(transport.recv(1, 50)).rejects.toThrow(Iec62056TimeoutError);

    await transport.disconnect();
  });

  it('refuses to send before connecting', async () => {
    const transport = new NodeTcpTransport('127.0.0.1', 5000);
    await expect(transport.send(encodeText('x'))).rejects.toThrow(Iec62056NotConnectedError);
  });
});
