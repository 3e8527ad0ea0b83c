// src/transport/factory.ts

import { Iec62056ClientError } from '../errors.js';
import { rootLogger } from '../logger.js';
import type {
  NodeSerialTransportOptions,
  NodeTcpTransportOptions,
  Transport,
  TransportType,
} from '../types/iec-types.js';

const logger = rootLogger.createLogger('TransportFactory');

export interface SerialTransportFactoryOptions extends NodeSerialTransportOptions {
  path: string;
}

export interface TcpTransportFactoryOptions extends NodeTcpTransportOptions {
  host: string;
  port: number;
}

/**
 * Creates a transport for the given type. The implementation module is loaded on demand,
 * so `serialport` is only required when a serial transport is created.
 *
 * @param type - `'serial'` (optical probe or RS-232/485 via serialport) or `'tcp'`
 *   (terminal server or meter with a network port)
 * @throws Iec62056ClientError if the type is unknown or a required option is missing
 */
export async function createTransport(
  type: 'serial',
  options: SerialTransportFactoryOptions
): Promise<Transport>;
export async function createTransport(
  type: 'tcp',
  options: TcpTransportFactoryOptions
): Promise<Transport>;
export async function createTransport(
  type: TransportType,
  options: SerialTransportFactoryOptions | TcpTransportFactoryOptions
): Promise<Transport>;
export async function createTransport(
  type: TransportType,
  options: SerialTransportFactoryOptions | TcpTransportFactoryOptions
): Promise<Transport> {
  try {
    switch (type) {
      case 'serial': {
        if (!('path' in options) || !options.path) {
          throw new Iec62056ClientError('Missing "path" option for serial transport');
        }
        const { path, ...rest } = options;
        const { NodeSerialTransport } = await import('./node-transports/node-serialport.js');
        logger.debug(`Creating NodeSerialTransport on ${path}`);
        return new NodeSerialTransport(path, rest);
      }

      case 'tcp': {
        if (!('host' in options) || !options.host) {
          throw new Iec62056ClientError('Missing "host" option for tcp transport');
        }
        const { host, port, ...rest } = options;
        const { NodeTcpTransport } = await import('./node-transports/node-tcp-transport.js');
        logger.debug(`Creating NodeTcpTransport to ${host}:${port}`);
        return new NodeTcpTransport(host, port, rest);
      }

      default:
        throw new Iec62056ClientError(`Unknown transport type: ${String(type)}`);
    }
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Failed to create transport of type "${String(type)}": ${message}`);
    throw err;
  }
}
