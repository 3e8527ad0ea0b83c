// src/types/iec-types.ts

import type { ErrorParser } from '../error-parsers/error-parser.js';

// !=============================================================================
// ! Transport
// !=============================================================================

/**
 * Byte transport for one session. Implementations own the physical link; the
 * client only sends and receives bytes through it.
 */
export interface Transport {
  readonly isOpen: boolean;
  /**
   * Whether the request message must carry the device address
   * (true on buses and networks, false on a point-to-point optical probe).
   */
  readonly requiresAddress: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  send(buffer: Uint8Array): Promise<void>;
  /**
   * Resolves with exactly `length` bytes, or rejects with Iec62056TimeoutError.
   */
  recv(length: number, timeout?: number): Promise<Uint8Array>;
  /**
   * Changes the line speed after the option select. A no-op on network transports.
   */
  switchBaudrate(baudRate: number): Promise<void>;
  flush?(): Promise<void>;
}

export type TransportType = 'serial' | 'tcp';

/** Options for the serialport based transport */
export interface NodeSerialTransportOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  readTimeout?: number;
  /** Unread bytes held before the next recv fails with a buffer overflow */
  maxBufferSize?: number;
  /** Pause before re-clocking the port on a baud switch, ms */
  switchoverDelay?: number;
}

/** Options for the TCP transport */
export interface NodeTcpTransportOptions {
  readTimeout?: number;
  connectTimeout?: number;
  /** Unread bytes held before the next recv fails with a buffer overflow */
  maxBufferSize?: number;
}

// !=============================================================================
// ! Client
// !=============================================================================

export interface ClientOptions {
  /** Device address sent in the request message when the transport requires one */
  deviceAddress?: string;
  /** Password used by sendPassword() when none is passed */
  password?: string;
  /** Send the NUL wake-up sequence before each request */
  batteryPowered?: boolean;
  errorParser?: ErrorParser;
  /** Deadline for one framed read, ms */
  timeout?: number;
  /** Consecutive BCC failures tolerated per packet before giving up */
  maxChecksumRetries?: number;
  /** Level of this client's own log category */
  logLevel?: LogLevel;
}

/**
 * Handshake phases of a session, in order.
 */
export type SessionPhase =
  | 'new'
  | 'started'
  | 'mode-selected'
  | 'baud-switched'
  | 'active'
  | 'terminated';

/**
 * Snapshot of what the client learned during the handshake. Replaced as a whole at
 * every phase change; only startup() fills in the identification fields.
 */
export interface SessionState {
  readonly phase: SessionPhase;
  readonly identification: string | null;
  readonly manufacturerId: string | null;
  readonly switchoverBaudrateChar: string | null;
  readonly useShortReactionTime: boolean;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Context for log lines */
export interface LogContext {
  command?: string;
  address?: string;
  bytes?: number;
  responseTime?: number;
  logger?: string;
  transport?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogField = keyof LogContext | 'timestamp' | 'level' | 'logger';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

/** Named logger bound to a category */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  group(): void;
  groupEnd(): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}
