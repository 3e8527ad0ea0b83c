// src/client.ts

import { Mutex } from 'async-mutex';
import {
  BATTERY_STARTUP,
  BAUDRATES_MODE_C,
  type BaudrateChar,
  CONTROL_BYTES,
  DEFAULT_PASSWORD,
  MODE_CONTROL_CHARACTER,
  type ProtocolMode,
  REACTION_TIME,
  REST_FACTOR,
  SHORT_REACTION_TIME,
} from './constants/constants.js';
import {
  Iec62056ClientError,
  Iec62056NackError,
  Iec62056NoDataReturnedError,
  Iec62056NotSupportedError,
  Iec62056ProtocolError,
  Iec62056TooManyValuesReturnedError,
  Iec62056ValidationError,
} from './errors.js';
import { NoopErrorParser } from './error-parsers/error-parser.js';
import type { ErrorParser } from './error-parsers/error-parser.js';
import { FrameReader } from './framers/frame-reader.js';
import { ArchiveReadoutCommand } from './lis200/archive.js';
import { rootLogger } from './logger.js';
import {
  AckOptionSelectMessage,
  AnswerDataMessage,
  CommandMessage,
  DataSet,
  IdentificationMessage,
  ReadoutDataMessage,
  RequestMessage,
} from './messages/index.js';
import type { ResponseMessage } from './messages/index.js';
import { createTransport } from './transport/factory.js';
import type {
  SerialTransportFactoryOptions,
  TcpTransportFactoryOptions,
} from './transport/factory.js';
import type {
  ClientOptions,
  LogContext,
  LoggerInstance,
  LogLevel,
  SessionPhase,
  SessionState,
  Transport,
} from './types/iec-types.js';
import { describeBytes, sleep } from './utils/utils.js';

// Each client logs under its own category so levels can be set per session
let clientCount = 0;

const INITIAL_STATE: SessionState = {
  phase: 'new',
  identification: null,
  manufacturerId: null,
  switchoverBaudrateChar: null,
  useShortReactionTime: false,
};

function isBaudrateChar(value: string): value is BaudrateChar {
  return Object.prototype.hasOwnProperty.call(BAUDRATES_MODE_C, value);
}

function isProtocolMode(value: string): value is ProtocolMode {
  return Object.prototype.hasOwnProperty.call(MODE_CONTROL_CHARACTER, value);
}

/**
 * Separates the client's own options from those meant for the transport.
 */
function splitOptions<T extends ClientOptions>(
  options: T
): { clientOptions: ClientOptions; transportOptions: Omit<T, keyof ClientOptions> } {
  const {
    deviceAddress,
    password,
    batteryPowered,
    errorParser,
    timeout,
    maxChecksumRetries,
    logLevel,
    ...transportOptions
  } = options;
  return {
    clientOptions: {
      deviceAddress,
      password,
      batteryPowered,
      errorParser,
      timeout,
      maxChecksumRetries,
      logLevel,
    },
    transportOptions,
  };
}

/**
 * Drives an IEC 62056-21 mode C session over one transport.
 *
 * Public operations are serialised by a mutex: a session is a strict request/response
 * dialogue and two interleaved operations would corrupt it.
 */
export class Iec62056Client {
  readonly transport: Transport;
  private deviceAddress: string;
  private password: string;
  private batteryPowered: boolean;
  private errorParser: ErrorParser;
  private reader: FrameReader;
  private _state: SessionState = INITIAL_STATE;
  private _mutex: Mutex;
  private logger: LoggerInstance;

  /**
   * @throws Iec62056ClientError if the transport needs a device address and none is given
   */
  constructor(transport: Transport, options: ClientOptions = {}) {
    if (transport.requiresAddress && !options.deviceAddress) {
      throw new Iec62056ClientError(
        'The transport requires a device address but none was given'
      );
    }

    this.transport = transport;
    this.deviceAddress = options.deviceAddress ?? '';
    this.password = options.password ?? DEFAULT_PASSWORD;
    this.batteryPowered = options.batteryPowered ?? false;
    this.errorParser = options.errorParser ?? new NoopErrorParser();
    this.reader = new FrameReader(transport, {
      timeout: options.timeout,
      maxChecksumRetries: options.maxChecksumRetries,
    });
    this._mutex = new Mutex();
    clientCount += 1;
    this.logger = rootLogger.createLogger(`Iec62056Client#${clientCount}`);
    if (options.logLevel) {
      this.logger.setLevel(options.logLevel);
    }
  }

  /**
   * Creates a client on a serial port (optical probe at 300 baud 7E1).
   */
  static async withSerialTransport(
    path: string,
    options: ClientOptions & Omit<SerialTransportFactoryOptions, 'path'> = {}
  ): Promise<Iec62056Client> {
    const { clientOptions, transportOptions } = splitOptions(options);
    const transport = await createTransport('serial', { ...transportOptions, path });
    return new Iec62056Client(transport, clientOptions);
  }

  /**
   * Creates a client on a TCP connection. `deviceAddress` is required.
   */
  static async withTcpTransport(
    host: string,
    port: number,
    options: ClientOptions & Omit<TcpTransportFactoryOptions, 'host' | 'port'> = {}
  ): Promise<Iec62056Client> {
    const { clientOptions, transportOptions } = splitOptions(options);
    const transport = await createTransport('tcp', { ...transportOptions, host, port });
    return new Iec62056Client(transport, clientOptions);
  }

  /**
   * Enables logging for this client only; other sessions keep their level.
   * @param level - Logging level
   */
  enableLogger(level: LogLevel = 'info'): void {
    this.logger.setLevel(level);
  }

  /**
   * Disables this client's logger (only errors get through)
   */
  disableLogger(): void {
    this.logger.setLevel('error');
  }

  /**
   * Adds fields (e.g. a meter serial) to every log line of the process, not only this
   * client's.
   */
  setLoggerContext(context: LogContext): void {
    rootLogger.addGlobalContext(context);
  }

  /** Current session snapshot */
  get state(): SessionState {
    return this._state;
  }

  get phase(): SessionPhase {
    return this._state.phase;
  }

  get identification(): string | null {
    return this._state.identification;
  }

  get manufacturerId(): string | null {
    return this._state.manufacturerId;
  }

  /**
   * Baud rate the device proposed in its identification message.
   * @throws Iec62056ProtocolError before startup() or for a character outside the mode C table
   */
  get switchoverBaudrate(): number {
    const char = this._state.switchoverBaudrateChar;
    if (char === null) {
      throw new Iec62056ProtocolError('No identification received yet');
    }
    if (!isBaudrateChar(char)) {
      throw new Iec62056ProtocolError(`Unknown switchover baud rate character: ${char}`);
    }
    return BAUDRATES_MODE_C[char];
  }

  /** 20 ms when the manufacturer ID ends in a lowercase letter, else 200 ms */
  get reactionTime(): number {
    return this._state.useShortReactionTime ? SHORT_REACTION_TIME : REACTION_TIME;
  }

  /**
   * Waits before the next message; defaults to 1.25 reaction times.
   */
  async rest(ms?: number): Promise<void> {
    const duration = ms ?? this.reactionTime * REST_FACTOR;
    this.logger.trace(`Resting for ${duration}ms`);
    await sleep(duration);
  }

  private _transition(phase: SessionPhase, patch: Partial<Omit<SessionState, 'phase'>> = {}): void {
    const previous = this._state.phase;
    this._state = { ...this._state, ...patch, phase };
    this.logger.debug(`Session ${previous} -> ${phase}`);
  }

  private async _send(bytes: Uint8Array, context: LogContext = {}): Promise<void> {
    this.logger.debug(`Sending ${describeBytes(bytes)}`, { ...context, bytes: bytes.length });
    await this.transport.send(bytes);
  }

  // ----- transport -----

  async connect(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      await this.transport.connect();
      this.logger.info('Transport connected');
    } finally {
      release();
    }
  }

  async disconnect(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      await this.transport.disconnect();
      this.logger.info('Transport disconnected');
    } finally {
      release();
    }
  }

  // ----- handshake -----

  /**
   * Wakes a battery powered device: NUL bytes for 2.2 s, one every 200 ms, then 1.5 s
   * of silence before the request.
   * @throws Iec62056NotSupportedError for the fast sequence
   */
  async sendBatteryPoweredStartupSequence(fast: boolean = false): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      await this._sendBatteryPoweredStartupSequence(fast);
    } finally {
      release();
    }
  }

  private async _sendBatteryPoweredStartupSequence(fast: boolean): Promise<void> {
    if (fast) {
      throw new Iec62056NotSupportedError('Fast battery startup sequence is not implemented');
    }
    this.logger.info('Sending battery startup sequence');
    const count = Math.floor(BATTERY_STARTUP.DURATION_MS / BATTERY_STARTUP.INTERVAL_MS);
    const nul = Uint8Array.of(CONTROL_BYTES.NUL);
    for (let i = 0; i < count; i++) {
      await this.transport.send(nul);
      await sleep(BATTERY_STARTUP.INTERVAL_MS);
    }
    this.logger.info('Battery startup sequence finished');
    await sleep(BATTERY_STARTUP.SETTLE_MS);
  }

  /**
   * Opens the session: sends the request message and reads the identification.
   */
  async startup(): Promise<IdentificationMessage> {
    const release = await this._mutex.acquire();
    try {
      return await this._startup();
    } finally {
      release();
    }
  }

  private async _startup(): Promise<IdentificationMessage> {
    if (this.batteryPowered) {
      await this._sendBatteryPoweredStartupSequence(false);
    }

    // Only shared links carry the address; a probe talks to exactly one meter.
    const request = this.transport.requiresAddress
      ? new RequestMessage(this.deviceAddress)
      : new RequestMessage();
    this.logger.info('Sending request message', { address: request.deviceAddress });
    await this._send(request.toBytes());
    await this.rest();

    const data = await this.reader.readUntil('/', '\n');
    const identification = IdentificationMessage.fromBytes(data);
    this.logger.info(
      `Identified ${identification.manufacturer} ${identification.identification}, baud char ${identification.switchoverBaudrateChar}`
    );

    this._transition('started', {
      identification: identification.identification,
      manufacturerId: identification.manufacturer,
      switchoverBaudrateChar: identification.switchoverBaudrateChar,
      useShortReactionTime: identification.usesShortReactionTime,
    });
    return identification;
  }

  /**
   * Acknowledges the identification, selecting the session mode and the switchover baud
   * rate the device proposed.
   * @param mode - `readout`, `programming`, `binary` or `manufacturer6`..`manufacturer9`
   * @throws Iec62056ValidationError for an unknown mode
   */
  async ackWithOptionSelect(mode: string): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      await this._ackWithOptionSelect(mode);
    } finally {
      release();
    }
  }

  private async _ackWithOptionSelect(mode: string): Promise<void> {
    if (!isProtocolMode(mode)) {
      throw new Iec62056ValidationError(
        `Unknown mode ${JSON.stringify(mode)}, allowed: ${Object.keys(MODE_CONTROL_CHARACTER).join(', ')}`
      );
    }
    const baudChar = this._state.switchoverBaudrateChar;
    if (baudChar === null) {
      throw new Iec62056ProtocolError('No identification received yet');
    }

    const message = new AckOptionSelectMessage({
      baudChar,
      modeChar: MODE_CONTROL_CHARACTER[mode],
    });
    this.logger.info(`Selecting ${mode} mode`);
    await this._send(message.toBytes());
    await this.rest();
    this._transition('mode-selected');
  }

  private async _switchBaudrate(): Promise<void> {
    const baudRate = this.switchoverBaudrate;
    await this.transport.switchBaudrate(baudRate);
    this._transition('baud-switched');
  }

  /**
   * Runs startup, selects programming mode and switches baud rate. Returns the device's
   * first reply, usually the password challenge (`P0`).
   */
  async accessProgrammingMode(): Promise<ResponseMessage> {
    const release = await this._mutex.acquire();
    try {
      await this._startup();
      await this._ackWithOptionSelect('programming');
      await this._switchBaudrate();
      const response = await this._readResponse();
      this._transition('active');
      return response;
    } finally {
      release();
    }
  }

  /**
   * Runs startup, selects readout mode, switches baud rate and returns the data the
   * device sends unprompted.
   */
  async standardReadout(): Promise<ReadoutDataMessage> {
    const release = await this._mutex.acquire();
    try {
      await this._startup();
      await this._ackWithOptionSelect('readout');
      await this._switchBaudrate();
      this.logger.info('Reading standard readout');
      const data = await this.reader.read();
      const readout = ReadoutDataMessage.fromBytes(data);
      this.errorParser.checkForErrors(readout);
      this._transition('active');
      return readout;
    } finally {
      release();
    }
  }

  // ----- programming mode commands -----

  /**
   * Answers the password challenge with `P1(password)`.
   * @param password - defaults to the configured password
   */
  async sendPassword(password?: string): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      const message = new CommandMessage({
        command: 'P',
        commandType: '1',
        dataSet: new DataSet({ value: password ?? this.password }),
      });
      this.logger.info('Sending password', { command: 'P1' });
      await this._send(message.toBytes(), { command: 'P1' });
    } finally {
      release();
    }
  }

  /**
   * Ends the session with `B0`.
   */
  async sendBreak(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      const message = new CommandMessage({ command: 'B', commandType: '0' });
      this.logger.info('Sending break', { command: 'B0' });
      await this._send(message.toBytes(), { command: 'B0' });
      this._transition('terminated');
    } finally {
      release();
    }
  }

  /**
   * Reads one value with `R1`.
   * @param additionalData - content of the parentheses; most devices expect `1`
   * @throws Iec62056NoDataReturnedError if the answer holds no data set
   * @throws Iec62056TooManyValuesReturnedError if it holds more than one
   */
  async readSingleValue(address: string, additionalData: string = '1'): Promise<DataSet> {
    const release = await this._mutex.acquire();
    try {
      const context: LogContext = { command: 'R1', address };
      const request = CommandMessage.forSingleRead(address, additionalData);
      const started = Date.now();
      await this._send(request.toBytes(), context);

      const response = await this._readResponse();
      if (!(response instanceof AnswerDataMessage)) {
        throw new Iec62056ProtocolError(
          `Expected data in reply to a read, got command ${response.command}${response.commandType}`
        );
      }
      const { data } = response;
      if (data.length > 1) {
        throw new Iec62056TooManyValuesReturnedError(data.length);
      }
      const [value] = data;
      if (value === undefined) {
        throw new Iec62056NoDataReturnedError();
      }
      this.logger.info(`Read ${value.toRepresentation()}`, {
        ...context,
        responseTime: Date.now() - started,
      });
      return value;
    } finally {
      release();
    }
  }

  /**
   * Writes one value with `W1` and waits for the device's ACK.
   * @throws Iec62056NackError if the device refuses the write
   * @throws Iec62056ProtocolError for any other reply byte
   */
  async writeSingleValue(address: string, value: string): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      const context: LogContext = { command: 'W1', address };
      const request = CommandMessage.forSingleWrite(address, value);
      await this._send(request.toBytes(), context);

      const reply = await this.reader.readControl();
      if (reply === CONTROL_BYTES.ACK) {
        this.logger.info('Write accepted', context);
        return;
      }
      if (reply === CONTROL_BYTES.NACK) {
        this.logger.warn('Write refused', context);
        throw new Iec62056NackError(request.toRepresentation());
      }
      throw new Iec62056ProtocolError(
        `Received invalid response ${describeBytes(Uint8Array.of(reply))} to write request`
      );
    } finally {
      release();
    }
  }

  /**
   * Reads a LIS-200 archive (values, addresses or units depending on the attribute).
   */
  async readArchive(command: ArchiveReadoutCommand): Promise<AnswerDataMessage> {
    const release = await this._mutex.acquire();
    try {
      const context: LogContext = { command: command.partialBlocks ? 'R3' : 'R1' };
      await this._send(command.toBytes(), context);
      const response = await this._readResponse();
      if (!(response instanceof AnswerDataMessage)) {
        throw new Iec62056ProtocolError(
          `Expected archive data, got command ${response.command}${response.commandType}`
        );
      }
      this.logger.info(`Archive ${command.archive} returned ${response.dataBlock.dataLines.length} rows`, context);
      return response;
    } finally {
      release();
    }
  }

  /**
   * Reads and parses the next reply: a command (e.g. a password challenge) or data, the
   * latter checked by the configured error parser.
   */
  async readResponse(): Promise<ResponseMessage> {
    const release = await this._mutex.acquire();
    try {
      return await this._readResponse();
    } finally {
      release();
    }
  }

  private async _readResponse(): Promise<ResponseMessage> {
    const data = await this.reader.read();
    const first = data[0];

    if (first === CONTROL_BYTES.SOH) {
      const command = CommandMessage.fromBytes(data);
      this.logger.debug(`Received command ${command.command}${command.commandType}`);
      return command;
    }
    if (data.length === 1) {
      throw new Iec62056ProtocolError(
        `Expected a frame, got control reply ${describeBytes(data)}`
      );
    }

    const answer = AnswerDataMessage.fromBytes(data);
    this.errorParser.checkForErrors(answer);
    return answer;
  }
}

export default Iec62056Client;
