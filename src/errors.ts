// src/errors.ts

/**
 * Base class for all IEC 62056-21 errors
 */
export class Iec62056Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'Iec62056Error';
  }
}

// --- Errors for Message Format ---

/**
 * Error class for text or bytes that cannot be decoded into a message
 */
export class Iec62056ParseError extends Iec62056Error {
  constructor(message: string = 'Unable to parse IEC 62056-21 data') {
    super(message);
    this.name = 'Iec62056ParseError';
  }
}

/**
 * Error class for values rejected at construction (command letters, modes...)
 */
export class Iec62056ValidationError extends Iec62056Error {
  constructor(message: string = 'Invalid IEC 62056-21 data') {
    super(message);
    this.name = 'Iec62056ValidationError';
  }
}

/**
 * Error class for BCC check failure
 */
export class Iec62056ChecksumError extends Iec62056ValidationError {
  constructor(message: string = 'BCC not valid') {
    super(message);
    this.name = 'Iec62056ChecksumError';
  }
}

/**
 * Error class for frames missing their SOH/STX marker
 */
export class Iec62056FramingError extends Iec62056Error {
  constructor(message: string = 'No SOH or STX found in message') {
    super(message);
    this.name = 'Iec62056FramingError';
  }
}

// --- Errors for Connection and Transport ---

/**
 * Error class for reads that received no byte in time
 */
export class Iec62056TimeoutError extends Iec62056Error {
  constructor(message: string = 'IEC 62056-21 read timed out') {
    super(message);
    this.name = 'Iec62056TimeoutError';
  }
}

/**
 * Error class for underlying I/O failures
 */
export class Iec62056TransportError extends Iec62056Error {
  constructor(message: string = 'Transport error') {
    super(message);
    this.name = 'Iec62056TransportError';
  }
}

/**
 * Error class for not connected
 */
export class Iec62056NotConnectedError extends Iec62056TransportError {
  constructor() {
    super('Not connected to IEC 62056-21 device');
    this.name = 'Iec62056NotConnectedError';
  }
}

/**
 * Error class for a misconfigured client
 */
export class Iec62056ClientError extends Iec62056Error {
  constructor(message: string) {
    super(message);
    this.name = 'Iec62056ClientError';
  }
}

/**
 * Error class for protocol variants the library does not implement
 */
export class Iec62056NotSupportedError extends Iec62056Error {
  constructor(message: string) {
    super(message);
    this.name = 'Iec62056NotSupportedError';
  }
}

// --- Errors for Session Replies ---

/**
 * Error class for a single-value read that returned more than one value
 */
export class Iec62056TooManyValuesReturnedError extends Iec62056Error {
  count: number;

  constructor(count: number) {
    super(`Read of one value returned ${count}`);
    this.name = 'Iec62056TooManyValuesReturnedError';
    this.count = count;
  }
}

/**
 * Error class for a read that returned no data
 */
export class Iec62056NoDataReturnedError extends Iec62056Error {
  constructor(message: string = 'Read returned no data') {
    super(message);
    this.name = 'Iec62056NoDataReturnedError';
  }
}

/**
 * Error class for replies that break the protocol flow
 */
export class Iec62056ProtocolError extends Iec62056Error {
  constructor(message: string) {
    super(message);
    this.name = 'Iec62056ProtocolError';
  }
}

/**
 * Error class for a NACK received in reply to a request
 */
export class Iec62056NackError extends Iec62056ProtocolError {
  constructor(request: string) {
    super(`Received NACK upon sending ${request}`);
    this.name = 'Iec62056NackError';
  }
}
