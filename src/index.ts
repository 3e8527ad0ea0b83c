// src/index.ts

export { Iec62056Client } from './client.js';
export { FrameReader } from './framers/frame-reader.js';
export type { FrameReaderOptions } from './framers/frame-reader.js';
export * from './messages/index.js';
export * from './errors.js';
export * from './constants/constants.js';
export { calculateBcc, addBcc, isBccValid, addBccToString, isBccValidString } from './utils/bcc.js';
export { NoopErrorParser } from './error-parsers/error-parser.js';
export type { ErrorParser } from './error-parsers/error-parser.js';
export {
  Lis200ErrorParser,
  Lis200ProtocolError,
  LIS200_ERROR_MESSAGES,
} from './error-parsers/lis200.js';
export {
  ArchiveReadout,
  ArchiveReadoutCommand,
  formatLis200Datetime,
  parseLis200Datetime,
} from './lis200/archive.js';
export type { ArchiveDataPoint, ArchiveReadoutCommandInit } from './lis200/archive.js';
export { createTransport } from './transport/factory.js';
export type {
  SerialTransportFactoryOptions,
  TcpTransportFactoryOptions,
} from './transport/factory.js';
export { default as Logger, rootLogger } from './logger.js';
export type * from './types/iec-types.js';
