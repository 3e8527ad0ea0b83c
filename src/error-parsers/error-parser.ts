// src/error-parsers/error-parser.ts

import type { DataMessage } from '../messages/index.js';

/**
 * Inspects an answer for manufacturer specific error values and throws if it finds one.
 * Error values live inside ordinary data sets and their format differs per vendor, so the
 * client only calls this hook; catalogs are plugged in by the caller.
 */
export interface ErrorParser {
  checkForErrors(answer: DataMessage): void;
}

/**
 * Default parser: accepts every answer.
 */
export class NoopErrorParser implements ErrorParser {
  checkForErrors(_answer: DataMessage): void {}
}
